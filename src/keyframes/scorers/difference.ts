/**
 * difference — mean absolute luma change against the immediately preceding
 * decoded frame. Catches hard cuts cheaply; blind to slow drift.
 */
import { DEFAULT_THRESHOLDS } from '../../config.js';
import type { FrameSource } from '../../media/frame-source.js';
import { meanAbsoluteDifference, toLuma, type LumaPlane } from '../signal.js';
import type { Candidate, KeyframeScorer, MethodSpec, ScorerContext } from '../types.js';

export class DifferenceScorer implements KeyframeScorer {
  readonly spec: MethodSpec;

  constructor(threshold: number = DEFAULT_THRESHOLDS.difference) {
    this.spec = { method: 'difference', threshold };
  }

  async *candidates(source: FrameSource, ctx: ScorerContext): AsyncGenerator<Candidate> {
    let prev: LumaPlane | null = null;
    for await (const frame of source.decode({ step: 1, signal: ctx.signal })) {
      const luma = toLuma(frame.pixels, frame.width, frame.height);
      if (prev) {
        yield {
          frameIndex: frame.index,
          timestampS: frame.timestampS,
          method: 'difference',
          score: meanAbsoluteDifference(prev, luma),
        };
      }
      prev = luma;
    }
  }
}
