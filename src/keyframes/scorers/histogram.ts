/**
 * histogram — Bhattacharyya distance between the luma histograms of
 * consecutive decoded frames. Tolerates local motion that pixel differencing
 * over-reacts to; less sensitive to gradual fades.
 */
import { DEFAULT_THRESHOLDS, HISTOGRAM_BINS } from '../../config.js';
import type { FrameSource } from '../../media/frame-source.js';
import { bhattacharyyaDistance, lumaHistogram, toLuma } from '../signal.js';
import type { Candidate, KeyframeScorer, MethodSpec, ScorerContext } from '../types.js';

export class HistogramScorer implements KeyframeScorer {
  readonly spec: MethodSpec;

  constructor(
    threshold: number = DEFAULT_THRESHOLDS.histogram,
    private readonly bins: number = HISTOGRAM_BINS,
  ) {
    this.spec = { method: 'histogram', threshold };
  }

  async *candidates(source: FrameSource, ctx: ScorerContext): AsyncGenerator<Candidate> {
    let prev: Float64Array | null = null;
    for await (const frame of source.decode({ step: 1, signal: ctx.signal })) {
      const hist = lumaHistogram(toLuma(frame.pixels, frame.width, frame.height), this.bins);
      if (prev) {
        yield {
          frameIndex: frame.index,
          timestampS: frame.timestampS,
          method: 'histogram',
          score: bhattacharyyaDistance(prev, hist),
        };
      }
      prev = hist;
    }
  }
}
