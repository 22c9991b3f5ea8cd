/**
 * I_frame — container-declared key frames as candidates. No pixel decode,
 * no score, no threshold; only the selector's interval and cap apply.
 */
import { logger } from '../../utils/logger.js';
import { MethodUnavailableError } from '../../utils/errors.js';
import type { FrameSource } from '../../media/frame-source.js';
import type { Candidate, KeyframeScorer, MethodSpec, ScorerContext } from '../types.js';

export class IndexFrameScorer implements KeyframeScorer {
  readonly spec: MethodSpec = { method: 'I_frame', threshold: null };

  async *candidates(source: FrameSource, ctx: ScorerContext): AsyncGenerator<Candidate> {
    const frames = await source.probeKeyframeIndices(ctx.signal);
    if (frames.length === 0) {
      throw new MethodUnavailableError('I_frame', 'Container declares no index frames');
    }
    logger.debug('I_frame: index frames listed', { count: frames.length });

    for (const f of frames) {
      yield { frameIndex: f.frameIndex, timestampS: f.timestampS, method: 'I_frame', score: null };
    }
  }
}
