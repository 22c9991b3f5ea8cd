/**
 * optical_flow — aggregate motion between consecutive *sampled* frames
 * (every `flowStep`-th frame). The most expensive method; meant as the
 * fallback for slow pans that never trip the cut detectors.
 */
import { DEFAULT_THRESHOLDS, FLOW_PARAMS, SELECTION_DEFAULTS } from '../../config.js';
import type { FrameSource } from '../../media/frame-source.js';
import { meanFlowMagnitude, toLuma, type LumaPlane } from '../signal.js';
import type { Candidate, KeyframeScorer, MethodSpec, ScorerContext } from '../types.js';

export interface OpticalFlowOptions {
  threshold?: number;
  flowStep?: number;
  blockSize?: number;
  searchRadius?: number;
}

export class OpticalFlowScorer implements KeyframeScorer {
  readonly spec: MethodSpec;
  private readonly flowStep: number;
  private readonly params: { blockSize: number; searchRadius: number };

  constructor(opts: OpticalFlowOptions = {}) {
    this.spec = { method: 'optical_flow', threshold: opts.threshold ?? DEFAULT_THRESHOLDS.optical_flow };
    this.flowStep = opts.flowStep ?? SELECTION_DEFAULTS.flowStep;
    this.params = {
      blockSize:    opts.blockSize ?? FLOW_PARAMS.blockSize,
      searchRadius: opts.searchRadius ?? FLOW_PARAMS.searchRadius,
    };
  }

  async *candidates(source: FrameSource, ctx: ScorerContext): AsyncGenerator<Candidate> {
    let prev: LumaPlane | null = null;
    for await (const frame of source.decode({ step: this.flowStep, signal: ctx.signal })) {
      const luma = toLuma(frame.pixels, frame.width, frame.height);
      if (prev) {
        yield {
          frameIndex: frame.index,
          timestampS: frame.timestampS,
          method: 'optical_flow',
          score: meanFlowMagnitude(prev, luma, this.params),
        };
      }
      prev = luma;
    }
  }
}
