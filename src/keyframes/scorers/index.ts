import type { KeyframeMethod } from '../../config.js';
import type { KeyframeScorer } from '../types.js';
import { DifferenceScorer } from './difference.js';
import { HistogramScorer } from './histogram.js';
import { IndexFrameScorer } from './iframe.js';
import { OpticalFlowScorer } from './optical-flow.js';

export { DifferenceScorer, HistogramScorer, IndexFrameScorer, OpticalFlowScorer };
export type { OpticalFlowOptions } from './optical-flow.js';

export interface ScorerSettings {
  /** Overrides the per-method default; ignored by I_frame. */
  threshold?: number;
  flowStep?: number;
}

export function createScorer(method: KeyframeMethod, settings: ScorerSettings = {}): KeyframeScorer {
  switch (method) {
    case 'I_frame':
      return new IndexFrameScorer();
    case 'difference':
      return new DifferenceScorer(settings.threshold);
    case 'histogram':
      return new HistogramScorer(settings.threshold);
    case 'optical_flow':
      return new OpticalFlowScorer({ threshold: settings.threshold, flowStep: settings.flowStep });
  }
}
