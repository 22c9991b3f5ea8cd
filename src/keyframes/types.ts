import type { KeyframeMethod } from '../config.js';
import type { FrameSource } from '../media/frame-source.js';

export type { KeyframeMethod };

export interface Candidate {
  frameIndex: number;
  timestampS: number;
  method: KeyframeMethod;
  /** Dissimilarity against the previous (sampled) frame; null for I_frame. */
  score: number | null;
}

export interface Keyframe {
  frameIndex: number;
  timestampS: number;
  method: KeyframeMethod;
  score: number | null;
  localPath: string | null;
  s3Url: string | null;
}

export interface MethodSpec {
  method: KeyframeMethod;
  /** Null only for I_frame, which has no intrinsic score. */
  threshold: number | null;
}

export interface ScorerContext {
  signal?: AbortSignal;
}

/**
 * One detection strategy. `candidates()` opens its own decode session on the
 * source and must release it when iteration stops for any reason.
 */
export interface KeyframeScorer {
  readonly spec: MethodSpec;
  candidates(source: FrameSource, ctx: ScorerContext): AsyncIterable<Candidate>;
}
