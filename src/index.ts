/**
 * framesift — keyframe extraction for local, HTTP and S3 videos.
 *
 * Library entry point. The CLI lives in ./cli.ts.
 */
export { extractVideoKeyframes, type ExtractOptions, type ExtractResult } from './pipeline/index.js';
export {
  normalizeImageFormat,
  toManifest,
  writeArtifacts,
  writeManifest,
  type ArtifactOptions,
  type ManifestEntry,
} from './pipeline/artifacts.js';
export {
  detectKeyframes,
  resolveKeyframeOptions,
  KeyframeOptionsSchema,
  type AttemptOutcome,
  type KeyframeOptions,
  type KeyframeRunResult,
  type MethodAttempt,
  type ResolvedKeyframeOptions,
  type RunControl,
  type RunState,
} from './keyframes/engine.js';
export { KeyframeSelector, selectKeyframes, type SelectionPolicy, type Verdict } from './keyframes/selector.js';
export {
  createScorer,
  DifferenceScorer,
  HistogramScorer,
  IndexFrameScorer,
  OpticalFlowScorer,
  type OpticalFlowOptions,
  type ScorerSettings,
} from './keyframes/scorers/index.js';
export type { Candidate, Keyframe, KeyframeScorer, MethodSpec, ScorerContext } from './keyframes/types.js';
export {
  FfmpegFrameSource,
  openFrameSource,
  type DecodeOptions,
  type Frame,
  type FrameSource,
  type IndexFrame,
  type VideoStreamInfo,
} from './media/frame-source.js';
export { prepareInput, type PreparedInput } from './media/inputs.js';
export {
  ArtifactError,
  CancellationError,
  FramesiftError,
  KeyframeOptionsError,
  MethodUnavailableError,
  SourceError,
} from './utils/errors.js';
export { DEFAULT_THRESHOLDS, KEYFRAME_METHODS, type KeyframeMethod } from './config.js';
