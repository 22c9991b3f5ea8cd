/**
 * Keyframe extraction pipeline — input resolution → probe → method
 * orchestration → artifacts.
 *
 * Resolution and probe failures are fatal (`SourceError`); per-method failures
 * are absorbed by the orchestrator; an aborted or timed-out run comes back
 * with status `incomplete` and writes no artifacts.
 */
import { logger } from '../utils/logger.js';
import { prepareInput } from '../media/inputs.js';
import { openFrameSource, type FrameSource } from '../media/frame-source.js';
import {
  detectKeyframes,
  resolveKeyframeOptions,
  type KeyframeOptions,
  type KeyframeRunResult,
  type RunState,
} from '../keyframes/engine.js';
import { normalizeImageFormat, writeArtifacts, type ArtifactOptions } from './artifacts.js';

export interface ExtractOptions extends KeyframeOptions, Omit<ArtifactOptions, 'signal' | 'cleanup'> {
  /** Remove temp downloads and temp outputs (default true). */
  cleanup?: boolean;
  signal?: AbortSignal;
  /** Abort detection after this many milliseconds. */
  timeoutMs?: number;
  onStateChange?: (state: RunState) => void;
  /** Replaces the ffmpeg-backed source; the path is the resolved local input. */
  openSource?: (localPath: string, signal?: AbortSignal) => Promise<FrameSource>;
}

export type ExtractResult = KeyframeRunResult;

export async function extractVideoKeyframes(
  inputPath: string,
  options: ExtractOptions = {},
): Promise<ExtractResult> {
  const { cleanup = true, signal, timeoutMs, onStateChange, openSource } = options;
  // Validate before touching the network or spawning anything
  const keyframeOptions = resolveKeyframeOptions({
    methods: options.methods,
    threshold: options.threshold,
    maxKeyframes: options.maxKeyframes,
    minIntervalS: options.minIntervalS,
    flowStep: options.flowStep,
  });
  normalizeImageFormat(options.imageFormat);

  logger.info('Pipeline: extracting keyframes', { inputPath, methods: keyframeOptions.methods });
  const input = await prepareInput(inputPath, { signal, cleanup });

  try {
    const source = openSource
      ? await openSource(input.path, signal)
      : await openFrameSource(input.path, { signal });

    const result = await detectKeyframes(source, keyframeOptions, { signal, timeoutMs, onStateChange });
    if (result.status !== 'resolved') return result;

    const keyframes = await writeArtifacts(input.path, result.keyframes, {
      outputDir: options.outputDir,
      imageFormat: options.imageFormat,
      manifestPath: options.manifestPath,
      s3OutputPrefix: options.s3OutputPrefix,
      cleanup,
      signal,
    });
    logger.info('Pipeline: keyframes extracted', { method: result.method, count: keyframes.length });
    return { ...result, keyframes };
  } finally {
    await input.dispose();
  }
}
