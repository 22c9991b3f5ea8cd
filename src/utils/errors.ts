/**
 * Error taxonomy. The orchestrator recovers from `MethodUnavailableError` and
 * from `SourceError`s raised inside a method's decode session; everything
 * else reaches the caller.
 */

export class FramesiftError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'FramesiftError';
  }
}

/** The input cannot be resolved, probed or decoded. */
export class SourceError extends FramesiftError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'SourceError';
  }
}

/** A method's prerequisite signal is missing (e.g. no container index frames). */
export class MethodUnavailableError extends FramesiftError {
  constructor(public readonly method: string, message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'MethodUnavailableError';
  }
}

export class CancellationError extends FramesiftError {
  constructor(message = 'Keyframe extraction was cancelled', cause?: unknown) {
    super(message, cause);
    this.name = 'CancellationError';
  }
}

export class KeyframeOptionsError extends FramesiftError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'KeyframeOptionsError';
  }
}

/** Writing an image, uploading it or persisting the manifest failed. */
export class ArtifactError extends FramesiftError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ArtifactError';
  }
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancellationError(undefined, signal.reason);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
