/**
 * Artifact writer — turns a resolved keyframe list into image files, optional
 * S3 uploads and an optional JSON manifest.
 */
import * as fs from 'fs';
import * as path from 'path';
import { env, IMAGE_CONTENT_TYPES, IMAGE_FORMATS } from '../config.js';
import { logger } from '../utils/logger.js';
import { ArtifactError, CancellationError, errorMessage, throwIfAborted } from '../utils/errors.js';
import { buildOutputFilename, extractFrameAtTime } from '../media/frames.js';
import { isS3Url, joinS3Url, uploadBufferToS3, uploadPathToS3 } from '../storage/s3.js';
import type { Keyframe } from '../keyframes/types.js';

export interface ArtifactOptions {
  outputDir?: string;
  /** jpg, jpeg or png; anything else is an ArtifactError. */
  imageFormat?: string;
  /** Local path or s3:// URL. */
  manifestPath?: string;
  /** s3://bucket/prefix/ — images are uploaded under it. */
  s3OutputPrefix?: string;
  /** Remove the temp image directory used for S3-only output. */
  cleanup?: boolean;
  signal?: AbortSignal;
}

export interface ManifestEntry {
  frame_index: number;
  timestamp_s: number;
  method: string;
  score: number | null;
  local_path: string | null;
  s3_url: string | null;
}

export function normalizeImageFormat(format: string = 'jpg'): 'jpg' | 'png' {
  const f = format.toLowerCase().replace(/^\./, '');
  if (!IMAGE_FORMATS.some((allowed) => allowed === f)) {
    throw new ArtifactError(`Unsupported image format: ${format}`);
  }
  return f === 'png' ? 'png' : 'jpg';
}

export function toManifest(keyframes: readonly Keyframe[]): ManifestEntry[] {
  return keyframes.map((k) => ({
    frame_index: k.frameIndex,
    timestamp_s: k.timestampS,
    method: k.method,
    score: k.score,
    local_path: k.localPath,
    s3_url: k.s3Url,
  }));
}

/** Cancellation passes through unwrapped; anything else becomes an ArtifactError. */
function artifactFailure(message: string, err: unknown, signal?: AbortSignal): Error {
  if (err instanceof CancellationError) return err;
  if (signal?.aborted) return new CancellationError(undefined, err);
  return new ArtifactError(`${message}: ${errorMessage(err)}`, err);
}

export async function writeManifest(
  keyframes: readonly Keyframe[],
  manifestPath: string,
  signal?: AbortSignal,
): Promise<void> {
  const body = JSON.stringify(toManifest(keyframes), null, 2);
  try {
    throwIfAborted(signal);
    if (isS3Url(manifestPath)) {
      await uploadBufferToS3(Buffer.from(body, 'utf-8'), manifestPath, 'application/json');
    } else {
      await fs.promises.mkdir(path.dirname(path.resolve(manifestPath)), { recursive: true });
      await fs.promises.writeFile(manifestPath, body, 'utf-8');
    }
  } catch (err) {
    throw artifactFailure(`Failed to write manifest ${manifestPath}`, err, signal);
  }
  logger.info('Artifacts: manifest written', { manifestPath, entries: keyframes.length });
}

/**
 * Materialise `keyframes` from `videoPath`. Returns a new list with
 * `localPath` / `s3Url` filled in; the input list is not modified.
 */
export async function writeArtifacts(
  videoPath: string,
  keyframes: readonly Keyframe[],
  opts: ArtifactOptions = {},
): Promise<Keyframe[]> {
  const ext = normalizeImageFormat(opts.imageFormat);
  const cleanup = opts.cleanup ?? true;
  let results: Keyframe[] = keyframes.map((k) => ({ ...k }));
  if (results.length === 0) {
    if (opts.manifestPath) await writeManifest(results, opts.manifestPath, opts.signal);
    return results;
  }

  let outputDir = opts.outputDir ?? null;
  let tempDir: string | null = null;
  if (!outputDir && opts.s3OutputPrefix) {
    await fs.promises.mkdir(env.TEMP_DIR, { recursive: true });
    tempDir = await fs.promises.mkdtemp(path.join(env.TEMP_DIR, 'frames-'));
    outputDir = tempDir;
  }

  try {
    if (outputDir) {
      await fs.promises.mkdir(outputDir, { recursive: true });
      for (const [i, k] of results.entries()) {
        const outPath = path.join(outputDir, buildOutputFilename(i + 1, k.timestampS, ext));
        try {
          await extractFrameAtTime(videoPath, k.timestampS, outPath, opts.signal);
        } catch (err) {
          throw artifactFailure(`Failed to write keyframe image ${outPath}`, err, opts.signal);
        }
        k.localPath = outPath;
      }
      logger.info('Artifacts: images written', { outputDir, count: results.length, format: ext });
    }

    if (opts.s3OutputPrefix) {
      const prefix = opts.s3OutputPrefix;
      for (const k of results) {
        if (!k.localPath) continue;
        const dest = joinS3Url(prefix, path.basename(k.localPath));
        try {
          throwIfAborted(opts.signal);
          await uploadPathToS3(k.localPath, dest, IMAGE_CONTENT_TYPES[ext]);
        } catch (err) {
          throw artifactFailure(`Failed to upload ${k.localPath} to ${dest}`, err, opts.signal);
        }
        k.s3Url = dest;
      }
    }

    // Images in a removed temp directory have no local path worth reporting
    if (tempDir && cleanup) {
      results = results.map((k) => ({ ...k, localPath: null }));
    }

    if (opts.manifestPath) await writeManifest(results, opts.manifestPath, opts.signal);
    return results;
  } finally {
    if (tempDir && cleanup) {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    }
  }
}
