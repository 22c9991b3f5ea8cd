/**
 * Input resolution — turn a local path, HTTP(S) URL or s3:// URL into a local
 * file ffmpeg can seek in. Remote inputs are downloaded into a private temp
 * directory that `dispose()` removes.
 */
import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { env, RETRY_POLICY } from '../config.js';
import { logger } from '../utils/logger.js';
import { NonRetryableError, withRetry } from '../utils/retry.js';
import { CancellationError, SourceError, errorMessage } from '../utils/errors.js';
import { downloadS3ToPath, isS3Url, parseS3Url } from '../storage/s3.js';

export interface PreparedInput {
  /** Local path to hand to ffmpeg / ffprobe. */
  path: string;
  dispose(): Promise<void>;
}

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

function isLocalFile(value: string): boolean {
  try {
    return fs.statSync(value).isFile();
  } catch {
    return false;
  }
}

function filenameFromUrl(url: string, fallback: string): string {
  try {
    const name = path.basename(new URL(url).pathname);
    return name || fallback;
  } catch {
    return fallback;
  }
}

async function downloadHttp(
  url: string,
  destPath: string,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<void> {
  await withRetry(async () => {
    // Each attempt gets its own deadline on top of the caller's signal
    const deadline = AbortSignal.timeout(timeoutMs);
    const res = await fetch(url, {
      signal: signal ? AbortSignal.any([signal, deadline]) : deadline,
    });
    if (!res.ok || !res.body) {
      const msg = `GET ${url} failed with HTTP ${res.status}`;
      // Client errors will not fix themselves
      if (res.status >= 400 && res.status < 500) throw new NonRetryableError(msg);
      throw new Error(msg);
    }
    await pipeline(Readable.fromWeb(res.body), fs.createWriteStream(destPath));
  }, {
    maxAttempts: RETRY_POLICY.maxAttempts,
    baseDelayMs: RETRY_POLICY.baseDelayMs,
    label: 'download',
    signal,
  });
}

function noop(): Promise<void> {
  return Promise.resolve();
}

export async function prepareInput(
  inputPath: string,
  opts: { signal?: AbortSignal; cleanup?: boolean; downloadTimeoutMs?: number } = {},
): Promise<PreparedInput> {
  const cleanup = opts.cleanup ?? true;

  if (isLocalFile(inputPath)) {
    return { path: inputPath, dispose: noop };
  }
  if (!isHttpUrl(inputPath) && !isS3Url(inputPath)) {
    throw new SourceError(`Unsupported input path: ${inputPath}`);
  }

  await fs.promises.mkdir(env.TEMP_DIR, { recursive: true });
  const dir = await fs.promises.mkdtemp(path.join(env.TEMP_DIR, 'input-'));
  const dispose = async () => {
    if (!cleanup) return;
    await fs.promises.rm(dir, { recursive: true, force: true });
  };

  try {
    let localPath: string;
    if (isHttpUrl(inputPath)) {
      localPath = path.join(dir, filenameFromUrl(inputPath, 'input_file'));
      logger.info('Inputs: downloading HTTP input', { url: inputPath, localPath });
      await downloadHttp(inputPath, localPath, opts.downloadTimeoutMs ?? env.DOWNLOAD_TIMEOUT_MS, opts.signal);
    } else {
      const { key } = parseS3Url(inputPath);
      localPath = path.join(dir, path.basename(key) || 'input_file');
      await downloadS3ToPath(inputPath, localPath, opts.signal);
    }
    logger.info('Inputs: input ready', { inputPath, localPath });
    return { path: localPath, dispose };
  } catch (err) {
    await dispose();
    if (opts.signal?.aborted) throw new CancellationError('Input download cancelled', err);
    throw new SourceError(`Failed to fetch input ${inputPath}: ${errorMessage(err)}`, err);
  }
}
