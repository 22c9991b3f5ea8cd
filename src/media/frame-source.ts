/**
 * FrameSource — forward-only access to the decoded frames of one video.
 *
 * Every `decode()` call is an independent session backed by its own ffmpeg
 * process. The process is killed in the generator's `finally`, so a consumer
 * that stops early (`break`, a thrown error, an aborted signal) always
 * releases it before moving on.
 */
import { spawn } from 'child_process';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { CancellationError, SourceError, throwIfAborted } from '../utils/errors.js';
import { probeIndexFrames, probeVideo, type IndexFrame, type VideoStreamInfo } from './ffmpeg.js';

export type { IndexFrame, VideoStreamInfo };

export interface Frame {
  index: number;
  timestampS: number;
  width: number;
  height: number;
  /** Packed RGB24, row-major, `width * height * 3` bytes. */
  pixels: Uint8Array;
}

export interface DecodeOptions {
  /** Keep every `step`-th frame (1 = all frames). */
  step?: number;
  signal?: AbortSignal;
}

export interface FrameSource {
  readonly info: VideoStreamInfo;
  /** Container-declared key frames, without a full decode. */
  probeKeyframeIndices(signal?: AbortSignal): Promise<IndexFrame[]>;
  decode(options?: DecodeOptions): AsyncIterable<Frame>;
}

const STDERR_LIMIT = 4_096;

/** Largest even size no wider than `maxWidth`, keeping the aspect ratio. */
export function analysisSize(
  info: Pick<VideoStreamInfo, 'width' | 'height'>,
  maxWidth: number,
): { width: number; height: number } {
  const even = (n: number) => Math.max(2, Math.round(n / 2) * 2);
  const width = even(Math.min(maxWidth, info.width));
  const height = even((info.height * width) / info.width);
  return { width, height };
}

export function buildDecodeArgs(
  inputPath: string,
  size: { width: number; height: number },
  step: number,
): string[] {
  const filters = step > 1 ? [`select=not(mod(n\\,${step}))`] : [];
  filters.push(`scale=${size.width}:${size.height}`);
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-nostdin',
    '-i', inputPath,
    '-map', '0:v:0',
    '-vf', filters.join(','),
    '-vsync', 'passthrough',
    '-f', 'rawvideo',
    '-pix_fmt', 'rgb24',
    'pipe:1',
  ];
}

export class FfmpegFrameSource implements FrameSource {
  private readonly size: { width: number; height: number };

  constructor(
    private readonly inputPath: string,
    public readonly info: VideoStreamInfo,
    analysisWidth: number = env.ANALYSIS_WIDTH,
  ) {
    this.size = analysisSize(info, analysisWidth);
  }

  probeKeyframeIndices(signal?: AbortSignal): Promise<IndexFrame[]> {
    return probeIndexFrames(this.inputPath, this.info.fps, { signal });
  }

  async *decode(options: DecodeOptions = {}): AsyncGenerator<Frame> {
    const step = Math.max(1, Math.floor(options.step ?? 1));
    const { signal } = options;
    throwIfAborted(signal);

    const { width, height } = this.size;
    const frameBytes = width * height * 3;
    const fps = this.info.fps;

    logger.debug('FrameSource: opening decode session', { inputPath: this.inputPath, step, width, height });
    const child = spawn(env.FFMPEG_PATH, buildDecodeArgs(this.inputPath, this.size, step), {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stderr = '';
    child.stderr.setEncoding('utf-8');
    child.stderr.on('data', (chunk: string) => {
      if (stderr.length < STDERR_LIMIT) stderr += chunk;
    });

    const exited = new Promise<{ code: number | null; error?: Error }>((resolve) => {
      child.once('error', (error) => resolve({ code: null, error }));
      child.once('close', (code) => resolve({ code }));
    });

    const onAbort = () => child.kill('SIGKILL');
    signal?.addEventListener('abort', onAbort, { once: true });

    let pending: Buffer = Buffer.alloc(0);
    let produced = 0;

    try {
      for await (const chunk of child.stdout) {
        if (!Buffer.isBuffer(chunk)) continue;
        pending = pending.length > 0 ? Buffer.concat([pending, chunk]) : chunk;

        while (pending.length >= frameBytes) {
          // Copy out: the pipe's buffers are reused
          const pixels = new Uint8Array(pending.subarray(0, frameBytes));
          pending = pending.subarray(frameBytes);
          const index = produced * step;
          produced++;
          yield { index, timestampS: index / fps, width, height, pixels };
          throwIfAborted(signal);
        }
      }

      if (signal?.aborted) {
        throw new CancellationError('Decode cancelled', signal.reason);
      }

      const { code, error } = await exited;
      if (error) {
        throw new SourceError(`FFmpeg decode could not start: ${error.message}`, error);
      }
      if (code !== 0) {
        throw new SourceError(`FFmpeg decode failed (exit ${code}): ${stderr.trim()}`);
      }
      if (pending.length > 0) {
        throw new SourceError(`FFmpeg decode desynchronized: ${pending.length} trailing bytes`);
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGKILL');
      }
      logger.debug('FrameSource: decode session closed', { inputPath: this.inputPath, frames: produced });
    }
  }
}

/** Probe `inputPath` and return a source ready for decoding. Probe failures are fatal. */
export async function openFrameSource(
  inputPath: string,
  opts: { signal?: AbortSignal; analysisWidth?: number } = {},
): Promise<FrameSource> {
  const info = await probeVideo(inputPath, { signal: opts.signal });
  return new FfmpegFrameSource(inputPath, info, opts.analysisWidth);
}
