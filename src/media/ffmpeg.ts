/**
 * FFmpeg / FFprobe plumbing — process execution, container probing and
 * index-frame listing.
 *
 * All functions reject with `SourceError` on non-zero exit and with
 * `CancellationError` when the supplied signal aborts.
 */
import { execFile } from 'child_process';
import { z } from 'zod';
import { env, FALLBACK_FPS } from '../config.js';
import { logger } from '../utils/logger.js';
import { CancellationError, SourceError, throwIfAborted } from '../utils/errors.js';

// ── Helpers ────────────────────────────────────────────────────────────────────

interface RunOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

const MAX_BUFFER = 256 * 1024 * 1024;

function run(bin: string, args: string[], label: string, opts: RunOptions): Promise<string> {
  throwIfAborted(opts.signal);
  return new Promise((resolve, reject) => {
    execFile(
      bin,
      args,
      { encoding: 'utf-8', maxBuffer: MAX_BUFFER, signal: opts.signal, timeout: opts.timeoutMs ?? 0 },
      (err, stdout, stderr) => {
        if (!err) {
          resolve(stdout);
          return;
        }
        if (opts.signal?.aborted) {
          reject(new CancellationError(`${label} cancelled`, opts.signal.reason));
          return;
        }
        reject(new SourceError(`${label} failed: ${stderr.trim() || err.message}`, err));
      },
    );
  });
}

export function runFfmpeg(args: string[], label: string, opts: RunOptions = {}): Promise<string> {
  logger.debug(`FFmpeg [${label}]`, { args });
  return run(env.FFMPEG_PATH, ['-hide_banner', '-loglevel', 'error', ...args], `FFmpeg ${label}`, opts);
}

export function runFfprobe(args: string[], label: string, opts: RunOptions = {}): Promise<string> {
  logger.debug(`FFprobe [${label}]`, { args });
  return run(env.FFPROBE_PATH, ['-v', 'error', ...args], `FFprobe ${label}`, {
    timeoutMs: env.PROBE_TIMEOUT_MS,
    ...opts,
  });
}

/**
 * Parse an ffprobe rational ("30000/1001") or decimal frame rate.
 * Returns null for missing, zero or malformed values.
 */
export function parseFrameRate(value: string | undefined): number | null {
  if (!value) return null;
  const [num, den] = value.trim().split('/');
  const n = parseFloat(num ?? '');
  const d = den === undefined ? 1 : parseFloat(den);
  if (!Number.isFinite(n) || !Number.isFinite(d) || d <= 0) return null;
  const fps = n / d;
  return fps > 0 ? fps : null;
}

// ── Probe ──────────────────────────────────────────────────────────────────────

export interface VideoStreamInfo {
  durationS: number;
  formatName: string;
  width: number;
  height: number;
  fps: number;
  videoCodec: string | null;
}

const FfprobeOutputSchema = z.object({
  streams: z.array(z.object({
    codec_type:     z.string().optional(),
    codec_name:     z.string().optional(),
    width:          z.number().optional(),
    height:         z.number().optional(),
    r_frame_rate:   z.string().optional(),
    avg_frame_rate: z.string().optional(),
  })).default([]),
  format: z.object({
    duration:    z.string().optional(),
    format_name: z.string().optional(),
  }).optional(),
});

/** Reduce raw `ffprobe -show_format -show_streams` JSON to the fields analysis needs. */
export function parseProbeOutput(raw: string, source: string): VideoStreamInfo {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new SourceError(`Failed to parse ffprobe output for ${source}`, err);
  }
  const result = FfprobeOutputSchema.safeParse(json);
  if (!result.success) {
    throw new SourceError(`Unexpected ffprobe output for ${source}`, result.error);
  }
  const data = result.data;

  const video = data.streams.find((s) => s.codec_type === 'video');
  if (!video || !video.width || !video.height) {
    throw new SourceError(`No decodable video stream in ${source}`);
  }

  const fps = parseFrameRate(video.r_frame_rate) ?? parseFrameRate(video.avg_frame_rate) ?? FALLBACK_FPS;
  const duration = parseFloat(data.format?.duration ?? '0');

  return {
    durationS: Number.isFinite(duration) ? duration : 0,
    formatName: data.format?.format_name ?? '',
    width: video.width,
    height: video.height,
    fps,
    videoCodec: video.codec_name ?? null,
  };
}

export async function probeVideo(inputPath: string, opts: RunOptions = {}): Promise<VideoStreamInfo> {
  logger.info('FFprobe: probing video', { inputPath });
  const raw = await runFfprobe(
    ['-print_format', 'json', '-show_format', '-show_streams', inputPath],
    'probeVideo',
    opts,
  );
  const info = parseProbeOutput(raw, inputPath);
  logger.info('FFprobe: video probed', { ...info });
  return info;
}

// ── Index frames ───────────────────────────────────────────────────────────────

export interface IndexFrame {
  frameIndex: number;
  timestampS: number;
}

/**
 * Parse `frame=best_effort_timestamp_time,pict_type` CSV rows and keep the
 * intra-coded ones, in ascending time order with duplicates dropped.
 */
export function parseIndexFrameRows(csv: string, fps: number): IndexFrame[] {
  const frames: IndexFrame[] = [];
  let last = -Infinity;
  for (const line of csv.split('\n')) {
    const parts = line.trim().split(',').map((p) => p.trim());
    if (parts.length < 2) continue;
    const [ts, pict] = parts;
    if (!ts || ts === 'N/A' || pict !== 'I') continue;
    const timestampS = parseFloat(ts);
    if (!Number.isFinite(timestampS) || timestampS < 0 || timestampS <= last) continue;
    frames.push({ frameIndex: Math.round(timestampS * fps), timestampS });
    last = timestampS;
  }
  return frames;
}

/**
 * List container-declared key frames. `-skip_frame nokey` keeps the decoder
 * from touching inter frames, so this is far cheaper than a full decode.
 */
export async function probeIndexFrames(
  inputPath: string,
  fps: number,
  opts: RunOptions = {},
): Promise<IndexFrame[]> {
  const csv = await runFfprobe(
    [
      '-select_streams', 'v:0',
      '-skip_frame', 'nokey',
      '-show_entries', 'frame=best_effort_timestamp_time,pict_type',
      '-of', 'csv=p=0',
      inputPath,
    ],
    'probeIndexFrames',
    opts,
  );
  return parseIndexFrameRows(csv, fps);
}
