import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Toolchain
  FFMPEG_PATH:                   z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:                  z.string().min(1).default('ffprobe'),

  // Analysis
  ANALYSIS_WIDTH:                z.coerce.number().int().min(16).default(320),

  // Timeouts
  PROBE_TIMEOUT_MS:              z.coerce.number().int().positive().default(300_000),
  DOWNLOAD_TIMEOUT_MS:           z.coerce.number().int().positive().default(30_000),

  // Object storage (credentials come from the default AWS provider chain)
  AWS_REGION:                    z.string().min(1).default('us-east-1'),
  S3_ENDPOINT:                   z.string().url().optional(),
  S3_FORCE_PATH_STYLE:           z.string().transform(v => v === 'true').default('false'),

  // Local storage
  TEMP_DIR:                      z.string().default(path.join(os.tmpdir(), 'framesift')),

  // Logging
  LOG_LEVEL:                     z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                    z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── Methods ───────────────────────────────────────────────────────────────────

export const KEYFRAME_METHODS = [
  'I_frame',
  'difference',
  'histogram',
  'optical_flow',
] as const;

export type KeyframeMethod = typeof KEYFRAME_METHODS[number];

export type ScoredMethod = Exclude<KeyframeMethod, 'I_frame'>;

// ── Thresholds ────────────────────────────────────────────────────────────────
// Calibrated against the reductions in src/keyframes/signal.ts; changing a
// reduction means re-tuning its default here.

export const DEFAULT_THRESHOLDS: Record<ScoredMethod, number> = {
  difference:   12,    // mean absolute luma delta, 0..255
  histogram:    0.35,  // Bhattacharyya distance, 0..1
  optical_flow: 1.5,   // mean block-motion vector norm, analysis pixels
};

// ── Selection ─────────────────────────────────────────────────────────────────

export const DEFAULT_METHODS: readonly KeyframeMethod[] = ['I_frame'];

export const SELECTION_DEFAULTS = {
  maxKeyframes: 20,
  minIntervalS: 0.5,
  flowStep:     2,
} as const;

// ── Signal parameters ─────────────────────────────────────────────────────────

export const HISTOGRAM_BINS = 64;

export const FLOW_PARAMS = {
  blockSize:    8,
  searchRadius: 4,
} as const;

// Used when the container reports no usable frame rate
export const FALLBACK_FPS = 30;

// ── Output ────────────────────────────────────────────────────────────────────

export const IMAGE_FORMATS = ['jpg', 'jpeg', 'png'] as const;

export type ImageFormat = typeof IMAGE_FORMATS[number];

export const IMAGE_CONTENT_TYPES: Record<'jpg' | 'png', string> = {
  jpg: 'image/jpeg',
  png: 'image/png',
};

// ── Retry Policy ──────────────────────────────────────────────────────────────

export const RETRY_POLICY = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
} as const;
