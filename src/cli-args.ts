import { IMAGE_FORMATS, KEYFRAME_METHODS, type ImageFormat, type KeyframeMethod } from './config.js';
import type { ExtractOptions } from './pipeline/index.js';
import { CancellationError } from './utils/errors.js';

export const USAGE = `Usage: framesift <input> [options]

  <input>                   Local path, http(s):// URL or s3://bucket/key

Options:
  --method LIST             Comma-separated methods, first non-empty wins
                            (${KEYFRAME_METHODS.join(', ')}; default: I_frame)
  --threshold N             Score threshold for non-I_frame methods
  --max-keyframes N         Maximum keyframes (default: 20)
  --min-interval-s N        Minimum seconds between keyframes (default: 0.5)
  --flow-step N             optical_flow compares every N-th frame (default: 2)
  --output-dir DIR          Write images to DIR
  --image-format FMT        jpg | png (default: jpg)
  --manifest PATH           Write the manifest JSON to a path or s3:// URL
  --s3-output-prefix URL    Upload images under s3://bucket/prefix/
  --timeout-ms N            Abort detection after N milliseconds
  --no-cleanup              Keep temporary downloads and outputs
  -h, --help                Show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 2;

/** A thrown run is "cancelled" when the error says so or the run's signal has fired. */
export function exitCodeForError(err: unknown, signal?: AbortSignal): number {
  return err instanceof CancellationError || signal?.aborted ? EXIT_CANCELLED : EXIT_FAILURE;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'extract'; inputPath: string; options: ExtractOptions };

const VALUE_FLAGS = new Set([
  '--method',
  '--threshold',
  '--max-keyframes',
  '--min-interval-s',
  '--flow-step',
  '--output-dir',
  '--image-format',
  '--manifest',
  '--s3-output-prefix',
  '--timeout-ms',
]);

function parseNumber(flag: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(n)) {
    throw new UsageError(`${flag} expects a number, got "${raw}"`);
  }
  return n;
}

export function parseMethods(raw: string): KeyframeMethod[] {
  const methods: KeyframeMethod[] = [];
  for (const part of raw.split(',')) {
    const name = part.trim();
    if (!name) continue;
    const method = KEYFRAME_METHODS.find((m) => m === name);
    if (!method) {
      throw new UsageError(`Unsupported method "${name}" (expected one of ${KEYFRAME_METHODS.join(', ')})`);
    }
    methods.push(method);
  }
  if (methods.length === 0) throw new UsageError('--method must name at least one method');
  return methods;
}

function parseImageFormat(raw: string): ImageFormat {
  const format = IMAGE_FORMATS.find((f) => f === raw.toLowerCase());
  if (!format) throw new UsageError(`--image-format expects jpg or png, got "${raw}"`);
  return format;
}

/** Accepts both `--flag value` and `--flag=value`. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const values = new Map<string, string>();
  const positionals: string[] = [];
  let cleanup = true;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '-h' || arg === '--help') return { kind: 'help' };
    if (arg === '--no-cleanup') {
      cleanup = false;
      continue;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (!VALUE_FLAGS.has(flag)) throw new UsageError(`Unknown option ${flag}`);

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) throw new UsageError(`${flag} expects a value`);
    values.set(flag, value);
  }

  if (positionals.length !== 1) {
    throw new UsageError(positionals.length === 0 ? 'Missing <input>' : `Unexpected argument "${positionals[1]}"`);
  }
  const [inputPath = ''] = positionals;

  const options: ExtractOptions = { cleanup };
  const get = (flag: string) => values.get(flag);

  const method = get('--method');
  if (method !== undefined) options.methods = parseMethods(method);
  const threshold = get('--threshold');
  if (threshold !== undefined) options.threshold = parseNumber('--threshold', threshold);
  const maxKeyframes = get('--max-keyframes');
  if (maxKeyframes !== undefined) options.maxKeyframes = parseNumber('--max-keyframes', maxKeyframes);
  const minInterval = get('--min-interval-s');
  if (minInterval !== undefined) options.minIntervalS = parseNumber('--min-interval-s', minInterval);
  const flowStep = get('--flow-step');
  if (flowStep !== undefined) options.flowStep = parseNumber('--flow-step', flowStep);
  const timeout = get('--timeout-ms');
  if (timeout !== undefined) options.timeoutMs = parseNumber('--timeout-ms', timeout);
  const imageFormat = get('--image-format');
  if (imageFormat !== undefined) options.imageFormat = parseImageFormat(imageFormat);

  options.outputDir = get('--output-dir');
  options.manifestPath = get('--manifest');
  options.s3OutputPrefix = get('--s3-output-prefix');

  return { kind: 'extract', inputPath, options };
}
