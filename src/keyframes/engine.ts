/**
 * Method orchestration — runs the requested methods strictly in order and
 * returns the first non-empty selection.
 *
 *   pending → scoring(m) → selecting(m) → resolved
 *                  ↑              │
 *                  └── next m ────┘ (empty / unavailable / session error)
 *   … → exhausted   when every method came back empty
 *   … → incomplete  when the signal aborts or the timeout elapses
 *
 * Scoring and selecting overlap: candidates stream into the selector as they
 * are scored. `selecting` is entered when the first candidate reaches the
 * selector, so a method that fails before producing one never enters it.
 *
 * A method that fails mid-stream contributes nothing: partial selections are
 * discarded, never returned.
 */
import { z } from 'zod';
import {
  DEFAULT_METHODS,
  KEYFRAME_METHODS,
  SELECTION_DEFAULTS,
  type KeyframeMethod,
} from '../config.js';
import { logger } from '../utils/logger.js';
import {
  CancellationError,
  KeyframeOptionsError,
  MethodUnavailableError,
  SourceError,
  errorMessage,
} from '../utils/errors.js';
import type { FrameSource } from '../media/frame-source.js';
import { createScorer } from './scorers/index.js';
import { selectKeyframes, type SelectionPolicy } from './selector.js';
import type { Candidate, Keyframe } from './types.js';

// ── Options ───────────────────────────────────────────────────────────────────

export const KeyframeOptionsSchema = z.object({
  methods:      z.array(z.enum(KEYFRAME_METHODS)).min(1).default([...DEFAULT_METHODS]),
  threshold:    z.number().finite().optional(),
  maxKeyframes: z.number().int().positive().default(SELECTION_DEFAULTS.maxKeyframes),
  minIntervalS: z.number().finite().nonnegative().default(SELECTION_DEFAULTS.minIntervalS),
  flowStep:     z.number().int().positive().default(SELECTION_DEFAULTS.flowStep),
});

export type KeyframeOptions = z.input<typeof KeyframeOptionsSchema>;
export type ResolvedKeyframeOptions = z.output<typeof KeyframeOptionsSchema>;

export function resolveKeyframeOptions(options: KeyframeOptions = {}): ResolvedKeyframeOptions {
  const parsed = KeyframeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'options'}: ${i.message}`).join('; ');
    throw new KeyframeOptionsError(`Invalid keyframe options: ${issues}`, parsed.error);
  }
  return parsed.data;
}

// ── Run state ─────────────────────────────────────────────────────────────────

export type AttemptOutcome = 'selected' | 'empty' | 'unavailable' | 'source_error' | 'cancelled';

export interface MethodAttempt {
  method: KeyframeMethod;
  outcome: AttemptOutcome;
  keyframes: number;
  durationMs: number;
  error?: string;
}

export type RunState =
  | { status: 'pending' }
  | { status: 'scoring'; method: KeyframeMethod }
  | { status: 'selecting'; method: KeyframeMethod }
  | { status: 'resolved'; method: KeyframeMethod; keyframes: Keyframe[] }
  | { status: 'exhausted' }
  | { status: 'incomplete'; method: KeyframeMethod | null; reason: string };

export type KeyframeRunResult =
  | { status: 'resolved'; method: KeyframeMethod; keyframes: Keyframe[]; attempts: MethodAttempt[] }
  | { status: 'exhausted'; method: null; keyframes: Keyframe[]; attempts: MethodAttempt[] }
  | { status: 'incomplete'; method: KeyframeMethod | null; keyframes: Keyframe[]; attempts: MethodAttempt[]; reason: string };

export interface RunControl {
  signal?: AbortSignal;
  timeoutMs?: number;
  onStateChange?: (state: RunState) => void;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function toKeyframe(c: Candidate, method: KeyframeMethod): Keyframe {
  return {
    frameIndex: c.frameIndex,
    timestampS: c.timestampS,
    method,
    score: c.score,
    localPath: null,
    s3Url: null,
  };
}

/** Combine the caller's signal with an optional timeout. `dispose` clears the timer. */
function linkSignal(control: RunControl): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const abort = (reason: unknown) => {
    if (!controller.signal.aborted) controller.abort(reason);
  };
  const onParentAbort = () => abort(control.signal?.reason);

  if (control.signal?.aborted) abort(control.signal.reason);
  control.signal?.addEventListener('abort', onParentAbort, { once: true });

  const timer = control.timeoutMs !== undefined
    ? setTimeout(() => abort(new CancellationError(`Timed out after ${control.timeoutMs}ms`)), control.timeoutMs)
    : null;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      control.signal?.removeEventListener('abort', onParentAbort);
    },
  };
}

/** Pass `candidates` through, calling `onFirst` just before the first one. */
async function* onFirstCandidate(
  candidates: AsyncIterable<Candidate>,
  onFirst: () => void,
): AsyncGenerator<Candidate> {
  let first = true;
  for await (const candidate of candidates) {
    if (first) {
      first = false;
      onFirst();
    }
    yield candidate;
  }
}

function abortReason(signal: AbortSignal): string {
  return signal.reason instanceof Error ? signal.reason.message : 'cancelled';
}

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * Detect keyframes on an opened source. Never throws for empty results or for
 * per-method failures; throws `KeyframeOptionsError` for bad options and
 * rethrows anything that is not part of the error taxonomy.
 */
export async function detectKeyframes(
  source: FrameSource,
  options: KeyframeOptions = {},
  control: RunControl = {},
): Promise<KeyframeRunResult> {
  const opts = resolveKeyframeOptions(options);
  const policy: SelectionPolicy = { maxKeyframes: opts.maxKeyframes, minIntervalS: opts.minIntervalS };
  const attempts: MethodAttempt[] = [];

  let state: RunState = { status: 'pending' };
  const transition = (next: RunState) => {
    logger.debug('Keyframes: state transition', { from: state.status, to: next.status });
    state = next;
    control.onStateChange?.(next);
  };
  control.onStateChange?.(state);

  const { signal, dispose } = linkSignal(control);

  const incomplete = (method: KeyframeMethod | null): KeyframeRunResult => {
    const reason = abortReason(signal);
    transition({ status: 'incomplete', method, reason });
    logger.warn('Keyframes: run incomplete', { method, reason });
    return { status: 'incomplete', method, keyframes: [], attempts, reason };
  };

  try {
    for (const method of opts.methods) {
      if (signal.aborted) return incomplete(method);

      const scorer = createScorer(method, { threshold: opts.threshold, flowStep: opts.flowStep });
      const started = Date.now();
      transition({ status: 'scoring', method });
      logger.info('Keyframes: trying method', { method, threshold: scorer.spec.threshold });

      let picked: Candidate[];
      try {
        const candidates = onFirstCandidate(
          scorer.candidates(source, { signal }),
          () => transition({ status: 'selecting', method }),
        );
        picked = await selectKeyframes(candidates, scorer.spec, policy);
      } catch (err) {
        const durationMs = Date.now() - started;
        if (err instanceof CancellationError || signal.aborted) {
          attempts.push({ method, outcome: 'cancelled', keyframes: 0, durationMs, error: errorMessage(err) });
          return incomplete(method);
        }
        if (err instanceof MethodUnavailableError || err instanceof SourceError) {
          const outcome: AttemptOutcome = err instanceof MethodUnavailableError ? 'unavailable' : 'source_error';
          logger.warn('Keyframes: method failed — falling through', { method, outcome, error: err.message });
          attempts.push({ method, outcome, keyframes: 0, durationMs, error: err.message });
          continue;
        }
        throw err;
      }

      const durationMs = Date.now() - started;

      if (picked.length > 0) {
        const keyframes = picked.map((c) => toKeyframe(c, method));
        attempts.push({ method, outcome: 'selected', keyframes: keyframes.length, durationMs });
        transition({ status: 'resolved', method, keyframes });
        logger.info('Keyframes: method resolved', { method, count: keyframes.length, durationMs });
        return { status: 'resolved', method, keyframes, attempts };
      }

      attempts.push({ method, outcome: 'empty', keyframes: 0, durationMs });
      logger.info('Keyframes: method produced no keyframes', { method, durationMs });
    }

    transition({ status: 'exhausted' });
    logger.info('Keyframes: all methods exhausted', { methods: opts.methods });
    return { status: 'exhausted', method: null, keyframes: [], attempts };
  } finally {
    dispose();
  }
}
