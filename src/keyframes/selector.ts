import type { Candidate, MethodSpec } from './types.js';

export interface SelectionPolicy {
  maxKeyframes: number;
  minIntervalS: number;
}

export type Verdict =
  | 'accepted'
  | 'below_threshold'
  | 'too_close'
  | 'out_of_order'
  | 'full';

/**
 * Greedy, first-seen-wins selection over a time-ordered candidate stream.
 * Once `maxKeyframes` are accepted the selector is full and the caller stops
 * consuming; it never ranks by score.
 */
export class KeyframeSelector {
  private readonly accepted: Candidate[] = [];
  private lastTimestampS: number | null = null;

  constructor(
    private readonly spec: MethodSpec,
    private readonly policy: SelectionPolicy,
  ) {}

  get full(): boolean {
    return this.accepted.length >= this.policy.maxKeyframes;
  }

  get selected(): readonly Candidate[] {
    return this.accepted;
  }

  offer(candidate: Candidate): Verdict {
    if (this.full) return 'full';

    const { threshold } = this.spec;
    if (threshold !== null && (candidate.score === null || candidate.score < threshold)) {
      return 'below_threshold';
    }

    if (this.lastTimestampS !== null) {
      const gap = candidate.timestampS - this.lastTimestampS;
      if (gap <= 0) return 'out_of_order';
      if (gap < this.policy.minIntervalS) return 'too_close';
    }

    this.accepted.push(candidate);
    this.lastTimestampS = candidate.timestampS;
    return 'accepted';
  }
}

/** Run `candidates` through a fresh selector; stops pulling as soon as it is full. */
export async function selectKeyframes(
  candidates: AsyncIterable<Candidate>,
  spec: MethodSpec,
  policy: SelectionPolicy,
): Promise<Candidate[]> {
  const selector = new KeyframeSelector(spec, policy);
  if (selector.full) return [];
  for await (const candidate of candidates) {
    selector.offer(candidate);
    if (selector.full) break;
  }
  return [...selector.selected];
}
