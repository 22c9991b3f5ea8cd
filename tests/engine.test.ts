import { detectKeyframes, type KeyframeRunResult, type RunState } from '../src/keyframes/engine.js';
import { KeyframeOptionsError, SourceError } from '../src/utils/errors.js';
import type { Keyframe } from '../src/keyframes/types.js';
import type { Frame } from '../src/media/frame-source.js';
import {
  FakeFrameSource,
  hardCut,
  periodicCuts,
  slowPan,
  solidRgb,
} from './helpers/fake-source.js';

function assertInvariants(keyframes: Keyframe[], maxKeyframes: number, minIntervalS: number): void {
  expect(keyframes.length).toBeLessThanOrEqual(maxKeyframes);
  for (let i = 1; i < keyframes.length; i++) {
    const prev = keyframes[i - 1];
    const cur = keyframes[i];
    if (!prev || !cur) throw new Error('unreachable');
    expect(cur.timestampS).toBeGreaterThan(prev.timestampS);
    expect(cur.timestampS - prev.timestampS).toBeGreaterThanOrEqual(minIntervalS);
  }
  const methods = new Set(keyframes.map((k) => k.method));
  expect(methods.size).toBeLessThanOrEqual(1);
}

function resolved(result: KeyframeRunResult) {
  if (result.status !== 'resolved') throw new Error(`expected resolved, got ${result.status}`);
  return result;
}

describe('detectKeyframes — difference', () => {
  it('finds the single hard cut of a static 10 s, 30 fps clip', async () => {
    const source = new FakeFrameSource({ durationS: 10, fps: 30, paint: hardCut(150) });
    const result = resolved(
      await detectKeyframes(source, { methods: ['difference'], threshold: 12, minIntervalS: 0.5 }),
    );

    expect(result.method).toBe('difference');
    expect(result.keyframes).toHaveLength(1);
    const [k] = result.keyframes;
    expect(k?.frameIndex).toBe(150);
    expect(k?.timestampS).toBe(5);
    expect(k?.method).toBe('difference');
    expect(k?.score).toBe(160);
    expect(k?.localPath).toBeNull();
  });

  it('keeps the first three cuts when capped at three', async () => {
    const source = new FakeFrameSource({ durationS: 11, fps: 30, paint: periodicCuts(30) });
    const result = resolved(
      await detectKeyframes(source, { methods: ['difference'], maxKeyframes: 3, minIntervalS: 0.5 }),
    );

    expect(result.keyframes.map((k) => k.timestampS)).toEqual([1, 2, 3]);
    expect(result.keyframes.map((k) => k.frameIndex)).toEqual([30, 60, 90]);
  });

  it('stops decoding and releases the session once the cap is hit', async () => {
    const source = new FakeFrameSource({ durationS: 11, fps: 30, paint: periodicCuts(30) });
    await detectKeyframes(source, { methods: ['difference'], maxKeyframes: 3 });

    expect(source.decodedFrames).toBe(91);
    expect(source.openSessions).toBe(0);
  });

  it('yields an identical list on repeated runs', async () => {
    const options = { methods: ['difference' as const], maxKeyframes: 5, minIntervalS: 0.25 };
    const first = await detectKeyframes(new FakeFrameSource({ paint: periodicCuts(17) }), options);
    const second = await detectKeyframes(new FakeFrameSource({ paint: periodicCuts(17) }), options);
    expect(second.status).toBe(first.status);
    expect(second.keyframes).toEqual(first.keyframes);
    expect(first.keyframes.length).toBeGreaterThan(0);
  });
});

describe('detectKeyframes — histogram', () => {
  it('scores a cut between disjoint luma levels as distance 1', async () => {
    const source = new FakeFrameSource({ paint: hardCut(150) });
    const result = resolved(await detectKeyframes(source, { methods: ['histogram'] }));

    expect(result.keyframes).toHaveLength(1);
    expect(result.keyframes[0]?.frameIndex).toBe(150);
    expect(result.keyframes[0]?.score).toBe(1);
  });

  it('ignores a brightness change that stays inside one histogram bin', async () => {
    const source = new FakeFrameSource({ paint: hardCut(150, 40, 42) });
    const result = await detectKeyframes(source, { methods: ['histogram'] });
    expect(result.status).toBe('exhausted');
  });
});

describe('detectKeyframes — optical_flow', () => {
  it('picks up a slow pan once the texture starts moving', async () => {
    const flowOnly = resolved(
      await detectKeyframes(
        new FakeFrameSource({ durationS: 6, fps: 30, width: 64, height: 48, paint: slowPan(90) }),
        { methods: ['optical_flow'], maxKeyframes: 4 },
      ),
    );
    expect(flowOnly.method).toBe('optical_flow');
    expect(flowOnly.keyframes[0]?.frameIndex).toBe(92);
    expect(flowOnly.keyframes[0]?.score).toBe(2);
    assertInvariants(flowOnly.keyframes, 4, 0.5);
  });

  it('decodes with the configured flow step', async () => {
    const source = new FakeFrameSource({ durationS: 2, width: 64, height: 48, paint: slowPan(0) });
    await detectKeyframes(source, { methods: ['optical_flow'], flowStep: 3 });
    expect(source.decodeSteps).toEqual([3]);
  });

  it('only reports sampled frame indices', async () => {
    const source = new FakeFrameSource({ durationS: 4, width: 64, height: 48, paint: slowPan(0) });
    const result = resolved(await detectKeyframes(source, { methods: ['optical_flow'], flowStep: 3, minIntervalS: 0 }));
    expect(result.keyframes.every((k) => k.frameIndex % 3 === 0)).toBe(true);
    expect(result.keyframes[0]?.score).toBe(3);
  });
});

describe('detectKeyframes — I_frame and fallback', () => {
  it('uses container index frames without decoding pixels', async () => {
    const source = new FakeFrameSource({
      paint: hardCut(150),
      indexFrames: [
        { frameIndex: 0, timestampS: 0 },
        { frameIndex: 9, timestampS: 0.3 },
        { frameIndex: 60, timestampS: 2 },
        { frameIndex: 120, timestampS: 4 },
      ],
    });
    const result = resolved(await detectKeyframes(source));

    expect(result.method).toBe('I_frame');
    expect(result.keyframes.map((k) => k.timestampS)).toEqual([0, 2, 4]);
    expect(result.keyframes.every((k) => k.score === null)).toBe(true);
    expect(source.sessionsOpened).toBe(0);
  });

  it('falls through to difference when the container has no index frames', async () => {
    const source = new FakeFrameSource({ paint: hardCut(150) });
    const result = resolved(await detectKeyframes(source, { methods: ['I_frame', 'difference'] }));

    expect(result.method).toBe('difference');
    expect(result.keyframes.map((k) => k.frameIndex)).toEqual([150]);
    expect(result.attempts.map((a) => [a.method, a.outcome])).toEqual([
      ['I_frame', 'unavailable'],
      ['difference', 'selected'],
    ]);
  });

  it('returns exactly the later method’s list when the earlier one is empty', async () => {
    const paint = hardCut(150, 40, 46);
    // 6 levels apart: below the difference default (12) but two histogram bins apart
    const alone = resolved(await detectKeyframes(new FakeFrameSource({ paint }), { methods: ['histogram'] }));
    const chained = resolved(
      await detectKeyframes(new FakeFrameSource({ paint }), { methods: ['difference', 'histogram'] }),
    );

    expect(chained.method).toBe('histogram');
    expect(chained.keyframes).toEqual(alone.keyframes);
    expect(chained.attempts[0]?.outcome).toBe('empty');
  });

  it('discards a partial list when a decode session fails mid-stream', async () => {
    // First session (difference) dies after the cut; second (histogram) is healthy
    const source = new FakeFrameSource({ paint: hardCut(150), failAtIndex: 200, failSessions: 1 });
    const result = resolved(await detectKeyframes(source, { methods: ['difference', 'histogram'] }));

    expect(result.method).toBe('histogram');
    expect(result.keyframes.map((k) => k.frameIndex)).toEqual([150]);
    expect(result.attempts[0]).toMatchObject({ method: 'difference', outcome: 'source_error', keyframes: 0 });
    expect(source.openSessions).toBe(0);
  });

  it('reports an exhausted run, not an error, when every method is empty', async () => {
    const source = new FakeFrameSource({ paint: (_i, w, h) => solidRgb(w, h, 77) });
    const result = await detectKeyframes(source, { methods: ['I_frame', 'difference', 'histogram'] });

    expect(result.status).toBe('exhausted');
    expect(result.method).toBeNull();
    expect(result.keyframes).toEqual([]);
    expect(result.attempts.map((a) => a.outcome)).toEqual(['unavailable', 'empty', 'empty']);
  });

  it('walks the documented state sequence', async () => {
    const states: RunState['status'][] = [];
    const source = new FakeFrameSource({ paint: hardCut(150) });
    await detectKeyframes(source, { methods: ['I_frame', 'difference'] }, {
      onStateChange: (s) => states.push(s.status),
    });
    expect(states).toEqual(['pending', 'scoring', 'scoring', 'selecting', 'resolved']);
  });

  it('enters selecting as soon as candidates flow, even for a method that later fails', async () => {
    const states: string[] = [];
    const source = new FakeFrameSource({ paint: hardCut(150), failAtIndex: 200, failSessions: 1 });
    await detectKeyframes(source, { methods: ['difference', 'histogram'] }, {
      onStateChange: (s) => states.push('method' in s && s.method ? `${s.status}:${s.method}` : s.status),
    });
    expect(states).toEqual([
      'pending',
      'scoring:difference',
      'selecting:difference',
      'scoring:histogram',
      'selecting:histogram',
      'resolved:histogram',
    ]);
  });
});

describe('detectKeyframes — cancellation', () => {
  it('reports an incomplete run and releases the session when aborted mid-decode', async () => {
    const controller = new AbortController();
    const source = new FakeFrameSource({
      paint: hardCut(150),
      onFrame: (i) => {
        if (i === 10) controller.abort(new Error('stop requested'));
      },
    });
    const result = await detectKeyframes(source, { methods: ['difference', 'histogram'] }, {
      signal: controller.signal,
    });

    expect(result.status).toBe('incomplete');
    expect(result.method).toBe('difference');
    expect(result.keyframes).toEqual([]);
    expect(source.openSessions).toBe(0);
    expect(source.sessionsOpened).toBe(1);
  });

  it('does not start any method when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new FakeFrameSource({ paint: hardCut(150) });
    const result = await detectKeyframes(source, { methods: ['difference'] }, { signal: controller.signal });

    expect(result.status).toBe('incomplete');
    expect(source.sessionsOpened).toBe(0);
  });

  it('times out a slow decode', async () => {
    const source = new FakeFrameSource({ durationS: 10, paint: hardCut(150), frameDelayMs: 1 });
    const result = await detectKeyframes(source, { methods: ['difference'] }, { timeoutMs: 20 });

    expect(result.status).toBe('incomplete');
    if (result.status === 'incomplete') expect(result.reason).toMatch(/Timed out after 20ms/);
    expect(source.openSessions).toBe(0);
  });
});

describe('detectKeyframes — errors', () => {
  it('rejects invalid options before decoding', async () => {
    const source = new FakeFrameSource({ paint: hardCut(150) });
    await expect(detectKeyframes(source, { methods: [] })).rejects.toBeInstanceOf(KeyframeOptionsError);
    await expect(detectKeyframes(source, { maxKeyframes: 0 })).rejects.toBeInstanceOf(KeyframeOptionsError);
    await expect(detectKeyframes(source, { flowStep: 1.5 })).rejects.toBeInstanceOf(KeyframeOptionsError);
    await expect(detectKeyframes(source, { minIntervalS: -1 })).rejects.toBeInstanceOf(KeyframeOptionsError);
    expect(source.sessionsOpened).toBe(0);
  });

  it('propagates errors outside the taxonomy', async () => {
    const source = new FakeFrameSource({ paint: hardCut(150) });
    const broken = {
      info: source.info,
      probeKeyframeIndices: () => source.probeKeyframeIndices(),
      decode: async function* (): AsyncGenerator<Frame> {
        throw new TypeError('bug in decoder glue');
      },
    };
    await expect(detectKeyframes(broken, { methods: ['difference'] })).rejects.toThrow(TypeError);
  });

  it('treats a SourceError from the index probe as a fallthrough', async () => {
    const source = new FakeFrameSource({ paint: hardCut(150) });
    const flaky = {
      info: source.info,
      probeKeyframeIndices: () => Promise.reject(new SourceError('ffprobe exploded')),
      decode: (opts?: { step?: number; signal?: AbortSignal }) => source.decode(opts),
    };
    const result = resolved(await detectKeyframes(flaky, { methods: ['I_frame', 'difference'] }));
    expect(result.attempts[0]?.outcome).toBe('source_error');
    expect(result.method).toBe('difference');
  });
});

describe('detectKeyframes — output invariants', () => {
  const cutFrames = [3, 10, 12, 40, 41, 70, 100, 101, 102, 150, 170, 171, 250, 290];
  const paint = (index: number, w: number, h: number) =>
    solidRgb(w, h, cutFrames.filter((c) => c <= index).length % 2 === 0 ? 30 : 220);

  const configs = [0, 0.25, 0.5, 1].flatMap((minIntervalS) =>
    [1, 3, 20].flatMap((maxKeyframes) =>
      (['difference', 'histogram'] as const).map((method) => ({ minIntervalS, maxKeyframes, method })),
    ),
  );

  it.each(configs)('holds for $method, max=$maxKeyframes, interval=$minIntervalS', async (cfg) => {
    const result = await detectKeyframes(new FakeFrameSource({ paint }), {
      methods: [cfg.method],
      maxKeyframes: cfg.maxKeyframes,
      minIntervalS: cfg.minIntervalS,
    });
    assertInvariants(result.keyframes, cfg.maxKeyframes, cfg.minIntervalS);
    expect(result.keyframes[0]?.frameIndex).toBe(3);
  });
});
