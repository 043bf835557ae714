import { describe, expect, it } from 'vitest';

import { mapLimit, mapLimitWithDeadline } from '@/lib/concurrency/map-limit';

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe('mapLimit', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let running = 0;
    let peak = 0;

    const res = await mapLimit([30, 10, 20, 5, 15], 2, async (ms) => {
      running += 1;
      peak = Math.max(peak, running);
      await delay(ms);
      running -= 1;
      return ms * 2;
    });

    expect(res).toEqual([60, 20, 40, 10, 30]);
    expect(peak).toBe(2);
  });
});

describe('mapLimitWithDeadline', () => {
  it('returns an empty list for no items', async () => {
    await expect(mapLimitWithDeadline([], { limit: 3, timeoutMs: 10 }, async () => 1)).resolves.toEqual([]);
  });

  it('reports fulfilled, rejected and timed-out items separately', async () => {
    const outcomes = await mapLimitWithDeadline(['fast', 'broken', 'hung'], { limit: 3, timeoutMs: 50 }, (item) => {
      if (item === 'fast') return Promise.resolve('ok');
      if (item === 'broken') return Promise.reject(new Error('access is denied'));
      return new Promise<string>(() => {});
    });

    expect(outcomes[0]).toEqual({ status: 'fulfilled', value: 'ok' });
    expect(outcomes[1]?.status).toBe('rejected');
    expect(outcomes[2]).toEqual({ status: 'timeout' });
  });

  it('leaves queued items unstarted once the deadline passes', async () => {
    const started: number[] = [];
    const outcomes = await mapLimitWithDeadline([1, 2, 3, 4], { limit: 1, timeoutMs: 30 }, (n) => {
      started.push(n);
      return new Promise<number>(() => {});
    });

    expect(started).toEqual([1]);
    expect(outcomes.every((o) => o.status === 'timeout')).toBe(true);
  });

  it('aborts the shared signal when the deadline passes', async () => {
    const signals: AbortSignal[] = [];
    await mapLimitWithDeadline(['a', 'b'], { limit: 2, timeoutMs: 20 }, (_item, signal) => {
      signals.push(signal);
      return new Promise<string>(() => {});
    });

    expect(signals).toHaveLength(2);
    expect(signals.every((s) => s.aborted)).toBe(true);
  });
});
