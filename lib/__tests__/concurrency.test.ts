import { describe, expect, it } from 'vitest';
import { deadline, raceSignal, settleBounded, sleep } from '../concurrency';

describe('settleBounded', () => {
  it('keeps input order and never exceeds the concurrency', async () => {
    let active = 0;
    let peak = 0;
    const results = await settleBounded([30, 10, 20, 0], 2, async (ms, i) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(ms);
      active--;
      if (i === 2) throw new Error('third failed');
      return ms * 2;
    });

    expect(peak).toBe(2);
    expect(results.map((r) => (r.status === 'fulfilled' ? r.value : 'rejected'))).toEqual([60, 20, 'rejected', 0]);
  });

  it('handles an empty list', async () => {
    expect(await settleBounded([], 3, async () => 1)).toEqual([]);
  });
});

describe('deadline', () => {
  it('aborts with a TimeoutError once the time is up', async () => {
    const guard = deadline(5);
    await expect(sleep(1_000, guard.signal)).rejects.toMatchObject({ name: 'TimeoutError' });
    expect(guard.timedOut()).toBe(true);
    guard.dispose();
  });

  it('follows the parent signal', () => {
    const parent = new AbortController();
    const guard = deadline(1_000, parent.signal);
    parent.abort();
    expect(guard.signal.aborted).toBe(true);
    expect(guard.timedOut()).toBe(false);
    guard.dispose();
  });
});

describe('raceSignal', () => {
  it('rejects when the signal aborts first', async () => {
    const controller = new AbortController();
    const pending = raceSignal(new Promise<string>(() => undefined), controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('passes the value through otherwise', async () => {
    await expect(raceSignal(Promise.resolve('ok'), new AbortController().signal)).resolves.toBe('ok');
  });
});
