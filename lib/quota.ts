import { RateLimitExceeded } from './errors';
import { sleep } from './concurrency';

type Window = { start: number; count: number };

export type WaitOptions = { timeoutMs?: number; signal?: AbortSignal };

/**
 * Fixed-window counters keyed by API key or platform. Check and increment
 * happen in one synchronous step, so concurrent callers never overshoot.
 */
export class QuotaCounter {
  private windows = new Map<string, Window>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Consumes one unit if the window has room; otherwise reports how long until it resets. */
  tryConsume(key: string, limit: number, windowMs: number): { ok: true } | { ok: false; waitMs: number } {
    const t = this.now();
    let w = this.windows.get(key);
    if (!w || t - w.start >= windowMs) {
      w = { start: t, count: 0 };
      this.windows.set(key, w);
    }
    if (w.count < limit) {
      w.count++;
      return { ok: true };
    }
    return { ok: false, waitMs: w.start + windowMs - t };
  }

  remaining(key: string, limit: number, windowMs: number) {
    const w = this.windows.get(key);
    if (!w || this.now() - w.start >= windowMs) return limit;
    return Math.max(0, limit - w.count);
  }

  /** Waits for the next window when the current one is spent, up to `timeoutMs`. */
  async consume(key: string, limit: number, windowMs: number, options: WaitOptions = {}) {
    const budget = options.timeoutMs ?? Infinity;
    const started = this.now();
    for (;;) {
      const attempt = this.tryConsume(key, limit, windowMs);
      if (attempt.ok) return;
      const elapsed = this.now() - started;
      if (elapsed + attempt.waitMs > budget) throw new RateLimitExceeded(key, attempt.waitMs);
      await sleep(attempt.waitMs, options.signal);
    }
  }
}

export type HostBudget = {
  requestsPerSecond: number;
  minIntervalMs: number;
};

/**
 * Hands out request slots per host. Slots are spaced by
 * `max(minIntervalMs, 1000 / requestsPerSecond)`; a caller whose slot lies
 * beyond its timeout is refused without reserving anything.
 */
export class HostRateLimiter {
  private nextSlot = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  static spacing(budget: HostBudget) {
    return Math.max(budget.minIntervalMs, 1000 / budget.requestsPerSecond);
  }

  async acquire(host: string, budget: HostBudget, options: WaitOptions = {}) {
    const t = this.now();
    const slot = Math.max(t, this.nextSlot.get(host) ?? 0);
    const waitMs = slot - t;
    if (waitMs > (options.timeoutMs ?? Infinity)) {
      throw new RateLimitExceeded(`host:${host}`, waitMs);
    }
    this.nextSlot.set(host, slot + HostRateLimiter.spacing(budget));
    if (waitMs > 0) await sleep(waitMs, options.signal);
    else if (options.signal?.aborted) await sleep(0, options.signal);
  }
}
