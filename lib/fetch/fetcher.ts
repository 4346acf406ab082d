import { log as rootLog, type Logger } from '../logger';
import type { Settings } from '../config';
import { FetchBlocked, FetchError, IntelError, isAbortError, type BlockReason } from '../errors';
import { deadline, sleep } from '../concurrency';
import { HostRateLimiter } from '../quota';
import { contentHash, normalizeUrl } from '../normalize';
import type { RawDocument } from '../types';
import { ALLOW_ALL, isPathAllowed, parseRobots, type RobotsRules } from './robots';

export type FetchPolicy = {
  requestsPerSecond: number;
  minIntervalMs: number;
  userAgents: string[];
  respectRobots: boolean;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  maxBodyBytes: number;
  acquireTimeoutMs: number;
  maxRetryAfterMs: number;
};

export type AccessPolicy = (url: string) => boolean | Promise<boolean>;
export type FetchImpl = (url: string, init: RequestInit) => Promise<Response>;

export type FetchOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type FetcherOptions = {
  policy: FetchPolicy;
  limiter?: HostRateLimiter;
  isAllowed?: AccessPolicy;
  fetchImpl?: FetchImpl;
  logger?: Logger;
};

export function fetchPolicyFromSettings(settings: Settings): FetchPolicy {
  return {
    requestsPerSecond: settings.hostRequestsPerSecond,
    minIntervalMs: settings.minRequestIntervalMs,
    userAgents: settings.userAgents,
    respectRobots: settings.respectRobots,
    timeoutMs: settings.requestTimeoutMs,
    maxAttempts: settings.maxAttempts,
    backoffBaseMs: settings.backoffBaseMs,
    maxBodyBytes: settings.maxBodyBytes,
    acquireTimeoutMs: settings.acquireTimeoutMs,
    maxRetryAfterMs: 30_000,
  };
}

type AttemptFailure =
  | { kind: 'status'; status: number; retryAfterMs: number | null }
  | { kind: 'transport'; error: unknown; timedOut: boolean };

const ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

/**
 * Policy-aware HTTP retrieval for one run. Host blocks and robots rules are
 * remembered for the lifetime of the instance; the rate limiter may be shared
 * across runs.
 */
export class Fetcher {
  private readonly policy: FetchPolicy;
  private readonly limiter: HostRateLimiter;
  private readonly isAllowed: AccessPolicy | undefined;
  private readonly fetchImpl: FetchImpl;
  private readonly log: Logger;
  private readonly blockedHosts = new Map<string, BlockReason>();
  private readonly robots = new Map<string, Promise<RobotsRules>>();
  private uaCursor = 0;
  private requests = 0;

  constructor(options: FetcherOptions) {
    this.policy = options.policy;
    this.limiter = options.limiter ?? new HostRateLimiter();
    this.isAllowed = options.isAllowed;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.log = options.logger ?? rootLog.child({ module: 'fetch' });
  }

  /** Network requests issued so far, robots.txt included. */
  get requestCount() {
    return this.requests;
  }

  isHostBlocked(url: string) {
    try {
      return this.blockedHosts.has(new URL(url).host);
    } catch {
      return false;
    }
  }

  async fetch(rawUrl: string, options: FetchOptions = {}): Promise<RawDocument> {
    const url = normalizeUrl(rawUrl);
    if (!url) throw new FetchError(rawUrl, `Invalid URL: ${rawUrl}`);
    const { host, origin } = new URL(url);

    if (this.blockedHosts.has(host)) {
      throw new FetchBlocked(url, 'host-blocked', `Host ${host} is blocked for this run`);
    }
    if (this.isAllowed && !(await this.isAllowed(url))) {
      throw new FetchBlocked(url, 'policy');
    }
    if (this.policy.respectRobots) {
      const rules = await this.robotsFor(origin, host, options.signal);
      if (!isPathAllowed(rules, url)) throw new FetchBlocked(url, 'robots');
    }

    const timeoutMs = options.timeoutMs ?? this.policy.timeoutMs;
    let last: AttemptFailure | null = null;

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      if (attempt > 1 && last) {
        await sleep(this.backoffFor(attempt - 1, last), options.signal);
      }
      await this.limiter.acquire(host, this.budget(), {
        timeoutMs: this.policy.acquireTimeoutMs,
        signal: options.signal,
      });

      const outcome = await this.attempt(url, timeoutMs, options.signal);
      if ('doc' in outcome) return outcome.doc;
      last = outcome.failure;

      if (last.kind === 'status' && !isRetryableStatus(last.status)) {
        throw new FetchError(url, `HTTP ${last.status}`, last.status);
      }
      this.log.debug({ url, attempt, failure: describe(last) }, 'Fetch attempt failed');
    }

    if (last?.kind === 'status' && (last.status === 403 || last.status === 429)) {
      const reason: BlockReason = last.status === 403 ? 'forbidden' : 'throttled';
      this.blockedHosts.set(host, reason);
      this.log.warn({ url, host, status: last.status }, 'Host blocked for the rest of the run');
      throw new FetchBlocked(url, reason, `HTTP ${last.status} persisted after ${this.policy.maxAttempts} attempts`);
    }
    if (last?.kind === 'status') {
      throw new FetchError(url, `HTTP ${last.status} after ${this.policy.maxAttempts} attempts`, last.status);
    }
    const cause = last?.kind === 'transport' ? last.error : undefined;
    const reason = last?.kind === 'transport' && last.timedOut ? `Timed out after ${timeoutMs}ms` : 'Connection failed';
    throw new FetchError(url, `${reason} (${this.policy.maxAttempts} attempts)`, null, { cause });
  }

  private budget() {
    return { requestsPerSecond: this.policy.requestsPerSecond, minIntervalMs: this.policy.minIntervalMs };
  }

  private nextUserAgent() {
    const agents = this.policy.userAgents;
    if (!agents.length) return 'Mozilla/5.0 (compatible; rivalscope/1.0)';
    const ua = agents[this.uaCursor % agents.length];
    this.uaCursor++;
    return ua;
  }

  private async attempt(
    url: string,
    timeoutMs: number,
    signal: AbortSignal | undefined
  ): Promise<{ doc: RawDocument } | { failure: AttemptFailure }> {
    const guard = deadline(timeoutMs, signal);
    this.requests++;
    try {
      const res = await this.fetchImpl(url, {
        signal: guard.signal,
        redirect: 'follow',
        headers: {
          'user-agent': this.nextUserAgent(),
          accept: ACCEPT,
          'accept-language': 'en-US,en;q=0.9',
        },
      });
      if (!res.ok) {
        await res.body?.cancel();
        return { failure: { kind: 'status', status: res.status, retryAfterMs: parseRetryAfter(res.headers.get('retry-after')) } };
      }
      const content = await readBody(res, this.policy.maxBodyBytes);
      const doc: RawDocument = Object.freeze({
        url,
        fetchedAt: new Date().toISOString(),
        content,
        contentHash: contentHash(content),
        contentType: res.headers.get('content-type') ?? '',
        status: res.status,
      });
      return { doc };
    } catch (error) {
      if (signal?.aborted) throw error;
      if (error instanceof IntelError) throw error;
      return { failure: { kind: 'transport', error, timedOut: guard.timedOut() || isAbortError(error) } };
    } finally {
      guard.dispose();
    }
  }

  private backoffFor(retry: number, failure: AttemptFailure) {
    const exponential = this.policy.backoffBaseMs * 2 ** (retry - 1);
    if (failure.kind === 'status' && failure.status === 429 && failure.retryAfterMs !== null) {
      return Math.min(Math.max(failure.retryAfterMs, exponential), this.policy.maxRetryAfterMs);
    }
    return exponential;
  }

  private robotsFor(origin: string, host: string, signal: AbortSignal | undefined) {
    let pending = this.robots.get(host);
    if (!pending) {
      pending = this.loadRobots(origin, host, signal);
      this.robots.set(host, pending);
    }
    return pending;
  }

  private async loadRobots(origin: string, host: string, signal: AbortSignal | undefined): Promise<RobotsRules> {
    const url = `${origin}/robots.txt`;
    try {
      await this.limiter.acquire(host, this.budget(), { timeoutMs: this.policy.acquireTimeoutMs, signal });
      const outcome = await this.attempt(url, this.policy.timeoutMs, signal);
      if ('doc' in outcome) return parseRobots(outcome.doc.content);
      this.log.debug({ url, failure: describe(outcome.failure) }, 'robots.txt unavailable, allowing all');
      return ALLOW_ALL;
    } catch (error) {
      if (signal?.aborted) {
        this.robots.delete(host);
        throw error;
      }
      this.log.debug({ url, error }, 'robots.txt unreachable, allowing all');
      return ALLOW_ALL;
    }
  }
}

function isRetryableStatus(status: number) {
  return status >= 500 || status === 403 || status === 429 || status === 408;
}

function describe(failure: AttemptFailure) {
  if (failure.kind === 'status') return `HTTP ${failure.status}`;
  return failure.timedOut ? 'timeout' : failure.error instanceof Error ? failure.error.message : String(failure.error);
}

export function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value.trim());
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const at = Date.parse(value);
  return Number.isNaN(at) ? null : Math.max(0, at - Date.now());
}

async function readBody(res: Response, maxBytes: number): Promise<string> {
  if (!res.body) return '';
  const reader = res.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    if (size + value.byteLength > maxBytes) {
      chunks.push(value.subarray(0, maxBytes - size));
      await reader.cancel();
      break;
    }
    chunks.push(value);
    size += value.byteLength;
  }
  return new TextDecoder().decode(Buffer.concat(chunks));
}
