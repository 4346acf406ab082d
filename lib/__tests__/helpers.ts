import pino from 'pino';
import type { CompletionRequest, LanguageModel } from '../ai';
import { parseSettings, type Settings } from '../config';
import type { FetchImpl, FetchPolicy } from '../fetch/fetcher';
import type { SearchProvider } from '../search';
import type { CompetitorProfile, SourceType } from '../types';

export const silent = pino({ level: 'silent' });

type Reply = { status?: number; body?: string; headers?: Record<string, string> };
type Route = string | Reply | Reply[] | ((url: string) => Reply | Promise<Reply>);

/**
 * In-process stand-in for fetch. A string route answers 200 with that body,
 * an array is played in order (the last entry repeats) and unknown URLs 404.
 */
export function routedFetch(routes: Record<string, Route>) {
  const calls: string[] = [];
  const cursors = new Map<string, number>();
  const userAgents: string[] = [];

  const impl: FetchImpl = async (url, init) => {
    calls.push(url);
    const headers = new Headers(init.headers);
    userAgents.push(headers.get('user-agent') ?? '');
    const route = routes[url];
    let reply: Reply;
    if (route === undefined) reply = { status: 404, body: 'not found' };
    else if (typeof route === 'string') reply = { body: route };
    else if (typeof route === 'function') reply = await route(url);
    else if (Array.isArray(route)) {
      const i = cursors.get(url) ?? 0;
      cursors.set(url, i + 1);
      reply = route[Math.min(i, route.length - 1)] ?? { status: 404 };
    } else reply = route;
    return new Response(reply.body ?? '', {
      status: reply.status ?? 200,
      headers: { 'content-type': 'text/html; charset=utf-8', ...reply.headers },
    });
  };

  return { impl, calls, userAgents, count: (url: string) => calls.filter((c) => c === url).length };
}

export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return parseSettings(
    {},
    {
      hostRequestsPerSecond: 1_000,
      minRequestIntervalMs: 0,
      backoffBaseMs: 0,
      requestTimeoutMs: 2_000,
      acquireTimeoutMs: 5_000,
      ...overrides,
    }
  );
}

export function testPolicy(overrides: Partial<FetchPolicy> = {}): FetchPolicy {
  return {
    requestsPerSecond: 1_000,
    minIntervalMs: 0,
    userAgents: ['agent-a', 'agent-b'],
    respectRobots: true,
    timeoutMs: 2_000,
    maxAttempts: 3,
    backoffBaseMs: 0,
    maxBodyBytes: 1_000_000,
    acquireTimeoutMs: 5_000,
    maxRetryAfterMs: 0,
    ...overrides,
  };
}

export function profile(overrides: Partial<CompetitorProfile> = {}): CompetitorProfile {
  return {
    id: 'acme-pos',
    name: 'Acme POS',
    rootUrl: 'https://acme.example/',
    manualOverrides: [],
    country: null,
    ...overrides,
  };
}

/** Model stand-in answering from a script; records every request. */
export function scriptedModel(script: string[] | ((req: CompletionRequest, call: number) => string | Promise<string>)) {
  const requests: CompletionRequest[] = [];
  const model: LanguageModel = {
    name: 'scripted',
    async complete(req) {
      requests.push(req);
      const call = requests.length - 1;
      if (typeof script === 'function') return script(req, call);
      const answer = script[Math.min(call, script.length - 1)];
      if (answer === undefined) throw new Error('script exhausted');
      return answer;
    },
  };
  return { model, requests };
}

/** Search stand-in: the first key contained in the query decides the results. */
export function scriptedSearch(results: Record<string, string[]>, fail: string[] = []) {
  const queries: { query: string; sourceType: SourceType }[] = [];
  const markets: (string | null)[] = [];
  const search: SearchProvider = {
    name: 'scripted',
    async search(query, sourceType, options) {
      queries.push({ query, sourceType });
      markets.push(options.market?.code ?? null);
      if (fail.some((f) => query.includes(f))) throw new Error(`search failed for ${query}`);
      const key = Object.keys(results).find((k) => query.includes(k));
      return (key ? results[key] : []).slice(0, options.num);
    },
  };
  return { search, queries, markets };
}

export const html = (title: string, body: string) =>
  `<!doctype html><html><head><title>${title}</title></head><body>${body}</body></html>`;
