import { z } from 'zod';
import { log } from '../logger';
import type { Settings } from '../config';
import { ServiceUnavailable, IntelError, isAbortError } from '../errors';
import { deadline } from '../concurrency';
import type { FetchImpl } from '../fetch/fetcher';
import { searchRegion, type Market } from '../markets';
import { QuotaCounter } from '../quota';
import type { SourceType } from '../types';

export type SearchOptions = { num: number; market?: Market | null; signal?: AbortSignal };

/** External web search. Returns result URLs; an empty list is a valid answer. */
export interface SearchProvider {
  readonly name: string;
  search(query: string, sourceType: SourceType, options: SearchOptions): Promise<string[]>;
}

type ProviderConfig = {
  apiKey: string;
  quota: QuotaCounter;
  requestsPerMinute: number;
  timeoutMs: number;
  acquireTimeoutMs: number;
  fetchImpl: FetchImpl;
};

const tavilyResponse = z.object({
  results: z.array(z.object({ url: z.string() }).passthrough()).default([]),
});

const serpapiResponse = z.object({
  organic_results: z.array(z.object({ link: z.string() }).passthrough()).default([]),
  error: z.string().optional(),
});

abstract class HttpSearchProvider implements SearchProvider {
  abstract readonly name: string;

  constructor(protected readonly config: ProviderConfig) {}

  protected abstract request(query: string, options: SearchOptions, signal: AbortSignal): Promise<string[]>;

  async search(query: string, sourceType: SourceType, options: SearchOptions): Promise<string[]> {
    const { quota, requestsPerMinute, acquireTimeoutMs, timeoutMs } = this.config;
    await quota.consume(`search:${this.name}`, requestsPerMinute, 60_000, {
      timeoutMs: acquireTimeoutMs,
      signal: options.signal,
    });
    const guard = deadline(timeoutMs, options.signal);
    try {
      const urls = await this.request(query, options, guard.signal);
      log.debug({ provider: this.name, query, sourceType, results: urls.length }, 'Search completed');
      return urls.slice(0, options.num);
    } catch (error) {
      if (options.signal?.aborted) throw error;
      if (error instanceof IntelError) throw error;
      const reason = guard.timedOut() || isAbortError(error) ? `timed out after ${timeoutMs}ms` : 'request failed';
      throw new ServiceUnavailable(this.name, reason, { cause: error });
    } finally {
      guard.dispose();
    }
  }

  protected async readJson(res: Response) {
    if (!res.ok) {
      throw new ServiceUnavailable(this.name, `HTTP ${res.status}`);
    }
    return res.json();
  }
}

export class TavilySearch extends HttpSearchProvider {
  readonly name = 'tavily';

  protected async request(query: string, options: SearchOptions, signal: AbortSignal) {
    const res = await this.config.fetchImpl('https://api.tavily.com/search', {
      method: 'POST',
      signal,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        api_key: this.config.apiKey,
        query,
        search_depth: 'basic',
        max_results: options.num,
        ...(options.market ? { country: options.market.name.toLowerCase() } : {}),
      }),
    });
    const parsed = tavilyResponse.safeParse(await this.readJson(res));
    if (!parsed.success) throw new ServiceUnavailable(this.name, 'unexpected response shape');
    return parsed.data.results.map((r) => r.url);
  }
}

export class SerpApiSearch extends HttpSearchProvider {
  readonly name = 'serpapi';

  protected async request(query: string, options: SearchOptions, signal: AbortSignal) {
    const params = new URLSearchParams({
      engine: 'google',
      q: query,
      num: String(options.num),
      api_key: this.config.apiKey,
    });
    if (options.market) {
      params.set('gl', searchRegion(options.market));
      params.set('google_domain', options.market.googleDomain);
    }
    const res = await this.config.fetchImpl(`https://serpapi.com/search.json?${params.toString()}`, { signal });
    const parsed = serpapiResponse.safeParse(await this.readJson(res));
    if (!parsed.success) throw new ServiceUnavailable(this.name, 'unexpected response shape');
    // SerpAPI reports "no results" as an error string.
    if (parsed.data.error && !/hasn't returned any results/i.test(parsed.data.error)) {
      throw new ServiceUnavailable(this.name, parsed.data.error);
    }
    return parsed.data.organic_results.map((r) => r.link);
  }
}

/** Builds the configured search provider, or null when none is configured. */
export function makeSearch(
  settings: Settings,
  quota: QuotaCounter,
  fetchImpl: FetchImpl = (url, init) => fetch(url, init)
): SearchProvider | null {
  const base = {
    quota,
    requestsPerMinute: settings.searchRequestsPerMinute,
    timeoutMs: settings.requestTimeoutMs,
    acquireTimeoutMs: settings.acquireTimeoutMs,
    fetchImpl,
  };
  switch (settings.searchProvider) {
    case 'tavily':
      if (!settings.tavilyKey) throw new ServiceUnavailable('tavily', 'TAVILY_API_KEY not configured');
      return new TavilySearch({ ...base, apiKey: settings.tavilyKey });
    case 'serpapi':
      if (!settings.serpapiKey) throw new ServiceUnavailable('serpapi', 'SERPAPI_API_KEY not configured');
      return new SerpApiSearch({ ...base, apiKey: settings.serpapiKey });
    default:
      log.warn('No search provider configured; complaint collection will be skipped');
      return null;
  }
}
