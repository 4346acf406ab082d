import { z } from 'zod';
import { log as rootLog, type Logger } from '../logger';
import { StageCache } from '../cache';
import { DiscoveryIncomplete, FetchBlocked, FetchError, toRunFailure, type RunFailure } from '../errors';
import type { Fetcher } from '../fetch/fetcher';
import { CATEGORY_PRIORITY, classifyPage, isCommercial } from '../crawl/classify';
import { extractInternalLinks, type PageLink } from '../crawl/links';
import { parseSitemap, SITEMAP_PATHS } from '../crawl/sitemap';
import { contentHash, isOnDomain, getDomain, normalizeUrl, round2, shortHash } from '../normalize';
import {
  CONFIDENCE_SCORE,
  type CompetitorProfile,
  type ConfidenceLevel,
  type DiscoveredPage,
  type DiscoveryMethod,
  type DiscoveryStatus,
  type PageCategory,
  type RawDocument,
} from '../types';

export type PageFetcher = Pick<Fetcher, 'fetch'>;

export type DiscoveryResult = {
  pages: DiscoveredPage[];
  status: DiscoveryStatus;
  notice: DiscoveryIncomplete | null;
  /** HTML pages fetched while crawling links; empty when served from cache. */
  documents: RawDocument[];
  failures: RunFailure[];
  fromCache: boolean;
};

export type DiscoveryOptions = {
  cacheTtlMs: number;
  maxHopPages: number;
  maxChildSitemaps?: number;
  maxSitemapUrls?: number;
};

const STAGE = 'discovery';

const cachedDiscoverySchema = z.object({
  inputsHash: z.string(),
  status: z.enum(['complete', 'incomplete']),
  pages: z.array(
    z.object({
      url: z.string(),
      category: z.enum(['pricing', 'features', 'blog', 'careers', 'unknown']),
      method: z.enum(['sitemap', 'link-pattern', 'manual-override']),
      confidence: z.enum(['maximum', 'high', 'medium']),
      score: z.number(),
    })
  ),
});

type CachedDiscovery = z.infer<typeof cachedDiscoverySchema>;

/** Per-call bookkeeping shared by the sitemap and crawl passes. */
type Pass = {
  documents: RawDocument[];
  failures: RunFailure[];
  transientErrors: number;
  signal: AbortSignal | undefined;
};

/** Outages that may clear on the next run, as opposed to a page that does not exist. */
function isTransient(error: unknown) {
  if (error instanceof FetchError) return error.status === null || error.status === 429 || error.status >= 500;
  return error instanceof FetchBlocked && (error.reason === 'throttled' || error.reason === 'host-blocked');
}

function parseCached(value: unknown): CachedDiscovery | null {
  const parsed = cachedDiscoverySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Keyed by normalized URL; a page's confidence only ever moves up. */
class PageSet {
  private pages = new Map<string, DiscoveredPage>();

  add(url: string, category: PageCategory, method: DiscoveryMethod, confidence: ConfidenceLevel, match: number) {
    const score = confidence === 'maximum' ? 1 : round2(CONFIDENCE_SCORE[confidence] * (0.5 + 0.5 * match));
    const existing = this.pages.get(url);
    if (existing && CONFIDENCE_SCORE[existing.confidence] >= CONFIDENCE_SCORE[confidence]) return;
    this.pages.set(url, { url, category, method, confidence, score });
  }

  has(category: PageCategory) {
    for (const page of this.pages.values()) if (page.category === category) return true;
    return false;
  }

  get size() {
    return this.pages.size;
  }

  list() {
    return [...this.pages.values()].sort((a, b) => a.url.localeCompare(b.url));
  }
}

export class DiscoveryEngine {
  private readonly log: Logger;

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly cache: StageCache,
    private readonly options: DiscoveryOptions,
    logger?: Logger
  ) {
    this.log = logger ?? rootLog.child({ module: 'discovery' });
  }

  async discover(profile: CompetitorProfile, opts: { signal?: AbortSignal } = {}): Promise<DiscoveryResult> {
    const inputsHash = shortHash(
      JSON.stringify({
        rootUrl: profile.rootUrl,
        overrides: [...profile.manualOverrides].sort(),
        maxHopPages: this.options.maxHopPages,
      }),
      16
    );

    const cached = await this.cache.readFresh(profile.id, STAGE, this.options.cacheTtlMs, parseCached);
    if (cached && cached.value.inputsHash === inputsHash) {
      this.log.info({ competitorId: profile.id, pages: cached.value.pages.length }, 'Discovery served from cache');
      return this.finish(profile, cached.value.pages, [], [], true);
    }

    const pages = new PageSet();
    const pass: Pass = { documents: [], failures: [], transientErrors: 0, signal: opts.signal };

    for (const url of profile.manualOverrides) {
      pages.add(url, classifyPage(url).category, 'manual-override', 'maximum', 1);
    }

    const sitemapUrls = await this.readSitemaps(profile.rootUrl, pass);
    for (const url of sitemapUrls) {
      const { category, score } = classifyPage(url);
      if (isCommercial(category)) pages.add(url, category, 'sitemap', 'high', score);
    }

    if (!sitemapUrls.length || !pages.has('pricing') || !pages.has('features')) {
      this.log.debug(
        { competitorId: profile.id, sitemapUrls: sitemapUrls.length },
        'Sitemap missing or incomplete, crawling links'
      );
      await this.crawlLinks(profile.rootUrl, pages, pass);
    }

    const result = this.finish(profile, pages.list(), pass.documents, pass.failures, false);
    if (pass.failures.length || pass.transientErrors) {
      this.log.info(
        { competitorId: profile.id, failures: pass.failures.length, transientErrors: pass.transientErrors },
        'Discovery not cached after failed fetches'
      );
      return result;
    }
    const entry: CachedDiscovery = { inputsHash, status: result.status, pages: result.pages };
    await this.cache.write(profile.id, STAGE, contentHash(JSON.stringify(entry)), entry);
    return result;
  }

  private finish(
    profile: CompetitorProfile,
    pages: DiscoveredPage[],
    documents: RawDocument[],
    failures: RunFailure[],
    fromCache: boolean
  ): DiscoveryResult {
    const commercial = pages.filter((p) => isCommercial(p.category)).length;
    const status: DiscoveryStatus = commercial > 0 ? 'complete' : 'incomplete';
    const notice = status === 'incomplete' ? new DiscoveryIncomplete(profile.rootUrl, pages.length) : null;
    if (notice) this.log.warn({ competitorId: profile.id, pages: pages.length }, notice.message);
    return { pages, status, notice, documents, failures, fromCache };
  }

  /** URLs listed by the first sitemap location that parses, with index files followed one level. */
  private async readSitemaps(rootUrl: string, pass: Pass): Promise<string[]> {
    const maxChildren = this.options.maxChildSitemaps ?? 5;
    const maxUrls = this.options.maxSitemapUrls ?? 5_000;
    const domain = getDomain(rootUrl);
    if (!domain) return [];

    for (const path of SITEMAP_PATHS) {
      const xml = await this.tryFetch(new URL(path, rootUrl).toString(), pass);
      if (xml === null) continue;
      const parsed = parseSitemap(xml);
      if (parsed.kind === 'invalid') continue;

      const urls: string[] = parsed.kind === 'urlset' ? parsed.urls : [];
      if (parsed.kind === 'index') {
        const children = parsed.sitemaps.filter((u) => isOnDomain(u, domain)).slice(0, maxChildren);
        for (const child of children) {
          const childXml = await this.tryFetch(child, pass);
          if (childXml === null) continue;
          const childMap = parseSitemap(childXml);
          if (childMap.kind === 'urlset') urls.push(...childMap.urls);
          if (urls.length >= maxUrls) break;
        }
      }
      return urls
        .slice(0, maxUrls)
        .map((u) => normalizeUrl(u))
        .filter((u) => u && isOnDomain(u, domain));
    }
    return [];
  }

  private async tryFetch(url: string, pass: Pass) {
    try {
      const doc = await this.fetcher.fetch(url, { signal: pass.signal });
      return doc.content;
    } catch (error) {
      if (pass.signal?.aborted) throw error;
      if (isTransient(error)) pass.transientErrors++;
      this.log.debug({ url, error }, 'Sitemap candidate unavailable');
      return null;
    }
  }

  private async crawlLinks(rootUrl: string, pages: PageSet, pass: Pass) {
    const home = await this.fetchPage(rootUrl, pass);
    if (!home) return;
    pass.documents.push(home);
    const homeLinks = extractInternalLinks(home.content, home.url);
    this.classifyLinks(homeLinks, pages);

    const hops = rankForHop(homeLinks, rootUrl).slice(0, this.options.maxHopPages);
    for (const link of hops) {
      const doc = await this.fetchPage(link.url, pass);
      if (!doc) continue;
      pass.documents.push(doc);
      this.classifyLinks(extractInternalLinks(doc.content, doc.url), pages);
    }
  }

  private classifyLinks(links: PageLink[], pages: PageSet) {
    for (const link of links) {
      const { category, score } = classifyPage(link.url, link.text);
      if (isCommercial(category)) pages.add(link.url, category, 'link-pattern', 'medium', score);
    }
  }

  private async fetchPage(url: string, pass: Pass) {
    try {
      return await this.fetcher.fetch(url, { signal: pass.signal });
    } catch (error) {
      if (pass.signal?.aborted) throw error;
      const level = error instanceof FetchBlocked ? 'info' : 'warn';
      this.log[level]({ url, error }, 'Discovery fetch failed');
      if (isTransient(error)) pass.transientErrors++;
      pass.failures.push(toRunFailure('discovery', url, error));
      return null;
    }
  }
}

/** Commercial links first, in category priority order, then everything else in page order. */
function rankForHop(links: PageLink[], rootUrl: string) {
  const root = normalizeUrl(rootUrl);
  const rank = (link: PageLink) => {
    const { category } = classifyPage(link.url, link.text);
    return isCommercial(category) ? CATEGORY_PRIORITY.indexOf(category) : CATEGORY_PRIORITY.length;
  };
  return links
    .filter((l) => l.url !== root)
    .map((link, index) => ({ link, index, rank: rank(link) }))
    .sort((a, b) => a.rank - b.rank || a.index - b.index)
    .map((x) => x.link);
}
