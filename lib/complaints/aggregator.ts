import { log as rootLog, type Logger } from '../logger';
import { FetchBlocked, ServiceUnavailable, toRunFailure, type RunFailure } from '../errors';
import { settleBounded } from '../concurrency';
import { getMarket, type Market } from '../markets';
import { QuotaCounter } from '../quota';
import type { SearchProvider } from '../search';
import type { PageFetcher } from '../discovery/discover';
import { isOnDomain, normalizeText, normalizeUrl, shortHash } from '../normalize';
import type { Complaint, CompetitorProfile, RawDocument, SourceType } from '../types';
import { buildComplaintQueries, CATALOG, localKeywords, type PlatformQueries } from './queries';
import { extractPassages } from './passages';
import { SimilarityIndex } from './similarity';

export type ComplaintSettings = {
  complaintPlatforms: string[];
  searchResultsPerQuery: number;
  searchQuotaPerSource: number;
  maxDocumentsPerSource: number;
  complaintConcurrency: number;
  similarityThreshold: number;
};

export type ComplaintCollection = {
  complaints: Complaint[];
  failures: RunFailure[];
  documents: RawDocument[];
};

type PlatformHarvest = {
  platform: PlatformQueries;
  order: number;
  documents: RawDocument[];
  errors: unknown[];
};

export class ComplaintAggregator {
  private readonly log: Logger;

  constructor(
    private readonly search: SearchProvider | null,
    private readonly fetcher: PageFetcher,
    private readonly settings: ComplaintSettings,
    logger?: Logger
  ) {
    this.log = logger ?? rootLog.child({ module: 'complaints' });
  }

  async collectComplaints(profile: CompetitorProfile, opts: { signal?: AbortSignal } = {}): Promise<ComplaintCollection> {
    if (!this.search) {
      return {
        complaints: [],
        documents: [],
        failures: [toRunFailure('complaints', null, new ServiceUnavailable('search', 'no search provider configured'))],
      };
    }

    const market = getMarket(profile.country);
    const platforms = buildComplaintQueries(profile.name, this.settings.complaintPlatforms, market);
    // Query budgets are per collection; the provider API quota is the shared one.
    const budget = new QuotaCounter();
    const settled = await settleBounded(platforms, this.settings.complaintConcurrency, (platform, order) =>
      this.harvest(platform, order, budget, market, opts.signal)
    );

    const harvests: PlatformHarvest[] = [];
    const failures: RunFailure[] = [];
    settled.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        harvests.push(result.value);
        return;
      }
      if (opts.signal?.aborted) return;
      failures.push(toRunFailure('complaints', platforms[i].platform, result.reason));
    });
    opts.signal?.throwIfAborted();

    for (const h of harvests) {
      if (h.documents.length === 0 && h.errors.length > 0) {
        const failure = toRunFailure('complaints', h.platform.platform, h.errors[0]);
        this.log.warn({ platform: h.platform.platform, code: failure.code }, 'Complaint source failed');
        failures.push(failure);
      }
    }

    const { complaints, documents } = this.dedupe(harvests, market);
    this.log.info(
      { competitorId: profile.id, complaints: complaints.length, documents: documents.length, failures: failures.length },
      'Complaint collection finished'
    );
    return { complaints, failures, documents };
  }

  private async harvest(
    platform: PlatformQueries,
    order: number,
    budget: QuotaCounter,
    market: Market | null,
    signal: AbortSignal | undefined
  ): Promise<PlatformHarvest> {
    const search = this.search;
    const harvest: PlatformHarvest = { platform, order, documents: [], errors: [] };
    if (!search) return harvest;

    const urls: string[] = [];
    for (const query of platform.queries) {
      if (urls.length >= this.settings.maxDocumentsPerSource) break;
      const slot = budget.tryConsume(`search:${platform.platform}`, this.settings.searchQuotaPerSource, Infinity);
      if (!slot.ok) {
        this.log.debug({ platform: platform.platform }, 'Query quota exhausted');
        break;
      }
      try {
        const results = await search.search(query, platform.sourceType, { num: this.settings.searchResultsPerQuery, market, signal });
        for (const raw of results) {
          const url = normalizeUrl(raw);
          if (!url || !isOnDomain(url, platform.platform) || urls.includes(url)) continue;
          urls.push(url);
        }
      } catch (error) {
        if (signal?.aborted) throw error;
        this.log.warn({ platform: platform.platform, query, error }, 'Complaint search failed');
        harvest.errors.push(error);
        break;
      }
    }

    for (const url of urls.slice(0, this.settings.maxDocumentsPerSource)) {
      try {
        harvest.documents.push(await this.fetcher.fetch(url, { signal }));
      } catch (error) {
        if (signal?.aborted) throw error;
        harvest.errors.push(error);
        if (error instanceof FetchBlocked && (error.reason === 'host-blocked' || error.reason === 'forbidden' || error.reason === 'throttled')) {
          this.log.warn({ platform: platform.platform, url, reason: error.reason }, 'Platform blocked, skipping remaining pages');
          break;
        }
        this.log.debug({ platform: platform.platform, url, error }, 'Complaint page fetch failed');
      }
    }
    return harvest;
  }

  /** Folds passages into complaints, earliest-seen first. */
  private dedupe(harvests: PlatformHarvest[], market: Market | null) {
    const local = localKeywords(market);
    const keywords = local.length ? [...CATALOG.keywords, ...local] : undefined;
    type Candidate = { doc: RawDocument; order: number; docIndex: number; sourceType: SourceType; platform: string };
    const candidates: Candidate[] = [];
    for (const h of harvests) {
      h.documents.forEach((doc, docIndex) => {
        candidates.push({ doc, order: h.order, docIndex, sourceType: h.platform.sourceType, platform: h.platform.platform });
      });
    }
    candidates.sort(
      (a, b) => a.doc.fetchedAt.localeCompare(b.doc.fetchedAt) || a.order - b.order || a.docIndex - b.docIndex
    );

    const index = new SimilarityIndex<Complaint>(this.settings.similarityThreshold);
    const complaints: Complaint[] = [];

    for (const c of candidates) {
      for (const passage of extractPassages(c.doc.content, keywords)) {
        const normalized = normalizeText(passage);
        if (!normalized) continue;
        const source = {
          url: c.doc.url,
          platform: c.platform,
          sourceType: c.sourceType,
          documentHash: c.doc.contentHash,
          seenAt: c.doc.fetchedAt,
        };
        const match = index.match(normalized);
        if (match) {
          if (!match.item.sources.some((s) => s.url === source.url)) match.item.sources.push(source);
          continue;
        }
        const complaint: Complaint = {
          id: `c-${shortHash(normalized, 12)}`,
          text: passage,
          sourceType: c.sourceType,
          sourceUrl: c.doc.url,
          firstSeen: c.doc.fetchedAt,
          sources: [source],
        };
        index.add(normalized, complaint);
        complaints.push(complaint);
      }
    }
    // Identical pages served by several platforms are kept once; each still counts as a source above.
    const documents = new Map<string, RawDocument>();
    for (const c of candidates) if (!documents.has(c.doc.contentHash)) documents.set(c.doc.contentHash, c.doc);
    return { complaints, documents: [...documents.values()] };
  }
}
