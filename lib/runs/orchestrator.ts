// Orchestrator: end-to-end pipeline to discover, collect, extract and merge one competitor profile.
// Every phase reports its state through setStatus so callers can follow the run.

import { log as rootLog, type Logger } from '../logger';
import type { Settings } from '../config';
import { ModelClient, modelLimitsFromSettings, type LanguageModel } from '../ai';
import { StageCache, type CacheStore } from '../cache';
import { Categorizer, uncategorizedReport, type CategorizationReport } from '../categorize/categorizer';
import { ComplaintAggregator, type ComplaintCollection } from '../complaints/aggregator';
import { settleBounded } from '../concurrency';
import { CATEGORY_PRIORITY, isCommercial } from '../crawl/classify';
import { DiscoveryEngine, type DiscoveryResult } from '../discovery/discover';
import { ExtractionEngine, relevantCategories, type AnalysisMap, type ExtractionOutcome } from '../extract/engine';
import { Fetcher, fetchPolicyFromSettings, type AccessPolicy, type FetchImpl } from '../fetch/fetcher';
import { RunFailed, ServiceUnavailable, toRunFailure, type RunFailure } from '../errors';
import { getMarket } from '../markets';
import { round2 } from '../normalize';
import { HostRateLimiter, QuotaCounter } from '../quota';
import type { SearchProvider } from '../search';
import {
  toDocumentRef,
  type AnalysisResult,
  type AnalysisType,
  type CategorizedComplaints,
  type CompetitorProfile,
  type DiscoveredPage,
  type DocumentRef,
  type RawDocument,
  type SectionResult,
} from '../types';

export type RunState =
  | 'Pending'
  | 'Discovering'
  | 'Collecting'
  | 'Extracting'
  | 'Merging'
  | 'Complete'
  | 'PartiallyComplete'
  | 'Failed';

export type RunOutcome =
  | { status: 'Complete' | 'PartiallyComplete'; result: AnalysisResult }
  | { status: 'Failed'; error: RunFailed; failures: RunFailure[] };

/** Collaborators for a run. Only the cache store, quota and limiter are meant to be shared between runs. */
export type RunDeps = {
  settings: Settings;
  cacheStore: CacheStore;
  quota?: QuotaCounter;
  limiter?: HostRateLimiter;
  search: SearchProvider | null;
  model: LanguageModel | null;
  fetchImpl?: FetchImpl;
  isAllowed?: AccessPolicy;
  logger?: Logger;
};

export type RunOptions = {
  runId?: string;
  signal?: AbortSignal;
  onStatus?: (state: RunState, note: string) => void;
};

const LOW_CONFIDENCE = 0.5;
const INCOMPLETE_DISCOVERY_PENALTY = 0.8;

type ComplaintBranch = {
  collection: ComplaintCollection;
  report: CategorizationReport;
};

/**
 * Runs the whole pipeline for one competitor. Complaint collection runs
 * alongside discovery; extraction waits for page content. Resolves with a
 * Failed outcome only when neither branch produced any input; rejects only
 * when the caller aborts.
 */
export async function orchestrateRun(profile: CompetitorProfile, deps: RunDeps, opts: RunOptions = {}): Promise<RunOutcome> {
  const startedAt = Date.now();
  const runId = opts.runId ?? `run_${startedAt}_${Math.random().toString(36).slice(2, 11)}`;
  const log = (deps.logger ?? rootLog).child({ runId, competitorId: profile.id });
  const { settings } = deps;
  const { signal } = opts;

  const setStatus = (state: RunState, note: string) => {
    log.info({ state, elapsedMs: Date.now() - startedAt }, note);
    if (!opts.onStatus) return;
    try {
      opts.onStatus(state, note);
    } catch (error) {
      log.warn({ error, state }, 'Status listener threw');
    }
  };

  setStatus('Pending', `Queued analysis of ${profile.name}`);

  const quota = deps.quota ?? new QuotaCounter();
  const fetcher = new Fetcher({
    policy: fetchPolicyFromSettings(settings),
    limiter: deps.limiter ?? new HostRateLimiter(),
    isAllowed: deps.isAllowed,
    fetchImpl: deps.fetchImpl,
    logger: log.child({ module: 'fetch' }),
  });
  const stageCache = new StageCache(deps.cacheStore);
  const cacheScope = { stage: stageCache, competitorId: profile.id };
  const client = deps.model ? new ModelClient(deps.model, modelLimitsFromSettings(settings), quota) : null;
  const failures: RunFailure[] = [];

  setStatus('Discovering', 'Starting discovery and complaint collection…');

  const pageBranch = async () => {
    let discovery: DiscoveryResult;
    try {
      const engine = new DiscoveryEngine(
        fetcher,
        stageCache,
        { cacheTtlMs: settings.cacheTtlMs, maxHopPages: settings.maxHopPages },
        log.child({ module: 'discovery' })
      );
      discovery = await engine.discover(profile, { signal });
    } catch (error) {
      if (signal?.aborted) throw error;
      log.error({ error }, 'Discovery failed');
      failures.push(toRunFailure('discovery', profile.rootUrl, error));
      discovery = { pages: [], status: 'incomplete', notice: null, documents: [], failures: [], fromCache: false };
    }
    failures.push(...discovery.failures);
    if (discovery.notice) failures.push(toRunFailure('discovery', profile.rootUrl, discovery.notice));

    const selected = selectPages(discovery.pages, settings.maxPagesPerSite);
    setStatus('Collecting', `Discovered ${discovery.pages.length} pages; fetching ${selected.length}…`);
    const pageDocs = await fetchPages(selected, discovery.documents, fetcher, failures, log, signal);
    return { discovery, pageDocs };
  };

  const [pagesOutcome, complaintsOutcome] = await Promise.allSettled([
    pageBranch(),
    collectAndCategorize(profile, deps.search, fetcher, client, settings, cacheScope, log, signal),
  ]);
  // Both branches absorb their own failures; a rejection here is a cancellation.
  if (pagesOutcome.status === 'rejected') throw pagesOutcome.reason;
  if (complaintsOutcome.status === 'rejected') throw complaintsOutcome.reason;
  const { discovery, pageDocs } = pagesOutcome.value;
  const complaints = complaintsOutcome.value;
  failures.push(...complaints.collection.failures, ...complaints.report.failures);

  if (pageDocs.length === 0 && complaints.collection.complaints.length === 0) {
    const error = new RunFailed(profile.id, `No page content and no complaints collected for ${profile.name}`);
    setStatus('Failed', error.message);
    return { status: 'Failed', error, failures: freeze(failures) };
  }

  setStatus('Extracting', `Extracting pricing, monetization and vision from ${pageDocs.length} documents…`);
  const sections = await extractAll(profile, pageDocs, client, settings, cacheScope, log, failures, signal);

  setStatus('Merging', 'Merging results…');
  const complaintSection = complaintsSection(complaints.report.categorized, complaints.collection.complaints.length);
  const all = [sections.pricing, sections.monetization, sections.vision, complaintSection];
  const mean = all.reduce((sum, s) => sum + s.confidence, 0) / all.length;
  const overallConfidence = round2(discovery.status === 'incomplete' ? mean * INCOMPLETE_DISCOVERY_PENALTY : mean);

  const clean = failures.length === 0 && discovery.status === 'complete' && all.every((s) => s.status === 'ok');
  const result: AnalysisResult = {
    competitorId: profile.id,
    competitor: { name: profile.name, rootUrl: profile.rootUrl, country: profile.country },
    status: clean ? 'Complete' : 'PartiallyComplete',
    generatedAt: new Date().toISOString(),
    discoveryStatus: discovery.status,
    pages: discovery.pages,
    documents: documentRefs([...pageDocs, ...complaints.collection.documents]),
    pricing: sections.pricing,
    monetization: sections.monetization,
    vision: sections.vision,
    complaints: complaintSection,
    overallConfidence,
    failures,
  };

  setStatus(result.status, `Finished with ${failures.length} failure(s); overall confidence ${overallConfidence}`);
  return { status: result.status, result: freeze(result) };
}

async function collectAndCategorize(
  profile: CompetitorProfile,
  search: SearchProvider | null,
  fetcher: Fetcher,
  client: ModelClient | null,
  settings: Settings,
  cacheScope: { stage: StageCache; competitorId: string },
  log: Logger,
  signal: AbortSignal | undefined
): Promise<ComplaintBranch> {
  let collection: ComplaintCollection;
  try {
    const aggregator = new ComplaintAggregator(search, fetcher, settings, log.child({ module: 'complaints' }));
    collection = await aggregator.collectComplaints(profile, { signal });
  } catch (error) {
    if (signal?.aborted) throw error;
    log.error({ error }, 'Complaint collection failed');
    collection = { complaints: [], documents: [], failures: [toRunFailure('complaints', null, error)] };
  }

  if (!client || !collection.complaints.length) {
    return { collection, report: uncategorizedReport(collection.complaints, new ServiceUnavailable('llm', 'no AI provider configured')) };
  }
  const categorizer = new Categorizer(
    client,
    { confidenceFloor: settings.categoryConfidenceFloor, concurrency: settings.complaintConcurrency },
    cacheScope,
    log.child({ module: 'categorize' })
  );
  const report = await categorizer.categorizeAll(collection.complaints, profile.name, { signal });
  return { collection, report };
}

/** Manual overrides first, then by category value and score; at most `limit` pages. */
export function selectPages(pages: DiscoveredPage[], limit: number): DiscoveredPage[] {
  const rank = (p: DiscoveredPage) => {
    if (p.method === 'manual-override') return -1;
    return isCommercial(p.category) ? CATEGORY_PRIORITY.indexOf(p.category) : CATEGORY_PRIORITY.length;
  };
  return [...pages]
    .sort((a, b) => rank(a) - rank(b) || b.score - a.score || a.url.localeCompare(b.url))
    .slice(0, limit);
}

type PageDocument = { page: DiscoveredPage; doc: RawDocument };

async function fetchPages(
  pages: DiscoveredPage[],
  alreadyFetched: RawDocument[],
  fetcher: Fetcher,
  failures: RunFailure[],
  log: Logger,
  signal: AbortSignal | undefined
): Promise<PageDocument[]> {
  const byUrl = new Map(alreadyFetched.map((d) => [d.url, d]));
  const settled = await settleBounded(pages, 2, async (page) => byUrl.get(page.url) ?? fetcher.fetch(page.url, { signal }));
  signal?.throwIfAborted();

  const out: PageDocument[] = [];
  settled.forEach((result, i) => {
    const page = pages[i];
    if (result.status === 'fulfilled') {
      out.push({ page, doc: result.value });
      return;
    }
    log.warn({ url: page.url, error: result.reason }, 'Page fetch failed');
    failures.push(toRunFailure('fetch', page.url, result.reason));
  });
  return out;
}

type Sections = { [K in AnalysisType]: SectionResult<AnalysisMap[K]> };

async function extractAll(
  profile: CompetitorProfile,
  pageDocs: PageDocument[],
  client: ModelClient | null,
  settings: Settings,
  cacheScope: { stage: StageCache; competitorId: string },
  log: Logger,
  failures: RunFailure[],
  signal: AbortSignal | undefined
): Promise<Sections> {
  const missing = { status: 'missing', confidence: 0, data: null } as const;
  if (!client) {
    if (pageDocs.length) {
      failures.push(toRunFailure('extraction', null, new ServiceUnavailable('llm', 'no AI provider configured')));
    }
    return { pricing: missing, monetization: missing, vision: missing };
  }

  const engine = new ExtractionEngine(client, { maxContextChars: settings.maxContextChars }, cacheScope, log.child({ module: 'extract' }));
  const docsFor = (type: AnalysisType) => {
    const wanted = relevantCategories(type);
    return pageDocs.filter(({ page }) => wanted.includes(page.category) || page.category === 'unknown').map((p) => p.doc);
  };
  const market = getMarket(profile.country);
  const run = <K extends AnalysisType>(type: K) =>
    engine.extract(docsFor(type), type, { competitorName: profile.name, market, signal });

  const [pricing, monetization, vision] = await Promise.allSettled([run('pricing'), run('monetization'), run('vision')]);
  signal?.throwIfAborted();

  const section = <T>(type: AnalysisType, outcome: PromiseSettledResult<ExtractionOutcome<T>>): SectionResult<T> => {
    if (outcome.status === 'rejected') {
      log.warn({ type, error: outcome.reason }, 'Extraction failed');
      failures.push(toRunFailure('extraction', type, outcome.reason));
      return { status: 'missing', confidence: 0, data: null };
    }
    const { analysis, confidence } = outcome.value;
    return { status: confidence < LOW_CONFIDENCE ? 'low_confidence' : 'ok', confidence, data: analysis };
  };

  return {
    pricing: section('pricing', pricing),
    monetization: section('monetization', monetization),
    vision: section('vision', vision),
  };
}

function complaintsSection(categorized: CategorizedComplaints, collected: number): SectionResult<CategorizedComplaints> {
  if (!collected) return { status: 'missing', confidence: 0, data: null };
  const confidence = round2(
    categorized.items.reduce((sum, c) => sum + c.categoryConfidence, 0) / categorized.items.length
  );
  return { status: confidence < LOW_CONFIDENCE ? 'low_confidence' : 'ok', confidence, data: categorized };
}

function documentRefs(docs: (RawDocument | PageDocument)[]): DocumentRef[] {
  const seen = new Set<string>();
  const refs: DocumentRef[] = [];
  for (const entry of docs) {
    const doc = 'doc' in entry ? entry.doc : entry;
    if (seen.has(doc.contentHash)) continue;
    seen.add(doc.contentHash);
    refs.push(toDocumentRef(doc));
  }
  return refs;
}

/** Recursively freezes plain objects and arrays. */
export function freeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) freeze(child);
  }
  return value;
}
