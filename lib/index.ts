export { orchestrateRun, selectPages } from './runs/orchestrator';
export type { RunDeps, RunOptions, RunOutcome, RunState } from './runs/orchestrator';
export { analyzeCompetitors } from './runs/batch';
export type { BatchEntry, BatchOptions } from './runs/batch';

export { createCompetitorProfile, competitorInputSchema } from './validation';
export type { CompetitorInput } from './validation';
export { loadSettings, parseSettings, setSettings, resetSettings } from './config';
export type { Settings } from './config';

export { MemoryCacheStore, FileCacheStore, StageCache } from './cache';
export type { CacheStore } from './cache';
export { QuotaCounter, HostRateLimiter } from './quota';
export { MARKETS, getMarket } from './markets';
export type { Market } from './markets';
export { Fetcher, fetchPolicyFromSettings } from './fetch/fetcher';
export type { AccessPolicy, FetchImpl, FetchPolicy } from './fetch/fetcher';

export { DiscoveryEngine } from './discovery/discover';
export type { DiscoveryResult } from './discovery/discover';
export { ComplaintAggregator } from './complaints/aggregator';
export { Categorizer } from './categorize/categorizer';
export type { CategorizationOutcome, CategorizationReport } from './categorize/categorizer';
export { ExtractionEngine } from './extract/engine';
export type { ExtractionOutcome } from './extract/engine';

export { makeSearch } from './search';
export type { SearchProvider } from './search';
export { makeLanguageModel, ModelClient } from './ai';
export type { LanguageModel, CompletionRequest } from './ai';

export * from './errors';
export type * from './types';
export type * from './extract/schemas';
export { COMPLAINT_CATEGORIES, CONFIDENCE_SCORE } from './types';
