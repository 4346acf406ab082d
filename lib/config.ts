import { z } from 'zod';

const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:123.0) Gecko/20100101 Firefox/123.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15',
];

const DEFAULT_PLATFORMS = [
  'twitter.com',
  'facebook.com',
  'linkedin.com',
  'youtube.com',
  'g2.com',
  'capterra.com',
  'trustpilot.com',
  'getapp.com',
  'reddit.com',
  'news.ycombinator.com',
];

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const csv = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((v) => {
      const items = (v ?? '')
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean);
      return items.length ? items : fallback;
    });

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === '' ? fallback : ['1', 'true', 'yes', 'on'].includes(v.toLowerCase())));

const settingsSchema = z.object({
  // Collaborators
  searchProvider: z.enum(['tavily', 'serpapi']).nullable(),
  tavilyKey: optionalString,
  serpapiKey: optionalString,
  aiProvider: z.enum(['openai', 'gemini', 'anthropic']).nullable(),
  openaiApiKey: optionalString,
  openaiModel: optionalString,
  geminiApiKey: optionalString,
  geminiModel: optionalString,
  anthropicApiKey: optionalString,
  anthropicModel: optionalString,

  // Fetch layer
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
  maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  backoffBaseMs: z.coerce.number().int().min(0).default(500),
  hostRequestsPerSecond: z.coerce.number().positive().default(1),
  minRequestIntervalMs: z.coerce.number().int().min(0).default(1_000),
  acquireTimeoutMs: z.coerce.number().int().positive().default(60_000),
  maxBodyBytes: z.coerce.number().int().positive().default(2 * 1024 * 1024),
  respectRobots: flag(true),
  userAgents: csv(DEFAULT_USER_AGENTS),

  // Discovery
  maxPagesPerSite: z.coerce.number().int().positive().default(10),
  maxHopPages: z.coerce.number().int().min(0).default(5),

  // Complaints
  complaintPlatforms: csv(DEFAULT_PLATFORMS),
  searchResultsPerQuery: z.coerce.number().int().positive().default(10),
  searchQuotaPerSource: z.coerce.number().int().positive().default(4),
  searchRequestsPerMinute: z.coerce.number().int().positive().default(60),
  maxDocumentsPerSource: z.coerce.number().int().positive().default(5),
  complaintConcurrency: z.coerce.number().int().positive().default(3),
  similarityThreshold: z.coerce.number().min(0).max(1).default(0.6),

  // Language model
  llmTimeoutMs: z.coerce.number().int().positive().default(60_000),
  llmRequestsPerMinute: z.coerce.number().int().positive().default(30),
  temperature: z.coerce.number().min(0).max(2).default(0.1),
  maxTokens: z.coerce.number().int().positive().default(4_000),
  categoryConfidenceFloor: z.coerce.number().min(0).max(1).default(0.6),
  maxContextChars: z.coerce.number().int().positive().default(24_000),

  // Cache
  cacheTtlMs: z.coerce.number().int().min(0).default(3_600_000),
  cacheDir: optionalString,
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;

type Env = Record<string, string | undefined>;

/**
 * Maps environment variables onto settings and validates them.
 * Unknown provider names are rejected.
 */
export function parseSettings(env: Env, overrides: Partial<Settings> = {}): Settings {
  const raw: { [K in keyof SettingsInput]-?: unknown } = {
    searchProvider: nullableEnum(env.SEARCH_PROVIDER),
    tavilyKey: env.TAVILY_API_KEY,
    serpapiKey: env.SERPAPI_API_KEY,
    aiProvider: nullableEnum(env.AI_PROVIDER),
    openaiApiKey: env.OPENAI_API_KEY,
    openaiModel: env.OPENAI_MODEL,
    geminiApiKey: env.GEMINI_API_KEY,
    geminiModel: env.GEMINI_MODEL,
    anthropicApiKey: env.ANTHROPIC_API_KEY,
    anthropicModel: env.ANTHROPIC_MODEL,
    requestTimeoutMs: env.INTEL_REQUEST_TIMEOUT_MS,
    maxAttempts: env.INTEL_MAX_ATTEMPTS,
    backoffBaseMs: env.INTEL_BACKOFF_BASE_MS,
    hostRequestsPerSecond: env.INTEL_HOST_RPS,
    minRequestIntervalMs: env.INTEL_MIN_REQUEST_INTERVAL_MS,
    acquireTimeoutMs: env.INTEL_ACQUIRE_TIMEOUT_MS,
    maxBodyBytes: env.INTEL_MAX_BODY_BYTES,
    respectRobots: env.INTEL_RESPECT_ROBOTS,
    userAgents: env.INTEL_USER_AGENTS,
    maxPagesPerSite: env.INTEL_MAX_PAGES_PER_SITE,
    maxHopPages: env.INTEL_MAX_HOP_PAGES,
    complaintPlatforms: env.INTEL_COMPLAINT_PLATFORMS,
    searchResultsPerQuery: env.INTEL_SEARCH_RESULTS_PER_QUERY,
    searchQuotaPerSource: env.INTEL_SEARCH_QUOTA_PER_SOURCE,
    searchRequestsPerMinute: env.INTEL_SEARCH_RPM,
    maxDocumentsPerSource: env.INTEL_MAX_DOCUMENTS_PER_SOURCE,
    complaintConcurrency: env.INTEL_COMPLAINT_CONCURRENCY,
    similarityThreshold: env.INTEL_SIMILARITY_THRESHOLD,
    llmTimeoutMs: env.INTEL_LLM_TIMEOUT_MS,
    llmRequestsPerMinute: env.INTEL_LLM_RPM,
    temperature: env.INTEL_TEMPERATURE,
    maxTokens: env.INTEL_MAX_TOKENS,
    categoryConfidenceFloor: env.INTEL_CATEGORY_CONFIDENCE_FLOOR,
    maxContextChars: env.INTEL_MAX_CONTEXT_CHARS,
    cacheTtlMs: env.INTEL_CACHE_TTL_MS,
    cacheDir: env.INTEL_CACHE_DIR,
  };
  return assignDefined(settingsSchema.parse(raw), overrides);
}

function assignDefined<T extends object>(target: T, patch: Partial<T>): T {
  const out = { ...target };
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) Reflect.set(out, key, value);
  }
  return out;
}

function nullableEnum(value: string | undefined) {
  const v = value?.trim().toLowerCase();
  return v ? v : null;
}

let cache: { data: Settings; ts: number } | null = null;
let overrides: Partial<Settings> = {};
const TTL_MS = 60_000;

export async function loadSettings(): Promise<Settings> {
  if (cache && Date.now() - cache.ts < TTL_MS) return cache.data;
  const data = parseSettings(process.env, overrides);
  cache = { data, ts: Date.now() };
  return data;
}

export async function setSettings(partial: Partial<Settings>) {
  overrides = assignDefined(overrides, partial);
  cache = null;
}

export function resetSettings() {
  overrides = {};
  cache = null;
}
