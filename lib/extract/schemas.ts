import { z } from 'zod';

export const BILLING_AXES = [
  'per_month',
  'per_year',
  'per_terminal',
  'per_location',
  'per_user',
  'percentage_of_sales',
  'one_time',
  'usage',
] as const;

export const HARDWARE_COST_MODELS = ['one_time', 'lease', 'subscription', 'included', 'unknown'] as const;

export const MONETIZATION_MODELS = [
  'subscription',
  'transaction_fees',
  'hardware_sales',
  'freemium',
  'usage_based',
  'hybrid',
  'unknown',
] as const;

export const REVENUE_STREAMS = [
  'subscription',
  'transaction_fees',
  'hardware_sales',
  'setup_fees',
  'support_fees',
  'add_on_services',
  'third_party_integrations',
  'other',
] as const;

export const LOCK_IN_STRATEGIES = [
  'proprietary_hardware',
  'data_integration',
  'contract_terms',
  'ecosystem_integration',
  'switching_costs',
  'other',
] as const;

export const EXPANSION_LEVERS = [
  'tiered_pricing',
  'usage_based',
  'feature_gating',
  'add_ons',
  'multi_location',
  'payments_attach',
  'other',
] as const;

export const ROADMAP_HORIZONS = ['shipped', 'near_term', 'long_term', 'unknown'] as const;

export const SIGNAL_TYPES = [
  'product_launch',
  'feature_release',
  'market_expansion',
  'partnership',
  'acquisition',
  'technology_investment',
  'other',
] as const;

export const HIRING_FUNCTIONS = [
  'engineering',
  'product',
  'data',
  'sales_marketing',
  'customer_success',
  'operations',
  'leadership',
  'other',
] as const;

export const TECHNOLOGY_AREAS = [
  'ai_ml',
  'cloud_infrastructure',
  'mobile',
  'data_analytics',
  'security_compliance',
  'integrations_apis',
  'payments',
  'hardware',
  'other',
] as const;

const text = z.string().trim().min(1).max(1000);
const strength = z.enum(['low', 'medium', 'high']);

/** What the model cites for an item: a context label (`D3`) and a verbatim quote. */
export const evidenceSchema = z.object({
  document: z.string(),
  quote: z.string().max(1000),
});

export const provenanceSchema = z
  .object({
    documentIds: z.array(z.string().min(1)).min(1),
    quote: z.string().nullable(),
    basis: z.enum(['observed', 'inferred']),
  })
  .strict();

export type Evidence = z.infer<typeof evidenceSchema>;
export type Provenance = z.infer<typeof provenanceSchema>;

export const metricsSchema = z
  .object({
    items: z.number().int().min(0),
    observed: z.number().int().min(0),
    observedRatio: z.number().min(0).max(1),
    modelConfidence: z.number().min(0).max(1),
  })
  .strict();

export type ExtractionMetrics = z.infer<typeof metricsSchema>;

/** Same fields twice: with model evidence on the way in, with provenance on the way out. */
function lineItem<T extends z.ZodRawShape>(shape: T) {
  return {
    draft: z.object(shape).extend({ evidence: evidenceSchema }),
    final: z.object(shape).extend({ provenance: provenanceSchema }).strict(),
  };
}

// --------------------------- Pricing ---------------------------

const hardwareItem = lineItem({
  name: text,
  proprietary: z.boolean(),
  costModel: z.enum(HARDWARE_COST_MODELS),
  price: z.number().nonnegative().nullable(),
});

const pricePoint = z
  .object({
    amount: z.number().nonnegative(),
    label: z.string().max(200).nullable(),
  })
  .strict();

const softwareTier = lineItem({
  name: text,
  billingAxis: z.enum(BILLING_AXES),
  pricePoints: z.array(pricePoint),
  hiddenFees: z.array(z.string().trim().min(1).max(300)),
});

const currency = z
  .string()
  .regex(/^[A-Z]{3}$/, 'ISO 4217 code expected')
  .nullable();

export const pricingDraftSchema = z.object({
  currency,
  hardware: z.array(hardwareItem.draft),
  softwareTiers: z.array(softwareTier.draft),
  summary: z.string(),
  confidence: z.number().min(0).max(1),
});

export const pricingAnalysisSchema = z
  .object({
    currency,
    hardware: z.array(hardwareItem.final),
    softwareTiers: z.array(softwareTier.final),
    summary: z.string(),
    metrics: metricsSchema,
  })
  .strict();

export type PricingDraft = z.infer<typeof pricingDraftSchema>;
export type PricingAnalysis = z.infer<typeof pricingAnalysisSchema>;

// --------------------------- Monetization ---------------------------

const revenueStream = lineItem({ type: z.enum(REVENUE_STREAMS), description: text });
const lockInStrategy = lineItem({ type: z.enum(LOCK_IN_STRATEGIES), description: text, strength });
const expansionLever = lineItem({ type: z.enum(EXPANSION_LEVERS), description: text });

export const monetizationDraftSchema = z.object({
  primaryModel: z.enum(MONETIZATION_MODELS),
  revenueStreams: z.array(revenueStream.draft),
  lockInStrategies: z.array(lockInStrategy.draft),
  expansionLevers: z.array(expansionLever.draft),
  summary: z.string(),
  confidence: z.number().min(0).max(1),
});

export const monetizationAnalysisSchema = z
  .object({
    primaryModel: z.enum(MONETIZATION_MODELS),
    revenueStreams: z.array(revenueStream.final),
    lockInStrategies: z.array(lockInStrategy.final),
    expansionLevers: z.array(expansionLever.final),
    summary: z.string(),
    metrics: metricsSchema,
  })
  .strict();

export type MonetizationDraft = z.infer<typeof monetizationDraftSchema>;
export type MonetizationAnalysis = z.infer<typeof monetizationAnalysisSchema>;

// --------------------------- Vision ---------------------------

const roadmapSignal = lineItem({ signal: text, type: z.enum(SIGNAL_TYPES), horizon: z.enum(ROADMAP_HORIZONS) });
const hiringFocus = lineItem({ function: z.enum(HIRING_FUNCTIONS), role: text, openings: z.number().int().min(0).nullable() });
const technologyBet = lineItem({ area: z.enum(TECHNOLOGY_AREAS), description: text });

export const visionDraftSchema = z.object({
  roadmapSignals: z.array(roadmapSignal.draft),
  hiringFocus: z.array(hiringFocus.draft),
  technologyBets: z.array(technologyBet.draft),
  summary: z.string(),
  confidence: z.number().min(0).max(1),
});

export const visionAnalysisSchema = z
  .object({
    roadmapSignals: z.array(roadmapSignal.final),
    hiringFocus: z.array(hiringFocus.final),
    technologyBets: z.array(technologyBet.final),
    summary: z.string(),
    metrics: metricsSchema,
  })
  .strict();

export type VisionDraft = z.infer<typeof visionDraftSchema>;
export type VisionAnalysis = z.infer<typeof visionAnalysisSchema>;
