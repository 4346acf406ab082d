import { z } from 'zod';
import { log as rootLog, type Logger } from '../logger';
import { formatIssues, parseJsonResponse, type ModelClient } from '../ai';
import type { StageCache } from '../cache';
import { ExtractionError, IntelError } from '../errors';
import { clamp01, contentHash, normalizeText, round2, stripMarkup } from '../normalize';
import type { Market } from '../markets';
import type { AnalysisType, PageCategory, RawDocument } from '../types';
import {
  BILLING_AXES,
  EXPANSION_LEVERS,
  HARDWARE_COST_MODELS,
  HIRING_FUNCTIONS,
  LOCK_IN_STRATEGIES,
  MONETIZATION_MODELS,
  REVENUE_STREAMS,
  ROADMAP_HORIZONS,
  SIGNAL_TYPES,
  TECHNOLOGY_AREAS,
  monetizationAnalysisSchema,
  monetizationDraftSchema,
  pricingAnalysisSchema,
  pricingDraftSchema,
  visionAnalysisSchema,
  visionDraftSchema,
  type Evidence,
  type ExtractionMetrics,
  type MonetizationAnalysis,
  type MonetizationDraft,
  type PricingAnalysis,
  type PricingDraft,
  type Provenance,
  type VisionAnalysis,
  type VisionDraft,
} from './schemas';

export type AnalysisMap = {
  pricing: PricingAnalysis;
  monetization: MonetizationAnalysis;
  vision: VisionAnalysis;
};

export type ExtractionOutcome<T> = {
  analysis: T;
  confidence: number;
  fromCache: boolean;
};

type ContextDocument = {
  label: string;
  doc: RawDocument;
  excerpt: string;
  normalized: string;
};

/** Maps model evidence onto source documents and keeps the observed/inferred tally. */
class EvidenceResolver {
  private total = 0;
  private observed = 0;

  constructor(private readonly context: ContextDocument[]) {}

  resolve(evidence: Evidence): Provenance {
    this.total++;
    const quote = evidence.quote.trim();
    const match = /D(\d+)/i.exec(evidence.document);
    const target = match ? this.context.find((c) => c.label === `D${match[1]}`) : undefined;
    const needle = normalizeText(quote);
    if (target && needle.length >= 3 && target.normalized.includes(needle)) {
      this.observed++;
      return { documentIds: [target.doc.contentHash], quote, basis: 'observed' };
    }
    return {
      documentIds: this.context.map((c) => c.doc.contentHash),
      quote: quote || null,
      basis: 'inferred',
    };
  }

  items<T extends { evidence: Evidence }>(items: T[]): (Omit<T, 'evidence'> & { provenance: Provenance })[] {
    return items.map(({ evidence, ...rest }) => ({ ...rest, provenance: this.resolve(evidence) }));
  }

  metrics(modelConfidence: number): ExtractionMetrics {
    return {
      items: this.total,
      observed: this.observed,
      observedRatio: this.total ? round2(this.observed / this.total) : 0,
      modelConfidence: round2(clamp01(modelConfidence)),
    };
  }
}

type Definition<D extends { confidence: number }, P> = {
  categories: PageCategory[];
  draft: z.ZodType<D, z.ZodTypeDef, unknown>;
  final: z.ZodType<P, z.ZodTypeDef, unknown>;
  focus: string;
  shape: string;
  assemble: (draft: D, resolver: EvidenceResolver) => P;
};

const enumList = (values: readonly string[]) => values.map((v) => `"${v}"`).join(' | ');
const EVIDENCE = '"evidence": {"document": "D<n>", "quote": "verbatim text from that document"}';

const DEFINITIONS: { [K in AnalysisType]: Definition<DraftMap[K], AnalysisMap[K]> } = {
  pricing: {
    categories: ['pricing', 'features'],
    draft: pricingDraftSchema,
    final: pricingAnalysisSchema,
    focus:
      'Break down the pricing: hardware items (flag proprietary devices and the cost model) and software tiers (billing axis, every price point, and fees that are easy to miss such as setup, payment processing or cancellation fees).',
    shape: `{
  "currency": "ISO 4217 code" | null,
  "hardware": [{"name": "string", "proprietary": boolean, "costModel": ${enumList(HARDWARE_COST_MODELS)}, "price": number | null, ${EVIDENCE}}],
  "softwareTiers": [{"name": "string", "billingAxis": ${enumList(BILLING_AXES)}, "pricePoints": [{"amount": number, "label": "string" | null}], "hiddenFees": ["string"], ${EVIDENCE}}],
  "summary": "2-3 sentences",
  "confidence": number between 0 and 1
}`,
    assemble: (draft: PricingDraft, r) => {
      const hardware = r.items(draft.hardware);
      const softwareTiers = r.items(draft.softwareTiers);
      return { currency: draft.currency, hardware, softwareTiers, summary: draft.summary, metrics: r.metrics(draft.confidence) };
    },
  },
  monetization: {
    categories: ['pricing', 'features', 'blog'],
    draft: monetizationDraftSchema,
    final: monetizationAnalysisSchema,
    focus:
      'Describe how the company makes money: the primary model, each revenue stream, the strategies that keep customers locked in, and the levers used to expand revenue per customer.',
    shape: `{
  "primaryModel": ${enumList(MONETIZATION_MODELS)},
  "revenueStreams": [{"type": ${enumList(REVENUE_STREAMS)}, "description": "string", ${EVIDENCE}}],
  "lockInStrategies": [{"type": ${enumList(LOCK_IN_STRATEGIES)}, "description": "string", "strength": "low" | "medium" | "high", ${EVIDENCE}}],
  "expansionLevers": [{"type": ${enumList(EXPANSION_LEVERS)}, "description": "string", ${EVIDENCE}}],
  "summary": "2-3 sentences",
  "confidence": number between 0 and 1
}`,
    assemble: (draft: MonetizationDraft, r) => {
      const revenueStreams = r.items(draft.revenueStreams);
      const lockInStrategies = r.items(draft.lockInStrategies);
      const expansionLevers = r.items(draft.expansionLevers);
      return {
        primaryModel: draft.primaryModel,
        revenueStreams,
        lockInStrategies,
        expansionLevers,
        summary: draft.summary,
        metrics: r.metrics(draft.confidence),
      };
    },
  },
  vision: {
    categories: ['blog', 'careers'],
    draft: visionDraftSchema,
    final: visionAnalysisSchema,
    focus:
      'Identify where the company is heading: roadmap signals from announcements, the functions it is hiring for, and the technology areas it is betting on.',
    shape: `{
  "roadmapSignals": [{"signal": "string", "type": ${enumList(SIGNAL_TYPES)}, "horizon": ${enumList(ROADMAP_HORIZONS)}, ${EVIDENCE}}],
  "hiringFocus": [{"function": ${enumList(HIRING_FUNCTIONS)}, "role": "string", "openings": number | null, ${EVIDENCE}}],
  "technologyBets": [{"area": ${enumList(TECHNOLOGY_AREAS)}, "description": "string", ${EVIDENCE}}],
  "summary": "2-3 sentences",
  "confidence": number between 0 and 1
}`,
    assemble: (draft: VisionDraft, r) => {
      const roadmapSignals = r.items(draft.roadmapSignals);
      const hiringFocus = r.items(draft.hiringFocus);
      const technologyBets = r.items(draft.technologyBets);
      return { roadmapSignals, hiringFocus, technologyBets, summary: draft.summary, metrics: r.metrics(draft.confidence) };
    },
  },
};

type DraftMap = {
  pricing: PricingDraft;
  monetization: MonetizationDraft;
  vision: VisionDraft;
};

/** Page categories whose documents feed each analysis type. */
export function relevantCategories(type: AnalysisType): PageCategory[] {
  return DEFINITIONS[type].categories;
}

export type ExtractionOptions = {
  maxContextChars: number;
};

export class ExtractionEngine {
  private readonly log: Logger;

  constructor(
    private readonly client: ModelClient,
    private readonly options: ExtractionOptions,
    private readonly cache?: { stage: StageCache; competitorId: string },
    logger?: Logger
  ) {
    this.log = logger ?? rootLog.child({ module: 'extract' });
  }

  async extract<K extends AnalysisType>(
    documents: readonly RawDocument[],
    type: K,
    opts: { competitorName: string; market?: Market | null; signal?: AbortSignal }
  ): Promise<ExtractionOutcome<AnalysisMap[K]>> {
    const def: Definition<DraftMap[K], AnalysisMap[K]> = DEFINITIONS[type];
    if (!documents.length) throw new ExtractionError(type, `No documents available for ${type} analysis`);

    const stage = `extract:${type}`;
    const market = opts.market ?? null;
    const hash = contentHash(
      documents
        .map((d) => d.contentHash)
        .sort()
        .concat(market ? [`market:${market.code}`] : [])
        .join('|')
    );
    const cached = await this.readCache(stage, hash, def.final);
    if (cached) {
      this.log.info({ type, hash }, 'Extraction served from cache');
      return { ...cached, fromCache: true };
    }

    const context = buildContext(documents, this.options.maxContextChars);
    const system = `You are an expert competitive intelligence analyst. Extract structured data about ${opts.competitorName} from the provided documents. Return ONLY valid JSON matching the exact schema provided. Do not include any explanatory text outside the JSON.`;
    const prompt = buildPrompt(opts.competitorName, def, context, marketNote(type, market));

    let issue = '';
    let previous = '';
    for (let attempt = 1; attempt <= 2; attempt++) {
      const request =
        attempt === 1
          ? { system, prompt }
          : { system, prompt: repairPrompt(prompt, previous, issue) };

      let raw: string;
      try {
        raw = await this.client.complete({ ...request, json: true }, opts.signal);
      } catch (error) {
        if (opts.signal?.aborted || !(error instanceof IntelError)) throw error;
        throw new ExtractionError(type, `${type} analysis unavailable: ${error.message}`, { cause: error });
      }

      const parsed = parseJsonResponse(raw, def.draft);
      if (!parsed.ok) {
        issue = parsed.issue;
        previous = raw;
        this.log.warn({ type, attempt, kind: parsed.kind, issue }, 'Extraction response rejected');
        continue;
      }

      const resolver = new EvidenceResolver(context);
      const assembled = def.assemble(parsed.data, resolver);
      const checked = def.final.safeParse(assembled);
      if (!checked.success) {
        issue = formatIssues(checked.error);
        previous = raw;
        this.log.warn({ type, attempt, issue }, 'Extracted analysis failed final validation');
        continue;
      }

      const metrics = resolver.metrics(parsed.data.confidence);
      const confidence = round2((metrics.modelConfidence + metrics.observedRatio) / 2);
      await this.writeCache(stage, hash, { analysis: checked.data, confidence });
      this.log.info({ type, items: metrics.items, observed: metrics.observed, confidence }, 'Extraction complete');
      return { analysis: checked.data, confidence, fromCache: false };
    }

    throw new ExtractionError(type, `Invalid ${type} response after repair: ${issue}`);
  }

  private async readCache<P>(stage: string, hash: string, schema: z.ZodType<P, z.ZodTypeDef, unknown>) {
    if (!this.cache) return null;
    const entry = z.object({ analysis: schema, confidence: z.number().min(0).max(1) });
    return this.cache.stage.read(this.cache.competitorId, stage, hash, (value) => {
      const parsed = entry.safeParse(value);
      return parsed.success ? { analysis: parsed.data.analysis, confidence: parsed.data.confidence } : null;
    });
  }

  private async writeCache(stage: string, hash: string, value: { analysis: unknown; confidence: number }) {
    if (!this.cache) return;
    await this.cache.stage.write(this.cache.competitorId, stage, hash, value);
  }
}

/** Documents ordered by URL, labelled D1..Dn, each trimmed to an equal share of the budget. */
export function buildContext(documents: readonly RawDocument[], maxChars: number): ContextDocument[] {
  const sorted = [...documents].sort((a, b) => a.url.localeCompare(b.url) || a.contentHash.localeCompare(b.contentHash));
  const share = Math.max(1, Math.floor(maxChars / sorted.length));
  return sorted.map((doc, i) => {
    const excerpt = stripMarkup(doc.content).slice(0, share);
    return { label: `D${i + 1}`, doc, excerpt, normalized: normalizeText(excerpt) };
  });
}

/** Market context for the prompt; pricing also gets the expected currency. */
export function marketNote(type: AnalysisType, market: Market | null) {
  if (!market) return '';
  const lines = [`Target market: ${market.name} (${market.code}). ${market.businessContext}`];
  if (type === 'pricing') {
    lines.push(`Prices are expected in ${market.currency} for ${market.name}; report the currency the documents actually show.`);
  }
  return lines.join('\n');
}

function buildPrompt<D extends { confidence: number }, P>(
  competitorName: string,
  def: Definition<D, P>,
  context: ContextDocument[],
  note: string
) {
  const docs = context.map((c) => `[${c.label}] ${c.doc.url}\n---\n${c.excerpt}\n---`).join('\n\n');
  return `Competitor: ${competitorName}${note ? `\n${note}` : ''}

Documents:
${docs}

${def.focus}
Every item must cite the document label it came from and a short verbatim quote from that document. Report "confidence" as how well the documents support your answer.

Return a JSON object with this exact structure:
${def.shape}`;
}

function repairPrompt(prompt: string, previous: string, issue: string) {
  return `${prompt}

Your previous response was rejected.
Validation error: ${issue}
Previous response:
${previous.slice(0, 2000)}

Return the corrected JSON object only.`;
}
