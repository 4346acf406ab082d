import { z } from 'zod';
import { log as rootLog, type Logger } from '../logger';
import type { ModelClient } from '../ai';
import type { StageCache } from '../cache';
import { settleBounded } from '../concurrency';
import { CategorizationSchemaViolation, IntelError, ServiceUnavailable, errorMessage, toRunFailure, type RunFailure } from '../errors';
import { contentHash, normalizeText, round2 } from '../normalize';
import {
  COMPLAINT_CATEGORIES,
  type AssignedCategory,
  type CategorizedComplaint,
  type CategorizedComplaints,
  type Complaint,
  type Severity,
} from '../types';

const SEVERITIES = ['Low', 'Medium', 'High', 'Critical'] as const;

const CATEGORY_DESCRIPTIONS: Record<(typeof COMPLAINT_CATEGORIES)[number], string> = {
  'Product Gaps': 'missing features, limited functionality, integrations that do not exist, hardware limits',
  'Service & Support': 'slow or unhelpful support, onboarding and training problems, no response',
  'Billing & Contract': 'pricing issues, hidden fees, contract lock-in, billing errors, cancellation and refunds',
  Performance: 'speed, reliability, downtime, crashes, bugs and glitches',
};

export const categorizationSchema = z.object({
  category: z.enum(COMPLAINT_CATEGORIES),
  confidence: z.number().min(0).max(1),
  severity: z.enum(SEVERITIES).nullish(),
  summary: z.string().max(500).nullish(),
});

const cachedOutcomeSchema = categorizationSchema.extend({ needsReview: z.boolean() });

export type CategorizationOutcome = {
  category: AssignedCategory;
  confidence: number;
  needsReview: boolean;
  severity: Severity | null;
  summary: string | null;
  attempts: number;
  /** Why the complaint fell back to Uncategorized, if it did. */
  error: IntelError | null;
};

export type CategorizerOptions = {
  confidenceFloor: number;
  concurrency: number;
};

export type CategorizationReport = {
  categorized: CategorizedComplaints;
  violations: number;
  failures: RunFailure[];
};

const STAGE = 'categorize';

export class Categorizer {
  private readonly log: Logger;

  constructor(
    private readonly client: ModelClient,
    private readonly options: CategorizerOptions,
    private readonly cache?: { stage: StageCache; competitorId: string },
    logger?: Logger
  ) {
    this.log = logger ?? rootLog.child({ module: 'categorize' });
  }

  async categorize(complaint: Complaint, competitorName: string, opts: { signal?: AbortSignal } = {}): Promise<CategorizationOutcome> {
    const key = contentHash(`${competitorName.toLowerCase()}|${normalizeText(complaint.text)}`);
    const hit = await this.readCache(key);
    if (hit) return hit;

    let violation: CategorizationSchemaViolation | null = null;
    for (let attempt = 1; attempt <= 2; attempt++) {
      const answer = await this.ask(complaint.text, competitorName, attempt > 1, opts.signal);
      if (answer instanceof IntelError) return fallback(attempt, answer);

      if (answer.ok) {
        const confidence = round2(answer.data.confidence);
        const outcome: CategorizationOutcome = {
          category: answer.data.category,
          confidence,
          needsReview: confidence < this.options.confidenceFloor,
          severity: answer.data.severity ?? null,
          summary: answer.data.summary ?? null,
          attempts: attempt,
          error: null,
        };
        await this.writeCache(key, outcome);
        return outcome;
      }

      violation = new CategorizationSchemaViolation(answer.issue, answer.raw);
      this.log.warn({ complaintId: complaint.id, attempt, issue: answer.issue }, 'Categorization response rejected');
    }
    return fallback(2, violation);
  }

  /** Categorizes every complaint; a model outage stops further calls and falls the rest back. */
  async categorizeAll(
    complaints: Complaint[],
    competitorName: string,
    opts: { signal?: AbortSignal } = {}
  ): Promise<CategorizationReport> {
    let outage: IntelError | null = null;
    const settled = await settleBounded(complaints, this.options.concurrency, async (complaint) => {
      if (outage) return fallback(0, outage);
      const outcome = await this.categorize(complaint, competitorName, opts);
      if (outcome.error && !(outcome.error instanceof CategorizationSchemaViolation)) outage = outcome.error;
      return outcome;
    });
    opts.signal?.throwIfAborted();

    const items: CategorizedComplaint[] = [];
    const counts = emptyCounts();
    let violations = 0;
    let serviceError: IntelError | null = null;
    let serviceErrors = 0;
    let firstViolation: CategorizationSchemaViolation | null = null;

    for (const [i, result] of settled.entries()) {
      const outcome = result.status === 'fulfilled' ? result.value : fallback(0, asIntelError(result.reason));
      items.push({
        ...complaints[i],
        category: outcome.category,
        categoryConfidence: outcome.confidence,
        needsReview: outcome.needsReview,
        severity: outcome.severity,
        summary: outcome.summary,
      });
      counts[outcome.category]++;
      const error = outcome.error;
      if (error instanceof CategorizationSchemaViolation) {
        violations++;
        firstViolation ??= error;
      } else if (error) {
        serviceErrors++;
        serviceError ??= error;
      }
    }

    const failures: RunFailure[] = [];
    if (firstViolation) {
      const f = toRunFailure('categorization', null, firstViolation);
      failures.push({ ...f, message: `${violations} complaint(s) left Uncategorized; first: ${f.message}` });
    }
    if (serviceError) {
      const f = toRunFailure('categorization', null, serviceError);
      failures.push({ ...f, message: `${serviceErrors} complaint(s) left Uncategorized; ${f.message}` });
    }

    const categorized: CategorizedComplaints = {
      items,
      counts,
      reviewQueue: items.filter((c) => c.needsReview).length,
    };
    this.log.info({ complaints: items.length, violations, reviewQueue: categorized.reviewQueue }, 'Categorization finished');
    return { categorized, violations, failures };
  }

  /** One model round trip; collaborator failures come back as values. */
  private async ask(text: string, competitorName: string, strict: boolean, signal: AbortSignal | undefined) {
    try {
      return await this.client.completeJson(
        { system: systemPrompt(strict), prompt: userPrompt(text, competitorName, strict), temperature: 0 },
        categorizationSchema,
        signal
      );
    } catch (error) {
      if (signal?.aborted || !(error instanceof IntelError)) throw error;
      return error;
    }
  }

  private async readCache(key: string): Promise<CategorizationOutcome | null> {
    if (!this.cache) return null;
    const value = await this.cache.stage.read(this.cache.competitorId, STAGE, key, (v) => {
      const parsed = cachedOutcomeSchema.safeParse(v);
      return parsed.success ? parsed.data : null;
    });
    if (!value) return null;
    return {
      category: value.category,
      confidence: value.confidence,
      needsReview: value.needsReview,
      severity: value.severity ?? null,
      summary: value.summary ?? null,
      attempts: 0,
      error: null,
    };
  }

  private async writeCache(key: string, outcome: CategorizationOutcome) {
    if (!this.cache) return;
    const { attempts: _attempts, error: _error, ...value } = outcome;
    await this.cache.stage.writeEntry(this.cache.competitorId, STAGE, key, value);
  }
}

function fallback(attempts: number, error: IntelError | null): CategorizationOutcome {
  return {
    category: 'Uncategorized',
    confidence: 0,
    needsReview: true,
    severity: null,
    summary: null,
    attempts,
    error,
  };
}

function asIntelError(reason: unknown): IntelError {
  if (reason instanceof IntelError) return reason;
  return new ServiceUnavailable('categorizer', errorMessage(reason), { cause: reason });
}

function emptyCounts(): Record<AssignedCategory, number> {
  return { 'Product Gaps': 0, 'Service & Support': 0, 'Billing & Contract': 0, Performance: 0, Uncategorized: 0 };
}

function systemPrompt(strict: boolean) {
  const base =
    'You are a business analyst categorizing customer complaints about a competitor. Return ONLY valid JSON, no text outside the JSON.';
  if (!strict) return base;
  return `${base} Your previous answer was rejected. The "category" field MUST be exactly one of: ${COMPLAINT_CATEGORIES.map((c) => JSON.stringify(c)).join(', ')}. Any other value is invalid.`;
}

function userPrompt(text: string, competitorName: string, strict: boolean) {
  const categories = COMPLAINT_CATEGORIES.map((c) => `- ${c}: ${CATEGORY_DESCRIPTIONS[c]}`).join('\n');
  return `Competitor: ${competitorName}

Complaint:
"""
${text}
"""

Categories:
${categories}

Respond with JSON of this exact shape:
{"category": ${strict ? COMPLAINT_CATEGORIES.map((c) => JSON.stringify(c)).join(' | ') : '"<one category name>"'}, "confidence": <number 0..1>, "severity": "Low" | "Medium" | "High" | "Critical", "summary": "<one sentence>"}`;
}

/** Report used when no model is available: every complaint waits for review. */
export function uncategorizedReport(complaints: Complaint[], reason: IntelError): CategorizationReport {
  const counts = emptyCounts();
  counts.Uncategorized = complaints.length;
  const items: CategorizedComplaint[] = complaints.map((c) => ({
    ...c,
    category: 'Uncategorized',
    categoryConfidence: 0,
    needsReview: true,
    severity: null,
    summary: null,
  }));
  const failures = complaints.length ? [toRunFailure('categorization', null, reason)] : [];
  return { categorized: { items, counts, reviewQueue: items.length }, violations: 0, failures };
}
