import { describe, expect, it } from 'vitest';
import { ModelClient, type ModelLimits } from '../../ai';
import { MemoryCacheStore, StageCache } from '../../cache';
import { CategorizationSchemaViolation, ServiceUnavailable } from '../../errors';
import type { Complaint } from '../../types';
import { Categorizer, uncategorizedReport } from '../categorizer';
import { scriptedModel, silent } from '../../__tests__/helpers';

const LIMITS: ModelLimits = { timeoutMs: 1_000, requestsPerMinute: 100, acquireTimeoutMs: 1_000, temperature: 0, maxTokens: 200 };

const answer = (category: string, confidence: number) =>
  JSON.stringify({ category, confidence, severity: 'High', summary: 'Terminal instability' });

function complaint(id: string, text: string): Complaint {
  return {
    id,
    text,
    sourceType: 'review-site',
    sourceUrl: `https://www.g2.com/reviews/${id}`,
    firstSeen: '2024-05-01T10:00:00.000Z',
    sources: [],
  };
}

const CRASH = complaint('c1', 'The terminal crashes every Friday during the dinner rush.');
const FEE = complaint('c2', 'They added a hidden fee to the invoice without telling us.');
const REPORTS = complaint('c3', 'There is no way to export reports by location.');

function setup(script: Parameters<typeof scriptedModel>[0], cache?: StageCache) {
  const scripted = scriptedModel(script);
  const client = new ModelClient(scripted.model, LIMITS);
  const scope = cache ? { stage: cache, competitorId: 'acme-pos' } : undefined;
  return { categorizer: new Categorizer(client, { confidenceFloor: 0.6, concurrency: 1 }, scope, silent), ...scripted };
}

describe('Categorizer', () => {
  it('accepts a valid answer', async () => {
    const { categorizer, requests } = setup([answer('Performance', 0.914)]);
    const outcome = await categorizer.categorize(CRASH, 'Acme POS');

    expect(outcome).toEqual({
      category: 'Performance',
      confidence: 0.91,
      needsReview: false,
      severity: 'High',
      summary: 'Terminal instability',
      attempts: 1,
      error: null,
    });
    expect(requests[0].prompt).toContain(CRASH.text);
    expect(requests[0].json).toBe(true);
  });

  it('retries once with a stricter prompt', async () => {
    const { categorizer, requests } = setup([answer('Hardware', 0.9), answer('Product Gaps', 0.8)]);
    const outcome = await categorizer.categorize(REPORTS, 'Acme POS');

    expect(outcome).toMatchObject({ category: 'Product Gaps', confidence: 0.8, attempts: 2, error: null });
    expect(requests[1].system).toContain('previous answer was rejected');
  });

  it('falls back to Uncategorized after two invalid answers', async () => {
    const { categorizer, requests } = setup(['not json at all', answer('Hardware', 0.9)]);
    const outcome = await categorizer.categorize(REPORTS, 'Acme POS');

    expect(requests).toHaveLength(2);
    expect(outcome).toMatchObject({ category: 'Uncategorized', confidence: 0, needsReview: true, attempts: 2 });
    expect(outcome.error).toBeInstanceOf(CategorizationSchemaViolation);
  });

  it('flags low-confidence answers for review', async () => {
    const { categorizer } = setup([answer('Billing & Contract', 0.45)]);
    const outcome = await categorizer.categorize(FEE, 'Acme POS');
    expect(outcome).toMatchObject({ category: 'Billing & Contract', confidence: 0.45, needsReview: true });
  });

  it('summarizes a batch', async () => {
    const { categorizer } = setup((req) => {
      if (req.prompt.includes('invoice')) return answer('Billing & Contract', 0.9);
      if (req.prompt.includes('dinner rush')) return answer('Performance', 0.5);
      return '{"category": "Other", "confidence": 1}';
    });

    const report = await categorizer.categorizeAll([CRASH, FEE, REPORTS], 'Acme POS');

    expect(report.categorized.items.map((c) => [c.id, c.category, c.needsReview])).toEqual([
      ['c1', 'Performance', true],
      ['c2', 'Billing & Contract', false],
      ['c3', 'Uncategorized', true],
    ]);
    expect(report.categorized.counts).toEqual({
      'Product Gaps': 0,
      'Service & Support': 0,
      'Billing & Contract': 1,
      Performance: 1,
      Uncategorized: 1,
    });
    expect(report.categorized.reviewQueue).toBe(2);
    expect(report.violations).toBe(1);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0].code).toBe('CategorizationSchemaViolation');
    expect(report.failures[0].message.startsWith('1 complaint(s) left Uncategorized; first: ')).toBe(true);
  });

  it('stops calling the model after an outage', async () => {
    const { categorizer, requests } = setup(() => {
      throw new Error('boom');
    });

    const report = await categorizer.categorizeAll([CRASH, FEE, REPORTS], 'Acme POS');

    expect(requests).toHaveLength(1);
    expect(report.categorized.counts.Uncategorized).toBe(3);
    expect(report.failures).toEqual([
      {
        stage: 'categorization',
        scope: null,
        code: 'ServiceUnavailable',
        message: '3 complaint(s) left Uncategorized; scripted: boom',
      },
    ]);
  });

  it('reuses cached answers for the same complaint text', async () => {
    const cache = new StageCache(new MemoryCacheStore());
    const first = setup([answer('Performance', 0.9)], cache);
    await first.categorizer.categorize(CRASH, 'Acme POS');

    const second = setup([answer('Product Gaps', 0.9)], cache);
    const outcome = await second.categorizer.categorize({ ...CRASH, id: 'other' }, 'Acme POS');

    expect(second.requests).toHaveLength(0);
    expect(outcome).toMatchObject({ category: 'Performance', confidence: 0.9, attempts: 0 });
  });
});

describe('uncategorizedReport', () => {
  it('sends everything to review with one failure', () => {
    const report = uncategorizedReport([CRASH, FEE], new ServiceUnavailable('llm', 'no AI provider configured'));
    expect(report.categorized.reviewQueue).toBe(2);
    expect(report.categorized.counts.Uncategorized).toBe(2);
    expect(report.failures).toEqual([
      { stage: 'categorization', scope: null, code: 'ServiceUnavailable', message: 'llm: no AI provider configured' },
    ]);
  });

  it('records nothing when there are no complaints', () => {
    expect(uncategorizedReport([], new ServiceUnavailable('llm', 'no AI provider configured')).failures).toEqual([]);
  });
});
