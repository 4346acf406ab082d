import { describe, expect, it } from 'vitest';
import { ModelClient, type ModelLimits } from '../../ai';
import { MemoryCacheStore, StageCache } from '../../cache';
import { ExtractionError } from '../../errors';
import { contentHash } from '../../normalize';
import type { RawDocument } from '../../types';
import { getMarket } from '../../markets';
import { ExtractionEngine, buildContext, marketNote, relevantCategories } from '../engine';
import { scriptedModel, silent } from '../../__tests__/helpers';

const LIMITS: ModelLimits = { timeoutMs: 1_000, requestsPerMinute: 100, acquireTimeoutMs: 1_000, temperature: 0, maxTokens: 2_000 };

function doc(url: string, content: string): RawDocument {
  return { url, content, contentHash: contentHash(content), fetchedAt: '2024-05-01T10:00:00.000Z', contentType: 'text/html', status: 200 };
}

const FEATURES = doc('https://acme.example/features', '<p>Works with the Acme Terminal X2, a proprietary card reader.</p>');
const PRICING = doc('https://acme.example/pricing', '<p>Starter plan $49 per month per location. Setup fee $199.</p>');

function pricingDraft(costModel = 'one_time') {
  return {
    currency: 'USD',
    hardware: [
      {
        name: 'Terminal X2',
        proprietary: true,
        costModel,
        price: null,
        evidence: { document: 'D1', quote: 'a proprietary card reader' },
      },
    ],
    softwareTiers: [
      {
        name: 'Starter',
        billingAxis: 'per_location',
        pricePoints: [{ amount: 49, label: 'per month' }],
        hiddenFees: ['Setup fee $199'],
        evidence: { document: 'D2', quote: 'Annual contract required' },
      },
    ],
    summary: 'Per-location subscription with proprietary hardware.',
    confidence: 0.8,
  };
}

function setup(script: Parameters<typeof scriptedModel>[0], cache?: StageCache) {
  const scripted = scriptedModel(script);
  const engine = new ExtractionEngine(
    new ModelClient(scripted.model, LIMITS),
    { maxContextChars: 10_000 },
    cache ? { stage: cache, competitorId: 'acme-pos' } : undefined,
    silent
  );
  return { engine, ...scripted };
}

describe('ExtractionEngine', () => {
  it('separates observed from inferred items and scores confidence', async () => {
    const { engine, requests } = setup(['```json\n' + JSON.stringify(pricingDraft()) + '\n```']);

    const outcome = await engine.extract([PRICING, FEATURES], 'pricing', { competitorName: 'Acme POS' });

    expect(outcome.fromCache).toBe(false);
    expect(outcome.confidence).toBe(0.65);
    expect(outcome.analysis.currency).toBe('USD');
    expect(outcome.analysis.hardware[0]).toEqual({
      name: 'Terminal X2',
      proprietary: true,
      costModel: 'one_time',
      price: null,
      provenance: { documentIds: [FEATURES.contentHash], quote: 'a proprietary card reader', basis: 'observed' },
    });
    expect(outcome.analysis.softwareTiers[0].provenance).toEqual({
      documentIds: [FEATURES.contentHash, PRICING.contentHash],
      quote: 'Annual contract required',
      basis: 'inferred',
    });
    expect(outcome.analysis.metrics).toEqual({ items: 2, observed: 1, observedRatio: 0.5, modelConfidence: 0.8 });
    expect(requests[0].prompt).toContain('[D1] https://acme.example/features');
    expect(requests[0].prompt).toContain('[D2] https://acme.example/pricing');
  });

  it('repairs an answer that fails validation', async () => {
    const { engine, requests } = setup([JSON.stringify(pricingDraft('rental')), JSON.stringify(pricingDraft())]);

    const outcome = await engine.extract([PRICING, FEATURES], 'pricing', { competitorName: 'Acme POS' });

    expect(outcome.analysis.hardware[0].costModel).toBe('one_time');
    expect(requests).toHaveLength(2);
    expect(requests[1].prompt).toContain('Your previous response was rejected.');
    expect(requests[1].prompt).toContain('Validation error: hardware.0.costModel');
  });

  it('throws ExtractionError after two malformed answers', async () => {
    const { engine, requests } = setup(['Sorry, I cannot help with that.', '{"currency": "USD",']);

    const error = await engine.extract([PRICING], 'pricing', { competitorName: 'Acme POS' }).catch((e: unknown) => e);

    expect(requests).toHaveLength(2);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({ analysisType: 'pricing' });
    expect(error instanceof Error && error.message.startsWith('Invalid pricing response after repair: invalid JSON')).toBe(true);
  });

  it('wraps a model outage', async () => {
    const { engine } = setup(() => {
      throw new Error('boom');
    });
    await expect(engine.extract([PRICING], 'monetization', { competitorName: 'Acme POS' })).rejects.toMatchObject({
      code: 'ExtractionError',
      message: 'monetization analysis unavailable: scripted: boom',
    });
  });

  it('refuses to run without documents', async () => {
    const { engine, requests } = setup(['{}']);
    await expect(engine.extract([], 'vision', { competitorName: 'Acme POS' })).rejects.toBeInstanceOf(ExtractionError);
    expect(requests).toHaveLength(0);
  });

  it('scores an empty analysis on model confidence alone', async () => {
    const { engine } = setup([
      JSON.stringify({ roadmapSignals: [], hiringFocus: [], technologyBets: [], summary: 'Nothing announced.', confidence: 0.6 }),
    ]);
    const outcome = await engine.extract([PRICING], 'vision', { competitorName: 'Acme POS' });
    expect(outcome.confidence).toBe(0.3);
    expect(outcome.analysis.metrics).toEqual({ items: 0, observed: 0, observedRatio: 0, modelConfidence: 0.6 });
  });

  it('serves unchanged documents from cache', async () => {
    const cache = new StageCache(new MemoryCacheStore());
    const first = setup([JSON.stringify(pricingDraft())], cache);
    const initial = await first.engine.extract([PRICING, FEATURES], 'pricing', { competitorName: 'Acme POS' });

    const second = setup(['not used'], cache);
    const again = await second.engine.extract([FEATURES, PRICING], 'pricing', { competitorName: 'Acme POS' });

    expect(second.requests).toHaveLength(0);
    expect(again.fromCache).toBe(true);
    expect(again.analysis).toEqual(initial.analysis);
    expect(again.confidence).toBe(initial.confidence);
  });

  it('names the target market and its currency in the pricing prompt', async () => {
    const { engine, requests } = setup([JSON.stringify(pricingDraft())]);

    await engine.extract([PRICING, FEATURES], 'pricing', { competitorName: 'Acme POS', market: getMarket('GB') });

    expect(requests[0].prompt).toContain(
      'Prices are expected in GBP for United Kingdom; report the currency the documents actually show.'
    );
    expect(requests[0].prompt.split('\n')[1]).toBe(
      'Target market: United Kingdom (GB). Mature market; prices usually quoted with or without VAT, GDPR applies.'
    );
  });

  it('keeps cached analyses apart per market', async () => {
    const cache = new StageCache(new MemoryCacheStore());
    await setup([JSON.stringify(pricingDraft())], cache).engine.extract([PRICING], 'pricing', { competitorName: 'Acme POS' });

    const german = setup([JSON.stringify({ ...pricingDraft(), currency: 'EUR' })], cache);
    const outcome = await german.engine.extract([PRICING], 'pricing', { competitorName: 'Acme POS', market: getMarket('DE') });

    expect(german.requests).toHaveLength(1);
    expect(outcome.fromCache).toBe(false);
    expect(outcome.analysis.currency).toBe('EUR');
  });
});

describe('marketNote', () => {
  it('adds the currency only for pricing', () => {
    const de = getMarket('DE');
    expect(marketNote('pricing', null)).toBe('');
    expect(marketNote('vision', de)).toBe(
      'Target market: Germany (DE). Largest EU market with strict data protection and a preference for long contracts.'
    );
    expect(marketNote('pricing', de).split('\n')[1]).toBe(
      'Prices are expected in EUR for Germany; report the currency the documents actually show.'
    );
  });
});

describe('buildContext', () => {
  it('orders by URL and splits the budget evenly', () => {
    const context = buildContext([PRICING, FEATURES], 10);
    expect(context.map((c) => [c.label, c.doc.url, c.excerpt])).toEqual([
      ['D1', 'https://acme.example/features', 'Works'],
      ['D2', 'https://acme.example/pricing', 'Start'],
    ]);
  });
});

describe('relevantCategories', () => {
  it('feeds each analysis from its page categories', () => {
    expect(relevantCategories('pricing')).toEqual(['pricing', 'features']);
    expect(relevantCategories('vision')).toEqual(['blog', 'careers']);
  });
});
