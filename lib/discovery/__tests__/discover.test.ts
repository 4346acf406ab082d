import { describe, expect, it } from 'vitest';
import { MemoryCacheStore, StageCache } from '../../cache';
import { DiscoveryIncomplete } from '../../errors';
import { Fetcher } from '../../fetch/fetcher';
import { DiscoveryEngine } from '../discover';
import { html, profile, routedFetch, silent, testPolicy } from '../../__tests__/helpers';

const ROOT = 'https://acme.example/';

const urlset = (...paths: string[]) =>
  `<?xml version="1.0"?><urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${paths
    .map((p) => `<url><loc>https://acme.example${p}</loc></url>`)
    .join('')}</urlset>`;

function setup(routes: Parameters<typeof routedFetch>[0], cache = new StageCache(new MemoryCacheStore())) {
  const fake = routedFetch(routes);
  const fetcher = new Fetcher({ policy: testPolicy({ respectRobots: false }), fetchImpl: fake.impl, logger: silent });
  const engine = new DiscoveryEngine(fetcher, cache, { cacheTtlMs: 60_000, maxHopPages: 5 }, silent);
  return { engine, fetcher, fake, cache };
}

describe('DiscoveryEngine', () => {
  it('takes commercial pages from the sitemap and crawls for what is missing', async () => {
    const { engine, fake } = setup({
      'https://acme.example/sitemap.xml': urlset('/pricing', '/careers', '/about'),
      [ROOT]: html('Acme POS', '<a href="/pricing">Pricing</a><a href="/features">Features</a>'),
      'https://acme.example/pricing': html('Pricing', '<p>Plans</p>'),
      'https://acme.example/features': html('Features', '<p>Everything</p>'),
    });

    const result = await engine.discover(profile());

    expect(result.status).toBe('complete');
    expect(result.notice).toBeNull();
    expect(result.pages).toEqual([
      { url: 'https://acme.example/careers', category: 'careers', method: 'sitemap', confidence: 'high', score: 0.9 },
      { url: 'https://acme.example/features', category: 'features', method: 'link-pattern', confidence: 'medium', score: 0.6 },
      { url: 'https://acme.example/pricing', category: 'pricing', method: 'sitemap', confidence: 'high', score: 0.9 },
    ]);
    expect(result.documents.map((d) => d.url)).toEqual([
      ROOT,
      'https://acme.example/pricing',
      'https://acme.example/features',
    ]);
    expect(fake.count('https://acme.example/sitemap_index.xml')).toBe(0);
    expect(result.fromCache).toBe(false);
  });

  it('skips the crawl when the sitemap covers pricing and features', async () => {
    const { engine, fake } = setup({
      'https://acme.example/sitemap.xml': urlset('/pricing', '/features'),
    });

    const result = await engine.discover(profile());

    expect(result.pages.map((p) => p.category)).toEqual(['features', 'pricing']);
    expect(fake.calls).toEqual(['https://acme.example/sitemap.xml']);
  });

  it('follows a sitemap index into on-domain children', async () => {
    const { engine } = setup({
      'https://acme.example/sitemap.xml': `<sitemapindex>
        <sitemap><loc>https://acme.example/sitemap-pages.xml</loc></sitemap>
        <sitemap><loc>https://cdn.other.example/sitemap.xml</loc></sitemap>
      </sitemapindex>`,
      'https://acme.example/sitemap-pages.xml': urlset('/plans', '/product'),
    });

    const result = await engine.discover(profile());

    expect(result.pages.map((p) => [p.url, p.category])).toEqual([
      ['https://acme.example/plans', 'pricing'],
      ['https://acme.example/product', 'features'],
    ]);
  });

  it('falls back to link patterns when there is no sitemap', async () => {
    const { engine } = setup({
      [ROOT]: html('Acme POS', '<a href="/plans">Plans</a><a href="/blog">Blog</a><a href="/about">About</a>'),
      'https://acme.example/plans': html('Plans', ''),
      'https://acme.example/blog': html('Blog', ''),
    });

    const result = await engine.discover(profile());

    expect(result.pages).toEqual([
      { url: 'https://acme.example/blog', category: 'blog', method: 'link-pattern', confidence: 'medium', score: 0.6 },
      { url: 'https://acme.example/plans', category: 'pricing', method: 'link-pattern', confidence: 'medium', score: 0.6 },
    ]);
    expect(result.failures).toEqual([
      { stage: 'discovery', scope: 'https://acme.example/about', code: 'FetchError', message: 'HTTP 404' },
    ]);
  });

  it('gives manual overrides maximum confidence', async () => {
    const { engine } = setup({
      'https://acme.example/sitemap.xml': urlset('/plans', '/features'),
    });

    const result = await engine.discover(profile({ manualOverrides: ['https://acme.example/plans'] }));

    expect(result.pages.find((p) => p.url === 'https://acme.example/plans')).toEqual({
      url: 'https://acme.example/plans',
      category: 'pricing',
      method: 'manual-override',
      confidence: 'maximum',
      score: 1,
    });
  });

  it('reports incomplete discovery without throwing', async () => {
    const { engine } = setup({
      [ROOT]: html('Acme POS', '<a href="/about">About</a>'),
      'https://acme.example/about': html('About', ''),
    });

    const result = await engine.discover(profile());

    expect(result.status).toBe('incomplete');
    expect(result.pages).toEqual([]);
    expect(result.notice).toBeInstanceOf(DiscoveryIncomplete);
  });

  it('serves a repeated discovery from cache without fetching', async () => {
    const routes = { 'https://acme.example/sitemap.xml': urlset('/pricing', '/features') };
    const first = setup(routes);
    const initial = await first.engine.discover(profile());

    const second = setup(routes, first.cache);
    const again = await second.engine.discover(profile());

    expect(again.fromCache).toBe(true);
    expect(again.pages).toEqual(initial.pages);
    expect(again.documents).toEqual([]);
    expect(second.fetcher.requestCount).toBe(0);
  });

  it('does not cache a discovery made during an outage', async () => {
    const down = { status: 503, body: 'unavailable' };
    const first = setup({
      'https://acme.example/sitemap.xml': [down, down, down, { body: urlset('/pricing', '/features') }],
      [ROOT]: [down, down, down, { body: html('Acme POS', '<p>Welcome</p>') }],
    });
    const outage = await first.engine.discover(profile());
    expect(outage.status).toBe('incomplete');
    expect(outage.failures.map((f) => f.code)).toEqual(['FetchError']);

    const restored = new DiscoveryEngine(
      new Fetcher({ policy: testPolicy({ respectRobots: false }), fetchImpl: first.fake.impl, logger: silent }),
      first.cache,
      { cacheTtlMs: 60_000, maxHopPages: 5 },
      silent
    );
    const recovered = await restored.discover(profile());
    expect(recovered.fromCache).toBe(false);
    expect(recovered.status).toBe('complete');
    expect(recovered.pages.map((p) => p.url)).toEqual(['https://acme.example/features', 'https://acme.example/pricing']);

    const again = await restored.discover(profile());
    expect(again.fromCache).toBe(true);
    expect(again.pages).toEqual(recovered.pages);
  });

  it('misses the cache when the overrides change', async () => {
    const routes = { 'https://acme.example/sitemap.xml': urlset('/pricing', '/features') };
    const first = setup(routes);
    await first.engine.discover(profile());

    const second = setup(routes, first.cache);
    const again = await second.engine.discover(profile({ manualOverrides: ['https://acme.example/deals'] }));

    expect(again.fromCache).toBe(false);
    expect(second.fetcher.requestCount).toBe(1);
  });
});
