import { z } from 'zod';
import { log } from '../logger';
import type { Market } from '../markets';
import type { SourceType } from '../types';
import catalogJson from './catalog.json';

const catalogSchema = z.object({
  platforms: z.array(
    z.object({
      domain: z.string().min(1),
      sourceType: z.enum(['social', 'review-site', 'forum']),
      templates: z.array(z.string().includes('{name}')).min(1),
    })
  ),
  keywords: z.array(z.string().min(1)).min(1),
  marketTemplates: z.array(z.string().includes('{domain}')),
  languageKeywords: z.record(z.array(z.string().min(1)).min(1)),
});

export const CATALOG = catalogSchema.parse(catalogJson);

export type PlatformQueries = {
  platform: string;
  sourceType: SourceType;
  queries: string[];
};

/** Complaint keywords in the market's languages, English excluded. */
export function localKeywords(market: Market | null): string[] {
  if (!market) return [];
  return market.languages.flatMap((lang) => CATALOG.languageKeywords[lang] ?? []);
}

const quoteTerm = (term: string) => (term.includes(' ') ? `"${term}"` : term);

function marketQueries(domain: string, name: string, market: Market) {
  const local = localKeywords(market).slice(0, 4).map(quoteTerm).join(' OR ');
  return CATALOG.marketTemplates
    .filter((t) => local || !t.includes('{localTerms}'))
    .map((t) =>
      t
        .replaceAll('{domain}', domain)
        .replaceAll('{name}', name)
        .replaceAll('{market}', market.name)
        .replaceAll('{localTerms}', local)
    );
}

/**
 * Expands the query templates of each platform with the competitor name.
 * With a market, its regional platforms replace the configured social and
 * review sites (configured forums stay) and market-specific queries go first.
 * Platforms without templates are skipped.
 */
export function buildComplaintQueries(
  competitorName: string,
  platforms: readonly string[],
  market: Market | null = null
): PlatformQueries[] {
  const name = competitorName.replace(/"/g, '').trim();
  const clean = (raw: string) => raw.trim().toLowerCase().replace(/^www\./, '');
  const selected = market
    ? [...market.platforms, ...platforms.filter((p) => CATALOG.platforms.find((e) => e.domain === clean(p))?.sourceType === 'forum')]
    : platforms;

  const out: PlatformQueries[] = [];
  for (const raw of selected) {
    const domain = clean(raw);
    const entry = CATALOG.platforms.find((p) => p.domain === domain);
    if (!entry) {
      log.warn({ platform: domain }, 'No query templates for platform, skipping');
      continue;
    }
    if (out.some((p) => p.platform === domain)) continue;
    out.push({
      platform: domain,
      sourceType: entry.sourceType,
      queries: [
        ...(market ? marketQueries(domain, name, market) : []),
        ...entry.templates.map((t) => t.replaceAll('{name}', name)),
      ],
    });
  }
  return out;
}
