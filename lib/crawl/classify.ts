import type { PageCategory } from '../types';

export type CommercialCategory = Exclude<PageCategory, 'unknown'>;

const CAT_PATTERNS: { category: CommercialCategory; terms: string[] }[] = [
  { category: 'pricing', terms: ['pricing', 'price', 'prices', 'plans', 'plan', 'packages', 'subscription', 'subscriptions', 'buy'] },
  { category: 'features', terms: ['features', 'feature', 'capabilities', 'product', 'products', 'solutions', 'platform', 'integrations'] },
  {
    category: 'blog',
    terms: ['blog', 'news', 'press', 'newsroom', 'articles', 'insights', 'updates', 'announcements', 'press-releases'],
  },
  { category: 'careers', terms: ['careers', 'career', 'jobs', 'hiring', 'join-us', 'work-with-us', 'open-positions'] },
];

/** Extraction relevance order; pages are fetched highest-value first. */
export const CATEGORY_PRIORITY: CommercialCategory[] = ['pricing', 'features', 'careers', 'blog'];

export const COMMERCIAL_CATEGORIES: readonly CommercialCategory[] = CAT_PATTERNS.map((c) => c.category);

function pathSegments(url: string) {
  try {
    return new URL(url).pathname
      .toLowerCase()
      .split('/')
      .map((s) => s.replace(/\.(html?|php|aspx?)$/, ''))
      .filter(Boolean);
  } catch {
    return [];
  }
}

function textTokens(text: string) {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, ' ')
    .split(/\s+/)
    .filter(Boolean);
}

/**
 * Classifies a URL by its path segments, falling back to anchor text. The
 * root path and deep article URLs under a blog prefix both count; a segment
 * match beats a text match.
 */
export function classifyPage(url: string, anchorText = ''): { category: PageCategory; score: number } {
  const segments = pathSegments(url);
  for (let depth = 0; depth < segments.length; depth++) {
    const hit = CAT_PATTERNS.find((c) => c.terms.includes(segments[depth]));
    // Shallower matches are stronger: /pricing beats /docs/api/pricing.
    if (hit) return { category: hit.category, score: 1 / (1 + depth) };
  }
  if (anchorText) {
    const tokens = textTokens(anchorText);
    const joined = tokens.join('-');
    for (const { category, terms } of CAT_PATTERNS) {
      if (terms.some((t) => tokens.includes(t) || joined === t)) {
        return { category, score: 0.5 };
      }
    }
  }
  return { category: 'unknown', score: 0 };
}

export function isCommercial(category: PageCategory): category is CommercialCategory {
  return category !== 'unknown';
}
