import { z } from 'zod';
import marketsJson from './markets.json';

const marketSchema = z.object({
  code: z.string().regex(/^[A-Z]{2}$/),
  name: z.string().min(1),
  currency: z.string().regex(/^[A-Z]{3}$/),
  googleDomain: z.string().min(1),
  /** Google `gl` value when it differs from the lower-cased code. */
  gl: z.string().optional(),
  languages: z.array(z.string().min(2)).min(1),
  platforms: z.array(z.string().min(1)).min(1),
  businessContext: z.string(),
});

export type Market = z.infer<typeof marketSchema>;

export const MARKETS: readonly Market[] = z.object({ markets: z.array(marketSchema) }).parse(marketsJson).markets;

export function getMarket(code: string | null | undefined): Market | null {
  if (!code) return null;
  const wanted = code.trim().toUpperCase();
  return MARKETS.find((m) => m.code === wanted) ?? null;
}

export function isKnownMarket(code: string) {
  return getMarket(code) !== null;
}

/** Two-letter region code search engines expect. */
export function searchRegion(market: Market) {
  return market.gl ?? market.code.toLowerCase();
}
