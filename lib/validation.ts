import { z } from 'zod';
import { isKnownMarket } from './markets';
import { normalizeUrl, shortHash, slugify } from './normalize';
import type { CompetitorProfile } from './types';

// URL validation schema
const urlSchema = z.string().url().max(2048).refine(
  (url) => {
    try {
      const parsed = new URL(url);
      return ['http:', 'https:'].includes(parsed.protocol);
    } catch {
      return false;
    }
  },
  { message: 'Invalid URL format' }
);

export const competitorInputSchema = z
  .object({
    name: z
      .string()
      .max(255, 'Competitor name must be 255 characters or less')
      .transform((val) => sanitizeText(val))
      .refine((val) => val.length > 0, 'Competitor name is required'),
    rootUrl: urlSchema,
    manualOverrides: z.array(urlSchema).max(50, 'Maximum 50 override URLs allowed').default([]),
    country: z
      .string()
      .trim()
      .transform((val) => val.toUpperCase())
      .refine(isKnownMarket, 'Unknown country code')
      .nullish(),
  })
  .strict();

export type CompetitorInput = z.input<typeof competitorInputSchema>;

/**
 * Sanitizes text input by removing HTML/script content and trimming whitespace.
 */
export function sanitizeText(text: string): string {
  let sanitized = text.trim();

  sanitized = sanitized
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
    .replace(/<[^>]*>/g, '')
    .replace(/javascript:/gi, '')
    .replace(/on\w+\s*=/gi, '')
    .replace(/data:text\/html/gi, '')
    .replace(/vbscript:/gi, '');

  sanitized = sanitized
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&')
    .replace(/&quot;/g, '"')
    .replace(/&#x27;/g, "'")
    .replace(/&#x2F;/g, '/');

  sanitized = sanitized.replace(/&#?[a-zA-Z0-9]+;/g, '');

  return sanitized.replace(/\s+/g, ' ').trim();
}

/**
 * Validates the request and freezes it into a profile. The id is stable for a
 * given name and root URL so repeated runs share cache entries.
 */
export function createCompetitorProfile(data: unknown): CompetitorProfile {
  const input = competitorInputSchema.parse(data);
  const rootUrl = normalizeUrl(input.rootUrl);
  const overrides = Array.from(new Set(input.manualOverrides.map((u) => normalizeUrl(u)).filter(Boolean)));
  const slug = slugify(input.name) || 'competitor';
  const country = input.country ?? null;
  // The target country is part of the identity when set.
  const key = `${input.name.toLowerCase()}|${rootUrl}${country ? `|${country}` : ''}`;
  return Object.freeze({
    id: `${slug}-${shortHash(key, 8)}`,
    name: input.name,
    rootUrl,
    manualOverrides: Object.freeze(overrides),
    country,
  });
}
