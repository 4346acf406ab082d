import { createHash } from 'node:crypto';

const MULTISPACE = /\s+/g;
const NON_ALPHANUM = /[^a-z0-9$€£%\s]/g;

export function contentHash(raw: string) {
  return createHash('sha256').update(raw).digest('hex');
}

export function shortHash(raw: string, length = 12) {
  return contentHash(raw).slice(0, length);
}

/** Text form used for similarity and quote matching: no accents, no punctuation, lowercase. */
export function normalizeText(raw: string) {
  return stripMarkup(raw)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(NON_ALPHANUM, ' ')
    .replace(MULTISPACE, ' ')
    .trim();
}

export function collapseWhitespace(raw: string) {
  return raw.replace(MULTISPACE, ' ').trim();
}

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#x27;': "'",
  '&apos;': "'",
};

/** Drops tags, scripts and styles, keeps block boundaries as newlines. */
export function stripMarkup(html: string) {
  if (!/[<&]/.test(html)) return html;
  let text = html
    .replace(/<script[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style[\s\S]*?<\/style>/gi, ' ')
    .replace(/<noscript[\s\S]*?<\/noscript>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ');
  text = text.replace(/<\/(p|div|h\d|li|section|article|blockquote|tr)>/gi, '$&\n').replace(/<br\s*\/?>/gi, '\n');
  text = text.replace(/<[^>]+>/g, ' ');
  text = text.replace(/&(nbsp|amp|lt|gt|quot|apos|#39|#x27);/g, (m) => ENTITIES[m] ?? ' ');
  return text
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** Scheme and host lowercased, fragment and trailing slash dropped, default ports removed. */
export function normalizeUrl(url: string | null | undefined, base?: string) {
  if (!url) return '';
  try {
    const u = base ? new URL(url, base) : new URL(url);
    if (u.protocol !== 'http:' && u.protocol !== 'https:') return '';
    u.hash = '';
    u.hostname = u.hostname.toLowerCase();
    if (u.pathname.length > 1 && u.pathname.endsWith('/')) {
      u.pathname = u.pathname.replace(/\/+$/, '');
    }
    return u.toString();
  } catch {
    return '';
  }
}

export function getDomain(url: string | null | undefined) {
  if (!url) return null;
  try {
    const u = new URL(url);
    return u.hostname.replace(/^www\./, '') || null;
  } catch {
    return null;
  }
}

export function shortUrl(url: string) {
  try {
    const u = new URL(url);
    return `${u.hostname}${u.pathname}`;
  } catch {
    return url;
  }
}

/** True when `url` is on `domain` or one of its subdomains (www-insensitive). */
export function isOnDomain(url: string, domain: string) {
  const host = getDomain(url);
  const target = domain.replace(/^www\./, '').toLowerCase();
  if (!host) return false;
  return host === target || host.endsWith(`.${target}`);
}

export function slugify(raw: string) {
  return normalizeText(raw).replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
}

export function uniq<T>(xs: T[]): T[] {
  return Array.from(new Set(xs));
}

export function clamp01(value: number) {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export function round2(value: number) {
  return Math.round(value * 100) / 100;
}
