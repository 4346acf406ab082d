import * as cheerio from 'cheerio';
import { collapseWhitespace, isOnDomain, getDomain, normalizeUrl } from '../normalize';

export type PageLink = { url: string; text: string };

/** Internal anchors of a page, resolved against `baseUrl`, first occurrence kept. */
export function extractInternalLinks(html: string, baseUrl: string): PageLink[] {
  const domain = getDomain(baseUrl);
  if (!domain) return [];
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const links: PageLink[] = [];

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (!href || href.startsWith('#') || /^(mailto|tel|javascript):/i.test(href)) return;
    const url = normalizeUrl(href, baseUrl);
    if (!url || !isOnDomain(url, domain) || seen.has(url)) return;
    seen.add(url);
    links.push({ url, text: collapseWhitespace($(el).text()) });
  });
  return links;
}
