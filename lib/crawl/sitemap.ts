import * as cheerio from 'cheerio';

export const SITEMAP_PATHS = ['/sitemap.xml', '/sitemap_index.xml', '/sitemaps.xml', '/sitemap/sitemap.xml'];

export type ParsedSitemap =
  | { kind: 'urlset'; urls: string[] }
  | { kind: 'index'; sitemaps: string[] }
  | { kind: 'invalid' };

/** Reads a sitemap or sitemap index. Anything without a urlset/sitemapindex root is invalid. */
export function parseSitemap(xml: string): ParsedSitemap {
  if (!/<(urlset|sitemapindex)[\s>]/i.test(xml)) return { kind: 'invalid' };
  const $ = cheerio.load(xml, { xml: true });
  const locs = (selector: string) =>
    $(selector)
      .map((_, el) => $(el).text().trim())
      .get()
      .filter(Boolean);

  if ($('sitemapindex').length) {
    return { kind: 'index', sitemaps: locs('sitemapindex > sitemap > loc') };
  }
  return { kind: 'urlset', urls: locs('urlset > url > loc') };
}
