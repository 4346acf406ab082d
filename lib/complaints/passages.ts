import { collapseWhitespace, stripMarkup } from '../normalize';
import { CATALOG } from './queries';

export const MIN_PASSAGE_CHARS = 30;
export const MAX_PASSAGE_CHARS = 1200;

function keywordPattern(keywords: readonly string[]) {
  const alternatives = [...keywords]
    .sort((a, b) => b.length - a.length)
    .map((k) => k.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
  return new RegExp(`\\b(?:${alternatives.join('|')})\\b`, 'i');
}

const DEFAULT_PATTERN = keywordPattern(CATALOG.keywords);

/** Paragraphs of a page that read like a complaint. */
export function extractPassages(content: string, keywords?: readonly string[]): string[] {
  const pattern = keywords ? keywordPattern(keywords) : DEFAULT_PATTERN;
  return stripMarkup(content)
    .split(/\n+/)
    .map(collapseWhitespace)
    .filter((p) => p.length >= MIN_PASSAGE_CHARS && p.length <= MAX_PASSAGE_CHARS && pattern.test(p));
}
