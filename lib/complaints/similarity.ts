export const SHINGLE_SIZE = 3;

/** Word n-grams of already-normalized text. Short texts yield a single shingle. */
export function shingles(normalized: string, size = SHINGLE_SIZE): Set<string> {
  const words = normalized.split(' ').filter(Boolean);
  if (!words.length) return new Set();
  if (words.length <= size) return new Set([words.join(' ')]);
  const out = new Set<string>();
  for (let i = 0; i + size <= words.length; i++) {
    out.add(words.slice(i, i + size).join(' '));
  }
  return out;
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>) {
  if (!a.size || !b.size) return 0;
  let shared = 0;
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  for (const s of small) if (large.has(s)) shared++;
  return shared / (a.size + b.size - shared);
}

/** Linear scan over canonical texts; returns the closest entry at or above the threshold. */
export class SimilarityIndex<T> {
  private entries: { shingles: Set<string>; item: T }[] = [];

  constructor(private readonly threshold: number) {}

  match(normalized: string): { item: T; similarity: number } | null {
    const probe = shingles(normalized);
    let best: { item: T; similarity: number } | null = null;
    for (const entry of this.entries) {
      const similarity = jaccard(probe, entry.shingles);
      if (similarity >= this.threshold && (!best || similarity > best.similarity)) {
        best = { item: entry.item, similarity };
      }
    }
    return best;
  }

  add(normalized: string, item: T) {
    this.entries.push({ shingles: shingles(normalized), item });
  }

  get size() {
    return this.entries.length;
  }
}
