/**
 * Tokenization
 *
 * Shared by the keyword topic scorer, the FTS query builder and the
 * consolidation naming heuristics.
 */

const STOP_WORDS = new Set([
  'the', 'a', 'an', 'is', 'are', 'was', 'were', 'using', 'with', 'for',
  'to', 'in', 'on', 'of', 'and', 'that', 'this', 'it', 'be', 'as', 'at',
  'by', 'from', 'or', 'not', 'but', 'have', 'has', 'had', 'do', 'does',
  'did', 'will', 'would', 'could', 'should', 'may', 'might', 'can',
  'we', 'our', 'they', 'them', 'its', 'use', 'used', 'all', 'each',
]);

/**
 * Lowercase word tokens, in order of appearance, duplicates kept
 */
export function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Distinct keyword set: words longer than two characters that are not stop words
 */
export function keywords(text: string): Set<string> {
  return new Set(words(text).filter(w => w.length > 2 && !STOP_WORDS.has(w)));
}

/**
 * Jaccard overlap of two sets. Two empty sets have no overlap.
 */
export function jaccard<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let intersection = 0;
  for (const x of a) {
    if (b.has(x)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}
