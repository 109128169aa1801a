/**
 * Destination naming
 *
 * Names say what the merged file is about: the most common tag of the
 * sources, or their most frequent keyword when none carry tags.
 */

import { posix } from 'node:path';

import type { OpportunityKind } from '../types/index.js';
import { dateStamp } from '../utils/time.js';
import { keywords, words } from '../utils/tokens.js';
import type { ConsolidationCandidate } from './similarity.js';

const FALLBACK_CONTEXT = 'notes';
const DEFAULT_EXTENSION = '.md';

function mostCommon(counts: Map<string, number>): string | null {
  let best: string | null = null;
  let bestCount = 0;
  for (const [key, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && key < best)) {
      best = key;
      bestCount = count;
    }
  }
  return best;
}

export function primaryContext(sources: ConsolidationCandidate[]): string {
  const tagCounts = new Map<string, number>();
  for (const source of sources) {
    for (const tag of new Set(source.tags)) {
      tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + 1);
    }
  }
  const tag = mostCommon(tagCounts);
  if (tag) {
    return tag;
  }

  const wordCounts = new Map<string, number>();
  for (const source of sources) {
    const allowed = keywords(source.content);
    for (const word of words(source.content)) {
      if (allowed.has(word)) {
        wordCounts.set(word, (wordCounts.get(word) ?? 0) + 1);
      }
    }
  }
  return mostCommon(wordCounts) ?? FALLBACK_CONTEXT;
}

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || FALLBACK_CONTEXT;
}

/**
 * `<context>-<kind>-<YYYYMMDD>.<ext>` in the first source's directory,
 * dated by the newest source
 */
export function suggestName(sources: ConsolidationCandidate[], kind: OpportunityKind): string {
  const [first] = sources;
  if (!first) {
    throw new RangeError('suggestName needs at least one source');
  }
  const newest = sources.reduce(
    (latest, source) => (source.createdAt > latest ? source.createdAt : latest),
    first.createdAt
  );
  const extension = posix.extname(first.path) || DEFAULT_EXTENSION;
  const name = `${slugify(primaryContext(sources))}-${kind}-${dateStamp(newest)}${extension}`;
  const dir = posix.dirname(first.path);
  return dir === '.' ? name : `${dir}/${name}`;
}

/**
 * Append -2, -3, ... before the extension until the name is free
 */
export function dedupeName(name: string, taken: ReadonlySet<string>): string {
  if (!taken.has(name)) {
    return name;
  }
  const extension = posix.extname(name);
  const stem = name.slice(0, name.length - extension.length);
  for (let n = 2; ; n++) {
    const candidate = `${stem}-${n}${extension}`;
    if (!taken.has(candidate)) {
      return candidate;
    }
  }
}
