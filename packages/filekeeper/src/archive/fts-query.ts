/**
 * FTS5 query building
 */

import { words } from '../utils/tokens.js';

/**
 * Build an FTS5 MATCH expression from free text. Tokens are quoted and
 * OR-ed, so user input can never produce FTS syntax errors. Returns null
 * when the text has no searchable tokens.
 */
export function buildFtsQuery(text: string): string | null {
  const tokens = [...new Set(words(text))];
  if (tokens.length === 0) {
    return null;
  }
  return tokens.map(token => `"${token}"`).join(' OR ');
}

/**
 * Snippet text with the highlight brackets removed, lowercased
 */
export function plainSnippet(snippet: string): string {
  return snippet.replace(/[[\]]/g, '').toLowerCase();
}
