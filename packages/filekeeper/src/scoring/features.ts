/**
 * Content feature extraction for retention scoring
 */

import { words } from '../utils/tokens.js';
import { SIGNAL_TERMS } from './mode-bands.js';

export interface ContentFeatures {
  /** Characters */
  length: number;
  headings: number;
  listItems: number;
  tableRows: number;
  codeBlocks: number;
  links: number;
  /** Signal terms present, sorted */
  signalTerms: string[];
}

export function extractFeatures(content: string): ContentFeatures {
  const lines = content.split('\n');
  let headings = 0;
  let listItems = 0;
  let tableRows = 0;
  let fences = 0;

  for (const raw of lines) {
    const line = raw.trim();
    if (/^#{1,6}\s/.test(line)) headings++;
    else if (/^([-*+]|\d+\.)\s/.test(line)) listItems++;
    else if (/^\|.*\|$/.test(line)) tableRows++;
    if (line.startsWith('```')) fences++;
  }

  const tokens = new Set(words(content));
  const signalTerms = Object.keys(SIGNAL_TERMS).filter(term => tokens.has(term)).sort();

  return {
    length: content.length,
    headings,
    listItems,
    tableRows,
    codeBlocks: Math.floor(fences / 2),
    links: (content.match(/\[[^\]]+\]\([^)]+\)/g) ?? []).length,
    signalTerms,
  };
}
