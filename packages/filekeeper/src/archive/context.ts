/**
 * Archive context
 *
 * Labels an archived file with the business, stakeholder, budget,
 * strategy, team, platform and technical themes its content mentions, and
 * cuts a short summary from its headings and leading prose. Both are
 * derived from content at ingestion and rebuilt by a reindex.
 */

import type { ArchiveContext } from '../types/index.js';

interface ContextRule {
  label: string;
  /** Lowercase words or phrases, matched on word boundaries */
  terms: readonly string[];
}

const CONTEXT_RULES: readonly ContextRule[] = [
  { label: 'platform-migration', terms: ['migration', 'migrate'] },
  { label: 'platform-scaling', terms: ['scaling', 'scale'] },
  { label: 'platform-architecture', terms: ['architecture'] },
  { label: 'infrastructure', terms: ['infrastructure'] },
  { label: 'team-hiring', terms: ['hiring', 'recruitment'] },
  { label: 'team-structure', terms: ['org chart', 'organization', 'reorg'] },
  { label: 'team-performance', terms: ['performance review'] },
  { label: 'strategic-roadmap', terms: ['roadmap'] },
  { label: 'strategic-vision', terms: ['vision'] },
  { label: 'strategic-objectives', terms: ['okr', 'okrs', 'objectives'] },
  { label: 'quarterly-strategy', terms: ['quarterly'] },
  { label: 'executive-communication', terms: ['executive', 'executives', 'exec'] },
  { label: 'board-presentation', terms: ['board'] },
  { label: 'leadership-alignment', terms: ['leadership'] },
  { label: 'stakeholder-management', terms: ['stakeholder', 'stakeholders'] },
  { label: 'roi-analysis', terms: ['roi', 'return on investment'] },
  { label: 'budget-planning', terms: ['budget', 'budgets'] },
  { label: 'cost-analysis', terms: ['cost', 'costs'] },
  { label: 'investment-strategy', terms: ['investment', 'investments'] },
  { label: 'technical-debt', terms: ['technical debt', 'tech debt'] },
  { label: 'technical-implementation', terms: ['implementation'] },
  { label: 'technical-framework', terms: ['framework', 'frameworks'] },
];

const SUMMARY_SCAN_LINES = 20;
const SUMMARY_MAX_CHARS = 300;
const MIN_PROSE_CHARS = 20;

function mentions(text: string, term: string): boolean {
  let from = 0;
  for (;;) {
    const at = text.indexOf(term, from);
    if (at < 0) {
      return false;
    }
    const before = at === 0 ? '' : text.charAt(at - 1);
    const after = text.charAt(at + term.length);
    if (!/[a-z0-9]/.test(before) && !/[a-z0-9]/.test(after)) {
      return true;
    }
    from = at + 1;
  }
}

/**
 * Context labels in rule order; empty when nothing matched
 */
export function extractContextLabels(content: string): string[] {
  const text = content.toLowerCase().replace(/\s+/g, ' ');
  return CONTEXT_RULES.filter(rule => rule.terms.some(term => mentions(text, term))).map(
    rule => rule.label
  );
}

/**
 * Headings, emphasized lines and prose lines from the top of the file,
 * joined and cut to 300 characters
 */
export function summarize(content: string): string {
  const parts: string[] = [];
  for (const raw of content.split('\n').slice(0, SUMMARY_SCAN_LINES)) {
    const line = raw.trim();
    if (line.startsWith('#') || line.startsWith('*')) {
      const text = line.replace(/[#*]/g, '').trim();
      if (text !== '') parts.push(text);
    } else if (line.length > MIN_PROSE_CHARS) {
      parts.push(line);
    }
  }
  const summary = parts.join(' ');
  return summary.length > SUMMARY_MAX_CHARS ? `${summary.slice(0, SUMMARY_MAX_CHARS)}...` : summary;
}

export function extractContext(content: string): ArchiveContext {
  return { labels: extractContextLabels(content), summary: summarize(content) };
}
