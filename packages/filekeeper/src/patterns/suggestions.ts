/**
 * Workflow suggestions
 *
 * Reads computed insights and proposes changes to how sessions produce
 * files. Like tuning, an insight below MIN_CONFIDENCE suggests nothing.
 */

import type { PatternInsight, WorkflowSuggestion } from '../types/index.js';
import { BUSY_SESSION_FILES, MIN_CONFIDENCE } from './tuning.js';

const REPEATED_TRANSITIONS = 2;
const LONG_SESSION_MINUTES = 120;
const LOW_SUCCESS_RATE = 0.5;

function suggestionFor(insight: PatternInsight): string | null {
  const value = insight.value;
  switch (value.kind) {
    case 'workflow': {
      if (value.occurrences < REPEATED_TRANSITIONS) return null;
      const [from, to] = value.sequence;
      return from === to
        ? `${from} files often follow one another (${value.occurrences}x); consider consolidating them into one ${from} file`
        : `${from} files are usually followed by ${to} files (${value.occurrences}x); consider a combined ${from}-${to} template`;
    }
    case 'timing':
      return value.medianDurationMinutes > LONG_SESSION_MINUTES
        ? `Sessions run a median of ${value.medianDurationMinutes} minutes; consider splitting long sessions at natural breaks`
        : null;
    case 'content':
      return value.meanFilesPerSession > BUSY_SESSION_FILES
        ? `Sessions produce ${value.meanFilesPerSession} files on average; review consolidation opportunities after each session`
        : null;
    case 'outcome':
      return value.successRate < LOW_SUCCESS_RATE
        ? `Only ${Math.round(value.successRate * 100)}% of sessions succeed; review what abandoned sessions leave behind`
        : null;
  }
}

/**
 * One suggestion per confident insight that calls for a change, in insight
 * order
 */
export function suggestWorkflowOptimizations(insights: PatternInsight[]): WorkflowSuggestion[] {
  const suggestions: WorkflowSuggestion[] = [];
  for (const insight of insights) {
    if (insight.confidence < MIN_CONFIDENCE) continue;
    const message = suggestionFor(insight);
    if (message !== null) {
      suggestions.push({ kind: insight.kind, message, confidence: insight.confidence });
    }
  }
  return suggestions;
}
