/**
 * Session history and pattern insight types
 */

export type SessionOutcome = 'success' | 'partial' | 'abandoned';

export const SESSION_OUTCOMES: readonly SessionOutcome[] = ['success', 'partial', 'abandoned'];

export function isSessionOutcome(value: string): value is SessionOutcome {
  return SESSION_OUTCOMES.some(outcome => outcome === value);
}

/**
 * One entry of the append-only session log
 */
export interface SessionRecord {
  sessionId: string;
  recordedAt: string;
  files: string[];
  outcome: SessionOutcome;
  durationMinutes: number;
}

export type InsightKind = 'workflow' | 'timing' | 'content' | 'outcome';

/**
 * Kind-specific computed values
 */
export type InsightValue =
  | { kind: 'timing'; medianDurationMinutes: number }
  | { kind: 'workflow'; sequence: [string, string]; occurrences: number }
  | { kind: 'content'; meanFilesPerSession: number }
  | { kind: 'outcome'; successRate: number };

export interface PatternInsight {
  kind: InsightKind;
  sampleCount: number;
  value: InsightValue;
  /** n / (n + 5) */
  confidence: number;
  /** Timestamp of the newest session the insight was computed from */
  generatedAt: string;
}

/**
 * A workflow change suggested by a confident insight
 */
export interface WorkflowSuggestion {
  kind: InsightKind;
  message: string;
  confidence: number;
}

/**
 * A published set of insights, retained for audit
 */
export interface InsightGeneration {
  id: string;
  publishedAt: string;
  insights: PatternInsight[];
}

/**
 * Parameters consumed by the lifecycle manager and consolidation advisor
 */
export interface TuningParameters {
  temporalWindowMinutes: number;
  similarityThreshold: number;
  /** Scales the aging and archive thresholds */
  agingMultiplier: number;
}
