/**
 * Tuning derivation
 *
 * Turns insights into parameters for the lifecycle manager and the
 * consolidation advisor. An insight below MIN_CONFIDENCE (fewer than five
 * samples) leaves its parameter at the base value.
 */

import type { PatternInsight, TuningParameters } from '../types/index.js';

export const MIN_CONFIDENCE = 0.5;

const WINDOW_BOUNDS = { min: 15, max: 480 };
const THRESHOLD_BOUNDS = { min: 0.5, max: 0.95 };
const THRESHOLD_STEP = 0.05;

export const BUSY_SESSION_FILES = 5;
const SPARSE_SESSION_FILES = 2;
const BUSY_MULTIPLIER = 0.8;
const SPARSE_MULTIPLIER = 1.25;

function clamp(value: number, bounds: { min: number; max: number }): number {
  return Math.min(bounds.max, Math.max(bounds.min, value));
}

function find<K extends PatternInsight['value']['kind']>(
  insights: PatternInsight[],
  kind: K
): Extract<PatternInsight['value'], { kind: K }> | null {
  for (const insight of insights) {
    if (insight.confidence < MIN_CONFIDENCE) continue;
    if (isKind(insight.value, kind)) {
      return insight.value;
    }
  }
  return null;
}

function isKind<K extends PatternInsight['value']['kind']>(
  value: PatternInsight['value'],
  kind: K
): value is Extract<PatternInsight['value'], { kind: K }> {
  return value.kind === kind;
}

/**
 * - temporal window: the median session length, within 15 - 480 minutes
 * - similarity threshold: lowered when most sessions succeed, raised when
 *   fewer than half do
 * - aging multiplier: busy sessions (more than five files) age files
 *   faster, sparse ones (fewer than two) slower
 */
export function deriveTuning(insights: PatternInsight[], base: TuningParameters): TuningParameters {
  const tuning = { ...base };

  const timing = find(insights, 'timing');
  if (timing && timing.medianDurationMinutes > 0) {
    tuning.temporalWindowMinutes = clamp(Math.round(timing.medianDurationMinutes), WINDOW_BOUNDS);
  }

  const outcome = find(insights, 'outcome');
  if (outcome) {
    if (outcome.successRate >= 0.8) {
      tuning.similarityThreshold = base.similarityThreshold - THRESHOLD_STEP;
    } else if (outcome.successRate < 0.5) {
      tuning.similarityThreshold = base.similarityThreshold + THRESHOLD_STEP;
    }
    tuning.similarityThreshold =
      Math.round(clamp(tuning.similarityThreshold, THRESHOLD_BOUNDS) * 100) / 100;
  }

  const content = find(insights, 'content');
  if (content) {
    if (content.meanFilesPerSession > BUSY_SESSION_FILES) {
      tuning.agingMultiplier = BUSY_MULTIPLIER;
    } else if (content.meanFilesPerSession < SPARSE_SESSION_FILES) {
      tuning.agingMultiplier = SPARSE_MULTIPLIER;
    }
  }

  return tuning;
}
