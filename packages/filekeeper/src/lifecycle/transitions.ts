/**
 * Lifecycle transitions
 *
 * Pure rules for when a tracked file moves to its next state.
 */

import type { LifecycleConfig } from '../config/types.js';
import type {
  LifecycleState,
  NextTransitionEstimate,
  PersistedState,
  TrackedFile,
} from '../types/index.js';
import { addDays, daysBetween } from '../utils/time.js';

/**
 * Lifecycle thresholds after tuning
 */
export interface LifecycleThresholds extends LifecycleConfig {
  /** Scales both day thresholds; 1 leaves them as configured */
  agingMultiplier: number;
}

const VALID_TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  created: ['active'],
  active: ['aging', 'archived'],
  aging: ['active', 'archive_eligible', 'archived'],
  archive_eligible: ['active', 'archived'],
  archived: [],
};

export function isValidTransition(from: LifecycleState, to: LifecycleState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * A protected file stays active until it is archived explicitly: its score
 * reached the protect ceiling, or the user retained it.
 */
export function isProtected(
  file: Pick<TrackedFile, 'retentionScore' | 'retained'>,
  thresholds: LifecycleThresholds
): boolean {
  return file.retained !== undefined || file.retentionScore >= thresholds.protectScore;
}

export function agingThresholdDays(thresholds: LifecycleThresholds): number {
  return thresholds.agingAfterDays * thresholds.agingMultiplier;
}

/**
 * Idle days before an aging file becomes archive-eligible. A retention-days
 * hint longer than the configured threshold extends it.
 */
export function archiveThresholdDays(
  file: Pick<TrackedFile, 'retentionDays'>,
  thresholds: LifecycleThresholds
): number {
  return Math.max(thresholds.archiveAfterDays * thresholds.agingMultiplier, file.retentionDays ?? 0);
}

/**
 * The automatic transition due at `now`, if any
 */
export function dueTransition(
  file: TrackedFile,
  now: string | Date,
  thresholds: LifecycleThresholds
): PersistedState | null {
  if (file.retained) {
    return null;
  }
  const idleDays = daysBetween(file.lastAccessedAt, now);
  switch (file.state) {
    case 'active':
      if (isProtected(file, thresholds)) {
        return null;
      }
      return idleDays > agingThresholdDays(thresholds) ? 'aging' : null;
    case 'aging':
      return idleDays > archiveThresholdDays(file, thresholds) ? 'archive_eligible' : null;
    case 'archive_eligible':
      return null;
  }
}

/**
 * When the next automatic transition becomes due. Archive-eligible files
 * wait for an archive sweep, so their estimate has no time.
 */
export function estimateNextTransition(
  file: TrackedFile,
  thresholds: LifecycleThresholds
): NextTransitionEstimate | null {
  if (file.retained) {
    return null;
  }
  switch (file.state) {
    case 'active':
      if (isProtected(file, thresholds)) {
        return null;
      }
      return { to: 'aging', at: addDays(file.lastAccessedAt, agingThresholdDays(thresholds)) };
    case 'aging':
      return {
        to: 'archive_eligible',
        at: addDays(file.lastAccessedAt, archiveThresholdDays(file, thresholds)),
      };
    case 'archive_eligible':
      return { to: 'archived', at: null };
  }
}
