/**
 * Lifecycle transition rule tests
 */

import { describe, it, expect } from 'vitest';
import {
  agingThresholdDays,
  archiveThresholdDays,
  dueTransition,
  estimateNextTransition,
  isProtected,
  isValidTransition,
  type LifecycleThresholds,
} from '../../lifecycle/transitions.js';
import type { TrackedFile } from '../../types/index.js';
import { addDays } from '../../utils/time.js';

const T0 = '2026-03-02T09:00:00.000Z';

const thresholds: LifecycleThresholds = {
  agingAfterDays: 14,
  archiveAfterDays: 30,
  protectScore: 8.5,
  agingMultiplier: 1,
};

function file(overrides: Partial<TrackedFile> = {}): TrackedFile {
  return {
    path: 'notes/standup.md',
    contentHash: 'hash',
    createdAt: T0,
    lastAccessedAt: T0,
    lastModifiedAt: T0,
    retentionScore: 4,
    state: 'active',
    generationMode: 'professional',
    tags: [],
    ...overrides,
  };
}

describe('isValidTransition', () => {
  it('allows the forward path and a return to active', () => {
    expect(isValidTransition('created', 'active')).toBe(true);
    expect(isValidTransition('active', 'aging')).toBe(true);
    expect(isValidTransition('aging', 'archive_eligible')).toBe(true);
    expect(isValidTransition('aging', 'active')).toBe(true);
    expect(isValidTransition('archive_eligible', 'active')).toBe(true);
    expect(isValidTransition('archive_eligible', 'archived')).toBe(true);
  });

  it('treats archived as terminal', () => {
    expect(isValidTransition('archived', 'active')).toBe(false);
    expect(isValidTransition('archived', 'aging')).toBe(false);
  });

  it('does not skip aging', () => {
    expect(isValidTransition('active', 'archive_eligible')).toBe(false);
  });
});

describe('dueTransition', () => {
  it('waits until the aging threshold has been exceeded', () => {
    expect(dueTransition(file(), addDays(T0, 14), thresholds)).toBeNull();
    expect(dueTransition(file(), addDays(T0, 14.5), thresholds)).toBe('aging');
  });

  it('moves aging files after the archive threshold', () => {
    const aging = file({ state: 'aging' });
    expect(dueTransition(aging, addDays(T0, 30), thresholds)).toBeNull();
    expect(dueTransition(aging, addDays(T0, 31), thresholds)).toBe('archive_eligible');
  });

  it('extends the archive threshold by a longer retention hint', () => {
    const aging = file({ state: 'aging', retentionDays: 60 });
    expect(archiveThresholdDays(aging, thresholds)).toBe(60);
    expect(dueTransition(aging, addDays(T0, 45), thresholds)).toBeNull();
    expect(dueTransition(aging, addDays(T0, 61), thresholds)).toBe('archive_eligible');
  });

  it('never ages a protected file', () => {
    const keeper = file({ retentionScore: 9 });
    expect(isProtected(keeper, thresholds)).toBe(true);
    expect(dueTransition(keeper, addDays(T0, 365), thresholds)).toBeNull();
  });

  it('leaves archive-eligible files to the archive sweep', () => {
    expect(dueTransition(file({ state: 'archive_eligible' }), addDays(T0, 365), thresholds)).toBeNull();
  });

  it('scales both thresholds by the aging multiplier', () => {
    const faster = { ...thresholds, agingMultiplier: 0.5 };
    expect(agingThresholdDays(faster)).toBe(7);
    expect(archiveThresholdDays(file(), faster)).toBe(15);
    expect(dueTransition(file(), addDays(T0, 8), faster)).toBe('aging');
  });
});

describe('estimateNextTransition', () => {
  it('estimates aging for an active file', () => {
    expect(estimateNextTransition(file(), thresholds)).toEqual({ to: 'aging', at: addDays(T0, 14) });
  });

  it('estimates eligibility for an aging file', () => {
    expect(estimateNextTransition(file({ state: 'aging' }), thresholds)).toEqual({
      to: 'archive_eligible',
      at: addDays(T0, 30),
    });
  });

  it('has no time for an archive-eligible file', () => {
    expect(estimateNextTransition(file({ state: 'archive_eligible' }), thresholds)).toEqual({
      to: 'archived',
      at: null,
    });
  });

  it('has no estimate for a protected file', () => {
    expect(estimateNextTransition(file({ retentionScore: 8.5 }), thresholds)).toBeNull();
  });
});
