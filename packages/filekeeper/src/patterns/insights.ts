/**
 * Insight computation
 *
 * A pure function of the session log. Nothing here reads the clock or live
 * file state: the same log always yields the same insights, including
 * their timestamps.
 */

import { posix } from 'node:path';

import type { PatternInsight, SessionRecord } from '../types/index.js';

const CONFIDENCE_PRIOR = 5;

export function insightConfidence(sampleCount: number): number {
  return round(sampleCount / (sampleCount + CONFIDENCE_PRIOR), 4);
}

function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length === 0) return 0;
  if (sorted.length % 2 === 1) return sorted[mid] ?? 0;
  return ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;
}

/**
 * Kind of a file for workflow analysis: the first word of its name,
 * e.g. `notes/meeting-prep-0612.md` is a `meeting` file
 */
export function fileKind(path: string): string {
  const base = posix.basename(path.replace(/\\/g, '/'));
  const stem = base.slice(0, base.length - posix.extname(base).length);
  const word = stem.toLowerCase().match(/[a-z]+/);
  if (word) return word[0];
  const extension = posix.extname(base).slice(1).toLowerCase();
  return extension || 'file';
}

/**
 * Most frequent consecutive pair of file kinds across sessions; ties go to
 * the lexicographically smaller pair
 */
function mostFrequentTransition(
  sessions: SessionRecord[]
): { sequence: [string, string]; occurrences: number; samples: number } | null {
  const counts = new Map<string, { sequence: [string, string]; occurrences: number }>();
  let samples = 0;

  for (const session of sessions) {
    if (session.files.length < 2) continue;
    samples++;
    const kinds = session.files.map(fileKind);
    for (let i = 1; i < kinds.length; i++) {
      const from = kinds[i - 1] ?? '';
      const to = kinds[i] ?? '';
      const key = `${from}\u0000${to}`;
      const entry = counts.get(key) ?? { sequence: [from, to], occurrences: 0 };
      entry.occurrences++;
      counts.set(key, entry);
    }
  }

  let best: { sequence: [string, string]; occurrences: number } | null = null;
  for (const [, entry] of [...counts].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (!best || entry.occurrences > best.occurrences) {
      best = entry;
    }
  }
  return best ? { ...best, samples } : null;
}

export function computeInsights(sessions: SessionRecord[]): PatternInsight[] {
  if (sessions.length === 0) {
    return [];
  }

  const n = sessions.length;
  const generatedAt = sessions.reduce(
    (latest, session) => (session.recordedAt > latest ? session.recordedAt : latest),
    sessions[0]?.recordedAt ?? ''
  );
  const insights: PatternInsight[] = [];

  insights.push({
    kind: 'timing',
    sampleCount: n,
    value: { kind: 'timing', medianDurationMinutes: round(median(sessions.map(s => s.durationMinutes))) },
    confidence: insightConfidence(n),
    generatedAt,
  });

  const transition = mostFrequentTransition(sessions);
  if (transition) {
    insights.push({
      kind: 'workflow',
      sampleCount: transition.samples,
      value: { kind: 'workflow', sequence: transition.sequence, occurrences: transition.occurrences },
      confidence: insightConfidence(transition.samples),
      generatedAt,
    });
  }

  const totalFiles = sessions.reduce((sum, s) => sum + s.files.length, 0);
  insights.push({
    kind: 'content',
    sampleCount: n,
    value: { kind: 'content', meanFilesPerSession: round(totalFiles / n) },
    confidence: insightConfidence(n),
    generatedAt,
  });

  const successes = sessions.filter(s => s.outcome === 'success').length;
  insights.push({
    kind: 'outcome',
    sampleCount: n,
    value: { kind: 'outcome', successRate: round(successes / n, 4) },
    confidence: insightConfidence(n),
    generatedAt,
  });

  return insights;
}
