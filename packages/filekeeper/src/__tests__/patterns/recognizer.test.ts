/**
 * Pattern Recognizer Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ValidationFailureError } from '../../errors.js';
import { PatternRecognizer } from '../../patterns/recognizer.js';
import { SQLiteSessionLog } from '../../patterns/storage/sqlite.js';
import { createMetadataStore } from '../../storage/factory.js';
import type { SQLiteMetadataStore } from '../../storage/sqlite/metadata-store.js';
import { manualClock, type ManualClock } from '../helpers.js';

describe('PatternRecognizer', () => {
  let store: SQLiteMetadataStore;
  let log: SQLiteSessionLog;
  let time: ManualClock;
  let recognizer: PatternRecognizer;

  beforeEach(async () => {
    store = await createMetadataStore(':memory:');
    log = new SQLiteSessionLog(store.database);
    time = manualClock();
    recognizer = new PatternRecognizer(log, { clock: time.clock });
  });

  afterEach(async () => {
    await store.close();
  });

  it('records sessions in append order', async () => {
    const first = await recognizer.recordSession(['notes/a.md'], 'success', 20, { sessionId: 'sess_one' });
    time.advanceSeconds(60);
    await recognizer.recordSession(['notes/b.md', 'notes/c.md'], 'partial', 35);

    expect(first).toEqual({
      sessionId: 'sess_one',
      recordedAt: '2026-03-02T09:00:00.000Z',
      files: ['notes/a.md'],
      outcome: 'success',
      durationMinutes: 20,
    });

    const sessions = await log.list();
    expect(sessions.map(s => s.outcome)).toEqual(['success', 'partial']);
    expect(sessions[1]?.files).toEqual(['notes/b.md', 'notes/c.md']);
    expect(sessions[1]?.sessionId).toMatch(/^sess_/);
    expect(await log.count()).toBe(2);
  });

  it('rejects invalid sessions', async () => {
    await expect(recognizer.recordSession(['a.md'], 'success', -1)).rejects.toBeInstanceOf(ValidationFailureError);
    await expect(recognizer.recordSession([' '], 'success', 5)).rejects.toThrow('Invalid session');
    expect(await log.count()).toBe(0);
  });

  it('rejects a duplicate session id', async () => {
    await recognizer.recordSession(['a.md'], 'success', 5, { sessionId: 'sess_dup' });
    await expect(recognizer.recordSession(['b.md'], 'success', 5, { sessionId: 'sess_dup' })).rejects.toThrow();
    expect(await log.count()).toBe(1);
  });

  it('publishes insight generations that read back intact', async () => {
    await recognizer.recordSession(['notes/meeting-prep.md', 'notes/budget-plan.md'], 'success', 30);
    const first = await recognizer.publishInsights();
    time.advanceSeconds(3600);
    await recognizer.recordSession(['notes/draft.md'], 'abandoned', 10);
    const second = await recognizer.publishInsights();

    expect(first.publishedAt).toBe('2026-03-02T09:00:00.000Z');
    expect(second.publishedAt).toBe('2026-03-02T10:00:00.000Z');

    const generations = await recognizer.listGenerations();
    expect(generations.map(g => g.id)).toEqual([first.id, second.id]);
    expect(generations[0]?.insights).toEqual(first.insights);
    expect(generations[1]?.insights).toEqual(second.insights);
    expect(second.insights.find(i => i.kind === 'outcome')?.value).toEqual({ kind: 'outcome', successRate: 0.5 });
  });
});
