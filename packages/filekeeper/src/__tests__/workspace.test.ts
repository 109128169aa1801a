/**
 * Workspace Tests
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigValidationException } from '../config/config-validator.js';
import { NotFoundError } from '../errors.js';
import type { Workspace } from '../workspace.js';
import { makeTempRoot, manualClock, openTestWorkspace, removeTempRoot, type ManualClock } from './helpers.js';

describe('Workspace', () => {
  let root: string;
  let time: ManualClock;
  let ws: Workspace;

  beforeEach(async () => {
    root = await makeTempRoot();
    time = manualClock();
    ws = await openTestWorkspace(root, { clock: time.clock });
  });

  afterEach(async () => {
    await ws.close();
    await removeTempRoot(root);
  });

  it('locates tracked and archived copies of a path', async () => {
    await ws.register('notes/plan.md', 'First plan');
    const record = await ws.archive('notes/plan.md');
    await ws.register('notes/plan.md', 'Second plan');

    const found = await ws.locate('./notes/plan.md');

    expect(found.tracked?.path).toBe('notes/plan.md');
    expect(found.archived.map(r => r.archiveId)).toEqual([record.archiveId]);
    await expect(ws.locate('notes/other.md')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('filters archive search by category and tag', async () => {
    await ws.register('notes/prep.md', 'Agenda for the vendor meeting', { category: 'meeting_prep', tags: ['vendor'] });
    await ws.register('notes/recap.md', 'Recap of the vendor meeting', { tags: ['vendor', 'recap'] });
    await ws.archive('notes/prep.md');
    await ws.archive('notes/recap.md');

    const byCategory = await ws.search('vendor', { category: 'meeting_prep' });
    expect(byCategory.hits.map(hit => hit.originalPath)).toEqual(['notes/prep.md']);

    const byTag = await ws.search('meeting', { tags: ['recap'] });
    expect(byTag.hits.map(hit => hit.originalPath)).toEqual(['notes/recap.md']);
    expect(byTag.hits[0]?.category).toBe('general');
  });

  it('purges an archive record from the store and the index', async () => {
    await ws.register('notes/secret.md', 'Placeholder credentials test-secret');
    const record = await ws.archive('notes/secret.md');
    time.advanceDays(1);

    const entry = await ws.purgeArchive(record.archiveId, 'contains a placeholder secret');

    expect(entry).toEqual({
      archiveId: record.archiveId,
      originalPath: 'notes/secret.md',
      contentHash: record.contentHash,
      purgedAt: '2026-03-03T09:00:00.000Z',
      reason: 'contains a placeholder secret',
    });
    expect((await ws.search('credentials')).hits).toEqual([]);
    await expect(ws.getArchiveRecord(record.archiveId)).rejects.toBeInstanceOf(NotFoundError);
    expect(await ws.listPurges()).toEqual([entry]);
  });

  it('reports stats across the store, session log and index', async () => {
    await ws.register('notes/a.md', 'Alpha');
    await ws.register('notes/b.md', 'Beta');
    await ws.archive('notes/b.md');
    await ws.recordSession(['notes/a.md'], 'success', 10);

    const stats = await ws.getStats();

    expect(stats.trackedByState).toEqual({ active: 1, aging: 0, archive_eligible: 0 });
    expect(stats.archived).toBe(1);
    expect(stats.archivedByReason).toEqual({ manual: 1 });
    expect(stats.sessions).toBe(1);
    expect(stats.indexSegments).toHaveLength(8);
  });

  it('explains a score without tracking anything', async () => {
    const factors = ws.explainScore('Short note', { generationMode: 'minimal' });

    expect(factors.score).toBeGreaterThanOrEqual(0);
    expect(factors.score).toBeLessThanOrEqual(4);
    expect(await ws.listFiles()).toEqual([]);
  });

  it('applies derived tuning to the sweeps and the advisor', async () => {
    for (let i = 0; i < 5; i++) {
      await ws.recordSession(['a.md', 'b.md', 'c.md', 'd.md', 'e.md', 'f.md'], 'success', 45);
    }

    expect(await ws.applyTuning()).toEqual({
      temporalWindowMinutes: 45,
      similarityThreshold: 0.65,
      agingMultiplier: 0.8,
    });
    expect(ws.consolidation.similarityThreshold).toBe(0.65);
  });
});

describe('Workspace.open', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempRoot();
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('reads the workspace config file', async () => {
    await mkdir(join(root, '.filekeeper'), { recursive: true });
    await writeFile(join(root, '.filekeeper', 'config.json'), JSON.stringify({ index: { segments: 3 } }));

    const ws = await openTestWorkspace(root);
    try {
      expect(ws.config.index.segments).toBe(3);
      expect((await ws.getStats()).indexSegments).toHaveLength(3);
    } finally {
      await ws.close();
    }
  });

  it('validates overrides', async () => {
    await expect(
      openTestWorkspace(root, { overrides: { lifecycle: { protectScore: 12 } } })
    ).rejects.toBeInstanceOf(ConfigValidationException);
  });
});
