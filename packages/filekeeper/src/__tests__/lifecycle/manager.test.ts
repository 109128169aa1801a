/**
 * Lifecycle Manager Tests
 *
 * Registration, access, sweeps and archival through a workspace over a
 * temporary root, with the store and index in memory.
 */

import { readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConflictError, NotFoundError, StorageFailureError, ValidationFailureError } from '../../errors.js';
import { hashContent } from '../../utils/hash.js';
import { addDays } from '../../utils/time.js';
import type { Workspace } from '../../workspace.js';
import { manualClock, makeTempRoot, openTestWorkspace, removeTempRoot, T0, type ManualClock } from '../helpers.js';

describe('LifecycleManager', () => {
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

  describe('register', () => {
    it('tracks a minimal file as active with a score in the minimal band', async () => {
      const file = await ws.register('notes/quick.md', 'Quick note.', { generationMode: 'minimal' });

      expect(file.state).toBe('active');
      expect(file.retentionScore).toBeGreaterThanOrEqual(0);
      expect(file.retentionScore).toBeLessThanOrEqual(4);
      expect(file.createdAt).toBe(T0);
      expect(await readFile(join(root, 'notes/quick.md'), 'utf8')).toBe('Quick note.');

      const events = await ws.listEvents('notes/quick.md');
      expect(events.map(e => [e.from, e.to, e.reason])).toEqual([['created', 'active', 'registered']]);
    });

    it('normalizes paths and tags', async () => {
      const file = await ws.register('./notes//plan.md', 'Plan', { tags: ['Budget', ' q3 ', 'budget', ''] });
      expect(file.path).toBe('notes/plan.md');
      expect(file.tags).toEqual(['budget', 'q3']);
    });

    it('rejects different content without update intent and keeps the working copy', async () => {
      await ws.register('notes/a.md', 'first draft');

      await expect(ws.register('notes/a.md', 'second draft')).rejects.toBeInstanceOf(ConflictError);
      expect(await readFile(join(root, 'notes/a.md'), 'utf8')).toBe('first draft');
      expect((await ws.getFile('notes/a.md')).contentHash).toBe(hashContent('first draft'));
    });

    it('replaces content with update intent and keeps the creation time', async () => {
      const first = await ws.register('notes/a.md', 'first draft');
      time.advanceDays(1);

      const updated = await ws.register('notes/a.md', 'second draft', { update: true });

      expect(updated.contentHash).not.toBe(first.contentHash);
      expect(updated.createdAt).toBe(T0);
      expect(updated.lastModifiedAt).toBe(time.now());
      expect(await readFile(join(root, 'notes/a.md'), 'utf8')).toBe('second draft');
    });

    it('counts identical content as an access', async () => {
      await ws.register('notes/a.md', 'same');
      time.advanceDays(15);
      await ws.runAgingSweep();
      expect((await ws.getFile('notes/a.md')).state).toBe('aging');

      const again = await ws.register('notes/a.md', 'same');

      expect(again.state).toBe('active');
      expect(again.lastAccessedAt).toBe(time.now());
    });

    it('rejects paths outside the workspace or inside the data directory', async () => {
      await expect(ws.register('../outside.md', 'x')).rejects.toBeInstanceOf(ValidationFailureError);
      await expect(ws.register('/etc/passwd', 'x')).rejects.toBeInstanceOf(ValidationFailureError);
      await expect(ws.register('.filekeeper/metadata.db', 'x')).rejects.toBeInstanceOf(ValidationFailureError);
      await expect(ws.register('', 'x')).rejects.toBeInstanceOf(ValidationFailureError);
    });
  });

  describe('aging sweep', () => {
    it('moves an idle file to aging, and an access brings it back to active', async () => {
      await ws.register('notes/standup.md', 'Standup notes.');
      time.advanceDays(15);

      const sweep = await ws.runAgingSweep();
      expect(sweep).toEqual({
        skipped: false,
        result: { examined: 1, toAging: 1, toArchiveEligible: 0, interrupted: false, errors: [] },
      });
      expect((await ws.getFile('notes/standup.md')).state).toBe('aging');

      const touched = await ws.touch('notes/standup.md');
      expect(touched.state).toBe('active');
      expect(touched.lastAccessedAt).toBe(time.now());

      const events = await ws.listEvents('notes/standup.md');
      expect(events.map(e => [e.from, e.to, e.reason])).toEqual([
        ['created', 'active', 'registered'],
        ['active', 'aging', 'idle 15.0 days'],
        ['aging', 'active', 'accessed'],
      ]);
    });

    it('leaves a file alone until the threshold is exceeded', async () => {
      await ws.register('notes/standup.md', 'Standup notes.');
      time.advanceDays(14);

      const sweep = await ws.runAgingSweep();

      expect(sweep.skipped).toBe(false);
      expect((await ws.getFile('notes/standup.md')).state).toBe('active');
    });

    it('moves a file idle past both thresholds through both in one sweep', async () => {
      await ws.register('notes/standup.md', 'Standup notes.');
      time.advanceDays(31);

      const sweep = await ws.runAgingSweep();

      expect(sweep.skipped ? null : sweep.result).toMatchObject({ toAging: 1, toArchiveEligible: 1 });
      expect((await ws.getFile('notes/standup.md')).state).toBe('archive_eligible');
    });

    it('never ages a protected file', async () => {
      const file = await ws.register('notes/board.md', 'Board pack', {
        generationMode: 'research',
        retentionDays: 3650,
      });
      expect(file.retentionScore).toBe(10);
      time.advanceDays(400);

      await ws.runAgingSweep();

      expect((await ws.getFile('notes/board.md')).state).toBe('active');
      expect((await ws.getLifecycleStatus('notes/board.md')).nextTransition).toBeNull();
    });

    it('skips a second sweep that starts while one is running', async () => {
      await ws.register('notes/standup.md', 'Standup notes.');
      const [first, second] = await Promise.all([ws.runAgingSweep(), ws.runAgingSweep()]);
      expect(first.skipped).toBe(false);
      expect(second).toEqual({ skipped: true });
    });

    it('stops at the next file once interrupted', async () => {
      await ws.register('notes/a.md', 'a');
      time.advanceDays(20);
      const controller = new AbortController();
      controller.abort();

      const sweep = await ws.runAgingSweep({ signal: controller.signal });

      expect(sweep.skipped ? null : sweep.result).toMatchObject({ examined: 0, interrupted: true });
      expect((await ws.getFile('notes/a.md')).state).toBe('active');
    });

    it('ages files faster under a tuned multiplier', async () => {
      await ws.register('notes/standup.md', 'Standup notes.');
      ws.lifecycle.applyTuning({ agingMultiplier: 0.5 });
      time.advanceDays(8);

      await ws.runAgingSweep();

      expect((await ws.getFile('notes/standup.md')).state).toBe('aging');
    });
  });

  describe('archival', () => {
    it('archives archive-eligible files in the archive sweep', async () => {
      await ws.register('notes/standup.md', 'Standup notes about the migration.', {
        tags: ['team'],
        category: 'meeting_notes',
      });
      time.advanceDays(31);
      await ws.runAgingSweep();

      const sweep = await ws.runArchiveSweep();

      expect(sweep.skipped).toBe(false);
      const archived = sweep.skipped ? [] : sweep.result.archived;
      expect(archived).toHaveLength(1);

      const record = await ws.getArchiveRecord(archived[0] ?? '');
      expect(record).toMatchObject({
        originalPath: 'notes/standup.md',
        content: 'Standup notes about the migration.',
        tags: ['team'],
        category: 'meeting_notes',
        reason: 'sweep',
        indexedAt: time.now(),
      });
      await expect(ws.getFile('notes/standup.md')).rejects.toBeInstanceOf(NotFoundError);
      await expect(readFile(join(root, 'notes/standup.md'), 'utf8')).rejects.toThrow();

      const found = await ws.search('migration');
      expect(found.hits.map(hit => hit.archiveId)).toEqual([record.archiveId]);
    });

    it('archives manually from any state with the general category by default', async () => {
      await ws.register('notes/a.md', 'Some notes');

      const record = await ws.archive('notes/a.md');

      expect(record.reason).toBe('manual');
      expect(record.category).toBe('general');
      expect(record.archivedAt).toBe(T0);
      const events = await ws.listEvents('notes/a.md');
      expect(events.at(-1)).toMatchObject({ from: 'active', to: 'archived', archiveId: record.archiveId });
    });

    it('lets exactly one of two concurrent archives of a path succeed', async () => {
      await ws.register('notes/a.md', 'Some notes');

      const results = await Promise.allSettled([ws.archive('notes/a.md'), ws.archive('notes/a.md')]);

      expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.reason).toBeInstanceOf(NotFoundError);
      expect(await ws.listArchiveRecords()).toHaveLength(1);
    });

    it('fails with a storage error when the working copy is gone, keeping the file tracked', async () => {
      await ws.register('notes/a.md', 'Some notes');
      await rm(join(root, 'notes/a.md'));

      await expect(ws.archive('notes/a.md')).rejects.toBeInstanceOf(StorageFailureError);
      expect((await ws.getFile('notes/a.md')).state).toBe('active');
      expect(await ws.listArchiveRecords()).toHaveLength(0);
    });

    it('archives the current content when the working copy changed outside the workspace', async () => {
      await ws.register('notes/a.md', 'tracked');
      await writeFile(join(root, 'notes/a.md'), 'edited by hand');

      const record = await ws.archive('notes/a.md');

      expect(record.content).toBe('edited by hand');
    });
  });

  describe('status and rescoring', () => {
    it('reports the next transition of an active file', async () => {
      await ws.register('notes/a.md', 'Some notes');

      const status = await ws.getLifecycleStatus('notes/a.md');

      expect(status).toMatchObject({ path: 'notes/a.md', state: 'active', protected: false });
      expect(status.nextTransition).toEqual({ to: 'aging', at: addDays(T0, 14) });
    });

    it('rescores from the current working copy', async () => {
      const before = await ws.register('notes/a.md', 'Quick note.', { generationMode: 'minimal' });
      await writeFile(join(root, 'notes/a.md'), '# ROI\n\n## Budget\n\n- board review\n'.repeat(10));

      const after = await ws.rescore('notes/a.md');

      expect(after.retentionScore).toBeGreaterThan(before.retentionScore);
      expect(after.retentionScore).toBeLessThanOrEqual(4);
      expect((await ws.getFile('notes/a.md')).retentionScore).toBe(after.retentionScore);
    });

    it('keeps the score of unchanged content, importance hints included', async () => {
      const hints = { generationMode: 'professional' as const, stakeholders: ['cfo', 'board'], frameworks: ['okr', 'raci'] };
      const before = await ws.register('notes/plan.md', '# Plan\n', hints);
      const withoutHints = ws.explainScore('# Plan\n', { generationMode: 'professional' }).score;
      expect(before.retentionScore).toBeGreaterThan(withoutHints);

      const after = await ws.rescore('notes/plan.md');

      expect(after.retentionScore).toBe(before.retentionScore);
      expect((await ws.getFile('notes/plan.md')).retentionScore).toBe(before.retentionScore);
    });

    it('keeps the stored hints when content is updated without new ones', async () => {
      const hints = { generationMode: 'professional' as const, stakeholders: ['cfo', 'board'], frameworks: ['okr', 'raci'] };
      await ws.register('notes/plan.md', '# Plan\n', hints);

      const updated = await ws.register('notes/plan.md', '# Plan\n\nRevised.\n', { update: true });

      expect(updated).toMatchObject({ stakeholders: ['cfo', 'board'], frameworks: ['okr', 'raci'] });
      expect(updated.retentionScore).toBe(ws.explainScore('# Plan\n\nRevised.\n', hints).score);
    });

    it('fails with NotFoundError for an untracked path', async () => {
      await expect(ws.touch('notes/missing.md')).rejects.toBeInstanceOf(NotFoundError);
      await expect(ws.getLifecycleStatus('notes/missing.md')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('retention marks', () => {
    it('keeps a retained file active through the sweeps and reports it as protected', async () => {
      await ws.register('notes/contract.md', 'Signed contract notes.');
      const retained = await ws.retain('notes/contract.md', 'legal hold');
      expect(retained.retained).toEqual({ reason: 'legal hold', at: T0 });

      time.advanceDays(90);
      const sweep = await ws.runAgingSweep();

      expect(sweep.skipped ? null : sweep.result).toMatchObject({ toAging: 0, toArchiveEligible: 0 });
      expect((await ws.getFile('notes/contract.md')).state).toBe('active');
      expect(await ws.getLifecycleStatus('notes/contract.md')).toMatchObject({
        protected: true,
        retained: { reason: 'legal hold', at: T0 },
        nextTransition: null,
      });
    });

    it('brings an aging file back to active and logs both marks', async () => {
      await ws.register('notes/a.md', 'Some notes');
      time.advanceDays(15);
      await ws.runAgingSweep();
      expect((await ws.getFile('notes/a.md')).state).toBe('aging');

      await ws.retain('notes/a.md', 'quarter close');
      await ws.release('notes/a.md');

      const events = await ws.listEvents('notes/a.md');
      expect(events.slice(-2).map(e => [e.from, e.to, e.reason])).toEqual([
        ['aging', 'active', 'retained: quarter close'],
        ['active', 'active', 'released'],
      ]);
    });

    it('ages a released file again from its last access', async () => {
      await ws.register('notes/a.md', 'Some notes');
      await ws.retain('notes/a.md', 'review');
      time.advanceDays(20);
      await ws.runAgingSweep();
      expect((await ws.getFile('notes/a.md')).state).toBe('active');

      const released = await ws.release('notes/a.md');
      expect(released.retained).toBeUndefined();
      await ws.runAgingSweep();

      expect((await ws.getFile('notes/a.md')).state).toBe('aging');
      expect((await ws.getLifecycleStatus('notes/a.md')).retained).toBeNull();
    });

    it('still archives a retained file on request', async () => {
      await ws.register('notes/a.md', 'Some notes');
      await ws.retain('notes/a.md', 'review');

      const record = await ws.archive('notes/a.md');

      expect(record.originalPath).toBe('notes/a.md');
      await expect(ws.getFile('notes/a.md')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('requires a reason', async () => {
      await ws.register('notes/a.md', 'Some notes');
      await expect(ws.retain('notes/a.md', '  ')).rejects.toThrow('retain notes/a.md: reason must not be empty');
      await expect(ws.retain('notes/missing.md', 'review')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
