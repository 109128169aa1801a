/**
 * Consolidation Advisor Tests
 */

import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ArchiveIndex } from '../../archive/archive-index.js';
import { IndexIngestion } from '../../archive/ingestion.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { ConsolidationAdvisor } from '../../consolidation/advisor.js';
import type { ConsolidationCandidate, SimilarityScorer } from '../../consolidation/similarity.js';
import { ConflictError, ValidationFailureError } from '../../errors.js';
import { LifecycleManager } from '../../lifecycle/manager.js';
import { PathLocks } from '../../lifecycle/path-locks.js';
import type { ConsolidationCommit } from '../../storage/interface.js';
import { SQLiteMetadataStore } from '../../storage/sqlite/metadata-store.js';
import type { SimilarityBreakdown } from '../../types/index.js';
import type { Workspace } from '../../workspace.js';
import { WorkspaceFiles } from '../../workspace/files.js';
import { makeTempRoot, manualClock, openTestWorkspace, removeTempRoot, T0, type ManualClock } from '../helpers.js';

const BUDGET = 'Q3 budget figures for the finance review';
const FORECAST = 'Q3 forecast figures for the finance review';

/**
 * Scorer returning fixed pairwise similarities by path
 */
class TableSimilarity implements SimilarityScorer {
  constructor(private readonly table: Record<string, number>) {}

  compare(a: ConsolidationCandidate, b: ConsolidationCandidate): SimilarityBreakdown {
    const combined = this.table[[a.path, b.path].sort().join('|')] ?? 0;
    return { tags: combined, temporal: 0, topic: 0, combined };
  }
}

describe('ConsolidationAdvisor', () => {
  let root: string;
  let time: ManualClock;
  let ws: Workspace;

  beforeEach(async () => {
    root = await makeTempRoot();
    time = manualClock();
  });

  afterEach(async () => {
    await ws.close();
    await removeTempRoot(root);
  });

  describe('with fixed similarities', () => {
    beforeEach(async () => {
      ws = await openTestWorkspace(root, {
        clock: time.clock,
        similarity: new TableSimilarity({
          'notes/a.md|notes/b.md': 0.9,
          'notes/b.md|notes/c.md': 0.9,
          'notes/a.md|notes/c.md': 0.3,
        }),
      });
    });

    function candidates(): ConsolidationCandidate[] {
      const hours = ['09', '10', '11'];
      return ['a', 'b', 'c'].map((name, i) => ({
        path: `notes/${name}.md`,
        content: `Launch checklist part ${name}`,
        contentHash: `hash-${name}`,
        tags: ['launch'],
        createdAt: `2026-03-02T${hours[i] ?? '12'}:00:00.000Z`,
      }));
    }

    it('reports the weakest pair of a chained group as its confidence', () => {
      const [opportunity, ...rest] = ws.consolidation.identifyOpportunities(candidates());

      expect(rest).toEqual([]);
      expect(opportunity).toMatchObject({
        sources: ['notes/a.md', 'notes/b.md', 'notes/c.md'],
        sourceHashes: ['hash-a', 'hash-b', 'hash-c'],
        confidence: 0.3,
        kind: 'outcome',
        suggestedName: 'notes/launch-outcome-20260302.md',
      });
      expect(opportunity?.rationale).toContain('weakest pair notes/a.md / notes/c.md at 0.30');
    });

    it('avoids names that are already taken', () => {
      const [opportunity] = ws.consolidation.identifyOpportunities(
        candidates(),
        new Set(['notes/launch-outcome-20260302.md'])
      );
      expect(opportunity?.suggestedName).toBe('notes/launch-outcome-20260302-2.md');
    });

    it('finds nothing when every pair is below the threshold', () => {
      ws.consolidation.applyTuning({ similarityThreshold: 0.95, temporalWindowMinutes: 60 });
      expect(ws.consolidation.identifyOpportunities(candidates())).toEqual([]);
    });
  });

  describe('with keyword topics', () => {
    beforeEach(async () => {
      ws = await openTestWorkspace(root, { clock: time.clock });
      ws.consolidation.applyTuning({ similarityThreshold: 0.85, temporalWindowMinutes: 120 });
    });

    function pair(first: string, second: string): ConsolidationCandidate[] {
      return [
        { path: 'notes/a.md', content: first, contentHash: 'hash-a', tags: ['vendor'], createdAt: T0, sessionId: 's1' },
        { path: 'notes/b.md', content: second, contentHash: 'hash-b', tags: ['vendor'], createdAt: T0, sessionId: 's1' },
      ];
    }

    it('reads keywords afresh on every scan', () => {
      const terms = 'Vendor contract renewal terms';
      expect(ws.consolidation.identifyOpportunities(pair(terms, terms))).toHaveLength(1);

      expect(ws.consolidation.identifyOpportunities(pair(terms, 'Garden irrigation schedule'))).toEqual([]);
    });
  });

  describe('applying', () => {
    beforeEach(async () => {
      ws = await openTestWorkspace(root, { clock: time.clock });
      const hints = { tags: ['budget', 'q3'], sessionId: 'sess_test' };
      await ws.register('notes/q3-budget.md', BUDGET, hints);
      await ws.register('notes/q3-forecast.md', FORECAST, hints);
      await ws.register('notes/lunch.md', 'Team lunch options', { tags: ['social'] });
    });

    it('finds related active files', async () => {
      const opportunities = await ws.listConsolidationOpportunities();

      expect(opportunities).toHaveLength(1);
      expect(opportunities[0]).toMatchObject({
        sources: ['notes/q3-budget.md', 'notes/q3-forecast.md'],
        kind: 'outcome',
        suggestedName: 'notes/budget-outcome-20260302.md',
      });
      expect(opportunities[0]?.confidence).toBeCloseTo(0.88, 6);
    });

    it('leaves retained files out of the scan', async () => {
      await ws.retain('notes/q3-forecast.md', 'board pack');
      expect(await ws.listConsolidationOpportunities()).toEqual([]);
    });

    it('previews without writing', async () => {
      const [opportunity] = await ws.listConsolidationOpportunities();
      if (!opportunity) throw new Error('expected an opportunity');

      const preview = await ws.previewConsolidation(opportunity);

      expect(preview.problems).toEqual([]);
      expect(preview.destinationPath).toBe('notes/budget-outcome-20260302.md');
      await expect(readFile(join(root, preview.destinationPath), 'utf8')).rejects.toThrow();
    });

    it('archives the sources and tracks the merged destination', async () => {
      const [opportunity] = await ws.listConsolidationOpportunities();
      if (!opportunity) throw new Error('expected an opportunity');

      const result = await ws.applyConsolidation(opportunity);

      const destination = 'notes/budget-outcome-20260302.md';
      expect(result.destination).toMatchObject({
        path: destination,
        state: 'active',
        tags: ['budget', 'q3'],
        sessionId: 'sess_test',
      });
      expect(await readFile(join(root, destination), 'utf8')).toBe(
        '# Consolidated: budget\n\n_Consolidated from 2 files (outcome)._\n\n' +
          `## notes/q3-budget.md\n\n${BUDGET}\n\n## notes/q3-forecast.md\n\n${FORECAST}\n`
      );

      expect(result.archived.map(record => [record.originalPath, record.reason])).toEqual([
        ['notes/q3-budget.md', 'consolidated'],
        ['notes/q3-forecast.md', 'consolidated'],
      ]);
      expect(result.archived.every(record => record.indexedAt === time.now())).toBe(true);
      await expect(readFile(join(root, 'notes/q3-budget.md'), 'utf8')).rejects.toThrow();
      expect((await ws.listFiles()).map(file => file.path).sort()).toEqual([destination, 'notes/lunch.md']);

      const [entry] = await ws.listConsolidations();
      expect(entry).toMatchObject({ destinationPath: destination, kind: 'outcome' });
      expect(entry?.sources.map(source => source.archiveId)).toEqual(
        result.archived.map(record => record.archiveId)
      );

      const found = await ws.search('forecast');
      expect(found.hits.map(hit => hit.originalPath)).toEqual(['notes/q3-forecast.md']);
    });

    it('leaves everything untouched when the merged file fails validation', async () => {
      await ws.register('notes/q3-budget.md', `${BUDGET}\n\`\`\``, {
        update: true,
        tags: ['budget', 'q3'],
        sessionId: 'sess_test',
      });
      const [opportunity] = await ws.listConsolidationOpportunities();
      if (!opportunity) throw new Error('expected an opportunity');

      const preview = await ws.previewConsolidation(opportunity);
      expect(preview.problems).toEqual(['unbalanced code fence']);

      await expect(ws.applyConsolidation(opportunity)).rejects.toBeInstanceOf(ValidationFailureError);

      await expect(readFile(join(root, opportunity.suggestedName), 'utf8')).rejects.toThrow();
      expect(await readFile(join(root, 'notes/q3-forecast.md'), 'utf8')).toBe(FORECAST);
      expect((await ws.listFiles()).map(file => file.path).sort()).toEqual([
        'notes/lunch.md',
        'notes/q3-budget.md',
        'notes/q3-forecast.md',
      ]);
      expect(await ws.listArchiveRecords()).toEqual([]);
      expect(await ws.listConsolidations()).toEqual([]);
    });

    it('rejects an opportunity whose sources changed since the scan', async () => {
      const [opportunity] = await ws.listConsolidationOpportunities();
      if (!opportunity) throw new Error('expected an opportunity');
      await ws.register('notes/q3-forecast.md', `${FORECAST}, revised`, { update: true });

      await expect(ws.applyConsolidation(opportunity)).rejects.toThrow('Consolidation source changed');
      expect(await ws.listArchiveRecords()).toEqual([]);
    });

    it('refuses to overwrite an untracked file at the destination', async () => {
      const [opportunity] = await ws.listConsolidationOpportunities();
      if (!opportunity) throw new Error('expected an opportunity');
      await writeFile(join(root, opportunity.suggestedName), 'hand-written');

      await expect(ws.applyConsolidation(opportunity)).rejects.toBeInstanceOf(ConflictError);
      expect(await readFile(join(root, opportunity.suggestedName), 'utf8')).toBe('hand-written');
      expect((await ws.listFiles()).length).toBe(3);
    });

    it('rejects malformed opportunities', async () => {
      await expect(
        ws.applyConsolidation({
          sources: ['notes/q3-budget.md'],
          sourceHashes: [],
          suggestedName: 'notes/out.md',
          confidence: 1,
          rationale: '',
          kind: 'topic',
        })
      ).rejects.toBeInstanceOf(ValidationFailureError);
    });
  });

  describe('when the destination is taken during the commit', () => {
    /**
     * Store where another writer registers the destination just before the
     * consolidation commits
     */
    class RacingStore extends SQLiteMetadataStore {
      override async commitConsolidation(commit: ConsolidationCommit): Promise<void> {
        await this.register({ ...commit.destination, contentHash: 'hash-other-writer' });
        return super.commitConsolidation(commit);
      }
    }

    let store: RacingStore;
    let index: ArchiveIndex;
    let advisor: ConsolidationAdvisor;

    beforeEach(async () => {
      store = new RacingStore(':memory:');
      await store.initialize();
      index = new ArchiveIndex({ indexDir: null, segments: 1, snippetTokens: 16 });
      await index.initialize();
      const files = new WorkspaceFiles(root, DEFAULT_CONFIG.storage.dataDir);
      const ingestion = new IndexIngestion(store, index, DEFAULT_CONFIG.index, { clock: time.clock });
      const locks = new PathLocks();
      const manager = new LifecycleManager({ store, files, ingestion, config: DEFAULT_CONFIG, locks, clock: time.clock });
      advisor = new ConsolidationAdvisor({ store, files, ingestion, locks, config: DEFAULT_CONFIG, clock: time.clock });

      const hints = { tags: ['budget', 'q3'], sessionId: 'sess_test' };
      await manager.register('notes/q3-budget.md', BUDGET, hints);
      await manager.register('notes/q3-forecast.md', FORECAST, hints);
      // Closed by the shared teardown
      ws = await openTestWorkspace(root, { clock: time.clock });
    });

    afterEach(async () => {
      await index.close();
      await store.close();
    });

    it('rolls back every source and removes the written destination', async () => {
      const [opportunity] = await advisor.listOpportunities();
      if (!opportunity) throw new Error('expected an opportunity');

      await expect(advisor.apply(opportunity)).rejects.toBeInstanceOf(ConflictError);

      for (const path of ['notes/q3-budget.md', 'notes/q3-forecast.md']) {
        expect(await store.findFile(path)).toMatchObject({ path, state: 'active' });
      }
      expect(await store.listArchiveRecords()).toEqual([]);
      expect(await store.listConsolidations()).toEqual([]);
      await expect(readFile(join(root, opportunity.suggestedName), 'utf8')).rejects.toThrow();
      expect(await readFile(join(root, 'notes/q3-budget.md'), 'utf8')).toBe(BUDGET);
      expect(await readFile(join(root, 'notes/q3-forecast.md'), 'utf8')).toBe(FORECAST);
      expect((await store.getFile(opportunity.suggestedName)).contentHash).toBe('hash-other-writer');
    });
  });
});
