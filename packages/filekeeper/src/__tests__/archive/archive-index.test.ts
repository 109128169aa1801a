/**
 * Archive Index Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ArchiveIndex, computeRelevance, segmentFor } from '../../archive/archive-index.js';
import { buildFtsQuery } from '../../archive/fts-query.js';
import type { ArchiveRecordSource } from '../../archive/interface.js';
import type { ArchiveRecord } from '../../types/index.js';

function record(archiveId: string, overrides: Partial<ArchiveRecord> = {}): ArchiveRecord {
  return {
    archiveId,
    originalPath: `notes/${archiveId}.md`,
    content: '',
    contentHash: `hash-${archiveId}`,
    tags: [],
    category: 'general',
    archivedAt: '2026-01-01T00:00:00.000Z',
    sourceRetentionScore: 5,
    reason: 'manual',
    ...overrides,
  };
}

const budgetReview = record('arc_budget', {
  originalPath: 'notes/budget-q3.md',
  content: 'Q3 budget review with finance',
  tags: ['finance', 'q3'],
  category: 'meeting_notes',
  archivedAt: '2026-01-10T00:00:00.000Z',
});
const roadmap = record('arc_roadmap', {
  originalPath: 'notes/roadmap.md',
  content: 'Product roadmap and budget assumptions',
  tags: ['product'],
  category: 'planning',
  archivedAt: '2026-02-10T00:00:00.000Z',
});
const lunch = record('arc_lunch', {
  originalPath: 'notes/lunch.md',
  content: 'Team lunch options',
  archivedAt: '2026-03-10T00:00:00.000Z',
});

describe('buildFtsQuery', () => {
  it('quotes and ORs distinct tokens', () => {
    expect(buildFtsQuery('Budget budget AND (roi')).toBe('"budget" OR "and" OR "roi"');
  });

  it('returns null without searchable tokens', () => {
    expect(buildFtsQuery('  !!! ')).toBeNull();
  });
});

describe('segmentFor', () => {
  it('places an ID in the same segment every time', () => {
    const first = segmentFor('arc_budget', 8);
    expect(segmentFor('arc_budget', 8)).toBe(first);
    expect(first).toBeGreaterThanOrEqual(0);
    expect(first).toBeLessThan(8);
  });
});

describe('computeRelevance', () => {
  const hit = {
    archiveId: 'arc_1',
    originalPath: 'notes/a.md',
    category: 'general',
    tags: [],
    archivedAt: '2026-01-01T00:00:00.000Z',
    context: [],
    summary: '',
  };

  it('gives the best rank in the result set the full text score', () => {
    expect(
      computeRelevance({ ...hit, rank: -3, sourceRetentionScore: 5, snippet: 'the [budget] review' }, 'budget', -3)
    ).toBe(9);
  });

  it('scales weaker ranks against the best one and skips the bonus without the phrase', () => {
    expect(
      computeRelevance(
        { ...hit, rank: -1.5, sourceRetentionScore: 10, snippet: 'the [budget] review' },
        'roi budget',
        -3
      )
    ).toBe(7);
  });

  it('falls back to the retention score when nothing ranked', () => {
    expect(computeRelevance({ ...hit, rank: 0, sourceRetentionScore: 5, snippet: '' }, 'budget', 0)).toBe(2);
  });
});

describe('ArchiveIndex ranking', () => {
  let index: ArchiveIndex;

  beforeEach(async () => {
    index = new ArchiveIndex({ indexDir: null, segments: 1, snippetTokens: 16 });
    await index.initialize();
    for (let i = 0; i < 20; i++) {
      await index.ingest(record(`arc_filler_${i}`, { content: 'quarterly staffing notes' }));
    }
  });

  afterEach(async () => {
    await index.close();
  });

  it('puts the stronger match first when retention scores are equal', async () => {
    await index.ingest(record('arc_weak', { content: `budget ${'filler '.repeat(240)}` }));
    await index.ingest(record('arc_strong', { content: 'budget budget budget budget' }));

    const { hits } = await index.search('budget');

    expect(hits.map(hit => hit.archiveId)).toEqual(['arc_strong', 'arc_weak']);
    expect(hits[0]?.relevance).toBe(9);
    expect(hits[1]?.relevance).toBeLessThan(9);
  });

  it('breaks rank ties by the retention score at archive time', async () => {
    await index.ingest(record('arc_low', { content: 'budget plan', sourceRetentionScore: 3 }));
    await index.ingest(record('arc_high', { content: 'budget plan', sourceRetentionScore: 8 }));

    const { hits } = await index.search('budget');

    expect(hits.map(hit => hit.archiveId)).toEqual(['arc_high', 'arc_low']);
  });
});

describe('ArchiveIndex', () => {
  let index: ArchiveIndex;

  beforeEach(async () => {
    index = new ArchiveIndex({ indexDir: null, segments: 4, snippetTokens: 16 });
    await index.initialize();
    for (const r of [budgetReview, roadmap, lunch]) {
      await index.ingest(r);
    }
  });

  afterEach(async () => {
    await index.close();
  });

  it('finds records by content', async () => {
    const result = await index.search('budget');

    expect(result.partial).toBe(false);
    expect(result.degradedSegments).toEqual([]);
    expect(result.hits.map(hit => hit.archiveId).sort()).toEqual(['arc_budget', 'arc_roadmap']);
    for (const hit of result.hits) {
      expect(hit.relevance).toBeGreaterThan(0);
      expect(hit.relevance).toBeLessThanOrEqual(10);
      expect(hit.segment).toBe(segmentFor(hit.archiveId, 4));
    }
  });

  it('orders hits by relevance when retention scores are equal', async () => {
    const { hits } = await index.search('budget');
    const relevances = hits.map(hit => hit.relevance);
    expect(relevances).toEqual([...relevances].sort((a, b) => b - a));
  });

  it('highlights matched terms in the snippet', async () => {
    const { hits } = await index.search('lunch');
    expect(hits).toHaveLength(1);
    expect(hits[0]?.snippet).toContain('[lunch]');
  });

  it('applies tag, category and date filters', async () => {
    const byTag = await index.search('budget', { tags: ['finance'] });
    expect(byTag.hits.map(hit => hit.archiveId)).toEqual(['arc_budget']);

    const byCategory = await index.search('budget', { category: 'planning' });
    expect(byCategory.hits.map(hit => hit.archiveId)).toEqual(['arc_roadmap']);

    const byDate = await index.search('budget', { archivedAfter: '2026-02-01T00:00:00.000Z' });
    expect(byDate.hits.map(hit => hit.archiveId)).toEqual(['arc_roadmap']);

    const beforeDate = await index.search('budget', { archivedBefore: '2026-02-01T00:00:00.000Z' });
    expect(beforeDate.hits.map(hit => hit.archiveId)).toEqual(['arc_budget']);
  });

  it('labels hits with the context and summary of their content', async () => {
    const { hits } = await index.search('budget');
    const byId = new Map(hits.map(hit => [hit.archiveId, hit]));

    expect(byId.get('arc_budget')).toMatchObject({
      context: ['budget-planning'],
      summary: 'Q3 budget review with finance',
    });
    expect(byId.get('arc_roadmap')).toMatchObject({
      context: ['strategic-roadmap', 'budget-planning'],
      summary: 'Product roadmap and budget assumptions',
    });
  });

  it('filters by part of a context label', async () => {
    const byRoadmap = await index.search('budget', { context: 'roadmap' });
    expect(byRoadmap.hits.map(hit => hit.archiveId)).toEqual(['arc_roadmap']);

    const listed = await index.search('', { context: 'BUDGET' });
    expect(listed.hits.map(hit => hit.archiveId)).toEqual(['arc_roadmap', 'arc_budget']);

    expect((await index.search('budget', { context: 'hiring' })).hits).toEqual([]);
    expect((await index.search('budget', { context: '%' })).hits).toEqual([]);
  });

  it('lists newest first when the query has no terms', async () => {
    const { hits } = await index.search('');
    expect(hits.map(hit => hit.archiveId)).toEqual(['arc_lunch', 'arc_roadmap', 'arc_budget']);
    expect(hits.every(hit => hit.relevance === 0)).toBe(true);
  });

  it('honours the limit', async () => {
    expect((await index.search('budget', { limit: 1 })).hits).toHaveLength(1);
  });

  it('replaces an entry ingested twice', async () => {
    await index.ingest({ ...roadmap, content: 'Product roadmap only' });

    const sizes = index.segmentSizes();
    expect(sizes.reduce((sum: number, n) => sum + (n ?? 0), 0)).toBe(3);
    expect((await index.search('budget')).hits.map(hit => hit.archiveId)).toEqual(['arc_budget']);
  });

  it('drops removed records', async () => {
    await index.remove('arc_budget');
    expect((await index.search('budget')).hits.map(hit => hit.archiveId)).toEqual(['arc_roadmap']);
  });

  it('rebuilds from a record source', async () => {
    const marked: string[] = [];
    const source: ArchiveRecordSource = {
      listArchiveRecords: async (options = {}) => [budgetReview, lunch].slice(options.offset ?? 0),
      markIndexed: async archiveId => {
        marked.push(archiveId);
      },
      clearRetry: async () => undefined,
    };

    const result = await index.reindex(source, { at: '2026-04-01T00:00:00.000Z' });

    expect(result).toEqual({ indexed: 2, failed: 0, interrupted: false });
    expect(marked).toEqual(['arc_budget', 'arc_lunch']);
    expect((await index.search('budget')).hits.map(hit => hit.archiveId)).toEqual(['arc_budget']);
  });

  it('reports an interrupted rebuild as partial until a later one finishes', async () => {
    const source: ArchiveRecordSource = {
      listArchiveRecords: async (options = {}) => [budgetReview, roadmap].slice(options.offset ?? 0),
      markIndexed: async () => undefined,
      clearRetry: async () => undefined,
    };
    const controller = new AbortController();
    controller.abort();

    const interrupted = await index.reindex(source, { at: '2026-04-01T00:00:00.000Z', signal: controller.signal });
    expect(interrupted).toEqual({ indexed: 0, failed: 0, interrupted: true });
    expect((await index.search('budget')).partial).toBe(true);

    await index.reindex(source, { at: '2026-04-01T00:00:00.000Z' });
    const after = await index.search('budget');
    expect(after.partial).toBe(false);
    expect(after.hits).toHaveLength(2);
  });
});
