/**
 * Archive Index
 *
 * Full-text index over archive records, split into segments. A record
 * lives in segment fnv1a(archiveId) mod N. Search fans out to every
 * segment; a segment that cannot be read is skipped and the result is
 * flagged partial. The index is derived data: reindex rebuilds it from the
 * archive records in the metadata store.
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { ArchiveRecord, SearchFilters, SearchHit, SearchResult } from '../types/index.js';
import { fnv1a } from '../utils/hash.js';
import { buildFtsQuery, plainSnippet } from './fts-query.js';
import type { ArchiveRecordSource, IArchiveIndex, ReindexOptions, ReindexResult } from './interface.js';
import { IndexSegment, segmentFileName, type SegmentHit } from './segment.js';

export interface ArchiveIndexOptions {
  /** Directory holding the segment files; null keeps every segment in memory */
  indexDir: string | null;
  segments: number;
  snippetTokens: number;
  logger?: Logger;
}

const DEFAULT_LIMIT = 20;
const REINDEX_PAGE_SIZE = 200;
const PHRASE_BONUS = 1;
const MAX_RELEVANCE = 10;
const TEXT_WEIGHT = 0.6;
const RETENTION_WEIGHT = 0.4;

/**
 * Segment that owns an archive ID
 */
export function segmentFor(archiveId: string, segmentCount: number): number {
  return fnv1a(archiveId) % segmentCount;
}

/**
 * Relevance in [0, 10]. bm25 ranks are negative and lower is better, so the
 * text score is the hit's rank as a fraction of `bestRank`, the lowest rank
 * in the result set. The retention score the file had when it was archived
 * and a bonus for the whole query phrase in the snippet are added.
 */
export function computeRelevance(hit: SegmentHit, query: string, bestRank: number): number {
  const textScore = bestRank < 0 ? (MAX_RELEVANCE * Math.min(0, hit.rank)) / bestRank : 0;
  const phrase = query.trim().toLowerCase();
  const bonus = phrase.length > 0 && plainSnippet(hit.snippet).includes(phrase) ? PHRASE_BONUS : 0;
  const relevance = TEXT_WEIGHT * textScore + RETENTION_WEIGHT * hit.sourceRetentionScore + bonus;
  return Math.round(Math.min(MAX_RELEVANCE, relevance) * 100) / 100;
}

function compareNewest(a: SegmentHit, b: SegmentHit): number {
  return b.archivedAt.localeCompare(a.archivedAt) || a.archiveId.localeCompare(b.archiveId);
}

/**
 * Best match first: bm25 rank, then the retention score at archive time
 */
function compareHits(a: SegmentHit, b: SegmentHit): number {
  return a.rank - b.rank || b.sourceRetentionScore - a.sourceRetentionScore || compareNewest(a, b);
}

export class ArchiveIndex implements IArchiveIndex {
  private readonly segments: IndexSegment[];
  private readonly logger: Logger;
  /** Set while a rebuild has started but not finished */
  private rebuildPending = false;

  constructor(private readonly options: ArchiveIndexOptions) {
    this.logger = options.logger ?? silentLogger;
    this.segments = Array.from(
      { length: options.segments },
      (_, id) =>
        new IndexSegment(id, options.indexDir ? join(options.indexDir, segmentFileName(id)) : ':memory:')
    );
  }

  async initialize(): Promise<void> {
    if (this.options.indexDir) {
      await mkdir(this.options.indexDir, { recursive: true });
    }
  }

  async close(): Promise<void> {
    for (const segment of this.segments) {
      segment.close();
    }
  }

  get segmentCount(): number {
    return this.segments.length;
  }

  async ingest(record: ArchiveRecord): Promise<void> {
    this.segmentOf(record.archiveId).upsert(record);
    this.logger.debug(`ingest: ${record.archiveId} (${record.originalPath})`);
  }

  async remove(archiveId: string): Promise<void> {
    this.segmentOf(archiveId).remove(archiveId);
  }

  async search(query: string, filters: SearchFilters = {}): Promise<SearchResult> {
    const limit = filters.limit ?? DEFAULT_LIMIT;
    const ftsQuery = buildFtsQuery(query);
    const found: Array<{ hit: SegmentHit; segment: number }> = [];
    const degradedSegments: number[] = [];

    for (const segment of this.segments) {
      let segmentHits: SegmentHit[];
      try {
        segmentHits = segment.search(ftsQuery, filters, limit, this.options.snippetTokens);
      } catch (error) {
        degradedSegments.push(segment.id);
        this.logger.warn(
          `search: skipping segment ${segment.id}: ${errorMessage(error)}`
        );
        continue;
      }
      for (const hit of segmentHits) {
        found.push({ hit, segment: segment.id });
      }
    }

    const compare = ftsQuery === null ? compareNewest : compareHits;
    const top = found.sort((a, b) => compare(a.hit, b.hit)).slice(0, limit);
    const bestRank = Math.min(0, ...top.map(({ hit }) => hit.rank));

    const hits = top.map(({ hit, segment }): SearchHit => ({
      archiveId: hit.archiveId,
      originalPath: hit.originalPath,
      category: hit.category,
      tags: hit.tags,
      archivedAt: hit.archivedAt,
      relevance: ftsQuery === null ? 0 : computeRelevance(hit, query, bestRank),
      snippet: hit.snippet,
      context: hit.context,
      summary: hit.summary,
      segment,
    }));

    return {
      hits,
      partial: degradedSegments.length > 0 || this.rebuildPending,
      degradedSegments,
    };
  }

  /**
   * Drop every segment and re-ingest all archive records. Interrupting it
   * leaves a valid but incomplete index that search reports as partial
   * until a later rebuild finishes.
   */
  async reindex(source: ArchiveRecordSource, options: ReindexOptions): Promise<ReindexResult> {
    this.rebuildPending = true;
    for (const segment of this.segments) {
      segment.reset();
    }

    let indexed = 0;
    let failed = 0;
    let offset = 0;

    for (;;) {
      const page = await source.listArchiveRecords({ limit: REINDEX_PAGE_SIZE, offset });
      if (page.length === 0) {
        break;
      }
      for (const record of page) {
        if (options.signal?.aborted) {
          this.logger.warn(`reindex: interrupted after ${indexed} records`);
          return { indexed, failed, interrupted: true };
        }
        try {
          this.segmentOf(record.archiveId).upsert(record);
        } catch (error) {
          failed++;
          this.logger.error(
            `reindex: ${record.archiveId} (${record.originalPath}) failed: ${errorMessage(error)}`
          );
          continue;
        }
        await source.markIndexed(record.archiveId, options.at);
        await source.clearRetry(record.archiveId);
        indexed++;
      }
      offset += page.length;
    }

    this.rebuildPending = failed > 0;
    this.logger.info(`reindex: ${indexed} records indexed, ${failed} failed`);
    return { indexed, failed, interrupted: false };
  }

  /**
   * Entry count per segment; null for an unreadable segment
   */
  segmentSizes(): Array<number | null> {
    return this.segments.map(segment => {
      try {
        return segment.count();
      } catch {
        return null;
      }
    });
  }

  private segmentOf(archiveId: string): IndexSegment {
    const segment = this.segments[segmentFor(archiveId, this.segments.length)];
    if (!segment) {
      throw new RangeError(`No segment for ${archiveId}`);
    }
    return segment;
  }
}
