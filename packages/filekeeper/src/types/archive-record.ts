/**
 * Archive record and search types
 */

export type ArchiveReason = 'sweep' | 'manual' | 'consolidated';

/**
 * A file after archival. Immutable apart from `indexedAt`.
 */
export interface ArchiveRecord {
  archiveId: string;
  originalPath: string;
  content: string;
  contentHash: string;
  tags: string[];
  category: string;
  archivedAt: string;
  sourceRetentionScore: number;
  reason: ArchiveReason;
  sessionId?: string | undefined;
  /** Last time the record was written to the search index */
  indexedAt?: string | undefined;
}

/**
 * Themes and summary derived from archived content for search
 */
export interface ArchiveContext {
  /** e.g. 'budget-planning', 'board-presentation' */
  labels: string[];
  summary: string;
}

export interface SearchFilters {
  /** Every listed tag must be present */
  tags?: string[];
  category?: string;
  /** Part of a context label, e.g. 'budget' matches 'budget-planning' */
  context?: string;
  /** Inclusive lower bound on archivedAt (ISO) */
  archivedAfter?: string;
  /** Inclusive upper bound on archivedAt (ISO) */
  archivedBefore?: string;
  limit?: number;
}

export interface SearchHit {
  archiveId: string;
  originalPath: string;
  category: string;
  tags: string[];
  archivedAt: string;
  /** 0 - 10 */
  relevance: number;
  /** Excerpt with matched terms in [brackets] */
  snippet: string;
  context: string[];
  summary: string;
  segment: number;
}

export interface SearchResult {
  hits: SearchHit[];
  /** Some segments could not be read; hits from them are missing */
  partial: boolean;
  degradedSegments: number[];
}

export interface PurgeEntry {
  archiveId: string;
  originalPath: string;
  contentHash: string;
  purgedAt: string;
  reason: string;
}
