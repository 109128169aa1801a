/**
 * Consolidation types
 */

export type OpportunityKind = 'topic' | 'temporal' | 'outcome' | 'reference';

/**
 * Component scores of a pairwise similarity
 */
export interface SimilarityBreakdown {
  tags: number;
  temporal: number;
  topic: number;
  /** Weighted combination, 0 - 1 */
  combined: number;
}

/**
 * A proposed merge of two or more active files
 */
export interface ConsolidationOpportunity {
  /** Ordered source paths, at least two */
  sources: string[];
  /** Content hashes of the sources when the scan ran, parallel to `sources` */
  sourceHashes: string[];
  suggestedName: string;
  /** Minimum pairwise similarity among the sources */
  confidence: number;
  rationale: string;
  kind: OpportunityKind;
}

/**
 * Audit entry written when an opportunity is applied
 */
export interface ConsolidationLogEntry {
  id: string;
  appliedAt: string;
  destinationPath: string;
  destinationHash: string;
  sources: Array<{ path: string; contentHash: string; archiveId: string }>;
  kind: OpportunityKind;
  confidence: number;
}
