export { ArchiveIndex, computeRelevance, segmentFor, type ArchiveIndexOptions } from './archive-index.js';
export { buildFtsQuery } from './fts-query.js';
export { IndexIngestion, retryDelaySeconds, type RetryRunResult } from './ingestion.js';
export type { ArchiveRecordSource, IArchiveIndex, ReindexOptions, ReindexResult } from './interface.js';
export { IndexSegment, segmentFileName, type SegmentHit } from './segment.js';
