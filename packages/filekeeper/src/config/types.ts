/**
 * Configuration types
 */

import type { GenerationMode } from '../types/index.js';

export interface LifecycleConfig {
  /** Days without access before an active file starts aging */
  agingAfterDays: number;
  /** Days without access before an aging file becomes archive-eligible */
  archiveAfterDays: number;
  /** Files scoring at or above this never leave active automatically */
  protectScore: number;
}

export interface SimilarityWeights {
  tags: number;
  temporal: number;
  topic: number;
}

export interface ConsolidationSettings {
  /** Single-linkage cut for grouping files */
  similarityThreshold: number;
  /** Files created within this window are temporally related */
  temporalWindowMinutes: number;
  weights: SimilarityWeights;
}

export interface IndexConfig {
  /** Number of index segments */
  segments: number;
  /** First retry delay for failed ingestion */
  retryBaseSeconds: number;
  /** Upper bound for the retry delay */
  retryMaxSeconds: number;
  /** Snippet length in tokens */
  snippetTokens: number;
}

export interface StorageSettings {
  /** Data directory relative to the workspace root */
  dataDir: string;
}

export interface LoggingConfig {
  debug: boolean;
}

export interface FilekeeperConfig {
  /** Generation mode used when a registration carries none */
  defaultGenerationMode: GenerationMode;
  lifecycle: LifecycleConfig;
  consolidation: ConsolidationSettings;
  index: IndexConfig;
  storage: StorageSettings;
  logging: LoggingConfig;
}

/**
 * Recursive partial, used for config files and overrides
 */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};
