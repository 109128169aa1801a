/**
 * Default configuration
 */

import type { FilekeeperConfig } from './types.js';

export const DEFAULT_CONFIG: FilekeeperConfig = {
  defaultGenerationMode: 'professional',
  lifecycle: {
    agingAfterDays: 14,
    archiveAfterDays: 30,
    protectScore: 8.5,
  },
  consolidation: {
    similarityThreshold: 0.7,
    temporalWindowMinutes: 120,
    weights: {
      tags: 0.4,
      temporal: 0.3,
      topic: 0.3,
    },
  },
  index: {
    segments: 8,
    retryBaseSeconds: 30,
    retryMaxSeconds: 3600,
    snippetTokens: 16,
  },
  storage: {
    dataDir: '.filekeeper',
  },
  logging: {
    debug: false,
  },
};
