/**
 * Score bands per generation mode
 *
 * A file's score stays inside its mode's band unless an explicit
 * retention-days hint lifts it.
 */

import type { GenerationMode } from '../types/index.js';

export interface ScoreBand {
  min: number;
  max: number;
}

export const MODE_BANDS: Record<GenerationMode, ScoreBand> = {
  minimal: { min: 0, max: 4 },
  professional: { min: 3, max: 7 },
  research: { min: 6, max: 10 },
};

export const MAX_SCORE = 10;

/**
 * High-value business terms and their weights
 */
export const SIGNAL_TERMS: Record<string, number> = {
  roi: 2.0,
  board: 2.0,
  quarterly: 1.5,
  executive: 1.5,
  migration: 1.5,
  budget: 1.5,
  strategy: 1.0,
  architecture: 1.0,
};

/**
 * Retention-days hint at which a score reaches the top of its band.
 * Every further block of this many days adds one point.
 */
export const RETENTION_DAYS_PER_POINT = 30;
