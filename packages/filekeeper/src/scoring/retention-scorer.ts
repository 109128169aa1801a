/**
 * Retention Scorer
 *
 * Deterministic retention score in [0, 10]. The generation mode picks the
 * band; content depth, structure, signal terms and declared stakeholders
 * or frameworks place the score inside it; a retention-days hint can lift
 * it to the top of the band or beyond.
 */

import type { GenerationMode } from '../types/index.js';
import { extractFeatures, type ContentFeatures } from './features.js';
import { MAX_SCORE, MODE_BANDS, RETENTION_DAYS_PER_POINT, SIGNAL_TERMS } from './mode-bands.js';

/**
 * Everything the score depends on
 */
export interface ScoringInput {
  content: string;
  generationMode: GenerationMode;
  retentionDays?: number | undefined;
  stakeholders?: string[] | undefined;
  frameworks?: string[] | undefined;
}

/**
 * Factor breakdown
 */
export interface ScoreFactors {
  /** 0 - 1, from content length */
  depth: number;
  /** 0 - 1, from headings, lists, tables, code and links */
  structure: number;
  /** 0 - 1, from high-value terms */
  signals: number;
  /** 0 - 1, from declared stakeholders and frameworks */
  importance: number;
  /** Position inside the mode band, 0 - 1 */
  bandPosition: number;
  /** Score before the retention-days override */
  bandScore: number;
  /** Whether the retention-days hint raised the score */
  overridden: boolean;
  score: number;
  features: ContentFeatures;
}

const FULL_DEPTH_CHARS = 4000;
const FULL_STRUCTURE_POINTS = 20;
const FULL_SIGNAL_WEIGHT = 6;
const FULL_IMPORTANCE_HINTS = 4;

const WEIGHTS = {
  depth: 0.3,
  structure: 0.25,
  signals: 0.25,
  importance: 0.2,
} as const;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class RetentionScorer {
  /**
   * Score with the full factor breakdown
   */
  explain(input: ScoringInput): ScoreFactors {
    const features = extractFeatures(input.content);
    const band = MODE_BANDS[input.generationMode];

    const depth = Math.min(1, features.length / FULL_DEPTH_CHARS);
    const structurePoints =
      features.headings * 2 +
      features.listItems * 0.5 +
      features.tableRows * 1 +
      features.codeBlocks * 2 +
      features.links * 0.5;
    const structure = Math.min(1, structurePoints / FULL_STRUCTURE_POINTS);
    const signalWeight = features.signalTerms.reduce((sum, term) => sum + (SIGNAL_TERMS[term] ?? 0), 0);
    const signals = Math.min(1, signalWeight / FULL_SIGNAL_WEIGHT);
    const hintCount = distinctCount(input.stakeholders) + distinctCount(input.frameworks);
    const importance = Math.min(1, hintCount / FULL_IMPORTANCE_HINTS);

    const bandPosition =
      WEIGHTS.depth * depth +
      WEIGHTS.structure * structure +
      WEIGHTS.signals * signals +
      WEIGHTS.importance * importance;
    const bandScore = band.min + (band.max - band.min) * bandPosition;

    let raw = bandScore;
    let overridden = false;
    const days = input.retentionDays;
    if (days !== undefined && days >= RETENTION_DAYS_PER_POINT) {
      const lifted = band.max + (days - RETENTION_DAYS_PER_POINT) / RETENTION_DAYS_PER_POINT;
      if (lifted > raw) {
        raw = lifted;
        overridden = true;
      }
    }

    return {
      depth,
      structure,
      signals,
      importance,
      bandPosition,
      bandScore: round2(bandScore),
      overridden,
      score: round2(Math.max(0, Math.min(MAX_SCORE, raw))),
      features,
    };
  }

  score(input: ScoringInput): number {
    return this.explain(input).score;
  }
}

function distinctCount(values: string[] | undefined): number {
  return values ? new Set(values.map(v => v.trim().toLowerCase()).filter(v => v !== '')).size : 0;
}
