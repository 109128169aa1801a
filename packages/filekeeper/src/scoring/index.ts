export { RetentionScorer, type ScoringInput, type ScoreFactors } from './retention-scorer.js';
export { extractFeatures, type ContentFeatures } from './features.js';
export { MODE_BANDS, SIGNAL_TERMS, MAX_SCORE, type ScoreBand } from './mode-bands.js';
