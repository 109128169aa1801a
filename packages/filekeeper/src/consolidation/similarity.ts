/**
 * Similarity
 *
 * Pairwise similarity between consolidation candidates: a weighted sum of
 * tag overlap, temporal proximity and topic overlap.
 */

import type { ConsolidationSettings } from '../config/types.js';
import type { SimilarityBreakdown } from '../types/index.js';
import { jaccard, keywords } from '../utils/tokens.js';
import { minutesBetween } from '../utils/time.js';

/**
 * A tracked file as seen by the advisor
 */
export interface ConsolidationCandidate {
  path: string;
  content: string;
  contentHash: string;
  tags: string[];
  createdAt: string;
  sessionId?: string | undefined;
}

/**
 * Topic overlap in [0, 1]
 */
export interface TopicScorer {
  score(a: ConsolidationCandidate, b: ConsolidationCandidate): number;
  /** Drop anything held from earlier scans */
  reset?(): void;
}

export interface SimilarityScorer {
  compare(a: ConsolidationCandidate, b: ConsolidationCandidate): SimilarityBreakdown;
  /** Scorers with a temporal component take the tuned window here */
  setTemporalWindow?(minutes: number): void;
  /** Called at the start of every scan */
  reset?(): void;
}

/**
 * Keyword Jaccard after stop-word removal. Keyword sets are cached by
 * content hash for the length of one scan.
 */
export class KeywordTopicScorer implements TopicScorer {
  private readonly cache = new Map<string, Set<string>>();

  score(a: ConsolidationCandidate, b: ConsolidationCandidate): number {
    return jaccard(this.keywordsOf(a), this.keywordsOf(b));
  }

  reset(): void {
    this.cache.clear();
  }

  private keywordsOf(candidate: ConsolidationCandidate): Set<string> {
    let set = this.cache.get(candidate.contentHash);
    if (!set) {
      set = keywords(candidate.content);
      this.cache.set(candidate.contentHash, set);
    }
    return set;
  }
}

/**
 * Temporal proximity: 1 for the same session, otherwise a linear falloff
 * to 0 at the edge of the window
 */
export function temporalProximity(
  a: ConsolidationCandidate,
  b: ConsolidationCandidate,
  windowMinutes: number
): number {
  if (a.sessionId && a.sessionId === b.sessionId) {
    return 1;
  }
  const minutes = minutesBetween(a.createdAt, b.createdAt);
  return minutes >= windowMinutes ? 0 : 1 - minutes / windowMinutes;
}

export class WeightedSimilarity implements SimilarityScorer {
  private settings: Pick<ConsolidationSettings, 'weights' | 'temporalWindowMinutes'>;

  constructor(
    settings: Pick<ConsolidationSettings, 'weights' | 'temporalWindowMinutes'>,
    private readonly topic: TopicScorer = new KeywordTopicScorer()
  ) {
    this.settings = { ...settings };
  }

  setTemporalWindow(minutes: number): void {
    this.settings = { ...this.settings, temporalWindowMinutes: minutes };
  }

  reset(): void {
    this.topic.reset?.();
  }

  compare(a: ConsolidationCandidate, b: ConsolidationCandidate): SimilarityBreakdown {
    const { weights, temporalWindowMinutes } = this.settings;
    const tags = jaccard(new Set(a.tags), new Set(b.tags));
    const temporal = temporalProximity(a, b, temporalWindowMinutes);
    const topic = this.topic.score(a, b);
    return {
      tags,
      temporal,
      topic,
      combined: weights.tags * tags + weights.temporal * temporal + weights.topic * topic,
    };
  }
}
