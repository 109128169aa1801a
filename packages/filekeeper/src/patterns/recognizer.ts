/**
 * Pattern Recognizer
 *
 * Records finished sessions and derives insights from the session log.
 * Insights never look at live tracked files, so tuning can only change
 * through new sessions.
 */

import { ValidationFailureError } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type {
  InsightGeneration,
  PatternInsight,
  SessionOutcome,
  SessionRecord,
  TuningParameters,
} from '../types/index.js';
import { isSessionOutcome } from '../types/index.js';
import { generateInsightGenerationId, generateSessionId } from '../utils/id-generator.js';
import { systemClock, type Clock } from '../utils/time.js';
import { computeInsights } from './insights.js';
import type { ISessionLog } from './storage/interface.js';
import { deriveTuning } from './tuning.js';

export interface RecordSessionOptions {
  sessionId?: string;
}

export class PatternRecognizer {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly log: ISessionLog,
    options: { logger?: Logger; clock?: Clock } = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  async recordSession(
    files: string[],
    outcome: SessionOutcome,
    durationMinutes: number,
    options: RecordSessionOptions = {}
  ): Promise<SessionRecord> {
    const problems: string[] = [];
    if (!isSessionOutcome(outcome)) {
      problems.push(`unknown outcome "${outcome}"`);
    }
    if (!Number.isFinite(durationMinutes) || durationMinutes < 0) {
      problems.push('durationMinutes must be a non-negative number');
    }
    if (files.some(file => file.trim() === '')) {
      problems.push('file paths must be non-empty');
    }
    if (problems.length > 0) {
      throw new ValidationFailureError('Invalid session', problems);
    }

    const session: SessionRecord = {
      sessionId: options.sessionId ?? generateSessionId(),
      recordedAt: this.clock().toISOString(),
      files: [...files],
      outcome,
      durationMinutes,
    };
    await this.log.append(session);
    this.logger.debug(`session: ${session.sessionId} ${outcome}, ${files.length} files`);
    return session;
  }

  async computeInsights(): Promise<PatternInsight[]> {
    return computeInsights(await this.log.list());
  }

  /**
   * Compute insights and keep them as a new generation
   */
  async publishInsights(): Promise<InsightGeneration> {
    const generation: InsightGeneration = {
      id: generateInsightGenerationId(),
      publishedAt: this.clock().toISOString(),
      insights: await this.computeInsights(),
    };
    await this.log.appendGeneration(generation);
    this.logger.info(`insights: published ${generation.id} with ${generation.insights.length} insights`);
    return generation;
  }

  async listGenerations(): Promise<InsightGeneration[]> {
    return this.log.listGenerations();
  }

  async deriveTuning(base: TuningParameters): Promise<TuningParameters> {
    return deriveTuning(await this.computeInsights(), base);
  }
}
