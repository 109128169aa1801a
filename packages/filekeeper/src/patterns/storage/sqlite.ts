/**
 * SQLite Session Log
 *
 * Shares the metadata database; the sessions and insight_generations tables
 * are created by its migrations.
 */

import type Database from 'better-sqlite3';

import { StorageFailureError, toStorageFailure } from '../../errors.js';
import type { InsightGeneration, InsightKind, InsightValue, PatternInsight, SessionRecord } from '../../types/index.js';
import { isSessionOutcome } from '../../types/index.js';
import { parseStringArray } from '../../utils/json.js';
import type { ISessionLog } from './interface.js';

interface SessionRow {
  session_id: string;
  recorded_at: string;
  files: string;
  outcome: string;
  duration_minutes: number;
}

interface GenerationRow {
  id: string;
  published_at: string;
  insights: string;
}

const INSIGHT_KINDS: readonly InsightKind[] = ['workflow', 'timing', 'content', 'outcome'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(source: Record<string, unknown>, key: string): number | null {
  const value = source[key];
  return typeof value === 'number' ? value : null;
}

function toInsightValue(raw: unknown): InsightValue | null {
  if (!isRecord(raw)) return null;
  switch (raw['kind']) {
    case 'timing': {
      const median = readNumber(raw, 'medianDurationMinutes');
      return median === null ? null : { kind: 'timing', medianDurationMinutes: median };
    }
    case 'content': {
      const mean = readNumber(raw, 'meanFilesPerSession');
      return mean === null ? null : { kind: 'content', meanFilesPerSession: mean };
    }
    case 'outcome': {
      const rate = readNumber(raw, 'successRate');
      return rate === null ? null : { kind: 'outcome', successRate: rate };
    }
    case 'workflow': {
      const occurrences = readNumber(raw, 'occurrences');
      const sequence = raw['sequence'];
      if (occurrences === null || !Array.isArray(sequence)) return null;
      const [first, second] = sequence;
      if (typeof first !== 'string' || typeof second !== 'string') return null;
      return { kind: 'workflow', sequence: [first, second], occurrences };
    }
    default:
      return null;
  }
}

function toInsight(raw: unknown): PatternInsight | null {
  if (!isRecord(raw)) return null;
  const kind = INSIGHT_KINDS.find(k => k === raw['kind']);
  const value = toInsightValue(raw['value']);
  const sampleCount = readNumber(raw, 'sampleCount');
  const confidence = readNumber(raw, 'confidence');
  const generatedAt = raw['generatedAt'];
  if (!kind || !value || sampleCount === null || confidence === null || typeof generatedAt !== 'string') {
    return null;
  }
  return { kind, sampleCount, value, confidence, generatedAt };
}

export class SQLiteSessionLog implements ISessionLog {
  constructor(private readonly db: Database.Database) {}

  async append(session: SessionRecord): Promise<void> {
    this.guard('appendSession', () => {
      this.db
        .prepare<[string, string, string, string, number]>(
          `INSERT INTO sessions (session_id, recorded_at, files, outcome, duration_minutes)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(
          session.sessionId,
          session.recordedAt,
          JSON.stringify(session.files),
          session.outcome,
          session.durationMinutes
        );
    });
  }

  async list(): Promise<SessionRecord[]> {
    return this.guard('listSessions', () =>
      this.db
        .prepare<[], SessionRow>('SELECT * FROM sessions ORDER BY seq ASC')
        .all()
        .map(row => {
          if (!isSessionOutcome(row.outcome)) {
            throw new StorageFailureError(
              'listSessions',
              new Error(`session ${row.session_id} has unknown outcome ${row.outcome}`)
            );
          }
          return {
            sessionId: row.session_id,
            recordedAt: row.recorded_at,
            files: parseStringArray(row.files),
            outcome: row.outcome,
            durationMinutes: row.duration_minutes,
          };
        })
    );
  }

  async count(): Promise<number> {
    return this.guard('countSessions', () => {
      const row = this.db.prepare<[], { n: number }>('SELECT count(*) AS n FROM sessions').get();
      return row?.n ?? 0;
    });
  }

  async appendGeneration(generation: InsightGeneration): Promise<void> {
    this.guard('appendGeneration', () => {
      this.db
        .prepare<[string, string, string]>(
          'INSERT INTO insight_generations (id, published_at, insights) VALUES (?, ?, ?)'
        )
        .run(generation.id, generation.publishedAt, JSON.stringify(generation.insights));
    });
  }

  async listGenerations(): Promise<InsightGeneration[]> {
    return this.guard('listGenerations', () =>
      this.db
        .prepare<[], GenerationRow>('SELECT id, published_at, insights FROM insight_generations ORDER BY seq ASC')
        .all()
        .map(row => {
          const parsed: unknown = JSON.parse(row.insights);
          const list: unknown[] = Array.isArray(parsed) ? parsed : [];
          return {
            id: row.id,
            publishedAt: row.published_at,
            insights: list.flatMap(item => {
              const insight = toInsight(item);
              return insight ? [insight] : [];
            }),
          };
        })
    );
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw toStorageFailure(operation, error);
    }
  }
}
