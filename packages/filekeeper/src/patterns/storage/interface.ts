/**
 * Session Log Interface
 *
 * Append-only history consumed by the pattern recognizer.
 */

import type { InsightGeneration, SessionRecord } from '../../types/index.js';

export interface ISessionLog {
  /** Append a session; session IDs are unique */
  append(session: SessionRecord): Promise<void>;
  /** Every session in append order */
  list(): Promise<SessionRecord[]>;
  count(): Promise<number>;
  appendGeneration(generation: InsightGeneration): Promise<void>;
  /** Published generations, oldest first */
  listGenerations(): Promise<InsightGeneration[]>;
}
