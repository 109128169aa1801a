/**
 * Shared fixtures: a temporary workspace root, a clock the test drives,
 * and an index stand-in that fails on demand.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { IArchiveIndex, ReindexResult } from '../archive/interface.js';
import { silentLogger } from '../logging/logger.js';
import type { ArchiveRecord, SearchResult } from '../types/index.js';
import type { Clock } from '../utils/time.js';
import { Workspace, type WorkspaceOptions } from '../workspace.js';

export const T0 = '2026-03-02T09:00:00.000Z';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface ManualClock {
  clock: Clock;
  now(): string;
  advanceDays(days: number): void;
  advanceSeconds(seconds: number): void;
}

export function manualClock(start: string = T0): ManualClock {
  let current = new Date(start).getTime();
  return {
    clock: () => new Date(current),
    now: () => new Date(current).toISOString(),
    advanceDays: days => {
      current += days * MS_PER_DAY;
    },
    advanceSeconds: seconds => {
      current += seconds * 1000;
    },
  };
}

export async function makeTempRoot(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'filekeeper-test-'));
}

export async function removeTempRoot(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

/**
 * Workspace over a fresh temporary root with the store and index in memory
 */
export async function openTestWorkspace(
  root: string,
  options: WorkspaceOptions = {}
): Promise<Workspace> {
  return Workspace.open(root, { inMemory: true, logger: silentLogger, env: {}, ...options });
}

/**
 * Index stand-in whose ingestion fails while `healthy` is false
 */
export class FlakyIndex implements IArchiveIndex {
  healthy = false;
  readonly ingested: string[] = [];

  async initialize(): Promise<void> {}

  async close(): Promise<void> {}

  async ingest(record: ArchiveRecord): Promise<void> {
    if (!this.healthy) {
      throw new Error('index unavailable');
    }
    this.ingested.push(record.archiveId);
  }

  async remove(archiveId: string): Promise<void> {
    const at = this.ingested.indexOf(archiveId);
    if (at >= 0) {
      this.ingested.splice(at, 1);
    }
  }

  async search(): Promise<SearchResult> {
    return { hits: [], partial: false, degradedSegments: [] };
  }

  async reindex(): Promise<ReindexResult> {
    return { indexed: 0, failed: 0, interrupted: false };
  }
}
