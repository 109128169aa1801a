/**
 * Lifecycle Manager
 *
 * Owns every state change of a tracked file: registration, access, the
 * aging and archive sweeps, and manual archival. Transitions on one path are
 * serialized by a path lock and committed with a compare-and-set on the
 * stored state, so a sweep never overwrites a concurrent access.
 *
 * Archival commits the archive record and removes the tracked record in one
 * transaction, then hands the record to the index and deletes the working
 * copy. Neither of the last two steps can lose data: a failed ingestion is
 * queued for retry, and a failed delete leaves an untracked file behind.
 */

import type { IndexIngestion, RetryRunResult } from '../archive/ingestion.js';
import type { FilekeeperConfig } from '../config/types.js';
import { ConflictError, errorMessage, StorageFailureError, ValidationFailureError } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { RetentionScorer } from '../scoring/retention-scorer.js';
import type { IMetadataStore } from '../storage/interface.js';
import type {
  ArchiveReason,
  ArchiveRecord,
  LifecycleStatus,
  PersistedState,
  RegistrationHints,
  TrackedFile,
  TuningParameters,
} from '../types/index.js';
import { hashContent } from '../utils/hash.js';
import { generateArchiveId } from '../utils/id-generator.js';
import { addDays, daysBetween, systemClock, type Clock } from '../utils/time.js';
import type { WorkspaceFiles } from '../workspace/files.js';
import { PathLocks } from './path-locks.js';
import { SweepGuard, type Guarded } from './sweep-guard.js';
import {
  agingThresholdDays,
  dueTransition,
  estimateNextTransition,
  isProtected,
  type LifecycleThresholds,
} from './transitions.js';

export interface SweepOptions {
  /** Checked before each file */
  signal?: AbortSignal | undefined;
}

export interface SweepError {
  path: string;
  error: string;
}

export interface AgingSweepResult {
  examined: number;
  toAging: number;
  toArchiveEligible: number;
  interrupted: boolean;
  errors: SweepError[];
}

export interface ArchiveSweepResult {
  examined: number;
  archived: string[];
  /** Archived records whose ingestion went to the retry queue */
  deferred: number;
  interrupted: boolean;
  errors: SweepError[];
}

export interface LifecycleManagerDeps {
  store: IMetadataStore;
  files: WorkspaceFiles;
  ingestion: IndexIngestion;
  config: FilekeeperConfig;
  scorer?: RetentionScorer;
  locks?: PathLocks;
  guard?: SweepGuard;
  logger?: Logger;
  clock?: Clock;
}

const DEFAULT_CATEGORY = 'general';

export function normalizeTags(tags: string[]): string[] {
  return [...new Set(tags.map(tag => tag.trim().toLowerCase()).filter(tag => tag !== ''))].sort();
}

export class LifecycleManager {
  private readonly store: IMetadataStore;
  private readonly files: WorkspaceFiles;
  private readonly ingestion: IndexIngestion;
  private readonly config: FilekeeperConfig;
  private readonly scorer: RetentionScorer;
  private readonly locks: PathLocks;
  private readonly guard: SweepGuard;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private agingMultiplier = 1;

  constructor(deps: LifecycleManagerDeps) {
    this.store = deps.store;
    this.files = deps.files;
    this.ingestion = deps.ingestion;
    this.config = deps.config;
    this.scorer = deps.scorer ?? new RetentionScorer();
    this.locks = deps.locks ?? new PathLocks();
    this.guard = deps.guard ?? new SweepGuard();
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? systemClock;
  }

  get thresholds(): LifecycleThresholds {
    return { ...this.config.lifecycle, agingMultiplier: this.agingMultiplier };
  }

  // ==========================================================================
  // Registration and access
  // ==========================================================================

  /**
   * Track a file and write its working copy. Registering identical content
   * again counts as an access; different content needs `hints.update`.
   */
  async register(path: string, content: string, hints: RegistrationHints = {}): Promise<TrackedFile> {
    const target = this.files.normalize(path);

    return this.locks.withLock(target, async () => {
      const now = this.now();
      const contentHash = hashContent(content);
      const existing = await this.store.findFile(target);

      if (existing && existing.contentHash !== contentHash && !hints.update) {
        this.logger.warn(`register: ${target} conflicts with tracked content at ${now}`);
        throw new ConflictError(target, existing.contentHash, contentHash);
      }

      const generationMode =
        hints.generationMode ?? existing?.generationMode ?? this.config.defaultGenerationMode;
      const retentionDays = hints.retentionDays ?? existing?.retentionDays;
      const stakeholders = hints.stakeholders ?? existing?.stakeholders ?? [];
      const frameworks = hints.frameworks ?? existing?.frameworks ?? [];
      const file: TrackedFile = {
        path: target,
        contentHash,
        createdAt: now,
        lastAccessedAt: now,
        lastModifiedAt: now,
        retentionScore: this.scorer.score({
          content,
          generationMode,
          retentionDays,
          stakeholders,
          frameworks,
        }),
        state: 'active',
        generationMode,
        tags: normalizeTags(hints.tags ?? existing?.tags ?? []),
        sessionId: hints.sessionId ?? existing?.sessionId,
        category: hints.category ?? existing?.category,
        retentionDays,
        stakeholders,
        frameworks,
      };

      const previous = await this.files.readIfExists(target);
      if (previous !== content) {
        await this.files.write(target, content);
      }

      try {
        const result = await this.store.register(file, { update: hints.update ?? false });
        this.logger.info(
          `register: ${target} ${result.outcome} (score ${result.file.retentionScore}, ${generationMode})`
        );
        return result.file;
      } catch (error) {
        this.logger.error(`register: ${target} failed at ${now}: ${errorMessage(error)}`);
        if (previous === null) {
          await this.files.remove(target);
        } else if (previous !== content) {
          await this.files.write(target, previous);
        }
        throw error;
      }
    });
  }

  /**
   * Record an access. Any state returns to active.
   */
  async touch(path: string): Promise<TrackedFile> {
    const target = this.files.normalize(path);
    return this.locks.withLock(target, async () => {
      const file = await this.store.touch(target, this.now());
      this.logger.debug(`touch: ${target}`);
      return file;
    });
  }

  /**
   * Recompute the score from the current working copy
   */
  async rescore(path: string): Promise<TrackedFile> {
    const target = this.files.normalize(path);
    return this.locks.withLock(target, async () => {
      const file = await this.store.getFile(target);
      const content = await this.files.read(target);
      const retentionScore = this.scorer.score({
        content,
        generationMode: file.generationMode,
        retentionDays: file.retentionDays,
        stakeholders: file.stakeholders,
        frameworks: file.frameworks,
      });
      await this.store.updateScore(target, retentionScore);
      this.logger.info(`rescore: ${target} ${file.retentionScore} -> ${retentionScore}`);
      return { ...file, retentionScore };
    });
  }

  /**
   * Keep a file out of the sweeps until it is released. The file returns
   * to active; explicit archival still works.
   */
  async retain(path: string, reason: string): Promise<TrackedFile> {
    const target = this.files.normalize(path);
    const note = reason.trim();
    if (note === '') {
      throw new ValidationFailureError(`retain ${target}`, ['reason must not be empty']);
    }
    return this.locks.withLock(target, async () => {
      const now = this.now();
      const file = await this.store.setRetention(target, { reason: note, at: now }, now, `retained: ${note}`);
      this.logger.info(`retain: ${target} (${note})`);
      return file;
    });
  }

  /**
   * Drop the retention mark. Idle time counts from the last access again.
   */
  async release(path: string): Promise<TrackedFile> {
    const target = this.files.normalize(path);
    return this.locks.withLock(target, async () => {
      const now = this.now();
      const file = await this.store.setRetention(target, null, now, 'released');
      this.logger.info(`release: ${target}`);
      return file;
    });
  }

  // ==========================================================================
  // Archival
  // ==========================================================================

  /**
   * Archive a file now, whatever its state
   */
  async archive(path: string, reason: ArchiveReason = 'manual'): Promise<ArchiveRecord> {
    const target = this.files.normalize(path);
    return this.locks.withLock(target, () => this.archiveLocked(target, reason));
  }

  private async archiveLocked(path: string, reason: ArchiveReason): Promise<ArchiveRecord> {
    const file = await this.store.getFile(path);
    const now = this.now();

    const content = await this.files.readIfExists(path);
    if (content === null) {
      const failure = new StorageFailureError(`archive ${path}`, new Error('working copy is missing'));
      this.logger.error(`archive: ${path} failed at ${now}: ${failure.message}`);
      throw failure;
    }
    const contentHash = hashContent(content);
    if (contentHash !== file.contentHash) {
      this.logger.warn(`archive: ${path} changed outside the workspace; archiving the current content`);
    }

    const record: ArchiveRecord = {
      archiveId: generateArchiveId(),
      originalPath: path,
      content,
      contentHash,
      tags: file.tags,
      category: file.category ?? DEFAULT_CATEGORY,
      archivedAt: now,
      sourceRetentionScore: file.retentionScore,
      reason,
      sessionId: file.sessionId,
    };

    try {
      await this.store.archiveFile(path, record);
    } catch (error) {
      this.logger.error(`archive: ${path} failed at ${now}: ${errorMessage(error)}`);
      throw error;
    }
    this.logger.info(`archive: ${path} -> ${record.archiveId} (${reason})`);

    const stored = await this.ingestion.ingest(record);
    await this.removeWorkingCopy(path);
    return stored;
  }

  /**
   * Delete an archived file's working copy. The archive already holds the
   * content, so a failure here is logged and left for the user.
   */
  async removeWorkingCopy(path: string): Promise<void> {
    try {
      await this.files.remove(path);
    } catch (error) {
      this.logger.warn(`archive: could not remove working copy ${path}: ${errorMessage(error)}`);
    }
  }

  // ==========================================================================
  // Sweeps
  // ==========================================================================

  /**
   * Move idle files to aging and aging files to archive_eligible. A file
   * idle past both thresholds moves through both in one sweep.
   */
  async runAgingSweep(options: SweepOptions = {}): Promise<Guarded<AgingSweepResult>> {
    return this.guard.run('aging', async () => {
      const now = this.now();
      const thresholds = this.thresholds;
      const cutoff = addDays(now, -agingThresholdDays(thresholds));
      const candidates = await this.store.listFiles({ accessedBefore: cutoff });
      const result: AgingSweepResult = {
        examined: 0,
        toAging: 0,
        toArchiveEligible: 0,
        interrupted: false,
        errors: [],
      };

      for (const candidate of candidates) {
        if (candidate.state === 'archive_eligible') {
          continue;
        }
        if (options.signal?.aborted) {
          result.interrupted = true;
          break;
        }
        result.examined++;
        try {
          await this.locks.withLock(candidate.path, () => this.advance(candidate.path, now, thresholds, result));
        } catch (error) {
          result.errors.push({ path: candidate.path, error: errorMessage(error) });
          this.logger.error(`aging sweep: ${candidate.path} failed at ${now}: ${errorMessage(error)}`);
        }
      }

      this.logger.info(
        `aging sweep: ${result.examined} examined, ${result.toAging} aging, ${result.toArchiveEligible} eligible`
      );
      return result;
    });
  }

  private async advance(
    path: string,
    now: string,
    thresholds: LifecycleThresholds,
    result: AgingSweepResult
  ): Promise<void> {
    let file = await this.store.findFile(path);
    while (file) {
      const next: PersistedState | null = dueTransition(file, now, thresholds);
      if (!next) {
        return;
      }
      const idle = daysBetween(file.lastAccessedAt, now).toFixed(1);
      const moved = await this.store.transitionState(path, file.state, next, now, `idle ${idle} days`);
      if (!moved) {
        return;
      }
      if (next === 'aging') {
        result.toAging++;
      } else {
        result.toArchiveEligible++;
      }
      file = { ...file, state: next };
    }
  }

  /**
   * Archive every archive-eligible file, one path at a time
   */
  async runArchiveSweep(options: SweepOptions = {}): Promise<Guarded<ArchiveSweepResult>> {
    return this.guard.run('archive', async () => {
      const candidates = await this.store.listFiles({ state: 'archive_eligible' });
      const result: ArchiveSweepResult = {
        examined: 0,
        archived: [],
        deferred: 0,
        interrupted: false,
        errors: [],
      };

      for (const candidate of candidates) {
        if (options.signal?.aborted) {
          result.interrupted = true;
          break;
        }
        result.examined++;
        try {
          const record = await this.locks.withLock(candidate.path, async () => {
            const current = await this.store.findFile(candidate.path);
            if (current?.state !== 'archive_eligible') {
              return null;
            }
            return this.archiveLocked(candidate.path, 'sweep');
          });
          if (record) {
            result.archived.push(record.archiveId);
            if (!record.indexedAt) {
              result.deferred++;
            }
          }
        } catch (error) {
          result.errors.push({ path: candidate.path, error: errorMessage(error) });
        }
      }

      this.logger.info(`archive sweep: ${result.archived.length} of ${result.examined} archived`);
      return result;
    });
  }

  /**
   * Retry queued index ingestions whose backoff has elapsed
   */
  async retryPendingIngestion(options: SweepOptions = {}): Promise<Guarded<RetryRunResult>> {
    return this.guard.run('retry', () => this.ingestion.retryDue(options.signal));
  }

  // ==========================================================================
  // Status and tuning
  // ==========================================================================

  async getLifecycleStatus(path: string): Promise<LifecycleStatus> {
    const file = await this.store.getFile(this.files.normalize(path));
    const thresholds = this.thresholds;
    return {
      path: file.path,
      score: file.retentionScore,
      state: file.state,
      protected: isProtected(file, thresholds),
      retained: file.retained ?? null,
      lastAccessedAt: file.lastAccessedAt,
      nextTransition: estimateNextTransition(file, thresholds),
    };
  }

  applyTuning(tuning: Pick<TuningParameters, 'agingMultiplier'>): void {
    this.agingMultiplier = tuning.agingMultiplier;
    this.logger.info(`tuning: aging multiplier ${tuning.agingMultiplier}`);
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
