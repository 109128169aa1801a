/**
 * Workspace
 *
 * Main entry point. Wires configuration, the metadata store, the archive
 * index and the four engines together for one workspace root, and exposes
 * the operations collaborators call.
 */

import { ArchiveIndex } from './archive/archive-index.js';
import { IndexIngestion, type RetryRunResult } from './archive/ingestion.js';
import type { IArchiveIndex, ReindexResult } from './archive/interface.js';
import { ConfigLoader, mergeConfig } from './config/config-loader.js';
import { validateConfig, ConfigValidationException } from './config/config-validator.js';
import type { DeepPartial, FilekeeperConfig } from './config/types.js';
import {
  ConsolidationAdvisor,
  type ConsolidationPreview,
  type ConsolidationResult,
} from './consolidation/advisor.js';
import type { SimilarityScorer } from './consolidation/similarity.js';
import { errorMessage, NotFoundError } from './errors.js';
import { LifecycleManager, type AgingSweepResult, type ArchiveSweepResult, type SweepOptions } from './lifecycle/manager.js';
import { PathLocks } from './lifecycle/path-locks.js';
import { SweepScheduler, type SchedulerConfig } from './lifecycle/scheduler.js';
import { SweepGuard, type Guarded } from './lifecycle/sweep-guard.js';
import { createLogger, type Logger } from './logging/logger.js';
import { PatternRecognizer, type RecordSessionOptions } from './patterns/recognizer.js';
import { SQLiteSessionLog } from './patterns/storage/sqlite.js';
import { suggestWorkflowOptimizations } from './patterns/suggestions.js';
import { RetentionScorer, type ScoreFactors } from './scoring/retention-scorer.js';
import { createMetadataStore, resolveDataPaths } from './storage/factory.js';
import type { StoreStats } from './storage/interface.js';
import type { SQLiteMetadataStore } from './storage/sqlite/metadata-store.js';
import type {
  ArchiveRecord,
  ConsolidationLogEntry,
  ConsolidationOpportunity,
  InsightGeneration,
  LifecycleEvent,
  LifecycleStatus,
  PatternInsight,
  PurgeEntry,
  RegistrationHints,
  SearchFilters,
  SearchResult,
  SessionOutcome,
  SessionRecord,
  TrackedFile,
  TuningParameters,
  WorkflowSuggestion,
} from './types/index.js';
import { systemClock, type Clock } from './utils/time.js';
import { WorkspaceFiles } from './workspace/files.js';

export interface WorkspaceOptions {
  /** Complete configuration; skips the config file and environment */
  config?: FilekeeperConfig;
  /** Applied over the loaded configuration */
  overrides?: DeepPartial<FilekeeperConfig>;
  /** Keep the metadata store and index in memory */
  inMemory?: boolean;
  /** Replace the on-disk index, e.g. with a failing stand-in */
  index?: IArchiveIndex;
  similarity?: SimilarityScorer;
  scheduler?: Partial<SchedulerConfig>;
  logger?: Logger;
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
}

export interface WorkspaceStats extends StoreStats {
  sessions: number;
  indexSegments: Array<number | null>;
}

export class Workspace {
  readonly lifecycle: LifecycleManager;
  readonly consolidation: ConsolidationAdvisor;
  readonly patterns: PatternRecognizer;
  readonly scheduler: SweepScheduler;
  readonly scorer: RetentionScorer;

  private readonly guard: SweepGuard;
  private readonly sessionLog: SQLiteSessionLog;

  private constructor(
    readonly rootDir: string,
    readonly config: FilekeeperConfig,
    private readonly store: SQLiteMetadataStore,
    private readonly index: IArchiveIndex,
    private readonly files: WorkspaceFiles,
    private readonly logger: Logger,
    private readonly clock: Clock,
    options: WorkspaceOptions
  ) {
    const locks = new PathLocks();
    const ingestion = new IndexIngestion(store, index, config.index, { logger, clock });

    this.guard = new SweepGuard();
    this.scorer = new RetentionScorer();
    this.sessionLog = new SQLiteSessionLog(store.database);
    this.lifecycle = new LifecycleManager({
      store,
      files,
      ingestion,
      config,
      scorer: this.scorer,
      locks,
      guard: this.guard,
      logger,
      clock,
    });
    this.consolidation = new ConsolidationAdvisor({
      store,
      files,
      ingestion,
      locks,
      config,
      similarity: options.similarity,
      scorer: this.scorer,
      logger,
      clock,
    });
    this.patterns = new PatternRecognizer(this.sessionLog, { logger, clock });
    this.scheduler = new SweepScheduler(this.lifecycle, { enabled: false, ...options.scheduler }, logger);
    this.scheduler.start();
  }

  /**
   * Open (creating if needed) the workspace rooted at `rootDir`
   */
  static async open(rootDir: string, options: WorkspaceOptions = {}): Promise<Workspace> {
    let config = options.config ?? (await new ConfigLoader({ rootDir, env: options.env }).getConfig());
    if (options.overrides) {
      config = mergeConfig(config, options.overrides);
      const validation = validateConfig(config);
      if (!validation.valid) {
        throw new ConfigValidationException('Invalid filekeeper configuration', validation.errors);
      }
    }

    const logger = options.logger ?? createLogger({ prefix: 'workspace', debug: config.logging.debug });
    const clock = options.clock ?? systemClock;
    const paths = resolveDataPaths(rootDir, config);

    const store = await createMetadataStore(options.inMemory ? ':memory:' : paths.metadataDb);
    const index =
      options.index ??
      new ArchiveIndex({
        indexDir: options.inMemory ? null : paths.indexDir,
        segments: config.index.segments,
        snippetTokens: config.index.snippetTokens,
        logger,
      });
    await index.initialize();

    const files = new WorkspaceFiles(rootDir, config.storage.dataDir);
    logger.debug(`open: ${rootDir} (${options.inMemory ? 'in memory' : paths.dataDir})`);
    return new Workspace(rootDir, config, store, index, files, logger, clock, options);
  }

  async close(): Promise<void> {
    this.scheduler.stop();
    await this.index.close();
    await this.store.close();
  }

  // ==========================================================================
  // Files
  // ==========================================================================

  async register(path: string, content: string, hints?: RegistrationHints): Promise<TrackedFile> {
    return this.lifecycle.register(path, content, hints);
  }

  async touch(path: string): Promise<TrackedFile> {
    return this.lifecycle.touch(path);
  }

  async archive(path: string): Promise<ArchiveRecord> {
    return this.lifecycle.archive(path);
  }

  async getFile(path: string): Promise<TrackedFile> {
    return this.store.getFile(this.files.normalize(path));
  }

  async listFiles(): Promise<TrackedFile[]> {
    return this.store.listFiles();
  }

  async getLifecycleStatus(path: string): Promise<LifecycleStatus> {
    return this.lifecycle.getLifecycleStatus(path);
  }

  async rescore(path: string): Promise<TrackedFile> {
    return this.lifecycle.rescore(path);
  }

  async retain(path: string, reason: string): Promise<TrackedFile> {
    return this.lifecycle.retain(path, reason);
  }

  async release(path: string): Promise<TrackedFile> {
    return this.lifecycle.release(path);
  }

  /**
   * Score content without tracking it
   */
  explainScore(content: string, hints: RegistrationHints = {}): ScoreFactors {
    return this.scorer.explain({
      content,
      generationMode: hints.generationMode ?? this.config.defaultGenerationMode,
      retentionDays: hints.retentionDays,
      stakeholders: hints.stakeholders,
      frameworks: hints.frameworks,
    });
  }

  async listEvents(path?: string): Promise<LifecycleEvent[]> {
    return this.store.listEvents(path === undefined ? undefined : this.files.normalize(path));
  }

  // ==========================================================================
  // Sweeps
  // ==========================================================================

  async runAgingSweep(options?: SweepOptions): Promise<Guarded<AgingSweepResult>> {
    return this.lifecycle.runAgingSweep(options);
  }

  async runArchiveSweep(options?: SweepOptions): Promise<Guarded<ArchiveSweepResult>> {
    return this.lifecycle.runArchiveSweep(options);
  }

  async retryPendingIngestion(options?: SweepOptions): Promise<Guarded<RetryRunResult>> {
    return this.lifecycle.retryPendingIngestion(options);
  }

  // ==========================================================================
  // Archive
  // ==========================================================================

  async search(query: string, filters?: SearchFilters): Promise<SearchResult> {
    return this.index.search(query, filters);
  }

  async getArchiveRecord(archiveId: string): Promise<ArchiveRecord> {
    return this.store.getArchiveRecord(archiveId);
  }

  async listArchiveRecords(options?: { limit?: number; offset?: number }): Promise<ArchiveRecord[]> {
    return this.store.listArchiveRecords(options);
  }

  /**
   * Rebuild the index from the archive records
   */
  async reindex(options: SweepOptions = {}): Promise<Guarded<ReindexResult>> {
    return this.guard.run('reindex', () =>
      this.index.reindex(this.store, { signal: options.signal, at: this.clock().toISOString() })
    );
  }

  /**
   * Remove an archive record for good. The only way archived content is
   * ever deleted, and it is logged.
   */
  async purgeArchive(archiveId: string, reason: string): Promise<PurgeEntry> {
    const entry = await this.store.purgeArchiveRecord(archiveId, reason, this.clock().toISOString());
    try {
      await this.index.remove(archiveId);
    } catch (error) {
      // The next reindex drops the stale entry
      this.logger.warn(
        `purge: ${archiveId} removed from the archive but not the index: ${errorMessage(error)}`
      );
    }
    this.logger.info(`purge: ${archiveId} (${entry.originalPath}): ${reason}`);
    return entry;
  }

  async listPurges(): Promise<PurgeEntry[]> {
    return this.store.listPurges();
  }

  // ==========================================================================
  // Consolidation
  // ==========================================================================

  async listConsolidationOpportunities(): Promise<ConsolidationOpportunity[]> {
    return this.consolidation.listOpportunities();
  }

  async previewConsolidation(opportunity: ConsolidationOpportunity): Promise<ConsolidationPreview> {
    return this.consolidation.preview(opportunity);
  }

  async applyConsolidation(opportunity: ConsolidationOpportunity): Promise<ConsolidationResult> {
    return this.consolidation.apply(opportunity);
  }

  async listConsolidations(): Promise<ConsolidationLogEntry[]> {
    return this.store.listConsolidations();
  }

  // ==========================================================================
  // Patterns
  // ==========================================================================

  async recordSession(
    files: string[],
    outcome: SessionOutcome,
    durationMinutes: number,
    options?: RecordSessionOptions
  ): Promise<SessionRecord> {
    return this.patterns.recordSession(files, outcome, durationMinutes, options);
  }

  async computeInsights(): Promise<PatternInsight[]> {
    return this.patterns.computeInsights();
  }

  async publishInsights(): Promise<InsightGeneration> {
    return this.patterns.publishInsights();
  }

  async suggestOptimizations(): Promise<WorkflowSuggestion[]> {
    return suggestWorkflowOptimizations(await this.patterns.computeInsights());
  }

  /**
   * Derive tuning from the session log and hand it to the lifecycle
   * manager and the consolidation advisor
   */
  async applyTuning(): Promise<TuningParameters> {
    const tuning = await this.patterns.deriveTuning({
      temporalWindowMinutes: this.config.consolidation.temporalWindowMinutes,
      similarityThreshold: this.config.consolidation.similarityThreshold,
      agingMultiplier: 1,
    });
    this.lifecycle.applyTuning(tuning);
    this.consolidation.applyTuning(tuning);
    return tuning;
  }

  // ==========================================================================
  // Stats
  // ==========================================================================

  async getStats(): Promise<WorkspaceStats> {
    const stats = await this.store.getStats();
    const sizes = this.index instanceof ArchiveIndex ? this.index.segmentSizes() : [];
    return { ...stats, sessions: await this.sessionLog.count(), indexSegments: sizes };
  }

  /**
   * Tracked file or archive records for a path, for lookups that accept both
   */
  async locate(path: string): Promise<{ tracked: TrackedFile | null; archived: ArchiveRecord[] }> {
    const target = this.files.normalize(path);
    const tracked = await this.store.findFile(target);
    const archived = await this.store.listArchiveRecordsByPath(target);
    if (!tracked && archived.length === 0) {
      throw new NotFoundError(target);
    }
    return { tracked, archived };
  }
}
