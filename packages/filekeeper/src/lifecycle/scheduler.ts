/**
 * Sweep Scheduler
 *
 * Runs the aging, archive and retry sweeps on a fixed interval. The
 * background timer is unref'd so it never keeps the process alive on its
 * own; `watch` is the foreground loop the CLI runs until it is stopped.
 */

import type { RetryRunResult } from '../archive/ingestion.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { AgingSweepResult, ArchiveSweepResult, LifecycleManager } from './manager.js';
import type { Guarded } from './sweep-guard.js';

/**
 * Scheduler configuration
 */
export interface SchedulerConfig {
  /** Whether the background timer runs */
  enabled: boolean;
  /** Minutes between sweep rounds */
  intervalMinutes: number;
  /** Run a round immediately on start */
  runOnStart: boolean;
}

/**
 * The sweeps a round drives
 */
export type SweepRunner = Pick<LifecycleManager, 'runAgingSweep' | 'runArchiveSweep' | 'retryPendingIngestion'>;

/**
 * Outcome of one round. A sweep that never started because the round was
 * stopped is absent.
 */
export interface SweepRound {
  startedAt: string;
  aging?: Guarded<AgingSweepResult>;
  archive?: Guarded<ArchiveSweepResult>;
  retry?: Guarded<RetryRunResult>;
  interrupted: boolean;
  error?: string;
}

export interface WatchOptions {
  /** Stop after this many rounds; unlimited when absent */
  rounds?: number;
  /** Overrides the configured interval */
  intervalMinutes?: number;
  /** Called after every round */
  onRound?: (round: SweepRound) => void;
}

const DEFAULT_CONFIG: SchedulerConfig = {
  enabled: true,
  intervalMinutes: 60,
  runOnStart: false,
};

export class SweepScheduler {
  private readonly config: SchedulerConfig;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private controller: AbortController | null = null;
  private wake: (() => void) | null = null;
  private stopped = false;
  private lastRun: Date | null = null;

  constructor(
    private readonly runner: SweepRunner,
    config?: Partial<SchedulerConfig>,
    logger?: Logger
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger ?? silentLogger;
  }

  start(): void {
    if (!this.config.enabled || this.timer) return;
    this.stopped = false;

    this.timer = setInterval(() => {
      void this.runRound();
    }, this.config.intervalMinutes * 60 * 1000);
    this.timer.unref();

    if (this.config.runOnStart) {
      void this.runRound();
    }
  }

  /**
   * Stop the timer and any watch loop, and interrupt a round in progress
   * at its next file
   */
  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    this.wake?.();
  }

  /**
   * One round: aging, then archive, then index retries. Never rejects; a
   * failure is logged and reported on the round.
   */
  async runRound(): Promise<SweepRound> {
    const controller = new AbortController();
    this.controller = controller;
    const options = { signal: controller.signal };
    const round: SweepRound = { startedAt: new Date().toISOString(), interrupted: false };
    try {
      round.aging = await this.runner.runAgingSweep(options);
      if (!controller.signal.aborted) {
        round.archive = await this.runner.runArchiveSweep(options);
      }
      if (!controller.signal.aborted) {
        round.retry = await this.runner.retryPendingIngestion(options);
      }
      round.interrupted = controller.signal.aborted;
      this.lastRun = new Date();
    } catch (error) {
      round.error = errorMessage(error);
      this.logger.error(`scheduler: sweep round failed: ${round.error}`);
    } finally {
      if (this.controller === controller) {
        this.controller = null;
      }
    }
    return round;
  }

  /**
   * Run rounds in the foreground, one interval apart, until `stop()` is
   * called or the round limit is reached. Unlike the background timer the
   * wait keeps the process alive.
   */
  async watch(options: WatchOptions = {}): Promise<SweepRound[]> {
    this.stopped = false;
    const rounds: SweepRound[] = [];
    const limit = options.rounds ?? Number.POSITIVE_INFINITY;
    const interval = options.intervalMinutes ?? this.config.intervalMinutes;

    while (!this.stopped && rounds.length < limit) {
      const round = await this.runRound();
      rounds.push(round);
      options.onRound?.(round);
      this.logger.info(`watch: round ${rounds.length} done${round.interrupted ? ' (interrupted)' : ''}`);
      if (this.stopped || rounds.length >= limit) {
        break;
      }
      await this.sleep(interval * 60 * 1000);
    }
    return rounds;
  }

  getStatus(): { running: boolean; lastRun: Date | null } {
    return { running: this.timer !== null, lastRun: this.lastRun };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
