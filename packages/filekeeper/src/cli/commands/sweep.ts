/**
 * filekeeper sweep | watch - run lifecycle sweeps once, or on an interval
 */

import type { Command } from 'commander';

import type { SweepRound } from '../../lifecycle/scheduler.js';
import { addCommonOptions, parseNumber, runWithWorkspace, type CommonOptions } from '../context.js';

interface WatchCommandOptions extends CommonOptions {
  interval: string;
  rounds?: string;
}

const SWEEPS = ['aging', 'archive', 'retry', 'all'] as const;
type SweepName = (typeof SWEEPS)[number];

function isSweepName(value: string): value is SweepName {
  return SWEEPS.some(name => name === value);
}

/**
 * One table row per round
 */
export function summarizeRound(round: SweepRound, index: number): Record<string, string | number | boolean> {
  const aging = round.aging && !round.aging.skipped ? round.aging.result : null;
  const archive = round.archive && !round.archive.skipped ? round.archive.result : null;
  const retry = round.retry && !round.retry.skipped ? round.retry.result : null;
  return {
    round: index + 1,
    startedAt: round.startedAt,
    toAging: aging?.toAging ?? 0,
    toArchiveEligible: aging?.toArchiveEligible ?? 0,
    archived: archive?.archived.length ?? 0,
    retried: retry?.succeeded ?? 0,
    interrupted: round.interrupted,
    error: round.error ?? '',
  };
}

export function registerSweepCommand(program: Command): void {
  addCommonOptions(
    program
      .command('sweep [kind]')
      .description('Run the aging, archive or index-retry sweep (default: all, in that order)')
  ).action(async (kind: string | undefined, opts: CommonOptions) => {
    await runWithWorkspace(opts, async workspace => {
      const name = kind ?? 'all';
      if (!isSweepName(name)) {
        throw new Error(`Unknown sweep "${name}"; use ${SWEEPS.join(', ')}`);
      }
      const summary: Record<string, unknown> = {};
      if (name === 'aging' || name === 'all') {
        const run = await workspace.runAgingSweep();
        summary['aging'] = run.skipped ? 'skipped' : run.result;
      }
      if (name === 'archive' || name === 'all') {
        const run = await workspace.runArchiveSweep();
        summary['archive'] = run.skipped ? 'skipped' : run.result;
      }
      if (name === 'retry' || name === 'all') {
        const run = await workspace.retryPendingIngestion();
        summary['retry'] = run.skipped ? 'skipped' : run.result;
      }
      return summary;
    });
  });
}

export function registerWatchCommand(program: Command): void {
  addCommonOptions(
    program
      .command('watch')
      .description('Run all sweeps every interval until interrupted')
      .option('-i, --interval <minutes>', 'Minutes between rounds', '60')
      .option('-n, --rounds <count>', 'Stop after this many rounds')
  ).action(async (opts: WatchCommandOptions) => {
    await runWithWorkspace(opts, async workspace => {
      const intervalMinutes = parseNumber('--interval', opts.interval);
      if (intervalMinutes <= 0) {
        throw new Error('--interval must be greater than 0');
      }
      const rounds = opts.rounds === undefined ? undefined : parseNumber('--rounds', opts.rounds);
      const stop = (): void => workspace.scheduler.stop();
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);
      try {
        const completed = await workspace.scheduler.watch({ intervalMinutes, rounds });
        return completed.map(summarizeRound);
      } finally {
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
      }
    });
  });
}
