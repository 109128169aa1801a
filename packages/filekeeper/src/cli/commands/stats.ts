/**
 * filekeeper stats - workspace overview
 */

import type { Command } from 'commander';

import { addCommonOptions, runWithWorkspace, type CommonOptions } from '../context.js';

export function registerStatsCommand(program: Command): void {
  addCommonOptions(
    program.command('stats').description('Tracked files by state, archive totals, index segment sizes')
  ).action(async (opts: CommonOptions) => {
    await runWithWorkspace(opts, async workspace => {
      const stats = await workspace.getStats();
      return {
        ...stats.trackedByState,
        archived: stats.archived,
        pendingIndexRetries: stats.pendingIndexRetries,
        sessions: stats.sessions,
        indexSegments: stats.indexSegments.map(size => (size === null ? 'unreadable' : size)).join(' '),
      };
    });
  });
}
