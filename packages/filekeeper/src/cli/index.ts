/**
 * filekeeper CLI - command registration.
 */

import { Command } from 'commander';

import { registerArchiveCommands } from './commands/archive.js';
import { registerConsolidateCommand } from './commands/consolidate.js';
import { registerFileCommands } from './commands/files.js';
import { registerPatternCommands } from './commands/patterns.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerSweepCommand, registerWatchCommand } from './commands/sweep.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('filekeeper')
    .description('Retention lifecycle, archive search and consolidation for a workspace of generated files')
    .version(VERSION);

  registerFileCommands(program);
  registerArchiveCommands(program);
  registerConsolidateCommand(program);
  registerSweepCommand(program);
  registerWatchCommand(program);
  registerPatternCommands(program);
  registerStatsCommand(program);

  return program;
}

export { resetWorkspaceOptions, setWorkspaceOptions } from './context.js';
