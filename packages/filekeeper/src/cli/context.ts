/**
 * Shared command plumbing: common options, opening the workspace, output
 * and error reporting.
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { errorMessage } from '../errors.js';
import { createLogger } from '../logging/logger.js';
import { Workspace, type WorkspaceOptions } from '../workspace.js';
import { formatOutput, isOutputFormat } from './output/index.js';

export interface CommonOptions {
  root?: string;
  format: string;
  verbose?: boolean;
  quiet?: boolean;
}

let workspaceOptions: WorkspaceOptions = {};

/**
 * Options every command opens its workspace with. Tests use this to keep
 * the workspace in memory or fix the clock.
 */
export function setWorkspaceOptions(options: WorkspaceOptions): void {
  workspaceOptions = options;
}

export function resetWorkspaceOptions(): void {
  workspaceOptions = {};
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('-C, --root <dir>', 'Workspace root (default: current directory)')
    .option('-f, --format <format>', 'Output format: table, json', 'table')
    .option('-v, --verbose', 'Log progress to stderr')
    .option('-q, --quiet', 'Suppress all output except errors');
}

/**
 * Open the workspace, run the action and print its result. Errors go to
 * stderr and set exit code 2.
 */
export async function runWithWorkspace(
  opts: CommonOptions,
  action: (workspace: Workspace) => Promise<unknown>
): Promise<void> {
  let workspace: Workspace | null = null;
  try {
    if (!isOutputFormat(opts.format)) {
      throw new Error(`Unknown format "${opts.format}"; use table or json`);
    }
    const format = opts.format;
    workspace = await Workspace.open(opts.root ?? process.cwd(), {
      logger: createLogger({ prefix: 'cli', level: opts.verbose ? 'debug' : 'warn', stderr: true }),
      ...workspaceOptions,
    });
    const result = await action(workspace);
    if (!opts.quiet) {
      process.stdout.write(formatOutput(result, format));
    }
  } catch (err) {
    process.stderr.write(`${chalk.red('Error:')} ${errorMessage(err)}\n`);
    process.exitCode = 2;
  } finally {
    await workspace?.close();
  }
}

/**
 * Comma-separated option value as a list
 */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item !== '');
}

export function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}
