/**
 * filekeeper register | touch | archive | status | retain | release - tracked file commands
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { Command } from 'commander';

import { isGenerationMode, type RegistrationHints } from '../../types/index.js';
import { addCommonOptions, parseList, parseNumber, runWithWorkspace, type CommonOptions } from '../context.js';

interface RetainOptions extends CommonOptions {
  reason: string;
}

interface RegisterOptions extends CommonOptions {
  from?: string;
  mode?: string;
  tags?: string;
  stakeholders?: string;
  frameworks?: string;
  retainDays?: string;
  category?: string;
  session?: string;
  update?: boolean;
}

export function registerFileCommands(program: Command): void {
  addCommonOptions(
    program
      .command('register <path>')
      .description('Track a file; content is read from the path itself or from --from')
      .option('--from <file>', 'Read the content from another file')
      .option('-m, --mode <mode>', 'Generation mode: minimal, professional, research')
      .option('-t, --tags <tags>', 'Comma-separated tags')
      .option('--stakeholders <names>', 'Comma-separated stakeholders')
      .option('--frameworks <names>', 'Comma-separated frameworks')
      .option('--retain-days <days>', 'Retain for at least this many days')
      .option('--category <category>', 'Content category, e.g. meeting_prep')
      .option('--session <id>', 'Session that produced the file')
      .option('-u, --update', 'Replace the content of an already tracked path')
  ).action(async (path: string, opts: RegisterOptions) => {
    await runWithWorkspace(opts, async workspace => {
      const source = opts.from ?? join(workspace.rootDir, path);
      const content = await readFile(source, 'utf8');
      const hints: RegistrationHints = {
        tags: parseList(opts.tags),
        stakeholders: parseList(opts.stakeholders),
        frameworks: parseList(opts.frameworks),
        update: opts.update ?? false,
      };
      if (opts.mode !== undefined) {
        if (!isGenerationMode(opts.mode)) {
          throw new Error(`Unknown generation mode "${opts.mode}"`);
        }
        hints.generationMode = opts.mode;
      }
      if (opts.retainDays !== undefined) hints.retentionDays = parseNumber('--retain-days', opts.retainDays);
      if (opts.category !== undefined) hints.category = opts.category;
      if (opts.session !== undefined) hints.sessionId = opts.session;
      return workspace.register(path, content, hints);
    });
  });

  addCommonOptions(
    program.command('touch <path>').description('Record an access; the file returns to active')
  ).action(async (path: string, opts: CommonOptions) => {
    await runWithWorkspace(opts, workspace => workspace.touch(path));
  });

  addCommonOptions(
    program.command('archive <path>').description('Archive a file now, whatever its state')
  ).action(async (path: string, opts: CommonOptions) => {
    await runWithWorkspace(opts, async workspace => {
      const { content, ...record } = await workspace.archive(path);
      return { ...record, bytes: Buffer.byteLength(content, 'utf8') };
    });
  });

  addCommonOptions(
    program
      .command('status [path]')
      .description('Lifecycle status of a file, or of every tracked file')
  ).action(async (path: string | undefined, opts: CommonOptions) => {
    await runWithWorkspace(opts, async workspace => {
      if (path !== undefined) {
        return workspace.getLifecycleStatus(path);
      }
      const files = await workspace.listFiles();
      return Promise.all(
        files.map(async file => {
          const status = await workspace.getLifecycleStatus(file.path);
          return {
            path: status.path,
            state: status.state,
            score: status.score,
            protected: status.protected,
            retained: status.retained?.reason ?? '',
            next: status.nextTransition
              ? `${status.nextTransition.to}${status.nextTransition.at ? ` at ${status.nextTransition.at}` : ''}`
              : '',
          };
        })
      );
    });
  });

  addCommonOptions(
    program
      .command('retain <path>')
      .description('Keep a file out of aging and archive sweeps until it is released')
      .requiredOption('-r, --reason <reason>', 'Why the file is kept')
  ).action(async (path: string, opts: RetainOptions) => {
    await runWithWorkspace(opts, workspace => workspace.retain(path, opts.reason));
  });

  addCommonOptions(
    program.command('release <path>').description('Return a retained file to the normal lifecycle')
  ).action(async (path: string, opts: CommonOptions) => {
    await runWithWorkspace(opts, workspace => workspace.release(path));
  });
}
