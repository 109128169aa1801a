/**
 * filekeeper search | reindex | purge - archive commands
 */

import type { Command } from 'commander';

import type { SearchFilters } from '../../types/index.js';
import { addCommonOptions, parseNumber, runWithWorkspace, type CommonOptions } from '../context.js';

interface SearchOptions extends CommonOptions {
  tag: string[];
  category?: string;
  context?: string;
  after?: string;
  before?: string;
  limit?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerArchiveCommands(program: Command): void {
  addCommonOptions(
    program
      .command('search <query>')
      .description('Full-text search over archived files')
      .option('--tag <tag>', 'Require a tag (repeatable)', collect, [])
      .option('--category <category>', 'Only this category')
      .option('--context <label>', 'Only files whose context labels contain this text, e.g. budget')
      .option('--after <date>', 'Archived at or after this ISO date')
      .option('--before <date>', 'Archived at or before this ISO date')
      .option('-n, --limit <count>', 'Maximum number of hits')
  ).action(async (query: string, opts: SearchOptions) => {
    await runWithWorkspace(opts, async workspace => {
      const filters: SearchFilters = {};
      if (opts.tag.length > 0) filters.tags = opts.tag;
      if (opts.category !== undefined) filters.category = opts.category;
      if (opts.context !== undefined) filters.context = opts.context;
      if (opts.after !== undefined) filters.archivedAfter = opts.after;
      if (opts.before !== undefined) filters.archivedBefore = opts.before;
      if (opts.limit !== undefined) filters.limit = parseNumber('--limit', opts.limit);

      const result = await workspace.search(query, filters);
      if (result.partial) {
        process.stderr.write(
          `Warning: partial results; unreadable segments: ${result.degradedSegments.join(', ') || 'rebuild pending'}\n`
        );
      }
      return result.hits.map(hit => ({
        relevance: hit.relevance,
        path: hit.originalPath,
        archivedAt: hit.archivedAt,
        archiveId: hit.archiveId,
        context: hit.context.join(', '),
        snippet: hit.snippet,
      }));
    });
  });

  addCommonOptions(
    program.command('reindex').description('Rebuild the search index from the archive records')
  ).action(async (opts: CommonOptions) => {
    await runWithWorkspace(opts, async workspace => {
      const run = await workspace.reindex();
      if (run.skipped) {
        throw new Error('A reindex is already running');
      }
      return run.result;
    });
  });

  addCommonOptions(
    program
      .command('purge <archiveId>')
      .description('Permanently delete an archive record')
      .requiredOption('-r, --reason <reason>', 'Why the record is deleted; kept in the purge log')
  ).action(async (archiveId: string, opts: CommonOptions & { reason: string }) => {
    await runWithWorkspace(opts, workspace => workspace.purgeArchive(archiveId, opts.reason));
  });
}
