/**
 * filekeeper consolidate - list, preview and apply merge opportunities
 */

import type { Command } from 'commander';

import type { ConsolidationOpportunity } from '../../types/index.js';
import { addCommonOptions, parseNumber, runWithWorkspace, type CommonOptions } from '../context.js';

interface ConsolidateOptions extends CommonOptions {
  preview?: string;
  apply?: string;
}

function pick(opportunities: ConsolidationOpportunity[], option: string, value: string): ConsolidationOpportunity {
  const position = parseNumber(option, value);
  const opportunity = opportunities[position - 1];
  if (!Number.isInteger(position) || opportunity === undefined) {
    throw new Error(`${option} must be between 1 and ${opportunities.length}, got ${value}`);
  }
  return opportunity;
}

export function registerConsolidateCommand(program: Command): void {
  addCommonOptions(
    program
      .command('consolidate')
      .description('Find groups of related active files that could be merged')
      .option('-p, --preview <n>', 'Show the merged content of opportunity n')
      .option('-a, --apply <n>', 'Merge opportunity n and archive its sources')
  ).action(async (opts: ConsolidateOptions) => {
    await runWithWorkspace(opts, async workspace => {
      const opportunities = await workspace.listConsolidationOpportunities();

      if (opts.apply !== undefined) {
        const result = await workspace.applyConsolidation(pick(opportunities, '--apply', opts.apply));
        return {
          destination: result.destination.path,
          archived: result.archived.map(record => record.archiveId),
          confidence: result.entry.confidence,
        };
      }
      if (opts.preview !== undefined) {
        return workspace.previewConsolidation(pick(opportunities, '--preview', opts.preview));
      }
      return opportunities.map((opportunity, i) => ({
        n: i + 1,
        kind: opportunity.kind,
        confidence: opportunity.confidence,
        destination: opportunity.suggestedName,
        sources: opportunity.sources.join(', '),
      }));
    });
  });
}
