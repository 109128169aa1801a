/**
 * filekeeper session | insights - session log and pattern insights
 */

import type { Command } from 'commander';

import { isSessionOutcome, SESSION_OUTCOMES, type InsightValue } from '../../types/index.js';
import { addCommonOptions, parseNumber, runWithWorkspace, type CommonOptions } from '../context.js';

interface InsightsOptions extends CommonOptions {
  publish?: boolean;
  tune?: boolean;
  suggest?: boolean;
}

export function registerPatternCommands(program: Command): void {
  addCommonOptions(
    program
      .command('session <outcome> <minutes> <files...>')
      .description(`Record a finished session (outcome: ${SESSION_OUTCOMES.join(', ')})`)
      .option('--id <sessionId>', 'Session ID (default: generated)')
  ).action(async (outcome: string, minutes: string, files: string[], opts: CommonOptions & { id?: string }) => {
    await runWithWorkspace(opts, async workspace => {
      if (!isSessionOutcome(outcome)) {
        throw new Error(`Unknown outcome "${outcome}"; use ${SESSION_OUTCOMES.join(', ')}`);
      }
      return workspace.recordSession(files, outcome, parseNumber('<minutes>', minutes), { sessionId: opts.id });
    });
  });

  addCommonOptions(
    program
      .command('insights')
      .description('Compute insights from the session log')
      .option('--publish', 'Store the insights as a new generation')
      .option('--tune', 'Show the tuning the insights derive')
      .option('--suggest', 'Suggest workflow changes from confident insights')
  ).action(async (opts: InsightsOptions) => {
    await runWithWorkspace(opts, async workspace => {
      if (opts.suggest) {
        return (await workspace.suggestOptimizations()).map(suggestion => ({
          kind: suggestion.kind,
          confidence: suggestion.confidence,
          suggestion: suggestion.message,
        }));
      }
      if (opts.tune) {
        return workspace.applyTuning();
      }
      const insights = opts.publish
        ? (await workspace.publishInsights()).insights
        : await workspace.computeInsights();
      return insights.map(insight => ({
        kind: insight.kind,
        samples: insight.sampleCount,
        confidence: insight.confidence,
        value: describeValue(insight.value),
      }));
    });
  });
}

function describeValue(value: InsightValue): string {
  switch (value.kind) {
    case 'timing':
      return `median ${value.medianDurationMinutes} min`;
    case 'workflow':
      return `${value.sequence[0]} -> ${value.sequence[1]} (${value.occurrences}x)`;
    case 'content':
      return `${value.meanFilesPerSession} files per session`;
    case 'outcome':
      return `${Math.round(value.successRate * 100)}% success`;
  }
}
