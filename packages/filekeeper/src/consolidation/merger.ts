/**
 * Merged content and destination validation
 */

import { posix } from 'node:path';

import type { OpportunityKind } from '../types/index.js';

export interface MergeSource {
  path: string;
  content: string;
}

const FENCE = /^\s*(```|~~~)/;

function mergeMarkdown(sources: MergeSource[], title: string, kind: OpportunityKind): string {
  const sections = sources.map(source => `## ${source.path}\n\n${source.content.trim()}\n`);
  return [
    `# ${title}`,
    '',
    `_Consolidated from ${sources.length} files (${kind})._`,
    '',
    ...sections,
  ].join('\n');
}

function mergeJson(sources: MergeSource[], kind: OpportunityKind): string {
  const merged: Record<string, unknown> = {};
  for (const source of sources) {
    try {
      const parsed: unknown = JSON.parse(source.content);
      merged[source.path] = parsed;
    } catch {
      merged[source.path] = source.content;
    }
  }
  return `${JSON.stringify({ consolidatedFrom: sources.map(s => s.path), kind, sources: merged }, null, 2)}\n`;
}

function mergePlain(sources: MergeSource[]): string {
  return sources.map(source => `--- ${source.path} ---\n${source.content.trim()}\n`).join('\n');
}

/**
 * Merged destination content; the format follows the destination extension
 */
export function mergeContent(
  destinationPath: string,
  sources: MergeSource[],
  title: string,
  kind: OpportunityKind
): string {
  switch (posix.extname(destinationPath).toLowerCase()) {
    case '.md':
    case '.markdown':
      return mergeMarkdown(sources, title, kind);
    case '.json':
      return mergeJson(sources, kind);
    default:
      return mergePlain(sources);
  }
}

/**
 * Problems that make a destination unusable; empty when it is valid
 */
export function validateDestination(destinationPath: string, content: string): string[] {
  const problems: string[] = [];
  if (content.trim().length === 0) {
    problems.push('destination is empty');
    return problems;
  }

  switch (posix.extname(destinationPath).toLowerCase()) {
    case '.md':
    case '.markdown': {
      const fences = content.split('\n').filter(line => FENCE.test(line)).length;
      if (fences % 2 !== 0) {
        problems.push('unbalanced code fence');
      }
      break;
    }
    case '.json':
      try {
        JSON.parse(content);
      } catch (error) {
        problems.push(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
      }
      break;
  }
  return problems;
}
