/**
 * Output format registration - table, JSON.
 */

import { formatJson } from './json.js';
import { formatTable } from './table.js';

export type OutputFormat = 'table' | 'json';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'table' || value === 'json';
}

/**
 * Format data for output in the specified format.
 */
export function formatOutput(data: unknown, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'table':
      return formatTable(data);
  }
}

export { formatJson } from './json.js';
export { formatTable } from './table.js';
