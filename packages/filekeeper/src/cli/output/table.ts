/**
 * Table output format - human-readable terminal output.
 */

import chalk from 'chalk';

type TableRow = Record<string, unknown>;

function isRow(value: unknown): value is TableRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format data as a human-readable table.
 */
export function formatTable(data: unknown): string {
  if (data === null || data === undefined) {
    return '';
  }

  // Arrays of objects become table rows
  if (Array.isArray(data)) {
    if (data.length === 0) return 'No results.\n';
    const rows = data.filter(isRow);
    if (rows.length === data.length) {
      return renderObjectTable(rows);
    }
    return data.map(String).join('\n') + '\n';
  }

  if (isRow(data)) {
    return renderKeyValue(data);
  }

  return String(data) + '\n';
}

function renderObjectTable(rows: TableRow[]): string {
  const keys = [...new Set(rows.flatMap(row => Object.keys(row)))];
  const widths = keys.map(k => Math.max(k.length, ...rows.map(r => formatCellValue(r[k]).length)));
  const width = (i: number): number => widths[i] ?? 0;

  const lines: string[] = [];
  lines.push(chalk.bold(keys.map((k, i) => k.padEnd(width(i))).join('  ')));
  lines.push(widths.map(w => '─'.repeat(w)).join('──'));

  for (const row of rows) {
    lines.push(keys.map((k, i) => formatCellValue(row[k]).padEnd(width(i))).join('  '));
  }

  return lines.join('\n') + '\n';
}

/**
 * Format a cell value for table display.
 * Arrays of primitives are joined, arrays of objects are counted, long
 * strings are truncated.
 */
function formatCellValue(v: unknown): string {
  if (v === null || v === undefined) return '';
  if (Array.isArray(v)) {
    if (v.length === 0) return '';
    if (v.every(item => typeof item !== 'object')) return v.join(', ');
    return String(v.length);
  }
  if (typeof v === 'object') return JSON.stringify(v);
  const s = String(v).replace(/\s+/g, ' ');
  if (s.length > 80) return s.slice(0, 77) + '...';
  return s;
}

function renderKeyValue(obj: TableRow): string {
  const entries = Object.entries(obj);
  if (entries.length === 0) return 'No data.\n';

  const maxKeyLen = Math.max(...entries.map(([k]) => k.length));
  return (
    entries.map(([k, v]) => `${chalk.bold(k.padEnd(maxKeyLen))}  ${formatValue(v)}`).join('\n') + '\n'
  );
}

function formatValue(v: unknown): string {
  if (v === null || v === undefined) return '-';
  if (typeof v === 'object') return JSON.stringify(v);
  return String(v);
}
