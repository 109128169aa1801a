/**
 * JSON column helpers
 */

/**
 * Parse a JSON array column, keeping only string entries
 */
export function parseStringArray(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  const list: unknown[] = Array.isArray(parsed) ? parsed : [];
  return list.filter((value): value is string => typeof value === 'string');
}
