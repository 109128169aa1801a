/**
 * ID Generator
 *
 * Format: <prefix>_<timestamp36>_<random hex>
 */

import { randomBytes } from 'node:crypto';

function generate(prefix: string, bytes: number): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(bytes).toString('hex');
  return `${prefix}_${timestamp}_${random}`;
}

/**
 * Generate a stable archive record ID
 */
export function generateArchiveId(): string {
  return generate('arc', 6);
}

/**
 * Generate a consolidation log entry ID
 */
export function generateConsolidationId(): string {
  return generate('cons', 4);
}

/**
 * Generate a session ID
 */
export function generateSessionId(): string {
  return generate('sess', 4);
}

/**
 * Generate an insight generation ID
 */
export function generateInsightGenerationId(): string {
  return generate('gen', 4);
}
