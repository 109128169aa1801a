/**
 * Config Validator - range and consistency checks for FilekeeperConfig
 */

import type { FilekeeperConfig } from './types.js';

// ============================================================================
// Validation Error Types
// ============================================================================

export interface ConfigValidationError {
  /** Path to the invalid field, e.g. 'lifecycle.protectScore' */
  path: string;
  message: string;
  actual?: unknown;
  suggestion?: string;
}

export type ConfigValidationResult =
  | { valid: true; errors: [] }
  | { valid: false; errors: ConfigValidationError[] };

/**
 * Thrown by the loader when validation fails
 */
export class ConfigValidationException extends Error {
  constructor(
    message: string,
    public readonly errors: ConfigValidationError[]
  ) {
    super(`${message}: ${errors.map(e => `${e.path} ${e.message}`).join('; ')}`);
    this.name = 'ConfigValidationException';
  }

  /**
   * Human-readable listing with suggestions
   */
  format(): string {
    const lines = [this.message.split(':')[0] ?? this.message];
    for (const error of this.errors) {
      lines.push(`  - ${error.path}: ${error.message}`);
      if (error.suggestion) {
        lines.push(`    Suggestion: ${error.suggestion}`);
      }
    }
    return lines.join('\n');
  }
}

// ============================================================================
// Validation
// ============================================================================

function checkRange(
  errors: ConfigValidationError[],
  path: string,
  value: number,
  min: number,
  max: number,
  suggestion: string
): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    errors.push({
      path,
      message: `must be between ${min} and ${max}`,
      actual: value,
      suggestion,
    });
  }
}

/**
 * Validate a fully merged configuration
 */
export function validateConfig(config: FilekeeperConfig): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];
  const { lifecycle, consolidation, index } = config;

  checkRange(errors, 'lifecycle.agingAfterDays', lifecycle.agingAfterDays, 0, 3650,
    'Use a number of days such as 14');
  checkRange(errors, 'lifecycle.archiveAfterDays', lifecycle.archiveAfterDays, 0, 3650,
    'Use a number of days such as 30');
  if (lifecycle.archiveAfterDays < lifecycle.agingAfterDays) {
    errors.push({
      path: 'lifecycle.archiveAfterDays',
      message: 'must not be shorter than lifecycle.agingAfterDays',
      actual: lifecycle.archiveAfterDays,
      suggestion: `Set it to at least ${lifecycle.agingAfterDays}`,
    });
  }
  checkRange(errors, 'lifecycle.protectScore', lifecycle.protectScore, 0, 10,
    'Scores range from 0 to 10; the default is 8.5');

  checkRange(errors, 'consolidation.similarityThreshold', consolidation.similarityThreshold, 0, 1,
    'Use a similarity such as 0.7');
  checkRange(errors, 'consolidation.temporalWindowMinutes', consolidation.temporalWindowMinutes, 1, 60 * 24 * 30,
    'Use a window in minutes such as 120');
  const { tags, temporal, topic } = consolidation.weights;
  for (const [name, weight] of [['tags', tags], ['temporal', temporal], ['topic', topic]] as const) {
    checkRange(errors, `consolidation.weights.${name}`, weight, 0, 1, 'Weights are fractions that sum to 1');
  }
  if (Math.abs(tags + temporal + topic - 1) > 1e-6) {
    errors.push({
      path: 'consolidation.weights',
      message: 'must sum to 1',
      actual: tags + temporal + topic,
      suggestion: 'The defaults are 0.4 / 0.3 / 0.3',
    });
  }

  if (!Number.isInteger(index.segments) || index.segments < 1 || index.segments > 64) {
    errors.push({
      path: 'index.segments',
      message: 'must be an integer between 1 and 64',
      actual: index.segments,
    });
  }
  checkRange(errors, 'index.retryBaseSeconds', index.retryBaseSeconds, 0, 86400,
    'Use a delay in seconds such as 30');
  if (index.retryMaxSeconds < index.retryBaseSeconds) {
    errors.push({
      path: 'index.retryMaxSeconds',
      message: 'must not be shorter than index.retryBaseSeconds',
      actual: index.retryMaxSeconds,
    });
  }
  checkRange(errors, 'index.snippetTokens', index.snippetTokens, 1, 64,
    'FTS5 snippets take between 1 and 64 tokens');

  if (config.storage.dataDir.trim() === '') {
    errors.push({ path: 'storage.dataDir', message: 'must not be empty', suggestion: 'Use .filekeeper' });
  }

  return errors.length === 0 ? { valid: true, errors: [] } : { valid: false, errors };
}
