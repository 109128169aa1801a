/**
 * Filekeeper - workspace file lifecycle and archive engine
 *
 * Scores generated files for retention, moves them through
 * active -> aging -> archive_eligible -> archived, keeps archived content
 * searchable in a segmented full-text index, suggests consolidations and
 * tunes itself from session history.
 *
 * @packageDocumentation
 */

// Main Workspace class
export { Workspace, type WorkspaceOptions, type WorkspaceStats } from './workspace.js';

// Types
export * from './types/index.js';

// Errors
export {
  ConflictError,
  IndexDegradedError,
  NotFoundError,
  StorageFailureError,
  ValidationFailureError,
  errorMessage,
  isDomainError,
} from './errors.js';

// Configuration
export * from './config/index.js';

// Logging
export { createLogger, silentLogger, type Logger, type LoggerOptions, type LogLevel } from './logging/logger.js';

// Storage
export * from './storage/index.js';

// Scoring
export * from './scoring/index.js';

// Lifecycle
export * from './lifecycle/index.js';

// Archive index
export * from './archive/index.js';

// Consolidation
export * from './consolidation/index.js';

// Patterns
export * from './patterns/index.js';

// Utilities
export { systemClock, type Clock } from './utils/time.js';
export { hashContent } from './utils/hash.js';
