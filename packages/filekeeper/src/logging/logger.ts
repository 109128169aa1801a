/**
 * Logger
 *
 * Minimal leveled logger. Every line carries the component prefix and an
 * ISO timestamp so failures can be traced back to a path and operation.
 */

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export interface LoggerOptions {
  /** Component prefix, e.g. 'lifecycle' */
  prefix: string;
  /** Emit debug lines; shorthand for level 'debug' */
  debug?: boolean;
  /** Most verbose level written (default: info) */
  level?: LogLevel;
  /** Clock for the timestamp column */
  now?: () => Date;
  /** Write every level to stderr, keeping stdout for command output */
  stderr?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  const now = options.now ?? (() => new Date());
  const threshold = LEVEL_RANK[options.debug ? 'debug' : (options.level ?? 'info')];
  const enabled = (level: LogLevel): boolean => LEVEL_RANK[level] <= threshold;
  const line = (level: LogLevel, msg: string): string =>
    `[filekeeper:${options.prefix}] ${now().toISOString()} ${level.toUpperCase()} ${msg}`;

  return {
    error: (msg) => {
      if (enabled('error')) console.error(line('error', msg));
    },
    warn: (msg) => {
      if (enabled('warn')) console.warn(line('warn', msg));
    },
    info: (msg) => {
      if (enabled('info')) (options.stderr ? console.error : console.info)(line('info', msg));
    },
    debug: (msg) => {
      if (enabled('debug')) (options.stderr ? console.error : console.debug)(line('debug', msg));
    },
  };
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};
