/**
 * Config Loader - Configuration loading and merging
 *
 * Loads configuration from <root>/.filekeeper/config.json, merges it over
 * the defaults and applies FILEKEEPER_* environment overrides.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig, ConfigValidationException } from './config-validator.js';
import { isGenerationMode } from '../types/index.js';

import type { DeepPartial, FilekeeperConfig } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const CONFIG_DIR = '.filekeeper';
const CONFIG_FILE = 'config.json';
const ENV_PREFIX = 'FILEKEEPER_';

const ENV_VARS = {
  AGING_AFTER_DAYS: `${ENV_PREFIX}AGING_AFTER_DAYS`,
  ARCHIVE_AFTER_DAYS: `${ENV_PREFIX}ARCHIVE_AFTER_DAYS`,
  PROTECT_SCORE: `${ENV_PREFIX}PROTECT_SCORE`,
  SIMILARITY_THRESHOLD: `${ENV_PREFIX}SIMILARITY_THRESHOLD`,
  INDEX_SEGMENTS: `${ENV_PREFIX}INDEX_SEGMENTS`,
  GENERATION_MODE: `${ENV_PREFIX}GENERATION_MODE`,
  DEBUG: `${ENV_PREFIX}DEBUG`,
} as const;

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when the configuration file cannot be read
 */
export class ConfigLoadError extends Error {
  public readonly errorCause: Error | undefined;

  constructor(
    message: string,
    public readonly filePath: string,
    errorCause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when the configuration file is not valid JSON or has
 * fields of the wrong type
 */
export class ConfigParseError extends Error {
  public readonly errorCause: Error | undefined;

  constructor(
    message: string,
    public readonly filePath: string,
    errorCause?: Error
  ) {
    super(message);
    this.name = 'ConfigParseError';
    this.errorCause = errorCause;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  return undefined;
}

function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = parseFloat(value);
  return isNaN(num) ? undefined : num;
}

function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

/**
 * Reads typed fields out of a parsed JSON section, collecting type errors
 */
class SectionReader {
  constructor(
    private readonly section: Record<string, unknown>,
    private readonly prefix: string,
    private readonly problems: string[]
  ) {}

  number(key: string): number | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || isNaN(value)) {
      this.problems.push(`${this.prefix}${key} must be a number`);
      return undefined;
    }
    return value;
  }

  boolean(key: string): boolean | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') {
      this.problems.push(`${this.prefix}${key} must be a boolean`);
      return undefined;
    }
    return value;
  }

  string(key: string): string | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
      this.problems.push(`${this.prefix}${key} must be a string`);
      return undefined;
    }
    return value;
  }

  child(key: string): SectionReader {
    const value = this.section[key];
    if (value !== undefined && !isPlainObject(value)) {
      this.problems.push(`${this.prefix}${key} must be an object`);
    }
    return new SectionReader(isPlainObject(value) ? value : {}, `${this.prefix}${key}.`, this.problems);
  }
}

/**
 * Convert a parsed config.json object into a typed partial configuration
 */
export function parseConfigObject(
  raw: Record<string, unknown>,
  filePath: string
): DeepPartial<FilekeeperConfig> {
  const problems: string[] = [];
  const root = new SectionReader(raw, '', problems);

  const mode = root.string('defaultGenerationMode');
  if (mode !== undefined && !isGenerationMode(mode)) {
    problems.push('defaultGenerationMode must be one of minimal, professional, research');
  }

  const lifecycle = root.child('lifecycle');
  const consolidation = root.child('consolidation');
  const weights = consolidation.child('weights');
  const index = root.child('index');
  const storage = root.child('storage');
  const logging = root.child('logging');

  const parsed: DeepPartial<FilekeeperConfig> = {
    defaultGenerationMode: mode !== undefined && isGenerationMode(mode) ? mode : undefined,
    lifecycle: {
      agingAfterDays: lifecycle.number('agingAfterDays'),
      archiveAfterDays: lifecycle.number('archiveAfterDays'),
      protectScore: lifecycle.number('protectScore'),
    },
    consolidation: {
      similarityThreshold: consolidation.number('similarityThreshold'),
      temporalWindowMinutes: consolidation.number('temporalWindowMinutes'),
      weights: {
        tags: weights.number('tags'),
        temporal: weights.number('temporal'),
        topic: weights.number('topic'),
      },
    },
    index: {
      segments: index.number('segments'),
      retryBaseSeconds: index.number('retryBaseSeconds'),
      retryMaxSeconds: index.number('retryMaxSeconds'),
      snippetTokens: index.number('snippetTokens'),
    },
    storage: {
      dataDir: storage.string('dataDir'),
    },
    logging: {
      debug: logging.boolean('debug'),
    },
  };

  if (problems.length > 0) {
    throw new ConfigParseError(`Invalid configuration: ${problems.join('; ')}`, filePath);
  }
  return parsed;
}

/**
 * Overlay a partial configuration onto a complete one
 */
export function mergeConfig(
  base: FilekeeperConfig,
  patch: DeepPartial<FilekeeperConfig>
): FilekeeperConfig {
  return {
    defaultGenerationMode: patch.defaultGenerationMode ?? base.defaultGenerationMode,
    lifecycle: {
      agingAfterDays: patch.lifecycle?.agingAfterDays ?? base.lifecycle.agingAfterDays,
      archiveAfterDays: patch.lifecycle?.archiveAfterDays ?? base.lifecycle.archiveAfterDays,
      protectScore: patch.lifecycle?.protectScore ?? base.lifecycle.protectScore,
    },
    consolidation: {
      similarityThreshold:
        patch.consolidation?.similarityThreshold ?? base.consolidation.similarityThreshold,
      temporalWindowMinutes:
        patch.consolidation?.temporalWindowMinutes ?? base.consolidation.temporalWindowMinutes,
      weights: {
        tags: patch.consolidation?.weights?.tags ?? base.consolidation.weights.tags,
        temporal: patch.consolidation?.weights?.temporal ?? base.consolidation.weights.temporal,
        topic: patch.consolidation?.weights?.topic ?? base.consolidation.weights.topic,
      },
    },
    index: {
      segments: patch.index?.segments ?? base.index.segments,
      retryBaseSeconds: patch.index?.retryBaseSeconds ?? base.index.retryBaseSeconds,
      retryMaxSeconds: patch.index?.retryMaxSeconds ?? base.index.retryMaxSeconds,
      snippetTokens: patch.index?.snippetTokens ?? base.index.snippetTokens,
    },
    storage: {
      dataDir: patch.storage?.dataDir ?? base.storage.dataDir,
    },
    logging: {
      debug: patch.logging?.debug ?? base.logging.debug,
    },
  };
}

// ============================================================================
// Config Loader Class
// ============================================================================

export interface ConfigLoaderOptions {
  /** Workspace root containing .filekeeper/config.json */
  rootDir?: string | undefined;
  /** Whether to apply environment variable overrides */
  applyEnvOverrides?: boolean | undefined;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv | undefined;
}

export interface ConfigLoadResult {
  config: FilekeeperConfig;
  configPath?: string | undefined;
  configFileFound: boolean;
  envOverridesApplied: boolean;
}

/**
 * ConfigLoader - Loads the workspace configuration
 */
export class ConfigLoader {
  private readonly applyEnvOverrides: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private readonly configPath: string;
  private cachedConfig: FilekeeperConfig | null = null;

  constructor(options: ConfigLoaderOptions = {}) {
    const rootDir = options.rootDir ?? process.cwd();
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.env = options.env ?? process.env;
    this.configPath = path.join(rootDir, CONFIG_DIR, CONFIG_FILE);
  }

  /**
   * Load from file, merge over defaults, apply env overrides and validate
   */
  async load(): Promise<ConfigLoadResult> {
    let config = DEFAULT_CONFIG;
    let configFileFound = false;
    let envOverridesApplied = false;

    const fileConfig = await this.loadFromFile();
    if (fileConfig) {
      config = mergeConfig(config, fileConfig);
      configFileFound = true;
    }

    if (this.applyEnvOverrides) {
      const envConfig = this.getEnvOverrides();
      if (Object.keys(envConfig).length > 0) {
        config = mergeConfig(config, envConfig);
        envOverridesApplied = true;
      }
    }

    const validation = validateConfig(config);
    if (!validation.valid) {
      throw new ConfigValidationException('Invalid filekeeper configuration', validation.errors);
    }

    this.cachedConfig = config;
    return {
      config,
      configPath: configFileFound ? this.configPath : undefined,
      configFileFound,
      envOverridesApplied,
    };
  }

  /**
   * Cached configuration, loading on first use
   */
  async getConfig(): Promise<FilekeeperConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }
    return (await this.load()).config;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Write a configuration file, creating the data directory if needed
   */
  async save(config: FilekeeperConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
    this.cachedConfig = config;
  }

  private async loadFromFile(): Promise<DeepPartial<FilekeeperConfig> | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw new ConfigLoadError(
        `Failed to read configuration file: ${error instanceof Error ? error.message : String(error)}`,
        this.configPath,
        error instanceof Error ? error : undefined
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (parseError) {
      throw new ConfigParseError(
        `Failed to parse configuration file: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
        this.configPath,
        parseError instanceof Error ? parseError : undefined
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigParseError('Configuration must be a JSON object', this.configPath);
    }
    return parseConfigObject(parsed, this.configPath);
  }

  private getEnvOverrides(): DeepPartial<FilekeeperConfig> {
    const overrides: DeepPartial<FilekeeperConfig> = {};

    const agingAfterDays = parseEnvNumber(this.env[ENV_VARS.AGING_AFTER_DAYS]);
    const archiveAfterDays = parseEnvNumber(this.env[ENV_VARS.ARCHIVE_AFTER_DAYS]);
    const protectScore = parseEnvNumber(this.env[ENV_VARS.PROTECT_SCORE]);
    if (agingAfterDays !== undefined || archiveAfterDays !== undefined || protectScore !== undefined) {
      overrides.lifecycle = { agingAfterDays, archiveAfterDays, protectScore };
    }

    const similarityThreshold = parseEnvNumber(this.env[ENV_VARS.SIMILARITY_THRESHOLD]);
    if (similarityThreshold !== undefined) {
      overrides.consolidation = { similarityThreshold };
    }

    const segments = parseEnvInteger(this.env[ENV_VARS.INDEX_SEGMENTS]);
    if (segments !== undefined) {
      overrides.index = { segments };
    }

    const mode = this.env[ENV_VARS.GENERATION_MODE];
    if (mode !== undefined && isGenerationMode(mode)) {
      overrides.defaultGenerationMode = mode;
    }

    const debug = parseEnvBoolean(this.env[ENV_VARS.DEBUG]);
    if (debug !== undefined) {
      overrides.logging = { debug };
    }

    return overrides;
  }
}
