export * from './types.js';
export { DEFAULT_CONFIG } from './defaults.js';
export {
  ConfigLoader,
  ConfigLoadError,
  ConfigParseError,
  mergeConfig,
  parseConfigObject,
  type ConfigLoaderOptions,
  type ConfigLoadResult,
} from './config-loader.js';
export {
  validateConfig,
  ConfigValidationException,
  type ConfigValidationError,
  type ConfigValidationResult,
} from './config-validator.js';
