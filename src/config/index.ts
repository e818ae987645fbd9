/**
 * Configuration module exports
 */

// Cadence
export { DEFAULT_CADENCE_MINUTES, parseCadence } from "./cadence";
// Defaults
export { DEFAULT_CONFIG, deepMerge, isPlainObject, type PlainObject } from "./defaults";
// Inline
export {
  buildInlineConfig,
  canRunWithoutConfigFile,
  CYCLE_CONFIG_OPTIONS,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  validateInlineOptionsForConfigFreeMode,
} from "./inline";
// Loader
export {
  buildConfig,
  CONFIG_FILE_NAMES,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  readConfigFile,
} from "./loader";
// Resolver
export { defaultArchiveName, resolveConfig } from "./resolver";
// Validator
export { ARCHIVE_FORMATS, validateConfig } from "./validator";
