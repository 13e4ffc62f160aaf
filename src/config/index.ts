/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `delve config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  SearchProviderNameSchema,
  LLMConfigSchema,
  ResearchConfigSchema,
  SearchConfigSchema,
  IndexConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, SearchProviderName } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Key catalogue
export { describeConfigKeys, findConfigKey, type ConfigKeyInfo } from './keys.js';

// Loader functions
export {
  loadConfig,
  resolveConfig,
  getConfigValue,
  setConfigValue,
  resetConfig,
  deepMerge,
} from './loader.js';

// Paths
export { getDelveDir, getDbPath, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, KeyedService } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_PROVIDERS,
} from './startup-validation.js';
export type { StartupValidationResult, StartupValidationOptions } from './startup-validation.js';
