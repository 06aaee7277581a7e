/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `wsa config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  BackendUrlSchema,
  BackendsConfigSchema,
  ModelsConfigSchema,
  QueryConfigSchema,
  ManagerConfigSchema,
  GenerationConfigSchema,
  ExportConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getHomeDir,
  getConfigPath,
} from './loader.js';

// Paths
export { HOME_DIR_NAME, getDefaultGuidesDir, expandHome } from './paths.js';

// Environment variables
export { loadEnv, SETUP_INSTRUCTIONS, EnvSchema, ENV_KEYS, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';

// Resolved settings
export { resolveSettings } from './settings.js';
export type {
  WorkspaceSettings,
  BackendSettings,
  ModelSettings,
  ExportSettings,
} from './settings.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  requiresStartupValidation,
  COMMANDS_REQUIRING_BACKENDS,
} from './startup-validation.js';
export type { StartupValidationResult } from './startup-validation.js';
