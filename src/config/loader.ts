/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the home directory (~/.workspace-agent)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getHomeDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';
import { isJsonObject } from '../utils/json.js';

export { getConfigPath, getHomeDir } from './paths.js';

/**
 * Ensure the home directory exists
 */
function ensureHomeDir(): void {
  const homeDir = getHomeDir();
  if (!fs.existsSync(homeDir)) {
    fs.mkdirSync(homeDir, { recursive: true });
  }
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested objects are merged key by key; arrays and primitives replace.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isJsonObject(sourceValue) && isJsonObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Format Zod issues as an indented bullet list
 */
function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Read and parse the TOML file into a plain object.
 * Returns an empty object when the file is absent.
 */
function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');

  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: wsa config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the commented template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureHomeDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readConfigFile(configPath);

  // Sparse files are fine - missing keys come from the defaults
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      'Run: wsa config reset --force  to restore defaults'
    );
  }

  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), parsed);

  // Cross-field checks only make sense on the merged result
  const full = ConfigSchema.safeParse(merged);
  if (!full.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(full.error.issues)}`,
      'Run: wsa config reset --force  to restore defaults'
    );
  }

  if (full.data.query.default_top_k > full.data.query.max_top_k) {
    throw new ConfigError(
      `Invalid configuration: query.default_top_k (${full.data.query.default_top_k}) exceeds query.max_top_k (${full.data.query.max_top_k})`,
      'Lower query.default_top_k or raise query.max_top_k'
    );
  }

  return full.data;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('models.chat') => 'llama3.1'
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();

  for (const part of key.split('.')) {
    if (!isJsonObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 */
export function setConfigValue(key: string, value: string): void {
  const configPath = getConfigPath();
  ensureHomeDir();

  const config = readConfigFile(configPath);

  const parts = key.split('.').filter((part) => part !== '');
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: wsa config list  to see available keys'
    );
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  // Validate the complete config before saving
  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), config);
  const validationResult = ConfigSchema.strict().safeParse(merged);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error.issues)}`,
      'Run: wsa config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(config as TOML.JsonMap), 'utf-8');
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['models.chat', 'llama3.1']
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isJsonObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
