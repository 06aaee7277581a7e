/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.workspace-agent/         (or $WORKSPACE_AGENT_HOME)
 * ├── config.toml             (User configuration)
 * └── study_guides/           (Default export directory)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/** Name of the home directory under the user's home */
export const HOME_DIR_NAME = '.workspace-agent';

/**
 * Get the workspace agent home directory.
 * Read on every call so tests can point it elsewhere.
 */
export function getHomeDir(): string {
  const override = process.env.WORKSPACE_AGENT_HOME?.trim();
  return override ? override : join(homedir(), HOME_DIR_NAME);
}

/**
 * Get the config file path (<home>/config.toml)
 */
export function getConfigPath(): string {
  return join(getHomeDir(), 'config.toml');
}

/**
 * Get the default study guide directory (<home>/study_guides)
 */
export function getDefaultGuidesDir(): string {
  return join(getHomeDir(), 'study_guides');
}

/**
 * Expand a leading ~ to the user's home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}
