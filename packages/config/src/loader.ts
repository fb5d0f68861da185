/**
 * Configuration Loader
 *
 * Loads and validates branch-gate hook settings from YAML files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { ConfigurationError } from '@branch-gate/utils';
import { parse as parseYaml } from 'yaml';

import { SETTINGS_ENV_VAR, SETTINGS_FILE_NAME } from './constants.js';
import { defaultSettings, safeValidateSettings, type HookSettings } from './schema.js';

export interface SettingsLocation {
  /** Absolute path of the settings file */
  path: string;
  /** True when the path was requested explicitly (option or env var) */
  explicit: boolean;
}

/**
 * Decide which settings file applies
 *
 * Precedence: explicit path, then BRANCH_GATE_CONFIG, then
 * <git-dir>/branch-gate.config.yaml.
 */
export function resolveSettingsLocation(
  gitDir: string,
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): SettingsLocation {
  if (explicitPath) {
    return { path: resolve(explicitPath), explicit: true };
  }
  const fromEnv = env[SETTINGS_ENV_VAR];
  if (fromEnv) {
    return { path: resolve(fromEnv), explicit: true };
  }
  return { path: join(gitDir, SETTINGS_FILE_NAME), explicit: false };
}

/**
 * Load settings from a file path
 *
 * @param configPath - Path to a .yaml/.yml settings file
 * @returns Validated settings with defaults applied
 * @throws ConfigurationError if the file cannot be read or is invalid
 */
export async function loadSettingsFromFile(configPath: string): Promise<HookSettings> {
  const absolutePath = resolve(configPath);

  if (!absolutePath.endsWith('.yaml') && !absolutePath.endsWith('.yml')) {
    throw new ConfigurationError(
      `Unsupported settings file format: ${absolutePath}\n` +
      `Only .yaml format is supported.`
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read settings file ${absolutePath}`, { cause: error });
  }

  // An empty file parses to null: no overrides
  if (raw === null || raw === undefined) {
    return defaultSettings();
  }

  // Remove $schema property if present (used for IDE support only)
  if (typeof raw === 'object' && '$schema' in raw) {
    const { $schema: _schema, ...rest } = raw;
    raw = rest;
  }

  const result = safeValidateSettings(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid settings in ${absolutePath}:\n  ${result.errors.join('\n  ')}`
    );
  }
  return result.data;
}

/**
 * Load the settings that apply to a repository
 *
 * A missing default-location file means "all defaults". A missing file that
 * was asked for explicitly is an error.
 */
export async function loadSettings(location: SettingsLocation): Promise<HookSettings> {
  if (!existsSync(location.path)) {
    if (location.explicit) {
      throw new ConfigurationError(`Settings file not found: ${location.path}`);
    }
    return defaultSettings();
  }
  return await loadSettingsFromFile(location.path);
}
