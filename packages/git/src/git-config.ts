/**
 * Git Config Lookups
 *
 * Reads repository-scoped values with get-with-default semantics, so a
 * missing key is never an error. A lookup that fails for any other reason
 * (unreadable config, not a repository) is a ConfigurationError.
 */

import { BackendError, ConfigurationError } from '@branch-gate/utils';

import { execStrictGitCommand } from './git-executor.js';

/**
 * Read a single git config value, returning `defaultValue` when unset
 *
 * @param key - Full key, e.g. 'branchgate.release.enforceMergeOnly'
 *
 * @example
 * ```typescript
 * getConfigValue('branchgate.release.enforceMergeOnly', 'false'); // "true"
 * ```
 */
export function getConfigValue(key: string, defaultValue: string, cwd?: string): string {
  if (!/^[A-Za-z][A-Za-z0-9-]*(\.[^\s\0]+)?\.[A-Za-z][A-Za-z0-9-]*$/.test(key)) {
    throw new ConfigurationError(`Invalid git config key: ${key}`);
  }

  try {
    return execStrictGitCommand(['config', '--default', defaultValue, '--get', key], { cwd });
  } catch (error) {
    if (error instanceof BackendError) {
      throw new ConfigurationError(`Cannot read git config key ${key}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Get the path to the git directory of the repository
 *
 * Inside a hook of a bare repository this is the repository itself.
 */
export function getGitDir(cwd?: string): string {
  try {
    return execStrictGitCommand(['rev-parse', '--absolute-git-dir'], { cwd });
  } catch (error) {
    if (error instanceof BackendError) {
      throw new ConfigurationError('Not inside a git repository', { cause: error });
    }
    throw error;
  }
}
