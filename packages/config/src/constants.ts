/**
 * Configuration Constants
 *
 * Single source of truth for all default values and key names.
 *
 * @packageDocumentation
 */

/**
 * Default hook settings
 *
 * @example
 * ```typescript
 * import { SETTINGS_DEFAULTS } from '@branch-gate/config';
 *
 * const scope = settings.commitScope ?? SETTINGS_DEFAULTS.COMMIT_SCOPE;
 * ```
 */
export const SETTINGS_DEFAULTS = {
  /** Where per-branch policies are read from */
  POLICY_SOURCE: 'git-config' as const,

  /** git config section holding per-branch keys: <section>.<branch>.<key> */
  GIT_CONFIG_SECTION: 'branchgate' as const,

  /** Log file name, relative to the git directory */
  LOG_FILE_NAME: 'branch-gate.log' as const,

  /** Inspect only the pushed tip commit */
  COMMIT_SCOPE: 'tip' as const,

  /** Verify against the ambient trust store when none is configured */
  TRUST_STORE_FALLBACK: 'ambient' as const,
} as const;

/**
 * Per-branch policy keys and their defaults
 *
 * Defaults are strings because every policy source hands back raw text;
 * interpretation happens in the policy resolver.
 */
export const POLICY_KEYS = {
  enforceMergeOnly: 'false',
  enforceAuthOnly: 'false',
  authTrustStorePath: '',
} as const;

export type PolicyKey = keyof typeof POLICY_KEYS;

/**
 * Settings file name, looked up in the git directory
 */
export const SETTINGS_FILE_NAME = 'branch-gate.config.yaml';

/**
 * Environment variable naming an explicit settings file
 */
export const SETTINGS_ENV_VAR = 'BRANCH_GATE_CONFIG';
