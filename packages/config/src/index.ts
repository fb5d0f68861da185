/**
 * @branch-gate/config
 *
 * Hook settings for branch-gate with YAML-first design and Zod schema
 * validation.
 *
 * @example Settings file
 * ```yaml
 * # <git-dir>/branch-gate.config.yaml
 * policySource: file
 * commitScope: tip
 * trustStoreFallback: ambient
 *
 * branches:
 *   release:
 *     enforceMergeOnly: true
 *   secure:
 *     enforceAuthOnly: true
 *     authTrustStorePath: /srv/git/keys/secure
 * ```
 */

// Core schema types and validation
export {
  type BranchEntry,
  type PolicySourceKind,
  type CommitScope,
  type TrustStoreFallback,
  type HookSettings,
  type HookSettingsInput,
  type SettingsValidation,
  BranchEntrySchema,
  PolicySourceKindSchema,
  CommitScopeSchema,
  TrustStoreFallbackSchema,
  HookSettingsSchema,
  safeValidateSettings,
  defaultSettings,
} from './schema.js';

// Settings loading
export {
  resolveSettingsLocation,
  loadSettingsFromFile,
  loadSettings,
  type SettingsLocation,
} from './loader.js';

// Constants
export {
  SETTINGS_DEFAULTS,
  POLICY_KEYS,
  SETTINGS_FILE_NAME,
  SETTINGS_ENV_VAR,
  type PolicyKey,
} from './constants.js';
