/**
 * Configuration Schema with Zod Validation
 *
 * Hook settings and the optional file-based branch policy table.
 */

import { z } from 'zod';

import { SETTINGS_DEFAULTS } from './constants.js';

/**
 * A raw policy value as written in YAML
 *
 * Any scalar is accepted (`true`, `"true"`, `1`, an empty value) and handed
 * to the resolver as text, which decides what counts as enabled. Lists and
 * mappings are still rejected.
 */
const PolicyValueSchema = z.union([z.boolean(), z.string(), z.number(), z.null()]);

/**
 * Per-branch entry (file policy source only)
 */
export const BranchEntrySchema = z.object({
  /** Require the pushed commit to be a merge commit */
  enforceMergeOnly: PolicyValueSchema.optional(),

  /** Require a good signature on the pushed commit */
  enforceAuthOnly: PolicyValueSchema.optional(),

  /** GnuPG home directory used for verification */
  authTrustStorePath: z.string().optional(),
}).strict();

export type BranchEntry = z.infer<typeof BranchEntrySchema>;

export const PolicySourceKindSchema = z.enum(['git-config', 'file']);
export type PolicySourceKind = z.infer<typeof PolicySourceKindSchema>;

/**
 * tip: inspect only the new tip commit
 * introduced: inspect every commit the update introduces
 */
export const CommitScopeSchema = z.enum(['tip', 'introduced']);
export type CommitScope = z.infer<typeof CommitScopeSchema>;

/**
 * ambient: no trust store configured -> verify against the ambient one;
 *   configured but missing -> fail closed
 * skip-if-missing: no usable trust store -> skip verification
 */
export const TrustStoreFallbackSchema = z.enum(['ambient', 'skip-if-missing']);
export type TrustStoreFallback = z.infer<typeof TrustStoreFallbackSchema>;

/**
 * Hook Settings Schema
 *
 * Root object of branch-gate.config.yaml. Every key is optional.
 */
export const HookSettingsSchema = z.object({
  /** Where per-branch policies come from (default: git-config) */
  policySource: PolicySourceKindSchema.optional().default(SETTINGS_DEFAULTS.POLICY_SOURCE),

  /** git config section for per-branch keys (default: branchgate) */
  gitConfigSection: z
    .string()
    .regex(/^[A-Za-z][A-Za-z0-9-]*$/, 'Section must be alphanumeric (dashes allowed)')
    .optional()
    .default(SETTINGS_DEFAULTS.GIT_CONFIG_SECTION),

  /** Log file path (default: <git-dir>/branch-gate.log) */
  logFile: z.string().min(1, 'Log file path cannot be empty').optional(),

  /** Which commits are inspected (default: tip) */
  commitScope: CommitScopeSchema.optional().default(SETTINGS_DEFAULTS.COMMIT_SCOPE),

  /** Behavior when no usable trust store exists (default: ambient) */
  trustStoreFallback: TrustStoreFallbackSchema.optional().default(
    SETTINGS_DEFAULTS.TRUST_STORE_FALLBACK,
  ),

  /** Branch short name -> policy keys (policySource: file) */
  branches: z.record(z.string(), BranchEntrySchema).optional().default({}),
}).strict();

/** Settings with defaults applied */
export type HookSettings = z.output<typeof HookSettingsSchema>;

/** Settings as written by a user */
export type HookSettingsInput = z.input<typeof HookSettingsSchema>;

export type SettingsValidation =
  | { success: true; data: HookSettings }
  | { success: false; errors: string[] };

/**
 * Validate raw settings without throwing
 *
 * Each error names the offending key path, e.g.
 * `branches.release.enforceMergeOnly: Invalid input`.
 */
export function safeValidateSettings(raw: unknown): SettingsValidation {
  const parsed = HookSettingsSchema.safeParse(raw);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  return {
    success: false,
    errors: parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    ),
  };
}

/**
 * Settings used when no settings file exists
 */
export function defaultSettings(): HookSettings {
  return HookSettingsSchema.parse({});
}
