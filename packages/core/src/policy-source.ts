/**
 * Policy Sources
 *
 * Where per-branch policy keys come from. Every source offers
 * get-with-default semantics and hands back raw text; interpretation is the
 * resolver's job, so both sources resolve identically.
 */

import type { BranchEntry, HookSettings, PolicyKey } from '@branch-gate/config';
import { getConfigValue } from '@branch-gate/git';

export interface PolicySource {
  /** Human-readable origin, for logs */
  readonly description: string;
  /**
   * Raw value of `key` for `branch`, or `defaultValue` when unset
   *
   * @throws ConfigurationError if the store cannot be read
   */
  get(branch: string, key: PolicyKey, defaultValue: string): string;
}

/**
 * Keys stored in git config as <section>.<branch>.<key>
 *
 * @example
 * ```
 * git config branchgate.release.enforceMergeOnly true
 * ```
 */
export class GitConfigPolicySource implements PolicySource {
  readonly description: string;

  constructor(
    private readonly section: string,
    private readonly cwd?: string,
  ) {
    this.description = `git config section "${section}"`;
  }

  get(branch: string, key: PolicyKey, defaultValue: string): string {
    return getConfigValue(`${this.section}.${branch}.${key}`, defaultValue, this.cwd);
  }
}

/**
 * Keys stored under `branches:` in the settings file
 */
export class FilePolicySource implements PolicySource {
  readonly description = 'settings file branches table';

  constructor(private readonly branches: Readonly<Record<string, BranchEntry>>) {}

  get(branch: string, key: PolicyKey, defaultValue: string): string {
    if (!Object.hasOwn(this.branches, branch)) {
      return defaultValue;
    }
    const value = this.branches[branch][key];
    return value === undefined ? defaultValue : String(value);
  }
}

/**
 * Build the source named by the settings
 */
export function createPolicySource(settings: HookSettings, cwd?: string): PolicySource {
  switch (settings.policySource) {
    case 'file':
      return new FilePolicySource(settings.branches);
    case 'git-config':
      return new GitConfigPolicySource(settings.gitConfigSection, cwd);
  }
}
