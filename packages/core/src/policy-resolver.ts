/**
 * Policy Resolver
 *
 * Turns a ref name into the effective BranchPolicy. Only refs under
 * refs/heads/ carry policy; everything else gets the non-enforcing default.
 */

import { POLICY_KEYS, type PolicyKey } from '@branch-gate/config';
import type { Logger } from '@branch-gate/utils';

import { isFlagEnabled, parsePolicyFlag } from './policy-flag.js';
import type { PolicySource } from './policy-source.js';
import type { BranchPolicy } from './types.js';

export const BRANCH_NAMESPACE = 'refs/heads/';

export const DEFAULT_POLICY: BranchPolicy = Object.freeze({
  mergeOnly: false,
  authOnly: false,
});

export interface ResolvedPolicy {
  /** Branch short name, or null for refs outside refs/heads/ */
  branch: string | null;
  policy: BranchPolicy;
}

/**
 * Strip the branch namespace from a ref
 *
 * @returns The branch short name, or null if the ref is not a branch
 */
export function branchShortName(refName: string): string | null {
  if (!refName.startsWith(BRANCH_NAMESPACE)) {
    return null;
  }
  const short = refName.slice(BRANCH_NAMESPACE.length);
  return short.length > 0 ? short : null;
}

/**
 * Whether a policy requires any commit inspection at all
 */
export function isEnforcing(policy: BranchPolicy): boolean {
  return policy.mergeOnly || policy.authOnly;
}

export class PolicyResolver {
  constructor(
    private readonly source: PolicySource,
    private readonly logger: Logger,
  ) {}

  /**
   * Resolve the policy for a ref
   *
   * @throws ConfigurationError if the policy source cannot be read
   */
  resolve(refName: string): ResolvedPolicy {
    const branch = branchShortName(refName);
    if (branch === null) {
      this.logger.debug('config', 'Ref outside branch namespace, no policy', { refName });
      return { branch: null, policy: DEFAULT_POLICY };
    }

    const policy: BranchPolicy = Object.freeze({
      mergeOnly: this.readFlag(branch, 'enforceMergeOnly'),
      authOnly: this.readFlag(branch, 'enforceAuthOnly'),
      trustStorePath: this.readValue(branch, 'authTrustStorePath') || undefined,
    });

    this.logger.debug('config', 'Resolved branch policy', {
      branch,
      source: this.source.description,
      ...policy,
    });
    return { branch, policy };
  }

  private readValue(branch: string, key: PolicyKey): string {
    return this.source.get(branch, key, POLICY_KEYS[key]);
  }

  private readFlag(branch: string, key: 'enforceMergeOnly' | 'enforceAuthOnly'): boolean {
    const raw = this.readValue(branch, key);
    const flag = parsePolicyFlag(raw);
    if (flag === 'unparseable') {
      this.logger.warn('config', `Unrecognized value for ${key}, treating as false`, {
        branch,
        value: raw,
        source: this.source.description,
      });
    }
    return isFlagEnabled(flag);
  }
}
