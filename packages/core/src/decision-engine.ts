/**
 * Decision Engine
 *
 * Combines a branch policy with commit facts. Checks run in a fixed order
 * and the first violation wins, so later facts are never computed after a
 * rejection.
 */

import type { BranchPolicy, CommitFacts, Verdict } from './types.js';

export const ACCEPT: Verdict = Object.freeze({ kind: 'accept' as const });

export const MERGE_ONLY_VIOLATION = 'merge-only policy violated';
export const AUTH_ONLY_VIOLATION = 'auth-only policy violated';

const VERDICT_DESCRIPTIONS = {
  Good: 'good signature',
  Bad: 'bad signature',
  Unverifiable: 'signature from an untrusted key',
  NoSignature: 'no signature',
} as const;

export function decide(policy: BranchPolicy, facts: CommitFacts): Verdict {
  if (policy.mergeOnly) {
    const parents = facts.parentCount();
    if (parents <= 1) {
      return {
        kind: 'reject',
        policy: 'merge-only',
        reason: MERGE_ONLY_VIOLATION,
        commitId: facts.commitId,
        detail: `${parents} parent${parents === 1 ? '' : 's'}`,
      };
    }
  }

  if (policy.authOnly) {
    const verdict = facts.verificationVerdict();
    if (verdict !== 'Good') {
      return {
        kind: 'reject',
        policy: 'auth-only',
        reason: AUTH_ONLY_VIOLATION,
        commitId: facts.commitId,
        detail: VERDICT_DESCRIPTIONS[verdict],
      };
    }
  }

  return ACCEPT;
}
