/**
 * Core types for branch-gate policy evaluation
 */

import type { CommitSha, RefName, VerificationVerdict } from '@branch-gate/git';

/**
 * One ref update as handed to the update hook
 */
export interface RefUpdate {
  /** Fully qualified ref, e.g. refs/heads/release */
  refName: RefName;
  /** Current ref value; all zeros when the ref is being created */
  oldCommitId: CommitSha;
  /** Proposed ref value; all zeros when the ref is being deleted */
  newCommitId: CommitSha;
}

/**
 * Effective policy for one ref, resolved fresh per invocation
 */
export interface BranchPolicy {
  readonly mergeOnly: boolean;
  readonly authOnly: boolean;
  /** GnuPG home to verify against; undefined means none configured */
  readonly trustStorePath?: string;
}

/**
 * Facts about one commit, computed on first access
 */
export interface CommitFacts {
  readonly commitId: CommitSha;
  parentCount(): number;
  verificationVerdict(): VerificationVerdict;
}

export type PolicyName = 'merge-only' | 'auth-only';

export interface AcceptVerdict {
  kind: 'accept';
}

export interface RejectVerdict {
  kind: 'reject';
  policy: PolicyName;
  /** Stable reason, e.g. "merge-only policy violated" */
  reason: string;
  /** The commit that violated the policy */
  commitId: CommitSha;
  /** What was observed, e.g. "1 parent" or "bad signature" */
  detail: string;
}

export type Verdict = AcceptVerdict | RejectVerdict;
