/**
 * Lazy commit facts
 *
 * Each fact is queried from the inspector on first access and memoized, so
 * the decision engine pays only for the facts the active policy needs.
 */

import type { CommitInspector, CommitSha, VerificationVerdict } from '@branch-gate/git';
import type { Logger } from '@branch-gate/utils';

import type { CommitFacts } from './types.js';

/**
 * How signatures are checked for this evaluation
 *
 * - trust-store: verify against the given GnuPG home
 * - ambient: verify against whatever GNUPGHOME the hook inherited
 */
export type VerificationContext =
  | { mode: 'trust-store'; trustStorePath: string }
  | { mode: 'ambient' };

export class LazyCommitFacts implements CommitFacts {
  private parents: number | undefined;
  private verdict: VerificationVerdict | undefined;

  constructor(
    readonly commitId: CommitSha,
    private readonly inspector: CommitInspector,
    private readonly verification: VerificationContext,
    private readonly logger: Logger,
  ) {}

  parentCount(): number {
    if (this.parents === undefined) {
      this.parents = this.inspector.parentCount(this.commitId);
      this.logger.debug('git', 'Parent count', { commitId: this.commitId, parents: this.parents });
    }
    return this.parents;
  }

  verificationVerdict(): VerificationVerdict {
    if (this.verdict === undefined) {
      const trustStorePath =
        this.verification.mode === 'trust-store' ? this.verification.trustStorePath : undefined;
      this.verdict = this.inspector.verify(this.commitId, trustStorePath);
      this.logger.debug('git', 'Signature verdict', {
        commitId: this.commitId,
        verdict: this.verdict,
        trustStore: trustStorePath ?? '(ambient)',
      });
    }
    return this.verdict;
  }
}
