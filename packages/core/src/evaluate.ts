/**
 * Ref Update Evaluation
 *
 * Orchestrates one ref update: resolve policy, pick the commits to inspect,
 * run the decision engine on each. Every call builds its own policy, facts
 * and verdict, so evaluating several refs in one process shares nothing.
 */

import type { CommitScope, TrustStoreFallback } from '@branch-gate/config';
import { isZeroCommitId, type CommitInspector, type CommitSha } from '@branch-gate/git';
import { TrustStoreError, type Logger } from '@branch-gate/utils';

import { LazyCommitFacts, type VerificationContext } from './commit-facts.js';
import { ACCEPT, decide } from './decision-engine.js';
import { isEnforcing, type PolicyResolver } from './policy-resolver.js';
import type { BranchPolicy, RefUpdate, Verdict } from './types.js';

export interface EvaluationOptions {
  commitScope: CommitScope;
  trustStoreFallback: TrustStoreFallback;
}

export interface EvaluationDeps {
  resolver: PolicyResolver;
  inspector: CommitInspector;
  logger: Logger;
  options: EvaluationOptions;
}

/**
 * Why a verdict was reached
 *
 * - outside-namespace: not a branch ref, no policy applies
 * - unrestricted: branch without enforced policies
 * - deletion: ref deleted, nothing to inspect
 * - inspected: commits were inspected
 */
export type EvaluationPath = 'outside-namespace' | 'unrestricted' | 'deletion' | 'inspected';

export interface EvaluationResult {
  verdict: Verdict;
  path: EvaluationPath;
  branch: string | null;
  /** Policy as configured for the branch */
  policy: BranchPolicy;
  /** Commits whose facts were consulted, in evaluation order */
  inspected: CommitSha[];
}

interface InspectionTarget {
  commitId: CommitSha;
  policy: BranchPolicy;
}

/**
 * Decide how signatures are verified, applying the trust-store fallback
 *
 * @returns The policy to enforce (auth-only may be dropped under
 *   skip-if-missing) and the verification context
 * @throws TrustStoreError if a configured trust store is missing and the
 *   fallback is ambient
 */
export function planVerification(
  policy: BranchPolicy,
  inspector: CommitInspector,
  fallback: TrustStoreFallback,
  logger: Logger,
): { policy: BranchPolicy; verification: VerificationContext } {
  const ambient: VerificationContext = { mode: 'ambient' };
  if (!policy.authOnly) {
    return { policy, verification: ambient };
  }

  const trustStorePath = policy.trustStorePath;
  if (trustStorePath !== undefined && inspector.hasTrustStore(trustStorePath)) {
    return { policy, verification: { mode: 'trust-store', trustStorePath } };
  }

  if (fallback === 'skip-if-missing') {
    logger.warn('policy', 'No usable trust store, signature verification skipped', {
      trustStorePath: trustStorePath ?? null,
    });
    return { policy: { ...policy, authOnly: false }, verification: ambient };
  }

  if (trustStorePath !== undefined) {
    throw new TrustStoreError(`Configured trust store does not exist: ${trustStorePath}`, trustStorePath);
  }

  logger.debug('policy', 'No trust store configured, verifying against ambient trust store');
  return { policy, verification: ambient };
}

/**
 * Commits to inspect, newest first, each with the policy that applies to it
 *
 * In the introduced scope merge-only covers the first-parent chain and
 * auth-only covers every introduced commit. An empty range (the new tip is
 * already reachable) falls back to the tip itself.
 */
export function selectTargets(
  update: RefUpdate,
  policy: BranchPolicy,
  scope: CommitScope,
  inspector: CommitInspector,
): InspectionTarget[] {
  const tip: InspectionTarget[] = [{ commitId: update.newCommitId, policy }];
  if (scope === 'tip') {
    return tip;
  }

  const range = { oldCommitId: update.oldCommitId, newCommitId: update.newCommitId };
  const mainline = policy.mergeOnly
    ? inspector.introducedCommits({ ...range, firstParent: true })
    : [];
  const introduced = policy.authOnly
    ? inspector.introducedCommits({ ...range, firstParent: false })
    : mainline;

  if (introduced.length === 0) {
    return tip;
  }

  const onMainline = new Set(mainline);
  return introduced.map((commitId) => ({
    commitId,
    policy: { ...policy, mergeOnly: policy.mergeOnly && onMainline.has(commitId) },
  }));
}

/**
 * Evaluate one ref update
 *
 * @throws BackendError, CorruptDataError, ConfigurationError or
 *   TrustStoreError when no confident verdict is possible
 */
export function evaluateRefUpdate(update: RefUpdate, deps: EvaluationDeps): EvaluationResult {
  const { resolver, inspector, logger, options } = deps;
  const { branch, policy } = resolver.resolve(update.refName);

  if (branch === null) {
    return { verdict: ACCEPT, path: 'outside-namespace', branch, policy, inspected: [] };
  }
  if (!isEnforcing(policy)) {
    return { verdict: ACCEPT, path: 'unrestricted', branch, policy, inspected: [] };
  }
  if (isZeroCommitId(update.newCommitId)) {
    logger.info('policy', 'Branch deletion, no commit to inspect', { refName: update.refName });
    return { verdict: ACCEPT, path: 'deletion', branch, policy, inspected: [] };
  }

  const plan = planVerification(policy, inspector, options.trustStoreFallback, logger);
  const targets = selectTargets(update, plan.policy, options.commitScope, inspector);
  logger.debug('policy', 'Inspecting commits', {
    refName: update.refName,
    scope: options.commitScope,
    count: targets.length,
  });

  const inspected: CommitSha[] = [];
  for (const target of targets) {
    inspected.push(target.commitId);
    const facts = new LazyCommitFacts(target.commitId, inspector, plan.verification, logger);
    const verdict = decide(target.policy, facts);
    if (verdict.kind === 'reject') {
      return { verdict, path: 'inspected', branch, policy, inspected };
    }
  }

  return { verdict: ACCEPT, path: 'inspected', branch, policy, inspected };
}
