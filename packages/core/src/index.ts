/**
 * @branch-gate/core
 *
 * Policy evaluation engine: per-branch policy resolution, lazy commit
 * facts, and the accept/reject decision.
 *
 * @example Basic usage
 * ```typescript
 * import { PolicyResolver, GitConfigPolicySource, evaluateRefUpdate } from '@branch-gate/core';
 * import { GitCommitInspector } from '@branch-gate/git';
 *
 * const result = evaluateRefUpdate(update, {
 *   resolver: new PolicyResolver(new GitConfigPolicySource('branchgate'), logger),
 *   inspector: new GitCommitInspector(),
 *   logger,
 *   options: { commitScope: 'tip', trustStoreFallback: 'ambient' },
 * });
 * ```
 */

// Core types
export type {
  RefUpdate,
  BranchPolicy,
  CommitFacts,
  PolicyName,
  AcceptVerdict,
  RejectVerdict,
  Verdict,
} from './types.js';

// Policy flag parsing
export { parsePolicyFlag, isFlagEnabled, type PolicyFlag } from './policy-flag.js';

// Policy sources
export {
  GitConfigPolicySource,
  FilePolicySource,
  createPolicySource,
  type PolicySource,
} from './policy-source.js';

// Policy resolution
export {
  PolicyResolver,
  BRANCH_NAMESPACE,
  DEFAULT_POLICY,
  branchShortName,
  isEnforcing,
  type ResolvedPolicy,
} from './policy-resolver.js';

// Commit facts
export { LazyCommitFacts, type VerificationContext } from './commit-facts.js';

// Decision engine
export {
  decide,
  ACCEPT,
  MERGE_ONLY_VIOLATION,
  AUTH_ONLY_VIOLATION,
} from './decision-engine.js';

// Ref update evaluation
export {
  evaluateRefUpdate,
  planVerification,
  selectTargets,
  type EvaluationOptions,
  type EvaluationDeps,
  type EvaluationPath,
  type EvaluationResult,
} from './evaluate.js';
