/**
 * @branch-gate/git
 *
 * Git access for branch-gate - secure command execution, commit
 * inspection, and repository config lookups.
 *
 * @packageDocumentation
 */

// Branded types for git objects (compile-time safety)
export type {
  CommitSha,
  RefName,
  VerificationVerdict,
  IntroducedRange,
} from './types.js';

// Secure git command execution (low-level - use high-level APIs when possible)
export {
  executeGitCommand,
  execStrictGitCommand,
  validateGitRef,
  validateCommitId,
  toCommitSha,
  toRefName,
  isZeroCommitId,
  type GitExecutionOptions,
  type GitExecutionResult,
} from './git-executor.js';

// Commit facts (parent count, signature verdict, introduced range)
export {
  GitCommitInspector,
  countParents,
  parseVerificationStatus,
  type CommitInspector,
} from './commit-inspector.js';

// Repository config lookups
export { getConfigValue, getGitDir } from './git-config.js';
