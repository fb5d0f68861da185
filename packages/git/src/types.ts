/**
 * Branded types for git objects
 *
 * These types prevent incorrect usage at compile time by ensuring only
 * properly validated values reach git operations.
 *
 * @example
 * // ✅ CORRECT - CommitSha from toCommitSha()
 * const sha = toCommitSha(process.argv[4]);
 * inspector.parentCount(sha);
 *
 * // ❌ WRONG - Compilation error
 * inspector.parentCount('HEAD');
 */

/**
 * Branded type for git commit SHAs
 *
 * Full hexadecimal object ids: 40 chars (SHA-1) or 64 chars (SHA-256).
 * Symbolic refs like 'HEAD' or 'main' are NOT commit SHAs.
 */
export type CommitSha = string & { readonly __brand: 'CommitSha' };

/**
 * Branded type for fully qualified ref names (e.g. 'refs/heads/main')
 */
export type RefName = string & { readonly __brand: 'RefName' };

/**
 * Signature verification verdict for a single commit
 *
 * - Good: valid signature from a trusted key
 * - Bad: invalid signature
 * - Unverifiable: valid signature, key not trusted
 * - NoSignature: commit is not signed
 */
export type VerificationVerdict = 'Good' | 'Bad' | 'Unverifiable' | 'NoSignature';

/**
 * Which commits an update introduces, for range-based inspection
 */
export interface IntroducedRange {
  oldCommitId: CommitSha;
  newCommitId: CommitSha;
  /** Follow only first parents (the mainline of the branch) */
  firstParent: boolean;
}
