/**
 * Secure Git Command Execution
 *
 * This module provides a centralized, secure way to execute git commands.
 * ALL git command execution in branch-gate MUST go through this module.
 *
 * Security principles:
 * 1. Use spawnSync with array arguments (never string interpolation)
 * 2. Validate all hook-supplied inputs
 * 3. No shell piping or heredocs
 * 4. Per-call environment, never process-wide mutation
 *
 * @packageDocumentation
 */

import { BackendError, ConfigurationError, safeExecResult } from '@branch-gate/utils';

import type { CommitSha, RefName } from './types.js';

const GIT_TIMEOUT = 30000; // 30 seconds

export interface GitExecutionOptions {
  /**
   * Maximum time to wait for git command (ms)
   * @default 30000
   */
  timeout?: number;

  /**
   * Environment variables for this invocation only (e.g. GNUPGHOME)
   */
  env?: Record<string, string>;

  /**
   * Working directory (defaults to the hook's cwd, i.e. the repository)
   */
  cwd?: string;
}

/**
 * Result of a git command execution
 */
export interface GitExecutionResult {
  /** Standard output from the command, trimmed */
  stdout: string;
  /** Standard error from the command, trimmed */
  stderr: string;
  /** Exit code (0 for success) */
  exitCode: number;
  /** Whether the command succeeded */
  success: boolean;
}

/**
 * Execute a git command securely
 *
 * This is the ONLY function that should execute git commands.
 *
 * @param args - Git command arguments (e.g., ['cat-file', 'commit', sha])
 * @returns Execution result
 * @throws BackendError if git cannot be spawned or exits non-zero
 *
 * @example
 * ```typescript
 * const result = executeGitCommand(['log', '-1', '--format=%G?', sha], {
 *   env: { GNUPGHOME: trustStorePath },
 * });
 * ```
 */
export function executeGitCommand(
  args: string[],
  options: GitExecutionOptions = {}
): GitExecutionResult {
  const { timeout = GIT_TIMEOUT, env, cwd } = options;

  if (args.length === 0) {
    throw new Error('Git command arguments must be a non-empty array');
  }

  const result = safeExecResult('git', args, {
    env,
    cwd,
    timeout,
    maxBuffer: 10 * 1024 * 1024, // 10MB buffer
  });

  if (result.error) {
    throw new BackendError(
      `Git command could not run: git ${args.join(' ')}`,
      { exitCode: null, stderr: result.stderr.trim() },
      { cause: result.error },
    );
  }

  const stdout = result.stdout.trim();
  const stderr = result.stderr.trim();
  const exitCode = result.status;
  const success = exitCode === 0;

  if (!success) {
    const errorMessage = stderr || stdout || 'Git command failed';
    throw new BackendError(
      `Git command failed: git ${args.join(' ')}\n${errorMessage}`,
      { exitCode, stderr },
    );
  }

  return {
    stdout,
    stderr,
    exitCode,
    success,
  };
}

/**
 * Execute a git command whose stderr must stay empty
 *
 * Read-only queries behind policy decisions treat any diagnostic output as
 * a failed query rather than silently trusting stdout.
 *
 * @throws BackendError on non-zero exit or non-empty stderr
 */
export function execStrictGitCommand(args: string[], options: GitExecutionOptions = {}): string {
  const result = executeGitCommand(args, options);
  if (result.stderr.length > 0) {
    throw new BackendError(
      `Git command wrote to stderr: git ${args.join(' ')}\n${result.stderr}`,
      { exitCode: result.exitCode, stderr: result.stderr },
    );
  }
  return result.stdout;
}

/**
 * Validate a ref name against git's ref naming rules
 *
 * Mirrors `git check-ref-format`: ref names may hold shell metacharacters
 * such as `$` or `(`, which is harmless because nothing here reaches a shell.
 * A leading dash is refused as well, so a ref can never be read as an option.
 *
 * @throws ConfigurationError if ref is invalid
 */
export function validateGitRef(ref: string): asserts ref is RefName {
  if (ref.length === 0) {
    throw new ConfigurationError('Git ref must be a non-empty string');
  }

  if (ref.startsWith('-')) {
    throw new ConfigurationError(`Invalid git ref: starts with dash: ${ref}`);
  }

  if (/[\x00-\x20\x7f~^:?*[\\]/.test(ref)) {
    throw new ConfigurationError(`Invalid git ref: contains a forbidden character: ${JSON.stringify(ref)}`);
  }

  if (ref.includes('..') || ref.includes('@{') || ref === '@') {
    throw new ConfigurationError(`Invalid git ref: contains a forbidden sequence: ${ref}`);
  }

  if (ref.startsWith('/') || ref.endsWith('/') || ref.endsWith('.') || ref.includes('//')) {
    throw new ConfigurationError(`Invalid git ref: malformed path: ${ref}`);
  }

  for (const component of ref.split('/')) {
    if (component.startsWith('.') || component.endsWith('.lock')) {
      throw new ConfigurationError(`Invalid git ref: malformed component "${component}": ${ref}`);
    }
  }
}

/**
 * Validate that a string is a full commit object id
 *
 * @throws ConfigurationError if the id is not 40 or 64 lowercase hex chars
 */
export function validateCommitId(commitId: string): asserts commitId is CommitSha {
  if (!/^[0-9a-f]+$/.test(commitId)) {
    throw new ConfigurationError(`Invalid commit id: must be hexadecimal: ${commitId}`);
  }

  if (commitId.length !== 40 && commitId.length !== 64) {
    throw new ConfigurationError(`Invalid commit id: invalid length: ${commitId}`);
  }
}

/**
 * Narrow a string to a CommitSha
 */
export function toCommitSha(commitId: string): CommitSha {
  validateCommitId(commitId);
  return commitId;
}

/**
 * Narrow a string to a RefName
 */
export function toRefName(ref: string): RefName {
  validateGitRef(ref);
  return ref;
}

/**
 * The all-zero id git passes for a created (old) or deleted (new) ref
 */
export function isZeroCommitId(commitId: string): boolean {
  return /^0+$/.test(commitId);
}
