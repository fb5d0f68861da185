/**
 * Commit Inspector
 *
 * Read-only facts about single commits, obtained from git. Every query runs
 * through execStrictGitCommand, so a non-zero exit or any stderr output is a
 * BackendError and an unexpected answer is a CorruptDataError. Nothing here
 * guesses a fact it could not read.
 *
 * @packageDocumentation
 */

import { existsSync, statSync } from 'node:fs';

import { CorruptDataError } from '@branch-gate/utils';

import { execStrictGitCommand, isZeroCommitId, toCommitSha } from './git-executor.js';
import type { CommitSha, IntroducedRange, VerificationVerdict } from './types.js';

/**
 * Facts the decision engine may ask about a commit
 */
export interface CommitInspector {
  /** Number of parent edges of the commit */
  parentCount(commitId: CommitSha): number;
  /**
   * Signature verdict against `trustStorePath`, or against the ambient
   * trust store when it is undefined
   */
  verify(commitId: CommitSha, trustStorePath?: string): VerificationVerdict;
  /** Commits an update introduces, newest first */
  introducedCommits(range: IntroducedRange): CommitSha[];
  /** Whether a trust store directory exists at the given path */
  hasTrustStore(trustStorePath: string): boolean;
}

const STATUS_CODES: Readonly<Record<string, VerificationVerdict>> = {
  G: 'Good',
  B: 'Bad',
  U: 'Unverifiable',
  N: 'NoSignature',
};

/**
 * Count parent headers in a raw commit record (`git cat-file commit` output)
 *
 * @throws CorruptDataError if the text is not a commit record
 */
export function countParents(record: string): number {
  const headerEnd = record.indexOf('\n\n');
  const header = headerEnd === -1 ? record : record.slice(0, headerEnd);
  const lines = header.split('\n');

  if (!/^tree [0-9a-f]{40,64}$/.test(lines[0] ?? '')) {
    throw new CorruptDataError('Commit record does not start with a tree header', record);
  }

  let parents = 0;
  for (const line of lines.slice(1)) {
    if (!line.startsWith('parent ')) {
      continue;
    }
    if (!/^parent [0-9a-f]{40,64}$/.test(line)) {
      throw new CorruptDataError(`Malformed parent header: ${line}`, record);
    }
    parents++;
  }
  return parents;
}

/**
 * Map git's single-character signature status to a verdict
 *
 * @throws CorruptDataError for any status outside G/B/U/N
 */
export function parseVerificationStatus(status: string): VerificationVerdict {
  const verdict = Object.hasOwn(STATUS_CODES, status) ? STATUS_CODES[status] : undefined;
  if (verdict === undefined) {
    throw new CorruptDataError(`Unexpected signature status: ${JSON.stringify(status)}`, status);
  }
  return verdict;
}

/**
 * CommitInspector backed by the git CLI of the repository the hook runs in
 */
export class GitCommitInspector implements CommitInspector {
  constructor(private readonly cwd?: string) {}

  parentCount(commitId: CommitSha): number {
    const record = execStrictGitCommand(['cat-file', 'commit', commitId], { cwd: this.cwd });
    return countParents(record);
  }

  verify(commitId: CommitSha, trustStorePath?: string): VerificationVerdict {
    // The trust store travels in this call's own environment map
    const env = trustStorePath ? { GNUPGHOME: trustStorePath } : undefined;
    const status = execStrictGitCommand(['log', '-1', '--format=%G?', commitId], {
      cwd: this.cwd,
      env,
    });
    return parseVerificationStatus(status);
  }

  introducedCommits(range: IntroducedRange): CommitSha[] {
    const args = ['rev-list'];
    if (range.firstParent) {
      args.push('--first-parent');
    }
    if (isZeroCommitId(range.oldCommitId)) {
      // New ref: everything not already reachable from an existing ref
      args.push(range.newCommitId, '--not', '--all');
    } else {
      args.push(`${range.oldCommitId}..${range.newCommitId}`);
    }

    const output = execStrictGitCommand(args, { cwd: this.cwd });
    if (output.length === 0) {
      return [];
    }
    return output.split('\n').map((line) => {
      try {
        return toCommitSha(line.trim());
      } catch (error) {
        throw new CorruptDataError(`Unexpected rev-list line: ${line}`, output, { cause: error });
      }
    });
  }

  hasTrustStore(trustStorePath: string): boolean {
    return existsSync(trustStorePath) && statSync(trustStorePath).isDirectory();
  }
}
