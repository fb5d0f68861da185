/**
 * Tests for ref update evaluation
 */

import { toCommitSha, toRefName } from '@branch-gate/git';
import { TrustStoreError } from '@branch-gate/utils';
import { describe, it, expect } from 'vitest';

import { evaluateRefUpdate, type EvaluationOptions } from '../src/evaluate.js';
import { PolicyResolver } from '../src/policy-resolver.js';
import type { RefUpdate } from '../src/types.js';

import {
  FakeCommitInspector,
  MapPolicySource,
  createTestLogger,
  ZERO,
  OLD_TIP,
  MERGE_COMMIT,
  PLAIN_COMMIT,
  ROOT_COMMIT,
  OCTOPUS_COMMIT,
  type BranchValues,
  type FakeRanges,
} from './helpers/fakes.js';

const COMMITS = {
  [MERGE_COMMIT]: { parents: 2, verdict: 'Good' },
  [PLAIN_COMMIT]: { parents: 1, verdict: 'Good' },
  [ROOT_COMMIT]: { parents: 0, verdict: 'NoSignature' },
  [OCTOPUS_COMMIT]: { parents: 3, verdict: 'Bad' },
} as const;

const TIP_AMBIENT: EvaluationOptions = { commitScope: 'tip', trustStoreFallback: 'ambient' };

function update(refName: string, newCommitId: string, oldCommitId: string = OLD_TIP): RefUpdate {
  return {
    refName: toRefName(refName),
    oldCommitId: toCommitSha(oldCommitId),
    newCommitId: toCommitSha(newCommitId),
  };
}

function setup(
  branches: Record<string, BranchValues>,
  options: EvaluationOptions = TIP_AMBIENT,
  ranges: FakeRanges = {},
  trustStores: string[] = [],
) {
  const inspector = new FakeCommitInspector(COMMITS, ranges, new Set(trustStores));
  const source = new MapPolicySource(branches);
  const { logger, sink } = createTestLogger();
  const deps = { resolver: new PolicyResolver(source, logger), inspector, logger, options };
  return { deps, inspector, source, sink };
}

describe('evaluateRefUpdate - merge-only', () => {
  const branches = { release: { enforceMergeOnly: 'true' } };

  it('should reject a non-merge commit on a merge-only branch', () => {
    const { deps } = setup(branches);

    const result = evaluateRefUpdate(update('refs/heads/release', PLAIN_COMMIT), deps);

    expect(result.verdict).toEqual({
      kind: 'reject',
      policy: 'merge-only',
      reason: 'merge-only policy violated',
      commitId: PLAIN_COMMIT,
      detail: '1 parent',
    });
    expect(result.path).toBe('inspected');
    expect(result.inspected).toEqual([PLAIN_COMMIT]);
  });

  it('should accept a merge commit on a merge-only branch', () => {
    const { deps, inspector } = setup(branches);

    const result = evaluateRefUpdate(update('refs/heads/release', MERGE_COMMIT), deps);

    expect(result.verdict).toEqual({ kind: 'accept' });
    expect(inspector.calls).toEqual([`parentCount ${MERGE_COMMIT}`]);
  });

  it('should reject a root commit', () => {
    const { deps } = setup(branches);

    const result = evaluateRefUpdate(update('refs/heads/release', ROOT_COMMIT, ZERO), deps);

    expect(result.verdict.kind === 'reject' && result.verdict.detail).toBe('0 parents');
  });
});

describe('evaluateRefUpdate - auth-only', () => {
  const branches = { secure: { enforceAuthOnly: 'true', authTrustStorePath: '/srv/keys' } };

  it('should reject a badly signed commit', () => {
    const { deps, inspector } = setup(branches, TIP_AMBIENT, {}, ['/srv/keys']);

    const result = evaluateRefUpdate(update('refs/heads/secure', OCTOPUS_COMMIT), deps);

    expect(result.verdict).toEqual({
      kind: 'reject',
      policy: 'auth-only',
      reason: 'auth-only policy violated',
      commitId: OCTOPUS_COMMIT,
      detail: 'bad signature',
    });
    expect(inspector.calls).toEqual([`verify ${OCTOPUS_COMMIT} /srv/keys`]);
  });

  it('should accept a well signed commit', () => {
    const { deps } = setup(branches, TIP_AMBIENT, {}, ['/srv/keys']);

    const result = evaluateRefUpdate(update('refs/heads/secure', PLAIN_COMMIT), deps);

    expect(result.verdict).toEqual({ kind: 'accept' });
  });

  it('should refuse to evaluate when the configured trust store is missing', () => {
    const { deps, inspector } = setup(branches);

    expect(() => evaluateRefUpdate(update('refs/heads/secure', PLAIN_COMMIT), deps))
      .toThrow(TrustStoreError);
    expect(inspector.calls).toEqual([]);
  });

  it('should skip verification for a missing trust store under skip-if-missing', () => {
    const { deps, inspector, sink } = setup(branches, {
      commitScope: 'tip',
      trustStoreFallback: 'skip-if-missing',
    });

    const result = evaluateRefUpdate(update('refs/heads/secure', OCTOPUS_COMMIT), deps);

    expect(result.verdict).toEqual({ kind: 'accept' });
    expect(inspector.calls).toEqual([]);
    expect(sink.lines).toContain(
      '[2026-01-02T03:04:05.000Z] [WARN] [policy] No usable trust store, signature verification skipped ' +
      '{"trustStorePath":"/srv/keys"}'
    );
  });

  it('should verify against the ambient trust store when none is configured', () => {
    const { deps, inspector } = setup({ secure: { enforceAuthOnly: 'true' } });

    const result = evaluateRefUpdate(update('refs/heads/secure', PLAIN_COMMIT), deps);

    expect(result.verdict).toEqual({ kind: 'accept' });
    expect(inspector.calls).toEqual([`verify ${PLAIN_COMMIT} (ambient)`]);
  });
});

describe('evaluateRefUpdate - no applicable policy', () => {
  it('should accept refs outside refs/heads/ without inspecting commits', () => {
    const { deps, inspector, source } = setup({});

    const result = evaluateRefUpdate(update('refs/tags/v1.0.0', ROOT_COMMIT), deps);

    expect(result).toEqual({
      verdict: { kind: 'accept' },
      path: 'outside-namespace',
      branch: null,
      policy: { mergeOnly: false, authOnly: false },
      inspected: [],
    });
    expect(inspector.calls).toEqual([]);
    expect(source.lookups).toEqual([]);
  });

  it('should accept updates to an unconfigured branch without inspecting commits', () => {
    const { deps, inspector } = setup({ release: { enforceMergeOnly: 'true' } });

    const result = evaluateRefUpdate(update('refs/heads/feature', ROOT_COMMIT), deps);

    expect(result.path).toBe('unrestricted');
    expect(result.verdict).toEqual({ kind: 'accept' });
    expect(inspector.calls).toEqual([]);
  });

  it('should accept deletion of a protected branch', () => {
    const { deps, inspector, sink } = setup({ release: { enforceMergeOnly: 'true' } });

    const result = evaluateRefUpdate(update('refs/heads/release', ZERO), deps);

    expect(result.path).toBe('deletion');
    expect(result.verdict).toEqual({ kind: 'accept' });
    expect(inspector.calls).toEqual([]);
    expect(sink.lines).toContain(
      '[2026-01-02T03:04:05.000Z] [INFO] [policy] Branch deletion, no commit to inspect ' +
      '{"refName":"refs/heads/release"}'
    );
  });

  it('should treat a malformed flag as disabled', () => {
    const { deps, inspector } = setup({ release: { enforceMergeOnly: 'yes' } });

    const result = evaluateRefUpdate(update('refs/heads/release', PLAIN_COMMIT), deps);

    expect(result.verdict).toEqual({ kind: 'accept' });
    expect(inspector.calls).toEqual([]);
  });
});

describe('evaluateRefUpdate - introduced scope', () => {
  const introducedScope: EvaluationOptions = { commitScope: 'introduced', trustStoreFallback: 'ambient' };

  it('should apply merge-only to the first-parent chain only', () => {
    const { deps, inspector } = setup(
      { release: { enforceMergeOnly: 'true' } },
      introducedScope,
      { mainline: [OCTOPUS_COMMIT, MERGE_COMMIT] },
    );

    const result = evaluateRefUpdate(update('refs/heads/release', OCTOPUS_COMMIT), deps);

    expect(result.verdict).toEqual({ kind: 'accept' });
    expect(result.inspected).toEqual([OCTOPUS_COMMIT, MERGE_COMMIT]);
    expect(inspector.calls).toEqual([
      'introduced first-parent',
      `parentCount ${OCTOPUS_COMMIT}`,
      `parentCount ${MERGE_COMMIT}`,
    ]);
  });

  it('should stop at the first mainline commit that is not a merge', () => {
    const { deps, inspector } = setup(
      { release: { enforceMergeOnly: 'true' } },
      introducedScope,
      { mainline: [MERGE_COMMIT, PLAIN_COMMIT, OCTOPUS_COMMIT] },
    );

    const result = evaluateRefUpdate(update('refs/heads/release', MERGE_COMMIT), deps);

    expect(result.verdict.kind === 'reject' && result.verdict.commitId).toBe(PLAIN_COMMIT);
    expect(result.inspected).toEqual([MERGE_COMMIT, PLAIN_COMMIT]);
    expect(inspector.calls).not.toContain(`parentCount ${OCTOPUS_COMMIT}`);
  });

  it('should verify side-branch commits without requiring them to be merges', () => {
    const { deps, inspector } = setup(
      { both: { enforceMergeOnly: 'true', enforceAuthOnly: 'true' } },
      introducedScope,
      { mainline: [MERGE_COMMIT], introduced: [MERGE_COMMIT, PLAIN_COMMIT] },
    );

    const result = evaluateRefUpdate(update('refs/heads/both', MERGE_COMMIT), deps);

    expect(result.verdict).toEqual({ kind: 'accept' });
    expect(inspector.calls).toEqual([
      'introduced first-parent',
      'introduced all',
      `parentCount ${MERGE_COMMIT}`,
      `verify ${MERGE_COMMIT} (ambient)`,
      `verify ${PLAIN_COMMIT} (ambient)`,
    ]);
  });

  it('should fall back to the tip when nothing new is introduced', () => {
    const { deps, inspector } = setup(
      { release: { enforceMergeOnly: 'true' } },
      introducedScope,
      { mainline: [] },
    );

    const result = evaluateRefUpdate(update('refs/heads/release', PLAIN_COMMIT), deps);

    expect(result.verdict.kind).toBe('reject');
    expect(result.inspected).toEqual([PLAIN_COMMIT]);
    expect(inspector.calls).toEqual(['introduced first-parent', `parentCount ${PLAIN_COMMIT}`]);
  });
});

describe('evaluateRefUpdate - independence', () => {
  it('should evaluate each ref against its own policy', () => {
    const { deps } = setup({
      release: { enforceMergeOnly: 'true' },
      secure: { enforceAuthOnly: 'true' },
    });

    const release = evaluateRefUpdate(update('refs/heads/release', PLAIN_COMMIT), deps);
    const secure = evaluateRefUpdate(update('refs/heads/secure', PLAIN_COMMIT), deps);
    const feature = evaluateRefUpdate(update('refs/heads/feature', PLAIN_COMMIT), deps);

    expect(release.verdict.kind).toBe('reject');
    expect(secure.verdict).toEqual({ kind: 'accept' });
    expect(feature.path).toBe('unrestricted');
  });
});
