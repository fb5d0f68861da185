/**
 * Tests for the decision engine
 */

import type { VerificationVerdict } from '@branch-gate/git';
import { describe, it, expect } from 'vitest';

import { LazyCommitFacts } from '../src/commit-facts.js';
import { decide, MERGE_ONLY_VIOLATION, AUTH_ONLY_VIOLATION } from '../src/decision-engine.js';
import type { BranchPolicy } from '../src/types.js';

import { FakeCommitInspector, PLAIN_COMMIT, createTestLogger } from './helpers/fakes.js';

const NEITHER: BranchPolicy = { mergeOnly: false, authOnly: false };
const MERGE_ONLY: BranchPolicy = { mergeOnly: true, authOnly: false };
const AUTH_ONLY: BranchPolicy = { mergeOnly: false, authOnly: true };
const BOTH: BranchPolicy = { mergeOnly: true, authOnly: true };

function factsFor(parents: number, verdict: VerificationVerdict) {
  const inspector = new FakeCommitInspector({ [PLAIN_COMMIT]: { parents, verdict } });
  const { logger } = createTestLogger();
  const facts = new LazyCommitFacts(PLAIN_COMMIT, inspector, { mode: 'ambient' }, logger);
  return { facts, inspector };
}

describe('decide - merge-only', () => {
  it.each([0, 1])('should reject a commit with %i parent(s)', (parents) => {
    const { facts } = factsFor(parents, 'Good');

    const verdict = decide(MERGE_ONLY, facts);

    expect(verdict).toEqual({
      kind: 'reject',
      policy: 'merge-only',
      reason: MERGE_ONLY_VIOLATION,
      commitId: PLAIN_COMMIT,
      detail: parents === 1 ? '1 parent' : '0 parents',
    });
  });

  it.each([2, 3, 8])('should accept a commit with %i parents', (parents) => {
    const { facts } = factsFor(parents, 'NoSignature');

    expect(decide(MERGE_ONLY, facts)).toEqual({ kind: 'accept' });
  });

  it('should not compute a verification verdict when auth-only is off', () => {
    const { facts, inspector } = factsFor(2, 'Bad');

    decide(MERGE_ONLY, facts);

    expect(inspector.calls).toEqual([`parentCount ${PLAIN_COMMIT}`]);
  });
});

describe('decide - auth-only', () => {
  it.each<[VerificationVerdict, string]>([
    ['Bad', 'bad signature'],
    ['Unverifiable', 'signature from an untrusted key'],
    ['NoSignature', 'no signature'],
  ])('should reject verdict %s', (verdict, detail) => {
    const { facts } = factsFor(2, verdict);

    expect(decide(AUTH_ONLY, facts)).toEqual({
      kind: 'reject',
      policy: 'auth-only',
      reason: AUTH_ONLY_VIOLATION,
      commitId: PLAIN_COMMIT,
      detail,
    });
  });

  it('should accept a Good verdict', () => {
    const { facts } = factsFor(1, 'Good');

    expect(decide(AUTH_ONLY, facts)).toEqual({ kind: 'accept' });
  });

  it('should not count parents when merge-only is off', () => {
    const { facts, inspector } = factsFor(1, 'Good');

    decide(AUTH_ONLY, facts);

    expect(inspector.calls).toEqual([`verify ${PLAIN_COMMIT} (ambient)`]);
  });
});

describe('decide - combined policies', () => {
  it('should report merge-only first and skip verification after the rejection', () => {
    const { facts, inspector } = factsFor(1, 'Bad');

    const verdict = decide(BOTH, facts);

    expect(verdict.kind === 'reject' && verdict.policy).toBe('merge-only');
    expect(inspector.calls).toEqual([`parentCount ${PLAIN_COMMIT}`]);
  });

  it('should report auth-only when the merge check passes', () => {
    const { facts } = factsFor(2, 'Unverifiable');

    const verdict = decide(BOTH, facts);

    expect(verdict.kind === 'reject' && verdict.policy).toBe('auth-only');
  });

  it('should accept a signed merge commit', () => {
    const { facts } = factsFor(2, 'Good');

    expect(decide(BOTH, facts)).toEqual({ kind: 'accept' });
  });

  it('should accept anything and query nothing without policies', () => {
    const { facts, inspector } = factsFor(0, 'Bad');

    expect(decide(NEITHER, facts)).toEqual({ kind: 'accept' });
    expect(inspector.calls).toEqual([]);
  });

  it('should give the same verdict on repeated evaluation', () => {
    const first = decide(BOTH, factsFor(1, 'Good').facts);
    const second = decide(BOTH, factsFor(1, 'Good').facts);

    expect(second).toEqual(first);
  });
});

describe('LazyCommitFacts', () => {
  it('should query each fact at most once', () => {
    const { facts, inspector } = factsFor(2, 'Good');

    facts.parentCount();
    facts.parentCount();
    facts.verificationVerdict();
    facts.verificationVerdict();

    expect(inspector.calls).toEqual([
      `parentCount ${PLAIN_COMMIT}`,
      `verify ${PLAIN_COMMIT} (ambient)`,
    ]);
  });

  it('should pass the trust store of the verification context', () => {
    const inspector = new FakeCommitInspector({ [PLAIN_COMMIT]: { parents: 1, verdict: 'Good' } });
    const { logger } = createTestLogger();
    const facts = new LazyCommitFacts(
      PLAIN_COMMIT,
      inspector,
      { mode: 'trust-store', trustStorePath: '/srv/keys' },
      logger,
    );

    expect(facts.verificationVerdict()).toBe('Good');
    expect(inspector.calls).toEqual([`verify ${PLAIN_COMMIT} /srv/keys`]);
  });
});
