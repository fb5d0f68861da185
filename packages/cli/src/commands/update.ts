/**
 * Update Command
 *
 * The git `update` hook entry point. Called once per ref with the ref name,
 * the old commit id and the new commit id. Exit 0 lets the ref move; exit 1
 * aborts it, with one line on stderr saying why.
 *
 * Rejections name the ref and the violated policy. Anything that prevents a
 * confident verdict is reported only as an internal error with a
 * correlation id; the details go to the server-side log.
 */

import {
  resolveSettingsLocation,
  type HookSettings,
} from '@branch-gate/config';
import {
  PolicyResolver,
  branchShortName,
  evaluateRefUpdate,
  type RefUpdate,
  type RejectVerdict,
} from '@branch-gate/core';
import { toCommitSha, toRefName } from '@branch-gate/git';
import { ConfigurationError, describeError, toInternalError } from '@branch-gate/utils';
import chalk from 'chalk';
import type { Command } from 'commander';

import { createDefaultHookDeps, resolveLogPath, type HookDeps } from '../utils/hook-context.js';

export interface UpdateHookInput {
  refName: string;
  oldCommitId: string;
  newCommitId: string;
  /** Explicit settings file (--config) */
  configPath?: string;
}

export interface HookOutcome {
  exitCode: 0 | 1;
  /** Single line for the pusher; absent on acceptance */
  message?: string;
}

const MESSAGE_PREFIX = 'branch-gate:';

/**
 * Pusher-facing rejection line
 *
 * @example
 * "branch-gate: refs/heads/release: merge-only policy violated (commit 0123456789ab: 1 parent)"
 */
export function formatRejection(refName: string, verdict: RejectVerdict): string {
  const shortId = verdict.commitId.slice(0, 12);
  return `${MESSAGE_PREFIX} ${refName}: ${verdict.reason} (commit ${shortId}: ${verdict.detail})`;
}

/**
 * Pusher-facing internal error line; carries nothing but the id
 */
export function formatInternalError(correlationId: string): string {
  return `${MESSAGE_PREFIX} internal error (id: ${correlationId})`;
}

function parseRefUpdate(input: UpdateHookInput): RefUpdate {
  return {
    refName: toRefName(input.refName),
    oldCommitId: toCommitSha(input.oldCommitId),
    newCommitId: toCommitSha(input.newCommitId),
  };
}

/**
 * Evaluate one ref update and map the result to an exit code and message
 *
 * Never throws: every failure becomes an internal-error outcome.
 */
export async function runUpdateHook(
  input: UpdateHookInput,
  deps: HookDeps = createDefaultHookDeps(),
): Promise<HookOutcome> {
  const correlationId = deps.newCorrelationId();

  // Settings decide where the log goes, so they load before the logger opens
  let gitDir: string | undefined;
  let settings: HookSettings | undefined;
  let bootstrapError: unknown;
  try {
    gitDir = deps.getGitDir();
    settings = await deps.loadSettings(
      resolveSettingsLocation(gitDir, input.configPath, deps.env),
    );
  } catch (error) {
    bootstrapError = error;
  }

  const logger = deps.openLogger(
    gitDir === undefined ? undefined : resolveLogPath(gitDir, settings),
  );

  try {
    // Refs outside refs/heads/ carry no policy: nothing below may refuse them
    if (branchShortName(input.refName) === null) {
      logger.info('hook', 'Ref outside branch namespace, accepted', {
        refName: input.refName,
        oldCommitId: input.oldCommitId,
        newCommitId: input.newCommitId,
      });
      if (bootstrapError !== undefined) {
        logger.warn('hook', 'Settings unavailable, not needed for this ref', {
          error: describeError(bootstrapError),
        });
      }
      return { exitCode: 0 };
    }

    if (settings === undefined) {
      throw bootstrapError ?? new ConfigurationError('Settings could not be loaded');
    }

    const update = parseRefUpdate(input);
    logger.info('hook', 'Update requested', { ...update });

    const result = evaluateRefUpdate(update, {
      resolver: new PolicyResolver(deps.createPolicySource(settings), logger),
      inspector: deps.createInspector(),
      logger,
      options: {
        commitScope: settings.commitScope,
        trustStoreFallback: settings.trustStoreFallback,
      },
    });

    if (result.verdict.kind === 'reject') {
      logger.info('policy', 'Update rejected', {
        refName: update.refName,
        policy: result.verdict.policy,
        commitId: result.verdict.commitId,
        detail: result.verdict.detail,
      });
      return { exitCode: 1, message: formatRejection(update.refName, result.verdict) };
    }

    logger.info('policy', 'Update accepted', {
      refName: update.refName,
      path: result.path,
      inspected: result.inspected,
    });
    return { exitCode: 0 };
  } catch (error) {
    const internal = toInternalError(error, correlationId);
    logger.error('hook', 'Internal error, update refused', internal.cause, {
      correlationId,
      refName: input.refName,
      oldCommitId: input.oldCommitId,
      newCommitId: input.newCommitId,
    });
    return { exitCode: 1, message: formatInternalError(correlationId) };
  } finally {
    logger.close();
  }
}

export function updateCommand(program: Command): void {
  program
    .command('update')
    .description('Run as the git update hook: decide whether <ref> may move from <old> to <new>')
    .argument('<ref>', 'Fully qualified ref name (e.g. refs/heads/main)')
    .argument('<old>', 'Current commit id of the ref')
    .argument('<new>', 'Proposed commit id of the ref')
    .option('-c, --config <path>', 'Settings file (default: <git-dir>/branch-gate.config.yaml)')
    .action(async (refName: string, oldCommitId: string, newCommitId: string, options: { config?: string }) => {
      const outcome = await runUpdateHook({
        refName,
        oldCommitId,
        newCommitId,
        configPath: options.config,
      });
      if (outcome.message !== undefined) {
        console.error(chalk.red(outcome.message));
      }
      process.exit(outcome.exitCode);
    });
}

/**
 * Show verbose help for the update command
 */
export function showUpdateVerboseHelp(): void {
  console.log(`# update Command Reference

> Git update hook entry point

## Overview

Install as \`hooks/update\` in the server-side repository:

\`\`\`sh
#!/bin/sh
exec branch-gate update "$1" "$2" "$3"
\`\`\`

## Policies (git config, per branch short name)

| Key | Default | Effect |
|-----|---------|--------|
| \`branchgate.<branch>.enforceMergeOnly\` | false | pushed commit must have 2+ parents |
| \`branchgate.<branch>.enforceAuthOnly\` | false | pushed commit must carry a good signature |
| \`branchgate.<branch>.authTrustStorePath\` | (ambient) | GnuPG home to verify against |

Only \`"true"\` enables a policy; any other value is treated as false and logged.

## Exit Codes

- \`0\` - Update accepted
- \`1\` - Update rejected, or internal error (message carries a correlation id)
`);
}
