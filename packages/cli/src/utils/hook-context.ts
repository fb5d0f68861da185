/**
 * Hook Context
 *
 * Everything one invocation needs from its surroundings: the repository's
 * git directory, settings, a logger and the git-backed collaborators.
 * Commands take these as injectable dependencies so they can run against
 * in-memory fakes.
 *
 * @package branch-gate
 */

import { randomUUID } from 'node:crypto';
import { resolve } from 'node:path';

import {
  SETTINGS_DEFAULTS,
  loadSettings,
  type HookSettings,
  type SettingsLocation,
} from '@branch-gate/config';
import { createPolicySource, type PolicySource } from '@branch-gate/core';
import { GitCommitInspector, getGitDir, type CommitInspector } from '@branch-gate/git';
import { DiscardLogSink, Logger, openLogSink } from '@branch-gate/utils';

export interface HookDeps {
  /** Absolute git directory of the repository being pushed to */
  getGitDir(): string;
  loadSettings(location: SettingsLocation): Promise<HookSettings>;
  /** Open the log at `path`; undefined means no usable location */
  openLogger(path: string | undefined): Logger;
  createPolicySource(settings: HookSettings): PolicySource;
  createInspector(): CommitInspector;
  newCorrelationId(): string;
  env: NodeJS.ProcessEnv;
}

/**
 * Opaque identifier tying a pusher-visible failure to its log entry
 */
export function newCorrelationId(): string {
  return randomUUID();
}

/**
 * Where the log goes: settings.logFile (relative paths are relative to the
 * git directory), else <git-dir>/branch-gate.log
 */
export function resolveLogPath(gitDir: string, settings?: HookSettings): string {
  return resolve(gitDir, settings?.logFile ?? SETTINGS_DEFAULTS.LOG_FILE_NAME);
}

/**
 * Open a logger, degrading to discard when the file is unusable
 */
export function openHookLogger(path: string | undefined): Logger {
  if (path === undefined) {
    return new Logger(new DiscardLogSink());
  }
  return new Logger(openLogSink(path));
}

/**
 * Dependencies wired to the real repository the hook runs in
 */
export function createDefaultHookDeps(): HookDeps {
  return {
    getGitDir: () => getGitDir(),
    loadSettings,
    openLogger: openHookLogger,
    createPolicySource: (settings) => createPolicySource(settings),
    createInspector: () => new GitCommitInspector(),
    newCorrelationId,
    env: process.env,
  };
}
