import { spawnSync, type SpawnSyncOptionsWithStringEncoding } from 'node:child_process';

import which from 'which';

/**
 * Options for safe command execution
 */
export interface SafeExecOptions {
  /**
   * Extra environment variables for this one invocation.
   *
   * Merged over a copy of process.env; process.env itself is never touched,
   * so an override cannot outlive the call it was made for.
   */
  env?: Record<string, string>;
  /** Working directory */
  cwd?: string;
  /** Maximum output buffer size in bytes */
  maxBuffer?: number;
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * Result of a safe command execution
 */
export interface SafeExecResult {
  /** Exit code (-1 when the process never ran or was killed) */
  status: number;
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Error object if command failed to spawn or timed out */
  error?: Error;
}

/**
 * Build the environment for a single child process
 */
export function buildChildEnv(overrides: Record<string, string> = {}): NodeJS.ProcessEnv {
  return { ...process.env, ...overrides };
}

/**
 * Safe command execution using spawnSync + which pattern
 *
 * - Resolves PATH once using pure Node.js (which package)
 * - Executes with absolute path and shell: false
 * - No shell interpreter = no command injection risk
 *
 * Never throws: spawn failures come back in `error`.
 *
 * @example
 * const result = safeExecResult('git', ['log', '-1', '--format=%G?', sha], {
 *   env: { GNUPGHOME: '/srv/keys' },
 * });
 */
export function safeExecResult(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): SafeExecResult {
  let commandPath: string;
  try {
    commandPath = which.sync(command);
  } catch (error) {
    // which.sync throws if command not found
    return {
      status: -1,
      stdout: '',
      stderr: '',
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }

  const spawnOptions: SpawnSyncOptionsWithStringEncoding = {
    shell: false,
    encoding: 'utf8',
    stdio: ['ignore', 'pipe', 'pipe'],
    env: buildChildEnv(options.env),
    cwd: options.cwd,
    maxBuffer: options.maxBuffer,
    timeout: options.timeout,
  };

  const result = spawnSync(commandPath, args, spawnOptions);

  return {
    status: result.status ?? -1,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    error: result.error,
  };
}
