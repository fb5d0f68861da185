/**
 * Structured logging for branch-gate
 *
 * Every entry is one line, `[timestamp] [LEVEL] [category] message`, with
 * optional metadata as compact JSON on the same line. Entries go to an
 * append-only log file; debug entries only when BRANCH_GATE_DEBUG=1.
 *
 * The pusher never sees log output: the hook's stderr is reserved for the
 * single verdict line.
 */

import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';

import { describeError } from './errors.js';

export type LogCategory =
  | 'git'
  | 'config'
  | 'policy'
  | 'hook';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Destination for formatted log lines
 */
export interface LogSink {
  readonly kind: 'file' | 'discard' | 'memory';
  write(line: string): void;
  close(): void;
}

/**
 * Sink that drops everything
 */
export class DiscardLogSink implements LogSink {
  readonly kind = 'discard' as const;

  write(_line: string): void {
    // intentionally empty
  }

  close(): void {
    // nothing to release
  }
}

/**
 * Sink that keeps lines in memory (tests, dry runs)
 */
export class MemoryLogSink implements LogSink {
  readonly kind = 'memory' as const;
  readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }

  close(): void {
    // nothing to release
  }
}

/**
 * Append-only file sink
 *
 * A write that fails after opening demotes the sink to a no-op: log
 * availability never decides a push.
 */
export class FileLogSink implements LogSink {
  readonly kind = 'file' as const;
  private fd: number | null;
  private stopped = false;

  constructor(public readonly path: string, fd: number) {
    this.fd = fd;
  }

  write(line: string): void {
    if (this.fd === null || this.stopped) {
      return;
    }
    try {
      writeSync(this.fd, `${line}\n`);
    } catch {
      // A broken descriptor is abandoned, never retried or closed
      this.stopped = true;
    }
  }

  close(): void {
    if (this.fd === null) {
      return;
    }
    const fd = this.fd;
    this.fd = null;
    if (!this.stopped) {
      closeSync(fd);
    }
  }
}

/**
 * Open the log file for appending, degrading to a discard sink
 *
 * @example
 * ```typescript
 * const logger = new Logger(openLogSink('/srv/git/repo.git/branch-gate.log'));
 * ```
 */
export function openLogSink(path: string): FileLogSink | DiscardLogSink {
  try {
    mkdirSync(dirname(path), { recursive: true });
    return new FileLogSink(path, openSync(path, 'a'));
  } catch {
    // Nowhere to record why: the pusher's stderr is reserved for the verdict
    return new DiscardLogSink();
  }
}

/**
 * Check whether debug entries are enabled
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.BRANCH_GATE_DEBUG === '1';
}

/**
 * Logger bound to one sink
 */
export class Logger {
  private readonly debugEnabled: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly sink: LogSink,
    options: { debug?: boolean; now?: () => Date } = {},
  ) {
    this.debugEnabled = options.debug ?? isDebugEnabled();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Log a debug message
   * Only written when debug is enabled (BRANCH_GATE_DEBUG=1)
   *
   * @example
   * ```typescript
   * logger.debug('git', 'Parent count', { commitId, parents });
   * ```
   */
  debug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
    if (this.debugEnabled) {
      this.write('DEBUG', category, message, metadata);
    }
  }

  /**
   * Log an audit entry (verdicts, resolved policies)
   */
  info(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
    this.write('INFO', category, message, metadata);
  }

  /**
   * Log a warning (non-critical, enforcement continues)
   */
  warn(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
    this.write('WARN', category, message, metadata);
  }

  /**
   * Log an error with its full cause chain
   */
  error(
    category: LogCategory,
    message: string,
    error?: unknown,
    metadata?: Record<string, unknown>,
  ): void {
    const details = error === undefined ? metadata : { ...metadata, error: describeError(error) };
    this.write('ERROR', category, message, details);
    if (error instanceof Error && error.stack && this.debugEnabled) {
      this.write('DEBUG', category, error.stack.replaceAll('\n', ' | '));
    }
  }

  close(): void {
    this.sink.close();
  }

  private write(
    level: LogLevel,
    category: LogCategory,
    message: string,
    metadata?: Record<string, unknown>,
  ): void {
    const timestamp = this.now().toISOString();
    let line = `[${timestamp}] [${level}] [${category}] ${message}`;
    if (metadata && Object.keys(metadata).length > 0) {
      line += ` ${JSON.stringify(metadata)}`;
    }
    this.sink.write(line);
  }
}
