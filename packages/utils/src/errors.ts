/**
 * Error taxonomy shared by every branch-gate package.
 *
 * Policy rejections are NOT errors: they are ordinary verdicts produced by
 * the decision engine. Everything below prevents a confident verdict and
 * ends up as an internal error at the hook entry point.
 *
 * @packageDocumentation
 */

export type BranchGateErrorCode =
  | 'BACKEND'
  | 'CORRUPT_DATA'
  | 'CONFIGURATION'
  | 'TRUST_STORE'
  | 'INTERNAL';

/**
 * Base class for all branch-gate failures
 */
export class BranchGateError extends Error {
  public readonly code: BranchGateErrorCode;

  constructor(code: BranchGateErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BranchGateError';
    this.code = code;
  }
}

/**
 * git could not be queried: spawn failure, non-zero exit, timeout, or
 * anything written to stderr.
 */
export class BackendError extends BranchGateError {
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(
    message: string,
    details: { exitCode?: number | null; stderr?: string } = {},
    options?: ErrorOptions,
  ) {
    super('BACKEND', message, options);
    this.name = 'BackendError';
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr ?? '';
  }
}

/**
 * git answered, but the answer violates its output contract
 */
export class CorruptDataError extends BranchGateError {
  public readonly raw: string;

  constructor(message: string, raw: string, options?: ErrorOptions) {
    super('CORRUPT_DATA', message, options);
    this.name = 'CorruptDataError';
    this.raw = raw;
  }
}

/**
 * Settings or policy storage is unreachable or malformed
 */
export class ConfigurationError extends BranchGateError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A configured trust store cannot be used for verification
 */
export class TrustStoreError extends BranchGateError {
  public readonly trustStorePath: string;

  constructor(message: string, trustStorePath: string, options?: ErrorOptions) {
    super('TRUST_STORE', message, options);
    this.name = 'TrustStoreError';
    this.trustStorePath = trustStorePath;
  }
}

/**
 * Opaque failure surfaced to the pusher.
 *
 * `message` carries only the correlation id. The underlying failure is kept
 * as `cause` for the server-side log and must never be printed to the pusher.
 */
export class InternalError extends BranchGateError {
  public readonly correlationId: string;

  constructor(correlationId: string, options?: ErrorOptions) {
    super('INTERNAL', `internal error (id: ${correlationId})`, options);
    this.name = 'InternalError';
    this.correlationId = correlationId;
  }
}

/**
 * Wrap any thrown value as an InternalError with the given correlation id
 */
export function toInternalError(error: unknown, correlationId: string): InternalError {
  if (error instanceof InternalError) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new InternalError(correlationId, { cause });
}

/**
 * Render an error for the server-side log, following the `cause` chain
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const parts: string[] = [];
  let current: unknown = error;
  while (current instanceof Error) {
    parts.push(`${current.name}: ${current.message}`);
    current = current.cause;
  }
  if (current !== undefined) {
    parts.push(String(current));
  }
  return parts.join(' <- ');
}
