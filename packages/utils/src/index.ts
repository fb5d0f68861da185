/**
 * @branch-gate/utils
 *
 * Foundational helpers for branch-gate packages: the error taxonomy,
 * structured logging and shell-free process execution.
 * This package has NO dependencies on other branch-gate packages.
 *
 * @package @branch-gate/utils
 */

// Error taxonomy
export {
  BranchGateError,
  BackendError,
  CorruptDataError,
  ConfigurationError,
  TrustStoreError,
  InternalError,
  toInternalError,
  describeError,
  type BranchGateErrorCode,
} from './errors.js';

// Safe command execution (security-critical)
export {
  safeExecResult,
  buildChildEnv,
  type SafeExecOptions,
  type SafeExecResult,
} from './safe-exec.js';

// Structured logging (file sink with discard fallback)
export {
  Logger,
  FileLogSink,
  DiscardLogSink,
  MemoryLogSink,
  openLogSink,
  isDebugEnabled,
  type LogSink,
  type LogCategory,
  type LogLevel,
} from './logger.js';
