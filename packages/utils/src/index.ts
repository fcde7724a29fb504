/**
 * @branchgate/utils
 *
 * Common utilities for branchgate packages.
 * This is the foundational package with NO dependencies on other branchgate packages.
 *
 * @package @branchgate/utils
 */

// Safe command execution (no shell, absolute paths via which)
export {
  safeExecSync,
  safeExecAsync,
  getToolVersion,
  CommandExecutionError,
  type SafeExecOptions,
  type SafeExecAsyncOptions,
  type SafeExecAsyncResult
} from './safe-exec.js';

// Category-based debug logging
export {
  logDebug,
  logWarning,
  isDebugEnabled,
  enableDebugLogging,
  DEBUG_ENV_VAR,
  type LogCategory
} from './logger.js';
