/**
 * Structured logging for branchgate
 *
 * Debug output is only written when BRANCHGATE_DEBUG=1 (the CLI sets it
 * for --verbose). Warnings always print; their stack traces only in debug mode.
 * Everything goes to stderr so YAML output on stdout stays parseable.
 */

export type LogCategory =
  | 'resolution'
  | 'directory'
  | 'git'
  | 'config'
  | 'prompt';

export const DEBUG_ENV_VAR = 'BRANCHGATE_DEBUG';

/**
 * Whether debug output is currently enabled
 */
export function isDebugEnabled(): boolean {
  return process.env[DEBUG_ENV_VAR] === '1';
}

/**
 * Turn on debug output for this process (and child processes that inherit env)
 */
export function enableDebugLogging(): void {
  process.env[DEBUG_ENV_VAR] = '1';
}

/**
 * Log a debug message
 *
 * @example
 * ```typescript
 * logDebug('resolution', 'Resolved exact branch match', { branch: 'develop' });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (isDebugEnabled()) {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [DEBUG] [${category}] ${message}`);
    if (metadata) {
      console.error(JSON.stringify(metadata, null, 2));
    }
  }
}

/**
 * Log a warning (non-critical error)
 *
 * @example
 * ```typescript
 * logWarning('directory', 'Region lookup failed - continuing without region', error);
 * ```
 */
export function logWarning(category: LogCategory, message: string, error?: Error): void {
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [WARN] [${category}] ${message}`);
  if (error) {
    console.error(`Error: ${error.message}`);
    if (error.stack && isDebugEnabled()) {
      console.error(error.stack);
    }
  }
}
