/**
 * Secure Git Command Execution
 *
 * Centralized way to execute git commands. Every git call in branchgate
 * goes through this module.
 *
 * Security principles:
 * 1. Use spawnSync with array arguments (never string interpolation)
 * 2. Validate user-controlled refs before they reach git
 * 3. No shell piping
 *
 * @packageDocumentation
 */

import { spawnSync, type SpawnSyncOptions } from 'node:child_process';

const GIT_TIMEOUT = 30000; // 30 seconds

export interface GitExecutionOptions {
  /**
   * Maximum time to wait for git command (ms)
   * @default 30000
   */
  timeout?: number;

  /**
   * Working directory for the command
   * @default process.cwd()
   */
  cwd?: string;

  /**
   * Whether to ignore errors (return the failed result instead of throwing)
   * @default false
   */
  ignoreErrors?: boolean;

  /**
   * Whether to suppress stderr
   * @default false
   */
  suppressStderr?: boolean;
}

/**
 * Result of a git command execution
 */
export interface GitExecutionResult {
  /** Standard output from the command, trimmed */
  stdout: string;
  /** Standard error from the command, trimmed */
  stderr: string;
  /** Exit code (0 for success) */
  exitCode: number;
  /** Whether the command succeeded */
  success: boolean;
}

/**
 * Error thrown when a git command fails
 */
export class GitCommandError extends Error {
  readonly exitCode: number;
  readonly stderr: string;
  readonly stdout: string;

  constructor(args: string[], result: Omit<GitExecutionResult, 'success'>) {
    const detail = result.stderr || result.stdout || 'Git command failed';
    super(`Git command failed: git ${args.join(' ')}\n${detail}`);
    this.name = 'GitCommandError';
    this.exitCode = result.exitCode;
    this.stderr = result.stderr;
    this.stdout = result.stdout;
  }
}

/**
 * Execute a git command securely using spawnSync with array arguments
 *
 * @param args - Git command arguments (e.g., ['rev-parse', '--abbrev-ref', 'HEAD'])
 * @throws GitCommandError if command fails and ignoreErrors is false
 *
 * @example
 * ```typescript
 * const result = executeGitCommand(['rev-parse', '--show-toplevel']);
 * console.log(result.stdout); // "/home/me/project"
 * ```
 */
export function executeGitCommand(
  args: string[],
  options: GitExecutionOptions = {}
): GitExecutionResult {
  const {
    timeout = GIT_TIMEOUT,
    cwd,
    ignoreErrors = false,
    suppressStderr = false,
  } = options;

  if (args.length === 0) {
    throw new Error('Git command arguments must be a non-empty array');
  }

  const spawnOptions: SpawnSyncOptions = {
    encoding: 'utf8',
    timeout,
    cwd,
    maxBuffer: 10 * 1024 * 1024, // 10MB buffer
    stdio: ['ignore', 'pipe', suppressStderr ? 'ignore' : 'pipe'],
  };

  const result = spawnSync('git', args, spawnOptions);

  const stdout = (result.stdout?.toString() ?? '').trim();
  const stderr = (result.stderr?.toString() ?? '').trim();
  const exitCode = result.status ?? 1;
  const success = exitCode === 0;

  if (!success && !ignoreErrors) {
    throw new GitCommandError(args, { stdout, stderr, exitCode });
  }

  return {
    stdout,
    stderr,
    exitCode,
    success,
  };
}

/**
 * Execute a git command and return stdout, throwing on error
 */
export function execGitCommand(args: string[], options: GitExecutionOptions = {}): string {
  return executeGitCommand(args, options).stdout;
}

/**
 * Execute a git command and return success status (no throw)
 */
export function tryGitCommand(args: string[], options: GitExecutionOptions = {}): boolean {
  return executeGitCommand(args, { ...options, ignoreErrors: true }).success;
}

/**
 * Validate that a string is safe to use as a git ref
 *
 * Git refs must:
 * - Not contain special shell characters
 * - Not start with a dash (looks like an option)
 * - Not contain path traversal sequences
 * - Not contain null bytes or newlines
 *
 * @throws Error if ref is invalid
 */
export function validateGitRef(ref: string): void {
  if (ref.length === 0) {
    throw new Error('Git ref must be a non-empty string');
  }

  if (/[;&|`$(){}[\]<>!\\"]/.test(ref)) {
    throw new Error(`Invalid git ref: contains shell special characters: ${ref}`);
  }

  if (ref.startsWith('-')) {
    throw new Error(`Invalid git ref: starts with dash: ${ref}`);
  }

  if (ref.includes('..') || ref.includes('//')) {
    throw new Error(`Invalid git ref: contains path traversal: ${ref}`);
  }

  if (ref.includes('\0')) {
    throw new Error('Invalid git ref: contains null byte');
  }

  if (ref.includes('\n') || ref.includes('\r')) {
    throw new Error('Invalid git ref: contains newline');
  }
}
