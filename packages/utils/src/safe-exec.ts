import { spawn, spawnSync, type SpawnSyncOptions } from 'node:child_process';

import which from 'which';

/**
 * Options for safe command execution
 */
export interface SafeExecOptions {
  /** Character encoding for output (default: undefined = Buffer) */
  encoding?: BufferEncoding;
  /** Standard I/O configuration */
  stdio?: 'pipe' | 'ignore' | Array<'pipe' | 'ignore' | 'inherit'>;
  /** Environment variables (merged with process.env if not fully specified) */
  env?: NodeJS.ProcessEnv;
  /** Working directory */
  cwd?: string;
  /** Maximum output buffer size in bytes */
  maxBuffer?: number;
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * Options for abortable asynchronous execution
 */
export interface SafeExecAsyncOptions {
  /** Environment variables */
  env?: NodeJS.ProcessEnv;
  /** Working directory */
  cwd?: string;
  /** Timeout in milliseconds (default: none) */
  timeout?: number;
  /** Aborting kills the child process and rejects with an AbortError */
  signal?: AbortSignal;
}

/**
 * Output of a successful asynchronous execution
 */
export interface SafeExecAsyncResult {
  status: number;
  stdout: string;
  stderr: string;
}

/**
 * Error thrown when command execution fails
 */
export class CommandExecutionError extends Error {
  public readonly status: number;
  public readonly stdout: Buffer | string;
  public readonly stderr: Buffer | string;

  constructor(
    message: string,
    status: number,
    stdout: Buffer | string,
    stderr: Buffer | string,
  ) {
    super(message);
    this.name = 'CommandExecutionError';
    this.status = status;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/**
 * Windows needs a shell for node itself and for .cmd/.bat/.ps1 shims
 * (the supabase CLI installed through npm is a .cmd shim there).
 * Paths have already been resolved by which at this point.
 */
function shouldUseShell(command: string, commandPath: string): boolean {
  if (process.platform !== 'win32') {
    return false;
  }

  if (command === 'node') {
    return true;
  }

  const lowerPath = commandPath.toLowerCase();
  return lowerPath.endsWith('.cmd') || lowerPath.endsWith('.bat') || lowerPath.endsWith('.ps1');
}

/**
 * Safe command execution using spawnSync + which pattern
 *
 * The command is resolved to an absolute path once and executed with
 * `shell: false`, so arguments are never interpreted by a shell.
 *
 * @param command - Command name (e.g., 'git', 'supabase')
 * @param args - Array of arguments
 * @returns Buffer or string output
 * @throws Error if command not found or execution fails
 *
 * @example
 * const version = safeExecSync('supabase', ['--version'], { encoding: 'utf8' });
 */
export function safeExecSync(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): Buffer | string {
  const commandPath = which.sync(command);
  const useShell = shouldUseShell(command, commandPath);

  const spawnOptions: SpawnSyncOptions = {
    shell: useShell,
    stdio: options.stdio ?? 'pipe',
    env: options.env,
    cwd: options.cwd,
    maxBuffer: options.maxBuffer,
    timeout: options.timeout,
    encoding: options.encoding,
  };

  // When shell:true, use command name so shell can resolve it properly
  const execCommand = useShell ? command : commandPath;
  const result = spawnSync(execCommand, args, spawnOptions);

  if (result.error) {
    throw result.error;
  }

  if (result.status !== 0) {
    throw new CommandExecutionError(
      `Command failed with exit code ${result.status ?? 'unknown'}: ${command} ${args.join(' ')}`,
      result.status ?? -1,
      result.stdout,
      result.stderr,
    );
  }

  return result.stdout;
}

/**
 * Abortable command execution using spawn + which
 *
 * Same resolution rules as {@link safeExecSync}, but the caller is never
 * blocked: the returned promise settles when the child closes, and an
 * aborted `signal` kills the child and rejects with the AbortError.
 *
 * @throws CommandExecutionError on non-zero exit
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * process.once('SIGINT', () => controller.abort());
 * const { stdout } = await safeExecAsync('supabase', ['branches', 'list', '--output', 'json'], {
 *   signal: controller.signal,
 * });
 * ```
 */
export async function safeExecAsync(
  command: string,
  args: string[] = [],
  options: SafeExecAsyncOptions = {},
): Promise<SafeExecAsyncResult> {
  options.signal?.throwIfAborted();

  const commandPath = await which(command);
  const useShell = shouldUseShell(command, commandPath);
  const execCommand = useShell ? command : commandPath;

  return new Promise<SafeExecAsyncResult>((resolve, reject) => {
    const child = spawn(execCommand, args, {
      shell: useShell,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: options.env,
      cwd: options.cwd,
      timeout: options.timeout,
      signal: options.signal,
    });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    // Spawn failures and aborts both arrive here; 'close' may still follow
    child.on('error', (error: Error) => {
      reject(error);
    });

    child.on('close', (code: number | null, signalName: NodeJS.Signals | null) => {
      if (code === 0) {
        resolve({ status: 0, stdout, stderr });
        return;
      }
      reject(
        new CommandExecutionError(
          `Command failed with exit code ${code ?? signalName ?? 'unknown'}: ${command} ${args.join(' ')}`,
          code ?? -1,
          stdout,
          stderr,
        ),
      );
    });
  });
}

/**
 * Get tool version if available
 *
 * @returns Version string or null if not available
 *
 * @example
 * getToolVersion('git', 'version'); // "git version 2.39.2"
 */
export function getToolVersion(
  toolName: string,
  versionArg: string = '--version',
): string | null {
  try {
    const version = safeExecSync(toolName, [versionArg], {
      encoding: 'utf8',
      stdio: 'pipe',
    });
    return version.toString().trim();
  } catch {
    return null;
  }
}
