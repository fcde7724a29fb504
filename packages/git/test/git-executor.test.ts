/**
 * Tests for secure git command execution
 */

import { spawnSync, type SpawnSyncReturns } from 'node:child_process';

import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  executeGitCommand,
  execGitCommand,
  tryGitCommand,
  validateGitRef,
  GitCommandError,
} from '../src/git-executor.js';

vi.mock('node:child_process', async () => {
  const actual = await vi.importActual('node:child_process');
  return {
    ...actual,
    spawnSync: vi.fn(),
  };
});

/**
 * Build a spawnSync return value
 */
function spawnResult(status: number, stdout: string, stderr = ''): SpawnSyncReturns<string> {
  return { pid: 1, output: [null, stdout, stderr], stdout, stderr, status, signal: null };
}

describe('git-executor - executeGitCommand', () => {
  beforeEach(() => {
    vi.mocked(spawnSync).mockReset();
  });

  it('should run git with array arguments and trim output', () => {
    vi.mocked(spawnSync).mockReturnValue(spawnResult(0, 'main\n'));

    const result = executeGitCommand(['rev-parse', '--abbrev-ref', 'HEAD']);

    expect(result).toEqual({ stdout: 'main', stderr: '', exitCode: 0, success: true });
    expect(spawnSync).toHaveBeenCalledWith(
      'git',
      ['rev-parse', '--abbrev-ref', 'HEAD'],
      expect.objectContaining({ encoding: 'utf8', timeout: 30000 })
    );
  });

  it('should pass cwd through to spawnSync', () => {
    vi.mocked(spawnSync).mockReturnValue(spawnResult(0, '/repo'));

    execGitCommand(['rev-parse', '--show-toplevel'], { cwd: '/repo/sub' });

    expect(spawnSync).toHaveBeenCalledWith(
      'git',
      ['rev-parse', '--show-toplevel'],
      expect.objectContaining({ cwd: '/repo/sub' })
    );
  });

  it('should throw GitCommandError with stderr on failure', () => {
    vi.mocked(spawnSync).mockReturnValue(spawnResult(128, '', 'fatal: not a git repository'));

    try {
      executeGitCommand(['rev-parse', '--show-toplevel']);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(GitCommandError);
      if (error instanceof GitCommandError) {
        expect(error.exitCode).toBe(128);
        expect(error.stderr).toBe('fatal: not a git repository');
        expect(error.message).toBe(
          'Git command failed: git rev-parse --show-toplevel\nfatal: not a git repository'
        );
      }
    }
  });

  it('should return the failed result when ignoreErrors is set', () => {
    vi.mocked(spawnSync).mockReturnValue(spawnResult(1, ''));

    const result = executeGitCommand(['rev-parse', '--is-inside-work-tree'], { ignoreErrors: true });

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(1);
  });

  it('should reject empty argument lists', () => {
    expect(() => executeGitCommand([])).toThrow('non-empty array');
    expect(spawnSync).not.toHaveBeenCalled();
  });

  it('should report success through tryGitCommand', () => {
    vi.mocked(spawnSync).mockReturnValueOnce(spawnResult(0, 'true'));
    vi.mocked(spawnSync).mockReturnValueOnce(spawnResult(128, '', 'fatal'));

    expect(tryGitCommand(['rev-parse', '--is-inside-work-tree'])).toBe(true);
    expect(tryGitCommand(['rev-parse', '--is-inside-work-tree'])).toBe(false);
  });
});

describe('git-executor - validateGitRef', () => {
  it('should accept ordinary branch names', () => {
    expect(() => validateGitRef('main')).not.toThrow();
    expect(() => validateGitRef('feature/checkout-flow')).not.toThrow();
    expect(() => validateGitRef('release-2024.10')).not.toThrow();
  });

  it('should reject shell special characters', () => {
    expect(() => validateGitRef('main; rm -rf /')).toThrow('shell special characters');
    expect(() => validateGitRef('main$(whoami)')).toThrow('shell special characters');
  });

  it('should reject refs starting with dash (option injection)', () => {
    expect(() => validateGitRef('--help')).toThrow('starts with dash');
  });

  it('should reject path traversal, null bytes and newlines', () => {
    expect(() => validateGitRef('main/../other')).toThrow('path traversal');
    expect(() => validateGitRef('main\0')).toThrow('null byte');
    expect(() => validateGitRef('main\nother')).toThrow('newline');
  });

  it('should reject empty refs', () => {
    expect(() => validateGitRef('')).toThrow('non-empty string');
  });
});
