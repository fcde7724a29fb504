import { describe, it, expect } from 'vitest';

import {
  safeExecSync,
  safeExecAsync,
  getToolVersion,
  CommandExecutionError,
} from '../src/safe-exec.js';

describe('safeExecSync', () => {
  it('should return string when encoding specified', () => {
    const result = safeExecSync('node', ['--version'], { encoding: 'utf8' });
    expect(typeof result).toBe('string');
    expect(result).toMatch(/^v\d+\.\d+\.\d+/);
  });

  it('should return Buffer by default', () => {
    const result = safeExecSync('node', ['--version']);
    expect(Buffer.isBuffer(result)).toBe(true);
  });

  it('should pass arguments without shell interpretation', () => {
    const result = safeExecSync('node', ['-e', 'console.log(process.argv[1])', 'a; echo injected'], {
      encoding: 'utf8',
    });
    expect(result.toString().trim()).toBe('a; echo injected');
  });

  it('should throw if command not found', () => {
    expect(() => safeExecSync('nonexistent-command-xyz-123', ['--version'])).toThrow();
  });

  it('should throw CommandExecutionError on non-zero exit code', () => {
    try {
      safeExecSync('node', ['-e', 'process.exit(42)']);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(CommandExecutionError);
      if (error instanceof CommandExecutionError) {
        expect(error.message).toContain('exit code 42');
        expect(error.status).toBe(42);
      }
    }
  });
});

describe('safeExecAsync', () => {
  it('should resolve with stdout and stderr', async () => {
    const result = await safeExecAsync('node', [
      '-e',
      'process.stdout.write("out"); process.stderr.write("err")',
    ]);
    expect(result).toEqual({ status: 0, stdout: 'out', stderr: 'err' });
  });

  it('should reject with CommandExecutionError on non-zero exit', async () => {
    const promise = safeExecAsync('node', ['-e', 'process.stderr.write("boom"); process.exit(7)']);
    await expect(promise).rejects.toBeInstanceOf(CommandExecutionError);
    await expect(promise).rejects.toMatchObject({ status: 7, stderr: 'boom' });
  });

  it('should reject when the command is missing', async () => {
    await expect(safeExecAsync('nonexistent-command-xyz-123')).rejects.toThrow();
  });

  it('should reject immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      safeExecAsync('node', ['--version'], { signal: controller.signal })
    ).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('should kill the child when the signal aborts mid-flight', async () => {
    const controller = new AbortController();
    const promise = safeExecAsync('node', ['-e', 'setTimeout(() => {}, 60000)'], {
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 50);
    await expect(promise).rejects.toMatchObject({ name: 'AbortError' });
  });
});

describe('tool detection', () => {
  it('should report missing tools as null', () => {
    expect(getToolVersion('nonexistent-command-xyz-123')).toBeNull();
  });

  it('should return a trimmed version string', () => {
    expect(getToolVersion('node')).toMatch(/^v\d+\.\d+\.\d+$/);
  });
});
