/**
 * Tests for branches command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { parse as parseYaml } from 'yaml';

vi.mock('../../src/utils/command-context.js', async () => {
  const actual = await vi.importActual<typeof import('../../src/utils/command-context.js')>(
    '../../src/utils/command-context.js'
  );
  return { ...actual, createCommandContext: vi.fn() };
});

import { branchesCommand } from '../../src/commands/branches.js';
import { createCommandContext } from '../../src/utils/command-context.js';
import { setupCommanderTest, runProgram, type CommanderTestEnv } from '../helpers/commander-test-setup.js';
import { createMemoryDirectory, createTestContext, makeBranch } from '../helpers/context-fakes.js';

describe('branches command', () => {
  let env: CommanderTestEnv;

  beforeEach(() => {
    env = setupCommanderTest();
    branchesCommand(env.program);
  });

  afterEach(() => {
    env.cleanup();
    vi.clearAllMocks();
  });

  it('should list branches in fallback-candidate order', async () => {
    vi.mocked(createCommandContext).mockResolvedValue(createTestContext());

    const code = await runProgram(env.program, ['branches', '--yaml']);

    expect(code).toBe(0);
    const text = env.capturedStdout.join('').replace(/^---\n/, '').replace(/---\n$/, '');
    expect(parseYaml(text)).toEqual({
      branches: [
        { name: 'develop', git_branch: 'develop', environment: 'Development', protected: false, project_ref: 'devref', status: 'ACTIVE_HEALTHY' },
        { name: 'feature/login', git_branch: 'feature/login', environment: 'Feature', protected: false, project_ref: 'featref', status: 'ACTIVE_HEALTHY' },
        { name: 'main', git_branch: 'main', environment: 'Production', protected: true, project_ref: 'prodref', status: 'ACTIVE_HEALTHY' },
      ],
    });
  });

  it('should honour configured protected names', async () => {
    const directory = createMemoryDirectory([
      makeBranch({ gitBranchName: 'live', projectRef: 'liveref', isPersistent: true }),
      makeBranch({ gitBranchName: 'main', projectRef: 'mainref', isPersistent: true }),
    ]);
    vi.mocked(createCommandContext).mockResolvedValue(
      createTestContext({ directory, branchesConfig: { protected_names: ['live'] } })
    );

    const code = await runProgram(env.program, ['branches', '--yaml']);

    expect(code).toBe(0);
    const text = env.capturedStdout.join('').replace(/^---\n/, '').replace(/---\n$/, '');
    expect(parseYaml(text)).toMatchObject({
      branches: [
        { git_branch: 'live', protected: true },
        { git_branch: 'main', protected: false },
      ],
    });
  });

  it('should say so when the directory has no branches', async () => {
    vi.mocked(createCommandContext).mockResolvedValue(
      createTestContext({ directory: createMemoryDirectory([]) })
    );

    const code = await runProgram(env.program, ['branches']);

    expect(code).toBe(0);
    expect(env.capturedLog).toContain('No remote branches found');
  });

  it('should exit 2 on an unexpected directory failure', async () => {
    const directory = createMemoryDirectory();
    vi.mocked(directory.listAll).mockRejectedValue(new Error('spawn supabase ENOENT'));
    vi.mocked(createCommandContext).mockResolvedValue(createTestContext({ directory }));

    const code = await runProgram(env.program, ['branches']);

    expect(code).toBe(2);
    expect(env.capturedError).toContain('❌ Branch listing failed with error:');
    expect(env.capturedError).toContain('spawn supabase ENOENT');
  });
});
