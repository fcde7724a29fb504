/**
 * In-memory collaborators for resolution tests
 *
 * @packageDocumentation
 */

import { vi } from 'vitest';

import type { BranchDirectory, Prompt } from '../../src/directory.js';
import type { RemoteBranch } from '../../src/types.js';

/**
 * Build a remote branch with sensible defaults
 */
export function makeBranch(overrides: Partial<RemoteBranch> & { gitBranchName: string }): RemoteBranch {
  return {
    name: overrides.gitBranchName,
    projectRef: `ref-${overrides.gitBranchName.replaceAll('/', '-')}`,
    isDefault: false,
    isPersistent: false,
    status: 'ACTIVE_HEALTHY',
    ...overrides,
  };
}

/**
 * Directory backed by a fixed branch list
 *
 * Lookups match git branch name first, then display name. Every method
 * is a spy so tests can count calls.
 */
export function createMemoryDirectory(
  branches: RemoteBranch[],
  regions: Record<string, string> = {}
) {
  const directory = {
    findByGitBranch: vi.fn(async (name: string) =>
      branches.find(b => b.gitBranchName === name) ?? branches.find(b => b.name === name)
    ),
    listAll: vi.fn(async () => [...branches]),
    urlFor: (projectRef: string) => `https://${projectRef}.example.test`,
    findProjectRegion: vi.fn(async (projectRef: string): Promise<string | undefined> => regions[projectRef]),
  } satisfies BranchDirectory;
  return directory;
}

export interface ScriptedPromptAnswers {
  select?: number | Error;
  confirm?: boolean | Error;
  text?: string | Error;
}

/**
 * Prompt that replays fixed answers and records what it showed
 */
export function createScriptedPrompt(answers: ScriptedPromptAnswers = {}) {
  const warnings: string[] = [];
  const infos: string[] = [];

  function answer<T>(value: T | Error | undefined, fallback: T): Promise<T> {
    if (value instanceof Error) {
      return Promise.reject(value);
    }
    return Promise.resolve(value ?? fallback);
  }

  const prompt = {
    selectOne: vi.fn((_label: string, _options: readonly string[], _signal?: AbortSignal) =>
      answer(answers.select, 0)
    ),
    confirm: vi.fn((_message: string, defaultValue: boolean, _signal?: AbortSignal) =>
      answer(answers.confirm, defaultValue)
    ),
    text: vi.fn((_message: string, _signal?: AbortSignal) => answer(answers.text, '')),
    warn: (message: string) => {
      warnings.push(message);
    },
    info: (message: string) => {
      infos.push(message);
    },
  } satisfies Prompt;

  return { prompt, warnings, infos };
}
