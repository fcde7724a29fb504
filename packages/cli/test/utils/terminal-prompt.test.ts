import { PromptCancelledError } from '@branchgate/core';
import { describe, it, expect, vi, afterEach } from 'vitest';

vi.mock('prompts', () => ({ default: vi.fn() }));

import prompts from 'prompts';

import { createTerminalPrompt } from '../../src/utils/terminal-prompt.js';

describe('terminal prompt', () => {
  afterEach(() => {
    vi.mocked(prompts).mockReset();
  });

  it('should offer options as a select and return the chosen index', async () => {
    vi.mocked(prompts).mockResolvedValue({ value: 1 });

    const index = await createTerminalPrompt().selectOne('Pick one', ['develop (Development)', 'main (Production)']);

    expect(index).toBe(1);
    expect(prompts).toHaveBeenCalledWith(
      {
        type: 'select',
        name: 'value',
        message: 'Pick one',
        choices: [
          { title: 'develop (Development)', value: 0 },
          { title: 'main (Production)', value: 1 },
        ],
      },
      expect.objectContaining({ onCancel: expect.any(Function) })
    );
  });

  it('should throw PromptCancelledError when the prompt is dismissed', async () => {
    vi.mocked(prompts).mockImplementation(async (_questions, options) => {
      options?.onCancel?.({ type: 'select', name: 'value', message: 'Pick one' }, {});
      return {};
    });

    await expect(createTerminalPrompt().selectOne('Pick one', ['develop'])).rejects.toBeInstanceOf(
      PromptCancelledError
    );
  });

  it('should default confirm to the given value', async () => {
    vi.mocked(prompts).mockResolvedValue({ value: true });

    await expect(createTerminalPrompt().confirm('Continue?', false)).resolves.toBe(true);
    expect(prompts).toHaveBeenCalledWith(
      { type: 'confirm', name: 'value', message: 'Continue?', initial: false },
      expect.anything()
    );
  });

  it('should return an empty string when text has no answer', async () => {
    vi.mocked(prompts).mockResolvedValue({});

    await expect(createTerminalPrompt().text("Type 'yes' to confirm")).resolves.toBe('');
  });

  it('should reject when the signal aborts an open prompt', async () => {
    vi.mocked(prompts).mockImplementation(() => new Promise(() => {}));
    const controller = new AbortController();

    const pending = createTerminalPrompt().confirm('Continue?', false, controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('should not open a prompt for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createTerminalPrompt().text('Name?', controller.signal)).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(prompts).not.toHaveBeenCalled();
  });
});
