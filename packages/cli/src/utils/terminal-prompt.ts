/**
 * Terminal Prompt
 *
 * Prompt implementation on top of the `prompts` library. Messages go to
 * stderr so YAML on stdout stays parseable.
 */

import { PromptCancelledError, type Prompt } from '@branchgate/core';
import chalk from 'chalk';
import prompts from 'prompts';

/**
 * Reject as soon as the signal fires, even if the prompt is still open
 */
function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  signal.throwIfAborted();

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Ask one question and return the raw answer
 *
 * @throws PromptCancelledError when the user presses Esc or Ctrl-C
 */
async function askOne(question: prompts.PromptObject<'value'>, signal?: AbortSignal): Promise<unknown> {
  let cancelled = false;
  const response = await raceAbort(
    prompts(question, {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }),
    signal
  );

  if (cancelled) {
    throw new PromptCancelledError();
  }
  const value: unknown = response.value;
  return value;
}

export function createTerminalPrompt(): Prompt {
  return {
    async selectOne(label, options, signal) {
      const value = await askOne(
        {
          type: 'select',
          name: 'value',
          message: label,
          choices: options.map((title, index) => ({ title, value: index })),
        },
        signal
      );
      if (typeof value !== 'number') {
        throw new PromptCancelledError();
      }
      return value;
    },

    async confirm(message, defaultValue, signal) {
      const value = await askOne({ type: 'confirm', name: 'value', message, initial: defaultValue }, signal);
      return value === true;
    },

    async text(message, signal) {
      const value = await askOne({ type: 'text', name: 'value', message }, signal);
      return typeof value === 'string' ? value : '';
    },

    warn(message) {
      console.error(chalk.yellow(`⚠️  ${message}`));
    },

    info(message) {
      console.error(chalk.gray(message));
    },
  };
}
