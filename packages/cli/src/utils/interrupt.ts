/**
 * Process-wide cancellation
 *
 * SIGINT aborts one shared controller. Directory calls and prompts take
 * its signal, so Ctrl-C kills a hanging `supabase` child process instead
 * of leaving the CLI blocked.
 */

import { logDebug } from '@branchgate/utils';

const controller = new AbortController();
let installed = false;

/**
 * Install the SIGINT handler (idempotent) and return the shared signal
 */
export function installInterruptHandler(): AbortSignal {
  if (!installed) {
    installed = true;
    process.once('SIGINT', () => {
      logDebug('prompt', 'SIGINT received; aborting');
      controller.abort();
    });
  }
  return controller.signal;
}

export function getProcessSignal(): AbortSignal {
  return controller.signal;
}
