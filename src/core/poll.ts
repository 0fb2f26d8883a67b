import type { Action } from './action.js';
import { actionFunc } from './action.js';
import type { PollOutcome } from './outcome.js';
import type { Scope } from './scope.js';
import { sleep } from './scope.js';
import { TIMING } from '../config/defaults.js';

export type PollFn = (scope: Scope) => PollOutcome | Promise<PollOutcome>;

export interface WaitUntilOptions {
  tickMs?: number | undefined;
}

/**
 * Invoke `poll` once per tick until it returns anything other than
 * `continue`. The first invocation happens one tick after start.
 * There is no attempt limit; bound the wait with the scope's deadline.
 */
export function waitUntil(
  poll: PollFn,
  options: WaitUntilOptions = {},
): Action {
  const tickMs = options.tickMs ?? TIMING.POLL_TICK_MS;

  return actionFunc(async (scope) => {
    for (;;) {
      await sleep(scope, tickMs);
      scope.throwIfCancelled();

      const outcome = await poll(scope);
      switch (outcome.kind) {
        case 'continue':
          continue;
        case 'success':
          return;
        case 'failure':
          throw outcome.error;
      }
    }
  });
}
