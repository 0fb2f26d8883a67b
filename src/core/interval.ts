import type { Action } from './action.js';
import { actionFunc } from './action.js';
import { sleep } from './scope.js';

/**
 * Run `action` once every `intervalMs` until it fails or the scope ends.
 * The next interval starts only after the previous run has settled.
 */
export function intervalRun(intervalMs: number, action: Action): Action {
  return actionFunc(async (scope) => {
    for (;;) {
      await sleep(scope, intervalMs);
      scope.throwIfCancelled();
      await action.run(scope);
    }
  });
}
