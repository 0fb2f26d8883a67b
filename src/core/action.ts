import type { Outcome } from './outcome.js';
import { failure, success } from './outcome.js';
import type { Scope } from './scope.js';

// ── Action ───────────────────────────────────────────────────

/**
 * A unit of cancellable work. Resolving is success; rejecting is failure.
 * Implementations are expected to watch `scope` and stop once it ends.
 */
export interface Action {
  run(scope: Scope): Promise<void>;
}

export function actionFunc(run: (scope: Scope) => Promise<void>): Action {
  return { run };
}

/** Run an action and fold a rejection into a `failure` outcome. */
export async function settle(action: Action, scope: Scope): Promise<Outcome> {
  try {
    await action.run(scope);
    return success();
  } catch (err) {
    return failure(err);
  }
}
