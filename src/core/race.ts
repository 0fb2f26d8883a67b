import type { Action } from './action.js';
import { actionFunc, settle } from './action.js';
import { MisuseError } from './errors.js';
import type { Outcome } from './outcome.js';
import { Rendezvous } from './rendezvous.js';
import type { Scope } from './scope.js';
import type { Slot } from './slot.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface WaitOneOfOptions {
  /** Receives the 0-based position of the winning action, on success only. */
  winner?: Slot<number> | undefined;
}

interface RaceResult {
  index: number;
  outcome: Outcome;
}

// ── Race coordinator ─────────────────────────────────────────

/**
 * Run every action concurrently and finish with whichever settles first.
 *
 * The losers run under a derived scope that is cancelled as soon as a
 * winner is picked; the returned action still waits for each of them to
 * stop before it settles. A winning failure fails the race. Ties go to
 * whichever executor reaches the handoff first.
 */
export function waitOneOf(
  actions: readonly Action[],
  options: WaitOneOfOptions = {},
): Action {
  if (actions.length === 0) {
    throw new MisuseError('waitOneOf: actions cannot be empty');
  }

  const contenders = [...actions];
  const { winner } = options;

  return actionFunc(async (parent) => {
    parent.throwIfCancelled();

    const scope = parent.derive();
    const handoff = new Rendezvous<RaceResult>();
    const executors = contenders.map((action, index) =>
      execute(action, index, scope, handoff),
    );

    try {
      const result = await Promise.race([handoff.receive(), scope.done()]);
      log.debug(
        `waitOneOf: action ${String(result.index)} of ${String(contenders.length)} settled first (${result.outcome.kind})`,
      );

      if (result.outcome.kind === 'failure') {
        throw result.outcome.error;
      }
      winner?.set(result.index);
    } finally {
      scope.cancel();
      await Promise.all(executors);
    }
  });
}

// ── Executor ─────────────────────────────────────────────────

async function execute(
  action: Action,
  index: number,
  scope: Scope,
  handoff: Rendezvous<RaceResult>,
): Promise<void> {
  const outcome = await settle(action, scope);
  // The coordinator has moved on; drop the result.
  if (scope.isCancelled) return;
  handoff.offer({ index, outcome });
}
