import type { EventSource } from './events.js';
import type { MatchOutcome } from './outcome.js';
import { failure } from './outcome.js';
import { Rendezvous } from './rendezvous.js';
import type { Scope } from './scope.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

/**
 * Decides whether one event is the one being waited for.
 * Only `success()` ends the wait; `notMatched()` and `failure()` both
 * mean the event is not the one.
 */
export type EventPredicate<E> = (scope: Scope, event: E) => MatchOutcome;

// ── Evaluation ───────────────────────────────────────────────

export function evaluateEvent<E>(
  predicate: EventPredicate<E>,
  scope: Scope,
  event: E,
): MatchOutcome {
  try {
    return predicate(scope, event);
  } catch (err) {
    return failure(err);
  }
}

// ── Waiter ───────────────────────────────────────────────────

/**
 * Block until an event satisfies `predicate`, or resolve at once when
 * `predicate` is null. Rejects only with the caller's cancellation error.
 *
 * Subscription happens when this is called. A caller that first triggers
 * a side effect (a navigation, say) and then waits can miss an event that
 * fires in between, and will then wait until `scope` ends. Subscribing
 * before the trigger is worse: it can match a stale event left by an
 * earlier trigger, and the event stream carries no correlation id to
 * tell the two apart. The missed-event window is the accepted trade-off.
 */
export async function waitForEvent<E>(
  scope: Scope,
  events: EventSource<E>,
  predicate: EventPredicate<E> | null,
): Promise<void> {
  if (predicate === null) return;

  const listening = scope.derive();
  const completion = new Rendezvous<void>();

  events.listen(listening, (event) => {
    const outcome = evaluateEvent(predicate, scope, event);
    if (outcome.kind === 'failure') {
      const message =
        outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
      log.debug(`waitForEvent: predicate failed, still listening: ${message}`);
      return;
    }
    if (outcome.kind === 'not_matched') return;
    if (completion.offer()) {
      listening.cancel();
    }
  });

  try {
    await Promise.race([completion.receive(), listening.done()]);
  } finally {
    listening.cancel();
  }
}
