/**
 * Core coordination module.
 * Scopes, actions and the race / poll / interval / event-wait coordinators.
 * No browser APIs, no IO.
 */

export { Scope, sleep } from './scope.js';
export { ScopeCancelledError, ScopeTimeoutError, MisuseError } from './errors.js';
export { actionFunc, settle } from './action.js';
export type { Action } from './action.js';
export {
  success,
  continueWaiting,
  notMatched,
  failure,
} from './outcome.js';
export type {
  Outcome,
  PollOutcome,
  MatchOutcome,
  Success,
  Continue,
  NotMatched,
  Failure,
} from './outcome.js';
export { Slot, createSlot, requireSlot } from './slot.js';
export { Rendezvous } from './rendezvous.js';
export { waitOneOf } from './race.js';
export type { WaitOneOfOptions } from './race.js';
export { waitUntil } from './poll.js';
export type { PollFn, WaitUntilOptions } from './poll.js';
export { intervalRun } from './interval.js';
export { EventHub } from './events.js';
export type { EventSource, EventCallback } from './events.js';
export { waitForEvent, evaluateEvent } from './wait-event.js';
export type { EventPredicate } from './wait-event.js';
