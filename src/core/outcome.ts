// ── Tagged outcomes ──────────────────────────────────────────

export interface Success {
  readonly kind: 'success';
}

/** Poll is not done yet and has not failed. Internal to `waitUntil`. */
export interface Continue {
  readonly kind: 'continue';
}

/** Event is irrelevant to the waiter. Internal to `waitForEvent`. */
export interface NotMatched {
  readonly kind: 'not_matched';
}

export interface Failure {
  readonly kind: 'failure';
  readonly error: unknown;
}

export type Outcome = Success | Continue | NotMatched | Failure;

export type PollOutcome = Success | Continue | Failure;

export type MatchOutcome = Success | NotMatched | Failure;

// ── Constructors ─────────────────────────────────────────────

const SUCCESS: Success = Object.freeze({ kind: 'success' });
const CONTINUE: Continue = Object.freeze({ kind: 'continue' });
const NOT_MATCHED: NotMatched = Object.freeze({ kind: 'not_matched' });

export function success(): Success {
  return SUCCESS;
}

export function continueWaiting(): Continue {
  return CONTINUE;
}

export function notMatched(): NotMatched {
  return NOT_MATCHED;
}

export function failure(error: unknown): Failure {
  return { kind: 'failure', error };
}
