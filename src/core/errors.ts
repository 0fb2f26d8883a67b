// ── Cancellation ─────────────────────────────────────────────

/** The scope an operation ran under ended before the operation did. */
export class ScopeCancelledError extends Error {
  constructor(message = 'scope cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/** The scope ended because its deadline passed. */
export class ScopeTimeoutError extends ScopeCancelledError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`scope deadline exceeded after ${String(timeoutMs)}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// ── Programming misuse ───────────────────────────────────────

/**
 * Raised while an action is being built, never while it runs:
 * an empty action list, a missing output slot.
 */
export class MisuseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MisuseError';
  }
}
