import { ScopeCancelledError, ScopeTimeoutError } from './errors.js';

// ── Scope ────────────────────────────────────────────────────

/**
 * Cancellable execution context.
 *
 * Scopes form a tree: cancelling a scope cancels every scope derived
 * from it, with the same error. Cancellation is advisory. Running
 * code observes it through `signal`, `throwIfCancelled()`, `done()`
 * or `sleep()`.
 */
export class Scope {
  private readonly controller = new AbortController();
  private reason: ScopeCancelledError | undefined;
  private detach: () => void = () => {};
  private timer: NodeJS.Timeout | null = null;
  private donePromise: Promise<never> | null = null;

  private constructor(parent: Scope | null) {
    if (parent === null) return;

    const inherited = parent.reason;
    if (inherited) {
      this.cancel(inherited);
      return;
    }

    const onParentCancel = (): void => {
      this.cancel(parent.reason);
    };
    parent.signal.addEventListener('abort', onParentCancel, { once: true });
    this.detach = () => {
      parent.signal.removeEventListener('abort', onParentCancel);
    };
  }

  /** Root scope. Ends only when `cancel()` is called on it. */
  static background(): Scope {
    return new Scope(null);
  }

  derive(): Scope {
    return new Scope(this);
  }

  /** Child scope that cancels itself with a `ScopeTimeoutError` after `ms`. */
  withTimeout(ms: number): Scope {
    const child = new Scope(this);
    if (!child.isCancelled) {
      child.timer = setTimeout(() => {
        child.cancel(new ScopeTimeoutError(ms));
      }, ms);
    }
    return child;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.reason !== undefined;
  }

  get error(): ScopeCancelledError | undefined {
    return this.reason;
  }

  cancel(error: ScopeCancelledError = new ScopeCancelledError()): void {
    if (this.reason) return;

    this.reason = error;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.detach();
    this.detach = () => {};
    this.controller.abort(error);
  }

  throwIfCancelled(): void {
    if (this.reason) {
      throw this.reason;
    }
  }

  /** Rejects with the cancellation error once the scope ends. Never resolves. */
  done(): Promise<never> {
    if (this.donePromise) return this.donePromise;

    this.donePromise = new Promise<never>((_resolve, reject) => {
      if (this.reason) {
        reject(this.reason);
        return;
      }
      this.signal.addEventListener(
        'abort',
        () => {
          reject(this.reason);
        },
        { once: true },
      );
    });
    // Callers race this promise; the rejection is observed there.
    this.donePromise.catch(() => {});
    return this.donePromise;
  }
}

// ── Timer ────────────────────────────────────────────────────

/**
 * Wait `ms`, or reject with the scope's error as soon as it is cancelled.
 */
export function sleep(scope: Scope, ms: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cancelled = scope.error;
    if (cancelled) {
      reject(cancelled);
      return;
    }

    const onCancel = (): void => {
      clearTimeout(timer);
      reject(scope.error);
    };
    const timer = setTimeout(() => {
      scope.signal.removeEventListener('abort', onCancel);
      resolve();
    }, ms);
    scope.signal.addEventListener('abort', onCancel, { once: true });
  });
}
