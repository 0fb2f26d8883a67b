import type { Scope } from './scope.js';
import * as log from '../utils/logger.js';

// ── Subscription contract ────────────────────────────────────

export type EventCallback<E> = (event: E) => void;

/**
 * Delivers events to `callback` until `scope` is cancelled. Delivery may
 * continue briefly after cancellation; it must stop eventually.
 */
export interface EventSource<E> {
  listen(scope: Scope, callback: EventCallback<E>): void;
}

// ── In-process hub ───────────────────────────────────────────

interface Listener<E> {
  scope: Scope;
  callback: EventCallback<E>;
}

export class EventHub<E> implements EventSource<E> {
  private readonly listeners = new Set<Listener<E>>();

  listen(scope: Scope, callback: EventCallback<E>): void {
    if (scope.isCancelled) return;

    const listener: Listener<E> = { scope, callback };
    this.listeners.add(listener);
    scope.signal.addEventListener(
      'abort',
      () => {
        this.listeners.delete(listener);
      },
      { once: true },
    );
  }

  /** Deliver synchronously to every listener whose scope is still live. */
  emit(event: E): void {
    for (const listener of [...this.listeners]) {
      if (listener.scope.isCancelled) continue;
      try {
        listener.callback(event);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`Event listener threw: ${message}`);
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
