import { afterEach, describe, expect, it, vi } from 'vitest';

import { ScopeCancelledError, ScopeTimeoutError } from '../src/core/errors.js';
import { Scope, sleep } from '../src/core/scope.js';

describe('scope tree', () => {
  it('cancels children with the parent error', () => {
    const parent = Scope.background();
    const child = parent.derive();
    const grandchild = child.derive();
    const reason = new ScopeCancelledError('stop');

    parent.cancel(reason);

    expect(child.error).toBe(reason);
    expect(grandchild.error).toBe(reason);
    expect(grandchild.signal.aborted).toBe(true);
  });

  it('leaves the parent running when a child is cancelled', () => {
    const parent = Scope.background();
    const child = parent.derive();

    child.cancel();

    expect(child.isCancelled).toBe(true);
    expect(parent.isCancelled).toBe(false);
  });

  it('derives an already-cancelled child from a cancelled parent', () => {
    const parent = Scope.background();
    const reason = new ScopeCancelledError('gone');
    parent.cancel(reason);

    const child = parent.derive();

    expect(child.error).toBe(reason);
    expect(() => child.throwIfCancelled()).toThrow(reason);
  });

  it('keeps the first cancellation error', () => {
    const scope = Scope.background();
    const first = new ScopeCancelledError('first');

    scope.cancel(first);
    scope.cancel(new ScopeCancelledError('second'));

    expect(scope.error).toBe(first);
  });

  it('rejects done() with the cancellation error', async () => {
    const scope = Scope.background();
    const reason = new ScopeCancelledError('bye');
    const done = scope.done();

    scope.cancel(reason);

    await expect(done).rejects.toBe(reason);
    expect(scope.done()).toBe(done);
  });
});

describe('scope deadlines', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('cancels with a timeout error once the deadline passes', async () => {
    vi.useFakeTimers();
    const parent = Scope.background();
    const scope = parent.withTimeout(100);

    await vi.advanceTimersByTimeAsync(99);
    expect(scope.isCancelled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(scope.error).toBeInstanceOf(ScopeTimeoutError);
    expect(scope.error?.message).toBe('scope deadline exceeded after 100ms');
    expect(parent.isCancelled).toBe(false);
  });

  it('clears the deadline when cancelled early', () => {
    vi.useFakeTimers();
    const scope = Scope.background().withTimeout(100);

    scope.cancel();

    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the requested delay', async () => {
    vi.useFakeTimers();
    let woke = false;
    const pending = sleep(Scope.background(), 50).then(() => {
      woke = true;
    });

    await vi.advanceTimersByTimeAsync(49);
    expect(woke).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(woke).toBe(true);
  });

  it('rejects as soon as the scope is cancelled', async () => {
    vi.useFakeTimers();
    const scope = Scope.background();
    const reason = new ScopeCancelledError('wake up');
    const pending = expect(sleep(scope, 10_000)).rejects.toBe(reason);

    scope.cancel(reason);

    await pending;
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects immediately on a cancelled scope', async () => {
    const scope = Scope.background();
    scope.cancel();

    await expect(sleep(scope, 10)).rejects.toBeInstanceOf(ScopeCancelledError);
  });
});
