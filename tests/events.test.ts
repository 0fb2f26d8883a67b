import { afterEach, describe, expect, it, vi } from 'vitest';

import { EventHub } from '../src/core/events.js';
import { Scope } from '../src/core/scope.js';

describe('event hub', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers every event until the listener scope is cancelled', () => {
    const hub = new EventHub<number>();
    const scope = Scope.background();
    const seen: number[] = [];

    hub.listen(scope, (n) => seen.push(n));
    hub.emit(1);
    hub.emit(2);
    scope.cancel();
    hub.emit(3);

    expect(seen).toEqual([1, 2]);
    expect(hub.listenerCount).toBe(0);
  });

  it('ignores listeners registered on a cancelled scope', () => {
    const hub = new EventHub<number>();
    const scope = Scope.background();
    scope.cancel();

    hub.listen(scope, () => {
      throw new Error('should not run');
    });
    hub.emit(1);

    expect(hub.listenerCount).toBe(0);
  });

  it('keeps delivering after a listener throws', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const hub = new EventHub<string>();
    const scope = Scope.background();
    const seen: string[] = [];

    hub.listen(scope, () => {
      throw new Error('listener broke');
    });
    hub.listen(scope, (event) => seen.push(event));
    hub.emit('ping');

    expect(seen).toEqual(['ping']);
    expect(stderr).toHaveBeenCalledWith('⚠️  Event listener threw: listener broke\n');
  });
});
