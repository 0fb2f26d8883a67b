import { describe, expect, it } from 'vitest';

import type { Action } from '../src/core/action.js';
import { actionFunc } from '../src/core/action.js';
import { MisuseError, ScopeCancelledError } from '../src/core/errors.js';
import { waitOneOf } from '../src/core/race.js';
import { Scope } from '../src/core/scope.js';
import { createSlot } from '../src/core/slot.js';

// ── Helpers ──────────────────────────────────────────────────

/** Blocks until its scope ends, then records its name. */
function blocker(observed: string[], name: string): Action {
  return actionFunc(async (scope) => {
    try {
      await scope.done();
    } finally {
      observed.push(name);
    }
  });
}

const succeed = actionFunc(async () => {});

// ── Tests ────────────────────────────────────────────────────

describe('waitOneOf', () => {
  it('refuses an empty action list when built', () => {
    expect(() => waitOneOf([])).toThrow(MisuseError);
  });

  it('fails with the one failing action and stops the others first', async () => {
    for (let k = 0; k < 4; k++) {
      const boom = new Error(`boom ${String(k)}`);
      const observed: string[] = [];
      const actions = [0, 1, 2, 3].map((i) =>
        i === k
          ? actionFunc(async () => {
              throw boom;
            })
          : blocker(observed, `a${String(i)}`),
      );

      await expect(waitOneOf(actions).run(Scope.background())).rejects.toBe(boom);

      const expected = [0, 1, 2, 3]
        .filter((i) => i !== k)
        .map((i) => `a${String(i)}`);
      expect([...observed].sort()).toEqual(expected);
    }
  });

  it('reports the index of the action that finished', async () => {
    for (let k = 0; k < 5; k++) {
      const observed: string[] = [];
      const winner = createSlot<number>();
      const actions = [0, 1, 2, 3, 4].map((i) =>
        i === k ? succeed : blocker(observed, `a${String(i)}`),
      );
      const parent = Scope.background();

      await waitOneOf(actions, { winner }).run(parent);

      expect(winner.value).toBe(k);
      expect(observed).toHaveLength(4);
      expect(parent.isCancelled).toBe(false);
    }
  });

  it('leaves the winner slot untouched when the race fails', async () => {
    const winner = createSlot<number>();
    const race = waitOneOf(
      [
        actionFunc(async () => {
          throw new Error('nope');
        }),
      ],
      { winner },
    );

    await expect(race.run(Scope.background())).rejects.toThrow('nope');
    expect(winner.isSet).toBe(false);
  });

  it('accepts either action on a tie', async () => {
    const winner = createSlot<number>();

    await waitOneOf([succeed, succeed], { winner }).run(Scope.background());

    expect([0, 1]).toContain(winner.value);
  });

  it('fails with the parent error when the parent is cancelled first', async () => {
    const observed: string[] = [];
    const parent = Scope.background();
    const reason = new ScopeCancelledError('caller gave up');
    const race = waitOneOf([
      blocker(observed, 'a0'),
      blocker(observed, 'a1'),
    ]).run(parent);
    const assertion = expect(race).rejects.toBe(reason);

    parent.cancel(reason);

    await assertion;
    expect([...observed].sort()).toEqual(['a0', 'a1']);
  });

  it('starts nothing under an already-cancelled parent', async () => {
    const parent = Scope.background();
    parent.cancel();
    let started = 0;
    const action = actionFunc(async () => {
      started++;
    });

    await expect(waitOneOf([action]).run(parent)).rejects.toBeInstanceOf(
      ScopeCancelledError,
    );
    expect(started).toBe(0);
  });

  it('does not leave executors running across repeated races', async () => {
    let active = 0;
    const tracked = (inner: Action): Action =>
      actionFunc(async (scope) => {
        active++;
        try {
          await inner.run(scope);
        } finally {
          active--;
        }
      });
    const parent = Scope.background();
    const ignored: string[] = [];

    for (let round = 0; round < 200; round++) {
      const fast = round % 5;
      const actions = [0, 1, 2, 3, 4].map((i) =>
        tracked(i === fast ? succeed : blocker(ignored, 'loser')),
      );
      const winner = createSlot<number>();

      await waitOneOf(actions, { winner }).run(parent);

      expect(winner.value).toBe(fast);
      expect(active).toBe(0);
    }
    expect(ignored).toHaveLength(800);
  });
});
