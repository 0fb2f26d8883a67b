import { describe, expect, it } from 'vitest';

import { MisuseError } from '../src/core/errors.js';
import { Rendezvous } from '../src/core/rendezvous.js';
import { createSlot, requireSlot } from '../src/core/slot.js';

describe('output slot', () => {
  it('starts empty and holds the written value', () => {
    const slot = createSlot<number>();
    expect(slot.isSet).toBe(false);
    expect(slot.value).toBeUndefined();

    slot.set(3);

    expect(slot.isSet).toBe(true);
    expect(slot.expect()).toBe(3);
  });

  it('throws when read before it was written', () => {
    expect(() => createSlot<string>().expect()).toThrow(MisuseError);
  });

  it('rejects a missing required slot', () => {
    expect(() => requireSlot<string>(undefined, 'title')).toThrow(
      'title cannot be empty',
    );
    expect(() => requireSlot<string>(null, 'title')).toThrow(MisuseError);
  });
});

describe('rendezvous', () => {
  it('delivers only the first offer', async () => {
    const handoff = new Rendezvous<string>();

    expect(handoff.offer('first')).toBe(true);
    expect(handoff.offer('second')).toBe(false);

    expect(handoff.isDelivered).toBe(true);
    await expect(handoff.receive()).resolves.toBe('first');
  });
});
