import { MisuseError } from './errors.js';

// ── Output slot ──────────────────────────────────────────────

/**
 * Output cell an action writes into before it resolves.
 * Read it after the action's promise settles, never during.
 */
export class Slot<T> {
  private current: T | undefined;
  private filled = false;

  set(value: T): void {
    this.current = value;
    this.filled = true;
  }

  get value(): T | undefined {
    return this.current;
  }

  get isSet(): boolean {
    return this.filled;
  }

  /** The written value; throws when nothing was written. */
  expect(): T {
    if (!this.filled || this.current === undefined) {
      throw new MisuseError('slot read before it was written');
    }
    return this.current;
  }
}

export function createSlot<T>(): Slot<T> {
  return new Slot<T>();
}

/** Guard for slots an action cannot run without. */
export function requireSlot<T>(
  slot: Slot<T> | null | undefined,
  name: string,
): Slot<T> {
  if (!slot) {
    throw new MisuseError(`${name} cannot be empty`);
  }
  return slot;
}
