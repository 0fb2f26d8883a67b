// ── Rendezvous ───────────────────────────────────────────────

/**
 * Single-slot handoff. The first `offer` is delivered to `receive()`;
 * every later offer is refused and the sender drops its value.
 */
export class Rendezvous<T> {
  private delivered = false;
  private deliver: (value: T) => void = () => {};
  private readonly received: Promise<T>;

  constructor() {
    this.received = new Promise<T>((resolve) => {
      this.deliver = resolve;
    });
  }

  offer(value: T): boolean {
    if (this.delivered) return false;
    this.delivered = true;
    this.deliver(value);
    return true;
  }

  receive(): Promise<T> {
    return this.received;
  }

  get isDelivered(): boolean {
    return this.delivered;
  }
}
