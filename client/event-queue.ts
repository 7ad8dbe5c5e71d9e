export type TransportEvent =
  | { readonly kind: "opened" }
  | { readonly kind: "closed"; readonly code: number; readonly reason: string }
  | { readonly kind: "message"; readonly text: string }
  | { readonly kind: "error"; readonly description: string }
  | { readonly kind: "sendFailed"; readonly description: string };

export interface TransportEventSink {
  readonly push: (event: TransportEvent) => void;
}

export type TransportEventConsumer = (event: TransportEvent) => void;

export type DrainScheduler = (drain: () => void) => void;

const scheduleOnNextTurn: DrainScheduler = (drain) => {
  setImmediate(drain);
};

/**
 * One-directional hand-off between the transport and the code that owns the
 * player state. The transport only pushes; the consumer sees events in order,
 * on a later turn of the event loop, never from inside a socket callback.
 */
export class TransportEventQueue implements TransportEventSink {
  private readonly pending: TransportEvent[] = [];
  private consumer: TransportEventConsumer | null = null;
  private drainScheduled = false;

  constructor(private readonly schedule: DrainScheduler = scheduleOnNextTurn) {}

  get size(): number {
    return this.pending.length;
  }

  attach(consumer: TransportEventConsumer): void {
    this.consumer = consumer;
    this.requestDrain();
  }

  detach(): void {
    this.consumer = null;
  }

  push(event: TransportEvent): void {
    this.pending.push(event);
    this.requestDrain();
  }

  drain(): void {
    this.drainScheduled = false;
    while (this.consumer && this.pending.length > 0) {
      const event = this.pending.shift();
      if (event) {
        this.consumer(event);
      }
    }
  }

  clear(): void {
    this.pending.length = 0;
  }

  private requestDrain(): void {
    if (this.drainScheduled || !this.consumer || this.pending.length === 0) {
      return;
    }
    this.drainScheduled = true;
    this.schedule(() => this.drain());
  }
}
