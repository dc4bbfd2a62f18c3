/**
 * Single-consumer queue for inbound messages.
 *
 * Items pushed while the consumer runs (a handler that triggers another
 * delivery, for instance) are appended and handled after the current one,
 * so items are always consumed in arrival order and never re-entrantly.
 */
export class InboundQueue<T> {
  private readonly consume: (item: T) => void;
  private readonly onConsumerError: (error: unknown, item: T) => void;
  private items: T[] = [];
  private draining = false;

  constructor(consume: (item: T) => void, onConsumerError: (error: unknown, item: T) => void) {
    this.consume = consume;
    this.onConsumerError = onConsumerError;
  }

  push(item: T): void {
    this.items.push(item);
    if (this.draining) {
      return;
    }

    this.draining = true;
    try {
      let next = this.items.shift();
      while (next !== undefined) {
        try {
          this.consume(next);
        } catch (error) {
          this.onConsumerError(error, next);
        }
        next = this.items.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
