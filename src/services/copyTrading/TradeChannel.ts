/**
 * Bounded FIFO channel between the activity feed and the executor.
 *
 * `send` waits while the buffer is full; `receive` waits while it is empty
 * and resolves `undefined` once the channel is closed and drained. Closing
 * releases pending senders, whose items are dropped.
 */
export class TradeChannel<T> {
  private readonly capacity: number;
  private buffer: T[] = [];
  private closed = false;
  private receivers: Array<(item: T | undefined) => void> = [];
  private senders: Array<{ item: T; resolve: (accepted: boolean) => void }> = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Enqueue an item
   * @returns false if the channel was closed before the item was accepted
   */
  async send(item: T): Promise<boolean> {
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return true;
    }

    return new Promise((resolve) => {
      this.senders.push({ item, resolve });
    });
  }

  /**
   * Dequeue the next item, or undefined once closed and drained
   */
  async receive(): Promise<T | undefined> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      // A slot opened up for the oldest waiting sender
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.item);
        sender.resolve(true);
      }
      return item;
    }

    if (this.closed) return undefined;

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers) {
      receiver(undefined);
    }
    this.receivers = [];

    for (const sender of this.senders) {
      sender.resolve(false);
    }
    this.senders = [];
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }
}
