export interface BoundedChannelOptions<T> {
  capacity: number;
  /** Processes one item; items are handed over one at a time */
  consume: (item: T) => Promise<void>;
  onDrop: (item: T) => void;
  onError: (error: unknown, item: T) => void;
}

/**
 * Fixed-capacity queue between notification producers (the transport's
 * callbacks) and a single async consumer. `offer` never blocks: when the
 * queue is full the item is dropped.
 */
export class BoundedChannel<T> {
  private readonly queue: T[] = [];
  private running = false;
  private draining: Promise<void> = Promise.resolve();

  constructor(private readonly options: BoundedChannelOptions<T>) {
    if (options.capacity < 1) {
      throw new Error(`Channel capacity must be at least 1, got ${options.capacity}`);
    }
  }

  get size(): number {
    return this.queue.length;
  }

  offer(item: T): boolean {
    if (this.queue.length >= this.options.capacity) {
      this.options.onDrop(item);
      return false;
    }
    this.queue.push(item);
    if (!this.running) {
      this.running = true;
      this.draining = this.drain();
    }
    return true;
  }

  /** Resolves when the queue is empty and the consumer is idle */
  async idle(): Promise<void> {
    while (this.running) {
      await this.draining;
    }
  }

  private async drain(): Promise<void> {
    try {
      let item = this.queue.shift();
      while (item !== undefined) {
        try {
          await this.options.consume(item);
        } catch (error) {
          this.options.onError(error, item);
        }
        item = this.queue.shift();
      }
    } finally {
      this.running = false;
    }
  }
}
