/**
 * Bounded FIFO of pending telemetry entries. When full, the oldest entries
 * are dropped so a dead endpoint never grows memory without limit.
 */
export class BatchQueue<T> {
  private items: T[] = [];

  constructor(private readonly maxSize: number) {}

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
    const overflow = this.items.length - this.maxSize;
    if (overflow > 0) {
      this.items.splice(0, overflow);
    }
  }

  take(count: number): T[] {
    return this.items.splice(0, count);
  }
}

/**
 * A queue bound to the ingest path and body shape it ships with
 */
export interface Stream<T> {
  path: string;
  queue: BatchQueue<T>;
  wrap(batch: T[]): Record<string, unknown>;
}
