/**
 * Bounded FIFO ring buffer. Pushing never waits: when the buffer is full the
 * oldest item is overwritten and counted as dropped.
 */
export class BoundedQueue<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private length = 0;
  private droppedCount = 0;
  private listeners = new Set<() => void>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  /** Items dropped since creation */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Append an item. Returns true when an older item had to be dropped.
   */
  push(item: T): boolean {
    const dropped = this.insert(item);
    this.notify();
    return dropped;
  }

  /**
   * Append several items. Returns how many older items were dropped.
   */
  pushAll(items: readonly T[]): number {
    let dropped = 0;
    for (const item of items) {
      if (this.insert(item)) dropped++;
    }
    if (items.length > 0) this.notify();
    return dropped;
  }

  shift(): T | undefined {
    if (this.length === 0) return undefined;
    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.length--;
    return item;
  }

  take(max: number): T[] {
    const out: T[] = [];
    while (out.length < max && this.length > 0) {
      const item = this.shift();
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.length = 0;
  }

  /**
   * Called after every push. Returns a function that unsubscribes.
   */
  onAvailable(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private insert(item: T): boolean {
    let dropped = false;
    if (this.length === this.capacity) {
      this.head = (this.head + 1) % this.capacity;
      this.length--;
      this.droppedCount++;
      dropped = true;
    }
    this.buffer[(this.head + this.length) % this.capacity] = item;
    this.length++;
    return dropped;
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }
}
