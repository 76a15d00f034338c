/**
 * Fixed-capacity FIFO. When full, pushing evicts the oldest element.
 */
export class RingBuffer<T> {
  private buf: Array<T | undefined>;
  private head = 0; // points to oldest element
  private size = 0;

  constructor(private capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid ring buffer capacity: ${capacity}`);
    }
    this.buf = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.size;
  }

  get maxSize(): number {
    return this.capacity;
  }

  /** Returns the evicted element (if the buffer was full). */
  push(item: T): { evicted?: T } {
    let evicted: T | undefined;
    if (this.size === this.capacity) {
      evicted = this.shift();
    }

    this.buf[(this.head + this.size) % this.capacity] = item;
    this.size++;
    return evicted !== undefined ? { evicted } : {};
  }

  /** Removes and returns the oldest element. */
  shift(): T | undefined {
    if (this.size === 0) return undefined;
    const item = this.buf[this.head];
    this.buf[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.size--;
    return item;
  }

  newest(): T | undefined {
    if (this.size === 0) return undefined;
    return this.buf[(this.head + this.size - 1) % this.capacity];
  }

  /** Oldest -> newest. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.size; i++) {
      const v = this.buf[(this.head + i) % this.capacity];
      if (v !== undefined) out.push(v);
    }
    return out;
  }

  clear(): void {
    this.buf = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.size = 0;
  }
}
