/**
 * Fixed-capacity ring buffer. Once full, each push overwrites the oldest entry.
 */
export class RollingHistory<T> {
  private readonly buffer: (T | undefined)[];
  private head = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`RollingHistory capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(value: T) {
    this.buffer[(this.head + this.size) % this.capacity] = value;
    if (this.size < this.capacity) {
      this.size += 1;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  get length(): number {
    return this.size;
  }

  /** Oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.size; i++) {
      const value = this.buffer[(this.head + i) % this.capacity];
      if (value !== undefined) out.push(value);
    }
    return out;
  }
}
