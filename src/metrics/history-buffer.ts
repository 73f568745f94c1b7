import type { Sample } from '../types/metrics';

/**
 * Fixed-capacity FIFO of samples backing a chart.
 *
 * Ring buffer: push is O(1), the oldest sample is overwritten once the buffer
 * is full, and iteration always runs oldest to newest.
 */
export class HistoryBuffer implements Iterable<Sample> {
  public readonly capacity: number;
  private slots: Array<Sample | undefined>;
  private head = 0;
  private size = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`History capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<Sample | undefined>(capacity);
  }

  get length(): number {
    return this.size;
  }

  push(value: number, timestamp: number): void {
    if (this.capacity === 0) return;

    this.slots[this.head] = Object.freeze({ timestamp, value });
    this.head = (this.head + 1) % this.capacity;
    if (this.size < this.capacity) this.size++;
  }

  latest(): Sample | undefined {
    if (this.size === 0) return undefined;
    return this.slots[(this.head - 1 + this.capacity) % this.capacity];
  }

  *iter(): IterableIterator<Sample> {
    const start = this.size < this.capacity ? 0 : this.head;
    for (let i = 0; i < this.size; i++) {
      const sample = this.slots[(start + i) % this.capacity];
      if (sample) yield sample;
    }
  }

  [Symbol.iterator](): Iterator<Sample> {
    return this.iter();
  }

  toArray(): Sample[] {
    return Array.from(this.iter());
  }
}
