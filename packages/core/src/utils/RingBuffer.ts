/**
 * Fixed-capacity buffer of the most recent items. Pushing past
 * capacity drops the oldest item.
 */
export class RingBuffer<T> {
  private readonly items: (T | undefined)[];
  private start = 0;
  private _size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this._size;
  }

  push(item: T): void {
    const index = (this.start + this._size) % this.capacity;
    this.items[index] = item;
    if (this._size < this.capacity) {
      this._size++;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
  }

  /**
   * The newest `n` items, oldest first
   */
  tail(n: number): T[] {
    const count = Math.max(0, Math.min(n, this._size));
    const result: T[] = [];
    for (let i = this._size - count; i < this._size; i++) {
      const item = this.items[(this.start + i) % this.capacity];
      if (item !== undefined) {
        result.push(item);
      }
    }
    return result;
  }

  toArray(): T[] {
    return this.tail(this._size);
  }
}
