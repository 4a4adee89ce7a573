// Bounded snapshot queue

/**
 * FIFO queue with a fixed capacity. Pushing onto a full queue drops the oldest
 * entry and counts the drop.
 */
export class SnapshotQueue<T> {
  readonly capacity: number;
  private items: T[] = [];
  private droppedCount = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * @returns The entry dropped to make room, if any
   */
  push(item: T): T | undefined {
    let dropped: T | undefined;
    if (this.items.length >= this.capacity) {
      dropped = this.items.shift();
      this.droppedCount++;
    }
    this.items.push(item);
    return dropped;
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }
}
