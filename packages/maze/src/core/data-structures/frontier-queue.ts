/**
 * FIFO queue backing the breadth-first frontier.
 *
 * Array plus head index, so dequeue is O(1) amortized. The consumed prefix
 * is dropped once it passes `COMPACT_THRESHOLD` and outweighs the live part.
 *
 * @example
 * ```typescript
 * const frontier = FrontierQueue.of({ row: 0, col: 0 });
 * frontier.enqueue({ row: 0, col: 1 });
 * frontier.dequeue();  // { row: 0, col: 0 }
 * frontier.toArray();  // [{ row: 0, col: 1 }]
 * ```
 */
export class FrontierQueue<T> {
  private static readonly COMPACT_THRESHOLD = 1024;

  private items: T[] = [];
  private head = 0;

  static of<T>(...items: T[]): FrontierQueue<T> {
    const queue = new FrontierQueue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (
      this.head > FrontierQueue.COMPACT_THRESHOLD &&
      this.head > this.items.length / 2
    ) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  peek(): T | undefined {
    return this.isEmpty ? undefined : this.items[this.head];
  }

  /**
   * Queued items in dequeue order. The returned array is a copy.
   */
  toArray(): T[] {
    return this.items.slice(this.head);
  }
}
