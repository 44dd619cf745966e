/**
 * Array-backed FIFO storage for the queues.
 *
 * Removal from the front advances a head offset instead of shifting the
 * array; the consumed prefix is dropped once it makes up half of the
 * backing array, so a long drain stays linear overall.
 *
 * @typeParam T - The item type
 */
export class FifoBuffer<T> implements Iterable<T> {
  private items: T[];
  private head = 0;

  constructor(items: T[] = []) {
    this.items = items;
  }

  get length(): number {
    return this.items.length - this.head;
  }

  /** Append `item` and return its position from the front */
  push(item: T): number {
    this.items.push(item);
    return this.length - 1;
  }

  /** Front item; the buffer must not be empty */
  peek(): T {
    return this.items[this.head];
  }

  /** Remove and return the front item; the buffer must not be empty */
  shift(): T {
    const item = this.items[this.head];
    this.head++;
    if (this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }

  includes(item: T): boolean {
    return this.items.includes(item, this.head);
  }

  clear(): void {
    this.items = [];
    this.head = 0;
  }

  toArray(): T[] {
    return this.items.slice(this.head);
  }

  *[Symbol.iterator](): Iterator<T> {
    const items = this.items;
    for (let i = this.head; i < items.length; i++) {
      yield items[i];
    }
  }
}
