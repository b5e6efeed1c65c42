/**
 * FIFO queue for breadth-first search
 */
export class Frontier<T> {
  private items: T[] = [];
  private head = 0;

  push(item: T): void {
    this.items.push(item);
  }

  pop(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const item = this.items[this.head];
    this.head++;

    // Drop consumed slots once they dominate the backing array
    if (this.head > 32 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  peek(): T | undefined {
    return this.items[this.head];
  }

  isEmpty(): boolean {
    return this.head >= this.items.length;
  }

  size(): number {
    return this.items.length - this.head;
  }
}
