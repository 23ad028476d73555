/**
 * Append-only ordered sequence; head is the most recently appended item
 */
export class Chain<T> implements Iterable<T> {
  private readonly items: T[] = [];

  get length(): number {
    return this.items.length;
  }

  append(item: T): void {
    this.items.push(item);
  }

  head(): T | undefined {
    return this.items[this.items.length - 1];
  }

  at(index: number): T | undefined {
    return this.items[index];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
