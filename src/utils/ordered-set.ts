/**
 * Insertion-ordered set. Re-adding an existing value keeps its original position.
 */
export class OrderedSet<T> implements Iterable<T> {
  private items: T[] = [];
  private positions = new Map<T, number>();

  constructor(initial?: Iterable<T>) {
    if (initial) {
      for (const value of initial) this.add(value);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** Returns the position of the value, adding it at the end if absent. */
  add(value: T): number {
    const existing = this.positions.get(value);
    if (existing !== undefined) return existing;
    this.positions.set(value, this.items.length);
    this.items.push(value);
    return this.items.length - 1;
  }

  has(value: T): boolean {
    return this.positions.has(value);
  }

  indexOf(value: T): number {
    return this.positions.get(value) ?? -1;
  }

  delete(value: T): boolean {
    const index = this.positions.get(value);
    if (index === undefined) return false;
    this.items.splice(index, 1);
    this.positions.delete(value);
    for (let i = index; i < this.items.length; i++) {
      this.positions.set(this.items[i], i);
    }
    return true;
  }

  union(...others: Iterable<T>[]): OrderedSet<T> {
    const result = new OrderedSet<T>(this);
    for (const other of others) {
      for (const value of other) result.add(value);
    }
    return result;
  }

  difference(...others: Iterable<T>[]): OrderedSet<T> {
    const excluded = new Set<T>();
    for (const other of others) {
      for (const value of other) excluded.add(value);
    }
    return new OrderedSet(this.items.filter(value => !excluded.has(value)));
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
