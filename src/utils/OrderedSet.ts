/**
 * Insertion-ordered set backed by a Map; the first occurrence wins.
 */
export class OrderedSet<T> {
  private readonly entries = new Map<T, true>();

  constructor(values?: Iterable<T>) {
    if (values) {
      for (const value of values) {
        this.add(value);
      }
    }
  }

  add(value: T): this {
    if (!this.entries.has(value)) {
      this.entries.set(value, true);
    }
    return this;
  }

  has(value: T): boolean {
    return this.entries.has(value);
  }

  get size(): number {
    return this.entries.size;
  }

  toArray(): T[] {
    return [...this.entries.keys()];
  }
}
