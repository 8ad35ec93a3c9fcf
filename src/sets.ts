export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

/**
 * An immutable set of numbers which can be hashed to a string, so
 * it can be used as the key of a Map.
 */
export class NumberSet implements ConstSet<number> {
  private data: Set<number>;
  private _hash: string | undefined;
  constructor(items: Iterable<number> = []) {
    this.data = new Set(items);
  }
  get size(): number {
    return this.data.size;
  }

  [Symbol.iterator]() {
    return this.data[Symbol.iterator]();
  }

  has(a: number): boolean {
    return this.data.has(a);
  }

  sorted(): number[] {
    return Array.from(this.data.values()).sort((a, b) => a - b);
  }

  hash(): string {
    if (this._hash === undefined) {
      this._hash = `{${this.sorted().join(',')}}`;
    }
    return this._hash;
  }
}

/**
 * Assigns a stable index to each distinct NumberSet that is added,
 * in insertion order.
 */
export class NumberSetIndex {
  private indices: Map<string, number> = new Map();
  private sets: NumberSet[] = [];

  get size() {
    return this.sets.length;
  }

  /**
   * Returns the index of the given set, and whether it was newly added.
   */
  add(set: NumberSet): { index: number; added: boolean } {
    const existing = this.indices.get(set.hash());
    if (existing !== undefined) {
      return { index: existing, added: false };
    }
    const index = this.sets.length;
    this.sets.push(set);
    this.indices.set(set.hash(), index);
    return { index, added: true };
  }

  get(index: number): NumberSet {
    return this.sets[index];
  }

  [Symbol.iterator]() {
    return this.sets[Symbol.iterator]();
  }
}
