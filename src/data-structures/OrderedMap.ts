import { iter, Iter } from '../iter';

/**
 * A map that remembers the order keys were first added in.
 */
export class OrderedMap<K, V> {
  private keyMap: Map<K, V>;
  private keyList: K[];

  constructor(pairs: Iterable<[K, V]> = []) {
    this.keyMap = new Map();
    this.keyList = [];
    for (const [key, value] of pairs) {
      this.push(key, value);
    }
  }

  has(key: K) {
    return this.keyMap.has(key);
  }

  get(key: K): V | undefined {
    return this.keyMap.get(key);
  }

  push(key: K, value: V) {
    if (this.keyMap.has(key)) {
      throw new Error(`key ${key} already in map`);
    }
    this.keyMap.set(key, value);
    this.keyList.push(key);
  }

  keys(): Iter<K> {
    return iter(this.keyList);
  }

  *values(): Generator<V> {
    for (const key of this.keyList) {
      const value = this.keyMap.get(key);
      if (value !== undefined) {
        yield value;
      }
    }
  }
}
