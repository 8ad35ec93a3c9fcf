export abstract class Iter<T> implements IterableIterator<T> {
  [Symbol.iterator]() {
    return this;
  }

  abstract next(): IteratorResult<T>;

  map<O>(mapper: (i: T) => O): Iter<O> {
    return new MapIter(this, mapper);
  }

  filter(predicate: (i: T) => boolean): Iter<T> {
    return new FilterIter(this, predicate);
  }

  first(): T | undefined {
    let next = this.next();
    return next.done ? undefined : next.value;
  }

  toArray(): T[] {
    return [...this];
  }
}

class PlainIter<T> extends Iter<T> {
  private iterator: Iterator<T>;
  constructor(iterable: Iterable<T>) {
    super();
    this.iterator = iterable[Symbol.iterator]();
  }
  next() {
    return this.iterator.next();
  }
}

export function iter<T>(iterable: Iterable<T> = []): Iter<T> {
  return new PlainIter(iterable);
}

class MapIter<I, O> extends Iter<O> {
  private iterator: Iterator<I>;
  private mapper: (i: I) => O;
  constructor(iterable: Iterable<I>, mapper: (i: I) => O) {
    super();
    this.iterator = iterable[Symbol.iterator]();
    this.mapper = mapper;
  }
  next(): IteratorResult<O> {
    const result = this.iterator.next();
    if (result.done) {
      return { done: true, value: undefined };
    }
    return { value: this.mapper(result.value), done: false };
  }
}

class FilterIter<T> extends Iter<T> {
  private iterator: Iterator<T>;
  private predicate: (i: T) => boolean;
  constructor(iterable: Iterable<T>, predicate: (i: T) => boolean) {
    super();
    this.iterator = iterable[Symbol.iterator]();
    this.predicate = predicate;
  }
  next(): IteratorResult<T> {
    for (
      let result = this.iterator.next();
      !result.done;
      result = this.iterator.next()
    ) {
      if (this.predicate(result.value)) {
        return result;
      }
    }
    return { done: true, value: undefined };
  }
}

/**
 * Iterates over the unicode code points of a string. Surrogate pairs
 * are combined, so each step yields one symbol.
 */
class CodePointIterator implements IterableIterator<number> {
  private input: string;
  private index: number = 0;
  constructor(input: string) {
    this.input = input;
  }
  next(): IteratorResult<number> {
    const codePoint = this.input.codePointAt(this.index);
    if (codePoint === undefined) {
      return { done: true, value: undefined };
    }
    this.index += codePoint > 0xffff ? 2 : 1;
    return { done: false, value: codePoint };
  }
  [Symbol.iterator]() {
    return this;
  }
}

export function codePoints(input: string) {
  return new CodePointIterator(input);
}
