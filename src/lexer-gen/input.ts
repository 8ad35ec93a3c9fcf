import { InvalidInputError } from '../errors';
import { codePoints } from '../iter';
import { MAX_CODE_POINT } from '../pattern/symbol-set';

/**
 * Returned by {@link InputReader.peek} once the input is exhausted. It is
 * never a valid symbol.
 */
export const EOS = -1;

// String.fromCodePoint takes its symbols as arguments, which are limited
const CHUNK_SIZE = 4096;

export type Input = string | Iterable<number>;

/**
 * Pulls code points from the input one at a time. Symbols that have
 * been read but not yet committed stay buffered so the reader can be
 * rewound to any offset after the last commit; everything before it is
 * released.
 */
export class InputReader {
  private source: Iterator<number>;
  // buffer[0] is the symbol at offset `base`
  private buffer: number[] = [];
  private base: number = 0;
  private cursor: number = 0;
  private exhausted: boolean = false;

  constructor(input: Input) {
    this.source =
      typeof input == 'string'
        ? codePoints(input)
        : input[Symbol.iterator]();
  }

  /**
   * Offset of the next symbol, counted in code points from the start of
   * the input.
   */
  get offset() {
    return this.cursor;
  }

  /**
   * Offset of the last commit. The reader can not rewind past it.
   */
  get committed() {
    return this.base;
  }

  /**
   * The next symbol, without consuming it, or {@link EOS}. Throws
   * {@link InvalidInputError} when the input yields a value that is not
   * a code point.
   */
  peek(): number {
    const index = this.cursor - this.base;
    if (index < this.buffer.length) {
      return this.buffer[index];
    }
    if (this.exhausted) {
      return EOS;
    }
    const next = this.source.next();
    if (next.done) {
      this.exhausted = true;
      return EOS;
    }
    const symbol = next.value;
    if (!Number.isInteger(symbol) || symbol < 0 || symbol > MAX_CODE_POINT) {
      throw new InvalidInputError(this.base + this.buffer.length, symbol);
    }
    this.buffer.push(symbol);
    return symbol;
  }

  /**
   * Consume the next symbol. Does nothing at the end of the input.
   */
  advance() {
    if (this.peek() != EOS) {
      this.cursor++;
    }
  }

  rewind(offset: number) {
    if (offset < this.base || offset > this.base + this.buffer.length) {
      throw new RangeError(
        `Can not rewind to ${offset}, buffered input spans ${this.base}..${
          this.base + this.buffer.length
        }`
      );
    }
    this.cursor = offset;
  }

  /**
   * Release everything before the current offset.
   */
  commit() {
    this.buffer.splice(0, this.cursor - this.base);
    this.base = this.cursor;
  }

  /**
   * The buffered text between two offsets.
   */
  text(from: number, to: number): string {
    if (from < this.base || to > this.base + this.buffer.length) {
      throw new RangeError(
        `Text ${from}..${to} is outside the buffered input ${this.base}..${
          this.base + this.buffer.length
        }`
      );
    }
    let out = '';
    for (let i = from - this.base; i < to - this.base; i += CHUNK_SIZE) {
      out += String.fromCodePoint(
        ...this.buffer.slice(i, Math.min(i + CHUNK_SIZE, to - this.base))
      );
    }
    return out;
  }
}
