import { InvalidPatternError } from '../errors';

/**
 * Largest unicode code point.
 */
export const MAX_CODE_POINT = 0x10ffff;

/**
 * The symbol offered to the automaton once, after the last code point
 * of the input. It lies outside the unicode range so no character can
 * ever match it.
 */
export const EOF_SYMBOL = MAX_CODE_POINT + 1;

/**
 * An inclusive range of symbols.
 */
export type SymbolRange = readonly [start: number, end: number];

function isSymbol(n: number) {
  return Number.isInteger(n) && n >= 0 && n <= EOF_SYMBOL;
}

/**
 * Sort and merge the given ranges so that they are disjoint and
 * non-adjacent.
 */
function normalize(ranges: Iterable<SymbolRange>): SymbolRange[] {
  const sorted = [...ranges].sort((a, b) => a[0] - b[0]);
  const out: [number, number][] = [];
  for (const [start, end] of sorted) {
    const last = out[out.length - 1];
    if (last && start <= last[1] + 1) {
      last[1] = Math.max(last[1], end);
    } else {
      out.push([start, end]);
    }
  }
  return out;
}

/**
 * An immutable set of symbols, stored as a sorted list of disjoint
 * ranges.
 */
export class SymbolSet {
  readonly ranges: readonly SymbolRange[];

  private constructor(ranges: readonly SymbolRange[]) {
    this.ranges = ranges;
  }

  static readonly EMPTY = new SymbolSet([]);

  /**
   * Every unicode code point. Does not include {@link EOF_SYMBOL}.
   */
  static readonly UNICODE = new SymbolSet([[0, MAX_CODE_POINT]]);

  static readonly EOF = new SymbolSet([[EOF_SYMBOL, EOF_SYMBOL]]);

  static fromRanges(ranges: Iterable<SymbolRange>): SymbolSet {
    const checked: SymbolRange[] = [];
    for (const [start, end] of ranges) {
      if (!isSymbol(start) || !isSymbol(end)) {
        throw new InvalidPatternError(
          `InvalidPattern: invalid symbol range ${start}..${end}`
        );
      }
      if (start <= end) {
        checked.push([start, end]);
      }
    }
    return new SymbolSet(normalize(checked));
  }

  static of(...symbols: number[]): SymbolSet {
    return SymbolSet.fromRanges(symbols.map((s) => [s, s]));
  }

  static range(start: number, end: number): SymbolSet {
    return SymbolSet.fromRanges([[start, end]]);
  }

  /**
   * The set of code points appearing in the given string.
   */
  static fromString(chars: string): SymbolSet {
    const symbols: number[] = [];
    for (const char of chars) {
      // for..of over a string yields whole code points
      symbols.push(char.codePointAt(0) ?? 0);
    }
    return SymbolSet.of(...symbols);
  }

  get isEmpty(): boolean {
    return this.ranges.length == 0;
  }

  /**
   * The number of symbols in the set.
   */
  get size(): number {
    let size = 0;
    for (const [start, end] of this.ranges) {
      size += end - start + 1;
    }
    return size;
  }

  has(symbol: number): boolean {
    let lo = 0;
    let hi = this.ranges.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const [start, end] = this.ranges[mid];
      if (symbol < start) {
        hi = mid - 1;
      } else if (symbol > end) {
        lo = mid + 1;
      } else {
        return true;
      }
    }
    return false;
  }

  union(other: SymbolSet): SymbolSet {
    return new SymbolSet(normalize([...this.ranges, ...other.ranges]));
  }

  /**
   * Every unicode code point that is not in this set. The EOF symbol is
   * never part of a complement.
   */
  complement(): SymbolSet {
    const out: SymbolRange[] = [];
    let next = 0;
    for (const [start, end] of this.ranges) {
      if (start > MAX_CODE_POINT) {
        break;
      }
      if (start > next) {
        out.push([next, start - 1]);
      }
      next = end + 1;
    }
    if (next <= MAX_CODE_POINT) {
      out.push([next, MAX_CODE_POINT]);
    }
    return new SymbolSet(out);
  }

  equals(other: SymbolSet): boolean {
    if (this.ranges.length != other.ranges.length) {
      return false;
    }
    return this.ranges.every(
      ([start, end], i) =>
        start == other.ranges[i][0] && end == other.ranges[i][1]
    );
  }

  toString(): string {
    if (this.equals(SymbolSet.UNICODE)) {
      return '.';
    }
    if (this.ranges.length == 1 && this.ranges[0][0] == this.ranges[0][1]) {
      return symbolLabel(this.ranges[0][0]);
    }
    const inner = this.ranges
      .map(([start, end]) =>
        start == end
          ? symbolLabel(start, true)
          : `${symbolLabel(start, true)}-${symbolLabel(end, true)}`
      )
      .join('');
    return `[${inner}]`;
  }
}

const REGEX_SPECIAL = new Set('\\|()[]{}*+?.^-'.split(''));

/**
 * A printable label for a single symbol, escaped the way the regex
 * syntax expects it.
 */
export function symbolLabel(symbol: number, inBrackets = false): string {
  if (symbol == EOF_SYMBOL) {
    return '<eof>';
  }
  switch (symbol) {
    case 0x0a:
      return '\\n';
    case 0x0d:
      return '\\r';
    case 0x09:
      return '\\t';
  }
  if (symbol < 0x20 || (symbol >= 0x7f && symbol <= 0xa0)) {
    return `\\u{${symbol.toString(16)}}`;
  }
  const char = String.fromCodePoint(symbol);
  if (REGEX_SPECIAL.has(char) && (!inBrackets || '\\]^-'.includes(char))) {
    return '\\' + char;
  }
  return char;
}
