import { EOF_SYMBOL, SymbolRange, SymbolSet } from '../pattern/symbol-set';

/**
 * A partition of the symbol space into segments such that every symbol
 * set the alphabet was built from is a union of whole segments. This
 * keeps transition tables proportional to the number of distinct
 * boundaries in the patterns rather than the number of code points.
 */
export class Alphabet {
  /**
   * Sorted start symbol of each segment. The first division is always 0,
   * and segment i spans divisions[i] up to divisions[i+1] - 1 (the last
   * one up to EOF_SYMBOL).
   */
  readonly divisions: readonly number[];

  private constructor(divisions: readonly number[]) {
    this.divisions = divisions;
  }

  static fromSets(sets: Iterable<SymbolSet>): Alphabet {
    const divisions = new Set<number>([0]);
    for (const set of sets) {
      for (const [start, end] of set.ranges) {
        divisions.add(start);
        if (end < EOF_SYMBOL) {
          divisions.add(end + 1);
        }
      }
    }
    return new Alphabet([...divisions].sort((a, b) => a - b));
  }

  get size() {
    return this.divisions.length;
  }

  /**
   * Index of the segment containing the given symbol, or -1 if the symbol
   * is outside the symbol space.
   */
  segmentOf(symbol: number): number {
    if (symbol < 0 || symbol > EOF_SYMBOL) {
      return -1;
    }
    let lo = 0;
    let hi = this.divisions.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.divisions[mid] <= symbol) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo;
  }

  segmentRange(segment: number): SymbolRange {
    const start = this.divisions[segment];
    const next = this.divisions[segment + 1];
    return [start, next === undefined ? EOF_SYMBOL : next - 1];
  }

  /**
   * A human readable label for the segment.
   */
  segmentLabel(segment: number): string {
    return SymbolSet.fromRanges([this.segmentRange(segment)]).toString();
  }
}
