/**
 * The pattern algebra: immutable trees describing sets of strings,
 * independent of any automaton representation.
 */
import { err, ok, Result } from 'neverthrow';
import { InvalidPatternError } from '../errors';
import { SymbolSet } from './symbol-set';

export enum PatternKind {
  SYMBOL = 'SYMBOL',
  SEQ = 'SEQ',
  OR = 'OR',
  REPEAT = 'REPEAT',
}

export type Pattern = SymbolPattern | SeqPattern | OrPattern | RepeatPattern;

abstract class BasePattern<Props extends object> {
  abstract readonly kind: PatternKind;
  readonly props: Readonly<Props>;
  constructor(props: Props) {
    this.props = Object.freeze(props);
  }

  /**
   * Returns the reason this node is malformed, if it is.
   */
  protected abstract check(): string | undefined;
  protected abstract children(): readonly Pattern[];
  abstract equals(other: Pattern): boolean;
  abstract toString(): string;

  /**
   * Check this pattern and all of its descendants.
   */
  validate(): Result<this, InvalidPatternError> {
    const problem = this.check();
    if (problem !== undefined) {
      return err(new InvalidPatternError(`InvalidPattern: ${problem}`));
    }
    for (const child of this.children()) {
      const result = child.validate();
      if (result.isErr()) {
        return err(result.error);
      }
    }
    return ok(this);
  }

  then(next: Pattern): SeqPattern {
    return new SeqPattern({ left: this.self(), right: next });
  }

  or(alternative: Pattern): OrPattern {
    return new OrPattern({ left: this.self(), right: alternative });
  }

  times(min: number, max: number = min): RepeatPattern {
    return new RepeatPattern({ child: this.self(), min, max });
  }

  many(): RepeatPattern {
    return this.times(0, Infinity);
  }

  many1(): RepeatPattern {
    return this.times(1, Infinity);
  }

  opt(): RepeatPattern {
    return this.times(0, 1);
  }

  /**
   * Narrow `this` to the Pattern union.
   */
  protected abstract self(): Pattern;
}

export class SymbolPattern extends BasePattern<{ symbols: SymbolSet }> {
  readonly kind = PatternKind.SYMBOL;
  constructor(props: { symbols: SymbolSet }) {
    super(props);
    throwIfInvalid(this.check());
  }
  protected check() {
    return this.props.symbols.isEmpty
      ? 'a symbol pattern needs at least one symbol'
      : undefined;
  }
  protected children() {
    return [];
  }
  protected self() {
    return this;
  }
  equals(other: Pattern): boolean {
    return (
      other.kind == PatternKind.SYMBOL &&
      other.props.symbols.equals(this.props.symbols)
    );
  }
  toString(): string {
    return this.props.symbols.toString();
  }
}

export class SeqPattern extends BasePattern<{ left: Pattern; right: Pattern }> {
  readonly kind = PatternKind.SEQ;
  protected check() {
    return undefined;
  }
  protected children() {
    return [this.props.left, this.props.right];
  }
  protected self() {
    return this;
  }
  equals(other: Pattern): boolean {
    return (
      other.kind == PatternKind.SEQ &&
      other.props.left.equals(this.props.left) &&
      other.props.right.equals(this.props.right)
    );
  }
  toString(): string {
    const wrap = (p: Pattern): string =>
      p.kind == PatternKind.OR ? `(${p.toString()})` : p.toString();
    return wrap(this.props.left) + wrap(this.props.right);
  }
}

export class OrPattern extends BasePattern<{ left: Pattern; right: Pattern }> {
  readonly kind = PatternKind.OR;
  protected check() {
    return undefined;
  }
  protected children() {
    return [this.props.left, this.props.right];
  }
  protected self() {
    return this;
  }
  equals(other: Pattern): boolean {
    return (
      other.kind == PatternKind.OR &&
      other.props.left.equals(this.props.left) &&
      other.props.right.equals(this.props.right)
    );
  }
  toString(): string {
    return `${this.props.left}|${this.props.right}`;
  }
}

export class RepeatPattern extends BasePattern<{
  child: Pattern;
  min: number;
  max: number;
}> {
  readonly kind = PatternKind.REPEAT;
  constructor(props: { child: Pattern; min: number; max: number }) {
    super(props);
    throwIfInvalid(this.check());
  }
  protected check() {
    const { min, max } = this.props;
    if (!Number.isInteger(min) || min < 0) {
      return `repeat minimum must be a non-negative integer, got ${min}`;
    }
    if (max !== Infinity && !Number.isInteger(max)) {
      return `repeat maximum must be an integer or Infinity, got ${max}`;
    }
    if (max < min) {
      return `repeat maximum ${max} is less than minimum ${min}`;
    }
    return undefined;
  }
  protected children() {
    return [this.props.child];
  }
  protected self() {
    return this;
  }
  equals(other: Pattern): boolean {
    return (
      other.kind == PatternKind.REPEAT &&
      other.props.min == this.props.min &&
      other.props.max == this.props.max &&
      other.props.child.equals(this.props.child)
    );
  }
  toString(): string {
    const { child, min, max } = this.props;
    const inner =
      child.kind == PatternKind.SYMBOL ? child.toString() : `(${child})`;
    if (min == 0 && max == Infinity) {
      return inner + '*';
    } else if (min == 1 && max == Infinity) {
      return inner + '+';
    } else if (min == 0 && max == 1) {
      return inner + '?';
    } else if (max == Infinity) {
      return `${inner}{${min},}`;
    } else if (min == max) {
      return `${inner}{${min}}`;
    }
    return `${inner}{${min},${max}}`;
  }
}

function throwIfInvalid(problem: string | undefined) {
  if (problem !== undefined) {
    throw new InvalidPatternError(`InvalidPattern: ${problem}`);
  }
}

function toCodePoint(char: string | number): number {
  if (typeof char == 'number') {
    return char;
  }
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined || String.fromCodePoint(codePoint) != char) {
    throw new InvalidPatternError(
      `InvalidPattern: expected a single character, got ${JSON.stringify(
        char
      )}`
    );
  }
  return codePoint;
}

export function symbols(set: SymbolSet): SymbolPattern {
  return new SymbolPattern({ symbols: set });
}

export function char(c: string | number): SymbolPattern {
  return symbols(SymbolSet.of(toCodePoint(c)));
}

/**
 * Any symbol between start and end, inclusive.
 */
export function range(start: string | number, end: string | number) {
  return symbols(SymbolSet.range(toCodePoint(start), toCodePoint(end)));
}

/**
 * Any one of the given characters.
 */
export function chars(validChars: string): SymbolPattern {
  return symbols(SymbolSet.fromString(validChars));
}

/**
 * Any code point except the given ones.
 */
export function notChars(invalidChars: string | SymbolSet): SymbolPattern {
  const set =
    typeof invalidChars == 'string'
      ? SymbolSet.fromString(invalidChars)
      : invalidChars;
  return symbols(set.complement());
}

export function any(): SymbolPattern {
  return symbols(SymbolSet.UNICODE);
}

/**
 * Matches the end of the input. See the engine for when it is offered.
 */
export function eof(): SymbolPattern {
  return symbols(SymbolSet.EOF);
}

export function seq(...parts: Pattern[]): Pattern {
  const [first, ...rest] = parts;
  if (first === undefined) {
    throw new InvalidPatternError('InvalidPattern: empty sequence');
  }
  return rest.reduce<Pattern>((left, right) => left.then(right), first);
}

export function or(...alternatives: Pattern[]): Pattern {
  const [first, ...rest] = alternatives;
  if (first === undefined) {
    throw new InvalidPatternError('InvalidPattern: empty alternation');
  }
  return rest.reduce<Pattern>((left, right) => left.or(right), first);
}

/**
 * The exact string given.
 */
export function literal(text: string): Pattern {
  if (text.length == 0) {
    throw new InvalidPatternError('InvalidPattern: empty literal');
  }
  return seq(...Array.from(text, (c) => char(c)));
}

export function repeat(
  pattern: Pattern,
  min: number,
  max: number = Infinity
): RepeatPattern {
  return pattern.times(min, max);
}

export function many(pattern: Pattern) {
  return pattern.many();
}

export function many1(pattern: Pattern) {
  return pattern.many1();
}

export function opt(pattern: Pattern) {
  return pattern.opt();
}
