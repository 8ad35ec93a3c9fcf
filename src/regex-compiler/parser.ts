import { err, ok, Result } from 'neverthrow';
import { InvalidPatternError, StuckError } from '../errors';
import {
  any,
  char,
  or,
  Pattern,
  seq,
  symbols,
} from '../pattern/pattern';
import { MAX_CODE_POINT, SymbolSet } from '../pattern/symbol-set';
import { Lexeme, lexRegex, Token } from './lexer';

const DIGIT = SymbolSet.range(0x30, 0x39);
const WORD = SymbolSet.fromRanges([
  [0x30, 0x39],
  [0x41, 0x5a],
  [0x5f, 0x5f],
  [0x61, 0x7a],
]);
const SPACE = SymbolSet.fromString(' \t\n\r\f\v');

const ESCAPES: ReadonlyMap<string, SymbolSet> = new Map([
  ['d', DIGIT],
  ['D', DIGIT.complement()],
  ['w', WORD],
  ['W', WORD.complement()],
  ['s', SPACE],
  ['S', SPACE.complement()],
  ['n', SymbolSet.of(0x0a)],
  ['r', SymbolSet.of(0x0d)],
  ['t', SymbolSet.of(0x09)],
  ['f', SymbolSet.of(0x0c)],
  ['v', SymbolSet.of(0x0b)],
  ['0', SymbolSet.of(0x00)],
]);

/**
 * The symbols matched by an escape sequence such as `\d` or `\*`. Escapes
 * without a special meaning stand for the escaped character itself.
 */
function escapeSet(escape: string): SymbolSet {
  const escaped = escape.slice(1);
  return ESCAPES.get(escaped) ?? SymbolSet.fromString(escaped);
}

function invalid(message: string): InvalidPatternError {
  return new InvalidPatternError(`InvalidPattern: ${message}`);
}

function unicodeEscapeSet(token: Lexeme): SymbolSet {
  const codePoint = parseInt(token.substr.slice(3, -1), 16);
  if (codePoint > MAX_CODE_POINT) {
    throw invalid(`${token.substr} is not a code point at ${token.span.from}`);
  }
  return SymbolSet.of(codePoint);
}

/**
 * Recursive descent parser from regex syntax to {@link Pattern}s:
 *
 *   alternation := sequence ('|' sequence)*
 *   sequence    := repeat+
 *   repeat      := atom ('*' | '+' | '?' | '{m}' | '{m,}' | '{m,n}')*
 *   atom        := char | escape | '.' | '(' alternation ')' | bracket
 */
export class RegexParser {
  private readonly tokens: readonly Lexeme[];
  private readonly length: number;
  private index = 0;

  private constructor(tokens: readonly Lexeme[], length: number) {
    this.tokens = tokens;
    this.length = length;
  }

  static parseResult(input: string): Result<Pattern, InvalidPatternError> {
    const lexed = lexRegex(input);
    if (lexed.isErr()) {
      const e = lexed.error;
      return err(
        e instanceof StuckError
          ? invalid(`dangling escape at ${e.offset}`)
          : invalid(e.message)
      );
    }
    const parser = new RegexParser(lexed.value, Array.from(input).length);
    try {
      return ok(parser.parse());
    } catch (e) {
      if (e instanceof InvalidPatternError) {
        return err(e);
      }
      throw e;
    }
  }

  static parseOrThrow(input: string): Pattern {
    const result = RegexParser.parseResult(input);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }

  private parse(): Pattern {
    if (this.tokens.length == 0) {
      throw invalid('empty regex');
    }
    const pattern = this.parseAlternation();
    const extra = this.peek();
    if (extra !== undefined) {
      throw invalid(
        `unexpected ${JSON.stringify(extra.substr)} at ${extra.span.from}`
      );
    }
    return pattern;
  }

  private peek(): Lexeme | undefined {
    return this.tokens[this.index];
  }

  private next(): Lexeme | undefined {
    const token = this.tokens[this.index];
    if (token !== undefined) {
      this.index++;
    }
    return token;
  }

  private position(): number {
    return this.peek()?.span.from ?? this.length;
  }

  private parseAlternation(): Pattern {
    const alternatives = [this.parseSequence()];
    while (this.peek()?.token == Token.OR) {
      this.index++;
      alternatives.push(this.parseSequence());
    }
    return or(...alternatives);
  }

  private parseSequence(): Pattern {
    const parts: Pattern[] = [];
    for (
      let token = this.peek();
      token !== undefined &&
      token.token != Token.OR &&
      token.token != Token.CLOSE_PAREN;
      token = this.peek()
    ) {
      parts.push(this.parseRepeat());
    }
    if (parts.length == 0) {
      throw invalid(`expected an expression at ${this.position()}`);
    }
    return seq(...parts);
  }

  private parseRepeat(): Pattern {
    let pattern = this.parseAtom();
    while (true) {
      const token = this.peek();
      if (token === undefined) {
        return pattern;
      }
      switch (token.token) {
        case Token.STAR:
          pattern = pattern.many();
          break;
        case Token.PLUS:
          pattern = pattern.many1();
          break;
        case Token.QUESTION:
          pattern = pattern.opt();
          break;
        case Token.REPEAT: {
          const [min, max] = token.substr.slice(1, -1).split(',');
          if (max === undefined) {
            pattern = pattern.times(Number(min));
          } else {
            pattern = pattern.times(
              Number(min),
              max == '' ? Infinity : Number(max)
            );
          }
          break;
        }
        default:
          return pattern;
      }
      this.index++;
    }
  }

  private parseAtom(): Pattern {
    const token = this.next();
    if (token === undefined) {
      throw invalid(`unexpected end of regex at ${this.length}`);
    }
    switch (token.token) {
      case Token.CHAR:
        return char(token.substr);
      case Token.ANY_CHAR:
        return any();
      case Token.ESCAPE:
        return symbols(escapeSet(token.substr));
      case Token.UNICODE_ESCAPE:
        return symbols(unicodeEscapeSet(token));
      case Token.OPEN_PAREN: {
        const inner = this.parseAlternation();
        if (this.next()?.token != Token.CLOSE_PAREN) {
          throw invalid(`missing ) for ( at ${token.span.from}`);
        }
        return inner;
      }
      case Token.OPEN_BRACKET:
      case Token.NEGATED_OPEN_BRACKET:
        return this.parseBracket(token);
      default:
        throw invalid(
          `unexpected ${JSON.stringify(token.substr)} at ${token.span.from}`
        );
    }
  }

  private parseBracket(open: Lexeme): Pattern {
    let set = SymbolSet.EMPTY;
    let items = 0;
    while (true) {
      const token = this.next();
      if (token === undefined) {
        throw invalid(`missing ] for [ at ${open.span.from}`);
      }
      if (token.token == Token.CLOSE_BRACKET) {
        break;
      }
      const low = this.bracketItem(token);
      const dash = this.peek();
      const high = this.tokens[this.index + 1];
      if (
        dash !== undefined &&
        dash.token == Token.CHAR &&
        dash.substr == '-' &&
        high !== undefined &&
        high.token != Token.CLOSE_BRACKET
      ) {
        // Step 1: a range between two single symbols
        this.index += 2;
        set = set.union(this.bracketRange(token, low, this.bracketItem(high)));
      } else {
        // Step 2: a lone symbol or class
        set = set.union(low);
      }
      items++;
    }
    if (items == 0) {
      throw invalid(`empty character class at ${open.span.from}`);
    }
    return symbols(
      open.token == Token.NEGATED_OPEN_BRACKET ? set.complement() : set
    );
  }

  private bracketItem(token: Lexeme): SymbolSet {
    switch (token.token) {
      case Token.CHAR:
        return SymbolSet.fromString(token.substr);
      case Token.ESCAPE:
        return escapeSet(token.substr);
      case Token.UNICODE_ESCAPE:
        return unicodeEscapeSet(token);
      default:
        throw invalid(
          `unexpected ${JSON.stringify(token.substr)} at ${token.span.from}`
        );
    }
  }

  private bracketRange(
    token: Lexeme,
    low: SymbolSet,
    high: SymbolSet
  ): SymbolSet {
    if (low.size != 1 || high.size != 1) {
      throw invalid(
        `range bounds must be single characters at ${token.span.from}`
      );
    }
    const [start] = low.ranges[0];
    const [end] = high.ranges[0];
    if (start > end) {
      throw invalid(`range out of order at ${token.span.from}`);
    }
    return SymbolSet.range(start, end);
  }
}

export const parseRegex = RegexParser.parseResult;
export const parseRegexOrThrow = RegexParser.parseOrThrow;

/**
 * Shorthand for writing rule patterns in regex syntax. Throws
 * {@link InvalidPatternError} for malformed input.
 */
export function regex(source: string): Pattern {
  return parseRegexOrThrow(source);
}
