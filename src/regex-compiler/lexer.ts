/**
 * The lexer for regular expressions, built with the engine itself. The
 * inside of a bracket expression is lexed in its own context, where only
 * escapes and the closing bracket are special.
 */
import { Result } from 'neverthrow';
import { RunError } from '../errors';
import { emit, emitAndPop, emitAndPush } from '../lexer-gen/actions';
import { LexerDefinition } from '../lexer-gen/definition';
import type { Lexer } from '../lexer-gen/lexer';
import { LexToken } from '../lexer-gen/LexToken';
import {
  any,
  char,
  literal,
  notChars,
  opt,
  or,
  range,
  seq,
} from '../pattern/pattern';
import { memoize } from '../utils';

export enum Token {
  PLUS = 'PLUS',
  STAR = 'STAR',
  QUESTION = 'QUESTION',
  REPEAT = 'REPEAT',
  OR = 'OR',
  OPEN_PAREN = 'OPEN_PAREN',
  CLOSE_PAREN = 'CLOSE_PAREN',
  OPEN_BRACKET = 'OPEN_BRACKET',
  NEGATED_OPEN_BRACKET = 'NEGATED_OPEN_BRACKET',
  CLOSE_BRACKET = 'CLOSE_BRACKET',
  ESCAPE = 'ESCAPE',
  UNICODE_ESCAPE = 'UNICODE_ESCAPE',
  CHAR = 'CHAR',
  ANY_CHAR = 'ANY_CHAR',
}

export type Lexeme = LexToken<Token>;

const BRACKET = 'bracket';

const getLexer = memoize((): Lexer<Token> => {
  const definition = new LexerDefinition<Token>();
  const digits = range('0', '9').many1();
  const escape = seq(char('\\'), any());
  const hex = or(range('0', '9'), range('a', 'f'), range('A', 'F'));
  const unicodeEscape = seq(literal('\\u{'), hex.many1(), char('}'));

  definition
    .defineContext('main')
    .rule(unicodeEscape, emit(Token.UNICODE_ESCAPE))
    .rule(escape, emit(Token.ESCAPE))
    .rule(char('.'), emit(Token.ANY_CHAR))
    .rule(char('+'), emit(Token.PLUS))
    .rule(char('*'), emit(Token.STAR))
    .rule(char('?'), emit(Token.QUESTION))
    .rule(char('|'), emit(Token.OR))
    .rule(char('('), emit(Token.OPEN_PAREN))
    .rule(char(')'), emit(Token.CLOSE_PAREN))
    .rule(literal('[^'), emitAndPush(Token.NEGATED_OPEN_BRACKET, BRACKET))
    .rule(char('['), emitAndPush(Token.OPEN_BRACKET, BRACKET))
    .rule(
      seq(char('{'), digits, opt(seq(char(','), opt(digits))), char('}')),
      emit(Token.REPEAT)
    )
    .rule(notChars('\\'), emit(Token.CHAR));

  definition
    .defineContext(BRACKET)
    .rule(unicodeEscape, emit(Token.UNICODE_ESCAPE))
    .rule(escape, emit(Token.ESCAPE))
    .rule(char(']'), emitAndPop(Token.CLOSE_BRACKET))
    .rule(notChars(']\\'), emit(Token.CHAR));

  return definition.buildOrThrow({ root: 'main' });
});

export function lexRegex(input: string): Result<Lexeme[], RunError> {
  return getLexer().tokenize(input);
}
