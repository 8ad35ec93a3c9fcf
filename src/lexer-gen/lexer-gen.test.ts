import { StuckError } from '../errors';
import { chars, Pattern } from '../pattern/pattern';
import { regex } from '../regex-compiler/parser';
import { buildLexer } from './lexer-gen';
import { LexToken } from './LexToken';

function token<T>(
  token: T,
  substr: string,
  from: number,
  to: number
): LexToken<T> {
  return new LexToken(token, { from, to }, substr);
}

describe('buildLexer', () => {
  enum MT {
    NUM = 'NUM',
    ID = 'ID',
    LPAREN = '(',
    RPAREN = ')',
    PLUS = '+',
    MINUS = '-',
    WS = 'WS',
  }
  const patterns: [MT, string][] = [
    [MT.NUM, '\\d\\d*'],
    [MT.ID, '\\w\\w*'],
    [MT.LPAREN, '\\('],
    [MT.RPAREN, '\\)'],
    [MT.PLUS, '\\+'],
    [MT.MINUS, '-'],
    [MT.WS, '( |\t)+'],
  ];
  const lexer = buildLexer(
    patterns.map(([t, source]): [MT, Pattern] => [t, regex(source)]),
    [MT.WS]
  );

  test('should lex the right tokens', () => {
    const tokens = lexer.tokenizeOrThrow('34+5-(4 - something)');
    expect(tokens.map((t) => t.toString())).toEqual([
      '<NUM>34</NUM>',
      '<+>+</+>',
      '<NUM>5</NUM>',
      '<->-</->',
      '<(>(</(>',
      '<NUM>4</NUM>',
      '<->-</->',
      '<ID>something</ID>',
      '<)>)</)>',
    ]);
  });

  test('spans', () => {
    expect(lexer.tokenizeOrThrow('1 +x')).toEqual([
      token(MT.NUM, '1', 0, 1),
      token(MT.PLUS, '+', 2, 3),
      token(MT.ID, 'x', 3, 4),
    ]);
  });

  test('tokens() throws once it reaches text no pattern matches', () => {
    const digits = buildLexer([
      ['ADD', chars('+')],
      ['DIGITS', chars('0123456789').many1()],
    ]);
    const tokens = digits.tokens('123+fdahj');
    expect(tokens.next().value).toEqual(token('DIGITS', '123', 0, 3));
    expect(tokens.next().value).toEqual(token('ADD', '+', 3, 4));
    expect(() => tokens.next()).toThrow(StuckError);
  });
});
