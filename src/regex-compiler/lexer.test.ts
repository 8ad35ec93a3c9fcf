import { lexRegex, Token } from './lexer';

function lex(input: string): [Token, string][] {
  return lexRegex(input)
    ._unsafeUnwrap()
    .map((t) => [t.token, t.substr]);
}

describe('regex lexer', () => {
  test('operators and escapes', () => {
    expect(lex('\\d+{2,}a?|.')).toEqual([
      [Token.ESCAPE, '\\d'],
      [Token.PLUS, '+'],
      [Token.REPEAT, '{2,}'],
      [Token.CHAR, 'a'],
      [Token.QUESTION, '?'],
      [Token.OR, '|'],
      [Token.ANY_CHAR, '.'],
    ]);
  });

  test('a brace that is not a repeat is a character', () => {
    expect(lex('a{x}')).toEqual([
      [Token.CHAR, 'a'],
      [Token.CHAR, '{'],
      [Token.CHAR, 'x'],
      [Token.CHAR, '}'],
    ]);
  });

  test('only escapes and ] are special inside brackets', () => {
    expect(lex('[^.*-]')).toEqual([
      [Token.NEGATED_OPEN_BRACKET, '[^'],
      [Token.CHAR, '.'],
      [Token.CHAR, '*'],
      [Token.CHAR, '-'],
      [Token.CLOSE_BRACKET, ']'],
    ]);
    expect(lex('[\\]](')).toEqual([
      [Token.OPEN_BRACKET, '['],
      [Token.ESCAPE, '\\]'],
      [Token.CLOSE_BRACKET, ']'],
      [Token.OPEN_PAREN, '('],
    ]);
  });

  test('unicode escapes', () => {
    expect(lex('\\u{1F600}\\u')).toEqual([
      [Token.UNICODE_ESCAPE, '\\u{1F600}'],
      [Token.ESCAPE, '\\u'],
    ]);
  });

  test('spans', () => {
    const tokens = lexRegex('a[b]')._unsafeUnwrap();
    expect(tokens.map((t) => t.span)).toEqual([
      { from: 0, to: 1 },
      { from: 1, to: 2 },
      { from: 2, to: 3 },
      { from: 3, to: 4 },
    ]);
  });

  test('a trailing backslash is an error', () => {
    expect(lexRegex('ab\\')._unsafeUnwrapErr().message).toEqual(
      'Stuck: no rule in context "main" matches at 2 starting with "\\\\"'
    );
  });
});
