import { InvalidPatternError } from '../errors';
import { char, literal, or, range } from '../pattern/pattern';
import { parseRegex, parseRegexOrThrow, regex } from './parser';

describe('parseRegex()', () => {
  const cases: [string, string][] = [
    ['a(b|c)*', 'a(b|c)*'],
    ['[a-c]x+', '[a-c]x+'],
    ['a|b|c', 'a|b|c'],
    ['a{2,}', 'a{2,}'],
    ['(ab){3}', '(ab){3}'],
    ['a{2,4}?', '(a{2,4})?'],
    ['\\.', '\\.'],
    ['[\\-]', '\\-'],
  ];
  test.each(cases)('%s', (source, expected) => {
    expect(parseRegexOrThrow(source).toString()).toEqual(expected);
  });

  test('builds the same patterns as the combinators', () => {
    const keywordOrIdent = literal('if').or(range('a', 'z').many1());
    expect(regex('if|[a-z]+').equals(keywordOrIdent)).toBe(true);
    expect(regex('a|b').equals(or(char('a'), char('b')))).toBe(true);
  });

  const errors: [string, string][] = [
    ['', 'empty regex'],
    ['*a', 'unexpected "*" at 0'],
    ['(ab', 'missing ) for ( at 0'],
    ['ab)', 'unexpected ")" at 2'],
    ['a|', 'expected an expression at 2'],
    ['()', 'expected an expression at 1'],
    ['[abc', 'missing ] for [ at 0'],
    ['[]', 'empty character class at 0'],
    ['[z-a]', 'range out of order at 1'],
    ['[\\d-z]', 'range bounds must be single characters at 1'],
    ['ab\\', 'dangling escape at 2'],
    ['a{3,1}', 'repeat maximum 1 is less than minimum 3'],
    ['\\u{110000}', '\\u{110000} is not a code point at 0'],
  ];
  test.each(errors)('%p is an error', (source, message) => {
    const result = parseRegex(source);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(InvalidPatternError);
      expect(result.error.message).toEqual(`InvalidPattern: ${message}`);
    }
  });
});
