import path from 'path';
import { buildParser, formatToken, lexerFromJSON } from './cli';
import { logger, useColors } from './debug';
import { DefinitionError, UnknownContextError } from './errors';
import { LexToken } from './lexer-gen/LexToken';

const SAMPLE = path.join(__dirname, '..', 'examples', 'strings.json');

describe('lexerFromJSON()', () => {
  test('a definition needs a context', () => {
    const result = lexerFromJSON('{"contexts": {}}');
    expect(result._unsafeUnwrapErr()).toEqual(
      new DefinitionError('contexts', 'no contexts defined')
    );
  });

  test('the root option overrides the definition', () => {
    const json = '{"root": "main", "contexts": {"main": {"rules": []}}}';
    expect(lexerFromJSON(json, { root: 'other' })._unsafeUnwrapErr()).toEqual(
      new UnknownContextError('other')
    );
  });
});

describe('formatToken()', () => {
  test('prints the token, its span and its text', () => {
    useColors(false);
    const token = new LexToken('IDENT', { from: 3, to: 5 }, 'ab');
    expect(formatToken(token)).toEqual('IDENT 3-5 "ab"');
  });
});

describe('munch', () => {
  let log: jest.SpyInstance;
  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => {});
  });
  afterEach(() => {
    log.mockRestore();
  });

  test('tokenize prints one line per token', () => {
    buildParser([
      'tokenize',
      SAMPLE,
      '--text',
      'x = 1',
      '--no-color',
    ]).parseSync();
    expect(log.mock.calls).toEqual([
      ['IDENT 0-1 "x"'],
      ['OP 2-3 "="'],
      ['NUMBER 4-5 "1"'],
      ['EOF 5-5 ""'],
    ]);
  });

  test('tables prints the rules of every context', () => {
    buildParser(['tables', SAMPLE, '--no-color']).parseSync();
    expect(log).toHaveBeenCalledTimes(1);
    const [[tables]] = log.mock.calls;
    expect(tables).toMatch(/^context main:\n {2}0: if\|else\|while\n/);
    expect(tables).toContain('context string (parent escapes):\n');
  });

  test('--debug logs to stderr through one listener', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});
    try {
      buildParser(['tables', SAMPLE, '--debug', '--no-color']).parseSync();
      buildParser(['tables', SAMPLE, '--debug', '--no-color']).parseSync();
      error.mockClear();
      logger.log('hello');
      expect(error.mock.calls).toEqual([['hello']]);
      buildParser(['tables', SAMPLE, '--no-color']).parseSync();
      error.mockClear();
      logger.log('hello');
      expect(error).not.toHaveBeenCalled();
    } finally {
      error.mockRestore();
    }
  });
});
