import {
  ActionError,
  DefinitionError,
  EmptyRuleSetError,
  InvalidInputError,
  StackUnderflowError,
  StuckError,
  UnknownContextError,
} from '../errors';
import { codePoints } from '../iter';
import {
  char,
  eof,
  literal,
  notChars,
  or,
  range,
} from '../pattern/pattern';
import {
  emit,
  emitAndPop,
  emitAndPush,
  pop,
  push,
  sequence,
  skip,
} from './actions';
import { LexerControl } from './context';
import { LexerDefinition } from './definition';
import { LexStatus } from './engine';
import { Lexer } from './lexer';
import { LexToken } from './LexToken';

enum T {
  KEYWORD = 'KEYWORD',
  IDENT = 'IDENT',
  NUM = 'NUM',
  QUOTE = 'QUOTE',
  STRING_CHUNK = 'STRING_CHUNK',
  UNTERMINATED = 'UNTERMINATED',
  END = 'END',
}

function token<T>(
  token: T,
  substr: string,
  from: number,
  to: number
): LexToken<T> {
  return new LexToken(token, { from, to }, substr);
}

const letters = or(range('a', 'z'), range('A', 'Z')).many1();
const spaces = char(' ').many1();

function keywordLexer(): Lexer<T> {
  const definition = new LexerDefinition<T>();
  definition
    .defineContext('main')
    .rule(literal('if'), emit(T.KEYWORD))
    .rule(letters, emit(T.IDENT));
  return definition.buildOrThrow();
}

function stringLexer(): Lexer<T> {
  const definition = new LexerDefinition<T>();
  definition
    .defineContext('main')
    .rule(char('"'), push('string'))
    .rule(letters, emit(T.IDENT))
    .rule(spaces, skip());
  definition
    .defineContext('string')
    .rule(notChars('"').many1(), emit(T.STRING_CHUNK))
    .rule(char('"'), pop());
  return definition.buildOrThrow({ root: 'main' });
}

describe('maximal munch', () => {
  test('the longest match wins over rule order', () => {
    expect(keywordLexer().tokenizeOrThrow('iffy')).toEqual([
      token(T.IDENT, 'iffy', 0, 4),
    ]);
  });

  test('the earlier rule wins between matches of equal length', () => {
    expect(keywordLexer().tokenizeOrThrow('if')).toEqual([
      token(T.KEYWORD, 'if', 0, 2),
    ]);
  });

  test('rules can switch contexts', () => {
    expect(stringLexer().tokenizeOrThrow('"ab"c')).toEqual([
      token(T.STRING_CHUNK, 'ab', 1, 3),
      token(T.IDENT, 'c', 4, 5),
    ]);
  });

  test('no rule matching at the start gets the run stuck', () => {
    const run = keywordLexer().run('9x');
    expect(run.runToEnd().isErr()).toBe(true);
    expect(run.status).toEqual(LexStatus.STUCK);
    expect(run.offset).toEqual(0);
    expect(run.error).toBeInstanceOf(StuckError);
    expect(run.error?.message).toEqual(
      'Stuck: no rule in context "main" matches at 0 starting with "9"'
    );
  });

  test('empty input ends immediately with no tokens', () => {
    const run = keywordLexer().run('');
    expect(run.runToEnd()._unsafeUnwrap()).toEqual([]);
    expect(run.status).toEqual(LexStatus.END_OF_INPUT);
  });

  test('the stuck error reports everything scanned', () => {
    const definition = new LexerDefinition<T>();
    definition.defineContext('main').rule(literal('abc'), emit(T.IDENT));
    const result = definition.buildOrThrow().tokenize('abd');
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(StuckError);
      expect(result.error).toMatchObject({
        offset: 0,
        context: 'main',
        text: 'abd',
      });
    }
  });

  test('stuck after some tokens', () => {
    const tokens = stringLexer().tokens('ab 9');
    expect(tokens.next()).toEqual({
      done: false,
      value: token(T.IDENT, 'ab', 0, 2),
    });
    expect(() => tokens.next()).toThrow(StuckError);
  });

  test('token iterators can be mapped and filtered', () => {
    const substrs = stringLexer()
      .tokens('ab "cd" ef')
      .filter((t) => t.token == T.IDENT)
      .map((t) => t.substr)
      .toArray();
    expect(substrs).toEqual(['ab', 'ef']);
  });

  test('zero length matches are not tokens', () => {
    const definition = new LexerDefinition<T>();
    definition
      .defineContext('main')
      .rule(range('0', '9').many(), emit(T.NUM));
    const result = definition.buildOrThrow().tokenize('12x');
    expect(result.isErr() && result.error).toMatchObject({ offset: 2 });
  });

  test('spans count code points', () => {
    const definition = new LexerDefinition<T>();
    definition
      .defineContext('main')
      .rule(notChars(' ').many1(), emit(T.IDENT))
      .rule(spaces, skip());
    expect(definition.buildOrThrow().tokenizeOrThrow('😀😀 a')).toEqual([
      token(T.IDENT, '😀😀', 0, 2),
      token(T.IDENT, 'a', 3, 4),
    ]);
  });

  test('accepts any iterable of code points', () => {
    expect(keywordLexer().tokenizeOrThrow(codePoints('if'))).toEqual([
      token(T.KEYWORD, 'if', 0, 2),
    ]);
  });

  test('symbols that are not code points fail the run', () => {
    const run = keywordLexer().run([97, 0x110000, 97]);
    expect(run.runToEnd()._unsafeUnwrapErr()).toBeInstanceOf(
      InvalidInputError
    );
    expect(run.status).toEqual(LexStatus.FAILED);
    expect(run.offset).toEqual(0);
    expect(run.error?.message).toEqual(
      'InvalidInput: 1114112 at 1 is not a code point'
    );
  });

  test('a lexer can be run any number of times', () => {
    const lexer = stringLexer();
    expect(lexer.tokenize('"x').isOk()).toBe(true);
    expect(lexer.tokenizeOrThrow('y')).toEqual([token(T.IDENT, 'y', 0, 1)]);
  });

  test('step() does nothing once the run is over', () => {
    const run = keywordLexer().run('if');
    expect(run.step()).toEqual(LexStatus.IDLE);
    expect(run.step()).toEqual(LexStatus.END_OF_INPUT);
    expect(run.step()).toEqual(LexStatus.END_OF_INPUT);
    expect(run.takeTokens()).toEqual([token(T.KEYWORD, 'if', 0, 2)]);
  });
});

describe('end of input rules', () => {
  function eofLexer(): Lexer<T> {
    const definition = new LexerDefinition<T>();
    definition
      .defineContext('main')
      .rule(char('"'), emitAndPush(T.QUOTE, 'string'))
      .rule(letters, emit(T.IDENT))
      .rule(eof(), emit(T.END));
    definition
      .defineContext('string')
      .rule(notChars('"').many1(), emit(T.STRING_CHUNK))
      .rule(char('"'), emitAndPop(T.QUOTE))
      .rule(eof(), sequence(emit(T.UNTERMINATED), pop()));
    return definition.buildOrThrow();
  }

  test('match once at the end of input', () => {
    expect(eofLexer().tokenizeOrThrow('ab')).toEqual([
      token(T.IDENT, 'ab', 0, 2),
      token(T.END, '', 2, 2),
    ]);
  });

  test('a pattern can end with the end of input', () => {
    const definition = new LexerDefinition<T>();
    definition
      .defineContext('main')
      .rule(letters.then(eof()), emit(T.END))
      .rule(letters, emit(T.IDENT))
      .rule(spaces, skip())
      .rule(eof(), emit(T.UNTERMINATED));
    const lexer = definition.buildOrThrow();
    expect(lexer.tokenizeOrThrow('ab cd')).toEqual([
      token(T.IDENT, 'ab', 0, 2),
      token(T.END, 'cd', 3, 5),
    ]);
    expect(lexer.tokenizeOrThrow('ab ')).toEqual([
      token(T.IDENT, 'ab', 0, 2),
      token(T.UNTERMINATED, '', 3, 3),
    ]);
  });

  test('a context that pops itself passes the end of input down', () => {
    expect(eofLexer().tokenizeOrThrow('"ab')).toEqual([
      token(T.QUOTE, '"', 0, 1),
      token(T.STRING_CHUNK, 'ab', 1, 3),
      token(T.UNTERMINATED, '', 3, 3),
      token(T.END, '', 3, 3),
    ]);
  });
});

describe('actions', () => {
  test('the lexeme describes the match', () => {
    const seen: unknown[] = [];
    const definition = new LexerDefinition<T>();
    definition
      .defineContext('main')
      .rule(spaces, skip())
      .rule(letters, (lexeme, control) => {
        const { context: active, depth } = control;
        seen.push({ ...lexeme, active, depth });
      });
    definition.buildOrThrow().tokenizeOrThrow(' ab');
    expect(seen).toEqual([
      {
        substr: 'ab',
        span: { from: 1, to: 3 },
        rule: 1,
        context: 'main',
        active: 'main',
        depth: 1,
      },
    ]);
  });

  test('less() gives back the end of the match', () => {
    const definition = new LexerDefinition<T>();
    definition
      .defineContext('main')
      .rule(literal('ab'), (_lexeme, control) => {
        control.less(1);
        control.emit(T.KEYWORD);
      })
      .rule(char('b'), emit(T.IDENT));
    expect(definition.buildOrThrow().tokenizeOrThrow('ab')).toEqual([
      token(T.KEYWORD, 'a', 0, 1),
      token(T.IDENT, 'b', 1, 2),
    ]);
  });

  test('less() must keep at least one symbol', () => {
    const definition = new LexerDefinition<T>();
    definition
      .defineContext('main')
      .rule(literal('ab'), (_lexeme, control) => control.less(0));
    expect(() => definition.buildOrThrow().tokenize('ab')).toThrow(
      'less(0): must keep between 1 and 2 symbols'
    );
  });

  test('pushing an unknown context fails the run', () => {
    const definition = new LexerDefinition<T>();
    definition.defineContext('main').rule(char('"'), push('nowhere'));
    const run = definition.buildOrThrow().run('"');
    const result = run.runToEnd();
    expect(run.status).toEqual(LexStatus.FAILED);
    expect(result.isErr() && result.error).toBeInstanceOf(UnknownContextError);
  });

  test('popping the root context fails the run', () => {
    const definition = new LexerDefinition<T>();
    definition.defineContext('main').rule(char('"'), emitAndPop(T.QUOTE));
    const run = definition.buildOrThrow().run('"');
    const result = run.runToEnd();
    expect(run.status).toEqual(LexStatus.FAILED);
    expect(result.isErr() && result.error).toBeInstanceOf(StackUnderflowError);
    expect(run.stack.names()).toEqual(['main']);
  });

  test('tryPush() and tryPop() report failures instead', () => {
    const definition = new LexerDefinition<T>();
    const tryBoth = (_lexeme: unknown, control: LexerControl<T>) => {
      if (control.tryPush('nowhere').isErr() && control.tryPop().isErr()) {
        control.emit(T.IDENT);
      }
    };
    definition.defineContext('main').rule(letters, tryBoth);
    expect(definition.buildOrThrow().tokenizeOrThrow('ab')).toEqual([
      token(T.IDENT, 'ab', 0, 2),
    ]);
  });

  test('other errors thrown by actions propagate', () => {
    const definition = new LexerDefinition<T>();
    definition.defineContext('main').rule(letters, () => {
      throw new Error('boom');
    });
    expect(() => definition.buildOrThrow().tokenize('ab')).toThrow('boom');
  });

  test('a run ends once an action has thrown', () => {
    const definition = new LexerDefinition<T>();
    definition
      .defineContext('main')
      .rule(spaces, skip())
      .rule(letters, (lexeme, control) => {
        control.emit(T.IDENT);
        if (lexeme.substr == 'bad') {
          throw new Error('boom');
        }
      });
    const run = definition.buildOrThrow().run('ok bad');
    expect(() => run.runToEnd()).toThrow('boom');
    expect(run.status).toEqual(LexStatus.FAILED);
    expect(run.done).toBe(true);
    expect(run.offset).toEqual(3);
    expect(run.error).toBeInstanceOf(ActionError);
    expect(run.error?.message).toEqual(
      'ActionFailed: action in context "main" threw at 3: boom'
    );
    expect(run.takeTokens()).toEqual([token(T.IDENT, 'ok', 0, 2)]);
    expect(run.step()).toEqual(LexStatus.FAILED);
    expect(run.takeTokens()).toEqual([]);
  });
});

describe('LexerDefinition', () => {
  test('a context inherits the rules of its parent, after its own', () => {
    const definition = new LexerDefinition<T>();
    definition
      .defineContext('common')
      .rule(range('0', '9').many1(), emit(T.NUM))
      .rule(letters, emit(T.IDENT))
      .rule(spaces, skip());
    definition
      .defineContext('main', { parent: 'common' })
      .rule(letters, emit(T.KEYWORD));
    const lexer = definition.buildOrThrow({ root: 'main' });
    expect(lexer.tokenizeOrThrow('ab 12')).toEqual([
      token(T.KEYWORD, 'ab', 0, 2),
      token(T.NUM, '12', 3, 5),
    ]);
    expect(lexer.getContext('main')?.rules.map((r) => r.priority)).toEqual([
      0, 1, 2, 3,
    ]);
  });

  test('the first context is the default root', () => {
    expect(keywordLexer().root.name).toEqual('main');
  });

  test('context names must be unique', () => {
    const definition = new LexerDefinition<T>();
    definition.defineContext('main');
    expect(() => definition.defineContext('main')).toThrow(DefinitionError);
  });

  test('build errors', () => {
    const empty = new LexerDefinition<T>();
    expect(empty.build()._unsafeUnwrapErr()).toBeInstanceOf(DefinitionError);

    const noRules = new LexerDefinition<T>();
    noRules.defineContext('main');
    expect(noRules.build()._unsafeUnwrapErr()).toBeInstanceOf(
      EmptyRuleSetError
    );

    const badRoot = new LexerDefinition<T>();
    badRoot.defineContext('main').rule(letters, skip());
    expect(badRoot.build({ root: 'other' })._unsafeUnwrapErr()).toEqual(
      new UnknownContextError('other')
    );

    const badParent = new LexerDefinition<T>();
    badParent.defineContext('main', { parent: 'nope' }).rule(letters, skip());
    expect(badParent.build()._unsafeUnwrapErr()).toEqual(
      new UnknownContextError('nope')
    );
  });

  test('parent chains can not loop', () => {
    const definition = new LexerDefinition<T>();
    definition.defineContext('a', { parent: 'b' }).rule(letters, skip());
    definition.defineContext('b', { parent: 'a' }).rule(letters, skip());
    expect(definition.build()._unsafeUnwrapErr().message).toEqual(
      'InvalidDefinition at contexts.a.parent: parent chain loops: a -> b -> a'
    );
  });
});
