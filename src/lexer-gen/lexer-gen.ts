import { Pattern } from '../pattern/pattern';
import { emit, skip } from './actions';
import { LexerDefinition } from './definition';
import { Lexer } from './lexer';

/**
 * Build a lexer with a single context from a list of token patterns.
 * Earlier patterns win ties. Matches of the tokens listed in `ignore`
 * are dropped instead of emitted.
 */
export function buildLexer<T>(
  patterns: Iterable<[T, Pattern]>,
  ignore: T[] = [],
  name = 'main'
): Lexer<T> {
  const definition = new LexerDefinition<T>();
  const context = definition.defineContext(name);
  for (const [token, pattern] of patterns) {
    const ignored = ignore.indexOf(token) >= 0;
    context.rule(pattern, ignored ? skip<T>() : emit(token));
  }
  return definition.buildOrThrow();
}
