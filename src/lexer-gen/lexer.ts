import { Result } from 'neverthrow';
import { RunError, UnknownContextError } from '../errors';
import { Context } from './context';
import { LexerRun, TokenIterator } from './engine';
import { Input } from './input';
import { LexToken } from './LexToken';

/**
 * A compiled lexer: a table of contexts and the name of the root one.
 * Lexers are immutable; each call to {@link run} starts an independent
 * run with its own context stack.
 */
export class Lexer<T> {
  readonly contexts: ReadonlyMap<string, Context<T>>;
  readonly root: Context<T>;

  constructor(contexts: ReadonlyMap<string, Context<T>>, root: string) {
    const rootContext = contexts.get(root);
    if (rootContext === undefined) {
      throw new UnknownContextError(root);
    }
    this.contexts = contexts;
    this.root = rootContext;
  }

  getContext(name: string): Context<T> | undefined {
    return this.contexts.get(name);
  }

  run(input: Input): LexerRun<T> {
    return new LexerRun(this.contexts, this.root, input);
  }

  /**
   * Lex the whole input.
   *
   * @returns every token, or the error that ended the run
   */
  tokenize(input: Input): Result<LexToken<T>[], RunError> {
    return this.run(input).runToEnd();
  }

  tokenizeOrThrow(input: Input): LexToken<T>[] {
    const result = this.tokenize(input);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }

  /**
   * Lazily lex the input. The iterator throws the error that ends the
   * run, if any.
   */
  tokens(input: Input): TokenIterator<T> {
    return new TokenIterator(this.run(input));
  }

  toDebugStr(): string {
    let out = '';
    for (const context of this.contexts.values()) {
      out += `context ${context.name}`;
      if (context.parent !== undefined) {
        out += ` (parent ${context.parent})`;
      }
      out += ':\n';
      for (const rule of context.rules) {
        out += `  ${rule.priority}: ${rule.pattern}\n`;
      }
      out += context.dfa.toDebugStr();
      out += '\n';
    }
    return out;
  }
}
