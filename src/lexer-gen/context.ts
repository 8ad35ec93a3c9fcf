import type { Result } from 'neverthrow';
import type { StackUnderflowError, UnknownContextError } from '../errors';
import type { ConstDFA } from '../nfa-to-dfa/dfa';
import type { Pattern } from '../pattern/pattern';
import type { Span } from './LexToken';

/**
 * What a rule's action is told about the text it matched.
 */
export type Lexeme = {
  readonly substr: string;
  readonly span: Span;
  /**
   * Priority of the matched rule within its context.
   */
  readonly rule: number;
  /**
   * Name of the context whose rule matched.
   */
  readonly context: string;
};

/**
 * The handle an action uses to talk back to the running lexer.
 */
export interface LexerControl<T> {
  /**
   * Name of the active context.
   */
  readonly context: string;
  readonly depth: number;
  /**
   * Emit a token spanning the current match.
   */
  emit(token: T): void;
  /**
   * Enter the named context. Throws {@link UnknownContextError}, which
   * ends the run unless the action catches it.
   */
  push(name: string): void;
  /**
   * Leave the active context. Throws {@link StackUnderflowError} at the
   * root, which ends the run unless the action catches it.
   */
  pop(): void;
  tryPush(name: string): Result<void, UnknownContextError>;
  tryPop(): Result<string, StackUnderflowError>;
  /**
   * Keep only the first `keep` symbols of the match and return the rest
   * to the input, to be scanned again. Tokens emitted afterwards span the
   * shortened match.
   */
  less(keep: number): void;
}

export type Action<T> = (lexeme: Lexeme, control: LexerControl<T>) => void;

export type Rule<T> = {
  /**
   * Declaration index within the context. Lower wins ties.
   */
  readonly priority: number;
  readonly pattern: Pattern;
  readonly action: Action<T>;
};

/**
 * A named, compiled rule set: one mode of the lexer.
 */
export class Context<T> {
  readonly name: string;
  readonly rules: readonly Rule<T>[];
  readonly dfa: ConstDFA;
  readonly parent: string | undefined;

  constructor(
    name: string,
    rules: readonly Rule<T>[],
    dfa: ConstDFA,
    parent?: string
  ) {
    this.name = name;
    this.rules = rules;
    this.dfa = dfa;
    this.parent = parent;
  }

  /**
   * The rule that accepts in the given dfa state, if any.
   */
  ruleAt(state: number): Rule<T> | undefined {
    const tag = this.dfa.acceptTag(state);
    return tag === null ? undefined : this.rules[tag];
  }
}
