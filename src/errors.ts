export enum ErrorKind {
  INVALID_PATTERN = 'InvalidPattern',
  EMPTY_RULE_SET = 'EmptyRuleSet',
  UNKNOWN_CONTEXT = 'UnknownContext',
  STACK_UNDERFLOW = 'StackUnderflow',
  STUCK = 'Stuck',
  INVALID_DEFINITION = 'InvalidDefinition',
  INVALID_INPUT = 'InvalidInput',
  ACTION_FAILED = 'ActionFailed',
}

export abstract class LexerError extends Error {
  abstract readonly kind: ErrorKind;
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidPatternError extends LexerError {
  readonly kind = ErrorKind.INVALID_PATTERN;
}

export class EmptyRuleSetError extends LexerError {
  readonly kind = ErrorKind.EMPTY_RULE_SET;
  readonly context: string | undefined;
  constructor(context?: string) {
    super(
      context === undefined
        ? 'EmptyRuleSet: cannot compile zero rules'
        : `EmptyRuleSet: context "${context}" has no rules`
    );
    this.context = context;
  }
}

export type CompileError = InvalidPatternError | EmptyRuleSetError;

export class UnknownContextError extends LexerError {
  readonly kind = ErrorKind.UNKNOWN_CONTEXT;
  readonly context: string;
  constructor(context: string) {
    super(`UnknownContext: no context named "${context}"`);
    this.context = context;
  }
}

export class StackUnderflowError extends LexerError {
  readonly kind = ErrorKind.STACK_UNDERFLOW;
  readonly context: string;
  constructor(context: string) {
    super(`StackUnderflow: cannot pop the root context "${context}"`);
    this.context = context;
  }
}

export type StackError = UnknownContextError | StackUnderflowError;

/**
 * No rule of the active context matches at `offset`.
 */
export class StuckError extends LexerError {
  readonly kind = ErrorKind.STUCK;
  readonly offset: number;
  readonly context: string;
  readonly text: string;
  constructor(offset: number, context: string, text: string) {
    super(
      `Stuck: no rule in context "${context}" matches at ${offset} starting with ${JSON.stringify(
        text
      )}`
    );
    this.offset = offset;
    this.context = context;
    this.text = text;
  }
}

/**
 * The input yielded something that is not a code point.
 */
export class InvalidInputError extends LexerError {
  readonly kind = ErrorKind.INVALID_INPUT;
  readonly offset: number;
  readonly value: number;
  constructor(offset: number, value: number) {
    super(`InvalidInput: ${value} at ${offset} is not a code point`);
    this.offset = offset;
    this.value = value;
  }
}

/**
 * An action threw something other than a lexer error. The run records
 * this and the original error is rethrown to the caller.
 */
export class ActionError extends LexerError {
  readonly kind = ErrorKind.ACTION_FAILED;
  readonly offset: number;
  readonly context: string;
  readonly thrown: unknown;
  constructor(offset: number, context: string, thrown: unknown) {
    super(
      `ActionFailed: action in context "${context}" threw at ${offset}: ${
        thrown instanceof Error ? thrown.message : String(thrown)
      }`
    );
    this.offset = offset;
    this.context = context;
    this.thrown = thrown;
  }
}

export type RunError =
  | StuckError
  | StackError
  | InvalidInputError
  | ActionError;

export class DefinitionError extends LexerError {
  readonly kind = ErrorKind.INVALID_DEFINITION;
  readonly path: string;
  constructor(path: string, message: string) {
    super(`InvalidDefinition at ${path || '<root>'}: ${message}`);
    this.path = path;
  }
}
