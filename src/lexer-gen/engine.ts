import { err, ok, Result } from 'neverthrow';
import { logger } from '../debug';
import {
  ActionError,
  InvalidInputError,
  RunError,
  StackUnderflowError,
  StuckError,
  UnknownContextError,
} from '../errors';
import { Iter } from '../iter';
import { DFA } from '../nfa-to-dfa/dfa';
import { EOF_SYMBOL } from '../pattern/symbol-set';
import { Context, Lexeme, LexerControl, Rule } from './context';
import { ContextStack } from './context-stack';
import { EOS, Input, InputReader } from './input';
import { LexToken } from './LexToken';

export enum LexStatus {
  IDLE = 'idle',
  SCANNING = 'scanning',
  EMITTING = 'emitting',
  END_OF_INPUT = 'end-of-input',
  STUCK = 'stuck',
  FAILED = 'failed',
}

const TERMINAL: ReadonlySet<LexStatus> = new Set([
  LexStatus.END_OF_INPUT,
  LexStatus.STUCK,
  LexStatus.FAILED,
]);

type Match<T> = {
  end: number;
  rule: Rule<T>;
  // the match went through EOF_SYMBOL after the last code point
  atEof?: boolean;
};

/**
 * One pass of a lexer over one input. Each call to {@link step} scans
 * one lexeme with maximal munch: it follows the active context's DFA as
 * far as the input allows, then commits to the longest accepted prefix
 * and runs that rule's action.
 *
 * The compiled contexts are only read, so any number of runs can share
 * them. The stack and the scanning state belong to the run.
 */
export class LexerRun<T> {
  readonly stack: ContextStack<Context<T>>;
  private readonly reader: InputReader;
  private _status: LexStatus = LexStatus.IDLE;
  private _error: RunError | null = null;
  private output: LexToken<T>[] = [];
  // stack depth at which the end of input was last offered
  private eofDepth: number | null = null;

  constructor(
    contexts: ReadonlyMap<string, Context<T>>,
    root: Context<T>,
    input: Input
  ) {
    this.stack = new ContextStack(contexts, root);
    this.reader = new InputReader(input);
  }

  get status() {
    return this._status;
  }

  get error() {
    return this._error;
  }

  /**
   * Code point offset of the next lexeme.
   */
  get offset() {
    return this.reader.offset;
  }

  get done() {
    return TERMINAL.has(this._status);
  }

  /**
   * Remove and return the tokens emitted so far.
   */
  takeTokens(): LexToken<T>[] {
    const tokens = this.output;
    this.output = [];
    return tokens;
  }

  /**
   * Scan one lexeme.
   *
   * @returns the status afterwards: idle if a rule matched, otherwise
   *          one of the terminal statuses.
   */
  step(): LexStatus {
    if (this.done) {
      return this._status;
    }
    const context = this.stack.current();
    const start = this.reader.offset;
    try {
      return this.scan(context, start);
    } catch (e) {
      // an action's own errors have already ended the run in emit()
      if (e instanceof InvalidInputError && !this.done) {
        this.reader.rewind(start);
        return this.fail(LexStatus.FAILED, e);
      }
      throw e;
    }
  }

  private scan(context: Context<T>, start: number): LexStatus {
    const dfa = context.dfa;
    if (this.reader.peek() == EOS) {
      return this.endOfInput(context, start);
    }

    this._status = LexStatus.SCANNING;
    let state = dfa.getStartState();
    let best: Match<T> | null = null;
    for (
      let symbol = this.reader.peek();
      symbol != EOS;
      symbol = this.reader.peek()
    ) {
      const next = dfa.getNextState(state, symbol);
      if (next == DFA.NO_STATE) {
        break;
      }
      this.reader.advance();
      state = next;
      const rule = context.ruleAt(state);
      if (rule !== undefined) {
        best = { end: this.reader.offset, rule };
      }
    }
    if (this.reader.peek() == EOS) {
      // the end of input follows the last code point like any other symbol
      const next = dfa.getNextState(state, EOF_SYMBOL);
      const rule = next == DFA.NO_STATE ? undefined : context.ruleAt(next);
      if (rule !== undefined) {
        best = { end: this.reader.offset, rule, atEof: true };
      }
    }

    if (best === null) {
      // report everything scanned, up to and including the symbol that
      // had no transition
      this.reader.advance();
      const text = this.reader.text(start, this.reader.offset);
      this.reader.rewind(start);
      return this.fail(
        LexStatus.STUCK,
        new StuckError(start, context.name, text)
      );
    }
    this.reader.rewind(best.end);
    if (best.atEof) {
      this.eofDepth = this.stack.depth;
    }
    return this.emit(context, start, best);
  }

  /**
   * Step until the run ends.
   */
  runToEnd(): Result<LexToken<T>[], RunError> {
    while (!this.done) {
      this.step();
    }
    const tokens = this.takeTokens();
    if (this._error !== null) {
      return err(this._error);
    }
    return ok(tokens);
  }

  /**
   * With the input exhausted, give the active context a chance to match
   * the end of input. A context that pops itself there hands the same
   * chance to the context below it.
   */
  private endOfInput(context: Context<T>, start: number): LexStatus {
    if (this.eofDepth === null || this.stack.depth < this.eofDepth) {
      this.eofDepth = this.stack.depth;
      const dfa = context.dfa;
      const next = dfa.getNextState(dfa.getStartState(), EOF_SYMBOL);
      const rule = next == DFA.NO_STATE ? undefined : context.ruleAt(next);
      if (rule !== undefined) {
        return this.emit(context, start, { end: start, rule });
      }
    }
    this._status = LexStatus.END_OF_INPUT;
    return this._status;
  }

  private emit(context: Context<T>, start: number, match: Match<T>) {
    this._status = LexStatus.EMITTING;
    const { stack, reader, output } = this;
    let end = match.end;
    const lexeme: Lexeme = {
      substr: reader.text(start, end),
      span: { from: start, to: end },
      rule: match.rule.priority,
      context: context.name,
    };
    const control: LexerControl<T> = {
      get context() {
        return stack.current().name;
      },
      get depth() {
        return stack.depth;
      },
      emit(token: T) {
        const span = { from: start, to: end };
        output.push(new LexToken(token, span, reader.text(start, end)));
      },
      tryPush(name: string) {
        return stack.push(name).map((pushed) => {
          logger.log(`push ${pushed.name} at ${start}`);
        });
      },
      tryPop() {
        return stack.pop().map((popped) => {
          logger.log(`pop ${popped.name} at ${start}`);
          return popped.name;
        });
      },
      push(name: string) {
        const result = control.tryPush(name);
        if (result.isErr()) {
          throw result.error;
        }
      },
      pop() {
        const result = control.tryPop();
        if (result.isErr()) {
          throw result.error;
        }
      },
      less(keep: number) {
        if (!Number.isInteger(keep) || keep < 1 || keep > end - start) {
          throw new RangeError(
            `less(${keep}): must keep between 1 and ${end - start} symbols`
          );
        }
        end = start + keep;
        reader.rewind(end);
      },
    };

    const emitted = output.length;
    try {
      match.rule.action(lexeme, control);
    } catch (e) {
      if (
        e instanceof UnknownContextError ||
        e instanceof StackUnderflowError
      ) {
        return this.fail(LexStatus.FAILED, e);
      }
      // Step 1: undo the lexeme so the run does not resume after it
      output.splice(emitted);
      reader.rewind(start);
      // Step 2: end the run, then hand the error to the caller as is
      this.fail(LexStatus.FAILED, new ActionError(start, context.name, e));
      throw e;
    }
    reader.commit();
    this._status = LexStatus.IDLE;
    return this._status;
  }

  private fail(status: LexStatus, error: RunError): LexStatus {
    logger.log(error.message);
    this._status = status;
    this._error = error;
    return status;
  }
}

/**
 * Tokens of a run, pulled one lexeme at a time. Throws the run's error
 * once the tokens emitted before it have been consumed.
 */
export class TokenIterator<T> extends Iter<LexToken<T>> {
  readonly run: LexerRun<T>;
  private buffer: LexToken<T>[] = [];
  constructor(run: LexerRun<T>) {
    super();
    this.run = run;
  }

  next(): IteratorResult<LexToken<T>> {
    while (this.buffer.length == 0 && !this.run.done) {
      this.run.step();
      this.buffer.push(...this.run.takeTokens());
    }
    const token = this.buffer.shift();
    if (token !== undefined) {
      return { done: false, value: token };
    }
    if (this.run.error !== null) {
      throw this.run.error;
    }
    return { done: true, value: undefined };
  }
}
