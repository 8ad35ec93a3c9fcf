import { err, ok, Result } from 'neverthrow';
import { StackUnderflowError, UnknownContextError } from '../errors';

/**
 * The stack of active lexer contexts for one run. The root context is at
 * the bottom and can never be popped, so the stack is never empty. Failed
 * operations leave the stack unchanged.
 */
export class ContextStack<C extends { readonly name: string }> {
  private readonly contexts: ReadonlyMap<string, C>;
  private readonly stack: C[];

  constructor(contexts: ReadonlyMap<string, C>, root: C) {
    this.contexts = contexts;
    this.stack = [root];
  }

  get depth() {
    return this.stack.length;
  }

  /**
   * The active context, i.e. the top of the stack.
   */
  current(): C {
    return this.stack[this.stack.length - 1];
  }

  push(name: string): Result<C, UnknownContextError> {
    const context = this.contexts.get(name);
    if (context === undefined) {
      return err(new UnknownContextError(name));
    }
    this.stack.push(context);
    return ok(context);
  }

  /**
   * Remove the active context.
   *
   * @returns the context that was removed
   */
  pop(): Result<C, StackUnderflowError> {
    const top = this.current();
    if (this.stack.length <= 1) {
      return err(new StackUnderflowError(top.name));
    }
    this.stack.pop();
    return ok(top);
  }

  /**
   * Context names from the bottom of the stack to the top.
   */
  names(): string[] {
    return this.stack.map((c) => c.name);
  }
}
