import { err, ok, Result } from 'neverthrow';
import { OrderedMap } from '../data-structures/OrderedMap';
import {
  CompileError,
  DefinitionError,
  UnknownContextError,
} from '../errors';
import { compile, CompileOptions } from '../nfa-to-dfa/compile';
import type { Pattern } from '../pattern/pattern';
import { Action, Context, Rule } from './context';
import { Lexer } from './lexer';

export type BuildError = CompileError | UnknownContextError | DefinitionError;

export type BuildOptions = Omit<CompileOptions, 'name'> & {
  /**
   * The context at the bottom of the stack. Defaults to the first context
   * defined.
   */
  root?: string;
};

export class ContextDefinition<T> {
  readonly name: string;
  readonly parent: string | undefined;
  private readonly ownRules: { pattern: Pattern; action: Action<T> }[] = [];

  constructor(name: string, parent?: string) {
    this.name = name;
    this.parent = parent;
  }

  /**
   * Add a rule. Rules declared earlier win over later ones when both
   * match the same length of input.
   */
  rule(pattern: Pattern, action: Action<T>): this {
    this.ownRules.push({ pattern, action });
    return this;
  }

  get rules(): readonly { pattern: Pattern; action: Action<T> }[] {
    return this.ownRules;
  }
}

/**
 * The setup time surface for describing a lexer: a set of named contexts,
 * each with an ordered list of rules. A context with a parent also gets
 * the parent's rules, after its own.
 */
export class LexerDefinition<T> {
  private readonly contexts: OrderedMap<string, ContextDefinition<T>> =
    new OrderedMap();

  defineContext(
    name: string,
    options: { parent?: string } = {}
  ): ContextDefinition<T> {
    if (this.contexts.has(name)) {
      throw new DefinitionError(
        `contexts.${name}`,
        `context "${name}" is already defined`
      );
    }
    const context = new ContextDefinition<T>(name, options.parent);
    this.contexts.push(name, context);
    return context;
  }

  getContext(name: string): ContextDefinition<T> | undefined {
    return this.contexts.get(name);
  }

  get contextNames(): string[] {
    return this.contexts.keys().toArray();
  }

  /**
   * A context's own rules followed by those of its ancestors.
   */
  effectiveRules(name: string): Result<Rule<T>[], BuildError> {
    const rules: Rule<T>[] = [];
    const seen: string[] = [];
    for (
      let current: string | undefined = name;
      current !== undefined;
      current = this.contexts.get(current)?.parent
    ) {
      const definition = this.contexts.get(current);
      if (definition === undefined) {
        return err(new UnknownContextError(current));
      }
      if (seen.indexOf(current) >= 0) {
        return err(
          new DefinitionError(
            `contexts.${name}.parent`,
            `parent chain loops: ${[...seen, current].join(' -> ')}`
          )
        );
      }
      seen.push(current);
      for (const { pattern, action } of definition.rules) {
        rules.push({ priority: rules.length, pattern, action });
      }
    }
    return ok(rules);
  }

  /**
   * Compile every context. Contexts compile independently; the first
   * failure is returned.
   */
  build(options: BuildOptions = {}): Result<Lexer<T>, BuildError> {
    const { root = this.contexts.keys().first(), ...compileOptions } = options;
    if (root === undefined) {
      return err(new DefinitionError('contexts', 'no contexts defined'));
    }
    if (!this.contexts.has(root)) {
      return err(new UnknownContextError(root));
    }
    const compiled: Map<string, Context<T>> = new Map();
    for (const definition of this.contexts.values()) {
      const rules = this.effectiveRules(definition.name);
      if (rules.isErr()) {
        return err(rules.error);
      }
      const dfa = compile(rules.value, {
        ...compileOptions,
        name: definition.name,
      });
      if (dfa.isErr()) {
        return err(dfa.error);
      }
      compiled.set(
        definition.name,
        new Context(definition.name, rules.value, dfa.value, definition.parent)
      );
    }
    return ok(new Lexer(compiled, root));
  }

  buildOrThrow(options?: BuildOptions): Lexer<T> {
    const result = this.build(options);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }
}
