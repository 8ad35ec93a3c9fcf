import { err, ok, Result } from 'neverthrow';
import { logger } from '../debug';
import { CompileError, EmptyRuleSetError } from '../errors';
import { Pattern } from '../pattern/pattern';
import { AcceptResolver, DFA, lowestTagWins } from './dfa';
import { NFA } from './nfa';

export type CompileOptions = {
  /**
   * Merge equivalent states. Defaults to true.
   */
  minimize?: boolean;
  /**
   * Picks the winning rule when several accept in the same state.
   * Defaults to the earliest declared rule.
   */
  resolveAccept?: AcceptResolver;
  /**
   * Name used in error messages and logs, usually the context name.
   */
  name?: string;
};

/**
 * Anything with a pattern can be compiled. The position of a rule in the
 * list is its priority, and it is the accept tag of the states where the
 * rule matches.
 */
export type CompilableRule = { readonly pattern: Pattern };

/**
 * Compile an ordered list of rules into a single DFA whose accept tags are
 * indices into the list.
 */
export function compile(
  rules: readonly CompilableRule[],
  options: CompileOptions = {}
): Result<DFA, CompileError> {
  const { minimize = true, resolveAccept = lowestTagWins, name } = options;
  if (rules.length == 0) {
    return err(new EmptyRuleSetError(name));
  }
  for (const rule of rules) {
    const valid = rule.pattern.validate();
    if (valid.isErr()) {
      return err(valid.error);
    }
  }
  const nfa = NFA.fromPatterns(rules.map((r) => r.pattern));
  const dfa = DFA.fromNFA(nfa, resolveAccept);
  const result = minimize ? dfa.minimized() : dfa;
  if (logger.enabled) {
    logger.log(
      `compile${name === undefined ? '' : ` ${name}`}: ${rules.length} rules, ` +
        `${nfa.numStates} nfa states, ${dfa.numStates} dfa states` +
        (minimize ? `, ${result.numStates} after minimizing` : '')
    );
  }
  return ok(result);
}

export function compileOrThrow(
  rules: readonly CompilableRule[],
  options?: CompileOptions
): DFA {
  const result = compile(rules, options);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}
