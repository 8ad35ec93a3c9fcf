/**
 * Nondeterministic finite automata built from patterns with the
 * McNaughton-Yamada-Thompson construction. See Section 3.7.4 of the
 * dragon book (p. 159): "Construction of an NFA from a Regular
 * Expression".
 *
 * All states live in one arena and refer to each other by index.
 */
import { Table } from '../data-structures/table';
import { IHaveDebugStr } from '../debug';
import { NumberSet } from '../sets';
import { Pattern, PatternKind } from '../pattern/pattern';
import { SymbolSet } from '../pattern/symbol-set';

export type Link = { readonly symbols: SymbolSet; readonly target: number };

type NFAState = {
  epsilons: number[];
  links: Link[];
  accept: number | null;
};

export interface ConstNFA extends IHaveDebugStr {
  readonly numStates: number;
  getStartState(): number;
  getEpsilons(state: number): readonly number[];
  getLinks(state: number): readonly Link[];
  /**
   * The rule accepted at the given state, or null if it is not accepting.
   */
  acceptTag(state: number): number | null;
  /**
   * Every symbol set used by a link in this nfa.
   */
  symbolSets(): SymbolSet[];
}

export class NFA implements ConstNFA {
  private readonly states: NFAState[] = [];
  private startState: number = -1;

  get numStates() {
    return this.states.length;
  }

  getStartState() {
    return this.startState;
  }

  setStartState(state: number) {
    this.checkState(state);
    this.startState = state;
  }

  /**
   * Adds a new state with no transitions.
   *
   * @returns the index of the newly added state.
   */
  addState(): number {
    this.states.push({ epsilons: [], links: [], accept: null });
    return this.states.length - 1;
  }

  addEpsilon(fromState: number, toState: number) {
    this.checkState(fromState);
    this.checkState(toState);
    this.states[fromState].epsilons.push(toState);
  }

  addLink(fromState: number, toState: number, symbols: SymbolSet) {
    this.checkState(fromState);
    this.checkState(toState);
    this.states[fromState].links.push({ symbols, target: toState });
  }

  setAccept(state: number, rule: number | null) {
    this.checkState(state);
    this.states[state].accept = rule;
  }

  getEpsilons(state: number): readonly number[] {
    return this.states[state].epsilons;
  }

  getLinks(state: number): readonly Link[] {
    return this.states[state].links;
  }

  acceptTag(state: number): number | null {
    return this.states[state].accept;
  }

  symbolSets(): SymbolSet[] {
    return this.states.flatMap((s) => s.links.map((l) => l.symbols));
  }

  /**
   * Adds the states for the given pattern, starting from an existing state.
   *
   * @param start state the pattern's states hang off of
   * @returns the state reached after matching the whole pattern
   */
  addPattern(start: number, pattern: Pattern): number {
    switch (pattern.kind) {
      case PatternKind.SYMBOL: {
        const end = this.addState();
        this.addLink(start, end, pattern.props.symbols);
        return end;
      }
      case PatternKind.SEQ: {
        const middle = this.addPattern(start, pattern.props.left);
        return this.addPattern(middle, pattern.props.right);
      }
      case PatternKind.OR: {
        const end = this.addState();
        for (const branch of [pattern.props.left, pattern.props.right]) {
          const branchStart = this.addState();
          this.addEpsilon(start, branchStart);
          this.addEpsilon(this.addPattern(branchStart, branch), end);
        }
        return end;
      }
      case PatternKind.REPEAT: {
        const { child, min, max } = pattern.props;
        let current = start;
        for (let i = 0; i < min; i++) {
          current = this.addPattern(current, child);
        }
        if (max == Infinity) {
          // `current` may already have links of its own, which must not
          // become part of the loop
          const loop = this.addState();
          this.addEpsilon(current, loop);
          this.addEpsilon(this.addPattern(loop, child), loop);
          return loop;
        }
        const end = this.addState();
        this.addEpsilon(current, end);
        for (let i = min; i < max; i++) {
          current = this.addPattern(current, child);
          this.addEpsilon(current, end);
        }
        return end;
      }
    }
  }

  /**
   * Build a single nfa for a list of patterns. A new start state has
   * an epsilon edge to the start of each pattern, and the end state of
   * pattern i is tagged with accept tag i.
   */
  static fromPatterns(patterns: readonly Pattern[]): NFA {
    const nfa = new NFA();
    const start = nfa.addState();
    nfa.setStartState(start);
    for (const [i, pattern] of patterns.entries()) {
      const patternStart = nfa.addState();
      nfa.addEpsilon(start, patternStart);
      nfa.setAccept(nfa.addPattern(patternStart, pattern), i);
    }
    return nfa;
  }

  private checkState(state: number) {
    if (state < 0 || state >= this.states.length) {
      throw new Error(
        `IndexError: ${state} is not a valid state. Must be < ${this.states.length}`
      );
    }
  }

  toDebugStr(): string {
    const table = Table.init(1 + this.numStates, 3, () => '');
    table.setCell(0, 0, 'state');
    table.setCell(0, 1, 'ϵ');
    table.setCell(0, 2, 'links');
    for (let si = 0; si < this.numStates; si++) {
      table.setCell(si + 1, 0, this.stateLabel(si) + ':');
      table.setCell(si + 1, 1, this.getEpsilons(si).join(',') || '_');
      table.setCell(
        si + 1,
        2,
        this.getLinks(si)
          .map((l) => `${l.symbols}->${l.target}`)
          .join(' ') || '_'
      );
    }
    return table.toDebugStr();
  }

  private stateLabel(state: number) {
    let out = 's' + state;
    const accept = this.acceptTag(state);
    if (accept !== null) {
      out = `*${out}(${accept})`;
    }
    if (state == this.startState) {
      out = '>' + out;
    }
    return out;
  }
}

/**
 * The set of states reachable from the given states by following only
 * epsilon edges (including the states themselves).
 */
export function epsilonClosure(
  nfa: ConstNFA,
  startStates: Iterable<number>
): NumberSet {
  const visited: Set<number> = new Set();
  const toVisit = [...startStates];
  for (
    let current = toVisit.pop();
    current !== undefined;
    current = toVisit.pop()
  ) {
    if (visited.has(current)) {
      continue;
    }
    visited.add(current);
    for (const next of nfa.getEpsilons(current)) {
      if (!visited.has(next)) {
        toVisit.push(next);
      }
    }
  }
  return new NumberSet(visited);
}

/**
 * move(T,a)
 *
 * Set of NFA states to which there is a transition on input symbol a
 * from some state s in T.
 */
export function move(
  nfa: ConstNFA,
  states: Iterable<number>,
  symbol: number
): Set<number> {
  const set: Set<number> = new Set();
  for (const state of states) {
    for (const link of nfa.getLinks(state)) {
      if (link.symbols.has(symbol)) {
        set.add(link.target);
      }
    }
  }
  return set;
}
