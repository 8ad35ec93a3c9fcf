import { Table } from '../data-structures/table';
import { IHaveDebugStr } from '../debug';
import { NumberSet, NumberSetIndex } from '../sets';
import { Alphabet } from './alphabet';
import { ConstNFA, epsilonClosure, move } from './nfa';

/**
 * Chooses which of several rules accepting in the same DFA state wins.
 * Receives the accept tags of every accepting NFA state in the subset,
 * sorted ascending, and returns one of them.
 */
export type AcceptResolver = (candidates: readonly number[]) => number;

/**
 * The earliest declared rule wins.
 */
export const lowestTagWins: AcceptResolver = (candidates) => candidates[0];

export interface ConstDFA extends IHaveDebugStr {
  readonly alphabet: Alphabet;
  readonly numStates: number;
  getStartState(): number;
  /**
   * The state reached from the given state on the given symbol, or
   * {@link DFA.NO_STATE} when there is no transition.
   */
  getNextState(fromState: number, symbol: number): number;
  /**
   * The rule accepted at the given state, or null if it is not accepting.
   */
  acceptTag(state: number): number | null;
}

export type DFAMatch = { length: number; accept: number };

export class DFA implements ConstDFA {
  static readonly NO_STATE = -1;

  readonly alphabet: Alphabet;
  // each row is a state, each column a segment of the alphabet
  private readonly transitions: Table<number>;
  private readonly accepting: (number | null)[] = [];
  private startState: number = DFA.NO_STATE;

  constructor(alphabet: Alphabet) {
    this.alphabet = alphabet;
    this.transitions = new Table(alphabet.size);
  }

  get numStates() {
    return this.transitions.numRows;
  }

  getStartState() {
    return this.startState;
  }

  setStartState(state: number) {
    if (state < 0 || state >= this.numStates) {
      throw new Error(`IndexError: ${state} is not a valid startState`);
    }
    this.startState = state;
  }

  addState(accept: number | null = null): number {
    this.accepting.push(accept);
    return this.transitions.addRow(() => DFA.NO_STATE);
  }

  acceptTag(state: number): number | null {
    return this.accepting[state];
  }

  /**
   * Add the edge for one segment of the alphabet. A state can have at
   * most one edge per segment.
   */
  addEdge(fromState: number, toState: number, segment: number) {
    const existing = this.transitions.getCell(fromState, segment);
    if (existing != DFA.NO_STATE && existing != toState) {
      throw new Error(
        `There is already an edge from ${fromState} to ${existing} via ${this.alphabet.segmentLabel(
          segment
        )}`
      );
    }
    this.transitions.setCell(fromState, segment, toState);
  }

  getNextStateForSegment(fromState: number, segment: number): number {
    return this.transitions.getCell(fromState, segment);
  }

  getNextState(fromState: number, symbol: number): number {
    const segment = this.alphabet.segmentOf(symbol);
    if (segment < 0) {
      return DFA.NO_STATE;
    }
    return this.transitions.getCell(fromState, segment);
  }

  static fromNFA(
    nfa: ConstNFA,
    resolveAccept: AcceptResolver = lowestTagWins
  ): DFAFromNFA {
    return toDFA(nfa, resolveAccept);
  }

  minimized(): DFA {
    return minimizeDFA(this);
  }

  /**
   * Find the longest prefix of the input that reaches an accepting
   * state. Empty matches are not reported.
   */
  match(input: Iterable<number>): DFAMatch | null {
    let state = this.startState;
    let length = 0;
    let best: DFAMatch | null = null;
    for (const symbol of input) {
      state = this.getNextState(state, symbol);
      if (state == DFA.NO_STATE) {
        break;
      }
      length++;
      const accept = this.acceptTag(state);
      if (accept !== null) {
        best = { length, accept };
      }
    }
    return best;
  }

  toDebugStr(): string {
    const numCols = 1 + this.alphabet.size;
    const table = Table.init(1 + this.numStates, numCols, () => '');
    table.setCell(0, 0, 'δ');
    for (let ai = 0; ai < this.alphabet.size; ai++) {
      table.setCell(0, ai + 1, this.alphabet.segmentLabel(ai));
    }
    for (let si = 0; si < this.numStates; si++) {
      table.setCell(si + 1, 0, this.stateLabel(si) + ':');
      for (let ai = 0; ai < this.alphabet.size; ai++) {
        const next = this.getNextStateForSegment(si, ai);
        table.setCell(
          si + 1,
          ai + 1,
          next == DFA.NO_STATE ? '_' : this.stateLabel(next)
        );
      }
    }
    return table.toDebugStr();
  }

  protected stateLabel(state: number) {
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
 * A DFA that remembers which NFA states each of its states stands for.
 */
export class DFAFromNFA extends DFA {
  readonly nfaStateMap: readonly NumberSet[];
  constructor(alphabet: Alphabet, nfaStateMap: readonly NumberSet[]) {
    super(alphabet);
    this.nfaStateMap = nfaStateMap;
  }

  getStatesForSourceNFAState(sourceNFAState: number): number[] {
    const states: number[] = [];
    for (const [si, sourceNFAStates] of this.nfaStateMap.entries()) {
      if (sourceNFAStates.has(sourceNFAState)) {
        states.push(si);
      }
    }
    return states;
  }

  override toDebugStr() {
    let out = 'DFAfromNFA:\n' + super.toDebugStr();
    out += '\n';
    out += 'Mapping from DFA state to source NFA states:\n';
    for (const [si, nfaStates] of this.nfaStateMap.entries()) {
      out += `s${si}: ${nfaStates.hash()}\n`;
    }
    return out;
  }
}

/**
 * Convert an NFA to a DFA by resolving ambiguity in the paths
 * through the NFA with the subset construction.
 * See page 47 of Engineering a Compiler (Cooper & Torczon).
 */
function toDFA(nfa: ConstNFA, resolveAccept: AcceptResolver): DFAFromNFA {
  // Step 1: split the symbol space into segments that no link in the
  // nfa distinguishes between, so one representative symbol per segment
  // is enough to compute transitions.
  const alphabet = Alphabet.fromSets(nfa.symbolSets());

  // Step 2: the subset construction. Each distinct configuration (set of
  // nfa states) becomes one dfa state, numbered in discovery order, so the
  // start configuration is state 0.
  const configs = new NumberSetIndex();
  const edges: [from: number, to: number, segment: number][] = [];
  const toVisit: number[] = [];
  const start = configs.add(epsilonClosure(nfa, [nfa.getStartState()]));
  toVisit.push(start.index);

  for (let next = toVisit.pop(); next !== undefined; next = toVisit.pop()) {
    const config = configs.get(next);
    for (let segment = 0; segment < alphabet.size; segment++) {
      const [representative] = alphabet.segmentRange(segment);
      const targets = move(nfa, config, representative);
      if (targets.size == 0) {
        continue;
      }
      const { index, added } = configs.add(epsilonClosure(nfa, targets));
      if (added) {
        toVisit.push(index);
      }
      edges.push([next, index, segment]);
    }
  }

  // Step 3: build the dfa. A state accepts if any nfa state in its
  // configuration accepts; the resolver picks the rule when several do.
  const dfa = new DFAFromNFA(alphabet, [...configs]);
  for (const config of configs) {
    const candidates: number[] = [];
    for (const nfaState of config) {
      const accept = nfa.acceptTag(nfaState);
      if (accept !== null && candidates.indexOf(accept) == -1) {
        candidates.push(accept);
      }
    }
    candidates.sort((a, b) => a - b);
    dfa.addState(candidates.length > 0 ? resolveAccept(candidates) : null);
  }
  dfa.setStartState(start.index);
  for (const [from, to, segment] of edges) {
    dfa.addEdge(from, to, segment);
  }
  return dfa;
}

/**
 * Merge states that can not be told apart: states with the same accept
 * tag whose transitions lead to equivalent states. Partitions are
 * refined until they stop changing.
 */
function minimizeDFA(dfa: DFA): DFA {
  const alphabet = dfa.alphabet;

  // Step 1: initial partition by accept tag
  let partitionOf: number[] = [];
  {
    const byTag: Map<number | null, number> = new Map();
    for (let si = 0; si < dfa.numStates; si++) {
      const tag = dfa.acceptTag(si);
      let partition = byTag.get(tag);
      if (partition === undefined) {
        partition = byTag.size;
        byTag.set(tag, partition);
      }
      partitionOf.push(partition);
    }
  }

  // Step 2: split partitions whose members disagree about which
  // partition a segment leads to, until a fixed point.
  let numPartitions = new Set(partitionOf).size;
  while (true) {
    const bySignature: Map<string, number> = new Map();
    const next: number[] = [];
    for (let si = 0; si < dfa.numStates; si++) {
      let signature = `${partitionOf[si]}`;
      for (let ai = 0; ai < alphabet.size; ai++) {
        const target = dfa.getNextStateForSegment(si, ai);
        signature +=
          ',' + (target == DFA.NO_STATE ? '_' : `${partitionOf[target]}`);
      }
      let partition = bySignature.get(signature);
      if (partition === undefined) {
        partition = bySignature.size;
        bySignature.set(signature, partition);
      }
      next.push(partition);
    }
    partitionOf = next;
    if (bySignature.size == numPartitions) {
      break;
    }
    numPartitions = bySignature.size;
  }

  // Step 3: one state per partition, numbered in breadth first order from
  // the start state so equivalent DFAs come out with the same numbering.
  const minDFA = new DFA(alphabet);
  const stateOfPartition: Map<number, number> = new Map();
  const representatives: number[] = [];
  const visit = (si: number) => {
    const partition = partitionOf[si];
    let state = stateOfPartition.get(partition);
    if (state === undefined) {
      state = minDFA.addState(dfa.acceptTag(si));
      stateOfPartition.set(partition, state);
      representatives.push(si);
    }
    return state;
  };
  minDFA.setStartState(visit(dfa.getStartState()));
  for (let state = 0; state < representatives.length; state++) {
    const si = representatives[state];
    for (let ai = 0; ai < alphabet.size; ai++) {
      const target = dfa.getNextStateForSegment(si, ai);
      if (target != DFA.NO_STATE) {
        minDFA.addEdge(state, visit(target), ai);
      }
    }
  }
  return minDFA;
}
