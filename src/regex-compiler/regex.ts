import { codePoints } from '../iter';
import { compileOrThrow } from '../nfa-to-dfa/compile';
import { DFA } from '../nfa-to-dfa/dfa';
import { Pattern } from '../pattern/pattern';
import { parseRegexOrThrow } from './parser';

export class Regex {
  readonly source: string;
  readonly pattern: Pattern;
  private dfa: DFA;
  constructor(source: string) {
    this.source = source;
    this.pattern = parseRegexOrThrow(source);
    this.dfa = compileOrThrow([{ pattern: this.pattern }]);
  }

  /**
   * The longest non-empty prefix of the input that the regex matches.
   */
  match(input: string): { substr: string } | null {
    const result = this.dfa.match(codePoints(input));
    if (result === null) {
      return null;
    }
    return { substr: Array.from(input).slice(0, result.length).join('') };
  }

  /**
   * Whether the regex matches the whole input.
   */
  test(input: string): boolean {
    let state = this.dfa.getStartState();
    for (const symbol of codePoints(input)) {
      state = this.dfa.getNextState(state, symbol);
      if (state == DFA.NO_STATE) {
        return false;
      }
    }
    return this.dfa.acceptTag(state) !== null;
  }
}
