import { char, literal, or } from '../pattern/pattern';
import { epsilonClosure, move, NFA } from './nfa';

describe('NFA', () => {
  test('fromPatterns() tags the end of each pattern with its index', () => {
    const nfa = NFA.fromPatterns([char('a')]);
    expect(nfa.numStates).toEqual(3);
    expect(nfa.getStartState()).toEqual(0);
    expect(nfa.getEpsilons(0)).toEqual([1]);
    expect(nfa.acceptTag(2)).toEqual(0);
    expect(nfa.acceptTag(1)).toBeNull();
  });

  test('toDebugStr()', () => {
    const nfa = NFA.fromPatterns([char('a')]);
    expect(nfa.toDebugStr()).toEqual(
      [
        '    state  ϵ  links',
        '     >s0:  1      _',
        '      s1:  _   a->2',
        '  *s2(0):  _      _',
        '',
      ].join('\n')
    );
  });

  test('addEpsilon() checks its states', () => {
    const nfa = new NFA();
    nfa.addState();
    expect(() => nfa.addEpsilon(0, 1)).toThrow('IndexError');
  });

  test('epsilonClosure() and move()', () => {
    // 0 -> 1 -> {3 -a-> 4 -b-> 5, 6 -c-> 7 -b-> 8} -> 2
    const nfa = NFA.fromPatterns([or(literal('ab'), literal('cb'))]);
    const start = epsilonClosure(nfa, [0]);
    expect(start.sorted()).toEqual([0, 1, 3, 6]);
    expect([...move(nfa, start, 'a'.charCodeAt(0))]).toEqual([4]);
    expect([...move(nfa, start, 'b'.charCodeAt(0))]).toEqual([]);
    expect(epsilonClosure(nfa, [5]).sorted()).toEqual([2, 5]);
    expect(nfa.acceptTag(2)).toEqual(0);
  });

  test('symbolSets() lists the sets of every link', () => {
    const nfa = NFA.fromPatterns([literal('ab'), char('c')]);
    expect(nfa.symbolSets().map((s) => s.toString())).toEqual(['a', 'b', 'c']);
  });
});
