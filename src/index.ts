export * from './errors';
export { logger, useColors, colors } from './debug';
export type { IHaveDebugStr } from './debug';
export { SymbolSet, EOF_SYMBOL, MAX_CODE_POINT } from './pattern/symbol-set';
export type { SymbolRange } from './pattern/symbol-set';
export * from './pattern/pattern';
export { Alphabet } from './nfa-to-dfa/alphabet';
export { NFA } from './nfa-to-dfa/nfa';
export { DFA, lowestTagWins } from './nfa-to-dfa/dfa';
export type { AcceptResolver, ConstDFA, DFAMatch } from './nfa-to-dfa/dfa';
export { compile, compileOrThrow } from './nfa-to-dfa/compile';
export type { CompileOptions, CompilableRule } from './nfa-to-dfa/compile';
export * from './lexer-gen/actions';
export { Context } from './lexer-gen/context';
export type {
  Action,
  Lexeme,
  LexerControl,
  Rule,
} from './lexer-gen/context';
export { ContextStack } from './lexer-gen/context-stack';
export { ContextDefinition, LexerDefinition } from './lexer-gen/definition';
export type { BuildError, BuildOptions } from './lexer-gen/definition';
export { LexStatus, LexerRun, TokenIterator } from './lexer-gen/engine';
export { EOS } from './lexer-gen/input';
export type { Input } from './lexer-gen/input';
export { Lexer } from './lexer-gen/lexer';
export { buildLexer } from './lexer-gen/lexer-gen';
export { LexToken } from './lexer-gen/LexToken';
export type { Span } from './lexer-gen/LexToken';
export {
  parseRegex,
  parseRegexOrThrow,
  regex,
  RegexParser,
} from './regex-compiler/parser';
export { Regex } from './regex-compiler/regex';
export { loadDefinition, parseDefinition } from './definition-file';
export type { LoadedDefinition } from './definition-file';
