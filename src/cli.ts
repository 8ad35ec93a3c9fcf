#!/usr/bin/env node
import fs from 'fs';
import { Result } from 'neverthrow';
import { hideBin } from 'yargs/helpers';
import yargs from 'yargs/yargs';
import { colors, logger, useColors } from './debug';
import { parseDefinition } from './definition-file';
import { DefinitionError } from './errors';
import { BuildError } from './lexer-gen/definition';
import { Lexer } from './lexer-gen/lexer';
import { LexToken } from './lexer-gen/LexToken';

export function lexerFromJSON(
  text: string,
  options: { root?: string; minimize?: boolean } = {}
): Result<Lexer<string>, DefinitionError | BuildError> {
  return parseDefinition(text).andThen(({ definition, root }) =>
    definition.build({
      root: options.root ?? root,
      minimize: options.minimize,
    })
  );
}

export function formatToken(token: LexToken<string>): string {
  const { from, to } = token.span;
  return `${colors.cyan(token.token)} ${from}-${to} ${JSON.stringify(
    token.substr
  )}`;
}

function loadLexerOrExit(
  file: string,
  options: { root?: string; minimize?: boolean }
): Lexer<string> | null {
  const lexer = lexerFromJSON(fs.readFileSync(file, 'utf-8'), options);
  if (lexer.isErr()) {
    console.error(colors.red(lexer.error.message));
    process.exitCode = 1;
    return null;
  }
  return lexer.value;
}

// listener added by the last --debug parse
let stopDebugLog: (() => void) | null = null;

export function buildParser(argv: string[]) {
  return yargs(argv)
    .scriptName('munch')
    .option('debug', {
      describe: 'log compilation and context switches to stderr',
      type: 'boolean',
      default: false,
    })
    .option('color', {
      describe: 'color the output',
      type: 'boolean',
      default: true,
    })
    .option('root', {
      describe: 'context to start in',
      type: 'string',
    })
    .option('minimize', {
      describe: 'minimize each context DFA',
      type: 'boolean',
      default: true,
    })
    .middleware((args) => {
      useColors(args.color);
      stopDebugLog?.();
      stopDebugLog = args.debug
        ? logger.subscribe((...messages: unknown[]) =>
            console.error(colors.yellow(messages.join(' ')))
          )
        : null;
    })
    .command(
      ['tokenize <definition> [file]', '$0'],
      'tokenize a file, or the text given with --text',
      (yargs) =>
        yargs
          .positional('definition', {
            describe: 'JSON lexer definition',
            type: 'string',
            demandOption: true,
          })
          .positional('file', {
            describe: 'file to tokenize',
            type: 'string',
          })
          .option('text', {
            describe: 'text to tokenize instead of a file',
            type: 'string',
          }),
      (args) => {
        const lexer = loadLexerOrExit(args.definition, args);
        if (lexer === null) {
          return;
        }
        const input =
          args.text ??
          (args.file === undefined
            ? fs.readFileSync(0, 'utf-8')
            : fs.readFileSync(args.file, 'utf-8'));
        const run = lexer.run(input);
        while (!run.done) {
          run.step();
          for (const token of run.takeTokens()) {
            console.log(formatToken(token));
          }
        }
        if (run.error !== null) {
          console.error(colors.red(run.error.message));
          process.exitCode = 1;
        }
      }
    )
    .command(
      'tables <definition>',
      'print the rules and DFA of every context',
      (yargs) =>
        yargs.positional('definition', {
          describe: 'JSON lexer definition',
          type: 'string',
          demandOption: true,
        }),
      (args) => {
        const lexer = loadLexerOrExit(args.definition, args);
        if (lexer !== null) {
          console.log(lexer.toDebugStr());
        }
      }
    )
    .strict();
}

if (require.main === module) {
  buildParser(hideBin(process.argv)).parseSync();
}
