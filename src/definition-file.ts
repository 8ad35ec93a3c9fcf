/**
 * Lexer definitions stored as JSON, as read by the command line tool:
 *
 *   {
 *     "root": "main",
 *     "contexts": {
 *       "main": {
 *         "rules": [
 *           { "pattern": "[a-z]+", "token": "IDENT" },
 *           { "pattern": "\"", "token": "QUOTE", "push": "string" },
 *           { "pattern": "\\s+", "skip": true }
 *         ]
 *       },
 *       "string": { "parent": "escapes", "rules": [...] }
 *     }
 *   }
 *
 * A rule matches `pattern` (regex syntax) or, with `"eof": true`, the end
 * of input. Its action emits `token`, then pops the context if `pop` is
 * set, then pushes `push`.
 */
import { err, ok, Result } from 'neverthrow';
import { DefinitionError } from './errors';
import { emit, pop, push, sequence, skip } from './lexer-gen/actions';
import type { Action } from './lexer-gen/context';
import { LexerDefinition } from './lexer-gen/definition';
import { eof, Pattern } from './pattern/pattern';
import { parseRegex } from './regex-compiler/parser';

export type LoadedDefinition = {
  definition: LexerDefinition<string>;
  root: string | undefined;
};

type JSONObject = { [key: string]: unknown };

function isObject(value: unknown): value is JSONObject {
  return typeof value == 'object' && value !== null && !Array.isArray(value);
}

function optional<V>(
  obj: JSONObject,
  key: string,
  path: string,
  type: 'string' | 'boolean',
  check: (value: unknown) => value is V
): Result<V | undefined, DefinitionError> {
  const value = obj[key];
  if (value === undefined || check(value)) {
    return ok(value);
  }
  const keyPath = path == '' ? key : `${path}.${key}`;
  return err(new DefinitionError(keyPath, `expected a ${type}`));
}

const isString = (value: unknown): value is string =>
  typeof value == 'string';
const isBoolean = (value: unknown): value is boolean =>
  typeof value == 'boolean';

function loadPattern(
  rule: JSONObject,
  path: string
): Result<Pattern, DefinitionError> {
  const isEOF = optional(rule, 'eof', path, 'boolean', isBoolean);
  if (isEOF.isErr()) {
    return err(isEOF.error);
  }
  const source = optional(rule, 'pattern', path, 'string', isString);
  if (source.isErr()) {
    return err(source.error);
  }
  if (isEOF.value && source.value !== undefined) {
    return err(
      new DefinitionError(path, 'a rule takes either pattern or eof, not both')
    );
  }
  if (isEOF.value) {
    return ok(eof());
  }
  if (source.value === undefined) {
    return err(new DefinitionError(`${path}.pattern`, 'missing pattern'));
  }
  return parseRegex(source.value).mapErr(
    (e) => new DefinitionError(`${path}.pattern`, e.message)
  );
}

function loadAction(
  rule: JSONObject,
  path: string
): Result<Action<string>, DefinitionError> {
  const token = optional(rule, 'token', path, 'string', isString);
  if (token.isErr()) {
    return err(token.error);
  }
  const pushTo = optional(rule, 'push', path, 'string', isString);
  if (pushTo.isErr()) {
    return err(pushTo.error);
  }
  const popped = optional(rule, 'pop', path, 'boolean', isBoolean);
  if (popped.isErr()) {
    return err(popped.error);
  }
  const skipped = optional(rule, 'skip', path, 'boolean', isBoolean);
  if (skipped.isErr()) {
    return err(skipped.error);
  }

  const actions: Action<string>[] = [];
  if (token.value !== undefined) {
    actions.push(emit(token.value));
  }
  if (popped.value) {
    actions.push(pop());
  }
  if (pushTo.value !== undefined) {
    actions.push(push(pushTo.value));
  }
  if (skipped.value) {
    if (actions.length > 0) {
      return err(
        new DefinitionError(path, 'a skip rule cannot emit, push or pop')
      );
    }
    return ok(skip());
  }
  if (actions.length == 0) {
    return err(
      new DefinitionError(
        path,
        'a rule needs at least one of token, push, pop or skip'
      )
    );
  }
  return ok(actions.length == 1 ? actions[0] : sequence(...actions));
}

/**
 * Check parsed JSON and turn it into a definition. Parents are looked up
 * when the definition is built, `push` targets when the rule runs.
 */
export function loadDefinition(
  json: unknown
): Result<LoadedDefinition, DefinitionError> {
  if (!isObject(json)) {
    return err(new DefinitionError('', 'expected an object'));
  }
  const root = optional(json, 'root', '', 'string', isString);
  if (root.isErr()) {
    return err(root.error);
  }
  const contexts = json.contexts;
  if (!isObject(contexts)) {
    return err(new DefinitionError('contexts', 'expected an object'));
  }

  const definition = new LexerDefinition<string>();
  for (const [name, context] of Object.entries(contexts)) {
    const path = `contexts.${name}`;
    if (!isObject(context)) {
      return err(new DefinitionError(path, 'expected an object'));
    }
    const parent = optional(context, 'parent', path, 'string', isString);
    if (parent.isErr()) {
      return err(parent.error);
    }
    const rules = context.rules;
    if (!Array.isArray(rules)) {
      return err(new DefinitionError(`${path}.rules`, 'expected an array'));
    }
    const contextDef = definition.defineContext(name, {
      parent: parent.value,
    });
    for (let i = 0; i < rules.length; i++) {
      const rulePath = `${path}.rules[${i}]`;
      const rule: unknown = rules[i];
      if (!isObject(rule)) {
        return err(new DefinitionError(rulePath, 'expected an object'));
      }
      const pattern = loadPattern(rule, rulePath);
      if (pattern.isErr()) {
        return err(pattern.error);
      }
      const action = loadAction(rule, rulePath);
      if (action.isErr()) {
        return err(action.error);
      }
      contextDef.rule(pattern.value, action.value);
    }
  }
  return ok({ definition, root: root.value });
}

/**
 * Parse JSON text and load it.
 */
export function parseDefinition(
  text: string
): Result<LoadedDefinition, DefinitionError> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    return err(
      new DefinitionError('', e instanceof Error ? e.message : String(e))
    );
  }
  return loadDefinition(json);
}
