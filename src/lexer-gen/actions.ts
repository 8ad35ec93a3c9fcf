import type { Action } from './context';

/**
 * Emit the given token for the match.
 */
export function emit<T>(token: T): Action<T> {
  return (_lexeme, control) => control.emit(token);
}

/**
 * Drop the match.
 */
export function skip<T>(): Action<T> {
  return () => {};
}

export function push<T>(context: string): Action<T> {
  return (_lexeme, control) => control.push(context);
}

export function pop<T>(): Action<T> {
  return (_lexeme, control) => control.pop();
}

/**
 * Run each action in order on the same match.
 */
export function sequence<T>(...actions: Action<T>[]): Action<T> {
  return (lexeme, control) => {
    for (const action of actions) {
      action(lexeme, control);
    }
  };
}

export function emitAndPush<T>(token: T, context: string): Action<T> {
  return sequence(emit(token), push(context));
}

export function emitAndPop<T>(token: T): Action<T> {
  return sequence(emit(token), pop());
}
