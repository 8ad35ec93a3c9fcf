import { StackUnderflowError, UnknownContextError } from '../errors';
import { ContextStack } from './context-stack';

describe('ContextStack', () => {
  const contexts = new Map([
    ['main', { name: 'main' }],
    ['string', { name: 'string' }],
  ]);
  let stack: ContextStack<{ name: string }>;
  beforeEach(() => {
    stack = new ContextStack(contexts, { name: 'main' });
  });

  test('starts with only the root', () => {
    expect(stack.depth).toEqual(1);
    expect(stack.current().name).toEqual('main');
  });

  test('push() makes the context active', () => {
    const result = stack.push('string');
    expect(result.isOk()).toBe(true);
    expect(stack.names()).toEqual(['main', 'string']);
    expect(stack.current().name).toEqual('string');
  });

  test('push() of an unknown context fails and leaves the stack alone', () => {
    const result = stack.push('comment');
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(UnknownContextError);
      expect(result.error.context).toEqual('comment');
    }
    expect(stack.names()).toEqual(['main']);
  });

  test('pop() returns the removed context', () => {
    stack.push('string');
    const result = stack.pop();
    expect(result.isOk() && result.value.name).toEqual('string');
    expect(stack.depth).toEqual(1);
  });

  test('pop() never removes the root', () => {
    const result = stack.pop();
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(StackUnderflowError);
      expect(result.error.message).toEqual(
        'StackUnderflow: cannot pop the root context "main"'
      );
    }
    expect(stack.names()).toEqual(['main']);
  });
});
