/**
 * Type Factory - constructors for operators and types
 */

import type { FunctionType, ParametricType, Type, TypeOperator } from './types.js';
import { TypingError } from '../constraint/errors.js';

export interface OperatorOptions {
  readonly arity?: number;
  readonly supertype?: TypeOperator | string;
  readonly symbol?: string;
}

/**
 * Declare a type operator value. Registration in a lattice is a separate step.
 */
export function operator(name: string, options: OperatorOptions = {}): TypeOperator {
  const arity = options.arity ?? 0;
  if (!Number.isInteger(arity) || arity < 0) {
    throw new TypingError('MalformedConfiguration', `Operator ${name} has invalid arity ${arity}`);
  }
  const supertype = typeof options.supertype === 'string'
    ? options.supertype
    : options.supertype?.name;
  return Object.freeze({
    name,
    arity,
    ...(supertype !== undefined ? { supertype } : {}),
    ...(options.symbol !== undefined ? { symbol: options.symbol } : {}),
  });
}

/**
 * Apply an operator to its arguments. The argument count must match the arity.
 */
export function param(op: TypeOperator, ...args: Type[]): ParametricType {
  if (args.length !== op.arity) {
    throw new TypingError(
      'MalformedConfiguration',
      `Operator ${op.name} takes ${op.arity} argument(s), got ${args.length}`
    );
  }
  return { kind: 'op', operator: op, args };
}

/**
 * Build a right-nested curried function type: arrow(a, b, c) = a → (b → c)
 */
export function arrow(first: Type, second: Type, ...rest: Type[]): FunctionType {
  const [next, ...remaining] = rest;
  if (next === undefined) {
    return { kind: 'fn', input: first, output: second };
  }
  return { kind: 'fn', input: first, output: arrow(second, next, ...remaining) };
}

/**
 * Curry a list of inputs onto an output; no inputs yields the output itself
 */
export function curried(inputs: readonly Type[], output: Type): Type {
  return inputs.reduceRight<Type>((acc, input) => ({ kind: 'fn', input, output: acc }), output);
}
