/**
 * Type Schemes - Polymorphic operator signatures
 *
 * A scheme is the type skeleton of an operator plus the constraints on its
 * variables. Every reference to an operator instantiates the scheme with
 * fresh variables, so two occurrences never share a variable.
 */

import type { Type, TypeVar } from '../types/types.js';
import { arrowDepth, freeTypeVars, substituteTypeVars } from '../types/types.js';
import { curried } from '../types/factory.js';
import type { Constraint } from '../constraint/types.js';
import { constraintTypes, mapConstraint } from '../constraint/types.js';
import type { TypeVarManager } from '../constraint/type-variable.js';
import { TypingError } from '../constraint/errors.js';

export interface Scheme {
  readonly name: string;
  readonly type: Type;
  /** Number of arguments the operator is declared to take */
  readonly arity: number;
  readonly constraints: readonly Constraint[];
  /** Quantified variables: those of the type, then those only in constraints */
  readonly variables: readonly TypeVar[];
}

export interface SchemeOptions {
  /** Defaults to the curried argument count of the type */
  readonly arity?: number;
  readonly constraints?: readonly Constraint[];
}

/**
 * An instantiated scheme: fresh variables, ready to join a checking call
 */
export interface Instance {
  readonly type: Type;
  readonly constraints: Constraint[];
}

export function scheme(name: string, type: Type, options: SchemeOptions = {}): Scheme {
  const depth = arrowDepth(type);
  const arity = options.arity ?? depth;
  if (!Number.isInteger(arity) || arity < 0) {
    throw new TypingError('MalformedConfiguration', `Operator ${name} has invalid arity ${arity}`);
  }
  if (arity > depth) {
    throw new TypingError(
      'UndefinedOperatorArity',
      `Operator ${name} declares ${arity} argument(s) but its type accepts ${depth}`,
      { types: [type] }
    );
  }

  const constraints = Object.freeze([...(options.constraints ?? [])]);
  const variables = freeTypeVars(type);
  for (const constraint of constraints) {
    for (const tv of constraintTypes(constraint).flatMap(freeTypeVars)) {
      if (!variables.some(v => v.id === tv.id)) {
        variables.push(tv);
      }
    }
  }

  return Object.freeze({
    name,
    type,
    arity,
    constraints,
    variables: Object.freeze(variables),
  });
}

/**
 * A source of data: `inputs` unconstrained arguments yielding `output`
 */
export function dataInput(name: string, output: Type, inputs: number, manager: TypeVarManager): Scheme {
  return scheme(name, curried(manager.freshN(inputs, 'in'), output));
}

/**
 * Replace every quantified variable of the scheme with a fresh one
 */
export function instantiate(s: Scheme, manager: TypeVarManager): Instance {
  const mapping = new Map<number, Type>();
  for (const tv of s.variables) {
    mapping.set(tv.id, manager.fresh(baseName(tv.name)));
  }
  const rename = (t: Type): Type => substituteTypeVars(t, mapping);
  return {
    type: rename(s.type),
    constraints: s.constraints.map(c => mapConstraint(c, rename)),
  };
}

/**
 * Strip a trailing subscript so re-instantiated names do not pile up
 */
function baseName(name: string): string {
  return name.replace(/[₀-₉]+$/u, '') || 'τ';
}
