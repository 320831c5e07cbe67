/**
 * Typing errors
 *
 * Every failure while checking an expression is a TypingError. The first one
 * raised aborts the check; nothing is retried.
 */

import type { Type } from '../types/types.js';
import type { Constraint } from './types.js';

export const TYPING_ERROR_KINDS = [
  'SubtypeMismatch',         // argument is not a subtype of the required domain
  'TypeMismatch',            // equality unification of different operators
  'ConstraintViolation',     // a constraint cannot hold
  'ArityMismatch',           // argument applied to a non-function
  'InfiniteType',            // occurs check
  'CyclicHierarchy',         // malformed lattice (configuration time)
  'NoCommonSupertype',       // no ancestor within the variable's bound
  'ConstraintDeadlock',      // fixpoint did not converge
  'AmbiguousOverload',       // several alternatives type-check
  'UndefinedOperatorArity',  // declared arity exceeds the signature
  'UnresolvedType',          // free variables left in a required-ground result
  'ParseError',              // malformed expression or type text
  'MalformedConfiguration',  // bad signature/operator configuration
] as const;

export type TypingErrorKind = typeof TYPING_ERROR_KINDS[number];

export interface TypingErrorDetails {
  /** Conflicting types, resolved under the substitution at the time of failure */
  readonly types?: readonly Type[];
  /** The constraint that could not hold */
  readonly constraint?: Constraint;
  /** Text of the subexpression being checked when the failure occurred */
  readonly subexpression?: string;
}

export class TypingError extends Error {
  readonly kind: TypingErrorKind;
  readonly types: readonly Type[];
  readonly constraint?: Constraint;
  subexpression?: string;

  constructor(kind: TypingErrorKind, message: string, details: TypingErrorDetails = {}) {
    super(message);
    this.name = 'TypingError';
    this.kind = kind;
    this.types = details.types ?? [];
    this.constraint = details.constraint;
    this.subexpression = details.subexpression;
  }

  /**
   * Record the innermost subexpression only; outer applications do not
   * overwrite it.
   */
  locate(subexpression: string): this {
    if (this.subexpression === undefined) {
      this.subexpression = subexpression;
    }
    return this;
  }
}

export function isTypingError(value: unknown): value is TypingError {
  return value instanceof TypingError;
}
