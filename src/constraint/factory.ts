/**
 * Constraint Factory - side-effect-free constructors for constraints
 */

import type { Type, TypeOperator, TypeVar } from '../types/types.js';
import { containsTypeVar } from '../types/types.js';
import type {
  HasParamConstraint,
  MemberOfConstraint,
  ShapeLimitConstraint,
  SubtypeBoundConstraint,
} from './types.js';
import { TypingError } from './errors.js';

export function subtypeBound(variable: TypeVar, bound: Type): SubtypeBoundConstraint {
  return Object.freeze({ kind: 'subtype-bound', variable, bound });
}

/**
 * Restrict a variable to a finite set of ground types
 */
export function memberOf(variable: TypeVar, ...alternatives: Type[]): MemberOfConstraint {
  if (alternatives.length === 0) {
    throw new TypingError('MalformedConfiguration', `member-of on ${variable.name} needs at least one alternative`);
  }
  if (alternatives.some(containsTypeVar)) {
    throw new TypingError('MalformedConfiguration', `member-of alternatives for ${variable.name} must be ground`);
  }
  return Object.freeze({ kind: 'member-of', variable, alternatives: Object.freeze([...alternatives]) });
}

export interface HasParamOptions {
  /** 1-based argument position; omit for "any position" */
  readonly position?: number;
  /** Operators the container may resolve to; empty means any parametric type */
  readonly operators?: readonly TypeOperator[];
}

export function hasParam(container: TypeVar, param: Type, options: HasParamOptions = {}): HasParamConstraint {
  const { position, operators = [] } = options;
  if (position !== undefined && (!Number.isInteger(position) || position < 1)) {
    throw new TypingError('MalformedConfiguration', `has-param position must be a positive integer, got ${position}`);
  }
  return Object.freeze({
    kind: 'has-param',
    container,
    param,
    ...(position !== undefined ? { position } : {}),
    operators: Object.freeze([...operators]),
  });
}

/**
 * Restrict a variable to one of several structural patterns
 */
export function shapeLimit(variable: TypeVar, ...patterns: Type[]): ShapeLimitConstraint {
  if (patterns.length === 0) {
    throw new TypingError('MalformedConfiguration', `shape limit on ${variable.name} needs at least one pattern`);
  }
  return Object.freeze({ kind: 'shape-limit', variable, patterns: Object.freeze([...patterns]) });
}
