/**
 * Constraint Types - side conditions attached to type variables
 *
 * Plain equality is handled by unification. Constraints express what
 * equality cannot:
 * - subtype-bound: v may only be bound to T or a subtype of T
 * - member-of:     v must be one of a finite set of ground alternatives
 * - has-param:     v must be a parametric type with p at some position
 * - shape-limit:   v must match one of several (open) structural patterns
 */

import type { Type, TypeOperator, TypeVar } from '../types/types.js';

// ============================================================================
// Constraints
// ============================================================================

export type Constraint =
  | SubtypeBoundConstraint
  | MemberOfConstraint
  | HasParamConstraint
  | ShapeLimitConstraint
  ;

export type ConstraintKind = Constraint['kind'];

/**
 * SubtypeBound(v, T): v ≤ T
 */
export interface SubtypeBoundConstraint {
  readonly kind: 'subtype-bound';
  readonly variable: TypeVar;
  readonly bound: Type;
}

/**
 * MemberOf(v, {T₁..Tₙ}): v ∈ {T₁..Tₙ}, each Tᵢ ground
 */
export interface MemberOfConstraint {
  readonly kind: 'member-of';
  readonly variable: TypeVar;
  readonly alternatives: readonly Type[];
}

/**
 * HasParam(c, p, i): c resolves to F(…) with an argument at position i
 * (1-based) that is a subtype of p. Without a position, any argument will do.
 */
export interface HasParamConstraint {
  readonly kind: 'has-param';
  readonly container: TypeVar;
  readonly param: Type;
  readonly position?: number;
  /** Operators the container may resolve to */
  readonly operators: readonly TypeOperator[];
}

/**
 * ShapeLimit(v, {P₁..Pₙ}): v unifies with one of the patterns
 */
export interface ShapeLimitConstraint {
  readonly kind: 'shape-limit';
  readonly variable: TypeVar;
  readonly patterns: readonly Type[];
}

// ============================================================================
// Check results
// ============================================================================

export type ConstraintStatus =
  | { readonly status: 'satisfied' }
  | { readonly status: 'pending' }
  | { readonly status: 'violated'; readonly reason: string; readonly type: Type }
  ;

/**
 * Apply a type mapping to every type inside a constraint
 */
export function mapConstraint(constraint: Constraint, f: (type: Type) => Type): Constraint {
  const variable = (v: TypeVar): TypeVar => {
    const mapped = f(v);
    return mapped.kind === 'var' ? mapped : v;
  };

  switch (constraint.kind) {
    case 'subtype-bound':
      return { kind: 'subtype-bound', variable: variable(constraint.variable), bound: f(constraint.bound) };
    case 'member-of':
      return {
        kind: 'member-of',
        variable: variable(constraint.variable),
        alternatives: constraint.alternatives.map(f),
      };
    case 'has-param':
      return {
        kind: 'has-param',
        container: variable(constraint.container),
        param: f(constraint.param),
        ...(constraint.position !== undefined ? { position: constraint.position } : {}),
        operators: constraint.operators,
      };
    case 'shape-limit':
      return {
        kind: 'shape-limit',
        variable: variable(constraint.variable),
        patterns: constraint.patterns.map(f),
      };
  }
}

/**
 * All types mentioned by a constraint (used to collect its variables)
 */
export function constraintTypes(constraint: Constraint): Type[] {
  switch (constraint.kind) {
    case 'subtype-bound':
      return [constraint.variable, constraint.bound];
    case 'member-of':
      return [constraint.variable, ...constraint.alternatives];
    case 'has-param':
      return [constraint.container, constraint.param];
    case 'shape-limit':
      return [constraint.variable, ...constraint.patterns];
  }
}
