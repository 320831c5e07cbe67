/**
 * Constraint System
 *
 * Lattice, substitution, unification and the fixpoint solver used by the
 * expression checker. All state lives in per-call objects; nothing here is
 * global.
 *
 * @module constraint
 */

// Constraint definitions
export type {
  Constraint,
  ConstraintKind,
  ConstraintStatus,
  SubtypeBoundConstraint,
  MemberOfConstraint,
  HasParamConstraint,
  ShapeLimitConstraint,
} from './types.js';

export { mapConstraint, constraintTypes } from './types.js';

export { subtypeBound, memberOf, hasParam, shapeLimit } from './factory.js';
export type { HasParamOptions } from './factory.js';

// Errors
export { TypingError, isTypingError, TYPING_ERROR_KINDS } from './errors.js';
export type { TypingErrorKind, TypingErrorDetails } from './errors.js';

// Type variable management
export { TypeVarManager } from './type-variable.js';

// Substitution
export { Substitution } from './substitution.js';

// Lattice
export { SubtypeLattice } from './subtyping.js';

// Unification
export { Unifier } from './unification.js';

// Solving
export { ConstraintSolver } from './solver.js';
export type { SolverConfig } from './solver.js';
