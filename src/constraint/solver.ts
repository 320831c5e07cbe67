/**
 * Constraint Solver - Checks constraints against the current substitution
 *
 * Each constraint evaluates to satisfied, pending (unresolved variables, try
 * again later) or violated. Checking may itself unify: a limit with a single
 * viable alternative is adopted, and a has-param container whose operator
 * family leaves one candidate is forced into that shape.
 *
 * `solve` iterates over all live constraints until a round binds nothing.
 * The number of rounds is bounded by the number of live variables.
 */

import type { Type, TypeVar } from '../types/types.js';
import { containsTypeVar, isParametric, isTypeVar, typeEquals } from '../types/types.js';
import { param } from '../types/factory.js';
import type {
  Constraint,
  ConstraintStatus,
  HasParamConstraint,
  MemberOfConstraint,
  ShapeLimitConstraint,
  SubtypeBoundConstraint,
} from './types.js';
import { mapConstraint } from './types.js';
import { Substitution } from './substitution.js';
import type { SubtypeLattice } from './subtyping.js';
import type { TypeVarManager } from './type-variable.js';
import { Unifier } from './unification.js';
import { TypingError } from './errors.js';
import { formatConstraint, formatType } from '../output/formatter.js';

/**
 * Configuration for the solver
 */
export interface SolverConfig {
  /** Maximum fixpoint rounds; defaults to the number of live variables + 1 */
  maxRounds?: number;
}

const SATISFIED: ConstraintStatus = { status: 'satisfied' };
const PENDING: ConstraintStatus = { status: 'pending' };

export class ConstraintSolver {
  private readonly live: Constraint[] = [];
  readonly unifier: Unifier;

  constructor(
    readonly lattice: SubtypeLattice,
    readonly manager: TypeVarManager,
    readonly substitution: Substitution = Substitution.empty(),
    private readonly config: SolverConfig = {}
  ) {
    this.unifier = new Unifier(lattice, substitution, this.live);
  }

  /**
   * Live constraints, in the order they were added
   */
  get constraints(): readonly Constraint[] {
    return this.live;
  }

  add(...constraints: Constraint[]): void {
    this.live.push(...constraints);
  }

  /**
   * Copy with its own variable counter, substitution and constraint list
   */
  fork(): ConstraintSolver {
    const copy = new ConstraintSolver(this.lattice, this.manager.clone(), this.substitution.clone(), this.config);
    copy.add(...this.live);
    return copy;
  }

  /**
   * Re-check every live constraint until nothing changes.
   * Throws ConstraintViolation or ConstraintDeadlock.
   */
  solve(): void {
    let rounds = 0;
    for (;;) {
      const limit = this.config.maxRounds ?? this.manager.count + 1;
      if (rounds >= limit) {
        throw new TypingError(
          'ConstraintDeadlock',
          `Constraints did not converge after ${rounds} round(s)`
        );
      }
      rounds++;

      const before = this.substitution.version;
      for (const constraint of this.live) {
        const result = this.check(constraint);
        if (result.status === 'violated') {
          const resolved = mapConstraint(constraint, t => this.substitution.apply(t));
          throw new TypingError(
            'ConstraintViolation',
            `Constraint ${formatConstraint(resolved)} cannot hold: ${result.reason}`,
            { types: [result.type], constraint: resolved }
          );
        }
      }
      if (this.substitution.version === before) {
        return;
      }
    }
  }

  /**
   * Evaluate one constraint against the current substitution
   */
  check(constraint: Constraint): ConstraintStatus {
    switch (constraint.kind) {
      case 'subtype-bound':
        return this.checkSubtypeBound(constraint);
      case 'member-of':
        return this.checkLimit(constraint.variable, constraint.alternatives, constraint);
      case 'shape-limit':
        return this.checkLimit(constraint.variable, constraint.patterns, constraint);
      case 'has-param':
        return this.checkHasParam(constraint);
    }
  }

  private checkSubtypeBound(constraint: SubtypeBoundConstraint): ConstraintStatus {
    if (isTypeVar(this.substitution.resolve(constraint.variable))) {
      return PENDING;
    }
    const type = this.substitution.apply(constraint.variable);
    const holds = this.unifier.attempt(u => u.subtype(constraint.variable, constraint.bound));
    if (holds === undefined) {
      return this.violated(type, `${formatType(type)} is not a subtype of ${formatType(this.substitution.apply(constraint.bound))}`);
    }
    return this.settled(type);
  }

  /**
   * MemberOf and ShapeLimit: keep the alternatives that can still unify with
   * the variable; adopt the only one left.
   */
  private checkLimit(
    variable: TypeVar,
    alternatives: readonly Type[],
    constraint: MemberOfConstraint | ShapeLimitConstraint
  ): ConstraintStatus {
    const candidates: Type[] = [];
    for (const alternative of alternatives) {
      const resolved = this.substitution.apply(alternative);
      if (!candidates.some(c => typeEquals(c, resolved))) {
        candidates.push(resolved);
      }
    }

    const viable = candidates.filter(c => this.unifier.attempt(u => u.unify(variable, c)) !== undefined);
    const type = this.substitution.apply(variable);

    const [only] = viable;
    if (only === undefined) {
      const what = constraint.kind === 'member-of' ? 'none of the alternatives' : 'none of the shapes';
      return this.violated(type, `${formatType(type)} matches ${what}`);
    }
    if (viable.length === 1) {
      this.unifier.unify(variable, only);
    }
    return this.settled(this.substitution.apply(variable));
  }

  private checkHasParam(constraint: HasParamConstraint): ConstraintStatus {
    const position = constraint.position;
    let container = this.substitution.resolve(constraint.container);

    if (isTypeVar(container)) {
      if (constraint.operators.length === 0) {
        return PENDING;
      }
      const candidates = constraint.operators.filter(op => op.arity >= (position ?? 1));
      const [only] = candidates;
      if (only === undefined) {
        return this.violated(container, `no operator in the family has position ${position ?? 1}`);
      }
      if (candidates.length > 1) {
        return PENDING;
      }
      this.unifier.unify(constraint.container, param(only, ...this.manager.freshN(only.arity)));
      container = this.substitution.resolve(constraint.container);
    }

    const type = this.substitution.apply(container);
    if (!isParametric(container)) {
      return this.violated(type, `${formatType(type)} is not a parametric type`);
    }
    const { operator, args } = container;
    if (constraint.operators.length > 0 && !constraint.operators.some(op => op.name === operator.name)) {
      return this.violated(type, `${formatType(type)} is not one of ${constraint.operators.map(op => op.name).join(', ')}`);
    }

    const positions = position !== undefined
      ? [position]
      : Array.from({ length: args.length }, (_, i) => i + 1);
    const viable = positions
      .map(p => args[p - 1])
      .filter((arg): arg is Type => arg !== undefined)
      .filter(arg => this.unifier.attempt(u => u.subtype(arg, constraint.param)) !== undefined);

    const [only] = viable;
    if (only === undefined) {
      const at = position !== undefined ? ` at position ${position}` : '';
      return this.violated(type, `${formatType(type)} has no parameter${at} below ${formatType(this.substitution.apply(constraint.param))}`);
    }
    if (viable.length === 1) {
      this.unifier.subtype(only, constraint.param);
    }

    const ground = !containsTypeVar(this.substitution.apply(constraint.container)) &&
      !containsTypeVar(this.substitution.apply(constraint.param));
    return ground ? SATISFIED : PENDING;
  }

  private settled(type: Type): ConstraintStatus {
    return containsTypeVar(type) ? PENDING : SATISFIED;
  }

  private violated(type: Type, reason: string): ConstraintStatus {
    return { status: 'violated', reason, type };
  }
}
