/**
 * Check Context - State owned by one branch of a check
 *
 * A check starts with a single context and forks it at every overloaded
 * identifier, so branches never see each other's variables or bindings.
 */

import { TypeVarManager } from '../constraint/type-variable.js';
import { Substitution } from '../constraint/substitution.js';
import type { SubtypeLattice } from '../constraint/subtyping.js';
import { ConstraintSolver } from '../constraint/solver.js';
import type { SolverConfig } from '../constraint/solver.js';
import type { Unifier } from '../constraint/unification.js';

export class CheckContext {
  /** Applications type-checked so far; ranks failed branches */
  applications = 0;

  /** Alternative taken at each overloaded identifier, in visiting order */
  readonly choices: number[] = [];

  constructor(readonly solver: ConstraintSolver) {}

  static start(lattice: SubtypeLattice, config: SolverConfig = {}): CheckContext {
    return new CheckContext(new ConstraintSolver(lattice, new TypeVarManager(), Substitution.empty(), config));
  }

  get manager(): TypeVarManager {
    return this.solver.manager;
  }

  get substitution(): Substitution {
    return this.solver.substitution;
  }

  get unifier(): Unifier {
    return this.solver.unifier;
  }

  fork(): CheckContext {
    const copy = new CheckContext(this.solver.fork());
    copy.applications = this.applications;
    copy.choices.push(...this.choices);
    return copy;
  }
}
