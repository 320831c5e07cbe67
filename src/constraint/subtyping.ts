/**
 * Subtype Lattice - Nominal subtyping between type operators
 *
 * Every operator declares at most one direct supertype, so the hierarchy is
 * a forest and each operator has a single ancestor chain.
 *
 * Key relations:
 * - Reflexivity: A <: A
 * - Transitivity: A <: B ∧ B <: C → A <: C
 * - Least upper bound: the first ancestor of A that B is a subtype of
 */

import type { TypeOperator } from '../types/types.js';
import { TypingError } from './errors.js';

export class SubtypeLattice {
  private readonly declared = new Map<string, TypeOperator>();

  /**
   * Register an operator. Its supertype (if any) must already be registered.
   * Redefinitions and self-referential chains are rejected.
   */
  declare(op: TypeOperator): TypeOperator {
    if (this.declared.has(op.name)) {
      throw new TypingError('CyclicHierarchy', `Operator ${op.name} is already declared`);
    }
    if (op.supertype !== undefined) {
      if (op.supertype === op.name) {
        throw new TypingError('CyclicHierarchy', `Operator ${op.name} cannot be its own supertype`);
      }
      if (!this.declared.has(op.supertype)) {
        throw new TypingError(
          'MalformedConfiguration',
          `Supertype ${op.supertype} of ${op.name} is not declared`
        );
      }
    }
    this.declared.set(op.name, op);
    return op;
  }

  has(name: string): boolean {
    return this.declared.has(name);
  }

  get(name: string): TypeOperator | undefined {
    return this.declared.get(name);
  }

  /**
   * All declared operators, in declaration order
   */
  operators(): TypeOperator[] {
    return Array.from(this.declared.values());
  }

  /**
   * The ancestor chain of an operator, starting with the operator itself
   */
  ancestors(op: TypeOperator): TypeOperator[] {
    const chain: TypeOperator[] = [];
    let current: TypeOperator | undefined = op;
    while (current !== undefined) {
      chain.push(current);
      current = current.supertype !== undefined ? this.declared.get(current.supertype) : undefined;
    }
    return chain;
  }

  /**
   * Is A a subtype of B?
   */
  isSubtype(a: TypeOperator, b: TypeOperator): boolean {
    return this.ancestors(a).some(op => op.name === b.name);
  }

  /**
   * Neither operator is a subtype of the other
   */
  meetIsEmpty(a: TypeOperator, b: TypeOperator): boolean {
    return !this.isSubtype(a, b) && !this.isSubtype(b, a);
  }

  /**
   * Most specific common ancestor of A and B that lies below the ceiling.
   */
  leastUpperBoundBelow(a: TypeOperator, b: TypeOperator, ceiling?: TypeOperator): TypeOperator {
    const lub = this.ancestors(a).find(op => this.isSubtype(b, op));
    if (lub === undefined) {
      throw new TypingError('NoCommonSupertype', `${a.name} and ${b.name} have no common supertype`);
    }
    if (ceiling !== undefined && !this.isSubtype(lub, ceiling)) {
      throw new TypingError(
        'NoCommonSupertype',
        `Common supertype ${lub.name} of ${a.name} and ${b.name} is not below ${ceiling.name}`
      );
    }
    return lub;
  }
}
