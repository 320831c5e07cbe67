/**
 * Unification Algorithm - Equality and subtype-aware unification
 *
 * Two entry points:
 * - unify(a, b):      a and b must become equal
 * - subtype(sub, sup): sub must become a subtype of sup (application sites)
 *
 * Both bind variables in the shared substitution and throw a TypingError on
 * failure. Callers re-check constraints after each step.
 *
 * Subtyping rules:
 * - Nullary operators follow the lattice
 * - Parametric types are covariant in their arguments
 * - Function types are contravariant in the input, covariant in the output
 * - A variable on the supertype side is bound to the subtype and may later be
 *   widened to a least upper bound below its SubtypeBound; reading a binding
 *   on the subtype side, or through equality, fixes it
 */

import type { Type, TypeOperator, TypeVar } from '../types/types.js';
import { occursIn } from '../types/types.js';
import { param } from '../types/factory.js';
import type { Constraint } from './types.js';
import { Substitution } from './substitution.js';
import type { SubtypeLattice } from './subtyping.js';
import { TypingError, isTypingError } from './errors.js';
import { formatType } from '../output/formatter.js';

export class Unifier {
  readonly substitution: Substitution;

  /**
   * @param constraints Live constraints of the call; consulted for the ceiling
   *                    of a variable being widened
   */
  constructor(
    private readonly lattice: SubtypeLattice,
    substitution?: Substitution,
    private readonly constraints: readonly Constraint[] = []
  ) {
    this.substitution = substitution ?? Substitution.empty();
  }

  /**
   * Unify two types for equality
   */
  unify(t1: Type, t2: Type): void {
    const s1 = this.substitution.resolve(t1);
    const s2 = this.substitution.resolve(t2);
    this.substitution.pin(t1);
    this.substitution.pin(t2);

    if (s1.kind === 'var' && s2.kind === 'var') {
      if (s1.id !== s2.id) {
        this.bindVar(s1, s2);
      }
      return;
    }
    if (s1.kind === 'var') {
      this.bindVar(s1, s2);
      return;
    }
    if (s2.kind === 'var') {
      this.bindVar(s2, s1);
      return;
    }

    if (s1.kind === 'fn' && s2.kind === 'fn') {
      this.unify(s1.input, s2.input);
      this.unify(s1.output, s2.output);
      return;
    }

    if (s1.kind === 'op' && s2.kind === 'op' &&
        s1.operator.name === s2.operator.name &&
        s1.args.length === s2.args.length) {
      s1.args.forEach((arg, i) => {
        const other = s2.args[i];
        if (other !== undefined) {
          this.unify(arg, other);
        }
      });
      return;
    }

    this.fail('TypeMismatch', t1, t2, (a, b) => `Cannot unify ${a} with ${b}`);
  }

  /**
   * Require sub ≤ sup, binding variables as needed
   */
  subtype(sub: Type, sup: Type): void {
    const a = this.substitution.resolve(sub);
    const b = this.substitution.resolve(sup);

    if (a.kind === 'var' && b.kind === 'var') {
      if (a.id !== b.id) {
        this.bindVar(a, b);
      }
      return;
    }
    if (a.kind === 'var') {
      this.bindVar(a, b);
      return;
    }
    if (b.kind === 'var') {
      this.substitution.pin(sub);
      this.bindVar(b, a, a.kind === 'op' && a.args.length === 0);
      return;
    }

    if (a.kind === 'fn' && b.kind === 'fn') {
      this.subtype(b.input, a.input);
      this.subtype(a.output, b.output);
      return;
    }

    if (a.kind === 'op' && b.kind === 'op') {
      this.substitution.pin(sub);

      const related = a.operator.name === b.operator.name ||
        (a.args.length === b.args.length && this.lattice.isSubtype(a.operator, b.operator));
      if (related) {
        a.args.forEach((arg, i) => {
          const other = b.args[i];
          if (other !== undefined) {
            this.subtype(arg, other);
          }
        });
        return;
      }

      if (a.args.length === 0 && b.args.length === 0 && this.widen(sup, a.operator, b.operator)) {
        return;
      }

      this.fail('SubtypeMismatch', sub, sup, (x, y) =>
        a.args.length === 0 && b.args.length === 0 && this.lattice.meetIsEmpty(a.operator, b.operator)
          ? `${x} is not a subtype of ${y}; the two are unrelated`
          : `${x} is not a subtype of ${y}`
      );
    }

    this.fail('SubtypeMismatch', sub, sup, (x, y) => `${x} is not a subtype of ${y}`);
  }

  /**
   * Run an action against a private copy of the substitution. Returns the
   * copy on success and leaves this unifier untouched either way.
   */
  attempt(action: (unifier: Unifier) => void): Substitution | undefined {
    const fork = new Unifier(this.lattice, this.substitution.clone(), this.constraints);
    try {
      action(fork);
      return fork.substitution;
    } catch (error) {
      if (isTypingError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Most specific nullary SubtypeBound attached to the variable's class
   */
  ceilingOf(tv: TypeVar): TypeOperator | undefined {
    let ceiling: TypeOperator | undefined;
    for (const constraint of this.constraints) {
      if (constraint.kind !== 'subtype-bound') continue;
      const rep = this.substitution.representative(constraint.variable);
      if (rep === undefined || rep.id !== tv.id) continue;
      const bound = this.substitution.resolve(constraint.bound);
      if (bound.kind !== 'op' || bound.args.length > 0) continue;
      if (ceiling === undefined || this.lattice.isSubtype(bound.operator, ceiling)) {
        ceiling = bound.operator;
      }
    }
    return ceiling;
  }

  /**
   * Merge rule: a widenable variable bound to `current` that now receives
   * `incoming` is rebound to their least upper bound below its ceiling.
   */
  private widen(sup: Type, incoming: TypeOperator, current: TypeOperator): boolean {
    const tv = this.substitution.representative(sup);
    if (tv === undefined || !this.substitution.isWidenable(tv)) {
      return false;
    }
    const ceiling = this.ceilingOf(tv);
    if (ceiling === undefined) {
      return false;
    }
    const lub = this.lattice.leastUpperBoundBelow(incoming, current, ceiling);
    this.substitution.bind(tv, param(lub), true);
    return true;
  }

  /**
   * Bind a variable after the occurs check
   */
  private bindVar(tv: TypeVar, type: Type, widenable = false): void {
    const resolved = this.substitution.apply(type);
    if (resolved.kind !== 'var' && occursIn(tv.id, resolved)) {
      throw new TypingError(
        'InfiniteType',
        `Type variable ${tv.name} occurs in ${formatType(resolved)}`,
        { types: [tv, resolved] }
      );
    }
    this.substitution.bind(tv, type, widenable);
  }

  private fail(
    kind: 'SubtypeMismatch' | 'TypeMismatch',
    t1: Type,
    t2: Type,
    message: (a: string, b: string) => string
  ): never {
    const a = this.substitution.apply(t1);
    const b = this.substitution.apply(t2);
    throw new TypingError(kind, message(formatType(a), formatType(b)), { types: [a, b] });
  }
}
