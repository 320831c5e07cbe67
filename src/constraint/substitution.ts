/**
 * Substitution - Mapping from type variables to their bindings
 *
 * Bindings may point at other variables (unioned variables form chains);
 * `resolve` follows a chain one level deep, `apply` resolves a type fully.
 * Each checking call owns its substitution; trials and overload
 * alternatives work on clones.
 */

import type { Type, TypeVar } from '../types/types.js';
import { formatType } from '../output/formatter.js';

export class Substitution {
  private mapping: Map<number, Type> = new Map();

  /** Bound variables by id, for display */
  private variables: Map<number, TypeVar> = new Map();

  /** Variables whose binding came from a lower bound and may still be widened */
  private widenable: Set<number> = new Set();

  /** Incremented on every binding change */
  private revision = 0;

  /**
   * Create an empty substitution
   */
  static empty(): Substitution {
    return new Substitution();
  }

  /**
   * Bind (or rebind) a type variable
   */
  bind(tv: TypeVar, type: Type, widenable = false): void {
    this.mapping.set(tv.id, type);
    this.variables.set(tv.id, tv);
    if (widenable) {
      this.widenable.add(tv.id);
    } else {
      this.widenable.delete(tv.id);
    }
    this.revision++;
  }

  /**
   * Follow variable chains until reaching an unbound variable or a
   * non-variable type. Does not descend into arguments.
   */
  resolve(type: Type): Type {
    let current = type;
    const seen = new Set<number>();
    while (current.kind === 'var' && !seen.has(current.id)) {
      seen.add(current.id);
      const bound = this.mapping.get(current.id);
      if (bound === undefined) {
        return current;
      }
      current = bound;
    }
    return current;
  }

  /**
   * The last variable on a chain starting at `type`: the one whose binding is
   * not itself a variable, or the unbound representative.
   */
  representative(type: Type): TypeVar | undefined {
    if (type.kind !== 'var') {
      return undefined;
    }
    let current: TypeVar = type;
    const seen = new Set<number>();
    while (!seen.has(current.id)) {
      seen.add(current.id);
      const bound = this.mapping.get(current.id);
      if (bound === undefined || bound.kind !== 'var') {
        return current;
      }
      current = bound;
    }
    return current;
  }

  /**
   * Apply this substitution to a type, resolving all type variables
   */
  apply(type: Type): Type {
    const resolved = this.resolve(type);
    switch (resolved.kind) {
      case 'var':
        return resolved;
      case 'op':
        if (resolved.args.length === 0) {
          return resolved;
        }
        return { ...resolved, args: resolved.args.map(a => this.apply(a)) };
      case 'fn':
        return {
          kind: 'fn',
          input: this.apply(resolved.input),
          output: this.apply(resolved.output),
        };
    }
  }

  isWidenable(tv: TypeVar): boolean {
    return this.widenable.has(tv.id);
  }

  /**
   * Mark every variable on the chain starting at `type` as fixed
   */
  pin(type: Type): void {
    let current = type;
    const seen = new Set<number>();
    while (current.kind === 'var' && !seen.has(current.id)) {
      seen.add(current.id);
      this.widenable.delete(current.id);
      const bound = this.mapping.get(current.id);
      if (bound === undefined) {
        return;
      }
      current = bound;
    }
  }

  /**
   * Check if a type variable is bound in this substitution
   */
  has(tv: TypeVar): boolean {
    return this.mapping.has(tv.id);
  }

  /**
   * Get the binding for a type variable (if any)
   */
  get(tv: TypeVar): Type | undefined {
    return this.mapping.get(tv.id);
  }

  get size(): number {
    return this.mapping.size;
  }

  /**
   * Monotonic counter of binding changes
   */
  get version(): number {
    return this.revision;
  }

  /**
   * Create an independent copy of this substitution
   */
  clone(): Substitution {
    const copy = new Substitution();
    copy.mapping = new Map(this.mapping);
    copy.variables = new Map(this.variables);
    copy.widenable = new Set(this.widenable);
    copy.revision = this.revision;
    return copy;
  }

  /**
   * Debug string representation
   */
  toString(): string {
    if (this.mapping.size === 0) {
      return '{}';
    }

    const entries = Array.from(this.mapping.entries())
      .map(([id, type]) => `${this.variables.get(id)?.name ?? id} ↦ ${formatType(type)}`)
      .join(', ');

    return `{ ${entries} }`;
  }
}
