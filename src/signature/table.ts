/**
 * Signature Table - Operator name to type scheme(s)
 *
 * A table is built once and then only read. Names with more than one scheme
 * are overloaded; the checker tries each alternative.
 */

import type { Type } from '../types/types.js';
import { constraintTypes } from '../constraint/types.js';
import type { SubtypeLattice } from '../constraint/subtyping.js';
import { TypingError } from '../constraint/errors.js';
import type { Scheme } from './scheme.js';

export class SignatureTable {
  private readonly entries: ReadonlyMap<string, readonly Scheme[]>;

  constructor(readonly lattice: SubtypeLattice, entries: ReadonlyMap<string, readonly Scheme[]>) {
    this.entries = new Map(
      Array.from(entries, ([name, schemes]) => [name, Object.freeze([...schemes])] as const)
    );
  }

  /**
   * Alternatives for a name, or undefined when the name is not an operator
   */
  lookup(name: string): readonly Scheme[] | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  isOverloaded(name: string): boolean {
    return (this.entries.get(name)?.length ?? 0) > 1;
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }
}

export class SignatureTableBuilder {
  private readonly entries = new Map<string, Scheme[]>();

  constructor(private readonly lattice: SubtypeLattice) {}

  /**
   * Register the alternatives for an operator name. Each name is defined once.
   */
  define(name: string, ...schemes: Scheme[]): this {
    if (schemes.length === 0) {
      throw new TypingError('MalformedConfiguration', `Operator ${name} needs at least one signature`);
    }
    if (this.entries.has(name)) {
      throw new TypingError('MalformedConfiguration', `Operator ${name} is defined twice`);
    }
    for (const s of schemes) {
      this.checkOperators(name, s.type);
      for (const constraint of s.constraints) {
        constraintTypes(constraint).forEach(t => this.checkOperators(name, t));
        if (constraint.kind === 'has-param') {
          constraint.operators.forEach(op => this.checkDeclared(name, op.name));
        }
      }
    }
    this.entries.set(name, schemes);
    return this;
  }

  build(): SignatureTable {
    return new SignatureTable(this.lattice, this.entries);
  }

  private checkDeclared(name: string, operatorName: string): void {
    if (!this.lattice.has(operatorName)) {
      throw new TypingError(
        'MalformedConfiguration',
        `Signature of ${name} uses undeclared type operator ${operatorName}`
      );
    }
  }

  private checkOperators(name: string, type: Type): void {
    switch (type.kind) {
      case 'var':
        return;
      case 'op':
        this.checkDeclared(name, type.operator.name);
        type.args.forEach(a => this.checkOperators(name, a));
        return;
      case 'fn':
        this.checkOperators(name, type.input);
        this.checkOperators(name, type.output);
        return;
    }
  }
}
