/**
 * Type Variable Management - Creation of fresh type variables
 *
 * Each checking call owns one TypeVarManager, so variable ids are unique
 * within a call and never shared across calls.
 */

import type { TypeVar } from '../types/types.js';

export class TypeVarManager {
  /** Counter for generating unique IDs */
  private counter = 0;

  /** Greek letters for naming type variables */
  private static readonly GREEK = [
    'α', 'β', 'γ', 'δ', 'ε', 'ζ', 'η', 'θ',
    'ι', 'κ', 'λ', 'μ', 'ν', 'ξ', 'ο', 'π',
    'ρ', 'σ', 'τ', 'υ', 'φ', 'χ', 'ψ', 'ω'
  ];

  /**
   * Create a fresh type variable with a unique ID
   * @param prefix Optional display name (defaults to a Greek letter)
   */
  fresh(prefix?: string): TypeVar {
    const id = this.counter++;
    const name = prefix !== undefined ? `${prefix}${this.toSubscript(id)}` : this.generateName(id);

    return {
      kind: 'var',
      id,
      name,
    };
  }

  /**
   * Fresh variable that keeps `name` verbatim (scheme variables read from
   * configuration keep their written names)
   */
  named(name: string): TypeVar {
    return { kind: 'var', id: this.counter++, name };
  }

  /**
   * Create multiple fresh type variables
   */
  freshN(count: number, prefix?: string): TypeVar[] {
    return Array.from({ length: count }, () => this.fresh(prefix));
  }

  /**
   * Independent manager that continues numbering from this one
   */
  clone(): TypeVarManager {
    const copy = new TypeVarManager();
    copy.counter = this.counter;
    return copy;
  }

  /**
   * Number of variables handed out so far
   */
  get count(): number {
    return this.counter;
  }

  private generateName(id: number): string {
    const greekIndex = id % TypeVarManager.GREEK.length;
    const subscript = Math.floor(id / TypeVarManager.GREEK.length);
    const letter = TypeVarManager.GREEK[greekIndex] ?? 'τ';

    if (subscript === 0) {
      return letter;
    }
    return `${letter}${this.toSubscript(subscript)}`;
  }

  /**
   * Convert a number to Unicode subscript characters
   */
  private toSubscript(n: number): string {
    const subscripts = '₀₁₂₃₄₅₆₇₈₉';
    return n.toString().split('').map(d => subscripts[Number(d)] ?? d).join('');
  }
}
