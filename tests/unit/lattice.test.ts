/**
 * Tests for the subtype lattice
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SubtypeLattice } from '../../src/constraint/subtyping.js';
import { operator } from '../../src/types/factory.js';
import type { TypeOperator } from '../../src/types/types.js';
import { catchTypingError } from '../helpers/errors.js';

describe('SubtypeLattice', () => {
  let lattice: SubtypeLattice;
  let Val: TypeOperator;
  let Obj: TypeOperator;
  let Qlt: TypeOperator;
  let Nom: TypeOperator;
  let Ord: TypeOperator;
  let Itv: TypeOperator;
  let Ratio: TypeOperator;
  let Count: TypeOperator;
  let Bool: TypeOperator;

  beforeEach(() => {
    lattice = new SubtypeLattice();
    Val = lattice.declare(operator('Val'));
    Obj = lattice.declare(operator('Obj', { supertype: Val }));
    Qlt = lattice.declare(operator('Qlt', { supertype: Val }));
    Nom = lattice.declare(operator('Nom', { supertype: Qlt }));
    Bool = lattice.declare(operator('Bool', { supertype: Nom }));
    Ord = lattice.declare(operator('Ord', { supertype: Nom }));
    Itv = lattice.declare(operator('Itv', { supertype: Ord }));
    Ratio = lattice.declare(operator('Ratio', { supertype: Itv }));
    Count = lattice.declare(operator('Count', { supertype: Ratio }));
  });

  describe('isSubtype', () => {
    it('should be reflexive', () => {
      for (const op of lattice.operators()) {
        expect(lattice.isSubtype(op, op)).toBe(true);
      }
    });

    it('should be transitive', () => {
      expect(lattice.isSubtype(Count, Ratio)).toBe(true);
      expect(lattice.isSubtype(Ratio, Ord)).toBe(true);
      expect(lattice.isSubtype(Count, Ord)).toBe(true);
      expect(lattice.isSubtype(Count, Val)).toBe(true);
    });

    it('should not relate a supertype to its subtype', () => {
      expect(lattice.isSubtype(Ord, Ratio)).toBe(false);
      expect(lattice.isSubtype(Val, Obj)).toBe(false);
    });

    it('should not relate siblings', () => {
      expect(lattice.isSubtype(Bool, Ord)).toBe(false);
      expect(lattice.isSubtype(Obj, Qlt)).toBe(false);
    });
  });

  describe('ancestors', () => {
    it('should list the chain from the operator to its root', () => {
      expect(lattice.ancestors(Count).map(op => op.name)).toEqual(
        ['Count', 'Ratio', 'Itv', 'Ord', 'Nom', 'Qlt', 'Val']
      );
    });
  });

  describe('meetIsEmpty', () => {
    it('should hold for unrelated operators only', () => {
      expect(lattice.meetIsEmpty(Bool, Ord)).toBe(true);
      expect(lattice.meetIsEmpty(Obj, Count)).toBe(true);
      expect(lattice.meetIsEmpty(Nom, Ord)).toBe(false);
      expect(lattice.meetIsEmpty(Ratio, Ratio)).toBe(false);
    });
  });

  describe('leastUpperBoundBelow', () => {
    it('should return the more general of two related operators', () => {
      expect(lattice.leastUpperBoundBelow(Count, Ratio).name).toBe('Ratio');
      expect(lattice.leastUpperBoundBelow(Ratio, Count).name).toBe('Ratio');
    });

    it('should find the nearest common ancestor of siblings', () => {
      expect(lattice.leastUpperBoundBelow(Bool, Count).name).toBe('Nom');
      expect(lattice.leastUpperBoundBelow(Obj, Nom).name).toBe('Val');
    });

    it('should respect the ceiling', () => {
      expect(lattice.leastUpperBoundBelow(Bool, Count, Qlt).name).toBe('Nom');
      const error = catchTypingError(() => lattice.leastUpperBoundBelow(Obj, Nom, Qlt));
      expect(error.kind).toBe('NoCommonSupertype');
      expect(error.message).toBe('Common supertype Val of Obj and Nom is not below Qlt');
    });

    it('should fail for operators in different trees', () => {
      const Loose = lattice.declare(operator('Loose'));
      expect(catchTypingError(() => lattice.leastUpperBoundBelow(Loose, Obj)).kind).toBe('NoCommonSupertype');
    });
  });

  describe('declare', () => {
    it('should reject a redefinition', () => {
      expect(catchTypingError(() => lattice.declare(operator('Obj'))).kind).toBe('CyclicHierarchy');
    });

    it('should reject an operator that is its own supertype', () => {
      expect(catchTypingError(() => lattice.declare(operator('Loop', { supertype: 'Loop' }))).kind).toBe('CyclicHierarchy');
    });

    it('should reject an undeclared supertype', () => {
      expect(catchTypingError(() => lattice.declare(operator('Orphan', { supertype: 'Missing' }))).kind).toBe('MalformedConfiguration');
    });

    it('should look operators up by name', () => {
      expect(lattice.get('Itv')).toBe(Itv);
      expect(lattice.has('Itv')).toBe(true);
      expect(lattice.get('Missing')).toBeUndefined();
    });
  });
});
