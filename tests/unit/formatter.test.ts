/**
 * Tests for type, constraint and result formatting
 */

import { describe, it, expect } from 'vitest';
import { formatConstraint, formatError, formatResultJSON, formatType } from '../../src/output/formatter.js';
import { TypeVarManager } from '../../src/constraint/type-variable.js';
import { hasParam, memberOf, shapeLimit, subtypeBound } from '../../src/constraint/factory.js';
import { TypingError } from '../../src/constraint/errors.js';
import { arrow, param } from '../../src/types/factory.js';
import { valueLattice } from '../helpers/lattice.js';

describe('Formatter', () => {
  const v = valueLattice();

  describe('formatType', () => {
    it('should render nullary operators by name', () => {
      expect(formatType(param(v.Ratio))).toBe('Ratio');
    });

    it('should render relations by symbol without spaces', () => {
      expect(formatType(param(v.R2, param(v.Obj), param(v.Ratio)))).toBe('R(Obj,Ratio)');
    });

    it('should render curried functions right-associatively', () => {
      expect(formatType(arrow(param(v.Ratio), param(v.Ratio), param(v.Ratio)))).toBe('Ratio -> Ratio -> Ratio');
    });

    it('should parenthesise function inputs', () => {
      const reifyType = arrow(param(v.Reg), param(v.R1, param(v.Obj)));
      expect(formatType(arrow(reifyType, param(v.Reg)))).toBe('(Reg -> R(Obj)) -> Reg');
    });

    it('should render variables by name', () => {
      const x = new TypeVarManager().fresh('x');
      expect(formatType(param(v.R1, x))).toBe('R(x₀)');
    });

    it('should honour formatting options', () => {
      const type = arrow(param(v.R2, param(v.Obj), param(v.Reg)), param(v.Reg));
      expect(formatType(type, { argumentSeparator: ', ', arrow: ' → ' })).toBe('R(Obj, Reg) → Reg');
    });
  });

  describe('formatConstraint', () => {
    const manager = new TypeVarManager();
    const x = manager.fresh('x');
    const c = manager.fresh('c');

    it('should render each constraint kind', () => {
      expect(formatConstraint(subtypeBound(x, param(v.Qlt)))).toBe('x₀ ≤ Qlt');
      expect(formatConstraint(memberOf(x, param(v.Ratio), param(v.Count)))).toBe('x₀ ∈ {Ratio, Count}');
      expect(formatConstraint(hasParam(c, x, { position: 2 }))).toBe('c₁ has x₀ at 2');
      expect(formatConstraint(hasParam(c, x))).toBe('c₁ has x₀');
      expect(formatConstraint(shapeLimit(c, param(v.R1, x), param(v.R2, x, param(v.Nom))))).toBe('c₁ ~ R(x₀) | R(x₀,Nom)');
    });
  });

  describe('formatError', () => {
    it('should include the kind and the subexpression', () => {
      const error = new TypingError('SubtypeMismatch', 'Nom is not a subtype of Ord', { subexpression: 'leq x' });
      expect(formatError(error)).toBe('SubtypeMismatch: Nom is not a subtype of Ord (in "leq x")');
    });

    it('should omit a missing subexpression', () => {
      expect(formatError(new TypingError('UnresolvedType', 'Result type α is not fully determined'))).toBe(
        'UnresolvedType: Result type α is not fully determined'
      );
    });
  });

  describe('formatResultJSON', () => {
    it('should render a successful result', () => {
      const type = param(v.R1, param(v.Obj));
      const json = formatResultJSON('pi1 (objects x)', { success: true, type, text: formatType(type) });
      expect(JSON.parse(json)).toEqual({ expression: 'pi1 (objects x)', type: 'R(Obj)' });
    });

    it('should render a failure with its details', () => {
      const error = new TypingError('SubtypeMismatch', 'Nom is not a subtype of Ord', {
        types: [param(v.Nom), param(v.Ord)],
        subexpression: 'leq n',
      });
      expect(JSON.parse(formatResultJSON('leq n', { success: false, error }))).toEqual({
        expression: 'leq n',
        error: {
          kind: 'SubtypeMismatch',
          message: 'Nom is not a subtype of Ord',
          types: ['Nom', 'Ord'],
          subexpression: 'leq n',
        },
      });
    });
  });
});
