/**
 * Tests for type schemes, signature tables and catalog configuration
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { dataInput, instantiate, scheme } from '../../src/signature/scheme.js';
import { SignatureTableBuilder } from '../../src/signature/table.js';
import { buildSignatureTable, loadSignatureTable } from '../../src/signature/config.js';
import { cctCatalogPath } from '../../src/catalog/index.js';
import { TypeVarManager } from '../../src/constraint/type-variable.js';
import { subtypeBound, shapeLimit } from '../../src/constraint/factory.js';
import { arrow, operator, param } from '../../src/types/factory.js';
import { freeTypeVars } from '../../src/types/types.js';
import { formatType } from '../../src/output/formatter.js';
import { catchTypingError } from '../helpers/errors.js';
import { valueLattice } from '../helpers/lattice.js';
import type { ValueLattice } from '../helpers/lattice.js';

describe('Type Schemes', () => {
  let v: ValueLattice;
  let manager: TypeVarManager;

  beforeEach(() => {
    v = valueLattice();
    manager = new TypeVarManager();
  });

  describe('scheme', () => {
    it('should default the arity to the curried argument count', () => {
      const s = scheme('ratio', arrow(param(v.Ratio), param(v.Ratio), param(v.Ratio)));
      expect(s.arity).toBe(2);
      expect(Object.isFrozen(s)).toBe(true);
      expect(Object.isFrozen(s.constraints)).toBe(true);
    });

    it('should accept a smaller declared arity', () => {
      const s = scheme('ratio', arrow(param(v.Ratio), param(v.Ratio), param(v.Ratio)), { arity: 1 });
      expect(s.arity).toBe(1);
    });

    it('should reject an arity beyond the signature', () => {
      const error = catchTypingError(() => scheme('merge', arrow(param(v.R1, param(v.Reg)), param(v.Reg)), { arity: 2 }));
      expect(error.kind).toBe('UndefinedOperatorArity');
      expect(error.message).toBe('Operator merge declares 2 argument(s) but its type accepts 1');
    });

    it('should quantify variables that only occur in constraints', () => {
      const rel = manager.named('rel');
      const q = manager.named('q');
      const q1 = manager.named('q1');
      const s = scheme('group', arrow(rel, q), {
        constraints: [subtypeBound(q, param(v.Qlt)), shapeLimit(rel, param(v.R2, param(v.Obj), q1))],
      });
      expect(s.variables.map(tv => tv.name)).toEqual(['rel', 'q', 'q1']);
    });
  });

  describe('instantiate', () => {
    it('should give every instantiation its own variables', () => {
      const x = manager.named('x');
      const s = scheme('get', arrow(param(v.R1, x), x), { constraints: [subtypeBound(x, param(v.Val))] });

      const callManager = new TypeVarManager();
      const first = instantiate(s, callManager);
      const second = instantiate(s, callManager);

      expect(formatType(first.type)).toBe('R(x₀) -> x₀');
      expect(formatType(second.type)).toBe('R(x₁) -> x₁');
      const [firstVar] = freeTypeVars(first.type);
      const [constraint] = first.constraints;
      expect(constraint?.kind === 'subtype-bound' && constraint.variable.id).toBe(firstVar?.id);
    });

    it('should leave the scheme untouched', () => {
      const x = manager.named('x');
      const s = scheme('get', arrow(param(v.R1, x), x));
      instantiate(s, new TypeVarManager());
      expect(formatType(s.type)).toBe('R(x) -> x');
    });
  });

  describe('dataInput', () => {
    it('should prepend unconstrained inputs', () => {
      const s = dataInput('field', param(v.R2, param(v.Obj), param(v.Ratio)), 1, manager);
      expect(s.arity).toBe(1);
      expect(formatType(instantiate(s, new TypeVarManager()).type)).toBe('in₀ -> R(Obj,Ratio)');
    });

    it('should be the bare type without inputs', () => {
      const s = dataInput('in', param(v.Nom), 0, manager);
      expect(s.arity).toBe(0);
      expect(formatType(s.type)).toBe('Nom');
    });
  });
});

describe('SignatureTableBuilder', () => {
  let v: ValueLattice;

  beforeEach(() => {
    v = valueLattice();
  });

  it('should build an immutable table of alternatives', () => {
    const table = new SignatureTableBuilder(v.lattice)
      .define('ratio', scheme('ratio', arrow(param(v.Ratio), param(v.Ratio), param(v.Ratio))))
      .define(
        'flip',
        scheme('flip', arrow(param(v.Ord), param(v.Reg))),
        scheme('flip', arrow(param(v.Nom), param(v.Obj)))
      )
      .build();

    expect(table.names()).toEqual(['ratio', 'flip']);
    expect(table.size).toBe(2);
    expect(table.lookup('flip')).toHaveLength(2);
    expect(table.isOverloaded('flip')).toBe(true);
    expect(table.isOverloaded('ratio')).toBe(false);
    expect(table.lookup('missing')).toBeUndefined();
    expect(Object.isFrozen(table.lookup('ratio'))).toBe(true);
  });

  it('should reject a name defined twice', () => {
    const builder = new SignatureTableBuilder(v.lattice).define('eq', scheme('eq', arrow(param(v.Val), param(v.Bool))));
    const error = catchTypingError(() => builder.define('eq', scheme('eq', arrow(param(v.Val), param(v.Bool)))));
    expect(error.kind).toBe('MalformedConfiguration');
    expect(error.message).toBe('Operator eq is defined twice');
  });

  it('should reject undeclared type operators', () => {
    const Ghost = operator('Ghost');
    const error = catchTypingError(() =>
      new SignatureTableBuilder(v.lattice).define('haunt', scheme('haunt', arrow(param(Ghost), param(v.Obj))))
    );
    expect(error.message).toBe('Signature of haunt uses undeclared type operator Ghost');
  });
});

describe('Signature configuration', () => {
  const operators = [
    { name: 'Count', supertype: 'Ratio' },
    { name: 'Ratio', supertype: 'Val' },
    { name: 'Val' },
    { name: 'R1', arity: 1, symbol: 'R' },
  ];

  it('should declare operators supertypes first regardless of order', () => {
    const table = buildSignatureTable({ operators, signatures: {} });
    const Count = table.lattice.get('Count');
    const Val = table.lattice.get('Val');
    expect(Count !== undefined && Val !== undefined && table.lattice.isSubtype(Count, Val)).toBe(true);
  });

  it('should treat undeclared names in type text as variables shared with constraints', () => {
    const table = buildSignatureTable({
      operators,
      signatures: {
        get: { type: 'R1(x) -> x', constraints: [{ kind: 'subtype', variable: 'x', bound: 'Val' }] },
      },
    });
    const [get] = table.lookup('get') ?? [];
    expect(get !== undefined && formatType(get.type)).toBe('R(x) -> x');
    const [typeVar] = get !== undefined ? freeTypeVars(get.type) : [];
    const [constraint] = get?.constraints ?? [];
    expect(constraint?.kind === 'subtype-bound' && constraint.variable.id).toBe(typeVar?.id);
  });

  it('should build overloads from an array of entries', () => {
    const table = buildSignatureTable({
      operators,
      signatures: { widen: [{ type: 'Count -> Ratio' }, { type: 'Ratio -> Val' }] },
    });
    expect(table.lookup('widen')?.map(s => formatType(s.type))).toEqual(['Count -> Ratio', 'Ratio -> Val']);
  });

  it('should detect cycles in the hierarchy', () => {
    const error = catchTypingError(() => buildSignatureTable({
      operators: [{ name: 'A', supertype: 'B' }, { name: 'B', supertype: 'A' }],
      signatures: {},
    }));
    expect(error.kind).toBe('CyclicHierarchy');
    expect(error.message).toBe('Supertype chain of A is cyclic');
  });

  it('should reject duplicate operators', () => {
    const error = catchTypingError(() => buildSignatureTable({
      operators: [{ name: 'A' }, { name: 'A' }],
      signatures: {},
    }));
    expect(error.kind).toBe('CyclicHierarchy');
  });

  it('should reject an unknown supertype', () => {
    const error = catchTypingError(() => buildSignatureTable({
      operators: [{ name: 'A', supertype: 'Missing' }],
      signatures: {},
    }));
    expect(error.kind).toBe('MalformedConfiguration');
    expect(error.message).toBe('Supertype Missing of A is not declared');
  });

  it('should reject data that does not match the schema', () => {
    const error = catchTypingError(() => buildSignatureTable({ operators: [{ arity: 1 }], signatures: {} }));
    expect(error.kind).toBe('MalformedConfiguration');
    expect(error.message.startsWith('Invalid signature configuration: operators.0.name:')).toBe(true);
  });

  it('should report an arity larger than the signature', () => {
    const error = catchTypingError(() => buildSignatureTable({
      operators,
      signatures: { f: { type: 'Ratio -> Count', arity: 3 } },
    }));
    expect(error.kind).toBe('UndefinedOperatorArity');
  });

  it('should reject an operator applied to the wrong number of arguments', () => {
    const error = catchTypingError(() => buildSignatureTable({
      operators,
      signatures: { f: { type: 'R1(Ratio, Count) -> Count' } },
    }));
    expect(error.kind).toBe('MalformedConfiguration');
    expect(error.message).toBe('Operator R1 takes 1 argument(s), got 2');
  });

  it('should reject an application of an undeclared operator', () => {
    const error = catchTypingError(() => buildSignatureTable({
      operators,
      signatures: { f: { type: 'R9(x) -> x' } },
    }));
    expect(error.message).toBe('Signature of f uses unknown operator R9');
  });

  it('should reject a constraint on an operator name', () => {
    const error = catchTypingError(() => buildSignatureTable({
      operators,
      signatures: { f: { type: 'x -> x', constraints: [{ kind: 'subtype', variable: 'Count', bound: 'Val' }] } },
    }));
    expect(error.message).toBe('Constraint of f names operator Count where a variable is expected');
  });

  it('should report malformed type text as a parse error', () => {
    const error = catchTypingError(() => buildSignatureTable({
      operators,
      signatures: { f: { type: 'Ratio -> ' } },
    }));
    expect(error.kind).toBe('ParseError');
  });

  it('should load the CCT catalog from disk', () => {
    const table = loadSignatureTable(cctCatalogPath);
    expect(table.size).toBe(55);
    expect(table.lattice.operators()).toHaveLength(14);
    expect(table.isOverloaded('invert')).toBe(true);
    expect(table.isOverloaded('revert')).toBe(true);
    expect(table.isOverloaded('select')).toBe(false);
  });

  it('should report a missing file', () => {
    expect(() => loadSignatureTable('/nonexistent/catalog.json')).toThrow(/ENOENT/);
  });
});
