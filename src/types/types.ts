/**
 * Type Model - Core type representation for the transformation algebra
 *
 * A type is one of:
 * - a type variable (placeholder bound during checking)
 * - a parametric type (a type operator applied to its arguments)
 * - a function type (domain → codomain, curried)
 *
 * Type operators are declared once, at configuration time, and are shared
 * by every checking call. Type variables never outlive a single call.
 */

// ============================================================================
// Type Operators
// ============================================================================

/**
 * A named type constructor, e.g. `Obj` (nullary) or `R2` (binary relation).
 */
export interface TypeOperator {
  readonly name: string;
  /** Number of type arguments the operator takes */
  readonly arity: number;
  /** Name of the direct supertype operator, if any */
  readonly supertype?: string;
  /** Rendering name; defaults to `name` (the R1/R2/R3 family renders as R) */
  readonly symbol?: string;
}

// ============================================================================
// Types
// ============================================================================

export type Type =
  | TypeVar
  | ParametricType
  | FunctionType
  ;

/**
 * A type variable. Identity is the numeric id; the name is for display only.
 */
export interface TypeVar {
  readonly kind: 'var';
  readonly id: number;
  readonly name: string;
}

/**
 * Application of a type operator to `operator.arity` arguments.
 */
export interface ParametricType {
  readonly kind: 'op';
  readonly operator: TypeOperator;
  readonly args: readonly Type[];
}

/**
 * Curried function type: input → output
 */
export interface FunctionType {
  readonly kind: 'fn';
  readonly input: Type;
  readonly output: Type;
}

// ============================================================================
// Type Utilities
// ============================================================================

export function isTypeVar(type: Type): type is TypeVar {
  return type.kind === 'var';
}

export function isFunctionType(type: Type): type is FunctionType {
  return type.kind === 'fn';
}

export function isParametric(type: Type): type is ParametricType {
  return type.kind === 'op';
}

/**
 * Check if a type contains any type variables
 */
export function containsTypeVar(type: Type): boolean {
  switch (type.kind) {
    case 'var':
      return true;
    case 'op':
      return type.args.some(containsTypeVar);
    case 'fn':
      return containsTypeVar(type.input) || containsTypeVar(type.output);
  }
}

/**
 * Collect the free type variables of a type, in order of first occurrence
 */
export function freeTypeVars(type: Type): TypeVar[] {
  const seen = new Set<number>();
  const result: TypeVar[] = [];

  function collect(t: Type): void {
    switch (t.kind) {
      case 'var':
        if (!seen.has(t.id)) {
          seen.add(t.id);
          result.push(t);
        }
        return;
      case 'op':
        t.args.forEach(collect);
        return;
      case 'fn':
        collect(t.input);
        collect(t.output);
        return;
    }
  }

  collect(type);
  return result;
}

/**
 * Does the variable with the given id occur in the type?
 * Callers are expected to have applied the substitution first.
 */
export function occursIn(varId: number, type: Type): boolean {
  switch (type.kind) {
    case 'var':
      return type.id === varId;
    case 'op':
      return type.args.some(a => occursIn(varId, a));
    case 'fn':
      return occursIn(varId, type.input) || occursIn(varId, type.output);
  }
}

/**
 * Structural equality. Operators compare by name; variables by id.
 */
export function typeEquals(a: Type, b: Type): boolean {
  if (a.kind === 'var' && b.kind === 'var') {
    return a.id === b.id;
  }
  if (a.kind === 'op' && b.kind === 'op') {
    return a.operator.name === b.operator.name &&
      a.args.length === b.args.length &&
      a.args.every((arg, i) => {
        const other = b.args[i];
        return other !== undefined && typeEquals(arg, other);
      });
  }
  if (a.kind === 'fn' && b.kind === 'fn') {
    return typeEquals(a.input, b.input) && typeEquals(a.output, b.output);
  }
  return false;
}

/**
 * Substitute type variables in a type according to a mapping.
 * Variables without an entry are left untouched.
 */
export function substituteTypeVars(type: Type, mapping: ReadonlyMap<number, Type>): Type {
  switch (type.kind) {
    case 'var':
      return mapping.get(type.id) ?? type;
    case 'op':
      if (type.args.length === 0) {
        return type;
      }
      return { ...type, args: type.args.map(a => substituteTypeVars(a, mapping)) };
    case 'fn':
      return {
        kind: 'fn',
        input: substituteTypeVars(type.input, mapping),
        output: substituteTypeVars(type.output, mapping),
      };
  }
}

/**
 * Number of curried arguments a type accepts (the depth of its arrow spine)
 */
export function arrowDepth(type: Type): number {
  let depth = 0;
  let current = type;
  while (current.kind === 'fn') {
    depth++;
    current = current.output;
  }
  return depth;
}
