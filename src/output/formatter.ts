/**
 * Type Formatter - Converts types, constraints and check results to text
 *
 * Canonical type text:
 *   Obj                      nullary operator
 *   R(Obj,Ratio)             parametric type (operator symbol, no spaces)
 *   Ratio -> Ratio -> Bool   curried function, right-associative
 *   (Reg -> R(Loc)) -> Reg   function-typed inputs are parenthesised
 */

import type { Type } from '../types/types.js';
import type { Constraint } from '../constraint/types.js';
import type { TypingError } from '../constraint/errors.js';
import type { CheckResult } from '../checker/checker.js';

export interface FormatOptions {
  /** Separator between operator arguments */
  argumentSeparator?: string;
  /** Arrow between function input and output */
  arrow?: string;
}

const DEFAULT_FORMAT_OPTIONS: Required<FormatOptions> = {
  argumentSeparator: ',',
  arrow: ' -> ',
};

/**
 * Format a type to its canonical string representation
 */
export function formatType(type: Type, options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  return formatTypeInternal(type, opts);
}

function formatTypeInternal(type: Type, opts: Required<FormatOptions>): string {
  switch (type.kind) {
    case 'var':
      return type.name;
    case 'op': {
      const symbol = type.operator.symbol ?? type.operator.name;
      if (type.args.length === 0) {
        return symbol;
      }
      const args = type.args.map(a => formatTypeInternal(a, opts)).join(opts.argumentSeparator);
      return `${symbol}(${args})`;
    }
    case 'fn': {
      const input = formatTypeInternal(type.input, opts);
      const output = formatTypeInternal(type.output, opts);
      return type.input.kind === 'fn'
        ? `(${input})${opts.arrow}${output}`
        : `${input}${opts.arrow}${output}`;
    }
  }
}

/**
 * Format a constraint for diagnostics
 */
export function formatConstraint(constraint: Constraint): string {
  switch (constraint.kind) {
    case 'subtype-bound':
      return `${constraint.variable.name} ≤ ${formatType(constraint.bound)}`;
    case 'member-of':
      return `${constraint.variable.name} ∈ {${constraint.alternatives.map(t => formatType(t)).join(', ')}}`;
    case 'has-param': {
      const at = constraint.position !== undefined ? ` at ${constraint.position}` : '';
      return `${constraint.container.name} has ${formatType(constraint.param)}${at}`;
    }
    case 'shape-limit':
      return `${constraint.variable.name} ~ ${constraint.patterns.map(t => formatType(t)).join(' | ')}`;
  }
}

/**
 * One-line description of a typing error
 */
export function formatError(error: TypingError): string {
  const where = error.subexpression !== undefined ? ` (in "${error.subexpression}")` : '';
  return `${error.kind}: ${error.message}${where}`;
}

/**
 * Machine-readable rendering of a check result
 */
export function formatResultJSON(expression: string, result: CheckResult): string {
  if (result.success) {
    return JSON.stringify({ expression, type: result.text }, null, 2);
  }
  const { error } = result;
  return JSON.stringify({
    expression,
    error: {
      kind: error.kind,
      message: error.message,
      types: error.types.map(t => formatType(t)),
      ...(error.constraint !== undefined ? { constraint: formatConstraint(error.constraint) } : {}),
      ...(error.subexpression !== undefined ? { subexpression: error.subexpression } : {}),
    },
  }, null, 2);
}
