/**
 * Signature Configuration - Build a lattice and signature table from JSON
 *
 *   {
 *     "operators":  [{ "name": "Ratio", "supertype": "Itv" }, { "name": "R2", "arity": 2, "symbol": "R" }],
 *     "signatures": {
 *       "ratio":  { "type": "Ratio -> Ratio -> Ratio" },
 *       "invert": [{ "type": "R2(Loc, Ord) -> R2(Ord, Reg)" }, { "type": "..." }]
 *     }
 *   }
 *
 * Inside type text, declared operator names denote operators and any other
 * identifier is a variable of that signature. Constraints refer to those
 * variables by name.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Type, TypeOperator, TypeVar } from '../types/types.js';
import { operator, param } from '../types/factory.js';
import type { Constraint } from '../constraint/types.js';
import { hasParam, memberOf, shapeLimit, subtypeBound } from '../constraint/factory.js';
import { SubtypeLattice } from '../constraint/subtyping.js';
import { TypeVarManager } from '../constraint/type-variable.js';
import { TypingError } from '../constraint/errors.js';
import { parseTypeText } from '../parser/type-parser.js';
import type { TypeSyntax } from '../parser/type-parser.js';
import type { Scheme } from './scheme.js';
import { dataInput, scheme } from './scheme.js';
import type { SignatureTable } from './table.js';
import { SignatureTableBuilder } from './table.js';

// ============================================================================
// Schema
// ============================================================================

export const OperatorSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
  supertype: z.string().optional(),
  arity: z.number().int().nonnegative().optional(),
  symbol: z.string().min(1).optional(),
});

export type OperatorSpec = z.infer<typeof OperatorSchema>;

export const ConstraintSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('subtype'),
    variable: z.string(),
    bound: z.string(),
  }),
  z.object({
    kind: z.literal('member-of'),
    variable: z.string(),
    alternatives: z.array(z.string()).min(1),
  }),
  z.object({
    kind: z.literal('has-param'),
    container: z.string(),
    param: z.string(),
    position: z.number().int().positive().optional(),
    operators: z.array(z.string()).default([]),
  }),
  z.object({
    kind: z.literal('shape'),
    variable: z.string(),
    patterns: z.array(z.string()).min(1),
  }),
]);

export type ConstraintSpec = z.infer<typeof ConstraintSchema>;

export const SignatureEntrySchema = z.object({
  type: z.string(),
  /** Prepend this many unconstrained data arguments */
  inputs: z.number().int().nonnegative().optional(),
  arity: z.number().int().nonnegative().optional(),
  constraints: z.array(ConstraintSchema).optional(),
});

export type SignatureEntry = z.infer<typeof SignatureEntrySchema>;

export const SignatureConfigSchema = z.object({
  operators: z.array(OperatorSchema),
  signatures: z.record(z.union([SignatureEntrySchema, z.array(SignatureEntrySchema).min(1)])),
});

export type SignatureConfig = z.infer<typeof SignatureConfigSchema>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Build a signature table from parsed JSON
 */
export function buildSignatureTable(json: unknown): SignatureTable {
  const parsed = SignatureConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new TypingError('MalformedConfiguration', `Invalid signature configuration: ${issues}`);
  }
  const config = parsed.data;

  const lattice = declareOperators(config.operators);
  const manager = new TypeVarManager();
  const builder = new SignatureTableBuilder(lattice);

  for (const [name, entry] of Object.entries(config.signatures)) {
    const entries = Array.isArray(entry) ? entry : [entry];
    builder.define(name, ...entries.map(e => schemeFromEntry(name, e, lattice, manager)));
  }
  return builder.build();
}

/**
 * Read and build a signature table from a JSON file
 */
export function loadSignatureTable(path: string): SignatureTable {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new TypingError('MalformedConfiguration', `${path} is not valid JSON: ${error.message}`);
    }
    throw error;
  }
  return buildSignatureTable(json);
}

// ============================================================================
// Operators
// ============================================================================

/**
 * Declare operators supertypes-first, whatever their order in the file
 */
function declareOperators(specs: readonly OperatorSpec[]): SubtypeLattice {
  const lattice = new SubtypeLattice();
  const byName = new Map<string, OperatorSpec>();
  for (const spec of specs) {
    if (byName.has(spec.name)) {
      throw new TypingError('CyclicHierarchy', `Operator ${spec.name} is already declared`);
    }
    byName.set(spec.name, spec);
  }

  const visiting = new Set<string>();
  const visit = (spec: OperatorSpec): void => {
    if (lattice.has(spec.name)) {
      return;
    }
    if (visiting.has(spec.name)) {
      throw new TypingError('CyclicHierarchy', `Supertype chain of ${spec.name} is cyclic`);
    }
    visiting.add(spec.name);
    const parent = spec.supertype !== undefined ? byName.get(spec.supertype) : undefined;
    if (parent !== undefined) {
      visit(parent);
    }
    lattice.declare(operator(spec.name, spec));
    visiting.delete(spec.name);
  };
  specs.forEach(visit);

  return lattice;
}

// ============================================================================
// Signatures
// ============================================================================

/**
 * Resolves type text for one signature; variables are shared across the
 * type and its constraints.
 */
class SchemeScope {
  private readonly variables = new Map<string, TypeVar>();

  constructor(
    private readonly owner: string,
    private readonly lattice: SubtypeLattice,
    private readonly manager: TypeVarManager
  ) {}

  type(text: string): Type {
    return this.resolve(parseTypeText(text));
  }

  variable(name: string): TypeVar {
    if (this.lattice.has(name)) {
      throw new TypingError(
        'MalformedConfiguration',
        `Constraint of ${this.owner} names operator ${name} where a variable is expected`
      );
    }
    let tv = this.variables.get(name);
    if (tv === undefined) {
      tv = this.manager.named(name);
      this.variables.set(name, tv);
    }
    return tv;
  }

  operator(name: string): TypeOperator {
    const op = this.lattice.get(name);
    if (op === undefined) {
      throw new TypingError('MalformedConfiguration', `Signature of ${this.owner} uses unknown operator ${name}`);
    }
    return op;
  }

  private resolve(syntax: TypeSyntax): Type {
    switch (syntax.kind) {
      case 'name': {
        const op = this.lattice.get(syntax.name);
        return op !== undefined ? param(op) : this.variable(syntax.name);
      }
      case 'apply':
        return param(this.operator(syntax.name), ...syntax.args.map(a => this.resolve(a)));
      case 'arrow':
        return { kind: 'fn', input: this.resolve(syntax.input), output: this.resolve(syntax.output) };
    }
  }
}

function schemeFromEntry(
  name: string,
  entry: SignatureEntry,
  lattice: SubtypeLattice,
  manager: TypeVarManager
): Scheme {
  const scope = new SchemeScope(name, lattice, manager);
  const type = scope.type(entry.type);
  const constraints = (entry.constraints ?? []).map(c => constraintFromSpec(c, scope));

  if (entry.inputs !== undefined) {
    if (constraints.length > 0 || entry.arity !== undefined) {
      throw new TypingError('MalformedConfiguration', `Data input ${name} cannot carry constraints or an arity`);
    }
    return dataInput(name, type, entry.inputs, manager);
  }
  return scheme(name, type, {
    ...(entry.arity !== undefined ? { arity: entry.arity } : {}),
    constraints,
  });
}

function constraintFromSpec(spec: ConstraintSpec, scope: SchemeScope): Constraint {
  switch (spec.kind) {
    case 'subtype':
      return subtypeBound(scope.variable(spec.variable), scope.type(spec.bound));
    case 'member-of':
      return memberOf(scope.variable(spec.variable), ...spec.alternatives.map(a => scope.type(a)));
    case 'has-param':
      return hasParam(scope.variable(spec.container), scope.type(spec.param), {
        ...(spec.position !== undefined ? { position: spec.position } : {}),
        operators: spec.operators.map(o => scope.operator(o)),
      });
    case 'shape':
      return shapeLimit(scope.variable(spec.variable), ...spec.patterns.map(p => scope.type(p)));
  }
}
