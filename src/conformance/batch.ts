/**
 * Batch Conformance - Check many expressions against expected outcomes
 *
 * Case file format:
 *   [
 *     { "expression": "pi1 (objectregions xs)", "expect": { "type": "R(Obj)" } },
 *     { "expression": "invert (field x)",       "expect": { "error": "AmbiguousOverload" } },
 *     { "expression": "reify (deify x)",        "expect": { "resolved": true } }
 *   ]
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { TYPING_ERROR_KINDS, TypingError } from '../constraint/errors.js';
import type { ExpressionChecker, CheckResult } from '../checker/checker.js';

// ============================================================================
// Schema
// ============================================================================

export const ExpectationSchema = z.union([
  z.object({ type: z.string() }).strict(),
  z.object({ error: z.enum(TYPING_ERROR_KINDS) }).strict(),
  z.object({ resolved: z.literal(true) }).strict(),
]);

export type Expectation = z.infer<typeof ExpectationSchema>;

export const ConformanceCaseSchema = z.object({
  expression: z.string().min(1),
  expect: ExpectationSchema,
  description: z.string().optional(),
});

export type ConformanceCase = z.infer<typeof ConformanceCaseSchema>;

export const ConformanceFileSchema = z.array(ConformanceCaseSchema);

// ============================================================================
// Running
// ============================================================================

export interface CaseOutcome {
  readonly case: ConformanceCase;
  readonly passed: boolean;
  /** What was expected, as text */
  readonly expected: string;
  /** What the checker produced: a type text or an error kind */
  readonly actual: string;
  readonly result: CheckResult;
}

export interface ConformanceReport {
  readonly outcomes: readonly CaseOutcome[];
  readonly passed: number;
  readonly failed: number;
}

/**
 * Check every case independently; one failing case does not affect others
 */
export function runConformance(checker: ExpressionChecker, cases: readonly ConformanceCase[]): ConformanceReport {
  const outcomes = cases.map(c => evaluate(checker, c));
  const passed = outcomes.filter(o => o.passed).length;
  return { outcomes, passed, failed: outcomes.length - passed };
}

function evaluate(checker: ExpressionChecker, testCase: ConformanceCase): CaseOutcome {
  const { expect: expectation } = testCase;
  const result = checker.check(testCase.expression);
  const actual = result.success ? result.text : result.error.kind;

  let passed: boolean;
  let expected: string;
  if ('type' in expectation) {
    expected = expectation.type;
    passed = result.success && result.text === expectation.type;
  } else if ('error' in expectation) {
    expected = expectation.error;
    passed = !result.success && result.error.kind === expectation.error;
  } else {
    expected = 'a fully resolved type';
    passed = result.success;
  }

  return { case: testCase, passed, expected, actual, result };
}

/**
 * Read a JSON case file
 */
export function loadConformanceCases(path: string): ConformanceCase[] {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new TypingError('MalformedConfiguration', `${path} is not valid JSON: ${error.message}`);
    }
    throw error;
  }
  const parsed = ConformanceFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new TypingError('MalformedConfiguration', `Invalid conformance cases in ${path}: ${issues}`);
  }
  return parsed.data;
}
