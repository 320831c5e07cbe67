/**
 * Expression Checker - Infers the type of an applicative expression
 *
 * The expression is folded left to right. Every operator reference is
 * instantiated fresh; an unknown name stands for a piece of data of unknown
 * type. At each application the argument must be a subtype of the head's
 * domain, after which the live constraints are solved to a fixpoint.
 *
 * Overloaded names fork the check, one branch per alternative; a branch is
 * dropped at its first failure:
 * - exactly one succeeds: that is the result
 * - none succeeds: the failure that got furthest is reported
 * - several succeed: AmbiguousOverload
 */

import type { Type } from '../types/types.js';
import { containsTypeVar, isFunctionType } from '../types/types.js';
import { TypingError, isTypingError } from '../constraint/errors.js';
import type { Expression, IdentifierExpression } from '../parser/parser.js';
import { formatExpression, parseExpression } from '../parser/parser.js';
import { instantiate } from '../signature/scheme.js';
import type { SignatureTable } from '../signature/table.js';
import { formatType } from '../output/formatter.js';
import { CheckContext } from './context.js';

/**
 * Configuration for the checker
 */
export interface CheckerConfig {
  /** Accept results that still contain free type variables */
  allowPartial: boolean;
  /** Fixpoint round limit; defaults to the number of live variables + 1 */
  maxFixpointRounds?: number;
}

const DEFAULT_CONFIG: CheckerConfig = {
  allowPartial: false,
};

export type CheckResult =
  | { success: true; type: Type; text: string }
  | { success: false; error: TypingError }
  ;

/** A branch that got through a subexpression */
interface Branch {
  readonly context: CheckContext;
  readonly type: Type;
}

interface Failure {
  readonly context: CheckContext;
  readonly error: TypingError;
}

/** Alternatives to take at the next overloaded identifiers, consumed in visiting order */
type Plan = number[];

export class ExpressionChecker {
  private readonly config: CheckerConfig;

  constructor(readonly table: SignatureTable, config: Partial<CheckerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Check an expression; typing failures are returned, not thrown
   */
  check(expression: string | Expression, options: Partial<CheckerConfig> = {}): CheckResult {
    try {
      const type = this.run(expression, { ...this.config, ...options });
      return { success: true, type, text: formatType(type) };
    } catch (error) {
      if (isTypingError(error)) {
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Check an expression and return its type; throws TypingError on failure
   */
  infer(expression: string | Expression, options: Partial<CheckerConfig> = {}): Type {
    const result = this.check(expression, options);
    if (!result.success) {
      throw result.error;
    }
    return result.type;
  }

  private run(expression: string | Expression, config: CheckerConfig): Type {
    const ast = typeof expression === 'string' ? parseExpression(expression) : expression;
    const context = CheckContext.start(this.table.lattice, {
      ...(config.maxFixpointRounds !== undefined ? { maxRounds: config.maxFixpointRounds } : {}),
    });

    const failures: Failure[] = [];
    const successes: Type[] = [];
    for (const branch of this.checkNode(ast, context, failures)) {
      const type = branch.context.substitution.apply(branch.type);
      if (!config.allowPartial && containsTypeVar(type)) {
        failures.push({
          context: branch.context,
          error: new TypingError(
            'UnresolvedType',
            `Result type ${formatType(type)} is not fully determined`,
            { types: [type], subexpression: formatExpression(ast) }
          ),
        });
      } else {
        successes.push(type);
      }
    }

    const [first] = successes;
    if (first !== undefined && successes.length === 1) {
      return first;
    }
    if (successes.length > 1) {
      throw new TypingError(
        'AmbiguousOverload',
        `${successes.length} overload combinations type-check: ${successes.map(t => formatType(t)).join('; ')}`,
        { types: successes, subexpression: formatExpression(ast) }
      );
    }
    throw furthestFailure(failures);
  }

  /**
   * Branches that type-check `node`; failed branches are recorded and dropped.
   *
   * The argument of an application is explored once, under the first head
   * branch that reaches it. Other head branches replay only the choices that
   * succeeded there, since head and argument share no variables.
   */
  private checkNode(node: Expression, context: CheckContext, failures: Failure[], plan?: Plan): Branch[] {
    if (node.kind === 'identifier') {
      return this.checkIdentifier(node, context, failures, plan);
    }

    const branches: Branch[] = [];
    let argPlans: Plan[] | undefined;
    for (const head of this.checkNode(node.fn, context, failures, plan)) {
      const fnType = head.context.substitution.resolve(head.type);
      if (!isFunctionType(fnType)) {
        const type = head.context.substitution.apply(fnType);
        failures.push({
          context: head.context,
          error: new TypingError(
            'ArityMismatch',
            `${formatExpression(node.fn)} has type ${formatType(type)} and takes no further argument`,
            { types: [type], subexpression: formatExpression(node) }
          ),
        });
        continue;
      }

      let args: Branch[];
      if (argPlans === undefined) {
        const offset = head.context.choices.length;
        args = this.checkNode(node.arg, head.context, failures, plan);
        argPlans = args.map(arg => arg.context.choices.slice(offset));
      } else {
        const plans = argPlans;
        args = plans.flatMap((argPlan, i) => {
          const replay = i === plans.length - 1 ? head.context : head.context.fork();
          return this.checkNode(node.arg, replay, failures, [...argPlan]);
        });
      }

      for (const arg of args) {
        try {
          arg.context.unifier.subtype(arg.type, fnType.input);
          arg.context.solver.solve();
        } catch (error) {
          if (isTypingError(error)) {
            failures.push({ context: arg.context, error: error.locate(formatExpression(node)) });
            continue;
          }
          throw error;
        }
        arg.context.applications++;
        branches.push({ context: arg.context, type: fnType.output });
      }
    }
    return branches;
  }

  private checkIdentifier(
    node: IdentifierExpression,
    context: CheckContext,
    failures: Failure[],
    plan?: Plan
  ): Branch[] {
    const schemes = this.table.lookup(node.name);
    if (schemes === undefined) {
      return [{ context, type: context.manager.fresh() }];
    }

    const overloaded = schemes.length > 1;
    const planned = overloaded ? plan?.shift() : undefined;
    const alternatives = overloaded && planned === undefined
      ? schemes.map((_, i) => i)
      : [planned ?? 0];
    const forks = alternatives.map((alternative, i) => ({
      alternative,
      context: i === 0 ? context : context.fork(),
    }));

    const branches: Branch[] = [];
    for (const { alternative, context: branch } of forks) {
      const scheme = schemes[alternative];
      if (scheme === undefined) {
        continue;
      }
      if (overloaded) {
        branch.choices.push(alternative);
      }
      const instance = instantiate(scheme, branch.manager);
      branch.solver.add(...instance.constraints);
      try {
        branch.solver.solve();
      } catch (error) {
        if (isTypingError(error)) {
          failures.push({ context: branch, error: error.locate(node.name) });
          continue;
        }
        throw error;
      }
      branches.push({ context: branch, type: instance.type });
    }
    return branches;
  }
}

/**
 * The failure with the most completed applications; the first on ties
 */
function furthestFailure(failures: readonly Failure[]): TypingError {
  let best: { error: TypingError; progress: number } | undefined;
  for (const { context, error } of failures) {
    if (best === undefined || context.applications > best.progress) {
      best = { error, progress: context.applications };
    }
  }
  if (best === undefined) {
    throw new Error('No branch was checked');
  }
  return best.error;
}

/**
 * One-shot convenience wrapper
 */
export function checkExpression(
  table: SignatureTable,
  expression: string | Expression,
  config?: Partial<CheckerConfig>
): CheckResult {
  return new ExpressionChecker(table, config).check(expression);
}

export { DEFAULT_CONFIG as DEFAULT_CHECKER_CONFIG };
