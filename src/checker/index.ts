/**
 * Checker module exports
 */

export { ExpressionChecker, checkExpression, DEFAULT_CHECKER_CONFIG } from './checker.js';
export type { CheckerConfig, CheckResult } from './checker.js';
export { CheckContext } from './context.js';
