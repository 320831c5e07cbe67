/**
 * Type Model - Main exports
 */

export type {
  TypeOperator,
  Type,
  TypeVar,
  ParametricType,
  FunctionType,
} from './types.js';

export {
  isTypeVar,
  isFunctionType,
  isParametric,
  containsTypeVar,
  freeTypeVars,
  occursIn,
  typeEquals,
  substituteTypeVars,
  arrowDepth,
} from './types.js';

export { operator, param, arrow, curried } from './factory.js';
export type { OperatorOptions } from './factory.js';
