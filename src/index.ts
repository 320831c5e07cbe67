/**
 * Transformation algebra type checker
 *
 * Declare type operators and operator signatures, then infer the types of
 * applicative expressions built from them.
 */

export * from './types/index.js';
export * from './constraint/index.js';
export * from './signature/index.js';
export * from './parser/index.js';
export * from './checker/index.js';
export * from './output/index.js';
export * from './conformance/index.js';
export * from './catalog/index.js';
