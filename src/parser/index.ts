/**
 * Parser module exports
 */

export { parseExpression, formatExpression, identifiers } from './parser.js';
export type { Expression, IdentifierExpression, ApplicationExpression, Span } from './parser.js';

export { parseTypeText } from './type-parser.js';
export type { TypeSyntax } from './type-parser.js';
