/**
 * Expression Parser - Applicative expressions over operator names
 *
 * Grammar:
 *   expression := atom (ws atom)*          left-associative application
 *   atom       := identifier | '(' expression ')'
 *
 * Identifiers may contain letters, digits, '_', ':', '.' and '-', so
 * blank-node style names such as `_:source3` are accepted. Newlines count as
 * whitespace.
 */

import P from 'parsimmon';
import { TypingError } from '../constraint/errors.js';

// ============================================================================
// AST
// ============================================================================

/**
 * Character offsets into the source text, end exclusive
 */
export interface Span {
  readonly start: number;
  readonly end: number;
}

export type Expression = IdentifierExpression | ApplicationExpression;

export interface IdentifierExpression {
  readonly kind: 'identifier';
  readonly name: string;
  readonly span: Span;
}

export interface ApplicationExpression {
  readonly kind: 'application';
  readonly fn: Expression;
  readonly arg: Expression;
  readonly span: Span;
}

// ============================================================================
// Grammar
// ============================================================================

const IDENTIFIER = /[A-Za-z0-9_][A-Za-z0-9_:.\-]*/;

interface ExpressionLanguage {
  Expression: Expression;
  Atom: Expression;
  Identifier: IdentifierExpression;
  Parenthesised: Expression;
}

function token<T>(parser: P.Parser<T>): P.Parser<T> {
  return parser.skip(P.optWhitespace);
}

function spanOf(mark: P.Mark<unknown>): Span {
  return { start: mark.start.offset, end: mark.end.offset };
}

const grammar = P.createLanguage<ExpressionLanguage>({
  Expression: r =>
    P.seq(r.Atom, r.Atom.many()).map(([head, args]) =>
      args.reduce<Expression>(
        (fn, arg) => ({
          kind: 'application',
          fn,
          arg,
          span: { start: fn.span.start, end: arg.span.end },
        }),
        head
      )
    ),

  Atom: r => P.alt(r.Identifier, r.Parenthesised),

  Identifier: () =>
    token(
      P.regexp(IDENTIFIER)
        .mark()
        .map((m): IdentifierExpression => ({ kind: 'identifier', name: m.value, span: spanOf(m) }))
    ).desc('identifier'),

  Parenthesised: r =>
    token(
      P.string('(')
        .skip(P.optWhitespace)
        .then(r.Expression)
        .skip(P.string(')'))
        .mark()
        .map((m): Expression => ({ ...m.value, span: spanOf(m) }))
    ),
});

const program = P.optWhitespace.then(grammar.Expression);

// ============================================================================
// Entry points
// ============================================================================

/**
 * Parse expression text into an AST. Throws a ParseError TypingError.
 */
export function parseExpression(source: string): Expression {
  const result = program.parse(source);
  if (result.status) {
    return result.value;
  }
  throw new TypingError('ParseError', `Cannot parse expression: ${P.formatError(source, result)}`);
}

/**
 * Canonical text of an expression: single spaces, parentheses only around
 * applications in argument position.
 */
export function formatExpression(expression: Expression): string {
  if (expression.kind === 'identifier') {
    return expression.name;
  }
  const fn = formatExpression(expression.fn);
  const arg = expression.arg.kind === 'application'
    ? `(${formatExpression(expression.arg)})`
    : formatExpression(expression.arg);
  return `${fn} ${arg}`;
}

/**
 * Identifier nodes in left-to-right order
 */
export function identifiers(expression: Expression): IdentifierExpression[] {
  if (expression.kind === 'identifier') {
    return [expression];
  }
  return [...identifiers(expression.fn), ...identifiers(expression.arg)];
}
