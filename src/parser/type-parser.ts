/**
 * Type Text Parser
 *
 *   type := app ('->' type)?
 *   app  := Name '(' type (',' type)* ')' | Name | '(' type ')'
 *
 * The result is plain syntax; whether a name is an operator or a variable is
 * decided by whoever resolves it against a lattice.
 */

import P from 'parsimmon';
import { TypingError } from '../constraint/errors.js';

export type TypeSyntax =
  | { readonly kind: 'name'; readonly name: string }
  | { readonly kind: 'apply'; readonly name: string; readonly args: readonly TypeSyntax[] }
  | { readonly kind: 'arrow'; readonly input: TypeSyntax; readonly output: TypeSyntax }
  ;

interface TypeLanguage {
  Type: TypeSyntax;
  App: TypeSyntax;
  Named: TypeSyntax;
  Name: string;
}

const token = <T>(parser: P.Parser<T>): P.Parser<T> => parser.skip(P.optWhitespace);
const symbol = (text: string): P.Parser<string> => token(P.string(text));

const grammar = P.createLanguage<TypeLanguage>({
  Type: r =>
    P.seq(r.App, symbol('->').then(r.Type).atMost(1)).map(([input, rest]): TypeSyntax => {
      const [output] = rest;
      return output === undefined ? input : { kind: 'arrow', input, output };
    }),

  App: r => P.alt(r.Named, r.Type.wrap(symbol('('), symbol(')'))),

  Named: r =>
    P.seq(r.Name, r.Type.sepBy1(symbol(',')).wrap(symbol('('), symbol(')')).atMost(1)).map(
      ([name, argLists]): TypeSyntax => {
        const [args] = argLists;
        return args === undefined ? { kind: 'name', name } : { kind: 'apply', name, args };
      }
    ),

  Name: () => token(P.regexp(/[A-Za-z_][A-Za-z0-9_]*/)).desc('type name'),
});

const typeText = P.optWhitespace.then(grammar.Type);

export function parseTypeText(source: string): TypeSyntax {
  const result = typeText.parse(source);
  if (result.status) {
    return result.value;
  }
  throw new TypingError('ParseError', `Cannot parse type "${source}": ${P.formatError(source, result)}`);
}
