export type TokenKind =
  | 'Keyword'
  | 'Identifier'
  | 'Operator'
  | 'StringLiteral'
  | 'NumberLiteral'
  | 'DateLiteral'
  | 'Punctuation';

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly position: number;
}

export type ComparisonOperator = '=' | '!=' | '<' | '>' | '<=' | '>=';

/** Clause keywords of the accepted grammar. */
export const CLAUSE_KEYWORDS: ReadonlySet<string> = new Set([
  'SELECT', 'FROM', 'WHERE', 'AND', 'ORDER', 'BY', 'LIMIT', 'ASC', 'DESC',
]);

/** Keywords that stand for literal values. */
export const LITERAL_KEYWORDS: ReadonlySet<string> = new Set(['TRUE', 'FALSE', 'NULL']);

/**
 * Words of the full query language this dialect rejects. They are lexed as
 * keywords so the parser can report the construct by name.
 */
export const UNSUPPORTED_KEYWORDS: ReadonlySet<string> = new Set([
  'OR', 'NOT', 'IN', 'LIKE', 'GROUP', 'HAVING', 'OFFSET',
]);

export const OPERATORS: readonly ComparisonOperator[] = ['<=', '>=', '!=', '=', '<', '>'];

export const PUNCTUATION: ReadonlySet<string> = new Set([',', '*', '(', ')']);

export function isKeyword(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === 'Keyword' && token.text === text;
}

export function isPunctuation(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === 'Punctuation' && token.text === text;
}

export function isComparisonOperator(text: string): text is ComparisonOperator {
  return (OPERATORS as readonly string[]).includes(text);
}
