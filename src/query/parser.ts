import { QuerySyntaxError } from '../errors.js';
import { tokenize } from './lexer.js';
import { UNSUPPORTED_KEYWORDS, isComparisonOperator, isKeyword, isPunctuation } from './tokens.js';
import type { Token, TokenKind } from './tokens.js';
import type { Direction, FieldRef, OrderItem, ParsedQuery, PredicateNode, Selection } from './types.js';

const LITERAL_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>(['StringLiteral', 'NumberLiteral', 'DateLiteral']);
const LITERAL_KEYWORD_TEXT: ReadonlySet<string> = new Set(['TRUE', 'FALSE', 'NULL']);

/**
 * Recursive-descent parser for
 *
 *   SELECT fieldList FROM object [WHERE cmp (AND cmp)*]
 *     [ORDER BY field [ASC|DESC] (, ...)*] [LIMIT n]
 *
 * One instance parses one token sequence.
 */
export class Parser {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parse(): ParsedQuery {
    this.expectKeyword('SELECT');
    const selection = this.parseSelection();
    this.expectKeyword('FROM');

    const objectToken = this.expect('Identifier', 'object name');
    if (objectToken.text.includes('.')) {
      throw new QuerySyntaxError(objectToken, ['object name'], objectToken.position);
    }

    const remaining = ['WHERE', 'ORDER BY', 'LIMIT'];

    let predicate: PredicateNode<FieldRef, Token> | null = null;
    if (this.matchKeyword('WHERE')) {
      predicate = this.parsePredicate();
      remaining.splice(0, 1);
    }

    let orderBy: OrderItem<FieldRef>[] = [];
    if (this.matchKeyword('ORDER')) {
      this.expectKeyword('BY');
      orderBy = this.parseOrderList();
      remaining.splice(0, remaining.indexOf('ORDER BY') + 1);
    }

    let limit: number | null = null;
    if (this.matchKeyword('LIMIT')) {
      limit = this.parseLimit();
      remaining.length = 0;
    }

    const trailing = this.peek();
    if (trailing !== undefined) {
      throw this.unexpected(trailing, [...remaining, 'end of query']);
    }

    return {
      selection,
      objectName: objectToken.text,
      objectPosition: objectToken.position,
      predicate,
      orderBy,
      limit,
    };
  }

  private parseSelection(): Selection {
    const first = this.peek();
    if (isPunctuation(first, '*') && first !== undefined) {
      this.index += 1;
      return { kind: 'all', position: first.position };
    }

    const fields: FieldRef[] = [];
    const seen = new Set<string>();
    do {
      const token = this.expect('Identifier', 'field name');
      if (seen.has(token.text)) {
        throw new QuerySyntaxError(
          token,
          [],
          token.position,
          `Duplicate field selected: ${token.text}`,
        );
      }
      seen.add(token.text);
      fields.push({ path: token.text, position: token.position });
    } while (this.matchPunctuation(','));

    return { kind: 'fields', fields };
  }

  private parsePredicate(): PredicateNode<FieldRef, Token> {
    let node: PredicateNode<FieldRef, Token> = this.parseComparison();
    while (this.matchKeyword('AND')) {
      const right = this.parseComparison();
      node = { kind: 'conjunction', left: node, right };
    }
    return node;
  }

  private parseComparison(): PredicateNode<FieldRef, Token> {
    const fieldToken = this.expect('Identifier', 'field name');

    const operatorToken = this.peek();
    const operator = operatorToken?.kind === 'Operator' ? operatorToken.text : '';
    if (operatorToken === undefined || !isComparisonOperator(operator)) {
      throw this.unexpected(operatorToken ?? null, ['comparison operator']);
    }
    this.index += 1;

    const literal = this.peek();
    const isLiteral =
      literal !== undefined &&
      (LITERAL_KINDS.has(literal.kind) || (literal.kind === 'Keyword' && LITERAL_KEYWORD_TEXT.has(literal.text)));
    if (!isLiteral || literal === undefined) {
      throw this.unexpected(literal ?? null, ['literal value']);
    }
    this.index += 1;

    return {
      kind: 'comparison',
      field: { path: fieldToken.text, position: fieldToken.position },
      operator,
      literal,
    };
  }

  private parseOrderList(): OrderItem<FieldRef>[] {
    const items: OrderItem<FieldRef>[] = [];
    do {
      const token = this.expect('Identifier', 'field name');
      let direction: Direction = 'ASC';
      if (this.matchKeyword('DESC')) direction = 'DESC';
      else this.matchKeyword('ASC');
      items.push({ field: { path: token.text, position: token.position }, direction });
    } while (this.matchPunctuation(','));
    return items;
  }

  private parseLimit(): number {
    const token = this.peek();
    if (token === undefined || token.kind !== 'NumberLiteral' || !/^\d+$/.test(token.text)) {
      throw this.unexpected(token ?? null, ['non-negative integer']);
    }
    const value = Number(token.text);
    if (!Number.isSafeInteger(value)) {
      throw new QuerySyntaxError(token, ['non-negative integer'], token.position, `LIMIT ${token.text} is out of range`);
    }
    this.index += 1;
    return value;
  }

  // --- token helpers ---

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private endPosition(): number {
    const last = this.tokens[this.tokens.length - 1];
    return last === undefined ? 0 : last.position + last.text.length;
  }

  private expect(kind: TokenKind, description: string): Token {
    const token = this.peek();
    if (token === undefined || token.kind !== kind) {
      throw this.unexpected(token ?? null, [description]);
    }
    this.index += 1;
    return token;
  }

  private expectKeyword(keyword: string): void {
    const token = this.peek();
    if (!isKeyword(token, keyword)) {
      throw this.unexpected(token ?? null, [keyword]);
    }
    this.index += 1;
  }

  private matchKeyword(keyword: string): boolean {
    if (!isKeyword(this.peek(), keyword)) return false;
    this.index += 1;
    return true;
  }

  private matchPunctuation(text: string): boolean {
    if (!isPunctuation(this.peek(), text)) return false;
    this.index += 1;
    return true;
  }

  private unexpected(token: Token | null, expected: string[]): QuerySyntaxError {
    if (token === null) {
      return new QuerySyntaxError(null, expected, this.endPosition());
    }
    if (token.kind === 'Keyword' && UNSUPPORTED_KEYWORDS.has(token.text)) {
      return new QuerySyntaxError(
        token,
        expected,
        token.position,
        `${token.text} is not supported (position ${token.position})`,
      );
    }
    if (isPunctuation(token, '(') || isPunctuation(token, ')')) {
      return new QuerySyntaxError(
        token,
        expected,
        token.position,
        `Parentheses are not supported (position ${token.position})`,
      );
    }
    return new QuerySyntaxError(token, expected, token.position);
  }
}

export function parse(tokens: readonly Token[]): ParsedQuery {
  return new Parser(tokens).parse();
}

export function parseQuery(text: string): ParsedQuery {
  return parse(tokenize(text));
}
