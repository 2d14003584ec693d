import { QuerySyntaxError } from '../errors.js';
import {
  CLAUSE_KEYWORDS,
  LITERAL_KEYWORDS,
  OPERATORS,
  PUNCTUATION,
  UNSUPPORTED_KEYWORDS,
} from './tokens.js';
import type { Token, TokenKind } from './tokens.js';

// Sticky patterns, matched at the current offset only.
const WHITESPACE = /\s+/y;
const DATE = /\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}:\d{2}(?:\.\d{1,3})?(?:Z|[+-]\d{2}:?\d{2})?)?(?![A-Za-z0-9_.:])/y;
const NUMBER = /-?\d+(?:\.\d+)?(?![A-Za-z0-9_.])/y;
const WORD = /[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*/y;

function matchAt(pattern: RegExp, text: string, offset: number): string | null {
  pattern.lastIndex = offset;
  const match = pattern.exec(text);
  return match === null ? null : match[0];
}

function classifyWord(word: string): TokenKind {
  const upper = word.toUpperCase();
  if (CLAUSE_KEYWORDS.has(upper) || LITERAL_KEYWORDS.has(upper) || UNSUPPORTED_KEYWORDS.has(upper)) {
    return 'Keyword';
  }
  return 'Identifier';
}

/**
 * Scans a single-quoted literal starting at `start` (the opening quote).
 * Returns the raw content, escapes untouched, and the offset after the
 * closing quote.
 */
function scanString(text: string, start: number): { raw: string; end: number } {
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === "'") {
      return { raw: text.slice(start + 1, i), end: i + 1 };
    }
    i += 1;
  }
  throw new QuerySyntaxError(
    null,
    ["closing quote (')"],
    start,
    `Unterminated string literal starting at position ${start}`,
  );
}

/**
 * Splits query text into tokens. Keyword text is upper-cased; every other
 * token keeps the source text. Whitespace is dropped.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  const push = (kind: TokenKind, tokenText: string, position: number): void => {
    tokens.push(Object.freeze({ kind, text: tokenText, position }));
  };

  while (offset < text.length) {
    const space = matchAt(WHITESPACE, text, offset);
    if (space !== null) {
      offset += space.length;
      continue;
    }

    const ch = text.charAt(offset);

    if (ch === "'") {
      const { raw, end } = scanString(text, offset);
      push('StringLiteral', raw, offset);
      offset = end;
      continue;
    }

    const date = matchAt(DATE, text, offset);
    if (date !== null) {
      push('DateLiteral', date, offset);
      offset += date.length;
      continue;
    }

    const number = matchAt(NUMBER, text, offset);
    if (number !== null) {
      push('NumberLiteral', number, offset);
      offset += number.length;
      continue;
    }

    const word = matchAt(WORD, text, offset);
    if (word !== null) {
      const kind = classifyWord(word);
      push(kind, kind === 'Keyword' ? word.toUpperCase() : word, offset);
      offset += word.length;
      continue;
    }

    const operator = OPERATORS.find((op) => text.startsWith(op, offset));
    if (operator !== undefined) {
      push('Operator', operator, offset);
      offset += operator.length;
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      push('Punctuation', ch, offset);
      offset += 1;
      continue;
    }

    throw new QuerySyntaxError(
      null,
      [],
      offset,
      `Unrecognized character '${ch}' at position ${offset}`,
    );
  }

  return tokens;
}
