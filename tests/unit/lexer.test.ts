import { describe, it, expect } from 'vitest';
import { tokenize } from '../../src/query/lexer.js';
import { QuerySyntaxError } from '../../src/errors.js';

describe('tokenize()', () => {
  it('splits a select list into keywords, identifiers and punctuation', () => {
    expect(tokenize('SELECT Id, Name FROM Lead')).toEqual([
      { kind: 'Keyword', text: 'SELECT', position: 0 },
      { kind: 'Identifier', text: 'Id', position: 7 },
      { kind: 'Punctuation', text: ',', position: 9 },
      { kind: 'Identifier', text: 'Name', position: 11 },
      { kind: 'Keyword', text: 'FROM', position: 16 },
      { kind: 'Identifier', text: 'Lead', position: 21 },
    ]);
  });

  it('upper-cases keywords but keeps identifier case', () => {
    const tokens = tokenize('select lastName from lead');
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ['Keyword', 'SELECT'],
      ['Identifier', 'lastName'],
      ['Keyword', 'FROM'],
      ['Identifier', 'lead'],
    ]);
  });

  it('lexes bare dates and datetimes as date literals', () => {
    const tokens = tokenize('CreatedDate > 2024-01-01 AND LastModifiedDate <= 2024-01-15T10:30:00Z');
    expect(tokens[2]).toEqual({ kind: 'DateLiteral', text: '2024-01-01', position: 14 });
    expect(tokens[6]).toEqual({ kind: 'DateLiteral', text: '2024-01-15T10:30:00Z', position: 49 });
  });

  it('lexes datetimes with fractions and offsets', () => {
    expect(tokenize('2024-03-01T08:00:00.25+02:00')).toEqual([
      { kind: 'DateLiteral', text: '2024-03-01T08:00:00.25+02:00', position: 0 },
    ]);
  });

  it('lexes signed and decimal numbers', () => {
    const tokens = tokenize('Amount >= -12.5 AND Count = 3');
    expect(tokens[2]).toEqual({ kind: 'NumberLiteral', text: '-12.5', position: 10 });
    expect(tokens[6]).toEqual({ kind: 'NumberLiteral', text: '3', position: 28 });
  });

  it('recognizes every comparison operator', () => {
    const ops = tokenize('a = 1 a != 1 a < 1 a > 1 a <= 1 a >= 1')
      .filter((t) => t.kind === 'Operator')
      .map((t) => t.text);
    expect(ops).toEqual(['=', '!=', '<', '>', '<=', '>=']);
  });

  it('keeps escapes in the raw string text', () => {
    expect(tokenize("'O\\'Brien'")).toEqual([{ kind: 'StringLiteral', text: "O\\'Brien", position: 0 }]);
  });

  it('keeps dotted relationship paths as one identifier', () => {
    expect(tokenize('Campaign.Name')).toEqual([{ kind: 'Identifier', text: 'Campaign.Name', position: 0 }]);
  });

  it('lexes literal and unsupported words as keywords', () => {
    expect(tokenize('true Null or Like').map((t) => [t.kind, t.text])).toEqual([
      ['Keyword', 'TRUE'],
      ['Keyword', 'NULL'],
      ['Keyword', 'OR'],
      ['Keyword', 'LIKE'],
    ]);
  });

  it('returns no tokens for blank input', () => {
    expect(tokenize('   \n\t ')).toEqual([]);
  });

  it('returns frozen tokens', () => {
    const [token] = tokenize('Id');
    expect(Object.isFrozen(token)).toBe(true);
  });

  it('throws QuerySyntaxError for an unterminated string', () => {
    expect(() => tokenize("Name = 'abc")).toThrow(QuerySyntaxError);
    expect(() => tokenize("Name = 'abc")).toThrow('Unterminated string literal starting at position 7');
  });

  it('throws QuerySyntaxError for an unknown character', () => {
    try {
      tokenize('Name # 1');
      expect.fail('expected tokenize to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(QuerySyntaxError);
      const syntax = err as QuerySyntaxError;
      expect(syntax.message).toBe("Unrecognized character '#' at position 5");
      expect(syntax.position).toBe(5);
      expect(syntax.errorCode).toBe('INVALID_QUERY');
    }
  });

  it('rejects a number glued to letters', () => {
    expect(() => tokenize('LIMIT 12abc')).toThrow("Unrecognized character '1' at position 6");
  });
});
