import { describe, it, expect } from 'vitest';
import { splitStatements, tokenize } from './sql-lexer.js';

describe('tokenize', () => {
  it('reproduces the input when tokens are joined', () => {
    const sql = "SELECT a, 'x''y' AS s FROM `t` -- note\n/* block */ WHERE b = \"q\";";
    expect(tokenize(sql).map((t) => t.text).join('')).toBe(sql);
  });

  it('classifies strings, quoted names and comments', () => {
    const kinds = tokenize("'it''s' `col` -- c\n/* b */").map((t) => [t.kind, t.text]);
    expect(kinds).toEqual([
      ['string', "'it''s'"],
      ['whitespace', ' '],
      ['quoted', '`col`'],
      ['whitespace', ' '],
      ['comment', '-- c'],
      ['whitespace', '\n'],
      ['comment', '/* b */'],
    ]);
  });

  it('keeps a backslash-escaped quote inside the string', () => {
    const tokens = tokenize("'a\\'b' x");
    expect(tokens[0]).toEqual({ kind: 'string', text: "'a\\'b'" });
    expect(tokens[2]).toEqual({ kind: 'word', text: 'x' });
  });

  it('splits dotted names into words and punctuation', () => {
    expect(tokenize('db.orders').map((t) => t.kind)).toEqual(['word', 'punct', 'word']);
  });
});

describe('splitStatements', () => {
  it('splits on top-level semicolons and drops terminators', () => {
    expect(splitStatements('SELECT 1; SELECT 2;')).toEqual(['SELECT 1', 'SELECT 2']);
  });

  it('ignores semicolons inside literals and comments', () => {
    expect(splitStatements("SELECT ';' AS s -- a;b\n; SELECT 2")).toEqual([
      "SELECT ';' AS s -- a;b",
      'SELECT 2',
    ]);
  });

  it('skips statements holding only whitespace or comments', () => {
    expect(splitStatements('  ;  -- nothing\n; SELECT 3')).toEqual(['SELECT 3']);
    expect(splitStatements('')).toEqual([]);
  });

  it('keeps an unterminated string as one statement', () => {
    expect(splitStatements("SELECT 'abc; def")).toEqual(["SELECT 'abc; def"]);
  });
});
