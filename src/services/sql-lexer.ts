/**
 * Minimal SQL tokenizer.
 *
 * Splits text into words, quoted runs, comments, whitespace and punctuation
 * without understanding the grammar. Concatenating the token texts gives
 * back the input, so rewrites can work on tokens and re-join them.
 */

export type TokenKind =
  | 'word'
  | 'string'
  | 'quoted'
  | 'comment'
  | 'whitespace'
  | 'punct';

export interface Token {
  kind: TokenKind;
  text: string;
}

const WORD_CHAR = /[A-Za-z0-9_$]/;
const WHITESPACE_CHAR = /\s/;

/**
 * End index (exclusive) of a quoted run starting at `start`.
 * Handles backslash escapes and doubled quotes; an unterminated run ends the input.
 */
function scanQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (ch === '\\' && quote !== '`') {
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    let end: number;
    let kind: TokenKind;

    if (ch === '-' && sql[i + 1] === '-') {
      const newline = sql.indexOf('\n', i);
      end = newline === -1 ? sql.length : newline;
      kind = 'comment';
    } else if (ch === '/' && sql[i + 1] === '*') {
      const close = sql.indexOf('*/', i + 2);
      end = close === -1 ? sql.length : close + 2;
      kind = 'comment';
    } else if (ch === "'" || ch === '"') {
      end = scanQuoted(sql, i, ch);
      kind = 'string';
    } else if (ch === '`') {
      end = scanQuoted(sql, i, ch);
      kind = 'quoted';
    } else if (WHITESPACE_CHAR.test(ch)) {
      end = i + 1;
      while (end < sql.length && WHITESPACE_CHAR.test(sql[end])) end++;
      kind = 'whitespace';
    } else if (WORD_CHAR.test(ch)) {
      end = i + 1;
      while (end < sql.length && WORD_CHAR.test(sql[end])) end++;
      kind = 'word';
    } else {
      end = i + 1;
      kind = 'punct';
    }

    tokens.push({ kind, text: sql.slice(i, end) });
    i = end;
  }

  return tokens;
}

/**
 * True for tokens that carry no SQL meaning.
 */
export function isTrivia(token: Token): boolean {
  return token.kind === 'whitespace' || token.kind === 'comment';
}

/**
 * Split on top-level semicolons. Returns each statement trimmed and without
 * its terminator, skipping statements that hold only whitespace or comments.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current: Token[] = [];

  const flush = () => {
    if (current.some((token) => !isTrivia(token))) {
      statements.push(current.map((token) => token.text).join('').trim());
    }
    current = [];
  };

  for (const token of tokenize(sql)) {
    if (token.kind === 'punct' && token.text === ';') {
      flush();
    } else {
      current.push(token);
    }
  }
  flush();

  return statements;
}
