/**
 * Turns raw generation output into one executable statement.
 *
 * Steps run in order: fence stripping, statement-boundary detection,
 * placeholder substitution, table-name qualification, restricted-namespace
 * check, normalization to a single statement, and the read-only guard.
 * These are textual heuristics over a token stream, not a SQL parse.
 */

import { logger } from '../utils/logger.js';
import { SQLGenerationError, SQLValidationError } from '../types/errors.js';
import { isTrivia, splitStatements, tokenize, type Token } from './sql-lexer.js';

/**
 * Keywords a statement may start with.
 */
export const LEADING_KEYWORDS = [
  'select',
  'show',
  'with',
  'describe',
  'explain',
  'use',
] as const;

export const DEFAULT_PLACEHOLDER_DATABASE = 'your_database_name';

export const RESTRICTED_NAMESPACE = 'information_schema';

const LEADING_KEYWORD_PATTERN = new RegExp(
  `^(?:${LEADING_KEYWORDS.join('|')})\\b`,
  'i'
);

/**
 * Opening fence: ``` followed by a language tag line, or by "sql" inline.
 */
const OPENING_FENCE = /^```(?:[\w+-]*[^\S\r\n]*\r?\n|sql\b[^\S\r\n]*)?/i;
const FENCE = '```';

const QUALIFYING_KEYWORDS = new Set(['from', 'join']);

/**
 * Functions whose argument list uses FROM as a separator, e.g. EXTRACT(YEAR FROM ts).
 */
const FROM_ARGUMENT_FUNCTIONS = new Set(['extract', 'trim', 'substring', 'overlay']);

/**
 * Words before DISTINCT in `a IS [NOT] DISTINCT FROM b`, where FROM is an operator.
 */
const DISTINCT_PREDICATE_WORDS = new Set(['is', 'not']);

/**
 * Words that can follow FROM without naming a table.
 */
const NON_TABLE_WORDS = new Set(['values', 'lateral']);

const WRITE_KEYWORDS = new Set([
  'insert',
  'update',
  'delete',
  'merge',
  'drop',
  'alter',
  'create',
  'truncate',
  'grant',
  'revoke',
  'copy',
  'optimize',
  'vacuum',
]);

export interface SanitizeOptions {
  /** Example database name the model may emit in quotes. */
  placeholder?: string;
  /** Reject statements containing write or DDL keywords. */
  readOnly?: boolean;
}

/**
 * Remove an opening code fence (and any narration before it) and a closing
 * fence (and anything after it). Either fence may be missing. A lone fence
 * after the statement is a closing one. Text without fences is only trimmed.
 */
export function stripCodeFences(text: string): string {
  let body = text.trim();

  const first = body.indexOf(FENCE);
  if (first === -1) {
    return body;
  }

  const paired = body.indexOf(FENCE, first + FENCE.length) !== -1;
  if (first === 0 || paired) {
    body = body.slice(first);
    const opening = OPENING_FENCE.exec(body);
    body = body.slice(opening ? opening[0].length : FENCE.length);
  }

  const closing = body.indexOf(FENCE);
  if (closing !== -1) {
    body = body.slice(0, closing);
  }

  return body.trim();
}

/**
 * Drop the lines before the first one that starts with a leading keyword.
 * Text with no such line is returned unchanged.
 */
export function findStatementStart(text: string): string {
  const lines = text.split(/\r?\n/);
  const start = lines.findIndex((line) => LEADING_KEYWORD_PATTERN.test(line.trim()));
  if (start === -1) {
    return text;
  }
  return lines.slice(start).join('\n');
}

/**
 * Replace the quoted placeholder database name with the real one.
 */
export function substitutePlaceholder(
  sql: string,
  database: string,
  placeholder: string = DEFAULT_PLACEHOLDER_DATABASE
): string {
  return sql.split(`'${placeholder}'`).join(`'${database}'`);
}

function nextSignificant(tokens: Token[], from: number): Token | undefined {
  for (let i = from; i < tokens.length; i++) {
    if (!isTrivia(tokens[i])) {
      return tokens[i];
    }
  }
  return undefined;
}

/**
 * Index of a bare table identifier directly after a FROM/JOIN at `keyword`,
 * or -1 when the reference is already qualified or is not a table.
 */
function bareTableIndex(tokens: Token[], keyword: number): number {
  const gap = tokens[keyword + 1];
  const candidate = tokens[keyword + 2];
  if (!gap || gap.kind !== 'whitespace' || !candidate || candidate.kind !== 'word') {
    return -1;
  }
  if (!/^[A-Za-z_]/.test(candidate.text) || NON_TABLE_WORDS.has(candidate.text.toLowerCase())) {
    return -1;
  }

  const after = nextSignificant(tokens, keyword + 3);
  if (after && after.kind === 'punct' && (after.text === '.' || after.text === '(')) {
    return -1;
  }
  return keyword + 2;
}

function isDistinctPredicate(
  previous: Token | undefined,
  beforePrevious: Token | undefined
): boolean {
  return (
    previous?.kind === 'word' &&
    previous.text.toLowerCase() === 'distinct' &&
    beforePrevious?.kind === 'word' &&
    DISTINCT_PREDICATE_WORDS.has(beforePrevious.text.toLowerCase())
  );
}

/**
 * Prefix every bare table after FROM or JOIN with `<database>.`.
 *
 * Identifiers followed by "." are already qualified and stay as they are,
 * so applying this twice changes nothing. String literals, comments and
 * backquoted names are never rewritten.
 */
export function qualifyTableNames(sql: string, database: string): string {
  const tokens = tokenize(sql);
  // One entry per open parenthesis; true inside EXTRACT(...) and friends.
  const frames: boolean[] = [false];
  let previous: Token | undefined;
  let beforePrevious: Token | undefined;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (isTrivia(token)) continue;

    if (token.kind === 'punct' && token.text === '(') {
      frames.push(
        previous?.kind === 'word' &&
          FROM_ARGUMENT_FUNCTIONS.has(previous.text.toLowerCase())
      );
    } else if (token.kind === 'punct' && token.text === ')') {
      if (frames.length > 1) frames.pop();
    } else if (
      token.kind === 'word' &&
      QUALIFYING_KEYWORDS.has(token.text.toLowerCase()) &&
      !frames[frames.length - 1] &&
      !isDistinctPredicate(previous, beforePrevious)
    ) {
      const target = bareTableIndex(tokens, i);
      if (target !== -1) {
        tokens[target] = {
          kind: 'word',
          text: `${database}.${tokens[target].text}`,
        };
      }
    }

    beforePrevious = previous;
    previous = token;
  }

  return tokens.map((token) => token.text).join('');
}

/**
 * @throws SQLValidationError when the text mentions information_schema anywhere
 */
export function assertNoRestrictedNamespace(sql: string): void {
  if (sql.toLowerCase().includes(RESTRICTED_NAMESPACE)) {
    throw new SQLValidationError(
      `Queries to \`${RESTRICTED_NAMESPACE}\` are not supported in Databricks.`
    );
  }
}

/**
 * First statement of the text, trimmed and without its terminator.
 * @throws SQLGenerationError when there is no statement at all
 */
export function normalizeStatement(sql: string): string {
  const statements = splitStatements(sql);
  if (statements.length === 0) {
    throw new SQLGenerationError('Generation service returned no SQL statement');
  }
  if (statements.length > 1) {
    logger.warn(`Discarded ${statements.length - 1} statement(s) after the first`);
  }
  return statements[0];
}

/**
 * @throws SQLValidationError on a write or DDL keyword outside literals
 */
export function assertReadOnly(sql: string): void {
  let previous: string | undefined;
  for (const token of tokenize(sql)) {
    if (token.kind !== 'word') continue;
    const word = token.text.toLowerCase();
    // SHOW CREATE TABLE only reads metadata
    if (WRITE_KEYWORDS.has(word) && previous !== 'show') {
      throw new SQLValidationError(
        `Only read-only statements are allowed (found ${word.toUpperCase()})`
      );
    }
    previous = word;
  }
}

/**
 * Run the whole pipeline on raw generation output.
 *
 * @param raw Text returned by the generation service
 * @param database Target database used for placeholders and qualification
 * @returns One statement ready for the warehouse
 * @throws SQLValidationError for restricted namespaces or write statements
 * @throws SQLGenerationError when no statement remains
 */
export function sanitizeGeneratedSql(
  raw: string,
  database: string,
  options: SanitizeOptions = {}
): string {
  const { placeholder = DEFAULT_PLACEHOLDER_DATABASE, readOnly = true } = options;

  let sql = stripCodeFences(raw);
  sql = findStatementStart(sql);
  sql = substitutePlaceholder(sql, database, placeholder);
  sql = qualifyTableNames(sql, database);
  assertNoRestrictedNamespace(sql);

  const statement = normalizeStatement(sql);
  if (readOnly) {
    assertReadOnly(statement);
  }

  logger.debug(`Sanitized SQL: ${statement}`);
  return statement;
}
