import { describe, it, expect } from 'vitest';
import {
  assertNoRestrictedNamespace,
  assertReadOnly,
  findStatementStart,
  normalizeStatement,
  qualifyTableNames,
  sanitizeGeneratedSql,
  stripCodeFences,
  substitutePlaceholder,
} from './sanitizer.js';
import { SQLGenerationError, SQLValidationError } from '../types/errors.js';

describe('stripCodeFences', () => {
  it('removes a fenced block with a language tag', () => {
    expect(stripCodeFences('```sql\nSELECT 1\n```')).toBe('SELECT 1');
    expect(stripCodeFences('```SQL\nSELECT 1\n```')).toBe('SELECT 1');
  });

  it('removes a fenced block without a tag', () => {
    expect(stripCodeFences('```\nSHOW DATABASES\n```')).toBe('SHOW DATABASES');
  });

  it('handles an inline fence', () => {
    expect(stripCodeFences('```sql SELECT 1```')).toBe('SELECT 1');
  });

  it('drops narration around the fences', () => {
    const raw = 'Here you go:\n```sql\nSELECT 1\n```\nThis counts rows.';
    expect(stripCodeFences(raw)).toBe('SELECT 1');
  });

  it('removes a closing fence without an opening one', () => {
    expect(stripCodeFences('SELECT SUM(amount) FROM orders\n```')).toBe(
      'SELECT SUM(amount) FROM orders'
    );
    expect(stripCodeFences('SELECT 1\n```\nHope this helps.')).toBe('SELECT 1');
  });

  it('removes an opening fence without a closing one', () => {
    expect(stripCodeFences('```sql\nSELECT 1\n')).toBe('SELECT 1');
  });

  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFences('  SELECT 1\n')).toBe('SELECT 1');
  });
});

describe('findStatementStart', () => {
  it('drops lines before the first leading keyword', () => {
    expect(findStatementStart('Here is the query:\nSELECT a\nFROM t')).toBe('SELECT a\nFROM t');
  });

  it('matches keywords in any case after indentation', () => {
    expect(findStatementStart('Sure.\n   describe orders')).toBe('   describe orders');
  });

  it('requires the keyword to be a whole word', () => {
    expect(findStatementStart('selection of data:\nSELECT 1')).toBe('SELECT 1');
  });

  it('passes text through when no line matches', () => {
    const text = 'no sql here\nat all';
    expect(findStatementStart(text)).toBe(text);
  });
});

describe('substitutePlaceholder', () => {
  it('replaces the quoted example database name', () => {
    expect(
      substitutePlaceholder("SELECT * FROM t WHERE db = 'your_database_name'", 'sales_db')
    ).toBe("SELECT * FROM t WHERE db = 'sales_db'");
  });

  it('accepts another placeholder', () => {
    expect(substitutePlaceholder("SHOW TABLES IN 'example_db'", 'sales_db', 'example_db')).toBe(
      "SHOW TABLES IN 'sales_db'"
    );
  });

  it('leaves the unquoted name alone', () => {
    expect(substitutePlaceholder('USE your_database_name', 'sales_db')).toBe(
      'USE your_database_name'
    );
  });
});

describe('qualifyTableNames', () => {
  it('qualifies a bare table after FROM', () => {
    expect(qualifyTableNames('SELECT SUM(amount) FROM orders', 'sales_db')).toBe(
      'SELECT SUM(amount) FROM sales_db.orders'
    );
  });

  it('qualifies joined tables in any case', () => {
    expect(
      qualifyTableNames('select * from orders o join customers c on o.cid = c.id', 'sales_db')
    ).toBe('select * from sales_db.orders o join sales_db.customers c on o.cid = c.id');
  });

  it('leaves qualified references unchanged', () => {
    expect(qualifyTableNames('SELECT * FROM other_db.orders', 'sales_db')).toBe(
      'SELECT * FROM other_db.orders'
    );
  });

  it('is idempotent', () => {
    const inputs = [
      'SELECT * FROM orders JOIN items ON orders.id = items.order_id',
      'SELECT * FROM (SELECT id FROM orders) t',
      'SHOW DATABASES',
    ];
    for (const sql of inputs) {
      const once = qualifyTableNames(sql, 'sales_db');
      expect(qualifyTableNames(once, 'sales_db')).toBe(once);
    }
  });

  it('qualifies inside subqueries', () => {
    expect(qualifyTableNames('SELECT * FROM (SELECT id FROM orders) t', 'sales_db')).toBe(
      'SELECT * FROM (SELECT id FROM sales_db.orders) t'
    );
  });

  it('qualifies across line breaks', () => {
    expect(qualifyTableNames('SELECT *\nFROM\n  orders', 'sales_db')).toBe(
      'SELECT *\nFROM\n  sales_db.orders'
    );
  });

  it('does not touch string literals or comments', () => {
    expect(qualifyTableNames("SELECT 'from orders' AS label FROM orders", 'sales_db')).toBe(
      "SELECT 'from orders' AS label FROM sales_db.orders"
    );
    expect(qualifyTableNames('-- pull from orders\nSELECT * FROM t', 'sales_db')).toBe(
      '-- pull from orders\nSELECT * FROM sales_db.t'
    );
  });

  it('skips FROM inside EXTRACT arguments', () => {
    expect(
      qualifyTableNames('SELECT EXTRACT(YEAR FROM order_date) AS y FROM orders', 'sales_db')
    ).toBe('SELECT EXTRACT(YEAR FROM order_date) AS y FROM sales_db.orders');
  });

  it('skips FROM in IS [NOT] DISTINCT FROM', () => {
    expect(
      qualifyTableNames('SELECT * FROM orders WHERE a IS DISTINCT FROM b', 'sales_db')
    ).toBe('SELECT * FROM sales_db.orders WHERE a IS DISTINCT FROM b');
    expect(
      qualifyTableNames('SELECT * FROM orders WHERE a is not distinct from b', 'sales_db')
    ).toBe('SELECT * FROM sales_db.orders WHERE a is not distinct from b');
  });

  it('skips table-valued functions, VALUES and backquoted names', () => {
    expect(qualifyTableNames('SELECT * FROM range(10)', 'sales_db')).toBe(
      'SELECT * FROM range(10)'
    );
    expect(qualifyTableNames('SELECT * FROM VALUES (1), (2)', 'sales_db')).toBe(
      'SELECT * FROM VALUES (1), (2)'
    );
    expect(qualifyTableNames('SELECT * FROM `orders`', 'sales_db')).toBe(
      'SELECT * FROM `orders`'
    );
  });

  it('returns statements without table references unchanged', () => {
    expect(qualifyTableNames('SHOW DATABASES', 'sales_db')).toBe('SHOW DATABASES');
  });
});

describe('assertNoRestrictedNamespace', () => {
  it('rejects information_schema in any case', () => {
    expect(() => assertNoRestrictedNamespace('SELECT * FROM INFORMATION_SCHEMA.TABLES')).toThrow(
      SQLValidationError
    );
    expect(() => assertNoRestrictedNamespace('SELECT * FROM information_schema.columns')).toThrow(
      'Queries to `information_schema` are not supported in Databricks.'
    );
  });

  it('accepts ordinary statements', () => {
    expect(() => assertNoRestrictedNamespace('SELECT * FROM sales_db.orders')).not.toThrow();
  });
});

describe('normalizeStatement', () => {
  it('keeps only the first statement', () => {
    expect(normalizeStatement('SELECT 1; DROP TABLE x')).toBe('SELECT 1');
  });

  it('drops the terminator', () => {
    expect(normalizeStatement('SELECT 1;')).toBe('SELECT 1');
  });

  it('fails when nothing is left', () => {
    expect(() => normalizeStatement('')).toThrow(SQLGenerationError);
    expect(() => normalizeStatement('-- only a comment')).toThrow(SQLGenerationError);
  });
});

describe('assertReadOnly', () => {
  it('rejects write statements', () => {
    expect(() => assertReadOnly('DELETE FROM sales_db.orders')).toThrow(
      'Only read-only statements are allowed (found DELETE)'
    );
  });

  it('ignores keywords in literals and longer identifiers', () => {
    expect(() => assertReadOnly("SELECT 'drop table' AS s, updated_at FROM t")).not.toThrow();
  });

  it('allows SHOW CREATE TABLE', () => {
    expect(() => assertReadOnly('SHOW CREATE TABLE orders')).not.toThrow();
  });
});

describe('sanitizeGeneratedSql', () => {
  it('qualifies a fenced aggregate', () => {
    expect(
      sanitizeGeneratedSql('```sql\nSELECT SUM(amount) FROM orders\n```', 'sales_db')
    ).toBe('SELECT SUM(amount) FROM sales_db.orders');
  });

  it('gives the same result with or without fences', () => {
    const bodies = [
      'SELECT SUM(amount) FROM orders',
      'SELECT c.name FROM customers c JOIN orders o ON o.cid = c.id',
      'SHOW TABLES',
    ];
    for (const body of bodies) {
      expect(sanitizeGeneratedSql('```sql\n' + body + '\n```', 'sales_db')).toBe(
        sanitizeGeneratedSql(body, 'sales_db')
      );
    }
  });

  it('accepts output with only a trailing fence', () => {
    expect(sanitizeGeneratedSql('SELECT SUM(amount) FROM orders\n```', 'sales_db')).toBe(
      'SELECT SUM(amount) FROM sales_db.orders'
    );
  });

  it('drops narration before the statement', () => {
    expect(
      sanitizeGeneratedSql('Sure! Here is the query:\nSELECT * FROM orders', 'sales_db')
    ).toBe('SELECT * FROM sales_db.orders');
  });

  it('substitutes the placeholder database', () => {
    expect(
      sanitizeGeneratedSql("SELECT * FROM orders WHERE db = 'your_database_name'", 'sales_db')
    ).toBe("SELECT * FROM sales_db.orders WHERE db = 'sales_db'");
  });

  it('rejects information_schema references', () => {
    expect(() =>
      sanitizeGeneratedSql('SELECT table_name FROM information_schema.tables', 'sales_db')
    ).toThrow(SQLValidationError);
  });

  it('discards statements after the first', () => {
    expect(sanitizeGeneratedSql('SELECT * FROM orders; DROP TABLE orders', 'sales_db')).toBe(
      'SELECT * FROM sales_db.orders'
    );
  });

  it('rejects write statements unless read-only is off', () => {
    expect(() => sanitizeGeneratedSql('DELETE FROM orders', 'sales_db')).toThrow(
      SQLValidationError
    );
    expect(sanitizeGeneratedSql('DELETE FROM orders', 'sales_db', { readOnly: false })).toBe(
      'DELETE FROM sales_db.orders'
    );
  });

  it('fails on empty output', () => {
    expect(() => sanitizeGeneratedSql('```sql\n```', 'sales_db')).toThrow(SQLGenerationError);
  });
});
