/**
 * Databricks SQL warehouse access.
 */

import { DBSQLClient } from '@databricks/sql';
import type { QueryResult } from '../types/models.js';
import { isRecord, type CellValue, type JsonValue } from '../types/utils.js';
import { SQLExecutionError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * A session that can run statements one after another.
 */
export interface WarehouseSession {
  run(statement: string): Promise<QueryResult>;
}

/**
 * Scoped access to the warehouse: the session given to `fn` is released
 * on every exit path.
 */
export interface Warehouse {
  withSession<T>(fn: (session: WarehouseSession) => Promise<T>): Promise<T>;
}

export interface WarehouseConnection {
  host: string;
  path: string;
  token: string;
}

// Structural view of the driver, narrowed to the calls made here.
export interface SqlOperation {
  fetchAll(): Promise<object[]>;
  getSchema(): Promise<{ columns: Array<{ columnName: string }> } | null>;
  close(): Promise<unknown>;
}

export interface SqlSession {
  executeStatement(statement: string): Promise<SqlOperation>;
  close(): Promise<unknown>;
}

export interface SqlClient {
  connect(options: WarehouseConnection): Promise<unknown>;
  openSession(): Promise<SqlSession>;
  close(): Promise<unknown>;
}

/**
 * Quote a name for Databricks SQL.
 */
export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

/**
 * Convert a driver value into a JSON cell.
 */
export function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  if (Array.isArray(value)) {
    return value.map(toCell);
  }
  if (value instanceof Map) {
    const entries: Record<string, JsonValue> = {};
    for (const [key, item] of value) {
      entries[String(key)] = toCell(item);
    }
    return entries;
  }
  if (isRecord(value)) {
    const entries: Record<string, JsonValue> = {};
    for (const [key, item] of Object.entries(value)) {
      entries[key] = toCell(item);
    }
    return entries;
  }
  return String(value);
}

/**
 * Driver rows are keyed by column name, so a repeated name would hide all
 * but one of its values.
 * @throws SQLExecutionError naming the repeated columns
 */
function assertUniqueColumns(columns: string[]): void {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) repeated.add(column);
    seen.add(column);
  }
  if (repeated.size > 0) {
    throw new SQLExecutionError(
      `Result has repeated column names (${Array.from(repeated).join(', ')}); ` +
        'alias the columns so each name is unique'
    );
  }
}

/**
 * Shape driver output into ordered rows.
 * Without a result schema the column names come from the first row.
 * @throws SQLExecutionError when the result schema repeats a column name
 */
export function toQueryResult(
  records: object[],
  schema: { columns: Array<{ columnName: string }> } | null
): QueryResult {
  const first = records[0];
  const columns = schema
    ? schema.columns.map((column) => column.columnName)
    : isRecord(first)
      ? Object.keys(first)
      : [];
  assertUniqueColumns(columns);

  const rows = records.map((record) => {
    const cells = isRecord(record) ? record : {};
    return columns.map((column) => toCell(cells[column]));
  });

  return { columns, rows };
}

async function release(what: string, close: () => Promise<unknown>): Promise<void> {
  try {
    await close();
  } catch (error) {
    logger.warn(`Failed to close warehouse ${what}: ${error}`);
  }
}

class DatabricksSession implements WarehouseSession {
  constructor(private readonly session: SqlSession) {}

  async run(statement: string): Promise<QueryResult> {
    logger.debug(`Executing on warehouse: ${statement}`);
    const operation = await this.session.executeStatement(statement);
    try {
      const records = await operation.fetchAll();
      const schema = await operation.getSchema();
      return toQueryResult(records, schema);
    } finally {
      await release('operation', () => operation.close());
    }
  }
}

/**
 * Warehouse backed by the Databricks SQL driver.
 * Every `withSession` opens its own connection; nothing is pooled.
 */
export class DatabricksWarehouse implements Warehouse {
  constructor(
    private readonly connection: WarehouseConnection,
    private readonly createClient: () => SqlClient = () => new DBSQLClient()
  ) {}

  async withSession<T>(fn: (session: WarehouseSession) => Promise<T>): Promise<T> {
    const client = this.createClient();
    await client.connect(this.connection);
    try {
      const session = await client.openSession();
      try {
        return await fn(new DatabricksSession(session));
      } finally {
        await release('session', () => session.close());
      }
    } finally {
      await release('connection', () => client.close());
    }
  }
}
