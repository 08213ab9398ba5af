/**
 * Refresh operations: the database list and per-database schema extraction.
 */

import type { CellValue } from '../types/utils.js';
import type { DatabaseSnapshot, QueryResult, SnapshotEntity } from '../types/models.js';
import { RefreshError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { SchemaCache } from './schema-cache.js';
import type { SnapshotStore } from './snapshot-store.js';
import { quoteIdentifier, type Warehouse, type WarehouseSession } from './warehouse.js';

function cellText(cell: CellValue | undefined): string {
  return typeof cell === 'string' ? cell : '';
}

/**
 * Column list from DESCRIBE TABLE output.
 *
 * Skips rows with an empty name or type and the `col_name` header; stops at
 * the first `#` row, where partition and detail sections begin.
 */
export function parseDescribeRows(result: QueryResult): SnapshotEntity['columns'] {
  const columns: SnapshotEntity['columns'] = [];
  const seen = new Set<string>();

  for (const row of result.rows) {
    const name = cellText(row[0]);
    const type = cellText(row[1]);
    if (name.startsWith('#')) break;
    if (!name || !type || name.toLowerCase() === 'col_name') continue;
    if (seen.has(name)) continue;
    seen.add(name);
    columns.push({ column_name: name, type });
  }

  return columns;
}

/**
 * Names in the second column of SHOW TABLES / SHOW VIEWS output.
 */
function entityNames(result: QueryResult): string[] {
  return result.rows.map((row) => cellText(row[1])).filter((name) => name.length > 0);
}

async function describeEntities(
  session: WarehouseSession,
  names: string[]
): Promise<SnapshotEntity[]> {
  const entities: SnapshotEntity[] = [];
  for (const name of names) {
    const described = await session.run(`DESCRIBE TABLE ${quoteIdentifier(name)}`);
    entities.push({ name, columns: parseDescribeRows(described) });
  }
  return entities;
}

export class SchemaRefresher {
  constructor(
    private readonly warehouse: Warehouse,
    private readonly store: SnapshotStore,
    private readonly schemaCache: SchemaCache
  ) {}

  /**
   * List every database on the warehouse and overwrite the database list store.
   *
   * @throws RefreshError carrying the warehouse or file system message
   */
  async refreshDatabases(): Promise<string[]> {
    try {
      const result = await this.warehouse.withSession((session) =>
        session.run('SHOW DATABASES')
      );
      const databases = result.rows
        .map((row) => cellText(row[0]))
        .filter((name) => name.length > 0);

      await this.store.writeDatabaseList(databases);
      logger.info(`Saved ${databases.length} database(s) to ${this.store.databaseListPath}`);
      return databases;
    } catch (error) {
      logger.error(`Database refresh failed: ${errorMessage(error)}`);
      throw new RefreshError('Failed to refresh databases.', errorMessage(error));
    }
  }

  /**
   * Read the tables and views of one database.
   */
  async extractSchema(database: string): Promise<DatabaseSnapshot> {
    logger.info(`Extracting schema for: ${database}`);
    return this.warehouse.withSession(async (session) => {
      await session.run(`USE ${quoteIdentifier(database)}`);
      const tables = await describeEntities(
        session,
        entityNames(await session.run('SHOW TABLES'))
      );
      const views = await describeEntities(
        session,
        entityNames(await session.run('SHOW VIEWS'))
      );
      return { database, tables, views };
    });
  }

  /**
   * Extract one database's schema, store it and reload the schema cache.
   * The snapshot file is only written once extraction succeeded.
   *
   * @throws RefreshError carrying the underlying message
   */
  async loadSchema(database: string): Promise<DatabaseSnapshot> {
    try {
      const record = await this.extractSchema(database);
      await this.store.upsertDatabase(record);
      await this.schemaCache.reload();
      logger.info(
        `Schema for '${database}' saved: ${record.tables.length} table(s), ${record.views.length} view(s)`
      );
      return record;
    } catch (error) {
      logger.error(`Schema load failed for ${database}: ${errorMessage(error)}`);
      throw new RefreshError(`Failed to load schema for \`${database}\`.`, errorMessage(error));
    }
  }
}
