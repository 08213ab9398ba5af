/**
 * In-memory schema cache for sqlsight.
 * Maps database → table/view → column → declared type.
 */

import type {
  DatabaseSchema,
  SchemaMap,
  SchemaSnapshot,
  SnapshotEntity,
  TableColumns,
} from '../types/models.js';
import { logger } from '../utils/logger.js';
import type { SnapshotStore } from './snapshot-store.js';

/**
 * Immutable view of the cache at one point in time.
 */
export interface CacheSnapshot {
  readonly version: number;
  readonly loadedAt: Date;
  readonly schemas: SchemaMap;
}

export interface SchemaCacheStats {
  version: number;
  loaded_at: string;
  databases: number;
  tables: number;
}

function toColumns(entity: SnapshotEntity): TableColumns {
  return new Map(entity.columns.map((col) => [col.column_name, col.type]));
}

/**
 * Build the cache mapping from a persisted snapshot.
 * Views are merged after tables, so a view replaces a table of the same name.
 */
export function buildSchemaMap(snapshot: SchemaSnapshot): SchemaMap {
  const schemas = new Map<string, DatabaseSchema>();
  for (const record of snapshot) {
    const entities = new Map<string, TableColumns>();
    for (const table of record.tables) {
      entities.set(table.name, toColumns(table));
    }
    for (const view of record.views) {
      entities.set(view.name, toColumns(view));
    }
    schemas.set(record.database, entities);
  }
  return schemas;
}

/**
 * Process-wide schema cache.
 *
 * Readers take the current snapshot reference; reload builds a complete new
 * mapping and swaps the reference, so nobody observes a half-built cache.
 * Reloads are chained so only one writer runs at a time.
 */
export class SchemaCache {
  private current: CacheSnapshot = {
    version: 0,
    loadedAt: new Date(),
    schemas: new Map(),
  };
  private writer: Promise<unknown> = Promise.resolve();

  constructor(private readonly store: SnapshotStore) {}

  /**
   * Read the persisted snapshot and build a mapping.
   * Never throws: any read or parse failure yields an empty mapping.
   */
  async load(): Promise<SchemaMap> {
    try {
      const snapshot = await this.store.readSchemaSnapshot();
      return buildSchemaMap(snapshot);
    } catch (error) {
      logger.error(`Failed to load schema snapshot: ${error}`);
      return new Map();
    }
  }

  /**
   * Load the snapshot and replace the whole cache.
   */
  async reload(): Promise<CacheSnapshot> {
    const next = this.writer.then(async () => {
      const schemas = await this.load();
      this.current = {
        version: this.current.version + 1,
        loadedAt: new Date(),
        schemas,
      };
      logger.info(
        `Schema cache v${this.current.version} loaded with ${schemas.size} database(s)`
      );
      return this.current;
    });
    this.writer = next;
    return next;
  }

  snapshot(): CacheSnapshot {
    return this.current;
  }

  get(database: string): DatabaseSchema | undefined {
    return this.current.schemas.get(database);
  }

  has(database: string): boolean {
    return this.current.schemas.has(database);
  }

  databases(): string[] {
    return Array.from(this.current.schemas.keys());
  }

  stats(): SchemaCacheStats {
    const { version, loadedAt, schemas } = this.current;
    let tables = 0;
    for (const entities of schemas.values()) {
      tables += entities.size;
    }
    return {
      version,
      loaded_at: loadedAt.toISOString(),
      databases: schemas.size,
      tables,
    };
  }
}
