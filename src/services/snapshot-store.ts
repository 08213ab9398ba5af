/**
 * Flat-file stores for the database list and the schema snapshot.
 */

import { randomUUID } from 'crypto';
import { readFile, rename, writeFile } from 'fs/promises';
import {
  DatabaseListSchema,
  SchemaSnapshotSchema,
  type DatabaseSnapshot,
  type SchemaSnapshot,
} from '../types/models.js';
import { logger } from '../utils/logger.js';

/**
 * Write JSON through a temporary sibling file so readers never see a partial document.
 */
async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  const tempPath = `${path}.${randomUUID()}.tmp`;
  await writeFile(tempPath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
  await rename(tempPath, path);
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * Reads and writes the two JSON stores the service persists.
 */
export class SnapshotStore {
  private snapshotWriter: Promise<void> = Promise.resolve();

  constructor(
    readonly databaseListPath: string,
    readonly schemaSnapshotPath: string
  ) {}

  /**
   * Read and validate the schema snapshot.
   * @throws on a missing file, malformed JSON or an unexpected shape
   */
  async readSchemaSnapshot(): Promise<SchemaSnapshot> {
    const raw = await readFile(this.schemaSnapshotPath, 'utf-8');
    return SchemaSnapshotSchema.parse(JSON.parse(raw));
  }

  async writeSchemaSnapshot(snapshot: SchemaSnapshot): Promise<void> {
    await writeJsonAtomic(this.schemaSnapshotPath, snapshot);
  }

  /**
   * Replace one database's record, keeping the others in order.
   * Upserts run one at a time, each on the result of the previous one.
   * A snapshot that cannot be read is started over.
   */
  upsertDatabase(record: DatabaseSnapshot): Promise<SchemaSnapshot> {
    const next = this.snapshotWriter.then(() => this.mergeDatabase(record));
    // The caller of each upsert receives its failure through `next`
    this.snapshotWriter = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private async mergeDatabase(record: DatabaseSnapshot): Promise<SchemaSnapshot> {
    let current: SchemaSnapshot;
    try {
      current = await this.readSchemaSnapshot();
    } catch (error) {
      logger.warn(`Starting a new schema snapshot: ${error}`);
      current = [];
    }

    const index = current.findIndex((entry) => entry.database === record.database);
    const next =
      index === -1
        ? [...current, record]
        : current.map((entry, i) => (i === index ? record : entry));

    await this.writeSchemaSnapshot(next);
    return next;
  }

  /**
   * Database names from the list store; an absent file is an empty list.
   */
  async readDatabaseList(): Promise<string[]> {
    try {
      const raw = await readFile(this.databaseListPath, 'utf-8');
      return DatabaseListSchema.parse(JSON.parse(raw));
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }

  async writeDatabaseList(databases: string[]): Promise<void> {
    await writeJsonAtomic(this.databaseListPath, databases);
  }
}
