import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, readdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createTempStore } from '../test-utils/fakes.js';
import { SnapshotStore } from './snapshot-store.js';
import type { DatabaseSnapshot } from '../types/models.js';

const sales: DatabaseSnapshot = {
  database: 'sales_db',
  tables: [{ name: 'orders', columns: [{ column_name: 'id', type: 'bigint' }] }],
  views: [],
};

const hr: DatabaseSnapshot = {
  database: 'hr_db',
  tables: [{ name: 'staff', columns: [{ column_name: 'name', type: 'string' }] }],
  views: [],
};

describe('SnapshotStore', () => {
  let store: SnapshotStore;
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ store, dir, cleanup } = createTempStore());
  });

  afterEach(() => {
    cleanup();
  });

  it('reads a missing database list as empty', async () => {
    expect(await store.readDatabaseList()).toEqual([]);
  });

  it('round-trips the database list', async () => {
    await store.writeDatabaseList(['sales_db', 'hr_db']);
    expect(await store.readDatabaseList()).toEqual(['sales_db', 'hr_db']);
    expect(JSON.parse(readFileSync(store.databaseListPath, 'utf-8'))).toEqual([
      'sales_db',
      'hr_db',
    ]);
  });

  it('rejects a malformed database list', async () => {
    writeFileSync(store.databaseListPath, '{"not": "a list"}');
    await expect(store.readDatabaseList()).rejects.toThrow();
  });

  it('fails to read a missing schema snapshot', async () => {
    await expect(store.readSchemaSnapshot()).rejects.toThrow();
  });

  it('fills in absent tables and views', async () => {
    writeFileSync(store.schemaSnapshotPath, '[{"database": "empty_db"}]');
    expect(await store.readSchemaSnapshot()).toEqual([
      { database: 'empty_db', tables: [], views: [] },
    ]);
  });

  it('appends a new database and replaces an existing one in place', async () => {
    await store.upsertDatabase(sales);
    await store.upsertDatabase(hr);

    const updated: DatabaseSnapshot = { ...sales, tables: [], views: [] };
    const result = await store.upsertDatabase(updated);

    expect(result.map((entry) => entry.database)).toEqual(['sales_db', 'hr_db']);
    expect(await store.readSchemaSnapshot()).toEqual([updated, hr]);
  });

  it('keeps every record when upserts overlap', async () => {
    const finance: DatabaseSnapshot = { database: 'finance_db', tables: [], views: [] };

    await Promise.all([
      store.upsertDatabase(sales),
      store.upsertDatabase(hr),
      store.upsertDatabase(finance),
    ]);

    expect(await store.readSchemaSnapshot()).toEqual([sales, hr, finance]);
    expect(readdirSync(dir).sort()).toEqual(['all_databases_schema.json']);
  });

  it('keeps upserting after a failed write', async () => {
    const nested = new SnapshotStore(store.databaseListPath, join(dir, 'nested', 'schema.json'));
    await expect(nested.upsertDatabase(sales)).rejects.toThrow();

    mkdirSync(join(dir, 'nested'));
    expect(await nested.upsertDatabase(hr)).toEqual([hr]);
    expect(await nested.readSchemaSnapshot()).toEqual([hr]);
  });

  it('starts over when the existing snapshot is unreadable', async () => {
    writeFileSync(store.schemaSnapshotPath, 'not json');
    expect(await store.upsertDatabase(hr)).toEqual([hr]);
  });

  it('leaves no temporary files behind', async () => {
    await store.upsertDatabase(sales);
    await store.writeDatabaseList(['sales_db']);
    expect(readdirSync(dir).sort()).toEqual(['all_databases_schema.json', 'databases.json']);
  });
});
