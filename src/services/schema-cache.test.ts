import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { SchemaCache, buildSchemaMap } from './schema-cache.js';
import { createTempStore } from '../test-utils/fakes.js';
import type { SnapshotStore } from './snapshot-store.js';
import type { SchemaSnapshot, TableColumns } from '../types/models.js';

function entries(columns: TableColumns | undefined): Array<[string, string]> {
  return columns ? Array.from(columns) : [];
}

const snapshot: SchemaSnapshot = [
  {
    database: 'sales_db',
    tables: [
      {
        name: 'orders',
        columns: [
          { column_name: 'id', type: 'bigint' },
          { column_name: 'amount', type: 'decimal(10,2)' },
        ],
      },
      { name: 'summary', columns: [{ column_name: 'total', type: 'double' }] },
    ],
    views: [{ name: 'summary', columns: [{ column_name: 'month', type: 'string' }] }],
  },
  { database: 'empty_db', tables: [], views: [] },
];

describe('buildSchemaMap', () => {
  it('maps databases to tables to column types', () => {
    const map = buildSchemaMap(snapshot);
    expect(Array.from(map.keys())).toEqual(['sales_db', 'empty_db']);
    expect(entries(map.get('sales_db')?.get('orders'))).toEqual([
      ['id', 'bigint'],
      ['amount', 'decimal(10,2)'],
    ]);
    expect(map.get('empty_db')?.size).toBe(0);
  });

  it('lets a view replace a table of the same name', () => {
    const summary = buildSchemaMap(snapshot).get('sales_db')?.get('summary');
    expect(entries(summary)).toEqual([['month', 'string']]);
  });
});

describe('SchemaCache', () => {
  let store: SnapshotStore;
  let cleanup: () => void;

  beforeEach(() => {
    ({ store, cleanup } = createTempStore());
  });

  afterEach(() => {
    cleanup();
  });

  it('loads an empty mapping when the snapshot is missing', async () => {
    const cache = new SchemaCache(store);
    expect((await cache.load()).size).toBe(0);
  });

  it('loads an empty mapping when the snapshot is malformed', async () => {
    writeFileSync(store.schemaSnapshotPath, '{ broken');
    const cache = new SchemaCache(store);
    expect((await cache.load()).size).toBe(0);
  });

  it('swaps in a new version on reload', async () => {
    const cache = new SchemaCache(store);
    expect(cache.has('sales_db')).toBe(false);

    await store.writeSchemaSnapshot(snapshot);
    const loaded = await cache.reload();

    expect(loaded.version).toBe(1);
    expect(cache.has('sales_db')).toBe(true);
    expect(cache.get('sales_db')?.has('orders')).toBe(true);
    expect(cache.databases()).toEqual(['sales_db', 'empty_db']);
    expect(cache.stats()).toMatchObject({ version: 1, databases: 2, tables: 2 });
  });

  it('keeps earlier snapshots intact for readers holding them', async () => {
    const cache = new SchemaCache(store);
    await store.writeSchemaSnapshot(snapshot);
    await cache.reload();
    const before = cache.snapshot();

    await store.writeSchemaSnapshot([{ database: 'hr_db', tables: [], views: [] }]);
    await cache.reload();

    expect(before.schemas.has('sales_db')).toBe(true);
    expect(cache.has('sales_db')).toBe(false);
    expect(cache.has('hr_db')).toBe(true);
  });

  it('runs concurrent reloads one after another', async () => {
    const cache = new SchemaCache(store);
    await store.writeSchemaSnapshot(snapshot);

    const versions = await Promise.all([cache.reload(), cache.reload(), cache.reload()]);

    expect(versions.map((entry) => entry.version)).toEqual([1, 2, 3]);
    expect(cache.snapshot().version).toBe(3);
  });
});
