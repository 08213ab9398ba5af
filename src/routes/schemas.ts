/**
 * Schema and database list management endpoints.
 */

import type { FastifyInstance } from 'fastify';
import { LoadSchemaRequestSchema } from '../types/models.js';
import { RequestValidationError } from '../types/errors.js';
import type { SchemaRefresher } from '../services/refresh.js';
import type { SnapshotStore } from '../services/snapshot-store.js';
import type { SchemaCache } from '../services/schema-cache.js';
import { parseBody } from './parse.js';

export interface SchemaRouteOptions {
  refresher: SchemaRefresher;
  store: SnapshotStore;
  schemaCache: SchemaCache;
}

export async function schemaRoutes(fastify: FastifyInstance, options: SchemaRouteOptions) {
  const { refresher, store, schemaCache } = options;

  // POST /load_schema - extract one database's schema and reload the cache
  fastify.post(
    '/load_schema',
    {
      schema: {
        description: 'Extract and cache the schema of one database',
        tags: ['Schemas'],
      },
    },
    async (request) => {
      const { database } = parseBody(LoadSchemaRequestSchema, request.body);
      const name = database?.trim();
      if (!name) {
        throw new RequestValidationError('Missing database name');
      }

      const record = await refresher.loadSchema(name);
      return {
        status: `Schema for \`${name}\` loaded successfully.`,
        tables: record.tables.length,
        views: record.views.length,
      };
    }
  );

  // POST /refresh_databases - rewrite the database list from the warehouse
  fastify.post(
    '/refresh_databases',
    {
      schema: {
        description: 'Refresh the list of databases on the warehouse',
        tags: ['Schemas'],
      },
    },
    async () => {
      const databases = await refresher.refreshDatabases();
      return { status: 'Database list refreshed.', databases };
    }
  );

  // GET /databases - persisted database list and the databases with a loaded schema
  fastify.get(
    '/databases',
    {
      schema: {
        description: 'List known databases',
        tags: ['Schemas'],
      },
    },
    async () => {
      return {
        databases: await store.readDatabaseList(),
        loaded: schemaCache.databases(),
      };
    }
  );
}
