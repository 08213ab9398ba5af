/**
 * Utility endpoints (health, root).
 */

import type { FastifyInstance } from 'fastify';
import type { SchemaCache } from '../services/schema-cache.js';

export interface UtilityRouteOptions {
  schemaCache: SchemaCache;
}

export async function utilityRoutes(fastify: FastifyInstance, options: UtilityRouteOptions) {
  const { schemaCache } = options;

  // GET /health - Health check
  fastify.get('/health', async () => {
    return {
      status: 'ok',
      schema_cache: schemaCache.stats(),
    };
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'sqlsight',
      version: '1.0.0',
      description: 'Ask questions of a Databricks SQL warehouse in natural language',
      docs: '/docs',
    };
  });
}
