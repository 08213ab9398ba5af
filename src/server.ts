/**
 * Fastify server construction.
 */

import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { Services } from './app.js';
import { analyzeRoutes } from './routes/analyze.js';
import { schemaRoutes } from './routes/schemas.js';
import { utilityRoutes } from './routes/utility.js';
import {
  RequestValidationError,
  UnknownDatabaseError,
  LLMError,
  SQLValidationError,
  SQLGenerationError,
  SQLExecutionError,
  RefreshError,
  errorMessage,
} from './types/errors.js';
import type { ErrorResponse } from './types/models.js';

export interface ServerOptions {
  logger?: FastifyServerOptions['logger'];
  /** Serve Swagger UI at /docs. */
  docs?: boolean;
  maxPromptLength: number;
}

/**
 * Status code and body for an error raised while handling a request.
 * Caller input errors are 400; everything else is 500.
 */
export function toErrorResponse(error: unknown): { status: number; body: ErrorResponse } {
  if (error instanceof RequestValidationError || error instanceof UnknownDatabaseError) {
    return { status: 400, body: { error: error.message } };
  }
  if (error instanceof RefreshError) {
    return { status: 500, body: { error: error.message, details: error.details } };
  }
  if (error instanceof LLMError && error.body !== undefined) {
    return { status: 500, body: { error: error.message, details: error.body } };
  }
  if (
    error instanceof LLMError ||
    error instanceof SQLValidationError ||
    error instanceof SQLGenerationError ||
    error instanceof SQLExecutionError
  ) {
    return { status: 500, body: { error: error.message } };
  }

  // Fastify's own client errors, such as a malformed JSON body
  if (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return { status: error.statusCode, body: { error: error.message } };
  }

  return { status: 500, body: { error: errorMessage(error) || 'An unexpected error occurred' } };
}

export async function buildServer(
  services: Services,
  options: ServerOptions
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? false,
  });

  /**
   * Register CORS plugin.
   */
  await fastify.register(cors, {
    origin: '*',
  });

  /**
   * Register Swagger documentation.
   */
  if (options.docs ?? true) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'sqlsight API',
          description: 'Ask questions of a Databricks SQL warehouse in natural language',
          version: '1.0.0',
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  /**
   * Register route handlers.
   */
  await fastify.register(analyzeRoutes, {
    analyzer: services.analyzer,
    maxPromptLength: options.maxPromptLength,
  });
  await fastify.register(schemaRoutes, {
    refresher: services.refresher,
    store: services.store,
    schemaCache: services.schemaCache,
  });
  await fastify.register(utilityRoutes, {
    schemaCache: services.schemaCache,
  });

  /**
   * Every failure becomes a JSON error body; nothing partial is returned.
   */
  fastify.setErrorHandler((error, request, reply) => {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      request.log.error({ err: error }, body.error);
    } else {
      request.log.warn(body.error);
    }
    reply.status(status).send(body);
  });

  return fastify;
}
