/**
 * sqlsight server - Main Entry Point
 */

import { config, requireCredentials } from './config.js';
import { createServices } from './app.js';
import { buildServer } from './server.js';
import { logger, loggerConfig } from './utils/logger.js';

requireCredentials(config);

const services = createServices(config);

/**
 * Create and configure Fastify server.
 */
const fastify = await buildServer(services, {
  logger: loggerConfig,
  maxPromptLength: config.MAX_PROMPT_LENGTH,
});

/**
 * Lifecycle hooks.
 */
fastify.addHook('onReady', async () => {
  logger.info('Starting sqlsight server...');
  await services.schemaCache.reload();
});

fastify.addHook('onClose', async () => {
  logger.info('Shutting down sqlsight server...');
});

/**
 * Start the server.
 */
const start = async () => {
  try {
    await fastify.listen({ port: config.PORT, host: config.HOST });
    logger.info(`Server running at http://localhost:${config.PORT}`);
    logger.info(`API docs at http://localhost:${config.PORT}/docs`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    );
  });
}

await start();
