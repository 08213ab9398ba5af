#!/usr/bin/env node
/**
 * sqlsight CLI
 * Server start-up, refresh jobs and one-off questions from the terminal.
 */

import { cac } from 'cac';
import { config, requireCredentials } from './config.js';
import { createServices } from './app.js';
import { RefreshError, errorMessage } from './types/errors.js';
import * as logger from './cli/logger.js';

const cli = cac('sqlsight');

cli.version('1.0.0');

cli.help();

function fail(title: string, error: unknown): never {
  const detail = error instanceof RefreshError ? error.details : undefined;
  logger.error(title, detail);
  logger.errorBox(errorMessage(error));
  process.exit(1);
}

/**
 * sqlsight serve
 * Start the HTTP server in this process
 */
cli
  .command('serve', 'Start the HTTP server')
  .action(async () => {
    logger.printBanner();
    await import('./index.js');
  });

/**
 * sqlsight refresh-databases
 * Rewrite the database list store from SHOW DATABASES
 */
cli
  .command('refresh-databases', 'Refresh the list of databases')
  .action(async () => {
    requireCredentials(config);
    const { refresher } = createServices(config);
    const spin = logger.spinner('Listing databases...');

    try {
      const databases = await refresher.refreshDatabases();
      spin.succeed(`Saved ${databases.length} database(s) to ${config.DATABASE_LIST_PATH}`);
      for (const name of databases) {
        logger.info(name);
      }
    } catch (error) {
      spin.fail('Refresh failed');
      fail('Failed to refresh databases', error);
    }
  });

/**
 * sqlsight load-schema <database>
 * Extract one database's tables and views into the schema snapshot
 */
cli
  .command('load-schema <database>', 'Extract and store the schema of a database')
  .action(async (database: string) => {
    requireCredentials(config);
    const { refresher } = createServices(config);
    const spin = logger.spinner(`Extracting schema for ${database}...`);

    try {
      const record = await refresher.loadSchema(database);
      spin.succeed(
        `Schema for '${database}' saved to ${config.SCHEMA_SNAPSHOT_PATH} ` +
          `(${record.tables.length} tables, ${record.views.length} views)`
      );
    } catch (error) {
      spin.fail('Schema extraction failed');
      fail(`Failed to load schema for ${database}`, error);
    }
  });

/**
 * sqlsight ask <prompt> --database <name>
 * Answer a question without the HTTP server
 */
cli
  .command('ask <prompt>', 'Ask a question about a database')
  .option('-d, --database <name>', 'Target database')
  .option('--sql-only', 'Print the generated SQL without running it')
  .action(async (prompt: string, options: { database?: string; sqlOnly?: boolean }) => {
    requireCredentials(config);
    const { schemaCache, analyzer } = createServices(config);
    await schemaCache.reload();

    logger.printBanner();
    const spin = logger.spinner('Thinking...');

    try {
      if (options.sqlOnly) {
        const { sql } = await analyzer.generateSql({ prompt, database: options.database });
        spin.stop();
        logger.section('Generated SQL');
        logger.sql(sql);
        return;
      }

      const result = await analyzer.analyze({ prompt, database: options.database });
      spin.stop();

      logger.section('Generated SQL');
      logger.sql(result.sql);

      logger.section(`Results (${result.rows.length} rows)`);
      logger.table(result.columns, result.rows);
      logger.newline();

      logger.insight(result.insight);
    } catch (error) {
      spin.fail('Question failed');
      fail('Failed to answer the question', error);
    }
  });

// Parse CLI arguments
cli.parse();
