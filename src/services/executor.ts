/**
 * Query execution against the warehouse.
 */

import type { QueryResult } from '../types/models.js';
import { SQLExecutionError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { quoteIdentifier, type Warehouse } from './warehouse.js';

/**
 * Execute one finalized statement, selecting the working database first
 * when one is given.
 *
 * A single round trip: no retry, no timeout, all rows held in memory.
 *
 * @throws SQLExecutionError carrying the warehouse's message
 */
export async function runQuery(
  warehouse: Warehouse,
  statement: string,
  database?: string
): Promise<QueryResult> {
  const startTime = Date.now();

  try {
    const result = await warehouse.withSession(async (session) => {
      if (database) {
        await session.run(`USE ${quoteIdentifier(database)}`);
      }
      return session.run(statement);
    });

    logger.info(
      `Query returned ${result.rows.length} row(s) in ${Date.now() - startTime}ms`
    );
    return result;
  } catch (error) {
    logger.error(`SQL execution failed: ${errorMessage(error)}`);
    throw new SQLExecutionError(errorMessage(error));
  }
}
