/**
 * Main orchestration pipeline: question → SQL → rows → insight.
 */

import type { AnalyzeResponse } from '../types/models.js';
import { RequestValidationError, UnknownDatabaseError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { SchemaCache } from './schema-cache.js';
import type { GenerationService } from './llm.js';
import type { Warehouse } from './warehouse.js';
import { buildSqlRequest } from './prompt.js';
import { sanitizeGeneratedSql } from './sanitizer.js';
import { runQuery } from './executor.js';
import { generateInsight } from './insight.js';

export interface AnalyzerOptions {
  sqlMaxOutputTokens: number;
  insightMaxOutputTokens: number;
  insightTemperature: number;
  placeholderDatabase: string;
  readOnly: boolean;
}

export interface AnalyzeInput {
  prompt?: string;
  database?: string;
}

export class Analyzer {
  constructor(
    private readonly schemaCache: SchemaCache,
    private readonly generation: GenerationService,
    private readonly warehouse: Warehouse,
    private readonly options: AnalyzerOptions
  ) {}

  /**
   * Generate SQL for a question without running it.
   *
   * @throws RequestValidationError when prompt or database is missing
   * @throws UnknownDatabaseError when the database is not in the schema cache
   * @throws LLMError, SQLValidationError, SQLGenerationError from generation and sanitizing
   */
  async generateSql(input: AnalyzeInput): Promise<{ prompt: string; database: string; sql: string }> {
    const prompt = input.prompt?.trim();
    const database = input.database?.trim();
    if (!prompt || !database) {
      throw new RequestValidationError('Missing prompt or database');
    }

    // Checked before any external call
    const schema = this.schemaCache.get(database);
    if (!schema) {
      throw new UnknownDatabaseError(database);
    }

    logger.info(`Generating SQL for ${database}: ${prompt}`);
    const raw = await this.generation.generate(
      buildSqlRequest(prompt, schema, database, {
        maxOutputTokens: this.options.sqlMaxOutputTokens,
      })
    );
    logger.debug(`Raw generation output: ${raw}`);

    const sql = sanitizeGeneratedSql(raw, database, {
      placeholder: this.options.placeholderDatabase,
      readOnly: this.options.readOnly,
    });
    logger.info(`Generated SQL: ${sql}`);

    return { prompt, database, sql };
  }

  /**
   * Answer a question end to end. Either every stage succeeds or the
   * first failure is thrown; nothing partial is returned.
   *
   * @throws SQLExecutionError when the warehouse fails
   */
  async analyze(input: AnalyzeInput): Promise<AnalyzeResponse> {
    const { prompt, database, sql } = await this.generateSql(input);

    const { rows, columns } = await runQuery(this.warehouse, sql, database);

    const insight = await generateInsight(this.generation, rows, columns, prompt, {
      temperature: this.options.insightTemperature,
      maxOutputTokens: this.options.insightMaxOutputTokens,
    });

    return { sql, columns, rows, insight };
  }
}
