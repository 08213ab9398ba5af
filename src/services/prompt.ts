/**
 * Prompt compiler for SQL generation.
 */

import type { DatabaseSchema } from '../types/models.js';
import type { GenerationRequest } from './llm.js';

export interface SqlRequestOptions {
  maxOutputTokens: number;
}

/**
 * One line per table or view: `orders: id (bigint), amount (decimal(10,2))`.
 */
export function buildSchemaDescription(schema: DatabaseSchema): string {
  const lines: string[] = [];
  for (const [table, columns] of schema) {
    const described = Array.from(columns, ([column, type]) => `${column} (${type})`);
    lines.push(`${table}: ${described.join(', ')}`);
  }
  return lines.join('\n');
}

/**
 * System instruction: the schema, the namespace restriction, SQL-only output.
 */
export function buildSqlSystemPrompt(schema: DatabaseSchema, database: string): string {
  return (
    `You are an expert SQL assistant. Use the following schema from database \`${database}\`:\n` +
    `${buildSchemaDescription(schema)}\n` +
    `Do not use \`information_schema\` or any system schemas. Only query user tables.\n` +
    `Always generate a query for a table. Output valid SQL only. No explanations.`
  );
}

/**
 * Generation request for turning a question into SQL.
 * Sampling is deterministic.
 */
export function buildSqlRequest(
  question: string,
  schema: DatabaseSchema,
  database: string,
  options: SqlRequestOptions
): GenerationRequest {
  return {
    system: buildSqlSystemPrompt(schema, database),
    messages: [{ role: 'user', content: question.trim() }],
    temperature: 0,
    maxOutputTokens: options.maxOutputTokens,
  };
}
