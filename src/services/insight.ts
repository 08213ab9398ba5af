/**
 * Insight compiler: summarizes result rows in prose.
 */

import type { CellValue, JsonObject } from '../types/utils.js';
import type { GenerationRequest, GenerationService } from './llm.js';

export const NO_DATA_MESSAGE = 'No data found for this query.';

export const ANALYST_PERSONA = "You're a data analyst. Provide concise insights.";

export interface InsightOptions {
  temperature: number;
  maxOutputTokens: number;
}

/**
 * Column-keyed records in row order.
 * Cells are already JSON values (decimals and big integers arrive as numbers).
 */
export function toRecords(rows: CellValue[][], columns: string[]): JsonObject[] {
  return rows.map((row) => {
    const record: JsonObject = {};
    columns.forEach((column, i) => {
      record[column] = row[i] ?? null;
    });
    return record;
  });
}

export function buildInsightRequest(
  rows: CellValue[][],
  columns: string[],
  question: string,
  options: InsightOptions
): GenerationRequest {
  const records = toRecords(rows, columns);
  return {
    system: ANALYST_PERSONA,
    messages: [
      { role: 'user', content: `User question: ${question}` },
      { role: 'user', content: `Data:\n${JSON.stringify(records, null, 2)}` },
    ],
    temperature: options.temperature,
    maxOutputTokens: options.maxOutputTokens,
  };
}

/**
 * Prose summary of the rows. An empty row set gets the fixed message
 * without calling the generation service.
 */
export async function generateInsight(
  generation: GenerationService,
  rows: CellValue[][],
  columns: string[],
  question: string,
  options: InsightOptions
): Promise<string> {
  if (rows.length === 0) {
    return NO_DATA_MESSAGE;
  }
  return generation.generate(buildInsightRequest(rows, columns, question, options));
}
