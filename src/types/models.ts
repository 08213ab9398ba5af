/**
 * Type definitions and Zod schemas for type-safe data validation.
 */

import { z } from 'zod';
import type { CellValue } from './utils.js';

// ============================================================================
// PERSISTED SNAPSHOTS
// ============================================================================

/**
 * One column as written by schema extraction.
 */
export const SnapshotColumnSchema = z.object({
  column_name: z.string(),
  type: z.string(),
});

/**
 * A table or view with its ordered columns.
 */
export const SnapshotEntitySchema = z.object({
  name: z.string(),
  columns: z.array(SnapshotColumnSchema),
});
export type SnapshotEntity = z.infer<typeof SnapshotEntitySchema>;

/**
 * Per-database record of the schema snapshot store.
 */
export const DatabaseSnapshotSchema = z.object({
  database: z.string(),
  tables: z.array(SnapshotEntitySchema).default([]),
  views: z.array(SnapshotEntitySchema).default([]),
});
export type DatabaseSnapshot = z.infer<typeof DatabaseSnapshotSchema>;

/**
 * Whole schema snapshot file: an ordered array of database records.
 */
export const SchemaSnapshotSchema = z.array(DatabaseSnapshotSchema);
export type SchemaSnapshot = z.infer<typeof SchemaSnapshotSchema>;

/**
 * Database list file: a JSON array of names.
 */
export const DatabaseListSchema = z.array(z.string());

// ============================================================================
// SCHEMA CACHE
// ============================================================================

/**
 * Column name → declared type, in declaration order.
 */
export type TableColumns = ReadonlyMap<string, string>;

/**
 * Table or view name → columns.
 */
export type DatabaseSchema = ReadonlyMap<string, TableColumns>;

/**
 * Database name → tables and views.
 */
export type SchemaMap = ReadonlyMap<string, DatabaseSchema>;

// ============================================================================
// QUERY RESULTS
// ============================================================================

/**
 * Rows fetched from the warehouse with the column names of the result descriptor.
 * Every row holds one cell per column, in column order.
 */
export interface QueryResult {
  columns: string[];
  rows: CellValue[][];
}

// ============================================================================
// HTTP REQUESTS AND RESPONSES
// ============================================================================

/**
 * Request model for /analyze. Both fields are optional here so that a
 * missing one gets the dedicated "Missing prompt or database" error.
 */
export function createAnalyzeRequestSchema(maxPromptLength: number) {
  return z.object({
    prompt: z
      .string()
      .max(maxPromptLength, `Prompt exceeds ${maxPromptLength} characters`)
      .optional()
      .describe('Natural language question'),
    database: z.string().optional().describe('Target database name'),
  });
}
export type AnalyzeRequest = z.infer<ReturnType<typeof createAnalyzeRequestSchema>>;

/**
 * Request model for /load_schema.
 */
export const LoadSchemaRequestSchema = z.object({
  database: z.string().optional(),
});
export type LoadSchemaRequest = z.infer<typeof LoadSchemaRequestSchema>;

/**
 * Response model for /analyze.
 */
export interface AnalyzeResponse {
  sql: string;
  columns: string[];
  rows: CellValue[][];
  insight: string;
}

/**
 * Body of every error response.
 */
export interface ErrorResponse {
  error: string;
  details?: string;
}
