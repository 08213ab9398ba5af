/**
 * Custom error classes for sqlsight.
 * One class per failure category; the HTTP error handler maps them to status codes.
 */

/**
 * Error thrown when a request is missing or has malformed input.
 */
export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
    Object.setPrototypeOf(this, RequestValidationError.prototype);
  }
}

/**
 * Error thrown when the requested database is not in the schema cache.
 */
export class UnknownDatabaseError extends Error {
  public readonly database: string;

  constructor(database: string) {
    super(`Unknown database: ${database}`);
    this.name = 'UnknownDatabaseError';
    this.database = database;
    Object.setPrototypeOf(this, UnknownDatabaseError.prototype);
  }
}

/**
 * Error thrown when the generation service call fails.
 * Carries the upstream status and body when the service answered.
 */
export class LLMError extends Error {
  public readonly status?: number;
  public readonly body?: string;

  constructor(message: string, status?: number, body?: string) {
    super(message);
    this.name = 'LLMError';
    this.status = status;
    this.body = body;
    Object.setPrototypeOf(this, LLMError.prototype);
  }
}

/**
 * Error thrown when generated SQL references a restricted namespace
 * or is not read-only.
 */
export class SQLValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SQLValidationError';
    Object.setPrototypeOf(this, SQLValidationError.prototype);
  }
}

/**
 * Error thrown when the generation output holds no SQL statement.
 */
export class SQLGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SQLGenerationError';
    Object.setPrototypeOf(this, SQLGenerationError.prototype);
  }
}

/**
 * Error thrown when the warehouse rejects or fails a statement.
 */
export class SQLExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SQLExecutionError';
    Object.setPrototypeOf(this, SQLExecutionError.prototype);
  }
}

/**
 * Error thrown when refreshing the database list or a schema snapshot fails.
 */
export class RefreshError extends Error {
  public readonly details: string;

  constructor(message: string, details: string) {
    super(message);
    this.name = 'RefreshError';
    this.details = details;
    Object.setPrototypeOf(this, RefreshError.prototype);
  }
}

/**
 * Error thrown when environment configuration does not validate.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
