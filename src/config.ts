/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';
import { ConfigError } from './types/errors.js';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Boolean flag read from an environment string ("true"/"false", "1"/"0").
 */
const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // LLM Provider Configuration
  LLM_PROVIDER: z.enum(['groq', 'openai', 'anthropic']).default('groq'),
  LLM_MODEL: z.string().default('llama-3.3-70b-versatile'),

  // API Keys (provider-specific)
  GROQ_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),

  // Generation budgets
  SQL_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(200),
  INSIGHT_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(300),
  INSIGHT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),

  // Databricks SQL warehouse
  DATABRICKS_HOSTNAME: z.string().optional(),
  DATABRICKS_HTTP_PATH: z.string().optional(),
  DATABRICKS_TOKEN: z.string().optional(),

  // Snapshot stores
  DATABASE_LIST_PATH: z.string().default('databases.json'),
  SCHEMA_SNAPSHOT_PATH: z.string().default('all_databases_schema.json'),

  // SQL pipeline
  PLACEHOLDER_DATABASE: z
    .string()
    .min(1)
    .default('your_database_name')
    .describe('Example database name the model may emit instead of the real one'),
  SQL_READ_ONLY: BooleanFlag.default('true'),
  MAX_PROMPT_LENGTH: z.coerce.number().int().positive().default(2000),

  // Server Configuration
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
    .default('INFO'),
});

/**
 * Type for base configuration object.
 */
type BaseConfig = z.infer<typeof ConfigSchema>;

export type LLMProvider = BaseConfig['LLM_PROVIDER'];

/**
 * Configuration with the provider credentials and warehouse settings grouped.
 */
export interface Config extends Omit<BaseConfig,
  'LLM_PROVIDER' | 'LLM_MODEL' |
  'GROQ_API_KEY' | 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY' |
  'DATABRICKS_HOSTNAME' | 'DATABRICKS_HTTP_PATH' | 'DATABRICKS_TOKEN' |
  'DATABASE_LIST_PATH' | 'SCHEMA_SNAPSHOT_PATH'
> {
  LLM_CONFIG: {
    provider: LLMProvider;
    model: string;
    apiKey?: string;
  };
  WAREHOUSE_CONFIG: {
    host?: string;
    path?: string;
    token?: string;
  };
  DATABASE_LIST_PATH: string;
  SCHEMA_SNAPSHOT_PATH: string;
}

const API_KEY_VARIABLES: Record<LLMProvider, 'GROQ_API_KEY' | 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY'> = {
  groq: 'GROQ_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

/**
 * Parse and validate configuration from environment variables.
 *
 * Relative store paths are resolved against the project root, the same
 * place the .env file is read from.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError('Configuration validation failed', issues);
  }

  const {
    LLM_PROVIDER,
    LLM_MODEL,
    GROQ_API_KEY,
    OPENAI_API_KEY,
    ANTHROPIC_API_KEY,
    DATABRICKS_HOSTNAME,
    DATABRICKS_HTTP_PATH,
    DATABRICKS_TOKEN,
    DATABASE_LIST_PATH,
    SCHEMA_SNAPSHOT_PATH,
    ...rest
  } = parsed.data;

  const apiKeys: Record<LLMProvider, string | undefined> = {
    groq: GROQ_API_KEY,
    openai: OPENAI_API_KEY,
    anthropic: ANTHROPIC_API_KEY,
  };

  return {
    ...rest,
    LLM_CONFIG: {
      provider: LLM_PROVIDER,
      model: LLM_MODEL,
      apiKey: apiKeys[LLM_PROVIDER] || undefined,
    },
    WAREHOUSE_CONFIG: {
      host: DATABRICKS_HOSTNAME || undefined,
      path: DATABRICKS_HTTP_PATH || undefined,
      token: DATABRICKS_TOKEN || undefined,
    },
    DATABASE_LIST_PATH: resolve(rootDir, DATABASE_LIST_PATH),
    SCHEMA_SNAPSHOT_PATH: resolve(rootDir, SCHEMA_SNAPSHOT_PATH),
  };
}

/**
 * Names of the environment variables a running service still needs.
 * Empty when the generation service and the warehouse are both configured.
 */
export function missingCredentials(cfg: Config): string[] {
  const missing: string[] = [];
  if (!cfg.LLM_CONFIG.apiKey) {
    missing.push(API_KEY_VARIABLES[cfg.LLM_CONFIG.provider]);
  }
  if (!cfg.WAREHOUSE_CONFIG.host) missing.push('DATABRICKS_HOSTNAME');
  if (!cfg.WAREHOUSE_CONFIG.path) missing.push('DATABRICKS_HTTP_PATH');
  if (!cfg.WAREHOUSE_CONFIG.token) missing.push('DATABRICKS_TOKEN');
  return missing;
}

/**
 * Exit when credentials are missing; used by the server and CLI entry points.
 */
export function requireCredentials(cfg: Config): void {
  const missing = missingCredentials(cfg);
  if (missing.length > 0) {
    console.error('Missing required configuration:');
    for (const name of missing) {
      console.error(`  - ${name}`);
    }
    process.exit(1);
  }
}

function loadConfigOrExit(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`${error.message}:`);
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Global configuration instance.
 */
export const config = loadConfigOrExit();
