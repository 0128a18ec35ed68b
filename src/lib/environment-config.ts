/**
 * Environment Configuration Management
 *
 * Builds the typed application configuration from environment variables.
 * Configuration is an explicit value handed to the components that need a
 * connection; nothing here holds credentials globally.
 */

import * as dotenv from 'dotenv';
import { ConfigurationError, LogLevel } from './error-handler';
import type { FailurePolicy } from '../types/migration-types';

export interface SourceConfig {
  sqlitePath: string;
}

export interface DestinationConfig {
  connectionString: string;
  ssl: boolean;
  connectionTimeoutMillis: number;
}

export interface MigrationConfig {
  batchSize: number;
  maxRetryAttempts: number;
  retryDelayMs: number;
  failurePolicy: FailurePolicy;
  recreateTables: boolean;
  includeForeignKeys: boolean;
}

export interface AssistantConfig {
  apiKey: string | null;
  model: string;
}

export type Environment = 'development' | 'staging' | 'production' | 'test';

export interface AppConfig {
  source: SourceConfig;
  destination: DestinationConfig;
  migration: MigrationConfig;
  assistant: AssistantConfig;
  environment: Environment;
  logging: {
    level: LogLevel;
    enableFileLogging: boolean;
    logDirectory: string;
  };
}

type Env = Record<string, string | undefined>;

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production', 'test'];
const FAILURE_POLICIES: readonly FailurePolicy[] = ['continue', 'abort'];
const LOG_LEVELS: readonly LogLevel[] = Object.values(LogLevel);

/**
 * Loads variables from a .env file into process.env (existing values win)
 */
export function loadEnvironment(path?: string): void {
  dotenv.config(path ? { path } : {});
}

function parseInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got '${raw}'`, 'CONFIG_INVALID_NUMBER', { variable: name });
  }
  return value;
}

function parseBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(raw.trim().toLowerCase());
}

function pickOne<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  const match = choices.find(choice => choice === raw);
  if (!match) {
    throw new ConfigurationError(
      `Invalid ${name}: ${raw}. Must be one of: ${choices.join(', ')}`,
      'CONFIG_INVALID_CHOICE',
      { variable: name }
    );
  }
  return match;
}

function buildConnectionString(env: Env): string {
  if (env.DATABASE_URL) {
    return env.DATABASE_URL;
  }
  if (!env.TARGET_DB_HOST) {
    throw new ConfigurationError(
      'Missing destination database settings: set DATABASE_URL or TARGET_DB_HOST',
      'CONFIG_MISSING_DESTINATION'
    );
  }
  const user = encodeURIComponent(env.TARGET_DB_USER || 'postgres');
  const password = env.TARGET_DB_PASSWORD ? `:${encodeURIComponent(env.TARGET_DB_PASSWORD)}` : '';
  const port = env.TARGET_DB_PORT || '5432';
  const database = env.TARGET_DB_NAME || 'postgres';
  return `postgresql://${user}${password}@${env.TARGET_DB_HOST}:${port}/${database}`;
}

/**
 * Builds and validates the configuration from an environment map
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = pickOne(env, 'LOG_LEVEL', LOG_LEVELS, LogLevel.INFO);

  const config: AppConfig = {
    source: {
      sqlitePath: env.SQLITE_PATH || './data/source.db'
    },
    destination: {
      connectionString: buildConnectionString(env),
      ssl: parseBoolean(env, 'TARGET_DB_SSL', false),
      connectionTimeoutMillis: parseInteger(env, 'TARGET_DB_TIMEOUT', 30000)
    },
    migration: {
      batchSize: parseInteger(env, 'BATCH_SIZE', 1000),
      maxRetryAttempts: parseInteger(env, 'MAX_RETRY_ATTEMPTS', 3),
      retryDelayMs: parseInteger(env, 'RETRY_DELAY_MS', 500),
      failurePolicy: pickOne(env, 'FAILURE_POLICY', FAILURE_POLICIES, 'continue'),
      recreateTables: parseBoolean(env, 'RECREATE_TABLES', false),
      includeForeignKeys: parseBoolean(env, 'INCLUDE_FOREIGN_KEYS', true)
    },
    assistant: {
      apiKey: env.OPENAI_API_KEY || null,
      model: env.OPENAI_MODEL || 'gpt-4o-mini'
    },
    environment: pickOne(env, 'NODE_ENV', ENVIRONMENTS, 'development'),
    logging: {
      level: logLevel,
      enableFileLogging: parseBoolean(env, 'ENABLE_FILE_LOGGING', false),
      logDirectory: env.LOG_DIRECTORY || './logs'
    }
  };

  validateConfig(config);
  return config;
}

/**
 * Validates ranges; throws ConfigurationError on the first problem found
 */
export function validateConfig(config: AppConfig): void {
  const { migration, destination } = config;

  if (migration.batchSize < 1 || migration.batchSize > 10000) {
    throw new ConfigurationError(
      `Invalid batch size: ${migration.batchSize}. Must be between 1 and 10000.`,
      'CONFIG_INVALID_BATCH_SIZE'
    );
  }

  if (migration.maxRetryAttempts < 0 || migration.maxRetryAttempts > 10) {
    throw new ConfigurationError(
      `Invalid max retry attempts: ${migration.maxRetryAttempts}. Must be between 0 and 10.`,
      'CONFIG_INVALID_RETRIES'
    );
  }

  if (migration.retryDelayMs < 0) {
    throw new ConfigurationError(`Invalid retry delay: ${migration.retryDelayMs}ms`, 'CONFIG_INVALID_RETRY_DELAY');
  }

  if (!/^postgres(ql)?:\/\//.test(destination.connectionString)) {
    throw new ConfigurationError(
      'Destination connection string must start with postgres:// or postgresql://',
      'CONFIG_INVALID_CONNECTION_STRING'
    );
  }

  if (config.source.sqlitePath.trim() === '') {
    throw new ConfigurationError('SQLITE_PATH must not be empty', 'CONFIG_MISSING_SOURCE');
  }
}

/**
 * Hides credentials in a connection string
 */
export function maskConnectionString(connectionString: string): string {
  return connectionString.replace(/\/\/([^:/@]+):[^@]*@/, '//$1:***@');
}

/**
 * Returns a copy of the configuration that is safe to log
 */
export function getConfigForLogging(config: AppConfig): Record<string, unknown> {
  return {
    source: config.source,
    destination: {
      ...config.destination,
      connectionString: maskConnectionString(config.destination.connectionString)
    },
    migration: config.migration,
    assistant: {
      model: config.assistant.model,
      apiKey: config.assistant.apiKey ? '***masked***' : ''
    },
    environment: config.environment,
    logging: config.logging
  };
}
