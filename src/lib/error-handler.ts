/**
 * Error Handling and Logging Infrastructure
 *
 * Error taxonomy for the migration, classification of raw driver errors,
 * retry with backoff, and the structured logger used across the tool.
 */

import * as fs from 'fs';
import * as path from 'path';

// ===== ERROR CLASSIFICATION =====

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  SCHEMA = 'schema',
  DATA = 'data',
  CONSTRAINT = 'constraint',
  NETWORK = 'network',
  DATABASE = 'database',
  CONFIGURATION = 'configuration',
  ASSISTANT = 'assistant'
}

export enum RecoveryStrategy {
  RETRY = 'retry',
  SKIP = 'skip',
  FAIL_FAST = 'fail_fast',
  ROLLBACK = 'rollback'
}

// ===== CUSTOM ERROR CLASSES =====

export class MigrationBaseError extends Error {
  public readonly errorCode: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly recoveryStrategy: RecoveryStrategy;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    errorCode: string,
    category: ErrorCategory,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    recoveryStrategy: RecoveryStrategy = RecoveryStrategy.ROLLBACK,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.category = category;
    this.severity = severity;
    this.recoveryStrategy = recoveryStrategy;
    this.context = context;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert to structured log format
   */
  toLogFormat(): LogEntry {
    return {
      timestamp: this.timestamp,
      level: this.severity === ErrorSeverity.LOW ? LogLevel.WARN : LogLevel.ERROR,
      message: this.message,
      error_code: this.errorCode,
      category: this.category,
      severity: this.severity,
      recovery_strategy: this.recoveryStrategy,
      context: this.context,
      stack_trace: this.stack
    };
  }
}

/**
 * Source catalog unreadable or table missing
 */
export class SchemaReadError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'SCHEMA_READ_ERROR', ErrorCategory.SCHEMA, ErrorSeverity.HIGH, RecoveryStrategy.SKIP, context, { cause });
  }
}

/**
 * Two source identifiers resolve to the same destination identifier
 */
export class SchemaConflictError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SCHEMA_CONFLICT', ErrorCategory.SCHEMA, ErrorSeverity.HIGH, RecoveryStrategy.SKIP, context);
  }
}

export class TypeCoercionError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'TYPE_COERCION', ErrorCategory.DATA, ErrorSeverity.MEDIUM, RecoveryStrategy.ROLLBACK, context, { cause });
  }
}

export class ConstraintViolationError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'CONSTRAINT_VIOLATION', ErrorCategory.CONSTRAINT, ErrorSeverity.MEDIUM, RecoveryStrategy.ROLLBACK, context, { cause });
  }
}

export class ConnectivityError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'CONNECTIVITY', ErrorCategory.NETWORK, ErrorSeverity.HIGH, RecoveryStrategy.RETRY, context, { cause });
  }
}

/**
 * Any other failure reported by the destination (rejected DDL, permissions, ...)
 */
export class DestinationError extends MigrationBaseError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'DESTINATION_ERROR', ErrorCategory.DATABASE, ErrorSeverity.HIGH, RecoveryStrategy.ROLLBACK, context, { cause });
  }
}

export class ConfigurationError extends MigrationBaseError {
  constructor(message: string, errorCode: string = 'CONFIG_ERROR', context: Record<string, unknown> = {}) {
    super(message, errorCode, ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, RecoveryStrategy.FAIL_FAST, context);
  }
}

export class AssistantError extends MigrationBaseError {
  constructor(message: string, errorCode: string = 'ASSISTANT_ERROR', context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, errorCode, ErrorCategory.ASSISTANT, ErrorSeverity.LOW, RecoveryStrategy.FAIL_FAST, context, { cause });
  }
}

// ===== DRIVER ERROR CLASSIFICATION =====

const CONNECTIVITY_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN'
]);

const CONNECTIVITY_MESSAGE_PATTERN = /connection terminated|connection (was )?closed|client has encountered a connection error|terminating connection|timeout exceeded when trying to connect|not queryable/i;

function readCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function readMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Maps a raw pg/socket error onto the migration error taxonomy.
 * SQLSTATE class 23 → constraint, class 22 → coercion, class 08 and 57P0x → connectivity.
 */
export function classifyDestinationError(error: unknown, context: Record<string, unknown> = {}): MigrationBaseError {
  if (error instanceof MigrationBaseError) {
    return error;
  }

  const code = readCode(error);
  const message = readMessage(error);
  const details = code ? { ...context, sqlstate: code } : context;

  if (code && CONNECTIVITY_ERROR_CODES.has(code)) {
    return new ConnectivityError(message, details, error);
  }

  if (code && /^[0-9A-Z]{5}$/.test(code)) {
    if (code.startsWith('23')) {
      return new ConstraintViolationError(message, details, error);
    }
    if (code.startsWith('22')) {
      return new TypeCoercionError(message, details, error);
    }
    if (code.startsWith('08') || code.startsWith('57P0')) {
      return new ConnectivityError(message, details, error);
    }
    return new DestinationError(message, details, error);
  }

  if (CONNECTIVITY_MESSAGE_PATTERN.test(message)) {
    return new ConnectivityError(message, details, error);
  }

  return new DestinationError(message, details, error);
}

/**
 * Short kind name used in summaries ("TypeCoercionError", ...)
 */
export function errorKind(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return 'Error';
}

// ===== RETRY =====

export interface RetryOptions {
  maxRetries: number;
  delayMs: number;
  backoffMultiplier?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Computes the wait before retry number `attempt` (1-based)
 */
export function backoffDelay(attempt: number, delayMs: number, backoffMultiplier = 2, maxDelayMs = 30000): number {
  return Math.min(delayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs);
}

/**
 * Runs an operation, retrying it up to `maxRetries` times while `shouldRetry` accepts the error
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleep = options.sleep ?? delay;
  let attempt = 0;

  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      attempt++;
      if (attempt > options.maxRetries || !shouldRetry(error)) {
        throw error;
      }
      const wait = backoffDelay(attempt, options.delayMs, options.backoffMultiplier, options.maxDelayMs);
      if (options.onRetry) {
        await options.onRetry(error, attempt, wait);
      }
      await sleep(wait);
    }
  }
}

// ===== LOGGING INFRASTRUCTURE =====

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error_code?: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  recovery_strategy?: RecoveryStrategy;
  stack_trace?: string;
  migration_id?: string;
  table_name?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logDirectory: string;
  maxFileSize?: number;
  enableStructuredLogging: boolean;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export class Logger {
  private config: LoggerConfig;
  private migrationId: string | null = null;
  private currentLogFile: string | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: LogLevel.INFO,
      enableConsole: true,
      enableFile: false,
      logDirectory: './logs',
      maxFileSize: 10 * 1024 * 1024,
      enableStructuredLogging: false,
      ...config
    };

    this.ensureLogDirectory();
    this.initializeLogFile();
  }

  setMigrationId(migrationId: string): void {
    this.migrationId = migrationId;
  }

  clearContext(): void {
    this.migrationId = null;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const errorContext = error instanceof MigrationBaseError
      ? { ...context, ...error.context, error_code: error.errorCode, error_message: error.message }
      : error instanceof Error
        ? { ...context, error_message: error.message, stack_trace: error.stack }
        : context;

    this.log(LogLevel.ERROR, message, errorContext);
  }

  /**
   * Log a classified migration error against a table
   */
  logMigrationError(error: MigrationBaseError, tableName?: string): void {
    if (!this.shouldLog(error.toLogFormat().level)) {
      return;
    }
    const entry = error.toLogFormat();
    entry.migration_id = this.migrationId ?? undefined;
    entry.table_name = tableName;
    this.writeLogEntry(entry);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    this.writeLogEntry({
      timestamp: new Date(),
      level,
      message,
      context,
      migration_id: this.migrationId ?? undefined
    });
  }

  private writeLogEntry(entry: LogEntry): void {
    const formatted = this.formatLogEntry(entry);

    if (this.config.enableConsole) {
      this.writeToConsole(entry.level, formatted);
    }

    if (this.config.enableFile) {
      this.writeToFile(JSON.stringify({ ...entry, timestamp: entry.timestamp.toISOString() }));
    }
  }

  private formatLogEntry(entry: LogEntry): string {
    if (this.config.enableStructuredLogging) {
      return JSON.stringify({ ...entry, timestamp: entry.timestamp.toISOString() });
    }

    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const migration = entry.migration_id ? `[${entry.migration_id.slice(0, 8)}] ` : '';
    const table = entry.table_name ? `[${entry.table_name}] ` : '';
    const context = entry.context && Object.keys(entry.context).length > 0 ? ` ${JSON.stringify(entry.context)}` : '';

    return `${timestamp} ${level} ${migration}${table}${entry.message}${context}`;
  }

  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(message);
        break;
      case LogLevel.INFO:
        console.info(message);
        break;
      case LogLevel.WARN:
        console.warn(message);
        break;
      case LogLevel.ERROR:
        console.error(message);
        break;
    }
  }

  private writeToFile(message: string): void {
    if (!this.currentLogFile) {
      return;
    }

    try {
      fs.appendFileSync(this.currentLogFile, message + '\n');
      this.checkLogRotation();
    } catch (error) {
      console.error('Failed to write to log file:', error);
      this.config.enableFile = false;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  private ensureLogDirectory(): void {
    if (!this.config.enableFile) {
      return;
    }

    try {
      fs.mkdirSync(this.config.logDirectory, { recursive: true });
    } catch (error) {
      console.error('Failed to create log directory:', error);
      this.config.enableFile = false;
    }
  }

  private initializeLogFile(): void {
    if (!this.config.enableFile) {
      return;
    }

    const date = new Date().toISOString().split('T')[0];
    this.currentLogFile = path.join(this.config.logDirectory, `migration-${date}.log`);
  }

  private checkLogRotation(): void {
    if (!this.currentLogFile || !this.config.maxFileSize) {
      return;
    }

    const stats = fs.statSync(this.currentLogFile);
    if (stats.size > this.config.maxFileSize) {
      const stamp = new Date().toISOString().replace(/[:.]/g, '-');
      fs.renameSync(this.currentLogFile, this.currentLogFile.replace('.log', `-${stamp}.log`));
    }
  }
}

// ===== SINGLETON ACCESS =====

let defaultLogger: Logger | null = null;

/**
 * Replaces the shared logger (the CLI calls this once configuration is loaded)
 */
export function configureLogger(config: Partial<LoggerConfig>): Logger {
  defaultLogger = new Logger(config);
  return defaultLogger;
}

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger();
  }
  return defaultLogger;
}
