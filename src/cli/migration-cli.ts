#!/usr/bin/env node
/**
 * Migration CLI
 *
 *   migrate   copy every source table into PostgreSQL
 *   plan      show the destination DDL without connecting to PostgreSQL
 *   ask       turn a question into SQL against the migrated schema
 *
 * Exit status: 0 when every table succeeded, 1 when a table failed or was
 * skipped, 2 when configuration or a connection failed before any work began.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { describeDestinationSchema, loadDestinationSchema } from '../assistant/schema-context';
import { QueryRunner } from '../assistant/query-runner';
import { SqlAssistant } from '../assistant/sql-generator';
import { DatabaseConnections, type ConnectionProvider } from '../lib/database-connections';
import {
  getConfigForLogging,
  loadConfig,
  loadEnvironment,
  validateConfig,
  type AppConfig,
  type AssistantConfig
} from '../lib/environment-config';
import {
  AssistantError,
  ConfigurationError,
  configureLogger,
  ErrorCategory,
  Logger,
  MigrationBaseError,
  SchemaReadError
} from '../lib/error-handler';
import { isSuccessfulRun } from '../models/migration-result';
import { MigrationReportGenerator } from '../reporting/report-generator';
import { resolveDependencies } from '../services/dependency-resolver';
import { MigrationOrchestrator, planMigration } from '../services/migration-orchestrator';
import { SchemaIntrospector } from '../services/schema-introspector';
import type { FailurePolicy, TablePlan } from '../types/migration-types';

export const EXIT_SUCCESS = 0;
export const EXIT_INCOMPLETE = 1;
export const EXIT_SETUP_FAILURE = 2;

interface SharedOptions {
  tables?: string;
  batchSize?: number;
  recreate?: boolean;
  foreignKeys?: boolean;
}

interface MigrateOptions extends SharedOptions {
  failurePolicy?: FailurePolicy;
  report?: string;
}

interface AskOptions {
  run?: boolean;
}

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  createLogger(config: AppConfig): Logger;
  createConnections(config: AppConfig, logger: Logger): ConnectionProvider;
  createAssistant(config: AssistantConfig, schemaDescription: string, logger: Logger): SqlAssistant;
  write(line: string): void;
  writeError(line: string): void;
}

const defaultDependencies: CliDependencies = {
  env: process.env,
  createLogger: config => configureLogger({
    level: config.logging.level,
    enableConsole: true,
    enableFile: config.logging.enableFileLogging,
    logDirectory: config.logging.logDirectory
  }),
  createConnections: (config, logger) => new DatabaseConnections(config, logger),
  createAssistant: (config, schemaDescription, logger) => SqlAssistant.fromConfig(config, schemaDescription, logger),
  write: line => console.log(line),
  writeError: line => console.error(line)
};

function parseBatchSize(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Batch size must be an integer.');
  }
  return parsed;
}

function parseFailurePolicy(value: string): FailurePolicy {
  if (value === 'continue' || value === 'abort') {
    return value;
  }
  throw new InvalidArgumentError('Failure policy must be continue or abort.');
}

function splitTables(value: string | undefined): string[] | null {
  if (!value) {
    return null;
  }
  const tables = value.split(',').map(table => table.trim()).filter(table => table.length > 0);
  return tables.length > 0 ? tables : null;
}

/**
 * Renders one cell of a query result
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return `<${value.length} bytes>`;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Setup failures stop the run before any table is touched
 */
function isSetupFailure(error: unknown): boolean {
  return error instanceof MigrationBaseError
    && (error.category === ErrorCategory.CONFIGURATION
      || error.category === ErrorCategory.NETWORK
      || error instanceof SchemaReadError);
}

export class MigrationCli {
  private readonly program: Command;
  private readonly deps: CliDependencies;
  private readonly reports = new MigrationReportGenerator();
  private exitCode = EXIT_SUCCESS;

  constructor(deps: Partial<CliDependencies> = {}) {
    this.deps = { ...defaultDependencies, ...deps };
    this.program = new Command();
    this.setupCommands();
  }

  private setupCommands(): void {
    this.program
      .name('sqlite-pg-migrate')
      .description('Migrate a SQLite database into PostgreSQL and query it in plain English')
      .version('1.0.0')
      .configureOutput({
        writeOut: text => this.deps.write(text.trimEnd()),
        writeErr: text => this.deps.writeError(text.trimEnd())
      })
      .exitOverride();

    this.program
      .command('migrate')
      .description('Copy every source table into PostgreSQL, one transaction per table')
      .option('-t, --tables <tables>', 'Comma-separated tables in migration order (default: all, parents first)')
      .option('-b, --batch-size <size>', 'Rows per INSERT statement', parseBatchSize)
      .option('-p, --failure-policy <policy>', 'continue or abort after a failed table', parseFailurePolicy)
      .option('--recreate', 'Drop and recreate each destination table')
      .option('--no-foreign-keys', 'Leave FOREIGN KEY clauses out of the DDL')
      .option('-r, --report <file>', 'Also write the summary to a file (.json or .md)')
      .action(async (options: MigrateOptions) => {
        this.exitCode = await this.guard(() => this.handleMigrate(options));
      });

    this.program
      .command('plan')
      .description('Introspect the source and print the destination DDL without writing anything')
      .option('-t, --tables <tables>', 'Comma-separated tables to plan (default: all, parents first)')
      .option('-b, --batch-size <size>', 'Rows per INSERT statement', parseBatchSize)
      .option('--recreate', 'Include DROP TABLE statements')
      .option('--no-foreign-keys', 'Leave FOREIGN KEY clauses out of the DDL')
      .action(async (options: SharedOptions) => {
        this.exitCode = await this.guard(() => this.handlePlan(options));
      });

    this.program
      .command('ask')
      .description('Generate SQL for a question about the migrated data')
      .argument('<question...>', 'The question, in plain English')
      .option('--run', 'Execute the generated SQL read-only and print the rows')
      .action(async (question: string[], options: AskOptions) => {
        this.exitCode = await this.guard(() => this.handleAsk(question.join(' '), options));
      });
  }

  /**
   * Parses arguments and runs one command; resolves to the process exit status
   */
  async run(argv: string[], from: 'node' | 'user' = 'node'): Promise<number> {
    this.exitCode = EXIT_SUCCESS;
    try {
      await this.program.parseAsync(argv, { from });
    } catch (error) {
      if (error instanceof CommanderError) {
        return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_SETUP_FAILURE;
      }
      throw error;
    }
    return this.exitCode;
  }

  private async guard(command: () => Promise<number>): Promise<number> {
    try {
      return await command();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const kind = error instanceof Error ? error.name : 'Error';
      this.deps.writeError(chalk.red(`❌ ${kind}: ${message}`));
      return isSetupFailure(error) ? EXIT_SETUP_FAILURE : EXIT_INCOMPLETE;
    }
  }

  private loadConfiguration(options: SharedOptions & { failurePolicy?: FailurePolicy }): AppConfig {
    const base = loadConfig(this.deps.env);
    const config: AppConfig = {
      ...base,
      migration: {
        ...base.migration,
        batchSize: options.batchSize ?? base.migration.batchSize,
        failurePolicy: options.failurePolicy ?? base.migration.failurePolicy,
        recreateTables: options.recreate ?? base.migration.recreateTables,
        includeForeignKeys: options.foreignKeys === false ? false : base.migration.includeForeignKeys
      }
    };
    validateConfig(config);
    return config;
  }

  private async handleMigrate(options: MigrateOptions): Promise<number> {
    const config = this.loadConfiguration(options);
    const logger = this.deps.createLogger(config);
    logger.debug('Configuration loaded', getConfigForLogging(config));

    const summary = await this.deps.createConnections(config, logger).withConnections(async (source, destination) => {
      const orchestrator = new MigrationOrchestrator(source, destination, {
        batchSize: config.migration.batchSize,
        maxRetries: config.migration.maxRetryAttempts,
        retryDelayMs: config.migration.retryDelayMs,
        recreate: config.migration.recreateTables,
        includeForeignKeys: config.migration.includeForeignKeys,
        failurePolicy: config.migration.failurePolicy
      }, logger);

      const tables = splitTables(options.tables) ?? orchestrator.orderTables().order;
      this.deps.write(chalk.blue(`🚀 Migrating ${tables.length} tables: ${tables.join(', ')}`));
      return orchestrator.migrate(tables);
    });

    this.deps.write(this.reports.renderConsole(summary));

    if (options.report) {
      const written = await this.reports.saveReport(summary, options.report);
      this.deps.write(`📋 Report saved: ${written}`);
    }

    return isSuccessfulRun(summary) ? EXIT_SUCCESS : EXIT_INCOMPLETE;
  }

  private async handlePlan(options: SharedOptions): Promise<number> {
    const config = this.loadConfiguration(options);
    const logger = this.deps.createLogger(config);
    const source = this.deps.createConnections(config, logger).openSource();

    try {
      const introspector = new SchemaIntrospector(source, logger);
      const tables = splitTables(options.tables)
        ?? resolveDependencies(introspector.listTables().map(table => introspector.describeTable(table))).order;
      const plans = planMigration(source, tables, {
        batchSize: config.migration.batchSize,
        recreate: config.migration.recreateTables,
        includeForeignKeys: config.migration.includeForeignKeys
      }, logger);

      for (const plan of plans) {
        this.printPlan(plan);
      }

      const deferred = plans.flatMap(plan => plan.deferredStatements);
      if (deferred.length > 0) {
        this.deps.write(chalk.bold('After every table is loaded:'));
        for (const statement of deferred) {
          this.deps.write(`${statement};`);
        }
      }

      return plans.every(plan => plan.error === null) ? EXIT_SUCCESS : EXIT_INCOMPLETE;
    } finally {
      source.close();
    }
  }

  private printPlan(plan: TablePlan): void {
    if (plan.error) {
      this.deps.write(chalk.red(`✗ ${plan.table}: ${plan.error.kind}: ${plan.error.message}`));
      return;
    }

    this.deps.write(chalk.bold(
      `${plan.table} → ${plan.descriptor?.destinationName ?? plan.table}` +
      ` (${plan.sourceRows ?? 0} rows, ${plan.batchSize ?? 0} per batch)`
    ));
    for (const statement of plan.statements) {
      this.deps.write(`${statement};`);
    }
    this.deps.write('');
  }

  private async handleAsk(question: string, options: AskOptions): Promise<number> {
    const config = this.loadConfiguration({});
    if (!config.assistant.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is required for the query assistant', 'CONFIG_MISSING_OPENAI_KEY');
    }
    const logger = this.deps.createLogger(config);

    return this.deps.createConnections(config, logger).withDestination(async destination => {
      const schema = await loadDestinationSchema(destination);
      if (schema.length === 0) {
        throw new AssistantError('The destination has no tables in the public schema; run migrate first', 'ASSISTANT_NO_SCHEMA');
      }

      const assistant = this.deps.createAssistant(config.assistant, describeDestinationSchema(schema), logger);
      const generated = await assistant.generateSql(question);

      this.deps.write(chalk.blue('📝 Generated SQL:'));
      this.deps.write(generated.sql);

      if (!options.run) {
        return EXIT_SUCCESS;
      }

      const result = await new QueryRunner(destination, logger).run(generated.sql);
      const table = new Table({ head: result.fields });
      for (const row of result.rows) {
        table.push(result.fields.map(field => formatCell(row[field])));
      }

      this.deps.write(table.toString());
      this.deps.write(`${result.rowCount} rows`);
      return EXIT_SUCCESS;
    });
  }
}

// CLI entry point
if (require.main === module) {
  loadEnvironment();
  new MigrationCli()
    .run(process.argv)
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('CLI failed to start:', error);
      process.exitCode = EXIT_SETUP_FAILURE;
    });
}
