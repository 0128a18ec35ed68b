/**
 * SQLite to PostgreSQL migration
 *
 * Library entry point. The CLI lives in cli/migration-cli.ts.
 */

export * from './types/migration-types';

export * from './lib/error-handler';
export * from './lib/environment-config';
export * from './lib/database-connections';
export * from './lib/batch-processor';

export * from './services/type-mapper';
export * from './services/schema-introspector';
export * from './services/schema-reconciler';
export * from './services/statement-builder';
export * from './services/batch-loader';
export * from './services/dependency-resolver';
export * from './services/migration-orchestrator';

export * from './models/migration-result';
export * from './reporting/report-generator';

export * from './assistant/schema-context';
export * from './assistant/sql-generator';
export * from './assistant/query-runner';
