/**
 * Report generator
 * Renders a migration summary for the console, as markdown, or as JSON
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import Table from 'cli-table3';
import { isSuccessfulRun } from '../models/migration-result';
import type { MigrationResult, MigrationSummary, TableStatus } from '../types/migration-types';

export type ReportFormat = 'json' | 'markdown';

const STATUS_EMOJI: Record<TableStatus, string> = {
  succeeded: '✅',
  failed: '❌',
  skipped: '⏭️'
};

/**
 * Format duration from milliseconds to human-readable format
 */
export function formatDuration(milliseconds: number): string {
  if (milliseconds < 1000) {
    return `${Math.round(milliseconds)}ms`;
  }

  const seconds = Math.floor(milliseconds / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}

/**
 * Picks the file format from the extension: .md is markdown, anything else JSON
 */
export function reportFormatFor(filePath: string): ReportFormat {
  const extension = path.extname(filePath).toLowerCase();
  return extension === '.md' || extension === '.markdown' ? 'markdown' : 'json';
}

function colourStatus(status: TableStatus): string {
  switch (status) {
    case 'succeeded':
      return chalk.green(status);
    case 'failed':
      return chalk.red(status);
    case 'skipped':
      return chalk.yellow(status);
  }
}

function rowsColumn(result: MigrationResult): string {
  return `${result.rowsCommitted.toLocaleString()}/${result.rowsAttempted.toLocaleString()}`;
}

export class MigrationReportGenerator {
  /**
   * Coloured console summary: one table row per migrated table, then the failures in full
   */
  renderConsole(summary: MigrationSummary): string {
    const table = new Table({
      head: ['Table', 'Status', 'Rows (committed/attempted)', 'Batches', 'Duration', 'Error']
    });

    for (const result of summary.results) {
      table.push([
        result.table,
        colourStatus(result.status),
        rowsColumn(result),
        String(result.batches),
        formatDuration(result.durationMs),
        result.error ? result.error.kind : '-'
      ]);
    }

    const lines = [
      chalk.bold(`Migration ${summary.runId}`),
      table.toString(),
      `Tables: ${summary.totalTables}  ` +
        chalk.green(`succeeded: ${summary.succeeded}`) + '  ' +
        chalk.red(`failed: ${summary.failed}`) + '  ' +
        chalk.yellow(`skipped: ${summary.skipped}`),
      `Rows committed: ${summary.totalRowsCommitted.toLocaleString()}`,
      `Duration: ${formatDuration(summary.completedAt.getTime() - summary.startedAt.getTime())}`
    ];

    const failures = summary.results.filter(result => result.status === 'failed');
    if (failures.length > 0) {
      lines.push('', chalk.red.bold('Failed tables:'));
      for (const failure of failures) {
        lines.push(chalk.red(`  ✗ ${failure.table}: ${failure.error?.kind ?? 'Error'}: ${failure.error?.message ?? ''}`));
      }
    }

    const missingForeignKeys = summary.deferredForeignKeys.filter(foreignKey => foreignKey.status !== 'added');
    if (missingForeignKeys.length > 0) {
      lines.push('', chalk.red.bold('Foreign keys not added:'));
      for (const foreignKey of missingForeignKeys) {
        lines.push(chalk.red(`  ✗ ${foreignKey.table} → ${foreignKey.referencedTable}: ${foreignKey.error?.message ?? foreignKey.status}`));
      }
    }

    lines.push(
      '',
      isSuccessfulRun(summary)
        ? chalk.green('✅ All tables migrated')
        : chalk.red('❌ Migration incomplete')
    );

    return lines.join('\n');
  }

  renderMarkdown(summary: MigrationSummary): string {
    let report = `# Migration Report\n\n`;
    report += `**Run**: ${summary.runId}\n`;
    report += `**Started**: ${summary.startedAt.toISOString()}\n`;
    report += `**Completed**: ${summary.completedAt.toISOString()}\n`;
    report += `**Failure Policy**: ${summary.failurePolicy}\n`;
    report += `**Status**: ${isSuccessfulRun(summary) ? '✅ SUCCESS' : '❌ ISSUES FOUND'}\n\n`;

    report += `## Summary\n\n`;
    report += `| Metric | Value |\n`;
    report += `|--------|-------|\n`;
    report += `| Total Tables | ${summary.totalTables} |\n`;
    report += `| Succeeded | ${summary.succeeded} |\n`;
    report += `| Failed | ${summary.failed} |\n`;
    report += `| Skipped | ${summary.skipped} |\n`;
    report += `| Rows Committed | ${summary.totalRowsCommitted.toLocaleString()} |\n\n`;

    report += `## Tables\n\n`;
    report += `| | Table | Destination | Committed | Attempted | Batches | Duration |\n`;
    report += `|---|-------|-------------|-----------|-----------|---------|----------|\n`;
    for (const result of summary.results) {
      report += `| ${STATUS_EMOJI[result.status]} | ${result.table} | ${result.destinationTable ?? '-'} `;
      report += `| ${result.rowsCommitted.toLocaleString()} | ${result.rowsAttempted.toLocaleString()} `;
      report += `| ${result.batches} | ${formatDuration(result.durationMs)} |\n`;
    }
    report += `\n`;

    if (summary.deferredForeignKeys.length > 0) {
      report += `## Deferred Foreign Keys\n\n`;
      report += `| Table | References | Status | Error |\n`;
      report += `|-------|------------|--------|-------|\n`;
      for (const foreignKey of summary.deferredForeignKeys) {
        report += `| ${foreignKey.table} | ${foreignKey.referencedTable} | ${foreignKey.status} | ${foreignKey.error?.message ?? '-'} |\n`;
      }
      report += `\n`;
    }

    const problems = summary.results.filter(result => result.error !== null);
    if (problems.length > 0) {
      report += `## Errors\n\n`;
      problems.forEach((result, i) => {
        report += `${i + 1}. **${result.table}** (${result.error?.kind}): ${result.error?.message}\n`;
      });
      report += `\n`;
    }

    return report;
  }

  renderJson(summary: MigrationSummary): string {
    return JSON.stringify(summary, null, 2);
  }

  /**
   * Writes the report in the format its extension names and returns the absolute path
   */
  async saveReport(summary: MigrationSummary, filePath: string): Promise<string> {
    const resolved = path.resolve(filePath);
    const content = reportFormatFor(resolved) === 'markdown'
      ? this.renderMarkdown(summary)
      : this.renderJson(summary);

    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, content, 'utf8');
    return resolved;
  }
}
