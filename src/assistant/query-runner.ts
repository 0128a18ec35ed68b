/**
 * Query Runner
 * Executes assistant-generated SQL inside a read-only transaction that is always rolled back
 */

import { AssistantError, getLogger, Logger } from '../lib/error-handler';
import type { DestinationConnection, DestinationQueryResult } from '../types/migration-types';

const DOLLAR_QUOTE = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

/**
 * End of the quoted text opening at `start`. A doubled quote stays inside;
 * E'...' strings also take backslash escapes.
 */
function quotedEnd(sql: string, start: number): number {
  const quote = sql[start];
  const escapes = quote === "'"
    && /[eE]/.test(sql[start - 1] ?? '')
    && !/[A-Za-z0-9_]/.test(sql[start - 2] ?? '');

  let index = start + 1;
  while (index < sql.length) {
    if (escapes && sql[index] === '\\') {
      index += 2;
      continue;
    }
    if (sql[index] === quote) {
      if (sql[index + 1] === quote) {
        index += 2;
        continue;
      }
      return index + 1;
    }
    index++;
  }
  return sql.length;
}

/**
 * Splits SQL on top-level semicolons. Semicolons inside quotes, dollar-quoted
 * bodies and comments do not split; statements holding only comments are dropped.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let hasContent = false;
  let index = 0;

  const take = (end: number, content: boolean): void => {
    current += sql.slice(index, end);
    hasContent = hasContent || content;
    index = end;
  };

  while (index < sql.length) {
    const char = sql[index];
    const next = sql[index + 1];
    const dollarTag = char === '$' ? DOLLAR_QUOTE.exec(sql.slice(index))?.[0] : undefined;

    if (char === '-' && next === '-') {
      const end = sql.indexOf('\n', index);
      take(end === -1 ? sql.length : end, false);
    } else if (char === '/' && next === '*') {
      const end = sql.indexOf('*/', index + 2);
      take(end === -1 ? sql.length : end + 2, false);
    } else if (char === "'" || char === '"') {
      take(quotedEnd(sql, index), true);
    } else if (dollarTag !== undefined) {
      const end = sql.indexOf(dollarTag, index + dollarTag.length);
      take(end === -1 ? sql.length : end + dollarTag.length, true);
    } else if (char === ';') {
      if (hasContent) {
        statements.push(current.trim());
      }
      current = '';
      hasContent = false;
      index++;
    } else {
      take(index + 1, /\S/.test(char));
    }
  }

  if (hasContent) {
    statements.push(current.trim());
  }
  return statements;
}

export class QueryRunner {
  private readonly logger: Logger;

  constructor(private readonly destination: DestinationConnection, logger?: Logger) {
    this.logger = logger ?? getLogger();
  }

  async run(sql: string): Promise<DestinationQueryResult> {
    const statement = sql.trim();
    const statements = splitStatements(statement);
    if (statements.length === 0) {
      throw new AssistantError('No SQL to run', 'ASSISTANT_EMPTY_QUERY');
    }
    // one statement only: a second one could end the read-only transaction
    if (statements.length > 1) {
      throw new AssistantError(
        `Generated SQL holds ${statements.length} statements; only a single query is run`,
        'ASSISTANT_MULTIPLE_STATEMENTS',
        { statements: statements.length }
      );
    }

    await this.destination.begin('read only');
    try {
      const result = await this.destination.execute(statement);
      this.logger.info(`Query returned ${result.rowCount} rows`);
      return result;
    } finally {
      await this.release();
    }
  }

  private async release(): Promise<void> {
    try {
      await this.destination.rollback();
    } catch (error) {
      this.logger.error('Rollback after read-only query failed', error);
    }
  }
}
