/**
 * Statement Executor
 *
 * Runs every statement in its own transaction (commit on return, rollback
 * on throw) and holds the dry-run gate for writes. Dry-run and logger are
 * constructor configuration, so independent executors can share nothing.
 */

import type { Db } from './index';
import { ReadOnlyContractError } from './errors';
import type { Logger } from '../logging/logger';
import type { WriteResult } from '../types';

export type SqlValue = string | number | bigint | null;

/**
 * Bound parameters: positional (`?`) or named (`:name`, keys without prefix)
 */
export type SqlParams = readonly SqlValue[] | Readonly<Record<string, SqlValue>>;

export interface StatementExecutorOptions {
  /**
   * Log writes instead of executing them
   * Defaults to true
   */
  dryRun?: boolean;
  logger: Logger;
}

/**
 * Remove the indentation shared by all non-blank lines and trim the result
 */
export function normalizeSql(sql: string): string {
  const lines = sql.replace(/\t/g, '    ').split('\n');
  let indent = Infinity;
  for (const line of lines) {
    if (line.trim() === '') continue;
    const leading = line.length - line.trimStart().length;
    indent = Math.min(indent, leading);
  }
  if (indent === Infinity) {
    return '';
  }
  return lines
    .map((line) => line.slice(Math.min(indent, line.length - line.trimStart().length)))
    .join('\n')
    .trim();
}

export class StatementExecutor {
  readonly dryRun: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly db: Db,
    options: StatementExecutorOptions
  ) {
    this.dryRun = options.dryRun ?? true;
    this.logger = options.logger;
  }

  /**
   * Execute an INSERT, UPDATE or DELETE statement
   *
   * In dry-run mode the statement is only logged.
   */
  runWrite(sql: string, params: SqlParams = []): WriteResult {
    const statement = normalizeSql(sql);
    this.logger.trace({ sql: statement }, 'Executing write');

    if (this.dryRun) {
      this.logger.info({ sql: statement, params }, 'Dry-run: statement not executed');
      return { simulated: true };
    }

    const changes = this.inTransaction(statement, params, () => {
      return this.db.prepare<[SqlParams]>(statement).run(params).changes;
    });
    this.logger.info({ sql: statement, params, changes }, 'Statement executed');

    return { simulated: false, changes };
  }

  /**
   * Execute a SELECT statement and return all rows
   *
   * @throws ReadOnlyContractError if the statement does not start with SELECT
   */
  runRead<Row>(sql: string, params: SqlParams = []): Row[] {
    const statement = normalizeSql(sql);
    if (!/^SELECT\b/.test(statement)) {
      throw new ReadOnlyContractError(statement);
    }

    this.logger.trace({ sql: statement }, 'Executing read');
    return this.inTransaction(statement, params, () => {
      return this.db.prepare<[SqlParams], Row>(statement).all(params);
    });
  }

  private inTransaction<T>(statement: string, params: SqlParams, work: () => T): T {
    try {
      return this.db.transaction(work)();
    } catch (err) {
      this.logger.error(
        { sql: statement, params, err },
        'Error executing statement'
      );
      throw err;
    }
  }
}
