/**
 * Database Connection for stats-repair
 *
 * Opens the recorder database with better-sqlite3. One connection is
 * opened per run and handed to everything that needs it.
 */

import Database from 'better-sqlite3';
import { existsSync, statSync } from 'fs';
import type { Logger } from '../logging/logger';
import { DatabaseFileNotFoundError } from './errors';

export type Db = Database.Database;

/**
 * Options for opening the database
 */
export interface OpenDbOptions {
  /**
   * Path to the SQLite database file, or ':memory:'
   */
  dbPath: string;

  /**
   * Open without write access
   * Dry-runs set this so the file cannot change. Ignored for ':memory:'.
   */
  readonly?: boolean;

  /**
   * Whether to enable foreign key constraints
   * Defaults to true so that deleting metadata cascades to orphaned samples
   */
  enableForeignKeys?: boolean;

  /**
   * Receives every executed statement at trace level
   */
  logger?: Logger;
}

/**
 * Check that a database file exists before any connection is attempted
 *
 * @throws DatabaseFileNotFoundError if the path is not a regular file
 */
export function assertDbFileExists(dbPath: string): void {
  if (dbPath === ':memory:') {
    return;
  }
  if (!existsSync(dbPath) || !statSync(dbPath).isFile()) {
    throw new DatabaseFileNotFoundError(dbPath);
  }
}

/**
 * Open the recorder database
 *
 * Never creates a file: the recorder owns the schema.
 */
export function openDb(options: OpenDbOptions): Db {
  const { dbPath, readonly = false, enableForeignKeys = true, logger } = options;
  const inMemory = dbPath === ':memory:';

  if (!inMemory) {
    assertDbFileExists(dbPath);
  }

  const db = new Database(dbPath, {
    readonly: readonly && !inMemory,
    fileMustExist: !inMemory,
    verbose: logger ? (message?: unknown) => logger.trace({ sql: String(message) }, 'sqlite') : undefined,
  });

  if (enableForeignKeys) {
    db.pragma('foreign_keys = ON');
  }

  return db;
}

/**
 * Close the database connection if it is still open
 */
export function closeDb(db: Db): void {
  if (db.open) {
    db.close();
  }
}

export { TABLES, SAMPLE_TABLES, NON_NUMERIC_STATES } from './schema';
export type { TableName, SampleTable } from './schema';
export { ReadOnlyContractError, DatabaseFileNotFoundError } from './errors';
