/**
 * Errors raised by the database layer
 *
 * Only genuinely exceptional conditions are thrown; a missing sensor or an
 * ordering conflict is reported through result values instead.
 */

/**
 * A statement that is not a SELECT was passed to the read path
 */
export class ReadOnlyContractError extends Error {
  constructor(public readonly statement: string) {
    super(`Only SELECT statements may be executed as reads:\n${statement}`);
    this.name = 'ReadOnlyContractError';
  }
}

/**
 * The database file does not exist
 */
export class DatabaseFileNotFoundError extends Error {
  constructor(public readonly dbPath: string) {
    super(
      `Database file ${dbPath} not found. Set an existing database file with option -d / --db-file.`
    );
    this.name = 'DatabaseFileNotFoundError';
  }
}
