/**
 * stats-repair CLI program
 *
 * Sets up Commander.js with global options and opens the database before
 * any command runs. Exactly one command runs per invocation.
 */

import { Command } from 'commander';
import type { DestinationStream } from 'pino';
import { VERSION, loadMaintenanceConfig, resolveDbPath } from '../config';
import type { MaintenanceConfig } from '../config';
import { assertDbFileExists, closeDb, openDb } from '../db';
import { DatabaseFileNotFoundError } from '../db/errors';
import { createLogger, resolveLogLevel } from '../logging/logger';
import { createMaintenanceContext } from '../maintenance';
import type { CliSession } from './session';
import { setOutputOptions } from './utils/output';
import { createListSensorsCommand } from './commands/sensors';
import { createMoveDataCommand } from './commands/move';
import { createMergeAllCommand, createMergeCommand } from './commands/merge';
import { createCopyStatesCommand } from './commands/copy-states';
import { createRestoreBackupCommand } from './commands/restore-backup';

/**
 * Global options shared by all commands
 */
export type GlobalOptions = {
  dbFile: string;
  modify: boolean;
  verbose: boolean;
  logLevel?: string;
  json: boolean;
};

/**
 * Seams for tests and embedding
 */
export interface ProgramOptions {
  /** Where log lines go (default: stderr) */
  logDestination?: DestinationStream;
  /** Overrides of the maintenance constants */
  config?: Partial<MaintenanceConfig>;
  /** Commander's own help and error output */
  writeOut?: (str: string) => void;
  writeErr?: (str: string) => void;
}

/**
 * Create and configure the main CLI program
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();
  const config = loadMaintenanceConfig(options.config);
  let session: CliSession | null = null;

  const getSession = (): CliSession => {
    if (!session) {
      throw new Error('Database not opened. Commands must run through the program.');
    }
    return session;
  };

  program
    .name('stats-repair')
    .description('Repair sensor statistics in a recorder SQLite database')
    .version(VERSION)
    .option('-d, --db-file <path>', 'SQLite database file (env: STATS_REPAIR_DB_PATH)', resolveDbPath())
    .option('-m, --modify', 'Modify the database (default is a dry-run)', false)
    .option('-v, --verbose', 'Log every executed statement', false)
    .option('--log-level <level>', 'trace, debug, info, warn, error (env: LOG_LEVEL)')
    .option('--json', 'Output as JSON', false)
    .addHelpText(
      'after',
      '\nBy default, the tool runs in dry-run mode. Set option -m / --modify to change the ' +
        'database. Stop the home-automation platform beforehand and restart it afterwards. ' +
        'A database backup is recommended to be able to undo the change in case of unexpected results.'
    )
    .exitOverride();

  if (options.writeOut) {
    program.configureOutput({ writeOut: options.writeOut });
  }
  if (options.writeErr) {
    program.configureOutput({ writeErr: options.writeErr });
  }

  // Open the database before any command
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const dryRun = !opts.modify;

    setOutputOptions({ json: opts.json });

    const logger = createLogger({
      level: opts.verbose ? 'trace' : resolveLogLevel(opts.logLevel),
      destination: options.logDestination,
    });

    try {
      assertDbFileExists(opts.dbFile);
    } catch (err) {
      if (err instanceof DatabaseFileNotFoundError) {
        logger.error({ dbFile: opts.dbFile }, err.message);
      }
      throw err;
    }

    logger.debug({ dbFile: opts.dbFile, dryRun }, 'Opening database');
    const db = openDb({ dbPath: opts.dbFile, readonly: dryRun, logger });
    session = {
      db,
      logger,
      dryRun,
      context: createMaintenanceContext(db, { dryRun, config, logger }),
    };

    if (dryRun) {
      logger.info('Dry-run mode: the database will not be modified. Use --modify to apply changes.');
    }
  });

  // Close the database after the command
  program.hook('postAction', () => {
    if (session) {
      closeDb(session.db);
      session.logger.debug('Database connection closed');
      session = null;
    }
  });

  const commands = [
    createListSensorsCommand(getSession),
    createMoveDataCommand(getSession),
    createMergeCommand(getSession),
    createMergeAllCommand(getSession),
    createCopyStatesCommand(getSession),
    createRestoreBackupCommand(getSession),
  ];
  for (const command of commands) {
    program.addCommand(command.copyInheritedSettings(program));
  }

  return program;
}
