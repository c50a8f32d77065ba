/**
 * Per-run CLI session
 *
 * Holds the connection and the maintenance context opened by the
 * preAction hook so that commands never open the database themselves.
 */

import type { Db } from '../db';
import type { MaintenanceContext } from '../maintenance';
import type { Logger } from '../logging/logger';

export interface CliSession {
  db: Db;
  context: MaintenanceContext;
  logger: Logger;
  dryRun: boolean;
}

/**
 * Returns the open session; throws if called outside an action
 */
export type SessionProvider = () => CliSession;
