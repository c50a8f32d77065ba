/**
 * Maintenance Module
 *
 * Wires repositories, the consistency checker and the maintenance
 * operations around one statement executor.
 */

import type { Db } from '../db';
import { StatementExecutor } from '../db/statement-executor';
import type { MaintenanceConfig } from '../config';
import type { Logger } from '../logging/logger';
import { SensorRepository, StateRepository, StatisticsRepository } from '../repositories';
import { ConsistencyChecker } from './consistency-checker';
import { SensorMaintenance } from './sensor-maintenance';
import { StateImport } from './state-import';
import { BackupRestore } from './backup-restore';

export { ConsistencyChecker } from './consistency-checker';
export type { OrderingCheckInput } from './consistency-checker';
export { SensorMaintenance } from './sensor-maintenance';
export type { SensorMaintenanceDeps } from './sensor-maintenance';
export { StateImport, hourStart, parseStateValue, HOUR_SECONDS } from './state-import';
export type { StateImportDeps, StateImportOptions } from './state-import';
export { BackupRestore } from './backup-restore';
export type { BackupRestoreDeps, IdMapping } from './backup-restore';

export interface MaintenanceContextOptions {
  dryRun: boolean;
  config: MaintenanceConfig;
  logger: Logger;
}

/**
 * Everything one run needs, built around a single connection
 */
export interface MaintenanceContext {
  executor: StatementExecutor;
  sensors: SensorRepository;
  checker: ConsistencyChecker;
  maintenance: SensorMaintenance;
  stateImport: StateImport;
  backupRestore: BackupRestore;
}

export function createMaintenanceContext(db: Db, options: MaintenanceContextOptions): MaintenanceContext {
  const { dryRun, config, logger } = options;
  const executor = new StatementExecutor(db, { dryRun, logger });
  const sensors = new SensorRepository(executor, logger);
  const statistics = new StatisticsRepository(executor);
  const checker = new ConsistencyChecker(statistics, logger);

  return {
    executor,
    sensors,
    checker,
    maintenance: new SensorMaintenance({ executor, sensors, checker, config, logger }),
    stateImport: new StateImport({ executor, sensors, states: new StateRepository(executor), logger }),
    backupRestore: new BackupRestore({ executor, statistics, logger }),
  };
}
