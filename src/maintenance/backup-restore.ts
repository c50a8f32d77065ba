/**
 * Backup Restore
 *
 * Copies sample rows of selected sensors out of one or more backup copies
 * of the recorder database, optionally re-pointing them to new sensor ids.
 * Used to recover statistics that were purged by accident.
 *
 * Backups are opened read-only. Nothing is written until the metadata of
 * every selected sensor and the columns of every sample table agree across
 * all backups and the target database.
 */

import { assertDbFileExists, closeDb, openDb } from '../db';
import type { Db } from '../db';
import { DatabaseFileNotFoundError } from '../db/errors';
import { SAMPLE_TABLES } from '../db/schema';
import type { SampleTable } from '../db/schema';
import { StatementExecutor } from '../db/statement-executor';
import type { SqlValue } from '../db/statement-executor';
import type { Logger } from '../logging/logger';
import { StatisticsRepository } from '../repositories';
import type { SampleRow } from '../repositories';
import { AbortReason } from '../types';
import type { BackupRestoreOutcome, RestoreCounts, StatisticMetadata } from '../types';

/**
 * Old sensor id in the backup → sensor id in the target database.
 * An entry mapping an id to itself restores the rows unchanged.
 */
export type IdMapping = ReadonlyMap<number, number>;

export interface BackupRestoreDeps {
  executor: StatementExecutor;
  statistics: StatisticsRepository;
  logger: Logger;
}

interface Backup {
  path: string;
  db: Db;
  statistics: StatisticsRepository;
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function sameSensor(a: StatisticMetadata, b: StatisticMetadata): boolean {
  return a.statisticId === b.statisticId && a.source === b.source && sameShape(a, b);
}

/**
 * Unit and aggregation flags; names may differ after a rename
 */
function sameShape(a: StatisticMetadata, b: StatisticMetadata): boolean {
  return a.unitOfMeasurement === b.unitOfMeasurement && a.hasMean === b.hasMean && a.hasSum === b.hasSum;
}

export class BackupRestore {
  private readonly executor: StatementExecutor;
  private readonly statistics: StatisticsRepository;
  private readonly logger: Logger;

  constructor(deps: BackupRestoreDeps) {
    this.executor = deps.executor;
    this.statistics = deps.statistics;
    this.logger = deps.logger;
  }

  /**
   * Restore the sample rows of the mapped sensors from the backups
   *
   * Rows are written with INSERT OR REPLACE keeping their row id. A row id
   * found in several backups is taken from the first backup listed.
   *
   * @throws DatabaseFileNotFoundError if a backup file does not exist
   */
  restore(backupPaths: readonly string[], mapping: IdMapping): BackupRestoreOutcome {
    for (const path of backupPaths) {
      try {
        assertDbFileExists(path);
      } catch (err) {
        if (err instanceof DatabaseFileNotFoundError) {
          this.logger.error({ backup: path }, `Backup database ${path} not found.`);
        }
        throw err;
      }
    }

    const backups = backupPaths.map((path) => this.openBackup(path));
    try {
      const problem = this.check(backups, mapping);
      if (problem !== null) {
        return { status: 'aborted', reason: problem };
      }
      return this.copy(backups, mapping);
    } finally {
      for (const backup of backups) {
        closeDb(backup.db);
      }
    }
  }

  private openBackup(path: string): Backup {
    const logger = this.logger.child({ backup: path });
    const db = openDb({ dbPath: path, readonly: true, logger });
    const executor = new StatementExecutor(db, { dryRun: true, logger });
    return { path, db, statistics: new StatisticsRepository(executor) };
  }

  private check(backups: Backup[], mapping: IdMapping): AbortReason | null {
    for (const [oldId, newId] of mapping) {
      let reference: StatisticMetadata | null = null;
      let referencePath = '';

      for (const backup of backups) {
        const meta = backup.statistics.findMetadata(oldId);
        if (!meta) {
          this.logger.error({ backup: backup.path, id: oldId }, `Sensor id ${oldId} not found in backup ${backup.path}.`);
          return AbortReason.NOT_FOUND;
        }
        if (reference === null) {
          reference = meta;
          referencePath = backup.path;
        } else if (!sameSensor(reference, meta)) {
          this.logger.error(
            { id: oldId, first: reference, second: meta },
            `Metadata of sensor id ${oldId} differs between ${referencePath} and ${backup.path}`
          );
          return AbortReason.METADATA_MISMATCH;
        }
      }

      const target = this.statistics.findMetadata(newId);
      if (!target) {
        this.logger.error({ id: newId }, `Sensor id ${newId} not found.`);
        return AbortReason.NOT_FOUND;
      }
      if (reference !== null && !sameShape(reference, target)) {
        this.logger.error(
          { oldId, newId, backup: reference, target },
          `Sensor id ${oldId} (${reference.statisticId}) in the backup does not match ` +
            `sensor id ${newId} (${target.statisticId}) in the database`
        );
        return AbortReason.METADATA_MISMATCH;
      }
    }

    for (const table of SAMPLE_TABLES) {
      const expected = this.statistics.listColumns(table).join(', ');
      for (const backup of backups) {
        const actual = backup.statistics.listColumns(table).join(', ');
        if (actual !== expected) {
          this.logger.error(
            { table, backup: backup.path, expected, actual },
            `Schema of table ${table} differs between ${backup.path} and the database`
          );
          return AbortReason.SCHEMA_MISMATCH;
        }
      }
    }

    this.logger.info({ backups: backups.length, sensors: mapping.size }, 'Backup checks passed');
    return null;
  }

  private copy(backups: Backup[], mapping: IdMapping): BackupRestoreOutcome {
    const oldIds = [...mapping.keys()];
    const restored: RestoreCounts = { statistics: 0, statistics_short_term: 0 };

    for (const table of SAMPLE_TABLES) {
      const rows = this.collectRows(backups, table, oldIds);
      const columns = this.statistics.listColumns(table);
      this.logger.info({ table, rows: rows.length }, `Restore ${rows.length} row(s) into ${table}`);

      const sql = `
        INSERT OR REPLACE INTO ${table} (${columns.map(quoteIdentifier).join(', ')})
        VALUES (${columns.map(() => '?').join(', ')})
        `;
      for (const row of rows) {
        const values = columns.map((column): SqlValue => {
          if (column === 'metadata_id') {
            const oldId = Number(row.metadata_id);
            return mapping.get(oldId) ?? oldId;
          }
          return row[column] ?? null;
        });
        const result = this.executor.runWrite(sql, values);
        restored[table] += result.simulated ? 1 : result.changes;
      }
    }

    const total = restored.statistics + restored.statistics_short_term;
    if (this.executor.dryRun) {
      this.logger.info({ restored }, `Dry-run finished: ${total} row(s) would be restored`);
    } else {
      this.logger.info({ restored }, `Restored ${total} row(s)`);
    }

    return { status: 'done', simulated: this.executor.dryRun, restored };
  }

  /**
   * Rows of all backups without repeated row ids, ordered by row id
   */
  private collectRows(backups: Backup[], table: SampleTable, oldIds: number[]): SampleRow[] {
    const byId = new Map<string, SampleRow>();
    for (const backup of backups) {
      for (const row of backup.statistics.findSamples(table, oldIds)) {
        const key = String(row.id);
        if (!byId.has(key)) {
          byId.set(key, row);
        }
      }
    }
    return [...byId.values()].sort((a, b) => Number(a.id) - Number(b.id));
  }
}
