/**
 * BackupRestore Tests
 *
 * The target is an in-memory database; backups are temporary files.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { closeDb, TABLES } from '../../db';
import type { Db } from '../../db';
import { DatabaseFileNotFoundError } from '../../db/errors';
import { loadMaintenanceConfig } from '../../config';
import { createMaintenanceContext } from '..';
import type { BackupRestore } from '..';
import { AbortReason } from '../../types';
import {
  countRows,
  createRecorderDb,
  createRecorderDbFile,
  seedSample,
  seedStatisticMeta,
  startTimes,
} from '../../../tests/helpers/recorder-db';
import { createLogCapture } from '../../../tests/helpers/log-capture';
import type { LogCapture } from '../../../tests/helpers/log-capture';

describe('BackupRestore', () => {
  let dir: string;
  let db: Db;
  let logs: LogCapture;
  let first: string;
  let second: string;

  const mapping = new Map([
    [5, 99],
    [35, 35],
  ]);

  function backupRestore(dryRun: boolean): BackupRestore {
    return createMaintenanceContext(db, { dryRun, config: loadMaintenanceConfig(), logger: logs.logger }).backupRestore;
  }

  function writeLogs(): string[] {
    return logs
      .messages()
      .filter((msg) => msg === 'Statement executed' || msg === 'Dry-run: statement not executed');
  }

  function seedBackupMeta(backup: Db): void {
    seedStatisticMeta(backup, 5, 'sensor.production');
    seedStatisticMeta(backup, 7, 'sensor.production_2');
    seedStatisticMeta(backup, 35, 'sensor.meter');
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stats-repair-backup-'));
    first = join(dir, 'first.db');
    second = join(dir, 'second.db');
    logs = createLogCapture();

    db = createRecorderDb();
    seedStatisticMeta(db, 35, 'sensor.meter');
    seedStatisticMeta(db, 99, 'sensor.inverter_production');

    createRecorderDbFile(first, (backup) => {
      seedBackupMeta(backup);
      seedSample(backup, TABLES.STATISTICS, { id: 1, metadataId: 5, createdTs: 100, startTs: 100, state: 1 });
      seedSample(backup, TABLES.STATISTICS, { id: 2, metadataId: 5, createdTs: 200, startTs: 200, state: 2 });
      seedSample(backup, TABLES.STATISTICS, { id: 3, metadataId: 35, createdTs: 100, startTs: 100 });
      seedSample(backup, TABLES.STATISTICS, { id: 4, metadataId: 7, createdTs: 100, startTs: 100 });
      seedSample(backup, TABLES.STATISTICS_SHORT_TERM, { id: 1, metadataId: 5, createdTs: 150, startTs: 150 });
    });
    createRecorderDbFile(second, (backup) => {
      seedBackupMeta(backup);
      seedSample(backup, TABLES.STATISTICS, { id: 2, metadataId: 5, createdTs: 200, startTs: 200, state: 7 });
      seedSample(backup, TABLES.STATISTICS, { id: 5, metadataId: 5, createdTs: 300, startTs: 300, state: 3 });
    });
  });

  afterEach(() => {
    closeDb(db);
    rmSync(dir, { recursive: true, force: true });
  });

  it('should copy the rows of all backups and map the sensor ids', () => {
    const outcome = backupRestore(false).restore([first, second], mapping);

    expect(outcome).toEqual({
      status: 'done',
      simulated: false,
      restored: { statistics: 4, statistics_short_term: 1 },
    });
    expect(startTimes(db, TABLES.STATISTICS, 99)).toEqual([100, 200, 300]);
    expect(startTimes(db, TABLES.STATISTICS, 35)).toEqual([100]);
    expect(startTimes(db, TABLES.STATISTICS_SHORT_TERM, 99)).toEqual([150]);
    expect(countRows(db, TABLES.STATISTICS, 7)).toBe(0);
  });

  it('should keep row ids and take repeated rows from the first backup', () => {
    backupRestore(false).restore([first, second], mapping);

    const rows = db.prepare('SELECT id, state FROM statistics WHERE metadata_id = 99 ORDER BY id').all();
    expect(rows).toEqual([
      { id: 1, state: 1 },
      { id: 2, state: 2 },
      { id: 5, state: 3 },
    ]);
  });

  it('should replace existing rows with the same id', () => {
    seedSample(db, TABLES.STATISTICS, { id: 2, metadataId: 35, createdTs: 900, startTs: 900 });

    backupRestore(false).restore([first], new Map([[5, 99]]));

    expect(startTimes(db, TABLES.STATISTICS, 35)).toEqual([]);
    expect(startTimes(db, TABLES.STATISTICS, 99)).toEqual([100, 200]);
  });

  it('should only log the inserts in dry-run', () => {
    const outcome = backupRestore(true).restore([first, second], mapping);

    expect(outcome).toEqual({
      status: 'done',
      simulated: true,
      restored: { statistics: 4, statistics_short_term: 1 },
    });
    expect(writeLogs()).toHaveLength(5);
    expect(countRows(db, TABLES.STATISTICS, 99)).toBe(0);
    expect(countRows(db, TABLES.STATISTICS_SHORT_TERM, 99)).toBe(0);

    const insert = logs.records().find((record) => record.msg === 'Dry-run: statement not executed');
    expect(insert?.params).toEqual([1, 100, 99, 100, null, null, null, null, 1, 1]);
  });

  it('should abort when a sensor id is missing in a backup', () => {
    const third = join(dir, 'third.db');
    createRecorderDbFile(third, (backup) => {
      seedStatisticMeta(backup, 5, 'sensor.production');
    });

    const outcome = backupRestore(false).restore([first, third], mapping);

    expect(outcome).toEqual({ status: 'aborted', reason: AbortReason.NOT_FOUND });
    expect(logs.messages('error')).toEqual([`Sensor id 35 not found in backup ${third}.`]);
    expect(writeLogs()).toEqual([]);
  });

  it('should abort when the metadata differs between backups', () => {
    const third = join(dir, 'third.db');
    createRecorderDbFile(third, (backup) => {
      seedStatisticMeta(backup, 5, 'sensor.production_old');
      seedStatisticMeta(backup, 35, 'sensor.meter');
    });

    const outcome = backupRestore(false).restore([first, third], mapping);

    expect(outcome).toEqual({ status: 'aborted', reason: AbortReason.METADATA_MISMATCH });
    expect(logs.messages('error')).toEqual([`Metadata of sensor id 5 differs between ${first} and ${third}`]);
    expect(countRows(db, TABLES.STATISTICS, 99)).toBe(0);
  });

  it('should abort when the target sensor does not exist', () => {
    const outcome = backupRestore(false).restore([first], new Map([[5, 98]]));

    expect(outcome).toEqual({ status: 'aborted', reason: AbortReason.NOT_FOUND });
    expect(logs.messages('error')).toEqual(['Sensor id 98 not found.']);
  });

  it('should abort when the target sensor has another unit', () => {
    seedStatisticMeta(db, 98, 'sensor.inverter_power', 'W');

    const outcome = backupRestore(false).restore([first], new Map([[5, 98]]));

    expect(outcome).toEqual({ status: 'aborted', reason: AbortReason.METADATA_MISMATCH });
    expect(logs.messages('error')).toEqual([
      'Sensor id 5 (sensor.production) in the backup does not match sensor id 98 (sensor.inverter_power) in the database',
    ]);
    expect(writeLogs()).toEqual([]);
  });

  it('should abort when a sample table has other columns', () => {
    const third = join(dir, 'third.db');
    createRecorderDbFile(third, (backup) => {
      seedBackupMeta(backup);
      backup.exec('ALTER TABLE statistics_short_term ADD COLUMN extra FLOAT');
    });

    const outcome = backupRestore(false).restore([first, third], mapping);

    expect(outcome).toEqual({ status: 'aborted', reason: AbortReason.SCHEMA_MISMATCH });
    expect(logs.messages('error')).toEqual([
      `Schema of table statistics_short_term differs between ${third} and the database`,
    ]);
    expect(countRows(db, TABLES.STATISTICS, 99)).toBe(0);
  });

  it('should throw before reading when a backup file is missing', () => {
    const missing = join(dir, 'missing.db');

    expect(() => backupRestore(false).restore([first, missing], mapping)).toThrow(DatabaseFileNotFoundError);
    expect(logs.messages('error')).toEqual([`Backup database ${missing} not found.`]);
  });
});
