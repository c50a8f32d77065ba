/**
 * Sensor Maintenance Operations
 *
 * Moves statistics between sensors and merges duplicate sensors. Every
 * operation resolves names first, checks where required, and only then
 * writes. Writes always run in the same order: sample tables before
 * metadata deletion, long-term tables before live-state tables.
 */

import { SAMPLE_TABLES, TABLES } from '../db/schema';
import type { StatementExecutor, SqlParams } from '../db/statement-executor';
import type { MaintenanceConfig } from '../config';
import type { Logger } from '../logging/logger';
import type { SensorRepository } from '../repositories';
import type { ConsistencyChecker } from './consistency-checker';
import { AbortReason, LookupStatus, ViolationReason } from '../types';
import type {
  LookupResult,
  MaintenanceOutcome,
  MergeAllEntry,
  StatementRecord,
} from '../types';

export interface SensorMaintenanceDeps {
  executor: StatementExecutor;
  sensors: SensorRepository;
  checker: ConsistencyChecker;
  config: MaintenanceConfig;
  logger: Logger;
}

function aborted(reason: AbortReason): MaintenanceOutcome {
  return { status: 'aborted', reason };
}

function lookupAbortReason(result: LookupResult): AbortReason {
  return result.status === LookupStatus.AMBIGUOUS ? AbortReason.AMBIGUOUS : AbortReason.NOT_FOUND;
}

export class SensorMaintenance {
  private readonly executor: StatementExecutor;
  private readonly sensors: SensorRepository;
  private readonly checker: ConsistencyChecker;
  private readonly config: MaintenanceConfig;
  private readonly logger: Logger;

  constructor(deps: SensorMaintenanceDeps) {
    this.executor = deps.executor;
    this.sensors = deps.sensors;
    this.checker = deps.checker;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  /**
   * Sensor names matching the marker (defaults to the configured list marker)
   */
  listSensors(marker: string = this.config.listMarker): string[] {
    return this.sensors.listNames(marker);
  }

  /**
   * Assign all statistics of the old sensor to the new sensor
   *
   * Used after a sensor was renamed. Metadata of the old sensor is kept.
   */
  moveData(oldName: string, newName: string): MaintenanceOutcome {
    const oldSensor = this.sensors.resolve(oldName);
    if (oldSensor.status !== LookupStatus.FOUND) {
      return aborted(lookupAbortReason(oldSensor));
    }
    this.logger.info({ sensor: oldName, id: oldSensor.id }, `Old sensor id: ${oldSensor.id}`);

    const newSensor = this.sensors.resolve(newName);
    if (newSensor.status !== LookupStatus.FOUND) {
      return aborted(lookupAbortReason(newSensor));
    }
    this.logger.info({ sensor: newName, id: newSensor.id }, `New sensor id: ${newSensor.id}`);

    const check = this.checker.checkOrdering({
      oldId: oldSensor.id,
      oldName,
      newId: newSensor.id,
      newName,
    });
    if (!check.ok) {
      return aborted(check.reason === ViolationReason.SAME_ID ? AbortReason.SAME_ID : AbortReason.ORDER_VIOLATION);
    }

    const statements: StatementRecord[] = [];
    for (const table of SAMPLE_TABLES) {
      this.logger.info({ table }, `Assign data from the old sensor in table ${table} to the new sensor`);
      statements.push(
        this.write(
          `move ${table}`,
          `
          UPDATE ${table}
          SET metadata_id = :newId
          WHERE metadata_id = :oldId
          `,
          { newId: newSensor.id, oldId: oldSensor.id }
        )
      );
    }

    this.logger.info({ oldName, newName }, 'All data from the old sensor assigned to the new sensor');
    return this.done(statements);
  }

  /**
   * Merge the duplicate `<name><suffix>` into `<name>`
   *
   * Duplicates are assumed to come from the same source, so no ordering
   * check runs. Sample rows that would collide with existing rows of the
   * original are left behind and removed with the duplicate's metadata
   * (ON DELETE CASCADE). Live-state metadata of the duplicate is kept while
   * states still reference it.
   */
  mergeSingle(name: string): MaintenanceOutcome {
    const { duplicateSuffix } = this.config;

    if (name.endsWith(duplicateSuffix)) {
      this.logger.error(
        { sensor: name, suffix: duplicateSuffix },
        `Sensor name ${name} already ends with ${duplicateSuffix}; pass the name of the original sensor`
      );
      return aborted(AbortReason.DUPLICATE_SUFFIX);
    }

    const duplicate = `${name}${duplicateSuffix}`;

    const original = this.sensors.resolve(name, { missingLevel: 'warn' });
    if (original.status !== LookupStatus.FOUND) {
      return aborted(lookupAbortReason(original));
    }
    const copy = this.sensors.resolve(duplicate, { missingLevel: 'warn' });
    if (copy.status !== LookupStatus.FOUND) {
      return aborted(lookupAbortReason(copy));
    }

    this.logger.info(
      { sensor: name, id: original.id, duplicate, duplicateId: copy.id },
      `Merge ${duplicate} into ${name}`
    );

    const params = { name, duplicate };
    const statements: StatementRecord[] = [];

    for (const table of SAMPLE_TABLES) {
      statements.push(
        this.write(
          `merge ${table}`,
          `
          UPDATE OR IGNORE ${table}
          SET metadata_id = (SELECT id FROM ${TABLES.STATISTICS_META} WHERE statistic_id = :name)
          WHERE metadata_id = (SELECT id FROM ${TABLES.STATISTICS_META} WHERE statistic_id = :duplicate)
          `,
          params
        )
      );
    }

    statements.push(
      this.write(
        `delete ${TABLES.STATISTICS_META}`,
        `
        DELETE FROM ${TABLES.STATISTICS_META}
        WHERE statistic_id = :duplicate
        `,
        { duplicate }
      )
    );

    statements.push(
      this.write(
        `merge ${TABLES.STATES}`,
        `
        UPDATE OR IGNORE ${TABLES.STATES}
        SET metadata_id = (SELECT metadata_id FROM ${TABLES.STATES_META} WHERE entity_id = :name)
        WHERE metadata_id = (SELECT metadata_id FROM ${TABLES.STATES_META} WHERE entity_id = :duplicate)
          AND EXISTS (SELECT 1 FROM ${TABLES.STATES_META} WHERE entity_id = :name)
        `,
        params
      )
    );

    statements.push(
      this.write(
        `delete ${TABLES.STATES_META}`,
        `
        DELETE FROM ${TABLES.STATES_META}
        WHERE entity_id = :duplicate
          AND NOT EXISTS (
            SELECT 1 FROM ${TABLES.STATES} WHERE ${TABLES.STATES}.metadata_id = ${TABLES.STATES_META}.metadata_id
          )
        `,
        { duplicate }
      )
    );

    if (this.executor.dryRun) {
      this.logger.info({ sensor: name, duplicate }, `Dry-run finished: ${duplicate} would be merged into ${name}`);
    } else {
      this.logger.info({ sensor: name, duplicate }, `Merged ${duplicate} into ${name}`);
    }

    return this.done(statements);
  }

  /**
   * Merge every duplicate sensor found in the long-term metadata table
   *
   * Excluded prefixes are skipped. A skipped or aborted candidate does not
   * stop the batch.
   */
  mergeAll(): MergeAllEntry[] {
    const { duplicateSuffix, excludedPrefixes } = this.config;
    const candidates = this.sensors.listStatisticNamesWithSuffix(duplicateSuffix);
    this.logger.info({ count: candidates.length }, `Found ${candidates.length} duplicate candidate(s)`);

    const results: MergeAllEntry[] = [];
    for (const candidate of candidates) {
      if (excludedPrefixes.some((prefix) => candidate.startsWith(prefix))) {
        this.logger.info({ sensor: candidate }, `Skipping excluded sensor ${candidate}`);
        results.push({ name: candidate, outcome: aborted(AbortReason.EXCLUDED) });
        continue;
      }

      const base = candidate.slice(0, candidate.length - duplicateSuffix.length);
      results.push({ name: candidate, outcome: this.mergeSingle(base) });
    }

    return results;
  }

  private write(description: string, sql: string, params: SqlParams): StatementRecord {
    return { description, result: this.executor.runWrite(sql, params) };
  }

  private done(statements: StatementRecord[]): MaintenanceOutcome {
    return { status: 'done', simulated: this.executor.dryRun, statements };
  }
}
