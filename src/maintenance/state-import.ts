/**
 * State Import
 *
 * Copies the live-state history of a sensor into long-term statistics.
 * Needed when a sensor ran without a state class: its history only lives in
 * the states table and is purged after a while.
 */

import { TABLES } from '../db/schema';
import type { StatementExecutor } from '../db/statement-executor';
import type { Logger } from '../logging/logger';
import type { SensorRepository, StateRepository } from '../repositories';
import { AbortReason, LookupStatus } from '../types';
import type { StateImportOutcome } from '../types';

/** Statistics are hourly */
export const HOUR_SECONDS = 60 * 60;

export interface StateImportDeps {
  executor: StatementExecutor;
  sensors: SensorRepository;
  states: StateRepository;
  logger: Logger;
}

export interface StateImportOptions {
  /**
   * Epoch seconds; only states updated before this are copied
   */
  until: number;
}

/**
 * Start of the hour containing the timestamp
 */
export function hourStart(ts: number): number {
  return ts - (ts % HOUR_SECONDS);
}

/**
 * Parse a recorded state as a number, or null if it is not numeric
 */
export function parseStateValue(state: string): number | null {
  if (state.trim() === '') {
    return null;
  }
  const value = Number(state);
  return Number.isFinite(value) ? value : null;
}

export class StateImport {
  private readonly executor: StatementExecutor;
  private readonly sensors: SensorRepository;
  private readonly states: StateRepository;
  private readonly logger: Logger;

  constructor(deps: StateImportDeps) {
    this.executor = deps.executor;
    this.sensors = deps.sensors;
    this.states = deps.states;
    this.logger = deps.logger;
  }

  /**
   * Copy the first state of every hour before `until` into statistics
   *
   * Hours that already have a statistics row are left alone (INSERT OR IGNORE
   * on the metadata_id/start_ts index) and not counted as inserted. In a
   * dry-run every statement that would run is counted.
   */
  copyStatesToStatistics(name: string, options: StateImportOptions): StateImportOutcome {
    const stateSensor = this.sensors.resolveState(name);
    if (stateSensor.status !== LookupStatus.FOUND) {
      return {
        status: 'aborted',
        reason: stateSensor.status === LookupStatus.AMBIGUOUS ? AbortReason.AMBIGUOUS : AbortReason.NOT_FOUND,
      };
    }
    const statisticSensor = this.sensors.resolve(name);
    if (statisticSensor.status !== LookupStatus.FOUND) {
      return {
        status: 'aborted',
        reason: statisticSensor.status === LookupStatus.AMBIGUOUS ? AbortReason.AMBIGUOUS : AbortReason.NOT_FOUND,
      };
    }

    const history = this.states.findHistory(stateSensor.id, options.until);
    this.logger.info(
      { sensor: name, stateId: stateSensor.id, statisticId: statisticSensor.id, rows: history.length },
      `Copy ${history.length} state row(s) of ${name} to ${TABLES.STATISTICS}`
    );

    const seenHours = new Set<number>();
    let firstValueChecked = false;
    let inserted = 0;
    let skipped = 0;

    for (const sample of history) {
      const value = parseStateValue(sample.state);
      if (value === null) {
        this.logger.warn(
          { sensor: name, state: sample.state, lastUpdatedTs: sample.lastUpdatedTs },
          `Ignoring non-numeric state ${sample.state}`
        );
        skipped++;
        continue;
      }

      if (!firstValueChecked) {
        if (value !== 0) {
          this.logger.warn(
            { sensor: name, value },
            `Sensor ${name} starts with unexpected value ${value} instead of 0. The history data is probably incomplete.`
          );
        }
        firstValueChecked = true;
      }

      const start = hourStart(sample.lastUpdatedTs);
      if (seenHours.has(start)) {
        skipped++;
        continue;
      }
      seenHours.add(start);

      // sum follows state for counters that only grow
      const result = this.executor.runWrite(
        `
        INSERT OR IGNORE INTO ${TABLES.STATISTICS} (state, sum, metadata_id, created_ts, start_ts)
        VALUES (:state, :sum, :metadataId, :createdTs, :startTs)
        `,
        {
          state: value,
          sum: value,
          metadataId: statisticSensor.id,
          createdTs: start,
          startTs: start,
        }
      );
      inserted += result.simulated ? 1 : result.changes;
    }

    return { status: 'done', inserted, skipped, simulated: this.executor.dryRun };
  }
}
