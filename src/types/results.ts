/**
 * Result types returned by lookups, checks and maintenance operations.
 *
 * Expected conditions (missing sensor, overlapping history) are values,
 * never exceptions.
 */

import type { SampleTable } from '../db/schema';
import type { AbortReason, LookupStatus, ViolationReason } from './enums';

export type LookupResult =
  | { status: LookupStatus.FOUND; id: number }
  | { status: LookupStatus.NOT_FOUND }
  | { status: LookupStatus.AMBIGUOUS; count: number };

/**
 * The most recent or earliest sample of a sensor
 */
export interface SampleBoundary {
  createdTs: number;
  startTs: number;
}

export type ConsistencyResult =
  | { ok: true }
  | { ok: false; reason: ViolationReason; message: string };

export type WriteResult =
  | { simulated: true }
  | { simulated: false; changes: number };

/**
 * One write issued by an orchestrator, kept for the caller's summary
 */
export interface StatementRecord {
  description: string;
  result: WriteResult;
}

export type MaintenanceOutcome =
  | { status: 'done'; simulated: boolean; statements: StatementRecord[] }
  | { status: 'aborted'; reason: AbortReason };

/**
 * Per-candidate result of a batch merge
 */
export interface MergeAllEntry {
  name: string;
  outcome: MaintenanceOutcome;
}

/**
 * Counters reported by the state import
 */
export interface StateImportSummary {
  inserted: number;
  skipped: number;
  simulated: boolean;
}

export type StateImportOutcome =
  | ({ status: 'done' } & StateImportSummary)
  | { status: 'aborted'; reason: AbortReason };

/**
 * Long-term metadata of a sensor as stored in statistics_meta
 */
export interface StatisticMetadata {
  id: number;
  statisticId: string | null;
  source: string | null;
  unitOfMeasurement: string | null;
  hasMean: number | null;
  hasSum: number | null;
}

/**
 * Rows written per sample table by a backup restore
 */
export type RestoreCounts = Record<SampleTable, number>;

export type BackupRestoreOutcome =
  | { status: 'done'; simulated: boolean; restored: RestoreCounts }
  | { status: 'aborted'; reason: AbortReason };
