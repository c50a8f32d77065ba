/**
 * stats-repair Type System
 *
 * This module exports all result types and enums
 * shared by repositories, checks and maintenance operations.
 */

// Re-export all enums
export { LookupStatus, ViolationReason, AbortReason } from './enums';

// Re-export all result types
export type {
  LookupResult,
  SampleBoundary,
  ConsistencyResult,
  WriteResult,
  StatementRecord,
  MaintenanceOutcome,
  MergeAllEntry,
  StateImportSummary,
  StateImportOutcome,
  StatisticMetadata,
  RestoreCounts,
  BackupRestoreOutcome,
} from './results';
