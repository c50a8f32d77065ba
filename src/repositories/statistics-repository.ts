/**
 * Statistics Repository
 *
 * Reads over statistics_meta and the sample tables. Checks only fetch the
 * boundary sample of a sensor; full rows are loaded for backup restores.
 */

import { TABLES } from '../db/schema';
import type { SampleTable } from '../db/schema';
import type { SqlValue, StatementExecutor } from '../db/statement-executor';
import type { SampleBoundary, StatisticMetadata } from '../types';

/**
 * A sample row with every column of its table
 */
export type SampleRow = Record<string, SqlValue>;

interface MetadataRow {
  id: number;
  statistic_id: string | null;
  source: string | null;
  unit_of_measurement: string | null;
  has_mean: number | null;
  has_sum: number | null;
}

function toMetadata(row: MetadataRow): StatisticMetadata {
  return {
    id: row.id,
    statisticId: row.statistic_id,
    source: row.source,
    unitOfMeasurement: row.unit_of_measurement,
    hasMean: row.has_mean,
    hasSum: row.has_sum,
  };
}

/**
 * Database row type for a boundary sample (snake_case)
 */
interface BoundaryRow {
  created_ts: number;
  start_ts: number;
}

function toBoundary(row: BoundaryRow): SampleBoundary {
  return {
    createdTs: row.created_ts,
    startTs: row.start_ts,
  };
}

export class StatisticsRepository {
  constructor(private readonly executor: StatementExecutor) {}

  /**
   * Most recent sample of a sensor by creation time, or null without samples
   */
  findLatest(metadataId: number): SampleBoundary | null {
    const rows = this.executor.runRead<BoundaryRow>(
      `
      SELECT created_ts, start_ts
      FROM ${TABLES.STATISTICS}
      WHERE metadata_id = :metadataId
      ORDER BY created_ts DESC
      LIMIT 1
      `,
      { metadataId }
    );
    return rows.length > 0 ? toBoundary(rows[0]) : null;
  }

  /**
   * Earliest sample of a sensor by creation time, or null without samples
   */
  findEarliest(metadataId: number): SampleBoundary | null {
    const rows = this.executor.runRead<BoundaryRow>(
      `
      SELECT created_ts, start_ts
      FROM ${TABLES.STATISTICS}
      WHERE metadata_id = :metadataId
      ORDER BY created_ts ASC
      LIMIT 1
      `,
      { metadataId }
    );
    return rows.length > 0 ? toBoundary(rows[0]) : null;
  }

  /**
   * Metadata row by id, or null if the id is unknown
   */
  findMetadata(id: number): StatisticMetadata | null {
    const rows = this.executor.runRead<MetadataRow>(
      `
      SELECT id, statistic_id, source, unit_of_measurement, has_mean, has_sum
      FROM ${TABLES.STATISTICS_META}
      WHERE id = :id
      `,
      { id }
    );
    return rows.length > 0 ? toMetadata(rows[0]) : null;
  }

  /**
   * Column names of a sample table in declaration order
   */
  listColumns(table: SampleTable): string[] {
    return this.executor
      .runRead<{ name: string }>('SELECT name FROM pragma_table_info(:table) ORDER BY cid', { table })
      .map((row) => row.name);
  }

  /**
   * All rows of a sample table referencing one of the ids, ordered by row id
   */
  findSamples(table: SampleTable, metadataIds: readonly number[]): SampleRow[] {
    if (metadataIds.length === 0) {
      return [];
    }
    const placeholders = metadataIds.map(() => '?').join(', ');
    return this.executor.runRead<SampleRow>(
      `
      SELECT *
      FROM ${table}
      WHERE metadata_id IN (${placeholders})
      ORDER BY id
      `,
      metadataIds
    );
  }
}
