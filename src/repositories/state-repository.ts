/**
 * State Repository
 *
 * Reads the live-state history of a single entity.
 */

import { NON_NUMERIC_STATES, TABLES } from '../db/schema';
import type { StatementExecutor } from '../db/statement-executor';

/**
 * A recorded state value and when it was last updated
 */
export interface StateSample {
  state: string;
  lastUpdatedTs: number;
}

interface StateRow {
  state: string;
  last_updated_ts: number;
}

export class StateRepository {
  constructor(private readonly executor: StatementExecutor) {}

  /**
   * States of an entity recorded before `until`, oldest first
   *
   * Rows without a reading (unknown, unavailable, NULL) are left out.
   */
  findHistory(stateMetadataId: number, until: number): StateSample[] {
    const [unknownState, unavailableState] = NON_NUMERIC_STATES;
    const rows = this.executor.runRead<StateRow>(
      `
      SELECT state, last_updated_ts
      FROM ${TABLES.STATES}
      WHERE metadata_id = :metadataId
        AND last_updated_ts < :until
        AND state IS NOT NULL
        AND state NOT IN (:unknownState, :unavailableState)
      ORDER BY last_updated_ts ASC
      `,
      { metadataId: stateMetadataId, until, unknownState, unavailableState }
    );
    return rows.map((row) => ({ state: row.state, lastUpdatedTs: row.last_updated_ts }));
  }
}
