/**
 * Sensor Repository
 *
 * Resolves sensor names to metadata ids and enumerates known sensor names.
 * All statements are reads routed through the statement executor.
 */

import { TABLES } from '../db/schema';
import type { StatementExecutor } from '../db/statement-executor';
import type { Logger } from '../logging/logger';
import { LookupStatus } from '../types';
import type { LookupResult } from '../types';

/**
 * Log level used when a sensor is missing
 *
 * Merges expect missing duplicates and only warn.
 */
export type MissingSensorLevel = 'error' | 'warn';

export interface ResolveOptions {
  missingLevel?: MissingSensorLevel;
}

interface IdRow {
  id: number;
}

interface NameRow {
  name: string;
}

/**
 * Escape LIKE wildcards so the value matches literally (ESCAPE '\')
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Sensor Repository Class
 */
export class SensorRepository {
  constructor(
    private readonly executor: StatementExecutor,
    private readonly logger: Logger
  ) {}

  /**
   * Resolve a long-term statistics sensor name to its id
   */
  resolve(name: string, options: ResolveOptions = {}): LookupResult {
    const rows = this.executor.runRead<IdRow>(
      `
      SELECT id
      FROM ${TABLES.STATISTICS_META}
      WHERE statistic_id = :name
      `,
      { name }
    );
    return this.toLookupResult(name, rows, options);
  }

  /**
   * Resolve a live-state entity name to its states_meta id
   */
  resolveState(name: string, options: ResolveOptions = {}): LookupResult {
    const rows = this.executor.runRead<IdRow>(
      `
      SELECT metadata_id AS id
      FROM ${TABLES.STATES_META}
      WHERE entity_id = :name
      `,
      { name }
    );
    return this.toLookupResult(name, rows, options);
  }

  /**
   * List every sensor name containing the marker, from both metadata tables
   */
  listNames(marker: string): string[] {
    const rows = this.executor.runRead<NameRow>(
      `
      SELECT statistic_id AS name FROM ${TABLES.STATISTICS_META} WHERE statistic_id LIKE :pattern ESCAPE '\\'
      UNION
      SELECT entity_id AS name FROM ${TABLES.STATES_META} WHERE entity_id LIKE :pattern ESCAPE '\\'
      ORDER BY name ASC
      `,
      { pattern: `%${escapeLike(marker)}%` }
    );
    return rows.map((row) => row.name);
  }

  /**
   * List long-term statistics sensor names ending in the suffix
   */
  listStatisticNamesWithSuffix(suffix: string): string[] {
    const rows = this.executor.runRead<NameRow>(
      `
      SELECT statistic_id AS name
      FROM ${TABLES.STATISTICS_META}
      WHERE statistic_id LIKE :pattern ESCAPE '\\'
      ORDER BY statistic_id ASC
      `,
      { pattern: `%${escapeLike(suffix)}` }
    );
    return rows.map((row) => row.name);
  }

  private toLookupResult(name: string, rows: IdRow[], options: ResolveOptions): LookupResult {
    if (rows.length === 0) {
      if (options.missingLevel === 'warn') {
        this.logger.warn({ sensor: name }, `Sensor ${name} not found.`);
      } else {
        this.logger.error({ sensor: name }, `Sensor ${name} not found.`);
      }
      return { status: LookupStatus.NOT_FOUND };
    }

    if (rows.length > 1) {
      this.logger.error(
        { sensor: name, count: rows.length },
        `Multiple sensors with name ${name} found.`
      );
      return { status: LookupStatus.AMBIGUOUS, count: rows.length };
    }

    return { status: LookupStatus.FOUND, id: rows[0].id };
  }
}
