/**
 * Recorder Database Schema Constants
 *
 * The schema belongs to the home-automation recorder. Names here must
 * match it exactly; this tool never creates or alters tables.
 */

/**
 * Table names as constants
 *
 * Statements interpolate table names only from this object.
 */
export const TABLES = {
  STATISTICS_META: 'statistics_meta',
  STATES_META: 'states_meta',
  STATISTICS: 'statistics',
  STATISTICS_SHORT_TERM: 'statistics_short_term',
  STATES: 'states',
} as const;

export type TableName = (typeof TABLES)[keyof typeof TABLES];

/**
 * Tables holding aggregated samples, long-term first
 */
export const SAMPLE_TABLES = [TABLES.STATISTICS, TABLES.STATISTICS_SHORT_TERM] as const;

export type SampleTable = (typeof SAMPLE_TABLES)[number];

/**
 * Live state values the recorder treats as "no reading"
 */
export const NON_NUMERIC_STATES = ['unknown', 'unavailable'] as const;
