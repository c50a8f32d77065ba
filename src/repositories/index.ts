/**
 * Repositories Module - stats-repair Data Access Layer
 *
 * Read-only access to the recorder tables. Writes are issued by the
 * maintenance operations through the statement executor.
 *
 * @example
 * ```typescript
 * const sensors = new SensorRepository(executor, logger);
 * const result = sensors.resolve('sensor.outdoor_temperature');
 * if (result.status === LookupStatus.FOUND) {
 *   // result.id is the statistics_meta id
 * }
 * ```
 */

// =============================================================================
// Sensor Repository
// =============================================================================

export { SensorRepository, escapeLike } from './sensor-repository';
export type { MissingSensorLevel, ResolveOptions } from './sensor-repository';

// =============================================================================
// Statistics Repository
// =============================================================================

export { StatisticsRepository } from './statistics-repository';
export type { SampleRow } from './statistics-repository';

// =============================================================================
// State Repository
// =============================================================================

export { StateRepository } from './state-repository';
export type { StateSample } from './state-repository';
