/**
 * stats-repair Configuration
 *
 * Configuration sources (in order of precedence):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Default values
 */

// =============================================================================
// Default Values
// =============================================================================

/** Recorder database location relative to the working directory */
export const DEFAULT_DB_PATH = 'config/home-assistant_v2.db';

/** Environment variable overriding the database location */
export const DB_PATH_ENV = 'STATS_REPAIR_DB_PATH';

/** Suffix the recorder appends when it registers a sensor a second time */
export const DEFAULT_DUPLICATE_SUFFIX = '_2';

/**
 * Name prefixes that legitimately end in the duplicate suffix.
 *
 * Multi-phase electricity meters publish `..._l1_2`, `..._l2_2` and so on,
 * which are separate sensors and never duplicates.
 */
export const DEFAULT_EXCLUDED_PREFIXES: readonly string[] = ['sensor.electricmeter_'];

/** Substring used by `list-sensors` when no marker is given */
export const DEFAULT_LIST_MARKER = 'sensor';

/** Tool version */
export const VERSION = '0.1.0';

// =============================================================================
// Types
// =============================================================================

/**
 * Constants driving duplicate discovery and sensor listing
 */
export interface MaintenanceConfig {
  duplicateSuffix: string;
  excludedPrefixes: readonly string[];
  listMarker: string;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve the database path
 * Priority: explicit override > STATS_REPAIR_DB_PATH > default
 */
export function resolveDbPath(override?: string): string {
  if (override) {
    return override;
  }

  const envPath = process.env[DB_PATH_ENV];
  if (envPath) {
    return envPath;
  }

  return DEFAULT_DB_PATH;
}

/**
 * Build the maintenance configuration, filling gaps with defaults
 */
export function loadMaintenanceConfig(overrides: Partial<MaintenanceConfig> = {}): MaintenanceConfig {
  return {
    duplicateSuffix: overrides.duplicateSuffix ?? DEFAULT_DUPLICATE_SUFFIX,
    excludedPrefixes: overrides.excludedPrefixes ?? DEFAULT_EXCLUDED_PREFIXES,
    listMarker: overrides.listMarker ?? DEFAULT_LIST_MARKER,
  };
}
