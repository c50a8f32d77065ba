/**
 * Enums for the stats-repair type system
 */

/**
 * Outcome of resolving a sensor name to its metadata id
 */
export enum LookupStatus {
  FOUND = 'found',
  NOT_FOUND = 'not-found',
  AMBIGUOUS = 'ambiguous',
}

/**
 * Reasons the consistency checker refuses a data reassignment
 */
export enum ViolationReason {
  SAME_ID = 'same-id',
  NO_SAMPLES = 'no-samples',
  CREATED_OLDER = 'created-older',
  CREATED_EQUAL = 'created-equal',
  START_OLDER = 'start-older',
  START_EQUAL = 'start-equal',
}

/**
 * Reasons a maintenance operation stops before writing
 */
export enum AbortReason {
  NOT_FOUND = 'not-found',
  AMBIGUOUS = 'ambiguous',
  SAME_ID = 'same-id',
  ORDER_VIOLATION = 'order-violation',
  DUPLICATE_SUFFIX = 'duplicate-suffix',
  EXCLUDED = 'excluded',
  METADATA_MISMATCH = 'metadata-mismatch',
  SCHEMA_MISMATCH = 'schema-mismatch',
}
