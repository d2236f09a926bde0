/**
 * Table Carpenter - Core Type Definitions
 * Shared by components, drivers and the table pipeline
 */

// ============================================================================
// Records
// ============================================================================

/** Primary key of a source record */
export type RowId = string | number;

/** A raw record as returned by a store driver */
export type DataRecord = Record<string, unknown>;

// ============================================================================
// Sorting
// ============================================================================

export type SortDirection = 'asc' | 'desc';

export interface SortState {
  /** Column key */
  column: string;
  direction: SortDirection;
}

export function isSortDirection(value: unknown): value is SortDirection {
  return value === 'asc' || value === 'desc';
}

export function oppositeDirection(direction: SortDirection): SortDirection {
  return direction === 'asc' ? 'desc' : 'asc';
}

// ============================================================================
// Request
// ============================================================================

/**
 * The current request as seen by a table.
 * Sort, direction and page parameters are read from `query`;
 * heading and pagination links are built from `url`.
 */
export interface TableRequest {
  /** Absolute URL or path, e.g. "/users?role=admin" */
  url: string;
  query: Record<string, string | undefined>;
}

export const EMPTY_REQUEST: TableRequest = { url: '/', query: {} };

// ============================================================================
// Values
// ============================================================================

/**
 * Date holding no time, e.g. `new Date('')`. Rendered and matched as blank.
 */
export function isInvalidDate(value: unknown): value is Date {
  return value instanceof Date && Number.isNaN(value.getTime());
}

/**
 * null, undefined or an invalid Date
 */
export function isBlankValue(value: unknown): value is null | undefined | Date {
  return value === null || value === undefined || isInvalidDate(value);
}

// ============================================================================
// Field Access
// ============================================================================

function isRecordLike(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Read a field from a record. Dot paths walk nested objects
 * ("author.name"); a key that exists verbatim wins over the path.
 */
export function getField(record: unknown, key: string): unknown {
  if (!isRecordLike(record)) {
    return undefined;
  }
  if (Object.hasOwn(record, key)) {
    return record[key];
  }
  if (!key.includes('.')) {
    return undefined;
  }

  let current: unknown = record;
  for (const segment of key.split('.')) {
    if (!isRecordLike(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}
