/**
 * Store Driver Contract
 */

import type { ColumnFilter } from '../filtering/FilterClause.js';
import type { DataRecord, SortDirection, SortState } from '../types/index.js';

export interface StoreQuery {
  filters: ReadonlyArray<ColumnFilter>;
  sort: SortState | null;
  /** Number of matching records to skip */
  offset: number;
  /** Maximum number of records, null for all */
  limit: number | null;
}

/**
 * Fetches raw records for a table. Drivers accept the source they
 * understand and throw UnsupportedSourceError for anything else.
 */
export interface StoreDriver {
  setSource(source: DataSource): void;
  /** Number of records matching the query filters */
  count(query: StoreQuery): number;
  /** Records matching the whole query, in order */
  results(query: StoreQuery): DataRecord[];
}

// =============================================================================
// Query Builder
// =============================================================================

export type QueryOperator = '=' | '!=' | '>' | '>=' | '<' | '<=' | 'like' | 'not like';

/**
 * Subset of a fluent query builder that the query store drives.
 * Methods may mutate and return the same builder; the store always
 * works on a clone.
 */
export interface QueryBuilder {
  clone(): QueryBuilder;
  where(column: string, operator: QueryOperator, value: string | number): QueryBuilder;
  whereNull(column: string): QueryBuilder;
  whereNotNull(column: string): QueryBuilder;
  whereBetween(column: string, range: [number, number]): QueryBuilder;
  orderBy(column: string, direction: SortDirection): QueryBuilder;
  offset(count: number): QueryBuilder;
  limit(count: number): QueryBuilder;
  count(): number;
  get(): DataRecord[];
}

export type DataSource = Iterable<DataRecord> | QueryBuilder;

const QUERY_BUILDER_METHODS = [
  'clone',
  'where',
  'whereNull',
  'whereNotNull',
  'whereBetween',
  'orderBy',
  'offset',
  'limit',
  'count',
  'get',
] as const;

export function isQueryBuilder(source: unknown): source is QueryBuilder {
  if (typeof source !== 'object' || source === null) {
    return false;
  }
  return QUERY_BUILDER_METHODS.every((method) => typeof Reflect.get(source, method) === 'function');
}

export function isIterableSource(source: unknown): source is Iterable<DataRecord> {
  if (typeof source !== 'object' || source === null) {
    return false;
  }
  return typeof Reflect.get(source, Symbol.iterator) === 'function';
}
