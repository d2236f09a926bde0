/**
 * Array Store
 *
 * In-memory driver for arrays and other iterables of records. Filtering,
 * sorting and slicing happen on a copy; the source is never reordered.
 */

import { UnsupportedSourceError } from '../errors/index.js';
import { matchesFilter } from '../filtering/FilterClause.js';
import type { ColumnFilter } from '../filtering/FilterClause.js';
import type { DataRecord, SortState } from '../types/index.js';
import { getField } from '../types/index.js';
import { compareValues } from './compare.js';
import type { DataSource, StoreDriver, StoreQuery } from './types.js';
import { isIterableSource } from './types.js';

export class ArrayStore implements StoreDriver {
  private records: DataRecord[] = [];

  setSource(source: DataSource): void {
    if (!isIterableSource(source)) {
      throw new UnsupportedSourceError('array', 'an array or iterable of records');
    }
    this.records = Array.from(source);
  }

  count(query: StoreQuery): number {
    return this.filter(query.filters).length;
  }

  results(query: StoreQuery): DataRecord[] {
    let records = this.filter(query.filters);

    if (query.sort !== null) {
      records = this.sort(records, query.sort);
    }

    const end = query.limit === null ? undefined : query.offset + query.limit;
    return records.slice(query.offset, end);
  }

  private filter(filters: ReadonlyArray<ColumnFilter>): DataRecord[] {
    if (filters.length === 0) {
      return this.records.slice();
    }
    return this.records.filter((record) =>
      filters.every(({ column, clause }) => matchesFilter(clause, getField(record, column)))
    );
  }

  /**
   * Array.prototype.sort is stable, so equal keys keep source order
   */
  private sort(records: DataRecord[], sort: SortState): DataRecord[] {
    return records.sort((a, b) =>
      compareValues(getField(a, sort.column), getField(b, sort.column), sort.direction)
    );
  }
}
