/**
 * Table Session
 *
 * Typed view of one table's persisted state. Keys are namespaced as
 * "<prefix>.<table>.<field>". Values read back are validated; anything
 * malformed is treated as absent.
 */

import type { ColumnFilter } from '../filtering/FilterClause.js';
import { isFilterClause } from '../filtering/FilterClause.js';
import type { SortState } from '../types/index.js';
import { isSortDirection } from '../types/index.js';
import type { SessionDriver } from './types.js';

function isColumnFilter(value: unknown): value is ColumnFilter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'column' in value &&
    'clause' in value &&
    typeof value.column === 'string' &&
    isFilterClause(value.clause)
  );
}

function isSortState(value: unknown): value is SortState {
  return (
    typeof value === 'object' &&
    value !== null &&
    'column' in value &&
    'direction' in value &&
    typeof value.column === 'string' &&
    isSortDirection(value.direction)
  );
}

export class TableSession {
  private readonly driver: SessionDriver;
  private readonly namespace: string;

  constructor(driver: SessionDriver, prefix: string, tableName: string) {
    this.driver = driver;
    this.namespace = `${prefix}.${tableName}`;
  }

  key(field: string): string {
    return `${this.namespace}.${field}`;
  }

  getSort(): SortState | null {
    const value = this.driver.get(this.key('sort'));
    return isSortState(value) ? value : null;
  }

  setSort(sort: SortState): void {
    this.driver.put(this.key('sort'), { column: sort.column, direction: sort.direction });
  }

  getFilters(): ColumnFilter[] {
    const value = this.driver.get(this.key('filters'));
    if (!Array.isArray(value)) {
      return [];
    }
    return value.filter(isColumnFilter);
  }

  setFilters(filters: ReadonlyArray<ColumnFilter>): void {
    if (filters.length === 0) {
      this.driver.forget(this.key('filters'));
      return;
    }
    this.driver.put(
      this.key('filters'),
      filters.map(({ column, clause }) => ({ column, clause: { ...clause } }))
    );
  }

  getPage(): number | null {
    const value = this.driver.get(this.key('page'));
    return typeof value === 'number' && Number.isInteger(value) && value >= 1 ? value : null;
  }

  setPage(page: number): void {
    this.driver.put(this.key('page'), page);
  }
}
