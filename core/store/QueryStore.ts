/**
 * Query Store
 *
 * Drives a fluent query builder. Every call works on a clone of the
 * source builder so counting and fetching never leak constraints into
 * each other or into the caller's builder.
 */

import { UnsupportedSourceError } from '../errors/index.js';
import type { ColumnFilter, FilterClause } from '../filtering/FilterClause.js';
import type { DataRecord } from '../types/index.js';
import type { DataSource, QueryBuilder, StoreDriver, StoreQuery } from './types.js';
import { isQueryBuilder } from './types.js';

/**
 * Escape LIKE wildcards in user input
 */
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function applyClause(builder: QueryBuilder, column: string, clause: FilterClause): QueryBuilder {
  switch (clause.operator) {
    case 'contains':
      return builder.where(column, 'like', `%${escapeLike(clause.value)}%`);
    case 'beginsWith':
      return builder.where(column, 'like', `${escapeLike(clause.value)}%`);
    case 'endsWith':
      return builder.where(column, 'like', `%${escapeLike(clause.value)}`);
    case 'equals':
      return builder.where(column, '=', clause.value);
    case 'notEquals':
      return builder.where(column, '!=', clause.value);
    case 'gt':
      return builder.where(column, '>', clause.value);
    case 'gte':
      return builder.where(column, '>=', clause.value);
    case 'lt':
      return builder.where(column, '<', clause.value);
    case 'lte':
      return builder.where(column, '<=', clause.value);
    case 'between':
      return builder.whereBetween(column, [clause.min, clause.max]);
    case 'isEmpty':
      return builder.whereNull(column);
    case 'isNotEmpty':
      return builder.whereNotNull(column);
  }
}

export class QueryStore implements StoreDriver {
  private source: QueryBuilder | null = null;

  setSource(source: DataSource): void {
    if (!isQueryBuilder(source)) {
      throw new UnsupportedSourceError('query', 'a query builder');
    }
    this.source = source;
  }

  count(query: StoreQuery): number {
    return this.filtered(query.filters).count();
  }

  results(query: StoreQuery): DataRecord[] {
    let builder = this.filtered(query.filters);

    if (query.sort !== null) {
      builder = builder.orderBy(query.sort.column, query.sort.direction);
    }
    if (query.offset > 0) {
      builder = builder.offset(query.offset);
    }
    if (query.limit !== null) {
      builder = builder.limit(query.limit);
    }

    return builder.get();
  }

  private filtered(filters: ReadonlyArray<ColumnFilter>): QueryBuilder {
    if (this.source === null) {
      throw new UnsupportedSourceError('query', 'a query builder before it is queried');
    }

    let builder = this.source.clone();
    for (const { column, clause } of filters) {
      builder = applyClause(builder, column, clause);
    }
    return builder;
  }
}
