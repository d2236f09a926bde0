/**
 * In-process query builder over an array, recording every call so tests
 * can assert how the query store drives it.
 */

import type { DataRecord, SortDirection } from '../../types/index.js';
import { getField } from '../../types/index.js';
import { compareValues } from '../compare.js';
import type { QueryBuilder, QueryOperator } from '../types.js';

type Predicate = (record: DataRecord) => boolean;

const REGEXP_SPECIAL = /[.*+?^${}()|[\]\\]/g;

function likeToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '\\' && i + 1 < pattern.length) {
      i++;
      source += pattern[i].replace(REGEXP_SPECIAL, '\\$&');
    } else if (char === '%') {
      source += '.*';
    } else if (char === '_') {
      source += '.';
    } else {
      source += char.replace(REGEXP_SPECIAL, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 'i');
}

function matches(operator: QueryOperator, value: string | number, field: unknown): boolean {
  switch (operator) {
    case '=':
      return field === value;
    case '!=':
      return field !== value;
    case '>':
      return Number(field) > Number(value);
    case '>=':
      return Number(field) >= Number(value);
    case '<':
      return Number(field) < Number(value);
    case '<=':
      return Number(field) <= Number(value);
    case 'like':
      return likeToRegExp(String(value)).test(String(field ?? ''));
    case 'not like':
      return !likeToRegExp(String(value)).test(String(field ?? ''));
  }
}

export class FakeQueryBuilder implements QueryBuilder {
  /** Calls made on this builder and the builders cloned from it */
  readonly calls: string[];
  private readonly records: DataRecord[];
  private predicates: Predicate[] = [];
  private order: { column: string; direction: SortDirection } | null = null;
  private skip = 0;
  private take: number | null = null;

  constructor(records: DataRecord[], calls: string[] = []) {
    this.records = records;
    this.calls = calls;
  }

  clone(): FakeQueryBuilder {
    const copy = new FakeQueryBuilder(this.records, this.calls);
    copy.predicates = this.predicates.slice();
    copy.order = this.order;
    copy.skip = this.skip;
    copy.take = this.take;
    this.calls.push('clone');
    return copy;
  }

  where(column: string, operator: QueryOperator, value: string | number): this {
    this.calls.push(`where ${column} ${operator} ${value}`);
    this.predicates.push((record) => matches(operator, value, getField(record, column)));
    return this;
  }

  whereNull(column: string): this {
    this.calls.push(`whereNull ${column}`);
    this.predicates.push((record) => getField(record, column) == null);
    return this;
  }

  whereNotNull(column: string): this {
    this.calls.push(`whereNotNull ${column}`);
    this.predicates.push((record) => getField(record, column) != null);
    return this;
  }

  whereBetween(column: string, range: [number, number]): this {
    this.calls.push(`whereBetween ${column} ${range[0]} ${range[1]}`);
    this.predicates.push((record) => {
      const value = Number(getField(record, column));
      return value >= range[0] && value <= range[1];
    });
    return this;
  }

  orderBy(column: string, direction: SortDirection): this {
    this.calls.push(`orderBy ${column} ${direction}`);
    this.order = { column, direction };
    return this;
  }

  offset(count: number): this {
    this.calls.push(`offset ${count}`);
    this.skip = count;
    return this;
  }

  limit(count: number): this {
    this.calls.push(`limit ${count}`);
    this.take = count;
    return this;
  }

  count(): number {
    this.calls.push('count');
    return this.filtered().length;
  }

  get(): DataRecord[] {
    this.calls.push('get');
    let records = this.filtered();
    const order = this.order;
    if (order !== null) {
      records = records.sort((a, b) =>
        compareValues(getField(a, order.column), getField(b, order.column), order.direction)
      );
    }
    const end = this.take === null ? undefined : this.skip + this.take;
    return records.slice(this.skip, end);
  }

  private filtered(): DataRecord[] {
    return this.records.filter((record) => this.predicates.every((predicate) => predicate(record)));
  }
}
