/**
 * Query Store Tests
 */

import { describe, it, expect } from 'vitest';
import { UnsupportedSourceError } from '../errors/index.js';
import type { ColumnFilter } from '../filtering/FilterClause.js';
import { QueryStore } from './QueryStore.js';
import { FakeQueryBuilder } from './__fixtures__/FakeQueryBuilder.js';
import type { StoreQuery } from './types.js';

const records = [
  { id: 1, name: '100% cotton', price: 20, note: null },
  { id: 2, name: 'Wool', price: 45, note: 'itchy' },
  { id: 3, name: 'Cotton blend', price: 30, note: null },
  { id: 4, name: 'Linen', price: 60, note: 'cool' },
];

function query(overrides: Partial<StoreQuery> = {}): StoreQuery {
  return { filters: [], sort: null, offset: 0, limit: null, ...overrides };
}

function setup(): { store: QueryStore; builder: FakeQueryBuilder } {
  const builder = new FakeQueryBuilder(records);
  const store = new QueryStore();
  store.setSource(builder);
  return { store, builder };
}

describe('QueryStore', () => {
  it('should reject arrays', () => {
    expect(() => new QueryStore().setSource(records)).toThrow(UnsupportedSourceError);
  });

  it('should throw when queried without a source', () => {
    expect(() => new QueryStore().count(query())).toThrow(UnsupportedSourceError);
  });

  it('should count on a clone', () => {
    const { store, builder } = setup();
    expect(store.count(query())).toBe(4);
    expect(builder.calls).toEqual(['clone', 'count']);
  });

  it('should apply sort, offset and limit to results', () => {
    const { store, builder } = setup();
    const result = store.results(query({ sort: { column: 'price', direction: 'desc' }, offset: 1, limit: 2 }));

    expect(result.map((r) => r.id)).toEqual([2, 3]);
    expect(builder.calls).toEqual(['clone', 'orderBy price desc', 'offset 1', 'limit 2', 'get']);
  });

  it('should skip a zero offset', () => {
    const { store, builder } = setup();
    store.results(query({ limit: 10 }));
    expect(builder.calls).toEqual(['clone', 'limit 10', 'get']);
  });

  it('should translate text clauses to LIKE with escaped wildcards', () => {
    const { store, builder } = setup();
    const filters: ColumnFilter[] = [{ column: 'name', clause: { operator: 'contains', value: '0%' } }];

    expect(store.results(query({ filters })).map((r) => r.id)).toEqual([1]);
    expect(builder.calls).toContain('where name like %0\\%%');
  });

  it('should translate each operator', () => {
    const { store, builder } = setup();
    const filters: ColumnFilter[] = [
      { column: 'name', clause: { operator: 'beginsWith', value: 'co' } },
      { column: 'name', clause: { operator: 'endsWith', value: 'd' } },
      { column: 'price', clause: { operator: 'between', min: 25, max: 50 } },
      { column: 'note', clause: { operator: 'isEmpty' } },
    ];

    expect(store.count(query({ filters }))).toBe(1);
    expect(builder.calls).toEqual([
      'clone',
      'where name like co%',
      'where name like %d',
      'whereBetween price 25 50',
      'whereNull note',
      'count',
    ]);
  });

  it('should map comparison operators', () => {
    const { store, builder } = setup();
    const filters: ColumnFilter[] = [
      { column: 'price', clause: { operator: 'gte', value: 30 } },
      { column: 'price', clause: { operator: 'lt', value: 60 } },
      { column: 'name', clause: { operator: 'notEquals', value: 'Wool' } },
      { column: 'note', clause: { operator: 'isNotEmpty' } },
    ];

    expect(store.count(query({ filters }))).toBe(0);
    expect(builder.calls.slice(1, -1)).toEqual([
      'where price >= 30',
      'where price < 60',
      'where name != Wool',
      'whereNotNull note',
    ]);
  });

  it('should not leak constraints into the source builder', () => {
    const { store } = setup();
    const filters: ColumnFilter[] = [{ column: 'price', clause: { operator: 'gt', value: 40 } }];
    expect(store.count(query({ filters }))).toBe(2);
    expect(store.count(query())).toBe(4);
  });
});
