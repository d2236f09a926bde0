/**
 * Row Tests
 */

import { describe, it, expect } from 'vitest';
import { Action } from './Action.js';
import { Column } from './Column.js';
import { Row } from './Row.js';

describe('Row', () => {
  const columns = [
    new Column('name').setPresenter((value) => String(value).toUpperCase()),
    new Column('author.email'),
    new Column('missing'),
  ];
  const record = { id: 3, name: 'ada', author: { email: 'ada@example.test' } };

  it('should build a cell per column in order', () => {
    const row = new Row(record, 3, columns);
    expect(row.getCells().map((cell) => cell.column?.key)).toEqual(['name', 'author.email', 'missing']);
  });

  it('should expose presented values', () => {
    const row = new Row(record, 3, columns);
    expect(row.toArray()).toEqual({ name: 'ADA', 'author.email': 'ada@example.test', missing: undefined });
  });

  it('should look up cells by key', () => {
    const row = new Row(record, 3, columns);
    expect(row.has('name')).toBe(true);
    expect(row.has('other')).toBe(false);
    expect(row.cell('name')?.value).toBe('ADA');
    expect(row.cell('other')).toBeUndefined();
  });

  it('should resolve actions against the record', () => {
    const edit = new Action('edit', 'row').setHref((source) => `/users/${String(source.id)}/edit`);
    const row = new Row(record, 3, columns, [edit]);

    expect(row.getActions()).toEqual([{ key: 'edit', label: 'Edit', href: '/users/3/edit', confirm: null }]);
  });
});
