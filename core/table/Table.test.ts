/**
 * Table Tests
 */

import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { resolveConfig } from '../config/CarpenterConfig.js';
import type { CarpenterConfigInput } from '../config/CarpenterConfig.js';
import { DriverNotFoundError, TableStateError, ViewTemplateNotFoundError } from '../errors/index.js';
import { PaginationManager } from '../managers/PaginationManager.js';
import { SessionManager } from '../managers/SessionManager.js';
import { StoreManager } from '../managers/StoreManager.js';
import { ViewManager } from '../managers/ViewManager.js';
import type { Logger } from '../logging/Logger.js';
import { silentLogger } from '../logging/Logger.js';
import type { SessionBackend } from '../session/types.js';
import { Table } from './Table.js';

// ============================================================================
// Helpers
// ============================================================================

const users = [
  { id: 1, name: 'Carol', age: 41 },
  { id: 2, name: 'alice', age: 29 },
  { id: 3, name: 'Bob', age: 35 },
  { id: 4, name: 'Dan', age: 52 },
  { id: 5, name: 'Eve', age: 23 },
];

function createTable(input: CarpenterConfigInput = {}, name = 'users', logger: Logger = silentLogger): Table {
  const config = resolveConfig(input);
  return new Table(
    name,
    {
      store: new StoreManager(config.store, new Map()),
      session: new SessionManager(config.session, new Map()),
      view: new ViewManager(config.view, new Map()),
      paginator: new PaginationManager(config.paginator, new Map()),
    },
    config,
    logger
  );
}

function usersTable(input: CarpenterConfigInput = {}, logger: Logger = silentLogger): Table {
  const table = createTable(input, 'users', logger);
  table.column('name');
  table.column('age').sortable(false);
  table.data(users);
  return table;
}

function sharedBackend(): SessionBackend {
  const values = new Map<string, unknown>();
  return {
    get: (key) => values.get(key),
    set: (key, value) => {
      values.set(key, value);
    },
    delete: (key) => {
      values.delete(key);
    },
  };
}

// ============================================================================
// Building
// ============================================================================

describe('Table', () => {
  describe('build', () => {
    it('should require a data source', () => {
      const table = createTable();
      table.column('name');
      expect(() => table.build()).toThrow("Table 'users': no data source has been set");
    });

    it('should build rows in source order', () => {
      const table = usersTable();
      expect(table.getRows().map((row) => row.id)).toEqual([1, 2, 3, 4, 5]);
      expect(table.getTotal()).toBe(5);
      expect(table.isBuilt()).toBe(true);
    });

    it('should present values', () => {
      const table = usersTable();
      table.column('name').setPresenter((value, record) => `${String(value)} (${String(record.age)})`);
      expect(table.toArray()[0]).toEqual({ name: 'Carol (41)', age: 41 });
    });

    it('should fall back to the position when the identifier is missing', () => {
      const table = createTable();
      table.column('name');
      table.data([{ name: 'x' }, { name: 'y' }]);
      expect(table.getRows().map((row) => row.id)).toEqual([0, 1]);
    });

    it('should use a custom identifier', () => {
      const table = createTable();
      table.column('name');
      table.data([{ sku: 'A-1', name: 'x' }]).setIdentifier('sku');
      expect(table.getRows()[0].id).toBe('A-1');
    });

    it('should build only once', () => {
      let calls = 0;
      const table = usersTable();
      table.column('name').setPresenter((value) => {
        calls++;
        return value;
      });
      table.build();
      table.build();
      table.getRows();
      expect(calls).toBe(5);
    });

    it('should stay unbuilt when a presenter throws', () => {
      const table = usersTable();
      table.column('name').setPresenter(() => {
        throw new Error('bad presenter');
      });

      expect(() => table.build()).toThrow('bad presenter');
      expect(table.isBuilt()).toBe(false);
      expect(table.getColumn('name')?.isFrozen()).toBe(false);
    });

    it('should throw for an unknown store driver', () => {
      const table = usersTable().useStore('elastic');
      expect(() => table.build()).toThrow(DriverNotFoundError);
    });
  });

  // ==========================================================================
  // Sorting
  // ==========================================================================

  describe('sorting', () => {
    it('should sort by the requested column', () => {
      const table = usersTable().setRequest({ url: '/users', query: { sort: 'name', dir: 'desc' } });

      expect(table.getRows().map((row) => row.record.name)).toEqual(['Eve', 'Dan', 'Carol', 'Bob', 'alice']);
      expect(table.getSort()).toEqual({ column: 'name', direction: 'desc' });
    });

    it('should default to ascending for unknown directions', () => {
      const table = usersTable().setRequest({ url: '/users', query: { sort: 'name', dir: 'up' } });
      expect(table.getSort()).toEqual({ column: 'name', direction: 'asc' });
    });

    it('should persist the requested sort in the session', () => {
      const table = usersTable().setRequest({ url: '/users', query: { sort: 'name' } });
      table.build();
      expect(table.getManagers().session.driver().get('carpenter.users.sort')).toEqual({
        column: 'name',
        direction: 'asc',
      });
    });

    it('should ignore sorting by unsortable or unknown columns', () => {
      const table = usersTable()
        .defaultSort('name', 'desc')
        .setRequest({ url: '/users', query: { sort: 'age' } });
      expect(table.getSort()).toEqual({ column: 'name', direction: 'desc' });

      const other = usersTable().setRequest({ url: '/users', query: { sort: 'password' } });
      expect(other.getSort()).toBeNull();
    });

    it('should reuse the sort stored by an earlier request', () => {
      const backend = sharedBackend();
      const first = usersTable({ session: { driver: 'backend', backend } });
      first.setRequest({ url: '/users', query: { sort: 'name', dir: 'desc' } }).build();

      const second = usersTable({ session: { driver: 'backend', backend } });
      expect(second.getSort()).toEqual({ column: 'name', direction: 'desc' });
    });

    it('should ignore a default sort on an undeclared column', () => {
      expect(usersTable().defaultSort('email').getSort()).toBeNull();
    });
  });

  // ==========================================================================
  // Filtering
  // ==========================================================================

  describe('filtering', () => {
    it('should apply session filters', () => {
      const table = usersTable().setFilter('age', { operator: 'gte', value: 35 });

      expect(table.getRows().map((row) => row.id)).toEqual([1, 3, 4]);
      expect(table.getTotal()).toBe(3);
      expect(table.getFilters()).toEqual([{ column: 'age', clause: { operator: 'gte', value: 35 } }]);
    });

    it('should replace the filter of a column', () => {
      const table = usersTable()
        .setFilter('age', { operator: 'gte', value: 35 })
        .setFilter('age', { operator: 'lt', value: 25 });
      expect(table.getRows().map((row) => row.id)).toEqual([5]);
    });

    it('should clear filters', () => {
      const table = usersTable()
        .setFilter('age', { operator: 'gte', value: 35 })
        .setFilter('name', { operator: 'contains', value: 'a' })
        .clearFilter('age');
      expect(table.getFilters()).toEqual([{ column: 'name', clause: { operator: 'contains', value: 'a' } }]);

      const cleared = usersTable().setFilter('age', { operator: 'gte', value: 35 }).clearFilters();
      expect(cleared.getTotal()).toBe(5);
    });

    it('should log the applied filters', () => {
      const lines: string[] = [];
      const record = (message: string) => {
        lines.push(message);
      };
      const logger: Logger = { debug: record, info: record, warn: record, error: record };

      usersTable({}, logger)
        .setFilter('age', { operator: 'gte', value: 35 })
        .setFilter('name', { operator: 'contains', value: 'o' })
        .build();
      expect(lines).toEqual(["Built table 'users': 2 of 2 records (age >= 35, name Contains \"o\")"]);
    });

    it('should ignore filters on undeclared columns', () => {
      const table = usersTable().setFilter('email', { operator: 'isEmpty' });
      expect(table.getFilters()).toEqual([]);
      expect(table.getTotal()).toBe(5);
    });
  });

  // ==========================================================================
  // Pagination
  // ==========================================================================

  describe('pagination', () => {
    it('should return every record without pagination', () => {
      const table = usersTable();
      expect(table.getPagination()).toBeNull();
      expect(table.getRows()).toHaveLength(5);
    });

    it('should fetch the requested page', () => {
      const table = usersTable()
        .paginate(2)
        .setRequest({ url: '/users?page=2', query: { page: '2' } });

      expect(table.getRows().map((row) => row.id)).toEqual([3, 4]);
      expect(table.getPagination()).toMatchObject({ currentPage: 2, lastPage: 3, total: 5, from: 3, to: 4 });
    });

    it('should use the configured page size', () => {
      const table = usersTable({ paginator: { perPage: 3 } }).paginate();
      expect(table.getRows().map((row) => row.id)).toEqual([1, 2, 3]);
    });

    it('should clamp pages past the end', () => {
      const table = usersTable()
        .paginate(2)
        .setRequest({ url: '/users', query: { page: '9' } });
      expect(table.getRows().map((row) => row.id)).toEqual([5]);
      expect(table.getPagination()?.currentPage).toBe(3);
    });

    it('should ignore malformed page parameters', () => {
      const table = usersTable()
        .paginate(2)
        .setRequest({ url: '/users', query: { page: '2abc' } });
      expect(table.getPagination()?.currentPage).toBe(1);
    });

    it('should remember the page between requests', () => {
      const backend = sharedBackend();
      usersTable({ session: { driver: 'backend', backend } })
        .paginate(2)
        .setRequest({ url: '/users', query: { page: '3' } })
        .build();

      const next = usersTable({ session: { driver: 'backend', backend } }).paginate(2);
      expect(next.getPagination()?.currentPage).toBe(3);
    });

    it('should number rows without identifiers across pages', () => {
      const table = createTable();
      table.column('name');
      table
        .data([{ name: 'a' }, { name: 'b' }, { name: 'c' }])
        .paginate(2)
        .setRequest({ url: '/', query: { page: '2' } });
      expect(table.getRows().map((row) => row.id)).toEqual([2]);
    });

    it('should reject invalid page sizes', () => {
      expect(() => usersTable().paginate(0)).toThrow(RangeError);
    });
  });

  // ==========================================================================
  // Headings and Actions
  // ==========================================================================

  describe('headings', () => {
    it('should describe visible columns with sort links', () => {
      const table = usersTable().setRequest({ url: '/users?page=2&sort=name', query: { page: '2', sort: 'name' } });
      table.column('secret').hidden();

      expect(table.getHeadings()).toEqual([
        {
          key: 'name',
          label: 'Name',
          sortable: true,
          active: true,
          direction: 'asc',
          href: '/users?sort=name&dir=desc',
        },
        { key: 'age', label: 'Age', sortable: false, active: false, direction: null, href: null },
      ]);
    });

    it('should link inactive columns to ascending order', () => {
      const table = createTable();
      table.column('name');
      table.column('age');
      table.data(users).setRequest({ url: '/users', query: { sort: 'name', dir: 'desc' } });

      expect(table.getHeadings().map((heading) => heading.href)).toEqual([
        '/users?sort=name&dir=asc',
        '/users?sort=age&dir=asc',
      ]);
    });
  });

  describe('actions', () => {
    it('should separate table and row actions', () => {
      const table = usersTable();
      table.action('create').setHref('/users/new');
      table.action('edit', 'row').setHref((record) => `/users/${String(record.id)}/edit`);

      expect(table.getActions()).toEqual([{ key: 'create', label: 'Create', href: '/users/new', confirm: null }]);
      expect(table.getRows()[1].getActions()[0].href).toBe('/users/2/edit');
    });
  });

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  describe('after build', () => {
    it('should reject declaration changes', () => {
      const table = usersTable();
      table.build();

      expect(() => table.column('email')).toThrow(TableStateError);
      expect(() => table.data([])).toThrow("Table 'users': cannot change the data source after the table is built");
      expect(() => table.setRequest({ url: '/', query: {} })).toThrow(TableStateError);
      expect(() => table.column('name').setLabel('Full name')).toThrow(TableStateError);
    });

    it('should still return existing columns', () => {
      const table = usersTable();
      table.build();
      expect(table.column('name').getLabel()).toBe('Name');
    });
  });

  // ==========================================================================
  // Output
  // ==========================================================================

  describe('output', () => {
    it('should render with the html view by default', () => {
      const html = usersTable().setTitle('People').render();
      expect(html.startsWith('<div class="carpenter carpenter-users"><table><caption>People</caption>')).toBe(true);
      expect(html).toContain('<tr data-id="2"><td>alice</td><td>29</td></tr>');
    });

    it('should render through another view driver', () => {
      const table = createTable();
      table.column('name');
      table.data([{ name: 'Ada' }]).useView('csv');
      expect(table.render()).toBe('Name\r\nAda\r\n');
    });

    it('should throw for unknown templates', () => {
      expect(() => usersTable().render('cards')).toThrow(ViewTemplateNotFoundError);
      expect(() => usersTable().setTemplate('cards').render()).toThrow(ViewTemplateNotFoundError);
    });

    it('should expose view data', () => {
      const data = usersTable().setTitle('People').getViewData();
      expect(data.name).toBe('users');
      expect(data.title).toBe('People');
      expect(data.total).toBe(5);
      expect(data.rows).toHaveLength(5);
    });

    it('should export a workbook', async () => {
      const bytes = await usersTable().toSpreadsheet({ sheetName: 'People' });
      const zip = await JSZip.loadAsync(bytes);
      const workbook = await zip.file('xl/workbook.xml')?.async('string');
      expect(workbook).toContain('name="People"');
    });
  });
});
