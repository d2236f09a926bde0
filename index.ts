/**
 * Table Carpenter
 *
 * Builds paginated, presentable tables from arrays and query builders:
 * - Columns with presenters and spreadsheet cell callbacks
 * - Sort, filter and page state kept in a session driver
 * - Pluggable store, session, view and paginator drivers
 * - HTML (React), CSV and XLSX output
 *
 * @example
 * ```typescript
 * import { Carpenter } from 'table-carpenter';
 *
 * const carpenter = new Carpenter();
 *
 * carpenter.add('users', (table) => {
 *   table.setTitle('Users');
 *   table.column('name');
 *   table.column('created_at', 'Joined').setPresenter((value) => new Date(String(value)));
 *   table.data(users).paginate(20);
 * });
 *
 * const html = carpenter
 *   .get('users')
 *   .setRequest({ url: '/users?sort=name&dir=desc', query: { sort: 'name', dir: 'desc' } })
 *   .render();
 * ```
 */

export * from './core/index.js';
