/**
 * Table
 *
 * A table is declared first (columns, data source, paging, actions) and
 * materialized later: build() reads sort/filter/page state, fetches the
 * page of records through the store driver and wraps each record in a
 * Row of Cells. Every read that needs rows builds the table on first use.
 *
 * A failed build leaves the table unbuilt; rows and pagination are only
 * assigned once every step has succeeded.
 */

import { Action } from '../components/Action.js';
import type { ActionPosition, ResolvedAction } from '../components/Action.js';
import { Column } from '../components/Column.js';
import { Row } from '../components/Row.js';
import type { CarpenterConfig } from '../config/CarpenterConfig.js';
import { TableStateError } from '../errors/index.js';
import { describeFilter } from '../filtering/FilterClause.js';
import type { ColumnFilter, FilterClause } from '../filtering/FilterClause.js';
import type { Logger } from '../logging/Logger.js';
import { silentLogger } from '../logging/Logger.js';
import type { PaginationManager } from '../managers/PaginationManager.js';
import type { SessionManager } from '../managers/SessionManager.js';
import type { StoreManager } from '../managers/StoreManager.js';
import type { ViewManager } from '../managers/ViewManager.js';
import type { PaginationMeta } from '../pagination/types.js';
import { TableSession } from '../session/TableSession.js';
import type { DataSource } from '../store/types.js';
import { withQuery } from '../support/url.js';
import type { DataRecord, RowId, SortDirection, SortState, TableRequest } from '../types/index.js';
import { EMPTY_REQUEST, getField, isSortDirection, oppositeDirection } from '../types/index.js';
import { SpreadsheetExporter } from '../view/SpreadsheetExporter.js';
import type { SpreadsheetExportOptions } from '../view/SpreadsheetExporter.js';
import type { Heading, TableViewData } from '../view/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Managers scoped to one table build
 */
export interface TableManagers {
  store: StoreManager;
  session: SessionManager;
  view: ViewManager;
  paginator: PaginationManager;
}

interface BuiltState {
  rows: Row[];
  total: number;
  pagination: PaginationMeta | null;
  sort: SortState | null;
  filters: ColumnFilter[];
}

function parsePage(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) {
    return null;
  }
  const page = Number(value);
  return page >= 1 ? page : null;
}

// =============================================================================
// Table
// =============================================================================

export class Table {
  private readonly name: string;
  private readonly managers: TableManagers;
  private readonly config: CarpenterConfig;
  private readonly logger: Logger;

  private title: string | null = null;
  private readonly columns: Map<string, Column> = new Map();
  private readonly actions: Action[] = [];
  private source: DataSource | null = null;
  private identifier: string;
  private perPage: number | null = null;
  private defaultSortState: SortState | null = null;
  private request: TableRequest = EMPTY_REQUEST;
  private template: string | null = null;
  private storeDriver: string | undefined;
  private viewDriver: string | undefined;
  private tableSession: TableSession | null = null;
  private built: BuiltState | null = null;

  constructor(name: string, managers: TableManagers, config: CarpenterConfig, logger: Logger = silentLogger) {
    this.name = name;
    this.managers = managers;
    this.config = config;
    this.logger = logger;
    this.identifier = config.store.primaryKey;
  }

  getName(): string {
    return this.name;
  }

  getManagers(): Readonly<TableManagers> {
    return this.managers;
  }

  // ===========================================================================
  // Declaration
  // ===========================================================================

  setTitle(title: string): this {
    this.title = title;
    return this;
  }

  getTitle(): string | null {
    return this.title;
  }

  /**
   * Get or create a column. New columns are appended in declaration order.
   */
  column(key: string, label?: string): Column {
    const existing = this.columns.get(key);
    if (existing !== undefined) {
      if (label !== undefined) {
        existing.setLabel(label);
      }
      return existing;
    }

    this.assertNotBuilt(`cannot add column '${key}'`);
    const column = new Column(key, label);
    this.columns.set(key, column);
    return column;
  }

  hasColumn(key: string): boolean {
    return this.columns.has(key);
  }

  getColumn(key: string): Column | undefined {
    return this.columns.get(key);
  }

  getColumns(): Column[] {
    return Array.from(this.columns.values());
  }

  getVisibleColumns(): Column[] {
    return this.getColumns().filter((column) => column.isVisible());
  }

  /**
   * Set the data source handed to the store driver
   */
  data(source: DataSource): this {
    this.assertNotBuilt('cannot change the data source');
    this.source = source;
    return this;
  }

  /**
   * Record field used as the row id (default: store.primaryKey)
   */
  setIdentifier(key: string): this {
    this.assertNotBuilt('cannot change the identifier');
    this.identifier = key;
    return this;
  }

  paginate(perPage: number = this.config.paginator.perPage): this {
    this.assertNotBuilt('cannot change pagination');
    if (!Number.isInteger(perPage) || perPage < 1) {
      throw new RangeError(`perPage must be a positive integer, got ${perPage}`);
    }
    this.perPage = perPage;
    return this;
  }

  /**
   * Sort used when neither the request nor the session names one
   */
  defaultSort(column: string, direction: SortDirection = 'asc'): this {
    this.assertNotBuilt('cannot change the default sort');
    this.defaultSortState = { column, direction };
    return this;
  }

  setRequest(request: TableRequest): this {
    this.assertNotBuilt('cannot change the request');
    this.request = request;
    return this;
  }

  /**
   * Persist a filter for a column in the session
   */
  setFilter(column: string, clause: FilterClause): this {
    this.assertNotBuilt('cannot change filters');
    const session = this.session();
    const filters = session.getFilters().filter((filter) => filter.column !== column);
    filters.push({ column, clause });
    session.setFilters(filters);
    return this;
  }

  clearFilter(column: string): this {
    this.assertNotBuilt('cannot change filters');
    const session = this.session();
    session.setFilters(session.getFilters().filter((filter) => filter.column !== column));
    return this;
  }

  clearFilters(): this {
    this.assertNotBuilt('cannot change filters');
    this.session().setFilters([]);
    return this;
  }

  action(key: string, position: ActionPosition = 'table'): Action {
    this.assertNotBuilt(`cannot add action '${key}'`);
    const action = new Action(key, position);
    this.actions.push(action);
    return action;
  }

  setTemplate(template: string): this {
    this.template = template;
    return this;
  }

  /**
   * Fetch through a store driver other than the configured one
   */
  useStore(driver: string): this {
    this.assertNotBuilt('cannot change the store driver');
    this.storeDriver = driver;
    return this;
  }

  /**
   * Render through a view driver other than the configured one
   */
  useView(driver: string): this {
    this.viewDriver = driver;
    return this;
  }

  // ===========================================================================
  // Materialization
  // ===========================================================================

  isBuilt(): boolean {
    return this.built !== null;
  }

  /**
   * Fetch records and build rows. Runs at most once.
   */
  build(): this {
    if (this.built !== null) {
      return this;
    }
    if (this.source === null) {
      throw new TableStateError(this.name, 'no data source has been set');
    }

    const session = this.session();
    const sort = this.resolveSort(session);
    const filters = session.getFilters().filter((filter) => this.columns.has(filter.column));

    const store = this.managers.store.driver(this.storeDriver);
    store.setSource(this.source);
    const total = store.count({ filters, sort: null, offset: 0, limit: null });

    let pagination: PaginationMeta | null = null;
    let offset = 0;
    let limit: number | null = null;
    if (this.perPage !== null) {
      pagination = this.managers.paginator.driver().make({
        total,
        perPage: this.perPage,
        currentPage: this.resolvePage(session),
        request: this.request,
        pageParam: this.config.paginator.pageParam,
      });
      offset = pagination.offset;
      limit = this.perPage;
    }

    const records = store.results({ filters, sort, offset, limit });
    const columns = this.getColumns();
    const rowActions = this.actions.filter((action) => action.position === 'row');
    const rows = records.map(
      (record, index) => new Row(record, this.rowId(record, offset + index), columns, rowActions)
    );

    for (const column of columns) {
      column.freeze(this.name);
    }
    this.built = { rows, total, pagination, sort, filters };
    const filtered = filters.map((filter) => `${filter.column} ${describeFilter(filter.clause)}`).join(', ');
    this.logger.debug(
      `Built table '${this.name}': ${rows.length} of ${total} records${filtered === '' ? '' : ` (${filtered})`}`
    );
    return this;
  }

  private resolveSort(session: TableSession): SortState | null {
    const { sortParam, directionParam } = this.config.tables;
    const requested = this.request.query[sortParam];

    if (requested !== undefined && this.isSortable(requested)) {
      const direction = this.request.query[directionParam];
      const sort: SortState = {
        column: requested,
        direction: isSortDirection(direction) ? direction : 'asc',
      };
      session.setSort(sort);
      return sort;
    }

    const stored = session.getSort();
    if (stored !== null && this.isSortable(stored.column)) {
      return stored;
    }

    if (this.defaultSortState !== null && this.columns.has(this.defaultSortState.column)) {
      return this.defaultSortState;
    }
    return null;
  }

  private resolvePage(session: TableSession): number {
    const requested = parsePage(this.request.query[this.config.paginator.pageParam]);
    if (requested !== null) {
      session.setPage(requested);
      return requested;
    }
    return session.getPage() ?? 1;
  }

  private isSortable(key: string): boolean {
    return this.columns.get(key)?.isSortable() ?? false;
  }

  private rowId(record: DataRecord, position: number): RowId {
    const id = getField(record, this.identifier);
    return typeof id === 'string' || typeof id === 'number' ? id : position;
  }

  private session(): TableSession {
    if (this.tableSession === null) {
      this.tableSession = new TableSession(
        this.managers.session.driver(),
        this.config.session.prefix,
        this.name
      );
    }
    return this.tableSession;
  }

  private state(): BuiltState {
    this.build();
    if (this.built === null) {
      throw new TableStateError(this.name, 'build did not complete');
    }
    return this.built;
  }

  private assertNotBuilt(message: string): void {
    if (this.built !== null) {
      throw new TableStateError(this.name, `${message} after the table is built`);
    }
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  getRows(): Row[] {
    return this.state().rows;
  }

  /**
   * Number of records matching the filters, across all pages
   */
  getTotal(): number {
    return this.state().total;
  }

  getPagination(): PaginationMeta | null {
    return this.state().pagination;
  }

  getSort(): SortState | null {
    return this.state().sort;
  }

  getFilters(): ColumnFilter[] {
    return this.state().filters;
  }

  getHeadings(): Heading[] {
    const sort = this.getSort();
    const { sortParam, directionParam } = this.config.tables;

    return this.getVisibleColumns().map((column) => {
      const active = sort !== null && sort.column === column.key;
      const direction = active ? sort.direction : null;
      const next = direction === null ? 'asc' : oppositeDirection(direction);

      return {
        key: column.key,
        label: column.getLabel(),
        sortable: column.isSortable(),
        active,
        direction,
        href: column.isSortable()
          ? withQuery(this.request.url, {
              [sortParam]: column.key,
              [directionParam]: next,
              [this.config.paginator.pageParam]: null,
            })
          : null,
      };
    });
  }

  getActions(): ResolvedAction[] {
    return this.actions.filter((action) => action.position === 'table').map((action) => action.resolve());
  }

  /**
   * Presented values of every row
   */
  toArray(): Array<Record<string, unknown>> {
    return this.getRows().map((row) => row.toArray());
  }

  getViewData(): TableViewData {
    const state = this.state();
    return {
      name: this.name,
      title: this.title,
      headings: this.getHeadings(),
      rows: state.rows,
      pagination: state.pagination,
      actions: this.getActions(),
      total: state.total,
    };
  }

  /**
   * Render through the view driver
   * @param template - Template name (default: table template, then view.template)
   */
  render(template?: string): string {
    const data = this.getViewData();
    const name = template ?? this.template ?? this.config.view.template;
    return this.managers.view.driver(this.viewDriver).make(name, data);
  }

  toSpreadsheet(options: SpreadsheetExportOptions = {}): Promise<Uint8Array> {
    return new SpreadsheetExporter(options).export(this.getViewData());
  }
}
