/**
 * Table Carpenter - Core Module Exports
 */

// Entry point
export { Carpenter } from './carpenter/Carpenter.js';
export type { CarpenterOptions } from './carpenter/Carpenter.js';
export { parseClassCallback, toBuilderRef, DEFAULT_BUILDER_METHOD } from './carpenter/BuilderRef.js';
export type {
  BuilderRef,
  ClassCallback,
  TableBuilder,
  TableBuilderInput,
  TableClass,
} from './carpenter/BuilderRef.js';

// Table
export { Table } from './table/Table.js';
export type { TableManagers } from './table/Table.js';

// Components
export { Cell, DETACHED_CELL } from './components/Cell.js';
export type { DetachedCell } from './components/Cell.js';
export { Row } from './components/Row.js';
export { Column, humanizeKey } from './components/Column.js';
export type {
  Presenter,
  PresenterFn,
  PresenterObject,
  SpreadsheetCellCallback,
} from './components/Column.js';
export { SpreadsheetCell } from './components/SpreadsheetCell.js';
export type { SpreadsheetCellStyle, HorizontalAlignment } from './components/SpreadsheetCell.js';
export { Action } from './components/Action.js';
export type { ActionHref, ActionPosition, ResolvedAction } from './components/Action.js';

// Types
export * from './types/index.js';

// Configuration
export { DEFAULT_CONFIG, resolveConfig } from './config/CarpenterConfig.js';
export type {
  CarpenterConfig,
  CarpenterConfigInput,
  DriverConfig,
  StoreConfig,
  SessionConfig,
  ViewConfig,
  PaginatorConfig,
  TablesConfig,
} from './config/CarpenterConfig.js';

// Errors
export * from './errors/index.js';

// Logging
export { createConsoleLogger, silentLogger } from './logging/Logger.js';
export type { Logger, ConsoleLoggerOptions } from './logging/Logger.js';

// Filtering
export { matchesFilter, describeFilter, isFilterClause } from './filtering/FilterClause.js';
export type {
  FilterClause,
  FilterOperator,
  TextOperator,
  NumberOperator,
  ColumnFilter,
} from './filtering/FilterClause.js';

// Managers
export * from './managers/index.js';

// Store drivers
export { ArrayStore } from './store/ArrayStore.js';
export { QueryStore } from './store/QueryStore.js';
export { isQueryBuilder, isIterableSource } from './store/types.js';
export type { StoreDriver, StoreQuery, QueryBuilder, QueryOperator, DataSource } from './store/types.js';

// Session drivers
export { ArraySession } from './session/ArraySession.js';
export { BackendSession } from './session/BackendSession.js';
export { TableSession } from './session/TableSession.js';
export type { SessionDriver, SessionBackend } from './session/types.js';

// View drivers
export { HtmlView, DEFAULT_TEMPLATES } from './view/HtmlView.js';
export { CsvView } from './view/CsvView.js';
export { SpreadsheetExporter, columnLetter, sanitizeSheetName } from './view/SpreadsheetExporter.js';
export type { SpreadsheetExportOptions } from './view/SpreadsheetExporter.js';
export { TableTemplate } from './view/templates/TableTemplate.js';
export type {
  ViewDriver,
  TableViewData,
  Heading,
  TableTemplateProps,
  TableTemplateComponent,
} from './view/types.js';

// Paginator drivers
export { UrlPaginator } from './pagination/UrlPaginator.js';
export { SimplePaginator } from './pagination/SimplePaginator.js';
export type { PaginatorDriver, PaginateOptions, PaginationMeta, PageLink } from './pagination/types.js';
