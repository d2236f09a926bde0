/**
 * Carpenter Configuration
 *
 * One sub-config per manager plus the table settings. Sections given
 * to resolveConfig() are merged over DEFAULT_CONFIG.
 */

import { ConfigurationError } from '../errors/index.js';
import type { SessionBackend } from '../session/types.js';
import type { TableTemplateComponent } from '../view/types.js';

// =============================================================================
// Types
// =============================================================================

export interface DriverConfig {
  /** Driver key resolved by the manager */
  driver: string;
}

export interface StoreConfig extends DriverConfig {
  /** Record field used as the row id */
  primaryKey: string;
}

export interface SessionConfig extends DriverConfig {
  /** Prefix of every session key */
  prefix: string;
  /** Persistence used by the "backend" session driver */
  backend?: SessionBackend;
}

export interface ViewConfig extends DriverConfig {
  /** Template rendered when the table does not name one */
  template: string;
  /** Extra HTML templates by name */
  templates?: Record<string, TableTemplateComponent>;
  /** Field delimiter of the csv driver */
  csvDelimiter: string;
}

export interface PaginatorConfig extends DriverConfig {
  perPage: number;
  /** Query parameter holding the page number */
  pageParam: string;
  /** Pages shown on each side of the current page */
  onEachSide: number;
}

export interface TablesConfig {
  /** Module registering tables, used by loadTables() */
  location: string;
  /** Query parameter naming the sort column */
  sortParam: string;
  /** Query parameter holding the sort direction */
  directionParam: string;
}

export interface CarpenterConfig {
  store: StoreConfig;
  session: SessionConfig;
  view: ViewConfig;
  paginator: PaginatorConfig;
  tables: TablesConfig;
}

export type CarpenterConfigInput = {
  [K in keyof CarpenterConfig]?: Partial<CarpenterConfig[K]>;
};

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_CONFIG: CarpenterConfig = {
  store: {
    driver: 'array',
    primaryKey: 'id',
  },
  session: {
    driver: 'array',
    prefix: 'carpenter',
  },
  view: {
    driver: 'html',
    template: 'table',
    csvDelimiter: ',',
  },
  paginator: {
    driver: 'url',
    perPage: 15,
    pageParam: 'page',
    onEachSide: 3,
  },
  tables: {
    location: 'tables.js',
    sortParam: 'sort',
    directionParam: 'dir',
  },
};

// =============================================================================
// Resolution
// =============================================================================

function assertDriver(section: string, config: DriverConfig): void {
  if (config.driver.trim() === '') {
    throw new ConfigurationError(`${section}.driver must not be empty`);
  }
}

/**
 * Merge a partial configuration over the defaults and validate it
 */
export function resolveConfig(input: CarpenterConfigInput = {}): CarpenterConfig {
  const config: CarpenterConfig = {
    store: { ...DEFAULT_CONFIG.store, ...input.store },
    session: { ...DEFAULT_CONFIG.session, ...input.session },
    view: { ...DEFAULT_CONFIG.view, ...input.view },
    paginator: { ...DEFAULT_CONFIG.paginator, ...input.paginator },
    tables: { ...DEFAULT_CONFIG.tables, ...input.tables },
  };

  assertDriver('store', config.store);
  assertDriver('session', config.session);
  assertDriver('view', config.view);
  assertDriver('paginator', config.paginator);

  if (!Number.isInteger(config.paginator.perPage) || config.paginator.perPage < 1) {
    throw new ConfigurationError(
      `paginator.perPage must be a positive integer, got ${config.paginator.perPage}`
    );
  }
  if (!Number.isInteger(config.paginator.onEachSide) || config.paginator.onEachSide < 0) {
    throw new ConfigurationError(
      `paginator.onEachSide must be a non-negative integer, got ${config.paginator.onEachSide}`
    );
  }
  if (config.view.csvDelimiter.length !== 1) {
    throw new ConfigurationError('view.csvDelimiter must be a single character');
  }

  return config;
}
