/**
 * Pagination Manager
 * Built-in drivers: "url" (numbered links), "simple" (previous/next).
 */

import type { PaginatorConfig } from '../config/CarpenterConfig.js';
import { SimplePaginator } from '../pagination/SimplePaginator.js';
import type { PaginatorDriver } from '../pagination/types.js';
import { UrlPaginator } from '../pagination/UrlPaginator.js';
import { Manager } from './Manager.js';
import type { DriverFactory, ManagerKind } from './types.js';

export class PaginationManager extends Manager<PaginatorDriver, PaginatorConfig> {
  readonly kind: ManagerKind = 'paginator';

  protected creators(): Record<string, DriverFactory<PaginatorDriver, PaginatorConfig>> {
    return {
      url: (config) => new UrlPaginator(config.onEachSide),
      simple: () => new SimplePaginator(),
    };
  }
}
