/**
 * Simple Paginator
 * Previous/next links only.
 */

import type { PaginateOptions, PaginationMeta, PaginatorDriver } from './types.js';
import { computeBounds, createMeta } from './window.js';

export class SimplePaginator implements PaginatorDriver {
  make(options: PaginateOptions): PaginationMeta {
    return createMeta(options, computeBounds(options), []);
  }
}
