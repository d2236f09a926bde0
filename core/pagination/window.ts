/**
 * Shared page arithmetic for paginator drivers.
 */

import { withQuery } from '../support/url.js';
import type { PageLink, PaginateOptions, PaginationMeta } from './types.js';

export interface PageBounds {
  currentPage: number;
  lastPage: number;
  offset: number;
  from: number;
  to: number;
}

/**
 * Clamp the requested page into [1, lastPage] and compute the record range
 */
export function computeBounds(options: PaginateOptions): PageBounds {
  const perPage = Math.max(1, Math.floor(options.perPage));
  const total = Math.max(0, Math.floor(options.total));
  const lastPage = Math.max(1, Math.ceil(total / perPage));

  const requested = Number.isFinite(options.currentPage) ? Math.floor(options.currentPage) : 1;
  const currentPage = Math.min(Math.max(1, requested), lastPage);
  const offset = (currentPage - 1) * perPage;

  return {
    currentPage,
    lastPage,
    offset,
    from: total === 0 ? 0 : offset + 1,
    to: Math.min(offset + perPage, total),
  };
}

/**
 * Pages to show: first, last and `onEachSide` pages around the current
 * page. Null marks a gap.
 */
export function pageWindow(currentPage: number, lastPage: number, onEachSide: number): Array<number | null> {
  const pages = new Set<number>([1, lastPage]);
  const start = Math.max(1, currentPage - onEachSide);
  const end = Math.min(lastPage, currentPage + onEachSide);
  for (let page = start; page <= end; page++) {
    pages.add(page);
  }

  const sorted = Array.from(pages).sort((a, b) => a - b);
  const result: Array<number | null> = [];
  let previous = 0;
  for (const page of sorted) {
    if (page - previous > 1) {
      result.push(null);
    }
    result.push(page);
    previous = page;
  }
  return result;
}

/**
 * Assemble pagination metadata around a set of links
 */
export function createMeta(options: PaginateOptions, bounds: PageBounds, links: PageLink[]): PaginationMeta {
  const pageUrl = (page: number) => withQuery(options.request.url, { [options.pageParam]: String(page) });

  return {
    total: Math.max(0, Math.floor(options.total)),
    perPage: options.perPage,
    currentPage: bounds.currentPage,
    lastPage: bounds.lastPage,
    from: bounds.from,
    to: bounds.to,
    offset: bounds.offset,
    hasPages: bounds.lastPage > 1,
    previousUrl: bounds.currentPage > 1 ? pageUrl(bounds.currentPage - 1) : null,
    nextUrl: bounds.currentPage < bounds.lastPage ? pageUrl(bounds.currentPage + 1) : null,
    links,
  };
}
