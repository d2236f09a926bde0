/**
 * URL Paginator
 * Numbered page links with a sliding window and gap markers.
 */

import { withQuery } from '../support/url.js';
import type { PageLink, PaginateOptions, PaginationMeta, PaginatorDriver } from './types.js';
import { computeBounds, createMeta, pageWindow } from './window.js';

export class UrlPaginator implements PaginatorDriver {
  private readonly onEachSide: number;

  constructor(onEachSide: number) {
    this.onEachSide = onEachSide;
  }

  make(options: PaginateOptions): PaginationMeta {
    const bounds = computeBounds(options);

    const links = pageWindow(bounds.currentPage, bounds.lastPage, this.onEachSide).map(
      (page): PageLink =>
        page === null
          ? { type: 'gap' }
          : {
              type: 'page',
              page,
              url: withQuery(options.request.url, { [options.pageParam]: String(page) }),
              active: page === bounds.currentPage,
            }
    );

    return createMeta(options, bounds, links);
  }
}
