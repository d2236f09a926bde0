/**
 * Paginator Driver Contract
 */

import type { TableRequest } from '../types/index.js';

export interface PaginateOptions {
  total: number;
  perPage: number;
  /** Requested page (1-based), clamped by the driver */
  currentPage: number;
  request: TableRequest;
  /** Query parameter holding the page number */
  pageParam: string;
}

export type PageLink =
  | { type: 'page'; page: number; url: string; active: boolean }
  | { type: 'gap' };

export interface PaginationMeta {
  total: number;
  perPage: number;
  currentPage: number;
  lastPage: number;
  /** 1-based index of the first record on the page, 0 when empty */
  from: number;
  /** 1-based index of the last record on the page, 0 when empty */
  to: number;
  /** Records to skip to reach the page */
  offset: number;
  /** More than one page exists */
  hasPages: boolean;
  previousUrl: string | null;
  nextUrl: string | null;
  links: PageLink[];
}

export interface PaginatorDriver {
  make(options: PaginateOptions): PaginationMeta;
}
