/**
 * View Driver Contract
 */

import type { ComponentType } from 'react';
import type { ResolvedAction } from '../components/Action.js';
import type { Row } from '../components/Row.js';
import type { PaginationMeta } from '../pagination/types.js';
import type { DataRecord, SortDirection } from '../types/index.js';

export interface Heading {
  key: string;
  label: string;
  sortable: boolean;
  /** Table is currently sorted by this column */
  active: boolean;
  /** Current direction when active */
  direction: SortDirection | null;
  /** Link that sorts by this column (toggles when active), null when not sortable */
  href: string | null;
}

/**
 * Everything a view needs; views must not modify the table
 */
export interface TableViewData<TRecord extends DataRecord = DataRecord> {
  name: string;
  title: string | null;
  headings: Heading[];
  rows: ReadonlyArray<Row<TRecord>>;
  pagination: PaginationMeta | null;
  actions: ResolvedAction[];
  total: number;
}

export interface ViewDriver {
  make(template: string, data: TableViewData): string;
}

export interface TableTemplateProps {
  data: TableViewData;
}

export type TableTemplateComponent = ComponentType<TableTemplateProps>;
