/**
 * Column
 *
 * Declares a field of the table: its label, visibility, whether it can be
 * sorted, and the optional presenter and spreadsheet callback applied to
 * its cells. Columns are frozen once their table has been built.
 */

import { TableStateError } from '../errors/index.js';
import type { DataRecord } from '../types/index.js';
import type { SpreadsheetCell } from './SpreadsheetCell.js';

export type PresenterFn<TRecord extends DataRecord = DataRecord> = (value: unknown, record: TRecord) => unknown;

/**
 * Object form of a presenter, for presenters that carry their own state
 */
export interface PresenterObject<TRecord extends DataRecord = DataRecord> {
  present(value: unknown, record: TRecord): unknown;
}

export type Presenter<TRecord extends DataRecord = DataRecord> =
  | PresenterFn<TRecord>
  | PresenterObject<TRecord>;

export type SpreadsheetCellCallback = (cell: SpreadsheetCell) => void;

/**
 * "first_name" / "firstName" / "author.name" -> "First Name" / "Author Name"
 */
export function humanizeKey(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[\s._-]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export class Column<TRecord extends DataRecord = DataRecord> {
  readonly key: string;
  private label: string;
  private visible = true;
  private sortableFlag = true;
  private presenter: PresenterFn<TRecord> | null = null;
  private spreadsheetCell: SpreadsheetCellCallback | null = null;
  private frozenBy: string | null = null;

  constructor(key: string, label?: string) {
    this.key = key;
    this.label = label ?? humanizeKey(key);
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  setLabel(label: string): this {
    this.assertMutable();
    this.label = label;
    return this;
  }

  getLabel(): string {
    return this.label;
  }

  setPresenter(presenter: Presenter<TRecord>): this {
    this.assertMutable();
    this.presenter =
      typeof presenter === 'function'
        ? presenter
        : (value, record) => presenter.present(value, record);
    return this;
  }

  hasPresenter(): boolean {
    return this.presenter !== null;
  }

  getPresenter(): PresenterFn<TRecord> | null {
    return this.presenter;
  }

  setSpreadsheetCell(callback: SpreadsheetCellCallback): this {
    this.assertMutable();
    this.spreadsheetCell = callback;
    return this;
  }

  hasSpreadsheetCell(): boolean {
    return this.spreadsheetCell !== null;
  }

  getSpreadsheetCell(): SpreadsheetCellCallback | null {
    return this.spreadsheetCell;
  }

  sortable(sortable = true): this {
    this.assertMutable();
    this.sortableFlag = sortable;
    return this;
  }

  isSortable(): boolean {
    return this.sortableFlag;
  }

  hidden(): this {
    this.assertMutable();
    this.visible = false;
    return this;
  }

  show(): this {
    this.assertMutable();
    this.visible = true;
    return this;
  }

  isVisible(): boolean {
    return this.visible;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Reject further changes; called by the owning table when it is built
   */
  freeze(tableName: string): void {
    this.frozenBy = tableName;
  }

  isFrozen(): boolean {
    return this.frozenBy !== null;
  }

  private assertMutable(): void {
    if (this.frozenBy !== null) {
      throw new TableStateError(
        this.frozenBy,
        `column '${this.key}' cannot be changed after the table is built`
      );
    }
  }
}
