/**
 * Cell
 *
 * Holds the presented value of one field of one row. The value is the
 * column presenter's output when the column has a presenter, otherwise
 * the raw field value unchanged.
 */

import type { DataRecord } from '../types/index.js';
import type { Column } from './Column.js';
import type { Row } from './Row.js';
import { SpreadsheetCell } from './SpreadsheetCell.js';

/**
 * Returned by renderSpreadsheetCell() for a cell that has no column
 */
export const DETACHED_CELL: unique symbol = Symbol('carpenter.detachedCell');

export type DetachedCell = typeof DETACHED_CELL;

export class Cell<TRecord extends DataRecord = DataRecord> {
  readonly value: unknown;
  readonly row: Row<TRecord>;
  readonly column: Column<TRecord> | null;

  constructor(value: unknown, row: Row<TRecord>, column: Column<TRecord> | null) {
    this.row = row;
    this.column = column;
    this.value = this.createCell(value, row, column);
  }

  /**
   * Run the column presenter on the raw value. Presenter errors propagate.
   */
  private createCell(value: unknown, row: Row<TRecord>, column: Column<TRecord> | null): unknown {
    const presenter = column?.getPresenter() ?? null;
    if (presenter === null) {
      return value;
    }
    return presenter(value, row.record);
  }

  /**
   * Value used by spreadsheet-style output. When the column declares a
   * spreadsheet callback, the callback configures a SpreadsheetCell built
   * from this value and the row id, and its rendered text is returned.
   */
  renderSpreadsheetCell(): unknown {
    if (this.column === null) {
      return DETACHED_CELL;
    }

    const callback = this.column.getSpreadsheetCell();
    if (callback === null) {
      return this.value;
    }

    return this.createSpreadsheetCell(callback).render();
  }

  /**
   * The configured SpreadsheetCell, or null when the column has no
   * spreadsheet callback. Used by the workbook exporter for styles.
   */
  toSpreadsheetCell(): SpreadsheetCell | null {
    const callback = this.column?.getSpreadsheetCell() ?? null;
    if (callback === null) {
      return null;
    }
    return this.createSpreadsheetCell(callback);
  }

  private createSpreadsheetCell(callback: (cell: SpreadsheetCell) => void): SpreadsheetCell {
    const cell = new SpreadsheetCell(this.value, this.row.id);
    callback(cell);
    return cell;
  }
}
