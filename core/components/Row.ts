/**
 * Row
 * The cells of one source record, in column declaration order.
 */

import type { DataRecord, RowId } from '../types/index.js';
import { getField } from '../types/index.js';
import type { Action, ResolvedAction } from './Action.js';
import { Cell } from './Cell.js';
import type { Column } from './Column.js';

export class Row<TRecord extends DataRecord = DataRecord> {
  readonly id: RowId;
  readonly record: TRecord;
  private readonly cells: Map<string, Cell<TRecord>> = new Map();
  private readonly actions: ReadonlyArray<Action<TRecord>>;

  constructor(
    record: TRecord,
    id: RowId,
    columns: ReadonlyArray<Column<TRecord>>,
    actions: ReadonlyArray<Action<TRecord>> = []
  ) {
    this.record = record;
    this.id = id;
    this.actions = actions;

    for (const column of columns) {
      this.cells.set(column.key, new Cell(getField(record, column.key), this, column));
    }
  }

  cell(key: string): Cell<TRecord> | undefined {
    return this.cells.get(key);
  }

  has(key: string): boolean {
    return this.cells.has(key);
  }

  getCells(): Cell<TRecord>[] {
    return Array.from(this.cells.values());
  }

  /**
   * Column key -> presented value
   */
  toArray(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, cell] of this.cells) {
      result[key] = cell.value;
    }
    return result;
  }

  getActions(): ResolvedAction[] {
    return this.actions.map((action) => action.resolve(this.record));
  }
}
