/**
 * CSV View
 *
 * One header line of visible column labels, then one line per row built
 * from each cell's spreadsheet rendering. The template name is ignored.
 */

import { DETACHED_CELL } from '../components/Cell.js';
import { isBlankValue } from '../types/index.js';
import type { TableViewData, ViewDriver } from './types.js';

const LINE_BREAK = '\r\n';

export class CsvView implements ViewDriver {
  private readonly delimiter: string;

  constructor(delimiter = ',') {
    this.delimiter = delimiter;
  }

  make(_template: string, data: TableViewData): string {
    const lines = [data.headings.map((heading) => this.escape(heading.label))];

    for (const row of data.rows) {
      lines.push(
        data.headings.map((heading) => {
          const rendered = row.cell(heading.key)?.renderSpreadsheetCell();
          return this.escape(rendered === DETACHED_CELL ? '' : this.stringify(rendered));
        })
      );
    }

    return lines.map((fields) => fields.join(this.delimiter)).join(LINE_BREAK) + LINE_BREAK;
  }

  private stringify(value: unknown): string {
    if (isBlankValue(value)) {
      return '';
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (typeof value === 'object') {
      return JSON.stringify(value);
    }
    return String(value);
  }

  /**
   * Quote fields containing the delimiter, quotes or line breaks
   */
  private escape(field: string): string {
    if (field.includes(this.delimiter) || /["\r\n]/.test(field)) {
      return `"${field.replace(/"/g, '""')}"`;
    }
    return field;
  }
}
