/**
 * SpreadsheetCell
 *
 * Export-side representation of a cell. A column's spreadsheet callback
 * receives one of these and may restyle it or replace its value before
 * it is rendered for CSV or written to a workbook.
 */

import type { RowId } from '../types/index.js';
import { isBlankValue } from '../types/index.js';

export type HorizontalAlignment = 'left' | 'center' | 'right';

export interface SpreadsheetCellStyle {
  /** Excel number format code (e.g. "#,##0.00") */
  numberFormat?: string;
  bold?: boolean;
  italic?: boolean;
  /** Font color (hex, "#RRGGBB") */
  fontColor?: string;
  /** Fill color (hex, "#RRGGBB") */
  background?: string;
  alignment?: HorizontalAlignment;
}

const HEX_COLOR = /^#?[0-9a-fA-F]{6}$/;

function normalizeColor(color: string): string {
  if (!HEX_COLOR.test(color)) {
    throw new RangeError(`Expected a hex color like "#1A2B3C", got "${color}"`);
  }
  return (color.startsWith('#') ? color : `#${color}`).toUpperCase();
}

function pad(num: number): string {
  return String(num).padStart(2, '0');
}

export class SpreadsheetCell {
  readonly rowId: RowId;
  private value: unknown;
  private hyperlink: string | null = null;
  private style: SpreadsheetCellStyle = {};

  constructor(value: unknown, rowId: RowId) {
    this.value = value;
    this.rowId = rowId;
  }

  getValue(): unknown {
    return this.value;
  }

  setValue(value: unknown): this {
    this.value = value;
    return this;
  }

  setNumberFormat(code: string): this {
    this.style.numberFormat = code;
    return this;
  }

  setBold(bold = true): this {
    this.style.bold = bold;
    return this;
  }

  setItalic(italic = true): this {
    this.style.italic = italic;
    return this;
  }

  setFontColor(color: string): this {
    this.style.fontColor = normalizeColor(color);
    return this;
  }

  setBackground(color: string): this {
    this.style.background = normalizeColor(color);
    return this;
  }

  setAlignment(alignment: HorizontalAlignment): this {
    this.style.alignment = alignment;
    return this;
  }

  setHyperlink(url: string): this {
    this.hyperlink = url;
    return this;
  }

  getHyperlink(): string | null {
    return this.hyperlink;
  }

  getStyle(): Readonly<SpreadsheetCellStyle> {
    return { ...this.style };
  }

  hasStyle(): boolean {
    return Object.keys(this.style).length > 0;
  }

  /**
   * Text form of the cell. Hyperlinks become a HYPERLINK formula.
   */
  render(): string {
    const text = this.renderValue();
    if (this.hyperlink === null) {
      return text;
    }
    const quote = (part: string) => part.replace(/"/g, '""');
    return `=HYPERLINK("${quote(this.hyperlink)}","${quote(text)}")`;
  }

  private renderValue(): string {
    const value = this.value;
    if (isBlankValue(value)) {
      return '';
    }
    if (typeof value === 'boolean') {
      return value ? 'TRUE' : 'FALSE';
    }
    if (value instanceof Date) {
      return `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
    }
    return String(value);
  }
}
