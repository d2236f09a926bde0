/**
 * Spreadsheet Exporter
 *
 * Writes a table as a single-sheet .xlsx workbook. The package is a ZIP
 * (JSZip) of SpreadsheetML parts built with fast-xml-parser's XMLBuilder.
 *
 * - Header row of visible column labels, bold
 * - Numbers and booleans are written as typed values, dates as serials
 * - Cells whose column declares a spreadsheet callback take their value,
 *   style and hyperlink from the configured SpreadsheetCell
 */

import { XMLBuilder } from 'fast-xml-parser';
import JSZip from 'jszip';
import type { SpreadsheetCellStyle } from '../components/SpreadsheetCell.js';
import { isBlankValue, isInvalidDate } from '../types/index.js';
import type { TableViewData } from './types.js';

// =============================================================================
// Constants
// =============================================================================

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
const NS_MAIN = 'http://schemas.openxmlformats.org/spreadsheetml/2006/main';
const NS_REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const NS_PKG_REL = 'http://schemas.openxmlformats.org/package/2006/relationships';
const NS_CONTENT_TYPES = 'http://schemas.openxmlformats.org/package/2006/content-types';
const REL_OFFICE_DOCUMENT = `${NS_REL}/officeDocument`;
const REL_WORKSHEET = `${NS_REL}/worksheet`;
const REL_STYLES = `${NS_REL}/styles`;

/** First id available for custom number formats */
const FIRST_CUSTOM_NUM_FMT = 164;
/** Built-in "m/d/yyyy" format */
const DATE_NUM_FMT = 14;
/** Days between 1899-12-30 and 1970-01-01 */
const EXCEL_EPOCH_OFFSET = 25569;
const MS_PER_DAY = 86_400_000;

const MAX_SHEET_NAME = 31;

const XML_INVALID_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

// =============================================================================
// Types
// =============================================================================

export interface SpreadsheetExportOptions {
  /** Worksheet name (default: table title, then table name) */
  sheetName?: string;
  /** Write the heading row (default: true) */
  includeHeader?: boolean;
}

type XmlNode = Record<string, unknown>;

interface SheetCell {
  value: unknown;
  style: SpreadsheetCellStyle;
  hyperlink: string | null;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Convert 0-based column index to letter (A, B, ..., Z, AA, ...)
 */
export function columnLetter(index: number): string {
  let label = '';
  let num = index;
  while (num >= 0) {
    label = String.fromCharCode(65 + (num % 26)) + label;
    num = Math.floor(num / 26) - 1;
  }
  return label;
}

export function sanitizeSheetName(name: string): string {
  const cleaned = name.replace(/[[\]:*?/\\]/g, ' ').trim().slice(0, MAX_SHEET_NAME);
  return cleaned === '' ? 'Sheet1' : cleaned;
}

function toSerialDate(date: Date): number {
  return date.getTime() / MS_PER_DAY + EXCEL_EPOCH_OFFSET;
}

function argb(hex: string): string {
  return `FF${hex.replace('#', '').toUpperCase()}`;
}

/**
 * Assigns style indexes (cellXfs) and collects the fonts, fills and
 * number formats they reference.
 */
class StyleRegistry {
  private readonly xfIndex: Map<string, number> = new Map();
  private readonly xfs: XmlNode[] = [];
  private readonly fonts: XmlNode[] = [];
  private readonly fontIndex: Map<string, number> = new Map();
  private readonly fills: XmlNode[] = [];
  private readonly fillIndex: Map<string, number> = new Map();
  private readonly numFmts: Map<string, number> = new Map();

  constructor() {
    this.font({});
    // Required by Excel: fills 0 and 1 are reserved
    this.fills.push({ patternFill: { '@_patternType': 'none' } });
    this.fills.push({ patternFill: { '@_patternType': 'gray125' } });
    this.xf({});
  }

  /**
   * Index of the cellXfs entry for a style; 0 is the default style
   */
  xf(style: SpreadsheetCellStyle, builtinNumFmt?: number): number {
    const key = JSON.stringify([style, builtinNumFmt ?? null]);
    const existing = this.xfIndex.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const numFmtId = style.numberFormat !== undefined ? this.numFmt(style.numberFormat) : builtinNumFmt ?? 0;
    const fontId = this.font(style);
    const fillId = style.background !== undefined ? this.fill(style.background) : 0;

    const node: XmlNode = {
      '@_numFmtId': numFmtId,
      '@_fontId': fontId,
      '@_fillId': fillId,
      '@_borderId': 0,
      '@_xfId': 0,
    };
    if (numFmtId !== 0) node['@_applyNumberFormat'] = 1;
    if (fontId !== 0) node['@_applyFont'] = 1;
    if (fillId !== 0) node['@_applyFill'] = 1;
    if (style.alignment !== undefined) {
      node['@_applyAlignment'] = 1;
      node.alignment = { '@_horizontal': style.alignment };
    }

    const index = this.xfs.length;
    this.xfs.push(node);
    this.xfIndex.set(key, index);
    return index;
  }

  toXml(): XmlNode {
    const numFmts = Array.from(this.numFmts, ([formatCode, id]) => ({
      '@_numFmtId': id,
      '@_formatCode': formatCode,
    }));

    const styleSheet: XmlNode = { '@_xmlns': NS_MAIN };
    if (numFmts.length > 0) {
      styleSheet.numFmts = { '@_count': numFmts.length, numFmt: numFmts };
    }
    styleSheet.fonts = { '@_count': this.fonts.length, font: this.fonts };
    styleSheet.fills = { '@_count': this.fills.length, fill: this.fills };
    styleSheet.borders = {
      '@_count': 1,
      border: [{ left: '', right: '', top: '', bottom: '', diagonal: '' }],
    };
    styleSheet.cellStyleXfs = {
      '@_count': 1,
      xf: [{ '@_numFmtId': 0, '@_fontId': 0, '@_fillId': 0, '@_borderId': 0 }],
    };
    styleSheet.cellXfs = { '@_count': this.xfs.length, xf: this.xfs };

    return { styleSheet };
  }

  private font(style: SpreadsheetCellStyle): number {
    const key = JSON.stringify([style.bold ?? false, style.italic ?? false, style.fontColor ?? null]);
    const existing = this.fontIndex.get(key);
    if (existing !== undefined) {
      return existing;
    }

    // Child order is fixed by the schema
    const node: XmlNode = {};
    if (style.bold) node.b = '';
    if (style.italic) node.i = '';
    node.sz = { '@_val': 11 };
    if (style.fontColor !== undefined) node.color = { '@_rgb': argb(style.fontColor) };
    node.name = { '@_val': 'Calibri' };

    const index = this.fonts.length;
    this.fonts.push(node);
    this.fontIndex.set(key, index);
    return index;
  }

  private fill(color: string): number {
    const existing = this.fillIndex.get(color);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.fills.length;
    this.fills.push({
      patternFill: {
        '@_patternType': 'solid',
        fgColor: { '@_rgb': argb(color) },
        bgColor: { '@_indexed': 64 },
      },
    });
    this.fillIndex.set(color, index);
    return index;
  }

  private numFmt(formatCode: string): number {
    const existing = this.numFmts.get(formatCode);
    if (existing !== undefined) {
      return existing;
    }
    const id = FIRST_CUSTOM_NUM_FMT + this.numFmts.size;
    this.numFmts.set(formatCode, id);
    return id;
  }
}

// =============================================================================
// Exporter
// =============================================================================

export class SpreadsheetExporter {
  private readonly options: SpreadsheetExportOptions;
  private readonly builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
    suppressEmptyNode: true,
  });

  constructor(options: SpreadsheetExportOptions = {}) {
    this.options = options;
  }

  /**
   * Build the workbook package
   */
  async export(data: TableViewData): Promise<Uint8Array> {
    const zip = new JSZip();
    for (const [path, content] of Object.entries(this.buildParts(data))) {
      zip.file(path, content);
    }
    return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
  }

  /**
   * Package part path -> XML content
   */
  buildParts(data: TableViewData): Record<string, string> {
    const styles = new StyleRegistry();
    const sheetName = sanitizeSheetName(this.options.sheetName ?? data.title ?? data.name);
    const worksheet = this.buildWorksheet(data, styles);

    return {
      '[Content_Types].xml': this.xml({
        Types: {
          '@_xmlns': NS_CONTENT_TYPES,
          Default: [
            { '@_Extension': 'rels', '@_ContentType': 'application/vnd.openxmlformats-package.relationships+xml' },
            { '@_Extension': 'xml', '@_ContentType': 'application/xml' },
          ],
          Override: [
            {
              '@_PartName': '/xl/workbook.xml',
              '@_ContentType': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml',
            },
            {
              '@_PartName': '/xl/worksheets/sheet1.xml',
              '@_ContentType': 'application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml',
            },
            {
              '@_PartName': '/xl/styles.xml',
              '@_ContentType': 'application/vnd.openxmlformats-officedocument.spreadsheetml.styles+xml',
            },
          ],
        },
      }),
      '_rels/.rels': this.xml({
        Relationships: {
          '@_xmlns': NS_PKG_REL,
          Relationship: [{ '@_Id': 'rId1', '@_Type': REL_OFFICE_DOCUMENT, '@_Target': 'xl/workbook.xml' }],
        },
      }),
      'xl/workbook.xml': this.xml({
        workbook: {
          '@_xmlns': NS_MAIN,
          '@_xmlns:r': NS_REL,
          sheets: { sheet: [{ '@_name': sheetName, '@_sheetId': 1, '@_r:id': 'rId1' }] },
        },
      }),
      'xl/_rels/workbook.xml.rels': this.xml({
        Relationships: {
          '@_xmlns': NS_PKG_REL,
          Relationship: [
            { '@_Id': 'rId1', '@_Type': REL_WORKSHEET, '@_Target': 'worksheets/sheet1.xml' },
            { '@_Id': 'rId2', '@_Type': REL_STYLES, '@_Target': 'styles.xml' },
          ],
        },
      }),
      'xl/worksheets/sheet1.xml': this.xml(worksheet),
      'xl/styles.xml': this.xml(styles.toXml()),
    };
  }

  private buildWorksheet(data: TableViewData, styles: StyleRegistry): XmlNode {
    const grid: SheetCell[][] = [];

    if (this.options.includeHeader ?? true) {
      grid.push(
        data.headings.map((heading) => ({ value: heading.label, style: { bold: true }, hyperlink: null }))
      );
    }

    for (const row of data.rows) {
      grid.push(
        data.headings.map((heading): SheetCell => {
          const cell = row.cell(heading.key);
          const spreadsheetCell = cell?.toSpreadsheetCell() ?? null;
          if (spreadsheetCell === null) {
            return { value: cell?.value, style: {}, hyperlink: null };
          }
          return {
            value: spreadsheetCell.getValue(),
            style: spreadsheetCell.getStyle(),
            hyperlink: spreadsheetCell.getHyperlink(),
          };
        })
      );
    }

    const rows = grid.map((cells, rowIndex) => ({
      '@_r': rowIndex + 1,
      c: cells.map((cell, colIndex) => this.buildCell(cell, `${columnLetter(colIndex)}${rowIndex + 1}`, styles)),
    }));

    return {
      worksheet: {
        '@_xmlns': NS_MAIN,
        sheetData: rows.length > 0 ? { row: rows } : '',
      },
    };
  }

  private buildCell(cell: SheetCell, ref: string, styles: StyleRegistry): XmlNode {
    const { value } = cell;
    const node: XmlNode = { '@_r': ref };

    const setStyle = (index: number) => {
      if (index !== 0) node['@_s'] = index;
    };

    if (cell.hyperlink !== null) {
      const text = this.text(value);
      setStyle(styles.xf(cell.style));
      node['@_t'] = 'str';
      node.f = `HYPERLINK("${cell.hyperlink.replace(/"/g, '""')}","${text.replace(/"/g, '""')}")`;
      node.v = text;
      return node;
    }

    if (typeof value === 'number' && Number.isFinite(value)) {
      setStyle(styles.xf(cell.style));
      node.v = value;
      return node;
    }
    if (typeof value === 'boolean') {
      setStyle(styles.xf(cell.style));
      node['@_t'] = 'b';
      node.v = value ? 1 : 0;
      return node;
    }
    if (value instanceof Date && !isInvalidDate(value)) {
      setStyle(styles.xf(cell.style, DATE_NUM_FMT));
      node.v = toSerialDate(value);
      return node;
    }

    setStyle(styles.xf(cell.style));
    node['@_t'] = 'inlineStr';
    node.is = { t: { '@_xml:space': 'preserve', '#text': this.text(value) } };
    return node;
  }

  /**
   * Cell text with the control characters XML 1.0 cannot carry removed
   */
  private text(value: unknown): string {
    if (isBlankValue(value)) {
      return '';
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
    return text.replace(XML_INVALID_CHARS, '');
  }

  private xml(node: XmlNode): string {
    return XML_DECLARATION + this.builder.build(node);
  }
}
