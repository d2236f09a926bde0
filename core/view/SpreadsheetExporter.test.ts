/**
 * Spreadsheet Exporter Tests
 */

import { describe, it, expect } from 'vitest';
import { XMLParser } from 'fast-xml-parser';
import JSZip from 'jszip';
import { Column } from '../components/Column.js';
import { Row } from '../components/Row.js';
import { SpreadsheetExporter, columnLetter, sanitizeSheetName } from './SpreadsheetExporter.js';
import type { TableViewData } from './types.js';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  isArray: (name) => name === 'row' || name === 'c' || name === 'xf' || name === 'numFmt',
});

interface ParsedCell {
  '@_r': string;
  '@_s'?: string;
  '@_t'?: string;
  v?: unknown;
  f?: string;
  is?: { t: { '#text': unknown } };
}

function viewData(columns: Column[], records: Array<Record<string, unknown>>, title: string | null = null): TableViewData {
  return {
    name: 'items',
    title,
    headings: columns.map((column) => ({
      key: column.key,
      label: column.getLabel(),
      sortable: false,
      active: false,
      direction: null,
      href: null,
    })),
    rows: records.map((record, index) => new Row(record, index, columns)),
    pagination: null,
    actions: [],
    total: records.length,
  };
}

function sheetCells(parts: Record<string, string>): ParsedCell[][] {
  const parsed = parser.parse(parts['xl/worksheets/sheet1.xml']);
  const rows: Array<{ c: ParsedCell[] }> = parsed.worksheet.sheetData.row;
  return rows.map((row) => row.c);
}

describe('columnLetter', () => {
  it('should convert indexes to column letters', () => {
    expect(columnLetter(0)).toBe('A');
    expect(columnLetter(25)).toBe('Z');
    expect(columnLetter(26)).toBe('AA');
    expect(columnLetter(701)).toBe('ZZ');
    expect(columnLetter(702)).toBe('AAA');
  });
});

describe('sanitizeSheetName', () => {
  it('should replace forbidden characters and truncate', () => {
    expect(sanitizeSheetName('Q1/Q2: sales')).toBe('Q1 Q2  sales');
    expect(sanitizeSheetName('x'.repeat(40))).toBe('x'.repeat(31));
    expect(sanitizeSheetName('[]')).toBe('Sheet1');
  });
});

describe('SpreadsheetExporter', () => {
  it('should write a bold header row', () => {
    const parts = new SpreadsheetExporter().buildParts(viewData([new Column('name')], []));
    const [header] = sheetCells(parts);

    expect(header).toEqual([{ '@_r': 'A1', '@_s': '1', '@_t': 'inlineStr', is: { t: { '#text': 'Name', '@_xml:space': 'preserve' } } }]);
  });

  it('should write typed values', () => {
    const columns = [new Column('name'), new Column('joined'), new Column('active'), new Column('qty')];
    const parts = new SpreadsheetExporter({ includeHeader: false }).buildParts(
      viewData(columns, [{ name: 'Ada', joined: new Date(Date.UTC(2024, 0, 1)), active: true, qty: 3 }])
    );
    const [cells] = sheetCells(parts);

    expect(cells[0]).toEqual({ '@_r': 'A1', '@_t': 'inlineStr', is: { t: { '#text': 'Ada', '@_xml:space': 'preserve' } } });
    expect(cells[1]).toEqual({ '@_r': 'B1', '@_s': '1', v: 45292 });
    expect(cells[2]).toEqual({ '@_r': 'C1', '@_t': 'b', v: 1 });
    expect(cells[3]).toEqual({ '@_r': 'D1', v: 3 });
  });

  it('should write invalid dates as empty text cells', () => {
    const parts = new SpreadsheetExporter({ includeHeader: false }).buildParts(
      viewData([new Column('joined')], [{ joined: new Date('') }])
    );
    const [[cell]] = sheetCells(parts);

    expect(cell['@_t']).toBe('inlineStr');
    expect(cell['@_s']).toBeUndefined();
    expect(cell.v).toBeUndefined();
  });

  it('should remove control characters from text', () => {
    const parts = new SpreadsheetExporter({ includeHeader: false }).buildParts(
      viewData([new Column('note')], [{ note: 'a\u0001b\u001Fc' }])
    );
    const [[cell]] = sheetCells(parts);

    expect(cell.is).toEqual({ t: { '#text': 'abc', '@_xml:space': 'preserve' } });
  });

  it('should apply spreadsheet cell styles and hyperlinks', () => {
    const columns = [
      new Column('site').setSpreadsheetCell((cell) => {
        cell.setHyperlink('https://example.test').setItalic();
      }),
      new Column('price').setSpreadsheetCell((cell) => {
        cell.setNumberFormat('#,##0.00').setBackground('#FFEE00');
      }),
    ];
    const parts = new SpreadsheetExporter({ includeHeader: false }).buildParts(
      viewData(columns, [{ site: 'Home', price: 12.5 }])
    );
    const [cells] = sheetCells(parts);

    expect(cells[0]).toEqual({
      '@_r': 'A1',
      '@_s': '1',
      '@_t': 'str',
      f: 'HYPERLINK("https://example.test","Home")',
      v: 'Home',
    });
    expect(cells[1]).toEqual({ '@_r': 'B1', '@_s': '2', v: 12.5 });

    const styles = parser.parse(parts['xl/styles.xml']).styleSheet;
    expect(styles.numFmts.numFmt).toEqual([{ '@_numFmtId': '164', '@_formatCode': '#,##0.00' }]);
    expect(styles.cellXfs.xf[2]).toMatchObject({ '@_numFmtId': '164', '@_fillId': '2', '@_applyFill': '1' });
    expect(styles.fills.fill[2].patternFill.fgColor['@_rgb']).toBe('FFFFEE00');
  });

  it('should name the sheet after the title', () => {
    const parts = new SpreadsheetExporter().buildParts(viewData([new Column('name')], [], 'Stock'));
    expect(parser.parse(parts['xl/workbook.xml']).workbook.sheets.sheet['@_name']).toBe('Stock');
  });

  it('should package the parts as a zip', async () => {
    const bytes = await new SpreadsheetExporter().export(viewData([new Column('name')], [{ name: 'Ada' }]));
    const zip = await JSZip.loadAsync(bytes);

    for (const path of [
      '[Content_Types].xml',
      '_rels/.rels',
      'xl/workbook.xml',
      'xl/_rels/workbook.xml.rels',
      'xl/worksheets/sheet1.xml',
      'xl/styles.xml',
    ]) {
      expect(zip.file(path)).not.toBeNull();
    }
    const sheet = await zip.file('xl/worksheets/sheet1.xml')?.async('string');
    expect(sheet).toContain('<t xml:space="preserve">Ada</t>');
  });
});
