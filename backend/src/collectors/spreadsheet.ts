import ExcelJS, { type CellValue } from 'exceljs';
import type { MetricPointInput } from '../db/metricRepository.js';
import { childLogger } from '../utils/logger.js';
import { createBinaryFetcher, describeFailure, type BinaryFetcher } from './http.js';
import { failedResult, type Collector, type CollectorResult } from './types.js';

const log = childLogger('collector:spreadsheet');

export type GridValue = Date | number | string | null;

/** Zero-based rows of zero-based cells. Rows and cells that were never written are missing. */
export type SheetGrid = GridValue[][];

export interface DataRow {
  date: Date;
  cells: GridValue[];
}

function normalizeCell(value: CellValue): GridValue {
  if (value === null || value === undefined || typeof value === 'boolean') {
    return null;
  }
  if (value instanceof Date || typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if ('richText' in value) {
    return value.richText.map((run) => run.text).join('');
  }
  if ('result' in value) {
    const result = value.result;
    return result instanceof Date || typeof result === 'number' || typeof result === 'string' ? result : null;
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  return null;
}

/**
 * Loads an `.xlsx` workbook and returns the cell values of `preferredSheet`, or of the first
 * worksheet when the workbook has no sheet by that name. Formula cells give their cached result.
 */
export async function readSheetGrid(data: ArrayBuffer, preferredSheet = 'Data1'): Promise<SheetGrid> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(data);

  const worksheet = workbook.getWorksheet(preferredSheet) ?? workbook.worksheets[0];
  if (!worksheet) {
    throw new Error('Workbook has no worksheets');
  }

  const grid: SheetGrid = [];
  worksheet.eachRow((row, rowNumber) => {
    const cells: GridValue[] = [];
    row.eachCell((cell, columnNumber) => {
      cells[columnNumber - 1] = normalizeCell(cell.value);
    });
    grid[rowNumber - 1] = cells;
  });
  return grid;
}

export function cellAt(grid: SheetGrid, row: number, column: number): GridValue {
  return grid[row]?.[column] ?? null;
}

/** Numbers, and strings that are entirely a number. Blanks and markers such as "n.a." give null. */
export function numericValue(value: GridValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Observations are the rows dated in the first column; everything above them is header. */
export function dataRows(grid: SheetGrid): DataRow[] {
  const rows: DataRow[] = [];
  for (const cells of grid) {
    const first = cells?.[0];
    if (first instanceof Date) {
      rows.push({ date: first, cells });
    }
  }
  return rows;
}

export function headerRows(grid: SheetGrid): GridValue[][] {
  const firstData = grid.findIndex((cells) => cells?.[0] instanceof Date);
  // Array.from visits holes left by blank rows
  return Array.from(firstData === -1 ? grid : grid.slice(0, firstData), (cells) => cells ?? []);
}

/** Lower-cased text of one cell, empty for blanks. */
export function cellText(value: GridValue): string {
  if (value === null) {
    return '';
  }
  return (value instanceof Date ? value.toISOString() : String(value)).trim().toLowerCase();
}

export function monthPeriod(date: Date): string {
  return date.toISOString().slice(0, 7);
}

export function dayPeriod(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export interface SpreadsheetSource {
  name: string;
  sourceUrl: string;
  /** Sheet to read; the first sheet is used when it is missing. */
  sheet?: string;
  parse(grid: SheetGrid): MetricPointInput[];
}

/** Downloads one workbook and turns its grid into metric points. */
export class SpreadsheetCollector implements Collector {
  readonly name: string;
  readonly sourceUrl: string;

  constructor(
    private readonly source: SpreadsheetSource,
    private readonly fetchBinary: BinaryFetcher = createBinaryFetcher()
  ) {
    this.name = source.name;
    this.sourceUrl = source.sourceUrl;
  }

  async collect(): Promise<CollectorResult> {
    let data: ArrayBuffer;
    try {
      data = await this.fetchBinary(this.sourceUrl);
    } catch (error) {
      return failedResult(describeFailure(error));
    }

    try {
      const grid = await readSheetGrid(data, this.source.sheet);
      const records = this.source.parse(grid);
      log.debug({ collector: this.name, records: records.length }, 'Parsed workbook');
      return { success: true, records, documents: [], metadata: { file_size: data.byteLength } };
    } catch (error) {
      return failedResult(describeFailure(error), { file_size: data.byteLength });
    }
  }
}
