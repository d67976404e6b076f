import type { MetricPointInput } from '../db/metricRepository.js';
import type { BinaryFetcher } from './http.js';
import {
  cellText,
  dataRows,
  dayPeriod,
  headerRows,
  monthPeriod,
  numericValue,
  SpreadsheetCollector,
  type SheetGrid
} from './spreadsheet.js';

export const RBA_TABLES_BASE_URL = 'https://www.rba.gov.au/statistics/tables/xls/';

export interface TableSeries {
  /** Zero-based column, or a pattern matched against the header cells above the data. */
  column: number | RegExp;
  metricName: string;
}

export interface RbaTable {
  name: string;
  file: string;
  source: string;
  unit: string;
  period: 'month' | 'day';
  series: TableSeries[];
}

export const RBA_INFLATION_TABLE: RbaTable = {
  name: 'RBA Inflation',
  file: 'g01hist.xlsx',
  source: 'RBA G1 Table',
  unit: 'Per cent',
  period: 'month',
  series: [
    { column: 2, metricName: 'inflation_cpi_annual' },
    { column: 10, metricName: 'inflation_trimmed_mean_annual' }
  ]
};

export const RBA_LENDING_RATES_TABLE: RbaTable = {
  name: 'RBA Housing Lending Rates',
  file: 'f06hist.xlsx',
  source: 'RBA F6 Table',
  unit: 'Per cent per annum',
  period: 'month',
  series: [
    { column: 4, metricName: 'housing_lending_rate_variable_owner_occupier' },
    { column: 25, metricName: 'housing_lending_rate_variable_investor' }
  ]
};

export const RBA_LABOUR_FORCE_TABLE: RbaTable = {
  name: 'RBA Labour Force',
  file: 'h05hist.xlsx',
  source: 'RBA H5 Table',
  unit: 'Per cent',
  period: 'month',
  series: [
    { column: 2, metricName: 'labour_force_participation_rate' },
    { column: 8, metricName: 'employment_to_population_ratio' },
    { column: 10, metricName: 'unemployment_rate' }
  ]
};

export const RBA_CASH_RATE_HISTORY_TABLE: RbaTable = {
  name: 'RBA Interest Rate History',
  file: 'f01hist.xlsx',
  source: 'RBA F1 Table',
  unit: 'percent',
  period: 'day',
  series: [{ column: /cash rate/, metricName: 'interest_rate_cash' }]
};

export const RBA_TABLES: readonly RbaTable[] = [
  RBA_CASH_RATE_HISTORY_TABLE,
  RBA_INFLATION_TABLE,
  RBA_LENDING_RATES_TABLE,
  RBA_LABOUR_FORCE_TABLE
];

function resolveColumn(grid: SheetGrid, column: number | RegExp): number | null {
  if (typeof column === 'number') {
    return column;
  }
  for (const cells of headerRows(grid)) {
    for (let index = 1; index < cells.length; index += 1) {
      if (column.test(cellText(cells[index] ?? null))) {
        return index;
      }
    }
  }
  return null;
}

/** One observation per dated row and series; blank cells are skipped. */
export function parseRbaTable(grid: SheetGrid, table: RbaTable): MetricPointInput[] {
  const columns = table.series.flatMap((series) => {
    const index = resolveColumn(grid, series.column);
    return index === null ? [] : [{ index, metricName: series.metricName }];
  });
  const toPeriod = table.period === 'day' ? dayPeriod : monthPeriod;

  const records: MetricPointInput[] = [];
  for (const row of dataRows(grid)) {
    const period = toPeriod(row.date);
    for (const { index, metricName } of columns) {
      const value = numericValue(row.cells[index] ?? null);
      if (value === null) {
        continue;
      }
      records.push({
        metricName,
        value,
        period,
        geography: 'Australia',
        unit: table.unit,
        source: table.source
      });
    }
  }
  return records;
}

export function createRbaTableCollector(table: RbaTable, fetchBinary?: BinaryFetcher): SpreadsheetCollector {
  return new SpreadsheetCollector(
    {
      name: table.name,
      sourceUrl: `${RBA_TABLES_BASE_URL}${table.file}`,
      sheet: 'Data',
      parse: (grid) => parseRbaTable(grid, table)
    },
    fetchBinary
  );
}
