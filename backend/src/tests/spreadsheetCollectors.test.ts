import { AxiosError, AxiosHeaders } from 'axios';
import ExcelJS from 'exceljs';
import { describe, expect, it } from 'vitest';
import {
  createAbsCollectors,
  earningsMetricName,
  parseBuildingApprovals,
  parseLendingIndicators,
  parseWeeklyEarnings
} from '../collectors/abs.js';
import type { BinaryFetcher } from '../collectors/http.js';
import { createHousingCollectors } from '../collectors/index.js';
import {
  createRbaTableCollector,
  parseRbaTable,
  RBA_CASH_RATE_HISTORY_TABLE,
  RBA_INFLATION_TABLE,
  RBA_LABOUR_FORCE_TABLE,
  RBA_LENDING_RATES_TABLE
} from '../collectors/rbaTables.js';
import { cellAt, numericValue, readSheetGrid, type GridValue, type SheetGrid } from '../collectors/spreadsheet.js';

type SheetRows = unknown[][];

function utc(year: number, month: number, day: number) {
  return new Date(Date.UTC(year, month - 1, day));
}

/** Row with the given zero-based columns filled and blanks elsewhere. */
function cells(entries: Record<number, GridValue>): GridValue[] {
  const row: GridValue[] = [];
  for (const [index, value] of Object.entries(entries)) {
    row[Number(index)] = value;
  }
  return Array.from(row, (value) => value ?? null);
}

async function workbook(sheets: Record<string, SheetRows>): Promise<ArrayBuffer> {
  const book = new ExcelJS.Workbook();
  for (const [name, rows] of Object.entries(sheets)) {
    const worksheet = book.addWorksheet(name);
    for (const values of rows) {
      const row = worksheet.addRow(values);
      row.eachCell((cell) => {
        if (cell.value instanceof Date) {
          cell.numFmt = 'yyyy-mm-dd';
        }
      });
    }
  }
  return book.xlsx.writeBuffer();
}

function httpError(status: number) {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', undefined, undefined, {
    data: '',
    status,
    statusText: 'Not Found',
    headers: {},
    config: { headers: new AxiosHeaders() }
  });
}

function fakeBinaryFetcher(files: Record<string, ArrayBuffer>): { fetch: BinaryFetcher; requested: string[] } {
  const requested: string[] = [];
  return {
    requested,
    fetch: async (url) => {
      requested.push(url);
      const file = files[url];
      if (file === undefined) {
        throw httpError(404);
      }
      return file;
    }
  };
}

describe('readSheetGrid', () => {
  it('reads the Data1 sheet with zero-based rows and columns', async () => {
    const data = await workbook({
      Index: [['Contents']],
      Data1: [
        ['Series', { richText: [{ text: 'Cash ' }, { text: 'rate' }] }, { text: 'RBA', hyperlink: 'https://www.rba.gov.au/' }],
        [utc(2024, 1, 1), { formula: '1+1', result: 2 }, null, 'n.a.']
      ]
    });

    const grid = await readSheetGrid(data);

    expect(cellAt(grid, 0, 0)).toBe('Series');
    expect(cellAt(grid, 0, 1)).toBe('Cash rate');
    expect(cellAt(grid, 0, 2)).toBe('RBA');
    expect(cellAt(grid, 1, 0)).toEqual(utc(2024, 1, 1));
    expect(cellAt(grid, 1, 1)).toBe(2);
    expect(cellAt(grid, 1, 2)).toBeNull();
    expect(cellAt(grid, 1, 3)).toBe('n.a.');
    expect(cellAt(grid, 5, 0)).toBeNull();
  });

  it('falls back to the first sheet', async () => {
    const grid = await readSheetGrid(await workbook({ Data: [['only sheet']] }), 'Data1');

    expect(cellAt(grid, 0, 0)).toBe('only sheet');
  });

  it('treats numeric text as a number and markers as blanks', () => {
    expect(numericValue(' 4.35 ')).toBe(4.35);
    expect(numericValue('n.a.')).toBeNull();
    expect(numericValue('')).toBeNull();
    expect(numericValue(utc(2024, 1, 1))).toBeNull();
  });
});

describe('RBA statistical tables', () => {
  it('reads year-ended CPI and trimmed mean inflation by month', () => {
    const grid: SheetGrid = [
      cells({ 0: 'G1 CONSUMER PRICE INFLATION', 1: 'Consumer price index' }),
      cells({ 0: utc(2024, 3, 31), 2: 3.6, 10: 4 }),
      cells({ 0: utc(2024, 6, 30), 2: 3.8 })
    ];

    expect(parseRbaTable(grid, RBA_INFLATION_TABLE)).toEqual([
      {
        metricName: 'inflation_cpi_annual',
        value: 3.6,
        period: '2024-03',
        geography: 'Australia',
        unit: 'Per cent',
        source: 'RBA G1 Table'
      },
      {
        metricName: 'inflation_trimmed_mean_annual',
        value: 4,
        period: '2024-03',
        geography: 'Australia',
        unit: 'Per cent',
        source: 'RBA G1 Table'
      },
      {
        metricName: 'inflation_cpi_annual',
        value: 3.8,
        period: '2024-06',
        geography: 'Australia',
        unit: 'Per cent',
        source: 'RBA G1 Table'
      }
    ]);
  });

  it('maps the labour force columns to participation, employment and unemployment', () => {
    const grid: SheetGrid = [cells({ 0: utc(2024, 10, 1), 2: 67.1, 8: 64.4, 10: 4.1 })];

    expect(parseRbaTable(grid, RBA_LABOUR_FORCE_TABLE).map((record) => [record.metricName, record.value])).toEqual([
      ['labour_force_participation_rate', 67.1],
      ['employment_to_population_ratio', 64.4],
      ['unemployment_rate', 4.1]
    ]);
  });

  it('finds the cash rate column by its header and keeps daily periods', () => {
    const grid: SheetGrid = [
      cells({ 0: 'F1.1 INTEREST RATES AND YIELDS' }),
      cells({ 0: 'Title', 1: 'Cash Rate Target', 2: 'Interbank Overnight Cash Rate' }),
      cells({ 0: utc(2024, 11, 6), 1: 4.35, 2: 4.33 })
    ];

    expect(parseRbaTable(grid, RBA_CASH_RATE_HISTORY_TABLE)).toEqual([
      {
        metricName: 'interest_rate_cash',
        value: 4.35,
        period: '2024-11-06',
        geography: 'Australia',
        unit: 'percent',
        source: 'RBA F1 Table'
      }
    ]);
    const withoutCashRate: SheetGrid = [cells({ 0: 'Title', 1: 'Bank bill' }), cells({ 0: utc(2024, 11, 6), 1: 4.4 })];
    expect(parseRbaTable(withoutCashRate, RBA_CASH_RATE_HISTORY_TABLE)).toEqual([]);
  });

  it('downloads the lending rate table and reports the file size', async () => {
    const data = await workbook({
      Data: [
        ['F6 HOUSING LENDING RATES'],
        [utc(2024, 9, 30), ...Array.from({ length: 3 }, () => null), 6.29, ...Array.from({ length: 20 }, () => null), 6.58]
      ]
    });
    const { fetch, requested } = fakeBinaryFetcher({ 'https://www.rba.gov.au/statistics/tables/xls/f06hist.xlsx': data });

    const result = await createRbaTableCollector(RBA_LENDING_RATES_TABLE, fetch).collect();

    expect(requested).toEqual(['https://www.rba.gov.au/statistics/tables/xls/f06hist.xlsx']);
    expect(result.success).toBe(true);
    expect(result.metadata).toEqual({ file_size: data.byteLength });
    expect(result.records.map((record) => [record.metricName, record.value, record.period, record.unit])).toEqual([
      ['housing_lending_rate_variable_owner_occupier', 6.29, '2024-09', 'Per cent per annum'],
      ['housing_lending_rate_variable_investor', 6.58, '2024-09', 'Per cent per annum']
    ]);
  });

  it('reports download and workbook failures as failed results', async () => {
    const missing = await createRbaTableCollector(RBA_INFLATION_TABLE, fakeBinaryFetcher({}).fetch).collect();

    expect(missing).toEqual({
      success: false,
      records: [],
      documents: [],
      errorMessage: 'HTTP error: Request failed with status code 404',
      metadata: {}
    });

    const garbage = new ArrayBuffer(16);
    const corrupt = await createRbaTableCollector(
      RBA_INFLATION_TABLE,
      fakeBinaryFetcher({ 'https://www.rba.gov.au/statistics/tables/xls/g01hist.xlsx': garbage }).fetch
    ).collect();

    expect(corrupt.success).toBe(false);
    expect(corrupt.errorMessage).toMatch(/^Unexpected error: /);
    expect(corrupt.metadata).toEqual({ file_size: 16 });
  });
});

describe('ABS average weekly earnings', () => {
  it('names metrics from the series description', () => {
    expect(earningsMetricName('Earnings; Males; Full Time; Adult; Ordinary time earnings ;')).toBe(
      'fulltime_adult_avg_weekly_ordinary_earnings_male'
    );
    expect(earningsMetricName('Earnings; Persons; Total earnings ;')).toBe('all_employees_avg_weekly_total_earnings');
    expect(earningsMetricName('Employees; Persons ;')).toBeNull();
  });

  it('keeps the first column of each series and skips non-earnings columns', () => {
    const grid: SheetGrid = [
      cells({
        0: 'Series description',
        1: 'Earnings; Persons; Full Time; Adult; Ordinary time earnings ;',
        2: 'Earnings; Males; Full Time; Adult; Total earnings ;',
        3: 'Earnings; Females; Total earnings ;',
        4: 'Earnings; Persons; Full Time; Adult; Ordinary time earnings ;',
        5: 'Employees; Persons ;'
      }),
      cells({ 0: 'Unit', 1: '$', 2: '$', 3: '$', 4: '$', 5: '000' }),
      cells({ 0: 'Series Type', 1: 'Trend', 2: 'Trend', 3: 'Trend', 4: 'Seasonally Adjusted', 5: 'Trend' }),
      cells({ 0: utc(2024, 5, 15), 1: 1923.5, 2: 2100, 3: 1200, 4: 1930, 5: 100 })
    ];

    expect(parseWeeklyEarnings(grid)).toEqual([
      {
        metricName: 'fulltime_adult_avg_weekly_ordinary_earnings',
        value: 1923.5,
        period: '2024-05',
        geography: 'Australia',
        unit: 'AUD',
        source: 'ABS Average Weekly Earnings',
        extraData: { adjustment: 'trend' }
      },
      {
        metricName: 'fulltime_adult_avg_weekly_total_earnings_male',
        value: 2100,
        period: '2024-05',
        geography: 'Australia',
        unit: 'AUD',
        source: 'ABS Average Weekly Earnings',
        extraData: { adjustment: 'trend' }
      },
      {
        metricName: 'all_employees_avg_weekly_total_earnings_female',
        value: 1200,
        period: '2024-05',
        geography: 'Australia',
        unit: 'AUD',
        source: 'ABS Average Weekly Earnings',
        extraData: { adjustment: 'trend' }
      }
    ]);
  });
});

describe('ABS lending indicators', () => {
  const grid: SheetGrid = [
    cells({ 0: 'Series description', 1: 'Total dwellings; Number' }),
    cells({ 0: 'Unit' }),
    cells({ 0: 'Series Type', 1: 'Seasonally Adjusted', 6: 'Original' }),
    cells({ 0: utc(2024, 9, 1), 1: 50000, 2: 35000, 3: 15000, 5: 10000, 6: 30000, 7: 22000, 8: 8000, 10: 6000 }),
    cells({ 0: utc(2024, 12, 1), 5: 0, 10: 0 })
  ];

  it('reads commitments and derives average loan sizes in thousands', () => {
    const records = parseLendingIndicators(grid);

    expect(records.map((record) => [record.metricName, record.value, record.period])).toEqual([
      ['loan_commitments_total_number', 50000, '2024-09'],
      ['loan_commitments_owner_occupier_number', 35000, '2024-09'],
      ['loan_commitments_investor_number', 15000, '2024-09'],
      ['loan_commitments_first_home_buyer_number', 10000, '2024-09'],
      ['loan_commitments_total_value', 30000, '2024-09'],
      ['loan_commitments_owner_occupier_value', 22000, '2024-09'],
      ['loan_commitments_investor_value', 8000, '2024-09'],
      ['loan_commitments_first_home_buyer_value', 6000, '2024-09'],
      ['loan_commitments_first_home_buyer_number', 0, '2024-12'],
      ['loan_commitments_first_home_buyer_value', 0, '2024-12'],
      ['avg_loan_size_total', 600, '2024-09'],
      ['avg_loan_size_owner_occupier', 628.57, '2024-09'],
      ['avg_loan_size_investor', 533.33, '2024-09'],
      ['avg_loan_size_first_home_buyer', 600, '2024-09']
    ]);
    expect(records[0]).toEqual({
      metricName: 'loan_commitments_total_number',
      value: 50000,
      period: '2024-09',
      geography: 'Australia',
      unit: 'Number',
      source: 'ABS Lending Indicators',
      extraData: { adjustment: 'seasonally adjusted' }
    });
    expect(records[13]).toEqual({
      metricName: 'avg_loan_size_first_home_buyer',
      value: 600,
      period: '2024-09',
      geography: 'Australia',
      unit: '$ Thousands',
      source: 'ABS Lending Indicators (calculated)',
      extraData: { adjustment: 'original' }
    });
  });

  it('collects from the Data1 sheet of the configured release file', async () => {
    const data = await workbook({
      Index: [['Contents'], [utc(2024, 9, 1), 999]],
      Data1: [['Series description'], [utc(2024, 9, 1), 100, null, null, null, null, 50]]
    });
    const urls = {
      buildingApprovals: 'https://example.test/approvals.xlsx',
      weeklyEarnings: 'https://example.test/earnings.xlsx',
      lendingIndicators: 'https://example.test/lending.xlsx'
    };
    const collectors = createAbsCollectors(fakeBinaryFetcher({ 'https://example.test/lending.xlsx': data }).fetch, urls);

    expect(collectors.map((collector) => [collector.name, collector.sourceUrl])).toEqual([
      ['ABS Building Approvals', 'https://example.test/approvals.xlsx'],
      ['ABS Weekly Earnings', 'https://example.test/earnings.xlsx'],
      ['ABS Lending Indicators', 'https://example.test/lending.xlsx']
    ]);

    const result = await collectors[2].collect();

    expect(result.success).toBe(true);
    expect(result.records.map((record) => [record.metricName, record.value])).toEqual([
      ['loan_commitments_total_number', 100],
      ['loan_commitments_total_value', 50],
      ['avg_loan_size_total', 500]
    ]);
  });
});

describe('ABS building approvals', () => {
  it('reads the original and seasonally adjusted dwelling totals and skips trend', () => {
    const total = 'Total number of dwelling units ;  Total (Type of Building) ;  Total Sectors ;';
    const grid: SheetGrid = [
      cells({ 0: 'Series description', 1: total, 2: total, 3: total, 4: 'Houses ;  Total Sectors ;' }),
      cells({ 0: 'Unit', 1: 'Number', 2: 'Number', 3: 'Number', 4: 'Number' }),
      cells({ 0: 'Series Type', 1: 'Trend', 2: 'Seasonally Adjusted', 3: 'Original', 4: 'Original' }),
      cells({ 0: utc(2025, 10, 1), 1: 15000, 2: 15500, 3: 16000, 4: 9000 })
    ];

    expect(parseBuildingApprovals(grid)).toEqual([
      {
        metricName: 'housing_approvals_total_sa',
        value: 15500,
        period: '2025-10',
        geography: 'Australia',
        unit: 'Number of dwelling units',
        source: 'ABS Building Approvals',
        extraData: { adjustment: 'seasonally_adjusted' }
      },
      {
        metricName: 'housing_approvals_total',
        value: 16000,
        period: '2025-10',
        geography: 'Australia',
        unit: 'Number of dwelling units',
        source: 'ABS Building Approvals',
        extraData: { adjustment: 'original' }
      }
    ]);
  });
});

describe('createHousingCollectors', () => {
  it('covers the RBA pages and tables and the ABS releases', () => {
    const collectors = createHousingCollectors({
      fetchHtml: async () => '',
      fetchBinary: async () => new ArrayBuffer(0)
    });

    expect(collectors.map((collector) => collector.name)).toEqual([
      'RBA Interest Rates',
      'RBA Interest Rate History',
      'RBA Inflation',
      'RBA Housing Lending Rates',
      'RBA Labour Force',
      'RBA Meeting Minutes',
      'RBA Monetary Policy Statement',
      'ABS Building Approvals',
      'ABS Weekly Earnings',
      'ABS Lending Indicators'
    ]);
  });
});
