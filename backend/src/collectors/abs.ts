import { config } from '../config/app.js';
import type { MetricPointInput } from '../db/metricRepository.js';
import { round } from '../tools/analytics.js';
import type { BinaryFetcher } from './http.js';
import { cellAt, cellText, dataRows, monthPeriod, numericValue, SpreadsheetCollector, type SheetGrid } from './spreadsheet.js';

// ABS time series workbooks: row 0 describes each series, row 1 is its unit, row 2 its type.
const DESCRIPTION_ROW = 0;
const SERIES_TYPE_ROW = 2;

function columnCount(grid: SheetGrid) {
  return grid.reduce((widest, cells) => Math.max(widest, cells?.length ?? 0), 0);
}

function seriesType(grid: SheetGrid, column: number) {
  return cellText(cellAt(grid, SERIES_TYPE_ROW, column)) || 'original';
}

// ---------------------------------------------------------------------------
// Average weekly earnings (6302.0, Table 1)
// ---------------------------------------------------------------------------

/**
 * Metric name for a series description such as
 * "Earnings; Males; Full Time; Adult; Ordinary time earnings ;", or null for
 * series that are not earnings.
 */
export function earningsMetricName(description: string): string | null {
  const parts = description
    .split(';')
    .map((part) => part.trim().toLowerCase())
    .filter(Boolean);

  let earnings: string;
  if (parts.includes('ordinary time earnings')) {
    earnings = 'avg_weekly_ordinary_earnings';
  } else if (parts.includes('total earnings')) {
    earnings = 'avg_weekly_total_earnings';
  } else {
    return null;
  }

  const sex = parts.includes('males') ? '_male' : parts.includes('females') ? '_female' : '';
  const fullTimeAdult = (parts.includes('full time') || parts.includes('full-time')) && parts.includes('adult');
  return `${fullTimeAdult ? 'fulltime_adult' : 'all_employees'}_${earnings}${sex}`;
}

/** When two columns describe the same series (trend and seasonally adjusted), the first one wins. */
export function parseWeeklyEarnings(grid: SheetGrid): MetricPointInput[] {
  const columns: Array<{ index: number; metricName: string; adjustment: string }> = [];
  const claimed = new Set<string>();
  for (let index = 1; index < columnCount(grid); index += 1) {
    const description = cellAt(grid, DESCRIPTION_ROW, index);
    const metricName = typeof description === 'string' ? earningsMetricName(description) : null;
    if (metricName === null || claimed.has(metricName)) {
      continue;
    }
    claimed.add(metricName);
    columns.push({ index, metricName, adjustment: seriesType(grid, index) });
  }

  const records: MetricPointInput[] = [];
  for (const row of dataRows(grid)) {
    for (const { index, metricName, adjustment } of columns) {
      const value = numericValue(row.cells[index] ?? null);
      if (value === null) {
        continue;
      }
      records.push({
        metricName,
        value,
        period: monthPeriod(row.date),
        geography: 'Australia',
        unit: 'AUD',
        source: 'ABS Average Weekly Earnings',
        extraData: { adjustment }
      });
    }
  }
  return records;
}

// ---------------------------------------------------------------------------
// Lending indicators (5601.0, Table 1)
// ---------------------------------------------------------------------------

type LoanSegment = 'total' | 'owner_occupier' | 'investor' | 'first_home_buyer';

interface LendingSeries {
  column: number;
  segment: LoanSegment;
  measure: 'number' | 'value';
}

const LENDING_SERIES: readonly LendingSeries[] = [
  { column: 1, segment: 'total', measure: 'number' },
  { column: 2, segment: 'owner_occupier', measure: 'number' },
  { column: 3, segment: 'investor', measure: 'number' },
  { column: 5, segment: 'first_home_buyer', measure: 'number' },
  { column: 6, segment: 'total', measure: 'value' },
  { column: 7, segment: 'owner_occupier', measure: 'value' },
  { column: 8, segment: 'investor', measure: 'value' },
  { column: 10, segment: 'first_home_buyer', measure: 'value' }
];

const LENDING_UNITS = { number: 'Number', value: '$ Millions' } as const;
const LOAN_SEGMENTS: readonly LoanSegment[] = ['total', 'owner_occupier', 'investor', 'first_home_buyer'];

/**
 * Loan commitment counts and values per segment, plus the average loan size in thousands of
 * dollars (value in millions / number * 1000) for every period that has both and a positive count.
 */
export function parseLendingIndicators(grid: SheetGrid): MetricPointInput[] {
  const records: MetricPointInput[] = [];
  const averages: MetricPointInput[] = [];

  for (const row of dataRows(grid)) {
    const period = monthPeriod(row.date);
    const observed = new Map<string, number>();

    for (const series of LENDING_SERIES) {
      const value = numericValue(row.cells[series.column] ?? null);
      if (value === null) {
        continue;
      }
      observed.set(`${series.segment}:${series.measure}`, value);
      records.push({
        metricName: `loan_commitments_${series.segment}_${series.measure}`,
        value,
        period,
        geography: 'Australia',
        unit: LENDING_UNITS[series.measure],
        source: 'ABS Lending Indicators',
        extraData: { adjustment: seriesType(grid, series.column) }
      });
    }

    for (const segment of LOAN_SEGMENTS) {
      const count = observed.get(`${segment}:number`);
      const value = observed.get(`${segment}:value`);
      if (count === undefined || value === undefined || count <= 0) {
        continue;
      }
      averages.push({
        metricName: `avg_loan_size_${segment}`,
        value: round((value / count) * 1000, 2),
        period,
        geography: 'Australia',
        unit: '$ Thousands',
        source: 'ABS Lending Indicators (calculated)',
        extraData: { adjustment: 'original' }
      });
    }
  }
  return [...records, ...averages];
}

// ---------------------------------------------------------------------------
// Building approvals (8731.0, Table 6)
// ---------------------------------------------------------------------------

/**
 * Total dwelling units approved, from the first original and the first seasonally adjusted
 * "total ... dwelling" series. Trend series are left out.
 */
export function parseBuildingApprovals(grid: SheetGrid): MetricPointInput[] {
  const columns: Array<{ index: number; metricName: string; adjustment: string }> = [];
  const claimed = new Set<string>();
  for (let index = 1; index < columnCount(grid); index += 1) {
    const description = cellText(cellAt(grid, DESCRIPTION_ROW, index));
    if (!description.includes('total') || !description.includes('dwelling')) {
      continue;
    }
    const type = seriesType(grid, index);
    const adjusted = type.includes('seasonally') || description.includes('seasonally');
    if (!adjusted && type.includes('trend')) {
      continue;
    }
    const metricName = adjusted ? 'housing_approvals_total_sa' : 'housing_approvals_total';
    if (claimed.has(metricName)) {
      continue;
    }
    claimed.add(metricName);
    columns.push({ index, metricName, adjustment: adjusted ? 'seasonally_adjusted' : 'original' });
  }

  const records: MetricPointInput[] = [];
  for (const row of dataRows(grid)) {
    for (const { index, metricName, adjustment } of columns) {
      const value = numericValue(row.cells[index] ?? null);
      if (value === null) {
        continue;
      }
      records.push({
        metricName,
        value,
        period: monthPeriod(row.date),
        geography: 'Australia',
        unit: 'Number of dwelling units',
        source: 'ABS Building Approvals',
        extraData: { adjustment }
      });
    }
  }
  return records;
}

export interface AbsReleaseUrls {
  buildingApprovals: string;
  weeklyEarnings: string;
  lendingIndicators: string;
}

const configuredUrls: AbsReleaseUrls = {
  buildingApprovals: config.ABS_BUILDING_APPROVALS_URL,
  weeklyEarnings: config.ABS_WEEKLY_EARNINGS_URL,
  lendingIndicators: config.ABS_LENDING_INDICATORS_URL
};

export function createAbsCollectors(fetchBinary?: BinaryFetcher, urls: AbsReleaseUrls = configuredUrls): SpreadsheetCollector[] {
  return [
    new SpreadsheetCollector(
      { name: 'ABS Building Approvals', sourceUrl: urls.buildingApprovals, sheet: 'Data1', parse: parseBuildingApprovals },
      fetchBinary
    ),
    new SpreadsheetCollector(
      { name: 'ABS Weekly Earnings', sourceUrl: urls.weeklyEarnings, sheet: 'Data1', parse: parseWeeklyEarnings },
      fetchBinary
    ),
    new SpreadsheetCollector(
      { name: 'ABS Lending Indicators', sourceUrl: urls.lendingIndicators, sheet: 'Data1', parse: parseLendingIndicators },
      fetchBinary
    )
  ];
}
