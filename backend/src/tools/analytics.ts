import { z } from 'zod';
import type { MetricPoint, MetricRepository } from '../db/metricRepository.js';
import { noDataError } from './metrics.js';
import { defineTool, objectSchema, type RegisteredTool, type ToolResult } from './types.js';

const MAX_CHANGES_COMPUTED = 12;
const MAX_CHANGES_RETURNED = 6;
const MORTGAGE_TERM_MONTHS = 30 * 12;

export const LOAN_SIZE_METRICS = {
  first_home_buyer: 'avg_loan_size_first_home_buyer',
  owner_occupier: 'avg_loan_size_owner_occupier',
  investor: 'avg_loan_size_investor',
  total: 'avg_loan_size_total'
} as const;

export type LoanType = keyof typeof LOAN_SIZE_METRICS;

export const EARNINGS_METRIC = 'fulltime_adult_avg_weekly_ordinary_earnings';
export const MORTGAGE_RATE_METRIC = 'housing_lending_rate_variable_owner_occupier';

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function isLoanType(value: string): value is LoanType {
  return Object.prototype.hasOwnProperty.call(LOAN_SIZE_METRICS, value);
}

interface Observation {
  period: string;
  value: number;
}

function leadingYear(period: string): number | null {
  const year = period.slice(0, 4);
  return /^\d{4}$/.test(year) ? Number(year) : null;
}

function monthOf(period: string): number | null {
  const month = period.slice(5, 7);
  return /^\d{1,2}$/.test(month) ? Number(month) : null;
}

/**
 * Fractional years between two "YYYY" or "YYYY-MM" periods; null when either cannot be
 * read. Months are only considered when the first period carries one.
 */
export function elapsedYears(firstPeriod: string, lastPeriod: string): number | null {
  const firstYear = leadingYear(firstPeriod);
  const lastYear = leadingYear(lastPeriod);
  if (firstYear === null || lastYear === null) {
    return null;
  }
  if (firstPeriod.length > 5) {
    const firstMonth = monthOf(firstPeriod);
    const lastMonth = monthOf(lastPeriod);
    if (firstMonth === null || lastMonth === null) {
      return null;
    }
    return lastYear - firstYear + (lastMonth - firstMonth) / 12;
  }
  return lastYear - firstYear;
}

/** Growth statistics over the `periods` most recent observations (all when `periods` <= 0). */
export function analyzeGrowth(metricName: string, series: MetricPoint[], periods = 0): ToolResult {
  if (series.length === 0) {
    return noDataError(metricName);
  }

  const window = periods > 0 ? series.slice(-periods) : series;
  const values: Observation[] = window.flatMap((point) =>
    point.value === null ? [] : [{ period: point.period, value: point.value }]
  );

  if (values.length < 2) {
    return { error: 'Insufficient data for analysis', metric: metricName };
  }

  const first = values[0];
  const last = values[values.length - 1];
  const totalPct = first.value !== 0 ? ((last.value - first.value) / first.value) * 100 : 0;

  let years = elapsedYears(first.period, last.period);
  let cagr: number | null = null;
  if (years === null) {
    years = values.length - 1;
  } else if (years > 0 && first.value > 0) {
    cagr = ((last.value / first.value) ** (1 / years) - 1) * 100;
  }

  const changes: Array<Record<string, unknown>> = [];
  for (let i = 1; i < Math.min(values.length, MAX_CHANGES_COMPUTED + 1); i += 1) {
    const previous = values[values.length - 1 - i];
    const current = values[values.length - i];
    if (previous.value === 0) {
      continue;
    }
    changes.push({
      from_period: previous.period,
      to_period: current.period,
      change: round(current.value - previous.value, 4),
      change_pct: round(((current.value - previous.value) / previous.value) * 100, 2)
    });
  }

  let min = values[0];
  let max = values[0];
  for (const observation of values) {
    if (observation.value < min.value) min = observation;
    if (observation.value > max.value) max = observation;
  }

  return {
    metric: metricName,
    data_points: values.length,
    period_range: {
      from: first.period,
      to: last.period,
      years: years !== 0 ? round(years, 1) : null
    },
    values: { first, last, min, max },
    growth: {
      total_change: round(last.value - first.value, 2),
      total_pct: round(totalPct, 2),
      cagr: cagr === null ? null : round(cagr, 2)
    },
    recent_changes: changes.slice(0, MAX_CHANGES_RETURNED),
    unit: window[0].unit,
    source: window[0].source
  };
}

export type StressLevel = 'LOW' | 'MODERATE' | 'HIGH' | 'SEVERE';

export function classifyMortgageStress(repaymentToIncomePct: number): { level: StressLevel; description: string } {
  if (repaymentToIncomePct < 25) {
    return { level: 'LOW', description: 'Comfortable - can build savings' };
  }
  if (repaymentToIncomePct < 30) {
    return { level: 'MODERATE', description: 'Manageable - limited buffer' };
  }
  if (repaymentToIncomePct < 35) {
    return { level: 'HIGH', description: 'Stretched - vulnerable to rate rises' };
  }
  return { level: 'SEVERE', description: 'Mortgage stress - risk of default' };
}

/** Standard amortized principal-and-interest repayment for an annual percentage rate. */
export function monthlyRepayment(principal: number, annualRatePct: number, months = MORTGAGE_TERM_MONTHS): number {
  const monthlyRate = annualRatePct / 100 / 12;
  if (monthlyRate === 0) {
    return principal / months;
  }
  const growth = (1 + monthlyRate) ** months;
  return (principal * (monthlyRate * growth)) / (growth - 1);
}

export function calculateAffordability(metrics: MetricRepository, loanType: string, dualIncome: boolean): ToolResult {
  if (!isLoanType(loanType)) {
    return { error: `Invalid loan type: ${loanType}` };
  }

  const loan = metrics.getLatest(LOAN_SIZE_METRICS[loanType]);
  if (!loan || loan.value === null) {
    return { error: `No loan data found for ${loanType}` };
  }
  const earnings = metrics.getLatest(EARNINGS_METRIC);
  if (!earnings || earnings.value === null) {
    return { error: 'No earnings data found' };
  }
  const rate = metrics.getLatest(MORTGAGE_RATE_METRIC);
  if (!rate || rate.value === null) {
    return { error: 'No mortgage rate data found' };
  }

  // loan sizes are published in thousands of dollars
  const loanAmount = loan.value * 1000;
  const annualIncome = earnings.value * 52 * (dualIncome ? 2 : 1);
  const monthly = monthlyRepayment(loanAmount, rate.value);
  const annual = monthly * 12;
  const repaymentToIncome = (annual / annualIncome) * 100;
  const stress = classifyMortgageStress(repaymentToIncome);

  return {
    loan_type: loanType,
    dual_income: dualIncome,
    inputs: {
      loan_amount: loanAmount,
      loan_period: loan.period,
      weekly_earnings: earnings.value,
      earnings_period: earnings.period,
      annual_income: annualIncome,
      interest_rate: rate.value,
      rate_period: rate.period
    },
    repayment: {
      monthly: round(monthly, 2),
      annual: round(annual, 2),
      percent_of_income: round(repaymentToIncome, 1)
    },
    ratios: {
      debt_to_income: round(loanAmount / annualIncome, 2)
    },
    assessment: {
      stress_level: stress.level,
      description: stress.description
    }
  };
}

const booleanArg = z.union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')]);

export function createAnalyticsTools(metrics: MetricRepository): RegisteredTool[] {
  const analyzeMetricGrowth = defineTool({
    name: 'analyze_metric_growth',
    description:
      'Analyze growth for a metric: total and percentage change, compound annual growth rate, recent period-over-period changes and min/max values.',
    parameters: objectSchema(
      {
        metric_name: { type: 'string', description: 'The metric to analyze' },
        periods: { type: 'integer', description: 'Number of recent periods to analyze (0 = all available data)' }
      },
      ['metric_name']
    ),
    schema: z.object({
      metric_name: z.string().trim().min(1, 'metric_name is required'),
      periods: z.coerce.number().int().default(0)
    }),
    handler: ({ metric_name, periods }) => analyzeGrowth(metric_name, metrics.getSeries(metric_name), periods)
  });

  const calculateAffordabilityTool = defineTool({
    name: 'calculate_affordability',
    description:
      'Calculate housing affordability from the latest average loan size, weekly earnings and variable mortgage rate: monthly repayment, share of income, debt-to-income ratio and mortgage stress level.',
    parameters: objectSchema({
      loan_type: {
        type: 'string',
        enum: Object.keys(LOAN_SIZE_METRICS),
        description: 'Loan category (default first_home_buyer)'
      },
      dual_income: { type: 'boolean', description: 'Assume two full-time incomes (default false)' }
    }),
    schema: z.object({
      loan_type: z.string().trim().default('first_home_buyer'),
      dual_income: booleanArg.default(false)
    }),
    handler: ({ loan_type, dual_income }) => calculateAffordability(metrics, loan_type, dual_income)
  });

  return [analyzeMetricGrowth, calculateAffordabilityTool];
}
