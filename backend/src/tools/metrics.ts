import { z } from 'zod';
import type { MetricPoint, MetricRepository } from '../db/metricRepository.js';
import { defineTool, objectSchema, type RegisteredTool } from './types.js';

export const KNOWN_METRICS: Record<string, string> = {
  housing_approvals_total: 'Total dwelling unit approvals',
  housing_approvals_total_sa: 'Total dwelling unit approvals, seasonally adjusted',
  interest_rate_cash: 'RBA cash rate target',
  inflation_cpi_annual: 'Annual CPI inflation',
  inflation_trimmed_mean_annual: 'Trimmed mean (core) inflation',
  unemployment_rate: 'Unemployment rate',
  labour_force_participation_rate: 'Labour force participation rate',
  employment_to_population_ratio: 'Employment to population ratio',
  housing_lending_rate_variable_owner_occupier: 'Variable owner-occupier mortgage rate',
  housing_lending_rate_variable_investor: 'Variable investor mortgage rate',
  loan_commitments_total_number: 'New housing loan commitments (number)',
  loan_commitments_total_value: 'New housing loan commitments ($m)',
  avg_loan_size_total: 'Average new housing loan ($000)',
  avg_loan_size_first_home_buyer: 'Average first home buyer loan ($000)',
  avg_loan_size_owner_occupier: 'Average owner-occupier loan ($000)',
  avg_loan_size_investor: 'Average investor loan ($000)',
  fulltime_adult_avg_weekly_ordinary_earnings: 'Full-time adult average weekly ordinary earnings'
};

const metricCatalogue = Object.entries(KNOWN_METRICS)
  .map(([name, label]) => `- ${name}: ${label}`)
  .join('\n');

const metricNameSchema = z.string().trim().min(1, 'metric_name is required');
const limitSchema = (fallback: number) => z.coerce.number().int().min(1).max(500).default(fallback);

export function noDataError(metric: string) {
  return { error: `No data found for metric '${metric}'`, metric };
}

function timeseriesPoint(point: MetricPoint) {
  return { period: point.period, value: point.value, unit: point.unit };
}

export function createMetricTools(metrics: MetricRepository): RegisteredTool[] {
  const getLatestMetric = defineTool({
    name: 'get_latest_metric',
    description: `Get the most recent value for an economic metric.\n\nCommon metrics:\n${metricCatalogue}`,
    parameters: objectSchema({ metric_name: { type: 'string', description: 'The metric to look up' } }, ['metric_name']),
    schema: z.object({ metric_name: metricNameSchema }),
    handler: ({ metric_name }) => {
      const latest = metrics.getLatest(metric_name);
      if (!latest) {
        return noDataError(metric_name);
      }
      return {
        metric: metric_name,
        value: latest.value,
        period: latest.period,
        unit: latest.unit,
        source: latest.source,
        collected_at: latest.createdAt
      };
    }
  });

  const getMetricTimeseries = defineTool({
    name: 'get_metric_timeseries',
    description: 'Get historical values for a metric, oldest first.',
    parameters: objectSchema(
      {
        metric_name: { type: 'string', description: 'The metric to retrieve' },
        limit: { type: 'integer', description: 'Number of recent data points to return (default 12)' }
      },
      ['metric_name']
    ),
    schema: z.object({ metric_name: metricNameSchema, limit: limitSchema(12) }),
    handler: ({ metric_name, limit }) => {
      const recent = metrics.getRecent(metric_name, limit);
      if (recent.length === 0) {
        return noDataError(metric_name);
      }
      const data = [...recent].reverse().map(timeseriesPoint);
      return { metric: metric_name, data, count: data.length, source: recent[0].source };
    }
  });

  const queryMetricByPeriod = defineTool({
    name: 'query_metric_by_period',
    description: 'Query metric data for a period range. Periods look like "YYYY-MM" (e.g. "2020-01").',
    parameters: objectSchema(
      {
        metric_name: { type: 'string', description: 'The metric to query' },
        start_period: { type: 'string', description: 'Inclusive start period, e.g. "2020-01"' },
        end_period: { type: 'string', description: 'Inclusive end period; omit for the latest available' }
      },
      ['metric_name', 'start_period']
    ),
    schema: z.object({
      metric_name: metricNameSchema,
      start_period: z.string().trim().min(1, 'start_period is required'),
      end_period: z.string().trim().optional().default('')
    }),
    handler: ({ metric_name, start_period, end_period }) => {
      const points = metrics.getRange(metric_name, start_period, end_period || undefined);
      if (points.length === 0) {
        return {
          error: `No data found for ${metric_name} in period ${start_period} to ${end_period || 'now'}`,
          metric: metric_name
        };
      }
      return {
        metric: metric_name,
        period_range: { from: start_period, to: end_period || points[points.length - 1].period },
        data: points.map((point) => ({ period: point.period, value: point.value })),
        count: points.length,
        unit: points[0].unit,
        source: points[0].source
      };
    }
  });

  const listAvailableMetrics = defineTool({
    name: 'list_available_metrics',
    description: 'List every metric that has stored data. Use this before querying an unfamiliar metric.',
    parameters: objectSchema({}),
    schema: z.object({}),
    handler: () => {
      const names = metrics.listMetricNames();
      return { metrics: names, count: names.length };
    }
  });

  const getMetricsSummary = defineTool({
    name: 'get_metrics_summary',
    description:
      'Summarize all stored metrics: data point count, earliest and latest period, latest value, source and unit.',
    parameters: objectSchema({}),
    schema: z.object({}),
    handler: () => {
      const summary = metrics.summarize().map((entry) => ({
        metric_name: entry.metricName,
        description: KNOWN_METRICS[entry.metricName] ?? null,
        count: entry.count,
        earliest_period: entry.earliestPeriod,
        latest_period: entry.latestPeriod,
        latest_value: entry.latestValue,
        source: entry.source,
        unit: entry.unit
      }));
      return { metrics: summary, total_metrics: summary.length };
    }
  });

  const compareMetrics = defineTool({
    name: 'compare_metrics',
    description:
      'Compare several metrics side by side. Pass a comma-separated list, e.g. "interest_rate_cash,inflation_cpi_annual".',
    parameters: objectSchema(
      {
        metric_names: { type: 'string', description: 'Comma-separated metric names' },
        limit: { type: 'integer', description: 'Recent periods per metric (default 12)' }
      },
      ['metric_names']
    ),
    schema: z.object({ metric_names: z.string().min(1, 'metric_names is required'), limit: limitSchema(12) }),
    handler: ({ metric_names, limit }) => {
      const names = metric_names
        .split(',')
        .map((name) => name.trim())
        .filter(Boolean);

      const result: Record<string, unknown> = {};
      for (const name of names) {
        const recent = metrics.getRecent(name, limit);
        if (recent.length === 0) {
          result[name] = { error: `No data found for ${name}` };
          continue;
        }
        result[name] = {
          data: [...recent].reverse().map((point) => ({ period: point.period, value: point.value })),
          unit: recent[0].unit,
          latest: { period: recent[0].period, value: recent[0].value }
        };
      }
      return { metrics: result, count: names.length };
    }
  });

  return [
    getLatestMetric,
    getMetricTimeseries,
    listAvailableMetrics,
    getMetricsSummary,
    queryMetricByPeriod,
    compareMetrics
  ];
}
