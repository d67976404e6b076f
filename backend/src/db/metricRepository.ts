import type { SqliteDatabase } from './database.js';
import { parseJsonColumn } from './database.js';
import { isRecord } from '../utils/guards.js';

export interface MetricPointInput {
  metricName: string;
  value: number | null;
  valueText?: string | null;
  period: string;
  source: string;
  geography?: string;
  unit?: string | null;
  extraData?: Record<string, unknown>;
}

export interface MetricPoint {
  id: number;
  agentName: string;
  metricName: string;
  value: number | null;
  valueText: string | null;
  period: string;
  source: string;
  geography: string;
  unit: string | null;
  extraData: Record<string, unknown>;
  createdAt: string;
}

export interface MetricSummary {
  metricName: string;
  count: number;
  earliestPeriod: string;
  latestPeriod: string;
  latestValue: number | null;
  unit: string | null;
  source: string;
}

interface DataPointRow {
  id: number;
  agent_name: string;
  metric_name: string;
  value: number | null;
  value_text: string | null;
  period: string;
  source: string;
  geography: string;
  unit: string | null;
  extra_data: string;
  created_at: string;
}

interface SummaryRow {
  metric_name: string;
  count: number;
  earliest: string;
  latest: string;
}

function toMetricPoint(row: DataPointRow): MetricPoint {
  return {
    id: row.id,
    agentName: row.agent_name,
    metricName: row.metric_name,
    value: row.value,
    valueText: row.value_text,
    period: row.period,
    source: row.source,
    geography: row.geography,
    unit: row.unit,
    extraData: parseJsonColumn(row.extra_data, {}, isRecord),
    createdAt: row.created_at
  };
}

/**
 * Metric observations, unique on (metric, period). Periods are ISO-like strings
 * (`YYYY`, `YYYY-MM`, `YYYY-MM-DD`) so lexical order is chronological order.
 */
export class MetricRepository {
  constructor(private readonly db: SqliteDatabase) {}

  /** Inserts or replaces the observation for (metric, period). */
  upsert(agentName: string, point: MetricPointInput): void {
    this.db
      .prepare<{
        agentName: string;
        metricName: string;
        value: number | null;
        valueText: string | null;
        period: string;
        source: string;
        geography: string;
        unit: string | null;
        extraData: string;
        createdAt: string;
      }>(
        `
          INSERT INTO data_points
            (agent_name, metric_name, value, value_text, period, source, geography, unit, extra_data, created_at)
          VALUES
            (@agentName, @metricName, @value, @valueText, @period, @source, @geography, @unit, @extraData, @createdAt)
          ON CONFLICT(metric_name, period) DO UPDATE SET
            agent_name = excluded.agent_name,
            value = excluded.value,
            value_text = excluded.value_text,
            source = excluded.source,
            geography = excluded.geography,
            unit = excluded.unit,
            extra_data = excluded.extra_data,
            created_at = excluded.created_at
        `
      )
      .run({
        agentName,
        metricName: point.metricName,
        value: point.value,
        valueText: point.valueText ?? null,
        period: point.period,
        source: point.source,
        geography: point.geography ?? 'Australia',
        unit: point.unit ?? null,
        extraData: JSON.stringify(point.extraData ?? {}),
        createdAt: new Date().toISOString()
      });
  }

  upsertMany(agentName: string, points: MetricPointInput[]): number {
    const insertAll = this.db.transaction((batch: MetricPointInput[]) => {
      for (const point of batch) {
        this.upsert(agentName, point);
      }
      return batch.length;
    });
    return insertAll(points);
  }

  getLatest(metricName: string): MetricPoint | null {
    const row = this.db
      .prepare<[string], DataPointRow>(`SELECT * FROM data_points WHERE metric_name = ? ORDER BY period DESC LIMIT 1`)
      .get(metricName);
    return row ? toMetricPoint(row) : null;
  }

  /** Most recent `limit` observations, newest first. */
  getRecent(metricName: string, limit: number): MetricPoint[] {
    return this.db
      .prepare<[string, number], DataPointRow>(
        `SELECT * FROM data_points WHERE metric_name = ? ORDER BY period DESC LIMIT ?`
      )
      .all(metricName, limit)
      .map(toMetricPoint);
  }

  /** Every observation, oldest first. */
  getSeries(metricName: string): MetricPoint[] {
    return this.db
      .prepare<[string], DataPointRow>(`SELECT * FROM data_points WHERE metric_name = ? ORDER BY period ASC`)
      .all(metricName)
      .map(toMetricPoint);
  }

  getRange(metricName: string, startPeriod: string, endPeriod?: string): MetricPoint[] {
    if (endPeriod) {
      return this.db
        .prepare<[string, string, string], DataPointRow>(
          `SELECT * FROM data_points WHERE metric_name = ? AND period >= ? AND period <= ? ORDER BY period ASC`
        )
        .all(metricName, startPeriod, endPeriod)
        .map(toMetricPoint);
    }
    return this.db
      .prepare<[string, string], DataPointRow>(
        `SELECT * FROM data_points WHERE metric_name = ? AND period >= ? ORDER BY period ASC`
      )
      .all(metricName, startPeriod)
      .map(toMetricPoint);
  }

  listMetricNames(): string[] {
    return this.db
      .prepare<[], { metric_name: string }>(`SELECT DISTINCT metric_name FROM data_points ORDER BY metric_name`)
      .all()
      .map((row) => row.metric_name);
  }

  summarize(): MetricSummary[] {
    const rows = this.db
      .prepare<[], SummaryRow>(
        `
          SELECT metric_name, COUNT(*) AS count, MIN(period) AS earliest, MAX(period) AS latest
          FROM data_points
          GROUP BY metric_name
          ORDER BY metric_name
        `
      )
      .all();

    return rows.map((row) => {
      const latest = this.getLatest(row.metric_name);
      return {
        metricName: row.metric_name,
        count: row.count,
        earliestPeriod: row.earliest,
        latestPeriod: row.latest,
        latestValue: latest?.value ?? null,
        unit: latest?.unit ?? null,
        source: latest?.source ?? ''
      };
    });
  }
}
