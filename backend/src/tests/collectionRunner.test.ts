import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runCollection } from '../collectors/runner.js';
import { failedResult, type Collector, type CollectorResult } from '../collectors/types.js';
import type { Store } from '../db/store.js';
import { memoryStore } from './helpers.js';

function collector(name: string, run: () => Promise<CollectorResult>): Collector {
  return { name, sourceUrl: `https://example.test/${name}`, collect: run };
}

const cashRate = collector('cash', async () => ({
  success: true,
  records: [{ metricName: 'interest_rate_cash', value: 4.35, period: '2024-11-20', source: 'RBA', unit: 'percent' }],
  documents: [],
  metadata: { content_length: 120 }
}));

const minutes = collector('minutes', async () => ({
  success: true,
  records: [],
  documents: [
    {
      documentType: 'rba_minutes',
      externalId: '2024-11-05',
      title: 'Minutes',
      content: 'The Board held the cash rate.',
      publishedAt: '2024-11-05'
    }
  ],
  metadata: {}
}));

const unreachable = collector('statements', async () => failedResult('HTTP error: Request failed with status code 503'));

const throwing = collector('broken', async () => {
  throw new Error('parser exploded');
});

describe('runCollection', () => {
  let store: Store;

  beforeEach(() => {
    store = memoryStore();
  });

  afterEach(() => {
    store.close();
  });

  it('persists everything and records a successful run', async () => {
    const summary = await runCollection('Housing Agent', [cashRate, minutes], store);

    expect(summary).toMatchObject({ agentName: 'Housing Agent', status: 'success', recordsCollected: 2, errors: [] });
    expect(summary.metadata.collectors).toEqual([
      { collector: 'cash', success: true, records: 1, content_length: 120 },
      { collector: 'minutes', success: true, records: 1 }
    ]);
    expect(store.metrics.getLatest('interest_rate_cash')?.agentName).toBe('Housing Agent');
    expect(store.documents.getByExternalId('rba_minutes', '2024-11-05')).not.toBeNull();

    const run = store.runs.get(Number(summary.metadata.runId));
    expect(run).toMatchObject({ status: 'success', recordsCollected: 2, completedAt: summary.completedAt });
  });

  it('keeps going after failures and reports a partial run', async () => {
    const summary = await runCollection('Housing Agent', [unreachable, cashRate, throwing], store);

    expect(summary.status).toBe('partial');
    expect(summary.recordsCollected).toBe(1);
    expect(summary.errors).toEqual([
      'statements: HTTP error: Request failed with status code 503',
      'broken: parser exploded'
    ]);
    expect(store.runs.listRecent(1)[0]).toMatchObject({ status: 'partial', errors: summary.errors });
  });

  it('reports a failed run when no collector succeeds', async () => {
    const summary = await runCollection('Housing Agent', [unreachable, throwing], store);

    expect(summary.status).toBe('failed');
    expect(summary.recordsCollected).toBe(0);
    expect(store.metrics.listMetricNames()).toEqual([]);
  });
});
