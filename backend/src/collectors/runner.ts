import type { CollectionStatus, CollectionSummary, JsonRecord } from '../../../shared/types.js';
import type { Store } from '../db/store.js';
import { traced } from '../orchestrator/telemetry.js';
import { childLogger, errorMessage } from '../utils/logger.js';
import type { Collector } from './types.js';

const log = childLogger('collection');

export type CollectionStore = Pick<Store, 'metrics' | 'documents' | 'runs'>;

function resolveStatus(errorCount: number, succeeded: number): CollectionStatus {
  if (errorCount === 0) {
    return 'success';
  }
  return succeeded === 0 ? 'failed' : 'partial';
}

/**
 * Runs each collector in turn and persists what it returns. A failing collector is
 * recorded as `"<collector>: <message>"` and the batch carries on.
 */
export async function runCollection(
  agentName: string,
  collectors: readonly Collector[],
  store: CollectionStore
): Promise<CollectionSummary> {
  const startedAt = new Date().toISOString();
  const runId = store.runs.start(agentName, startedAt);
  const errors: string[] = [];
  const perCollector: JsonRecord[] = [];
  let recordsCollected = 0;
  let succeeded = 0;

  for (const collector of collectors) {
    try {
      const result = await traced('collector.run', () => collector.collect(), {
        'collector.name': collector.name,
        'collector.source': collector.sourceUrl
      });

      if (!result.success) {
        errors.push(`${collector.name}: ${result.errorMessage ?? 'collection failed'}`);
        perCollector.push({ collector: collector.name, success: false });
        continue;
      }

      store.metrics.upsertMany(agentName, result.records);
      for (const document of result.documents) {
        store.documents.save(agentName, document);
      }

      const count = result.records.length + result.documents.length;
      recordsCollected += count;
      succeeded += 1;
      perCollector.push({ collector: collector.name, success: true, records: count, ...result.metadata });
    } catch (error) {
      errors.push(`${collector.name}: ${errorMessage(error)}`);
      perCollector.push({ collector: collector.name, success: false });
    }
  }

  const status = resolveStatus(errors.length, succeeded);
  const completedAt = new Date().toISOString();
  store.runs.complete(runId, { status, recordsCollected, errors, completedAt });

  if (errors.length > 0) {
    log.warn({ agentName, status, errors }, 'Collection finished with errors');
  } else {
    log.info({ agentName, recordsCollected }, 'Collection finished');
  }

  return {
    agentName,
    status,
    startedAt,
    completedAt,
    recordsCollected,
    errors,
    metadata: { runId, collectors: perCollector }
  };
}
