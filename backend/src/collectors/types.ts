import type { JsonRecord } from '../../../shared/types.js';
import type { DocumentInput } from '../db/documentRepository.js';
import type { MetricPointInput } from '../db/metricRepository.js';

export interface CollectorResult {
  success: boolean;
  records: MetricPointInput[];
  documents: DocumentInput[];
  errorMessage?: string;
  metadata: JsonRecord;
}

/** Fetches one upstream source. Failures are reported in the result, not thrown. */
export interface Collector {
  readonly name: string;
  readonly sourceUrl: string;
  collect(): Promise<CollectorResult>;
}

export function failedResult(message: string, metadata: JsonRecord = {}): CollectorResult {
  return { success: false, records: [], documents: [], errorMessage: message, metadata };
}
