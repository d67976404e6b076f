import { createAbsCollectors } from './abs.js';
import { createBinaryFetcher, createHtmlFetcher, type BinaryFetcher, type HtmlFetcher } from './http.js';
import { RbaCashRateCollector, RbaMinutesCollector, RbaStatementCollector } from './rba.js';
import { createRbaTableCollector, RBA_TABLES } from './rbaTables.js';
import type { Collector } from './types.js';

export type { Collector, CollectorResult } from './types.js';

export interface HousingFetchers {
  fetchHtml?: HtmlFetcher;
  fetchBinary?: BinaryFetcher;
}

/** RBA pages and statistical tables, then the ABS release workbooks. */
export function createHousingCollectors(fetchers: HousingFetchers = {}): Collector[] {
  const fetchHtml = fetchers.fetchHtml ?? createHtmlFetcher();
  const fetchBinary = fetchers.fetchBinary ?? createBinaryFetcher();
  return [
    new RbaCashRateCollector(fetchHtml),
    ...RBA_TABLES.map((table) => createRbaTableCollector(table, fetchBinary)),
    new RbaMinutesCollector(fetchHtml),
    new RbaStatementCollector(fetchHtml),
    ...createAbsCollectors(fetchBinary)
  ];
}
