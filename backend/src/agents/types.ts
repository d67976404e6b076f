import type { AgentCapabilities, AgentResponse, CollectionSummary } from '../../../shared/types.js';
import type { ToolDefinition } from '../llm/types.js';

export interface QueryContext {
  /** Pre-fetch headline data into the system prompt before the model sees the question. */
  forceFetch?: boolean;
  threadId?: string;
  messageCount?: number;
  routingScore?: number;
}

/**
 * A domain specialist. Implementations are looked up by name through the registry and
 * never share a base class.
 */
export interface Agent {
  readonly name: string;
  readonly description: string;
  readonly domainKeywords: readonly string[];
  getCapabilities(): AgentCapabilities;
  collect(): Promise<CollectionSummary>;
  query(question: string, context?: QueryContext): Promise<AgentResponse>;
  getTools(): ToolDefinition[];
  matchesQuery(query: string): number;
}

/**
 * Share of `keywords` that occur in the query as case-insensitive substrings, capped at 1.
 * No keywords means no match.
 */
export function keywordMatchScore(query: string, keywords: readonly string[]): number {
  if (keywords.length === 0) {
    return 0;
  }
  const lowered = query.toLowerCase();
  const matches = keywords.filter((keyword) => lowered.includes(keyword.toLowerCase())).length;
  return Math.min(matches / keywords.length, 1);
}

export function freezeResponse(response: AgentResponse): Readonly<AgentResponse> {
  Object.freeze(response.sourcesUsed);
  Object.freeze(response.dataPoints);
  Object.freeze(response.metadata);
  return Object.freeze(response);
}
