export type Role = 'user' | 'assistant';

export interface ConversationTurn {
  role: Role;
  content: string;
}

export type JsonRecord = Record<string, unknown>;

/**
 * One tool call made while answering a question: the tool name, the arguments the
 * model supplied and the payload that was fed back to it.
 */
export interface ToolInvocationRecord {
  tool: string;
  args: JsonRecord;
  result: JsonRecord;
}

export interface AgentResponse {
  agentName: string;
  content: string;
  /** Between 0 and 1. */
  confidence: number;
  sourcesUsed: string[];
  dataPoints: JsonRecord[];
  metadata: JsonRecord;
}

export interface DataSourceInfo {
  name: string;
  sourceType: 'api' | 'web' | 'file';
  url: string;
  updateFrequency: string;
  description: string;
}

export interface AgentCapabilities {
  name: string;
  description: string;
  dataSources: DataSourceInfo[];
  metricsTracked: string[];
  geographicScope: string;
  updateFrequency: string;
  exampleQuestions: string[];
}

export type CollectionStatus = 'success' | 'partial' | 'failed';

export interface CollectionSummary {
  agentName: string;
  status: CollectionStatus;
  startedAt: string;
  completedAt: string;
  recordsCollected: number;
  errors: string[];
  metadata: JsonRecord;
}

export interface ChatRequestPayload {
  message: string;
  threadId?: string;
}

export interface ChatResponsePayload {
  threadId: string;
  topic: string | null;
  response: AgentResponse;
}

export interface ThreadSummary {
  threadId: string;
  topic: string | null;
  summary: string | null;
  messageCount: number;
  isArchived: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface StoredMessage {
  sequenceNum: number;
  role: Role;
  content: string;
  agentName: string | null;
  confidence: number | null;
  sourcesUsed: string[];
  toolCalls: number;
  createdAt: string;
}

export interface ThreadDetail extends ThreadSummary {
  messages: StoredMessage[];
}
