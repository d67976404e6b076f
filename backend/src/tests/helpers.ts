import type { AgentCapabilities, AgentResponse, CollectionSummary } from '../../../shared/types.js';
import type { Agent, QueryContext } from '../agents/types.js';
import { keywordMatchScore } from '../agents/types.js';
import { createStore, type Store } from '../db/store.js';
import type { ChatCompletionRequest, ChatCompletionResult, ChatModel, ToolCallRequest } from '../llm/types.js';

/** Replies with queued results in order and keeps every request it was sent. */
export class ScriptedChatModel implements ChatModel {
  readonly modelName = 'scripted-model';
  readonly requests: ChatCompletionRequest[] = [];
  private readonly replies: ChatCompletionResult[];

  constructor(replies: Array<ChatCompletionResult | string> = []) {
    this.replies = replies.map((reply) => (typeof reply === 'string' ? text(reply) : reply));
  }

  enqueue(...replies: Array<ChatCompletionResult | string>) {
    for (const reply of replies) {
      this.replies.push(typeof reply === 'string' ? text(reply) : reply);
    }
  }

  async complete(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const next = this.replies.shift();
    if (!next) {
      throw new Error('No scripted reply left');
    }
    return next;
  }
}

export function text(content: string): ChatCompletionResult {
  return { content, toolCalls: [] };
}

export function toolCalls(...calls: Array<[name: string, args: string]>): ChatCompletionResult {
  const requests: ToolCallRequest[] = calls.map(([name, args], index) => ({
    id: `call_${index + 1}`,
    name,
    arguments: args
  }));
  return { content: '', toolCalls: requests };
}

export function memoryStore(): Store {
  return createStore(':memory:', { chunking: { chunkSize: 200, overlap: 20 } });
}

export interface StubAgentOptions {
  name: string;
  keywords?: string[];
  answer?: string;
  fail?: Error;
}

/** Keyword-routed agent that answers with a canned reply and remembers each query. */
export class StubAgent implements Agent {
  readonly name: string;
  readonly description: string;
  readonly domainKeywords: readonly string[];
  readonly queries: Array<{ question: string; context: QueryContext }> = [];
  collections = 0;

  constructor(private readonly options: StubAgentOptions) {
    this.name = options.name;
    this.description = `${options.name} for tests`;
    this.domainKeywords = options.keywords ?? [];
  }

  getCapabilities(): AgentCapabilities {
    return {
      name: this.name,
      description: this.description,
      dataSources: [],
      metricsTracked: ['metric_a'],
      geographicScope: 'Australia',
      updateFrequency: 'Never',
      exampleQuestions: []
    };
  }

  async collect(): Promise<CollectionSummary> {
    this.collections += 1;
    return {
      agentName: this.name,
      status: 'success',
      startedAt: '2024-01-01T00:00:00.000Z',
      completedAt: '2024-01-01T00:00:01.000Z',
      recordsCollected: 0,
      errors: [],
      metadata: {}
    };
  }

  async query(question: string, context: QueryContext = {}): Promise<AgentResponse> {
    this.queries.push({ question, context });
    if (this.options.fail) {
      throw this.options.fail;
    }
    return {
      agentName: this.name,
      content: this.options.answer ?? `${this.name} answer`,
      confidence: 0.9,
      sourcesUsed: ['get_latest_metric'],
      dataPoints: [{ tool: 'get_latest_metric' }],
      metadata: { toolCalls: 1, iterations: 2 }
    };
  }

  getTools() {
    return [];
  }

  matchesQuery(query: string): number {
    return keywordMatchScore(query, this.domainKeywords);
  }
}
