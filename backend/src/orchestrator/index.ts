import type { AgentResponse, ChatResponsePayload, ConversationTurn, JsonRecord } from '../../../shared/types.js';
import type { AgentRegistry } from '../agents/registry.js';
import { freezeResponse, type Agent } from '../agents/types.js';
import { config } from '../config/app.js';
import type { ChatRepository } from '../db/chatRepository.js';
import type { ChatMessage, ChatModel } from '../llm/types.js';
import { childLogger } from '../utils/logger.js';
import { describeAgents, orchestratorSystemPrompt } from './prompts.js';
import { routeQuery, type RoutingDecision } from './router.js';
import { traced } from './telemetry.js';
import { ThreadManager, type ConversationThread } from './threads.js';
import { generateTopic } from './topic.js';

const log = childLogger('orchestrator');

export const ORCHESTRATOR_NAME = 'Orchestrator';
const DIRECT_RESPONSE_CONFIDENCE = 0.8;

export interface OrchestratorSettings {
  /** Threads with fewer prior turns than this are fresh. */
  freshThreadThreshold: number;
  multiAgentThreshold: number;
  topicMaxLength: number;
  directHistoryTurns: number;
}

export interface OrchestratorOptions {
  model: ChatModel;
  registry: AgentRegistry;
  chats: ChatRepository;
  settings?: Partial<OrchestratorSettings>;
  now?: () => Date;
}

export interface ChatOptions {
  autoTopic?: boolean;
}

const defaultSettings = (): OrchestratorSettings => ({
  freshThreadThreshold: config.FRESH_THREAD_THRESHOLD,
  multiAgentThreshold: config.MULTI_AGENT_THRESHOLD,
  topicMaxLength: config.TOPIC_MAX_LENGTH,
  directHistoryTurns: config.DIRECT_HISTORY_TURNS
});

interface Delegation {
  agent: Agent;
  score: number;
}

export class Orchestrator {
  private readonly model: ChatModel;
  private readonly registry: AgentRegistry;
  private readonly threads: ThreadManager;
  private readonly settings: OrchestratorSettings;
  private readonly now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.model = options.model;
    this.registry = options.registry;
    this.now = options.now ?? (() => new Date());
    this.threads = new ThreadManager(options.chats, this.now);
    this.settings = { ...defaultSettings(), ...options.settings };
  }

  listAgents(): Agent[] {
    return [...this.registry.getAll().values()];
  }

  /** Looks an agent up by registry key or display name. */
  getAgent(name: string): Agent | null {
    return this.registry.get(name) ?? this.listAgents().find((agent) => agent.name === name) ?? null;
  }

  getThreadHistory(threadId: string): ConversationTurn[] {
    return this.threads.history(threadId);
  }

  clearThread(threadId: string): boolean {
    return this.threads.clear(threadId);
  }

  async chat(message: string, threadId?: string, options: ChatOptions = {}): Promise<AgentResponse> {
    const { response } = await this.converse(message, threadId, options);
    return response;
  }

  /** One user turn: resolve the thread, route, answer and persist both turns. */
  converse(message: string, threadId?: string, options: ChatOptions = {}): Promise<ChatResponsePayload> {
    return traced(
      'orchestrator.chat',
      async () => {
        const thread = this.threads.resolve(threadId);
        const priorTurns = thread.turns.length;
        const fresh = priorTurns < this.settings.freshThreadThreshold;

        if ((options.autoTopic ?? true) && priorTurns === 0 && !thread.topic) {
          const topic = await generateTopic(this.model, message, this.settings.topicMaxLength);
          this.threads.setTopic(thread, topic);
        }

        this.threads.append(thread, { role: 'user', content: message });

        const agents = this.listAgents();
        const routing = routeQuery(agents, message, this.settings.multiAgentThreshold);
        const delegation = this.chooseDelegate(routing, agents, fresh);

        log.debug(
          {
            threadId: thread.threadId,
            fresh,
            routedTo: delegation?.agent.name ?? null,
            requiresMultiAgent: routing.requiresMultiAgent
          },
          routing.reasoning
        );

        const response = delegation
          ? await this.delegate(thread, message, routing, delegation, fresh)
          : await this.respondDirectly(thread, message, routing, fresh);

        return { threadId: thread.threadId, topic: thread.topic, response };
      },
      { 'chat.thread_provided': Boolean(threadId) }
    );
  }

  private chooseDelegate(routing: RoutingDecision, agents: Agent[], fresh: boolean): Delegation | null {
    const top = routing.agents[0];
    if (top) {
      return { agent: top.agent, score: top.score };
    }
    // fresh threads are always grounded in stored data when any agent exists
    if (fresh && agents.length > 0) {
      routing.reasoning = `Fresh thread: defaulting to ${agents[0].name} for data grounding.`;
      return { agent: agents[0], score: 0 };
    }
    return null;
  }

  private async delegate(
    thread: ConversationThread,
    message: string,
    routing: RoutingDecision,
    { agent, score }: Delegation,
    fresh: boolean
  ): Promise<AgentResponse> {
    const answer = await agent.query(message, {
      threadId: thread.threadId,
      messageCount: thread.turns.length,
      routingScore: score,
      forceFetch: fresh
    });

    const toolCalls = typeof answer.metadata.toolCalls === 'number' ? answer.metadata.toolCalls : 0;
    this.threads.append(thread, {
      role: 'assistant',
      content: answer.content,
      agentName: agent.name,
      confidence: answer.confidence,
      sourcesUsed: answer.sourcesUsed,
      toolCalls
    });

    const metadata: JsonRecord = {
      threadId: thread.threadId,
      topic: thread.topic,
      routedTo: agent.name,
      routingScore: score,
      routingReasoning: routing.reasoning,
      freshThread: fresh,
      forceFetch: fresh,
      ...answer.metadata
    };

    return freezeResponse({
      agentName: ORCHESTRATOR_NAME,
      content: answer.content,
      confidence: answer.confidence,
      sourcesUsed: [...answer.sourcesUsed],
      dataPoints: [...answer.dataPoints],
      metadata
    });
  }

  private async respondDirectly(
    thread: ConversationThread,
    message: string,
    routing: RoutingDecision,
    fresh: boolean
  ): Promise<AgentResponse> {
    // the current message is already the last turn; history is what came before it
    const earlier = thread.turns.slice(0, -1);
    const history = this.settings.directHistoryTurns > 0 ? earlier.slice(-this.settings.directHistoryTurns) : [];
    const currentDate = this.now().toISOString().slice(0, 10);

    const messages: ChatMessage[] = [
      { role: 'system', content: orchestratorSystemPrompt(describeAgents(this.listAgents()), currentDate) },
      ...history.map(
        (turn): ChatMessage =>
          turn.role === 'user' ? { role: 'user', content: turn.content } : { role: 'assistant', content: turn.content }
      ),
      { role: 'user', content: message }
    ];

    const reply = await this.model.complete({ messages });

    this.threads.append(thread, {
      role: 'assistant',
      content: reply.content,
      agentName: ORCHESTRATOR_NAME,
      confidence: DIRECT_RESPONSE_CONFIDENCE
    });

    return freezeResponse({
      agentName: ORCHESTRATOR_NAME,
      content: reply.content,
      confidence: DIRECT_RESPONSE_CONFIDENCE,
      sourcesUsed: [],
      dataPoints: [],
      metadata: {
        threadId: thread.threadId,
        topic: thread.topic,
        routedTo: null,
        routingReasoning: routing.reasoning,
        freshThread: fresh,
        forceFetch: false,
        directResponse: true
      }
    });
  }
}
