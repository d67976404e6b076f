import type { FastifyInstance } from 'fastify';
import type { FastifySchema } from 'fastify';
import type { ChatRequestPayload } from '../../../shared/types.js';
import type { AgentRegistry } from '../agents/registry.js';
import { config } from '../config/app.js';
import type { Store } from '../db/store.js';
import type { Orchestrator } from '../orchestrator/index.js';
import { setupAgentRoutes } from './agents.js';
import { internalError } from './errors.js';
import { setupThreadRoutes } from './threads.js';

export interface RouteDeps {
  orchestrator: Orchestrator;
  registry: AgentRegistry;
  store: Store;
}

const chatSchema: FastifySchema = {
  body: {
    type: 'object',
    required: ['message'],
    properties: {
      message: { type: 'string' },
      threadId: { type: 'string' }
    }
  }
};

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps) {
  app.get('/', async () => ({
    name: config.PROJECT_NAME,
    status: 'ok',
    uptimeSeconds: Math.round(process.uptime()),
    endpoints: {
      health: '/health',
      chat: '/chat',
      agents: '/agents',
      collect: '/agents/:name/collect',
      threads: '/threads',
      thread: '/threads/:id'
    }
  }));

  app.get('/health', async () => ({
    status: 'healthy',
    agents: deps.registry.listAgents(),
    timestamp: new Date().toISOString()
  }));

  app.post<{ Body: ChatRequestPayload }>('/chat', { schema: chatSchema }, async (request, reply) => {
    const { message, threadId } = request.body;

    if (!message.trim()) {
      return reply.code(400).send({ error: 'Message required.' });
    }

    try {
      return await deps.orchestrator.converse(message, threadId || undefined);
    } catch (error) {
      request.log.error({ err: error }, 'Chat request failed');
      return reply.code(500).send(internalError(error));
    }
  });

  await setupAgentRoutes(app, deps);
  await setupThreadRoutes(app, deps);
}
