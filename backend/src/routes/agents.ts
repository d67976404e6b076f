import type { FastifyInstance } from 'fastify';
import type { Agent } from '../agents/types.js';
import { internalError } from './errors.js';
import type { RouteDeps } from './index.js';

interface AgentParams {
  name: string;
}

function findAgent(deps: Pick<RouteDeps, 'registry'>, name: string): Agent | null {
  const byKey = deps.registry.get(name);
  if (byKey) {
    return byKey;
  }
  for (const agent of deps.registry.getAll().values()) {
    if (agent.name.toLowerCase() === name.toLowerCase()) {
      return agent;
    }
  }
  return null;
}

export async function setupAgentRoutes(app: FastifyInstance, deps: Pick<RouteDeps, 'registry'>) {
  app.get('/agents', async () => ({
    agents: [...deps.registry.getAll()].map(([key, agent]) => ({
      key,
      name: agent.name,
      description: agent.description,
      capabilities: agent.getCapabilities(),
      tools: agent.getTools().map((tool) => tool.name)
    }))
  }));

  app.post<{ Params: AgentParams }>('/agents/:name/collect', async (request, reply) => {
    const agent = findAgent(deps, request.params.name);
    if (!agent) {
      return reply.code(404).send({ error: 'Agent not found' });
    }

    try {
      return await agent.collect();
    } catch (error) {
      request.log.error({ err: error, agent: agent.name }, 'Collection failed');
      return reply.code(500).send(internalError(error));
    }
  });
}
