import type { FastifyInstance } from 'fastify';
import type { FastifySchema } from 'fastify';
import type { ThreadDetail } from '../../../shared/types.js';
import { config } from '../config/app.js';
import type { RouteDeps } from './index.js';

interface ThreadParams {
  id: string;
}

interface ThreadListQuery {
  limit?: number;
  includeArchived?: boolean;
}

const listSchema: FastifySchema = {
  querystring: {
    type: 'object',
    properties: {
      limit: { type: 'integer', minimum: 1, maximum: 200 },
      includeArchived: { type: 'boolean', default: false }
    }
  }
};

const threadSchema: FastifySchema = {
  params: {
    type: 'object',
    required: ['id'],
    properties: {
      id: { type: 'string', minLength: 1 }
    }
  }
};

export async function setupThreadRoutes(app: FastifyInstance, deps: Pick<RouteDeps, 'store' | 'orchestrator'>) {
  const { chats } = deps.store;

  app.get<{ Querystring: ThreadListQuery }>('/threads', { schema: listSchema }, async (request) => {
    const limit = request.query.limit ?? config.THREAD_LIST_LIMIT;
    const threads = chats.listThreads(limit, request.query.includeArchived ?? false);
    return { threads: threads.map(({ metadata: _metadata, ...summary }) => summary) };
  });

  app.get<{ Params: ThreadParams }>('/threads/:id', { schema: threadSchema }, async (request, reply) => {
    const thread = chats.getThread(request.params.id);
    if (!thread) {
      return reply.code(404).send({ error: 'Thread not found' });
    }
    const { metadata: _metadata, ...summary } = thread;
    const detail: ThreadDetail = { ...summary, messages: chats.getMessages(thread.threadId) };
    return detail;
  });

  app.post<{ Params: ThreadParams }>('/threads/:id/archive', { schema: threadSchema }, async (request, reply) => {
    const thread = chats.archiveThread(request.params.id);
    if (!thread) {
      return reply.code(404).send({ error: 'Thread not found' });
    }
    deps.orchestrator.clearThread(thread.threadId);
    return { threadId: thread.threadId, isArchived: thread.isArchived };
  });

  app.delete<{ Params: ThreadParams }>('/threads/:id', { schema: threadSchema }, async (request, reply) => {
    const deleted = chats.deleteThread(request.params.id);
    if (!deleted) {
      return reply.code(404).send({ error: 'Thread not found' });
    }
    deps.orchestrator.clearThread(request.params.id);
    return { threadId: request.params.id, deleted: true };
  });
}
