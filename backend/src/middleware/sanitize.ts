import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';
import { isRecord } from '../utils/guards.js';

const HTML_TAG_REGEX = /<[^>]*>/g;
const SCRIPT_REGEX = /<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi;
const THREAD_ID_REGEX = /^[A-Za-z0-9_-]{1,100}$/;
export const MAX_MESSAGE_LENGTH = 10000;

/** Plain text with markup removed, line endings normalized and blank runs collapsed. */
export function cleanMessage(raw: string): string {
  let content = raw.replace(SCRIPT_REGEX, '');
  content = content.replace(/<\/?(code|pre)>/gi, '`');
  content = content.replace(HTML_TAG_REGEX, '');
  content = content.replace(/\r\n?/g, '\n');
  content = content.replace(/\u00a0/g, ' ');
  content = content
    .split('\n')
    .map((line) => line.replace(/\s+$/g, ''))
    .join('\n');
  return content.replace(/\n{3,}/g, '\n\n').trim();
}

export function sanitizeInput(request: FastifyRequest, reply: FastifyReply, done: HookHandlerDoneFunction) {
  const body: unknown = request.body;
  if (!isRecord(body)) {
    return done();
  }

  if ('message' in body) {
    if (typeof body.message !== 'string') {
      reply.code(400).send({ error: 'Message must be a string.' });
      return done();
    }
    if (body.message.length > MAX_MESSAGE_LENGTH) {
      reply.code(400).send({ error: `Message too long. Maximum ${MAX_MESSAGE_LENGTH} characters.` });
      return done();
    }
    body.message = cleanMessage(body.message);
  }

  if (body.threadId !== undefined && body.threadId !== null) {
    if (typeof body.threadId !== 'string' || !THREAD_ID_REGEX.test(body.threadId)) {
      reply.code(400).send({ error: 'Invalid thread id.' });
      return done();
    }
  }

  done();
}
