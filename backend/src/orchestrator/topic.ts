import type { ChatModel } from '../llm/types.js';
import { TOPIC_SYSTEM_PROMPT } from './prompts.js';

const ELLIPSIS = '...';

/** Strips surrounding whitespace and quote characters, then caps the length with an ellipsis. */
export function normalizeTopic(raw: string, maxLength: number): string {
  const topic = raw.trim().replace(/^["']+|["']+$/g, '');
  if (topic.length <= maxLength) {
    return topic;
  }
  return topic.slice(0, maxLength - ELLIPSIS.length) + ELLIPSIS;
}

/** A short title for a thread, from its first message. No tools are offered. */
export async function generateTopic(model: ChatModel, message: string, maxLength: number): Promise<string> {
  const reply = await model.complete({
    messages: [
      { role: 'system', content: TOPIC_SYSTEM_PROMPT },
      { role: 'user', content: message }
    ]
  });
  return normalizeTopic(reply.content, maxLength);
}
