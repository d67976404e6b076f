import { randomUUID } from 'node:crypto';
import type { ConversationTurn, JsonRecord } from '../../../shared/types.js';
import type { ChatRepository, NewMessage } from '../db/chatRepository.js';

export interface ConversationThread {
  threadId: string;
  topic: string | null;
  /** Append-only. */
  turns: ConversationTurn[];
  createdAt: Date;
  lastActive: Date;
  metadata: JsonRecord;
}

/** `thread_<yyyyMMdd>_<HHmmss>_<8 hex chars>`, timestamp in UTC. */
export function generateThreadId(now: Date = new Date(), suffix: string = randomUUID().slice(0, 8)): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
  return `thread_${stamp}_${suffix}`;
}

/**
 * In-memory cache of live threads over the chat repository. Each turn is written to
 * the store as it is appended.
 */
export class ThreadManager {
  private readonly cache = new Map<string, ConversationThread>();

  constructor(
    private readonly chats: ChatRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Cache, then store, then a new thread persisted under `threadId` or a generated id. */
  resolve(threadId?: string): ConversationThread {
    if (threadId) {
      const cached = this.cache.get(threadId);
      if (cached) {
        cached.lastActive = this.now();
        return cached;
      }

      const stored = this.chats.getThread(threadId);
      if (stored) {
        const thread: ConversationThread = {
          threadId: stored.threadId,
          topic: stored.topic,
          turns: this.chats.getMessages(threadId).map(({ role, content }) => ({ role, content })),
          createdAt: new Date(stored.createdAt),
          lastActive: new Date(stored.updatedAt),
          metadata: stored.metadata
        };
        this.cache.set(thread.threadId, thread);
        return thread;
      }
    }

    const created = this.chats.createThread(threadId ?? generateThreadId(this.now()));
    const thread: ConversationThread = {
      threadId: created.threadId,
      topic: null,
      turns: [],
      createdAt: new Date(created.createdAt),
      lastActive: new Date(created.updatedAt),
      metadata: {}
    };
    this.cache.set(thread.threadId, thread);
    return thread;
  }

  setTopic(thread: ConversationThread, topic: string): void {
    this.chats.updateTopic(thread.threadId, topic);
    thread.topic = topic;
  }

  /** Persists the turn first; the in-memory thread only grows once the write committed. */
  append(thread: ConversationThread, message: NewMessage): void {
    this.chats.addMessage(thread.threadId, message);
    thread.turns.push({ role: message.role, content: message.content });
    thread.lastActive = this.now();
  }

  get(threadId: string): ConversationThread | null {
    return this.cache.get(threadId) ?? null;
  }

  /** Turns from the cache, or from the store when the thread is not loaded. */
  history(threadId: string): ConversationTurn[] {
    const cached = this.cache.get(threadId);
    if (cached) {
      return cached.turns.map((turn) => ({ ...turn }));
    }
    return this.chats.getMessages(threadId).map(({ role, content }) => ({ role, content }));
  }

  /** Drops the cache entry only; stored turns are untouched. */
  clear(threadId: string): boolean {
    return this.cache.delete(threadId);
  }
}
