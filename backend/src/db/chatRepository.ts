import type { Role, StoredMessage, ThreadSummary } from '../../../shared/types.js';
import type { SqliteDatabase } from './database.js';
import { parseJsonColumn } from './database.js';
import { isRecord, isStringArray } from '../utils/guards.js';

export interface StoredThread extends ThreadSummary {
  metadata: Record<string, unknown>;
}

export interface NewMessage {
  role: Role;
  content: string;
  agentName?: string | null;
  confidence?: number | null;
  sourcesUsed?: string[];
  toolCalls?: number;
}

interface ThreadRow {
  thread_id: string;
  topic: string | null;
  summary: string | null;
  message_count: number;
  is_archived: number;
  metadata: string;
  created_at: string;
  updated_at: string;
}

interface MessageRow {
  sequence_num: number;
  role: Role;
  content: string;
  agent_name: string | null;
  confidence: number | null;
  sources_used: string;
  tool_calls: number;
  created_at: string;
}

function toThread(row: ThreadRow): StoredThread {
  return {
    threadId: row.thread_id,
    topic: row.topic,
    summary: row.summary,
    messageCount: row.message_count,
    isArchived: row.is_archived === 1,
    metadata: parseJsonColumn(row.metadata, {}, isRecord),
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function toMessage(row: MessageRow): StoredMessage {
  return {
    sequenceNum: row.sequence_num,
    role: row.role,
    content: row.content,
    agentName: row.agent_name,
    confidence: row.confidence,
    sourcesUsed: parseJsonColumn(row.sources_used, [], isStringArray),
    toolCalls: row.tool_calls,
    createdAt: row.created_at
  };
}

/** Conversation threads and their messages. Every write commits on its own. */
export class ChatRepository {
  constructor(private readonly db: SqliteDatabase) {}

  createThread(threadId: string, topic: string | null = null, metadata: Record<string, unknown> = {}): StoredThread {
    const now = new Date().toISOString();
    this.db
      .prepare<{ threadId: string; topic: string | null; metadata: string; now: string }>(
        `
          INSERT INTO chat_threads (thread_id, topic, metadata, created_at, updated_at)
          VALUES (@threadId, @topic, @metadata, @now, @now)
        `
      )
      .run({ threadId, topic, metadata: JSON.stringify(metadata), now });

    const created = this.getThread(threadId);
    if (!created) {
      throw new Error(`Thread ${threadId} could not be created`);
    }
    return created;
  }

  getThread(threadId: string): StoredThread | null {
    const row = this.db.prepare<[string], ThreadRow>(`SELECT * FROM chat_threads WHERE thread_id = ?`).get(threadId);
    return row ? toThread(row) : null;
  }

  getOrCreateThread(threadId: string, topic: string | null = null): StoredThread {
    return this.getThread(threadId) ?? this.createThread(threadId, topic);
  }

  /** Active threads, most recently updated first. */
  listThreads(limit: number, includeArchived = false): StoredThread[] {
    return this.db
      .prepare<[number, number], ThreadRow>(
        `
          SELECT * FROM chat_threads
          WHERE is_archived = 0 OR ? = 1
          ORDER BY updated_at DESC, created_at DESC
          LIMIT ?
        `
      )
      .all(includeArchived ? 1 : 0, limit)
      .map(toThread);
  }

  updateTopic(threadId: string, topic: string): StoredThread | null {
    return this.updateColumn(threadId, 'topic', topic);
  }

  updateSummary(threadId: string, summary: string): StoredThread | null {
    return this.updateColumn(threadId, 'summary', summary);
  }

  archiveThread(threadId: string): StoredThread | null {
    const result = this.db
      .prepare<[string, string]>(`UPDATE chat_threads SET is_archived = 1, updated_at = ? WHERE thread_id = ?`)
      .run(new Date().toISOString(), threadId);
    return result.changes > 0 ? this.getThread(threadId) : null;
  }

  deleteThread(threadId: string): boolean {
    const remove = this.db.transaction((id: string) => {
      this.db.prepare<[string]>(`DELETE FROM chat_messages WHERE thread_id = ?`).run(id);
      return this.db.prepare<[string]>(`DELETE FROM chat_threads WHERE thread_id = ?`).run(id).changes > 0;
    });
    return remove(threadId);
  }

  /**
   * Appends a message with the next sequence number and bumps the thread's counters.
   * The thread is created when it does not exist yet.
   */
  addMessage(threadId: string, message: NewMessage): StoredMessage {
    const append = this.db.transaction((): StoredMessage => {
      const thread = this.getOrCreateThread(threadId);
      const now = new Date().toISOString();
      const sequenceNum = thread.messageCount;

      this.db
        .prepare<{
          threadId: string;
          sequenceNum: number;
          role: Role;
          content: string;
          agentName: string | null;
          confidence: number | null;
          sourcesUsed: string;
          toolCalls: number;
          now: string;
        }>(
          `
            INSERT INTO chat_messages
              (thread_id, sequence_num, role, content, agent_name, confidence, sources_used, tool_calls, created_at)
            VALUES
              (@threadId, @sequenceNum, @role, @content, @agentName, @confidence, @sourcesUsed, @toolCalls, @now)
          `
        )
        .run({
          threadId,
          sequenceNum,
          role: message.role,
          content: message.content,
          agentName: message.agentName ?? null,
          confidence: message.confidence ?? null,
          sourcesUsed: JSON.stringify(message.sourcesUsed ?? []),
          toolCalls: message.toolCalls ?? 0,
          now
        });

      this.db
        .prepare<[string, string]>(
          `UPDATE chat_threads SET message_count = message_count + 1, updated_at = ? WHERE thread_id = ?`
        )
        .run(now, threadId);

      return {
        sequenceNum,
        role: message.role,
        content: message.content,
        agentName: message.agentName ?? null,
        confidence: message.confidence ?? null,
        sourcesUsed: message.sourcesUsed ?? [],
        toolCalls: message.toolCalls ?? 0,
        createdAt: now
      };
    });

    return append();
  }

  getMessages(threadId: string, limit?: number): StoredMessage[] {
    if (limit === undefined) {
      return this.db
        .prepare<[string], MessageRow>(`SELECT * FROM chat_messages WHERE thread_id = ? ORDER BY sequence_num ASC`)
        .all(threadId)
        .map(toMessage);
    }
    return this.db
      .prepare<[string, number], MessageRow>(
        `SELECT * FROM chat_messages WHERE thread_id = ? ORDER BY sequence_num ASC LIMIT ?`
      )
      .all(threadId, limit)
      .map(toMessage);
  }

  /** The last `count` messages, in conversation order. */
  getRecentMessages(threadId: string, count: number): StoredMessage[] {
    return this.db
      .prepare<[string, number], MessageRow>(
        `SELECT * FROM chat_messages WHERE thread_id = ? ORDER BY sequence_num DESC LIMIT ?`
      )
      .all(threadId, count)
      .map(toMessage)
      .reverse();
  }

  private updateColumn(threadId: string, column: 'topic' | 'summary', value: string): StoredThread | null {
    const result = this.db
      .prepare<[string, string, string]>(`UPDATE chat_threads SET ${column} = ?, updated_at = ? WHERE thread_id = ?`)
      .run(value, new Date().toISOString(), threadId);
    return result.changes > 0 ? this.getThread(threadId) : null;
  }
}
