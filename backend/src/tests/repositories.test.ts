import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runReadOnlyQuery } from '../db/readOnlyQuery.js';
import type { Store } from '../db/store.js';
import { memoryStore } from './helpers.js';

describe('repositories', () => {
  let store: Store;

  beforeEach(() => {
    store = memoryStore();
  });

  afterEach(() => {
    store.close();
  });

  describe('DocumentRepository', () => {
    it('creates chunks on first save and regenerates them when the document is saved again', () => {
      const first = store.documents.save('Housing Agent', {
        documentType: 'rba_minutes',
        externalId: '2024-11-05',
        title: 'Minutes',
        content: 'x'.repeat(450)
      });

      expect(first.created).toBe(true);
      expect(first.chunkCount).toBe(3);
      expect(store.documents.countChunks(first.document.id)).toBe(3);

      const second = store.documents.save('Housing Agent', {
        documentType: 'rba_minutes',
        externalId: '2024-11-05',
        title: 'Minutes (revised)',
        content: 'short revision',
        extraData: { cash_rate_decision: 4.35 }
      });

      expect(second.created).toBe(false);
      expect(second.document.id).toBe(first.document.id);
      expect(second.document.title).toBe('Minutes (revised)');
      expect(second.document.extraData).toEqual({ cash_rate_decision: 4.35 });
      expect(store.documents.getChunks(first.document.id).map((chunk) => chunk.content)).toEqual(['short revision']);
    });

    it('keeps the same external id apart across document types', () => {
      store.documents.save('Housing Agent', { documentType: 'rba_minutes', externalId: 'a', title: 'A', content: 'a' });
      store.documents.save('Housing Agent', { documentType: 'rba_statement', externalId: 'a', title: 'B', content: 'b' });

      expect(store.documents.getByExternalId('rba_minutes', 'a')?.title).toBe('A');
      expect(store.documents.getByExternalId('rba_statement', 'a')?.title).toBe('B');
    });

    it('orders by publication date with undated documents last', () => {
      for (const [externalId, publishedAt] of [
        ['undated', null],
        ['older', '2024-02-06'],
        ['newer', '2024-08-06']
      ] as const) {
        store.documents.save('Housing Agent', {
          documentType: 'rba_statement',
          externalId,
          title: externalId,
          content: externalId,
          publishedAt
        });
      }

      expect(store.documents.getByType('rba_statement', 10).map((doc) => doc.externalId)).toEqual([
        'newer',
        'older',
        'undated'
      ]);
      expect(store.documents.getLatest('rba_statement')?.externalId).toBe('newer');
      expect(store.documents.getLatest('rba_minutes')).toBeNull();
    });

    it('treats LIKE wildcards in search terms literally', () => {
      store.documents.save('Housing Agent', { documentType: 't', externalId: '1', title: 'rates', content: 'up 50%' });
      store.documents.save('Housing Agent', { documentType: 't', externalId: '2', title: 'rates', content: 'up 50 bps' });

      expect(store.documents.search('50%', null, 10).map((doc) => doc.externalId)).toEqual(['1']);
    });
  });

  describe('ChatRepository', () => {
    it('numbers messages per thread from zero and counts them', () => {
      store.chats.createThread('thread-a', 'Cash Rate');
      store.chats.addMessage('thread-a', { role: 'user', content: 'What is the cash rate?' });
      store.chats.addMessage('thread-a', {
        role: 'assistant',
        content: '4.35%',
        agentName: 'Housing Agent',
        confidence: 0.9,
        sourcesUsed: ['get_latest_metric'],
        toolCalls: 1
      });

      const messages = store.chats.getMessages('thread-a');
      expect(messages.map((message) => [message.sequenceNum, message.role, message.content])).toEqual([
        [0, 'user', 'What is the cash rate?'],
        [1, 'assistant', '4.35%']
      ]);
      expect(messages[1]).toMatchObject({
        agentName: 'Housing Agent',
        confidence: 0.9,
        sourcesUsed: ['get_latest_metric'],
        toolCalls: 1
      });
      expect(store.chats.getThread('thread-a')?.messageCount).toBe(2);
      expect(store.chats.getRecentMessages('thread-a', 1).map((message) => message.content)).toEqual(['4.35%']);
    });

    it('creates the thread when a message arrives for an unknown id', () => {
      store.chats.addMessage('thread-new', { role: 'user', content: 'hello' });

      expect(store.chats.getThread('thread-new')).toMatchObject({ topic: null, messageCount: 1, isArchived: false });
    });

    it('hides archived threads unless asked and deletes threads with their messages', () => {
      store.chats.createThread('keep');
      store.chats.createThread('old');
      store.chats.addMessage('old', { role: 'user', content: 'hi' });

      expect(store.chats.archiveThread('old')?.isArchived).toBe(true);
      expect(store.chats.listThreads(10).map((thread) => thread.threadId)).toEqual(['keep']);
      expect(store.chats.listThreads(10, true).map((thread) => thread.threadId).sort()).toEqual(['keep', 'old']);

      expect(store.chats.deleteThread('old')).toBe(true);
      expect(store.chats.getMessages('old')).toEqual([]);
      expect(store.chats.deleteThread('old')).toBe(false);
      expect(store.chats.archiveThread('missing')).toBeNull();
    });

    it('updates topic and summary', () => {
      store.chats.createThread('t');

      expect(store.chats.updateTopic('t', 'Inflation Trends')?.topic).toBe('Inflation Trends');
      expect(store.chats.updateSummary('t', 'Asked about CPI.')?.summary).toBe('Asked about CPI.');
      expect(store.chats.updateTopic('missing', 'x')).toBeNull();
    });
  });

  describe('CollectionRunRepository', () => {
    it('records a run from start to completion', () => {
      const id = store.runs.start('Housing Agent', '2024-11-05T00:00:00.000Z');

      expect(store.runs.get(id)).toMatchObject({ status: 'running', completedAt: null, errors: [] });

      const completed = store.runs.complete(id, {
        status: 'partial',
        recordsCollected: 4,
        errors: ['RBA Meeting Minutes: HTTP error'],
        completedAt: '2024-11-05T00:01:00.000Z'
      });

      expect(completed).toEqual({
        id,
        agentName: 'Housing Agent',
        status: 'partial',
        startedAt: '2024-11-05T00:00:00.000Z',
        completedAt: '2024-11-05T00:01:00.000Z',
        recordsCollected: 4,
        errors: ['RBA Meeting Minutes: HTTP error']
      });
      expect(store.runs.listRecent(5, 'Housing Agent')).toHaveLength(1);
      expect(store.runs.listRecent(5, 'Other Agent')).toHaveLength(0);
    });
  });

  describe('runReadOnlyQuery', () => {
    it('refuses statements that write', async () => {
      await expect(runReadOnlyQuery(store.db, 'DELETE FROM data_points', { maxRows: 10, timeoutMs: 10000 })).rejects.toThrow(
        'Only read-only statements that return rows can be executed'
      );
    });

    it('returns blobs as base64 with the column names', async () => {
      const result = await runReadOnlyQuery(store.db, "SELECT x'0102' AS payload", { maxRows: 10, timeoutMs: 10000 });

      expect(result).toEqual({ columns: ['payload'], rows: [{ payload: 'AQI=' }], truncated: false });
    });

    it('reads rows stored in an in-memory database and stops at the row cap', async () => {
      for (const period of ['2024-01', '2024-02', '2024-03']) {
        store.metrics.upsert('Housing Agent', { metricName: 'interest_rate_cash', value: 4.35, period, source: 'RBA' });
      }

      const result = await runReadOnlyQuery(store.db, 'SELECT period FROM data_points ORDER BY period', {
        maxRows: 2,
        timeoutMs: 10000
      });

      expect(result).toEqual({ columns: ['period'], rows: [{ period: '2024-01' }, { period: '2024-02' }], truncated: true });
    });

    it('kills a statement that never yields a row once the time limit passes', async () => {
      const started = Date.now();

      await expect(
        runReadOnlyQuery(
          store.db,
          'WITH RECURSIVE c(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM c) SELECT count(*) FROM c',
          { maxRows: 10, timeoutMs: 200 }
        )
      ).rejects.toThrow('Query exceeded the 200ms time limit');
      expect(Date.now() - started).toBeLessThan(2000);
    });
  });
});
