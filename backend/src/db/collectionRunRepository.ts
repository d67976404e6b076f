import type { CollectionStatus } from '../../../shared/types.js';
import type { SqliteDatabase } from './database.js';
import { parseJsonColumn } from './database.js';
import { isStringArray } from '../utils/guards.js';

export interface CollectionRunRecord {
  id: number;
  agentName: string;
  status: CollectionStatus | 'running';
  startedAt: string;
  completedAt: string | null;
  recordsCollected: number;
  errors: string[];
}

interface RunRow {
  id: number;
  agent_name: string;
  status: CollectionStatus | 'running';
  started_at: string;
  completed_at: string | null;
  records_collected: number;
  errors: string;
}

function toRun(row: RunRow): CollectionRunRecord {
  return {
    id: row.id,
    agentName: row.agent_name,
    status: row.status,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    recordsCollected: row.records_collected,
    errors: parseJsonColumn(row.errors, [], isStringArray)
  };
}

export class CollectionRunRepository {
  constructor(private readonly db: SqliteDatabase) {}

  start(agentName: string, startedAt = new Date().toISOString()): number {
    const result = this.db
      .prepare<[string, string]>(`INSERT INTO collection_runs (agent_name, status, started_at) VALUES (?, 'running', ?)`)
      .run(agentName, startedAt);
    return Number(result.lastInsertRowid);
  }

  complete(
    runId: number,
    outcome: { status: CollectionStatus; recordsCollected: number; errors: string[]; completedAt?: string }
  ): CollectionRunRecord | null {
    this.db
      .prepare<{ id: number; status: CollectionStatus; completedAt: string; records: number; errors: string }>(
        `
          UPDATE collection_runs
          SET status = @status, completed_at = @completedAt, records_collected = @records, errors = @errors
          WHERE id = @id
        `
      )
      .run({
        id: runId,
        status: outcome.status,
        completedAt: outcome.completedAt ?? new Date().toISOString(),
        records: outcome.recordsCollected,
        errors: JSON.stringify(outcome.errors)
      });
    return this.get(runId);
  }

  get(runId: number): CollectionRunRecord | null {
    const row = this.db.prepare<[number], RunRow>(`SELECT * FROM collection_runs WHERE id = ?`).get(runId);
    return row ? toRun(row) : null;
  }

  listRecent(limit: number, agentName?: string): CollectionRunRecord[] {
    if (agentName) {
      return this.db
        .prepare<[string, number], RunRow>(
          `SELECT * FROM collection_runs WHERE agent_name = ? ORDER BY started_at DESC, id DESC LIMIT ?`
        )
        .all(agentName, limit)
        .map(toRun);
    }
    return this.db
      .prepare<[number], RunRow>(`SELECT * FROM collection_runs ORDER BY started_at DESC, id DESC LIMIT ?`)
      .all(limit)
      .map(toRun);
  }
}
