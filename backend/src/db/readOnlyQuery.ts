import { spawn } from 'node:child_process';
import { createRequire } from 'node:module';
import { isRecord } from '../utils/guards.js';
import type { SqliteDatabase } from './database.js';

export interface ReadOnlyQueryOptions {
  maxRows: number;
  timeoutMs: number;
}

export interface ReadOnlyQueryResult {
  columns: string[];
  rows: Array<Record<string, unknown>>;
  truncated: boolean;
}

export class QueryTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Query exceeded the ${timeoutMs}ms time limit`);
    this.name = 'QueryTimeoutError';
  }
}

const driverPath = createRequire(import.meta.url).resolve('better-sqlite3');

// Runs in a separate Node process so a runaway statement can be killed mid-step.
const QUERY_PROCESS_SOURCE = `
process.once('message', (job) => {
  let db;
  let reply;
  try {
    const Database = require(job.driverPath);
    db = typeof job.source === 'string'
      ? new Database(job.source, { readonly: true, fileMustExist: true })
      : new Database(Buffer.from(job.source));
    const statement = db.prepare(job.sql);
    if (!statement.readonly || !statement.reader) {
      throw new Error('Only read-only statements that return rows can be executed');
    }
    const columns = statement.columns().map((column) => column.name);
    const rows = [];
    let truncated = false;
    for (const row of statement.iterate()) {
      if (rows.length >= job.maxRows) {
        truncated = true;
        break;
      }
      rows.push(row);
    }
    reply = { ok: true, columns, rows, truncated };
  } catch (error) {
    reply = { ok: false, message: error instanceof Error ? error.message : String(error) };
  } finally {
    if (db) db.close();
  }
  process.send(reply, () => process.exit(0));
});
`;

export function toJsonSafe(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64');
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return null;
  }
  return value;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function toResult(reply: unknown): ReadOnlyQueryResult {
  if (!isRecord(reply)) {
    throw new Error('Query process sent an unreadable reply');
  }
  if (reply.ok !== true) {
    throw new Error(typeof reply.message === 'string' ? reply.message : 'Query failed');
  }
  const { columns, rows, truncated } = reply;
  if (!isStringArray(columns) || !Array.isArray(rows) || typeof truncated !== 'boolean') {
    throw new Error('Query process sent an unreadable reply');
  }
  const safeRows = rows.filter(isRecord).map((row) => {
    const safeRow: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(row)) {
      safeRow[key] = toJsonSafe(value);
    }
    return safeRow;
  });
  return { columns, rows: safeRows, truncated };
}

/**
 * Executes one statement against a snapshot of `db` in a child process and collects up to
 * `maxRows` rows. SQLite steps cannot be interrupted from JavaScript, so the process is killed
 * once `timeoutMs` elapses. In-memory databases are shipped over as a serialized image; file
 * databases are reopened read-only.
 */
export function runReadOnlyQuery(db: SqliteDatabase, sql: string, options: ReadOnlyQueryOptions): Promise<ReadOnlyQueryResult> {
  const source: string | Buffer = db.memory ? db.serialize() : db.name;

  return new Promise((resolve, reject) => {
    const child = spawn(process.execPath, ['-e', QUERY_PROCESS_SOURCE], {
      stdio: ['ignore', 'ignore', 'ignore', 'ipc'],
      serialization: 'advanced'
    });
    let settled = false;

    const settle = (outcome: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGKILL');
      }
      outcome();
    };

    const timer = setTimeout(() => settle(() => reject(new QueryTimeoutError(options.timeoutMs))), options.timeoutMs);

    child.once('message', (reply: unknown) =>
      settle(() => {
        try {
          resolve(toResult(reply));
        } catch (error) {
          reject(error);
        }
      })
    );
    child.once('error', (error) => settle(() => reject(error)));
    // 'close' follows any pending IPC messages, so a reply is never mistaken for a crash
    child.once('close', (code, signal) =>
      settle(() => reject(new Error(`Query process exited without a result (${signal ?? `code ${String(code)}`})`)))
    );

    child.send({ driverPath, source, sql, maxRows: options.maxRows }, (error) => {
      if (error) {
        settle(() => reject(error));
      }
    });
  });
}
