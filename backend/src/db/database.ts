import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS data_points (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    agent_name TEXT NOT NULL,
    metric_name TEXT NOT NULL,
    value REAL,
    value_text TEXT,
    period TEXT NOT NULL,
    source TEXT NOT NULL,
    geography TEXT NOT NULL DEFAULT 'Australia',
    unit TEXT,
    extra_data TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL,
    UNIQUE (metric_name, period)
  );

  CREATE INDEX IF NOT EXISTS idx_data_points_metric_period ON data_points (metric_name, period);

  CREATE TABLE IF NOT EXISTS documents (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    agent_name TEXT NOT NULL,
    document_type TEXT NOT NULL,
    external_id TEXT NOT NULL,
    title TEXT NOT NULL,
    source_url TEXT,
    published_at TEXT,
    content TEXT NOT NULL,
    summary TEXT,
    extra_data TEXT NOT NULL DEFAULT '{}',
    collected_at TEXT NOT NULL,
    UNIQUE (document_type, external_id)
  );

  CREATE TABLE IF NOT EXISTS document_chunks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    document_id INTEGER NOT NULL REFERENCES documents (id) ON DELETE CASCADE,
    chunk_index INTEGER NOT NULL,
    content TEXT NOT NULL,
    section_name TEXT,
    char_start INTEGER,
    char_end INTEGER,
    token_count INTEGER NOT NULL,
    UNIQUE (document_id, chunk_index)
  );

  CREATE TABLE IF NOT EXISTS chat_threads (
    thread_id TEXT PRIMARY KEY,
    topic TEXT,
    summary TEXT,
    message_count INTEGER NOT NULL DEFAULT 0,
    is_archived INTEGER NOT NULL DEFAULT 0,
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS chat_messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    thread_id TEXT NOT NULL REFERENCES chat_threads (thread_id) ON DELETE CASCADE,
    sequence_num INTEGER NOT NULL,
    role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
    content TEXT NOT NULL,
    agent_name TEXT,
    confidence REAL,
    sources_used TEXT NOT NULL DEFAULT '[]',
    tool_calls INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    UNIQUE (thread_id, sequence_num)
  );

  CREATE TABLE IF NOT EXISTS collection_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    agent_name TEXT NOT NULL,
    status TEXT NOT NULL,
    started_at TEXT NOT NULL,
    completed_at TEXT,
    records_collected INTEGER NOT NULL DEFAULT 0,
    errors TEXT NOT NULL DEFAULT '[]'
  );
`;

function isMemoryPath(dbPath: string) {
  return dbPath === ':memory:' || dbPath.startsWith('file::memory:');
}

function ensureDirectoryFor(filePath: string): string {
  const absolutePath = resolve(filePath);
  const directory = dirname(absolutePath);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  return absolutePath;
}

export function openDatabase(dbPath: string): SqliteDatabase {
  const memory = isMemoryPath(dbPath);
  const db = new Database(memory ? dbPath : ensureDirectoryFor(dbPath));

  // WAL would create side files for :memory: databases
  if (!memory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  return db;
}

export function parseJsonColumn<T>(raw: string | null, fallback: T, guard: (value: unknown) => value is T): T {
  if (!raw) {
    return fallback;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return guard(parsed) ? parsed : fallback;
  } catch {
    return fallback;
  }
}
