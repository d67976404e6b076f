import { config } from '../config/app.js';
import { ChatRepository } from './chatRepository.js';
import { CollectionRunRepository } from './collectionRunRepository.js';
import { openDatabase, type SqliteDatabase } from './database.js';
import { DocumentRepository, type ChunkingSettings } from './documentRepository.js';
import { MetricRepository } from './metricRepository.js';

export interface Store {
  db: SqliteDatabase;
  chats: ChatRepository;
  metrics: MetricRepository;
  documents: DocumentRepository;
  runs: CollectionRunRepository;
  close(): void;
}

export interface StoreOptions {
  chunking?: ChunkingSettings;
}

export function createStore(dbPath: string = config.DATABASE_PATH, options: StoreOptions = {}): Store {
  const db = openDatabase(dbPath);
  const chunking = options.chunking ?? { chunkSize: config.CHUNK_SIZE, overlap: config.CHUNK_OVERLAP };

  return {
    db,
    chats: new ChatRepository(db),
    metrics: new MetricRepository(db),
    documents: new DocumentRepository(db, chunking),
    runs: new CollectionRunRepository(db),
    close: () => db.close()
  };
}
