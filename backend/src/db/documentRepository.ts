import { chunkDocument } from '../documents/chunker.js';
import type { SqliteDatabase } from './database.js';
import { parseJsonColumn } from './database.js';
import { isRecord } from '../utils/guards.js';

export interface DocumentInput {
  documentType: string;
  externalId: string;
  title: string;
  content: string;
  sourceUrl?: string | null;
  publishedAt?: string | null;
  summary?: string | null;
  extraData?: Record<string, unknown>;
  /** Ordered section name to section text; when present chunks never span sections. */
  sections?: Record<string, string>;
}

export interface StoredDocument {
  id: number;
  agentName: string;
  documentType: string;
  externalId: string;
  title: string;
  sourceUrl: string | null;
  publishedAt: string | null;
  content: string;
  summary: string | null;
  extraData: Record<string, unknown>;
  collectedAt: string;
}

export interface StoredChunk {
  id: number;
  documentId: number;
  chunkIndex: number;
  content: string;
  sectionName: string | null;
  charStart: number | null;
  charEnd: number | null;
  tokenCount: number;
}

export interface SaveDocumentResult {
  document: StoredDocument;
  chunkCount: number;
  created: boolean;
}

export interface ChunkingSettings {
  chunkSize: number;
  overlap: number;
}

interface DocumentRow {
  id: number;
  agent_name: string;
  document_type: string;
  external_id: string;
  title: string;
  source_url: string | null;
  published_at: string | null;
  content: string;
  summary: string | null;
  extra_data: string;
  collected_at: string;
}

interface ChunkRow {
  id: number;
  document_id: number;
  chunk_index: number;
  content: string;
  section_name: string | null;
  char_start: number | null;
  char_end: number | null;
  token_count: number;
}

function toDocument(row: DocumentRow): StoredDocument {
  return {
    id: row.id,
    agentName: row.agent_name,
    documentType: row.document_type,
    externalId: row.external_id,
    title: row.title,
    sourceUrl: row.source_url,
    publishedAt: row.published_at,
    content: row.content,
    summary: row.summary,
    extraData: parseJsonColumn(row.extra_data, {}, isRecord),
    collectedAt: row.collected_at
  };
}

function toChunk(row: ChunkRow): StoredChunk {
  return {
    id: row.id,
    documentId: row.document_id,
    chunkIndex: row.chunk_index,
    content: row.content,
    sectionName: row.section_name,
    charStart: row.char_start,
    charEnd: row.char_end,
    tokenCount: row.token_count
  };
}

function escapeLike(term: string) {
  return term.replace(/[\\%_]/g, (match) => `\\${match}`);
}

export class DocumentRepository {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly chunking: ChunkingSettings
  ) {}

  /**
   * Stores a document keyed by (documentType, externalId). Saving an existing key
   * replaces its content and regenerates every chunk.
   */
  save(agentName: string, input: DocumentInput): SaveDocumentResult {
    const persist = this.db.transaction((): SaveDocumentResult => {
      const existing = this.getByExternalId(input.documentType, input.externalId);
      const params = {
        agentName,
        documentType: input.documentType,
        externalId: input.externalId,
        title: input.title,
        sourceUrl: input.sourceUrl ?? null,
        publishedAt: input.publishedAt ?? null,
        content: input.content,
        summary: input.summary ?? null,
        extraData: JSON.stringify(input.extraData ?? {}),
        collectedAt: new Date().toISOString()
      };

      let documentId: number;
      if (existing) {
        this.db
          .prepare<typeof params & { id: number }>(
            `
              UPDATE documents SET
                agent_name = @agentName,
                title = @title,
                source_url = @sourceUrl,
                published_at = @publishedAt,
                content = @content,
                summary = @summary,
                extra_data = @extraData,
                collected_at = @collectedAt
              WHERE id = @id AND document_type = @documentType AND external_id = @externalId
            `
          )
          .run({ ...params, id: existing.id });
        this.db.prepare<[number]>(`DELETE FROM document_chunks WHERE document_id = ?`).run(existing.id);
        documentId = existing.id;
      } else {
        const result = this.db
          .prepare<typeof params>(
            `
              INSERT INTO documents
                (agent_name, document_type, external_id, title, source_url, published_at, content, summary, extra_data, collected_at)
              VALUES
                (@agentName, @documentType, @externalId, @title, @sourceUrl, @publishedAt, @content, @summary, @extraData, @collectedAt)
            `
          )
          .run(params);
        documentId = Number(result.lastInsertRowid);
      }

      const chunks = chunkDocument(input.content, {
        chunkSize: this.chunking.chunkSize,
        overlap: this.chunking.overlap,
        sections: input.sections
      });

      const insertChunk = this.db.prepare<{
        documentId: number;
        chunkIndex: number;
        content: string;
        sectionName: string | null;
        charStart: number | null;
        charEnd: number | null;
        tokenCount: number;
      }>(
        `
          INSERT INTO document_chunks
            (document_id, chunk_index, content, section_name, char_start, char_end, token_count)
          VALUES
            (@documentId, @chunkIndex, @content, @sectionName, @charStart, @charEnd, @tokenCount)
        `
      );
      for (const chunk of chunks) {
        insertChunk.run({ documentId, ...chunk });
      }

      const document = this.getById(documentId);
      if (!document) {
        throw new Error(`Document ${documentId} vanished during save`);
      }
      return { document, chunkCount: chunks.length, created: !existing };
    });

    return persist();
  }

  getById(id: number): StoredDocument | null {
    const row = this.db.prepare<[number], DocumentRow>(`SELECT * FROM documents WHERE id = ?`).get(id);
    return row ? toDocument(row) : null;
  }

  getByExternalId(documentType: string, externalId: string): StoredDocument | null {
    const row = this.db
      .prepare<[string, string], DocumentRow>(`SELECT * FROM documents WHERE document_type = ? AND external_id = ?`)
      .get(documentType, externalId);
    return row ? toDocument(row) : null;
  }

  /** Most recently published first. */
  getByType(documentType: string, limit: number): StoredDocument[] {
    return this.db
      .prepare<[string, number], DocumentRow>(
        `
          SELECT * FROM documents
          WHERE document_type = ?
          ORDER BY published_at IS NULL, published_at DESC, external_id DESC
          LIMIT ?
        `
      )
      .all(documentType, limit)
      .map(toDocument);
  }

  getLatest(documentType: string): StoredDocument | null {
    return this.getByType(documentType, 1)[0] ?? null;
  }

  getChunks(documentId: number): StoredChunk[] {
    return this.db
      .prepare<[number], ChunkRow>(`SELECT * FROM document_chunks WHERE document_id = ? ORDER BY chunk_index ASC`)
      .all(documentId)
      .map(toChunk);
  }

  countChunks(documentId: number): number {
    const row = this.db
      .prepare<[number], { total: number }>(`SELECT COUNT(*) AS total FROM document_chunks WHERE document_id = ?`)
      .get(documentId);
    return row?.total ?? 0;
  }

  /**
   * Case-insensitive substring search over title, summary, content and chunk text.
   * `LIKE` is case-insensitive for ASCII in SQLite.
   */
  search(term: string, documentType: string | null, limit: number): StoredDocument[] {
    const pattern = `%${escapeLike(term)}%`;
    return this.db
      .prepare<{ pattern: string; documentType: string | null; limit: number }, DocumentRow>(
        `
          SELECT d.* FROM documents d
          WHERE (@documentType IS NULL OR d.document_type = @documentType)
            AND (
              d.title LIKE @pattern ESCAPE '\\'
              OR d.summary LIKE @pattern ESCAPE '\\'
              OR d.content LIKE @pattern ESCAPE '\\'
              OR EXISTS (
                SELECT 1 FROM document_chunks c
                WHERE c.document_id = d.id AND c.content LIKE @pattern ESCAPE '\\'
              )
            )
          ORDER BY d.published_at IS NULL, d.published_at DESC, d.external_id DESC
          LIMIT @limit
        `
      )
      .all({ pattern, documentType, limit })
      .map(toDocument);
  }
}
