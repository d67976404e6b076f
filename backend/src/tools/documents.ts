import { z } from 'zod';
import type { DocumentRepository, StoredDocument } from '../db/documentRepository.js';
import { defineTool, objectSchema, type RegisteredTool } from './types.js';

export const RBA_MINUTES_TYPE = 'rba_minutes';
export const RBA_STATEMENT_TYPE = 'rba_statement';

const SUMMARY_CHARS = 500;
const EXCERPT_CHARS = 500;
const FALLBACK_EXCERPT_CHARS = 300;

function cashRateOf(document: StoredDocument): unknown {
  return document.extraData.cash_rate_decision ?? null;
}

export function createDocumentTools(documents: DocumentRepository): RegisteredTool[] {
  const getRbaMinutes = defineTool({
    name: 'get_rba_minutes',
    description:
      'Get recent RBA Monetary Policy Board meeting minutes: meeting date, decision summary and the cash rate decided.',
    parameters: objectSchema({
      limit: { type: 'integer', description: 'Number of recent meetings to return (default 3)' }
    }),
    schema: z.object({ limit: z.coerce.number().int().min(1).max(50).default(3) }),
    handler: ({ limit }) => {
      const minutes = documents.getByType(RBA_MINUTES_TYPE, limit);
      if (minutes.length === 0) {
        return { error: 'No RBA minutes found', meetings: [] };
      }
      const meetings = minutes.map((doc) => ({
        meeting_date: doc.externalId,
        title: doc.title,
        decision_summary: doc.summary ? doc.summary.slice(0, SUMMARY_CHARS) : null,
        cash_rate: cashRateOf(doc),
        source_url: doc.sourceUrl
      }));
      return { meetings, count: meetings.length };
    }
  });

  const searchRbaMinutes = defineTool({
    name: 'search_rba_minutes',
    description:
      'Search RBA meeting minutes for a topic such as "inflation", "housing" or "employment". Returns the first matching excerpt from each meeting.',
    parameters: objectSchema(
      {
        query: { type: 'string', description: 'Word or phrase to look for' },
        limit: { type: 'integer', description: 'Maximum number of meetings (default 5)' }
      },
      ['query']
    ),
    schema: z.object({
      query: z.string().trim().min(1, 'query is required'),
      limit: z.coerce.number().int().min(1).max(50).default(5)
    }),
    handler: ({ query, limit }) => {
      const needle = query.toLowerCase();
      const results = documents.search(query, RBA_MINUTES_TYPE, limit).map((doc) => {
        const match = documents.getChunks(doc.id).find((chunk) => chunk.content.toLowerCase().includes(needle));
        const excerpt = match
          ? match.content.slice(0, EXCERPT_CHARS)
          : doc.summary
            ? doc.summary.slice(0, FALLBACK_EXCERPT_CHARS)
            : null;
        return {
          meeting_date: doc.externalId,
          title: doc.title,
          relevant_excerpt: excerpt,
          section: match?.sectionName ?? null,
          cash_rate: cashRateOf(doc)
        };
      });
      return { query, results, count: results.length };
    }
  });

  return [getRbaMinutes, searchRbaMinutes];
}
