import { z } from 'zod';
import type { SqliteDatabase } from '../db/database.js';
import { runReadOnlyQuery } from '../db/readOnlyQuery.js';
import { errorMessage } from '../utils/logger.js';
import { validateReadOnlySql } from './sqlGuard.js';
import { defineTool, objectSchema, type RegisteredTool, type ToolResult } from './types.js';

export interface SqlToolSettings {
  maxRows: number;
  timeoutMs: number;
}

const SCHEMA_DESCRIPTION = `Execute a read-only SQL query (SQLite dialect) for ad-hoc analysis not covered by other tools.
ONLY a single SELECT (or WITH ... SELECT) statement is allowed; anything else is rejected before it runs.

Table data_points: id, agent_name, metric_name, value (REAL), value_text, period ('YYYY', 'YYYY-MM' or 'YYYY-MM-DD'),
  source, geography, unit, extra_data (JSON text), created_at
Table documents: id, agent_name, document_type ('rba_minutes', 'rba_statement'), external_id (meeting date), title,
  source_url, published_at, content, summary, extra_data (JSON text, e.g. cash_rate_decision), collected_at
Table document_chunks: id, document_id, chunk_index, content, section_name, char_start, char_end, token_count

Examples:
  SELECT DISTINCT metric_name FROM data_points ORDER BY metric_name
  SELECT substr(period, 1, 4) AS year, AVG(value) AS avg_value FROM data_points
    WHERE metric_name = 'interest_rate_cash' GROUP BY year ORDER BY year
  SELECT published_at, json_extract(extra_data, '$.cash_rate_decision') AS cash_rate FROM documents
    WHERE document_type = 'rba_minutes' ORDER BY published_at DESC LIMIT 10`;

function executionHints(message: string): string[] {
  const lower = message.toLowerCase();
  const hints: string[] = [];
  if (lower.includes('no such column')) {
    hints.push('Check the column name spelling against the schema in the tool description.');
  }
  if (lower.includes('no such table')) {
    hints.push("Only 'data_points', 'documents' and 'document_chunks' tables are available.");
  }
  if (lower.includes('syntax error')) {
    hints.push('Check SQL syntax. Common issues: missing quotes, incorrect JOIN syntax.');
  }
  if (lower.includes('time limit')) {
    hints.push('Narrow the query with WHERE clauses or a LIMIT.');
  }
  return hints.length > 0 ? hints : ['Check your SQL syntax and column/table names.'];
}

export async function executeReadOnlySql(
  db: SqliteDatabase,
  sql: string,
  settings: SqlToolSettings
): Promise<ToolResult> {
  const verdict = validateReadOnlySql(sql);
  if (!verdict.ok) {
    return {
      error: verdict.message,
      rule: verdict.rule,
      query: sql,
      hint: 'This tool only allows SELECT queries. To modify data, use the collection commands.'
    };
  }

  try {
    const result = await runReadOnlyQuery(db, sql, settings);
    return {
      success: true,
      query: sql,
      row_count: result.rows.length,
      truncated: result.truncated,
      max_rows: result.truncated ? settings.maxRows : null,
      columns: result.columns,
      data: result.rows
    };
  } catch (error) {
    const message = errorMessage(error);
    return {
      error: `Query execution failed: ${message}`,
      query: sql,
      hints: executionHints(message)
    };
  }
}

export function createSqlTool(db: SqliteDatabase, settings: SqlToolSettings): RegisteredTool {
  return defineTool({
    name: 'query_database',
    description: SCHEMA_DESCRIPTION,
    parameters: objectSchema(
      { sql_query: { type: 'string', description: 'A single read-only SELECT statement' } },
      ['sql_query']
    ),
    schema: z.object({ sql_query: z.string().min(1, 'sql_query is required') }),
    handler: ({ sql_query }) => executeReadOnlySql(db, sql_query, settings)
  });
}
