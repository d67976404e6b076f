import { config } from '../config/app.js';
import type { Store } from '../db/store.js';
import type { ToolDefinition } from '../llm/types.js';
import { createAnalyticsTools } from './analytics.js';
import { createDocumentTools } from './documents.js';
import { createMetricTools } from './metrics.js';
import { createSqlTool, type SqlToolSettings } from './sqlQuery.js';
import type { RegisteredTool, ToolResult, ToolSet } from './types.js';

export type { RegisteredTool, ToolResult, ToolSet } from './types.js';

export function createToolSet(
  store: Pick<Store, 'db' | 'metrics' | 'documents'>,
  sql: SqlToolSettings = { maxRows: config.SQL_MAX_ROWS, timeoutMs: config.SQL_QUERY_TIMEOUT_MS }
): ToolSet {
  const tools: RegisteredTool[] = [
    ...createMetricTools(store.metrics),
    ...createAnalyticsTools(store.metrics),
    ...createDocumentTools(store.documents),
    createSqlTool(store.db, sql)
  ];

  const table = new Map<string, RegisteredTool>();
  for (const tool of tools) {
    if (table.has(tool.definition.name)) {
      throw new Error(`Duplicate tool name: ${tool.definition.name}`);
    }
    table.set(tool.definition.name, tool);
  }
  return table;
}

export function toolDefinitions(tools: ToolSet): ToolDefinition[] {
  return Array.from(tools.values(), (tool) => tool.definition);
}

/** Runs a tool by name; an unknown name yields an error payload rather than an exception. */
export async function invokeTool(tools: ToolSet, name: string, args: unknown): Promise<ToolResult> {
  const tool = tools.get(name);
  if (!tool) {
    return { error: `Unknown tool: ${name}` };
  }
  return tool.invoke(args);
}
