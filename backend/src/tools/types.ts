import type { z } from 'zod';
import type { ToolDefinition } from '../llm/types.js';
import { errorMessage } from '../utils/logger.js';

export type ToolResult = Record<string, unknown>;

export interface ToolSpec<Args, Input> {
  name: string;
  description: string;
  /** JSON Schema advertised to the model. */
  parameters: Record<string, unknown>;
  /** Validates and normalizes whatever the model sent. */
  schema: z.ZodType<Args, z.ZodTypeDef, Input>;
  handler: (args: Args) => ToolResult | Promise<ToolResult>;
}

/** A tool bound to its validator. `invoke` never rejects. */
export interface RegisteredTool {
  readonly definition: ToolDefinition;
  invoke(rawArgs: unknown): Promise<ToolResult>;
}

export type ToolSet = ReadonlyMap<string, RegisteredTool>;

function describeIssues(error: z.ZodError) {
  return error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ');
}

export function defineTool<Args, Input>(spec: ToolSpec<Args, Input>): RegisteredTool {
  return {
    definition: { name: spec.name, description: spec.description, parameters: spec.parameters },
    async invoke(rawArgs: unknown): Promise<ToolResult> {
      const parsed = spec.schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        return { error: `Invalid arguments for ${spec.name}: ${describeIssues(parsed.error)}` };
      }
      try {
        return await spec.handler(parsed.data);
      } catch (error) {
        return { error: errorMessage(error) };
      }
    }
  };
}

export function objectSchema(properties: Record<string, unknown>, required: string[] = []): Record<string, unknown> {
  return {
    type: 'object',
    properties,
    required,
    additionalProperties: false
  };
}
