export interface ToolCallRequest {
  id: string;
  name: string;
  /** Raw JSON text as produced by the model. */
  arguments: string;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; content: string; toolCallId: string };

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON Schema for the arguments object. */
  parameters: Record<string, unknown>;
}

export interface ChatCompletionRequest {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  temperature?: number;
  maxTokens?: number;
}

export interface ChatCompletionResult {
  content: string;
  toolCalls: ToolCallRequest[];
}

/**
 * A stateless chat model: the whole exchange is sent on every call and the reply is
 * either text or a set of tool calls.
 */
export interface ChatModel {
  readonly modelName: string;
  complete(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
}
