import type { JsonRecord, ToolInvocationRecord } from '../../../shared/types.js';
import type { ChatMessage, ChatModel } from '../llm/types.js';
import { traced } from '../orchestrator/telemetry.js';
import { invokeTool, toolDefinitions, type ToolSet } from '../tools/index.js';
import { isRecord } from '../utils/guards.js';
import { childLogger, errorMessage } from '../utils/logger.js';

const log = childLogger('tool-loop');

export const NO_RESPONSE_FALLBACK = 'I was unable to generate a response.';

export interface ToolLoopOptions {
  model: ChatModel;
  tools: ToolSet;
  systemPrompt: string;
  question: string;
  maxIterations: number;
  agentName?: string;
}

export interface ToolLoopOutcome {
  content: string;
  records: ToolInvocationRecord[];
  /** Distinct tool names in order of first use. */
  toolsUsed: string[];
  /** Number of model replies. */
  iterations: number;
  /** True when the loop stopped at the iteration cap instead of on a plain answer. */
  exhausted: boolean;
  messages: ChatMessage[];
}

function parseArguments(raw: string): { ok: true; args: JsonRecord } | { ok: false; error: string } {
  if (!raw.trim()) {
    return { ok: true, args: {} };
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) {
      return { ok: true, args: parsed };
    }
    return { ok: false, error: 'Invalid arguments: expected a JSON object' };
  } catch (error) {
    return { ok: false, error: `Invalid arguments: ${errorMessage(error)}` };
  }
}

/**
 * Sends the exchange to the model, executes every tool call it asks for and feeds the
 * results back, until the model answers without tool calls or `maxIterations` replies
 * have been received.
 */
export async function runToolLoop(options: ToolLoopOptions): Promise<ToolLoopOutcome> {
  const { model, tools, maxIterations } = options;
  const definitions = toolDefinitions(tools);
  const messages: ChatMessage[] = [
    { role: 'system', content: options.systemPrompt },
    { role: 'user', content: options.question }
  ];
  const records: ToolInvocationRecord[] = [];
  const toolsUsed: string[] = [];
  let iterations = 0;
  let answered = false;

  while (iterations < maxIterations) {
    const reply = await traced('agent.model_round', () => model.complete({ messages, tools: definitions }), {
      'agent.name': options.agentName ?? 'unknown',
      'agent.iteration': iterations
    });
    iterations += 1;
    messages.push({ role: 'assistant', content: reply.content, toolCalls: reply.toolCalls });

    if (reply.toolCalls.length === 0) {
      answered = true;
      break;
    }

    for (const call of reply.toolCalls) {
      const parsed = parseArguments(call.arguments);
      let result: JsonRecord;

      if (!parsed.ok) {
        result = { error: parsed.error };
      } else {
        result = await traced(`tool.${call.name}`, () => invokeTool(tools, call.name, parsed.args), {
          'tool.name': call.name
        });
        // unknown tools get an error payload but do not count as consulted data
        if (tools.has(call.name)) {
          records.push({ tool: call.name, args: parsed.args, result });
          if (!toolsUsed.includes(call.name)) {
            toolsUsed.push(call.name);
          }
        }
      }

      if ('error' in result) {
        log.debug({ tool: call.name, error: result.error }, 'Tool returned an error payload');
      }
      messages.push({ role: 'tool', content: JSON.stringify(result), toolCallId: call.id });
    }
  }

  const last = messages[messages.length - 1];
  const content = last.role === 'assistant' ? last.content : NO_RESPONSE_FALLBACK;

  if (!answered) {
    log.warn({ agent: options.agentName, iterations }, 'Tool loop reached its iteration cap');
  }

  return { content, records, toolsUsed, iterations, exhausted: !answered, messages };
}
