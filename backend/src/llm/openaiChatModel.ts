import OpenAI, { AzureOpenAI } from 'openai';
import { DefaultAzureCredential, getBearerTokenProvider } from '@azure/identity';
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool
} from 'openai/resources/chat/completions';
import { config, type AppConfig } from '../config/app.js';
import { ConfigurationError, ModelRequestError } from '../utils/errors.js';
import { childLogger, errorMessage } from '../utils/logger.js';
import type { ChatCompletionRequest, ChatCompletionResult, ChatMessage, ChatModel, ToolDefinition } from './types.js';

const log = childLogger('llm');

const AZURE_SCOPE = 'https://cognitiveservices.azure.com/.default';

type ProviderSettings = Pick<
  AppConfig,
  | 'LLM_PROVIDER'
  | 'LLM_TEMPERATURE'
  | 'GITHUB_TOKEN'
  | 'GITHUB_MODEL'
  | 'GITHUB_MODELS_ENDPOINT'
  | 'AZURE_OPENAI_ENDPOINT'
  | 'AZURE_OPENAI_API_KEY'
  | 'AZURE_OPENAI_API_VERSION'
  | 'AZURE_OPENAI_CHAT_DEPLOYMENT'
  | 'OPENAI_API_KEY'
  | 'OPENAI_MODEL'
  | 'OLLAMA_ENDPOINT'
  | 'OLLAMA_MODEL'
>;

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function' as const,
            function: { name: call.name, arguments: call.arguments }
          }))
        };
      }
      return { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
  }
}

function toToolParam(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters
    }
  };
}

/** Chat completions through the openai SDK, against whichever host LLM_PROVIDER names. */
export class OpenAIChatModel implements ChatModel {
  constructor(
    private readonly client: OpenAI,
    readonly modelName: string,
    private readonly temperature: number = config.LLM_TEMPERATURE
  ) {}

  async complete(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    const tools = request.tools?.map(toToolParam);

    try {
      const completion = await this.client.chat.completions.create({
        model: this.modelName,
        temperature: request.temperature ?? this.temperature,
        max_tokens: request.maxTokens,
        messages: request.messages.map(toMessageParam),
        ...(tools && tools.length > 0 ? { tools } : {})
      });

      const message = completion.choices[0]?.message;
      if (!message) {
        throw new ModelRequestError(`Model ${this.modelName} returned no choices`);
      }

      return {
        content: message.content ?? '',
        toolCalls: (message.tool_calls ?? []).map((call) => ({
          id: call.id,
          name: call.function.name,
          arguments: call.function.arguments
        }))
      };
    } catch (error) {
      if (error instanceof ModelRequestError) {
        throw error;
      }
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      log.error({ model: this.modelName, status, err: errorMessage(error) }, 'Chat completion failed');
      throw new ModelRequestError(`Chat completion failed: ${errorMessage(error)}`, { cause: error, status });
    }
  }
}

export function createChatModel(settings: ProviderSettings = config): ChatModel {
  switch (settings.LLM_PROVIDER) {
    case 'azure': {
      if (!settings.AZURE_OPENAI_ENDPOINT) {
        throw new ConfigurationError('AZURE_OPENAI_ENDPOINT is required when LLM_PROVIDER=azure');
      }
      const client = settings.AZURE_OPENAI_API_KEY
        ? new AzureOpenAI({
            endpoint: settings.AZURE_OPENAI_ENDPOINT,
            apiKey: settings.AZURE_OPENAI_API_KEY,
            apiVersion: settings.AZURE_OPENAI_API_VERSION,
            deployment: settings.AZURE_OPENAI_CHAT_DEPLOYMENT
          })
        : new AzureOpenAI({
            endpoint: settings.AZURE_OPENAI_ENDPOINT,
            azureADTokenProvider: getBearerTokenProvider(new DefaultAzureCredential(), AZURE_SCOPE),
            apiVersion: settings.AZURE_OPENAI_API_VERSION,
            deployment: settings.AZURE_OPENAI_CHAT_DEPLOYMENT
          });
      return new OpenAIChatModel(client, settings.AZURE_OPENAI_CHAT_DEPLOYMENT, settings.LLM_TEMPERATURE);
    }
    case 'github': {
      if (!settings.GITHUB_TOKEN) {
        throw new ConfigurationError('GITHUB_TOKEN is required when LLM_PROVIDER=github');
      }
      const client = new OpenAI({ baseURL: settings.GITHUB_MODELS_ENDPOINT, apiKey: settings.GITHUB_TOKEN });
      return new OpenAIChatModel(client, settings.GITHUB_MODEL, settings.LLM_TEMPERATURE);
    }
    case 'ollama': {
      // Ollama ignores the key but the SDK requires one
      const client = new OpenAI({ baseURL: settings.OLLAMA_ENDPOINT, apiKey: 'ollama' });
      return new OpenAIChatModel(client, settings.OLLAMA_MODEL, settings.LLM_TEMPERATURE);
    }
    case 'openai': {
      if (!settings.OPENAI_API_KEY) {
        throw new ConfigurationError('OPENAI_API_KEY is required when LLM_PROVIDER=openai');
      }
      const client = new OpenAI({ apiKey: settings.OPENAI_API_KEY });
      return new OpenAIChatModel(client, settings.OPENAI_MODEL, settings.LLM_TEMPERATURE);
    }
  }
}

/** Builds the client on first use, so commands that never reach the model need no credentials. */
export function deferredChatModel(factory: () => ChatModel = () => createChatModel()): ChatModel {
  let model: ChatModel | null = null;
  const resolve = () => (model ??= factory());
  return {
    get modelName() {
      return resolve().modelName;
    },
    async complete(request) {
      return resolve().complete(request);
    }
  };
}
