import { z } from 'zod';
import { config as loadEnv } from 'dotenv';

loadEnv();

const envSchema = z
  .object({
    PROJECT_NAME: z.string().default('econ-insight-agent'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().default(8787),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    LLM_PROVIDER: z.enum(['github', 'azure', 'openai', 'ollama']).default('github'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),

    GITHUB_TOKEN: z.string().optional(),
    GITHUB_MODEL: z.string().default('gpt-4o'),
    GITHUB_MODELS_ENDPOINT: z.string().url().default('https://models.inference.ai.azure.com'),

    AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
    AZURE_OPENAI_API_KEY: z.string().optional(),
    AZURE_OPENAI_API_VERSION: z.string().default('2024-10-21'),
    AZURE_OPENAI_CHAT_DEPLOYMENT: z.string().default('gpt-4o'),

    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),

    OLLAMA_ENDPOINT: z.string().url().default('http://localhost:11434/v1'),
    OLLAMA_MODEL: z.string().default('llama3.1:latest'),

    DATABASE_PATH: z.string().default('./data/econ-agent.db'),

    // Routing and conversation
    FRESH_THREAD_THRESHOLD: z.coerce.number().int().min(0).default(6),
    MULTI_AGENT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
    TOPIC_MAX_LENGTH: z.coerce.number().int().min(4).default(50),
    DIRECT_HISTORY_TURNS: z.coerce.number().int().min(0).default(10),
    THREAD_LIST_LIMIT: z.coerce.number().int().positive().default(20),

    // Agent tool loop
    AGENT_MAX_ITERATIONS: z.coerce.number().int().positive().default(5),

    // Document chunking
    CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),

    // Read-only SQL tool
    SQL_MAX_ROWS: z.coerce.number().int().positive().default(500),
    SQL_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

    // Collectors
    COLLECTOR_USER_AGENT: z.string().default('econ-insight-agent data collector'),
    COLLECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    COLLECTOR_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
    // ABS release files move with each publication
    ABS_BUILDING_APPROVALS_URL: z
      .string()
      .url()
      .default(
        'https://www.abs.gov.au/statistics/industry/building-and-construction/building-approvals-australia/nov-2025/8731006.xlsx'
      ),
    ABS_WEEKLY_EARNINGS_URL: z
      .string()
      .url()
      .default(
        'https://www.abs.gov.au/statistics/labour/earnings-and-working-conditions/average-weekly-earnings-australia/may-2025/6302001.xlsx'
      ),
    ABS_LENDING_INDICATORS_URL: z
      .string()
      .url()
      .default('https://www.abs.gov.au/statistics/economy/finance/lending-indicators/sep-quarter-2025/560101.xlsx'),

    RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(30),
    REQUEST_TIMEOUT_MS: z.coerce.number().default(120000),
    CORS_ORIGIN: z.string().default('http://localhost:5173'),

    OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
    OTEL_SERVICE_NAME: z.string().default('econ-insight-agent'),
    ENABLE_CONSOLE_TRACING: z
      .enum(['true', 'false'])
      .default('false')
      .transform((value) => value === 'true')
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP']
  });

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse({ ...process.env });
export const isDevelopment = config.NODE_ENV === 'development';
