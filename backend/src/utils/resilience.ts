import { SpanStatusCode, type Span } from '@opentelemetry/api';
import { getTracer } from '../orchestrator/telemetry.js';
import { isRecord } from './guards.js';
import { childLogger, errorMessage } from './logger.js';

const log = childLogger('retry');

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  /** Per-attempt deadline; 0 disables it. */
  timeoutMs?: number;
  retryableErrors?: string[];
}

export interface RetryInvocationContext {
  attempt: number;
}

const DEFAULT_RETRYABLE = ['ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN', '429', '502', '503', '504', 'AbortError'];

class AttemptTimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

function responseOf(error: unknown): Record<string, unknown> | null {
  if (isRecord(error) && isRecord(error.response)) {
    return error.response;
  }
  return null;
}

// message, code, name and the HTTP status, which axios nests under `response`
function errorSignals(error: unknown): string[] {
  if (!isRecord(error)) {
    return [String(error)];
  }
  const signals = [error.message, error.code, error.status, error.name, responseOf(error)?.status];
  return signals.filter((value) => value !== undefined && value !== null).map(String);
}

function isRetryable(error: unknown, retryableErrors: string[]) {
  const signals = errorSignals(error);
  return retryableErrors.some((code) => signals.some((value) => value.includes(code)));
}

/** Seconds from a numeric Retry-After header on a 429 or 503, in milliseconds. */
export function retryAfterMs(error: unknown): number | null {
  const headers = responseOf(error)?.headers;
  if (!isRecord(headers)) {
    return null;
  }
  const raw = headers['retry-after'];
  const seconds = typeof raw === 'string' || typeof raw === 'number' ? Number(raw) : Number.NaN;
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

function backoffMs(error: unknown, attempt: number, initialDelayMs: number, maxDelayMs: number) {
  const requested = retryAfterMs(error);
  const exponential = initialDelayMs * 2 ** (attempt - 1);
  return Math.min(requested ?? exponential, maxDelayMs);
}

async function runAttempt<T>(
  operation: string,
  fn: (signal: AbortSignal, context: RetryInvocationContext) => Promise<T>,
  attempt: number,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  try {
    const pending = fn(controller.signal, { attempt });
    if (timeoutMs <= 0) {
      return await pending;
    }
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new AttemptTimeoutError(operation, timeoutMs));
      }, timeoutMs);
    });
    return await Promise.race([pending, deadline]);
  } catch (error) {
    controller.abort();
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

function fail(span: Span, error: unknown): never {
  const message = errorMessage(error);
  span.recordException(error instanceof Error ? error : new Error(message));
  span.setStatus({ code: SpanStatusCode.ERROR, message });
  throw error;
}

/**
 * Runs `fn` until it succeeds, retrying transient network and upstream failures with
 * exponential backoff. A Retry-After header on the failed response takes precedence over
 * the computed delay, capped at `maxDelayMs`.
 */
export async function withRetry<T>(
  operation: string,
  fn: (signal: AbortSignal, context: RetryInvocationContext) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    timeoutMs = 30000,
    retryableErrors = DEFAULT_RETRYABLE
  } = options;

  return getTracer().startActiveSpan(`retry:${operation}`, async (span) => {
    span.setAttributes({ 'retry.operation': operation, 'retry.max': maxRetries });
    try {
      for (let attempt = 0; ; attempt += 1) {
        try {
          const result = await runAttempt(operation, fn, attempt, timeoutMs);
          if (attempt > 0) {
            log.info({ operation, attempt }, `${operation} succeeded after ${attempt} retries`);
          }
          span.setAttribute('retry.attempts', attempt);
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          span.addEvent('retry.failure', { attempt, message: errorMessage(error) });
          if (attempt >= maxRetries || !isRetryable(error, retryableErrors)) {
            fail(span, error);
          }
          const waitMs = backoffMs(error, attempt + 1, initialDelayMs, maxDelayMs);
          log.warn({ operation, attempt: attempt + 1, maxRetries, waitMs }, `${operation} failed, retrying`);
          await new Promise((resolve) => setTimeout(resolve, waitMs));
        }
      }
    } finally {
      span.end();
    }
  });
}
