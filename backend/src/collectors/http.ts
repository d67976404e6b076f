import axios from 'axios';
import { config } from '../config/app.js';
import { errorMessage } from '../utils/logger.js';
import { withRetry } from '../utils/resilience.js';

export type HtmlFetcher = (url: string) => Promise<string>;
export type BinaryFetcher = (url: string) => Promise<ArrayBuffer>;

export interface HtmlFetcherSettings {
  userAgent: string;
  timeoutMs: number;
  maxRetries: number;
}

const defaultSettings: HtmlFetcherSettings = {
  userAgent: config.COLLECTOR_USER_AGENT,
  timeoutMs: config.COLLECTOR_TIMEOUT_MS,
  maxRetries: config.COLLECTOR_MAX_RETRIES
};

export function createHtmlFetcher(settings: HtmlFetcherSettings = defaultSettings): HtmlFetcher {
  return (url) =>
    withRetry(
      `fetch ${url}`,
      async (signal) => {
        const response = await axios.get<string>(url, {
          signal,
          responseType: 'text',
          timeout: settings.timeoutMs,
          maxRedirects: 5,
          headers: { 'User-Agent': settings.userAgent, Accept: 'text/html' }
        });
        return response.data;
      },
      { maxRetries: settings.maxRetries, timeoutMs: settings.timeoutMs }
    );
}

/** Spreadsheet downloads; same retry policy as pages. */
export function createBinaryFetcher(settings: HtmlFetcherSettings = defaultSettings): BinaryFetcher {
  return (url) =>
    withRetry(
      `fetch ${url}`,
      async (signal) => {
        const response = await axios.get<ArrayBuffer>(url, {
          signal,
          responseType: 'arraybuffer',
          timeout: settings.timeoutMs,
          maxRedirects: 5,
          headers: { 'User-Agent': settings.userAgent }
        });
        return response.data;
      },
      { maxRetries: settings.maxRetries, timeoutMs: settings.timeoutMs }
    );
}

/** The upstream answered with an HTTP error status (as opposed to a network failure). */
export function httpStatusOf(error: unknown): number | null {
  if (axios.isAxiosError(error) && error.response) {
    return error.response.status;
  }
  return null;
}

export function describeFailure(error: unknown): string {
  return httpStatusOf(error) !== null ? `HTTP error: ${errorMessage(error)}` : `Unexpected error: ${errorMessage(error)}`;
}
