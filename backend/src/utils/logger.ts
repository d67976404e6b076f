import pino from 'pino';
import { config, isDevelopment } from '../config/app.js';

export const loggerOptions = {
  level: config.LOG_LEVEL,
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname'
        }
      }
    : undefined
};

export const logger = pino(loggerOptions);

export function childLogger(component: string) {
  return logger.child({ component });
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
