import { config, isDevelopment } from './app.js';

const LOOPBACK_HOSTS = ['localhost', '127.0.0.1', '[::1]'];

function normalizeOrigin(origin: string) {
  const trimmed = origin.trim();
  if (!trimmed) {
    return '';
  }
  try {
    const url = new URL(trimmed);
    const port = url.port ? `:${url.port}` : '';
    return `${url.protocol.toLowerCase()}//${url.hostname.toLowerCase()}${port}`;
  } catch {
    return trimmed.toLowerCase();
  }
}

// localhost also admits its numeric loopback spellings
function withLoopbackAliases(origin: string): string[] {
  try {
    const url = new URL(origin.trim());
    if (url.hostname !== 'localhost') {
      return [url.origin];
    }
    const port = url.port ? `:${url.port}` : '';
    return [url.origin, `${url.protocol}//127.0.0.1${port}`, `${url.protocol}//[::1]${port}`];
  } catch {
    return [origin.trim()];
  }
}

function isLoopbackOrigin(origin: string) {
  try {
    const url = new URL(origin);
    return LOOPBACK_HOSTS.includes(url.hostname.toLowerCase()) && /^https?:$/.test(url.protocol);
  } catch {
    return false;
  }
}

export interface OriginPolicy {
  allowedOrigins: string[];
  isAllowed(origin?: string | null): boolean;
}

/**
 * Origins from a comma-separated list. Requests without an Origin header (curl, the CLI,
 * server-to-server) are always allowed.
 */
export function createOriginPolicy(csv: string, allowAnyLoopback: boolean): OriginPolicy {
  const allowed = new Set(
    csv
      .split(',')
      .filter((origin) => origin.trim())
      .flatMap(withLoopbackAliases)
      .map(normalizeOrigin)
      .filter(Boolean)
  );

  return {
    allowedOrigins: [...allowed],
    isAllowed(origin) {
      if (!origin) {
        return true;
      }
      return allowed.has(normalizeOrigin(origin)) || (allowAnyLoopback && isLoopbackOrigin(origin));
    }
  };
}

export const originPolicy = createOriginPolicy(config.CORS_ORIGIN, isDevelopment);
