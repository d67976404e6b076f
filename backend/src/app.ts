import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config } from './config/app.js';
import { originPolicy, type OriginPolicy } from './config/cors.js';
import { sanitizeInput } from './middleware/sanitize.js';
import { registerRoutes, type RouteDeps } from './routes/index.js';
import { loggerOptions } from './utils/logger.js';

export interface BuildAppOptions extends RouteDeps {
  origins?: OriginPolicy;
  rateLimitMax?: number;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: loggerOptions });
  const origins = options.origins ?? originPolicy;

  await app.register(cors, {
    origin: (origin, cb) => {
      if (origins.isAllowed(origin)) {
        cb(null, true);
        return;
      }
      app.log.warn({ origin, allowedOrigins: origins.allowedOrigins }, 'CORS origin rejected');
      cb(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    credentials: true
  });

  await app.register(rateLimit, {
    max: options.rateLimitMax ?? config.RATE_LIMIT_MAX_REQUESTS,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
    errorResponseBuilder: () => ({
      error: 'Too many requests',
      message: 'Please try again later.'
    })
  });

  app.addHook('preHandler', sanitizeInput);

  app.addHook('onRequest', async (request, reply) => {
    // collection runs fetch several upstream pages and may legitimately take longer
    if (request.method === 'POST' && request.url.endsWith('/collect')) {
      return;
    }

    const timer = setTimeout(() => {
      if (!reply.sent) {
        reply.code(408).send({ error: 'Request timeout' });
      }
    }, config.REQUEST_TIMEOUT_MS);
    timer.unref();

    reply.raw.on('close', () => clearTimeout(timer));
    reply.raw.on('finish', () => clearTimeout(timer));
  });

  await registerRoutes(app, options);
  return app;
}
