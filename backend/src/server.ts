import { createDefaultRegistry } from './agents/index.js';
import { buildApp } from './app.js';
import { config } from './config/app.js';
import { createStore } from './db/store.js';
import { deferredChatModel } from './llm/openaiChatModel.js';
import { Orchestrator } from './orchestrator/index.js';
import { shutdownTracing } from './orchestrator/telemetry.js';

const store = createStore();
const model = deferredChatModel();
const registry = createDefaultRegistry({ model, store });
const orchestrator = new Orchestrator({ model, registry, chats: store.chats });

const app = await buildApp({ orchestrator, registry, store });

async function shutdown(signal: NodeJS.Signals) {
  app.log.info({ signal }, 'Shutting down');
  try {
    await app.close();
    await shutdownTracing();
  } finally {
    store.close();
  }
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        app.log.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
  });
}

try {
  await app.listen({ port: config.PORT, host: config.HOST });
  app.log.info(`Econ insight API listening on http://${config.HOST}:${config.PORT}`);
} catch (error) {
  app.log.error({ err: error }, 'Server failed to start');
  store.close();
  process.exit(1);
}
