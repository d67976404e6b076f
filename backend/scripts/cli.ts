import { pathToFileURL } from 'node:url';
import { createDefaultRegistry } from '../src/agents/index.js';
import { config } from '../src/config/app.js';
import { createStore, type Store } from '../src/db/store.js';
import { deferredChatModel } from '../src/llm/openaiChatModel.js';
import { Orchestrator } from '../src/orchestrator/index.js';
import { shutdownTracing } from '../src/orchestrator/telemetry.js';
import { errorMessage } from '../src/utils/logger.js';

const USAGE = `Usage: npm run cli -- <command> [args]

Commands:
  agents                      List registered agents and their capabilities
  ask <question> [--thread <id>]
                              Ask a question (continues a thread when --thread is given)
  collect [agent]             Run data collection for one agent, or all of them
  threads                     List recent conversation threads
  init-db                     Create the database schema at DATABASE_PATH`;

function takeOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) {
    return undefined;
  }
  const [, value] = args.splice(index, 2);
  return value;
}

async function ask(store: Store, args: string[]) {
  const threadId = takeOption(args, '--thread');
  const question = args.join(' ').trim();
  if (!question) {
    throw new Error('ask needs a question');
  }

  const model = deferredChatModel();
  const registry = createDefaultRegistry({ model, store });
  const orchestrator = new Orchestrator({ model, registry, chats: store.chats });
  const { threadId: resolvedId, topic, response } = await orchestrator.converse(question, threadId);

  console.log(response.content);
  console.log('');
  console.log(`thread: ${resolvedId}${topic ? ` (${topic})` : ''}`);
  console.log(`routed to: ${String(response.metadata.routedTo ?? 'direct')}  confidence: ${response.confidence}`);
  if (response.sourcesUsed.length > 0) {
    console.log(`sources: ${response.sourcesUsed.join(', ')}`);
  }
}

async function collect(store: Store, args: string[]) {
  const registry = createDefaultRegistry({ model: deferredChatModel(), store });
  const keys = args.length > 0 ? args : registry.listAgents();

  for (const key of keys) {
    const agent = registry.get(key);
    if (!agent) {
      throw new Error(`Unknown agent: ${key}. Known agents: ${registry.listAgents().join(', ')}`);
    }
    console.log(`Collecting for ${agent.name}...`);
    const summary = await agent.collect();
    console.log(`  status: ${summary.status}, records: ${summary.recordsCollected}`);
    for (const error of summary.errors) {
      console.log(`  error: ${error}`);
    }
  }
}

function listAgents(store: Store) {
  const registry = createDefaultRegistry({ model: deferredChatModel(), store });
  for (const [key, capabilities] of Object.entries(registry.getAllCapabilities())) {
    console.log(`${key}: ${capabilities.name}`);
    console.log(`  ${capabilities.description}`);
    console.log(`  metrics: ${capabilities.metricsTracked.join(', ')}`);
    console.log(`  sources: ${capabilities.dataSources.map((source) => source.name).join(', ')}`);
    console.log(`  try: ${capabilities.exampleQuestions[0] ?? 'N/A'}`);
  }
}

function listThreads(store: Store) {
  const threads = store.chats.listThreads(config.THREAD_LIST_LIMIT);
  if (threads.length === 0) {
    console.log('No conversation threads yet.');
    return;
  }
  for (const thread of threads) {
    console.log(`${thread.threadId}  ${thread.messageCount} messages  ${thread.updatedAt}  ${thread.topic ?? '(no topic)'}`);
  }
}

async function main(argv: string[]) {
  const [command, ...args] = argv;
  if (!command || command === 'help' || command === '--help') {
    console.log(USAGE);
    return;
  }

  const store = createStore();
  try {
    switch (command) {
      case 'agents':
        listAgents(store);
        break;
      case 'ask':
        await ask(store, args);
        break;
      case 'collect':
        await collect(store, args);
        break;
      case 'threads':
        listThreads(store);
        break;
      case 'init-db':
        // opening the store applies the schema
        console.log(`Database ready at ${config.DATABASE_PATH}`);
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        console.log(USAGE);
        process.exitCode = 1;
    }
  } finally {
    store.close();
    await shutdownTracing();
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  });
}
