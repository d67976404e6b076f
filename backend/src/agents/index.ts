import type { Collector } from '../collectors/types.js';
import type { Store } from '../db/store.js';
import type { ChatModel } from '../llm/types.js';
import { HousingAgent } from './housing.js';
import { AgentRegistry } from './registry.js';

export { AgentRegistry } from './registry.js';
export { HousingAgent } from './housing.js';
export type { Agent, QueryContext } from './types.js';

export interface DefaultRegistryDeps {
  model: ChatModel;
  store: Store;
  collectors?: Collector[];
}

export function createDefaultRegistry(deps: DefaultRegistryDeps): AgentRegistry {
  const registry = new AgentRegistry();
  registry.registerFactory(
    'housing',
    () => new HousingAgent({ model: deps.model, store: deps.store, collectors: deps.collectors })
  );
  return registry;
}
