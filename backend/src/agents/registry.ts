import type { AgentCapabilities } from '../../../shared/types.js';
import type { Agent } from './types.js';

export type AgentFactory = () => Agent;

export interface DomainMatch {
  key: string;
  agent: Agent;
  score: number;
}

/**
 * Agents by registry key. Factories are instantiated on first lookup and cached;
 * iteration follows registration order.
 */
export class AgentRegistry {
  private readonly order: string[] = [];
  private readonly instances = new Map<string, Agent>();
  private readonly factories = new Map<string, AgentFactory>();

  register(key: string, agent: Agent): void {
    this.remember(key);
    this.instances.set(key, agent);
  }

  registerFactory(key: string, factory: AgentFactory): void {
    this.remember(key);
    this.factories.set(key, factory);
  }

  get(key: string): Agent | null {
    const existing = this.instances.get(key);
    if (existing) {
      return existing;
    }
    const factory = this.factories.get(key);
    if (!factory) {
      return null;
    }
    const agent = factory();
    this.instances.set(key, agent);
    return agent;
  }

  /** Every agent, instantiating pending factories. */
  getAll(): Map<string, Agent> {
    const all = new Map<string, Agent>();
    for (const key of this.order) {
      const agent = this.get(key);
      if (agent) {
        all.set(key, agent);
      }
    }
    return all;
  }

  listAgents(): string[] {
    return [...this.order];
  }

  get size(): number {
    return this.order.length;
  }

  getCapabilities(key: string): AgentCapabilities | null {
    return this.get(key)?.getCapabilities() ?? null;
  }

  getAllCapabilities(): Record<string, AgentCapabilities> {
    const capabilities: Record<string, AgentCapabilities> = {};
    for (const [key, agent] of this.getAll()) {
      capabilities[key] = agent.getCapabilities();
    }
    return capabilities;
  }

  /**
   * Looser discovery than `Agent.matchesQuery`: a keyword found verbatim in the query
   * scores 1, one that overlaps a query word scores 0.5. Zero scores are dropped.
   */
  findByDomain(query: string): DomainMatch[] {
    const lowered = query.toLowerCase();
    const words = new Set(lowered.split(/\s+/).filter(Boolean));
    const matches: DomainMatch[] = [];

    for (const [key, agent] of this.getAll()) {
      let score = 0;
      for (const keyword of agent.domainKeywords) {
        const term = keyword.toLowerCase();
        if (lowered.includes(term)) {
          score += 1;
        } else if ([...words].some((word) => term.includes(word) || word.includes(term))) {
          score += 0.5;
        }
      }
      if (score > 0) {
        matches.push({ key, agent, score });
      }
    }

    return matches.sort((a, b) => b.score - a.score);
  }

  private remember(key: string) {
    if (!this.order.includes(key)) {
      this.order.push(key);
    }
  }
}
