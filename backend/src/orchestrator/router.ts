import type { Agent } from '../agents/types.js';

export interface RankedAgent {
  agent: Agent;
  score: number;
}

export interface RoutingDecision {
  /** Agents with a positive score, best first. Ties keep registration order. */
  agents: RankedAgent[];
  reasoning: string;
  requiresMultiAgent: boolean;
}

export function routeQuery(agents: readonly Agent[], message: string, multiAgentThreshold: number): RoutingDecision {
  const ranked = agents
    .map((agent) => ({ agent, score: agent.matchesQuery(message) }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score);

  const strongMatches = ranked.filter((entry) => entry.score > multiAgentThreshold).length;
  const top = ranked[0];

  return {
    agents: ranked,
    reasoning: top
      ? `Routing to ${top.agent.name} based on domain keywords.`
      : 'No specific agent matched. Will provide general response.',
    requiresMultiAgent: strongMatches > 1
  };
}
