import { describe, expect, it, vi } from 'vitest';
import { AgentRegistry } from '../agents/registry.js';
import { keywordMatchScore } from '../agents/types.js';
import { routeQuery } from '../orchestrator/router.js';
import { StubAgent } from './helpers.js';

describe('keywordMatchScore', () => {
  it('is the share of keywords found, case-insensitively', () => {
    expect(keywordMatchScore('Mortgage RATES', ['mortgage', 'rates', 'rent', 'cpi'])).toBe(0.5);
  });

  it('is zero without keywords', () => {
    expect(keywordMatchScore('anything', [])).toBe(0);
  });
});

describe('routeQuery', () => {
  const housing = new StubAgent({ name: 'Housing', keywords: ['rent', 'mortgage', 'rates'] });
  const labour = new StubAgent({ name: 'Labour', keywords: ['jobs', 'wages', 'rates'] });

  it('ranks matching agents best first and drops non-matches', () => {
    const decision = routeQuery([labour, housing], 'mortgage rates', 0.3);

    expect(decision.agents.map((entry) => [entry.agent.name, entry.score])).toEqual([
      ['Housing', 2 / 3],
      ['Labour', 1 / 3]
    ]);
    expect(decision.reasoning).toBe('Routing to Housing based on domain keywords.');
  });

  it('flags multi-agent queries only when more than one score beats the threshold', () => {
    expect(routeQuery([housing, labour], 'rates', 0.3).requiresMultiAgent).toBe(true);
    expect(routeQuery([housing, labour], 'rates', 0.4).requiresMultiAgent).toBe(false);
  });

  it('treats a score equal to the threshold as a weak match', () => {
    const markets = new StubAgent({
      name: 'Markets',
      keywords: ['alpha', 'bravo', 'charlie', 'delta', 'echo', 'foxtrot', 'golf', 'hotel', 'india', 'juliet']
    });
    const trade = new StubAgent({
      name: 'Trade',
      keywords: ['kilo', 'lima', 'mike', 'november', 'oscar', 'papa', 'quebec', 'romeo', 'sierra', 'tango']
    });

    const decision = routeQuery([markets, trade], 'alpha bravo charlie kilo lima mike november', 0.3);

    expect(decision.agents.map((entry) => [entry.agent.name, entry.score])).toEqual([
      ['Trade', 0.4],
      ['Markets', 0.3]
    ]);
    expect(decision.requiresMultiAgent).toBe(false);
  });

  it('keeps registration order on ties', () => {
    expect(routeQuery([labour, housing], 'rates', 0.3).agents.map((entry) => entry.agent.name)).toEqual([
      'Labour',
      'Housing'
    ]);
  });

  it('explains when nothing matched', () => {
    expect(routeQuery([housing], 'hello', 0.3)).toEqual({
      agents: [],
      reasoning: 'No specific agent matched. Will provide general response.',
      requiresMultiAgent: false
    });
  });
});

describe('AgentRegistry', () => {
  it('instantiates factories lazily and only once', () => {
    const registry = new AgentRegistry();
    const factory = vi.fn(() => new StubAgent({ name: 'Housing' }));
    registry.registerFactory('housing', factory);

    expect(registry.listAgents()).toEqual(['housing']);
    expect(factory).not.toHaveBeenCalled();

    const first = registry.get('housing');
    const second = registry.get('housing');

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledOnce();
    expect(registry.get('missing')).toBeNull();
  });

  it('iterates in registration order and re-registering keeps the original slot', () => {
    const registry = new AgentRegistry();
    registry.register('b', new StubAgent({ name: 'B' }));
    registry.register('a', new StubAgent({ name: 'A' }));
    registry.register('b', new StubAgent({ name: 'B2' }));

    expect([...registry.getAll().keys()]).toEqual(['b', 'a']);
    expect(registry.get('b')?.name).toBe('B2');
    expect(registry.size).toBe(2);
    expect(Object.keys(registry.getAllCapabilities())).toEqual(['b', 'a']);
    expect(registry.getCapabilities('a')?.name).toBe('A');
  });

  it('finds agents by exact and partial keyword overlap', () => {
    const registry = new AgentRegistry();
    registry.register('housing', new StubAgent({ name: 'Housing', keywords: ['mortgage', 'rental'] }));
    registry.register('labour', new StubAgent({ name: 'Labour', keywords: ['wages', 'jobs'] }));

    const matches = registry.findByDomain('mortgage rent');

    expect(matches.map((match) => [match.key, match.score])).toEqual([['housing', 1.5]]);
  });
});
