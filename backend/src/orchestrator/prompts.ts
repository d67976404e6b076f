import type { Agent } from '../agents/types.js';

const METRICS_LISTED = 5;

export const TOPIC_SYSTEM_PROMPT = `Generate a very short topic title (3-4 words max) that summarizes what this question is about.
Reply with ONLY the topic, nothing else. No quotes, no punctuation at the end.
Examples:
- "What is the current interest rate?" -> "Current Interest Rates"
- "How has inflation changed over the last year?" -> "Inflation Trends"
- "What did the RBA say about housing?" -> "RBA Housing Discussion"
`;

export function describeAgents(agents: readonly Agent[]): string {
  if (agents.length === 0) {
    return 'No agents registered yet.';
  }
  return agents
    .map((agent) => {
      const capabilities = agent.getCapabilities();
      const metrics = capabilities.metricsTracked.slice(0, METRICS_LISTED).join(', ');
      const more = capabilities.metricsTracked.length > METRICS_LISTED ? '...' : '';
      const example = capabilities.exampleQuestions[0] ?? 'N/A';
      return `- **${agent.name}**: ${agent.description}
  - Metrics: ${metrics}${more}
  - Example questions: ${example}`;
    })
    .join('\n');
}

export function orchestratorSystemPrompt(agentDescriptions: string, currentDate: string): string {
  return `You are the orchestrator of an economic insights assistant, a helpful AI assistant that monitors
Australian economic trends and topics that often disappear from mainstream media attention.

You have access to specialized agents that collect and analyze data on specific domains.
When a user asks a question, you should:

1. Determine which specialist agent(s) can best answer the question
2. Route the query to the appropriate agent(s)
3. Synthesize the response in a clear, informative way
4. Always cite the data sources when providing statistics

Available agents:
${agentDescriptions}

Current date: ${currentDate}

If the question is outside the scope of available agents, acknowledge this honestly
and suggest what topics you can help with.

For general greetings or meta-questions about yourself, respond directly without
routing to any agent.`;
}
