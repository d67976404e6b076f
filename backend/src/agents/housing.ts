import type { AgentCapabilities, AgentResponse, CollectionSummary, JsonRecord } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { createHousingCollectors, type Collector } from '../collectors/index.js';
import { runCollection } from '../collectors/runner.js';
import type { Store } from '../db/store.js';
import type { ChatModel, ToolDefinition } from '../llm/types.js';
import { traced } from '../orchestrator/telemetry.js';
import { RBA_STATEMENT_TYPE } from '../tools/documents.js';
import { createToolSet, invokeTool, toolDefinitions, type ToolSet } from '../tools/index.js';
import { isRecord } from '../utils/guards.js';
import { runToolLoop } from './toolLoop.js';
import { freezeResponse, keywordMatchScore, type Agent, type QueryContext } from './types.js';

const TOOL_CATALOGUE = `Data Retrieval:
- get_latest_metric: Get the most recent value for a metric
- get_metric_timeseries: Get historical values for a metric
- list_available_metrics: List all metrics in the database
- get_metrics_summary: Get comprehensive summary of all metrics with ranges and latest values
- query_metric_by_period: Query data for a specific date range

Analysis Tools:
- analyze_metric_growth: Calculate growth rates, CAGR, and trends for any metric
- calculate_affordability: Calculate housing affordability (repayment %, stress level, DTI)
- compare_metrics: Compare multiple metrics side by side

RBA Documents:
- get_rba_minutes: Get recent RBA meeting minutes
- search_rba_minutes: Search minutes for specific topics

Flexible SQL (read-only):
- query_database: Execute custom SQL queries for ad-hoc analysis (SELECT only)
  Use this for complex queries not covered by other tools (aggregations, joins, window functions)`;

export function housingSystemPrompt(currentDate: string): string {
  return `You are the Housing Agent, a specialized analyst monitoring the Australian housing market.

IMPORTANT: You have access to a LOCAL DATABASE with real, up-to-date data. DO NOT rely on your training data.
ALWAYS use the available tools to retrieve current information before answering.

Available data sources in your database:
- Australian Bureau of Statistics (ABS): Building approvals, lending indicators, earnings
- Reserve Bank of Australia (RBA): Cash rate, inflation, housing lending rates
- RBA Meeting Minutes: Full text of recent monetary policy board meetings
- Economic indicators: Unemployment, participation, CPI

AVAILABLE TOOLS:
${TOOL_CATALOGUE}

CRITICAL INSTRUCTIONS:
1. ALWAYS call tools first to get data - never answer from memory
2. For analysis questions, use analyze_metric_growth or calculate_affordability
3. Use get_metrics_summary to discover available data
4. Cite specific numbers, dates, and sources from tool results
5. If a tool returns an error, tell the user what data is missing

Current date: ${currentDate}`;
}

export function housingSystemPromptWithData(prefetchedData: string, currentDate: string): string {
  return `You are the Housing Agent, a specialized analyst monitoring the Australian housing market.

You have been provided with CURRENT DATA from your local database below. Use this data to answer the question.
DO NOT rely on your training data - use ONLY the provided data and tool results.

=== PRE-FETCHED DATA (from database) ===
${prefetchedData}
=== END PRE-FETCHED DATA ===

You still have access to tools for additional queries if needed:

${TOOL_CATALOGUE}

INSTRUCTIONS:
1. Answer based on the pre-fetched data above
2. Call additional tools (especially analysis tools) if deeper analysis is needed
3. Use calculate_affordability for affordability questions
4. Use analyze_metric_growth for growth/trend questions
5. Cite specific numbers, dates, and sources
6. If data is missing, acknowledge what you don't have

Be concise but informative. Focus on facts from the data.

Current date: ${currentDate}`;
}

const KEY_METRICS: ReadonlyArray<readonly [metric: string, label: string]> = [
  ['interest_rate_cash', 'RBA Cash Rate'],
  ['inflation_cpi_annual', 'Annual CPI Inflation'],
  ['inflation_trimmed_mean_annual', 'Trimmed Mean Inflation'],
  ['unemployment_rate', 'Unemployment Rate']
];

const PREFETCH_MINUTES = 2;
const MINUTES_SUMMARY_CHARS = 200;

export interface PrefetchResult {
  text: string;
  dataPoints: JsonRecord[];
}

export interface HousingAgentDeps {
  model: ChatModel;
  store: Pick<Store, 'db' | 'metrics' | 'documents' | 'runs'>;
  tools?: ToolSet;
  collectors?: Collector[];
  maxIterations?: number;
  now?: () => Date;
}

function signedInteger(value: number) {
  return value > 0 ? `+${value}` : String(value);
}

export class HousingAgent implements Agent {
  readonly name = 'Housing Agent';
  readonly description =
    'Monitors Australian housing market indicators including building approvals, interest rates, lending, and RBA monetary policy decisions.';
  readonly domainKeywords: readonly string[] = [
    'housing',
    'property',
    'real estate',
    'mortgage',
    'home loan',
    'dwelling',
    'apartment',
    'house price',
    'rent',
    'rental',
    'building approval',
    'interest rate',
    'rba',
    'reserve bank',
    'cash rate',
    'housing affordability',
    'inflation',
    'cpi',
    'minutes',
    'meeting',
    'monetary policy',
    'board'
  ];

  private readonly model: ChatModel;
  private readonly store: HousingAgentDeps['store'];
  private readonly tools: ToolSet;
  private readonly collectors: Collector[];
  private readonly maxIterations: number;
  private readonly now: () => Date;

  constructor(deps: HousingAgentDeps) {
    this.model = deps.model;
    this.store = deps.store;
    this.tools = deps.tools ?? createToolSet(deps.store);
    this.collectors = deps.collectors ?? createHousingCollectors();
    this.maxIterations = deps.maxIterations ?? config.AGENT_MAX_ITERATIONS;
    this.now = deps.now ?? (() => new Date());
  }

  getCapabilities(): AgentCapabilities {
    return {
      name: this.name,
      description: this.description,
      dataSources: [
        {
          name: 'ABS Building Approvals',
          sourceType: 'file',
          url: config.ABS_BUILDING_APPROVALS_URL,
          updateFrequency: 'Monthly',
          description: 'Total dwelling units approved, original and seasonally adjusted'
        },
        {
          name: 'ABS Lending Indicators',
          sourceType: 'file',
          url: config.ABS_LENDING_INDICATORS_URL,
          updateFrequency: 'Quarterly',
          description: 'New loan commitments by borrower type and the implied average loan size'
        },
        {
          name: 'ABS Weekly Earnings',
          sourceType: 'file',
          url: config.ABS_WEEKLY_EARNINGS_URL,
          updateFrequency: 'Half-yearly',
          description: 'Average weekly ordinary and total earnings by sex'
        },
        {
          name: 'RBA Interest Rates',
          sourceType: 'web',
          url: 'https://www.rba.gov.au/statistics/cash-rate/',
          updateFrequency: 'As changed',
          description: 'Current cash rate target and the F1 cash rate history'
        },
        {
          name: 'RBA Housing Lending Rates',
          sourceType: 'file',
          url: 'https://www.rba.gov.au/statistics/tables/xls/f06hist.xlsx',
          updateFrequency: 'Monthly',
          description: 'Variable owner-occupier and investor housing lending rates'
        },
        {
          name: 'RBA Inflation Data',
          sourceType: 'file',
          url: 'https://www.rba.gov.au/statistics/tables/xls/g01hist.xlsx',
          updateFrequency: 'Quarterly',
          description: 'CPI and trimmed mean inflation measures'
        },
        {
          name: 'RBA Labour Force',
          sourceType: 'file',
          url: 'https://www.rba.gov.au/statistics/tables/xls/h05hist.xlsx',
          updateFrequency: 'Monthly',
          description: 'Unemployment, participation and employment-to-population rates'
        },
        {
          name: 'RBA Meeting Minutes',
          sourceType: 'web',
          url: 'https://www.rba.gov.au/monetary-policy/rba-board-minutes/',
          updateFrequency: '8x per year',
          description: 'Monetary Policy Board meeting minutes and decisions'
        }
      ],
      metricsTracked: [
        'housing_approvals_total',
        'housing_approvals_total_sa',
        'interest_rate_cash',
        'inflation_cpi_annual',
        'inflation_trimmed_mean_annual',
        'unemployment_rate',
        'labour_force_participation_rate',
        'housing_lending_rate_variable_owner_occupier',
        'housing_lending_rate_variable_investor',
        'avg_loan_size_first_home_buyer',
        'avg_loan_size_owner_occupier',
        'avg_loan_size_investor',
        'fulltime_adult_avg_weekly_ordinary_earnings'
      ],
      geographicScope: 'Australia',
      updateFrequency: 'Daily (news), Monthly (statistics)',
      exampleQuestions: [
        'What is the current RBA cash rate?',
        'How have building approvals trended over the last 12 months?',
        'What did the RBA say about inflation in their last meeting?',
        "What's the current unemployment rate?",
        'How have interest rates changed this year?'
      ]
    };
  }

  collect(): Promise<CollectionSummary> {
    return runCollection(this.name, this.collectors, this.store);
  }

  getTools(): ToolDefinition[] {
    return toolDefinitions(this.tools);
  }

  matchesQuery(query: string): number {
    return keywordMatchScore(query, this.domainKeywords);
  }

  /**
   * Headline indicators, the latest policy decision and the two most recent minutes,
   * formatted for the system prompt. Sections with no stored data are left out.
   */
  async prefetch(): Promise<PrefetchResult> {
    const sections: string[] = [];
    const dataPoints: JsonRecord[] = [];

    const metricLines: string[] = [];
    for (const [metric, label] of KEY_METRICS) {
      const args = { metric_name: metric };
      const result = await invokeTool(this.tools, 'get_latest_metric', args);
      if ('error' in result) {
        continue;
      }
      metricLines.push(`  • ${label}: ${String(result.value)}% (${String(result.period)})`);
      dataPoints.push({ tool: 'get_latest_metric', args, result });
    }
    if (metricLines.length > 0) {
      sections.push(`KEY ECONOMIC INDICATORS:\n${metricLines.join('\n')}`);
    }

    const statement = this.store.documents.getLatest(RBA_STATEMENT_TYPE);
    if (statement) {
      const meetingDate = statement.publishedAt ? statement.publishedAt.slice(0, 10) : null;
      const extra = statement.extraData;
      const lines = [
        'LATEST RBA MONETARY POLICY DECISION:',
        `  • Meeting date: ${meetingDate ?? 'N/A'}`,
        `  • Decision: ${statement.summary || 'N/A'}`
      ];
      if (typeof extra.cash_rate === 'number') {
        lines.push(`  • Cash rate: ${extra.cash_rate}%`);
      }
      if (typeof extra.decision_type === 'string' && extra.decision_type) {
        lines.push(`  • Action: ${extra.decision_type.toUpperCase()}`);
      }
      if (typeof extra.basis_points_change === 'number' && extra.basis_points_change !== 0) {
        lines.push(`  • Change: ${signedInteger(extra.basis_points_change)} basis points`);
      }
      sections.push(lines.join('\n'));
      dataPoints.push({
        source: RBA_STATEMENT_TYPE,
        meeting_date: meetingDate,
        summary: statement.summary,
        extra_data: extra
      });
    }

    const minutesArgs = { limit: PREFETCH_MINUTES };
    const minutes = await invokeTool(this.tools, 'get_rba_minutes', minutesArgs);
    const meetings = Array.isArray(minutes.meetings) ? minutes.meetings.filter(isRecord) : [];
    if (!('error' in minutes) && meetings.length > 0) {
      const lines = ['RECENT RBA MEETING MINUTES (detailed discussions):'];
      for (const meeting of meetings) {
        lines.push(`  • ${String(meeting.meeting_date)}: Cash rate ${String(meeting.cash_rate ?? 'N/A')}%`);
        if (typeof meeting.decision_summary === 'string' && meeting.decision_summary) {
          lines.push(`    Summary: ${meeting.decision_summary.slice(0, MINUTES_SUMMARY_CHARS)}...`);
        }
      }
      sections.push(lines.join('\n'));
      dataPoints.push({ tool: 'get_rba_minutes', args: minutesArgs, result: minutes });
    }

    return { text: sections.join('\n\n'), dataPoints };
  }

  query(question: string, context: QueryContext = {}): Promise<AgentResponse> {
    const forceFetch = context.forceFetch ?? false;

    return traced(
      'agent.query',
      async () => {
        const currentDate = this.now().toISOString().slice(0, 10);
        const dataPoints: JsonRecord[] = [];
        const sourcesUsed: string[] = [];
        let systemPrompt: string;

        if (forceFetch) {
          const prefetched = await this.prefetch();
          dataPoints.push(...prefetched.dataPoints);
          sourcesUsed.push('prefetch');
          systemPrompt = housingSystemPromptWithData(prefetched.text || '(No data available)', currentDate);
        } else {
          systemPrompt = housingSystemPrompt(currentDate);
        }

        const outcome = await runToolLoop({
          model: this.model,
          tools: this.tools,
          systemPrompt,
          question,
          maxIterations: this.maxIterations,
          agentName: this.name
        });

        for (const record of outcome.records) {
          dataPoints.push({ tool: record.tool, args: record.args, result: record.result });
        }
        for (const tool of outcome.toolsUsed) {
          if (!sourcesUsed.includes(tool)) {
            sourcesUsed.push(tool);
          }
        }

        return freezeResponse({
          agentName: this.name,
          content: outcome.content,
          confidence: dataPoints.length > 0 ? 0.9 : 0.5,
          sourcesUsed,
          dataPoints,
          metadata: { toolCalls: dataPoints.length, iterations: outcome.iterations }
        });
      },
      { 'agent.name': this.name, 'agent.force_fetch': forceFetch }
    );
  }
}
