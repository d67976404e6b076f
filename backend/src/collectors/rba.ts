import { convert, type HtmlToTextOptions } from 'html-to-text';
import type { DocumentInput } from '../db/documentRepository.js';
import type { MetricPointInput } from '../db/metricRepository.js';
import { RBA_MINUTES_TYPE, RBA_STATEMENT_TYPE } from '../tools/documents.js';
import { childLogger, errorMessage } from '../utils/logger.js';
import { createHtmlFetcher, describeFailure, httpStatusOf, type HtmlFetcher } from './http.js';
import { failedResult, type Collector, type CollectorResult } from './types.js';

const log = childLogger('collector:rba');

export const CASH_RATE_URL = 'https://www.rba.gov.au/statistics/cash-rate/';
export const MINUTES_BASE_URL = 'https://www.rba.gov.au/monetary-policy/rba-board-minutes/';
export const MEDIA_RELEASES_BASE_URL = 'https://www.rba.gov.au/media-releases/';

const SECTION_CHAR_LIMIT = 5000;
const STATEMENT_CHAR_LIMIT = 5000;

const MINUTES_SECTIONS = [
  'Financial conditions',
  'Economic conditions',
  'Considerations for monetary policy',
  'International economic conditions',
  'Domestic economic conditions'
] as const;

const textOptions: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: 'a', options: { ignoreHref: true } },
    { selector: 'img', format: 'skip' },
    ...['h1', 'h2', 'h3', 'h4', 'h5', 'h6'].map((selector) => ({ selector, options: { uppercase: false } }))
  ]
};

/** Markup fragment to a single line of plain text. */
export function cleanHtml(fragment: string): string {
  return convert(fragment, textOptions).replace(/\s+/g, ' ').trim();
}

function isoDate(date: Date) {
  return date.toISOString().slice(0, 10);
}

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// ---------------------------------------------------------------------------
// Cash rate target
// ---------------------------------------------------------------------------

/** The first percentage on the cash rate page is the current target. */
export function parseCashRatePage(html: string, today: string): MetricPointInput | null {
  const rate = /(\d+\.\d+)\s*(?:per\s*cent|%)/i.exec(html);
  if (!rate) {
    return null;
  }
  const effective = /(\d{1,2}\s+\w+\s+\d{4})/.exec(html);
  return {
    metricName: 'interest_rate_cash',
    value: Number.parseFloat(rate[1]),
    period: today,
    geography: 'Australia',
    unit: 'percent',
    source: 'RBA Cash Rate Target',
    extraData: effective ? { effective_date: effective[1] } : {}
  };
}

export class RbaCashRateCollector implements Collector {
  readonly name = 'RBA Interest Rates';
  readonly sourceUrl = CASH_RATE_URL;

  constructor(
    private readonly fetchHtml: HtmlFetcher = createHtmlFetcher(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async collect(): Promise<CollectorResult> {
    try {
      const html = await this.fetchHtml(CASH_RATE_URL);
      const record = parseCashRatePage(html, isoDate(this.now()));
      return {
        success: true,
        records: record ? [record] : [],
        documents: [],
        metadata: { content_length: html.length }
      };
    } catch (error) {
      return failedResult(describeFailure(error));
    }
  }
}

// ---------------------------------------------------------------------------
// Monetary Policy Board minutes
// ---------------------------------------------------------------------------

export interface ParsedMinutes {
  meetingDate: string;
  sourceUrl: string;
  membersParticipating: string;
  decisionText: string;
  cashRateDecision: number | null;
  /** snake_case section key to plain text. */
  sections: Record<string, string>;
  fullText: string;
}

/** Meeting dates linked from a year's minutes index, newest first. */
export function extractMinutesDates(indexHtml: string, year: number): string[] {
  const pattern = new RegExp(`href="[^"]*/${year}/(${year}-\\d{2}-\\d{2})\\.html"`, 'g');
  const dates = new Set<string>();
  for (const match of indexHtml.matchAll(pattern)) {
    dates.add(match[1]);
  }
  return [...dates].sort().reverse();
}

export function extractDecisionRate(decisionText: string): number | null {
  const patterns = [/at\s+(\d+\.\d+)\s*per\s*cent/i, /to\s+(\d+\.\d+)\s*per\s*cent/i, /(\d+\.\d+)\s*per\s*cent/i];
  for (const pattern of patterns) {
    const match = pattern.exec(decisionText);
    if (match) {
      return Number.parseFloat(match[1]);
    }
  }
  return null;
}

export function sectionKey(heading: string): string {
  return heading.toLowerCase().replace(/ /g, '_');
}

export function parseMinutesPage(html: string, meetingDate: string, sourceUrl: string): ParsedMinutes {
  const members = /Members participating.*?<\/h2>\s*<p>(.*?)<\/p>/is.exec(html);
  const decision = /The decision.*?<\/h2>\s*<p>(.*?)<\/p>/is.exec(html);
  const decisionText = decision ? cleanHtml(decision[1]) : '';

  const sections: Record<string, string> = {};
  for (const heading of MINUTES_SECTIONS) {
    const match = new RegExp(`${escapeRegExp(heading)}.*?</h2>\\s*(.*?)(?=<h2|$)`, 'is').exec(html);
    if (match) {
      sections[sectionKey(heading)] = cleanHtml(match[1]).slice(0, SECTION_CHAR_LIMIT);
    }
  }

  const body = Object.entries(sections)
    .map(([key, value]) => `${key}: ${value}`)
    .join('\n\n');

  return {
    meetingDate,
    sourceUrl,
    membersParticipating: members ? cleanHtml(members[1]) : '',
    decisionText,
    cashRateDecision: decision ? extractDecisionRate(decisionText) : null,
    sections,
    fullText: `RBA Meeting Minutes ${meetingDate}\n\n${decisionText}\n\n${body}`
  };
}

export function minutesToDocument(minutes: ParsedMinutes): DocumentInput {
  const sections: Record<string, string> = {};
  if (minutes.decisionText) {
    sections.the_decision = minutes.decisionText;
  }
  Object.assign(sections, minutes.sections);

  return {
    documentType: RBA_MINUTES_TYPE,
    externalId: minutes.meetingDate,
    title: `RBA Monetary Policy Board Minutes - ${minutes.meetingDate}`,
    content: minutes.fullText,
    sourceUrl: minutes.sourceUrl,
    publishedAt: minutes.meetingDate,
    summary: minutes.decisionText || null,
    extraData: {
      cash_rate_decision: minutes.cashRateDecision,
      members_participating: minutes.membersParticipating
    },
    sections: Object.keys(sections).length > 0 ? sections : undefined
  };
}

export class RbaMinutesCollector implements Collector {
  readonly name = 'RBA Meeting Minutes';
  readonly sourceUrl = MINUTES_BASE_URL;

  constructor(
    private readonly fetchHtml: HtmlFetcher = createHtmlFetcher(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async collect(year?: number): Promise<CollectorResult> {
    const currentYear = this.now().getUTCFullYear();
    const yearsTried = year === undefined ? [currentYear, currentYear - 1] : [year];
    const documents: DocumentInput[] = [];
    const meetingDates: string[] = [];
    let lastError: string | null = null;

    try {
      for (const targetYear of yearsTried) {
        let indexHtml: string;
        try {
          indexHtml = await this.fetchHtml(`${MINUTES_BASE_URL}${targetYear}/`);
        } catch (error) {
          if (httpStatusOf(error) === null) {
            throw error;
          }
          // the index for a year that has not started yet is a 404
          lastError = `HTTP error for ${targetYear}: ${errorMessage(error)}`;
          continue;
        }

        for (const date of extractMinutesDates(indexHtml, targetYear)) {
          const url = `${MINUTES_BASE_URL}${targetYear}/${date}.html`;
          try {
            const page = await this.fetchHtml(url);
            documents.push(minutesToDocument(parseMinutesPage(page, date, url)));
            meetingDates.push(date);
          } catch (error) {
            log.warn({ date, err: errorMessage(error) }, 'Failed to fetch minutes page');
          }
        }

        if (documents.length > 0 && year === undefined) {
          break;
        }
      }
    } catch (error) {
      return failedResult(describeFailure(error), { years_tried: yearsTried });
    }

    const metadata =
      documents.length > 0
        ? { years_tried: yearsTried, minutes_count: documents.length, meeting_dates: meetingDates }
        : { years_tried: yearsTried, message: lastError ?? 'No minutes found' };
    return { success: true, records: [], documents, metadata };
  }
}

// ---------------------------------------------------------------------------
// Monetary policy decision statements (media releases)
// ---------------------------------------------------------------------------

export type DecisionType = 'increase' | 'decrease' | 'hold' | 'unknown';

export interface ParsedStatement {
  releaseId: string;
  meetingDate: string;
  title: string;
  sourceUrl: string;
  decisionSummary: string;
  cashRate: number | null;
  decisionType: DecisionType;
  basisPointsChange: number | null;
  content: string;
}

/** Release ids whose link text names a monetary policy decision; every release id when none does. */
export function extractStatementIds(indexHtml: string, year: number): string[] {
  const yy = String(year).slice(2);
  const labelled = new RegExp(`href="[^"]*/(mr-${yy}-\\d{2})\\.html"[^>]*>[^<]*Monetary Policy`, 'gi');
  const ids = new Set<string>();
  for (const match of indexHtml.matchAll(labelled)) {
    ids.add(match[1]);
  }
  if (ids.size === 0) {
    for (const match of indexHtml.matchAll(new RegExp(`(mr-${yy}-\\d{2})\\.html`, 'g'))) {
      ids.add(match[1]);
    }
  }
  return [...ids];
}

export function classifyDecision(description: string): DecisionType {
  const text = description.toLowerCase();
  if (text.includes('increase') || text.includes('raise')) {
    return 'increase';
  }
  if (['decrease', 'lower', 'reduce', 'cut'].some((word) => text.includes(word))) {
    return 'decrease';
  }
  if (['unchanged', 'maintain', 'leave'].some((word) => text.includes(word))) {
    return 'hold';
  }
  return 'unknown';
}

/** Null when the page is not a cash rate decision. */
export function parseStatementPage(html: string, releaseId: string, sourceUrl: string, year: number): ParsedStatement | null {
  const lowered = html.toLowerCase();
  if (!lowered.includes('monetary policy') || !lowered.includes('cash rate')) {
    return null;
  }

  const dated =
    /<meta name="dc\.date" content="(\d{4}-\d{2}-\d{2})"/.exec(html) ??
    /<meta name="dcterms\.created" content="(\d{4}-\d{2}-\d{2})"/.exec(html);
  const meetingDate = dated ? dated[1] : `${year}-01-01`;

  const described = /<meta name="description" content="([^"]+)"/.exec(html);
  const description = (described ? described[1] : '').replace(/&nbsp;/g, ' ').replace(/&#146;/g, "'");

  const rate = /(\d+\.?\d*)\s*(?:per\s*cent|%)/.exec(description);
  const decisionType = classifyDecision(description);

  let basisPointsChange: number | null = null;
  const basisPoints = /(\d+)\s*basis\s*points?/i.exec(description);
  if (basisPoints) {
    const magnitude = Number.parseInt(basisPoints[1], 10);
    basisPointsChange = decisionType === 'decrease' ? -magnitude : magnitude;
  }

  const article = /<article[^>]*>(.*?)<\/article>/s.exec(html);
  const content = article ? cleanHtml(article[1]) : '';

  return {
    releaseId,
    meetingDate,
    title: `RBA Monetary Policy Statement - ${meetingDate}`,
    sourceUrl,
    decisionSummary: description,
    cashRate: rate ? Number.parseFloat(rate[1]) : null,
    decisionType,
    basisPointsChange,
    content: content ? content.slice(0, STATEMENT_CHAR_LIMIT) : description
  };
}

export function statementToDocument(statement: ParsedStatement): DocumentInput {
  return {
    documentType: RBA_STATEMENT_TYPE,
    externalId: statement.releaseId,
    title: statement.title,
    content: statement.content,
    sourceUrl: statement.sourceUrl,
    publishedAt: statement.meetingDate,
    summary: statement.decisionSummary || null,
    extraData: {
      release_id: statement.releaseId,
      cash_rate: statement.cashRate,
      decision_type: statement.decisionType,
      basis_points_change: statement.basisPointsChange
    }
  };
}

export class RbaStatementCollector implements Collector {
  readonly name = 'RBA Monetary Policy Statement';
  readonly sourceUrl = MEDIA_RELEASES_BASE_URL;

  constructor(
    private readonly fetchHtml: HtmlFetcher = createHtmlFetcher(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async collect(year?: number): Promise<CollectorResult> {
    const currentYear = this.now().getUTCFullYear();
    const yearsTried = year === undefined ? [currentYear, currentYear - 1] : [year];
    const statements: ParsedStatement[] = [];

    try {
      for (const targetYear of yearsTried) {
        let indexHtml: string;
        try {
          indexHtml = await this.fetchHtml(`${MEDIA_RELEASES_BASE_URL}${targetYear}/`);
        } catch (error) {
          if (httpStatusOf(error) === null) {
            throw error;
          }
          continue;
        }

        for (const releaseId of extractStatementIds(indexHtml, targetYear)) {
          const url = `${MEDIA_RELEASES_BASE_URL}${targetYear}/${releaseId}.html`;
          try {
            const parsed = parseStatementPage(await this.fetchHtml(url), releaseId, url, targetYear);
            if (parsed) {
              statements.push(parsed);
            }
          } catch (error) {
            log.warn({ releaseId, err: errorMessage(error) }, 'Failed to fetch statement');
          }
        }

        if (statements.length > 0 && year === undefined) {
          break;
        }
      }
    } catch (error) {
      return failedResult(describeFailure(error), { years_tried: yearsTried });
    }

    statements.sort((a, b) => b.meetingDate.localeCompare(a.meetingDate));

    const records: MetricPointInput[] = statements.flatMap((statement) =>
      statement.cashRate === null
        ? []
        : [
            {
              metricName: 'interest_rate_cash',
              value: statement.cashRate,
              period: statement.meetingDate,
              unit: 'percent',
              source: 'RBA Monetary Policy Statement',
              extraData: { decision_type: statement.decisionType, release_id: statement.releaseId }
            }
          ]
    );

    return {
      success: true,
      records,
      documents: statements.map(statementToDocument),
      metadata: { years_tried: yearsTried, statements_count: statements.length }
    };
  }
}
