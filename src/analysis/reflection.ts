import type { AnalysisRecord, ReflectionRecord, ReflectionSectionKey, ReflectionSections } from '../types/analysis.js';
import type { GenerationClient } from '../llm/generationClient.js';
import type { FailurePolicy } from '../config/index.js';
import { renderPrompt, type ReflectionPromptFacet } from '../prompts/catalog.js';
import { InsufficientHistoryError, PipelineError, ValidationError, errorMessage } from '../shared/errors.js';
import { ValidationUtils, type ValidationResult } from '../shared/utils/validation.utils.js';
import { runBounded } from '../utils/concurrency.js';
import { isoDate } from '../utils/dates.js';
import { logger } from '../utils/logger.js';

interface FacetSpec {
  key: ReflectionSectionKey;
  prompt: ReflectionPromptFacet;
  heading: string;
}

export const REFLECTION_FACETS: readonly FacetSpec[] = [
  { key: 'patternAnalysis', prompt: 'pattern_analysis', heading: 'Pattern Analysis' },
  { key: 'sentimentEvolution', prompt: 'sentiment_evolution', heading: 'Sentiment Evolution' },
  { key: 'keyEvents', prompt: 'key_events', heading: 'Key Events' },
  { key: 'investmentThesis', prompt: 'investment_thesis', heading: 'Investment Thesis' },
  { key: 'riskAssessment', prompt: 'risk_assessment', heading: 'Risk Assessment' },
];

const MONTHS = 'jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?';
const DATE_PATTERNS: readonly RegExp[] = [
  /\b\d{4}-\d{2}-\d{2}\b/,
  new RegExp(`\\b(?:${MONTHS})\\.?\\s+\\d{1,2}\\b`, 'i'),
  new RegExp(`\\b\\d{1,2}\\s+(?:${MONTHS})\\b`, 'i'),
  /\b\d{1,2}\/\d{1,2}(?:\/\d{2,4})?\b/,
];

/** True when the text points back at a date in the corpus in any common notation */
export function hasDateReference(text: string): boolean {
  return DATE_PATTERNS.some(re => re.test(text));
}

export function failedFacetPlaceholder(heading: string, err: unknown): string {
  return `[UNAVAILABLE] ${heading} could not be generated: ${errorMessage(err)}`;
}

/** Accumulator of one reflection run */
export interface ReflectionState {
  readonly ticker: string | null;
  readonly periodType: string;
  readonly periodStart: string;
  readonly periodEnd: string;
  readonly dayCount: number;
  readonly tickers: string[];
  readonly corpus: string;
  facets: Partial<ReflectionSections>;
  failedFacets: ReflectionSectionKey[];
}

export interface ReflectionEngineOptions {
  concurrency?: number;
  failurePolicy?: FailurePolicy;
  temperature?: number;
}

function chronological(a: AnalysisRecord, b: AnalysisRecord) {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  const ta = a.ticker ?? '';
  const tb = b.ticker ?? '';
  return ta < tb ? -1 : ta > tb ? 1 : 0;
}

/** Period actually covered by the records, not the window the caller asked for */
export function derivePeriod(records: readonly AnalysisRecord[]) {
  const dates = records.map(r => r.date).sort();
  return { periodStart: dates[0], periodEnd: dates[dates.length - 1], dayCount: new Set(dates).size };
}

/**
 * One chronological corpus entry per record. In portfolio mode every entry
 * carries its own ticker so cross-ticker observations stay attributable.
 */
export function buildCorpus(records: readonly AnalysisRecord[], portfolio: boolean): string {
  return [...records].sort(chronological).map(r => {
    const text = (r.body || r.sections.finalSummary || '').trim();
    const header = portfolio ? `Date: ${r.date} | Ticker: ${r.ticker ?? 'PORTFOLIO'}` : `Date: ${r.date}`;
    return `${header}\n${text}`;
  }).join('\n\n');
}

function periodInfo(state: Pick<ReflectionState, 'ticker' | 'periodStart' | 'periodEnd' | 'dayCount' | 'tickers'>): string {
  const span = `Period: ${state.periodStart} to ${state.periodEnd} (${state.dayCount} ${state.dayCount === 1 ? 'day' : 'days'})`;
  if (state.ticker) return `${span} for ${state.ticker}`;
  const listed = state.tickers.slice(0, 5).join(', ');
  const more = state.tickers.length > 5 ? ` and ${state.tickers.length - 5} others` : '';
  return `${span} across ${state.tickers.length} ${state.tickers.length === 1 ? 'target' : 'targets'}: ${listed}${more}`;
}

// A single-ticker reflection only reads that ticker's history
function matchesScope(record: AnalysisRecord, symbol: string | null, index: number): ValidationResult {
  if (symbol === null || record.ticker?.trim().toUpperCase() === symbol) return { isValid: true, errors: [] };
  return { isValid: false, errors: [`periodSummaries[${index}].ticker ${record.ticker ?? 'null'} does not match ${symbol}`] };
}

export class ReflectionEngine {
  private readonly concurrency: number;
  private readonly failurePolicy: FailurePolicy;
  private readonly temperature: number | undefined;

  constructor(private readonly client: GenerationClient, options: ReflectionEngineOptions = {}) {
    this.concurrency = options.concurrency ?? 3;
    this.failurePolicy = options.failurePolicy ?? 'abort';
    this.temperature = options.temperature;
  }

  async runReflection(
    periodSummaries: readonly AnalysisRecord[],
    ticker: string | null,
    periodType: string,
    options: { date?: string } = {},
  ): Promise<ReflectionRecord> {
    const symbol = ticker ? ticker.trim().toUpperCase() : null;
    const scope = symbol ?? 'the portfolio';
    if (!periodSummaries.length) throw new InsufficientHistoryError(scope);

    const checks = ValidationUtils.combineResults(
      symbol ? ValidationUtils.validateTicker(symbol) : { isValid: true, errors: [] },
      /^[a-z0-9_]+$/i.test(periodType) ? { isValid: true, errors: [] } : { isValid: false, errors: ['periodType must be a simple label such as week or month'] },
      ...periodSummaries.map((r, i) => ValidationUtils.validateIsoDate(r.date, `periodSummaries[${i}].date`)),
      ...periodSummaries.map((r, i) => matchesScope(r, symbol, i)),
    );
    if (!checks.isValid) throw new ValidationError('Invalid reflection input', checks.errors);

    const { periodStart, periodEnd, dayCount } = derivePeriod(periodSummaries);
    const tickers = Array.from(new Set(periodSummaries.map(r => r.ticker).filter((t): t is string => !!t))).sort();
    let state: ReflectionState = {
      ticker: symbol,
      periodType: periodType.toLowerCase(),
      periodStart,
      periodEnd,
      dayCount,
      tickers,
      corpus: buildCorpus(periodSummaries, symbol === null),
      facets: {},
      failedFacets: [],
    };

    const started = Date.now();
    const outputs = await runBounded(REFLECTION_FACETS, this.concurrency, (facet) => this.runFacet(state, facet, scope));
    state = {
      ...state,
      facets: Object.fromEntries(outputs.map(o => [o.key, o.text])),
      failedFacets: outputs.filter(o => o.failed).map(o => o.key),
    };
    const sections = this.completeSections(state);

    const lowConfidenceFacets: ReflectionSectionKey[] = [];
    if (!state.failedFacets.includes('keyEvents') && !hasDateReference(sections.keyEvents)) {
      lowConfidenceFacets.push('keyEvents');
      logger.warn({ ticker: scope, periodType }, 'reflection_key_events_without_dates');
    }

    const header = `PERIODIC REFLECTION (${state.periodType.toUpperCase()})\n${periodInfo(state)}`;
    const body = [header, ...REFLECTION_FACETS.map(f => `## ${f.heading}\n${sections[f.key]}`)].join('\n\n');
    logger.info({ ticker: scope, periodType: state.periodType, periodStart, periodEnd, dayCount, failed: state.failedFacets, ms: Date.now() - started }, 'reflection_done');

    return {
      ticker: symbol,
      date: options.date ?? isoDate(),
      analysisType: `reflection_${state.periodType}`,
      periodStart,
      periodEnd,
      body,
      sections,
      articleCount: null,
      dayCount,
      averageSentiment: null,
      priceChangePct: null,
      tickers,
      lowConfidenceFacets,
      failedFacets: state.failedFacets,
      createdAt: new Date().toISOString(),
    };
  }

  private async runFacet(state: ReflectionState, facet: FacetSpec, scope: string) {
    const prompt = renderPrompt(facet.prompt, { target: scope, periodType: state.periodType, corpus: state.corpus });
    try {
      const text = await this.client.generate(prompt, this.temperature ?? this.client.defaultTemperature);
      return { key: facet.key, text, failed: false };
    } catch (err) {
      logger.error({ ticker: scope, facet: facet.key, policy: this.failurePolicy, err }, 'reflection_facet_failed');
      if (this.failurePolicy === 'abort') throw new PipelineError(facet.key, err);
      return { key: facet.key, text: failedFacetPlaceholder(facet.heading, err), failed: true };
    }
  }

  private completeSections(state: ReflectionState): ReflectionSections {
    const pick = (key: ReflectionSectionKey): string => {
      const text = state.facets[key];
      if (!text) throw new PipelineError(key, new Error('facet produced no output'));
      return text;
    };
    return {
      patternAnalysis: pick('patternAnalysis'),
      sentimentEvolution: pick('sentimentEvolution'),
      keyEvents: pick('keyEvents'),
      investmentThesis: pick('investmentThesis'),
      riskAssessment: pick('riskAssessment'),
    };
  }
}
