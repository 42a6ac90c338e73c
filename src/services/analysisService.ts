import type { AnalysisPipeline, DailyAnalysisOptions, NewsSummary, NewsSummaryOptions } from '../analysis/pipeline.js';
import type { ReflectionEngine } from '../analysis/reflection.js';
import type { ArchiveStore, SearchOptions } from '../rag/archive.js';
import type { ArchivedRecord, DailyAnalysisRecord, NewsArticle, PriceSeries, ReflectionRecord, ScoredRecord } from '../types/analysis.js';
import { InsufficientHistoryError, ValidationError, errorMessage } from '../shared/errors.js';
import { ValidationUtils } from '../shared/utils/validation.utils.js';
import { addDays, isoDate } from '../utils/dates.js';
import { logger } from '../utils/logger.js';

export const PERIOD_DAYS: Readonly<Record<string, number>> = { week: 7, month: 30, quarter: 90 };

export type ArchiveOutcome = null | { saved: true; id: string } | { saved: false; error: string };

export interface RunResult<R> {
  record: R;
  archive: ArchiveOutcome;
}

export interface RunDailyInput extends Pick<DailyAnalysisOptions, 'date' | 'newsPrompt' | 'priceWindow' | 'newsInstructions' | 'synthesisInstructions'> {
  ticker: string;
  news: NewsArticle[];
  prices: PriceSeries;
  marketNews?: NewsArticle[];
  save?: boolean;
}

export interface SummarizeNewsInput extends Pick<NewsSummaryOptions, 'newsPrompt' | 'newsInstructions'> {
  /** Ticker, `market:<label>`, `topic:<label>` or null */
  target: string | null;
  news: NewsArticle[];
}

export interface RunReflectionInput {
  ticker: string | null;
  period: string;
  /** Required for periods other than week, month and quarter */
  days?: number;
  endDate?: string;
  save?: boolean;
}

export interface HistoryInput {
  ticker: string | null;
  start: string;
  end: string;
  includeReflections?: boolean;
}

export function resolveWindow(period: string, days: number | undefined, endDate: string): { start: string; end: string; days: number } {
  const span = days ?? PERIOD_DAYS[period.toLowerCase()];
  if (span === undefined) throw new ValidationError('Invalid reflection window', [`days is required for custom period "${period}"`]);
  const checks = ValidationUtils.combineResults(
    ValidationUtils.validateNumeric(span, 'days', 1, 3650),
    ValidationUtils.validateIsoDate(endDate, 'endDate'),
  );
  if (!checks.isValid) throw new ValidationError('Invalid reflection window', checks.errors);
  return { start: addDays(endDate, -span), end: endDate, days: span };
}

/**
 * Wires the daily pipeline, the reflection engine and the archive together.
 * A failed archive write never discards a produced analysis; it is reported
 * next to the record instead.
 */
export class AnalysisService {
  constructor(
    private readonly pipeline: AnalysisPipeline,
    private readonly reflection: ReflectionEngine,
    private readonly archive: ArchiveStore,
  ) {}

  async runDaily(input: RunDailyInput): Promise<RunResult<DailyAnalysisRecord>> {
    const record = await this.pipeline.runDailyAnalysis(input.ticker, input.news, input.prices, input.marketNews ?? [], {
      date: input.date,
      newsPrompt: input.newsPrompt,
      priceWindow: input.priceWindow,
      newsInstructions: input.newsInstructions,
      synthesisInstructions: input.synthesisInstructions,
    });
    return { record, archive: input.save === false ? null : await this.save(record) };
  }

  /** News-only summary; never archived. */
  summarizeNews(input: SummarizeNewsInput): Promise<NewsSummary> {
    return this.pipeline.summarizeNews(input.target, input.news, {
      newsPrompt: input.newsPrompt,
      newsInstructions: input.newsInstructions,
    });
  }

  async runReflection(input: RunReflectionInput): Promise<RunResult<ReflectionRecord>> {
    const period = input.period.trim().toLowerCase();
    const window = resolveWindow(period, input.days, input.endDate ?? isoDate());
    const ticker = input.ticker ? input.ticker.trim().toUpperCase() : null;

    const records = await this.archive.queryRange(window.start, window.end, ticker, { includeReflections: false });
    logger.info({ ticker: ticker ?? 'portfolio', period, start: window.start, end: window.end, records: records.length }, 'reflection_inputs_loaded');
    if (!records.length) throw new InsufficientHistoryError(ticker ?? 'the portfolio');

    const record = await this.reflection.runReflection(records, ticker, period);
    return { record, archive: input.save === false ? null : await this.save(record) };
  }

  search(query: string, options: SearchOptions = {}): Promise<ScoredRecord[]> {
    return this.archive.search(query, options);
  }

  history(input: HistoryInput): Promise<ArchivedRecord[]> {
    return this.archive.queryRange(input.start, input.end, input.ticker, { includeReflections: input.includeReflections ?? false });
  }

  stats() {
    return this.archive.stats();
  }

  private async save(record: DailyAnalysisRecord | ReflectionRecord): Promise<ArchiveOutcome> {
    try {
      const id = await this.archive.write(record);
      return { saved: true, id };
    } catch (err) {
      logger.warn({ ticker: record.ticker, analysisType: record.analysisType, err }, 'analysis_not_archived');
      return { saved: false, error: errorMessage(err) };
    }
  }
}
