import type { DailyAnalysisRecord, NewsArticle, PriceSeries } from '../types/analysis.js';
import type { GenerationClient } from '../llm/generationClient.js';
import { renderCustomPrompt, renderPrompt, type CustomInstructions, type NewsPromptFacet } from '../prompts/catalog.js';
import { formatMarketNews, formatNewsArticles, formatPriceSeries, normalizePriceSeries, windowPriceChangePct, DEFAULT_PRICE_WINDOW } from './formatter.js';
import { averageSentiment } from './sentiment.js';
import { PipelineError, ValidationError } from '../shared/errors.js';
import { ValidationUtils, type ValidationResult } from '../shared/utils/validation.utils.js';
import { isoDate } from '../utils/dates.js';
import { logger } from '../utils/logger.js';

export const NO_PRICE_DATA = 'No price data available for this target.';
export const NO_MARKET_CONTEXT = 'No market context available.';

export type DailyStageName = 'news' | 'price' | 'market_context' | 'synthesis';

/** Accumulator threaded through the stages of one run; never shared between runs. */
export interface PipelineState {
  readonly ticker: string;
  readonly news: readonly NewsArticle[];
  readonly prices: PriceSeries;
  readonly marketNews: readonly NewsArticle[];
  newsSummary: string;
  priceAnalysis: string;
  marketContext: string;
  finalSummary: string;
}

interface StageContext {
  client: GenerationClient;
  temperature: number;
  newsPrompt: NewsPromptFacet;
  priceWindow: number;
  newsInstructions?: CustomInstructions;
  synthesisInstructions?: CustomInstructions;
}

interface DailyStage {
  name: DailyStageName;
  run(state: PipelineState, ctx: StageContext): Promise<PipelineState>;
}

const newsStage: DailyStage = {
  name: 'news',
  async run(state, ctx) {
    const vars = { ticker: state.ticker, newsText: formatNewsArticles([...state.news], state.ticker) };
    const prompt = ctx.newsInstructions ? renderCustomPrompt(ctx.newsPrompt, vars, ctx.newsInstructions) : renderPrompt(ctx.newsPrompt, vars);
    return { ...state, newsSummary: await ctx.client.generate(prompt, ctx.temperature) };
  },
};

const priceStage: DailyStage = {
  name: 'price',
  async run(state, ctx) {
    const points = normalizePriceSeries(state.prices);
    if (!points.length) return { ...state, priceAnalysis: NO_PRICE_DATA };
    const priceText = formatPriceSeries(points, state.ticker, ctx.priceWindow);
    const days = Math.min(points.length, ctx.priceWindow);
    const prompt = renderPrompt('price_analysis', { ticker: state.ticker, priceText, days });
    return { ...state, priceAnalysis: await ctx.client.generate(prompt, ctx.temperature) };
  },
};

const marketContextStage: DailyStage = {
  name: 'market_context',
  async run(state, ctx) {
    if (!state.marketNews.length) return { ...state, marketContext: NO_MARKET_CONTEXT };
    const prompt = renderPrompt('market_context', { marketText: formatMarketNews([...state.marketNews]) });
    return { ...state, marketContext: await ctx.client.generate(prompt, ctx.temperature) };
  },
};

const synthesisStage: DailyStage = {
  name: 'synthesis',
  async run(state, ctx) {
    const vars = {
      ticker: state.ticker,
      newsSummary: state.newsSummary,
      priceAnalysis: state.priceAnalysis,
      marketContext: state.marketContext,
    };
    const prompt = ctx.synthesisInstructions ? renderCustomPrompt('synthesis', vars, ctx.synthesisInstructions) : renderPrompt('synthesis', vars);
    return { ...state, finalSummary: await ctx.client.generate(prompt, ctx.temperature) };
  },
};

export const DAILY_STAGES: readonly DailyStage[] = [newsStage, priceStage, marketContextStage, synthesisStage];

export interface DailyAnalysisOptions {
  /** Analysed day, defaults to today */
  date?: string;
  temperature?: number;
  newsPrompt?: NewsPromptFacet;
  priceWindow?: number;
  /** Replace the news stage's system prompt */
  newsInstructions?: CustomInstructions;
  /** Replace the synthesis stage's system prompt */
  synthesisInstructions?: CustomInstructions;
}

export type NewsSummaryOptions = Pick<DailyAnalysisOptions, 'temperature' | 'newsPrompt' | 'newsInstructions'>;

export interface NewsSummary {
  /** Upper-cased ticker, or the `market:` / `topic:` label as given */
  target: string;
  newsPrompt: NewsPromptFacet;
  summary: string;
  articleCount: number;
  averageSentiment: number | null;
}

const LABEL_TARGET = /^(market|topic):/i;

function instructionChecks(options: Pick<DailyAnalysisOptions, 'newsInstructions' | 'synthesisInstructions'>): ValidationResult[] {
  const checks: ValidationResult[] = [];
  if (options.newsInstructions) checks.push(ValidationUtils.validateString(options.newsInstructions.instructions, 'newsInstructions.instructions', 1, 4000));
  if (options.synthesisInstructions) checks.push(ValidationUtils.validateString(options.synthesisInstructions.instructions, 'synthesisInstructions.instructions', 1, 4000));
  return checks;
}

export class AnalysisPipeline {
  constructor(private readonly client: GenerationClient) {}

  /**
   * Run the four stages strictly in order. The first failing stage aborts the
   * run with a PipelineError naming it; nothing is returned for partial work.
   */
  async runDailyAnalysis(
    ticker: string,
    newsArticles: NewsArticle[],
    priceSeries: PriceSeries,
    marketNews: NewsArticle[] = [],
    options: DailyAnalysisOptions = {},
  ): Promise<DailyAnalysisRecord> {
    const symbol = String(ticker ?? '').trim().toUpperCase();
    const date = options.date ?? isoDate();
    const checks = ValidationUtils.combineResults(
      ValidationUtils.validateTicker(symbol),
      ValidationUtils.validateIsoDate(date, 'date'),
      ...instructionChecks(options),
    );
    if (!checks.isValid) throw new ValidationError('Invalid daily analysis input', checks.errors);

    const ctx: StageContext = {
      client: this.client,
      temperature: options.temperature ?? this.client.defaultTemperature,
      newsPrompt: options.newsPrompt ?? 'news_analysis',
      priceWindow: options.priceWindow ?? DEFAULT_PRICE_WINDOW,
      newsInstructions: options.newsInstructions,
      synthesisInstructions: options.synthesisInstructions,
    };
    let state: PipelineState = {
      ticker: symbol,
      news: newsArticles,
      prices: priceSeries,
      marketNews,
      newsSummary: '',
      priceAnalysis: '',
      marketContext: '',
      finalSummary: '',
    };

    const started = Date.now();
    for (const stage of DAILY_STAGES) {
      try {
        state = await stage.run(state, ctx);
      } catch (err) {
        logger.error({ ticker: symbol, stage: stage.name, err }, 'daily_stage_failed');
        throw new PipelineError(stage.name, err);
      }
      logger.debug({ ticker: symbol, stage: stage.name }, 'daily_stage_done');
    }
    if (!state.finalSummary.trim()) throw new PipelineError('synthesis', new Error('empty synthesis'));
    logger.info({ ticker: symbol, date, articles: newsArticles.length, ms: Date.now() - started }, 'daily_analysis_done');

    return {
      ticker: symbol,
      date,
      analysisType: 'daily',
      periodStart: null,
      periodEnd: null,
      body: state.finalSummary,
      sections: {
        newsSummary: state.newsSummary,
        priceAnalysis: state.priceAnalysis,
        marketContext: state.marketContext,
        finalSummary: state.finalSummary,
      },
      articleCount: newsArticles.length,
      dayCount: null,
      averageSentiment: averageSentiment(newsArticles),
      priceChangePct: windowPriceChangePct(priceSeries, ctx.priceWindow),
      tickers: [symbol],
      lowConfidenceFacets: [],
      failedFacets: [],
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * News stage on its own: no price, market or synthesis calls and nothing to
   * archive. A `market:` or `topic:` target is formatted as market news.
   */
  async summarizeNews(target: string | null, newsArticles: NewsArticle[], options: NewsSummaryOptions = {}): Promise<NewsSummary> {
    const raw = String(target ?? '').trim();
    const isLabel = LABEL_TARGET.test(raw);
    const symbol = raw && !isLabel ? raw.toUpperCase() : null;
    const checks = ValidationUtils.combineResults(
      symbol ? ValidationUtils.validateTicker(symbol) : { isValid: true, errors: [] },
      ...instructionChecks(options),
    );
    if (!checks.isValid) throw new ValidationError('Invalid news summary input', checks.errors);

    const newsPrompt = options.newsPrompt ?? 'news_analysis';
    const vars = { ticker: symbol ?? (raw || 'the target'), newsText: formatNewsArticles(newsArticles, symbol) };
    const prompt = options.newsInstructions ? renderCustomPrompt(newsPrompt, vars, options.newsInstructions) : renderPrompt(newsPrompt, vars);
    let summary: string;
    try {
      summary = await this.client.generate(prompt, options.temperature ?? this.client.defaultTemperature);
    } catch (err) {
      logger.error({ target: vars.ticker, stage: 'news', err }, 'news_summary_failed');
      throw new PipelineError('news', err);
    }
    logger.info({ target: vars.ticker, articles: newsArticles.length, newsPrompt }, 'news_summary_done');
    return { target: vars.ticker, newsPrompt, summary, articleCount: newsArticles.length, averageSentiment: averageSentiment(newsArticles) };
  }
}
