import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../utils/asyncHandler.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import type { AnalysisService } from '../services/analysisService.js';
import { addDays, isoDate } from '../utils/dates.js';
import { NEWS_PROMPT_FACETS } from '../prompts/catalog.js';

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const tickerSchema = z.string().trim().min(1).max(12).transform(s => s.toUpperCase());

export const articleSchema = z.object({
  title: z.string(),
  summary: z.string().default(''),
  publishedAt: z.string().default(''),
  source: z.string().default(''),
  sentimentScore: z.number().finite().optional(),
  sentimentLabel: z.string().optional(),
  url: z.string().optional(),
  topics: z.array(z.string()).optional(),
});

export const pricePointSchema = z.object({
  date: isoDateSchema,
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative().default(0),
});

const customInstructionsSchema = z.object({
  instructions: z.string().trim().min(1).max(4000),
  includePrinciples: z.boolean().default(true),
});

const newsPromptSchema = z.enum(NEWS_PROMPT_FACETS);

const dailyBody = z.object({
  ticker: tickerSchema,
  date: isoDateSchema.optional(),
  news: z.array(articleSchema).default([]),
  prices: z.array(pricePointSchema).default([]),
  marketNews: z.array(articleSchema).default([]),
  newsPrompt: newsPromptSchema.optional(),
  priceWindow: z.number().int().min(1).max(60).optional(),
  newsInstructions: customInstructionsSchema.optional(),
  synthesisInstructions: customInstructionsSchema.optional(),
  save: z.boolean().default(true),
});

const newsBody = z.object({
  target: z.string().trim().min(1).max(80).nullable().default(null),
  news: z.array(articleSchema).default([]),
  newsPrompt: newsPromptSchema.optional(),
  newsInstructions: customInstructionsSchema.optional(),
});

const reflectBody = z.object({
  ticker: tickerSchema.nullable().default(null),
  period: z.string().trim().regex(/^[a-z0-9_]+$/i, 'period must be a simple label').default('week'),
  days: z.number().int().min(1).max(3650).optional(),
  endDate: isoDateSchema.optional(),
  save: z.boolean().default(true),
});

const searchQuery = z.object({
  q: z.string().trim().min(1),
  ticker: tickerSchema.optional(),
  k: z.coerce.number().int().min(1).max(50).default(5),
  start: isoDateSchema.optional(),
  end: isoDateSchema.optional(),
  includeReflections: z.enum(['true', 'false']).default('true').transform(v => v === 'true'),
});

const historyQuery = z.object({
  ticker: tickerSchema.optional(),
  start: isoDateSchema.optional(),
  end: isoDateSchema.optional(),
  days: z.coerce.number().int().min(1).max(3650).default(30),
  includeReflections: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),
});

export function createAnalysisRouter(service: AnalysisService) {
  const router = Router();

  router.post('/daily', asyncHandler(async (req, res) => {
    const body = dailyBody.parse(req.body ?? {});
    const { record, archive } = await service.runDaily({
      ticker: body.ticker,
      date: body.date,
      news: body.news,
      prices: body.prices,
      marketNews: body.marketNews,
      newsPrompt: body.newsPrompt,
      priceWindow: body.priceWindow,
      newsInstructions: body.newsInstructions,
      synthesisInstructions: body.synthesisInstructions,
      save: body.save,
    });
    res.json(ResponseUtils.success(record, undefined, { archive }));
  }));

  router.post('/news', asyncHandler(async (req, res) => {
    const body = newsBody.parse(req.body ?? {});
    res.json(ResponseUtils.success(await service.summarizeNews(body)));
  }));

  router.post('/reflect', asyncHandler(async (req, res) => {
    const body = reflectBody.parse(req.body ?? {});
    const { record, archive } = await service.runReflection(body);
    res.json(ResponseUtils.success(record, undefined, { archive }));
  }));

  router.get('/search', asyncHandler(async (req, res) => {
    const q = searchQuery.parse(req.query);
    const dateRange = q.start || q.end
      ? { start: q.start ?? '1970-01-01', end: q.end ?? isoDate() }
      : null;
    const hits = await service.search(q.q, { ticker: q.ticker ?? null, k: q.k, dateRange, includeReflections: q.includeReflections });
    res.json(ResponseUtils.list(hits, { k: q.k }));
  }));

  router.get('/history', asyncHandler(async (req, res) => {
    const q = historyQuery.parse(req.query);
    const end = q.end ?? isoDate();
    const start = q.start ?? addDays(end, -q.days);
    const records = await service.history({ ticker: q.ticker ?? null, start, end, includeReflections: q.includeReflections });
    res.json(ResponseUtils.list(records, { start, end }));
  }));

  return router;
}
