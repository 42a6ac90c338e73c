import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { createAnalysisRouter } from './routes/analysis.js';
import { createHealthRouter, type HealthInfo } from './routes/health.js';
import { notFoundHandler, errorHandler } from './middleware/errorHandler.js';
import { ResponseUtils } from './shared/utils/response.utils.js';
import type { AnalysisService } from './services/analysisService.js';
import { logger } from './utils/logger.js';

export interface AppDeps {
  service: AnalysisService;
  health: HealthInfo;
  /** Requests per minute per client on the generation endpoints */
  rateLimitRpm?: number;
}

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  // Lightweight request logger
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info({ method: req.method, url: req.originalUrl, status: res.statusCode, ms: Date.now() - start }, 'http_request');
    });
    next();
  });

  // Generation calls are the expensive part; reads stay unthrottled
  const generationLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: deps.rateLimitRpm ?? 30,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => { res.status(429).json(ResponseUtils.rateLimited()); },
  });
  app.use('/api/analysis/daily', generationLimiter);
  app.use('/api/analysis/reflect', generationLimiter);
  app.use('/api/analysis/news', generationLimiter);

  app.use(createHealthRouter(deps.service, deps.health));
  app.use('/api/analysis', createAnalysisRouter(deps.service));

  app.use(notFoundHandler);
  // Central error handler (must be last)
  app.use(errorHandler);
  return app;
}
