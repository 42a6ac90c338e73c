import { Router } from 'express';
import { asyncHandler } from '../utils/asyncHandler.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import type { AnalysisService } from '../services/analysisService.js';
import { logger } from '../utils/logger.js';

export interface HealthInfo {
  generationBackend: string;
  failurePolicy: string;
}

export function createHealthRouter(service: AnalysisService, info: HealthInfo) {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json(ResponseUtils.success({ status: 'ok', ...info, uptimeSec: Math.round(process.uptime()) }));
  });

  router.get('/health/archive', asyncHandler(async (_req, res) => {
    try {
      const stats = await service.stats();
      res.json(ResponseUtils.success(stats));
    } catch (err) {
      logger.error({ err }, 'archive_health_failed');
      res.status(503).json(ResponseUtils.error('Archive store unavailable'));
    }
  }));

  return router;
}
