import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ResponseUtils, type ApiResponse } from '../shared/utils/response.utils.js';
import { AppError, GenerationError, InsufficientHistoryError, PipelineError, ValidationError } from '../shared/errors.js';
import { logger } from '../utils/logger.js';

/** 404 handler placed after all route mounts */
export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json(ResponseUtils.notFound('endpoint'));
}

function toResponse(err: unknown): { status: number; body: ApiResponse<never> } {
  if (err instanceof ZodError) {
    const errors = err.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`);
    return { status: 400, body: ResponseUtils.validationError(errors) };
  }
  // express.json() rejects malformed bodies with a SyntaxError carrying the raw body
  if (err instanceof SyntaxError && 'body' in err) {
    return { status: 400, body: ResponseUtils.validationError(['body: malformed JSON']) };
  }
  if (err instanceof ValidationError) {
    return { status: err.status, body: ResponseUtils.validationError(err.validationErrors, err.message) };
  }
  if (err instanceof InsufficientHistoryError) {
    return { status: err.status, body: ResponseUtils.error(err.code, err.message, { guidance: err.guidance }) };
  }
  if (err instanceof PipelineError) {
    const reason = err.cause instanceof GenerationError ? err.cause.reason : undefined;
    return { status: err.status, body: ResponseUtils.error(err.code, err.message, { stage: err.stage, reason }) };
  }
  if (err instanceof AppError && err.status < 500) {
    return { status: err.status, body: ResponseUtils.error(err.code, err.message) };
  }
  if (err instanceof AppError) {
    // Upstream failures keep their code; the message may carry backend detail
    return { status: err.status, body: ResponseUtils.error(err.code, 'The request could not be completed') };
  }
  // Avoid leaking internal details
  return { status: 500, body: ResponseUtils.internalError() };
}

/** Central error handler - MUST have 4 args to be recognized by Express */
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const { status, body } = toResponse(err);
  const log = status >= 500 ? logger.error : logger.warn;
  log({ err, status, url: req.originalUrl, method: req.method }, 'request_error');
  res.status(status).json(body);
}
