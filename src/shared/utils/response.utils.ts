/**
 * Shared response utilities for consistent API responses
 */

export interface ResponseMeta {
  total?: number;
  [key: string]: unknown;
}

export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  message?: string;
  meta?: ResponseMeta;
}

export class ResponseUtils {
  public static success<T>(data: T, message?: string, meta?: ResponseMeta): ApiResponse<T> {
    return {
      ok: true,
      data,
      message,
      meta
    };
  }

  public static list<T>(data: T[], meta: ResponseMeta = {}): ApiResponse<T[]> {
    return {
      ok: true,
      data,
      meta: { total: data.length, ...meta }
    };
  }

  public static error(error: string | Error, message?: string, meta?: ResponseMeta): ApiResponse<never> {
    return {
      ok: false,
      error: error instanceof Error ? error.message : error,
      message,
      meta
    };
  }

  public static validationError(errors: string[], message = 'Validation failed'): ApiResponse<never> {
    return {
      ok: false,
      error: 'validation_error',
      message,
      meta: { errors }
    };
  }

  public static notFound(resource: string): ApiResponse<never> {
    return {
      ok: false,
      error: `${resource} not found`,
      message: `The requested ${resource} could not be found`
    };
  }

  public static rateLimited(message = 'Rate limit exceeded'): ApiResponse<never> {
    return {
      ok: false,
      error: 'Rate limit exceeded',
      message
    };
  }

  public static internalError(message = 'Internal server error'): ApiResponse<never> {
    return {
      ok: false,
      error: 'Internal server error',
      message
    };
  }
}
