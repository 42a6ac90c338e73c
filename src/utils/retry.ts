// Retry with bounded exponential backoff, shaped after the provider fetch helper
import { logger } from './logger.js';

export type RetryOptions = {
  attempts?: number;         // total attempts including first (default 3)
  backoffMs?: number;        // initial backoff (default 500)
  backoffFactor?: number;    // multiplier (default 2)
  maxBackoffMs?: number;     // cap (default 8000)
  retryIf?: (err: unknown) => boolean;
  label?: string;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

export function backoffDelay(attempt: number, opts: Pick<RetryOptions, 'backoffMs' | 'backoffFactor' | 'maxBackoffMs'> = {}) {
  const { backoffMs = 500, backoffFactor = 2, maxBackoffMs = 8000 } = opts;
  return Math.min(maxBackoffMs, backoffMs * Math.pow(backoffFactor, Math.max(0, attempt - 1)));
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const { attempts = 3, retryIf = () => true, label = 'operation', onRetry } = opts;
  const max = Math.max(1, attempts);
  let attempt = 1;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= max || !retryIf(err)) {
        if (attempt > 1) logger.error({ label, attempts: attempt, err }, 'retry_exhausted');
        throw err;
      }
      const delay = backoffDelay(attempt, opts);
      logger.warn({ label, attempt, delayMs: delay, err: err instanceof Error ? err.message : String(err) }, 'retry_attempt');
      onRetry?.(err, attempt, delay);
      await new Promise(r => setTimeout(r, delay));
      attempt++;
    }
  }
}
