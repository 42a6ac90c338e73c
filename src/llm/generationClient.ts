import { GenerationError, type GenerationFailureReason } from '../shared/errors.js';
import type { RenderedPrompt } from '../prompts/catalog.js';
import type { GenerationConfig } from '../config/index.js';
import { withRetry } from '../utils/retry.js';
import { logger } from '../utils/logger.js';

export interface GenerationRequest extends RenderedPrompt {
  temperature: number;
}

/** A single text-generation capability; implementations must honour `signal`. */
export interface GenerationBackend {
  readonly name: string;
  generate(request: GenerationRequest, signal: AbortSignal): Promise<string>;
}

export type GenerationClientOptions = Pick<GenerationConfig, 'temperature' | 'timeoutMs' | 'maxAttempts' | 'backoffMs' | 'backoffFactor' | 'maxBackoffMs'>;

export const DEFAULT_GENERATION_OPTIONS: GenerationClientOptions = {
  temperature: 0.3,
  timeoutMs: 60_000,
  maxAttempts: 3,
  backoffMs: 500,
  backoffFactor: 2,
  maxBackoffMs: 8_000,
};

function statusOf(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status = Reflect.get(err, 'status') ?? Reflect.get(err, 'statusCode');
  return typeof status === 'number' ? status : null;
}

export function classifyBackendError(err: unknown): GenerationError {
  if (err instanceof GenerationError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const status = statusOf(err);
  let reason: GenerationFailureReason = 'backend';
  if (status === 429 || /quota|rate limit/i.test(message)) reason = 'quota';
  else if ((err instanceof Error && err.name === 'AbortError') || /timed? ?out/i.test(message)) reason = 'timeout';
  return new GenerationError(reason, message, { cause: err });
}

/**
 * Stateless wrapper around a generation backend: per-attempt timeout,
 * bounded exponential backoff, empty output treated as malformed.
 */
export class GenerationClient {
  private readonly options: GenerationClientOptions;
  private calls = 0;

  constructor(private readonly backend: GenerationBackend, options: Partial<GenerationClientOptions> = {}) {
    this.options = { ...DEFAULT_GENERATION_OPTIONS, ...options };
  }

  get defaultTemperature() { return this.options.temperature; }
  get backendName() { return this.backend.name; }
  /** Backend invocations so far, retries included */
  get callCount() { return this.calls; }

  async generate(prompt: RenderedPrompt, temperature = this.options.temperature): Promise<string> {
    const { maxAttempts, backoffMs, backoffFactor, maxBackoffMs } = this.options;
    return withRetry(
      (attempt) => this.attempt({ ...prompt, temperature }).catch((err: unknown) => {
        const classified = classifyBackendError(err);
        classified.attempts = attempt;
        throw classified;
      }),
      { attempts: maxAttempts, backoffMs, backoffFactor, maxBackoffMs, label: `generation:${this.backend.name}` },
    );
  }

  private async attempt(request: GenerationRequest): Promise<string> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settle as a timeout before the backend sees the abort
        reject(new GenerationError('timeout', `generation exceeded ${timeoutMs}ms`));
        controller.abort();
      }, timeoutMs);
    });
    this.calls++;
    const started = Date.now();
    try {
      const text = await Promise.race([this.backend.generate(request, controller.signal), timeout]);
      if (typeof text !== 'string' || !text.trim()) {
        throw new GenerationError('malformed', 'generation returned empty output');
      }
      logger.debug({ backend: this.backend.name, ms: Date.now() - started, chars: text.length }, 'generation_ok');
      return text.trim();
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}
