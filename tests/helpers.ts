import { GenerationClient, type GenerationBackend, type GenerationRequest } from '../src/llm/generationClient.js';
import { LocalHashEmbeddings } from '../src/rag/embeddings.js';
import type { AnalysisRecord, NewsArticle, PricePoint } from '../src/types/analysis.js';

process.env.LOG_LEVEL = 'silent';

const ROLE_PREFIX = 'Your role on the research desk: ';

/** Role title of a rendered system prompt, e.g. "NEWS ANALYST" */
export function roleOf(request: Pick<GenerationRequest, 'system'>): string {
  const first = request.system.split('\n')[0];
  return first.startsWith(ROLE_PREFIX) ? first.slice(ROLE_PREFIX.length) : first;
}

type Responder = (request: GenerationRequest, call: number) => string | Promise<string>;

/** Scripted in-process backend; answers with the role title unless told otherwise */
export class FakeBackend implements GenerationBackend {
  readonly name = 'fake';
  readonly requests: GenerationRequest[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(private readonly respond: Responder = (req) => `${roleOf(req)} output`) {}

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    this.requests.push(request);
    this.signals.push(signal);
    return this.respond(request, this.requests.length);
  }

  roles(): string[] {
    return this.requests.map(roleOf);
  }
}

export function fastClient(backend: GenerationBackend, overrides: ConstructorParameters<typeof GenerationClient>[1] = {}) {
  return new GenerationClient(backend, { backoffMs: 0, maxBackoffMs: 0, timeoutMs: 1_000, ...overrides });
}

export function localEmbeddings() {
  return new LocalHashEmbeddings(256);
}

export function article(overrides: Partial<NewsArticle> = {}): NewsArticle {
  return {
    title: 'Acme ships new widget line',
    summary: 'The launch widens the product range.',
    publishedAt: '2024-03-04',
    source: 'Test Wire',
    ...overrides,
  };
}

export function pricePoint(date: string, close: number, overrides: Partial<PricePoint> = {}): PricePoint {
  return { date, open: close - 1, high: close + 1, low: close - 2, close, volume: 1000, ...overrides };
}

export function dailyRecord(overrides: Partial<AnalysisRecord> = {}): AnalysisRecord {
  return {
    ticker: 'ACME',
    date: '2024-03-04',
    analysisType: 'daily',
    periodStart: null,
    periodEnd: null,
    body: 'Acme rallied on strong widget demand.',
    sections: { finalSummary: 'Acme rallied on strong widget demand.' },
    articleCount: 2,
    dayCount: null,
    averageSentiment: 0.2,
    priceChangePct: 1.5,
    tickers: ['ACME'],
    lowConfidenceFacets: [],
    failedFacets: [],
    createdAt: '2024-03-04T18:00:00.000Z',
    ...overrides,
  };
}
