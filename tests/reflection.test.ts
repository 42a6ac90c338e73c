import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as delay } from 'node:timers/promises';
import type { GenerationBackend } from '../src/llm/generationClient.js';
import { ReflectionEngine, buildCorpus, hasDateReference } from '../src/analysis/reflection.js';
import { InsufficientHistoryError, PipelineError, ValidationError } from '../src/shared/errors.js';
import { FakeBackend, dailyRecord, fastClient, roleOf } from './helpers.js';

class PeakTrackingBackend implements GenerationBackend {
  readonly name = 'peak';
  active = 0;
  peak = 0;
  calls = 0;

  async generate(): Promise<string> {
    this.calls++;
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    await delay(10);
    this.active--;
    return 'On 2024-03-05 guidance rose';
  }
}

const weekOfAcme = [
  dailyRecord({ date: '2024-03-06', body: 'Wednesday: guidance raised.' }),
  dailyRecord({ date: '2024-03-04', body: 'Monday: widget launch.' }),
  dailyRecord({ date: '2024-03-04', body: 'Monday again: analyst upgrade.' }),
];

describe('ReflectionEngine.runReflection', () => {
  it('runs the five facets over the chronological corpus', async () => {
    const backend = new FakeBackend();
    const engine = new ReflectionEngine(fastClient(backend), { concurrency: 2 });
    const record = await engine.runReflection(weekOfAcme, 'ACME', 'week', { date: '2024-03-07' });

    assert.deepStrictEqual([...backend.roles()].sort(), ['EVENTS ANALYST', 'PATTERN ANALYST', 'PORTFOLIO STRATEGIST', 'RISK ANALYST', 'SENTIMENT ANALYST']);
    assert.ok(backend.requests[0].user.includes('Date: 2024-03-04\nMonday: widget launch.\n\nDate: 2024-03-04\nMonday again: analyst upgrade.\n\nDate: 2024-03-06\nWednesday: guidance raised.'));
    assert.strictEqual(record.ticker, 'ACME');
    assert.strictEqual(record.date, '2024-03-07');
    assert.strictEqual(record.analysisType, 'reflection_week');
    assert.strictEqual(record.periodStart, '2024-03-04');
    assert.strictEqual(record.periodEnd, '2024-03-06');
    assert.strictEqual(record.dayCount, 2);
    assert.strictEqual(record.sections.investmentThesis, 'PORTFOLIO STRATEGIST output');
    assert.ok(record.body.startsWith('PERIODIC REFLECTION (WEEK)\nPeriod: 2024-03-04 to 2024-03-06 (2 days) for ACME\n\n## Pattern Analysis\nPATTERN ANALYST output\n\n## Sentiment Evolution\n'));
    assert.deepStrictEqual(record.failedFacets, []);
  });

  it('flags key events that cite no date', async () => {
    const undated = await new ReflectionEngine(fastClient(new FakeBackend())).runReflection(weekOfAcme, 'ACME', 'week');
    assert.deepStrictEqual(undated.lowConfidenceFacets, ['keyEvents']);

    const dated = await new ReflectionEngine(fastClient(new FakeBackend((req) =>
      roleOf(req) === 'EVENTS ANALYST' ? '1. 2024-03-06: guidance raised' : 'text'))).runReflection(weekOfAcme, 'ACME', 'week');
    assert.deepStrictEqual(dated.lowConfidenceFacets, []);
  });

  it('attributes every corpus entry to its ticker in portfolio mode', async () => {
    const backend = new FakeBackend();
    const record = await new ReflectionEngine(fastClient(backend)).runReflection([
      dailyRecord({ ticker: 'ACME', date: '2024-03-05', body: 'acme later' }),
      dailyRecord({ ticker: 'BETA', date: '2024-03-04', body: 'beta early' }),
      dailyRecord({ ticker: 'ACME', date: '2024-03-04', body: 'acme early' }),
    ], null, 'week');

    assert.strictEqual(record.ticker, null);
    assert.deepStrictEqual(record.tickers, ['ACME', 'BETA']);
    assert.ok(backend.requests[0].user.startsWith('Below are the archived daily analyses for the portfolio over the past week'));
    assert.ok(backend.requests[0].user.includes('Date: 2024-03-04 | Ticker: ACME\nacme early\n\nDate: 2024-03-04 | Ticker: BETA\nbeta early\n\nDate: 2024-03-05 | Ticker: ACME\nacme later'));
    assert.ok(record.body.includes('\nPeriod: 2024-03-04 to 2024-03-05 (2 days) across 2 targets: ACME, BETA\n'));
  });

  it('keeps at most `concurrency` facet calls in flight', async () => {
    const backend = new PeakTrackingBackend();
    const record = await new ReflectionEngine(fastClient(backend), { concurrency: 2 }).runReflection(weekOfAcme, 'ACME', 'week');
    assert.strictEqual(backend.calls, 5);
    assert.strictEqual(backend.peak, 2);
    assert.strictEqual(backend.active, 0);
    assert.deepStrictEqual(record.failedFacets, []);
  });

  it('rejects history from another ticker in a single-ticker reflection', async () => {
    const backend = new FakeBackend();
    const mixed = [...weekOfAcme, dailyRecord({ ticker: 'BETA', date: '2024-03-05', body: 'beta news' })];
    await assert.rejects(
      new ReflectionEngine(fastClient(backend)).runReflection(mixed, 'acme', 'week'),
      (err: unknown) => err instanceof ValidationError && err.validationErrors.includes('periodSummaries[3].ticker BETA does not match ACME'),
    );
    assert.strictEqual(backend.requests.length, 0);
  });

  it('refuses an empty history without calling the backend', async () => {
    const backend = new FakeBackend();
    await assert.rejects(new ReflectionEngine(fastClient(backend)).runReflection([], 'ACME', 'week'), InsufficientHistoryError);
    assert.strictEqual(backend.requests.length, 0);
  });

  it('rejects period labels that are not simple words', async () => {
    await assert.rejects(new ReflectionEngine(fastClient(new FakeBackend())).runReflection(weekOfAcme, 'ACME', 'last week'), ValidationError);
  });

  it('aborts on the first failed facet under the abort policy', async () => {
    const backend = new FakeBackend((req) => {
      if (roleOf(req) === 'SENTIMENT ANALYST') throw new Error('boom');
      return 'ok';
    });
    const engine = new ReflectionEngine(fastClient(backend, { maxAttempts: 1 }), { concurrency: 1, failurePolicy: 'abort' });
    await assert.rejects(engine.runReflection(weekOfAcme, 'ACME', 'week'), (err: unknown) => err instanceof PipelineError && err.stage === 'sentimentEvolution');
    assert.strictEqual(backend.requests.length, 2);
  });

  it('substitutes a marked placeholder under the placeholder policy', async () => {
    const backend = new FakeBackend((req) => {
      if (roleOf(req) === 'EVENTS ANALYST') throw new Error('boom');
      return 'ok';
    });
    const engine = new ReflectionEngine(fastClient(backend, { maxAttempts: 1 }), { failurePolicy: 'placeholder' });
    const record = await engine.runReflection(weekOfAcme, 'ACME', 'month');
    assert.strictEqual(backend.requests.length, 5);
    assert.deepStrictEqual(record.failedFacets, ['keyEvents']);
    assert.strictEqual(record.sections.keyEvents, '[UNAVAILABLE] Key Events could not be generated: boom');
    assert.deepStrictEqual(record.lowConfidenceFacets, []);
    assert.strictEqual(record.analysisType, 'reflection_month');
  });
});

describe('corpus helpers', () => {
  it('falls back to the final summary when the body is empty', () => {
    const corpus = buildCorpus([dailyRecord({ body: '', sections: { finalSummary: 'summary only' } })], false);
    assert.strictEqual(corpus, 'Date: 2024-03-04\nsummary only');
  });

  it('recognizes common date notations', () => {
    assert.strictEqual(hasDateReference('On 2024-03-05 guidance rose'), true);
    assert.strictEqual(hasDateReference('On March 5 guidance rose'), true);
    assert.strictEqual(hasDateReference('Around 5 Mar guidance rose'), true);
    assert.strictEqual(hasDateReference('Filed 3/5 after the close'), true);
    assert.strictEqual(hasDateReference('Guidance rose during the period'), false);
  });
});
