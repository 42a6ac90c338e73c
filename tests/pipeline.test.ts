import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AnalysisPipeline, NO_MARKET_CONTEXT, NO_PRICE_DATA } from '../src/analysis/pipeline.js';
import { PipelineError, ValidationError } from '../src/shared/errors.js';
import { FakeBackend, article, fastClient, pricePoint, roleOf } from './helpers.js';

const prices = [pricePoint('2024-03-01', 100), pricePoint('2024-03-04', 102)];

describe('AnalysisPipeline.runDailyAnalysis', () => {
  it('runs news, price, market context and synthesis in order', async () => {
    const backend = new FakeBackend();
    const pipeline = new AnalysisPipeline(fastClient(backend));
    const record = await pipeline.runDailyAnalysis('acme', [article({ sentimentScore: 0.3 })], prices, [article({ title: 'Rates hold' })], { date: '2024-03-04' });

    assert.deepStrictEqual(backend.roles(), ['NEWS ANALYST', 'TECHNICAL ANALYST', 'MACROECONOMIC ANALYST', 'SENIOR RESEARCH ANALYST']);
    assert.strictEqual(record.ticker, 'ACME');
    assert.strictEqual(record.date, '2024-03-04');
    assert.strictEqual(record.analysisType, 'daily');
    assert.strictEqual(record.body, 'SENIOR RESEARCH ANALYST output');
    assert.deepStrictEqual(record.sections, {
      newsSummary: 'NEWS ANALYST output',
      priceAnalysis: 'TECHNICAL ANALYST output',
      marketContext: 'MACROECONOMIC ANALYST output',
      finalSummary: 'SENIOR RESEARCH ANALYST output',
    });
    assert.strictEqual(record.articleCount, 1);
    assert.strictEqual(record.averageSentiment, 0.3);
    assert.strictEqual(record.priceChangePct, 2);
    assert.deepStrictEqual(record.tickers, ['ACME']);
    assert.strictEqual(record.periodStart, null);
  });

  it('hands every earlier section to the synthesis prompt', async () => {
    const backend = new FakeBackend();
    await new AnalysisPipeline(fastClient(backend)).runDailyAnalysis('ACME', [article()], prices, [article()], { date: '2024-03-04' });
    const synthesis = backend.requests[3].user;
    assert.ok(synthesis.includes('=== NEWS ANALYSIS ===\nNEWS ANALYST output'));
    assert.ok(synthesis.includes('=== TECHNICAL ANALYSIS ===\nTECHNICAL ANALYST output'));
    assert.ok(synthesis.includes('=== MARKET CONTEXT ===\nMACROECONOMIC ANALYST output'));
  });

  it('uses fixed markers instead of calls when price or market data is missing', async () => {
    const backend = new FakeBackend();
    const record = await new AnalysisPipeline(fastClient(backend)).runDailyAnalysis('ACME', [], [], [], { date: '2024-03-04' });
    assert.deepStrictEqual(backend.roles(), ['NEWS ANALYST', 'SENIOR RESEARCH ANALYST']);
    assert.strictEqual(record.sections.priceAnalysis, NO_PRICE_DATA);
    assert.strictEqual(record.sections.marketContext, NO_MARKET_CONTEXT);
    assert.strictEqual(record.articleCount, 0);
    assert.strictEqual(record.averageSentiment, null);
    assert.strictEqual(record.priceChangePct, null);
  });

  it('switches the news stage to an alternative prompt', async () => {
    const backend = new FakeBackend();
    await new AnalysisPipeline(fastClient(backend)).runDailyAnalysis('ACME', [article()], [], [], { date: '2024-03-04', newsPrompt: 'risk_focused' });
    assert.strictEqual(backend.roles()[0], 'RISK ANALYST');
  });

  it('stops at the first failing stage and names it', async () => {
    const backend = new FakeBackend((req) => {
      if (roleOf(req) === 'TECHNICAL ANALYST') throw new Error('backend down');
      return 'fine';
    });
    const pipeline = new AnalysisPipeline(fastClient(backend, { maxAttempts: 1 }));
    await assert.rejects(pipeline.runDailyAnalysis('ACME', [article()], prices, [article()], { date: '2024-03-04' }), (err: unknown) => {
      assert.ok(err instanceof PipelineError);
      assert.strictEqual(err.stage, 'price');
      assert.strictEqual(err.message, 'Stage "price" failed: backend down');
      return true;
    });
    assert.strictEqual(backend.requests.length, 2);
  });

  it('applies caller instructions to the news and synthesis stages', async () => {
    const backend = new FakeBackend();
    await new AnalysisPipeline(fastClient(backend)).runDailyAnalysis('ACME', [article()], prices, [], {
      date: '2024-03-04',
      newsInstructions: { instructions: 'CHIP ANALYST. Focus on fabs.', includePrinciples: false },
      synthesisInstructions: { instructions: 'Three bullets only.' },
    });
    assert.deepStrictEqual(backend.roles(), ['CHIP ANALYST. Focus on fabs.', 'TECHNICAL ANALYST', 'ANALYSIS PRINCIPLES:']);
    assert.ok(backend.requests[2].system.endsWith('\n\nThree bullets only.'));
  });

  it('rejects bad input before any generation call', async () => {
    const backend = new FakeBackend();
    const pipeline = new AnalysisPipeline(fastClient(backend));
    await assert.rejects(pipeline.runDailyAnalysis('BAD TICKER!', [], []), ValidationError);
    await assert.rejects(pipeline.runDailyAnalysis('ACME', [], [], [], { date: '2024-02-30' }), ValidationError);
    assert.strictEqual(backend.requests.length, 0);
  });
});

describe('AnalysisPipeline.summarizeNews', () => {
  it('runs only the news stage for a ticker', async () => {
    const backend = new FakeBackend();
    const result = await new AnalysisPipeline(fastClient(backend)).summarizeNews('acme', [article({ sentimentScore: 0.5 }), article({ sentimentScore: -0.1 })]);
    assert.deepStrictEqual(backend.roles(), ['NEWS ANALYST']);
    assert.ok(backend.requests[0].user.startsWith('Analyze the following news articles about ACME:\n\n=== News Articles for ACME ===\n'));
    assert.deepStrictEqual(result, { target: 'ACME', newsPrompt: 'news_analysis', summary: 'NEWS ANALYST output', articleCount: 2, averageSentiment: 0.2 });
  });

  it('formats a market or topic target as market news', async () => {
    const backend = new FakeBackend();
    const result = await new AnalysisPipeline(fastClient(backend)).summarizeNews('market:semiconductors', [article()], { newsPrompt: 'risk_focused' });
    assert.strictEqual(result.target, 'market:semiconductors');
    assert.deepStrictEqual(backend.roles(), ['RISK ANALYST']);
    assert.ok(backend.requests[0].user.startsWith('Analyze the following news articles about market:semiconductors:\n\n=== News Articles (Market News) ===\n'));
  });

  it('falls back to a generic target without one', async () => {
    const backend = new FakeBackend();
    const result = await new AnalysisPipeline(fastClient(backend)).summarizeNews(null, []);
    assert.strictEqual(result.target, 'the target');
    assert.strictEqual(result.averageSentiment, null);
    assert.ok(backend.requests[0].user.includes('No news articles available.'));
  });

  it('names the news stage when generation fails', async () => {
    const backend = new FakeBackend(() => { throw new Error('boom'); });
    await assert.rejects(
      new AnalysisPipeline(fastClient(backend, { maxAttempts: 1 })).summarizeNews('ACME', [article()]),
      (err: unknown) => err instanceof PipelineError && err.stage === 'news',
    );
  });
});
