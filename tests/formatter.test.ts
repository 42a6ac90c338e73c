import { describe, it } from 'node:test';
import assert from 'node:assert';
import { formatMarketNews, formatNewsArticles, formatPriceSeries, normalizePriceSeries, windowPriceChangePct } from '../src/analysis/formatter.js';
import { averageSentiment, classifySentiment } from '../src/analysis/sentiment.js';
import { article, pricePoint } from './helpers.js';

describe('formatNewsArticles', () => {
  it('numbers articles and prints optional fields only when present', () => {
    const text = formatNewsArticles([
      article({ sentimentScore: 0.5 }),
      article({ title: 'Recall hits Acme', summary: '', source: '', topics: ['recall', 'safety'], url: 'https://example.com/a' }),
    ], 'ACME');
    assert.strictEqual(text, [
      '=== News Articles for ACME ===',
      '',
      'Article 1:',
      'Title: Acme ships new widget line',
      'Source: Test Wire',
      'Published: 2024-03-04',
      'Summary: The launch widens the product range.',
      'Sentiment: positive (Score: 0.5000)',
      '',
      'Article 2:',
      'Title: Recall hits Acme',
      'Source: N/A',
      'Published: 2024-03-04',
      'Summary: N/A',
      'Topics: recall, safety',
      'Link: https://example.com/a',
      '',
    ].join('\n'));
  });

  it('prefers the feed sentiment label over the derived one', () => {
    const text = formatNewsArticles([article({ sentimentScore: -0.05, sentimentLabel: 'Somewhat-Bearish' })], 'ACME');
    assert.ok(text.includes('Sentiment: Somewhat-Bearish (Score: -0.0500)\n'));
  });

  it('returns a marker for an empty list', () => {
    assert.strictEqual(formatNewsArticles([], 'ACME'), 'No news articles available.');
  });

  it('labels market news without a ticker', () => {
    assert.strictEqual(formatMarketNews([article()]).split('\n')[0], '=== News Articles (Market News) ===');
  });
});

describe('price series', () => {
  const series = [
    pricePoint('2024-03-05', 99),
    pricePoint('2024-03-01', 100),
    pricePoint('2024-03-04', 110),
    pricePoint('2024-03-04', 104),
    pricePoint('2024-03-06', Number.NaN),
  ];

  it('normalizes to chronological order, last duplicate wins, non-finite closes dropped', () => {
    assert.deepStrictEqual(normalizePriceSeries(series).map(p => [p.date, p.close]), [
      ['2024-03-01', 100],
      ['2024-03-04', 104],
      ['2024-03-05', 99],
    ]);
  });

  it('prints the window most recent first with day-over-day change', () => {
    assert.strictEqual(formatPriceSeries(series, 'ACME', 2), [
      '=== Recent Price Data for ACME ===',
      '',
      'Date: 2024-03-05',
      '  Open:   $98.00',
      '  High:   $100.00',
      '  Low:    $97.00',
      '  Close:  $99.00',
      '  Volume: 1,000',
      '  Change: -4.81%',
      '',
      'Date: 2024-03-04',
      '  Open:   $103.00',
      '  High:   $105.00',
      '  Low:    $102.00',
      '  Close:  $104.00',
      '  Volume: 1,000',
      '  Change: +4.00%',
      '',
      'Price Change (Last 2 days): -$5.00 (-4.81%)',
    ].join('\n'));
  });

  it('omits the window change for a single point', () => {
    const text = formatPriceSeries([pricePoint('2024-03-01', 10, { volume: 1234567.4 })], 'ACME');
    assert.strictEqual(text, [
      '=== Recent Price Data for ACME ===',
      '',
      'Date: 2024-03-01',
      '  Open:   $9.00',
      '  High:   $11.00',
      '  Low:    $8.00',
      '  Close:  $10.00',
      '  Volume: 1,234,567',
      '  Change: n/a',
      '',
    ].join('\n'));
  });

  it('returns a marker for an empty series', () => {
    assert.strictEqual(formatPriceSeries([], 'ACME'), 'No price data available for ACME.');
  });

  it('computes the percent change over the same window', () => {
    const pct = windowPriceChangePct(series, 2);
    assert.ok(pct !== null && Math.abs(pct - (-5 / 104) * 100) < 1e-9);
    assert.strictEqual(windowPriceChangePct([pricePoint('2024-03-01', 10)]), null);
  });
});

describe('sentiment helpers', () => {
  it('classifies around the neutral band', () => {
    assert.strictEqual(classifySentiment(0.2), 'positive');
    assert.strictEqual(classifySentiment(-0.2), 'negative');
    assert.strictEqual(classifySentiment(0.1), 'neutral');
    assert.strictEqual(classifySentiment(null), 'n/a');
  });

  it('averages provided scores and is null without articles', () => {
    const avg = averageSentiment([article({ sentimentScore: 0.4 }), article({ sentimentScore: -0.2 })]);
    assert.ok(avg !== null && Math.abs(avg - 0.1) < 1e-9);
    assert.strictEqual(averageSentiment([]), null);
  });
});
