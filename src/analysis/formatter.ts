import type { NewsArticle, PricePoint, PriceSeries } from '../types/analysis.js';
import { classifySentiment } from './sentiment.js';

export const DEFAULT_PRICE_WINDOW = 5;

function formatPct(v: number) { return `${v >= 0 ? '+' : ''}${v.toFixed(2)}%`; }
function formatMoney(v: number) { return `${v >= 0 ? '+' : '-'}$${Math.abs(v).toFixed(2)}`; }
function pctChange(from: number, to: number): number | null { return from ? ((to - from) / from) * 100 : null; }

export function formatNewsArticles(articles: NewsArticle[], ticker?: string | null): string {
  if (!articles.length) return 'No news articles available.';

  const lines: string[] = [];
  lines.push(`=== News Articles ${ticker ? `for ${ticker}` : '(Market News)'} ===`, '');
  articles.forEach((a, i) => {
    lines.push(`Article ${i + 1}:`);
    lines.push(`Title: ${a.title || 'N/A'}`);
    lines.push(`Source: ${a.source || 'N/A'}`);
    lines.push(`Published: ${a.publishedAt || 'N/A'}`);
    lines.push(`Summary: ${a.summary || 'N/A'}`);
    if (a.topics?.length) lines.push(`Topics: ${a.topics.join(', ')}`);
    if (typeof a.sentimentScore === 'number' && Number.isFinite(a.sentimentScore)) {
      lines.push(`Sentiment: ${a.sentimentLabel || classifySentiment(a.sentimentScore)} (Score: ${a.sentimentScore.toFixed(4)})`);
    }
    if (a.url) lines.push(`Link: ${a.url}`);
    lines.push('');
  });
  return lines.join('\n');
}

export function formatMarketNews(articles: NewsArticle[]): string {
  return formatNewsArticles(articles, null);
}

/**
 * Chronological order, one point per date (the last occurrence wins),
 * points without a finite close dropped.
 */
export function normalizePriceSeries(series: PriceSeries): PricePoint[] {
  const byDate = new Map<string, PricePoint>();
  for (const p of series) {
    if (!p || !p.date || !Number.isFinite(p.close)) continue;
    byDate.set(p.date, p);
  }
  return Array.from(byDate.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export function formatPriceSeries(series: PriceSeries, ticker: string, k = DEFAULT_PRICE_WINDOW): string {
  const points = normalizePriceSeries(series);
  if (!points.length) return `No price data available for ${ticker}.`;

  const start = Math.max(0, points.length - Math.max(1, k));
  const lines: string[] = [`=== Recent Price Data for ${ticker} ===`, ''];
  // Most recent first; the change of the oldest shown point still uses the point before the window
  for (let i = points.length - 1; i >= start; i--) {
    const p = points[i];
    const change = i > 0 ? pctChange(points[i - 1].close, p.close) : null;
    lines.push(`Date: ${p.date}`);
    lines.push(`  Open:   $${p.open.toFixed(2)}`);
    lines.push(`  High:   $${p.high.toFixed(2)}`);
    lines.push(`  Low:    $${p.low.toFixed(2)}`);
    lines.push(`  Close:  $${p.close.toFixed(2)}`);
    lines.push(`  Volume: ${Math.round(p.volume).toLocaleString('en-US')}`);
    lines.push(`  Change: ${change === null ? 'n/a' : formatPct(change)}`);
    lines.push('');
  }

  const shown = points.length - start;
  if (shown >= 2) {
    const first = points[start];
    const last = points[points.length - 1];
    const pct = pctChange(first.close, last.close);
    lines.push(`Price Change (Last ${shown} days): ${formatMoney(last.close - first.close)} (${pct === null ? 'n/a' : formatPct(pct)})`);
  }
  return lines.join('\n');
}

/** Percent change across the same window `formatPriceSeries` shows */
export function windowPriceChangePct(series: PriceSeries, k = DEFAULT_PRICE_WINDOW): number | null {
  const points = normalizePriceSeries(series);
  const window = points.slice(Math.max(0, points.length - Math.max(1, k)));
  if (window.length < 2) return null;
  return pctChange(window[0].close, window[window.length - 1].close);
}
