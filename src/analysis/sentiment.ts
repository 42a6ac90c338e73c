import Sentiment from 'sentiment';
import type { NewsArticle } from '../types/analysis.js';

const sentiment = new Sentiment();

export function sentimentScore(texts: string[]): number {
  if (!texts.length) return 0;
  const scores = texts.map(t => sentiment.analyze(t || '').comparative || 0);
  const avg = scores.reduce((a, b) => a + b, 0) / scores.length;
  return avg; // roughly -1..+1
}

/** Provided score when the feed carries one, lexical score of title + summary otherwise */
export function articleSentiment(article: NewsArticle): number {
  if (typeof article.sentimentScore === 'number' && Number.isFinite(article.sentimentScore)) return article.sentimentScore;
  const text = `${article.title || ''}. ${article.summary || ''}`.trim();
  return text ? sentimentScore([text]) : 0;
}

export function averageSentiment(articles: NewsArticle[]): number | null {
  if (!articles.length) return null;
  const scores = articles.map(articleSentiment);
  return scores.reduce((sum, v) => sum + v, 0) / scores.length;
}

export function classifySentiment(s: number | null | undefined) {
  if (s === null || s === undefined || !Number.isFinite(s)) return 'n/a';
  if (s > 0.15) return 'positive';
  if (s < -0.15) return 'negative';
  return 'neutral';
}
