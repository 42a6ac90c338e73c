export interface NewsArticle {
  title: string;
  summary: string;
  publishedAt: string;
  source: string;
  /** Roughly -1..+1 */
  sentimentScore?: number;
  sentimentLabel?: string;
  url?: string;
  topics?: string[];
}

export interface PricePoint {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type PriceSeries = PricePoint[];

export const DAILY_SECTION_KEYS = ['newsSummary', 'priceAnalysis', 'marketContext', 'finalSummary'] as const;
export const REFLECTION_SECTION_KEYS = ['patternAnalysis', 'sentimentEvolution', 'keyEvents', 'investmentThesis', 'riskAssessment'] as const;

export type DailySectionKey = typeof DAILY_SECTION_KEYS[number];
export type ReflectionSectionKey = typeof REFLECTION_SECTION_KEYS[number];
export type DailySections = Record<DailySectionKey, string>;
export type ReflectionSections = Record<ReflectionSectionKey, string>;

/** `week`, `month`, `quarter` or a custom label such as `fortnight` */
export type PeriodType = string;
export type AnalysisType = 'daily' | `reflection_${PeriodType}`;

export interface AnalysisRecord {
  /** null means portfolio (multi-ticker) scope */
  ticker: string | null;
  /** ISO date; the analysed day for daily records, the creation day for reflections */
  date: string;
  analysisType: AnalysisType;
  periodStart: string | null;
  periodEnd: string | null;
  body: string;
  sections: Record<string, string>;
  articleCount: number | null;
  dayCount: number | null;
  averageSentiment: number | null;
  priceChangePct: number | null;
  tickers: string[];
  lowConfidenceFacets: string[];
  failedFacets: string[];
  createdAt: string;
}

export interface DailyAnalysisRecord extends AnalysisRecord {
  analysisType: 'daily';
  sections: DailySections;
  articleCount: number;
}

export interface ReflectionRecord extends AnalysisRecord {
  analysisType: `reflection_${PeriodType}`;
  periodStart: string;
  periodEnd: string;
  sections: ReflectionSections;
  dayCount: number;
}

export interface ArchivedRecord extends AnalysisRecord {
  id: string;
}

export interface ScoredRecord {
  record: ArchivedRecord;
  score: number;
}

export function isReflectionType(type: string): boolean {
  return type.startsWith('reflection_');
}
