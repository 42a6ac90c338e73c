import type Database from 'better-sqlite3';
import { Document } from '@langchain/core/documents';
import { MemoryVectorStore } from 'langchain/vectorstores/memory';
import type { Embeddings } from '@langchain/core/embeddings';
import { z } from 'zod';
import type { AnalysisType, ArchivedRecord, ScoredRecord } from '../types/analysis.js';
import { isReflectionType } from '../types/analysis.js';
import { cosineSimilarity } from './embeddings.js';

/** Metadata filter shared by range scans and vector lookups. */
export interface MetadataFilter {
  /** undefined matches every ticker, including portfolio records */
  ticker?: string;
  dateFrom?: string;
  dateTo?: string;
  includeReflections: boolean;
}

export interface StoredEntry {
  seq: number;
  record: ArchivedRecord;
  vector: number[];
}

export interface ArchiveCounts {
  total: number;
  byType: Record<string, number>;
  firstDate: string | null;
  lastDate: string | null;
}

/**
 * Storage seam under the archive. Implementations keep insertion order (`seq`)
 * so records with equal date and ticker come back in the order written.
 */
export interface VectorBackend {
  readonly kind: 'sqlite' | 'memory';
  insert(record: ArchivedRecord, vector: number[]): Promise<void>;
  queryByMetadata(filter: MetadataFilter): Promise<ArchivedRecord[]>;
  nearestNeighbors(vector: number[], k: number, filter: MetadataFilter): Promise<ScoredRecord[]>;
  counts(): Promise<ArchiveCounts>;
}

export function matchesFilter(record: ArchivedRecord, filter: MetadataFilter): boolean {
  if (filter.ticker !== undefined && record.ticker !== filter.ticker) return false;
  if (filter.dateFrom && record.date < filter.dateFrom) return false;
  if (filter.dateTo && record.date > filter.dateTo) return false;
  if (!filter.includeReflections && record.analysisType !== 'daily') return false;
  return true;
}

function compareEntries(a: StoredEntry, b: StoredEntry): number {
  if (a.record.date !== b.record.date) return a.record.date < b.record.date ? -1 : 1;
  const ta = a.record.ticker ?? '';
  const tb = b.record.ticker ?? '';
  if (ta !== tb) return ta < tb ? -1 : 1;
  return a.seq - b.seq;
}

const analysisTypeSchema = z.custom<AnalysisType>(
  (v) => typeof v === 'string' && (v === 'daily' || isReflectionType(v)),
  { message: 'unknown analysis type' },
);

const recordSchema = z.object({
  id: z.string(),
  ticker: z.string().nullable(),
  date: z.string(),
  analysisType: analysisTypeSchema,
  periodStart: z.string().nullable(),
  periodEnd: z.string().nullable(),
  body: z.string(),
  sections: z.record(z.string()),
  articleCount: z.number().nullable(),
  dayCount: z.number().nullable(),
  averageSentiment: z.number().nullable().default(null),
  priceChangePct: z.number().nullable().default(null),
  tickers: z.array(z.string()).default([]),
  lowConfidenceFacets: z.array(z.string()).default([]),
  failedFacets: z.array(z.string()).default([]),
  createdAt: z.string(),
});

const vectorSchema = z.array(z.number());

/** Parse a record column back into a typed record; rejects rows written by something else. */
export function parseStoredRecord(json: string): ArchivedRecord {
  return recordSchema.parse(JSON.parse(json));
}

interface ArchiveRow {
  seq: number;
  record: string;
  vector: string;
}

interface CountRow {
  analysis_type: string;
  n: number;
  first_date: string | null;
  last_date: string | null;
}

/**
 * better-sqlite3 backend. Metadata filters run in SQL before any similarity
 * is computed, so top-k is never cut from an unfiltered candidate set.
 */
export class SqliteVectorBackend implements VectorBackend {
  readonly kind = 'sqlite';
  private readonly insertStmt: Database.Statement<unknown[], unknown>;

  constructor(private readonly db: Database.Database) {
    this.insertStmt = db.prepare<unknown[], unknown>(`INSERT INTO analysis_archive
      (id, ticker, date, analysis_type, period_start, period_end, article_count, day_count, body, record, vector, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`);
  }

  async insert(record: ArchivedRecord, vector: number[]): Promise<void> {
    this.insertStmt.run(
      record.id,
      record.ticker,
      record.date,
      record.analysisType,
      record.periodStart,
      record.periodEnd,
      record.articleCount,
      record.dayCount,
      record.body,
      JSON.stringify(record),
      JSON.stringify(vector),
      record.createdAt,
    );
  }

  private where(filter: MetadataFilter): { sql: string; params: unknown[] } {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.ticker !== undefined) { clauses.push('ticker = ?'); params.push(filter.ticker); }
    if (filter.dateFrom) { clauses.push('date >= ?'); params.push(filter.dateFrom); }
    if (filter.dateTo) { clauses.push('date <= ?'); params.push(filter.dateTo); }
    if (!filter.includeReflections) { clauses.push(`analysis_type = 'daily'`); }
    return { sql: clauses.length ? `WHERE ${clauses.join(' AND ')}` : '', params };
  }

  private rows(filter: MetadataFilter): ArchiveRow[] {
    const { sql, params } = this.where(filter);
    return this.db
      .prepare<unknown[], ArchiveRow>(`SELECT seq, record, vector FROM analysis_archive ${sql} ORDER BY date ASC, ticker ASC, seq ASC`)
      .all(...params);
  }

  async queryByMetadata(filter: MetadataFilter): Promise<ArchivedRecord[]> {
    return this.rows(filter).map(r => parseStoredRecord(r.record));
  }

  async nearestNeighbors(vector: number[], k: number, filter: MetadataFilter): Promise<ScoredRecord[]> {
    return this.rows(filter)
      .map(r => ({ seq: r.seq, record: parseStoredRecord(r.record), score: cosineSimilarity(vector, vectorSchema.parse(JSON.parse(r.vector))) }))
      .sort((a, b) => b.score - a.score || a.seq - b.seq)
      .slice(0, k)
      .map(({ record, score }) => ({ record, score }));
  }

  async counts(): Promise<ArchiveCounts> {
    const rows = this.db
      .prepare<[], CountRow>(`SELECT analysis_type, COUNT(1) AS n, MIN(date) AS first_date, MAX(date) AS last_date FROM analysis_archive GROUP BY analysis_type ORDER BY analysis_type`)
      .all();
    return summarizeCounts(rows.map(r => ({ type: r.analysis_type, n: r.n, first: r.first_date, last: r.last_date })));
  }
}

function summarizeCounts(groups: Array<{ type: string; n: number; first: string | null; last: string | null }>): ArchiveCounts {
  const byType: Record<string, number> = {};
  let total = 0;
  let firstDate: string | null = null;
  let lastDate: string | null = null;
  for (const g of groups) {
    byType[g.type] = g.n;
    total += g.n;
    if (g.first && (!firstDate || g.first < firstDate)) firstDate = g.first;
    if (g.last && (!lastDate || g.last > lastDate)) lastDate = g.last;
  }
  return { total, byType, firstDate, lastDate };
}

/**
 * In-process backend on LangChain's MemoryVectorStore. The store only keeps
 * the record id in document metadata; full records live in a side map.
 */
export class MemoryVectorBackend implements VectorBackend {
  readonly kind = 'memory';
  private readonly store: MemoryVectorStore;
  private readonly entries = new Map<string, StoredEntry>();
  private seq = 0;

  constructor(embeddings: Embeddings) {
    this.store = new MemoryVectorStore(embeddings);
  }

  async insert(record: ArchivedRecord, vector: number[]): Promise<void> {
    await this.store.addVectors([vector], [new Document({ pageContent: record.body, metadata: { id: record.id } })]);
    // Entries own their copy; callers only ever see clones
    this.entries.set(record.id, { seq: ++this.seq, record: structuredClone(record), vector });
  }

  private entryOf(doc: Document): StoredEntry | undefined {
    const id: unknown = doc.metadata.id;
    return typeof id === 'string' ? this.entries.get(id) : undefined;
  }

  async queryByMetadata(filter: MetadataFilter): Promise<ArchivedRecord[]> {
    return Array.from(this.entries.values())
      .filter(e => matchesFilter(e.record, filter))
      .sort(compareEntries)
      .map(e => structuredClone(e.record));
  }

  async nearestNeighbors(vector: number[], k: number, filter: MetadataFilter): Promise<ScoredRecord[]> {
    const hits = await this.store.similaritySearchVectorWithScore(vector, k, (doc: Document) => {
      const entry = this.entryOf(doc);
      return !!entry && matchesFilter(entry.record, filter);
    });
    const scored: Array<ScoredRecord & { seq: number }> = [];
    for (const [doc, score] of hits) {
      const entry = this.entryOf(doc);
      if (entry) scored.push({ record: entry.record, score, seq: entry.seq });
    }
    return scored
      .sort((a, b) => b.score - a.score || a.seq - b.seq)
      .map(({ record, score }) => ({ record: structuredClone(record), score }));
  }

  async counts(): Promise<ArchiveCounts> {
    const groups = new Map<string, { type: string; n: number; first: string | null; last: string | null }>();
    for (const { record } of this.entries.values()) {
      const g = groups.get(record.analysisType) ?? { type: record.analysisType, n: 0, first: null, last: null };
      g.n += 1;
      if (!g.first || record.date < g.first) g.first = record.date;
      if (!g.last || record.date > g.last) g.last = record.date;
      groups.set(record.analysisType, g);
    }
    return summarizeCounts(Array.from(groups.values()));
  }
}
