import crypto from 'crypto';
import type { Embeddings } from '@langchain/core/embeddings';
import type { AnalysisRecord, ArchivedRecord, ScoredRecord } from '../types/analysis.js';
import { PersistenceError, ValidationError } from '../shared/errors.js';
import { ValidationUtils, type ValidationResult } from '../shared/utils/validation.utils.js';
import { logger } from '../utils/logger.js';
import type { ArchiveCounts, MetadataFilter, VectorBackend } from './backends.js';

export interface QueryRangeOptions {
  /** Reflection records are left out unless asked for */
  includeReflections?: boolean;
}

export interface SearchOptions {
  ticker?: string | null;
  k?: number;
  dateRange?: { start: string; end: string } | null;
  includeReflections?: boolean;
}

export interface ArchiveStats extends ArchiveCounts {
  backend: VectorBackend['kind'];
}

const DEFAULT_SEARCH_K = 5;

/** Tickers are stored and matched upper-case */
export function normalizeTicker(ticker: string | null | undefined): string | null {
  const t = ticker?.trim().toUpperCase();
  return t ? t : null;
}

export function validateRecord(record: AnalysisRecord): ValidationResult {
  const results: ValidationResult[] = [
    ValidationUtils.validateIsoDate(record.date, 'date'),
    ValidationUtils.validateString(record.body, 'body'),
    ValidationUtils.validateString(record.analysisType, 'analysisType'),
  ];
  if (record.ticker !== null) results.push(ValidationUtils.validateTicker(record.ticker));
  if (record.periodStart !== null || record.periodEnd !== null) {
    results.push(ValidationUtils.validateDateRange(record.periodStart ?? '', record.periodEnd ?? ''));
  }
  return ValidationUtils.combineResults(...results);
}

/**
 * Append-only archive of analysis records. Every write gets a fresh id, so
 * writing the same record twice yields two retrievable entries.
 */
export class ArchiveStore {
  constructor(private readonly backend: VectorBackend, private readonly embeddings: Embeddings) {}

  get backendKind() { return this.backend.kind; }

  async write(record: AnalysisRecord): Promise<string> {
    const checks = validateRecord(record);
    if (!checks.isValid) throw new ValidationError('Invalid analysis record', checks.errors);

    const archived: ArchivedRecord = { ...record, ticker: normalizeTicker(record.ticker), id: crypto.randomUUID() };
    try {
      const vector = await this.embeddings.embedQuery(record.body);
      await this.backend.insert(archived, vector);
    } catch (err) {
      logger.error({ ticker: record.ticker, date: record.date, analysisType: record.analysisType, err }, 'archive_write_failed');
      throw new PersistenceError('write', err);
    }
    logger.info({ id: archived.id, ticker: archived.ticker, date: record.date, analysisType: record.analysisType, backend: this.backend.kind }, 'archive_write');
    return archived.id;
  }

  /** Metadata-only scan, ascending by date. `ticker = null` spans every ticker. */
  async queryRange(start: string, end: string, ticker: string | null, options: QueryRangeOptions = {}): Promise<ArchivedRecord[]> {
    const checks = ValidationUtils.validateDateRange(start, end, 'start', 'end');
    if (!checks.isValid) throw new ValidationError('Invalid date range', checks.errors);
    const filter: MetadataFilter = {
      ticker: normalizeTicker(ticker) ?? undefined,
      dateFrom: start,
      dateTo: end,
      includeReflections: options.includeReflections ?? false,
    };
    try {
      return await this.backend.queryByMetadata(filter);
    } catch (err) {
      throw new PersistenceError('query', err);
    }
  }

  async search(query: string, options: SearchOptions = {}): Promise<ScoredRecord[]> {
    const q = ValidationUtils.validateString(query, 'query');
    const range = options.dateRange
      ? ValidationUtils.validateDateRange(options.dateRange.start, options.dateRange.end, 'start', 'end')
      : { isValid: true, errors: [] };
    const checks = ValidationUtils.combineResults(q, range);
    if (!checks.isValid) throw new ValidationError('Invalid search', checks.errors);

    const k = Math.max(1, Math.floor(options.k ?? DEFAULT_SEARCH_K));
    const filter: MetadataFilter = {
      ticker: normalizeTicker(options.ticker) ?? undefined,
      dateFrom: options.dateRange?.start,
      dateTo: options.dateRange?.end,
      includeReflections: options.includeReflections ?? true,
    };
    try {
      const vector = await this.embeddings.embedQuery(query);
      const hits = await this.backend.nearestNeighbors(vector, k, filter);
      logger.debug({ ticker: filter.ticker ?? null, k, hits: hits.length }, 'archive_search');
      return hits;
    } catch (err) {
      throw new PersistenceError('search', err);
    }
  }

  async stats(): Promise<ArchiveStats> {
    try {
      return { backend: this.backend.kind, ...(await this.backend.counts()) };
    } catch (err) {
      throw new PersistenceError('stats', err);
    }
  }
}
