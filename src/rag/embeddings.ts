import { Embeddings } from '@langchain/core/embeddings';
import { OpenAIEmbeddings } from '@langchain/openai';
import type { AppConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';

/**
 * Deterministic bag-of-tokens embedder: djb2 token hashes folded into `dim`
 * buckets, L2 normalized. Identical texts always map to identical vectors.
 */
export class LocalHashEmbeddings extends Embeddings {
  readonly dim: number;

  constructor(dim = 512) {
    super({});
    this.dim = dim;
  }

  vector(text: string): number[] {
    const v = new Array<number>(this.dim).fill(0);
    const tokens = String(text || '').toLowerCase().split(/[^a-z0-9]+/g).filter(Boolean);
    for (const t of tokens) {
      let h = 5381;
      for (let i = 0; i < t.length; i++) h = ((h << 5) + h + t.charCodeAt(i)) | 0;
      v[Math.abs(h) % this.dim] += 1;
    }
    let norm = 0;
    for (const x of v) norm += x * x;
    norm = Math.sqrt(norm) || 1;
    return v.map(x => x / norm);
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map(t => this.vector(t));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.vector(text);
  }
}

export function createEmbeddings(config: AppConfig): Embeddings {
  const { embeddings, embeddingModel, embedDim } = config.archive;
  const apiKey = config.generation.apiKey;
  if (embeddings === 'openai' && apiKey) {
    return new OpenAIEmbeddings({
      model: embeddingModel,
      apiKey,
      ...(config.generation.baseUrl ? { configuration: { baseURL: config.generation.baseUrl } } : {}),
    });
  }
  if (embeddings === 'openai') logger.warn('rag_embeddings_missing_key_fallback_local_hash');
  else logger.info({ dim: embedDim }, 'rag_embeddings_local_hash');
  return new LocalHashEmbeddings(embedDim);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0; let na = 0; let nb = 0;
  const n = Math.max(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i] || 0; const y = b[i] || 0;
    dot += x * y; na += x * x; nb += y * y;
  }
  return dot / ((Math.sqrt(na) || 1) * (Math.sqrt(nb) || 1));
}
