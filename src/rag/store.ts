import type Database from 'better-sqlite3';
import type { Embeddings } from '@langchain/core/embeddings';
import type { AppConfig } from '../config/index.js';
import { openDatabase } from '../db.js';
import { ArchiveStore } from './archive.js';
import { MemoryVectorBackend, SqliteVectorBackend } from './backends.js';
import { createEmbeddings } from './embeddings.js';
import { logger } from '../utils/logger.js';

export interface OpenedArchive {
  store: ArchiveStore;
  /** Releases the database handle, if any */
  close(): void;
}

export function openArchive(config: AppConfig, embeddings: Embeddings = createEmbeddings(config)): OpenedArchive {
  if (config.archive.store === 'memory') {
    logger.warn('archive_memory_store_not_persistent');
    return { store: new ArchiveStore(new MemoryVectorBackend(embeddings), embeddings), close: () => undefined };
  }
  const db: Database.Database = openDatabase(config.archive.dbPath);
  return { store: new ArchiveStore(new SqliteVectorBackend(db), embeddings), close: () => db.close() };
}
