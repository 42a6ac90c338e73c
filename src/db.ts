import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './utils/logger.js';

export const MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), 'db', 'migrations');

interface VersionRow { version: string }

// Simple migration runner: apply SQL files under db/migrations in order, each in its own transaction
export function runMigrations(db: Database.Database, dir = MIGRATIONS_DIR): string[] {
  if (!fs.existsSync(dir)) throw new Error(`Migrations directory not found: ${dir}`);
  db.exec('CREATE TABLE IF NOT EXISTS schema_migrations(version TEXT PRIMARY KEY, applied_at TEXT)');
  const applied = new Set(db.prepare<[], VersionRow>('SELECT version FROM schema_migrations').all().map(r => r.version));
  const files = fs.readdirSync(dir).filter(f => /\.sql$/i.test(f)).sort();
  const record = db.prepare<[string, string], unknown>('INSERT INTO schema_migrations(version, applied_at) VALUES(?, ?)');
  const done: string[] = [];

  for (const f of files) {
    if (applied.has(f)) continue;
    const sql = fs.readFileSync(path.join(dir, f), 'utf8');
    db.transaction(() => {
      db.exec(sql);
      record.run(f, new Date().toISOString());
    })();
    logger.info({ migration: f }, 'db_migration_applied');
    done.push(f);
  }
  return done;
}

/**
 * Open (or create) the archive database and bring its schema up to date.
 * `:memory:` gives a throwaway database for tests.
 */
export function openDatabase(file: string): Database.Database {
  const inMemory = file === ':memory:';
  if (!inMemory) fs.mkdirSync(path.dirname(file), { recursive: true });
  let db: Database.Database;
  try {
    db = new Database(file);
    if (!inMemory) {
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');  // Better than FULL for WAL mode
    }
    db.pragma('temp_store = MEMORY');
  } catch (err) {
    logger.error({ err, DB_PATH: file }, 'db_open_failed');
    throw err;
  }

  try {
    runMigrations(db);
  } catch (err) {
    logger.error({ err, DB_PATH: file }, 'db_migration_failed');
    db.close();
    throw err;
  }
  logger.info({ DB_PATH: file }, 'db_opened');
  return db;
}
