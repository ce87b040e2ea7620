/**
 * SQLite connection setup: WAL for concurrent readers, busy timeout for
 * lock contention, foreign keys so edges and access rows cannot dangle.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { LOG_PREFIX } from '../config.js';

/** Default busy timeout in milliseconds */
export const DEFAULT_BUSY_TIMEOUT = 5000;

export const IN_MEMORY_PATH = ':memory:';

/** SQLite configuration options */
export interface SqliteConfig {
  /** Path to database file, or ':memory:' */
  dbPath: string;
  /** Busy timeout in milliseconds (default: 5000) */
  busyTimeout?: number;
  /** Cache size in KB (default: 2000) */
  cacheSizeKb?: number;
  /** Synchronous mode (default: 'NORMAL') */
  synchronous?: 'OFF' | 'NORMAL' | 'FULL' | 'EXTRA';
  /** Log every statement through the Mindmap logger */
  debugSql?: boolean;
}

const DEFAULT_CONFIG: Omit<Required<SqliteConfig>, 'dbPath'> = {
  busyTimeout: DEFAULT_BUSY_TIMEOUT,
  cacheSizeKb: 2000,
  synchronous: 'NORMAL',
  debugSql: false,
};

/**
 * Open a database with safe PRAGMA settings.
 * Parent directories of a file path are created when missing.
 *
 * @example
 * const db = openDatabase({ dbPath: './data/mindmap.db' });
 */
export function openDatabase(config: SqliteConfig): Database.Database {
  const opts = { ...DEFAULT_CONFIG, ...config };
  const inMemory = opts.dbPath === IN_MEMORY_PATH;

  if (!inMemory) {
    const dbDir = dirname(opts.dbPath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(opts.dbPath, {
    verbose: opts.debugSql
      ? (sql: unknown) => console.error(`${LOG_PREFIX} [SQL]`, sql)
      : undefined,
  });

  // WAL is meaningless for in-memory databases (journal_mode stays 'memory')
  if (!inMemory) {
    const result = db.pragma('journal_mode = WAL') as Array<{ journal_mode: string }>;
    if (result[0]?.journal_mode !== 'wal') {
      console.error(`${LOG_PREFIX} Failed to enable WAL mode`);
    }
  }

  db.pragma(`busy_timeout = ${opts.busyTimeout}`);
  db.pragma(`cache_size = ${-opts.cacheSizeKb}`);
  db.pragma('foreign_keys = ON');
  db.pragma(`synchronous = ${opts.synchronous}`);

  return db;
}

/**
 * Read back the PRAGMA values that matter for correctness
 */
export function getPragmaStatus(db: Database.Database): {
  journalMode: string;
  busyTimeout: number;
  foreignKeys: boolean;
} {
  return {
    journalMode: String(db.pragma('journal_mode', { simple: true })),
    busyTimeout: Number(db.pragma('busy_timeout', { simple: true })),
    foreignKeys: db.pragma('foreign_keys', { simple: true }) === 1,
  };
}
