/**
 * Mindmap Schema
 * Table creation, versioned migrations, and the store's fixed embedding dimension.
 */
import Database from 'better-sqlite3';
import { LOG_PREFIX } from './config.js';
import { InvalidArgumentError } from './errors.js';

export const EMBEDDING_DIM_KEY = 'embedding_dim';

// ============================================================================
// Core Tables
// ============================================================================

export function createCoreTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS nodes (
      id TEXT PRIMARY KEY,
      content TEXT NOT NULL,
      tags TEXT NOT NULL DEFAULT '[]',
      priority TEXT NOT NULL DEFAULT 'normal'
        CHECK (priority IN ('critical', 'high', 'normal', 'low')),
      created_at TEXT NOT NULL,
      access_count INTEGER NOT NULL DEFAULT 0,
      embedding BLOB NOT NULL
    );

    CREATE TABLE IF NOT EXISTS edges (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_id TEXT NOT NULL,
      target_id TEXT NOT NULL,
      relationship TEXT NOT NULL,
      created_at TEXT NOT NULL,
      semantic_strength REAL NOT NULL DEFAULT 0.0,
      FOREIGN KEY (source_id) REFERENCES nodes(id),
      FOREIGN KEY (target_id) REFERENCES nodes(id),
      UNIQUE (source_id, target_id, relationship),
      CHECK (source_id != target_id)
    );

    CREATE TABLE IF NOT EXISTS access_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      node_id TEXT NOT NULL,
      accessed_at TEXT NOT NULL,
      access_type TEXT NOT NULL CHECK (access_type IN ('search', 'navigate')),
      FOREIGN KEY (node_id) REFERENCES nodes(id)
    );

    CREATE TABLE IF NOT EXISTS store_meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
}

// ============================================================================
// Migrations
// ============================================================================

interface Migration {
  version: number;
  description: string;
  sql: string;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'Indexes for edge endpoints and access log lookups',
    sql: `
      CREATE INDEX IF NOT EXISTS idx_edges_source ON edges(source_id);
      CREATE INDEX IF NOT EXISTS idx_edges_target ON edges(target_id);
      CREATE INDEX IF NOT EXISTS idx_access_node ON access_log(node_id);
    `,
  },
  {
    version: 2,
    description: 'Index node creation time for growth buckets',
    sql: `CREATE INDEX IF NOT EXISTS idx_nodes_created ON nodes(created_at);`,
  },
];

/** Apply pending migrations; returns the versions applied on this call */
export function runMigrations(db: Database.Database): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT DEFAULT (datetime('now'))
    );
  `);

  const hasRun = db.prepare('SELECT version FROM schema_migrations WHERE version = ?');
  const mark = db.prepare('INSERT INTO schema_migrations (version, description) VALUES (?, ?)');
  const applied: number[] = [];

  for (const migration of MIGRATIONS) {
    if (hasRun.get(migration.version)) continue;
    db.transaction(() => {
      db.exec(migration.sql);
      mark.run(migration.version, migration.description);
    })();
    applied.push(migration.version);
    console.error(`${LOG_PREFIX} Migration ${migration.version}: ${migration.description}`);
  }
  return applied;
}

// ============================================================================
// Embedding dimension
// ============================================================================

/**
 * Record D on first open; afterwards every open must agree with it.
 * @throws {InvalidArgumentError} when dim differs from the recorded value
 */
export function ensureEmbeddingDimension(db: Database.Database, dim: number): number {
  const row = db.prepare('SELECT value FROM store_meta WHERE key = ?').get(EMBEDDING_DIM_KEY) as
    { value: string } | undefined;

  if (!row) {
    db.prepare('INSERT INTO store_meta (key, value) VALUES (?, ?)').run(EMBEDDING_DIM_KEY, String(dim));
    console.error(`${LOG_PREFIX} Embedding dimension fixed at ${dim}`);
    return dim;
  }

  const stored = Number(row.value);
  if (stored !== dim) {
    throw new InvalidArgumentError(`Embedding dimension mismatch: store was created with ${stored}, got ${dim}`);
  }
  return stored;
}

export function initSchema(db: Database.Database, dim: number): void {
  createCoreTables(db);
  runMigrations(db);
  ensureEmbeddingDimension(db, dim);
}
