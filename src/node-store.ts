/**
 * Mindmap Node Store
 * Create + read only. Nodes are never updated except for access_count
 * (see access-log.ts) and never deleted.
 */
import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { safeParse } from './config.js';
import { bufferToEmbedding, embeddingToBuffer } from './embeddings.js';
import { ConflictError, NotFoundError, StorageError } from './errors.js';
import { PRIORITIES, type MemoryNode, type NodeRow, type NodeSummary, type Priority } from './types.js';

const MAX_ID_ATTEMPTS = 5;

export interface NewNode {
  id?: string;
  content: string;
  tags: string[];
  priority: Priority;
  embedding: Float32Array;
  createdAt: string;
}

// ============================================================================
// Row mapping
// ============================================================================

function toPriority(value: string): Priority {
  const priority = PRIORITIES.find(p => p === value);
  if (!priority) {
    throw new StorageError(`Stored node has unknown priority "${value}"`);
  }
  return priority;
}

export function rowToNode(row: NodeRow): MemoryNode {
  return {
    id: row.id,
    content: row.content,
    tags: safeParse<string[]>(row.tags, []),
    priority: toPriority(row.priority),
    created_at: row.created_at,
    access_count: row.access_count,
    embedding: bufferToEmbedding(row.embedding),
  };
}

export function toSummary(node: MemoryNode): NodeSummary {
  const { embedding: _embedding, ...summary } = node;
  return summary;
}

/** First `length` characters, "..." appended when cut */
export function snippet(content: string, length: number): string {
  return content.length > length ? content.slice(0, length) + '...' : content;
}

// ============================================================================
// Ids
// ============================================================================

export function generateNodeId(): string {
  return `node-${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

export function nodeExists(db: Database.Database, id: string): boolean {
  return db.prepare('SELECT 1 FROM nodes WHERE id = ?').get(id) !== undefined;
}

/**
 * Must run inside the caller's write transaction so the check and the
 * INSERT that follows cannot be split by another writer.
 */
function allocateNodeId(db: Database.Database, requested?: string): string {
  if (requested !== undefined) {
    if (nodeExists(db, requested)) {
      throw new ConflictError(`Node ${requested} already exists`);
    }
    return requested;
  }
  for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
    const id = generateNodeId();
    if (!nodeExists(db, id)) return id;
  }
  throw new StorageError(`Could not allocate a unique node id after ${MAX_ID_ATTEMPTS} attempts`);
}

// ============================================================================
// Create
// ============================================================================

/** Insert a node; call inside a transaction. */
export function insertNodeRow(db: Database.Database, node: NewNode): MemoryNode {
  const id = allocateNodeId(db, node.id);
  db.prepare(`
    INSERT INTO nodes (id, content, tags, priority, created_at, access_count, embedding)
    VALUES (?, ?, ?, ?, ?, 0, ?)
  `).run(id, node.content, JSON.stringify(node.tags), node.priority, node.createdAt, embeddingToBuffer(node.embedding));

  return {
    id,
    content: node.content,
    tags: node.tags,
    priority: node.priority,
    created_at: node.createdAt,
    access_count: 0,
    embedding: node.embedding,
  };
}

// ============================================================================
// Read
// ============================================================================

export function findNode(db: Database.Database, id: string): MemoryNode | undefined {
  const row = db.prepare('SELECT * FROM nodes WHERE id = ?').get(id) as NodeRow | undefined;
  return row ? rowToNode(row) : undefined;
}

/** @throws {NotFoundError} */
export function getNode(db: Database.Database, id: string): MemoryNode {
  const node = findNode(db, id);
  if (!node) {
    throw new NotFoundError(`Node ${id} not found`);
  }
  return node;
}

/**
 * Nodes for ranking. With a non-empty tag filter only nodes sharing at least
 * one tag are returned.
 */
export function listCandidates(
  db: Database.Database,
  options: { tags?: string[]; excludeId?: string } = {}
): MemoryNode[] {
  const conditions: string[] = [];
  const params: string[] = [];

  if (options.tags && options.tags.length > 0) {
    conditions.push(
      `EXISTS (SELECT 1 FROM json_each(nodes.tags) WHERE json_each.value IN (${options.tags.map(() => '?').join(', ')}))`
    );
    params.push(...options.tags);
  }
  if (options.excludeId !== undefined) {
    conditions.push('id != ?');
    params.push(options.excludeId);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const rows = db.prepare(`SELECT * FROM nodes ${where} ORDER BY id`).all(...params) as NodeRow[];
  return rows.map(rowToNode);
}

/** All nodes in creation order, without embeddings */
export function listNodes(db: Database.Database): NodeSummary[] {
  const rows = db.prepare('SELECT * FROM nodes ORDER BY created_at, id').all() as NodeRow[];
  return rows.map(row => toSummary(rowToNode(row)));
}
