/**
 * Mindmap Edge Store
 * Directed, labeled relationships. Labels are an open vocabulary and are
 * stored exactly as given.
 */
import Database from 'better-sqlite3';
import { cosineSimilarity, rescaleCosine, roundScore } from './embeddings.js';
import { StorageError } from './errors.js';
import type { CountRow, EdgeRow, EdgeSummary, MemoryNode, NeighborEdgeRow } from './types.js';

export interface NewEdge {
  source: MemoryNode;
  target: MemoryNode;
  relationship: string;
  createdAt: string;
}

/** Semantic strength of an edge: rescaled cosine of its endpoints' embeddings */
export function semanticStrength(source: MemoryNode, target: MemoryNode): number {
  return rescaleCosine(cosineSimilarity(source.embedding, target.embedding));
}

export function rowToEdge(row: EdgeRow): EdgeSummary {
  return {
    id: row.id,
    source_id: row.source_id,
    target_id: row.target_id,
    relationship: row.relationship,
    created_at: row.created_at,
    semantic_strength: roundScore(row.semantic_strength),
  };
}

export function findEdge(
  db: Database.Database,
  sourceId: string,
  targetId: string,
  relationship: string
): EdgeSummary | undefined {
  const row = db.prepare(`
    SELECT * FROM edges WHERE source_id = ? AND target_id = ? AND relationship = ?
  `).get(sourceId, targetId, relationship) as EdgeRow | undefined;
  return row ? rowToEdge(row) : undefined;
}

/**
 * Insert an edge; call inside a transaction with both endpoints already
 * loaded. An identical (source, target, relationship) edge is returned
 * as-is with created=false.
 */
export function insertEdgeRow(db: Database.Database, edge: NewEdge): { edge: EdgeSummary; created: boolean } {
  const existing = findEdge(db, edge.source.id, edge.target.id, edge.relationship);
  if (existing) {
    return { edge: existing, created: false };
  }

  const strength = semanticStrength(edge.source, edge.target);
  const info = db.prepare(`
    INSERT INTO edges (source_id, target_id, relationship, created_at, semantic_strength)
    VALUES (?, ?, ?, ?, ?)
  `).run(edge.source.id, edge.target.id, edge.relationship, edge.createdAt, strength);

  const row = db.prepare('SELECT * FROM edges WHERE id = ?').get(info.lastInsertRowid) as EdgeRow | undefined;
  if (!row) {
    throw new StorageError(`Edge ${String(info.lastInsertRowid)} vanished after insert`);
  }
  return { edge: rowToEdge(row), created: true };
}

/** Edges leaving nodeId, joined with each target's content */
export function outgoingEdges(db: Database.Database, nodeId: string): NeighborEdgeRow[] {
  return db.prepare(`
    SELECT e.*, n.content AS neighbor_content, n.tags AS neighbor_tags
    FROM edges e
    JOIN nodes n ON e.target_id = n.id
    WHERE e.source_id = ?
    ORDER BY e.id
  `).all(nodeId) as NeighborEdgeRow[];
}

/** Edges arriving at nodeId, joined with each source's content */
export function incomingEdges(db: Database.Database, nodeId: string): NeighborEdgeRow[] {
  return db.prepare(`
    SELECT e.*, n.content AS neighbor_content, n.tags AS neighbor_tags
    FROM edges e
    JOIN nodes n ON e.source_id = n.id
    WHERE e.target_id = ?
    ORDER BY e.id
  `).all(nodeId) as NeighborEdgeRow[];
}

/** All edges in creation order */
export function listEdges(db: Database.Database): EdgeSummary[] {
  const rows = db.prepare('SELECT * FROM edges ORDER BY id').all() as EdgeRow[];
  return rows.map(rowToEdge);
}

export function countEdges(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS count FROM edges').get() as CountRow;
  return row.count;
}
