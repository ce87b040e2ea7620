/**
 * Mindmap Access Tracker
 * Append-only log of search/navigate reads. Each row bumps the node's
 * access_count by exactly one, in the same statement group.
 */
import Database from 'better-sqlite3';
import { StorageError } from './errors.js';
import { ACCESS_TYPES, type AccessLogEntry, type AccessLogRow, type AccessType } from './types.js';

/** Log one access and increment the counter; call inside a transaction. */
export function logAccess(db: Database.Database, nodeId: string, accessType: AccessType, accessedAt: string): void {
  db.prepare('INSERT INTO access_log (node_id, accessed_at, access_type) VALUES (?, ?, ?)')
    .run(nodeId, accessedAt, accessType);
  db.prepare('UPDATE nodes SET access_count = access_count + 1 WHERE id = ?').run(nodeId);
}

function toAccessType(value: string): AccessType {
  const type = ACCESS_TYPES.find(t => t === value);
  if (!type) {
    throw new StorageError(`Access log row has unknown access_type "${value}"`);
  }
  return type;
}

/** Entries in append order, optionally for one node */
export function getAccessLog(db: Database.Database, nodeId?: string): AccessLogEntry[] {
  const rows = (nodeId === undefined
    ? db.prepare('SELECT * FROM access_log ORDER BY id').all()
    : db.prepare('SELECT * FROM access_log WHERE node_id = ? ORDER BY id').all(nodeId)) as AccessLogRow[];

  return rows.map(row => ({
    id: row.id,
    node_id: row.node_id,
    accessed_at: row.accessed_at,
    access_type: toAccessType(row.access_type),
  }));
}

export function countAccesses(db: Database.Database): Record<AccessType, number> {
  const rows = db.prepare(`
    SELECT access_type, COUNT(*) AS count FROM access_log GROUP BY access_type
  `).all() as Array<{ access_type: string; count: number }>;

  const counts: Record<AccessType, number> = { search: 0, navigate: 0 };
  for (const row of rows) {
    counts[toAccessType(row.access_type)] = row.count;
  }
  return counts;
}
