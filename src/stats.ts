/**
 * Mindmap Stats Aggregator
 * Structural and usage metrics computed on demand from current store state.
 * Nothing here is cached.
 */
import Database from 'better-sqlite3';
import { SNIPPET_LENGTH } from './config.js';
import { countAccesses } from './access-log.js';
import { countEdges } from './edge-store.js';
import { snippet } from './node-store.js';
import { PRIORITIES, type CountRow, type GraphStats, type GrowthBucket, type GrowthInterval, type Priority } from './types.js';

/** Prefix length of an ISO-8601 timestamp for each bucket size */
const BUCKET_PREFIX: Record<GrowthInterval, number> = {
  hour: 13,   // 2026-10-19T14
  day: 10,    // 2026-10-19
  month: 7,   // 2026-10
};

// ============================================================================
// Individual metrics
// ============================================================================

/** Highest out+in degree; ties go to the smallest id */
export function mostConnectedNode(db: Database.Database): GraphStats['most_connected_node'] {
  const row = db.prepare(`
    SELECT n.id, n.content,
      (SELECT COUNT(*) FROM edges e WHERE e.source_id = n.id) +
      (SELECT COUNT(*) FROM edges e WHERE e.target_id = n.id) AS degree
    FROM nodes n
    ORDER BY degree DESC, n.id ASC
    LIMIT 1
  `).get() as { id: string; content: string; degree: number } | undefined;

  if (!row) return null;
  return { id: row.id, content_snippet: snippet(row.content, SNIPPET_LENGTH), degree: row.degree };
}

/** Highest access_count; ties go to the earliest created_at, then smallest id */
export function mostAccessedNode(db: Database.Database): GraphStats['most_accessed_node'] {
  const row = db.prepare(`
    SELECT id, content, access_count
    FROM nodes
    ORDER BY access_count DESC, created_at ASC, id ASC
    LIMIT 1
  `).get() as { id: string; content: string; access_count: number } | undefined;

  if (!row) return null;
  return { id: row.id, content_snippet: snippet(row.content, SNIPPET_LENGTH), access_count: row.access_count };
}

/** Node creations per UTC hour/day/month, oldest bucket first */
export function nodeGrowth(db: Database.Database, interval: GrowthInterval = 'day'): GrowthBucket[] {
  return db.prepare(`
    SELECT substr(created_at, 1, ?) AS bucket, COUNT(*) AS count
    FROM nodes
    GROUP BY bucket
    ORDER BY bucket
  `).all(BUCKET_PREFIX[interval]) as GrowthBucket[];
}

/** Label usage, most used first; near-duplicate labels show up side by side here */
export function relationshipBreakdown(db: Database.Database): GraphStats['relationship_breakdown'] {
  return db.prepare(`
    SELECT relationship, COUNT(*) AS count
    FROM edges
    GROUP BY relationship
    ORDER BY count DESC, relationship ASC
  `).all() as Array<{ relationship: string; count: number }>;
}

export function priorityBreakdown(db: Database.Database): Record<Priority, number> {
  const rows = db.prepare(`
    SELECT priority, COUNT(*) AS count FROM nodes GROUP BY priority
  `).all() as Array<{ priority: string; count: number }>;

  const counts: Record<Priority, number> = { critical: 0, high: 0, normal: 0, low: 0 };
  for (const row of rows) {
    const priority = PRIORITIES.find(p => p === row.priority);
    if (priority) counts[priority] = row.count;
  }
  return counts;
}

// ============================================================================
// Aggregate
// ============================================================================

export function getGraphStats(db: Database.Database, interval: GrowthInterval = 'day'): GraphStats {
  const nodeCount = db.prepare('SELECT COUNT(*) AS count FROM nodes').get() as CountRow;
  const accessBreakdown = countAccesses(db);

  return {
    total_nodes: nodeCount.count,
    total_edges: countEdges(db),
    total_accesses: accessBreakdown.search + accessBreakdown.navigate,
    most_connected_node: mostConnectedNode(db),
    most_accessed_node: mostAccessedNode(db),
    growth: nodeGrowth(db, interval),
    growth_interval: interval,
    access_breakdown: accessBreakdown,
    relationship_breakdown: relationshipBreakdown(db),
    priority_breakdown: priorityBreakdown(db),
  };
}
