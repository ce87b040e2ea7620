/**
 * Mindmap Graph Navigator
 * A node plus every incident edge in both directions, each annotated with
 * the neighbor's content. Only the navigated node's access is logged.
 */
import Database from 'better-sqlite3';
import { safeParse } from './config.js';
import { logAccess } from './access-log.js';
import { incomingEdges, outgoingEdges } from './edge-store.js';
import { roundScore } from './embeddings.js';
import { getNode, toSummary } from './node-store.js';
import type { NavigatedNode, NeighborEdge, NeighborEdgeRow } from './types.js';

function toNeighborEdge(row: NeighborEdgeRow, neighborId: string): NeighborEdge {
  return {
    edge_id: row.id,
    relationship: row.relationship,
    semantic_strength: roundScore(row.semantic_strength),
    created_at: row.created_at,
    node_id: neighborId,
    content: row.neighbor_content,
    tags: safeParse<string[]>(row.neighbor_tags, []),
  };
}

/**
 * Assemble the navigated view and log one navigate access; call inside a
 * write transaction.
 * @throws {NotFoundError}
 */
export function navigateNode(db: Database.Database, nodeId: string, accessedAt: string): NavigatedNode {
  const node = getNode(db, nodeId);

  const outgoing = outgoingEdges(db, nodeId).map(row => toNeighborEdge(row, row.target_id));
  const incoming = incomingEdges(db, nodeId).map(row => toNeighborEdge(row, row.source_id));

  logAccess(db, nodeId, 'navigate', accessedAt);

  return {
    node: { ...toSummary(node), access_count: node.access_count + 1 },
    outgoing,
    incoming,
  };
}
