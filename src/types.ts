/**
 * Mindmap Shared Type Definitions
 *
 * Convention:
 *   - *Row     = raw SQLite row (matches CREATE TABLE columns in schema.ts)
 *   - *Result / *Summary = shaped value returned from a public operation
 */

export const PRIORITIES = ['critical', 'high', 'normal', 'low'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const ACCESS_TYPES = ['search', 'navigate'] as const;
export type AccessType = (typeof ACCESS_TYPES)[number];

export const GROWTH_INTERVALS = ['hour', 'day', 'month'] as const;
export type GrowthInterval = (typeof GROWTH_INTERVALS)[number];

// ============================================================================
// Database Row Types
// ============================================================================

export interface NodeRow {
  id: string;
  content: string;
  tags: string;            // JSON-encoded string[]
  priority: string;
  created_at: string;
  access_count: number;
  embedding: Buffer;
}

export interface EdgeRow {
  id: number;
  source_id: string;
  target_id: string;
  relationship: string;
  created_at: string;
  semantic_strength: number;
}

/** EdgeRow joined with the content of the node on the far side */
export interface NeighborEdgeRow extends EdgeRow {
  neighbor_content: string;
  neighbor_tags: string;
}

export interface AccessLogRow {
  id: number;
  node_id: string;
  accessed_at: string;
  access_type: string;
}

export interface CountRow {
  count: number;
}

// ============================================================================
// Domain Records
// ============================================================================

/** A stored node with its decoded embedding */
export interface MemoryNode {
  id: string;
  content: string;
  tags: string[];
  priority: Priority;
  created_at: string;
  access_count: number;
  embedding: Float32Array;
}

/** MemoryNode as handed to callers (embeddings stay inside the store) */
export type NodeSummary = Omit<MemoryNode, 'embedding'>;

export interface EdgeSummary {
  id: number;
  source_id: string;
  target_id: string;
  relationship: string;
  created_at: string;
  semantic_strength: number;
}

export interface AccessLogEntry {
  id: number;
  node_id: string;
  accessed_at: string;
  access_type: AccessType;
}

// ============================================================================
// Operation Results
// ============================================================================

export interface ScoredNode {
  node: MemoryNode;
  /** Raw cosine in [-1, 1]; used for ordering and thresholds */
  cosine: number;
  /** (cosine + 1) / 2, rounded for presentation */
  similarity: number;
}

export interface SearchResult extends NodeSummary {
  similarity: number;
}

export interface ConnectionSuggestion {
  node_id: string;
  content_snippet: string;
  tags: string[];
  similarity: number;
}

export interface InsertResult {
  node: NodeSummary;
  suggested_connections: ConnectionSuggestion[];
}

export interface ConnectResult extends EdgeSummary {
  /** false when the same (source, target, relationship) edge already existed */
  created: boolean;
}

export interface NeighborEdge {
  edge_id: number;
  relationship: string;
  semantic_strength: number;
  created_at: string;
  node_id: string;
  content: string;
  tags: string[];
}

export interface NavigatedNode {
  node: NodeSummary;
  outgoing: NeighborEdge[];
  incoming: NeighborEdge[];
}

export interface GraphExport {
  nodes: NodeSummary[];
  edges: EdgeSummary[];
}

export interface GrowthBucket {
  bucket: string;
  count: number;
}

export interface GraphStats {
  total_nodes: number;
  total_edges: number;
  total_accesses: number;
  most_connected_node: { id: string; content_snippet: string; degree: number } | null;
  most_accessed_node: { id: string; content_snippet: string; access_count: number } | null;
  growth: GrowthBucket[];
  growth_interval: GrowthInterval;
  access_breakdown: Record<AccessType, number>;
  relationship_breakdown: Array<{ relationship: string; count: number }>;
  priority_breakdown: Record<Priority, number>;
}
