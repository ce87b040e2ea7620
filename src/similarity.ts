/**
 * Mindmap Similarity Engine
 *
 * Ranking sits behind the SimilarityIndex interface so an indexed backend
 * can replace the brute-force scan without touching the stores, the
 * navigator, or the MindMap facade. LinearScanIndex is the only backend:
 * one cosine per stored node, O(n·D) per query.
 */
import Database from 'better-sqlite3';
import { cosineSimilarity, rescaleCosine, roundScore } from './embeddings.js';
import { listCandidates } from './node-store.js';
import type { MemoryNode, ScoredNode } from './types.js';

export interface RankOptions {
  /** Match-any tag filter; empty or absent means every node */
  tags?: string[];
  topK: number;
  excludeId?: string;
  /** Drop candidates whose raw cosine is below this value */
  minCosine?: number;
}

export interface SimilarityIndex {
  /** Backend name for diagnostics */
  readonly backend: string;
  rank(query: Float32Array, options: RankOptions): ScoredNode[];
}

function compareScored(a: ScoredNode, b: ScoredNode): number {
  if (b.cosine !== a.cosine) return b.cosine - a.cosine;
  if (a.node.id === b.node.id) return 0;
  return a.node.id < b.node.id ? -1 : 1;
}

/**
 * Rank candidates against a query embedding.
 * Sorted by raw cosine descending, ties by ascending node id.
 */
export function rankCandidates(
  query: Float32Array,
  candidates: readonly MemoryNode[],
  options: RankOptions
): ScoredNode[] {
  const filter = options.tags && options.tags.length > 0 ? new Set(options.tags) : null;

  const scored: ScoredNode[] = [];
  for (const node of candidates) {
    if (node.id === options.excludeId) continue;
    if (filter && !node.tags.some(tag => filter.has(tag))) continue;

    const cosine = cosineSimilarity(query, node.embedding);
    if (options.minCosine !== undefined && cosine < options.minCosine) continue;

    scored.push({ node, cosine, similarity: roundScore(rescaleCosine(cosine)) });
  }

  scored.sort(compareScored);
  return scored.slice(0, Math.max(0, options.topK));
}

export class LinearScanIndex implements SimilarityIndex {
  readonly backend = 'linear-scan';

  constructor(private readonly db: Database.Database) {}

  rank(query: Float32Array, options: RankOptions): ScoredNode[] {
    // Tag filter and exclusion are pushed into SQL; rankCandidates re-checks them
    const candidates = listCandidates(this.db, { tags: options.tags, excludeId: options.excludeId });
    return rankCandidates(query, candidates, options);
  }
}
