/**
 * Mindmap Auto-Connect Suggester
 * Advisory only: proposes links for a freshly inserted node. Never writes an
 * edge and never logs an access; callers materialize a link via connect().
 */
import { SNIPPET_LENGTH } from './config.js';
import { snippet } from './node-store.js';
import type { SimilarityIndex } from './similarity.js';
import type { ConnectionSuggestion, MemoryNode } from './types.js';

export interface SuggestOptions {
  /** Minimum raw cosine for a suggestion */
  threshold: number;
  limit: number;
}

export function suggestConnections(
  index: SimilarityIndex,
  node: MemoryNode,
  options: SuggestOptions
): ConnectionSuggestion[] {
  if (options.limit <= 0) return [];

  return index
    .rank(node.embedding, { topK: options.limit, excludeId: node.id, minCosine: options.threshold })
    .map(({ node: candidate, similarity }) => ({
      node_id: candidate.id,
      content_snippet: snippet(candidate.content, SNIPPET_LENGTH),
      tags: candidate.tags,
      similarity,
    }));
}
