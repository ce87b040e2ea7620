/**
 * Mindmap: persistent semantic memory graph.
 *
 * Memories are nodes carrying embeddings, linked by directed, labeled edges,
 * retrievable by meaning. The transport that exposes these operations and
 * the embedding model itself live outside this package.
 *
 * @example
 * const mindmap = MindMap.open({ provider: new OpenAIEmbeddingProvider() });
 * const { node, suggested_connections } = await mindmap.insert({ content: 'Ideas compound', tags: ['growth'] });
 */

export { MindMap, type MindMapOptions, type MindMapStatus } from './mindmap.js';

export {
  loadConfig,
  configFromEnv,
  MindmapConfigSchema,
  DEFAULT_AUTO_CONNECT_THRESHOLD,
  DEFAULT_SEARCH_TOP_K,
  DEFAULT_SUGGESTION_LIMIT,
  type MindmapConfig,
  type MindmapConfigInput,
} from './config.js';

export {
  MindmapError,
  NotFoundError,
  ConflictError,
  InvalidArgumentError,
  ServiceUnavailableError,
  StorageError,
  isMindmapError,
  type MindmapErrorCode,
} from './errors.js';

export {
  OpenAIEmbeddingProvider,
  cosineSimilarity,
  rescaleCosine,
  type EmbeddingProvider,
  type EmbeddingsClient,
  type OpenAIEmbeddingOptions,
} from './embeddings.js';

export {
  LinearScanIndex,
  rankCandidates,
  type RankOptions,
  type SimilarityIndex,
} from './similarity.js';

export {
  openDatabase,
  getPragmaStatus,
  withTimeout,
  TimeoutError,
  type SqliteConfig,
} from './utils/index.js';

export type { InsertInput, SearchInput, ConnectInput, StatsInput } from './validation.js';

export {
  PRIORITIES,
  ACCESS_TYPES,
  GROWTH_INTERVALS,
  type Priority,
  type AccessType,
  type GrowthInterval,
  type MemoryNode,
  type NodeSummary,
  type EdgeSummary,
  type AccessLogEntry,
  type ScoredNode,
  type SearchResult,
  type ConnectionSuggestion,
  type InsertResult,
  type ConnectResult,
  type NeighborEdge,
  type NavigatedNode,
  type GraphExport,
  type GrowthBucket,
  type GraphStats,
} from './types.js';
