/**
 * Mindmap facade
 *
 * Each public method is one unit of work: input validation, then (for
 * insert/search) embedding outside any lock, then a single SQLite
 * transaction under the write lock. Reads run in their own transaction
 * without the lock. Every method resolves with its result or rejects with
 * exactly one MindmapError; a rejected write leaves no rows behind.
 */
import Database from 'better-sqlite3';
import { LOG_PREFIX, loadConfig, type MindmapConfig, type MindmapConfigInput } from './config.js';
import { getAccessLog, logAccess } from './access-log.js';
import { suggestConnections } from './auto-connect.js';
import { insertEdgeRow, listEdges } from './edge-store.js';
import { embedText, type EmbeddingProvider } from './embeddings.js';
import { InvalidArgumentError, NotFoundError, StorageError, toStorageError } from './errors.js';
import { navigateNode } from './navigator.js';
import { findNode, getNode, insertNodeRow, listNodes, toSummary } from './node-store.js';
import { initSchema } from './schema.js';
import { LinearScanIndex, type SimilarityIndex } from './similarity.js';
import { getGraphStats } from './stats.js';
import type {
  AccessLogEntry, ConnectResult, EdgeSummary, GraphExport, GraphStats,
  InsertResult, NavigatedNode, NodeSummary, SearchResult,
} from './types.js';
import { openDatabase } from './utils/sqlite-config.js';
import {
  ConnectInputSchema, InsertInputSchema, SearchInputSchema, StatsInputSchema,
  parseInput, validateNodeId,
  type ConnectInput, type InsertInput, type SearchInput, type StatsInput,
} from './validation.js';
import { WriteLock, WriteLockTimeoutError } from './write-lock.js';

export interface MindMapOptions {
  provider: EmbeddingProvider;
  /** Explicit values win over MINDMAP_* environment variables */
  config?: MindmapConfigInput;
  env?: Record<string, string | undefined>;
  /** Similarity backend; defaults to a brute-force LinearScanIndex */
  similarityIndex?: (db: Database.Database) => SimilarityIndex;
  /** Timestamp source for created_at / accessed_at */
  clock?: () => Date;
}

export interface MindMapStatus {
  dbPath: string;
  dimensions: number;
  provider: string;
  similarityBackend: string;
  closed: boolean;
  writeLock: WriteLock['stats'];
}

export class MindMap {
  readonly config: MindmapConfig;
  /** Embedding dimensionality D, fixed for the life of the store */
  readonly dimensions: number;

  private readonly db: Database.Database;
  private readonly provider: EmbeddingProvider;
  private readonly index: SimilarityIndex;
  private readonly clock: () => Date;
  private readonly lock = new WriteLock();
  private closed = false;

  private constructor(
    db: Database.Database,
    config: MindmapConfig,
    dimensions: number,
    options: MindMapOptions
  ) {
    this.db = db;
    this.config = config;
    this.dimensions = dimensions;
    this.provider = options.provider;
    this.index = options.similarityIndex ? options.similarityIndex(db) : new LinearScanIndex(db);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Open (or create) a store.
   * @throws {InvalidArgumentError} bad config, or D disagrees with the provider or the existing store
   * @throws {StorageError} the database cannot be opened
   */
  static open(options: MindMapOptions): MindMap {
    const config = loadConfig(options.config, options.env);
    const dimensions = config.embeddingDim ?? options.provider.dimensions;
    if (dimensions !== options.provider.dimensions) {
      throw new InvalidArgumentError(
        `Embedding dimension mismatch: configured ${dimensions}, provider ${options.provider.name} returns ${options.provider.dimensions}`
      );
    }

    let db: Database.Database | undefined;
    try {
      db = openDatabase({ dbPath: config.dbPath, debugSql: config.debugSql });
      initSchema(db, dimensions);
    } catch (err) {
      db?.close();
      throw toStorageError(err, 'open');
    }

    const mindmap = new MindMap(db, config, dimensions, options);
    console.error(
      `${LOG_PREFIX} Store opened at ${config.dbPath} (D=${dimensions}, provider=${options.provider.name}, index=${mindmap.index.backend})`
    );
    return mindmap;
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /** Store a memory and return it with advisory connection suggestions */
  async insert(input: InsertInput): Promise<InsertResult> {
    const parsed = parseInput(InsertInputSchema, input, 'insert');
    this.assertOpen('insert');
    const embedding = await this.embed(parsed.content);

    return this.write('insert', () => {
      const node = insertNodeRow(this.db, {
        id: parsed.id,
        content: parsed.content,
        tags: parsed.tags,
        priority: parsed.priority,
        embedding,
        createdAt: this.now(),
      });
      const suggestions = suggestConnections(this.index, node, {
        threshold: this.config.autoConnectThreshold,
        limit: this.config.suggestionLimit,
      });
      return { node: toSummary(node), suggested_connections: suggestions };
    });
  }

  /** Rank nodes by meaning; every returned node gets one search access */
  async search(input: SearchInput): Promise<SearchResult[]> {
    const parsed = parseInput(SearchInputSchema, input, 'search');
    this.assertOpen('search');
    const topK = parsed.top_k ?? this.config.searchDefaultTopK;
    const query = await this.embed(parsed.query);

    return this.write('search', () => {
      const accessedAt = this.now();
      return this.index.rank(query, { tags: parsed.tags, topK }).map(({ node, similarity }) => {
        logAccess(this.db, node.id, 'search', accessedAt);
        return { ...toSummary(node), access_count: node.access_count + 1, similarity };
      });
    });
  }

  /** Create a directed edge; strength is derived from the stored embeddings */
  async connect(input: ConnectInput): Promise<ConnectResult> {
    const parsed = parseInput(ConnectInputSchema, input, 'connect');

    return this.write('connect', () => {
      const source = findNode(this.db, parsed.source_id);
      const target = findNode(this.db, parsed.target_id);
      if (!source || !target) {
        const missing = [source ? null : parsed.source_id, target ? null : parsed.target_id]
          .filter((id): id is string => id !== null);
        throw new NotFoundError(`connect: node(s) not found: ${missing.join(', ')}`);
      }

      const { edge, created } = insertEdgeRow(this.db, {
        source,
        target,
        relationship: parsed.relationship,
        createdAt: this.now(),
      });
      return { ...edge, created };
    });
  }

  /** A node with its outgoing and incoming edges; logs one navigate access */
  async navigate(nodeId: string): Promise<NavigatedNode> {
    const id = validateNodeId(nodeId, 'navigate');
    return this.write('navigate', () => navigateNode(this.db, id, this.now()));
  }

  async stats(input: StatsInput = {}): Promise<GraphStats> {
    const parsed = parseInput(StatsInputSchema, input, 'stats');
    return this.read('stats', () => getGraphStats(this.db, parsed.growth_interval));
  }

  // ==========================================================================
  // Reads (never logged as accesses)
  // ==========================================================================

  async getNode(nodeId: string): Promise<NodeSummary> {
    const id = validateNodeId(nodeId, 'getNode');
    return this.read('getNode', () => toSummary(getNode(this.db, id)));
  }

  async listNodes(): Promise<NodeSummary[]> {
    return this.read('listNodes', () => listNodes(this.db));
  }

  async listEdges(): Promise<EdgeSummary[]> {
    return this.read('listEdges', () => listEdges(this.db));
  }

  /** Whole graph for visualizers */
  async graph(): Promise<GraphExport> {
    return this.read('graph', () => ({ nodes: listNodes(this.db), edges: listEdges(this.db) }));
  }

  async accessLog(nodeId?: string): Promise<AccessLogEntry[]> {
    const id = nodeId === undefined ? undefined : validateNodeId(nodeId, 'accessLog');
    return this.read('accessLog', () => getAccessLog(this.db, id));
  }

  status(): MindMapStatus {
    return {
      dbPath: this.config.dbPath,
      dimensions: this.dimensions,
      provider: this.provider.name,
      similarityBackend: this.index.backend,
      closed: this.closed,
      writeLock: this.lock.stats,
    };
  }

  /** Reject queued writers and close the connection. Safe to call twice. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.lock.drain('Mindmap store closed');
    this.db.close();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private now(): string {
    return this.clock().toISOString();
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new StorageError(`${operation}: store is closed`);
    }
  }

  private embed(text: string): Promise<Float32Array> {
    return embedText(this.provider, text, this.dimensions, this.config.embeddingTimeoutMs);
  }

  private async write<T>(operation: string, fn: () => T): Promise<T> {
    this.assertOpen(operation);
    try {
      return await this.lock.withLock(() => this.db.transaction(fn)(), this.config.writeLockTimeoutMs);
    } catch (err) {
      if (err instanceof WriteLockTimeoutError) {
        throw new StorageError(`${operation}: ${err.message}`, { cause: err });
      }
      throw toStorageError(err, operation);
    }
  }

  private async read<T>(operation: string, fn: () => T): Promise<T> {
    this.assertOpen(operation);
    try {
      return this.db.transaction(fn)();
    } catch (err) {
      throw toStorageError(err, operation);
    }
  }
}
