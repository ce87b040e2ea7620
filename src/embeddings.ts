/**
 * Mindmap Embeddings
 *
 * The embedding model is an external collaborator reached through the
 * EmbeddingProvider interface. This module also owns the vector math and the
 * blob codec used to persist vectors (little-endian float32, 4·D bytes).
 *
 * Shipped adapter: OpenAIEmbeddingProvider (text-embedding-3-small by default;
 * the `dimensions` request parameter pins the output size).
 */

import OpenAI from 'openai';
import { DEFAULT_EMBEDDING_DIM, DEFAULT_EMBEDDING_MODEL, LOG_PREFIX } from './config.js';
import { InvalidArgumentError, ServiceUnavailableError } from './errors.js';
import { withTimeout } from './utils/timeout.js';

export interface EmbeddingProvider {
  /** Model or backend name for diagnostics */
  readonly name: string;
  /** Length of every vector this provider returns */
  readonly dimensions: number;
  /** Same text, same vector, within a session. Failures throw. */
  embed(text: string): Promise<Float32Array>;
}

// ============================================================================
// OpenAI adapter
// ============================================================================

/** The slice of the OpenAI client this adapter calls */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string; dimensions?: number }): Promise<{
      data: Array<{ embedding: number[] }>;
    }>;
  };
}

export interface OpenAIEmbeddingOptions {
  apiKey?: string;
  model?: string;
  dimensions?: number;
  /** Injected client; when absent one is built from apiKey / OPENAI_API_KEY */
  client?: EmbeddingsClient;
  /** Source of MINDMAP_EMBEDDING_MODEL and OPENAI_API_KEY; defaults to process.env */
  env?: Record<string, string | undefined>;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  private readonly client: EmbeddingsClient;

  constructor(options: OpenAIEmbeddingOptions = {}) {
    const env = options.env ?? process.env;
    this.name = options.model ?? (env.MINDMAP_EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL);
    this.dimensions = options.dimensions ?? DEFAULT_EMBEDDING_DIM;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey ?? env.OPENAI_API_KEY });
  }

  async embed(text: string): Promise<Float32Array> {
    const response = await this.client.embeddings.create({
      model: this.name,
      // The API rejects empty input; a single space keeps empty queries rankable
      input: text.length > 0 ? text : ' ',
      dimensions: this.dimensions,
    });
    const first = response.data[0];
    if (!first) {
      throw new Error(`Embedding response from ${this.name} contained no vectors`);
    }
    return Float32Array.from(first.embedding);
  }
}

// ============================================================================
// Guarded embedding
// ============================================================================

/**
 * Embed text with a bounded wait and a dimension check.
 * @throws {ServiceUnavailableError} provider failure or timeout
 * @throws {InvalidArgumentError} vector length differs from the store's dimension
 */
export async function embedText(
  provider: EmbeddingProvider,
  text: string,
  expectedDim: number,
  timeoutMs: number
): Promise<Float32Array> {
  let vector: Float32Array;
  try {
    vector = await withTimeout(() => provider.embed(text), timeoutMs, `Embedding (${provider.name})`);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    console.error(`${LOG_PREFIX} Embedding generation failed:`, detail);
    throw new ServiceUnavailableError(`Embedding provider unavailable: ${detail}`, { cause: err });
  }

  if (vector.length !== expectedDim) {
    throw new InvalidArgumentError(
      `Embedding dimension mismatch: provider ${provider.name} returned ${vector.length}, store expects ${expectedDim}`
    );
  }
  return vector;
}

// ============================================================================
// Vector math
// ============================================================================

/**
 * Cosine similarity in [-1, 1]. A zero-magnitude vector scores 0.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new InvalidArgumentError(`Embedding dimensions must match (${a.length} vs ${b.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dotProduct += x * y;
    normA += x * x;
    normB += y * y;
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;

  // Float error can push identical vectors a hair past 1
  return Math.max(-1, Math.min(1, dotProduct / magnitude));
}

/** Map cosine [-1, 1] onto [0, 1] */
export function rescaleCosine(cosine: number): number {
  return (cosine + 1) / 2;
}

/** Presentation rounding for similarity scores */
export function roundScore(score: number): number {
  return Math.round(score * 1000) / 1000;
}

// ============================================================================
// Blob codec
// ============================================================================

export function embeddingToBuffer(embedding: Float32Array): Buffer {
  const buffer = Buffer.alloc(embedding.length * 4);
  embedding.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer;
}

export function bufferToEmbedding(buffer: Buffer): Float32Array {
  if (buffer.byteLength % 4 !== 0) {
    throw new InvalidArgumentError(`Embedding blob length ${buffer.byteLength} is not a multiple of 4`);
  }
  const embedding = new Float32Array(buffer.byteLength / 4);
  for (let i = 0; i < embedding.length; i++) {
    embedding[i] = buffer.readFloatLE(i * 4);
  }
  return embedding;
}
