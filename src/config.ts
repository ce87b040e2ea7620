/**
 * Mindmap Configuration & Constants
 * Limits, defaults, and the validated runtime config (overrides > env > defaults).
 */
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { InvalidArgumentError, formatIssues } from './errors.js';
import { MAX_TIMEOUT, MIN_TIMEOUT } from './utils/timeout.js';

// ============================================================================
// Limits
// ============================================================================
export const MAX_CONTENT_LENGTH = 100000;
export const MAX_TAG_LENGTH = 100;
export const MAX_TAGS_COUNT = 20;
export const MAX_NODE_ID_LENGTH = 200;
export const MAX_RELATIONSHIP_LENGTH = 100;
export const MAX_TOP_K = 100;
export const SNIPPET_LENGTH = 100;

// ============================================================================
// Paths
// ============================================================================
export const DB_DIR = join(homedir(), '.mindmap');
export const DB_PATH = join(DB_DIR, 'mindmap.db');

// ============================================================================
// Defaults
// ============================================================================
export const DEFAULT_AUTO_CONNECT_THRESHOLD = 0.5;
export const DEFAULT_SEARCH_TOP_K = 5;
export const DEFAULT_SUGGESTION_LIMIT = 5;
export const DEFAULT_EMBEDDING_TIMEOUT_MS = 10000;
export const DEFAULT_WRITE_LOCK_TIMEOUT_MS = 10000;

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_EMBEDDING_DIM = 1536;

export const LOG_PREFIX = '[Mindmap]';

// ============================================================================
// Runtime config
// ============================================================================

export const MindmapConfigSchema = z.object({
  dbPath: z.string().min(1).default(DB_PATH),
  autoConnectThreshold: z.number().min(-1).max(1).default(DEFAULT_AUTO_CONNECT_THRESHOLD),
  searchDefaultTopK: z.number().int().min(1).max(MAX_TOP_K).default(DEFAULT_SEARCH_TOP_K),
  suggestionLimit: z.number().int().min(0).max(MAX_TOP_K).default(DEFAULT_SUGGESTION_LIMIT),
  /** Store dimensionality; when omitted the provider's dimensions are used */
  embeddingDim: z.number().int().positive().optional(),
  embeddingTimeoutMs: z.number().int().min(MIN_TIMEOUT).max(MAX_TIMEOUT).default(DEFAULT_EMBEDDING_TIMEOUT_MS),
  writeLockTimeoutMs: z.number().int().positive().default(DEFAULT_WRITE_LOCK_TIMEOUT_MS),
  debugSql: z.boolean().default(false),
});

export type MindmapConfig = z.output<typeof MindmapConfigSchema>;
export type MindmapConfigInput = z.input<typeof MindmapConfigSchema>;

type Env = Record<string, string | undefined>;

/** Blank or missing env values are treated as unset; anything else must parse. */
function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function envBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value.trim().toLowerCase() === 'true';
}

function definedOnly(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, v]) => v !== undefined));
}

export function configFromEnv(env: Env = process.env): Record<string, unknown> {
  return definedOnly({
    dbPath: env.MINDMAP_DB_PATH || undefined,
    autoConnectThreshold: envNumber(env.MINDMAP_AUTO_CONNECT_THRESHOLD),
    searchDefaultTopK: envNumber(env.MINDMAP_SEARCH_TOP_K),
    suggestionLimit: envNumber(env.MINDMAP_SUGGESTION_LIMIT),
    embeddingDim: envNumber(env.MINDMAP_EMBEDDING_DIM),
    embeddingTimeoutMs: envNumber(env.MINDMAP_EMBEDDING_TIMEOUT_MS),
    writeLockTimeoutMs: envNumber(env.MINDMAP_WRITE_LOCK_TIMEOUT_MS),
    debugSql: envBoolean(env.MINDMAP_DEBUG_SQL),
  });
}

/**
 * Resolve the runtime config.
 * @throws {InvalidArgumentError} when any value is out of range or not a number
 */
export function loadConfig(overrides: MindmapConfigInput = {}, env: Env = process.env): MindmapConfig {
  const merged = { ...configFromEnv(env), ...definedOnly(overrides) };
  const result = MindmapConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

// ============================================================================
// Helper
// ============================================================================
export function safeParse<T>(json: string | null | undefined, defaultValue: T): T {
  if (!json) return defaultValue;
  try {
    return JSON.parse(json) as T;
  } catch (err) {
    console.error(`${LOG_PREFIX} JSON parse error:`, err);
    return defaultValue;
  }
}
