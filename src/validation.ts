/**
 * Mindmap Input Validation
 * Zod schemas for every public operation. Limits fail loudly rather than truncate.
 */
import { z } from 'zod';
import {
  MAX_CONTENT_LENGTH, MAX_TAG_LENGTH, MAX_TAGS_COUNT,
  MAX_NODE_ID_LENGTH, MAX_RELATIONSHIP_LENGTH,
} from './config.js';
import { InvalidArgumentError, formatIssues } from './errors.js';
import { GROWTH_INTERVALS, PRIORITIES } from './types.js';

// ============================================================================
// Field Schemas
// ============================================================================

export const NodeIdSchema = z.string()
  .min(1, 'node id must not be empty')
  .max(MAX_NODE_ID_LENGTH, `node id exceeds maximum length of ${MAX_NODE_ID_LENGTH} characters`);

export const ContentSchema = z.string()
  .max(MAX_CONTENT_LENGTH, `content exceeds maximum length of ${MAX_CONTENT_LENGTH} characters`)
  .refine(value => value.trim().length > 0, { message: 'content must not be empty' });

/** Tags are a set: duplicates collapse, first occurrence wins */
export const TagsSchema = z.array(
  z.string()
    .min(1, 'tag must not be empty')
    .max(MAX_TAG_LENGTH, `tag exceeds maximum length of ${MAX_TAG_LENGTH} characters`),
)
  .max(MAX_TAGS_COUNT, `at most ${MAX_TAGS_COUNT} tags are allowed`)
  .transform(tags => [...new Set(tags)]);

export const PrioritySchema = z.enum(PRIORITIES);

export const RelationshipSchema = z.string()
  .max(MAX_RELATIONSHIP_LENGTH, `relationship exceeds maximum length of ${MAX_RELATIONSHIP_LENGTH} characters`)
  .refine(value => value.trim().length > 0, { message: 'relationship must not be empty' });

/** Any positive count; ranking returns at most as many nodes as there are candidates */
export const TopKSchema = z.number().int().min(1);

// ============================================================================
// Operation Schemas
// ============================================================================

export const InsertInputSchema = z.object({
  id: NodeIdSchema.optional(),
  content: ContentSchema,
  tags: TagsSchema.default([]),
  priority: PrioritySchema.default('normal'),
});

export const SearchInputSchema = z.object({
  // Empty queries are ranked like any other text
  query: z.string().max(MAX_CONTENT_LENGTH),
  tags: TagsSchema.optional(),
  top_k: TopKSchema.optional(),
});

/** Unknown keys (e.g. a caller-supplied semantic_strength) are stripped */
export const ConnectInputSchema = z.object({
  source_id: NodeIdSchema,
  target_id: NodeIdSchema,
  relationship: RelationshipSchema,
}).refine(input => input.source_id !== input.target_id, {
  message: 'source_id and target_id must differ (self-loops are not allowed)',
  path: ['target_id'],
});

export const StatsInputSchema = z.object({
  growth_interval: z.enum(GROWTH_INTERVALS).default('day'),
});

export type InsertInput = z.input<typeof InsertInputSchema>;
export type SearchInput = z.input<typeof SearchInputSchema>;
export type ConnectInput = z.input<typeof ConnectInputSchema>;
export type StatsInput = z.input<typeof StatsInputSchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse operation input, converting zod failures into InvalidArgumentError.
 * @param operation - Prefix for the error message
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, operation: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidArgumentError(`${operation}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function validateNodeId(id: unknown, operation: string): string {
  return parseInput(NodeIdSchema, id, operation);
}
