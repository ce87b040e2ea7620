/**
 * Mindmap typed errors.
 * Every public operation rejects with exactly one MindmapError subclass.
 */
import type { ZodError } from 'zod';

export type MindmapErrorCode =
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'INVALID_ARGUMENT'
  | 'SERVICE_UNAVAILABLE'
  | 'STORAGE_ERROR';

export class MindmapError extends Error {
  public readonly code: MindmapErrorCode;

  constructor(code: MindmapErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MindmapError';
    this.code = code;
  }
}

export class NotFoundError extends MindmapError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends MindmapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFLICT', message, options);
    this.name = 'ConflictError';
  }
}

export class InvalidArgumentError extends MindmapError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

/** Embedding provider failed or timed out */
export class ServiceUnavailableError extends MindmapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SERVICE_UNAVAILABLE', message, options);
    this.name = 'ServiceUnavailableError';
  }
}

/** Underlying SQLite failure */
export class StorageError extends MindmapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_ERROR', message, options);
    this.name = 'StorageError';
  }
}

export function isMindmapError(err: unknown): err is MindmapError {
  return err instanceof MindmapError;
}

/** "tags.0: String must contain at least 1 character(s); priority: Invalid enum value..." */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function sqliteCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Normalize anything thrown inside a storage operation.
 * MindmapErrors pass through; SQLite errors become StorageError.
 */
export function toStorageError(err: unknown, operation: string): MindmapError {
  if (err instanceof MindmapError) return err;
  const code = sqliteCode(err);
  const detail = err instanceof Error ? err.message : String(err);
  if (code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    return new ConflictError(`${operation}: ${detail}`, { cause: err });
  }
  return new StorageError(`${operation} failed${code ? ` (${code})` : ''}: ${detail}`, { cause: err });
}
