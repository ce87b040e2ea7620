/**
 * Mindmap utility modules
 */

export {
  MAX_TIMEOUT,
  MIN_TIMEOUT,
  getEffectiveTimeout,
  withTimeout,
  TimeoutError,
} from './timeout.js';

export {
  DEFAULT_BUSY_TIMEOUT,
  IN_MEMORY_PATH,
  openDatabase,
  getPragmaStatus,
  type SqliteConfig,
} from './sqlite-config.js';
