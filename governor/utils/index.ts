/**
 * Governor Utilities Index
 *
 * Centralized exports for all utility modules
 */

// Environment utilities
export { default as env, EnvironmentManager } from './env.js';
export type { EnvSource } from './env.js';

// Configuration
export { loadConfig, tierOverrideKey } from './config.js';

// Error handling
export {
  APIError,
  QuotaExceededError,
  ComputeFailureError,
  ConfigurationError,
  errorHandler,
} from './errorHandler.js';
export type { QuotaExceededDetails } from './errorHandler.js';

// Governance events
export { GovernanceEventBus, attachLogSink } from './events.js';
export type { GovernanceListener } from './events.js';

// Cycle locks
export { MemoryCycleLock, RedisCycleLock, createCycleLock, PRUNE_LOCK_KEY } from './lock.js';
export type { LockRedisClient } from './lock.js';

// Route registration
export { registerRoutes } from './router.js';

// Registry tables
export { jobsTable, artifactsTable } from './schema.js';
