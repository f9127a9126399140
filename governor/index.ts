/**
 * Resource Governor Entry Point
 *
 * Exports the cache, quota ledger and retention scheduler for embedding,
 * plus the HTTP server that exposes them.
 */

// Server application
export { createApp, createGovernor, shutdownGovernor, startServer } from './app.js';
export type { Governor, CreateGovernorOptions, StartServerOptions, RunningServer } from './app.js';

// Logger utilities
export { initializeLogger, getLogger, componentLogger } from './utils/logger.js';
export type { GovernorLoggerOptions, Logger, LoggerOptions, DestinationStream } from './utils/logger.js';

// Utilities
export * from './utils/index.js';

// Services
export { CacheStore, estimateSize } from './services/CacheStore.js';
export type { Clock } from './services/CacheStore.js';
export { CacheFacade, cacheKey } from './services/CacheFacade.js';
export type { CacheFacadeOptions, FacadeStats } from './services/CacheFacade.js';
export { QuotaLedger, isQuotaResource } from './services/QuotaLedger.js';
export { RetentionScheduler, artifactCacheKey, validatePruneConfig } from './services/RetentionScheduler.js';
export type { CacheInvalidator, RetentionDependencies } from './services/RetentionScheduler.js';
export { InMemoryRegistryAdapter, PostgresRegistryAdapter, initializeRegistry } from './services/RegistryService.js';

// Types
export * from './types/index.js';
