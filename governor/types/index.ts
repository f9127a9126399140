/**
 * Centralized Type Exports
 */

export * from './cache.js';
export * from './quota.js';
export * from './registry.js';
export * from './retention.js';
export * from './events.js';
export * from './config.js';
export * from './routes.js';
