/**
 * Prune cycle locks
 *
 * One cycle at a time across every governor instance. The memory adapter
 * covers a single process; the redis adapter holds a `SET NX` key with a TTL
 * so a crashed holder cannot block pruning forever.
 */

import Redis from 'ioredis';
import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { componentLogger, toError } from './logger.js';
import type { Clock } from '../services/CacheStore.js';
import type { CycleLock, LockConfig } from '../types/index.js';

export const PRUNE_LOCK_KEY = 'governor:prune:lock';

export class MemoryCycleLock implements CycleLock {
  private held: Map<string, number> = new Map();
  private readonly now: Clock;

  constructor(options: { clock?: Clock } = {}) {
    this.now = options.clock ?? Date.now;
  }

  async tryAcquire(key: string, ttlSeconds: number): Promise<boolean> {
    const expiry = this.held.get(key);
    if (expiry !== undefined && expiry > this.now()) {
      return false;
    }
    this.held.set(key, this.now() + ttlSeconds * 1000);
    return true;
  }

  async release(key: string): Promise<void> {
    this.held.delete(key);
  }

  async close(): Promise<void> {
    this.held.clear();
  }
}

/**
 * The slice of the ioredis client the lock needs
 */
export interface LockRedisClient {
  set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null>;
  get(key: string): Promise<string | null>;
  del(key: string): Promise<number>;
  quit(): Promise<'OK'>;
}

export class RedisCycleLock implements CycleLock {
  // Identifies this instance as the holder so release never drops a lock taken over by another
  private readonly owner = randomUUID();
  private readonly logger: Logger;

  constructor(private client: LockRedisClient, logger?: Logger) {
    this.logger = logger ?? componentLogger('CycleLock');
  }

  async tryAcquire(key: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.client.set(key, this.owner, 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }

  async release(key: string): Promise<void> {
    const holder = await this.client.get(key);
    if (holder === this.owner) {
      await this.client.del(key);
    } else if (holder) {
      this.logger.warn({ key }, 'Prune lock is held by another instance, not releasing');
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

export function createCycleLock(config: LockConfig, logger: Logger = componentLogger('CycleLock')): CycleLock {
  if (config.adapter === 'redis') {
    if (!config.redisUrl) {
      throw new Error('PRUNE_LOCK_REDIS_URL is required when the redis lock adapter is enabled');
    }

    const client = new Redis(config.redisUrl, {
      retryStrategy: (times: number) => Math.min(times * 50, 2000),
    });
    client.on('error', (error) => {
      logger.error({ err: toError(error) }, 'Redis lock client error');
    });

    logger.info('Prune cycle lock using Redis');
    return new RedisCycleLock(client, logger);
  }

  return new MemoryCycleLock();
}
