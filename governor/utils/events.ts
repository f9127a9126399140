import type { Logger } from 'pino';
import { componentLogger } from './logger.js';
import type { GovernanceEventMap, GovernanceEventName } from '../types/events.js';

export type GovernanceListener<E extends GovernanceEventName> = (payload: GovernanceEventMap[E]) => void;

type ListenerTable = { [E in GovernanceEventName]?: GovernanceListener<E>[] };

/**
 * Governance Event Bus - fans governance events out to external sinks
 *
 * Listeners run synchronously in registration order. A throwing listener is
 * logged and skipped; it never fails the cache, ledger or prune operation
 * that emitted the event.
 */
export class GovernanceEventBus {
  private listeners: ListenerTable = {};
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? componentLogger('GovernanceEvents');
  }

  on<E extends GovernanceEventName>(event: E, listener: GovernanceListener<E>): () => void {
    const table: { [K in E]?: GovernanceListener<K>[] } = this.listeners;
    const existing: GovernanceListener<E>[] = table[event] ?? [];
    existing.push(listener);
    table[event] = existing;
    return () => this.off(event, listener);
  }

  off<E extends GovernanceEventName>(event: E, listener: GovernanceListener<E>): void {
    const table: { [K in E]?: GovernanceListener<K>[] } = this.listeners;
    const existing: GovernanceListener<E>[] = table[event] ?? [];
    table[event] = existing.filter((candidate) => candidate !== listener);
  }

  emit<E extends GovernanceEventName>(event: E, payload: GovernanceEventMap[E]): void {
    const listeners: GovernanceListener<E>[] = this.listeners[event] ?? [];
    for (const listener of listeners) {
      try {
        listener(payload);
      } catch (error) {
        this.logger.warn({ err: error, event }, 'Governance event listener failed');
      }
    }
  }

  listenerCount(event: GovernanceEventName): number {
    return this.listeners[event]?.length ?? 0;
  }
}

/**
 * Default sink: every governance event becomes a structured log line
 */
export function attachLogSink(bus: GovernanceEventBus, logger: Logger = componentLogger('Governance')): void {
  bus.on('cache.hit', (event) => logger.debug(event, 'cache hit'));
  bus.on('cache.miss', (event) => logger.debug(event, 'cache miss'));
  bus.on('cache.eviction', (event) => logger.debug(event, 'cache entry removed'));
  bus.on('quota.denied', (event) => logger.info(event, 'quota denied'));
  bus.on('prune.completed', (stats) => {
    if (stats.errors.length > 0) {
      logger.warn({ ...stats }, `prune cycle completed with ${stats.errors.length} error(s)`);
    } else {
      logger.info({ ...stats }, 'prune cycle completed');
    }
  });
}
