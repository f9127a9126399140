import express, { Express } from "express";
import { createServer, Server } from "http";
import type { Logger } from "pino";
import { initializeLogger, getLogger, componentLogger, toError, GovernorLoggerOptions } from "./utils/logger.js";
import { errorHandler } from "./utils/errorHandler.js";
import { loadConfig } from "./utils/config.js";
import { GovernanceEventBus, attachLogSink } from "./utils/events.js";
import { createCycleLock } from "./utils/lock.js";
import { registerRoutes } from "./utils/router.js";
import governanceRoute from "./routes/governance.route.js";
import { CacheStore } from "./services/CacheStore.js";
import { CacheFacade } from "./services/CacheFacade.js";
import { QuotaLedger } from "./services/QuotaLedger.js";
import { RetentionScheduler } from "./services/RetentionScheduler.js";
import { initializeRegistry } from "./services/RegistryService.js";
import type { ArtifactRegistry, CycleLock, GovernorConfig, RouteContext } from "./types/index.js";

/**
 * Every long-lived component of one governor instance
 */
export interface Governor {
  config: GovernorConfig;
  events: GovernanceEventBus;
  ledger: QuotaLedger;
  store: CacheStore;
  cache: CacheFacade;
  registry: ArtifactRegistry;
  lock: CycleLock;
  scheduler: RetentionScheduler;
}

export interface CreateGovernorOptions {
  /** Use this registry instead of the configured adapter */
  registry?: ArtifactRegistry;
  /** Use this lock instead of the configured adapter */
  lock?: CycleLock;
  clock?: () => number;
}

/**
 * Wire ledger, store, facade, registry, lock and scheduler together
 */
export function createGovernor(config: GovernorConfig, options: CreateGovernorOptions = {}): Governor {
  const events = new GovernanceEventBus();
  attachLogSink(events);

  const ledger = new QuotaLedger(config.quota, { clock: options.clock, events });
  const store = new CacheStore(config.cache, { clock: options.clock });
  const cache = new CacheFacade(store, ledger, { estimatedEntryBytes: config.cache.estimatedEntryBytes, events });
  const registry = options.registry ?? initializeRegistry(config.registry);
  const lock = options.lock ?? createCycleLock(config.lock);
  const scheduler = new RetentionScheduler(config.prune, {
    registry,
    ledger,
    cache,
    lock,
    lockTtlSeconds: config.lock.ttlSeconds,
    events,
    clock: options.clock,
  });

  return { config, events, ledger, store, cache, registry, lock, scheduler };
}

/**
 * Express app exposing the governance admin routes
 */
export function createApp(context: RouteContext): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  registerRoutes(app, context, [governanceRoute]);

  app.use(errorHandler);
  return app;
}

/**
 * Stop the scheduler within its grace period, then release store, lock and registry resources
 */
export async function shutdownGovernor(governor: Governor, logger: Logger = componentLogger("Shutdown")): Promise<void> {
  logger.warn("Stopping retention scheduler...");
  await governor.scheduler.stop(governor.config.prune.shutdownGraceMs);

  logger.warn("Stopping cache sweep...");
  governor.store.stopSweep();
  governor.cache.close();

  logger.warn("Closing cycle lock...");
  try {
    await governor.lock.close();
  } catch (error) {
    logger.error({ err: toError(error) }, "Error closing cycle lock");
  }

  logger.warn("Closing registry...");
  try {
    await governor.registry.close();
  } catch (error) {
    logger.error({ err: toError(error) }, "Error closing registry");
  }
}

/**
 * Server startup options
 */
export interface StartServerOptions {
  /** Port number to listen on (default from PORT or 8060) */
  port?: number;
  /** Pino logger configuration options */
  logger?: GovernorLoggerOptions;
  /** Install SIGTERM/SIGINT handlers (default true) */
  handleSignals?: boolean;
  governor?: CreateGovernorOptions;
}

export interface RunningServer {
  app: Express;
  server: Server;
  governor: Governor;
  close: () => Promise<void>;
}

/**
 * Start the governor server
 */
export async function startServer(options: StartServerOptions = {}): Promise<RunningServer> {
  initializeLogger(options.logger);
  const logger = getLogger();

  const config = loadConfig();
  const governor = createGovernor(config, options.governor);
  const app = createApp(governor);
  const server = createServer(app);

  governor.store.startSweep(config.cache.sweepIntervalSeconds);
  governor.scheduler.start();

  const port = options.port ?? config.port;
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });
  logger.info(`Resource governor running on port ${port}`);

  let closing: Promise<void> | null = null;
  const close = () => {
    if (!closing) {
      closing = (async () => {
        await shutdownGovernor(governor);
        await new Promise<void>((resolve, reject) => {
          server.close((error) => (error ? reject(error) : resolve()));
        });
        logger.warn("Server shut down successfully");
      })();
    }
    return closing;
  };

  if (options.handleSignals ?? true) {
    const gracefulShutdown = (signal: string) => {
      logger.info(`Received ${signal}. Shutting down...`);
      close().then(
        () => process.exit(0),
        (error) => {
          logger.error({ err: toError(error) }, "Error during shutdown");
          process.exit(1);
        }
      );
    };
    process.once("SIGTERM", () => gracefulShutdown("SIGTERM"));
    process.once("SIGINT", () => gracefulShutdown("SIGINT"));
  }

  return { app, server, governor, close };
}

export default startServer;
