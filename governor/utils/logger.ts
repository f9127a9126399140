import pino, { Logger, LoggerOptions, DestinationStream, TransportTargetOptions } from "pino";
import env from "./env.js";

// Logger configuration type accepted by startServer
export interface GovernorLoggerOptions {
  /** Pino log level: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent' */
  level?: pino.LevelWithSilentOrString;
  /** Custom pino transport configuration */
  transport?: {
    target: string;
    options?: Record<string, unknown>;
  } | {
    targets: TransportTargetOptions[];
  };
  /** Additional pino options */
  options?: Omit<LoggerOptions, 'level' | 'transport'>;
  /** Custom destination stream (if not using transport) */
  destination?: DestinationStream;
  /** Enable pretty printing in development (uses pino-pretty) */
  pretty?: boolean;
}

let logger: Logger | null = null;

/**
 * Initialize the root logger. Called once at server startup; later calls replace it.
 */
export function initializeLogger(options?: GovernorLoggerOptions): Logger {
  const nodeEnv = env.get("NODE_ENV") || "development";
  const isPretty = options?.pretty ?? (nodeEnv === "development");

  // Jest sets NODE_ENV=test; stay quiet there unless asked otherwise
  const level = options?.level
    ?? env.get("LOG_LEVEL")
    ?? (nodeEnv === "test" ? "silent" : "info");

  const pinoOptions: LoggerOptions = {
    level,
    ...options?.options,
  };

  if (options?.transport) {
    pinoOptions.transport = options.transport;
    logger = pino(pinoOptions);
  } else if (options?.destination) {
    logger = pino(pinoOptions, options.destination);
  } else if (isPretty) {
    pinoOptions.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
    logger = pino(pinoOptions);
  } else {
    logger = pino(pinoOptions);
  }

  return logger;
}

/**
 * Get the root logger, creating a default one on first use
 */
export function getLogger(): Logger {
  if (!logger) {
    return initializeLogger();
  }
  return logger;
}

/**
 * Child logger tagged with the component name, e.g. `{"component":"CacheStore"}`
 */
export function componentLogger(component: string): Logger {
  return getLogger().child({ component });
}

/**
 * Serialize an unknown thrown value into something pino's `err` serializer understands
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === "string" ? value : JSON.stringify(value));
}

export default getLogger;

export type { Logger, LoggerOptions, DestinationStream } from "pino";
