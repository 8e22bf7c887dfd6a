/**
 * Logger Factory
 *
 * Creates the root Pino logger and component-scoped child loggers.
 * All log output goes to stderr; stdout is reserved for command output
 * (tables and `--json` documents).
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";
import { REDACT_OPTIONS } from "./redactors.js";

/**
 * Singleton root logger, initialized once per process
 */
let rootLogger: pino.Logger | null = null;

function baseOptions(config: LoggerConfig): pino.LoggerOptions {
  return {
    level: config.level,
    redact: REDACT_OPTIONS,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * Create the root Pino logger
 *
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const options = baseOptions(config);

  // Test capture stream
  if (config.stream) {
    return pino(options, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Must be called once before any component logger is requested.
 *
 * @throws Error if the logger is already initialized
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ level: config.level, format: config.format }, "Logger initialized");
  } catch (error) {
    // pino-pretty transport could not be started: fall back to JSON on stderr
    rootLogger = pino(baseOptions(config), pino.destination(2));
    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Whether initializeLogger() has been called (and not reset)
 */
export function isLoggerInitialized(): boolean {
  return rootLogger !== null;
}

/**
 * Get the root logger instance
 *
 * @throws Error if the logger is not initialized
 * @internal - application code should use getComponentLogger()
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Get a component-scoped logger
 *
 * @param component - Component name in colon notation ("backup:engine")
 * @param environment - Optional environment name attached to every line
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger("migration:runner", "stage");
 * logger.info({ revisionId }, "Applying step");
 * // {"level":"info","component":"migration:runner","environment":"stage",...}
 * ```
 */
export function getComponentLogger(component: string, environment?: string): pino.Logger {
  const context: ComponentContext = {
    component,
    ...(environment && { environment }),
  };

  return getRootLogger().child(context);
}

/**
 * Reset logger (tests only)
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}
