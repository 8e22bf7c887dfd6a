/**
 * Logging Module - Public API
 *
 * Structured logging for schemactl, built on Pino with secret redaction and
 * component-scoped child loggers.
 *
 * ```typescript
 * import { initializeLogger, getComponentLogger } from "./logging/index.js";
 *
 * initializeLogger({ level: "info", format: "pretty" });
 *
 * const logger = getComponentLogger("migration:runner");
 * logger.info({ revisionId: "005_purchased_item_unit" }, "Step committed");
 * ```
 *
 * Environment variables read by the CLI:
 *
 * - `LOG_LEVEL`: silent|fatal|error|warn|info|debug|trace (CLI default: warn)
 * - `LOG_FORMAT`: json|pretty (default: pretty)
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  isLoggerInitialized,
  getComponentLogger,
  getRootLogger,
  resetLogger,
} from "./logger-factory.js";

export { REDACT_PATHS, REDACT_OPTIONS, sanitizeError } from "./redactors.js";
