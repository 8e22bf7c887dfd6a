/**
 * Logging Types
 *
 * @module logging/types
 */

/**
 * Log levels supported by the logger
 *
 * `silent` suppresses all output and is what the test suite runs with.
 */
export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * Log output format
 * - json: one JSON object per line
 * - pretty: colorized, human-readable (pino-pretty)
 */
export type LogFormat = "json" | "pretty";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   */
  level: LogLevel;

  format: LogFormat;

  /**
   * Custom output stream, used by tests to capture log lines.
   * When set, `format` is ignored and JSON is written to the stream.
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Context attached to every line written by a component logger
 */
export interface ComponentContext {
  /**
   * Component name in colon notation, e.g. "migration:runner", "backup:engine"
   */
  component: string;

  /**
   * Environment the component is operating on (prod, stage, dev, ...)
   */
  environment?: string;
}
