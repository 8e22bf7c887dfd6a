/**
 * Secret Redaction Configuration
 *
 * Connection parameters travel through log objects (environment config,
 * child process environments), so passwords are redacted by path before a
 * line is written.
 *
 * @module logging/redactors
 */

/**
 * Paths to redact from log objects (Pino redaction path syntax)
 */
export const REDACT_PATHS = [
  // Child process environment for pg_dump / psql
  "env.PGPASSWORD",
  "childEnv.PGPASSWORD",

  // Connection parameters
  "connection.password",
  "config.password",
  "*.connection.password",

  // Common secret field names
  "password",
  "*.password",
  "*.connectionString",
  "*.secret",
  "*.token",
];

/**
 * Pino redaction options
 */
export const REDACT_OPTIONS = {
  paths: REDACT_PATHS,
  censor: "[REDACTED]",
  remove: false,
} as const;

/**
 * Flatten an error (and its cause chain) into a plain object for logging.
 *
 * Error messages are not scanned for secrets; never put a password in a
 * message string.
 *
 * @param error - Error to flatten
 * @returns Plain object with name, message, stack, cause and own properties
 */
export function sanitizeError(error: Error): Record<string, unknown> {
  const cause = error.cause instanceof Error ? sanitizeError(error.cause) : undefined;

  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    cause,
    ...Object.fromEntries(
      Object.entries(error).filter(([key]) => !["name", "message", "stack", "cause"].includes(key))
    ),
  };
}
