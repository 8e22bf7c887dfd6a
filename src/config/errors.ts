/**
 * Configuration errors
 *
 * @module config/errors
 */

/**
 * Thrown when an environment variable is missing or holds an invalid value
 */
export class ConfigurationError extends Error {
  public readonly code = "CONFIGURATION_ERROR";

  /**
   * Name of the offending environment variable, when there is one
   */
  public readonly variable?: string;

  constructor(message: string, variable?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.variable = variable;
    Error.captureStackTrace(this, this.constructor);
  }
}
