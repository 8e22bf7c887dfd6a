/**
 * Configuration Module Exports
 *
 * @module config
 */

export {
  // Types
  type EnvironmentName,
  type EnvironmentConfig,
  type ConnectionParams,
  type AppSettings,
  type EnvSource,
  // Constants
  ENVIRONMENT_NAMES,
  EnvironmentNameSchema,
  DEFAULT_MIGRATIONS_DIR,
  DEFAULT_BACKUP_DIR,
  // Functions
  loadEnvironmentConfig,
  loadAppSettings,
  environmentVariableNames,
  isEnvironmentName,
} from "./environment-config.js";

export { ConfigurationError } from "./errors.js";
