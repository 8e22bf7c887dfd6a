/**
 * Environment Configuration
 *
 * Resolves the PostgreSQL connection parameters of a deployment environment
 * (prod, stage, dev, test, local) and the application settings shared by
 * every command. Values come from an explicit variable source, normally
 * `process.env` after dotenv has loaded `.env`, and are passed down as plain
 * objects; nothing below the CLI reads process state.
 *
 * Variables per environment (pattern `{ENV}_POSTGRES_{SETTING}`):
 * - `{ENV}_POSTGRES_HOST` (default: localhost)
 * - `{ENV}_POSTGRES_PORT` (default: 5432)
 * - `{ENV}_POSTGRES_DB` (required)
 * - `{ENV}_POSTGRES_USER` (default: postgres)
 * - `{ENV}_POSTGRES_PASSWORD` (required)
 *
 * @module config/environment-config
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

/**
 * All deployment environments, in promotion order
 */
export const ENVIRONMENT_NAMES = ["prod", "stage", "dev", "test", "local"] as const;

/**
 * Zod schema for an environment selector (case-insensitive)
 */
export const EnvironmentNameSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(ENVIRONMENT_NAMES));

export type EnvironmentName = (typeof ENVIRONMENT_NAMES)[number];

/**
 * Variable source, usually `process.env`
 */
export type EnvSource = Record<string, string | undefined>;

/**
 * Connection parameters for one PostgreSQL database
 */
export interface ConnectionParams {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

/**
 * Resolved configuration for one environment
 */
export interface EnvironmentConfig {
  name: EnvironmentName;
  connection: ConnectionParams;
}

/**
 * Settings shared by all environments
 */
export interface AppSettings {
  /** Directory holding revision manifests and SQL files */
  migrationsDir: string;
  /** Directory holding backup dumps */
  backupDir: string;
}

const DEFAULT_HOST = "localhost";
const DEFAULT_PORT = "5432";
const DEFAULT_USER = "postgres";

export const DEFAULT_MIGRATIONS_DIR = "migrations";
export const DEFAULT_BACKUP_DIR = "db_backups";

/**
 * Environment variable names for an environment
 */
export function environmentVariableNames(environment: EnvironmentName): {
  host: string;
  port: string;
  database: string;
  user: string;
  password: string;
} {
  const prefix = `${environment.toUpperCase()}_POSTGRES`;
  return {
    host: `${prefix}_HOST`,
    port: `${prefix}_PORT`,
    database: `${prefix}_DB`,
    user: `${prefix}_USER`,
    password: `${prefix}_PASSWORD`,
  };
}

/**
 * Parse and range-check a port value
 *
 * parseInt alone would accept "5432abc", so the whole string is checked.
 */
function parsePort(value: string, variable: string): number {
  const port = parseInt(value, 10);
  if (!/^\d+$/.test(value) || isNaN(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(
      `Invalid ${variable} value: "${value}". Port must be a valid integer between 1 and 65535.`,
      variable
    );
  }
  return port;
}

function requireValue(env: EnvSource, variable: string): string {
  const value = env[variable];
  if (!value) {
    throw new ConfigurationError(
      `${variable} environment variable is required. ` +
        "Set it in your .env file or export it in your shell.",
      variable
    );
  }
  return value;
}

/**
 * Load the configuration of one environment
 *
 * @param environment - Environment to resolve
 * @param env - Variable source
 * @throws {ConfigurationError} If a required variable is missing or the port is invalid
 *
 * @example
 * ```typescript
 * const config = loadEnvironmentConfig("stage", process.env);
 * // reads STAGE_POSTGRES_HOST, STAGE_POSTGRES_PORT, ...
 * ```
 */
export function loadEnvironmentConfig(
  environment: EnvironmentName,
  env: EnvSource
): EnvironmentConfig {
  const names = environmentVariableNames(environment);

  return {
    name: environment,
    connection: {
      host: env[names.host] || DEFAULT_HOST,
      port: parsePort(env[names.port] || DEFAULT_PORT, names.port),
      database: requireValue(env, names.database),
      user: env[names.user] || DEFAULT_USER,
      password: requireValue(env, names.password),
    },
  };
}

/**
 * Load the settings shared by all environments
 *
 * - `MIGRATIONS_DIR` (default: migrations)
 * - `BACKUP_DIR` (default: db_backups)
 */
export function loadAppSettings(env: EnvSource): AppSettings {
  return {
    migrationsDir: env["MIGRATIONS_DIR"] || DEFAULT_MIGRATIONS_DIR,
    backupDir: env["BACKUP_DIR"] || DEFAULT_BACKUP_DIR,
  };
}

/**
 * Type guard for environment names
 */
export function isEnvironmentName(value: string): value is EnvironmentName {
  return ENVIRONMENT_NAMES.some((name) => name === value);
}
