/**
 * Dependency Initialization for CLI
 *
 * Builds everything a command needs from the process environment: logger,
 * settings, revision catalog, backup engine and, on demand, the connection
 * to the selected environment's database.
 */

import type { Logger } from "pino";
import { z } from "zod";
import { BackupEngine } from "../../backup/index.js";
import {
  ConfigurationError,
  loadAppSettings,
  loadEnvironmentConfig,
  type AppSettings,
  type EnvSource,
  type EnvironmentConfig,
  type EnvironmentName,
} from "../../config/index.js";
import {
  PostgresMigrationDatabase,
  createPool,
  type MigrationDatabase,
} from "../../database/index.js";
import {
  getComponentLogger,
  initializeLogger,
  isLoggerInitialized,
} from "../../logging/index.js";
import { MigrationRunner } from "../../migration/index.js";
import { loadRevisionCatalog, type RevisionStore } from "../../revisions/index.js";

const LogLevelSchema = z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]);
const LogFormatSchema = z.enum(["json", "pretty"]);

/**
 * All dependencies required by CLI commands
 */
export interface CliDependencies {
  /** Environment selected with --env */
  environmentName: EnvironmentName;
  settings: AppSettings;
  store: RevisionStore;
  backups: BackupEngine;
  logger: Logger;
  /**
   * Resolve the selected environment's connection settings
   *
   * @throws {ConfigurationError} If a required variable is missing or invalid
   */
  loadEnvironment(): EnvironmentConfig;
  /**
   * Open a connection to an environment's database; callers close it
   */
  openDatabase(environment: EnvironmentConfig): MigrationDatabase;
}

/**
 * Initialize the logger for CLI use (less verbose by default)
 *
 * Does nothing when the logger is already initialized.
 *
 * @throws {ConfigurationError} If LOG_LEVEL or LOG_FORMAT holds an unknown value
 */
export function initializeCliLogger(env: EnvSource = process.env): void {
  if (isLoggerInitialized()) {
    return;
  }

  const level = LogLevelSchema.safeParse(env["LOG_LEVEL"] || "warn");
  if (!level.success) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL value: "${env["LOG_LEVEL"]}". ` +
        `Expected one of: ${LogLevelSchema.options.join(", ")}.`,
      "LOG_LEVEL"
    );
  }

  const format = LogFormatSchema.safeParse(env["LOG_FORMAT"] || "pretty");
  if (!format.success) {
    throw new ConfigurationError(
      `Invalid LOG_FORMAT value: "${env["LOG_FORMAT"]}". Expected json or pretty.`,
      "LOG_FORMAT"
    );
  }

  initializeLogger({ level: level.data, format: format.data });
}

/**
 * Initialize all dependencies for CLI commands
 *
 * Connection settings are resolved lazily so that commands which never
 * touch the database (create, history without a connection) do not require
 * them.
 *
 * @param environmentName - Environment selected with --env
 * @param env - Variable source
 * @throws {ConfigurationError} If logging settings are invalid
 * @throws {InvalidRevisionError} If a revision file is malformed
 */
export async function initializeDependencies(
  environmentName: EnvironmentName,
  env: EnvSource = process.env
): Promise<CliDependencies> {
  initializeCliLogger(env);
  const logger = getComponentLogger("cli", environmentName);

  const settings = loadAppSettings(env);
  logger.debug({ ...settings }, "Settings loaded");

  const store = await loadRevisionCatalog(settings.migrationsDir);
  logger.debug({ revisions: store.size }, "Revision catalog loaded");

  const backups = new BackupEngine({ backupDir: settings.backupDir });

  return {
    environmentName,
    settings,
    store,
    backups,
    logger,
    loadEnvironment: () => loadEnvironmentConfig(environmentName, env),
    openDatabase: (environment) =>
      new PostgresMigrationDatabase(createPool(environment.connection), environment.name),
  };
}

/**
 * Run a function with a migration runner bound to the selected environment
 *
 * The database connection is closed when the function settles.
 */
export async function withMigrationRunner<T>(
  deps: CliDependencies,
  fn: (runner: MigrationRunner, environment: EnvironmentConfig) => Promise<T>
): Promise<T> {
  const environment = deps.loadEnvironment();
  const database = deps.openDatabase(environment);

  try {
    const runner = new MigrationRunner({
      store: deps.store,
      database,
      backups: deps.backups,
      environment,
    });
    return await fn(runner, environment);
  } finally {
    await database.close();
  }
}
