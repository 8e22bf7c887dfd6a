/**
 * schemactl - Library Entry Point
 *
 * Programmatic access to the revision catalog, backup engine and migration
 * runner. The CLI in `cli/index.ts` is a thin layer over these exports.
 *
 * ```typescript
 * import {
 *   BackupEngine,
 *   MigrationRunner,
 *   PostgresMigrationDatabase,
 *   createPool,
 *   initializeLogger,
 *   loadEnvironmentConfig,
 *   loadRevisionCatalog,
 * } from "schemactl";
 *
 * initializeLogger({ level: "info", format: "json" });
 * const environment = loadEnvironmentConfig("stage", process.env);
 * const database = new PostgresMigrationDatabase(createPool(environment.connection));
 * const runner = new MigrationRunner({
 *   store: await loadRevisionCatalog("migrations"),
 *   database,
 *   backups: new BackupEngine({ backupDir: "db_backups" }),
 *   environment,
 * });
 * try {
 *   await runner.upgrade();
 * } finally {
 *   await database.close();
 * }
 * ```
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./revisions/index.js";
export * from "./database/index.js";
export * from "./backup/index.js";
export * from "./migration/index.js";
