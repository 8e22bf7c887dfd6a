/**
 * @module backup/types
 *
 * Type definitions for the backup engine.
 */

import type { ConnectionParams, EnvironmentName } from "../config/index.js";

/**
 * A dump file on disk
 */
export interface BackupRecord {
  /** Path of the dump file */
  path: string;
  /** Environment the dump was taken from */
  environment: EnvironmentName;
  /** Database the dump was taken from */
  database: string;
  /** Creation time, taken from the file name */
  createdAt: Date;
  /** File size in bytes */
  sizeBytes: number;
}

/**
 * Outcome of a dump or restore subprocess
 */
export interface ProcessResult {
  /** Exit status, or null when the process could not be started */
  exitCode: number | null;
  /** Captured standard error */
  stderr: string;
}

/**
 * Native dump and restore tooling
 */
export interface DumpTool {
  /**
   * Write a full-schema dump of the database to a file
   */
  dump(connection: ConnectionParams, file: string): Promise<ProcessResult>;

  /**
   * Replay a dump file against the database
   */
  restore(connection: ConnectionParams, file: string): Promise<ProcessResult>;
}

/**
 * Result of pruning old backups
 */
export interface CleanupResult {
  /** Records left in place, newest first */
  kept: BackupRecord[];
  /** Records deleted, newest first */
  removed: BackupRecord[];
}

/**
 * Construction options for the backup engine
 */
export interface BackupEngineOptions {
  /** Directory holding dump files */
  backupDir: string;
  /** Dump tooling (defaults to pg_dump/psql) */
  dumpTool?: DumpTool;
  /** Time source for backup file names */
  clock?: () => Date;
}
