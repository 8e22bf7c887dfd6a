/**
 * @module backup/BackupEngine
 *
 * Timestamped full-schema dumps of an environment's database, plus listing,
 * restore and retention cleanup.
 *
 * @example
 * ```typescript
 * const engine = new BackupEngine({ backupDir: "db_backups" });
 * const record = await engine.backup(config);
 * await engine.cleanup(config, 10);
 * ```
 */

import { mkdir, open, readdir, rm, stat } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { EnvironmentConfig } from "../config/index.js";
import { getComponentLogger } from "../logging/index.js";
import {
  BackupFailedError,
  BackupNotFoundError,
  InvalidArgumentError,
  RestoreFailedError,
} from "./errors.js";
import { backupFileName, parseBackupFileName } from "./filenames.js";
import { PgDumpTool } from "./pg-dump-tool.js";
import type {
  BackupEngineOptions,
  BackupRecord,
  CleanupResult,
  DumpTool,
} from "./types.js";

type Logger = ReturnType<typeof getComponentLogger>;

/**
 * Default number of backups retained by cleanup
 */
export const DEFAULT_KEEP = 10;

/**
 * Attempts to find a free file name before giving up
 */
const MAX_NAME_ATTEMPTS = 1000;

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function isMissingFileError(error: unknown): boolean {
  return hasErrorCode(error, "ENOENT");
}

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Newest first; equal timestamps fall back to file name, descending
 */
function compareNewestFirst(a: BackupRecord, b: BackupRecord): number {
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  const nameA = basename(a.path);
  const nameB = basename(b.path);
  return nameA < nameB ? 1 : nameA > nameB ? -1 : 0;
}

export class BackupEngine {
  private readonly backupDir: string;
  private readonly dumpTool: DumpTool;
  private readonly clock: () => Date;

  constructor(options: BackupEngineOptions) {
    this.backupDir = options.backupDir;
    this.dumpTool = options.dumpTool ?? new PgDumpTool();
    this.clock = options.clock ?? (() => new Date());
  }

  private logger(environment: EnvironmentConfig): Logger {
    return getComponentLogger("backup:engine", environment.name);
  }

  /**
   * Dump the environment's database to a new timestamped file
   *
   * @throws {BackupFailedError} If the dump tool fails, cannot be started or
   *         leaves an empty file; any partial file is removed
   */
  async backup(environment: EnvironmentConfig): Promise<BackupRecord> {
    const logger = this.logger(environment);
    const { database } = environment.connection;

    await mkdir(this.backupDir, { recursive: true });
    const { path, createdAt } = await this.reserveFile(environment, this.clock());
    logger.info({ path, database }, "Creating backup");

    const result = await this.dumpTool.dump(environment.connection, path);
    const size = await fileSize(path);

    if (result.exitCode !== 0 || size === null || size === 0) {
      await rm(path, { force: true });
      const stderr =
        result.exitCode === 0 ? result.stderr || "pg_dump produced an empty file" : result.stderr;
      logger.error({ exitCode: result.exitCode, stderr }, "Backup failed");
      throw new BackupFailedError(environment.name, result.exitCode, stderr);
    }

    logger.info({ path, sizeBytes: size }, "Backup created");
    return { path, environment: environment.name, database, createdAt, sizeBytes: size };
  }

  /**
   * Create the empty backup file exclusively; a name already taken moves the
   * timestamp forward by one millisecond
   */
  private async reserveFile(
    environment: EnvironmentConfig,
    requested: Date
  ): Promise<{ path: string; createdAt: Date }> {
    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const createdAt = new Date(requested.getTime() + attempt);
      const path = join(
        this.backupDir,
        backupFileName(environment.name, environment.connection.database, createdAt)
      );

      try {
        const handle = await open(path, "wx");
        await handle.close();
        return { path, createdAt };
      } catch (error) {
        if (!hasErrorCode(error, "EEXIST")) {
          throw error;
        }
      }
    }

    throw new BackupFailedError(
      environment.name,
      null,
      `no free backup file name after ${MAX_NAME_ATTEMPTS} attempts`
    );
  }

  /**
   * Backups of the environment's database, newest first
   *
   * Files that are not backup file names are ignored. A missing directory
   * yields an empty list.
   */
  async list(environment: EnvironmentConfig): Promise<BackupRecord[]> {
    let entries: string[];
    try {
      entries = await readdir(this.backupDir);
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    const records: BackupRecord[] = [];
    for (const entry of entries) {
      const parsed = parseBackupFileName(entry);
      if (
        !parsed ||
        parsed.environment !== environment.name ||
        parsed.database !== environment.connection.database
      ) {
        continue;
      }

      const path = join(this.backupDir, entry);
      const size = await fileSize(path);
      if (size === null) {
        continue;
      }
      records.push({ ...parsed, path, sizeBytes: size });
    }

    return records.sort(compareNewestFirst);
  }

  /**
   * Find the backup file a restore would replay
   *
   * A bare file name that does not exist in the working directory is looked
   * up in the backups directory.
   *
   * @throws {BackupNotFoundError} If the file is missing, is not a backup file
   *         name, or was taken from another environment or database
   */
  async resolveBackup(environment: EnvironmentConfig, path: string): Promise<BackupRecord> {
    const name = basename(path);
    const parsed = parseBackupFileName(name);

    if (!parsed) {
      throw new BackupNotFoundError(path, "not a backup file name");
    }
    if (
      parsed.environment !== environment.name ||
      parsed.database !== environment.connection.database
    ) {
      throw new BackupNotFoundError(
        path,
        `backup belongs to ${parsed.environment}/${parsed.database}, ` +
          `not ${environment.name}/${environment.connection.database}`
      );
    }

    let resolved = path;
    let size = await fileSize(resolved);
    if (size === null && dirname(path) === ".") {
      resolved = join(this.backupDir, name);
      size = await fileSize(resolved);
    }
    if (size === null) {
      throw new BackupNotFoundError(path, "file does not exist");
    }

    return { ...parsed, path: resolved, sizeBytes: size };
  }

  /**
   * Replay a backup file into the environment's database
   *
   * The file is found as {@link resolveBackup} finds it. No backup is taken first.
   *
   * @throws {BackupNotFoundError} If the file cannot be resolved
   * @throws {RestoreFailedError} If the restore tool fails
   */
  async restore(environment: EnvironmentConfig, path: string): Promise<BackupRecord> {
    const logger = this.logger(environment);
    const record = await this.resolveBackup(environment, path);
    const resolved = record.path;

    logger.warn({ path: resolved }, "Restoring backup");
    const result = await this.dumpTool.restore(environment.connection, resolved);
    if (result.exitCode !== 0) {
      logger.error({ exitCode: result.exitCode, stderr: result.stderr }, "Restore failed");
      throw new RestoreFailedError(resolved, result.exitCode, result.stderr);
    }

    logger.info({ path: resolved }, "Restore completed");
    return record;
  }

  /**
   * Keep the newest `keep` backups and delete the rest
   *
   * @throws {InvalidArgumentError} If keep is not a non-negative integer
   */
  async cleanup(environment: EnvironmentConfig, keep: number = DEFAULT_KEEP): Promise<CleanupResult> {
    if (!Number.isInteger(keep) || keep < 0) {
      throw new InvalidArgumentError(`keep must be a non-negative integer, got ${keep}`);
    }

    const records = await this.list(environment);
    const kept = records.slice(0, keep);
    const removed = records.slice(keep);

    for (const record of removed) {
      await rm(record.path, { force: true });
    }

    this.logger(environment).info(
      { kept: kept.length, removed: removed.length },
      "Backup cleanup completed"
    );
    return { kept, removed };
  }
}
