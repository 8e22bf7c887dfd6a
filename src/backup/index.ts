/**
 * @module backup
 */

export type {
  BackupRecord,
  BackupEngineOptions,
  CleanupResult,
  DumpTool,
  ProcessResult,
} from "./types.js";

export {
  BackupError,
  BackupFailedError,
  BackupNotFoundError,
  RestoreFailedError,
  InvalidArgumentError,
} from "./errors.js";

export { BackupEngine, DEFAULT_KEEP } from "./BackupEngine.js";
export { PgDumpTool, pgDumpArgs, psqlRestoreArgs } from "./pg-dump-tool.js";
export {
  backupFileName,
  parseBackupFileName,
  formatBackupTimestamp,
  type ParsedBackupName,
} from "./filenames.js";
