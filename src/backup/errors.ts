/**
 * @module backup/errors
 *
 * Error classes for backup, restore and cleanup.
 */

/**
 * Base class for all backup errors
 */
export class BackupError extends Error {
  public readonly code: string;

  public override readonly cause?: Error;

  constructor(message: string, code: string = "BACKUP_ERROR", cause?: Error) {
    super(message);
    this.name = "BackupError";
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * The dump tool failed or produced no output
 */
export class BackupFailedError extends BackupError {
  constructor(
    public readonly environment: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    const status = exitCode === null ? "could not be started" : `exited with code ${exitCode}`;
    super(`Backup of ${environment} failed: pg_dump ${status}`, "BACKUP_FAILED");
    this.name = "BackupFailedError";
  }
}

/**
 * A restore was requested for a file that is missing or not a backup of
 * the selected environment
 */
export class BackupNotFoundError extends BackupError {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Backup not found: ${path} (${reason})`, "BACKUP_NOT_FOUND");
    this.name = "BackupNotFoundError";
  }
}

/**
 * The restore tool exited with a failure
 */
export class RestoreFailedError extends BackupError {
  constructor(
    public readonly path: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    const status = exitCode === null ? "could not be started" : `exited with code ${exitCode}`;
    super(`Restore of ${path} failed: psql ${status}`, "RESTORE_FAILED");
    this.name = "RestoreFailedError";
  }
}

/**
 * A caller passed an argument outside its allowed range
 */
export class InvalidArgumentError extends BackupError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}
