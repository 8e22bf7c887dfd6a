/**
 * @module migration/errors
 *
 * Error classes raised by the migration runner.
 */

import { BASE_REVISION } from "../revisions/index.js";
import type { MigrationDirection } from "./types.js";

function label(id: string | null): string {
  return id ?? BASE_REVISION;
}

/**
 * Base class for migration run errors
 */
export class MigrationError extends Error {
  public readonly code: string;

  public override readonly cause?: unknown;

  constructor(message: string, code: string = "MIGRATION_ERROR", cause?: unknown) {
    super(message);
    this.name = "MigrationError";
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause instanceof Error && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Details of a failed step
 */
export interface StepFailure {
  revisionId: string;
  direction: MigrationDirection;
  /** Error raised by the database, unmodified */
  cause: unknown;
  /** Applied revision after the failure (the last committed step) */
  currentRevision: string | null;
  /** Steps committed before the failure, in execution order */
  completedSteps: string[];
}

/**
 * A step's script or pointer write failed; the step was rolled back and
 * earlier steps stay committed
 */
export class MigrationStepFailedError extends MigrationError {
  public readonly revisionId: string;
  public readonly direction: MigrationDirection;
  public readonly currentRevision: string | null;
  public readonly completedSteps: string[];

  constructor(failure: StepFailure) {
    const reason = failure.cause instanceof Error ? failure.cause.message : String(failure.cause);
    super(
      `Migration ${failure.direction} of revision '${failure.revisionId}' failed: ${reason}`,
      "MIGRATION_STEP_FAILED",
      failure.cause
    );
    this.name = "MigrationStepFailedError";
    this.revisionId = failure.revisionId;
    this.direction = failure.direction;
    this.currentRevision = failure.currentRevision;
    this.completedSteps = failure.completedSteps;
  }
}

/**
 * A downgrade reached a revision that cannot be undone
 */
export class IrreversibleMigrationError extends MigrationError {
  constructor(
    public readonly revisionId: string,
    public readonly reason: string,
    public readonly currentRevision: string | null
  ) {
    super(`Revision '${revisionId}' cannot be downgraded: ${reason}`, "IRREVERSIBLE_MIGRATION");
    this.name = "IrreversibleMigrationError";
  }
}

/**
 * The requested target lies in the wrong direction
 */
export class InvalidMigrationTargetError extends MigrationError {
  constructor(
    public readonly target: string | null,
    public readonly direction: MigrationDirection,
    public readonly currentRevision: string | null
  ) {
    const relation = direction === "up" ? "an ancestor of" : "a descendant of";
    super(
      `Cannot migrate ${direction} to '${label(target)}': it is ${relation} ` +
        `the applied revision '${label(currentRevision)}'`,
      "INVALID_MIGRATION_TARGET"
    );
    this.name = "InvalidMigrationTargetError";
  }
}
