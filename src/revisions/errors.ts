/**
 * @module revisions/errors
 *
 * Error classes for the revision catalog.
 *
 * Catalogs are loaded from files, so a malformed chain is reported as an
 * error at the point it is observed rather than assumed away.
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base class for all revision catalog errors
 */
export class RevisionError extends Error {
  /**
   * Error code for categorization and handling
   */
  public readonly code: string;

  public override readonly cause?: Error;

  constructor(message: string, code: string = "REVISION_ERROR", cause?: Error) {
    super(message);
    this.name = "RevisionError";
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

// =============================================================================
// Lookup Errors
// =============================================================================

/**
 * Thrown when a revision id is not present in the catalog
 */
export class UnknownRevisionError extends RevisionError {
  public readonly revisionId: string;

  constructor(revisionId: string) {
    super(`Unknown revision '${revisionId}'`, "UNKNOWN_REVISION");
    this.name = "UnknownRevisionError";
    this.revisionId = revisionId;
  }
}

/**
 * Thrown when the catalog has no revisions at all
 */
export class EmptyHistoryError extends RevisionError {
  constructor() {
    super("Revision history is empty", "EMPTY_HISTORY");
    this.name = "EmptyHistoryError";
  }
}

// =============================================================================
// Structure Errors
// =============================================================================

/**
 * Thrown when the chain is broken: no path between two revisions, a parent
 * that does not exist, several roots or heads, a branch, or a cycle.
 */
export class DisconnectedHistoryError extends RevisionError {
  /**
   * Revision ids involved in the break, for diagnostics
   */
  public readonly revisionIds: string[];

  constructor(message: string, revisionIds: string[] = []) {
    super(message, "DISCONNECTED_HISTORY");
    this.name = "DisconnectedHistoryError";
    this.revisionIds = revisionIds;
  }
}

/**
 * Thrown when a revision definition is malformed (bad manifest, missing
 * script, duplicate id, unusable message for a new revision)
 */
export class InvalidRevisionError extends RevisionError {
  /**
   * File or id the problem was found in
   */
  public readonly source: string;

  constructor(message: string, source: string, cause?: Error) {
    super(message, "INVALID_REVISION", cause);
    this.name = "InvalidRevisionError";
    this.source = source;
  }
}
