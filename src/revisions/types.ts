/**
 * @module revisions/types
 *
 * Type definitions for the revision catalog.
 *
 * A revision is one immutable migration unit. Revisions form a single chain
 * through their parent links; the chain, not file names or dates, decides
 * the order in which they apply.
 */

// =============================================================================
// Revision
// =============================================================================

/**
 * How a revision is undone
 *
 * Irreversibility is a property of the revision itself, so a downgrade that
 * is deliberately disallowed is known before anything runs.
 */
export type Downgrade =
  | { kind: "reversible"; script: string }
  | { kind: "irreversible"; reason: string };

/**
 * A single migration unit
 */
export interface Revision {
  /**
   * Unique id, by convention a zero-padded sequence prefix plus slug
   * (e.g. "005_purchased_item_unit")
   */
  id: string;

  /**
   * Id of the preceding revision, or null for the root of the chain
   */
  parentId: string | null;

  /**
   * Human-readable description
   */
  description: string;

  /**
   * Creation date recorded in the manifest (informational only)
   */
  createdAt?: string;

  /**
   * SQL applied on upgrade
   */
  upScript: string;

  downgrade: Downgrade;
}

// =============================================================================
// Paths
// =============================================================================

/**
 * Direction of a resolved path
 */
export type PathDirection = "up" | "down" | "none";

/**
 * Ordered list of revisions between two points of the chain
 *
 * For "up" the steps ascend and each applies its upScript. For "down" they
 * descend from the current revision and each applies its downgrade.
 */
export interface MigrationPath {
  direction: PathDirection;
  /** Revision the path starts from (null = base) */
  from: string | null;
  /** Revision the path ends at (null = base) */
  to: string | null;
  steps: Revision[];
}

/**
 * Literal used on the command line for "no revisions applied"
 */
export const BASE_REVISION = "base";
