/**
 * @module migration/types
 *
 * Type definitions for the migration runner.
 */

import type { BackupRecord } from "../backup/index.js";
import type { EnvironmentConfig } from "../config/index.js";
import type { MigrationDatabase } from "../database/index.js";
import type { RevisionStore } from "../revisions/index.js";

// =============================================================================
// Phases
// =============================================================================

/**
 * Direction of a migration run
 */
export type MigrationDirection = "up" | "down";

/**
 * Runner state, reported on every transition
 *
 * `applying` and `committed` repeat once per step; a run ends in `done` or
 * `failed`. A failure with a null index happened before any step started
 * (backup).
 */
export type MigrationPhase =
  | { state: "idle" }
  | { state: "resolving"; direction: MigrationDirection }
  | { state: "backing-up"; environment: string }
  | {
      state: "applying";
      direction: MigrationDirection;
      index: number;
      total: number;
      revisionId: string;
    }
  | {
      state: "committed";
      direction: MigrationDirection;
      index: number;
      total: number;
      revisionId: string;
    }
  | { state: "done"; applied: string[] }
  | { state: "failed"; index: number | null; revisionId: string | null; error: unknown };

export type MigrationPhaseListener = (phase: MigrationPhase) => void;

// =============================================================================
// Options and Results
// =============================================================================

/**
 * Options for an upgrade or downgrade run
 */
export interface MigrationOptions {
  /**
   * Target revision id, null for base, or undefined for the default
   * (head for upgrade, the parent of the applied revision for downgrade)
   */
  target?: string | null;

  /**
   * Take a backup before the first step (default: true)
   */
  backup?: boolean;

  /**
   * Resolve and report the steps without touching the database
   */
  dryRun?: boolean;

  /**
   * Receives every phase transition
   */
  onPhase?: MigrationPhaseListener;
}

/**
 * Outcome of a successful run
 */
export interface MigrationResult {
  direction: MigrationDirection;
  /** Applied revision before the run (null = base) */
  from: string | null;
  /** Applied revision after the run (planned revision for a dry run) */
  to: string | null;
  /** Revision ids applied, or planned for a dry run, in execution order */
  applied: string[];
  /** Backup taken before the first step, if any */
  backup: BackupRecord | null;
  dryRun: boolean;
}

/**
 * Read-only view of where the database stands
 */
export interface MigrationStatus {
  current: string | null;
  head: string | null;
  /** Revisions between current and head, in apply order */
  pending: string[];
  atHead: boolean;
}

// =============================================================================
// Dependencies
// =============================================================================

/**
 * The part of the backup engine the runner uses
 */
export interface BackupService {
  backup(environment: EnvironmentConfig): Promise<BackupRecord>;
}

export interface MigrationRunnerDeps {
  store: RevisionStore;
  database: MigrationDatabase;
  backups: BackupService;
  environment: EnvironmentConfig;
}
