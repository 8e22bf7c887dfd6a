/**
 * @module migration
 *
 * Migration runner: resolves a path through the revision chain, takes a
 * backup and applies each step transactionally.
 */

export type {
  MigrationDirection,
  MigrationPhase,
  MigrationPhaseListener,
  MigrationOptions,
  MigrationResult,
  MigrationStatus,
  MigrationRunnerDeps,
  BackupService,
} from "./types.js";

export {
  MigrationError,
  MigrationStepFailedError,
  IrreversibleMigrationError,
  InvalidMigrationTargetError,
  type StepFailure,
} from "./errors.js";

export { MigrationRunner } from "./MigrationRunner.js";
