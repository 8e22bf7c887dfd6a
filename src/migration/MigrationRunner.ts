/**
 * @module migration/MigrationRunner
 *
 * Applies revisions to an environment's database.
 *
 * A run reads the applied-revision pointer, resolves the path to the target,
 * takes a backup, then applies each step in its own transaction together
 * with the pointer update. A failing step is rolled back; steps before it
 * stay committed, so a rerun resumes from the pointer.
 *
 * @example
 * ```typescript
 * const runner = new MigrationRunner({ store, database, backups, environment });
 * const result = await runner.upgrade();
 * console.log(`Applied ${result.applied.length} revisions`);
 * ```
 */

import type { BackupRecord } from "../backup/index.js";
import { getComponentLogger, sanitizeError } from "../logging/index.js";
import type { MigrationPath, Revision } from "../revisions/index.js";
import {
  IrreversibleMigrationError,
  InvalidMigrationTargetError,
  MigrationStepFailedError,
} from "./errors.js";
import type {
  MigrationDirection,
  MigrationOptions,
  MigrationPhase,
  MigrationResult,
  MigrationRunnerDeps,
  MigrationStatus,
} from "./types.js";

type Logger = ReturnType<typeof getComponentLogger>;

export class MigrationRunner {
  private readonly deps: MigrationRunnerDeps;
  private readonly logger: Logger;

  constructor(deps: MigrationRunnerDeps) {
    this.deps = deps;
    this.logger = getComponentLogger("migration:runner", deps.environment.name);
  }

  /**
   * Applied revision, read without side effects
   */
  async current(): Promise<string | null> {
    return this.deps.database.readPointer();
  }

  /**
   * Applied revision, head and pending revisions, read without side effects
   *
   * @throws {UnknownRevisionError} If the pointer names a revision missing from the catalog
   */
  async status(): Promise<MigrationStatus> {
    const { store } = this.deps;
    const current = await this.current();
    const head = store.size === 0 ? null : store.head();
    const path = store.resolvePath(current, head);
    const pending = path.direction === "up" ? path.steps.map((step) => step.id) : [];

    return { current, head, pending, atHead: current === head };
  }

  /**
   * Move forward to the target (default: head)
   *
   * @throws {InvalidMigrationTargetError} If the target is an ancestor of the applied revision
   * @throws {BackupFailedError} If the pre-migration backup fails; nothing is applied
   * @throws {MigrationStepFailedError} If a step fails; earlier steps stay committed
   */
  async upgrade(options: MigrationOptions = {}): Promise<MigrationResult> {
    const { store } = this.deps;
    this.emit(options, { state: "idle" });
    this.emit(options, { state: "resolving", direction: "up" });

    const current = await this.deps.database.readPointer();
    const target =
      options.target !== undefined ? options.target : store.size === 0 ? null : store.head();
    const path = store.resolvePath(current, target);

    if (path.direction === "down") {
      throw new InvalidMigrationTargetError(target, "up", current);
    }

    return this.run("up", path, options);
  }

  /**
   * Move backward to the target (default: the parent of the applied revision)
   *
   * @throws {InvalidMigrationTargetError} If the target is a descendant of the applied revision
   * @throws {IrreversibleMigrationError} If the path reaches an irreversible revision
   * @throws {BackupFailedError} If the pre-migration backup fails; nothing is applied
   * @throws {MigrationStepFailedError} If a step fails; earlier steps stay committed
   */
  async downgrade(options: MigrationOptions = {}): Promise<MigrationResult> {
    const { store } = this.deps;
    this.emit(options, { state: "idle" });
    this.emit(options, { state: "resolving", direction: "down" });

    const current = await this.deps.database.readPointer();
    let target: string | null;
    if (options.target !== undefined) {
      target = options.target;
    } else {
      target = current === null ? null : store.get(current).parentId;
    }
    const path = store.resolvePath(current, target);

    if (path.direction === "up") {
      throw new InvalidMigrationTargetError(target, "down", current);
    }

    return this.run("down", path, options);
  }

  private async run(
    direction: MigrationDirection,
    path: MigrationPath,
    options: MigrationOptions
  ): Promise<MigrationResult> {
    const { backup: takeBackup = true, dryRun = false } = options;
    const planned = path.steps.map((step) => step.id);

    this.logger.info(
      { direction, from: path.from, to: path.to, steps: planned, dryRun },
      "Migration path resolved"
    );

    // A dry run, or a downgrade blocked at its first step, fails before any backup
    const blocked =
      direction === "down"
        ? path.steps.findIndex((step) => step.downgrade.kind === "irreversible")
        : -1;
    const blockedStep = path.steps[blocked];
    if (blockedStep && (dryRun || blocked === 0)) {
      throw this.irreversible(blockedStep, path.from, options, blocked);
    }

    if (path.steps.length === 0 || dryRun) {
      this.emit(options, { state: "done", applied: dryRun ? planned : [] });
      return {
        direction,
        from: path.from,
        to: path.steps.length === 0 ? path.from : path.to,
        applied: dryRun ? planned : [],
        backup: null,
        dryRun,
      };
    }

    let backup: BackupRecord | null = null;
    if (takeBackup) {
      this.emit(options, { state: "backing-up", environment: this.deps.environment.name });
      try {
        backup = await this.deps.backups.backup(this.deps.environment);
      } catch (error) {
        this.emit(options, { state: "failed", index: null, revisionId: null, error });
        throw error;
      }
    } else {
      this.logger.warn("Backup skipped at caller's request");
    }

    let pointer = path.from;
    const applied: string[] = [];
    const total = path.steps.length;

    for (const [index, step] of path.steps.entries()) {
      this.emit(options, { state: "applying", direction, index, total, revisionId: step.id });

      const script = this.scriptFor(direction, step, pointer, options, index);
      const nextPointer = direction === "up" ? step.id : step.parentId;

      try {
        await this.deps.database.withTransaction(async (session) => {
          await session.execute(script);
          await session.writePointer(nextPointer);
        });
      } catch (error) {
        this.emit(options, { state: "failed", index, revisionId: step.id, error });
        this.logger.error(
          {
            revisionId: step.id,
            direction,
            currentRevision: pointer,
            err: error instanceof Error ? sanitizeError(error) : String(error),
          },
          "Migration step failed, rolled back"
        );
        throw new MigrationStepFailedError({
          revisionId: step.id,
          direction,
          cause: error,
          currentRevision: pointer,
          completedSteps: [...applied],
        });
      }

      pointer = nextPointer;
      applied.push(step.id);
      this.emit(options, { state: "committed", direction, index, total, revisionId: step.id });
      this.logger.info({ revisionId: step.id, direction }, "Migration step committed");
    }

    this.emit(options, { state: "done", applied: [...applied] });
    return { direction, from: path.from, to: pointer, applied, backup, dryRun: false };
  }

  /**
   * Script a step executes
   *
   * @throws {IrreversibleMigrationError} For a downgrade of an irreversible revision
   */
  private scriptFor(
    direction: MigrationDirection,
    step: Revision,
    pointer: string | null,
    options: MigrationOptions,
    index: number
  ): string {
    if (direction === "up") {
      return step.upScript;
    }
    if (step.downgrade.kind === "reversible") {
      return step.downgrade.script;
    }

    throw this.irreversible(step, pointer, options, index);
  }

  /**
   * Report an irreversible step as the run's failure
   */
  private irreversible(
    step: Revision,
    pointer: string | null,
    options: MigrationOptions,
    index: number
  ): IrreversibleMigrationError {
    const reason = step.downgrade.kind === "irreversible" ? step.downgrade.reason : "";
    const error = new IrreversibleMigrationError(step.id, reason, pointer);
    this.emit(options, { state: "failed", index, revisionId: step.id, error });
    this.logger.error(
      { revisionId: step.id, reason, currentRevision: pointer },
      "Irreversible revision reached"
    );
    return error;
  }

  private emit(options: MigrationOptions, phase: MigrationPhase): void {
    this.logger.debug({ phase: phase.state }, "Runner phase");
    options.onPhase?.(phase);
  }
}
