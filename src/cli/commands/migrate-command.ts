/**
 * Migrate Commands - Move the database up or down the revision chain
 *
 * @example
 * ```bash
 * # Upgrade dev to head (backup first)
 * schemactl up
 *
 * # Preview a downgrade of stage to revision 005
 * schemactl down --env stage --revision 005_purchased_item_unit --dry-run
 *
 * # Revert everything, no backup
 * schemactl down --revision base --no-backup
 * ```
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type {
  MigrationDirection,
  MigrationOptions,
  MigrationPhase,
  MigrationResult,
} from "../../migration/index.js";
import type { CliDependencies } from "../utils/dependency-init.js";
import { withMigrationRunner } from "../utils/dependency-init.js";
import type { ValidatedDownOptions, ValidatedUpOptions } from "../utils/validation.js";
import { createMigrationSpinner, updateMigrationSpinner } from "../output/progress.js";
import { formatMigrationSummary } from "../output/formatters.js";

/**
 * Execute up command
 */
export async function upCommand(options: ValidatedUpOptions, deps: CliDependencies): Promise<void> {
  await migrateCommand("up", options, deps);
}

/**
 * Execute down command
 */
export async function downCommand(
  options: ValidatedDownOptions,
  deps: CliDependencies
): Promise<void> {
  await migrateCommand("down", options, deps);
}

async function migrateCommand(
  direction: MigrationDirection,
  options: ValidatedUpOptions | ValidatedDownOptions,
  deps: CliDependencies
): Promise<void> {
  const { json = false, dryRun = false, backup } = options;
  const spinner = createMigrationSpinner(deps.environmentName, !json);

  let result: MigrationResult;
  try {
    result = await withMigrationRunner(deps, (runner) => {
      const migrationOptions: MigrationOptions = {
        target: options.revision,
        backup,
        dryRun,
        onPhase: (phase: MigrationPhase) => updateMigrationSpinner(spinner, phase),
      };
      return direction === "up"
        ? runner.upgrade(migrationOptions)
        : runner.downgrade(migrationOptions);
    });
  } catch (error) {
    spinner.stop();
    throw error;
  }

  if (json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.applied.length === 0) {
    spinner.info("Nothing to do");
  } else if (result.dryRun) {
    spinner.info("Dry run, no changes made");
  } else {
    spinner.succeed(chalk.green(`${direction === "up" ? "Upgrade" : "Downgrade"} complete`));
  }
  console.log(formatMigrationSummary(result));

  if (!backup && !result.dryRun && result.applied.length > 0) {
    console.log(chalk.yellow("\n⚠ No backup was taken for this run (--no-backup)."));
  }
}
