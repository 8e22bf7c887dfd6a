/**
 * Create Command - Scaffold a new revision
 *
 * @example
 * ```bash
 * schemactl create -m "add unit to purchased_item"
 * ```
 */

/* eslint-disable no-console */

import chalk from "chalk";
import { createRevision } from "../../revisions/index.js";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { ValidatedCreateOptions } from "../utils/validation.js";
import { revisionLabel } from "../output/formatters.js";

/**
 * Execute create command
 *
 * Needs no database connection.
 */
export async function createCommand(
  options: ValidatedCreateOptions,
  deps: CliDependencies
): Promise<void> {
  const created = await createRevision({
    directory: deps.settings.migrationsDir,
    message: options.message,
    store: deps.store,
  });

  console.log(chalk.green(`✓ Created revision ${chalk.cyan(created.id)}`));
  console.log(`  Parent: ${revisionLabel(created.parentId)}`);
  console.log(`  ${created.files.manifest}`);
  console.log(`  ${created.files.up}`);
  console.log(`  ${created.files.down}`);
  console.log("\n" + chalk.bold("Next steps:"));
  console.log("  • Write the upgrade SQL in " + chalk.cyan(created.files.up));
  console.log(
    "  • Write the downgrade SQL, or delete the file and set " +
      chalk.cyan('"irreversible": { "reason": "..." }') +
      " in the manifest"
  );
}
