/**
 * Current Command - Show the applied revision
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";
import { withMigrationRunner } from "../utils/dependency-init.js";
import type { ValidatedCurrentOptions } from "../utils/validation.js";
import { formatStatus } from "../output/formatters.js";

/**
 * Execute current command
 *
 * Reads the pointer only; never takes a backup or writes to the database.
 */
export async function currentCommand(
  options: ValidatedCurrentOptions,
  deps: CliDependencies
): Promise<void> {
  const status = await withMigrationRunner(deps, (runner) => runner.status());

  if (options.json) {
    console.log(JSON.stringify({ environment: deps.environmentName, ...status }, null, 2));
    return;
  }

  console.log(chalk.bold(`\nSchema Status (${deps.environmentName})\n`));
  console.log(formatStatus(status));
}
