/**
 * Backup Commands - backup, list, restore, cleanup
 *
 * @example
 * ```bash
 * schemactl backup --env stage
 * schemactl list --env stage
 * schemactl restore --env stage --file db_backups/stage_app_20241005_101500_000.sql
 * schemactl cleanup --env stage --keep 5
 * ```
 */

/* eslint-disable no-console */

import chalk from "chalk";
import ora from "ora";
import type { CliDependencies } from "../utils/dependency-init.js";
import { confirm } from "../utils/prompts.js";
import type {
  ValidatedBackupOptions,
  ValidatedCleanupOptions,
  ValidatedListOptions,
  ValidatedRestoreOptions,
} from "../utils/validation.js";
import { createBackupTable, formatBytes } from "../output/formatters.js";

/**
 * Execute backup command
 */
export async function backupCommand(
  options: ValidatedBackupOptions,
  deps: CliDependencies
): Promise<void> {
  const environment = deps.loadEnvironment();
  const spinner = ora({
    text: `Backing up ${chalk.cyan(environment.name)}...`,
    color: "cyan",
    isEnabled: !options.json,
    isSilent: options.json === true,
  }).start();

  try {
    const record = await deps.backups.backup(environment);
    spinner.succeed(chalk.green("Backup created"));

    if (options.json) {
      console.log(JSON.stringify(record, null, 2));
      return;
    }
    console.log(`  File: ${chalk.cyan(record.path)}`);
    console.log(`  Size: ${formatBytes(record.sizeBytes)}`);
  } catch (error) {
    spinner.stop();
    throw error;
  }
}

/**
 * Execute list command
 */
export async function listCommand(
  options: ValidatedListOptions,
  deps: CliDependencies
): Promise<void> {
  const environment = deps.loadEnvironment();
  const records = await deps.backups.list(environment);

  if (options.json) {
    console.log(JSON.stringify(records, null, 2));
    return;
  }

  console.log(createBackupTable(records));
}

/**
 * Execute restore command
 *
 * Asks for confirmation unless --yes is given.
 *
 * @param prompt - Confirmation prompt (replaced in tests)
 */
export async function restoreCommand(
  options: ValidatedRestoreOptions,
  deps: CliDependencies,
  prompt: (message: string) => Promise<boolean> = confirm
): Promise<void> {
  const environment = deps.loadEnvironment();
  const backup = await deps.backups.resolveBackup(environment, options.file);

  if (!options.yes) {
    console.log(
      chalk.yellow(
        `\nRestore ${chalk.cyan(environment.name)} (${environment.connection.database}) ` +
          `from ${backup.path}?`
      )
    );
    console.log("Objects in the dump are dropped and recreated. No backup is taken first.\n");

    const confirmed = await prompt("Continue? [y/N]");
    if (!confirmed) {
      console.log("Restore cancelled.");
      return;
    }
  }

  const spinner = ora({ text: `Restoring ${backup.path}...`, color: "yellow" }).start();
  try {
    const record = await deps.backups.restore(environment, backup.path);
    spinner.succeed(chalk.green(`Restored ${environment.name} from ${record.path}`));
  } catch (error) {
    spinner.stop();
    throw error;
  }
}

/**
 * Execute cleanup command
 */
export async function cleanupCommand(
  options: ValidatedCleanupOptions,
  deps: CliDependencies
): Promise<void> {
  const environment = deps.loadEnvironment();
  const { kept, removed } = await deps.backups.cleanup(environment, options.keep);

  console.log(
    `Kept ${chalk.cyan(kept.length.toString())} backup(s), ` +
      `removed ${chalk.cyan(removed.length.toString())}.`
  );
  for (const record of removed) {
    console.log(chalk.gray(`  - ${record.path}`));
  }
}
