/**
 * Centralized Error Handler for CLI Commands
 *
 * Maps errors to user-friendly messages with actionable next steps and
 * exits with the status code of the error's category.
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { Ora } from "ora";
import { ZodError } from "zod";
import { ConfigurationError } from "../../config/index.js";
import {
  BackupFailedError,
  BackupNotFoundError,
  InvalidArgumentError,
  RestoreFailedError,
} from "../../backup/index.js";
import {
  InvalidMigrationTargetError,
  IrreversibleMigrationError,
  MigrationStepFailedError,
} from "../../migration/index.js";
import {
  BASE_REVISION,
  DisconnectedHistoryError,
  EmptyHistoryError,
  InvalidRevisionError,
  RevisionError,
  UnknownRevisionError,
} from "../../revisions/index.js";

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  INVALID_ARGUMENTS: 2,
  BACKUP_FAILED: 3,
  STEP_FAILED: 4,
  IRREVERSIBLE: 5,
  REVISION_HISTORY: 6,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

function label(id: string | null): string {
  return id ?? BASE_REVISION;
}

function nextSteps(...steps: string[]): void {
  console.error("\n" + chalk.bold("Next steps:"));
  for (const step of steps) {
    console.error("  • " + step);
  }
}

function isVerbose(): boolean {
  const level = process.env["LOG_LEVEL"];
  return level === "debug" || level === "trace";
}

/**
 * Exit code for an error, by category
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (
    error instanceof ZodError ||
    error instanceof ConfigurationError ||
    error instanceof InvalidArgumentError ||
    error instanceof InvalidMigrationTargetError
  ) {
    return EXIT_CODES.INVALID_ARGUMENTS;
  }
  if (
    error instanceof BackupFailedError ||
    error instanceof BackupNotFoundError ||
    error instanceof RestoreFailedError
  ) {
    return EXIT_CODES.BACKUP_FAILED;
  }
  if (error instanceof MigrationStepFailedError) {
    return EXIT_CODES.STEP_FAILED;
  }
  if (error instanceof IrreversibleMigrationError) {
    return EXIT_CODES.IRREVERSIBLE;
  }
  if (error instanceof RevisionError) {
    return EXIT_CODES.REVISION_HISTORY;
  }
  return EXIT_CODES.UNEXPECTED;
}

/**
 * Handle command errors and exit with the category's status code
 *
 * Stops any active spinner, prints a formatted message to stderr and exits.
 *
 * @param error - The error to handle
 * @param spinner - Optional spinner to stop before showing error
 */
export function handleCommandError(error: unknown, spinner?: Ora): never {
  if (spinner && spinner.isSpinning) {
    spinner.stop();
  }

  const code = exitCodeFor(error);
  console.error();

  if (error instanceof ZodError) {
    console.error(chalk.red("✗ Invalid Arguments"));
    for (const issue of error.issues) {
      const field = issue.path.join(".");
      console.error(`  • ${field ? `${field}: ` : ""}${issue.message}`);
    }
    nextSteps("Show usage: " + chalk.gray("schemactl <command> --help"));
    process.exit(code);
  }

  if (error instanceof ConfigurationError) {
    console.error(chalk.red("✗ Configuration Error"));
    console.error(`\n${error.message}`);
    nextSteps(
      "Copy " + chalk.cyan(".env.example") + " to " + chalk.cyan(".env") + " and fill it in",
      "Check the selected environment: " + chalk.gray("schemactl <command> --env <environment>")
    );
    process.exit(code);
  }

  if (error instanceof InvalidArgumentError) {
    console.error(chalk.red("✗ Invalid Argument"));
    console.error(`\n${error.message}`);
    process.exit(code);
  }

  if (error instanceof InvalidMigrationTargetError) {
    console.error(chalk.red("✗ Invalid Migration Target"));
    console.error(`\n${error.message}`);
    nextSteps(
      error.direction === "up"
        ? "Move backward instead: " + chalk.gray(`schemactl down --revision ${label(error.target)}`)
        : "Move forward instead: " + chalk.gray(`schemactl up --revision ${label(error.target)}`),
      "Show the revision chain: " + chalk.gray("schemactl history")
    );
    process.exit(code);
  }

  if (error instanceof BackupFailedError) {
    console.error(chalk.red("✗ Backup Failed"));
    console.error(`\n${error.message}`);
    if (error.stderr.trim()) {
      console.error("\n" + chalk.gray(error.stderr.trim()));
    }
    console.error("\nNo migration step was run.");
    nextSteps(
      "Check that pg_dump is installed and on PATH",
      "Verify the connection settings for " + chalk.cyan(error.environment),
      "Skip the backup at your own risk: " + chalk.gray("--no-backup")
    );
    process.exit(code);
  }

  if (error instanceof BackupNotFoundError) {
    console.error(chalk.red("✗ Backup Not Found"));
    console.error(`\n${error.message}`);
    nextSteps("List available backups: " + chalk.gray("schemactl list --env <environment>"));
    process.exit(code);
  }

  if (error instanceof RestoreFailedError) {
    console.error(chalk.red("✗ Restore Failed"));
    console.error(`\n${error.message}`);
    if (error.stderr.trim()) {
      console.error("\n" + chalk.gray(error.stderr.trim()));
    }
    nextSteps("Check that psql is installed and on PATH", "Review the psql output above");
    process.exit(code);
  }

  if (error instanceof MigrationStepFailedError) {
    console.error(chalk.red("✗ Migration Step Failed"));
    console.error(`\n${error.message}`);
    console.error(`\n  Failed revision:       ${chalk.yellow(error.revisionId)}`);
    console.error(`  Last applied revision: ${chalk.cyan(label(error.currentRevision))}`);
    if (error.completedSteps.length > 0) {
      console.error(`  Completed this run:    ${error.completedSteps.join(", ")}`);
    }
    console.error("\nThe failing step was rolled back. Earlier steps remain applied.");
    nextSteps(
      "Fix the revision script and rerun " + chalk.gray(`schemactl ${error.direction}`),
      "Or restore the pre-migration backup: " + chalk.gray("schemactl restore --file <path>")
    );
    process.exit(code);
  }

  if (error instanceof IrreversibleMigrationError) {
    console.error(chalk.red("✗ Irreversible Migration"));
    console.error(`\n${error.message}`);
    console.error(`\n  Last applied revision: ${chalk.cyan(label(error.currentRevision))}`);
    nextSteps(
      "Restore a backup taken before " + chalk.yellow(error.revisionId) + ": " +
        chalk.gray("schemactl list")
    );
    process.exit(code);
  }

  if (error instanceof UnknownRevisionError) {
    console.error(chalk.red("✗ Unknown Revision"));
    console.error(`\n${error.message}`);
    nextSteps("Show known revisions: " + chalk.gray("schemactl history"));
    process.exit(code);
  }

  if (error instanceof EmptyHistoryError) {
    console.error(chalk.red("✗ No Revisions"));
    console.error(`\n${error.message}`);
    nextSteps("Create the first revision: " + chalk.gray('schemactl create -m "initial schema"'));
    process.exit(code);
  }

  if (error instanceof DisconnectedHistoryError || error instanceof InvalidRevisionError) {
    console.error(chalk.red("✗ Revision History Error"));
    console.error(`\n${error.message}`);
    nextSteps(
      "Check the parent field of each revision manifest in MIGRATIONS_DIR",
      "Every revision except the first must name exactly one existing parent"
    );
    process.exit(code);
  }

  if (error instanceof RevisionError) {
    console.error(chalk.red("✗ Revision History Error"));
    console.error(`\n${error.message}`);
    process.exit(code);
  }

  if (error instanceof Error) {
    console.error(chalk.red("✗ Error"));
    console.error(`\n${error.message}`);

    if (isVerbose()) {
      console.error("\n" + chalk.gray(error.stack || "No stack trace available"));
    }

    nextSteps(
      "Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug schemactl <command>"),
      "Check configuration in .env file"
    );
    process.exit(code);
  }

  console.error(chalk.red("✗ Unknown Error"));
  console.error(`\n${String(error)}`);
  nextSteps("Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug schemactl <command>"));
  process.exit(code);
}
