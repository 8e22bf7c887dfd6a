#!/usr/bin/env node
/**
 * schemactl - CLI Entry Point
 *
 * Schema migration and backup orchestration for PostgreSQL:
 * - up / down: move the database along the revision chain
 * - history / current: inspect the chain and the applied revision
 * - create: scaffold a new revision
 * - backup / list / restore / cleanup: manage dump files
 *
 * Every command takes `-e, --env <environment>` (default: dev).
 */

import "dotenv/config";
import { Command } from "commander";
import { ENVIRONMENT_NAMES } from "../config/index.js";
import { initializeDependencies } from "./utils/dependency-init.js";
import { handleCommandError } from "./utils/error-handler.js";
import { upCommand, downCommand } from "./commands/migrate-command.js";
import { historyCommand } from "./commands/history-command.js";
import { currentCommand } from "./commands/current-command.js";
import { createCommand } from "./commands/create-command.js";
import {
  backupCommand,
  listCommand,
  restoreCommand,
  cleanupCommand,
} from "./commands/backup-commands.js";
import {
  UpCommandOptionsSchema,
  DownCommandOptionsSchema,
  HistoryCommandOptionsSchema,
  CurrentCommandOptionsSchema,
  CreateCommandOptionsSchema,
  BackupCommandOptionsSchema,
  ListCommandOptionsSchema,
  RestoreCommandOptionsSchema,
  CleanupCommandOptionsSchema,
} from "./utils/validation.js";

const program = new Command();

program
  .name("schemactl")
  .description("Schema migration and backup orchestrator for PostgreSQL")
  .version("1.0.0")
  .option(
    "-e, --env <environment>",
    `Target environment (${ENVIRONMENT_NAMES.join(", ")})`,
    "dev"
  );

// Up command
program
  .command("up")
  .description("Upgrade the database to the head revision or a given revision")
  .option("-r, --revision <id>", "Target revision (default: head)")
  .option("--no-backup", "Skip the pre-migration backup")
  .option("--dry-run", "Show the steps without applying them")
  .option("--json", "Output as JSON")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const validatedOptions = UpCommandOptionsSchema.parse(command.optsWithGlobals());
      const deps = await initializeDependencies(validatedOptions.env);
      await upCommand(validatedOptions, deps);
    } catch (error) {
      handleCommandError(error);
    }
  });

// Down command
program
  .command("down")
  .description("Downgrade the database by one revision or to a given revision")
  .option("-r, --revision <id>", "Target revision, or 'base' to revert everything")
  .option("--no-backup", "Skip the pre-migration backup")
  .option("--dry-run", "Show the steps without applying them")
  .option("--json", "Output as JSON")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const validatedOptions = DownCommandOptionsSchema.parse(command.optsWithGlobals());
      const deps = await initializeDependencies(validatedOptions.env);
      await downCommand(validatedOptions, deps);
    } catch (error) {
      handleCommandError(error);
    }
  });

// History command
program
  .command("history")
  .description("Show the revision chain and the applied revision")
  .option("--json", "Output as JSON")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const validatedOptions = HistoryCommandOptionsSchema.parse(command.optsWithGlobals());
      const deps = await initializeDependencies(validatedOptions.env);
      await historyCommand(validatedOptions, deps);
    } catch (error) {
      handleCommandError(error);
    }
  });

// Current command
program
  .command("current")
  .description("Show the applied revision and pending revisions")
  .option("--json", "Output as JSON")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const validatedOptions = CurrentCommandOptionsSchema.parse(command.optsWithGlobals());
      const deps = await initializeDependencies(validatedOptions.env);
      await currentCommand(validatedOptions, deps);
    } catch (error) {
      handleCommandError(error);
    }
  });

// Create command
program
  .command("create")
  .description("Create a new revision on top of the current head")
  .requiredOption("-m, --message <text>", "Revision description")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const validatedOptions = CreateCommandOptionsSchema.parse(command.optsWithGlobals());
      const deps = await initializeDependencies(validatedOptions.env);
      await createCommand(validatedOptions, deps);
    } catch (error) {
      handleCommandError(error);
    }
  });

// Backup command
program
  .command("backup")
  .description("Dump the environment's database to a timestamped file")
  .option("--json", "Output as JSON")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const validatedOptions = BackupCommandOptionsSchema.parse(command.optsWithGlobals());
      const deps = await initializeDependencies(validatedOptions.env);
      await backupCommand(validatedOptions, deps);
    } catch (error) {
      handleCommandError(error);
    }
  });

// List command
program
  .command("list")
  .description("List backups of the environment, newest first")
  .option("--json", "Output as JSON")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const validatedOptions = ListCommandOptionsSchema.parse(command.optsWithGlobals());
      const deps = await initializeDependencies(validatedOptions.env);
      await listCommand(validatedOptions, deps);
    } catch (error) {
      handleCommandError(error);
    }
  });

// Restore command
program
  .command("restore")
  .description("Restore the environment's database from a backup file")
  .requiredOption("-f, --file <path>", "Backup file to restore")
  .option("-y, --yes", "Skip confirmation prompt")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const validatedOptions = RestoreCommandOptionsSchema.parse(command.optsWithGlobals());
      const deps = await initializeDependencies(validatedOptions.env);
      await restoreCommand(validatedOptions, deps);
    } catch (error) {
      handleCommandError(error);
    }
  });

// Cleanup command
program
  .command("cleanup")
  .description("Delete old backups, keeping the newest ones")
  .option("-k, --keep <number>", "Number of backups to keep", "10")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const validatedOptions = CleanupCommandOptionsSchema.parse(command.optsWithGlobals());
      const deps = await initializeDependencies(validatedOptions.env);
      await cleanupCommand(validatedOptions, deps);
    } catch (error) {
      handleCommandError(error);
    }
  });

await program.parseAsync(process.argv);
