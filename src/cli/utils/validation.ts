/**
 * Runtime validation schemas for CLI command options
 *
 * Uses Zod for type-safe runtime validation of Commander.js options. Every
 * schema includes the global `--env` option, read through
 * `command.optsWithGlobals()`.
 */

import { z } from "zod";
import { EnvironmentNameSchema } from "../../config/index.js";
import { BASE_REVISION } from "../../revisions/index.js";
import { DEFAULT_KEEP } from "../../backup/index.js";

/**
 * Options shared by every command
 */
export const GlobalOptionsSchema = z.object({
  env: EnvironmentNameSchema.default("dev"),
});

/**
 * Revision argument: an id, or "base" for the empty database
 */
const RevisionTargetSchema = z
  .string()
  .trim()
  .min(1, "revision must not be empty")
  .transform((value) => (value.toLowerCase() === BASE_REVISION ? null : value));

const MigrateOptionsShape = {
  revision: RevisionTargetSchema.optional(),
  // Commander sets backup=false for --no-backup
  backup: z.boolean().default(true),
  dryRun: z.boolean().optional(),
  json: z.boolean().optional(),
};

/**
 * Schema for up command options
 */
export const UpCommandOptionsSchema = GlobalOptionsSchema.extend(MigrateOptionsShape);

/**
 * Schema for down command options
 */
export const DownCommandOptionsSchema = GlobalOptionsSchema.extend(MigrateOptionsShape);

/**
 * Schema for history command options
 */
export const HistoryCommandOptionsSchema = GlobalOptionsSchema.extend({
  json: z.boolean().optional(),
});

/**
 * Schema for current command options
 */
export const CurrentCommandOptionsSchema = GlobalOptionsSchema.extend({
  json: z.boolean().optional(),
});

/**
 * Schema for create command options
 */
export const CreateCommandOptionsSchema = GlobalOptionsSchema.extend({
  message: z
    .string({ required_error: "message is required (-m, --message <text>)" })
    .trim()
    .min(1, "message must not be empty")
    .max(200, "message must be 200 characters or less"),
});

/**
 * Schema for backup command options
 */
export const BackupCommandOptionsSchema = GlobalOptionsSchema.extend({
  json: z.boolean().optional(),
});

/**
 * Schema for list command options
 */
export const ListCommandOptionsSchema = GlobalOptionsSchema.extend({
  json: z.boolean().optional(),
});

/**
 * Schema for restore command options
 */
export const RestoreCommandOptionsSchema = GlobalOptionsSchema.extend({
  file: z.string({ required_error: "file is required (--file <path>)" }).trim().min(1),
  yes: z.boolean().optional(),
});

/**
 * Schema for cleanup command options
 */
export const CleanupCommandOptionsSchema = GlobalOptionsSchema.extend({
  keep: z
    .string()
    .regex(/^\d+$/, "keep must be a non-negative integer")
    .optional()
    .transform((val) => (val === undefined ? DEFAULT_KEEP : parseInt(val, 10))),
});

/**
 * Inferred TypeScript types from schemas
 */
export type ValidatedGlobalOptions = z.infer<typeof GlobalOptionsSchema>;
export type ValidatedUpOptions = z.infer<typeof UpCommandOptionsSchema>;
export type ValidatedDownOptions = z.infer<typeof DownCommandOptionsSchema>;
export type ValidatedHistoryOptions = z.infer<typeof HistoryCommandOptionsSchema>;
export type ValidatedCurrentOptions = z.infer<typeof CurrentCommandOptionsSchema>;
export type ValidatedCreateOptions = z.infer<typeof CreateCommandOptionsSchema>;
export type ValidatedBackupOptions = z.infer<typeof BackupCommandOptionsSchema>;
export type ValidatedListOptions = z.infer<typeof ListCommandOptionsSchema>;
export type ValidatedRestoreOptions = z.infer<typeof RestoreCommandOptionsSchema>;
export type ValidatedCleanupOptions = z.infer<typeof CleanupCommandOptionsSchema>;
