/**
 * Output Formatters for CLI
 *
 * Functions for formatting output as tables or JSON.
 */

import Table from "cli-table3";
import chalk from "chalk";
import type { BackupRecord } from "../../backup/index.js";
import type { MigrationResult, MigrationStatus } from "../../migration/index.js";
import { BASE_REVISION, type Revision } from "../../revisions/index.js";

/**
 * Where a revision stands relative to the applied pointer
 */
export type RevisionState = "applied" | "current" | "pending";

/**
 * One row of `history --json`
 */
export interface HistoryEntry {
  id: string;
  parent: string | null;
  description: string;
  createdAt: string | null;
  reversible: boolean;
  state: RevisionState;
}

/**
 * Truncate a string to a maximum length, adding ellipsis if truncated
 */
function truncate(str: string, maxLength: number): string {
  if (maxLength < 4) return str.substring(0, maxLength);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength - 3) + "...";
}

/**
 * Format a date for display (YYYY-MM-DD HH:mm:ss, UTC)
 */
export function formatDate(date: Date): string {
  return date.toISOString().replace("T", " ").substring(0, 19);
}

/**
 * Format a byte count
 *
 * @example
 * formatBytes(512) // "512 B"
 * formatBytes(2048) // "2.0 KB"
 * formatBytes(5242880) // "5.0 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}

/**
 * Revision label for display, "base" for null
 */
export function revisionLabel(id: string | null): string {
  return id ?? BASE_REVISION;
}

/**
 * Annotate revisions (root to head) with their state relative to `current`
 */
export function buildHistoryEntries(revisions: Revision[], current: string | null): HistoryEntry[] {
  const currentIndex = current === null ? -1 : revisions.findIndex((r) => r.id === current);

  return revisions.map((revision, index) => {
    let state: RevisionState = "pending";
    if (index === currentIndex) {
      state = "current";
    } else if (index < currentIndex) {
      state = "applied";
    }

    return {
      id: revision.id,
      parent: revision.parentId,
      description: revision.description,
      createdAt: revision.createdAt ?? null,
      reversible: revision.downgrade.kind === "reversible",
      state,
    };
  });
}

function stateIndicator(state: RevisionState): string {
  switch (state) {
    case "current":
      return chalk.green("● current");
    case "applied":
      return chalk.gray("✓ applied");
    case "pending":
      return chalk.yellow("○ pending");
  }
}

/**
 * Create a table of the revision chain
 */
export function createHistoryTable(entries: HistoryEntry[]): string {
  if (entries.length === 0) {
    return chalk.yellow("No revisions found.") + "\n\nCreate one with: schemactl create -m <message>";
  }

  const table = new Table({
    head: [
      chalk.cyan("Revision"),
      chalk.cyan("Parent"),
      chalk.cyan("Description"),
      chalk.cyan("Down"),
      chalk.cyan("State"),
    ],
    colAligns: ["left", "left", "left", "center", "left"],
    style: {
      head: [],
      border: ["gray"],
    },
  });

  for (const entry of entries) {
    table.push([
      entry.id,
      revisionLabel(entry.parent),
      truncate(entry.description, 50),
      entry.reversible ? "yes" : chalk.red("no"),
      stateIndicator(entry.state),
    ]);
  }

  return table.toString();
}

/**
 * Create a table of backups (newest first)
 */
export function createBackupTable(records: BackupRecord[]): string {
  if (records.length === 0) {
    return chalk.yellow("No backups found.") + "\n\nCreate one with: schemactl backup";
  }

  const table = new Table({
    head: [chalk.cyan("Created (UTC)"), chalk.cyan("File"), chalk.cyan("Size")],
    colAligns: ["left", "left", "right"],
    style: {
      head: [],
      border: ["gray"],
    },
  });

  for (const record of records) {
    table.push([formatDate(record.createdAt), record.path, formatBytes(record.sizeBytes)]);
  }

  return table.toString();
}

/**
 * Summary lines for a finished migration run
 */
export function formatMigrationSummary(result: MigrationResult): string {
  const verb = result.direction === "up" ? "Upgraded" : "Downgraded";
  const lines: string[] = [];

  if (result.applied.length === 0) {
    lines.push(`Already at ${revisionLabel(result.to)}, nothing to do.`);
    return lines.join("\n");
  }

  if (result.dryRun) {
    lines.push(
      chalk.bold(`Dry run: would ${result.direction === "up" ? "upgrade" : "downgrade"} `) +
        `${revisionLabel(result.from)} → ${revisionLabel(result.to)}`
    );
  } else {
    lines.push(`${verb} ${revisionLabel(result.from)} → ${revisionLabel(result.to)}`);
  }

  for (const id of result.applied) {
    lines.push(`  • ${id}`);
  }

  if (result.backup) {
    lines.push(`\nBackup: ${chalk.cyan(result.backup.path)}`);
  }

  return lines.join("\n");
}

/**
 * Status lines for `current`
 */
export function formatStatus(status: MigrationStatus): string {
  const lines = [
    `  Current revision: ${chalk.cyan(revisionLabel(status.current))}`,
    `  Head revision:    ${chalk.cyan(revisionLabel(status.head))}`,
    `  Pending:          ${chalk.yellow(status.pending.length.toString())}`,
  ];

  if (status.pending.length > 0) {
    lines.push(`  Pending revisions: ${status.pending.join(", ")}`);
  }
  if (status.atHead) {
    lines.push("\n" + chalk.green("✓ Database is at head"));
  }

  return lines.join("\n");
}
