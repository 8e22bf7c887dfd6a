/**
 * Tests for CLI Output Formatters
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import chalk from "chalk";
import {
  buildHistoryEntries,
  createBackupTable,
  createHistoryTable,
  formatBytes,
  formatDate,
  formatMigrationSummary,
  formatStatus,
  revisionLabel,
} from "../../../src/cli/output/formatters.js";
import type { BackupRecord } from "../../../src/backup/index.js";
import { makeChain, makeRevision } from "../../helpers/revision-fixtures.js";

describe("Formatters", () => {
  let originalLevel: typeof chalk.level;

  beforeEach(() => {
    originalLevel = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = originalLevel;
  });

  describe("formatDate", () => {
    it("should format in UTC without milliseconds", () => {
      expect(formatDate(new Date("2026-03-01T04:05:06.007Z"))).toBe("2026-03-01 04:05:06");
    });
  });

  describe("formatBytes", () => {
    it.each([
      [0, "0 B"],
      [512, "512 B"],
      [1536, "1.5 KB"],
      [2048, "2.0 KB"],
      [5242880, "5.0 MB"],
      [3 * 1024 * 1024 * 1024, "3.0 GB"],
    ])("should format %i bytes as %s", (bytes, expected) => {
      expect(formatBytes(bytes)).toBe(expected);
    });
  });

  describe("revisionLabel", () => {
    it("should show base for null", () => {
      expect(revisionLabel(null)).toBe("base");
      expect(revisionLabel("005_unit")).toBe("005_unit");
    });
  });

  describe("buildHistoryEntries", () => {
    it("should mark revisions relative to the applied one", () => {
      const revisions = [
        makeRevision("001_a", null),
        makeRevision("002_b", "001_a", { irreversible: "enum" }),
        makeRevision("003_c", "002_b"),
      ];

      expect(buildHistoryEntries(revisions, "002_b")).toEqual([
        {
          id: "001_a",
          parent: null,
          description: "Revision 001_a",
          createdAt: null,
          reversible: true,
          state: "applied",
        },
        {
          id: "002_b",
          parent: "001_a",
          description: "Revision 002_b",
          createdAt: null,
          reversible: false,
          state: "current",
        },
        {
          id: "003_c",
          parent: "002_b",
          description: "Revision 003_c",
          createdAt: null,
          reversible: true,
          state: "pending",
        },
      ]);
    });

    it("should mark everything pending at base", () => {
      const states = buildHistoryEntries(makeChain("001", "002"), null).map((e) => e.state);
      expect(states).toEqual(["pending", "pending"]);
    });
  });

  describe("createHistoryTable", () => {
    it("should point to create when there are no revisions", () => {
      expect(createHistoryTable([])).toBe(
        "No revisions found.\n\nCreate one with: schemactl create -m <message>"
      );
    });

    it("should list each revision with its parent and state", () => {
      const output = createHistoryTable(buildHistoryEntries(makeChain("001_a", "002_b"), "001_a"));

      expect(output).toContain("001_a");
      expect(output).toContain("base");
      expect(output).toContain("● current");
      expect(output).toContain("○ pending");
    });
  });

  describe("createBackupTable", () => {
    it("should point to backup when there are none", () => {
      expect(createBackupTable([])).toBe("No backups found.\n\nCreate one with: schemactl backup");
    });

    it("should show date, path and size", () => {
      const record: BackupRecord = {
        path: "db_backups/dev_app_20260301_040506_007.sql",
        environment: "dev",
        database: "app",
        createdAt: new Date("2026-03-01T04:05:06.007Z"),
        sizeBytes: 2048,
      };

      const output = createBackupTable([record]);

      expect(output).toContain("2026-03-01 04:05:06");
      expect(output).toContain("db_backups/dev_app_20260301_040506_007.sql");
      expect(output).toContain("2.0 KB");
    });
  });

  describe("formatMigrationSummary", () => {
    it("should report when nothing was applied", () => {
      expect(
        formatMigrationSummary({
          direction: "up",
          from: "003",
          to: "003",
          applied: [],
          backup: null,
          dryRun: false,
        })
      ).toBe("Already at 003, nothing to do.");
    });

    it("should list applied revisions and the backup", () => {
      expect(
        formatMigrationSummary({
          direction: "up",
          from: null,
          to: "002",
          applied: ["001", "002"],
          backup: {
            path: "db_backups/dev_app_20260301_040506_007.sql",
            environment: "dev",
            database: "app",
            createdAt: new Date("2026-03-01T04:05:06.007Z"),
            sizeBytes: 8,
          },
          dryRun: false,
        })
      ).toBe(
        "Upgraded base → 002\n  • 001\n  • 002\n\nBackup: db_backups/dev_app_20260301_040506_007.sql"
      );
    });

    it("should describe a dry run", () => {
      expect(
        formatMigrationSummary({
          direction: "down",
          from: "003",
          to: "001",
          applied: ["003", "002"],
          backup: null,
          dryRun: true,
        })
      ).toBe("Dry run: would downgrade 003 → 001\n  • 003\n  • 002");
    });
  });

  describe("formatStatus", () => {
    it("should list pending revisions", () => {
      expect(
        formatStatus({ current: "001", head: "003", pending: ["002", "003"], atHead: false })
      ).toBe(
        "  Current revision: 001\n" +
          "  Head revision:    003\n" +
          "  Pending:          2\n" +
          "  Pending revisions: 002, 003"
      );
    });

    it("should confirm a database at head", () => {
      expect(formatStatus({ current: "003", head: "003", pending: [], atHead: true })).toBe(
        "  Current revision: 003\n" +
          "  Head revision:    003\n" +
          "  Pending:          0\n" +
          "\n✓ Database is at head"
      );
    });
  });
});
