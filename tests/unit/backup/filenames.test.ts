/**
 * Unit tests for backup file naming
 */

import { describe, it, expect } from "vitest";
import {
  backupFileName,
  formatBackupTimestamp,
  parseBackupFileName,
} from "../../../src/backup/index.js";

const CREATED = new Date("2026-03-01T04:05:06.007Z");

describe("Backup file names", () => {
  it("should format timestamps in UTC with milliseconds", () => {
    expect(formatBackupTimestamp(CREATED)).toBe("20260301_040506_007");
  });

  it("should build environment_database_timestamp.sql", () => {
    expect(backupFileName("dev", "receipts_dev", CREATED)).toBe(
      "dev_receipts_dev_20260301_040506_007.sql"
    );
  });

  it("should parse a name with underscores in the database", () => {
    expect(parseBackupFileName("dev_receipts_dev_20260301_040506_007.sql")).toEqual({
      environment: "dev",
      database: "receipts_dev",
      createdAt: CREATED,
    });
  });

  it("should reject names that are not backups", () => {
    expect(parseBackupFileName("notes.txt")).toBeNull();
    expect(parseBackupFileName("qa_app_20260301_040506_007.sql")).toBeNull();
    expect(parseBackupFileName("dev_app_20260301_040506.sql")).toBeNull();
  });

  it("should reject impossible dates", () => {
    expect(parseBackupFileName("dev_app_20261301_040506_007.sql")).toBeNull();
    expect(parseBackupFileName("dev_app_20260230_040506_007.sql")).toBeNull();
  });
});
