/**
 * Tests for CLI Validation Schemas
 */

import { describe, it, expect } from "vitest";
import {
  CleanupCommandOptionsSchema,
  CreateCommandOptionsSchema,
  DownCommandOptionsSchema,
  GlobalOptionsSchema,
  RestoreCommandOptionsSchema,
  UpCommandOptionsSchema,
} from "../../../src/cli/utils/validation.js";

describe("GlobalOptionsSchema", () => {
  it("should default the environment to dev", () => {
    expect(GlobalOptionsSchema.parse({})).toEqual({ env: "dev" });
  });

  it("should normalize the environment name", () => {
    expect(GlobalOptionsSchema.parse({ env: "PROD" })).toEqual({ env: "prod" });
  });

  it("should reject unknown environments", () => {
    const result = GlobalOptionsSchema.safeParse({ env: "qa" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["env"]);
    }
  });
});

describe("UpCommandOptionsSchema", () => {
  it("should take a backup unless --no-backup is given", () => {
    expect(UpCommandOptionsSchema.parse({})).toEqual({ env: "dev", backup: true });
    expect(UpCommandOptionsSchema.parse({ backup: false }).backup).toBe(false);
  });

  it("should keep a trimmed revision id", () => {
    expect(UpCommandOptionsSchema.parse({ revision: " 005_unit " }).revision).toBe("005_unit");
  });

  it("should map base to null", () => {
    expect(DownCommandOptionsSchema.parse({ revision: "base" }).revision).toBeNull();
    expect(DownCommandOptionsSchema.parse({ revision: "BASE" }).revision).toBeNull();
  });

  it("should leave the revision undefined when omitted", () => {
    expect(DownCommandOptionsSchema.parse({ dryRun: true })).toEqual({
      env: "dev",
      backup: true,
      dryRun: true,
    });
  });

  it("should reject a blank revision", () => {
    expect(UpCommandOptionsSchema.safeParse({ revision: "  " }).success).toBe(false);
  });
});

describe("CreateCommandOptionsSchema", () => {
  it("should require a message", () => {
    const result = CreateCommandOptionsSchema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("message is required (-m, --message <text>)");
    }
  });

  it("should trim the message", () => {
    expect(CreateCommandOptionsSchema.parse({ message: "  add shop id  " }).message).toBe(
      "add shop id"
    );
  });

  it("should reject messages over 200 characters", () => {
    expect(CreateCommandOptionsSchema.safeParse({ message: "x".repeat(201) }).success).toBe(false);
    expect(CreateCommandOptionsSchema.safeParse({ message: "x".repeat(200) }).success).toBe(true);
  });
});

describe("RestoreCommandOptionsSchema", () => {
  it("should require a file", () => {
    expect(RestoreCommandOptionsSchema.safeParse({ yes: true }).success).toBe(false);
  });

  it("should accept a file and confirmation flag", () => {
    expect(
      RestoreCommandOptionsSchema.parse({ env: "stage", file: "backup.sql", yes: true })
    ).toEqual({ env: "stage", file: "backup.sql", yes: true });
  });
});

describe("CleanupCommandOptionsSchema", () => {
  it("should default keep to 10", () => {
    expect(CleanupCommandOptionsSchema.parse({}).keep).toBe(10);
  });

  it("should parse keep as an integer", () => {
    expect(CleanupCommandOptionsSchema.parse({ keep: "3" }).keep).toBe(3);
    expect(CleanupCommandOptionsSchema.parse({ keep: "0" }).keep).toBe(0);
  });

  it.each(["-1", "1.5", "three", ""])("should reject keep %j", (keep) => {
    expect(CleanupCommandOptionsSchema.safeParse({ keep }).success).toBe(false);
  });
});
