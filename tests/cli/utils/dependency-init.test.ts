/**
 * Tests for CLI dependency initialization
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  initializeCliLogger,
  initializeDependencies,
  withMigrationRunner,
} from "../../../src/cli/utils/dependency-init.js";
import { ConfigurationError } from "../../../src/config/index.js";
import { getRootLogger, isLoggerInitialized, resetLogger } from "../../../src/logging/index.js";
import { RevisionStore } from "../../../src/revisions/index.js";
import { InMemoryMigrationDatabase } from "../../helpers/in-memory-database.js";
import { createTestDependencies } from "../../helpers/cli-dependencies.js";
import { makeChain } from "../../helpers/revision-fixtures.js";

describe("dependency-init", () => {
  afterEach(() => {
    resetLogger();
  });

  describe("initializeCliLogger", () => {
    it("should default to warn", () => {
      initializeCliLogger({ LOG_FORMAT: "json" });

      expect(getRootLogger().level).toBe("warn");
    });

    it("should honour LOG_LEVEL", () => {
      initializeCliLogger({ LOG_LEVEL: "silent", LOG_FORMAT: "json" });

      expect(getRootLogger().level).toBe("silent");
    });

    it("should reject an unknown LOG_LEVEL", () => {
      expect(() => initializeCliLogger({ LOG_LEVEL: "verbose" })).toThrow(ConfigurationError);
      expect(isLoggerInitialized()).toBe(false);
    });

    it("should reject an unknown LOG_FORMAT", () => {
      expect(() => initializeCliLogger({ LOG_LEVEL: "silent", LOG_FORMAT: "xml" })).toThrow(
        'Invalid LOG_FORMAT value: "xml". Expected json or pretty.'
      );
    });
  });

  describe("initializeDependencies", () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), "schemactl-deps-"));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it("should load settings and the revision catalog", async () => {
      await writeFile(
        join(directory, "001_init.json"),
        JSON.stringify({ id: "001_init", parent: null, description: "Initial schema" })
      );
      await writeFile(join(directory, "001_init.up.sql"), "CREATE TABLE shop (id SERIAL);\n");
      await writeFile(join(directory, "001_init.down.sql"), "DROP TABLE shop;\n");

      const deps = await initializeDependencies("stage", {
        LOG_LEVEL: "silent",
        LOG_FORMAT: "json",
        MIGRATIONS_DIR: directory,
        BACKUP_DIR: join(directory, "backups"),
      });

      expect(deps.environmentName).toBe("stage");
      expect(deps.settings).toEqual({
        migrationsDir: directory,
        backupDir: join(directory, "backups"),
      });
      expect(deps.store.head()).toBe("001_init");
    });

    it("should resolve connection settings only when asked", async () => {
      const deps = await initializeDependencies("prod", {
        LOG_LEVEL: "silent",
        LOG_FORMAT: "json",
        MIGRATIONS_DIR: join(directory, "missing"),
      });

      expect(deps.store.size).toBe(0);
      expect(() => deps.loadEnvironment()).toThrow(ConfigurationError);
    });
  });

  describe("withMigrationRunner", () => {
    beforeEach(() => {
      initializeCliLogger({ LOG_LEVEL: "silent", LOG_FORMAT: "json" });
    });

    it("should close the database after the callback", async () => {
      const database = new InMemoryMigrationDatabase("001");
      const { deps } = createTestDependencies({
        store: new RevisionStore(makeChain("001")),
        database,
        backupDir: "unused",
      });

      const current = await withMigrationRunner(deps, (runner) => runner.current());

      expect(current).toBe("001");
      expect(database.closed).toBe(true);
    });

    it("should close the database when the callback throws", async () => {
      const database = new InMemoryMigrationDatabase();
      const { deps } = createTestDependencies({ database, backupDir: "unused" });

      await expect(
        withMigrationRunner(deps, async () => {
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");
      expect(database.closed).toBe(true);
    });
  });
});
