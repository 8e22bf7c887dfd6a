/**
 * Tests for the history and current commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { currentCommand } from "../../../src/cli/commands/current-command.js";
import { historyCommand } from "../../../src/cli/commands/history-command.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { DisconnectedHistoryError, RevisionStore } from "../../../src/revisions/index.js";
import { InMemoryMigrationDatabase } from "../../helpers/in-memory-database.js";
import { createTestDependencies } from "../../helpers/cli-dependencies.js";
import { makeChain, makeRevision } from "../../helpers/revision-fixtures.js";

function spyOnConsoleLog() {
  return vi.spyOn(console, "log").mockImplementation(() => {});
}

describe("inspection commands", () => {
  let consoleLogSpy: ReturnType<typeof spyOnConsoleLog>;

  beforeEach(() => {
    initializeLogger({ level: "silent", format: "json" });
    consoleLogSpy = spyOnConsoleLog();
  });

  afterEach(() => {
    resetLogger();
  });

  function jsonOutput(): unknown {
    const [call] = consoleLogSpy.mock.calls;
    return JSON.parse(String(call?.[0]));
  }

  describe("historyCommand", () => {
    it("should list the chain with the applied revision marked", async () => {
      const database = new InMemoryMigrationDatabase("001");
      const { deps } = createTestDependencies({
        store: new RevisionStore(makeChain("001", "002")),
        database,
        backupDir: "unused",
      });

      await historyCommand({ env: "dev", json: true }, deps);

      expect(jsonOutput()).toEqual({
        environment: "dev",
        current: "001",
        revisions: [
          {
            id: "001",
            parent: null,
            description: "Revision 001",
            createdAt: null,
            reversible: true,
            state: "current",
          },
          {
            id: "002",
            parent: "001",
            description: "Revision 002",
            createdAt: null,
            reversible: true,
            state: "pending",
          },
        ],
      });
      expect(database.commits).toBe(0);
      expect(database.closed).toBe(true);
    });

    it("should report a branched chain before connecting", async () => {
      const database = new InMemoryMigrationDatabase();
      const { deps } = createTestDependencies({
        store: new RevisionStore([
          makeRevision("001", null),
          makeRevision("002a", "001"),
          makeRevision("002b", "001"),
        ]),
        database,
        backupDir: "unused",
      });

      await expect(historyCommand({ env: "dev", json: true }, deps)).rejects.toThrow(
        DisconnectedHistoryError
      );
      expect(database.readPointerCalls).toBe(0);
    });
  });

  describe("currentCommand", () => {
    it("should report status without writing", async () => {
      const database = new InMemoryMigrationDatabase("001");
      const { deps, dumpTool } = createTestDependencies({
        store: new RevisionStore(makeChain("001", "002", "003")),
        database,
        backupDir: "unused",
        environmentName: "stage",
      });

      await currentCommand({ env: "stage", json: true }, deps);

      expect(jsonOutput()).toEqual({
        environment: "stage",
        current: "001",
        head: "003",
        pending: ["002", "003"],
        atHead: false,
      });
      expect(database.commits).toBe(0);
      expect(dumpTool.dumps).toEqual([]);
    });
  });
});
