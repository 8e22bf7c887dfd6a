/**
 * Unit tests for PostgresMigrationDatabase
 *
 * A scripted pool stands in for `pg`; it records every query and answers
 * from a per-test handler.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import {
  PostgresMigrationDatabase,
  type PgClient,
  type PgPool,
} from "../../../src/database/index.js";

type QueryHandler = (text: string, values?: unknown[]) => unknown[];

class ScriptedPool implements PgPool {
  readonly queries: Array<{ text: string; values?: unknown[] }> = [];
  connects = 0;
  releases = 0;
  ended = false;

  constructor(private readonly handler: QueryHandler = () => []) {}

  async connect(): Promise<PgClient> {
    this.connects++;
    return {
      query: async (text, values) => {
        this.queries.push(values === undefined ? { text } : { text, values });
        return { rows: this.handler(text, values) };
      },
      release: () => {
        this.releases++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  texts(): string[] {
    return this.queries.map((query) => query.text.trim().split(/\s+/).slice(0, 2).join(" "));
  }
}

describe("PostgresMigrationDatabase", () => {
  beforeEach(() => {
    initializeLogger({ level: "silent", format: "json" });
  });

  afterEach(() => {
    resetLogger();
  });

  describe("readPointer", () => {
    it("should return null when the pointer table does not exist", async () => {
      const pool = new ScriptedPool(() => [{ present: false }]);
      const database = new PostgresMigrationDatabase(pool);

      expect(await database.readPointer()).toBeNull();
      expect(pool.queries).toHaveLength(1);
      expect(pool.queries[0]?.values).toEqual(["schema_revision"]);
      expect(pool.releases).toBe(1);
    });

    it("should return the stored revision", async () => {
      const pool = new ScriptedPool((text) =>
        text.includes("information_schema") ? [{ present: true }] : [{ revision_id: "005_unit" }]
      );
      const database = new PostgresMigrationDatabase(pool);

      expect(await database.readPointer()).toBe("005_unit");
    });

    it("should return null for an empty table", async () => {
      const pool = new ScriptedPool((text) =>
        text.includes("information_schema") ? [{ present: true }] : []
      );

      expect(await new PostgresMigrationDatabase(pool).readPointer()).toBeNull();
    });

    it("should reject an unexpected row shape", async () => {
      const pool = new ScriptedPool((text) =>
        text.includes("information_schema") ? [{ present: true }] : [{ revision_id: 5 }]
      );

      await expect(new PostgresMigrationDatabase(pool).readPointer()).rejects.toThrow();
      expect(pool.releases).toBe(1);
    });
  });

  describe("withTransaction", () => {
    it("should wrap the script and pointer write in BEGIN and COMMIT", async () => {
      const pool = new ScriptedPool();
      const database = new PostgresMigrationDatabase(pool);

      await database.withTransaction(async (session) => {
        await session.execute("ALTER TABLE receipt ADD COLUMN shop_id INTEGER");
        await session.writePointer("006_shop");
      });

      expect(pool.texts()).toEqual([
        "BEGIN",
        "ALTER TABLE",
        "CREATE TABLE",
        "INSERT INTO",
        "COMMIT",
      ]);
      expect(pool.queries[3]?.values).toEqual(["006_shop"]);
      expect(pool.releases).toBe(1);
    });

    it("should roll back and rethrow when the callback fails", async () => {
      const failure = new Error('column "shop_id" already exists');
      const pool = new ScriptedPool((text) => {
        if (text.startsWith("ALTER")) {
          throw failure;
        }
        return [];
      });
      const database = new PostgresMigrationDatabase(pool);

      await expect(
        database.withTransaction(async (session) => {
          await session.execute("ALTER TABLE receipt ADD COLUMN shop_id INTEGER");
          await session.writePointer("006_shop");
        })
      ).rejects.toBe(failure);

      expect(pool.texts()).toEqual(["BEGIN", "ALTER TABLE", "ROLLBACK"]);
      expect(pool.releases).toBe(1);
    });

    it("should rethrow the original error when the rollback also fails", async () => {
      const failure = new Error("syntax error");
      const pool = new ScriptedPool((text) => {
        if (text === "ROLLBACK") {
          throw new Error("connection terminated");
        }
        if (text.startsWith("BROKEN")) {
          throw failure;
        }
        return [];
      });
      const database = new PostgresMigrationDatabase(pool);

      await expect(
        database.withTransaction((session) => session.execute("BROKEN SQL"))
      ).rejects.toBe(failure);
      expect(pool.releases).toBe(1);
    });
  });

  it("should end the pool on close", async () => {
    const pool = new ScriptedPool();

    await new PostgresMigrationDatabase(pool).close();

    expect(pool.ended).toBe(true);
  });
});
