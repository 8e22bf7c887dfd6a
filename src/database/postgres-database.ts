/**
 * @module database/postgres-database
 *
 * PostgreSQL implementation of the migration target on a `pg` pool.
 */

import pg from "pg";
import { z } from "zod";
import type { ConnectionParams } from "../config/index.js";
import { getComponentLogger } from "../logging/index.js";
import type { MigrationDatabase, MigrationSession } from "./types.js";
import {
  CREATE_POINTER_TABLE_SQL,
  POINTER_TABLE,
  POINTER_TABLE_EXISTS_SQL,
  SELECT_POINTER_SQL,
  UPSERT_POINTER_SQL,
} from "./revision-pointer.js";

type Logger = ReturnType<typeof getComponentLogger>;

/**
 * The parts of a `pg` client this module uses
 */
export interface PgClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
}

/**
 * The parts of a `pg` pool this module uses
 */
export interface PgPool {
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

const ExistsRowSchema = z.object({ present: z.boolean() });
const PointerRowSchema = z.object({ revision_id: z.string().nullable() });

/**
 * Create a `pg` pool for one CLI invocation
 */
export function createPool(connection: ConnectionParams): PgPool {
  const pool = new pg.Pool({
    host: connection.host,
    port: connection.port,
    database: connection.database,
    user: connection.user,
    password: connection.password,
    max: 2,
    idleTimeoutMillis: 5_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on("error", (err) => {
    getComponentLogger("database:postgres").error({ err: err.message }, "Unexpected pool error");
  });

  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

/**
 * Migration target backed by a PostgreSQL pool
 *
 * @example
 * ```typescript
 * const database = new PostgresMigrationDatabase(createPool(config.connection), "dev");
 * try {
 *   console.log(await database.readPointer());
 * } finally {
 *   await database.close();
 * }
 * ```
 */
export class PostgresMigrationDatabase implements MigrationDatabase {
  private readonly logger: Logger;

  constructor(
    private readonly pool: PgPool,
    environment?: string
  ) {
    this.logger = getComponentLogger("database:postgres", environment);
  }

  async readPointer(): Promise<string | null> {
    const client = await this.pool.connect();
    try {
      const exists = await client.query(POINTER_TABLE_EXISTS_SQL, [POINTER_TABLE]);
      const [existsRow] = exists.rows;
      if (!ExistsRowSchema.parse(existsRow).present) {
        this.logger.debug("Pointer table absent, database is at base");
        return null;
      }

      const result = await client.query(SELECT_POINTER_SQL);
      const [row] = result.rows;
      if (row === undefined) {
        return null;
      }
      return PointerRowSchema.parse(row).revision_id;
    } finally {
      client.release();
    }
  }

  async withTransaction<T>(fn: (session: MigrationSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const session: MigrationSession = {
      execute: async (sql) => {
        await client.query(sql);
      },
      writePointer: async (revisionId) => {
        await client.query(CREATE_POINTER_TABLE_SQL);
        await client.query(UPSERT_POINTER_SQL, [revisionId]);
      },
    };

    try {
      await client.query("BEGIN");
      const result = await fn(session);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        this.logger.error(
          {
            err: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
          },
          "Rollback failed"
        );
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.debug("Database pool closed");
  }
}
