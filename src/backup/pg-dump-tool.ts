/**
 * @module backup/pg-dump-tool
 *
 * DumpTool implementation that shells out to `pg_dump` and `psql`.
 */

import { spawn } from "node:child_process";
import type { ConnectionParams } from "../config/index.js";
import type { DumpTool, ProcessResult } from "./types.js";

/**
 * Arguments for a plain-SQL schema and data dump that can be replayed into
 * an existing database
 */
export function pgDumpArgs(connection: ConnectionParams, file: string): string[] {
  return [
    "-h",
    connection.host,
    "-p",
    String(connection.port),
    "-U",
    connection.user,
    "-d",
    connection.database,
    "-f",
    file,
    "--no-owner",
    "--no-acl",
    "--clean",
    "--if-exists",
  ];
}

export function psqlRestoreArgs(connection: ConnectionParams, file: string): string[] {
  return [
    "-h",
    connection.host,
    "-p",
    String(connection.port),
    "-U",
    connection.user,
    "-d",
    connection.database,
    "-v",
    "ON_ERROR_STOP=1",
    "-f",
    file,
  ];
}

/**
 * Runs the PostgreSQL client binaries found on PATH
 *
 * The password is passed through `PGPASSWORD` in the child environment,
 * never on the command line.
 */
export class PgDumpTool implements DumpTool {
  constructor(
    private readonly pgDumpBinary: string = "pg_dump",
    private readonly psqlBinary: string = "psql"
  ) {}

  dump(connection: ConnectionParams, file: string): Promise<ProcessResult> {
    return this.run(this.pgDumpBinary, pgDumpArgs(connection, file), connection.password);
  }

  restore(connection: ConnectionParams, file: string): Promise<ProcessResult> {
    return this.run(this.psqlBinary, psqlRestoreArgs(connection, file), connection.password);
  }

  private run(command: string, args: string[], password: string): Promise<ProcessResult> {
    return new Promise((resolve) => {
      const proc = spawn(command, args, {
        env: { ...process.env, PGPASSWORD: password },
        stdio: ["ignore", "ignore", "pipe"],
      });

      let stderr = "";
      let settled = false;

      proc.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on("error", (error) => {
        if (settled) return;
        settled = true;
        resolve({ exitCode: null, stderr: stderr + error.message });
      });

      proc.on("close", (code) => {
        if (settled) return;
        settled = true;
        resolve({ exitCode: code, stderr });
      });
    });
  }
}
