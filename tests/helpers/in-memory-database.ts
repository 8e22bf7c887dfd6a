/**
 * In-memory migration target
 *
 * Keeps the applied-revision pointer and the committed scripts in memory.
 * Each transaction buffers its work and only publishes it on commit, so a
 * failing step leaves the pointer where the previous step left it.
 *
 * @module tests/helpers/in-memory-database
 */

import type { MigrationDatabase, MigrationSession } from "../../src/database/types.js";

interface PendingWork {
  scripts: string[];
  pointer?: { value: string | null };
}

export class InMemoryMigrationDatabase implements MigrationDatabase {
  /** Applied revision (null = base) */
  pointer: string | null;
  /** Scripts of committed transactions, in execution order */
  readonly executed: string[] = [];
  /** Pointer values written by committed transactions */
  readonly pointerWrites: Array<string | null> = [];
  commits = 0;
  rollbacks = 0;
  readPointerCalls = 0;
  closed = false;

  private readonly failures = new Map<string, Error>();

  constructor(initialPointer: string | null = null) {
    this.pointer = initialPointer;
  }

  /**
   * Make `execute` throw the error whenever it receives this exact script
   */
  failOn(script: string, error: Error): void {
    this.failures.set(script, error);
  }

  /**
   * Stop failing on a script
   */
  clearFailure(script: string): void {
    this.failures.delete(script);
  }

  async readPointer(): Promise<string | null> {
    this.readPointerCalls++;
    return this.pointer;
  }

  async withTransaction<T>(fn: (session: MigrationSession) => Promise<T>): Promise<T> {
    const pending: PendingWork = { scripts: [] };
    const session: MigrationSession = {
      execute: async (sql) => {
        const failure = this.failures.get(sql);
        if (failure) {
          throw failure;
        }
        pending.scripts.push(sql);
      },
      writePointer: async (revisionId) => {
        pending.pointer = { value: revisionId };
      },
    };

    let result: T;
    try {
      result = await fn(session);
    } catch (error) {
      this.rollbacks++;
      throw error;
    }

    this.executed.push(...pending.scripts);
    if (pending.pointer) {
      this.pointer = pending.pointer.value;
      this.pointerWrites.push(pending.pointer.value);
    }
    this.commits++;
    return result;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
