/**
 * @module database/types
 *
 * Target database interface used by the migration runner.
 */

/**
 * Operations available inside one step's transaction
 */
export interface MigrationSession {
  /**
   * Execute a SQL script (may contain several statements)
   */
  execute(sql: string): Promise<void>;

  /**
   * Record the applied revision, or null for base
   */
  writePointer(revisionId: string | null): Promise<void>;
}

/**
 * Connection to the database being migrated
 */
export interface MigrationDatabase {
  /**
   * Read the applied revision without modifying anything
   *
   * @returns Applied revision id, or null when the pointer table is absent or empty
   */
  readPointer(): Promise<string | null>;

  /**
   * Run a function inside a transaction
   *
   * Commits when the function resolves, rolls back and rethrows the original
   * error when it rejects.
   */
  withTransaction<T>(fn: (session: MigrationSession) => Promise<T>): Promise<T>;

  /**
   * Release all connections
   */
  close(): Promise<void>;
}
