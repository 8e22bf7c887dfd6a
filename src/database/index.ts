/**
 * @module database
 */

export type { MigrationDatabase, MigrationSession } from "./types.js";
export {
  PostgresMigrationDatabase,
  createPool,
  type PgClient,
  type PgPool,
} from "./postgres-database.js";
export { POINTER_TABLE } from "./revision-pointer.js";
