/**
 * SQL for the applied-revision pointer table.
 *
 * The table holds at most one row, keyed by a constant `singleton` column.
 */

export const POINTER_TABLE = "schema_revision";

export const POINTER_TABLE_EXISTS_SQL = `
  SELECT EXISTS (
    SELECT 1 FROM information_schema.tables
    WHERE table_schema = current_schema() AND table_name = $1
  ) AS present
`;

export const CREATE_POINTER_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS ${POINTER_TABLE} (
    singleton   BOOLEAN     PRIMARY KEY DEFAULT TRUE CHECK (singleton),
    revision_id TEXT        NULL,
    updated_at  TIMESTAMPTZ NOT NULL DEFAULT now()
  )
`;

export const SELECT_POINTER_SQL = `SELECT revision_id FROM ${POINTER_TABLE} WHERE singleton`;

export const UPSERT_POINTER_SQL = `
  INSERT INTO ${POINTER_TABLE} (singleton, revision_id, updated_at)
  VALUES (TRUE, $1, now())
  ON CONFLICT (singleton)
  DO UPDATE SET revision_id = EXCLUDED.revision_id, updated_at = EXCLUDED.updated_at
`;
