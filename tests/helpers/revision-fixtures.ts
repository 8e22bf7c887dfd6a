/**
 * Revision and environment fixtures
 *
 * @module tests/helpers/revision-fixtures
 */

import type { EnvironmentConfig, EnvironmentName } from "../../src/config/index.js";
import type { Revision } from "../../src/revisions/types.js";

export function upScript(id: string): string {
  return `-- up ${id}`;
}

export function downScript(id: string): string {
  return `-- down ${id}`;
}

/**
 * Build a revision whose scripts name it ("-- up <id>", "-- down <id>")
 */
export function makeRevision(
  id: string,
  parentId: string | null,
  options: { irreversible?: string; description?: string } = {}
): Revision {
  return {
    id,
    parentId,
    description: options.description ?? `Revision ${id}`,
    upScript: upScript(id),
    downgrade:
      options.irreversible !== undefined
        ? { kind: "irreversible", reason: options.irreversible }
        : { kind: "reversible", script: downScript(id) },
  };
}

/**
 * Linear chain a ← b ← c ... from ids in order
 */
export function makeChain(...ids: string[]): Revision[] {
  return ids.map((id, index) => makeRevision(id, index === 0 ? null : (ids[index - 1] ?? null)));
}

export function makeEnvironment(
  name: EnvironmentName = "dev",
  database: string = "app"
): EnvironmentConfig {
  return {
    name,
    connection: {
      host: "localhost",
      port: 5432,
      database,
      user: "postgres",
      password: "test-secret",
    },
  };
}
