/**
 * History Command - Show the revision chain
 *
 * Lists revisions from root to head and marks the one applied to the
 * selected environment.
 */

/* eslint-disable no-console */

import type { CliDependencies } from "../utils/dependency-init.js";
import { withMigrationRunner } from "../utils/dependency-init.js";
import type { ValidatedHistoryOptions } from "../utils/validation.js";
import { buildHistoryEntries, createHistoryTable } from "../output/formatters.js";

/**
 * Execute history command
 *
 * @param options - Command options
 * @param deps - CLI dependencies
 */
export async function historyCommand(
  options: ValidatedHistoryOptions,
  deps: CliDependencies
): Promise<void> {
  // Walk the chain first so history defects surface before connecting
  const revisions = [...deps.store.history()];
  const current = await withMigrationRunner(deps, (runner) => runner.current());
  const entries = buildHistoryEntries(revisions, current);

  if (options.json) {
    console.log(
      JSON.stringify({ environment: deps.environmentName, current, revisions: entries }, null, 2)
    );
    return;
  }

  console.log(createHistoryTable(entries));
}
