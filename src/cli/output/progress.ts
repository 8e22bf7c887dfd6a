/**
 * Progress Indicators for CLI
 *
 * Spinner driven by migration runner phases.
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";
import type { MigrationPhase } from "../../migration/index.js";

/**
 * Create a spinner for a migration run
 *
 * @param environment - Environment being migrated
 * @param enabled - False for --json output, which must keep stderr quiet
 */
export function createMigrationSpinner(environment: string, enabled: boolean = true): Ora {
  const spinner = ora({
    text: `Connecting to ${chalk.cyan(environment)}...`,
    color: "cyan",
    isEnabled: enabled,
    isSilent: !enabled,
  });

  return spinner.start();
}

/**
 * Spinner text for a phase, or null when the phase leaves the text unchanged
 */
export function describePhase(phase: MigrationPhase): string | null {
  switch (phase.state) {
    case "resolving":
      return "Resolving migration path...";

    case "backing-up":
      return `Backing up ${phase.environment}...`;

    case "applying": {
      const verb = phase.direction === "up" ? "Applying" : "Reverting";
      return `${verb} ${phase.revisionId} (${phase.index + 1}/${phase.total})...`;
    }

    case "committed":
      return `Committed ${phase.revisionId} (${phase.index + 1}/${phase.total})`;

    case "idle":
    case "done":
    case "failed":
      return null;
  }
}

/**
 * Update spinner text from a runner phase
 */
export function updateMigrationSpinner(spinner: Ora, phase: MigrationPhase): void {
  const text = describePhase(phase);
  if (text !== null) {
    spinner.text = text;
  }
}
