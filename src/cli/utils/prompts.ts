/**
 * Interactive Prompts for CLI
 *
 * Confirmation prompt used before destructive operations.
 */

import * as readline from "node:readline";

/**
 * Prompt user for confirmation
 *
 * Writes the question to stderr so that stdout stays clean for `--json`
 * output. Returns true if the user enters 'yes' or 'y' (case-insensitive).
 *
 * @example
 * ```typescript
 * if (await confirm("Restore dev from backup?")) {
 *   await engine.restore(config, file);
 * }
 * ```
 */
export async function confirm(
  message: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): Promise<boolean> {
  const rl = readline.createInterface({ input, output });

  return new Promise((resolve) => {
    rl.question(message + " ", (answer) => {
      rl.close();
      const normalized = answer.trim().toLowerCase();
      resolve(normalized === "yes" || normalized === "y");
    });
  });
}
