/**
 * Tests for the confirmation prompt
 */

import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { confirm } from "../../../src/cli/utils/prompts.js";

async function answer(reply: string): Promise<boolean> {
  const input = new PassThrough();
  const output = new PassThrough();
  const pending = confirm("Continue? [y/N]", input, output);
  input.write(`${reply}\n`);
  return pending;
}

describe("confirm", () => {
  it.each(["y", "Y", "yes", " YES "])("should accept %j", async (reply) => {
    expect(await answer(reply)).toBe(true);
  });

  it.each(["", "n", "no", "yep"])("should decline %j", async (reply) => {
    expect(await answer(reply)).toBe(false);
  });
});
