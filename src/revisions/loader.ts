/**
 * @module revisions/loader
 *
 * Loads a revision catalog from disk.
 *
 * Each revision is three files sharing its id:
 * - `<id>.json`: manifest (id, parent, description, optional irreversible reason)
 * - `<id>.up.sql`: upgrade script (required)
 * - `<id>.down.sql`: downgrade script (optional; absent means irreversible)
 */

import { readdir, readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { z } from "zod";
import { getComponentLogger } from "../logging/index.js";
import { InvalidRevisionError } from "./errors.js";
import { RevisionStore } from "./RevisionStore.js";
import { BASE_REVISION, type Downgrade, type Revision } from "./types.js";

type Logger = ReturnType<typeof getComponentLogger>;

function getLogger(): Logger {
  return getComponentLogger("revisions:loader");
}

/**
 * Reason recorded for a revision that ships no down script
 */
export const DEFAULT_IRREVERSIBLE_REASON = "No downgrade script provided for this revision";

export const MANIFEST_EXTENSION = ".json";
export const UP_SCRIPT_EXTENSION = ".up.sql";
export const DOWN_SCRIPT_EXTENSION = ".down.sql";

/**
 * Schema for a revision manifest file
 */
export const RevisionManifestSchema = z
  .object({
    id: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9_.-]+$/, "Revision id may only contain letters, digits, '_', '.' and '-'")
      .refine((id) => id !== BASE_REVISION, `'${BASE_REVISION}' is reserved for the empty database`),
    parent: z.string().min(1).nullable(),
    description: z.string().default(""),
    createdAt: z.string().optional(),
    irreversible: z.object({ reason: z.string().min(1) }).optional(),
  })
  .strict();

export type RevisionManifest = z.infer<typeof RevisionManifestSchema>;

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Parse and validate manifest text
 *
 * @param text - Raw JSON text
 * @param source - File name used in error messages
 * @throws {InvalidRevisionError} If the text is not valid JSON or fails the schema
 */
export function parseManifest(text: string, source: string): RevisionManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidRevisionError(
      `Revision manifest ${source} is not valid JSON`,
      source,
      error instanceof Error ? error : undefined
    );
  }

  const result = RevisionManifestSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidRevisionError(`Revision manifest ${source} is invalid: ${details}`, source);
  }
  return result.data;
}

/**
 * Load one revision from its manifest and SQL files
 *
 * @throws {InvalidRevisionError} If the manifest is invalid, its id does not
 *         match the file name, the up script is missing or empty, or a down
 *         script exists for a revision declared irreversible
 */
export async function loadRevision(directory: string, manifestFile: string): Promise<Revision> {
  const fileId = basename(manifestFile, MANIFEST_EXTENSION);
  const manifest = parseManifest(
    await readFile(join(directory, manifestFile), "utf-8"),
    manifestFile
  );

  if (manifest.id !== fileId) {
    throw new InvalidRevisionError(
      `Revision manifest ${manifestFile} declares id '${manifest.id}', expected '${fileId}'`,
      manifestFile
    );
  }

  const upFile = `${manifest.id}${UP_SCRIPT_EXTENSION}`;
  const upScript = await readOptional(join(directory, upFile));
  if (upScript === undefined || upScript.trim() === "") {
    throw new InvalidRevisionError(
      `Revision ${manifest.id} has no upgrade script (${upFile})`,
      upFile
    );
  }

  const downFile = `${manifest.id}${DOWN_SCRIPT_EXTENSION}`;
  const downScript = await readOptional(join(directory, downFile));

  let downgrade: Downgrade;
  if (manifest.irreversible) {
    if (downScript !== undefined) {
      throw new InvalidRevisionError(
        `Revision ${manifest.id} is declared irreversible but ships ${downFile}`,
        downFile
      );
    }
    downgrade = { kind: "irreversible", reason: manifest.irreversible.reason };
  } else if (downScript === undefined || downScript.trim() === "") {
    downgrade = { kind: "irreversible", reason: DEFAULT_IRREVERSIBLE_REASON };
  } else {
    downgrade = { kind: "reversible", script: downScript };
  }

  return {
    id: manifest.id,
    parentId: manifest.parent,
    description: manifest.description,
    ...(manifest.createdAt !== undefined && { createdAt: manifest.createdAt }),
    upScript,
    downgrade,
  };
}

/**
 * Load every revision in a directory into a store
 *
 * A directory that does not exist yields an empty catalog.
 *
 * @param directory - Directory holding revision files
 * @returns Catalog of all revisions found
 */
export async function loadRevisionCatalog(directory: string): Promise<RevisionStore> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    if (isMissingFileError(error)) {
      getLogger().warn({ directory }, "Migrations directory not found, catalog is empty");
      return new RevisionStore();
    }
    throw error;
  }

  const manifests = entries.filter((entry) => entry.endsWith(MANIFEST_EXTENSION)).sort();
  const revisions: Revision[] = [];

  for (const manifestFile of manifests) {
    revisions.push(await loadRevision(directory, manifestFile));
  }

  getLogger().debug({ directory, count: revisions.length }, "Revision catalog loaded");
  return new RevisionStore(revisions);
}
