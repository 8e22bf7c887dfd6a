/**
 * @module revisions/template
 *
 * Creates the files of a new revision.
 *
 * The new revision's parent is always the current chain head, so appending
 * never creates a branch.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { BASE_REVISION } from "./types.js";
import { InvalidRevisionError } from "./errors.js";
import {
  DOWN_SCRIPT_EXTENSION,
  MANIFEST_EXTENSION,
  UP_SCRIPT_EXTENSION,
  type RevisionManifest,
} from "./loader.js";
import type { RevisionStore } from "./RevisionStore.js";

const MAX_SLUG_LENGTH = 50;
const MIN_SEQUENCE_WIDTH = 3;

/**
 * Options for creating a revision
 */
export interface CreateRevisionOptions {
  /** Directory the revision files are written to */
  directory: string;
  /** Human-readable message; also names the revision */
  message: string;
  /** Current catalog, used to pick the parent and the sequence number */
  store: RevisionStore;
  /** Creation time (defaults to now) */
  now?: Date;
}

/**
 * Files written for a new revision
 */
export interface CreatedRevision {
  id: string;
  parentId: string | null;
  files: {
    manifest: string;
    up: string;
    down: string;
  };
}

/**
 * Turn a message into a file-name-safe slug
 *
 * @example
 * slugify("Add unit to purchased_item!") // "add_unit_to_purchased_item"
 */
export function slugify(message: string): string {
  return message
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/_+$/, "");
}

/**
 * Next revision id: highest numeric prefix in the catalog plus one, zero
 * padded to at least three digits, followed by the slug
 */
export function nextRevisionId(store: RevisionStore, slug: string): string {
  let highest = 0;
  let width = MIN_SEQUENCE_WIDTH;

  for (const revision of store.history()) {
    const match = /^(\d+)_/.exec(revision.id);
    if (match?.[1]) {
      highest = Math.max(highest, parseInt(match[1], 10));
      width = Math.max(width, match[1].length);
    }
  }

  return `${String(highest + 1).padStart(width, "0")}_${slug}`;
}

/**
 * Render the manifest and SQL templates for a revision
 */
export function renderRevisionFiles(
  id: string,
  parentId: string | null,
  message: string,
  now: Date
): { manifest: string; up: string; down: string } {
  const createdAt = now.toISOString().slice(0, 10);
  const manifest: RevisionManifest = {
    id,
    parent: parentId,
    description: message,
    createdAt,
  };

  const header = [
    `-- Revision: ${id}`,
    `-- Parent: ${parentId ?? BASE_REVISION}`,
    `-- Created: ${createdAt}`,
  ].join("\n");

  return {
    manifest: JSON.stringify(manifest, null, 2) + "\n",
    up: `-- ${message}\n${header}\n\n`,
    down: `-- Revert: ${message}\n${header}\n\n`,
  };
}

/**
 * Write a new revision whose parent is the current head
 *
 * @throws {InvalidRevisionError} If the message has no usable characters or
 *         a file for the new id already exists
 */
export async function createRevision(options: CreateRevisionOptions): Promise<CreatedRevision> {
  const { directory, message, store, now = new Date() } = options;

  const slug = slugify(message);
  if (slug === "") {
    throw new InvalidRevisionError(
      `Revision message "${message}" does not contain any letters or digits`,
      message
    );
  }

  const parentId = store.size === 0 ? null : store.head();
  const id = nextRevisionId(store, slug);
  const content = renderRevisionFiles(id, parentId, message.trim(), now);

  const files = {
    manifest: join(directory, `${id}${MANIFEST_EXTENSION}`),
    up: join(directory, `${id}${UP_SCRIPT_EXTENSION}`),
    down: join(directory, `${id}${DOWN_SCRIPT_EXTENSION}`),
  };

  await mkdir(directory, { recursive: true });

  try {
    await writeFile(files.up, content.up, { flag: "wx" });
    await writeFile(files.down, content.down, { flag: "wx" });
    await writeFile(files.manifest, content.manifest, { flag: "wx" });
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      throw new InvalidRevisionError(`Revision files for '${id}' already exist`, id, error);
    }
    throw error;
  }

  return { id, parentId, files };
}
