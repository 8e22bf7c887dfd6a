/**
 * @module revisions/RevisionStore
 *
 * In-memory revision catalog.
 *
 * Holds revisions keyed by id and answers questions about the chain they
 * form: which revision is the head, in what order they apply, and which
 * steps lead from one revision to another. Everything here is a pure
 * function of the catalog; no file or database I/O happens in this module.
 *
 * @example
 * ```typescript
 * const store = new RevisionStore(revisions);
 * const path = store.resolvePath(null, store.head());
 * console.log(path.steps.map((r) => r.id));
 * ```
 */

import { BASE_REVISION, type MigrationPath, type Revision } from "./types.js";
import {
  DisconnectedHistoryError,
  EmptyHistoryError,
  InvalidRevisionError,
  UnknownRevisionError,
} from "./errors.js";

function label(id: string | null): string {
  return id ?? BASE_REVISION;
}

/**
 * Ordered, immutable catalog of revisions
 */
export class RevisionStore {
  private readonly revisions = new Map<string, Revision>();
  private readonly children = new Map<string, string[]>();

  /**
   * @param revisions - Revisions in any order
   * @throws {InvalidRevisionError} If two revisions share an id
   */
  constructor(revisions: Iterable<Revision> = []) {
    for (const revision of revisions) {
      if (this.revisions.has(revision.id)) {
        throw new InvalidRevisionError(`Duplicate revision id: ${revision.id}`, revision.id);
      }
      this.revisions.set(revision.id, revision);
    }

    for (const revision of this.revisions.values()) {
      if (revision.parentId === null) {
        continue;
      }
      const siblings = this.children.get(revision.parentId) ?? [];
      siblings.push(revision.id);
      this.children.set(revision.parentId, siblings);
    }
  }

  /**
   * Number of revisions in the catalog
   */
  get size(): number {
    return this.revisions.size;
  }

  has(id: string): boolean {
    return this.revisions.has(id);
  }

  /**
   * Get a revision by id
   *
   * @throws {UnknownRevisionError} If the id is not in the catalog
   */
  get(id: string): Revision {
    const revision = this.revisions.get(id);
    if (!revision) {
      throw new UnknownRevisionError(id);
    }
    return revision;
  }

  /**
   * Id of the latest revision (the one no revision names as parent)
   *
   * @throws {EmptyHistoryError} If the catalog is empty
   * @throws {DisconnectedHistoryError} If there is no head or more than one
   */
  head(): string {
    if (this.revisions.size === 0) {
      throw new EmptyHistoryError();
    }

    const heads = [...this.revisions.keys()].filter((id) => !this.children.has(id));
    return this.single(heads, "head");
  }

  /**
   * Id of the first revision (the one without a parent)
   *
   * @throws {EmptyHistoryError} If the catalog is empty
   * @throws {DisconnectedHistoryError} If there is no root or more than one
   */
  root(): string {
    if (this.revisions.size === 0) {
      throw new EmptyHistoryError();
    }

    const roots = [...this.revisions.values()]
      .filter((revision) => revision.parentId === null)
      .map((revision) => revision.id);
    return this.single(roots, "root");
  }

  /**
   * Revisions from root to head
   *
   * The returned iterable is lazy and can be iterated any number of times.
   * Chain defects (several roots, a branch, a missing parent, a cycle) are
   * raised as DisconnectedHistoryError while iterating. An empty catalog
   * yields nothing.
   */
  history(): Iterable<Revision> {
    return {
      [Symbol.iterator]: () => this.walkChain(),
    };
  }

  /**
   * Resolve the ordered steps leading from one revision to another
   *
   * @param currentId - Applied revision, or null for base
   * @param targetId - Requested revision, or null for base
   * @returns Forward path when target descends from current, reverse path
   *          when it is an ancestor, empty path when they are equal
   * @throws {UnknownRevisionError} If either id is not in the catalog
   * @throws {DisconnectedHistoryError} If no path connects them
   */
  resolvePath(currentId: string | null, targetId: string | null): MigrationPath {
    if (currentId !== null) {
      this.get(currentId);
    }
    if (targetId !== null) {
      this.get(targetId);
    }

    if (currentId === targetId) {
      return { direction: "none", from: currentId, to: targetId, steps: [] };
    }

    // Forward: current must appear in the target's lineage
    if (targetId !== null) {
      const lineage = this.lineage(targetId);
      const index =
        currentId === null ? lineage.length : lineage.findIndex((r) => r.id === currentId);
      if (index > 0) {
        return {
          direction: "up",
          from: currentId,
          to: targetId,
          steps: lineage.slice(0, index).reverse(),
        };
      }
    }

    // Reverse: target must appear in the current revision's lineage
    if (currentId !== null) {
      const lineage = this.lineage(currentId);
      const index =
        targetId === null ? lineage.length : lineage.findIndex((r) => r.id === targetId);
      if (index > 0) {
        return {
          direction: "down",
          from: currentId,
          to: targetId,
          steps: lineage.slice(0, index),
        };
      }
    }

    throw new DisconnectedHistoryError(
      `No path between revision '${label(currentId)}' and '${label(targetId)}'`,
      [currentId, targetId].filter((id): id is string => id !== null)
    );
  }

  /**
   * The revision and all its ancestors, nearest first
   */
  private lineage(id: string): Revision[] {
    const lineage: Revision[] = [];
    const seen = new Set<string>();
    let cursor: string | null = id;

    while (cursor !== null) {
      if (seen.has(cursor)) {
        throw new DisconnectedHistoryError(`Revision history contains a cycle at '${cursor}'`, [
          ...seen,
        ]);
      }
      seen.add(cursor);

      const revision = this.revisions.get(cursor);
      if (!revision) {
        const child = lineage[lineage.length - 1];
        throw new DisconnectedHistoryError(
          `Revision '${child ? child.id : id}' names missing parent '${cursor}'`,
          child ? [child.id, cursor] : [cursor]
        );
      }

      lineage.push(revision);
      cursor = revision.parentId;
    }

    return lineage;
  }

  private *walkChain(): Generator<Revision, void, undefined> {
    if (this.revisions.size === 0) {
      return;
    }

    let cursor: string | undefined = this.root();
    let visited = 0;

    while (cursor !== undefined) {
      const revision = this.get(cursor);
      visited++;
      yield revision;

      const next: string[] = this.children.get(cursor) ?? [];
      if (next.length > 1) {
        throw new DisconnectedHistoryError(
          `Revision history branches after '${cursor}': ${next.join(", ")}`,
          next
        );
      }
      cursor = next[0];
    }

    if (visited !== this.revisions.size) {
      const unreachable = [...this.revisions.keys()].filter((id) => !this.reachesRoot(id));
      throw new DisconnectedHistoryError(
        `Revisions not connected to the root: ${unreachable.join(", ")}`,
        unreachable
      );
    }
  }

  private reachesRoot(id: string): boolean {
    try {
      this.lineage(id);
      return true;
    } catch (error) {
      if (error instanceof DisconnectedHistoryError) {
        return false;
      }
      throw error;
    }
  }

  private single(ids: string[], role: "head" | "root"): string {
    const [first] = ids;
    if (first === undefined) {
      throw new DisconnectedHistoryError(`Revision history has no ${role} (cycle detected)`);
    }
    if (ids.length > 1) {
      throw new DisconnectedHistoryError(
        `Revision history has multiple ${role}s: ${ids.join(", ")}`,
        ids
      );
    }
    return first;
  }
}
