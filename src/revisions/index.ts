/**
 * @module revisions
 *
 * Revision catalog: types, the in-memory store, loading from disk and
 * creation of new revisions.
 */

export type { Revision, Downgrade, MigrationPath, PathDirection } from "./types.js";
export { BASE_REVISION } from "./types.js";

export {
  RevisionError,
  UnknownRevisionError,
  EmptyHistoryError,
  DisconnectedHistoryError,
  InvalidRevisionError,
} from "./errors.js";

export { RevisionStore } from "./RevisionStore.js";

export {
  loadRevisionCatalog,
  loadRevision,
  parseManifest,
  RevisionManifestSchema,
  DEFAULT_IRREVERSIBLE_REASON,
  type RevisionManifest,
} from "./loader.js";

export {
  createRevision,
  slugify,
  nextRevisionId,
  renderRevisionFiles,
  type CreateRevisionOptions,
  type CreatedRevision,
} from "./template.js";
