import type { DiagnosticsPort } from '@deckdiff/core';

export type SnapshotLabel = 'previous' | 'next';

export interface SnapshotSourceContext {
  readonly diagnostics?: DiagnosticsPort;
}

/**
 * Supplies the raw `deck.json` text of both sides of a comparison.
 */
export interface DeckSnapshotSourcePort {
  describe(label: SnapshotLabel): string;
  /**
   * @throws {SnapshotNotFoundError} When the deck file does not exist on that side.
   * @throws {NoParentRevisionError} When the previous side would be the parent of a root commit.
   */
  load(label: SnapshotLabel, context?: SnapshotSourceContext): Promise<string>;
}

export interface CommitInfo {
  readonly hash: string;
  readonly shortHash: string;
  readonly subject: string;
  readonly author: string;
  readonly email: string;
  /** ISO 8601 author date. */
  readonly date: string;
}

/**
 * Reads deck files out of version control history.
 */
export interface RevisionLoader {
  /**
   * @throws {SnapshotNotFoundError} When `path` does not exist at `revision`.
   */
  load(path: string, revision: string): Promise<string>;
  /**
   * @throws {NoParentRevisionError} When `revision` is a root commit.
   */
  parentRevision(revision: string): Promise<string>;
  describeCommit(revision: string): Promise<CommitInfo>;
  /** Paths are relative to the repository root. */
  listChangedDeckFiles(revision: string): Promise<readonly string[]>;
  /** Absolute path of the working tree root that deck paths are relative to. */
  repositoryRoot(): Promise<string>;
}
