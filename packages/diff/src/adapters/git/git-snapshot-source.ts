import type {
  DeckSnapshotSourcePort,
  RevisionLoader,
  SnapshotLabel,
} from '../../application/ports/revision-loader.js';

export interface RevisionSnapshotSourceOptions {
  readonly loader: RevisionLoader;
  readonly path: string;
  readonly revision: string;
  /** Revision to compare against; the parent of `revision` when omitted. */
  readonly baseRevision?: string;
}

/**
 * Snapshot source comparing a deck file at a revision with the same file at its parent
 * (or an explicit base revision).
 *
 * @param options - Loader, deck path and revisions.
 * @returns A snapshot source port.
 */
export function createRevisionSnapshotSource(
  options: RevisionSnapshotSourceOptions,
): DeckSnapshotSourcePort {
  let base: Promise<string> | undefined;
  const resolveBase = (): Promise<string> => {
    base ??=
      options.baseRevision === undefined
        ? options.loader.parentRevision(options.revision)
        : Promise.resolve(options.baseRevision);
    return base;
  };

  const revisionLabel = (label: SnapshotLabel): string =>
    label === 'next' ? options.revision : (options.baseRevision ?? `${options.revision}^`);

  return {
    describe(label) {
      return `${options.path}@${revisionLabel(label)}`;
    },
    async load(label) {
      const revision = label === 'next' ? options.revision : await resolveBase();
      return options.loader.load(options.path, revision);
    },
  };
}
