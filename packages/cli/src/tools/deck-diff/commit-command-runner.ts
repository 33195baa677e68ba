import path from 'node:path';

import {
  createRevisionSnapshotSource,
  type RevisionLoader,
} from '@deckdiff/diff';

import {
  executeDeckDiffReport,
  type DeckDiffReportOutcome,
  type ExecuteDeckDiffReportOptions,
} from './report-runner.js';

export interface ExecuteCommitCommandOptions
  extends Omit<ExecuteDeckDiffReportOptions, 'targets' | 'labels'> {
  readonly loader: RevisionLoader;
  readonly revision: string;
  /** Compare only this deck file instead of every deck file the commit touched. */
  readonly deckPath?: string;
}

export type CommitCommandOutcome = DeckDiffReportOutcome | { readonly status: 'no-deck-files' };

/**
 * Compares the deck files of a commit with the same files at its parent.
 */
export const executeCommitCommand = async (
  options: ExecuteCommitCommandOptions,
): Promise<CommitCommandOutcome> => {
  const { loader, revision, io } = options;
  const commit = await loader.describeCommit(revision);
  const deckPaths =
    options.deckPath === undefined
      ? await loader.listChangedDeckFiles(revision)
      : [toRepositoryPath(options.deckPath)];

  if (deckPaths.length === 0) {
    if (!options.report.quiet) {
      io.writeErr(`No deck files changed in ${commit.shortHash} (${commit.subject}).\n`);
    }
    return { status: 'no-deck-files' };
  }

  const root = await loader.repositoryRoot();

  return executeDeckDiffReport({
    ...options,
    targets: deckPaths.map((deckPath) => ({
      source: createRevisionSnapshotSource({ loader, path: deckPath, revision }),
      deckDirectory: path.resolve(root, path.posix.dirname(deckPath)),
    })),
    labels: {
      previous: `${commit.shortHash}^`,
      next: commit.shortHash,
      deckPath: deckPaths.join(', '),
      commit,
    },
  });
};

const toRepositoryPath = (deckPath: string): string =>
  path.posix.normalize(deckPath.split(path.sep).join(path.posix.sep)).replace(/^\.\//, '');
