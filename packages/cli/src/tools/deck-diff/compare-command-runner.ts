import path from 'node:path';

import { createFileSnapshotSource } from '@deckdiff/diff';

import {
  executeDeckDiffReport,
  type DeckDiffReportOutcome,
  type ExecuteDeckDiffReportOptions,
} from './report-runner.js';

export interface ExecuteCompareCommandOptions
  extends Omit<ExecuteDeckDiffReportOptions, 'targets' | 'labels'> {
  readonly previous: string;
  readonly next: string;
}

/**
 * Compares two deck files on disk. Media is taken from the next deck's directory.
 */
export const executeCompareCommand = async (
  options: ExecuteCompareCommandOptions,
): Promise<DeckDiffReportOutcome> => {
  const source = createFileSnapshotSource(
    { previous: options.previous, next: options.next },
    options.cwd,
  );

  return executeDeckDiffReport({
    ...options,
    targets: [
      {
        source,
        deckDirectory: path.dirname(path.resolve(options.cwd, options.next)),
      },
    ],
    labels: {
      previous: source.describe('previous'),
      next: source.describe('next'),
    },
  });
};
