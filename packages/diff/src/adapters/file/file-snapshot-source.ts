import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type {
  DeckSnapshotSourcePort,
  SnapshotLabel,
} from '../../application/ports/revision-loader.js';
import { DeckFileNotFoundError } from '../../domain/errors.js';

export interface FileSnapshotSources {
  readonly previous: string;
  readonly next: string;
}

/**
 * Snapshot source reading two deck files from disk. Both files are named by the caller, so
 * a missing one fails the load instead of standing in for an empty deck.
 *
 * @param sources - Paths of the previous and next deck files.
 * @param cwd - Directory relative paths are resolved against.
 * @returns A snapshot source port.
 */
export function createFileSnapshotSource(
  sources: FileSnapshotSources,
  cwd: string = process.cwd(),
): DeckSnapshotSourcePort {
  const resolvePath = (label: SnapshotLabel): string => path.resolve(cwd, sources[label]);

  return {
    describe(label) {
      return path.relative(cwd, resolvePath(label)) || sources[label];
    },
    async load(label) {
      const filePath = resolvePath(label);
      try {
        return await readFile(filePath, 'utf8');
      } catch (error) {
        if (isMissingFileError(error)) {
          throw new DeckFileNotFoundError(sources[label]);
        }
        throw error;
      }
    },
  };
}

function isMissingFileError(error: unknown): error is NodeJS.ErrnoException {
  return Boolean(
    error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT',
  );
}
