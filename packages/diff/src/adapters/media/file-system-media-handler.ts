import { copyFile, mkdir, stat } from 'node:fs/promises';
import path from 'node:path';

import {
  createComponentLogger,
  noopLogger,
  type StructuredLogger,
} from '@deckdiff/core';

import type { MediaResolution, MediaResolverPort } from '../../application/ports/media.js';

export interface FileSystemMediaHandlerOptions {
  /** Directory holding the deck's `media/` folder, usually the directory of `deck.json`. */
  readonly deckDirectory: string;
  /** Directory the report is written to; media lands in its `media/` subdirectory. */
  readonly outputDirectory: string;
  readonly logger?: StructuredLogger;
}

export const MEDIA_DIRECTORY = 'media';

/**
 * Maps referenced media files in `<deck>/media` to `<output>/media`. Resolving only checks
 * that each file exists; nothing is copied until {@link FileSystemMediaHandler.publish}
 * runs, so a run that fails later leaves the output directory untouched.
 */
export class FileSystemMediaHandler implements MediaResolverPort {
  private readonly source: string;
  private readonly target: string;
  private readonly logger: StructuredLogger;
  private readonly pending = new Map<string, string>();

  constructor(options: FileSystemMediaHandlerOptions) {
    this.source = path.resolve(options.deckDirectory, MEDIA_DIRECTORY);
    this.target = path.resolve(options.outputDirectory, MEDIA_DIRECTORY);
    this.logger = options.logger ?? noopLogger;
  }

  async resolve(names: readonly string[]): Promise<MediaResolution> {
    const paths = new Map<string, string>();
    const missing: string[] = [];

    for (const name of names) {
      const from = path.resolve(this.source, name);
      if (!isInside(this.source, from) || !(await isFile(from))) {
        missing.push(name);
        continue;
      }

      this.pending.set(from, path.resolve(this.target, name));
      paths.set(name, path.posix.join(MEDIA_DIRECTORY, ...name.split(path.sep)));
    }

    return { paths, missing };
  }

  /**
   * Copies every file resolved so far.
   *
   * @returns The number of files copied.
   */
  async publish(): Promise<number> {
    for (const [from, to] of this.pending) {
      await mkdir(path.dirname(to), { recursive: true });
      await copyFile(from, to);
    }

    createComponentLogger(this.logger, 'deck-diff.media').info('media.copied', {
      copied: this.pending.size,
      directory: this.target,
    });
    return this.pending.size;
  }
}

function isInside(directory: string, candidate: string): boolean {
  const relative = path.relative(directory, candidate);
  return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
