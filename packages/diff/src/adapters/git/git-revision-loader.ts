import path from 'node:path';

import {
  createComponentLogger,
  noopLogger,
  type ComponentLogger,
  type StructuredLogger,
} from '@deckdiff/core';

import type { CommitInfo, RevisionLoader } from '../../application/ports/revision-loader.js';
import { NoParentRevisionError, SnapshotNotFoundError } from '../../domain/errors.js';
import {
  execFileCommandRunner,
  GitCommandError,
  type CommandResult,
  type CommandRunner,
} from './command-runner.js';

export interface GitRevisionLoaderOptions {
  /** Working directory inside the repository. Defaults to the process working directory. */
  readonly repository?: string;
  readonly runner?: CommandRunner;
  readonly logger?: StructuredLogger;
}

export const DECK_FILE_NAME = 'deck.json';

const COMMIT_FORMAT = ['%H', '%h', '%s', '%an', '%ae', '%aI'].join('%x00');
const MISSING_PATH_PATTERNS: readonly RegExp[] = [
  /does not exist in/i,
  /exists on disk, but not in/i,
];

/**
 * Reads deck files from git history by shelling out to the `git` executable.
 */
export class GitRevisionLoader implements RevisionLoader {
  private readonly repository: string;
  private readonly runner: CommandRunner;
  private readonly log: ComponentLogger;

  constructor(options: GitRevisionLoaderOptions = {}) {
    this.repository = path.resolve(options.repository ?? process.cwd());
    this.runner = options.runner ?? execFileCommandRunner;
    this.log = createComponentLogger(options.logger ?? noopLogger, 'deck-diff.git', {
      repository: this.repository,
    });
  }

  async load(filePath: string, revision: string): Promise<string> {
    const args = ['show', `${revision}:${toGitPath(filePath)}`];
    const result = await this.git(args);
    if (result.exitCode !== 0) {
      if (MISSING_PATH_PATTERNS.some((pattern) => pattern.test(result.stderr))) {
        throw new SnapshotNotFoundError(filePath, revision);
      }
      throw new GitCommandError(args, result);
    }
    return result.stdout;
  }

  async parentRevision(revision: string): Promise<string> {
    const commit = await this.resolveCommit(revision);
    const result = await this.git(['rev-parse', '--verify', '--quiet', `${commit}^`]);
    if (result.exitCode !== 0) {
      throw new NoParentRevisionError(revision);
    }
    return result.stdout.trim();
  }

  async describeCommit(revision: string): Promise<CommitInfo> {
    const args = ['show', '-s', `--format=${COMMIT_FORMAT}`, revision];
    const result = await this.git(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result);
    }

    const [hash = '', shortHash = '', subject = '', author = '', email = '', date = ''] =
      result.stdout.trim().split('\0');
    return { hash, shortHash, subject, author, email, date };
  }

  /**
   * Lists the `deck.json` files a commit touched. Paths are NUL-separated (`-z`) so that
   * git does not quote names outside ASCII.
   */
  async listChangedDeckFiles(revision: string): Promise<readonly string[]> {
    const args = ['diff-tree', '-z', '--no-commit-id', '--name-only', '-r', '--root', revision];
    const result = await this.git(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result);
    }

    return result.stdout
      .split('\0')
      .filter((entry) => path.posix.basename(entry) === DECK_FILE_NAME);
  }

  async repositoryRoot(): Promise<string> {
    const args = ['rev-parse', '--show-toplevel'];
    const result = await this.git(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result);
    }
    return path.resolve(result.stdout.trim());
  }

  private async resolveCommit(revision: string): Promise<string> {
    const args = ['rev-parse', '--verify', `${revision}^{commit}`];
    const result = await this.git(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result);
    }
    return result.stdout.trim();
  }

  private async git(args: readonly string[]): Promise<CommandResult> {
    const result = await this.runner('git', args, { cwd: this.repository });
    this.log.debug('git.command', { args, exitCode: result.exitCode });
    return result;
  }
}

/** Paths are relative to the repository root, as listed by `git diff-tree`. */
function toGitPath(filePath: string): string {
  return filePath.split(path.sep).join('/').replace(/^\.\//, '');
}
