import path from 'node:path';
import process from 'node:process';

import {
  createComponentLogger,
  serialiseError,
  type DiagnosticsPort,
  type StructuredLogger,
} from '@deckdiff/core';
import { GitRevisionLoader, type RevisionLoader } from '@deckdiff/diff';
import type { Command } from 'commander';

import type { CliIo } from '../../io/cli-io.js';
import type { CliCommandModule, CliKernelContext } from '../../kernel/types.js';
import { executeCommitCommand } from './commit-command-runner.js';
import { executeCompareCommand } from './compare-command-runner.js';
import { loadDeckDiffConfig } from './config.js';
import { createCliDiagnosticsPort } from './diagnostics.js';
import { isInputFailure } from './failures.js';
import { createCliLogger } from './logger.js';
import {
  registerReportOptions,
  resolveReportOptions,
  type CommanderReportOptions,
  type ReportCommandOptions,
} from './report-options.js';

interface CommanderCommitOptions extends CommanderReportOptions {
  readonly repo?: string;
  readonly commit?: string;
  readonly deckPath?: string;
}

export interface DeckDiffCommandDependencies {
  /** Working directory commands resolve paths and discover configuration from. */
  readonly cwd?: () => string;
  readonly createRevisionLoader?: (repository: string, logger: StructuredLogger) => RevisionLoader;
  readonly clock?: { now(): number };
}

interface PreparedRun {
  readonly cwd: string;
  readonly report: ReportCommandOptions;
  readonly logger: StructuredLogger;
  readonly diagnostics: DiagnosticsPort;
  readonly io: CliIo;
  readonly clock?: { now(): number };
}

const DEFAULT_REVISION = 'HEAD';

/**
 * Creates the module registering `commit` and `compare`. Dependencies exist for tests;
 * the defaults read git through the real command line.
 */
export const createDeckDiffCommandModule = (
  dependencies: DeckDiffCommandDependencies = {},
): CliCommandModule => ({
  id: 'deck-diff',
  register(program, context) {
    const commitCommand = program
      .command('commit')
      .summary('Render the deck changes made by a commit.')
      .description(
        'Compare every deck.json changed by a commit (or the one given with --deck-path) ' +
          'with its parent revision and render a visual report.',
      )
      .option('--repo <dir>', 'Directory inside the repository.', '.')
      .option('--commit <rev>', 'Commit to render.', DEFAULT_REVISION)
      .option('--deck-path <path>', 'Repository-relative deck.json to compare.');
    registerReportOptions(commitCommand);

    commitCommand.action(async (_options: unknown, command: Command) => {
      await runReportingCommand(command, context, dependencies, async (run) => {
        const options = command.opts<CommanderCommitOptions>();
        const repository = resolveRepository(run.cwd, options.repo);
        const loader = (dependencies.createRevisionLoader ?? createGitRevisionLoader)(
          repository,
          run.logger,
        );

        await executeCommitCommand({
          ...run,
          loader,
          revision: options.commit ?? DEFAULT_REVISION,
          ...(options.deckPath === undefined ? {} : { deckPath: options.deckPath }),
        });
      });
    });

    const compareCommand = program
      .command('compare')
      .summary('Render the differences between two deck files.')
      .description('Compare two CrowdAnki deck.json files on disk and render a visual report.')
      .argument('<previous>', 'Path of the previous deck.json.')
      .argument('<next>', 'Path of the next deck.json.');
    registerReportOptions(compareCommand);

    compareCommand.action(
      async (previous: string, next: string, _options: unknown, command: Command) => {
        await runReportingCommand(command, context, dependencies, async (run) => {
          await executeCompareCommand({ ...run, previous, next });
        });
      },
    );
  },
});

export const deckDiffCommandModule: CliCommandModule = createDeckDiffCommandModule();

const runReportingCommand = async (
  command: Command,
  context: CliKernelContext,
  dependencies: DeckDiffCommandDependencies,
  execute: (run: PreparedRun) => Promise<void>,
): Promise<void> => {
  const { io } = context;
  const cwd = (dependencies.cwd ?? process.cwd)();
  const options = command.opts<CommanderReportOptions>();
  const logger = createCliLogger(context.getGlobalOptions().logFormat, io);
  const log = createComponentLogger(logger, 'deck-diff.cli', { command: command.name() });

  try {
    const config = await loadDeckDiffConfig({
      cwd,
      ...(options.config === undefined ? {} : { configPath: options.config }),
    });
    const report = resolveReportOptions({
      options,
      config,
      cwd,
      mediaExplicit: command.getOptionValueSource('media') === 'cli',
    });
    log.debug('options.resolved', {
      ...(config.path === undefined ? {} : { config: config.path }),
      format: report.format,
      output: report.outputPath ?? 'stdout',
    });

    await execute({
      cwd,
      report,
      io,
      logger,
      diagnostics: createCliDiagnosticsPort(
        { quiet: report.quiet, color: io.interactive },
        io,
      ),
      ...(dependencies.clock === undefined ? {} : { clock: dependencies.clock }),
    });
  } catch (error) {
    log.error('run.failed', { error: serialiseError(error) });
    if (!isInputFailure(error)) {
      throw error;
    }

    context.fail(error.message);
  }
};

const resolveRepository = (cwd: string, repo: string | undefined): string =>
  repo === undefined ? cwd : path.resolve(cwd, repo);

const createGitRevisionLoader = (repository: string, logger: StructuredLogger): RevisionLoader =>
  new GitRevisionLoader({ repository, logger });
