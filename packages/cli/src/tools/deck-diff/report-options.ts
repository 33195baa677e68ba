import path from 'node:path';

import { InvalidArgumentError, type Command } from 'commander';

import type { LoadedDeckDiffConfig } from './config.js';

export type ReportFormat = 'html' | 'json';

/** `--output` value that sends the report to stdout. */
export const STDOUT_TARGET = '-';

const DEFAULT_OUTPUT_NAME = 'deck-diff';

export interface CommanderReportOptions {
  readonly output?: string;
  readonly format?: ReportFormat;
  readonly media?: boolean;
  readonly showCosmetic?: boolean;
  readonly title?: string;
  readonly config?: string;
  readonly quiet?: boolean;
}

export interface ReportCommandOptions {
  readonly format: ReportFormat;
  /** Absolute report path; the report goes to stdout when absent. */
  readonly outputPath?: string;
  readonly media: boolean;
  readonly showCosmetic: boolean;
  readonly title?: string;
  readonly quiet: boolean;
}

export interface ResolveReportOptionsInput {
  readonly options: CommanderReportOptions;
  readonly config: LoadedDeckDiffConfig;
  readonly cwd: string;
  /** Whether `--no-media` came from the command line rather than commander's default. */
  readonly mediaExplicit: boolean;
}

export const parseReportFormat = (value: string): ReportFormat => {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'html' || normalized === 'json') {
    return normalized;
  }

  throw new InvalidArgumentError(`Unknown report format "${value}". Expected one of: html, json.`);
};

/**
 * Adds the report options shared by every deck-diff command.
 */
export const registerReportOptions = (command: Command): Command =>
  command
    .option('--output <file>', `Write the report to this file ("${STDOUT_TARGET}" for stdout).`)
    .option('--format <format>', 'Report format (html, json).', parseReportFormat)
    .option('--no-media', 'Do not copy referenced media files next to the report.')
    .option('--show-cosmetic', 'Show cosmetic-only changes in the HTML report.')
    .option('--title <text>', 'Title of the HTML report.')
    .option('--config <file>', 'Path to a deckdiff configuration file.')
    .option('--quiet', 'Suppress diagnostics and progress notices.');

/**
 * Merges command-line flags over configuration values and defaults. Flag paths resolve
 * against the working directory, configured paths against the configuration file.
 */
export const resolveReportOptions = (input: ResolveReportOptionsInput): ReportCommandOptions => {
  const { options, cwd } = input;
  const { config, directory } = input.config;

  const format = options.format ?? config.format ?? 'html';
  const outputPath = selectOutputPath(options.output, config.output, { cwd, directory, format });
  const media = (input.mediaExplicit ? options.media : undefined) ?? config.media ?? true;
  const title = options.title ?? config.title;

  return {
    format,
    ...(outputPath === undefined ? {} : { outputPath }),
    media,
    showCosmetic: options.showCosmetic ?? config.showCosmetic ?? false,
    ...(title === undefined ? {} : { title }),
    quiet: options.quiet ?? false,
  } satisfies ReportCommandOptions;
};

const selectOutputPath = (
  flag: string | undefined,
  configured: string | undefined,
  bases: { readonly cwd: string; readonly directory: string; readonly format: ReportFormat },
): string | undefined => {
  if (flag !== undefined) {
    return resolveOutputTarget(flag, bases.cwd);
  }

  if (configured !== undefined) {
    return resolveOutputTarget(configured, bases.directory);
  }

  return path.resolve(bases.cwd, `${DEFAULT_OUTPUT_NAME}.${bases.format}`);
};

const resolveOutputTarget = (target: string, base: string): string | undefined => {
  const trimmed = target.trim();
  if (trimmed === STDOUT_TARGET) {
    return undefined;
  }

  return path.resolve(base, trimmed);
};
