import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  formatCount,
  type DiagnosticsPort,
  type StructuredLogger,
} from '@deckdiff/core';
import {
  createRunContext,
  FileSystemMediaHandler,
  formatReportAsHtml,
  formatReportAsJson,
  runDeckDiffSession,
  summarizeReport,
  type CommitInfo,
  type DeckSnapshotSourcePort,
  type ReportEntry,
  type ReportRunContext,
} from '@deckdiff/diff';

import type { CliIo } from '../../io/cli-io.js';
import type { ReportCommandOptions } from './report-options.js';

export interface DeckDiffTarget {
  readonly source: DeckSnapshotSourcePort;
  /** Directory of the deck file; its `media/` folder supplies referenced media. */
  readonly deckDirectory: string;
}

export interface DeckDiffRunLabels {
  readonly previous?: string;
  readonly next?: string;
  readonly deckPath?: string;
  readonly commit?: CommitInfo;
}

export interface ExecuteDeckDiffReportOptions {
  readonly targets: readonly DeckDiffTarget[];
  readonly labels: DeckDiffRunLabels;
  readonly report: ReportCommandOptions;
  readonly io: CliIo;
  readonly logger: StructuredLogger;
  readonly diagnostics: DiagnosticsPort;
  readonly cwd: string;
  readonly clock?: { now(): number };
}

export type DeckDiffReportOutcome =
  | { readonly status: 'unchanged' }
  | {
      readonly status: 'written';
      readonly entries: readonly ReportEntry[];
      /** Absent when the report went to stdout. */
      readonly outputPath?: string;
    };

/**
 * Diffs every target, then renders one report over all of their entries. Nothing is
 * written until every target has been diffed: media is copied and the report saved only
 * once the whole run succeeded.
 */
export const executeDeckDiffReport = async (
  options: ExecuteDeckDiffReportOptions,
): Promise<DeckDiffReportOutcome> => {
  const { report, io } = options;
  const clock = options.clock ?? { now: () => performance.now() };
  const startedAt = new Date();
  const started = clock.now();
  const entries: ReportEntry[] = [];
  const mediaHandlers: FileSystemMediaHandler[] = [];

  for (const target of options.targets) {
    const media = createMediaResolver(target, report, options.logger);
    const session = await runDeckDiffSession(
      {
        snapshotSource: target.source,
        diagnostics: options.diagnostics,
        logger: options.logger,
        clock,
        ...(media === undefined ? {} : { media }),
      },
      {},
    );
    entries.push(...session.entries);
    if (media !== undefined) {
      mediaHandlers.push(media);
    }
  }

  if (entries.length === 0) {
    if (!report.quiet) {
      io.writeErr('No changes detected.\n');
    }
    return { status: 'unchanged' };
  }

  const runContext = createRunContext({
    ...options.labels,
    startedAt,
    durationMs: clock.now() - started,
  });
  const rendered = renderReport(entries, report, runContext);

  if (report.outputPath === undefined) {
    io.writeOut(rendered);
  } else {
    for (const handler of mediaHandlers) {
      await handler.publish();
    }
    await mkdir(path.dirname(report.outputPath), { recursive: true });
    await writeFile(report.outputPath, rendered, 'utf8');
  }

  if (!report.quiet) {
    writeRunSummary(entries, report, options);
  }

  return {
    status: 'written',
    entries,
    ...(report.outputPath === undefined ? {} : { outputPath: report.outputPath }),
  };
};

const createMediaResolver = (
  target: DeckDiffTarget,
  report: ReportCommandOptions,
  logger: StructuredLogger,
): FileSystemMediaHandler | undefined => {
  if (!report.media || report.outputPath === undefined) {
    return undefined;
  }

  return new FileSystemMediaHandler({
    deckDirectory: target.deckDirectory,
    outputDirectory: path.dirname(report.outputPath),
    logger,
  });
};

const renderReport = (
  entries: readonly ReportEntry[],
  report: ReportCommandOptions,
  runContext: ReportRunContext,
): string => {
  if (report.format === 'json') {
    return formatReportAsJson(entries, { runContext });
  }

  return formatReportAsHtml(entries, {
    runContext,
    showCosmetic: report.showCosmetic,
    ...(report.title === undefined ? {} : { title: report.title }),
  });
};

const writeRunSummary = (
  entries: readonly ReportEntry[],
  report: ReportCommandOptions,
  options: ExecuteDeckDiffReportOptions,
): void => {
  const summary = summarizeReport(entries);
  const breakdown = `${String(summary.added)} added, ${String(summary.modified)} modified, ${String(summary.removed)} removed`;
  const destination =
    report.outputPath === undefined
      ? 'stdout'
      : path.relative(options.cwd, report.outputPath) || report.outputPath;

  options.io.writeErr(
    `Found ${formatCount(summary.total, 'changed note')} (${breakdown}); report written to ${destination}.\n`,
  );

  if (report.format === 'html' && !report.showCosmetic && summary.cosmeticOnly > 0) {
    options.io.writeErr(
      `${formatCount(summary.cosmeticOnly, 'cosmetic-only change')} hidden; pass --show-cosmetic to include them.\n`,
    );
  }
};
