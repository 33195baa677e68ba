import {
  createComponentLogger,
  createNullDiagnosticsPort,
  DiagnosticCategories,
  DiagnosticScopes,
  noopLogger,
  type DiagnosticsPort,
  type StructuredLogger,
} from '@deckdiff/core';

import type { NoteChange } from '../domain/changes.js';
import type { DeckSnapshot } from '../domain/deck.js';
import { computeNoteChanges, type NoteDifferOptions } from '../domain/note-differ.js';
import { createRenderContext } from '../rendering/render-context.js';
import {
  assembleReport,
  summarizeReport,
  type ReportEntry,
  type ReportSummary,
} from '../reporting/assembler.js';
import { collectMediaReferences } from '../reporting/media-references.js';
import type { MediaResolution, MediaResolverPort } from './ports/media.js';
import type { DeckSnapshotSourcePort, SnapshotLabel } from './ports/revision-loader.js';
import { loadDeckSnapshots } from './snapshot-loader.js';

export interface DeckDiffSessionDependencies {
  readonly snapshotSource: DeckSnapshotSourcePort;
  readonly media?: MediaResolverPort;
  readonly diagnostics?: DiagnosticsPort;
  readonly logger?: StructuredLogger;
  readonly clock?: { now(): number };
}

export interface DeckDiffSessionRequest {
  readonly differ?: NoteDifferOptions;
}

export interface DeckDiffSessionResult {
  readonly previous: DeckSnapshot;
  readonly next: DeckSnapshot;
  readonly missing: readonly SnapshotLabel[];
  readonly changes: readonly NoteChange[];
  readonly entries: readonly ReportEntry[];
  readonly summary: ReportSummary;
  readonly media?: MediaResolution;
  readonly durationMs: number;
}

/**
 * Runs one comparison: loads and parses both snapshots, computes note changes, resolves
 * referenced media and assembles the rendered report entries. Nothing is written; the
 * caller hands the result to a report writer once the whole run has succeeded.
 *
 * @param dependencies - Snapshot source, optional media resolver, diagnostics and logger.
 * @param request - Differ options.
 * @returns The assembled report with the data it was built from.
 */
export async function runDeckDiffSession(
  dependencies: DeckDiffSessionDependencies,
  request: DeckDiffSessionRequest = {},
): Promise<DeckDiffSessionResult> {
  const clock = dependencies.clock ?? { now: () => performance.now() };
  const log = createComponentLogger(dependencies.logger ?? noopLogger, 'deck-diff.session');
  const diagnostics = dependencies.diagnostics ?? createNullDiagnosticsPort();
  const started = clock.now();

  const { previous, next, missing } = await loadDeckSnapshots(dependencies.snapshotSource, {
    diagnostics,
  });
  log.info(
    'snapshots.loaded',
    {
      previous: dependencies.snapshotSource.describe('previous'),
      next: dependencies.snapshotSource.describe('next'),
      missing,
    },
    clock.now() - started,
  );

  const changes = computeNoteChanges(previous, next, request.differ);
  log.info(
    'changes.computed',
    {
      added: changes.filter((change) => change.kind === 'added').length,
      modified: changes.filter((change) => change.kind === 'modified').length,
      removed: changes.filter((change) => change.kind === 'removed').length,
    },
    clock.now() - started,
  );

  const media = await resolveMedia(changes, dependencies.media, diagnostics);
  const entries = assembleReport(changes, createRenderContext([previous, next]), {
    ...(media === undefined ? {} : { mediaPaths: media.paths }),
    diagnostics,
  });
  const durationMs = clock.now() - started;
  log.info('report.assembled', { entries: entries.length }, durationMs);

  return {
    previous,
    next,
    missing,
    changes,
    entries,
    summary: summarizeReport(entries),
    ...(media === undefined ? {} : { media }),
    durationMs,
  };
}

async function resolveMedia(
  changes: readonly NoteChange[],
  media: MediaResolverPort | undefined,
  diagnostics: DiagnosticsPort,
): Promise<MediaResolution | undefined> {
  if (media === undefined || changes.length === 0) {
    return undefined;
  }

  const resolution = await media.resolve(collectMediaReferences(changes));
  for (const name of resolution.missing) {
    diagnostics.emit({
      level: 'warn',
      scope: DiagnosticScopes.media,
      code: 'MEDIA_NOT_FOUND',
      category: DiagnosticCategories.media,
      message: `Referenced media file not found: ${name}`,
    });
  }

  return resolution;
}

export { SnapshotLoadError } from './snapshot-loader.js';
