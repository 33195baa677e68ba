import {
  DiagnosticCategories,
  formatSnapshotScope,
  describeError,
  type DiagnosticsPort,
} from '@deckdiff/core';

import { createEmptySnapshot, type DeckSnapshot } from '../domain/deck.js';
import { NoParentRevisionError, SnapshotNotFoundError } from '../domain/errors.js';
import { parseDeckJson } from '../parsing/deck-parser.js';
import type {
  DeckSnapshotSourcePort,
  SnapshotLabel,
  SnapshotSourceContext,
} from './ports/revision-loader.js';

export interface SnapshotLoadFailure {
  readonly label: SnapshotLabel;
  readonly description: string;
  readonly cause: unknown;
}

export class SnapshotLoadError extends Error {
  override readonly name = 'SnapshotLoadError';
  readonly failures: readonly SnapshotLoadFailure[];

  constructor(failures: readonly SnapshotLoadFailure[]) {
    super(formatLoadFailureSummary(failures));
    Object.setPrototypeOf(this, new.target.prototype);
    this.failures = failures;
  }
}

export interface LoadDeckSnapshotsResult {
  readonly previous: DeckSnapshot;
  readonly next: DeckSnapshot;
  /** Sides whose deck file did not exist and were replaced by an empty deck. */
  readonly missing: readonly SnapshotLabel[];
}

export interface LoadDeckSnapshotsOptions {
  readonly diagnostics?: DiagnosticsPort;
}

type SideOutcome =
  | { readonly status: 'loaded'; readonly snapshot: DeckSnapshot }
  | { readonly status: 'missing'; readonly failure: SnapshotLoadFailure }
  | { readonly status: 'failed'; readonly failure: SnapshotLoadFailure };

/**
 * Loads and parses both deck snapshots. Both sides are attempted before failing so every
 * problem is reported at once. A deck file missing on exactly one side becomes an empty
 * deck, as happens when a commit adds or deletes the file.
 *
 * @param source - Port supplying the raw deck text.
 * @param options - Optional diagnostics sink.
 * @returns Both parsed snapshots.
 * @throws {NoParentRevisionError} As soon as the source reports it.
 * @throws {SnapshotLoadError} When either side failed, or both sides are missing.
 */
export async function loadDeckSnapshots(
  source: DeckSnapshotSourcePort,
  options: LoadDeckSnapshotsOptions = {},
): Promise<LoadDeckSnapshotsResult> {
  const context: SnapshotSourceContext | undefined =
    options.diagnostics === undefined ? undefined : { diagnostics: options.diagnostics };

  const previous = await loadSide('previous', source, context, options.diagnostics);
  const next = await loadSide('next', source, context, options.diagnostics);
  const outcomes = [previous, next];

  const failures = outcomes.flatMap((outcome) =>
    outcome.status === 'failed' ? [outcome.failure] : [],
  );
  const missing = outcomes.flatMap((outcome) =>
    outcome.status === 'missing' ? [outcome.failure] : [],
  );

  if (failures.length > 0 || missing.length === outcomes.length) {
    throw new SnapshotLoadError([...failures, ...missing]);
  }

  return {
    previous: previous.status === 'loaded' ? previous.snapshot : createEmptySnapshot(),
    next: next.status === 'loaded' ? next.snapshot : createEmptySnapshot(),
    missing: missing.map((failure) => failure.label),
  };
}

async function loadSide(
  label: SnapshotLabel,
  source: DeckSnapshotSourcePort,
  context: SnapshotSourceContext | undefined,
  diagnostics: DiagnosticsPort | undefined,
): Promise<SideOutcome> {
  try {
    const text = await source.load(label, context);
    return { status: 'loaded', snapshot: parseDeckJson(text) };
  } catch (error) {
    if (error instanceof NoParentRevisionError) {
      throw error;
    }

    const failure: SnapshotLoadFailure = {
      label,
      description: safeDescribe(source, label),
      cause: error,
    };

    if (error instanceof SnapshotNotFoundError) {
      diagnostics?.emit({
        level: 'info',
        scope: formatSnapshotScope(label),
        code: 'DECK_FILE_MISSING',
        category: DiagnosticCategories.deckSource,
        message: `No ${label} deck at ${failure.description}; treating it as empty.`,
      });
      return { status: 'missing', failure };
    }

    diagnostics?.emit({
      level: 'error',
      scope: formatSnapshotScope(label),
      code: 'DECK_LOAD_FAILED',
      category: DiagnosticCategories.deckSource,
      message: `Failed to load ${label} deck from ${failure.description}: ${formatFailureCause(error)}`,
    });
    return { status: 'failed', failure };
  }
}

function safeDescribe(source: DeckSnapshotSourcePort, label: SnapshotLabel): string {
  try {
    return source.describe(label);
  } catch (error) {
    return `(unavailable: ${describeError(error)})`;
  }
}

function formatLoadFailureSummary(failures: readonly SnapshotLoadFailure[]): string {
  if (failures.length === 0) {
    return 'Failed to load deck snapshots.';
  }

  const details = failures
    .map(
      (failure) =>
        `- ${failure.label} (${failure.description}): ${formatFailureCause(failure.cause)}`,
    )
    .join('\n');
  return `Failed to load deck snapshots:\n${details}`;
}

function formatFailureCause(cause: unknown): string {
  const message = cause instanceof Error ? cause.message : String(cause);
  const [first = '', ...rest] = message.replaceAll(/\r?\n/g, '\n').split('\n');
  return [first, ...rest.map((line) => `  ${line}`)].join('\n');
}
