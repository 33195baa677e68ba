export type DiagnosticLevel = 'info' | 'warn' | 'error';

/**
 * Canonical diagnostic namespaces exposed as constants so emitters and tests stay consistent.
 */
export const DiagnosticCategories = {
  deckSource: 'deck-source',
  deckSourceGit: 'deck-source.git',
  deckSourceFile: 'deck-source.file',
  rendering: 'rendering',
  reporting: 'reporting',
  media: 'media',
} as const;

/**
 * Canonical diagnostic scopes. Snapshot scopes are derived from the snapshot label.
 */
export const DiagnosticScopes = {
  reportingHtml: 'reporting:html',
  reportingJson: 'reporting:json',
  media: 'media',
} as const;

/**
 * Formats a snapshot label into a deck source diagnostic scope.
 *
 * @param label - Either `previous` or `next`.
 * @returns The scoped diagnostic label.
 */
export function formatSnapshotScope(label: 'previous' | 'next'): string {
  return `deck-source:${label}`;
}

/**
 * Formats a note identifier into a rendering diagnostic scope.
 *
 * @param guid - The note GUID.
 * @returns The scoped diagnostic label.
 */
export function formatRenderingScope(guid: string): string {
  return `rendering:${guid}`;
}

/**
 * Discrete namespaces that downstream collectors can use to filter diagnostics.
 *
 * - `deck-source` – Loading and parsing of deck snapshots.
 * - `deck-source.git` – Revision lookups performed against git history.
 * - `deck-source.file` – Snapshots read straight from disk.
 * - `rendering` – Per-note template failures recovered with an inline placeholder.
 * - `reporting` – Report writers.
 * - `media` – Media collection and copying.
 */
export type DiagnosticCategory =
  | (typeof DiagnosticCategories)[keyof typeof DiagnosticCategories]
  | (string & {});

export interface DiagnosticEvent {
  readonly level: DiagnosticLevel;
  readonly message: string;
  readonly scope?: string;
  readonly code?: string;
  readonly category?: DiagnosticCategory;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface DiagnosticsPort<Event = DiagnosticEvent> {
  emit(event: Event): void;
}

/**
 * Creates a diagnostics port that ignores all emitted events.
 *
 * @returns A diagnostics port implementation that performs no I/O.
 */
export function createNullDiagnosticsPort<Event = DiagnosticEvent>(): DiagnosticsPort<Event> {
  return {
    emit() {
      // Intentionally empty: default no-op diagnostics implementation.
    },
  };
}

/**
 * Creates a diagnostics port that keeps every emitted event in memory.
 *
 * @returns The port together with the recorded events.
 */
export function createRecordingDiagnosticsPort(): DiagnosticsPort & {
  readonly events: readonly DiagnosticEvent[];
} {
  const events: DiagnosticEvent[] = [];

  return {
    emit(event) {
      events.push(event);
    },
    get events(): readonly DiagnosticEvent[] {
      return events;
    },
  };
}
