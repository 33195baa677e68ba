import type { ContentChange, FieldChangeKind, NoteChangeKind } from '../../domain/changes.js';
import type { RenderVariant } from '../../domain/deck.js';
import type { ReportEntry, ReportSummary } from '../assembler.js';
import { summarizeReport } from '../assembler.js';
import type { ReportRunContext } from '../run-context.js';

export const REPORT_SCHEMA_VERSION = 1;

export interface JsonFormatterOptions {
  readonly runContext?: ReportRunContext;
  /** Fixed report timestamp; defaults to the time of formatting. */
  readonly generatedAt?: Date;
  readonly pretty?: boolean;
}

export interface DeckDiffJsonRunContext {
  readonly previous?: string;
  readonly next?: string;
  readonly deckPath?: string;
  readonly commit?: {
    readonly hash: string;
    readonly subject: string;
    readonly author: string;
    readonly date: string;
  };
  readonly startedAt?: string;
  readonly durationMs?: number;
}

export interface DeckDiffJsonField {
  readonly index: number;
  readonly name: string;
  readonly kind: FieldChangeKind;
  readonly previous: string | null;
  readonly next: string | null;
  readonly classification: ContentChange | null;
}

export interface DeckDiffJsonEntry {
  readonly kind: NoteChangeKind;
  readonly guid: string;
  readonly deckPath: string;
  readonly model: string;
  readonly variant: RenderVariant;
  readonly contentChange: ContentChange;
  readonly cosmeticOnly: boolean;
  readonly tags: readonly string[];
  readonly tagsAdded: readonly string[];
  readonly tagsRemoved: readonly string[];
  readonly fields: readonly DeckDiffJsonField[];
  readonly beforeHtml: string | null;
  readonly afterHtml: string | null;
}

export interface DeckDiffJson {
  readonly reportSchemaVersion: number;
  readonly generatedAt: string;
  readonly run?: DeckDiffJsonRunContext;
  readonly summary: ReportSummary;
  readonly entries: readonly DeckDiffJsonEntry[];
}

/**
 * Builds the machine-readable report payload. Cosmetic-only entries are always included;
 * consumers filter on `cosmeticOnly`.
 *
 * @param entries - Report entries in display order.
 * @param options - Run metadata and timestamp.
 * @returns The JSON payload.
 */
export function createJsonPayload(
  entries: readonly ReportEntry[],
  options: JsonFormatterOptions = {},
): DeckDiffJson {
  const run = options.runContext === undefined ? undefined : createRunPayload(options.runContext);

  return {
    reportSchemaVersion: REPORT_SCHEMA_VERSION,
    generatedAt: (options.generatedAt ?? new Date()).toISOString(),
    ...(run === undefined ? {} : { run }),
    summary: summarizeReport(entries),
    entries: entries.map((entry) => createEntryPayload(entry)),
  };
}

/**
 * Serialises the report payload as JSON text.
 *
 * @param entries - Report entries in display order.
 * @param options - Run metadata, timestamp and indentation.
 * @returns JSON text terminated by a newline.
 */
export function formatReportAsJson(
  entries: readonly ReportEntry[],
  options: JsonFormatterOptions = {},
): string {
  const payload = createJsonPayload(entries, options);
  return `${JSON.stringify(payload, null, options.pretty === false ? undefined : 2)}\n`;
}

function createRunPayload(context: ReportRunContext): DeckDiffJsonRunContext {
  const { commit } = context;

  return {
    ...(context.previous === undefined ? {} : { previous: context.previous }),
    ...(context.next === undefined ? {} : { next: context.next }),
    ...(context.deckPath === undefined ? {} : { deckPath: context.deckPath }),
    ...(commit === undefined
      ? {}
      : {
          commit: {
            hash: commit.hash,
            subject: commit.subject,
            author: commit.author,
            date: commit.date,
          },
        }),
    ...(context.startedAt === undefined ? {} : { startedAt: context.startedAt }),
    ...(context.durationMs === undefined ? {} : { durationMs: context.durationMs }),
  };
}

function createEntryPayload(entry: ReportEntry): DeckDiffJsonEntry {
  return {
    kind: entry.changeKind,
    guid: entry.guid,
    deckPath: entry.deckPath,
    model: entry.modelName,
    variant: entry.variant,
    contentChange: entry.contentChange,
    cosmeticOnly: entry.cosmeticOnly,
    tags: entry.tags,
    tagsAdded: entry.tagDelta.added,
    tagsRemoved: entry.tagDelta.removed,
    fields: entry.fieldDiffs
      .filter((diff) => diff.kind !== 'unchanged')
      .map((diff) => ({
        index: diff.index,
        name: diff.name,
        kind: diff.kind,
        previous: diff.previous ?? null,
        next: diff.next ?? null,
        classification: diff.classification?.change ?? null,
      })),
    beforeHtml: entry.beforeHtml ?? null,
    afterHtml: entry.afterHtml ?? null,
  };
}
