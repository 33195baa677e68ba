import type { DiagnosticsPort } from '@deckdiff/core';

import type {
  ContentChange,
  CosmeticKind,
  FieldDiff,
  NoteChange,
  NoteChangeKind,
  NoteLocation,
  TagDelta,
} from '../domain/changes.js';
import type { RenderVariant } from '../domain/deck.js';
import { TemplateRenderError } from '../domain/errors.js';
import type { NoteRenderOptions } from '../rendering/note-renderer.js';
import type { RenderContext } from '../rendering/render-context.js';
import { renderNoteSafely } from '../rendering/safe-render.js';
import { listClozeIndices } from '../templating/cloze.js';
import { rewriteMediaReferences } from './media-references.js';

export interface ReportEntry {
  readonly changeKind: NoteChangeKind;
  readonly guid: string;
  readonly deckPath: string;
  readonly modelName: string;
  readonly variant: RenderVariant;
  /** Rendered previous note; `undefined` for additions. */
  readonly beforeHtml: string | undefined;
  /** Rendered next note; `undefined` for removals. */
  readonly afterHtml: string | undefined;
  readonly fieldDiffs: readonly FieldDiff[];
  readonly tags: readonly string[];
  readonly tagDelta: TagDelta;
  readonly cosmeticOnly: boolean;
  readonly contentChange: ContentChange;
}

export interface AssembleReportOptions {
  /** Referenced media file name to output-relative path. */
  readonly mediaPaths?: ReadonlyMap<string, string>;
  readonly diagnostics?: DiagnosticsPort;
}

export interface ReportSummary {
  readonly total: number;
  readonly added: number;
  readonly modified: number;
  readonly removed: number;
  readonly content: number;
  readonly cosmeticOnly: number;
  readonly cosmetic: Readonly<Record<CosmeticKind | 'mixed-cosmetic', number>>;
}

const NO_TAG_CHANGES: TagDelta = Object.freeze({ added: [], removed: [] });

/**
 * Renders both sides of every note change and packages them as report entries in the
 * order of the changes. No files are read or written.
 *
 * @param changes - Ordered note changes from the differ.
 * @param context - Render context built from both snapshots.
 * @param options - Media path mapping and diagnostics sink.
 * @returns One entry per change.
 */
export function assembleReport(
  changes: readonly NoteChange[],
  context: RenderContext,
  options: AssembleReportOptions = {},
): readonly ReportEntry[] {
  return changes.map((change) => {
    const changedFields = new Set(
      change.kind === 'modified'
        ? change.fieldDiffs.filter((diff) => diff.kind !== 'unchanged').map((diff) => diff.index)
        : [],
    );
    const render = (location: NoteLocation): string =>
      renderLocation(location, changedFields, context, options);

    switch (change.kind) {
      case 'added': {
        return createEntry(change.next, {
          changeKind: 'added',
          beforeHtml: undefined,
          afterHtml: render(change.next),
          fieldDiffs: [],
          tagDelta: { added: change.next.note.tags, removed: [] },
        });
      }
      case 'removed': {
        return createEntry(change.previous, {
          changeKind: 'removed',
          beforeHtml: render(change.previous),
          afterHtml: undefined,
          fieldDiffs: [],
          tagDelta: { added: [], removed: change.previous.note.tags },
        });
      }
      case 'modified': {
        return {
          ...createEntry(change.next, {
            changeKind: 'modified',
            beforeHtml: render(change.previous),
            afterHtml: render(change.next),
            fieldDiffs: change.fieldDiffs,
            tagDelta: change.tags,
          }),
          cosmeticOnly: change.cosmeticOnly,
          contentChange: change.contentChange,
        };
      }
    }
  });
}

/**
 * Counts report entries by change kind and by content classification.
 *
 * @param entries - Assembled report entries.
 * @returns Totals for the report header.
 */
export function summarizeReport(entries: readonly ReportEntry[]): ReportSummary {
  const cosmetic: Record<CosmeticKind | 'mixed-cosmetic', number> = {
    whitespace: 0,
    entities: 0,
    'html-formatting': 0,
    case: 0,
    punctuation: 0,
    'mixed-cosmetic': 0,
  };
  const counts = { added: 0, modified: 0, removed: 0, content: 0, cosmeticOnly: 0 };

  for (const entry of entries) {
    counts[entry.changeKind] += 1;
    if (entry.cosmeticOnly && entry.contentChange !== 'content') {
      counts.cosmeticOnly += 1;
      cosmetic[entry.contentChange] += 1;
    } else {
      counts.content += 1;
    }
  }

  return { total: entries.length, ...counts, cosmetic };
}

function createEntry(
  location: NoteLocation,
  parts: Pick<ReportEntry, 'changeKind' | 'beforeHtml' | 'afterHtml' | 'fieldDiffs' | 'tagDelta'>,
): ReportEntry {
  return {
    ...parts,
    guid: location.note.guid,
    deckPath: location.deckPath,
    modelName: location.model.name,
    variant: location.model.variant,
    tags: location.note.tags,
    cosmeticOnly: false,
    contentChange: 'content',
  };
}

function renderLocation(
  location: NoteLocation,
  changedFieldIndices: ReadonlySet<number>,
  context: RenderContext,
  options: AssembleReportOptions,
): string {
  const { note, model } = location;
  const renderer = context.rendererFor(model);
  const revealedClozeIndex = model.variant === 'cloze' ? lowestClozeIndex(note.fields) : undefined;
  const renderOptions: NoteRenderOptions = {
    changedFieldIndices,
    ...(revealedClozeIndex === undefined ? {} : { revealedClozeIndex }),
  };

  let html: string;
  if (renderer.sided) {
    const front = renderNoteSafely(renderer, note, model, 'front', renderOptions, options.diagnostics);
    const back = renderNoteSafely(
      renderer,
      note,
      model,
      'back',
      { ...renderOptions, frontSideHtml: front },
      options.diagnostics,
    );
    html =
      `<div class="card">` +
      `<div class="card__side card__side--front">${front}</div>` +
      `<div class="card__side card__side--back">${back}</div>` +
      `</div>`;
  } else {
    html = renderNoteSafely(renderer, note, model, 'front', renderOptions, options.diagnostics);
  }

  return options.mediaPaths === undefined ? html : rewriteMediaReferences(html, options.mediaPaths);
}

function lowestClozeIndex(values: readonly string[]): number | undefined {
  try {
    return listClozeIndices(values)[0];
  } catch (error) {
    // The renderer reports the malformed marker through its placeholder.
    if (error instanceof TemplateRenderError) {
      return undefined;
    }
    throw error;
  }
}
