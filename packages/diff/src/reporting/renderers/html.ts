import { readFileSync } from 'node:fs';

import Handlebars from 'handlebars';

import { formatCount } from '@deckdiff/core';

import type { FieldDiff } from '../../domain/changes.js';
import type { ReportEntry, ReportSummary } from '../assembler.js';
import { summarizeReport } from '../assembler.js';
import { highlightFieldDiff } from '../highlight.js';
import {
  CHANGE_KIND_LABELS,
  CONTENT_CHANGE_LABELS,
  FIELD_CHANGE_LABELS,
  VARIANT_LABELS,
} from '../labels.js';
import {
  describeRunComparison,
  formatRunDuration,
  formatRunTimestamp,
  type ReportRunContext,
} from '../run-context.js';

export interface HtmlFormatterOptions {
  readonly title?: string;
  /** Include entries whose edits are all cosmetic. Hidden by default. */
  readonly showCosmetic?: boolean;
  readonly runContext?: ReportRunContext;
}

interface HtmlHeaderModel {
  readonly title: string;
  readonly comparison: string;
  readonly deckPath: string;
  readonly commit: HtmlCommitModel | false;
  readonly startedAt: string;
  readonly duration: string;
}

interface HtmlCommitModel {
  readonly shortHash: string;
  readonly subject: string;
  readonly author: string;
  readonly date: string;
}

interface HtmlCountModel {
  readonly label: string;
  readonly value: number;
  readonly modifier: string;
}

interface HtmlSummaryModel {
  readonly headline: string;
  readonly counts: readonly HtmlCountModel[];
  readonly cosmetic: readonly HtmlCountModel[];
  readonly hiddenNotice: string;
}

interface HtmlFieldModel {
  readonly name: string;
  readonly kind: string;
  readonly kindLabel: string;
  readonly classification: string;
  readonly previousHtml: string;
  readonly nextHtml: string;
}

interface HtmlEntryModel {
  readonly anchor: string;
  readonly changeKind: string;
  readonly changeLabel: string;
  readonly guid: string;
  readonly deckPath: string;
  readonly modelName: string;
  readonly variantLabel: string;
  readonly contentLabel: string;
  readonly cosmeticOnly: boolean;
  readonly beforeHtml: string;
  readonly afterHtml: string;
  readonly hasBefore: boolean;
  readonly hasAfter: boolean;
  readonly fields: readonly HtmlFieldModel[];
  readonly tags: string;
  readonly tagsAdded: string;
  readonly tagsRemoved: string;
}

interface HtmlTemplateContext {
  readonly styles: string;
  readonly header: HtmlHeaderModel;
  readonly summary: HtmlSummaryModel;
  readonly entries: readonly HtmlEntryModel[];
  readonly hasEntries: boolean;
}

const DEFAULT_TITLE = 'Deck changes';
const TEMPLATE_ROOT = new URL('../templates/', import.meta.url);

/**
 * Renders assembled report entries as a standalone HTML page. Note markup is inserted as
 * rendered; every other value is escaped by the page template.
 *
 * @param entries - Report entries in display order.
 * @param options - Page title, cosmetic visibility and run metadata.
 * @returns The HTML document.
 */
export function formatReportAsHtml(
  entries: readonly ReportEntry[],
  options: HtmlFormatterOptions = {},
): string {
  const showCosmetic = options.showCosmetic ?? false;
  const visible = showCosmetic ? entries : entries.filter((entry) => !entry.cosmeticOnly);
  const summary = summarizeReport(entries);

  const template = compileHtmlTemplate();
  return template({
    styles: readTemplateAsset('report.css').trim(),
    header: createHeaderModel(options.title ?? DEFAULT_TITLE, options.runContext),
    summary: createSummaryModel(summary, entries.length - visible.length),
    entries: visible.map((entry, index) => createEntryModel(entry, index)),
    hasEntries: visible.length > 0,
  });
}

function compileHtmlTemplate(): Handlebars.TemplateDelegate<HtmlTemplateContext> {
  const environment = Handlebars.create();
  environment.registerPartial('summary', readTemplateAsset('partials/summary.hbs'));
  environment.registerPartial('note-entry', readTemplateAsset('partials/note-entry.hbs'));
  environment.registerPartial('field-table', readTemplateAsset('partials/field-table.hbs'));

  return environment.compile<HtmlTemplateContext>(readTemplateAsset('deck-diff-report.hbs'), {
    strict: true,
  });
}

function readTemplateAsset(relativePath: string): string {
  return readFileSync(new URL(relativePath, TEMPLATE_ROOT), 'utf8');
}

function createHeaderModel(title: string, context: ReportRunContext | undefined): HtmlHeaderModel {
  const commit = context?.commit;

  return {
    title,
    comparison: describeRunComparison(context) ?? '',
    deckPath: context?.deckPath ?? '',
    commit:
      commit === undefined
        ? false
        : {
            shortHash: commit.shortHash,
            subject: commit.subject,
            author: commit.author,
            date: commit.date,
          },
    startedAt: formatRunTimestamp(context) ?? '',
    duration: formatRunDuration(context) ?? '',
  };
}

function createSummaryModel(summary: ReportSummary, hidden: number): HtmlSummaryModel {
  const cosmetic = Object.entries(summary.cosmetic)
    .filter(([, value]) => value > 0)
    .map(([kind, value]) => ({
      label: isContentChangeLabelKey(kind) ? CONTENT_CHANGE_LABELS[kind] : kind,
      value,
      modifier: 'cosmetic',
    }));

  return {
    headline:
      summary.total === 0 ? 'No changes detected' : formatCount(summary.total, 'changed note'),
    counts: [
      { label: 'Added', value: summary.added, modifier: 'added' },
      { label: 'Modified', value: summary.modified, modifier: 'modified' },
      { label: 'Removed', value: summary.removed, modifier: 'removed' },
      { label: 'Content changes', value: summary.content, modifier: 'content' },
      { label: 'Cosmetic only', value: summary.cosmeticOnly, modifier: 'cosmetic' },
    ],
    cosmetic,
    hiddenNotice: hidden === 0 ? '' : `${formatCount(hidden, 'cosmetic-only note')} hidden.`,
  };
}

function createEntryModel(entry: ReportEntry, index: number): HtmlEntryModel {
  return {
    anchor: `note-${String(index + 1)}`,
    changeKind: entry.changeKind,
    changeLabel: CHANGE_KIND_LABELS[entry.changeKind],
    guid: entry.guid,
    deckPath: entry.deckPath,
    modelName: entry.modelName,
    variantLabel: VARIANT_LABELS[entry.variant],
    contentLabel: entry.changeKind === 'modified' ? CONTENT_CHANGE_LABELS[entry.contentChange] : '',
    cosmeticOnly: entry.cosmeticOnly,
    beforeHtml: entry.beforeHtml ?? '',
    afterHtml: entry.afterHtml ?? '',
    hasBefore: entry.beforeHtml !== undefined,
    hasAfter: entry.afterHtml !== undefined,
    fields: entry.fieldDiffs
      .filter((diff) => diff.kind !== 'unchanged')
      .map((diff) => createFieldModel(diff)),
    tags: entry.tags.join(' '),
    tagsAdded: entry.changeKind === 'modified' ? entry.tagDelta.added.join(' ') : '',
    tagsRemoved: entry.changeKind === 'modified' ? entry.tagDelta.removed.join(' ') : '',
  };
}

function createFieldModel(diff: FieldDiff): HtmlFieldModel {
  const { previousHtml, nextHtml } = highlightFieldDiff(diff.previous, diff.next);
  const classification = diff.classification;

  return {
    name: diff.name,
    kind: diff.kind,
    kindLabel: FIELD_CHANGE_LABELS[diff.kind],
    classification:
      classification === undefined || classification.change === 'content'
        ? ''
        : CONTENT_CHANGE_LABELS[classification.change],
    previousHtml,
    nextHtml,
  };
}

function isContentChangeLabelKey(value: string): value is keyof typeof CONTENT_CHANGE_LABELS {
  return Object.hasOwn(CONTENT_CHANGE_LABELS, value);
}
