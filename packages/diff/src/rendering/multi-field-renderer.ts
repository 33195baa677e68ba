import { escapeHtml } from '@deckdiff/core';

import type { Note, NoteModel } from '../domain/deck.js';
import type { CardSide } from '../templating/cloze.js';
import type { NoteRenderer, NoteRenderOptions } from './note-renderer.js';

/**
 * Renders every field of the note as a labelled grid cell, ignoring card templates and
 * the front/back split. Cells of changed fields carry the `--changed` modifier.
 */
export class MultiFieldNoteRenderer implements NoteRenderer {
  readonly variant = 'multi-field';
  readonly sided = false;

  render(note: Note, model: NoteModel, _side: CardSide, options: NoteRenderOptions = {}): string {
    const changed = options.changedFieldIndices ?? new Set<number>();
    const cells = model.fieldNames.map((name, index) => {
      const modifier = changed.has(index) ? ' field-grid__cell--changed' : '';
      return (
        `<div class="field-grid__cell${modifier}" data-field-index="${String(index)}">` +
        `<div class="field-grid__label">${escapeHtml(name)}</div>` +
        `<div class="field-grid__value">${note.fields[index] ?? ''}</div>` +
        `</div>`
      );
    });

    return `<div class="field-grid">${cells.join('')}</div>`;
  }
}
