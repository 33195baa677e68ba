import {
  DiagnosticCategories,
  escapeHtml,
  formatRenderingScope,
  type DiagnosticsPort,
} from '@deckdiff/core';

import type { Note, NoteModel } from '../domain/deck.js';
import { TemplateRenderError } from '../domain/errors.js';
import type { CardSide } from '../templating/cloze.js';
import type { NoteRenderer, NoteRenderOptions } from './note-renderer.js';

export const TEMPLATE_RENDER_FAILED = 'TEMPLATE_RENDER_FAILED';

/**
 * Renders a note, replacing a template syntax failure with an inline placeholder so the
 * rest of the report still renders. Any other error propagates.
 *
 * @param renderer - Renderer selected for the note's model.
 * @param note - Note to render.
 * @param model - The note's model.
 * @param side - Card side.
 * @param options - Render options forwarded to the renderer.
 * @param diagnostics - Receives a warning for every placeholder produced.
 * @returns The rendered fragment or the error placeholder.
 */
export function renderNoteSafely(
  renderer: NoteRenderer,
  note: Note,
  model: NoteModel,
  side: CardSide,
  options: NoteRenderOptions,
  diagnostics?: DiagnosticsPort,
): string {
  try {
    return renderer.render(note, model, side, options);
  } catch (error) {
    if (!(error instanceof TemplateRenderError)) {
      throw error;
    }

    diagnostics?.emit({
      level: 'warn',
      code: TEMPLATE_RENDER_FAILED,
      category: DiagnosticCategories.rendering,
      scope: formatRenderingScope(note.guid),
      message: `Could not render ${side} of note ${note.guid} (${model.name}): ${error.message}`,
      details: { guid: note.guid, model: model.name, tag: error.tag, offset: error.offset },
    });

    return renderErrorPlaceholder(error);
  }
}

export function renderErrorPlaceholder(error: TemplateRenderError): string {
  return `<div class="render-error">Template error: ${escapeHtml(error.message)}</div>`;
}
