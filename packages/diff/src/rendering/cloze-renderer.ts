import type { TemplateRenderOptions } from '../templating/template-engine.js';
import type { NoteRenderOptions } from './note-renderer.js';
import { TemplateNoteRenderer } from './template-note-renderer.js';

/**
 * Renders cloze notes. The marker whose index matches `revealedClozeIndex` is blanked on
 * the front and answered on the back; all other markers show their answer on both sides.
 */
export class ClozeNoteRenderer extends TemplateNoteRenderer {
  readonly variant = 'cloze';

  protected override clozeOptions(
    options: NoteRenderOptions,
  ): Pick<TemplateRenderOptions, 'revealedClozeIndex'> {
    return options.revealedClozeIndex === undefined
      ? {}
      : { revealedClozeIndex: options.revealedClozeIndex };
  }
}
