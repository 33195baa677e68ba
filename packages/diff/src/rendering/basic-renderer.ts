import { TemplateNoteRenderer } from './template-note-renderer.js';

/**
 * Plain field substitution into the front and back format strings.
 */
export class BasicNoteRenderer extends TemplateNoteRenderer {
  readonly variant = 'basic';
}
