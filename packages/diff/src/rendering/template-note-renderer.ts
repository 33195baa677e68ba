import type { Note, NoteModel, RenderVariant } from '../domain/deck.js';
import type { CardSide } from '../templating/cloze.js';
import {
  createFieldValues,
  renderCompiledTemplate,
  type FieldValues,
  type TemplateRenderOptions,
} from '../templating/template-engine.js';
import {
  uncachedTemplateSource,
  unwrapCompiledSide,
  type CompiledTemplateSource,
} from './compiled-templates.js';
import type { NoteRenderer, NoteRenderOptions } from './note-renderer.js';

/**
 * Shared behaviour of renderers that substitute note fields into the model's first card
 * template. The back side receives the rendered front as `{{FrontSide}}`.
 */
export abstract class TemplateNoteRenderer implements NoteRenderer {
  abstract readonly variant: RenderVariant;
  readonly sided: boolean = true;

  constructor(protected readonly templates: CompiledTemplateSource = uncachedTemplateSource) {}

  render(note: Note, model: NoteModel, side: CardSide, options: NoteRenderOptions = {}): string {
    const fields = createFieldValues(model.fieldNames, note.fields);
    return this.renderTemplateSide(note, model, fields, side, options);
  }

  protected renderTemplateSide(
    note: Note,
    model: NoteModel,
    fields: FieldValues,
    side: CardSide,
    options: NoteRenderOptions,
  ): string {
    const [card] = this.templates.templatesFor(model);
    if (card === undefined) {
      return '';
    }

    const shared: TemplateRenderOptions = {
      tags: note.tags,
      ...this.clozeOptions(options),
    };
    const front = (): string =>
      renderCompiledTemplate(unwrapCompiledSide(card.front), fields, { ...shared, side: 'front' });

    if (side === 'front') {
      return front();
    }

    return renderCompiledTemplate(unwrapCompiledSide(card.back), fields, {
      ...shared,
      side: 'back',
      frontSide: options.frontSideHtml ?? front(),
    });
  }

  protected clozeOptions(
    _options: NoteRenderOptions,
  ): Pick<TemplateRenderOptions, 'revealedClozeIndex'> {
    return {};
  }
}
