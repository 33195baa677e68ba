import type { Note, NoteModel, RenderVariant } from '../domain/deck.js';
import type { CardSide } from '../templating/cloze.js';

export interface NoteRenderOptions {
  /** Cloze index being asked about; other indices always show their answer. */
  readonly revealedClozeIndex?: number;
  /** Field indices flagged as changed by the differ. */
  readonly changedFieldIndices?: ReadonlySet<number>;
  /** Pre-rendered front side reused as `{{FrontSide}}` on the back. */
  readonly frontSideHtml?: string;
}

export interface NoteRenderer {
  readonly variant: RenderVariant;
  /** `false` for renderers that ignore the front/back split. */
  readonly sided: boolean;
  render(note: Note, model: NoteModel, side: CardSide, options?: NoteRenderOptions): string;
}
