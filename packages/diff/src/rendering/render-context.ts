import type { DeckSnapshot, NoteModel, RenderVariant } from '../domain/deck.js';
import { BasicNoteRenderer } from './basic-renderer.js';
import { ClozeNoteRenderer } from './cloze-renderer.js';
import {
  compileModelTemplates,
  type CompiledCardTemplate,
  type CompiledTemplateSource,
} from './compiled-templates.js';
import { ImageOcclusionNoteRenderer } from './image-occlusion-renderer.js';
import { MultiFieldNoteRenderer } from './multi-field-renderer.js';
import type { NoteRenderer } from './note-renderer.js';

/**
 * Per-run rendering state: the compiled card templates of every note model seen in the
 * compared snapshots and the renderer chosen for each model. Built once and never
 * mutated afterwards.
 */
export interface RenderContext extends CompiledTemplateSource {
  rendererFor(model: NoteModel): NoteRenderer;
}

/**
 * Builds the render context for the given snapshots. A model id present in both
 * snapshots with different templates is compiled once per version.
 *
 * @param snapshots - Snapshots whose note models will be rendered.
 * @returns A frozen render context.
 */
export function createRenderContext(snapshots: readonly DeckSnapshot[]): RenderContext {
  const compiled = new Map<NoteModel, readonly CompiledCardTemplate[]>();
  for (const snapshot of snapshots) {
    for (const model of snapshot.models.values()) {
      compiled.set(model, compileModelTemplates(model));
    }
  }

  const templates: CompiledTemplateSource = {
    templatesFor: (model) => compiled.get(model) ?? compileModelTemplates(model),
  };

  const renderers: Readonly<Record<RenderVariant, NoteRenderer>> = {
    basic: new BasicNoteRenderer(templates),
    cloze: new ClozeNoteRenderer(templates),
    'image-occlusion': new ImageOcclusionNoteRenderer(templates),
    'multi-field': new MultiFieldNoteRenderer(),
  };

  return Object.freeze({
    templatesFor: templates.templatesFor,
    rendererFor: (model: NoteModel) => renderers[model.variant],
  });
}
