import type { CardTemplate, NoteModel } from '../domain/deck.js';
import { TemplateRenderError } from '../domain/errors.js';
import { compileTemplate, type CompiledTemplate } from '../templating/template-engine.js';

/**
 * Outcome of compiling one side of a card template. A malformed template is kept as its
 * error so that it fails each note rendered with it rather than the whole run.
 */
export type CompiledSide =
  | { readonly template: CompiledTemplate }
  | { readonly error: TemplateRenderError };

export interface CompiledCardTemplate {
  readonly name: string;
  readonly front: CompiledSide;
  readonly back: CompiledSide;
}

export interface CompiledTemplateSource {
  templatesFor(model: NoteModel): readonly CompiledCardTemplate[];
}

/**
 * Compiles every card template of a note model.
 *
 * @param model - Note model whose templates should be compiled.
 * @returns One entry per card template, in model order.
 */
export function compileModelTemplates(model: NoteModel): readonly CompiledCardTemplate[] {
  return model.templates.map((template) => compileCardTemplate(template));
}

/**
 * Template source that compiles on every call. Used when a renderer runs outside a
 * {@link RenderContext}.
 */
export const uncachedTemplateSource: CompiledTemplateSource = {
  templatesFor: compileModelTemplates,
};

export function unwrapCompiledSide(side: CompiledSide): CompiledTemplate {
  if ('error' in side) {
    throw side.error;
  }
  return side.template;
}

function compileCardTemplate(template: CardTemplate): CompiledCardTemplate {
  return {
    name: template.name,
    front: compileSide(template.front),
    back: compileSide(template.back),
  };
}

function compileSide(source: string): CompiledSide {
  try {
    return { template: compileTemplate(source) };
  } catch (error) {
    if (error instanceof TemplateRenderError) {
      return { error };
    }
    throw error;
  }
}
