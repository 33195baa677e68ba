import { z } from 'zod';

/**
 * Schemas for one level of a CrowdAnki `deck.json` export. Nested decks, note models
 * and notes are left as `unknown` here and validated one element at a time so that
 * failures can be reported with their exact location.
 */
export const deckLevelSchema = z.object({
  name: z.string(),
  crowdanki_uuid: z.string().optional(),
  children: z.array(z.unknown()).optional(),
  note_models: z.array(z.unknown()).optional(),
  notes: z.array(z.unknown()).optional(),
  media_files: z.array(z.string()).optional(),
});

const fieldDefinitionSchema = z.object({
  name: z.string(),
  ord: z.number().int().nonnegative().optional(),
});

const cardTemplateSchema = z.object({
  name: z.string(),
  ord: z.number().int().nonnegative().optional(),
  qfmt: z.string(),
  afmt: z.string(),
});

export const noteModelSchema = z.object({
  crowdanki_uuid: z.string().min(1),
  name: z.string(),
  type: z.number().int().optional(),
  flds: z.array(fieldDefinitionSchema),
  tmpls: z.array(cardTemplateSchema).min(1),
  css: z.string().optional(),
  originalStockKind: z.number().int().nullable().optional(),
});

export const noteSchema = z.object({
  guid: z.string().min(1),
  note_model_uuid: z.string().min(1),
  fields: z.array(z.string()),
  tags: z.array(z.string()).optional(),
});

export type DeckLevelInput = z.infer<typeof deckLevelSchema>;
export type NoteModelInput = z.infer<typeof noteModelSchema>;
export type NoteInput = z.infer<typeof noteSchema>;

/** Anki's numeric model type for cloze note types. */
export const CLOZE_MODEL_TYPE = 1;
/** `originalStockKind` of Anki's built-in image occlusion note type. */
export const IMAGE_OCCLUSION_STOCK_KIND = 6;
