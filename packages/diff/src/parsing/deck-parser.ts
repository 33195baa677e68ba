import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';

import {
  DECK_PATH_SEPARATOR,
  type CardTemplate,
  type Deck,
  type DeckSnapshot,
  type Note,
  type NoteModel,
  type NoteModelKind,
  type RenderVariant,
} from '../domain/deck.js';
import { DeckParseError, MissingNoteModelError } from '../domain/errors.js';
import {
  CLOZE_MODEL_TYPE,
  IMAGE_OCCLUSION_STOCK_KIND,
  deckLevelSchema,
  noteModelSchema,
  noteSchema,
  type NoteInput,
  type NoteModelInput,
} from './deck-schema.js';

interface PendingNote {
  readonly input: NoteInput;
  readonly jsonPath: string;
}

interface PendingDeck {
  readonly name: string;
  readonly path: string;
  readonly children: readonly PendingDeck[];
  readonly models: readonly NoteModel[];
  readonly notes: readonly PendingNote[];
  readonly mediaFiles: readonly string[];
}

const MULTI_FIELD_THRESHOLD = 3;

/**
 * Parses JSON text holding a CrowdAnki deck export.
 *
 * @param text - Raw `deck.json` contents.
 * @returns The typed deck tree with every note model it declares.
 * @throws {DeckParseError} When the text is not JSON or the deck structure is invalid.
 */
export function parseDeckJson(text: string): DeckSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DeckParseError(`Invalid deck JSON: ${reason}`, { path: '$' });
  }
  return parseDeck(raw);
}

/**
 * Builds a typed deck tree from an already decoded deck export. Note models declared at
 * any level are visible to notes anywhere in the tree; when an id is declared twice the
 * first declaration wins.
 *
 * @param raw - Decoded deck object.
 * @returns The deck tree and the note models keyed by id.
 * @throws {DeckParseError} On missing or mistyped properties, duplicate GUIDs, field
 * counts that disagree with the note model, or a deck object reachable twice.
 * @throws {MissingNoteModelError} When a note references an undeclared model.
 */
export function parseDeck(raw: unknown): DeckSnapshot {
  const models = new Map<string, NoteModel>();
  const pending = readDeckLevel(raw, '$', undefined, models, new Set());
  const seenGuids = new Map<string, string>();
  const root = resolveDeck(pending, models, seenGuids);
  return { root, models };
}

/**
 * Picks the renderer for a note model from its kind and shape.
 *
 * @param kind - Note model kind.
 * @param fieldCount - Number of fields declared by the model.
 * @param templateCount - Number of card templates declared by the model.
 * @returns The rendering variant used for every note of the model.
 */
export function selectRenderVariant(
  kind: NoteModelKind,
  fieldCount: number,
  templateCount: number,
): RenderVariant {
  switch (kind) {
    case 'cloze': {
      return 'cloze';
    }
    case 'image-occlusion': {
      return 'image-occlusion';
    }
    default: {
      return fieldCount > MULTI_FIELD_THRESHOLD || templateCount > 1 ? 'multi-field' : 'basic';
    }
  }
}

function readDeckLevel(
  raw: unknown,
  jsonPath: string,
  parentPath: string | undefined,
  models: Map<string, NoteModel>,
  visited: Set<object>,
): PendingDeck {
  if (typeof raw === 'object' && raw !== null) {
    if (visited.has(raw)) {
      throw new DeckParseError('Deck object appears more than once in the deck tree', {
        path: jsonPath,
      });
    }
    visited.add(raw);
  }

  const level = validate(deckLevelSchema, raw, jsonPath);
  const path =
    parentPath === undefined ? level.name : `${parentPath}${DECK_PATH_SEPARATOR}${level.name}`;

  const levelModels = (level.note_models ?? []).map((candidate, index) => {
    const model = toNoteModel(
      validate(noteModelSchema, candidate, `${jsonPath}.note_models[${String(index)}]`),
    );
    if (!models.has(model.id)) {
      models.set(model.id, model);
    }
    return model;
  });

  const notes = (level.notes ?? []).map((candidate, index) => {
    const notePath = `${jsonPath}.notes[${String(index)}]`;
    return { input: validate(noteSchema, candidate, notePath, path), jsonPath: notePath };
  });

  const children = (level.children ?? []).map((child, index) =>
    readDeckLevel(child, `${jsonPath}.children[${String(index)}]`, path, models, visited),
  );

  return {
    name: level.name,
    path,
    children,
    models: levelModels,
    notes,
    mediaFiles: level.media_files ?? [],
  };
}

function resolveDeck(
  pending: PendingDeck,
  models: ReadonlyMap<string, NoteModel>,
  seenGuids: Map<string, string>,
): Deck {
  const notes = pending.notes.map((entry) => resolveNote(entry, pending.path, models, seenGuids));

  return {
    name: pending.name,
    path: pending.path,
    children: pending.children.map((child) => resolveDeck(child, models, seenGuids)),
    models: pending.models,
    notes,
    mediaFiles: pending.mediaFiles,
  };
}

function resolveNote(
  entry: PendingNote,
  deckPath: string,
  models: ReadonlyMap<string, NoteModel>,
  seenGuids: Map<string, string>,
): Note {
  const { input, jsonPath } = entry;
  const context = { path: jsonPath, deckPath, guid: input.guid };

  const model = models.get(input.note_model_uuid);
  if (model === undefined) {
    throw new MissingNoteModelError(input.note_model_uuid, context);
  }

  const firstSeen = seenGuids.get(input.guid);
  if (firstSeen !== undefined) {
    throw new DeckParseError(`Duplicate note GUID (first declared at ${firstSeen})`, context);
  }
  seenGuids.set(input.guid, jsonPath);

  if (input.fields.length !== model.fieldNames.length) {
    throw new DeckParseError(
      `Note has ${String(input.fields.length)} field values but note model "${model.name}" declares ${String(model.fieldNames.length)}`,
      context,
    );
  }

  return {
    guid: input.guid,
    modelId: model.id,
    fields: input.fields,
    tags: [...new Set(input.tags ?? [])],
  };
}

function toNoteModel(input: NoteModelInput): NoteModel {
  const kind = resolveModelKind(input);
  const fieldNames = sortByOrdinal(input.flds).map((field) => field.name);
  const templates: CardTemplate[] = sortByOrdinal(input.tmpls).map((template) => ({
    name: template.name,
    front: template.qfmt,
    back: template.afmt,
  }));

  return {
    id: input.crowdanki_uuid,
    name: input.name,
    fieldNames,
    templates,
    kind,
    css: input.css ?? '',
    variant: selectRenderVariant(kind, fieldNames.length, templates.length),
  };
}

function resolveModelKind(input: NoteModelInput): NoteModelKind {
  const name = input.name.toLowerCase();
  if (
    input.originalStockKind === IMAGE_OCCLUSION_STOCK_KIND ||
    (name.includes('image') && name.includes('occlusion'))
  ) {
    return 'image-occlusion';
  }

  return input.type === CLOZE_MODEL_TYPE ? 'cloze' : 'standard';
}

function sortByOrdinal<T extends { readonly ord?: number | undefined }>(
  entries: readonly T[],
): readonly T[] {
  return entries
    .map((entry, index) => ({ entry, ord: entry.ord ?? index }))
    .sort((left, right) => left.ord - right.ord)
    .map(({ entry }) => entry);
}

function validate<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  jsonPath: string,
  deckPath?: string,
): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  throw new DeckParseError(issue?.message ?? 'Invalid value', {
    path: issue === undefined ? jsonPath : appendIssuePath(jsonPath, issue),
    ...(deckPath === undefined ? {} : { deckPath }),
  });
}

function appendIssuePath(base: string, issue: ZodIssue): string {
  return issue.path.reduce<string>(
    (path, segment) =>
      typeof segment === 'number' ? `${path}[${String(segment)}]` : `${path}.${segment}`,
    base,
  );
}
