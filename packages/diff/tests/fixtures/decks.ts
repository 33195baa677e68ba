import type { DeckSnapshot } from '../../src/domain/deck.js';
import { parseDeck } from '../../src/parsing/deck-parser.js';

export interface RawNote {
  readonly guid: string;
  readonly note_model_uuid: string;
  readonly fields: readonly string[];
  readonly tags?: readonly string[];
}

export interface RawDeck {
  readonly name: string;
  readonly children?: readonly RawDeck[];
  readonly note_models?: readonly Record<string, unknown>[];
  readonly notes?: readonly RawNote[];
  readonly media_files?: readonly string[];
}

export const BASIC_MODEL_ID = 'model-basic';
export const CLOZE_MODEL_ID = 'model-cloze';
export const VOCABULARY_MODEL_ID = 'model-vocabulary';

export function createBasicModel(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    crowdanki_uuid: BASIC_MODEL_ID,
    name: 'Basic',
    type: 0,
    flds: [
      { name: 'Front', ord: 0 },
      { name: 'Back', ord: 1 },
    ],
    tmpls: [
      {
        name: 'Card 1',
        ord: 0,
        qfmt: '{{Front}}',
        afmt: '{{FrontSide}}<hr id=answer>{{Back}}',
      },
    ],
    css: '.card { font-family: arial; }',
    ...overrides,
  };
}

export function createClozeModel(): Record<string, unknown> {
  return {
    crowdanki_uuid: CLOZE_MODEL_ID,
    name: 'Cloze',
    type: 1,
    flds: [
      { name: 'Text', ord: 0 },
      { name: 'Back Extra', ord: 1 },
    ],
    tmpls: [
      {
        name: 'Cloze',
        ord: 0,
        qfmt: '{{cloze:Text}}',
        afmt: '{{cloze:Text}}<br>{{Back Extra}}',
      },
    ],
  };
}

export function createVocabularyModel(): Record<string, unknown> {
  return {
    crowdanki_uuid: VOCABULARY_MODEL_ID,
    name: 'Vocabulary',
    flds: [{ name: 'Word' }, { name: 'Meaning' }, { name: 'Example' }, { name: 'Notes' }],
    tmpls: [{ name: 'Recognition', qfmt: '{{Word}}', afmt: '{{FrontSide}}<hr>{{Meaning}}' }],
  };
}

export function createNote(
  guid: string,
  fields: readonly string[],
  options: { readonly modelId?: string; readonly tags?: readonly string[] } = {},
): RawNote {
  return {
    guid,
    note_model_uuid: options.modelId ?? BASIC_MODEL_ID,
    fields,
    tags: options.tags ?? [],
  };
}

export function createDeck(name: string, content: Omit<RawDeck, 'name'> = {}): RawDeck {
  return { name, ...content };
}

/**
 * Parses a single-level `Default` deck declaring the basic, cloze and vocabulary models.
 */
export function createSnapshot(notes: readonly RawNote[]): DeckSnapshot {
  return parseDeck(
    createDeck('Default', {
      note_models: [createBasicModel(), createClozeModel(), createVocabularyModel()],
      notes,
    }),
  );
}
