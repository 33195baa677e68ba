import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

export interface DeckFileNote {
  readonly guid: string;
  readonly front: string;
  readonly back: string;
  readonly tags?: readonly string[];
}

const BASIC_MODEL = {
  crowdanki_uuid: 'model-basic',
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
};

/**
 * Serialises a single-level `Default` deck with one basic note model.
 */
export const createDeckJson = (notes: readonly DeckFileNote[]): string =>
  JSON.stringify(
    {
      name: 'Default',
      note_models: [BASIC_MODEL],
      notes: notes.map((note) => ({
        guid: note.guid,
        note_model_uuid: BASIC_MODEL.crowdanki_uuid,
        fields: [note.front, note.back],
        tags: note.tags ?? [],
      })),
    },
    null,
    2,
  );

export const writeDeckFile = async (
  filePath: string,
  notes: readonly DeckFileNote[],
): Promise<void> => {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, createDeckJson(notes), 'utf8');
};
