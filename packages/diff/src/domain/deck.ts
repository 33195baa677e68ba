export type NoteModelKind = 'standard' | 'cloze' | 'image-occlusion';

/**
 * Rendering variant chosen once per note model when the snapshot is parsed.
 */
export type RenderVariant = 'basic' | 'cloze' | 'image-occlusion' | 'multi-field';

export interface CardTemplate {
  readonly name: string;
  readonly front: string;
  readonly back: string;
}

export interface NoteModel {
  readonly id: string;
  readonly name: string;
  readonly fieldNames: readonly string[];
  readonly templates: readonly CardTemplate[];
  readonly kind: NoteModelKind;
  readonly css: string;
  readonly variant: RenderVariant;
}

export interface Note {
  readonly guid: string;
  readonly modelId: string;
  readonly fields: readonly string[];
  readonly tags: readonly string[];
}

export interface Deck {
  readonly name: string;
  /** Display path joined with `::`, e.g. `Languages::Spanish`. */
  readonly path: string;
  readonly children: readonly Deck[];
  readonly models: readonly NoteModel[];
  readonly notes: readonly Note[];
  readonly mediaFiles: readonly string[];
}

export interface DeckSnapshot {
  readonly root: Deck;
  readonly models: ReadonlyMap<string, NoteModel>;
}

export const DECK_PATH_SEPARATOR = '::';

/**
 * Creates a snapshot holding a single empty deck, used when a deck file only exists on
 * one side of a comparison.
 *
 * @param name - Name given to the empty root deck.
 * @returns A snapshot with no models and no notes.
 */
export function createEmptySnapshot(name = ''): DeckSnapshot {
  return {
    root: { name, path: name, children: [], models: [], notes: [], mediaFiles: [] },
    models: new Map(),
  };
}

/**
 * Counts every note reachable from the snapshot root.
 *
 * @param snapshot - Parsed deck snapshot.
 * @returns Total note count across the deck tree.
 */
export function countNotes(snapshot: DeckSnapshot): number {
  const visit = (deck: Deck): number =>
    deck.children.reduce((total, child) => total + visit(child), deck.notes.length);
  return visit(snapshot.root);
}
