import type { Note, NoteModel } from './deck.js';

export type NoteChangeKind = 'added' | 'removed' | 'modified';

export type FieldChangeKind = 'unchanged' | 'added' | 'removed' | 'changed';

export type CosmeticKind = 'whitespace' | 'entities' | 'html-formatting' | 'case' | 'punctuation';

/**
 * Overall classification of an edit: a visible `content` change, a single cosmetic kind,
 * or `mixed-cosmetic` when several cosmetic kinds apply at once.
 */
export type ContentChange = 'content' | CosmeticKind | 'mixed-cosmetic';

export interface FieldClassification {
  readonly change: ContentChange;
  readonly cosmeticKinds: readonly CosmeticKind[];
}

export interface FieldDiff {
  readonly index: number;
  readonly name: string;
  /** `undefined` when the note had no value at this index. */
  readonly previous: string | undefined;
  readonly next: string | undefined;
  readonly kind: FieldChangeKind;
  readonly classification?: FieldClassification;
}

export interface TagDelta {
  readonly added: readonly string[];
  readonly removed: readonly string[];
}

export interface NoteLocation {
  readonly note: Note;
  readonly model: NoteModel;
  readonly deckPath: string;
}

interface BaseNoteChange {
  readonly kind: NoteChangeKind;
  readonly guid: string;
}

export interface NoteAddition extends BaseNoteChange {
  readonly kind: 'added';
  readonly next: NoteLocation;
}

export interface NoteRemoval extends BaseNoteChange {
  readonly kind: 'removed';
  readonly previous: NoteLocation;
}

export interface NoteModification extends BaseNoteChange {
  readonly kind: 'modified';
  readonly previous: NoteLocation;
  readonly next: NoteLocation;
  readonly fieldDiffs: readonly FieldDiff[];
  readonly tags: TagDelta;
  readonly contentChange: ContentChange;
  readonly cosmeticOnly: boolean;
}

export type NoteChange = NoteAddition | NoteRemoval | NoteModification;
