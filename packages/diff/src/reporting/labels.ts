import type { ContentChange, FieldChangeKind, NoteChangeKind } from '../domain/changes.js';
import type { RenderVariant } from '../domain/deck.js';

export const CHANGE_KIND_LABELS: Readonly<Record<NoteChangeKind, string>> = {
  added: 'Added',
  modified: 'Modified',
  removed: 'Removed',
};

export const FIELD_CHANGE_LABELS: Readonly<Record<FieldChangeKind, string>> = {
  unchanged: 'Unchanged',
  added: 'Added',
  removed: 'Removed',
  changed: 'Changed',
};

export const CONTENT_CHANGE_LABELS: Readonly<Record<ContentChange, string>> = {
  content: 'Content changed',
  whitespace: 'Whitespace only',
  entities: 'HTML entities only',
  'html-formatting': 'HTML formatting only',
  case: 'Letter case only',
  punctuation: 'Punctuation only',
  'mixed-cosmetic': 'Cosmetic changes only',
};

export const VARIANT_LABELS: Readonly<Record<RenderVariant, string>> = {
  basic: 'Basic',
  cloze: 'Cloze',
  'image-occlusion': 'Image occlusion',
  'multi-field': 'Multi-field',
};
