import type {
  CosmeticKind,
  FieldChangeKind,
  FieldDiff,
  NoteAddition,
  NoteChange,
  NoteLocation,
  NoteModification,
  NoteRemoval,
  TagDelta,
} from './changes.js';
import type { Deck, DeckSnapshot } from './deck.js';
import {
  DefaultCosmeticClassifier,
  summarizeCosmeticKinds,
  type CosmeticClassifier,
} from './strategies/cosmetic.js';

export interface NoteDifferOptions {
  readonly cosmeticClassifier?: CosmeticClassifier;
}

export interface FlattenedSnapshot {
  readonly order: readonly string[];
  readonly locations: ReadonlyMap<string, NoteLocation>;
}

const defaultCosmeticClassifier = new DefaultCosmeticClassifier();

/**
 * Computes the ordered note changes between two parsed deck snapshots.
 *
 * Additions and modifications follow the note order of the next snapshot. A removed note
 * is placed directly after the closest note preceding it in the previous snapshot that
 * still exists in the next one; removed notes without such a predecessor lead the list.
 * A note whose model changed is reported as a removal immediately followed by an addition.
 *
 * @param previous - Baseline snapshot.
 * @param next - Updated snapshot.
 * @param options - Optional classifier override for cosmetic edits.
 * @returns Changes in a stable order; empty when the snapshots hold the same notes.
 */
export function computeNoteChanges(
  previous: DeckSnapshot,
  next: DeckSnapshot,
  options: NoteDifferOptions = {},
): readonly NoteChange[] {
  const classifier = options.cosmeticClassifier ?? defaultCosmeticClassifier;
  const before = flattenSnapshot(previous);
  const after = flattenSnapshot(next);
  const { leading, anchored } = anchorRemovals(before, after);
  const changes: NoteChange[] = [...leading];

  for (const guid of after.order) {
    const nextLocation = after.locations.get(guid);
    if (nextLocation === undefined) {
      continue;
    }

    const previousLocation = before.locations.get(guid);
    if (previousLocation === undefined) {
      changes.push(createAddition(nextLocation));
    } else if (previousLocation.note.modelId === nextLocation.note.modelId) {
      const modification = compareNotes(previousLocation, nextLocation, classifier);
      if (modification !== undefined) {
        changes.push(modification);
      }
    } else {
      changes.push(createRemoval(previousLocation), createAddition(nextLocation));
    }

    changes.push(...(anchored.get(guid) ?? []));
  }

  return changes;
}

/**
 * Flattens a deck tree depth first: a deck's own notes, then each child deck in order.
 *
 * @param snapshot - Parsed snapshot whose notes should be indexed.
 * @returns The GUID order and each GUID's note, model and deck path.
 */
export function flattenSnapshot(snapshot: DeckSnapshot): FlattenedSnapshot {
  const order: string[] = [];
  const locations = new Map<string, NoteLocation>();

  const visit = (deck: Deck): void => {
    for (const note of deck.notes) {
      const model = snapshot.models.get(note.modelId);
      if (model === undefined || locations.has(note.guid)) {
        continue;
      }
      order.push(note.guid);
      locations.set(note.guid, { note, model, deckPath: deck.path });
    }
    for (const child of deck.children) {
      visit(child);
    }
  };

  visit(snapshot.root);
  return { order, locations };
}

function anchorRemovals(
  before: FlattenedSnapshot,
  after: FlattenedSnapshot,
): { readonly leading: readonly NoteRemoval[]; readonly anchored: Map<string, NoteRemoval[]> } {
  const leading: NoteRemoval[] = [];
  const anchored = new Map<string, NoteRemoval[]>();
  let anchor: string | undefined;

  for (const guid of before.order) {
    if (after.locations.has(guid)) {
      anchor = guid;
      continue;
    }

    const location = before.locations.get(guid);
    if (location === undefined) {
      continue;
    }

    const removal = createRemoval(location);
    if (anchor === undefined) {
      leading.push(removal);
    } else {
      const bucket = anchored.get(anchor) ?? [];
      bucket.push(removal);
      anchored.set(anchor, bucket);
    }
  }

  return { leading, anchored };
}

function compareNotes(
  previous: NoteLocation,
  next: NoteLocation,
  classifier: CosmeticClassifier,
): NoteModification | undefined {
  const fieldDiffs = diffFields(previous, next, classifier);
  const tags = diffTags(previous.note.tags, next.note.tags);
  const fieldsChanged = fieldDiffs.some((diff) => diff.kind !== 'unchanged');
  const tagsChanged = tags.added.length > 0 || tags.removed.length > 0;

  if (!fieldsChanged && !tagsChanged) {
    return undefined;
  }

  const changed = fieldDiffs.filter((diff) => diff.kind !== 'unchanged');
  const cosmeticKinds: CosmeticKind[] = [];
  let hasContentChange = tagsChanged;

  for (const diff of changed) {
    if (diff.classification === undefined || diff.classification.change === 'content') {
      hasContentChange = true;
    } else {
      cosmeticKinds.push(...diff.classification.cosmeticKinds);
    }
  }

  const cosmeticOnly = !hasContentChange && changed.length > 0;

  return {
    kind: 'modified',
    guid: next.note.guid,
    previous,
    next,
    fieldDiffs,
    tags,
    contentChange: cosmeticOnly ? summarizeCosmeticKinds(cosmeticKinds) : 'content',
    cosmeticOnly,
  } satisfies NoteModification;
}

function diffFields(
  previous: NoteLocation,
  next: NoteLocation,
  classifier: CosmeticClassifier,
): readonly FieldDiff[] {
  const previousFields = previous.note.fields;
  const nextFields = next.note.fields;
  const length = Math.max(previousFields.length, nextFields.length);
  const diffs: FieldDiff[] = [];

  for (let index = 0; index < length; index += 1) {
    const before = previousFields[index];
    const after = nextFields[index];
    const kind = classifyField(before, after);
    const name =
      next.model.fieldNames[index] ?? previous.model.fieldNames[index] ?? `Field ${String(index + 1)}`;

    diffs.push({
      index,
      name,
      previous: before,
      next: after,
      kind,
      ...(kind === 'changed' && before !== undefined && after !== undefined
        ? { classification: classifier.classify(before, after) }
        : {}),
    });
  }

  return diffs;
}

function classifyField(before: string | undefined, after: string | undefined): FieldChangeKind {
  if (before === after) {
    return 'unchanged';
  }
  if (before === undefined) {
    return 'added';
  }
  if (after === undefined) {
    return 'removed';
  }
  return 'changed';
}

function diffTags(previous: readonly string[], next: readonly string[]): TagDelta {
  const before = new Set(previous);
  const after = new Set(next);

  return {
    added: [...after].filter((tag) => !before.has(tag)),
    removed: [...before].filter((tag) => !after.has(tag)),
  };
}

function createAddition(next: NoteLocation): NoteAddition {
  return { kind: 'added', guid: next.note.guid, next };
}

function createRemoval(previous: NoteLocation): NoteRemoval {
  return { kind: 'removed', guid: previous.note.guid, previous };
}
