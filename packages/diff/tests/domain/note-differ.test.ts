import { test } from 'vitest';
import assert from 'node:assert/strict';

import type { NoteChange } from '../../src/domain/changes.js';
import type { DeckSnapshot } from '../../src/domain/deck.js';
import { computeNoteChanges, flattenSnapshot } from '../../src/domain/note-differ.js';
import { parseDeck } from '../../src/parsing/deck-parser.js';
import {
  createBasicModel,
  createDeck,
  createNote,
  createSnapshot,
  type RawNote,
} from '../fixtures/decks.js';

function describeChanges(changes: readonly NoteChange[]): readonly string[] {
  return changes.map((change) => `${change.kind}:${change.guid}`);
}

test('computeNoteChanges returns nothing for identical snapshots', () => {
  const notes = [createNote('n1', ['q', 'a']), createNote('n2', ['q2', 'a2'])];

  assert.deepEqual(computeNoteChanges(createSnapshot(notes), createSnapshot(notes)), []);
});

test('computeNoteChanges follows the next order and anchors removals after their predecessor', () => {
  const previous = createSnapshot([
    createNote('a', ['a', '1']),
    createNote('b', ['b', '1']),
    createNote('c', ['c', '1']),
    createNote('d', ['d', '1']),
  ]);
  const next = createSnapshot([
    createNote('a', ['a', '1']),
    createNote('e', ['e', '1']),
    createNote('c', ['c', '2']),
  ]);

  assert.deepEqual(describeChanges(computeNoteChanges(previous, next)), [
    'removed:b',
    'added:e',
    'modified:c',
    'removed:d',
  ]);
});

test('computeNoteChanges leads with removals that have no surviving predecessor', () => {
  const previous = createSnapshot([createNote('x', ['x', '1']), createNote('a', ['a', '1'])]);
  const next = createSnapshot([createNote('a', ['a', '1']), createNote('z', ['z', '1'])]);

  assert.deepEqual(describeChanges(computeNoteChanges(previous, next)), ['removed:x', 'added:z']);
});

test('computeNoteChanges removes every old note and adds every new one when no GUID is shared', () => {
  const previous = createSnapshot([createNote('p1', ['p', '1']), createNote('p2', ['p', '2'])]);
  const next = createSnapshot([createNote('n1', ['n', '1']), createNote('n2', ['n', '2'])]);

  const changes = computeNoteChanges(previous, next);

  assert.deepEqual(describeChanges(changes), [
    'removed:p1',
    'removed:p2',
    'added:n1',
    'added:n2',
  ]);
  assert.deepEqual(computeNoteChanges(previous, next), changes);
});

test('computeNoteChanges reports a changed note model as removal then addition', () => {
  const previous = createSnapshot([createNote('n1', ['q', 'a'])]);
  const next = parseDeck(
    createDeck('Default', {
      note_models: [createBasicModel({ crowdanki_uuid: 'model-basic-reversed' })],
      notes: [createNote('n1', ['q', 'a'], { modelId: 'model-basic-reversed' })],
    }),
  );

  assert.deepEqual(describeChanges(computeNoteChanges(previous, next)), [
    'removed:n1',
    'added:n1',
  ]);
});

test('computeNoteChanges diffs fields by position and classifies content edits', () => {
  const previous = createSnapshot([createNote('n1', ['What is 2+2?', '4'])]);
  const next = createSnapshot([createNote('n1', ['What is 2+2?', 'four'])]);

  const [change] = computeNoteChanges(previous, next);

  assert.equal(change?.kind, 'modified');
  if (change?.kind !== 'modified') {
    return;
  }
  assert.deepEqual(change.fieldDiffs, [
    { index: 0, name: 'Front', previous: 'What is 2+2?', next: 'What is 2+2?', kind: 'unchanged' },
    {
      index: 1,
      name: 'Back',
      previous: '4',
      next: 'four',
      kind: 'changed',
      classification: { change: 'content', cosmeticKinds: [] },
    },
  ]);
  assert.equal(change.contentChange, 'content');
  assert.equal(change.cosmeticOnly, false);
  assert.equal(change.previous.deckPath, 'Default');
});

function createSnapshotWithExtraField(notes: readonly RawNote[]): DeckSnapshot {
  return parseDeck(
    createDeck('Default', {
      note_models: [
        createBasicModel({
          flds: [
            { name: 'Front', ord: 0 },
            { name: 'Back', ord: 1 },
            { name: 'Extra', ord: 2 },
          ],
        }),
      ],
      notes,
    }),
  );
}

test('computeNoteChanges reports a field the model gained as added, even when empty', () => {
  const previous = createSnapshot([createNote('n1', ['q', 'a'])]);
  const next = createSnapshotWithExtraField([createNote('n1', ['q', 'a', ''])]);

  const [change] = computeNoteChanges(previous, next);

  assert.equal(change?.kind, 'modified');
  if (change?.kind !== 'modified') {
    return;
  }
  assert.deepEqual(change.fieldDiffs[2], {
    index: 2,
    name: 'Extra',
    previous: undefined,
    next: '',
    kind: 'added',
  });
  assert.equal(change.cosmeticOnly, false);
  assert.equal(change.contentChange, 'content');
});

test('computeNoteChanges reports a field the model lost as removed', () => {
  const previous = createSnapshotWithExtraField([createNote('n1', ['q', 'a', 'hint'])]);
  const next = createSnapshot([createNote('n1', ['q', 'a'])]);

  const [change] = computeNoteChanges(previous, next);

  assert.equal(change?.kind, 'modified');
  if (change?.kind !== 'modified') {
    return;
  }
  assert.deepEqual(
    change.fieldDiffs.map((diff) => diff.kind),
    ['unchanged', 'unchanged', 'removed'],
  );
  assert.deepEqual(change.fieldDiffs[2], {
    index: 2,
    name: 'Extra',
    previous: 'hint',
    next: undefined,
    kind: 'removed',
  });
});

test('computeNoteChanges flags notes whose only edits are cosmetic', () => {
  const previous = createSnapshot([createNote('n1', ['Capital of France', 'Paris'])]);
  const next = createSnapshot([createNote('n1', ['Capital of France', '<b>Paris</b>'])]);

  const [change] = computeNoteChanges(previous, next);

  assert.equal(change?.kind, 'modified');
  if (change?.kind === 'modified') {
    assert.equal(change.cosmeticOnly, true);
    assert.equal(change.contentChange, 'html-formatting');
  }
});

test('computeNoteChanges treats an operator edit as content', () => {
  const previous = createSnapshot([createNote('n1', ['Is x positive?', 'x &lt; 5'])]);
  const next = createSnapshot([createNote('n1', ['Is x positive?', 'x &gt; 5'])]);

  const [change] = computeNoteChanges(previous, next);

  assert.equal(change?.kind, 'modified');
  if (change?.kind === 'modified') {
    assert.equal(change.cosmeticOnly, false);
    assert.equal(change.contentChange, 'content');
  }
});

test('computeNoteChanges treats tag edits as content changes', () => {
  const previous = createSnapshot([createNote('n1', ['q', 'Paris'], { tags: ['geo'] })]);
  const next = createSnapshot([
    createNote('n1', ['q', '<b>Paris</b>'], { tags: ['geo', 'europe'] }),
  ]);

  const [change] = computeNoteChanges(previous, next);

  assert.equal(change?.kind, 'modified');
  if (change?.kind === 'modified') {
    assert.deepEqual(change.tags, { added: ['europe'], removed: [] });
    assert.equal(change.cosmeticOnly, false);
    assert.equal(change.contentChange, 'content');
  }
});

test('computeNoteChanges ignores a note that only moved between decks', () => {
  const previous = createSnapshot([createNote('n1', ['q', 'a'])]);
  const next = parseDeck(
    createDeck('Default', {
      note_models: [createBasicModel()],
      children: [createDeck('Archive', { notes: [createNote('n1', ['q', 'a'])] })],
    }),
  );

  assert.deepEqual(computeNoteChanges(previous, next), []);
});

test('flattenSnapshot visits a deck before its children', () => {
  const snapshot = parseDeck(
    createDeck('Root', {
      note_models: [createBasicModel()],
      children: [
        createDeck('A', { notes: [createNote('a1', ['q', 'a'])] }),
        createDeck('B', { notes: [createNote('b1', ['q', 'a'])] }),
      ],
      notes: [createNote('r1', ['q', 'a'])],
    }),
  );

  const flattened = flattenSnapshot(snapshot);

  assert.deepEqual(flattened.order, ['r1', 'a1', 'b1']);
  assert.equal(flattened.locations.get('b1')?.deckPath, 'Root::B');
});
