import { test } from 'vitest';
import assert from 'node:assert/strict';

import { createRecordingDiagnosticsPort } from '@deckdiff/core';

import { computeNoteChanges } from '../../src/domain/note-differ.js';
import { parseDeck } from '../../src/parsing/deck-parser.js';
import { createRenderContext } from '../../src/rendering/render-context.js';
import { assembleReport, summarizeReport } from '../../src/reporting/assembler.js';
import {
  CLOZE_MODEL_ID,
  createBasicModel,
  createDeck,
  createNote,
  createSnapshot,
} from '../fixtures/decks.js';
import type { DeckSnapshot } from '../../src/domain/deck.js';

function assemble(
  previous: DeckSnapshot,
  next: DeckSnapshot,
  options: Parameters<typeof assembleReport>[2] = {},
) {
  return assembleReport(
    computeNoteChanges(previous, next),
    createRenderContext([previous, next]),
    options,
  );
}

const card = (front: string, back: string): string =>
  '<div class="card">' +
  `<div class="card__side card__side--front">${front}</div>` +
  `<div class="card__side card__side--back">${back}</div>` +
  '</div>';

test('assembleReport renders both sides of each change in change order', () => {
  const previous = createSnapshot([
    createNote('n1', ['Q1', 'A1'], { tags: ['geo'] }),
    createNote('n2', ['Q2', 'A2']),
  ]);
  const next = createSnapshot([
    createNote('n1', ['Q1', 'A1 revised'], { tags: ['geo'] }),
    createNote('n3', ['Q3', 'A3'], { tags: ['new'] }),
  ]);

  const entries = assemble(previous, next);

  assert.deepEqual(
    entries.map((entry) => [entry.changeKind, entry.guid]),
    [
      ['modified', 'n1'],
      ['removed', 'n2'],
      ['added', 'n3'],
    ],
  );

  const [modified, removed, added] = entries;
  assert.equal(modified?.beforeHtml, card('Q1', 'Q1<hr id=answer>A1'));
  assert.equal(modified?.afterHtml, card('Q1', 'Q1<hr id=answer>A1 revised'));
  assert.equal(modified?.deckPath, 'Default');
  assert.equal(modified?.modelName, 'Basic');
  assert.equal(modified?.variant, 'basic');
  assert.equal(modified?.contentChange, 'content');

  assert.equal(removed?.afterHtml, undefined);
  assert.equal(removed?.beforeHtml, card('Q2', 'Q2<hr id=answer>A2'));

  assert.equal(added?.beforeHtml, undefined);
  assert.deepEqual(added?.tagDelta, { added: ['new'], removed: [] });
});

test('assembleReport reveals the lowest cloze index', () => {
  const previous = createSnapshot([
    createNote('c1', ['{{c2::b}} {{c1::a}}', ''], { modelId: CLOZE_MODEL_ID }),
  ]);
  const next = createSnapshot([
    createNote('c1', ['{{c2::b}} {{c1::a}}', 'extra'], { modelId: CLOZE_MODEL_ID }),
  ]);

  const [entry] = assemble(previous, next);

  assert.equal(
    entry?.afterHtml,
    card(
      '<span class="cloze" data-cloze="2">b</span> ' +
        '<span class="cloze cloze--hidden" data-cloze="1">[...]</span>',
      '<span class="cloze" data-cloze="2">b</span> ' +
        '<span class="cloze" data-cloze="1">a</span><br>extra',
    ),
  );
});

test('assembleReport points image sources at copied media', () => {
  const previous = createSnapshot([createNote('n1', ['Cat', 'meow'])]);
  const next = createSnapshot([createNote('n1', ['Cat', '<img src="cat.png">'])]);

  const [entry] = assemble(previous, next, {
    mediaPaths: new Map([['cat.png', 'media/cat.png']]),
  });

  assert.equal(entry?.afterHtml, card('Cat', 'Cat<hr id=answer><img src="media/cat.png">'));
});

test('assembleReport keeps going when a template cannot be rendered', () => {
  const broken = parseDeck(
    createDeck('Default', {
      note_models: [
        createBasicModel({ tmpls: [{ name: 'Card 1', qfmt: '{{Front', afmt: '{{Back}}' }] }),
      ],
      notes: [createNote('n1', ['Q', 'A'])],
    }),
  );
  const diagnostics = createRecordingDiagnosticsPort();

  const [entry] = assemble(createSnapshot([]), broken, { diagnostics });

  assert.equal(
    entry?.afterHtml,
    card(
      '<div class="render-error">Template error: Unterminated tag at offset 0: {{Front</div>',
      'A',
    ),
  );
  assert.deepEqual(
    diagnostics.events.map((event) => event.code),
    ['TEMPLATE_RENDER_FAILED'],
  );
});

test('summarizeReport counts change kinds and cosmetic classifications', () => {
  const previous = createSnapshot([
    createNote('n1', ['Q1', 'Paris']),
    createNote('n2', ['Q2', 'a']),
  ]);
  const next = createSnapshot([
    createNote('n1', ['Q1', '<b>Paris</b>']),
    createNote('n2', ['Q2', 'b']),
    createNote('n3', ['Q3', 'c']),
  ]);

  assert.deepEqual(summarizeReport(assemble(previous, next)), {
    total: 3,
    added: 1,
    modified: 2,
    removed: 0,
    content: 2,
    cosmeticOnly: 1,
    cosmetic: {
      whitespace: 0,
      entities: 0,
      'html-formatting': 1,
      case: 0,
      punctuation: 0,
      'mixed-cosmetic': 0,
    },
  });
});
