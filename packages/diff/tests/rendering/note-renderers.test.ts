import { test } from 'vitest';
import assert from 'node:assert/strict';

import { createRecordingDiagnosticsPort } from '@deckdiff/core';

import type { Note, NoteModel } from '../../src/domain/deck.js';
import { BasicNoteRenderer } from '../../src/rendering/basic-renderer.js';
import { ClozeNoteRenderer } from '../../src/rendering/cloze-renderer.js';
import {
  ImageOcclusionNoteRenderer,
  parseOcclusionShapes,
} from '../../src/rendering/image-occlusion-renderer.js';
import { MultiFieldNoteRenderer } from '../../src/rendering/multi-field-renderer.js';
import { createRenderContext } from '../../src/rendering/render-context.js';
import { renderNoteSafely } from '../../src/rendering/safe-render.js';
import { createSnapshot, createNote, CLOZE_MODEL_ID } from '../fixtures/decks.js';

const basicModel: NoteModel = {
  id: 'model-basic',
  name: 'Basic',
  fieldNames: ['Front', 'Back'],
  templates: [{ name: 'Card 1', front: '{{Front}}', back: '{{FrontSide}}<hr id=answer>{{Back}}' }],
  kind: 'standard',
  css: '',
  variant: 'basic',
};

const clozeModel: NoteModel = {
  id: 'model-cloze',
  name: 'Cloze',
  fieldNames: ['Text', 'Back Extra'],
  templates: [{ name: 'Cloze', front: '{{cloze:Text}}', back: '{{cloze:Text}}<br>{{Back Extra}}' }],
  kind: 'cloze',
  css: '',
  variant: 'cloze',
};

const occlusionModel: NoteModel = {
  id: 'model-io',
  name: 'Image Occlusion',
  fieldNames: ['Occlusion', 'Image', 'Header', 'Back Extra', 'Comments'],
  templates: [
    {
      name: 'Image Occlusion',
      front:
        '{{#Header}}<div>{{Header}}</div>{{/Header}}' +
        '<div id="io">{{Image}}<canvas id="mask"></canvas></div><script>setup();</script>',
      back: '{{#Header}}<div>{{Header}}</div>{{/Header}}<div id="io">{{Image}}</div>{{Back Extra}}',
    },
  ],
  kind: 'image-occlusion',
  css: '',
  variant: 'image-occlusion',
};

const note = (fields: readonly string[]): Note => ({
  guid: 'n1',
  modelId: 'model',
  fields,
  tags: [],
});

test('BasicNoteRenderer renders the front and reuses it on the back', () => {
  const renderer = new BasicNoteRenderer();
  const card = note(['Q', 'A']);

  assert.equal(renderer.render(card, basicModel, 'front'), 'Q');
  assert.equal(renderer.render(card, basicModel, 'back'), 'Q<hr id=answer>A');
  assert.equal(
    renderer.render(card, basicModel, 'back', { frontSideHtml: 'cached' }),
    'cached<hr id=answer>A',
  );
});

test('ClozeNoteRenderer blanks the asked index on the front only', () => {
  const renderer = new ClozeNoteRenderer();
  const card = note(['{{c1::Paris}} is in {{c2::France}}', 'Extra']);

  assert.equal(
    renderer.render(card, clozeModel, 'front', { revealedClozeIndex: 1 }),
    '<span class="cloze cloze--hidden" data-cloze="1">[...]</span> is in ' +
      '<span class="cloze" data-cloze="2">France</span>',
  );
  assert.equal(
    renderer.render(card, clozeModel, 'back', { revealedClozeIndex: 1 }),
    '<span class="cloze" data-cloze="1">Paris</span> is in ' +
      '<span class="cloze" data-cloze="2">France</span><br>Extra',
  );
});

test('parseOcclusionShapes reads rectangles and ellipses', () => {
  assert.deepEqual(
    parseOcclusionShapes(
      '{{c1::image-occlusion:rect:left=.1:top=.2:width=.3:height=.4:oi=1}}' +
        '{{c2::image-occlusion:ellipse:left=.5:top=.5:rx=.1:ry=.05:oi=1}}' +
        '{{c3::image-occlusion:polygon:points=1,2}}',
    ),
    [
      { clozeIndex: 1, kind: 'rect', left: 0.1, top: 0.2, width: 0.3, height: 0.4 },
      { clozeIndex: 2, kind: 'ellipse', left: 0.5, top: 0.5, width: 0.2, height: 0.1 },
    ],
  );
});

test('ImageOcclusionNoteRenderer overlays shapes on the image and strips scripts', () => {
  const renderer = new ImageOcclusionNoteRenderer();
  const card = note([
    '{{c1::image-occlusion:rect:left=.25:top=.5:width=.125:height=.0625:oi=1}}',
    '<img src="heart.png">',
    'Heart',
    'Extra',
    '',
  ]);

  assert.equal(
    renderer.render(card, occlusionModel, 'front'),
    '<figure class="occlusion-figure"><img src="heart.png">' +
      '<div class="occlusion occlusion--rect occlusion--masked" data-cloze="1" ' +
      'style="left:25%;top:50%;width:12.5%;height:6.25%"></div></figure>' +
      '<div>Heart</div><div id="io"></div>',
  );
  assert.equal(
    renderer.render(card, occlusionModel, 'back'),
    '<figure class="occlusion-figure"><img src="heart.png">' +
      '<div class="occlusion occlusion--rect occlusion--revealed" data-cloze="1" ' +
      'style="left:25%;top:50%;width:12.5%;height:6.25%"></div></figure>' +
      '<div>Heart</div><div id="io"></div>Extra',
  );
});

test('MultiFieldNoteRenderer lays out every field and marks changed ones', () => {
  const renderer = new MultiFieldNoteRenderer();
  const model: NoteModel = {
    ...basicModel,
    fieldNames: ['Word', 'Meaning', 'Notes & tips'],
    variant: 'multi-field',
  };

  assert.equal(renderer.sided, false);
  assert.equal(
    renderer.render(note(['hola', '<i>hello</i>', '']), model, 'front', {
      changedFieldIndices: new Set([1]),
    }),
    '<div class="field-grid">' +
      '<div class="field-grid__cell" data-field-index="0">' +
      '<div class="field-grid__label">Word</div><div class="field-grid__value">hola</div></div>' +
      '<div class="field-grid__cell field-grid__cell--changed" data-field-index="1">' +
      '<div class="field-grid__label">Meaning</div>' +
      '<div class="field-grid__value"><i>hello</i></div></div>' +
      '<div class="field-grid__cell" data-field-index="2">' +
      '<div class="field-grid__label">Notes &amp; tips</div>' +
      '<div class="field-grid__value"></div></div>' +
      '</div>',
  );
});

test('createRenderContext picks the renderer matching each model variant', () => {
  const snapshot = createSnapshot([]);
  const context = createRenderContext([snapshot]);

  const variants = [...snapshot.models.values()].map(
    (model) => context.rendererFor(model).variant,
  );
  assert.deepEqual(variants, ['basic', 'cloze', 'multi-field']);
  assert.equal(context.templatesFor(clozeModel).length, 1);
});

test('renderNoteSafely replaces a broken template with a placeholder and a warning', () => {
  const model: NoteModel = {
    ...basicModel,
    templates: [{ name: 'Card 1', front: '{{Front', back: '{{Back}}' }],
  };
  const diagnostics = createRecordingDiagnosticsPort();
  const renderer = new BasicNoteRenderer();

  const html = renderNoteSafely(renderer, note(['Q', 'A']), model, 'front', {}, diagnostics);

  assert.equal(
    html,
    '<div class="render-error">Template error: Unterminated tag at offset 0: {{Front</div>',
  );
  assert.equal(diagnostics.events.length, 1);
  assert.equal(diagnostics.events[0]?.code, 'TEMPLATE_RENDER_FAILED');
  assert.equal(diagnostics.events[0]?.scope, 'rendering:n1');
  assert.equal(renderer.render(note(['Q', 'A']), model, 'back', { frontSideHtml: '' }), 'A');
});

test('renderNoteSafely reports malformed cloze markers in note fields', () => {
  const snapshot = createSnapshot([
    createNote('c1', ['{{c1::open', ''], { modelId: CLOZE_MODEL_ID }),
  ]);
  const context = createRenderContext([snapshot]);
  const model = snapshot.models.get(CLOZE_MODEL_ID);
  const cardNote = snapshot.root.notes[0];
  assert.ok(model !== undefined && cardNote !== undefined);

  const html = renderNoteSafely(context.rendererFor(model), cardNote, model, 'front', {});

  assert.equal(
    html,
    '<div class="render-error">Template error: Unterminated cloze marker at offset 0: {{c1::open</div>',
  );
});
