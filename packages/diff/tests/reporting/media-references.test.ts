import { test } from 'vitest';
import assert from 'node:assert/strict';

import { computeNoteChanges } from '../../src/domain/note-differ.js';
import {
  collectMediaReferences,
  encodeMediaPath,
  extractMediaReferences,
  rewriteMediaReferences,
} from '../../src/reporting/media-references.js';
import { createNote, createSnapshot } from '../fixtures/decks.js';

test('extractMediaReferences finds images, sounds and CSS urls but skips remote files', () => {
  const html =
    '<img src="cat.png"> [sound:meow.mp3] ' +
    `<div style="background: url('bg%20image.jpg')"></div>` +
    '<img src="https://example.com/dog.png"><img src="data:image/png;base64,AA">';

  assert.deepEqual(extractMediaReferences(html), ['cat.png', 'meow.mp3', 'bg image.jpg']);
});

test('collectMediaReferences gathers media from both sides of every change', () => {
  const previous = createSnapshot([createNote('n1', ['<img src="old.png">', 'a'])]);
  const next = createSnapshot([
    createNote('n1', ['<img src="new.png">', 'a']),
    createNote('n2', ['[sound:audio.mp3]', '<img src="new.png">']),
  ]);

  assert.deepEqual(collectMediaReferences(computeNoteChanges(previous, next)), [
    'audio.mp3',
    'new.png',
    'old.png',
  ]);
});

test('rewriteMediaReferences only rewrites mapped image sources', () => {
  const mediaPaths = new Map([['cat photo.png', 'media/cat photo.png']]);

  assert.equal(
    rewriteMediaReferences(`<img class='a' src='cat%20photo.png'><img src="dog.png">`, mediaPaths),
    `<img class='a' src="media/cat%20photo.png"><img src="dog.png">`,
  );
});

test('rewriteMediaReferences encodes reserved characters and rewrites sounds and CSS urls', () => {
  const mediaPaths = new Map([
    ['a#1.png', 'media/a#1.png'],
    ['why?.mp3', 'media/why?.mp3'],
    ["it's.jpg", "media/it's.jpg"],
  ]);

  assert.equal(
    rewriteMediaReferences(
      `<img src="a%231.png">[sound:why?.mp3]<div style="background: url(it's.jpg)"></div>` +
        '[sound:other.mp3]',
      mediaPaths,
    ),
    '<img src="media/a%231.png"><audio controls src="media/why%3F.mp3"></audio>' +
      `<div style="background: url('media/it%27s.jpg')"></div>[sound:other.mp3]`,
  );
});

test('encodeMediaPath keeps directory separators', () => {
  assert.equal(encodeMediaPath('media/sub dir/a#b (1).png'), 'media/sub%20dir/a%23b%20%281%29.png');
});
