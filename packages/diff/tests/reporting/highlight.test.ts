import { test } from 'vitest';
import assert from 'node:assert/strict';

import { highlightFieldDiff } from '../../src/reporting/highlight.js';

test('highlightFieldDiff marks removed and added words', () => {
  assert.deepEqual(highlightFieldDiff('the red fox', 'the blue fox'), {
    previousHtml: 'the <del>red</del> fox',
    nextHtml: 'the <ins>blue</ins> fox',
  });
});

test('highlightFieldDiff escapes markup', () => {
  assert.deepEqual(highlightFieldDiff('a < b', 'a < b'), {
    previousHtml: 'a &lt; b',
    nextHtml: 'a &lt; b',
  });
});

test('highlightFieldDiff treats a missing value as empty', () => {
  assert.deepEqual(highlightFieldDiff('old', undefined), {
    previousHtml: '<del>old</del>',
    nextHtml: '',
  });
});
