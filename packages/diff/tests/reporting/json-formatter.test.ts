import { test } from 'vitest';
import assert from 'node:assert/strict';

import { computeNoteChanges } from '../../src/domain/note-differ.js';
import { createRenderContext } from '../../src/rendering/render-context.js';
import { assembleReport } from '../../src/reporting/assembler.js';
import { createJsonPayload, formatReportAsJson } from '../../src/reporting/renderers/json.js';
import { createRunContext } from '../../src/reporting/run-context.js';
import { createNote, createSnapshot } from '../fixtures/decks.js';

const generatedAt = new Date('2024-03-01T09:30:00.000Z');

function createEntries() {
  const previous = createSnapshot([createNote('n1', ['Q', 'old'], { tags: ['a'] })]);
  const next = createSnapshot([createNote('n1', ['Q', 'new'], { tags: ['b'] })]);
  return assembleReport(computeNoteChanges(previous, next), createRenderContext([previous, next]));
}

test('createJsonPayload describes every changed field', () => {
  const payload = createJsonPayload(createEntries(), {
    generatedAt,
    runContext: createRunContext({ previous: 'p', next: 'n', durationMs: 12 }),
  });

  assert.equal(payload.reportSchemaVersion, 1);
  assert.equal(payload.generatedAt, '2024-03-01T09:30:00.000Z');
  assert.deepEqual(payload.run, { previous: 'p', next: 'n', durationMs: 12 });
  assert.equal(payload.summary.modified, 1);

  const [entry] = payload.entries;
  assert.equal(entry?.kind, 'modified');
  assert.equal(entry?.model, 'Basic');
  assert.deepEqual(entry?.tagsAdded, ['b']);
  assert.deepEqual(entry?.tagsRemoved, ['a']);
  assert.deepEqual(entry?.fields, [
    {
      index: 1,
      name: 'Back',
      kind: 'changed',
      previous: 'old',
      next: 'new',
      classification: 'content',
    },
  ]);
});

test('formatReportAsJson omits the run block without a run context', () => {
  const text = formatReportAsJson([], { generatedAt });

  assert.ok(text.endsWith('\n'));
  const parsed: unknown = JSON.parse(text);
  assert.deepEqual(parsed, {
    reportSchemaVersion: 1,
    generatedAt: '2024-03-01T09:30:00.000Z',
    summary: {
      total: 0,
      added: 0,
      modified: 0,
      removed: 0,
      content: 0,
      cosmeticOnly: 0,
      cosmetic: {
        whitespace: 0,
        entities: 0,
        'html-formatting': 0,
        case: 0,
        punctuation: 0,
        'mixed-cosmetic': 0,
      },
    },
    entries: [],
  });
});
