import { TemplateRenderError } from '../domain/errors.js';

export type CardSide = 'front' | 'back';

export interface ClozeMarker {
  readonly index: number;
  readonly answer: string;
  readonly hint?: string;
  /** Character offset of the opening braces within the scanned text. */
  readonly offset: number;
  readonly raw: string;
}

export interface ClozeRenderOptions {
  readonly side?: CardSide;
  readonly revealedClozeIndex?: number;
}

export const IMAGE_OCCLUSION_PREFIX = 'image-occlusion:';

const MARKER_START = /\{\{c\d+::/g;
const MARKER_BODY = /^c(\d+)::([\s\S]+?)(?:::([\s\S]*))?$/;

/**
 * Tests whether tag content (the text between `{{` and `}}`) starts a cloze marker.
 */
export function isClozeTag(content: string): boolean {
  return /^c\d+::/.test(content);
}

/**
 * Parses the body of a cloze tag such as `c2::answer::hint`.
 *
 * @param content - Tag content without the surrounding braces.
 * @param offset - Offset of the tag, used for error reporting.
 * @param raw - Full tag text including braces.
 * @returns The parsed marker.
 * @throws {TemplateRenderError} When the index is zero or the answer is empty.
 */
export function parseClozeTag(content: string, offset: number, raw: string): ClozeMarker {
  const match = MARKER_BODY.exec(content);
  const index = match?.[1] === undefined ? Number.NaN : Number.parseInt(match[1], 10);
  const answer = match?.[2];

  if (answer === undefined || !Number.isInteger(index) || index < 1) {
    throw new TemplateRenderError('Malformed cloze marker', raw, offset);
  }

  const hint = match?.[3];
  return {
    index,
    answer,
    ...(hint === undefined || hint.length === 0 ? {} : { hint }),
    offset,
    raw,
  };
}

/**
 * Finds every cloze marker in a field value, in order of appearance.
 *
 * @param text - Field value.
 * @returns The markers found; text without markers yields an empty list.
 * @throws {TemplateRenderError} When a marker has no closing braces or is malformed.
 */
export function parseClozeMarkers(text: string): readonly ClozeMarker[] {
  const markers: ClozeMarker[] = [];

  for (const match of text.matchAll(MARKER_START)) {
    const offset = match.index ?? 0;
    const close = text.indexOf('}}', offset + 2);
    if (close === -1) {
      throw new TemplateRenderError('Unterminated cloze marker', text.slice(offset), offset);
    }
    markers.push(parseClozeTag(text.slice(offset + 2, close), offset, text.slice(offset, close + 2)));
  }

  return dropNestedMatches(markers);
}

/**
 * Lists the distinct cloze indices used in the given field values.
 *
 * @param values - Field values to scan.
 * @returns Sorted ascending, without duplicates.
 */
export function listClozeIndices(values: Iterable<string>): readonly number[] {
  const indices = new Set<number>();
  for (const value of values) {
    for (const marker of parseClozeMarkers(value)) {
      indices.add(marker.index);
    }
  }
  return [...indices].sort((left, right) => left - right);
}

/**
 * Replaces each cloze marker in a field value with its rendered form and leaves the
 * surrounding text untouched.
 *
 * @param text - Field value holding cloze markers.
 * @param options - Card side and the index being asked about.
 * @returns HTML with markers rendered.
 */
export function renderClozeText(text: string, options: ClozeRenderOptions = {}): string {
  let output = '';
  let cursor = 0;

  for (const marker of parseClozeMarkers(text)) {
    output += text.slice(cursor, marker.offset) + renderClozeMarker(marker, options);
    cursor = marker.offset + marker.raw.length;
  }

  return output + text.slice(cursor);
}

/**
 * Renders a single cloze marker. The marker being asked about is hidden on the front
 * side; every other marker shows its answer. Image occlusion markers render nothing since
 * their shapes are drawn separately.
 */
export function renderClozeMarker(marker: ClozeMarker, options: ClozeRenderOptions = {}): string {
  if (marker.answer.startsWith(IMAGE_OCCLUSION_PREFIX)) {
    return '';
  }

  const index = String(marker.index);
  const side = options.side ?? 'front';

  if (options.revealedClozeIndex === marker.index && side === 'front') {
    return `<span class="cloze cloze--hidden" data-cloze="${index}">[${marker.hint ?? '...'}]</span>`;
  }

  return `<span class="cloze" data-cloze="${index}">${marker.answer}</span>`;
}

function dropNestedMatches(markers: readonly ClozeMarker[]): readonly ClozeMarker[] {
  const result: ClozeMarker[] = [];
  let end = -1;

  for (const marker of markers) {
    if (marker.offset < end) {
      continue;
    }
    result.push(marker);
    end = marker.offset + marker.raw.length;
  }

  return result;
}
