import type { ContentChange, CosmeticKind, FieldClassification } from '../changes.js';
import {
  listEntities,
  listTags,
  normalizeTypography,
  removeWhitespace,
  visibleText,
} from '../html-text.js';

export interface CosmeticClassifier {
  classify(previous: string, next: string): FieldClassification;
}

const COSMETIC_ORDER: readonly CosmeticKind[] = [
  'whitespace',
  'entities',
  'html-formatting',
  'case',
  'punctuation',
];

const CONTENT_CHANGE: FieldClassification = Object.freeze({
  change: 'content',
  cosmeticKinds: Object.freeze([]),
});

/**
 * Separates edits a reader would notice from edits that only touch markup, spacing,
 * entities, letter case or typographic quotes. Any other punctuation or symbol edit is
 * content: `x < 5` and `x > 5` are different answers.
 */
export class DefaultCosmeticClassifier implements CosmeticClassifier {
  classify(previous: string, next: string): FieldClassification {
    if (previous === next || !hasSameReadableText(previous, next)) {
      return CONTENT_CHANGE;
    }

    const kinds = detectCosmeticKinds(previous, next);
    return { change: summarizeCosmeticKinds(kinds), cosmeticKinds: kinds };
  }
}

/**
 * Folds the cosmetic kinds found across several fields into one classification.
 *
 * @param kinds - Cosmetic kinds in any order, possibly repeated.
 * @returns The single kind, `mixed-cosmetic`, or `content` when the list is empty.
 */
export function summarizeCosmeticKinds(kinds: Iterable<CosmeticKind>): ContentChange {
  const unique = sortCosmeticKinds(kinds);
  const [first] = unique;

  if (first === undefined) {
    return 'content';
  }

  return unique.length === 1 ? first : 'mixed-cosmetic';
}

export function sortCosmeticKinds(kinds: Iterable<CosmeticKind>): readonly CosmeticKind[] {
  const present = new Set(kinds);
  return COSMETIC_ORDER.filter((kind) => present.has(kind));
}

function hasSameReadableText(previous: string, next: string): boolean {
  return readableText(previous).toLowerCase() === readableText(next).toLowerCase();
}

function readableText(value: string): string {
  return normalizeTypography(visibleText(value));
}

function detectCosmeticKinds(previous: string, next: string): readonly CosmeticKind[] {
  if (removeWhitespace(previous) === removeWhitespace(next)) {
    return ['whitespace'];
  }

  const kinds: CosmeticKind[] = [];
  const previousText = visibleText(previous);
  const nextText = visibleText(next);

  if (!sameMembers(listEntities(previous), listEntities(next))) {
    kinds.push('entities');
  }
  if (!sameSequence(listTags(previous), listTags(next))) {
    kinds.push('html-formatting');
  }
  if (readableText(previous) !== readableText(next)) {
    kinds.push('case');
  }
  if (previousText.toLowerCase() !== nextText.toLowerCase()) {
    kinds.push('punctuation');
  }

  return kinds.length === 0 ? ['html-formatting'] : kinds;
}

function sameMembers(left: ReadonlySet<string>, right: ReadonlySet<string>): boolean {
  return left.size === right.size && [...left].every((value) => right.has(value));
}

function sameSequence(left: readonly string[], right: readonly string[]): boolean {
  return left.length === right.length && left.every((value, index) => value === right[index]);
}
