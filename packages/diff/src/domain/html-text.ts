const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ensp: ' ',
  emsp: ' ',
  thinsp: ' ',
  ndash: '–',
  mdash: '—',
  hellip: '…',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
  middot: '·',
  times: '×',
  copy: '©',
  reg: '®',
};

const ENTITY_PATTERN = /&(#\d+|#x[\da-f]+|[a-z]+);/gi;
const TAG_PATTERN = /<[^>]*>/g;
const WHITESPACE_ENTITY_PATTERN = /&(nbsp|ensp|emsp|thinsp|#160|#8194|#8195|#8201);/gi;

/**
 * Decodes numeric character references and the common named entities. Unknown named
 * entities are left untouched.
 *
 * @param value - HTML text.
 * @returns Text with entities replaced by their characters.
 */
export function decodeEntities(value: string): string {
  return value.replaceAll(ENTITY_PATTERN, (match, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return fromCodePoint(Number.parseInt(body.slice(2), 16), match);
    }
    if (body.startsWith('#')) {
      return fromCodePoint(Number.parseInt(body.slice(1), 10), match);
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

export function stripTags(value: string): string {
  return value.replaceAll(TAG_PATTERN, '');
}

export function collapseWhitespace(value: string): string {
  return value.replaceAll(/\s+/g, ' ').trim();
}

/**
 * Text a reader sees once the markup is rendered: tags removed, entities decoded and
 * whitespace runs collapsed.
 */
export function visibleText(value: string): string {
  return collapseWhitespace(decodeEntities(stripTags(value)));
}

export function listTags(value: string): readonly string[] {
  return value.match(TAG_PATTERN) ?? [];
}

export function listEntities(value: string): ReadonlySet<string> {
  return new Set(value.match(ENTITY_PATTERN) ?? []);
}

export function removeWhitespace(value: string): string {
  return value.replaceAll(WHITESPACE_ENTITY_PATTERN, '').replaceAll(/\s+/g, '');
}

const TYPOGRAPHIC_VARIANTS: readonly (readonly [RegExp, string])[] = [
  [/[\u2018\u2019\u201a\u2032]/g, "'"],
  [/[\u201c\u201d\u201e\u2033]/g, '"'],
  [/\u2026/g, '...'],
];

/**
 * Folds typographic punctuation onto its plain form: curly quotes and primes become
 * straight quotes and an ellipsis becomes three dots. Every other character is kept.
 */
export function normalizeTypography(value: string): string {
  return TYPOGRAPHIC_VARIANTS.reduce(
    (text, [pattern, replacement]) => text.replaceAll(pattern, replacement),
    value,
  );
}

function fromCodePoint(codePoint: number, fallback: string): string {
  if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10_ff_ff) {
    return fallback;
  }
  return String.fromCodePoint(codePoint);
}
