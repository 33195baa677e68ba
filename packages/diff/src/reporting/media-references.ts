import type { NoteChange } from '../domain/changes.js';

const IMAGE_SOURCE_PATTERN = /<img\b[^>]*?\bsrc\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/gi;
const SOUND_PATTERN = /\[sound:([^\]]+)\]/g;
const CSS_URL_PATTERN = /url\(\s*(?:"([^"]*)"|'([^']*)'|([^)\s]*))\s*\)/gi;
const IMAGE_REWRITE_PATTERN = /(<img\b[^>]*?\bsrc\s*=\s*)(?:"([^"]*)"|'([^']*)'|([^\s>]+))/gi;
const EXTERNAL_PATTERN = /^(?:[a-z][\d+.a-z-]*:|\/\/|#)/i;

/**
 * Lists the local media files referenced by a piece of note HTML: `<img src>` values,
 * `[sound:…]` tags and CSS `url(…)` values. Remote and data URLs are ignored.
 *
 * @param html - Field value or rendered fragment.
 * @returns Referenced file names in order of first appearance.
 */
export function extractMediaReferences(html: string): readonly string[] {
  const names = new Set<string>();
  const add = (candidate: string | undefined): void => {
    const name = candidate?.trim();
    if (name && !EXTERNAL_PATTERN.test(name)) {
      names.add(decodeName(name));
    }
  };

  for (const match of html.matchAll(IMAGE_SOURCE_PATTERN)) {
    add(match[1] ?? match[2] ?? match[3]);
  }
  for (const match of html.matchAll(SOUND_PATTERN)) {
    add(match[1]);
  }
  for (const match of html.matchAll(CSS_URL_PATTERN)) {
    add(match[1] ?? match[2] ?? match[3]);
  }

  return [...names];
}

/**
 * Collects the media referenced by every note shown in the report.
 *
 * @param changes - Note changes of the run.
 * @returns Distinct file names, sorted.
 */
export function collectMediaReferences(changes: readonly NoteChange[]): readonly string[] {
  const names = new Set<string>();

  for (const change of changes) {
    const notes = [
      ...(change.kind === 'added' ? [] : [change.previous.note]),
      ...(change.kind === 'removed' ? [] : [change.next.note]),
    ];
    for (const note of notes) {
      for (const value of note.fields) {
        for (const name of extractMediaReferences(value)) {
          names.add(name);
        }
      }
    }
  }

  return [...names].sort();
}

/**
 * Points media references at their copied location: `<img src>` and CSS `url(…)` values
 * are rewritten in place and a `[sound:…]` tag becomes an `<audio>` player.
 *
 * @param html - Rendered fragment.
 * @param mediaPaths - Map from referenced file name to output-relative path.
 * @returns The fragment with every mapped reference rewritten.
 */
export function rewriteMediaReferences(
  html: string,
  mediaPaths: ReadonlyMap<string, string>,
): string {
  if (mediaPaths.size === 0) {
    return html;
  }

  const lookup = (reference: string): string | undefined => {
    const target = mediaPaths.get(decodeName(reference.trim()));
    return target === undefined ? undefined : encodeMediaPath(target);
  };

  return html
    .replaceAll(
      IMAGE_REWRITE_PATTERN,
      (match, prefix: string, double?: string, single?: string, bare?: string) => {
        const url = lookup(double ?? single ?? bare ?? '');
        return url === undefined ? match : `${prefix}"${url}"`;
      },
    )
    .replaceAll(CSS_URL_PATTERN, (match, double?: string, single?: string, bare?: string) => {
      const url = lookup(double ?? single ?? bare ?? '');
      return url === undefined ? match : `url('${url}')`;
    })
    .replaceAll(SOUND_PATTERN, (match, name: string) => {
      const url = lookup(name);
      return url === undefined ? match : `<audio controls src="${url}"></audio>`;
    });
}

/**
 * Percent-encodes each segment of a relative media path so that `#`, `?` and quotes in
 * file names survive inside attributes and CSS.
 */
export function encodeMediaPath(relativePath: string): string {
  return relativePath
    .split('/')
    .map((segment) =>
      encodeURIComponent(segment).replaceAll(
        /['()]/g,
        (character) => `%${character.charCodeAt(0).toString(16).toUpperCase()}`,
      ),
    )
    .join('/');
}

function decodeName(name: string): string {
  try {
    return decodeURIComponent(name);
  } catch {
    return name;
  }
}
