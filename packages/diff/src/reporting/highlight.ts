import { escapeHtml } from '@deckdiff/core';
import { diffWordsWithSpace, type Change } from 'diff';

export interface HighlightedFieldDiff {
  readonly previousHtml: string;
  readonly nextHtml: string;
}

/**
 * Word-level comparison of two field values for display. Both values are escaped, so
 * markup edits show up as text; removed words are wrapped in `<del>` on the previous side
 * and added words in `<ins>` on the next side.
 *
 * @param previous - Field value before the change, `undefined` when absent.
 * @param next - Field value after the change, `undefined` when absent.
 * @returns Escaped HTML for both sides.
 */
export function highlightFieldDiff(
  previous: string | undefined,
  next: string | undefined,
): HighlightedFieldDiff {
  const parts: Change[] = diffWordsWithSpace(previous ?? '', next ?? '');
  let previousHtml = '';
  let nextHtml = '';

  for (const part of parts) {
    const text = escapeHtml(part.value);
    if (part.added) {
      nextHtml += `<ins>${text}</ins>`;
    } else if (part.removed) {
      previousHtml += `<del>${text}</del>`;
    } else {
      previousHtml += text;
      nextHtml += text;
    }
  }

  return { previousHtml, nextHtml };
}
