import { TemplateRenderError } from '../domain/errors.js';
import { stripTags } from '../domain/html-text.js';
import {
  isClozeTag,
  parseClozeTag,
  renderClozeMarker,
  renderClozeText,
  type CardSide,
  type ClozeMarker,
} from './cloze.js';

export type FieldValues = ReadonlyMap<string, string>;

export interface TemplateRenderOptions {
  readonly side?: CardSide;
  readonly revealedClozeIndex?: number;
  readonly tags?: readonly string[];
  /** Rendered front of the card, substituted for `{{FrontSide}}`. */
  readonly frontSide?: string;
}

export type TemplateNode =
  | { readonly type: 'text'; readonly value: string }
  | {
      readonly type: 'field';
      readonly name: string;
      readonly filters: readonly string[];
      readonly offset: number;
    }
  | {
      readonly type: 'section';
      readonly name: string;
      readonly inverted: boolean;
      readonly children: readonly TemplateNode[];
    }
  | { readonly type: 'cloze'; readonly marker: ClozeMarker };

export interface CompiledTemplate {
  readonly source: string;
  readonly nodes: readonly TemplateNode[];
}

interface TagToken {
  readonly content: string;
  readonly raw: string;
  readonly offset: number;
}

interface OpenSection {
  readonly name: string;
  readonly inverted: boolean;
  readonly tag: TagToken;
  readonly children: TemplateNode[];
}

export const FRONT_SIDE_FIELD = 'FrontSide';
export const TAGS_FIELD = 'Tags';

/**
 * Parses a card format string into a node tree that can be rendered any number of times.
 *
 * @param source - Template text such as `{{Front}}<hr id=answer>{{Back}}`.
 * @returns The compiled template.
 * @throws {TemplateRenderError} On an unterminated or empty tag, a section left open, a
 * closing tag that does not match the open section, or a malformed cloze marker.
 */
export function compileTemplate(source: string): CompiledTemplate {
  const root: TemplateNode[] = [];
  const stack: OpenSection[] = [];
  const current = (): TemplateNode[] => stack.at(-1)?.children ?? root;
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf('{{', cursor);
    if (open === -1) {
      current().push({ type: 'text', value: source.slice(cursor) });
      break;
    }
    if (open > cursor) {
      current().push({ type: 'text', value: source.slice(cursor, open) });
    }

    const close = source.indexOf('}}', open + 2);
    if (close === -1) {
      throw new TemplateRenderError('Unterminated tag', source.slice(open), open);
    }

    const tag: TagToken = {
      content: source.slice(open + 2, close).trim(),
      raw: source.slice(open, close + 2),
      offset: open,
    };
    cursor = close + 2;

    const sigil = tag.content.charAt(0);
    if (sigil === '#' || sigil === '^') {
      stack.push({
        name: requireName(tag.content.slice(1), tag),
        inverted: sigil === '^',
        tag,
        children: [],
      });
      continue;
    }

    if (sigil === '/') {
      const name = requireName(tag.content.slice(1), tag);
      const section = stack.pop();
      if (section === undefined) {
        throw new TemplateRenderError('Closing tag without an open section', tag.raw, tag.offset);
      }
      if (section.name !== name) {
        throw new TemplateRenderError(
          `Closing tag does not match open section "${section.name}"`,
          tag.raw,
          tag.offset,
        );
      }
      current().push({
        type: 'section',
        name: section.name,
        inverted: section.inverted,
        children: section.children,
      });
      continue;
    }

    current().push(parseSubstitution(tag));
  }

  const unclosed = stack.at(-1);
  if (unclosed !== undefined) {
    throw new TemplateRenderError('Unterminated section', unclosed.tag.raw, unclosed.tag.offset);
  }

  return { source, nodes: root };
}

/**
 * Renders a compiled template against a note's field values. References to fields that
 * do not exist render as the empty string.
 *
 * @param template - Template produced by {@link compileTemplate}.
 * @param fields - Field values keyed by field name.
 * @param options - Card side, cloze index, tags and the rendered front side.
 * @returns The rendered HTML fragment.
 * @throws {TemplateRenderError} When a field rendered through the `cloze` filter holds a
 * malformed cloze marker.
 */
export function renderCompiledTemplate(
  template: CompiledTemplate,
  fields: FieldValues,
  options: TemplateRenderOptions = {},
): string {
  return renderNodes(template.nodes, fields, options);
}

/**
 * Compiles and renders a template in one step.
 *
 * @param source - Template text.
 * @param fields - Field values keyed by field name.
 * @param options - Card side, cloze index, tags and the rendered front side.
 * @returns The rendered HTML fragment.
 */
export function renderTemplate(
  source: string,
  fields: FieldValues,
  options: TemplateRenderOptions = {},
): string {
  return renderCompiledTemplate(compileTemplate(source), fields, options);
}

/**
 * Pairs a model's field names with a note's values by position.
 *
 * @param fieldNames - Ordered field names of the note model.
 * @param values - Ordered field values of the note.
 * @returns Field values keyed by name; names without a value map to the empty string.
 */
export function createFieldValues(
  fieldNames: readonly string[],
  values: readonly string[],
): FieldValues {
  return new Map(fieldNames.map((name, index) => [name, values[index] ?? '']));
}

function renderNodes(
  nodes: readonly TemplateNode[],
  fields: FieldValues,
  options: TemplateRenderOptions,
): string {
  let output = '';

  for (const node of nodes) {
    switch (node.type) {
      case 'text': {
        output += node.value;
        break;
      }
      case 'field': {
        output += applyFilters(lookupField(node.name, fields, options), node.filters, options);
        break;
      }
      case 'section': {
        const present = lookupField(node.name, fields, options).trim().length > 0;
        if (present !== node.inverted) {
          output += renderNodes(node.children, fields, options);
        }
        break;
      }
      case 'cloze': {
        output += renderClozeMarker(node.marker, options);
        break;
      }
    }
  }

  return output;
}

function lookupField(name: string, fields: FieldValues, options: TemplateRenderOptions): string {
  if (name === FRONT_SIDE_FIELD) {
    return options.frontSide ?? '';
  }
  if (name === TAGS_FIELD) {
    return (options.tags ?? []).join(' ');
  }
  return fields.get(name) ?? '';
}

function applyFilters(
  value: string,
  filters: readonly string[],
  options: TemplateRenderOptions,
): string {
  // The filter written closest to the field name runs first.
  return filters.reduceRight((current, filter) => {
    switch (filter) {
      case 'cloze': {
        return renderClozeText(current, options);
      }
      case 'text': {
        return stripTags(current);
      }
      default: {
        return current;
      }
    }
  }, value);
}

function parseSubstitution(tag: TagToken): TemplateNode {
  if (isClozeTag(tag.content)) {
    return { type: 'cloze', marker: parseClozeTag(tag.content, tag.offset, tag.raw) };
  }

  const segments = tag.content.split(':').map((segment) => segment.trim());
  const name = requireName(segments.at(-1) ?? '', tag);

  return {
    type: 'field',
    name,
    filters: segments.slice(0, -1).filter((filter) => filter.length > 0),
    offset: tag.offset,
  };
}

function requireName(candidate: string, tag: TagToken): string {
  const name = candidate.trim();
  if (name.length === 0) {
    throw new TemplateRenderError('Empty tag', tag.raw, tag.offset);
  }
  return name;
}
