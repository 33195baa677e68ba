import type { Note, NoteModel } from '../domain/deck.js';
import { IMAGE_OCCLUSION_PREFIX, parseClozeMarkers, type CardSide } from '../templating/cloze.js';
import { createFieldValues } from '../templating/template-engine.js';
import type { NoteRenderOptions } from './note-renderer.js';
import { TemplateNoteRenderer } from './template-note-renderer.js';

export type OcclusionShapeKind = 'rect' | 'ellipse';

/**
 * A masked region of the occluded image. Positions and sizes are fractions of the image
 * width and height.
 */
export interface OcclusionShape {
  readonly clozeIndex: number;
  readonly kind: OcclusionShapeKind;
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
}

const IMAGE_FIELD = 'Image';
const OCCLUSION_FIELDS: readonly string[] = ['Occlusion', 'Occlusions'];
const SCRIPT_PATTERN = /<script\b[\s\S]*?<\/script>/gi;
const CANVAS_PATTERN = /<canvas\b[\s\S]*?<\/canvas>/gi;
const IMAGE_TAG_PATTERN = /<img\b[^>]*>/i;

/**
 * Renders image occlusion notes as a figure holding the image with one absolutely
 * positioned overlay per shape. Masks are opaque on the front and outlined on the back.
 * The model's own template follows without its image, occlusion data, scripts or canvas.
 */
export class ImageOcclusionNoteRenderer extends TemplateNoteRenderer {
  readonly variant = 'image-occlusion';

  override render(
    note: Note,
    model: NoteModel,
    side: CardSide,
    options: NoteRenderOptions = {},
  ): string {
    const fields = createFieldValues(model.fieldNames, note.fields);
    const occlusionField = OCCLUSION_FIELDS.find((name) => fields.has(name));
    const occlusionSource =
      occlusionField === undefined ? note.fields.join('\n') : (fields.get(occlusionField) ?? '');
    const image = fields.get(IMAGE_FIELD) ?? findImage(note.fields);

    const remaining = new Map(fields);
    remaining.set(IMAGE_FIELD, '');
    if (occlusionField !== undefined) {
      remaining.set(occlusionField, '');
    }

    const template = this.renderTemplateSide(note, model, remaining, side, options)
      .replaceAll(SCRIPT_PATTERN, '')
      .replaceAll(CANVAS_PATTERN, '');

    const overlays = parseOcclusionShapes(occlusionSource)
      .map((shape) => renderOverlay(shape, side))
      .join('');

    return `<figure class="occlusion-figure">${image}${overlays}</figure>${template}`;
  }
}

/**
 * Extracts occlusion shapes from markers such as
 * `{{c1::image-occlusion:rect:left=.59:top=.44:width=.08:height=.1:oi=1}}`. Ellipses may
 * give `rx`/`ry` radii instead of a width and height. Shapes of other kinds are skipped.
 *
 * @param text - Field value holding the occlusion markers.
 * @returns Shapes in marker order.
 */
export function parseOcclusionShapes(text: string): readonly OcclusionShape[] {
  const shapes: OcclusionShape[] = [];

  for (const marker of parseClozeMarkers(text)) {
    if (!marker.answer.startsWith(IMAGE_OCCLUSION_PREFIX)) {
      continue;
    }

    const [kind, ...parameters] = marker.answer.slice(IMAGE_OCCLUSION_PREFIX.length).split(':');
    if (kind !== 'rect' && kind !== 'ellipse') {
      continue;
    }

    const values = new Map<string, number>();
    for (const parameter of parameters) {
      const separator = parameter.indexOf('=');
      if (separator > 0) {
        values.set(parameter.slice(0, separator), toNumber(parameter.slice(separator + 1)));
      }
    }

    const rx = values.get('rx');
    const ry = values.get('ry');
    shapes.push({
      clozeIndex: marker.index,
      kind,
      left: values.get('left') ?? 0,
      top: values.get('top') ?? 0,
      width: values.get('width') ?? (rx === undefined ? 0 : rx * 2),
      height: values.get('height') ?? (ry === undefined ? 0 : ry * 2),
    });
  }

  return shapes;
}

function renderOverlay(shape: OcclusionShape, side: CardSide): string {
  const state = side === 'front' ? 'masked' : 'revealed';
  const style = [
    `left:${formatPercent(shape.left)}`,
    `top:${formatPercent(shape.top)}`,
    `width:${formatPercent(shape.width)}`,
    `height:${formatPercent(shape.height)}`,
  ].join(';');

  return `<div class="occlusion occlusion--${shape.kind} occlusion--${state}" data-cloze="${String(shape.clozeIndex)}" style="${style}"></div>`;
}

function formatPercent(fraction: number): string {
  return `${String(Number((fraction * 100).toFixed(4)))}%`;
}

function toNumber(value: string): number {
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

function findImage(values: readonly string[]): string {
  for (const value of values) {
    const match = IMAGE_TAG_PATTERN.exec(value);
    if (match !== null) {
      return match[0];
    }
  }
  return '';
}
