/**
 * MapSpec → SVG.
 *
 * A pure function of its inputs. The MapSpec has already been validated, but
 * the renderer repeats its own checks immediately before writing markup:
 * every number must still be an integer, every shape must still lie on the
 * table, every element and attribute must be on the allowlist, every paint
 * must pass the paint filter and every piece of text is escaped. A failed
 * check is reported as a refusal and no markup at all is returned.
 */

import { RenderRefusedError } from '../errors';
import { isWithinTable } from '../engine/collision';
import type { MapSpec } from '../engine/mapSpec';
import { MAX_POLYGON_POINTS, MAX_SHAPES, MIN_POLYGON_POINTS } from '../engine/shapeValidation';
import type { TableSize } from '../engine/tableSize';
import type { CircleShape, PolygonShape, RectShape, Shape, ShapeLayer } from '../types/scenario';
import { LABEL_FONT_SIZE, placeObjectiveLabel } from './labelPlacement';
import type { SvgElementName } from './svgAllowlist';
import { SVG_NAMESPACE, isAllowedAttribute } from './svgAllowlist';
import { escapeXml, safePaint, svgInt } from './svgSafety';

export type RenderResult = { ok: true; svg: string } | { ok: false; error: RenderRefusedError };

export interface RenderOptions {
  /** Caption drawn across the top of the map. */
  overlayText?: string;
  /** Draw shape labels (default true). */
  showLabels?: boolean;
}

interface Paint {
  fill: string;
  stroke: string;
}

const LAYER_PAINT: Record<ShapeLayer, Paint> = {
  deployment: { fill: 'rgba(100,150,250,0.3)', stroke: '#4070c0' },
  scenography: { fill: 'rgba(120,120,120,0.35)', stroke: '#555555' },
  objective: { fill: '#000000', stroke: '#ffffff' },
};

const TYPE_PAINT: Record<Shape['type'], Paint> = {
  rect: { fill: 'rgba(128,128,128,0.2)', stroke: '#666666' },
  circle: { fill: 'rgba(128,128,128,0.2)', stroke: '#666666' },
  polygon: { fill: 'rgba(250,100,100,0.3)', stroke: '#c04040' },
};

const STROKE_WIDTH = 2;
const TEXT_FILL = '#000000';
const FONT_FAMILY = 'Arial, sans-serif';
const OVERLAY_FONT_SIZE = 24;

type Attributes = ReadonlyArray<readonly [string, string | number]>;

function element(tag: SvgElementName, attributes: Attributes, content?: string): string {
  const rendered = attributes
    .map(([name, value]) => {
      if (!isAllowedAttribute(tag, name)) {
        throw new RenderRefusedError(`attribute ${name} is not allowed on <${tag}>`);
      }
      return ` ${name}="${escapeXml(String(value))}"`;
    })
    .join('');
  return content === undefined ? `<${tag}${rendered}/>` : `<${tag}${rendered}>${content}</${tag}>`;
}

function paintFor(shape: Shape): Attributes {
  const defaults = shape.layer ? LAYER_PAINT[shape.layer] : TYPE_PAINT[shape.type];
  return [
    ['fill', safePaint(shape.fill, defaults.fill)],
    ['stroke', safePaint(shape.stroke, defaults.stroke)],
    ['stroke-width', STROKE_WIDTH],
  ];
}

function textElement(
  x: number,
  y: number,
  text: string,
  fontSize: number,
  anchor: 'start' | 'middle' | 'end' = 'middle'
): string {
  return element(
    'text',
    [
      ['x', svgInt(x, 'text.x')],
      ['y', svgInt(y, 'text.y')],
      ['fill', TEXT_FILL],
      ['font-size', fontSize],
      ['font-family', FONT_FAMILY],
      ['text-anchor', anchor],
      ['dominant-baseline', 'middle'],
      ['font-weight', 'bold'],
    ],
    escapeXml(text)
  );
}

function renderRect(shape: RectShape, index: number): string {
  return element('rect', [
    ['x', svgInt(shape.x, `shapes[${index}].x`)],
    ['y', svgInt(shape.y, `shapes[${index}].y`)],
    ['width', svgInt(shape.width, `shapes[${index}].width`)],
    ['height', svgInt(shape.height, `shapes[${index}].height`)],
    ...paintFor(shape),
  ]);
}

function renderCircle(shape: CircleShape, index: number): string {
  return element('circle', [
    ['cx', svgInt(shape.cx, `shapes[${index}].cx`)],
    ['cy', svgInt(shape.cy, `shapes[${index}].cy`)],
    ['r', svgInt(shape.r, `shapes[${index}].r`)],
    ...paintFor(shape),
  ]);
}

function renderPolygon(shape: PolygonShape, index: number): string {
  const count = shape.points.length;
  if (count < MIN_POLYGON_POINTS || count > MAX_POLYGON_POINTS) {
    throw new RenderRefusedError(`polygon at index ${index} has ${count} points`, { index });
  }
  const points = shape.points
    .map(
      (p, i) =>
        `${svgInt(p.x, `shapes[${index}].points[${i}].x`)},${svgInt(p.y, `shapes[${index}].points[${i}].y`)}`
    )
    .join(' ');
  return element('polygon', [['points', points], ...paintFor(shape)]);
}

function shapeCentre(shape: Shape): { x: number; y: number } {
  switch (shape.type) {
    case 'circle':
      return { x: shape.cx, y: shape.cy };
    case 'rect':
      return {
        x: shape.x + Math.floor(shape.width / 2),
        y: shape.y + Math.floor(shape.height / 2),
      };
    case 'polygon': {
      const sx = shape.points.reduce((sum, p) => sum + p.x, 0);
      const sy = shape.points.reduce((sum, p) => sum + p.y, 0);
      return {
        x: Math.round(sx / shape.points.length),
        y: Math.round(sy / shape.points.length),
      };
    }
    default: {
      const exhaustive: never = shape;
      throw new RenderRefusedError(`unknown shape ${JSON.stringify(exhaustive)}`);
    }
  }
}

function renderLabel(shape: Shape, widthMm: number, heightMm: number): string | null {
  if (shape.label === undefined || shape.label.trim() === '') {
    return null;
  }
  if (shape.layer === 'objective' && shape.type === 'circle') {
    const position = placeObjectiveLabel(
      shape.cx,
      shape.cy,
      shape.r,
      shape.label,
      widthMm,
      heightMm
    );
    const text = textElement(position.x, position.y, shape.label, LABEL_FONT_SIZE);
    if (position.rotation === 0) {
      return text;
    }
    const x = svgInt(position.x, 'label.x');
    const y = svgInt(position.y, 'label.y');
    return element('g', [['transform', `rotate(${position.rotation} ${x} ${y})`]], text);
  }
  const centre = shapeCentre(shape);
  return textElement(centre.x, centre.y, shape.label, LABEL_FONT_SIZE);
}

function renderShape(shape: Shape, index: number): string {
  switch (shape.type) {
    case 'rect':
      return renderRect(shape, index);
    case 'circle':
      return renderCircle(shape, index);
    case 'polygon':
      return renderPolygon(shape, index);
    default: {
      const exhaustive: never = shape;
      throw new RenderRefusedError(`unknown shape type at index ${index}`, {
        index,
        shape: JSON.stringify(exhaustive),
      });
    }
  }
}

function renderDocument(mapSpec: MapSpec, table: TableSize, options: RenderOptions): string {
  const width = svgInt(table.widthMm, 'table.widthMm');
  const height = svgInt(table.heightMm, 'table.heightMm');

  if (mapSpec.shapes.length > MAX_SHAPES) {
    throw new RenderRefusedError(`too many shapes (${mapSpec.shapes.length})`);
  }

  const body: string[] = [];
  const labels: string[] = [];
  mapSpec.shapes.forEach((shape, index) => {
    body.push(renderShape(shape, index));
    if (!isWithinTable(shape, width, height)) {
      throw new RenderRefusedError(`shape at index ${index} lies outside the table`, { index });
    }
    if (options.showLabels !== false) {
      const label = renderLabel(shape, width, height);
      if (label !== null) {
        labels.push(label);
      }
    }
  });

  if (options.overlayText !== undefined && options.overlayText.trim() !== '') {
    labels.push(
      textElement(Math.floor(width / 2), OVERLAY_FONT_SIZE, options.overlayText, OVERLAY_FONT_SIZE)
    );
  }

  return element(
    'svg',
    [
      ['xmlns', SVG_NAMESPACE],
      ['width', width],
      ['height', height],
      ['viewBox', `0 0 ${width} ${height}`],
    ],
    [...body, ...labels].join('')
  );
}

/**
 * Render `mapSpec` on `table` (defaults to the MapSpec's own table).
 *
 * Never throws for out-of-contract input: a failed check comes back as
 * `{ ok: false, error }`.
 */
export function renderMapSvg(
  mapSpec: MapSpec,
  table: TableSize = mapSpec.table,
  options: RenderOptions = {}
): RenderResult {
  try {
    return { ok: true, svg: renderDocument(mapSpec, table, options) };
  } catch (error) {
    if (error instanceof RenderRefusedError) {
      return { ok: false, error };
    }
    throw error;
  }
}
