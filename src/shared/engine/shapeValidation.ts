/**
 * Shape validation.
 *
 * Turns untrusted shape records (parsed JSON, form input) into the closed
 * {@link Shape} union. Checks run in a fixed order so the reported error is
 * predictable:
 *
 * 1. shape count, before any per-shape work
 * 2. `type` tag dispatch
 * 3. polygon vertex count
 * 4. integer coercion of every numeric field, positivity of sizes
 * 5. table bounds
 *
 * The first failure aborts the whole batch.
 */

import {
  InvalidCoordinateError,
  OutOfBoundsError,
  PolygonPointCountError,
  ShapeCountExceededError,
  UnknownShapeTypeError,
  ValidationError,
} from '../errors';
import type {
  CircleShape,
  Point,
  PolygonShape,
  RectShape,
  Shape,
  ShapeLayer,
  ShapeMetadata,
} from '../types/scenario';
import { SHAPE_LAYERS } from '../types/scenario';
import { isWithinTable, shapeBounds } from './collision';

export const MAX_SHAPES = 100;
export const MIN_POLYGON_POINTS = 3;
export const MAX_POLYGON_POINTS = 200;
export const MAX_LABEL_LENGTH = 120;
export const MAX_PAINT_LENGTH = 64;

const INTEGER_STRING = /^-?\d+$/;

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerce a numeric field to an integer. Integral numbers and strings of
 * decimal digits pass; booleans, fractions and everything else do not.
 */
export function coerceInteger(field: string, value: unknown): number {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return value + 0;
  }
  if (typeof value === 'string' && INTEGER_STRING.test(value.trim())) {
    const parsed = Number(value.trim());
    if (Number.isSafeInteger(parsed)) {
      return parsed + 0;
    }
  }
  throw new InvalidCoordinateError(field, value);
}

function coercePositive(field: string, value: unknown): number {
  const n = coerceInteger(field, value);
  if (n <= 0) {
    throw new InvalidCoordinateError(field, value, 'must be positive');
  }
  return n;
}

function readMetadata(index: number, record: UnknownRecord): ShapeMetadata {
  const prefix = `shapes[${index}]`;
  const metadata: {
    label?: string;
    layer?: ShapeLayer;
    allowOverlap?: boolean;
    fill?: string;
    stroke?: string;
  } = {};

  if (record.label !== undefined) {
    if (typeof record.label !== 'string' || record.label.length > MAX_LABEL_LENGTH) {
      throw new ValidationError(
        `${prefix}.label`,
        `label must be a string of at most ${MAX_LABEL_LENGTH} characters`
      );
    }
    metadata.label = record.label;
  }
  if (record.layer !== undefined) {
    const layer = SHAPE_LAYERS.find((candidate) => candidate === record.layer);
    if (!layer) {
      throw new ValidationError(`${prefix}.layer`, `unknown layer: ${String(record.layer)}`);
    }
    metadata.layer = layer;
  }
  if (record.allowOverlap !== undefined) {
    if (typeof record.allowOverlap !== 'boolean') {
      throw new ValidationError(`${prefix}.allowOverlap`, 'allowOverlap must be a boolean');
    }
    metadata.allowOverlap = record.allowOverlap;
  }
  for (const key of ['fill', 'stroke'] as const) {
    const paint = record[key];
    if (paint === undefined) {
      continue;
    }
    if (typeof paint !== 'string' || paint.length > MAX_PAINT_LENGTH) {
      throw new ValidationError(
        `${prefix}.${key}`,
        `${key} must be a string of at most ${MAX_PAINT_LENGTH} characters`
      );
    }
    metadata[key] = paint;
  }
  return metadata;
}

function readCircle(index: number, record: UnknownRecord): CircleShape {
  const prefix = `shapes[${index}]`;
  return {
    type: 'circle',
    cx: coerceInteger(`${prefix}.cx`, record.cx),
    cy: coerceInteger(`${prefix}.cy`, record.cy),
    r: coercePositive(`${prefix}.r`, record.r),
    ...readMetadata(index, record),
  };
}

function readRect(index: number, record: UnknownRecord): RectShape {
  const prefix = `shapes[${index}]`;
  return {
    type: 'rect',
    x: coerceInteger(`${prefix}.x`, record.x),
    y: coerceInteger(`${prefix}.y`, record.y),
    width: coercePositive(`${prefix}.width`, record.width),
    height: coercePositive(`${prefix}.height`, record.height),
    ...readMetadata(index, record),
  };
}

function readPoint(field: string, raw: unknown): Point {
  if (Array.isArray(raw) && raw.length === 2) {
    return { x: coerceInteger(`${field}.x`, raw[0]), y: coerceInteger(`${field}.y`, raw[1]) };
  }
  if (isRecord(raw)) {
    return { x: coerceInteger(`${field}.x`, raw.x), y: coerceInteger(`${field}.y`, raw.y) };
  }
  throw new ValidationError(field, `${field} must be an {x, y} object or an [x, y] pair`);
}

function readPolygon(index: number, record: UnknownRecord): PolygonShape {
  const prefix = `shapes[${index}]`;
  const rawPoints = record.points;
  if (!Array.isArray(rawPoints)) {
    throw new ValidationError(`${prefix}.points`, 'polygon points must be an array');
  }
  if (rawPoints.length < MIN_POLYGON_POINTS || rawPoints.length > MAX_POLYGON_POINTS) {
    throw new PolygonPointCountError(
      index,
      rawPoints.length,
      MIN_POLYGON_POINTS,
      MAX_POLYGON_POINTS
    );
  }
  const points = rawPoints.map((raw: unknown, i) => readPoint(`${prefix}.points[${i}]`, raw));
  return { type: 'polygon', points, ...readMetadata(index, record) };
}

/**
 * Validate one shape record against a table of `widthMm × heightMm`.
 */
export function validateShape(
  raw: unknown,
  index: number,
  widthMm: number,
  heightMm: number
): Shape {
  if (!isRecord(raw)) {
    throw new ValidationError(`shapes[${index}]`, `shapes[${index}] must be an object`);
  }

  let shape: Shape;
  switch (raw.type) {
    case 'circle':
      shape = readCircle(index, raw);
      break;
    case 'rect':
      shape = readRect(index, raw);
      break;
    case 'polygon':
      shape = readPolygon(index, raw);
      break;
    default:
      throw new UnknownShapeTypeError(index, raw.type);
  }

  if (!isWithinTable(shape, widthMm, heightMm)) {
    throw new OutOfBoundsError(shape.type, index, {
      bounds: shapeBounds(shape),
      table: { widthMm, heightMm },
    });
  }
  return deepFreeze(shape);
}

/**
 * Validate a whole batch. Input order is preserved; nothing is returned
 * unless every shape passes.
 */
export function validateShapes(raw: unknown, widthMm: number, heightMm: number): Shape[] {
  if (!Array.isArray(raw)) {
    throw new ValidationError('shapes', 'shapes must be an array');
  }
  if (raw.length > MAX_SHAPES) {
    throw new ShapeCountExceededError(raw.length, MAX_SHAPES);
  }
  return raw.map((item: unknown, index) => validateShape(item, index, widthMm, heightMm));
}

function deepFreeze(shape: Shape): Shape {
  if (shape.type === 'polygon') {
    shape.points.forEach((point) => Object.freeze(point));
    Object.freeze(shape.points);
  }
  return Object.freeze(shape);
}
