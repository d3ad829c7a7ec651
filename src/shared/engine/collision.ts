/**
 * Geometry predicates shared by MapSpec validation, the generator's placement
 * loop and the renderer's last-line bounds check.
 *
 * Polygons are approximated by their axis-aligned bounding box for overlap
 * tests. That over-reports collisions for concave or diagonal polygons, which
 * only ever makes placement more conservative.
 */

import type { CircleShape, Point, RectShape, Shape } from '../types/scenario';

/** Minimum gap kept between two solid shapes. */
export const MIN_CLEARANCE_MM = 10;

export interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

export function pointsBounds(points: readonly Point[]): Bounds {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  return { minX, minY, maxX, maxY };
}

export function shapeBounds(shape: Shape): Bounds {
  switch (shape.type) {
    case 'circle':
      return {
        minX: shape.cx - shape.r,
        minY: shape.cy - shape.r,
        maxX: shape.cx + shape.r,
        maxY: shape.cy + shape.r,
      };
    case 'rect':
      return {
        minX: shape.x,
        minY: shape.y,
        maxX: shape.x + shape.width,
        maxY: shape.y + shape.height,
      };
    case 'polygon':
      return pointsBounds(shape.points);
    default: {
      const exhaustive: never = shape;
      throw new Error(`Unknown shape ${JSON.stringify(exhaustive)}`);
    }
  }
}

/** True when the shape lies entirely within `[0, widthMm] × [0, heightMm]`. */
export function isWithinTable(shape: Shape, widthMm: number, heightMm: number): boolean {
  const b = shapeBounds(shape);
  return b.minX >= 0 && b.minY >= 0 && b.maxX <= widthMm && b.maxY <= heightMm;
}

function boundsAsRect(b: Bounds): RectShape {
  return { type: 'rect', x: b.minX, y: b.minY, width: b.maxX - b.minX, height: b.maxY - b.minY };
}

function rectsOverlap(a: RectShape, b: RectShape, clearance: number): boolean {
  return !(
    a.x + a.width + clearance <= b.x ||
    b.x + b.width + clearance <= a.x ||
    a.y + a.height + clearance <= b.y ||
    b.y + b.height + clearance <= a.y
  );
}

function circlesOverlap(a: CircleShape, b: CircleShape, clearance: number): boolean {
  const dx = a.cx - b.cx;
  const dy = a.cy - b.cy;
  const reach = a.r + b.r + clearance;
  return dx * dx + dy * dy < reach * reach;
}

function rectCircleOverlap(rect: RectShape, circle: CircleShape, clearance: number): boolean {
  const nearestX = Math.max(rect.x, Math.min(circle.cx, rect.x + rect.width));
  const nearestY = Math.max(rect.y, Math.min(circle.cy, rect.y + rect.height));
  const dx = circle.cx - nearestX;
  const dy = circle.cy - nearestY;
  const reach = circle.r + clearance;
  return dx * dx + dy * dy < reach * reach;
}

function asRectOrCircle(shape: Shape): RectShape | CircleShape {
  return shape.type === 'polygon' ? boundsAsRect(shapeBounds(shape)) : shape;
}

/**
 * True when two shapes come closer than `clearance`. Either shape opting into
 * `allowOverlap` disables the check for the pair.
 */
export function shapesOverlap(a: Shape, b: Shape, clearance = MIN_CLEARANCE_MM): boolean {
  if (a.allowOverlap === true || b.allowOverlap === true) {
    return false;
  }
  const left = asRectOrCircle(a);
  const right = asRectOrCircle(b);
  if (left.type === 'rect' && right.type === 'rect') {
    return rectsOverlap(left, right, clearance);
  }
  if (left.type === 'circle' && right.type === 'circle') {
    return circlesOverlap(left, right, clearance);
  }
  if (left.type === 'rect' && right.type === 'circle') {
    return rectCircleOverlap(left, right, clearance);
  }
  if (left.type === 'circle' && right.type === 'rect') {
    return rectCircleOverlap(right, left, clearance);
  }
  return false;
}

/** True when `candidate` overlaps any shape in `placed`. */
export function collidesWithAny(
  candidate: Shape,
  placed: readonly Shape[],
  clearance = MIN_CLEARANCE_MM
): boolean {
  return placed.some((shape) => shapesOverlap(candidate, shape, clearance));
}

