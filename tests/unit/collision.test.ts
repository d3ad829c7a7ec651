import {
  collidesWithAny,
  isWithinTable,
  shapeBounds,
  shapesOverlap,
} from '../../src/shared/engine/collision';
import type { CircleShape, PolygonShape, RectShape } from '../../src/shared/types/scenario';

const rect = (x: number, y: number, width: number, height: number): RectShape => ({
  type: 'rect',
  x,
  y,
  width,
  height,
});

const circle = (cx: number, cy: number, r: number): CircleShape => ({ type: 'circle', cx, cy, r });

describe('collision', () => {
  describe('shapeBounds', () => {
    it('computes the bounding box of each shape type', () => {
      expect(shapeBounds(circle(100, 200, 30))).toEqual({ minX: 70, minY: 170, maxX: 130, maxY: 230 });
      expect(shapeBounds(rect(10, 20, 30, 40))).toEqual({ minX: 10, minY: 20, maxX: 40, maxY: 60 });

      const polygon: PolygonShape = {
        type: 'polygon',
        points: [
          { x: 5, y: 50 },
          { x: 80, y: 10 },
          { x: 40, y: 90 },
        ],
      };
      expect(shapeBounds(polygon)).toEqual({ minX: 5, minY: 10, maxX: 80, maxY: 90 });
    });
  });

  describe('isWithinTable', () => {
    it('is inclusive of the table edges', () => {
      expect(isWithinTable(rect(0, 0, 1200, 1200), 1200, 1200)).toBe(true);
      expect(isWithinTable(rect(1, 0, 1200, 1200), 1200, 1200)).toBe(false);
      expect(isWithinTable(circle(20, 20, 21), 1200, 1200)).toBe(false);
    });
  });

  describe('shapesOverlap', () => {
    it('keeps the minimum clearance between rectangles', () => {
      expect(shapesOverlap(rect(0, 0, 100, 100), rect(110, 0, 50, 50))).toBe(false);
      expect(shapesOverlap(rect(0, 0, 100, 100), rect(109, 0, 50, 50))).toBe(true);
    });

    it('checks circles by centre distance', () => {
      expect(shapesOverlap(circle(0, 0, 50), circle(110, 0, 50))).toBe(false);
      expect(shapesOverlap(circle(0, 0, 50), circle(109, 0, 50))).toBe(true);
    });

    it('checks a circle against the nearest point of a rectangle', () => {
      expect(shapesOverlap(rect(0, 0, 100, 100), circle(140, 50, 30))).toBe(false);
      expect(shapesOverlap(circle(139, 50, 30), rect(0, 0, 100, 100))).toBe(true);
      // Corner: nearest point (100, 100), distance 50 > 30 + 10
      expect(shapesOverlap(rect(0, 0, 100, 100), circle(130, 140, 30))).toBe(false);
    });

    it('treats polygons as their bounding box', () => {
      const triangle: PolygonShape = {
        type: 'polygon',
        points: [
          { x: 0, y: 0 },
          { x: 100, y: 0 },
          { x: 0, y: 100 },
        ],
      };
      // Outside the triangle itself but inside its box.
      expect(shapesOverlap(triangle, circle(90, 90, 5))).toBe(true);
    });

    it('never reports overlap when either shape allows it', () => {
      const passable: RectShape = { ...rect(0, 0, 100, 100), allowOverlap: true };
      expect(shapesOverlap(passable, rect(50, 50, 100, 100))).toBe(false);
      expect(shapesOverlap(rect(50, 50, 100, 100), passable)).toBe(false);
    });

    it('honours a custom clearance', () => {
      expect(shapesOverlap(circle(0, 0, 25), circle(150, 0, 25), 150)).toBe(true);
      expect(shapesOverlap(circle(0, 0, 25), circle(200, 0, 25), 150)).toBe(false);
    });
  });

  describe('collidesWithAny', () => {
    it('is false for an empty list and true when any shape is hit', () => {
      expect(collidesWithAny(circle(100, 100, 10), [])).toBe(false);
      expect(collidesWithAny(circle(100, 100, 10), [rect(500, 500, 10, 10), circle(105, 100, 5)])).toBe(
        true
      );
    });
  });
});
