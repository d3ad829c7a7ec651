import {
  InvalidCoordinateError,
  OutOfBoundsError,
  PolygonPointCountError,
  ScenarioErrorCode,
  ShapeCountExceededError,
  UnknownShapeTypeError,
  ValidationError,
} from '../../src/shared/errors';
import { buildMapSpec, tryBuildMapSpec } from '../../src/shared/engine/mapSpec';
import { MAX_SHAPES, coerceInteger } from '../../src/shared/engine/shapeValidation';
import { TableSize } from '../../src/shared/engine/tableSize';

const table = TableSize.standard();

function square(size: number): Array<{ x: number; y: number }> {
  return [
    { x: 0, y: 0 },
    { x: size, y: 0 },
    { x: size, y: size },
  ];
}

describe('buildMapSpec', () => {
  it('keeps shapes in input order', () => {
    const spec = buildMapSpec(table, [
      { type: 'rect', x: 0, y: 0, width: 100, height: 50 },
      { type: 'circle', cx: 600, cy: 600, r: 40 },
      { type: 'polygon', points: square(200) },
    ]);

    expect(spec.shapes.map((s) => s.type)).toEqual(['rect', 'circle', 'polygon']);
    expect(spec.table).toBe(table);
  });

  it('coerces integer strings and accepts [x, y] pairs', () => {
    const spec = buildMapSpec(table, [
      { type: 'circle', cx: '600', cy: ' 300 ', r: '25' },
      {
        type: 'polygon',
        points: [
          [10, 10],
          ['20', 10],
          [15, '30'],
        ],
      },
    ]);

    expect(spec.shapes[0]).toEqual({ type: 'circle', cx: 600, cy: 300, r: 25 });
    expect(spec.shapes[1]).toEqual({
      type: 'polygon',
      points: [
        { x: 10, y: 10 },
        { x: 20, y: 10 },
        { x: 15, y: 30 },
      ],
    });
  });

  it('keeps shape metadata', () => {
    const spec = buildMapSpec(table, [
      {
        type: 'rect',
        x: 10,
        y: 10,
        width: 100,
        height: 100,
        label: 'Hill',
        layer: 'scenography',
        allowOverlap: true,
        fill: '#00ff00',
      },
    ]);

    expect(spec.shapes[0]).toMatchObject({
      label: 'Hill',
      layer: 'scenography',
      allowOverlap: true,
      fill: '#00ff00',
    });
    expect(spec.shapesOnLayer('scenography')).toHaveLength(1);
    expect(spec.shapesOnLayer('objective')).toHaveLength(0);
  });

  it('freezes the spec, its shape list and polygon points', () => {
    const spec = buildMapSpec(table, [{ type: 'polygon', points: square(100) }]);
    const polygon = spec.shapes[0];

    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.shapes)).toBe(true);
    expect(Object.isFrozen(polygon)).toBe(true);
    if (polygon.type !== 'polygon') {
      throw new Error('expected a polygon');
    }
    expect(Object.isFrozen(polygon.points)).toBe(true);
    expect(Object.isFrozen(polygon.points[0])).toBe(true);
  });

  it('accepts shapes touching the table edges', () => {
    expect(() =>
      buildMapSpec(table, [
        { type: 'rect', x: 0, y: 0, width: 1200, height: 1200 },
        { type: 'circle', cx: 50, cy: 1150, r: 50 },
      ])
    ).not.toThrow();
  });

  it('accepts exactly the maximum number of shapes', () => {
    const shapes = Array.from({ length: MAX_SHAPES }, () => ({ type: 'circle', cx: 100, cy: 100, r: 10 }));
    expect(buildMapSpec(table, shapes).shapes).toHaveLength(MAX_SHAPES);
  });

  describe('rejections', () => {
    it('rejects 101 shapes on count before looking at bounds', () => {
      const shapes = Array.from({ length: 101 }, () => ({ type: 'circle', cx: 5000, cy: 5000, r: 10 }));

      expect(() => buildMapSpec(table, shapes)).toThrow(ShapeCountExceededError);
    });

    it('rejects an unknown type tag', () => {
      const shapes = [{ type: 'ellipse', cx: 1, cy: 1, rx: 1, ry: 1 }];
      expect(() => buildMapSpec(table, shapes)).toThrow(UnknownShapeTypeError);
    });

    it('rejects a polygon with too few points before coercing them', () => {
      const shapes = [{ type: 'polygon', points: [{ x: 'a', y: 0 }, { x: 1, y: 1 }] }];
      expect(() => buildMapSpec(table, shapes)).toThrow(PolygonPointCountError);
    });

    it('rejects a polygon with too many points', () => {
      const points = Array.from({ length: 201 }, (_, i) => ({ x: i % 100, y: 5 }));
      expect(() => buildMapSpec(table, [{ type: 'polygon', points }])).toThrow(
        PolygonPointCountError
      );
    });

    it('rejects fractional coordinates with the field path', () => {
      const result = tryBuildMapSpec(table, [
        { type: 'rect', x: 0, y: 0, width: 10, height: 10 },
        { type: 'circle', cx: 100.5, cy: 100, r: 10 },
      ]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidCoordinateError);
        expect(result.error.field).toBe('shapes[1].cx');
      }
    });

    it('rejects a zero radius as not positive', () => {
      expect(() => buildMapSpec(table, [{ type: 'circle', cx: 100, cy: 100, r: 0 }])).toThrow(
        'shapes[0].r must be positive, got 0'
      );
    });

    it('rejects a circle crossing the table edge', () => {
      const result = tryBuildMapSpec(table, [{ type: 'circle', cx: 1190, cy: 600, r: 20 }]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(OutOfBoundsError);
        expect(result.error.code).toBe(ScenarioErrorCode.SHAPE_OUT_OF_BOUNDS);
        expect(result.error.context).toMatchObject({
          index: 0,
          bounds: { minX: 1170, minY: 580, maxX: 1210, maxY: 620 },
          table: { widthMm: 1200, heightMm: 1200 },
        });
      }
    });

    it('rejects an unknown layer', () => {
      const shapes = [{ type: 'circle', cx: 100, cy: 100, r: 10, layer: 'sky' }];
      expect(() => buildMapSpec(table, shapes)).toThrow('unknown layer: sky');
    });

    it('rejects non-array input', () => {
      expect(() => buildMapSpec(table, { type: 'circle' })).toThrow(ValidationError);
    });
  });

  describe('withShapes', () => {
    it('returns a new spec and leaves the original untouched', () => {
      const original = buildMapSpec(table, [{ type: 'circle', cx: 100, cy: 100, r: 10 }]);
      const edited = original.withShapes([{ type: 'rect', x: 0, y: 0, width: 5, height: 5 }]);

      expect(edited).not.toBe(original);
      expect(original.shapes[0].type).toBe('circle');
      expect(edited.shapes[0].type).toBe('rect');
      expect(edited.table).toBe(table);
    });
  });

  it('tryBuildMapSpec returns the spec on success', () => {
    const result = tryBuildMapSpec(table, []);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.toJSON()).toEqual({ table: { widthMm: 1200, heightMm: 1200 }, shapes: [] });
    }
  });
});

describe('coerceInteger', () => {
  it.each([
    [12, 12],
    ['-7', -7],
    [' 42 ', 42],
    [-0, 0],
  ])('accepts %p', (input, expected) => {
    expect(coerceInteger('f', input)).toBe(expected);
  });

  it.each([[1.5], ['1.5'], ['1e3'], [true], [null], [Number.NaN], ['']])('rejects %p', (input) => {
    expect(() => coerceInteger('f', input)).toThrow(InvalidCoordinateError);
  });
});
