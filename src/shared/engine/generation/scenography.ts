import { GenerationError } from '../../errors';
import type { Point, ScenographyPiece, Shape } from '../../types/scenario';
import type { SeededRNG } from '../../utils/rng';
import { collidesWithAny, pointsBounds } from '../collision';
import type { TableSize } from '../tableSize';
import type { ScenographyEntry } from './catalogue';
import { candidateOrder } from './selection';
import { scaleFootprint, tableScale } from './tableScale';

/** Default number of random positions tried per candidate. */
export const DEFAULT_MAX_PLACEMENT_TRIES = 200;

function rotateQuarterTurns(points: readonly Point[], turns: number): Point[] {
  let rotated = points.map((p) => ({ x: p.x, y: p.y }));
  for (let i = 0; i < turns; i++) {
    rotated = rotated.map((p) => ({ x: -p.y, y: p.x }));
  }
  const b = pointsBounds(rotated);
  return rotated.map((p) => ({ x: p.x - b.minX + 0, y: p.y - b.minY + 0 }));
}

/**
 * One random placement of `entry` on the table, or `null` when its
 * footprint can never fit.
 */
function drawFootprint(entry: ScenographyEntry, table: TableSize, rng: SeededRNG): Shape | null {
  const w = table.widthMm;
  const h = table.heightMm;
  const meta = {
    layer: 'scenography' as const,
    label: entry.name,
    ...(entry.allowOverlap && { allowOverlap: true }),
    ...(entry.fill !== undefined && { fill: entry.fill }),
  };
  // Sizes shrink with tables narrower than the standard one.
  const footprint = scaleFootprint(entry.footprint, tableScale(table));

  switch (footprint.kind) {
    case 'circle': {
      const r = rng.nextInt(footprint.minRadiusMm, footprint.maxRadiusMm);
      if (2 * r > w || 2 * r > h) {
        return null;
      }
      return { type: 'circle', cx: rng.nextInt(r, w - r), cy: rng.nextInt(r, h - r), r, ...meta };
    }
    case 'rect': {
      const width = rng.nextInt(footprint.minWidthMm, footprint.maxWidthMm);
      const height = rng.nextInt(footprint.minHeightMm, footprint.maxHeightMm);
      if (width > w || height > h) {
        return null;
      }
      return {
        type: 'rect',
        x: rng.nextInt(0, w - width),
        y: rng.nextInt(0, h - height),
        width,
        height,
        ...meta,
      };
    }
    case 'polygon': {
      const outline = rotateQuarterTurns(footprint.points, rng.nextInt(0, 3));
      const b = pointsBounds(outline);
      if (b.maxX > w || b.maxY > h) {
        return null;
      }
      const dx = rng.nextInt(0, w - b.maxX);
      const dy = rng.nextInt(0, h - b.maxY);
      return {
        type: 'polygon',
        points: outline.map((p) => ({ x: p.x + dx, y: p.y + dy })),
        ...meta,
      };
    }
  }
}

/**
 * Place `count` scenography pieces. Each slot walks the candidates in seeded
 * order and gives every candidate up to `maxTries` random positions that do
 * not collide with pieces already placed.
 */
export function placeScenography(
  rng: SeededRNG,
  entries: readonly ScenographyEntry[],
  count: number,
  table: TableSize,
  maxTries: number
): Array<{ entry: ScenographyEntry; piece: ScenographyPiece }> {
  const placed: Array<{ entry: ScenographyEntry; piece: ScenographyPiece }> = [];
  const shapes: Shape[] = [];

  for (let slot = 0; slot < count; slot++) {
    let filled = false;
    for (const entry of candidateOrder(rng, entries)) {
      for (let attempt = 0; attempt < maxTries && !filled; attempt++) {
        const shape = drawFootprint(entry, table, rng);
        if (shape === null) {
          break;
        }
        if (!collidesWithAny(shape, shapes)) {
          shapes.push(shape);
          placed.push({ entry, piece: { entryId: entry.id, name: entry.name, shape } });
          filled = true;
        }
      }
      if (filled) {
        break;
      }
    }
    if (!filled) {
      throw new GenerationError('scenography', `no candidate fits for piece ${slot + 1}`, {
        slot,
        placed: placed.length,
      });
    }
  }
  return placed;
}
