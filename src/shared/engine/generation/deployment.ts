import type {
  Corner,
  DeploymentZone,
  Edge,
  Point,
  PolygonShape,
  RectShape,
} from '../../types/scenario';
import type { SeededRNG } from '../../utils/rng';
import type { TableSize } from '../tableSize';
import type { DeploymentEntry } from './catalogue';

/** Open ground kept between the two deployment zones. */
export const MIN_NO_MANS_LAND_MM = 200;

const CORNER_ARC_SEGMENTS = 12;

const EDGE_LABELS: Record<Edge, string> = {
  north: 'North',
  south: 'South',
  east: 'East',
  west: 'West',
};

const CORNER_LABELS: Record<Corner, string> = {
  'north-west': 'North-west',
  'north-east': 'North-east',
  'south-west': 'South-west',
  'south-east': 'South-east',
};

function edgeRect(side: Edge, depth: number, table: TableSize): RectShape {
  const w = table.widthMm;
  const h = table.heightMm;
  const base = { type: 'rect' as const, layer: 'deployment' as const, label: EDGE_LABELS[side] };
  switch (side) {
    case 'north':
      return { ...base, x: 0, y: 0, width: w, height: depth };
    case 'south':
      return { ...base, x: 0, y: h - depth, width: w, height: depth };
    case 'west':
      return { ...base, x: 0, y: 0, width: depth, height: h };
    case 'east':
      return { ...base, x: w - depth, y: 0, width: depth, height: h };
  }
}

/**
 * Quarter disc anchored on a table corner, as a polygon: the corner itself
 * followed by the arc from one edge to the other.
 */
export function cornerPolygon(corner: Corner, radius: number, table: TableSize): PolygonShape {
  const w = table.widthMm;
  const h = table.heightMm;
  const anchorX = corner.endsWith('west') ? 0 : w;
  const anchorY = corner.startsWith('north') ? 0 : h;
  const signX = anchorX === 0 ? 1 : -1;
  const signY = anchorY === 0 ? 1 : -1;

  const points: Point[] = [{ x: anchorX, y: anchorY }];
  for (let i = 0; i <= CORNER_ARC_SEGMENTS; i++) {
    const angle = (i * Math.PI) / (2 * CORNER_ARC_SEGMENTS);
    points.push({
      x: anchorX + signX * Math.round(radius * Math.cos(angle)),
      y: anchorY + signY * Math.round(radius * Math.sin(angle)),
    });
  }
  return { type: 'polygon', points, layer: 'deployment', label: CORNER_LABELS[corner] };
}

/**
 * Lay out the two opposing zones described by `entry`, or `null` when they
 * cannot fit on this table with open ground between them.
 */
export function layoutDeploymentZones(
  entry: DeploymentEntry,
  table: TableSize,
  rng: SeededRNG
): DeploymentZone[] | null {
  const layout = entry.layout;
  const zone = (side: Edge | Corner, shape: RectShape | PolygonShape): DeploymentZone => ({
    entryId: entry.id,
    name: entry.name,
    description: entry.description,
    side,
    shape,
  });

  if (layout.kind === 'edges') {
    const axis =
      layout.axis === 'any' ? rng.pick(['north-south', 'east-west'] as const) : layout.axis;
    const span = axis === 'north-south' ? table.heightMm : table.widthMm;
    const maxDepth = Math.min(layout.maxDepthMm, Math.floor((span - MIN_NO_MANS_LAND_MM) / 2));
    if (maxDepth < layout.minDepthMm) {
      return null;
    }
    const depth = rng.nextInt(layout.minDepthMm, maxDepth);
    const sides: [Edge, Edge] = axis === 'north-south' ? ['north', 'south'] : ['west', 'east'];
    return sides.map((side) => zone(side, edgeRect(side, depth, table)));
  }

  const diagonal = layout.diagonal === 'any' ? rng.pick(['nw-se', 'ne-sw'] as const) : layout.diagonal;
  const shortSide = Math.min(table.widthMm, table.heightMm);
  const diagonalLength = Math.hypot(table.widthMm, table.heightMm);
  const maxRadius = Math.min(
    layout.maxRadiusMm,
    shortSide,
    Math.floor((diagonalLength - MIN_NO_MANS_LAND_MM) / 2)
  );
  if (maxRadius < layout.minRadiusMm) {
    return null;
  }
  const radius = rng.nextInt(layout.minRadiusMm, maxRadius);
  const corners: [Corner, Corner] =
    diagonal === 'nw-se' ? ['north-west', 'south-east'] : ['north-east', 'south-west'];
  return corners.map((corner) => zone(corner, cornerPolygon(corner, radius, table)));
}
