import type { TableSize } from '../tableSize';
import type { Footprint } from './catalogue';

/** Catalogue sizes are written for a table with this short side (the standard preset). */
export const REFERENCE_SHORT_SIDE_MM = 1200;

/**
 * Shrink factor for tables narrower than the reference one. Larger tables
 * keep catalogue sizes as written, so the factor never exceeds 1.
 */
export function tableScale(table: TableSize): number {
  return Math.min(1, Math.min(table.widthMm, table.heightMm) / REFERENCE_SHORT_SIDE_MM);
}

export function scaleMm(valueMm: number, scale: number): number {
  return scale >= 1 ? valueMm : Math.max(1, Math.round(valueMm * scale));
}

export function scaleFootprint(footprint: Footprint, scale: number): Footprint {
  if (scale >= 1) {
    return footprint;
  }
  switch (footprint.kind) {
    case 'circle':
      return {
        kind: 'circle',
        minRadiusMm: scaleMm(footprint.minRadiusMm, scale),
        maxRadiusMm: scaleMm(footprint.maxRadiusMm, scale),
      };
    case 'rect':
      return {
        kind: 'rect',
        minWidthMm: scaleMm(footprint.minWidthMm, scale),
        maxWidthMm: scaleMm(footprint.maxWidthMm, scale),
        minHeightMm: scaleMm(footprint.minHeightMm, scale),
        maxHeightMm: scaleMm(footprint.maxHeightMm, scale),
      };
    case 'polygon':
      return {
        kind: 'polygon',
        points: footprint.points.map((p) => ({
          x: Math.round(p.x * scale),
          y: Math.round(p.y * scale),
        })),
      };
  }
}
