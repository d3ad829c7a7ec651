import { GenerationError } from '../../errors';
import type { CircleShape, ObjectivePlacement, Shape } from '../../types/scenario';
import type { SeededRNG } from '../../utils/rng';
import { collidesWithAny } from '../collision';
import { MAX_LABEL_LENGTH } from '../shapeValidation';
import type { TableSize } from '../tableSize';
import type { CountLimit, ObjectiveEntry } from './catalogue';
import { candidateOrder, drawCount } from './selection';
import { scaleMm, tableScale } from './tableScale';

export const OBJECTIVE_MARKER_RADIUS_MM = 25;

/** Minimum gap between two objective markers on a standard-width table. */
export const MIN_OBJECTIVE_SPACING_MM = 150;

/** Keeps scattered markers off the table edge. */
const EDGE_MARGIN_MM = 50;

/** Entry name, numbered when the entry has several markers; the name is cut to fit the label limit. */
export function markerLabel(entry: ObjectiveEntry, index: number): string {
  const suffix = entry.markers > 1 ? ` ${index + 1}` : '';
  return `${entry.name.slice(0, MAX_LABEL_LENGTH - suffix.length)}${suffix}`;
}

function marker(entry: ObjectiveEntry, index: number, x: number, y: number): CircleShape {
  return {
    type: 'circle',
    cx: x,
    cy: y,
    r: OBJECTIVE_MARKER_RADIUS_MM,
    layer: 'objective',
    label: markerLabel(entry, index),
  };
}

/** Marker gap for `table`, shrunk on tables narrower than the standard one. */
export function objectiveSpacing(table: TableSize): number {
  return scaleMm(MIN_OBJECTIVE_SPACING_MM, tableScale(table));
}

function fits(
  candidate: CircleShape,
  obstacles: readonly Shape[],
  markers: readonly CircleShape[],
  spacing: number
): boolean {
  return !collidesWithAny(candidate, obstacles) && !collidesWithAny(candidate, markers, spacing);
}

function fixedPositions(entry: ObjectiveEntry, table: TableSize): Array<[number, number]> {
  const w = table.widthMm;
  const h = table.heightMm;
  const n = entry.markers;
  if (entry.layout === 'centre') {
    const spacing = objectiveSpacing(table) + 2 * OBJECTIVE_MARKER_RADIUS_MM;
    return Array.from({ length: n }, (_, i): [number, number] => [
      Math.round(w / 2 + (i - (n - 1) / 2) * spacing),
      Math.floor(h / 2),
    ]);
  }
  // midline: spread along the table's long axis
  return Array.from({ length: n }, (_, i): [number, number] =>
    w >= h
      ? [Math.floor((w * (i + 1)) / (n + 1)), Math.floor(h / 2)]
      : [Math.floor(w / 2), Math.floor((h * (i + 1)) / (n + 1))]
  );
}

/**
 * Markers for one objective entry, or `null` if they cannot all be placed
 * clear of the obstacles and of earlier markers.
 */
function layoutMarkers(
  entry: ObjectiveEntry,
  table: TableSize,
  rng: SeededRNG,
  obstacles: readonly Shape[],
  existing: readonly CircleShape[],
  maxTries: number
): CircleShape[] | null {
  const r = OBJECTIVE_MARKER_RADIUS_MM;
  const spacing = objectiveSpacing(table);
  const markers: CircleShape[] = [];

  if (entry.layout !== 'scattered') {
    for (const [i, [x, y]] of fixedPositions(entry, table).entries()) {
      const candidate = marker(entry, i, x, y);
      if (x - r < 0 || y - r < 0 || x + r > table.widthMm || y + r > table.heightMm) {
        return null;
      }
      if (!fits(candidate, obstacles, [...existing, ...markers], spacing)) {
        return null;
      }
      markers.push(candidate);
    }
    return markers;
  }

  const lo = r + EDGE_MARGIN_MM;
  for (let i = 0; i < entry.markers; i++) {
    let placed: CircleShape | null = null;
    for (let attempt = 0; attempt < maxTries && placed === null; attempt++) {
      const candidate = marker(
        entry,
        i,
        rng.nextInt(lo, table.widthMm - lo),
        rng.nextInt(lo, table.heightMm - lo)
      );
      if (fits(candidate, obstacles, [...existing, ...markers], spacing)) {
        placed = candidate;
      }
    }
    if (placed === null) {
      return null;
    }
    markers.push(placed);
  }
  return markers;
}

/**
 * Choose and place objectives. Each slot uses a distinct entry; markers keep
 * clear of deployment zones, solid scenography and each other.
 *
 * Slots up to `limit.min` are required and fail the step when no candidate
 * fits. Slots above it are left out instead, so the count still falls within
 * the mode limit.
 */
export function placeObjectives(
  rng: SeededRNG,
  entries: readonly ObjectiveEntry[],
  limit: CountLimit,
  table: TableSize,
  obstacles: readonly Shape[],
  maxTries: number
): Array<{ entry: ObjectiveEntry; placement: ObjectivePlacement }> {
  const count = drawCount(rng, 'objectives', limit, entries.length);
  const chosen: Array<{ entry: ObjectiveEntry; placement: ObjectivePlacement }> = [];
  const allMarkers: CircleShape[] = [];

  for (let slot = 0; slot < count; slot++) {
    const remaining = entries.filter((e) => !chosen.some((c) => c.entry.id === e.id));
    let filled = false;
    for (const entry of candidateOrder(rng, remaining)) {
      const markers = layoutMarkers(entry, table, rng, obstacles, allMarkers, maxTries);
      if (markers !== null) {
        allMarkers.push(...markers);
        chosen.push({
          entry,
          placement: {
            entryId: entry.id,
            name: entry.name,
            description: entry.description,
            markers,
          },
        });
        filled = true;
        break;
      }
    }
    if (!filled) {
      if (slot >= limit.min) {
        break;
      }
      throw new GenerationError('objectives', `no candidate fits for objective ${slot + 1}`, {
        slot,
      });
    }
  }
  return chosen;
}
