/**
 * Where to put the caption of an objective marker so it stays readable and
 * inside the table.
 *
 * Four slots are considered: above, below, right and left of the marker.
 * Side slots run the text vertically (rotated 90°), so their length is
 * measured along y. When the marker sits comfortably away from every edge
 * the slots are tried in that fixed order; near an edge, the slot facing the
 * most free space wins.
 */

export type LabelDirection = 'up' | 'down' | 'right' | 'left';

export interface LabelPosition {
  readonly x: number;
  readonly y: number;
  readonly direction: LabelDirection;
  /** Clockwise rotation around (x, y) in degrees; 0 for horizontal text. */
  readonly rotation: number;
}

export const LABEL_FONT_SIZE = 16;
const LABEL_GAP = 25;
const COMFORT_DISTANCE = 200;
const PREFERENCE: readonly LabelDirection[] = ['up', 'down', 'right', 'left'];

/** Rough advance width of `text` at the label font size. */
export function estimateTextWidth(text: string, fontSize = LABEL_FONT_SIZE): number {
  return Math.ceil(text.length * fontSize * 0.6);
}

function clampCentre(centre: number, halfLength: number, limit: number): number {
  if (centre - halfLength < 0) {
    return Math.min(halfLength, limit);
  }
  if (centre + halfLength > limit) {
    return Math.max(limit - halfLength, 0);
  }
  return centre;
}

interface Slot extends LabelPosition {
  readonly space: number;
}

export function placeObjectiveLabel(
  cx: number,
  cy: number,
  radius: number,
  text: string,
  widthMm: number,
  heightMm: number
): LabelPosition {
  const length = estimateTextWidth(text);
  const half = Math.floor(length / 2);
  const thickness = Math.floor(LABEL_FONT_SIZE * 1.25);
  const offset = radius + LABEL_GAP;
  const slots: Slot[] = [];

  if (cy - offset - thickness / 2 >= 0) {
    slots.push({
      direction: 'up',
      x: clampCentre(cx, half, widthMm),
      y: cy - offset,
      rotation: 0,
      space: cy,
    });
  }
  if (cy + offset + thickness / 2 <= heightMm) {
    slots.push({
      direction: 'down',
      x: clampCentre(cx, half, widthMm),
      y: cy + offset,
      rotation: 0,
      space: heightMm - cy,
    });
  }
  if (cx + offset + thickness / 2 <= widthMm) {
    slots.push({
      direction: 'right',
      x: cx + offset,
      y: clampCentre(cy, half, heightMm),
      rotation: 90,
      space: widthMm - cx,
    });
  }
  if (cx - offset - thickness / 2 >= 0) {
    slots.push({
      direction: 'left',
      x: cx - offset,
      y: clampCentre(cy, half, heightMm),
      rotation: -90,
      space: cx,
    });
  }

  if (slots.length === 0) {
    return { x: cx, y: cy, direction: 'up', rotation: 0 };
  }

  const nearestEdge = Math.min(cx, cy, widthMm - cx, heightMm - cy);
  let chosen: Slot | undefined;
  if (nearestEdge >= COMFORT_DISTANCE) {
    chosen = PREFERENCE.map((direction) => slots.find((s) => s.direction === direction)).find(
      (slot): slot is Slot => slot !== undefined
    );
  }
  if (!chosen) {
    chosen = slots.reduce((best, slot) => (slot.space > best.space ? slot : best));
  }
  return {
    x: Math.round(chosen.x),
    y: Math.round(chosen.y),
    direction: chosen.direction,
    rotation: chosen.rotation,
  };
}
