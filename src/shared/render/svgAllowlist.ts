/**
 * The SVG vocabulary the project emits and accepts back.
 *
 * The renderer builds every element through this allowlist and the server
 * sanitizer filters untrusted markup against the same table, so the two can
 * never drift apart.
 */

export const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';

export type SvgElementName = 'svg' | 'g' | 'rect' | 'circle' | 'polygon' | 'text';

const PAINT_ATTRIBUTES = ['fill', 'stroke', 'stroke-width'] as const;

export const ALLOWED_SVG_ATTRIBUTES: Readonly<Record<SvgElementName, readonly string[]>> = {
  svg: ['xmlns', 'width', 'height', 'viewBox'],
  g: ['transform'],
  rect: ['x', 'y', 'width', 'height', ...PAINT_ATTRIBUTES],
  circle: ['cx', 'cy', 'r', ...PAINT_ATTRIBUTES],
  polygon: ['points', ...PAINT_ATTRIBUTES],
  text: [
    'x',
    'y',
    'fill',
    'font-size',
    'font-family',
    'text-anchor',
    'dominant-baseline',
    'font-weight',
  ],
};

const ELEMENT_NAMES: readonly SvgElementName[] = ['svg', 'g', 'rect', 'circle', 'polygon', 'text'];

export function isAllowedElement(name: string): name is SvgElementName {
  return ELEMENT_NAMES.some((candidate) => candidate === name);
}

export function isAllowedAttribute(element: SvgElementName, attribute: string): boolean {
  return ALLOWED_SVG_ATTRIBUTES[element].includes(attribute);
}

/** Attributes whose value is a paint and must pass {@link isSafePaint}. */
export const PAINT_VALUE_ATTRIBUTES: readonly string[] = ['fill', 'stroke'];

export const TEXT_ANCHORS: readonly string[] = ['start', 'middle', 'end'];

export const DOMINANT_BASELINES: readonly string[] = [
  'auto',
  'middle',
  'central',
  'hanging',
  'alphabetic',
];

export const FONT_WEIGHTS: readonly string[] = ['normal', 'bold', 'bolder', 'lighter'];
