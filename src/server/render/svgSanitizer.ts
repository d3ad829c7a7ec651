/**
 * Hardened re-ingestion of SVG that came from outside the renderer (stored
 * cards, uploads, imports).
 *
 * - DOCTYPE and ENTITY declarations are refused outright, so no entity can
 *   ever be defined, let alone expanded.
 * - Elements outside the allowlist are dropped together with their subtree.
 * - Attributes outside the per-element allowlist are dropped, as are `on*`
 *   handlers, `href`, `style`, `class`, prefixed attributes and foreign
 *   namespace declarations.
 * - Paint values pass the renderer's paint filter; numeric attributes must
 *   be integers; `url(`, `javascript:` and `data:` never survive.
 * - The surviving tree is re-serialized with every value escaped again.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { ValidationError } from '../../shared/errors';
import {
  DOMINANT_BASELINES,
  FONT_WEIGHTS,
  PAINT_VALUE_ATTRIBUTES,
  SVG_NAMESPACE,
  TEXT_ANCHORS,
  isAllowedAttribute,
  isAllowedElement,
} from '../../shared/render/svgAllowlist';
import type { SvgElementName } from '../../shared/render/svgAllowlist';
import { escapeXml, isDangerousValue, isSafePaint } from '../../shared/render/svgSafety';

export const MAX_SVG_BYTES = 1_000_000;
const MAX_DEPTH = 32;
const ATTR_PREFIX = '@_';
const TEXT_KEY = '#text';
const ATTRS_KEY = ':@';

const INTEGER = /^-?\d+$/;
const POINTS = /^\s*-?\d+\s*,\s*-?\d+(\s+-?\d+\s*,\s*-?\d+)*\s*$/;
const VIEW_BOX = /^\s*-?\d+(\s+-?\d+){3}\s*$/;
const TRANSFORM = /^\s*rotate\(\s*-?\d+(\s+-?\d+\s+-?\d+)?\s*\)\s*$/;
const FONT_FAMILY = /^[A-Za-z0-9 ,-]{1,64}$/;
const FORBIDDEN_DECLARATION = /<!\s*(DOCTYPE|ENTITY)/i;

/** One node of fast-xml-parser's `preserveOrder` output. */
type OrderedNode = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNodeList(value: unknown): value is OrderedNode[] {
  return Array.isArray(value) && value.every(isRecord);
}

function tagOf(node: OrderedNode): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRS_KEY);
}

function isValidAttributeValue(element: SvgElementName, name: string, value: string): boolean {
  if (isDangerousValue(value)) {
    return false;
  }
  if (PAINT_VALUE_ATTRIBUTES.includes(name)) {
    return isSafePaint(value);
  }
  switch (name) {
    case 'xmlns':
      return element === 'svg' && value === SVG_NAMESPACE;
    case 'points':
      return POINTS.test(value);
    case 'viewBox':
      return VIEW_BOX.test(value);
    case 'transform':
      return TRANSFORM.test(value);
    case 'font-family':
      return FONT_FAMILY.test(value);
    case 'text-anchor':
      return TEXT_ANCHORS.includes(value);
    case 'dominant-baseline':
      return DOMINANT_BASELINES.includes(value);
    case 'font-weight':
      return FONT_WEIGHTS.includes(value) || INTEGER.test(value);
    default:
      // Remaining allowlisted attributes are all plain integers.
      return INTEGER.test(value.trim());
  }
}

function sanitizeAttributes(element: SvgElementName, raw: unknown): Record<string, string> {
  const kept: Record<string, string> = {};
  if (!isRecord(raw)) {
    return kept;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(ATTR_PREFIX) || typeof value !== 'string') {
      continue;
    }
    const name = key.slice(ATTR_PREFIX.length);
    if (name.includes(':') || name.toLowerCase().startsWith('on')) {
      continue;
    }
    if (!isAllowedAttribute(element, name) || !isValidAttributeValue(element, name, value)) {
      continue;
    }
    kept[key] = escapeXml(value.trim());
  }
  return kept;
}

function sanitizeChildren(nodes: OrderedNode[], parent: SvgElementName, depth: number): OrderedNode[] {
  if (depth > MAX_DEPTH) {
    return [];
  }
  const result: OrderedNode[] = [];
  for (const node of nodes) {
    const tag = tagOf(node);
    if (tag === undefined) {
      continue;
    }
    if (tag === TEXT_KEY) {
      const text = node[TEXT_KEY];
      if (parent === 'text' && typeof text === 'string' && text !== '') {
        result.push({ [TEXT_KEY]: escapeXml(text) });
      }
      continue;
    }
    // Prefixed (foreign namespace) and unknown elements go with their subtree.
    if (tag.includes(':') || !isAllowedElement(tag) || tag === 'svg') {
      continue;
    }
    const children = node[tag];
    const sanitized: OrderedNode = {
      [tag]: isNodeList(children) ? sanitizeChildren(children, tag, depth + 1) : [],
    };
    const attributes = sanitizeAttributes(tag, node[ATTRS_KEY]);
    if (Object.keys(attributes).length > 0) {
      sanitized[ATTRS_KEY] = attributes;
    }
    result.push(sanitized);
  }
  return result;
}

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  allowBooleanAttributes: false,
  parseTagValue: false,
  parseAttributeValue: false,
  processEntities: true,
  htmlEntities: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  processEntities: false,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
  format: false,
});

/**
 * Parse, filter and re-serialize untrusted SVG markup.
 *
 * @throws ValidationError when the input is not well-formed XML, declares a
 *   DOCTYPE or ENTITY, is too large, or has no `<svg>` root.
 */
export function sanitizeSvg(svg: string): string {
  if (Buffer.byteLength(svg, 'utf8') > MAX_SVG_BYTES) {
    throw new ValidationError('svg', `SVG exceeds ${MAX_SVG_BYTES} bytes`);
  }
  if (FORBIDDEN_DECLARATION.test(svg)) {
    throw new ValidationError('svg', 'DOCTYPE and ENTITY declarations are not allowed');
  }
  const validation = XMLValidator.validate(svg);
  if (validation !== true) {
    throw new ValidationError('svg', `SVG is not well-formed: ${validation.err.msg}`, {
      line: validation.err.line,
      col: validation.err.col,
    });
  }

  const parsed: unknown = parser.parse(svg);
  const roots = isNodeList(parsed) ? parsed : [];
  const root = roots.find((node) => tagOf(node) === 'svg');
  if (root === undefined) {
    throw new ValidationError('svg', 'document root must be <svg>');
  }

  const attributes = sanitizeAttributes('svg', root[ATTRS_KEY]);
  attributes[`${ATTR_PREFIX}xmlns`] = SVG_NAMESPACE;
  const children = root.svg;
  const clean: OrderedNode[] = [
    {
      svg: isNodeList(children) ? sanitizeChildren(children, 'svg', 1) : [],
      [ATTRS_KEY]: attributes,
    },
  ];
  const output: unknown = builder.build(clean);
  return String(output);
}
