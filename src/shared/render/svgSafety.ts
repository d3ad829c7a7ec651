import { RenderRefusedError } from '../errors';

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/** Escape text for use in element content or a double-quoted attribute. */
export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

const SAFE_PAINT = /^(#[0-9a-fA-F]{3,8}|rgba?\(\s*[\d.,/%\s]+\)|[a-zA-Z]+)$/;
const DANGEROUS_VALUE = /url\s*\(|javascript:|vbscript:|data:|expression\s*\(/i;
const MAX_PAINT_LENGTH = 64;

/**
 * Paint allowlist: hex colours, `rgb()`/`rgba()` with numeric arguments,
 * and bare colour keywords (which covers `none` and `transparent`).
 */
export function isSafePaint(value: string): boolean {
  const trimmed = value.trim();
  return (
    trimmed.length > 0 &&
    trimmed.length <= MAX_PAINT_LENGTH &&
    SAFE_PAINT.test(trimmed) &&
    !DANGEROUS_VALUE.test(trimmed)
  );
}

export function safePaint(value: string | undefined, fallback: string): string {
  return value !== undefined && isSafePaint(value) ? value.trim() : fallback;
}

/** True for values that must never reach an attribute, whatever its name. */
export function isDangerousValue(value: string): boolean {
  return DANGEROUS_VALUE.test(value);
}

/**
 * Re-check a numeric value right before interpolation. Anything that is not
 * a finite integer stops the render.
 */
export function svgInt(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new RenderRefusedError(`${field} is not an integer`, {
      field,
      valueType: typeof value,
    });
  }
  return value;
}
