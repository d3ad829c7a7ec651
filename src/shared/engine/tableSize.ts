/**
 * TableSize - immutable play-area geometry.
 *
 * Dimensions are stored in whole millimetres. Input in centimetres, inches or
 * feet is first rounded half-up to the nearest 0.1 cm and only then turned
 * into millimetres. The rounding works on the decimal digits of the input, so
 * `fromCm(60.05, …)` lands on 601 mm rather than whatever the nearest binary
 * float happens to be.
 */

import { ValidationError } from '../errors';
import type { LengthUnit, TablePreset } from '../types/scenario';

export const MIN_TABLE_MM = 600;
export const MAX_TABLE_MM = 3000;

/** Most decimal places accepted on a dimension. */
export const MAX_DECIMAL_PLACES = 2;

/** Size of one unit expressed in hundredths of a centimetre. */
const HUNDREDTHS_OF_CM: Record<Exclude<LengthUnit, 'mm'>, number> = {
  cm: 100,
  in: 254,
  ft: 3048,
};

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

type Dimension = 'width' | 'height';

export class TableSize {
  readonly widthMm: number;
  readonly heightMm: number;

  private constructor(widthMm: number, heightMm: number) {
    this.widthMm = widthMm;
    this.heightMm = heightMm;
    Object.freeze(this);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Factories
  // ═══════════════════════════════════════════════════════════════════════

  static fromCm(width: number | string, height: number | string): TableSize {
    return TableSize.fromUnit('cm', width, height);
  }

  static fromIn(width: number | string, height: number | string): TableSize {
    return TableSize.fromUnit('in', width, height);
  }

  static fromFt(width: number | string, height: number | string): TableSize {
    return TableSize.fromUnit('ft', width, height);
  }

  /** Whole millimetres only; no rounding is applied. */
  static fromMm(widthMm: number, heightMm: number): TableSize {
    return new TableSize(checkMm('width', widthMm), checkMm('height', heightMm));
  }

  static fromUnit(unit: LengthUnit, width: number | string, height: number | string): TableSize {
    if (unit === 'mm') {
      return TableSize.fromMm(parseMmInput('width', width), parseMmInput('height', height));
    }
    const factor = HUNDREDTHS_OF_CM[unit];
    const widthMm = checkBounds('width', toMm('width', width, factor));
    const heightMm = checkBounds('height', toMm('height', height, factor));
    return new TableSize(widthMm, heightMm);
  }

  /** 120 × 120 cm. */
  static standard(): TableSize {
    return new TableSize(1200, 1200);
  }

  /** 180 × 120 cm. */
  static massive(): TableSize {
    return new TableSize(1800, 1200);
  }

  static preset(name: TablePreset): TableSize {
    switch (name) {
      case 'standard':
        return TableSize.standard();
      case 'massive':
        return TableSize.massive();
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Accessors
  // ═══════════════════════════════════════════════════════════════════════

  get widthCm(): number {
    return this.widthMm / 10;
  }

  get heightCm(): number {
    return this.heightMm / 10;
  }

  get areaMm2(): number {
    return this.widthMm * this.heightMm;
  }

  toCm(): { width: number; height: number } {
    return { width: this.widthCm, height: this.heightCm };
  }

  toInches(): { width: number; height: number } {
    return { width: this.widthMm / 25.4, height: this.heightMm / 25.4 };
  }

  toFeet(): { width: number; height: number } {
    return { width: this.widthMm / 304.8, height: this.heightMm / 304.8 };
  }

  equals(other: TableSize): boolean {
    return this.widthMm === other.widthMm && this.heightMm === other.heightMm;
  }

  toJSON(): { widthMm: number; heightMm: number } {
    return { widthMm: this.widthMm, heightMm: this.heightMm };
  }

  toString(): string {
    return `${this.widthCm}×${this.heightCm} cm`;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Parsing helpers
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse a dimension into integer hundredths of the input unit.
 */
function toHundredths(dimension: Dimension, raw: number | string): number {
  let text: string;
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      throw new ValidationError(dimension, `${dimension} must be a finite number`, { value: raw });
    }
    if (raw <= 0) {
      throw new ValidationError(dimension, `${dimension} must be positive`, { value: raw });
    }
    text = String(raw);
  } else if (typeof raw === 'string') {
    text = raw.trim();
    if (text === '') {
      throw new ValidationError(dimension, `${dimension} must not be empty`);
    }
    if (text.includes(',')) {
      throw new ValidationError(
        dimension,
        `${dimension} must use '.' as the decimal separator, got ${JSON.stringify(raw)}`,
        { value: raw }
      );
    }
  } else {
    throw new ValidationError(dimension, `${dimension} must be a number or numeric string`, {
      value: typeof raw,
    });
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    const negative = /^-\d+(\.\d+)?$/.test(text);
    throw new ValidationError(
      dimension,
      negative ? `${dimension} must be positive` : `${dimension} is not a valid number: ${text}`,
      { value: text }
    );
  }

  const fraction = match[2] ?? '';
  if (fraction.length > MAX_DECIMAL_PLACES) {
    throw new ValidationError(
      dimension,
      `${dimension} cannot have more than ${MAX_DECIMAL_PLACES} decimal places, got ${text}`,
      { value: text }
    );
  }
  // Anything with more integer digits than this is far beyond MAX_TABLE_MM.
  if (match[1].length > 9) {
    throw new ValidationError(dimension, `${dimension} must be at most ${MAX_TABLE_MM / 10} cm`, {
      value: text,
      bound: 'max',
    });
  }

  const hundredths = Number(match[1]) * 100 + Number(fraction.padEnd(MAX_DECIMAL_PLACES, '0'));
  if (hundredths <= 0) {
    throw new ValidationError(dimension, `${dimension} must be positive`, { value: text });
  }
  return hundredths;
}

/**
 * Convert to millimetres: value (1/100 unit) × factor (1/100 cm per unit)
 * gives 1/10000 cm; round half-up to 0.1 cm (= 1 mm = 1000 such units).
 */
function toMm(dimension: Dimension, raw: number | string, factor: number): number {
  const tenThousandthsOfCm = toHundredths(dimension, raw) * factor;
  return Math.floor((tenThousandthsOfCm + 500) / 1000);
}

function parseMmInput(dimension: Dimension, raw: number | string): number {
  const value = typeof raw === 'string' && /^\s*\d+\s*$/.test(raw) ? Number(raw) : raw;
  if (typeof value !== 'number') {
    throw new ValidationError(dimension, `${dimension} must be a whole number of millimetres`, {
      value: raw,
    });
  }
  return value;
}

function checkMm(dimension: Dimension, value: number): number {
  if (!Number.isInteger(value)) {
    throw new ValidationError(dimension, `${dimension} must be a whole number of millimetres`, {
      value,
    });
  }
  return checkBounds(dimension, value);
}

function checkBounds(dimension: Dimension, mm: number): number {
  if (mm < MIN_TABLE_MM) {
    throw new ValidationError(
      dimension,
      `${dimension} must be at least ${MIN_TABLE_MM / 10} cm, got ${mm / 10} cm`,
      { valueMm: mm, bound: 'min', limitMm: MIN_TABLE_MM }
    );
  }
  if (mm > MAX_TABLE_MM) {
    throw new ValidationError(
      dimension,
      `${dimension} must be at most ${MAX_TABLE_MM / 10} cm, got ${mm / 10} cm`,
      { valueMm: mm, bound: 'max', limitMm: MAX_TABLE_MM }
    );
  }
  return mm;
}
