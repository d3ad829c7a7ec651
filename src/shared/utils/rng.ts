/**
 * Seeded randomness and seed utilities.
 *
 * Every generation run owns one {@link SeededRNG}; nothing in the engine
 * touches `Math.random`. The stream is mulberry32, which is small, fast and
 * gives identical sequences on every JavaScript runtime for the same seed.
 */

import { createHash, randomInt } from 'crypto';

/** Largest accepted seed (2^31 - 1). */
export const MAX_SEED = 0x7fffffff;

/**
 * Deterministic pseudo-random stream.
 *
 * @example
 * ```typescript
 * const rng = new SeededRNG(42);
 * const depth = rng.nextInt(150, 300);
 * ```
 */
export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0;
  }

  /** Next float in `[0, 1)`. */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Next integer in `[min, max]`, both ends inclusive. */
  nextInt(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new RangeError(`invalid integer range [${min}, ${max}]`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('cannot pick from an empty list');
    }
    return items[this.nextInt(0, items.length - 1)];
  }

  /** Fisher-Yates shuffle into a new array. */
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.nextInt(0, i);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }
}

/**
 * Source of fresh seeds when a request does not carry one. Injected so tests
 * can pin it.
 */
export type EntropySource = () => number;

/**
 * Draw a seed from the operating system's CSPRNG.
 */
export function generateScenarioSeed(): number {
  return randomInt(0, MAX_SEED + 1);
}

/**
 * Normalize an externally supplied seed.
 *
 * Accepts non-negative integers and strings of decimal digits. Values above
 * {@link MAX_SEED} are clamped. Booleans, fractions, negatives and anything
 * else throw a `RangeError`.
 */
export function normalizeSeed(raw: unknown): number {
  if (typeof raw === 'number') {
    if (!Number.isInteger(raw) || raw < 0) {
      throw new RangeError(`seed must be a non-negative integer, got ${raw}`);
    }
    return Math.min(raw, MAX_SEED);
  }
  if (typeof raw === 'string') {
    const text = raw.trim();
    if (!/^\d+$/.test(text)) {
      throw new RangeError(`seed must be a non-negative integer, got ${JSON.stringify(raw)}`);
    }
    // Long digit strings overflow to Infinity / imprecise values; both clamp.
    const value = Number(text);
    return Number.isSafeInteger(value) ? Math.min(value, MAX_SEED) : MAX_SEED;
  }
  throw new RangeError(`seed must be a non-negative integer, got ${typeof raw}`);
}

/**
 * Seed for re-roll attempt `attempt` of a run started with `baseSeed`.
 *
 * Attempt 0 is the base seed itself. Later attempts hash a 12-byte buffer
 * (base seed as a big-endian 64-bit integer, then the attempt as a
 * big-endian 32-bit integer) with SHA-256 and keep the first four bytes
 * masked to 31 bits.
 */
export function deriveAttemptSeed(baseSeed: number, attempt: number): number {
  if (attempt === 0) {
    return baseSeed;
  }
  const buffer = Buffer.alloc(12);
  buffer.writeBigUInt64BE(BigInt(baseSeed), 0);
  buffer.writeUInt32BE(attempt, 8);
  const digest = createHash('sha256').update(buffer).digest();
  return digest.readUInt32BE(0) & MAX_SEED;
}

/**
 * Stable seed derived from a configuration object: SHA-256 over its
 * canonical (key-sorted) JSON form, first four bytes masked to 31 bits.
 */
export function seedFromConfig(config: Record<string, unknown>): number {
  const digest = createHash('sha256').update(canonicalJson(config), 'utf8').digest();
  return digest.readUInt32BE(0) & MAX_SEED;
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}
