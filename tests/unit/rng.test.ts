import fc from 'fast-check';

import {
  MAX_SEED,
  SeededRNG,
  deriveAttemptSeed,
  generateScenarioSeed,
  normalizeSeed,
  seedFromConfig,
} from '../../src/shared/utils/rng';

describe('SeededRNG', () => {
  it('produces the mulberry32 stream for a seed', () => {
    const rng = new SeededRNG(42);
    expect(rng.next()).toBeCloseTo(0.6011037519201636, 15);
    expect(rng.next()).toBeCloseTo(0.44829055899754167, 15);
  });

  it('draws inclusive integer ranges', () => {
    const rng = new SeededRNG(42);
    expect([1, 2, 3, 4, 5].map(() => rng.nextInt(1, 6))).toEqual([4, 3, 6, 5, 2]);
  });

  it('shuffles deterministically without touching the input', () => {
    const input = [1, 2, 3, 4];
    expect(new SeededRNG(42).shuffle(input)).toEqual([1, 4, 2, 3]);
    expect(input).toEqual([1, 2, 3, 4]);
  });

  it('rejects empty picks and inverted ranges', () => {
    const rng = new SeededRNG(1);
    expect(() => rng.pick([])).toThrow(RangeError);
    expect(() => rng.nextInt(5, 4)).toThrow('invalid integer range [5, 4]');
  });

  it('stays within [0, 1) and repeats for the same seed', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: MAX_SEED }), (seed) => {
        const a = new SeededRNG(seed);
        const b = new SeededRNG(seed);
        for (let i = 0; i < 5; i++) {
          const value = a.next();
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThan(1);
          expect(b.next()).toBe(value);
        }
      })
    );
  });
});

describe('normalizeSeed', () => {
  it.each([
    [0, 0],
    [42, 42],
    ['  17 ', 17],
    [MAX_SEED + 10, MAX_SEED],
    ['99999999999999999999999', MAX_SEED],
  ])('normalizes %p to %p', (input, expected) => {
    expect(normalizeSeed(input)).toBe(expected);
  });

  it.each([[-1], [1.5], ['-3'], ['abc'], [true], [null]])('rejects %p', (input) => {
    expect(() => normalizeSeed(input)).toThrow(RangeError);
  });
});

describe('deriveAttemptSeed', () => {
  it('returns the base seed for attempt 0', () => {
    expect(deriveAttemptSeed(42, 0)).toBe(42);
  });

  it('hashes later attempts into the seed range', () => {
    expect(deriveAttemptSeed(42, 1)).toBe(1734511940);
    expect(deriveAttemptSeed(42, 2)).toBe(712578080);
    expect(deriveAttemptSeed(0, 1)).toBe(874762210);
  });
});

describe('seedFromConfig', () => {
  it('ignores key order and undefined values', () => {
    expect(seedFromConfig({ b: 1, a: 2 })).toBe(1398958787);
    expect(seedFromConfig({ a: 2, b: 1, c: undefined })).toBe(1398958787);
  });
});

describe('generateScenarioSeed', () => {
  it('draws a seed in range', () => {
    const seed = generateScenarioSeed();
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(MAX_SEED);
  });
});
