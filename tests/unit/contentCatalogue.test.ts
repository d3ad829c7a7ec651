/**
 * Sanity checks on the catalogue shipped in content/.
 */

import fs from 'fs';
import path from 'path';
import { parseCatalogue } from '../../src/server/catalogue/FileCatalogueProvider';
import { generateScenario } from '../../src/shared/engine/generation/generator';
import { isWithinTable } from '../../src/shared/engine/collision';
import { GAME_MODES } from '../../src/shared/types/scenario';
import type { TableRequest } from '../../src/shared/types/scenario';

const CATALOGUE_PATH = path.join(__dirname, '..', '..', 'content', 'catalogue.json');

jest.mock('../../src/server/utils/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('content catalogue', () => {
  const catalogue = parseCatalogue(fs.readFileSync(CATALOGUE_PATH, 'utf8'), CATALOGUE_PATH);

  it('passes schema validation', () => {
    expect(catalogue.size()).toBe(36);
  });

  it('keeps narrative hooks out of matched play', () => {
    expect(catalogue.entries('matched', 'narrativeHook')).toEqual([]);
    expect(catalogue.limits('matched').narrativeHooks).toEqual({ min: 0, max: 0 });
  });

  it.each(GAME_MODES)('has enough entries to meet every %s minimum', (mode) => {
    const limits = catalogue.limits(mode);
    expect(catalogue.entries(mode, 'deployment').length).toBeGreaterThan(0);
    expect(catalogue.entries(mode, 'scenography').length).toBeGreaterThan(0);
    expect(catalogue.entries(mode, 'objective').length).toBeGreaterThanOrEqual(
      limits.objectives.min
    );
    expect(catalogue.entries(mode, 'specialRule').length).toBeGreaterThanOrEqual(
      limits.specialRules.min
    );
    expect(catalogue.entries(mode, 'victoryPoints').length).toBeGreaterThanOrEqual(
      limits.victoryPoints.min
    );
    expect(catalogue.entries(mode, 'narrativeHook').length).toBeGreaterThanOrEqual(
      limits.narrativeHooks.min
    );
  });

  it.each(GAME_MODES)('generates %s scenarios that stay on a standard table', (mode) => {
    for (let seed = 1; seed <= 20; seed++) {
      const scenario = generateScenario({ mode, seed, table: 'standard' }, catalogue);

      for (const shape of scenario.mapSpec.shapes) {
        expect(isWithinTable(shape, 1200, 1200)).toBe(true);
      }
      expect(scenario.content.score !== null).toBe(mode === 'matched');
    }
  });

  const TABLE_LIMITS: Array<[string, TableRequest]> = [
    ['60×60 cm', { widthCm: 60, heightCm: 60 }],
    ['300×60 cm', { widthCm: 300, heightCm: 60 }],
    ['60×300 cm', { widthCm: 60, heightCm: 300 }],
    ['300×300 cm', { widthCm: 300, heightCm: 300 }],
    ['90×60 cm', { widthCm: 90, heightCm: 60 }],
  ];

  describe.each(TABLE_LIMITS)('on a %s table', (_label, table) => {
    it.each(GAME_MODES)('generates %s scenarios for every seed', (mode) => {
      for (let seed = 1; seed <= 40; seed++) {
        const scenario = generateScenario({ mode, seed, table }, catalogue);
        const { widthMm, heightMm } = scenario.table;

        for (const shape of scenario.mapSpec.shapes) {
          expect(isWithinTable(shape, widthMm, heightMm)).toBe(true);
        }
        const limits = catalogue.limits(mode);
        expect(scenario.content.objectives.length).toBeGreaterThanOrEqual(limits.objectives.min);
        expect(scenario.content.objectives.length).toBeLessThanOrEqual(limits.objectives.max);
      }
    });
  });
});
