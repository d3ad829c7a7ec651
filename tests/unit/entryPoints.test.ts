/**
 * The engine entry point must stay free of the server layer: importing it
 * may not read the environment or build the logger.
 */

jest.mock('../../src/server/config/unified', () => {
  throw new Error('server configuration loaded by the engine entry point');
});
jest.mock('../../src/server/utils/logger', () => {
  throw new Error('logger loaded by the engine entry point');
});

import * as engine from '../../src';

describe('engine entry point', () => {
  it('exports the pure engine', () => {
    expect(typeof engine.generateScenario).toBe('function');
    expect(typeof engine.renderMapSvg).toBe('function');
    expect(typeof engine.ScenarioCard.create).toBe('function');
  });

  it('does not export the server layer', () => {
    expect('sanitizeSvg' in engine).toBe(false);
    expect('ScenarioCardService' in engine).toBe(false);
    expect('FileCatalogueProvider' in engine).toBe(false);
  });
});
