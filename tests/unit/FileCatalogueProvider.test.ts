import path from 'path';
import { CatalogueError } from '../../src/shared/errors';
import { config } from '../../src/server/config';
import {
  FileCatalogueProvider,
  parseCatalogue,
} from '../../src/server/catalogue/FileCatalogueProvider';
import { logger } from '../../src/server/utils/logger';
import { FIXTURE_CATALOGUE_PATH } from '../helpers/scenarioFixtures';

jest.mock('../../src/server/utils/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('parseCatalogue', () => {
  it('rejects text that is not JSON', () => {
    expect(() => parseCatalogue('{', 'inline')).toThrow(
      new CatalogueError('Catalogue inline is not valid JSON')
    );
  });

  it('names the first schema issue', () => {
    expect(() => parseCatalogue('{"version":1}', 'draft.json')).toThrow(
      'Catalogue draft.json is invalid: entries: Required'
    );
  });

  it('lists every schema issue in the error context', () => {
    try {
      parseCatalogue('{"version":2}');
      throw new Error('expected a CatalogueError');
    } catch (error) {
      expect(error).toBeInstanceOf(CatalogueError);
      if (error instanceof CatalogueError) {
        expect(error.context.source).toBe('inline');
        expect(error.context.issues).toEqual(
          expect.arrayContaining([expect.objectContaining({ path: 'version' })])
        );
      }
    }
  });
});

describe('FileCatalogueProvider', () => {
  it('defaults to the configured catalogue path', () => {
    expect(new FileCatalogueProvider().path).toBe(config.catalogue.path);
  });

  it('loads and validates a catalogue file', () => {
    const catalogue = new FileCatalogueProvider(FIXTURE_CATALOGUE_PATH).load();

    expect(catalogue.size()).toBe(13);
    expect(catalogue.entries('matched', 'narrativeHook')).toEqual([]);
    expect(catalogue.entries('casual', 'narrativeHook').map((e) => e.id)).toEqual([
      'feud',
      'oath',
    ]);
    expect(logger.info).toHaveBeenCalledWith('Scenario catalogue loaded', {
      path: FIXTURE_CATALOGUE_PATH,
      entries: 13,
    });
  });

  it('reports a missing file', () => {
    const missing = path.join(__dirname, 'no-such-catalogue.json');
    expect(() => new FileCatalogueProvider(missing).load()).toThrow(
      `Catalogue file could not be read: ${missing}`
    );
    expect(logger.info).not.toHaveBeenCalled();
  });
});
