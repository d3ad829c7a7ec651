/**
 * Environment Configuration Tests
 *
 * Covers the Zod environment schema, its defaults and coercion, and the
 * assembly of the frozen application config.
 */

import path from 'path';
import {
  parseEnv,
  getEffectiveNodeEnv,
  isJestRuntime,
  isProduction,
  isProductionLike,
  isTest,
  type RawEnv,
} from '../../src/server/config/env';
import { buildConfig } from '../../src/server/config/unified';

function parsed(env: NodeJS.ProcessEnv): RawEnv {
  const result = parseEnv(env);
  if (!result.success) {
    throw new Error(`unexpected env errors: ${JSON.stringify(result.errors)}`);
  }
  return result.data;
}

describe('EnvSchema', () => {
  it('should apply defaults to an empty environment', () => {
    expect(parsed({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      LOG_FORMAT: 'json',
      SCENARIO_CATALOGUE_PATH: 'content/catalogue.json',
      GENERATION_MAX_PLACEMENT_TRIES: 200,
    });
  });

  it('should coerce numeric generation settings', () => {
    const env = parsed({ GENERATION_MAX_REROLLS: '5', GENERATION_MAX_PLACEMENT_TRIES: '50' });
    expect(env.GENERATION_MAX_REROLLS).toBe(5);
    expect(env.GENERATION_MAX_PLACEMENT_TRIES).toBe(50);
  });

  it.each([
    ['NODE_ENV', 'qa'],
    ['LOG_LEVEL', 'loud'],
    ['LOG_FORMAT', 'xml'],
    ['GENERATION_MAX_REROLLS', '-1'],
    ['GENERATION_MAX_PLACEMENT_TRIES', '0'],
    ['SCENARIO_CATALOGUE_PATH', ''],
  ])('should reject an invalid %s', (key, value) => {
    const result = parseEnv({ [key]: value });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((e) => e.path)).toEqual([key]);
    }
  });
});

describe('environment helpers', () => {
  it('should detect the Jest runtime from JEST_WORKER_ID', () => {
    expect(isJestRuntime({ JEST_WORKER_ID: '1' })).toBe(true);
    expect(isJestRuntime({})).toBe(false);
  });

  it('should force test mode under Jest', () => {
    const env = parsed({ NODE_ENV: 'production' });
    expect(getEffectiveNodeEnv(env, { JEST_WORKER_ID: '1' })).toBe('test');
    expect(getEffectiveNodeEnv(env, {})).toBe('production');
  });

  it('should classify environments', () => {
    expect(isProduction('production')).toBe(true);
    expect(isProduction('staging')).toBe(false);
    expect(isProductionLike('staging')).toBe(true);
    expect(isProductionLike('development')).toBe(false);
    expect(isTest('test')).toBe(true);
  });
});

describe('buildConfig', () => {
  it('should resolve the catalogue path against the working directory', () => {
    const config = buildConfig(parsed({}), '/srv/scenarios');
    expect(config.catalogue.path).toBe(path.resolve('/srv/scenarios', 'content/catalogue.json'));
  });

  it('should carry logging and generation settings', () => {
    const config = buildConfig(
      parsed({
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'pretty',
        LOG_FILE: ' ',
        GENERATION_MAX_REROLLS: '4',
      })
    );
    expect(config.logging).toEqual({ level: 'debug', format: 'pretty' });
    expect(config.generation).toEqual({ maxRerolls: 4, maxPlacementTries: 200 });
  });

  it('should report test mode and a default version under Jest', () => {
    const config = buildConfig(parsed({ NODE_ENV: 'production' }));
    expect(config.nodeEnv).toBe('test');
    expect(config.isTest).toBe(true);
    expect(config.isProduction).toBe(false);
    expect(config.app.version).toBe('0.0.0');
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(buildConfig(parsed({})))).toBe(true);
  });
});
